import { Module } from '@nestjs/common';
import { MetricsService } from '../common/services/metrics.service';
import { NullNormalizerService } from './normalizer/null-normalizer.service';
import { PresenceCheckService } from './presence-check/presence-check.service';
import { TypeCheckService } from './type-check/type-check.service';
import { ReconciliationService } from './reconciliation/reconciliation.service';
import { InvoiceValidationService } from './invoice-validation/invoice-validation.service';
import { ExtractionMappingService } from './extraction-mapping/extraction-mapping.service';

@Module({
  providers: [
    NullNormalizerService,
    PresenceCheckService,
    TypeCheckService,
    ReconciliationService,
    InvoiceValidationService,
    ExtractionMappingService,
    MetricsService,
  ],
  exports: [
    InvoiceValidationService,
    ExtractionMappingService,
    MetricsService,
  ],
})
export class ServicesModule {}
