import { Injectable } from '@nestjs/common';
import { LoggerService } from '../../common/logger/logger.service';
import { AppError, errorMessage, errorStack } from '../../common/errors/app-error';
import { RawInvoiceDocument } from '../../models/invoice-document';
import {
  VALIDATION_SUCCESS_MESSAGE,
  ValidationMode,
  ValidationReport,
  ValidationStep,
  ValidationVerdict,
} from '../../models/validation-result';
import { NullNormalizerService } from '../normalizer/null-normalizer.service';
import { PresenceCheckService } from '../presence-check/presence-check.service';
import { TypeCheckService } from '../type-check/type-check.service';
import { ReconciliationService } from '../reconciliation/reconciliation.service';
import { ViolationCollector } from './violation-collector';

const CONTEXT = 'InvoiceValidationService';

/**
 * Runs the gated pipeline: normalization, presence, types, relations. A
 * stage only runs when every earlier stage passed.
 */
@Injectable()
export class InvoiceValidationService {
  constructor(
    private readonly normalizer: NullNormalizerService,
    private readonly presenceCheck: PresenceCheckService,
    private readonly typeCheck: TypeCheckService,
    private readonly reconciliation: ReconciliationService,
    private readonly logger: LoggerService,
  ) {}

  /** Stops at the first violation and reports it. */
  validate(document: RawInvoiceDocument): ValidationVerdict {
    const report = this.run(document, 'first');
    const [violation] = report.violations;

    const verdict: ValidationVerdict = violation
      ? { passed: false, failedStep: report.failedStep, details: violation.message, violation }
      : { passed: true, failedStep: ValidationStep.ALL_STEPS, details: VALIDATION_SUCCESS_MESSAGE };

    this.logVerdict(verdict.passed, verdict.failedStep, 1, document);
    return verdict;
  }

  /** Same gates, but the failing stage reports every violation it finds. */
  validateAll(document: RawInvoiceDocument): ValidationReport {
    const report = this.run(document, 'all');
    this.logVerdict(report.passed, report.failedStep, report.violations.length, document);
    return report;
  }

  private run(document: RawInvoiceDocument, mode: ValidationMode): ValidationReport {
    try {
      const normalized = this.normalizer.normalizeDocument(document);

      const presence = new ViolationCollector(mode);
      this.presenceCheck.check(normalized, presence);
      if (!presence.isEmpty) {
        return this.failed(ValidationStep.MISSING_VALUES, presence);
      }

      const types = new ViolationCollector(mode);
      const typed = this.typeCheck.coerce(normalized, types);
      if (!types.isEmpty) {
        return this.failed(ValidationStep.DATA_TYPES, types);
      }

      const relations = new ViolationCollector(mode);
      this.reconciliation.check(typed, relations);
      if (!relations.isEmpty) {
        return this.failed(ValidationStep.RELATIONS, relations);
      }

      return { passed: true, failedStep: ValidationStep.ALL_STEPS, violations: [] };
    } catch (error) {
      this.logger.error('Error during invoice validation', errorStack(error), CONTEXT, {
        mode,
        error: errorMessage(error),
      });

      throw AppError.processingError(
        'Invoice validation failed due to internal error',
        { originalError: errorMessage(error) },
      );
    }
  }

  private failed(step: ValidationStep, collector: ViolationCollector): ValidationReport {
    return { passed: false, failedStep: step, violations: collector.violations };
  }

  private logVerdict(
    passed: boolean,
    step: ValidationStep,
    violationCount: number,
    document: RawInvoiceDocument,
  ): void {
    const metadata = {
      step,
      headerRows: document.invoiceDetails.length,
      lineItemRows: document.lineItems.length,
      summaryRows: document.totalSummary.length,
    };

    this.logger.debug('Invoice validation completed', CONTEXT, { ...metadata, passed });

    if (!passed) {
      this.logger.warn('Invoice validation failed', CONTEXT, { ...metadata, violationCount });
    }
  }
}
