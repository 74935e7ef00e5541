import {
  Body,
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { IncomingHttpHeaders } from 'http';
import { ErrorResponseDto, SuccessResponseDto } from '../common/dto/api-response.dto';
import { errorMessage, errorStack } from '../common/errors/app-error';
import { LoggerService } from '../common/logger/logger.service';
import { MetricsService } from '../common/services/metrics.service';
import { CorrelationIdUtil } from '../common/utils/correlation-id.util';
import { ConfigurationService } from '../config/configuration.service';
import { ValidationReport, ValidationVerdict } from '../models/validation-result';
import { ExtractionMappingService } from '../services/extraction-mapping/extraction-mapping.service';
import { InvoiceValidationService } from '../services/invoice-validation/invoice-validation.service';
import { ValidateInvoiceDto, ValidateInvoiceQueryDto } from './dto/validate-invoice.dto';

export type ValidationOutcome = ValidationVerdict | ValidationReport;

@ApiTags('Invoice Validation')
@Controller('validation')
export class ValidationController {
  private readonly logger = new Logger(ValidationController.name);

  constructor(
    private readonly extractionMapping: ExtractionMappingService,
    private readonly invoiceValidation: InvoiceValidationService,
    private readonly metrics: MetricsService,
    private readonly configService: ConfigurationService,
    private readonly loggerService: LoggerService,
  ) {}

  @Post('invoice')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Validate an extracted invoice',
    description:
      'Runs the missing value, data type and relation checks over the extraction result. ' +
      'A failed verdict is returned as data with status 200.',
  })
  @ApiQuery({ name: 'mode', required: false, enum: ['first', 'all'] })
  @ApiResponse({
    status: HttpStatus.OK,
    description: 'Validation verdict, or the violation report in all mode',
    type: SuccessResponseDto,
  })
  @ApiResponse({
    status: HttpStatus.BAD_REQUEST,
    description: 'Malformed extraction document',
    type: ErrorResponseDto,
  })
  validateInvoice(
    @Body() body: ValidateInvoiceDto,
    @Query() query: ValidateInvoiceQueryDto,
    @Headers() headers: IncomingHttpHeaders,
  ): SuccessResponseDto<ValidationOutcome> {
    const correlationId = CorrelationIdUtil.getOrGenerate(headers);
    const mode = query.mode ?? this.configService.validation.defaultMode;
    const startTime = Date.now();

    this.logger.log('Invoice validation request received', {
      mode,
      lineItems: Array.isArray(body['Line Items']) ? body['Line Items'].length : 0,
      correlationId,
    });

    try {
      const document = this.extractionMapping.toRawDocument(body, correlationId);

      const outcome: ValidationOutcome = mode === 'all'
        ? this.invoiceValidation.validateAll(document)
        : this.invoiceValidation.validate(document);

      const endTime = Date.now();
      const durationMs = endTime - startTime;

      this.metrics.recordValidation(outcome.passed, outcome.failedStep, durationMs);

      this.loggerService.logPerformance(
        {
          operation: 'invoice-validation',
          durationMs,
          startTime: new Date(startTime),
          endTime: new Date(endTime),
        },
        'ValidationController',
        { mode, correlationId },
      );

      this.loggerService.logBusinessEvent(
        outcome.passed ? 'invoice-validation-passed' : 'invoice-validation-failed',
        'invoice',
        correlationId,
        'validate',
        { mode, failedStep: outcome.failedStep },
      );

      return {
        success: true,
        data: outcome,
        timestamp: new Date().toISOString(),
        correlationId,
      };
    } catch (error) {
      this.loggerService.error(
        'Invoice validation request failed',
        errorStack(error),
        'ValidationController',
        {
          mode,
          correlationId,
          durationMs: Date.now() - startTime,
          error: errorMessage(error),
        },
      );
      throw error;
    }
  }
}
