import { Controller, Get, HttpCode, HttpStatus, Logger } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { errorMessage, errorStack } from '../common/errors/app-error';
import { LoggerService } from '../common/logger/logger.service';
import { MetricsService, ValidationMetricsSummary } from '../common/services/metrics.service';
import { CorrelationIdUtil } from '../common/utils/correlation-id.util';
import { ConfigurationService } from '../config/configuration.service';
import { RawInvoiceDocument } from '../models/invoice-document';
import { InvoiceValidationService } from '../services/invoice-validation/invoice-validation.service';

export interface HealthStatus {
  status: 'healthy' | 'unhealthy' | 'degraded';
  timestamp: string;
  uptime: number;
  version: string;
  environment: string;
  checks: {
    configuration: HealthCheck;
    engine: HealthCheck;
    memory: HealthCheck;
  };
  metrics: ValidationMetricsSummary;
}

export interface HealthCheck {
  status: 'pass' | 'fail' | 'warn';
  responseTime?: number;
  details?: Record<string, unknown>;
  error?: string;
}

export interface ReadinessStatus {
  ready: boolean;
  timestamp: string;
  checks: {
    configuration: boolean;
    engine: boolean;
  };
  details?: Record<string, unknown>;
}

export interface LivenessStatus {
  alive: boolean;
  timestamp: string;
  uptime: number;
  memory: {
    used: number;
    total: number;
    percentage: number;
  };
}

// A consistent invoice the engine must accept.
const SELF_TEST_DOCUMENT: RawInvoiceDocument = {
  invoiceDetails: [
    {
      invoice_number: 'SELF-TEST-1',
      invoice_date: '01-Jan-24',
      place_of_supply: 27,
      place_of_origin: 27,
      receiver_name: 'Self Test',
      gstin_supplier: 'SELFTEST0000000',
      taxable_value: 100,
      invoice_value: 118,
      tax_amount: 18,
    },
  ],
  lineItems: [
    {
      quantity: 2,
      rate_per_item_after_discount: 50,
      taxable_value: 100,
      sgst_rate: 9,
      cgst_rate: 9,
      igst_rate: 0,
      tax_amount: 18,
      final_amount: 118,
    },
  ],
  totalSummary: [
    {
      total_taxable_value: 100,
      total_tax_amount: 18,
      total_invoice_value: 118,
    },
  ],
};

@ApiTags('Health & Monitoring')
@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    private readonly configService: ConfigurationService,
    private readonly loggerService: LoggerService,
    private readonly invoiceValidation: InvoiceValidationService,
    private readonly metrics: MetricsService,
  ) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Comprehensive health check',
    description: 'Configuration, validation engine self-test, memory and validation counters',
  })
  @ApiResponse({ status: HttpStatus.OK, description: 'Health status retrieved successfully' })
  healthCheck(): HealthStatus {
    const correlationId = CorrelationIdUtil.generate();
    const startTime = Date.now();

    this.logger.log('Comprehensive health check requested', { correlationId });

    const checks = {
      configuration: this.checkConfiguration(),
      engine: this.checkEngine(),
      memory: this.checkMemory(),
    };

    const statuses = Object.values(checks).map(check => check.status);
    const overallStatus: HealthStatus['status'] = statuses.includes('fail')
      ? 'unhealthy'
      : statuses.includes('warn')
        ? 'degraded'
        : 'healthy';

    const endTime = Date.now();
    this.loggerService.logPerformance(
      {
        operation: 'health-check',
        durationMs: endTime - startTime,
        startTime: new Date(startTime),
        endTime: new Date(endTime),
      },
      'HealthController',
    );

    this.logger.log('Health check completed', {
      status: overallStatus,
      responseTimeMs: endTime - startTime,
      correlationId,
    });

    return {
      status: overallStatus,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: process.env.npm_package_version || '1.0.0',
      environment: process.env.NODE_ENV || 'development',
      checks,
      metrics: this.metrics.getValidationSummary(),
    };
  }

  @Get('ready')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Readiness check',
    description: 'Check if the application is ready to serve requests',
  })
  @ApiResponse({ status: HttpStatus.OK, description: 'Application readiness status' })
  readinessCheck(): ReadinessStatus {
    const checks = {
      configuration: this.checkConfiguration().status === 'pass',
      engine: this.checkEngine().status === 'pass',
    };
    const ready = checks.configuration && checks.engine;

    this.logger.log('Readiness check completed', { ready });

    return {
      ready,
      timestamp: new Date().toISOString(),
      checks,
      details: ready ? undefined : { reason: 'One or more critical components are not ready' },
    };
  }

  @Get('live')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Liveness check',
    description: 'Check if the application is alive and responsive',
  })
  @ApiResponse({ status: HttpStatus.OK, description: 'Application liveness status' })
  livenessCheck(): LivenessStatus {
    const { used, total, percentage } = this.memoryUsage();

    return {
      alive: true,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      memory: { used, total, percentage },
    };
  }

  private checkConfiguration(): HealthCheck {
    const startTime = Date.now();

    try {
      this.configService.validateConfiguration();
      return {
        status: 'pass',
        responseTime: Date.now() - startTime,
        details: {
          environment: process.env.NODE_ENV || 'development',
          defaultMode: this.configService.validation.defaultMode,
          maxLineItems: this.configService.validation.maxLineItems,
        },
      };
    } catch (error) {
      this.loggerService.error('Configuration check failed', errorStack(error), 'HealthController', {
        error: errorMessage(error),
      });
      return {
        status: 'fail',
        responseTime: Date.now() - startTime,
        error: errorMessage(error),
      };
    }
  }

  private checkEngine(): HealthCheck {
    const startTime = Date.now();

    try {
      const verdict = this.invoiceValidation.validate(SELF_TEST_DOCUMENT);
      const responseTime = Date.now() - startTime;

      if (verdict.passed) {
        return { status: 'pass', responseTime };
      }
      return {
        status: 'fail',
        responseTime,
        error: 'Validation engine rejected the self-test invoice',
        details: { failedStep: verdict.failedStep, reason: verdict.details },
      };
    } catch (error) {
      this.loggerService.error('Engine self-test failed', errorStack(error), 'HealthController', {
        error: errorMessage(error),
      });
      return {
        status: 'fail',
        responseTime: Date.now() - startTime,
        error: errorMessage(error),
      };
    }
  }

  private checkMemory(): HealthCheck {
    const startTime = Date.now();
    const usage = this.memoryUsage();

    let status: HealthCheck['status'] = 'pass';
    let error: string | undefined;

    if (usage.percentage > 90) {
      status = 'fail';
      error = 'Memory usage is critically high';
    } else if (usage.percentage > 75) {
      status = 'warn';
      error = 'Memory usage is high';
    }

    return {
      status,
      responseTime: Date.now() - startTime,
      error,
      details: {
        heapUsed: usage.heapUsed,
        heapTotal: usage.heapTotal,
        external: usage.external,
        rss: usage.rss,
        usedPercentage: usage.percentage,
      },
    };
  }

  private memoryUsage() {
    const memory = process.memoryUsage();
    const total = memory.heapTotal + memory.external;
    const used = memory.heapUsed;

    return {
      ...memory,
      used,
      total,
      percentage: Math.round((used / total) * 10000) / 100,
    };
  }
}
