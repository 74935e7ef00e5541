import { Test, TestingModule } from '@nestjs/testing';
import { HealthController } from './health.controller';
import { LoggerService } from '../common/logger/logger.service';
import { MetricsService } from '../common/services/metrics.service';
import { ConfigurationService } from '../config/configuration.service';
import { AppError } from '../common/errors/app-error';
import { NullNormalizerService } from '../services/normalizer/null-normalizer.service';
import { PresenceCheckService } from '../services/presence-check/presence-check.service';
import { TypeCheckService } from '../services/type-check/type-check.service';
import { ReconciliationService } from '../services/reconciliation/reconciliation.service';
import { InvoiceValidationService } from '../services/invoice-validation/invoice-validation.service';
import { ValidationStep } from '../models/validation-result';
import { MockLogger, TestHelpers, createTestConfigurationService } from '../../test';

describe('HealthController', () => {
  let controller: HealthController;
  let configService: ConfigurationService;
  let invoiceValidation: InvoiceValidationService;
  let metrics: MetricsService;
  let loggerService: MockLogger;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        NullNormalizerService,
        PresenceCheckService,
        TypeCheckService,
        ReconciliationService,
        InvoiceValidationService,
        MetricsService,
        { provide: ConfigurationService, useValue: createTestConfigurationService() },
        { provide: LoggerService, useValue: TestHelpers.createMockLogger() },
      ],
    }).compile();

    controller = module.get<HealthController>(HealthController);
    configService = module.get<ConfigurationService>(ConfigurationService);
    invoiceValidation = module.get<InvoiceValidationService>(InvoiceValidationService);
    metrics = module.get<MetricsService>(MetricsService);
    loggerService = module.get(LoggerService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('healthCheck', () => {
    it('should pass the configuration and engine checks', () => {
      const health = controller.healthCheck();

      expect(health.checks.configuration).toMatchObject({
        status: 'pass',
        details: { defaultMode: 'first', maxLineItems: 1000 },
      });
      expect(health.checks.engine.status).toBe('pass');
      expect(['pass', 'warn', 'fail']).toContain(health.checks.memory.status);
      expect(loggerService.logPerformance).toHaveBeenCalledWith(
        expect.objectContaining({ operation: 'health-check' }),
        'HealthController',
      );
    });

    it('should report validation counters', () => {
      metrics.recordValidation(true, ValidationStep.ALL_STEPS, 3);
      metrics.recordValidation(false, ValidationStep.DATA_TYPES, 5);

      const health = controller.healthCheck();

      expect(health.metrics).toEqual({
        passed: 1,
        failed: 1,
        failedByStep: { 'Step 2: Data Types': 1 },
        durationMs: { count: 2, sum: 8, avg: 4, min: 3, max: 5 },
      });
    });

    it('should be unhealthy when the engine rejects the self-test invoice', () => {
      jest.spyOn(invoiceValidation, 'validate').mockReturnValue({
        passed: false,
        failedStep: ValidationStep.RELATIONS,
        details: 'Invoice value mismatch at row 0: 1 != 100 + 18',
      });

      const health = controller.healthCheck();

      expect(health.status).toBe('unhealthy');
      expect(health.checks.engine).toMatchObject({
        status: 'fail',
        error: 'Validation engine rejected the self-test invoice',
        details: {
          failedStep: 'Step 3: Relations',
          reason: 'Invoice value mismatch at row 0: 1 != 100 + 18',
        },
      });
    });

    it('should be unhealthy when the configuration is invalid', () => {
      jest.spyOn(configService, 'validateConfiguration').mockImplementation(() => {
        throw AppError.configurationError('PORT must be a positive integer');
      });

      const health = controller.healthCheck();

      expect(health.status).toBe('unhealthy');
      expect(health.checks.configuration).toMatchObject({
        status: 'fail',
        error: 'PORT must be a positive integer',
      });
      expect(loggerService.error).toHaveBeenCalledWith(
        'Configuration check failed',
        expect.any(String),
        'HealthController',
        { error: 'PORT must be a positive integer' },
      );
    });
  });

  describe('readinessCheck', () => {
    it('should be ready when configuration and engine pass', () => {
      expect(controller.readinessCheck()).toEqual({
        ready: true,
        timestamp: expect.any(String),
        checks: { configuration: true, engine: true },
        details: undefined,
      });
    });

    it('should not be ready when the engine throws', () => {
      jest.spyOn(invoiceValidation, 'validate').mockImplementation(() => {
        throw new Error('engine down');
      });

      const readiness = controller.readinessCheck();

      expect(readiness.ready).toBe(false);
      expect(readiness.checks).toEqual({ configuration: true, engine: false });
      expect(readiness.details).toEqual({ reason: 'One or more critical components are not ready' });
    });
  });

  describe('livenessCheck', () => {
    it('should report memory usage', () => {
      const liveness = controller.livenessCheck();

      expect(liveness.alive).toBe(true);
      expect(liveness.memory.used).toBeGreaterThan(0);
      expect(liveness.memory.total).toBeGreaterThanOrEqual(liveness.memory.used);
      expect(liveness.memory.percentage).toBeLessThanOrEqual(100);
    });
  });
});
