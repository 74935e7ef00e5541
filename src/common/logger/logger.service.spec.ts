import { Test, TestingModule } from '@nestjs/testing';
import { createLogger } from 'winston';
import { LoggerService, PerformanceMetrics } from './logger.service';
import { ConfigurationService } from '../../config/configuration.service';

// Mock Winston logger
const mockWinstonLogger = {
  info: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  debug: jest.fn(),
  verbose: jest.fn(),
  log: jest.fn(),
};

jest.mock('winston', () => ({
  createLogger: jest.fn(() => mockWinstonLogger),
  format: {
    combine: jest.fn(() => ({})),
    timestamp: jest.fn(() => ({})),
    errors: jest.fn(() => ({})),
    json: jest.fn(() => ({})),
    colorize: jest.fn(() => ({})),
    printf: jest.fn(() => ({})),
  },
  transports: {
    Console: jest.fn(),
    File: jest.fn(),
  },
}));

describe('LoggerService', () => {
  let service: LoggerService;

  const createService = async (logging: { level: string; enableConsole: boolean; enableFile: boolean }) => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LoggerService,
        {
          provide: ConfigurationService,
          useValue: { logging },
        },
      ],
    }).compile();

    return module.get<LoggerService>(LoggerService);
  };

  beforeEach(async () => {
    service = await createService({ level: 'info', enableConsole: true, enableFile: false });

    // Clear all mocks
    jest.clearAllMocks();
  });

  describe('Logger construction', () => {
    it('should pass the configured level and stay audible with a console transport', async () => {
      await createService({ level: 'debug', enableConsole: true, enableFile: false });

      expect(createLogger).toHaveBeenCalledWith(
        expect.objectContaining({ level: 'debug', silent: false })
      );
    });

    it('should be silent when every transport is disabled', async () => {
      await createService({ level: 'info', enableConsole: false, enableFile: false });

      expect(createLogger).toHaveBeenCalledWith(
        expect.objectContaining({ transports: [], silent: true })
      );
    });
  });

  describe('Basic logging methods', () => {
    it('should log info messages with correlation ID', () => {
      const correlationId = 'test-correlation-id';
      service.setCorrelationId(correlationId);

      service.log('Test message', 'TestContext', { extra: 'data' });

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Test message', {
        context: 'TestContext',
        correlationId,
        extra: 'data',
      });
    });

    it('should log error messages with stack trace', () => {
      const correlationId = 'test-correlation-id';
      service.setCorrelationId(correlationId);

      service.error('Error message', 'Stack trace', 'ErrorContext', { errorCode: 'E001' });

      expect(mockWinstonLogger.error).toHaveBeenCalledWith('Error message', {
        context: 'ErrorContext',
        correlationId,
        stack: 'Stack trace',
        errorCode: 'E001',
      });
    });

    it('should log warning messages', () => {
      service.warn('Warning message', 'WarnContext', { step: 'Step 3: Relations' });

      expect(mockWinstonLogger.warn).toHaveBeenCalledWith('Warning message', {
        context: 'WarnContext',
        correlationId: undefined,
        step: 'Step 3: Relations',
      });
    });

    it('should log debug messages', () => {
      service.debug('Debug message', 'DebugContext');

      expect(mockWinstonLogger.debug).toHaveBeenCalledWith('Debug message', {
        context: 'DebugContext',
        correlationId: undefined,
      });
    });
  });

  describe('Correlation ID management', () => {
    it('should set and clear correlation ID', () => {
      const correlationId = 'test-correlation-id';

      service.setCorrelationId(correlationId);
      service.log('Test message');

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Test message', {
        context: undefined,
        correlationId,
      });

      service.clearCorrelationId();
      service.log('Another message');

      expect(mockWinstonLogger.info).toHaveBeenLastCalledWith('Another message', {
        context: undefined,
        correlationId: undefined,
      });
    });
  });

  describe('Performance monitoring', () => {
    it('should log performance with appropriate log level based on duration', () => {
      const testCases = [
        { durationMs: 500, expectedLevel: 'debug' },
        { durationMs: 1500, expectedLevel: 'info' },
        { durationMs: 3000, expectedLevel: 'warn' },
        { durationMs: 6000, expectedLevel: 'error' },
      ];

      testCases.forEach(({ durationMs, expectedLevel }) => {
        const metrics: PerformanceMetrics = {
          operation: 'invoice-validation',
          durationMs,
          startTime: new Date(),
          endTime: new Date(),
        };

        service.logPerformance(metrics, 'ValidationController');

        expect(mockWinstonLogger.log).toHaveBeenCalledWith(
          expectedLevel,
          `Performance: invoice-validation completed in ${durationMs}ms`,
          expect.objectContaining({
            context: 'ValidationController',
            performance: expect.objectContaining({
              operation: 'invoice-validation',
              durationMs,
            }),
          })
        );
      });
    });
  });

  describe('API request logging', () => {
    it('should log API requests with appropriate log level', () => {
      const testCases = [
        { statusCode: 200, expectedLevel: 'info' },
        { statusCode: 400, expectedLevel: 'warn' },
        { statusCode: 500, expectedLevel: 'error' },
      ];

      testCases.forEach(({ statusCode, expectedLevel }) => {
        service.logApiRequest('POST', '/validation/invoice', statusCode, 25);

        expect(mockWinstonLogger.log).toHaveBeenCalledWith(
          expectedLevel,
          `API Request: POST /validation/invoice - ${statusCode} (25ms)`,
          expect.objectContaining({
            api: expect.objectContaining({
              method: 'POST',
              url: '/validation/invoice',
              statusCode,
              durationMs: 25,
            }),
          })
        );
      });
    });
  });

  describe('Business event logging', () => {
    it('should log business events', () => {
      service.logBusinessEvent('INVOICE_VALIDATED', 'Invoice', 'INV-001', 'validate', { passed: true });

      expect(mockWinstonLogger.info).toHaveBeenCalledWith(
        'Business Event: INVOICE_VALIDATED',
        expect.objectContaining({
          passed: true,
          business: expect.objectContaining({
            event: 'INVOICE_VALIDATED',
            entity: 'Invoice',
            entityId: 'INV-001',
            action: 'validate',
          }),
        })
      );
    });
  });
});
