import { Test, TestingModule } from '@nestjs/testing';
import { MetricsService } from './metrics.service';
import { LoggerService } from '../logger/logger.service';
import { MockLogger, TestHelpers } from '../../../test';

describe('MetricsService', () => {
  let service: MetricsService;
  let loggerService: MockLogger;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MetricsService,
        {
          provide: LoggerService,
          useValue: TestHelpers.createMockLogger(),
        },
      ],
    }).compile();

    service = module.get<MetricsService>(MetricsService);
    loggerService = module.get(LoggerService);
  });

  afterEach(() => {
    service.reset();
  });

  describe('Counter operations', () => {
    it('should increment counter', () => {
      service.incrementCounter('test_counter', 5);
      expect(service.getCounter('test_counter')).toBe(5);

      service.incrementCounter('test_counter', 3);
      expect(service.getCounter('test_counter')).toBe(8);
    });

    it('should increment counter with default value', () => {
      service.incrementCounter('test_counter');
      expect(service.getCounter('test_counter')).toBe(1);
    });

    it('should keep tagged counters apart regardless of tag order', () => {
      service.incrementCounter('requests', 1, { method: 'GET', status: '200' });
      service.incrementCounter('requests', 1, { status: '200', method: 'GET' });
      service.incrementCounter('requests', 1, { method: 'POST', status: '200' });

      expect(service.getCounter('requests', { method: 'GET', status: '200' })).toBe(2);
      expect(service.getCounter('requests', { method: 'POST', status: '200' })).toBe(1);
      expect(service.getCounter('requests')).toBe(0);
    });
  });

  describe('Histogram operations', () => {
    it('should summarize recorded values', () => {
      [4, 1, 7].forEach(value => service.recordHistogram('latency', value));

      expect(service.getHistogramSummary('latency')).toEqual({ count: 3, sum: 12, avg: 4, min: 1, max: 7 });
    });

    it('should return null for an empty histogram', () => {
      expect(service.getHistogramSummary('latency')).toBeNull();
    });

    it('should keep only the most recent 1000 values', () => {
      for (let i = 1; i <= 1001; i++) {
        service.recordHistogram('latency', i);
      }

      const summary = service.getHistogramSummary('latency');
      expect(summary?.count).toBe(1000);
      expect(summary?.min).toBe(2);
      expect(summary?.max).toBe(1001);
    });
  });

  describe('Validation metrics', () => {
    it('should count outcomes by failed step', () => {
      service.recordValidation(true, 'All Steps', 2);
      service.recordValidation(false, 'Step 1: Missing Values', 4);
      service.recordValidation(false, 'Step 1: Missing Values', 6);
      service.recordValidation(false, 'Step 3: Relations', 8);

      expect(service.getValidationSummary()).toEqual({
        passed: 1,
        failed: 3,
        failedByStep: {
          'Step 1: Missing Values': 2,
          'Step 3: Relations': 1,
        },
        durationMs: { count: 4, sum: 20, avg: 5, min: 2, max: 8 },
      });
    });

    it('should report an empty summary before any validation', () => {
      expect(service.getValidationSummary()).toEqual({
        passed: 0,
        failed: 0,
        failedByStep: {},
        durationMs: null,
      });
    });

    it('should log each recorded outcome at debug', () => {
      service.recordValidation(false, 'Step 2: Data Types', 3);

      expect(loggerService.debug).toHaveBeenCalledWith('Recorded validation outcome', 'MetricsService', {
        passed: false,
        step: 'Step 2: Data Types',
        durationMs: 3,
      });
    });

    it('should clear everything on reset', () => {
      service.recordValidation(true, 'All Steps', 1);
      service.reset();

      expect(service.getValidationSummary().passed).toBe(0);
      expect(service.getHistogramSummary('validation.duration')).toBeNull();
    });
  });
});
