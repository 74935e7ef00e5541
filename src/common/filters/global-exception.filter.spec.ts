import { BadRequestException, HttpException, HttpStatus, Logger, NotFoundException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { GlobalExceptionFilter } from './global-exception.filter';
import { AppError } from '../errors/app-error';
import { ErrorType } from '../dto/api-response.dto';

describe('GlobalExceptionFilter', () => {
  let filter: GlobalExceptionFilter;
  let mockRequest: {
    method: string;
    url: string;
    headers: Record<string, string>;
    body: unknown;
    ip: string;
  };
  let mockResponse: { status: jest.Mock; json: jest.Mock };
  let host: ExecutionContextHost;
  let errorSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  const sentBody = () => mockResponse.json.mock.calls[0][0];

  beforeEach(() => {
    filter = new GlobalExceptionFilter();

    mockRequest = {
      method: 'POST',
      url: '/validation/invoice',
      headers: { 'x-correlation-id': 'test-correlation-id', 'user-agent': 'test-agent' },
      body: { 'Line Items': [] },
      ip: '127.0.0.1',
    };

    mockResponse = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn().mockReturnThis(),
    };

    host = new ExecutionContextHost([mockRequest, mockResponse]);

    errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation();
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('AppError handling', () => {
    it('should render an AppError with its own status and details', () => {
      filter.catch(
        AppError.validationError('"Line Items" must be an array', { field: 'Line Items' }),
        host,
      );

      expect(mockResponse.status).toHaveBeenCalledWith(400);
      expect(mockResponse.json).toHaveBeenCalledWith({
        success: false,
        error: {
          type: ErrorType.VALIDATION_ERROR,
          message: '"Line Items" must be an array',
          details: { field: 'Line Items' },
          correlationId: 'test-correlation-id',
        },
        timestamp: expect.any(String),
      });
      expect(warnSpy).toHaveBeenCalledWith(
        '[test-correlation-id] POST /validation/invoice - "Line Items" must be an array',
        expect.objectContaining({ context: expect.objectContaining({ status: 400, userAgent: 'test-agent' }) }),
      );
    });

    it('should prefer the correlation ID carried by the error', () => {
      filter.catch(AppError.processingError('failed', undefined, 'error-correlation-id'), host);

      expect(mockResponse.status).toHaveBeenCalledWith(500);
      expect(sentBody().error.correlationId).toBe('error-correlation-id');
      expect(errorSpy).toHaveBeenCalled();
    });
  });

  describe('HttpException handling', () => {
    it('should render typed payloads from the validation pipe with field errors', () => {
      const exception = new BadRequestException({
        type: ErrorType.VALIDATION_ERROR,
        message: 'Validation failed',
        details: { fieldErrors: { 'Line Items': ['Line Items must be an array'] }, totalErrors: 1 },
      });

      filter.catch(exception, host);

      expect(mockResponse.status).toHaveBeenCalledWith(400);
      expect(sentBody().error).toEqual({
        type: ErrorType.VALIDATION_ERROR,
        message: 'Validation failed',
        details: { fieldErrors: { 'Line Items': ['Line Items must be an array'] }, totalErrors: 1 },
        correlationId: 'test-correlation-id',
        fieldErrors: { 'Line Items': ['Line Items must be an array'] },
      });
    });

    it('should group default validation messages by field', () => {
      const exception = new BadRequestException(['mode must be one of the following values: first, all']);

      filter.catch(exception, host);

      expect(sentBody().error).toEqual({
        type: ErrorType.VALIDATION_ERROR,
        message: 'Validation failed',
        details: { validationErrors: ['mode must be one of the following values: first, all'] },
        correlationId: 'test-correlation-id',
        fieldErrors: { mode: ['mode must be one of the following values: first, all'] },
      });
    });

    it('should map other client errors to validation errors', () => {
      filter.catch(new NotFoundException('Cannot GET /missing'), host);

      expect(mockResponse.status).toHaveBeenCalledWith(404);
      expect(sentBody().error).toEqual({
        type: ErrorType.VALIDATION_ERROR,
        message: 'Cannot GET /missing',
        correlationId: 'test-correlation-id',
      });
    });

    it('should map server errors to processing errors', () => {
      filter.catch(new HttpException('Upstream unavailable', HttpStatus.SERVICE_UNAVAILABLE), host);

      expect(mockResponse.status).toHaveBeenCalledWith(503);
      expect(sentBody().error.type).toBe(ErrorType.PROCESSING_ERROR);
    });
  });

  describe('unexpected errors', () => {
    const originalEnv = process.env.NODE_ENV;

    afterEach(() => {
      process.env.NODE_ENV = originalEnv;
    });

    it('should expose the message and stack outside production', () => {
      filter.catch(new Error('boom'), host);

      expect(mockResponse.status).toHaveBeenCalledWith(500);
      expect(sentBody().error).toMatchObject({
        type: ErrorType.PROCESSING_ERROR,
        message: 'boom',
        details: { stack: expect.stringContaining('boom') },
      });
    });

    it('should hide internals in production', () => {
      process.env.NODE_ENV = 'production';

      filter.catch(new Error('boom'), host);

      expect(sentBody().error).toEqual({
        type: ErrorType.PROCESSING_ERROR,
        message: 'Internal server error',
        details: undefined,
        correlationId: 'test-correlation-id',
      });
    });

    it('should handle thrown non-errors', () => {
      filter.catch('plain string', host);

      expect(sentBody().error).toMatchObject({
        message: 'Internal server error',
        details: { originalError: 'plain string' },
      });
    });

    it('should generate a correlation ID when the request has none', () => {
      mockRequest.headers = {};

      filter.catch(new Error('boom'), host);

      expect(sentBody().error.correlationId).toHaveLength(36);
    });
  });
});
