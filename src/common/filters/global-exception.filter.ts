import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ErrorType, ErrorResponseDto } from '../dto/api-response.dto';
import { AppError } from '../errors/app-error';
import { CorrelationIdUtil } from '../utils/correlation-id.util';
import { sanitizeRequestBody } from '../utils/sanitize.util';
import { isRecord } from '../utils/type-guards';

function isErrorType(value: unknown): value is ErrorType {
  return Object.values(ErrorType).some(type => type === value);
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const correlationId = CorrelationIdUtil.getOrGenerate(request.headers);

    let status: number;
    let errorResponse: ErrorResponseDto;

    if (exception instanceof AppError) {
      status = exception.statusCode;
      errorResponse = {
        success: false,
        error: {
          type: exception.type,
          message: exception.message,
          details: exception.details,
          correlationId: exception.correlationId || correlationId,
        },
        timestamp: new Date().toISOString(),
      };
    } else if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      const payload: Record<string, unknown> = isRecord(exceptionResponse) ? exceptionResponse : {};
      const payloadType = payload.type;
      const payloadMessage = payload.message;

      if (payloadType !== undefined) {
        // Errors raised by CustomValidationPipe and other typed payloads
        errorResponse = {
          success: false,
          error: {
            type: isErrorType(payloadType) ? payloadType : ErrorType.VALIDATION_ERROR,
            message: typeof payloadMessage === 'string' ? payloadMessage : exception.message,
            details: payload.details,
            correlationId,
            fieldErrors: this.toFieldErrors(payload.details),
          },
          timestamp: new Date().toISOString(),
        };
      } else if (Array.isArray(payloadMessage)) {
        // Default NestJS validation pipe errors
        const messages = payloadMessage.map((message: unknown) => String(message));

        errorResponse = {
          success: false,
          error: {
            type: ErrorType.VALIDATION_ERROR,
            message: 'Validation failed',
            details: { validationErrors: messages },
            correlationId,
            fieldErrors: this.extractFieldErrors(messages),
          },
          timestamp: new Date().toISOString(),
        };
      } else {
        errorResponse = {
          success: false,
          error: {
            type: this.getErrorTypeFromStatus(status),
            message: exception.message,
            correlationId,
          },
          timestamp: new Date().toISOString(),
        };
      }
    } else if (exception instanceof Error) {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      errorResponse = {
        success: false,
        error: {
          type: ErrorType.PROCESSING_ERROR,
          message: process.env.NODE_ENV === 'production'
            ? 'Internal server error'
            : exception.message,
          details: process.env.NODE_ENV === 'production'
            ? undefined
            : { stack: exception.stack },
          correlationId,
        },
        timestamp: new Date().toISOString(),
      };
    } else {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      errorResponse = {
        success: false,
        error: {
          type: ErrorType.PROCESSING_ERROR,
          message: 'Internal server error',
          details: process.env.NODE_ENV === 'production'
            ? undefined
            : { originalError: String(exception) },
          correlationId,
        },
        timestamp: new Date().toISOString(),
      };
    }

    this.logError(exception, request, correlationId, status);

    response.status(status).json(errorResponse);
  }

  private getErrorTypeFromStatus(status: number): ErrorType {
    if (status >= 400 && status < 500) {
      return ErrorType.VALIDATION_ERROR;
    }
    return ErrorType.PROCESSING_ERROR;
  }

  private toFieldErrors(details: unknown): Record<string, string[]> | undefined {
    const source = isRecord(details) ? details.fieldErrors : undefined;
    if (!isRecord(source)) {
      return undefined;
    }

    const fieldErrors: Record<string, string[]> = {};
    for (const [field, messages] of Object.entries(source)) {
      if (Array.isArray(messages)) {
        fieldErrors[field] = messages.map(message => String(message));
      }
    }
    return fieldErrors;
  }

  private extractFieldErrors(messages: string[]): Record<string, string[]> | undefined {
    const fieldErrors: Record<string, string[]> = {};
    let hasFieldErrors = false;

    messages.forEach(message => {
      // Format: "property should not be empty" or "property must be a string"
      const fieldMatch = message.match(/^(\w+)\s+(should|must|cannot)/);
      if (fieldMatch) {
        const fieldName = fieldMatch[1];
        if (!fieldErrors[fieldName]) {
          fieldErrors[fieldName] = [];
        }
        fieldErrors[fieldName].push(message);
        hasFieldErrors = true;
      }
    });

    return hasFieldErrors ? fieldErrors : undefined;
  }

  private logError(
    exception: unknown,
    request: Request,
    correlationId: string,
    status: number,
  ): void {
    const message = exception instanceof Error ? exception.message : 'Unknown error';
    const stack = exception instanceof Error ? exception.stack : undefined;

    const logContext = {
      correlationId,
      errorType: exception instanceof AppError
        ? exception.type
        : this.getErrorTypeFromStatus(status),
      method: request.method,
      url: request.url,
      body: sanitizeRequestBody(request.body),
      userAgent: request.headers['user-agent'],
      ip: request.ip,
      status,
      details: exception instanceof AppError ? exception.details : undefined,
      timestamp: new Date().toISOString(),
    };

    if (status >= 500) {
      this.logger.error(
        `[${correlationId}] ${request.method} ${request.url} - ${message}`,
        { stack, context: logContext },
      );
    } else if (status >= 400) {
      this.logger.warn(
        `[${correlationId}] ${request.method} ${request.url} - ${message}`,
        { context: logContext },
      );
    } else {
      this.logger.log(
        `[${correlationId}] ${request.method} ${request.url} - ${message}`,
        { context: logContext },
      );
    }
  }
}
