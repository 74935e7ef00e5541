import { ErrorType } from '../dto/api-response.dto';

export { ErrorType };

export class AppError extends Error {
  constructor(
    public readonly type: ErrorType,
    public readonly message: string,
    public readonly statusCode: number,
    public readonly details?: Record<string, unknown>,
    public readonly correlationId?: string,
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  static validationError(
    message: string,
    details?: Record<string, unknown>,
    correlationId?: string,
  ): AppError {
    return new AppError(
      ErrorType.VALIDATION_ERROR,
      message,
      400,
      details,
      correlationId,
    );
  }

  static processingError(
    message: string,
    details?: Record<string, unknown>,
    correlationId?: string,
  ): AppError {
    return new AppError(
      ErrorType.PROCESSING_ERROR,
      message,
      500,
      details,
      correlationId,
    );
  }

  static configurationError(
    message: string,
    details?: Record<string, unknown>,
    correlationId?: string,
  ): AppError {
    return new AppError(
      ErrorType.CONFIGURATION_ERROR,
      message,
      500,
      details,
      correlationId,
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}
