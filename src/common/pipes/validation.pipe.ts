import {
  BadRequestException,
  Injectable,
  ValidationPipe as NestValidationPipe,
} from '@nestjs/common';
import { ValidationError } from 'class-validator';
import { ErrorType } from '../dto/api-response.dto';

/**
 * Request DTO validation that fails with the typed error payload the global
 * exception filter understands.
 */
@Injectable()
export class CustomValidationPipe extends NestValidationPipe {
  constructor() {
    super({
      whitelist: true,
      transform: true,
      exceptionFactory: (errors: ValidationError[]) => {
        const fieldErrors = formatValidationErrors(errors);

        return new BadRequestException({
          type: ErrorType.VALIDATION_ERROR,
          message: 'Validation failed',
          details: {
            fieldErrors,
            totalErrors: Object.keys(fieldErrors).length,
          },
          timestamp: new Date().toISOString(),
        });
      },
    });
  }
}

export function formatValidationErrors(errors: ValidationError[]): Record<string, string[]> {
  const fieldErrors: Record<string, string[]> = {};

  const processError = (error: ValidationError, parentPath = ''): void => {
    const fieldPath = parentPath ? `${parentPath}.${error.property}` : error.property;

    if (error.constraints) {
      fieldErrors[fieldPath] = Object.values(error.constraints);
    }

    if (error.children && error.children.length > 0) {
      error.children.forEach(child => processError(child, fieldPath));
    }
  };

  errors.forEach(error => processError(error));
  return fieldErrors;
}
