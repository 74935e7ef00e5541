import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppError } from '../common/errors/app-error';
import { VALIDATION_MODES, ValidationMode } from '../models/validation-result';

export interface LoggingConfig {
  level: string;
  enableConsole: boolean;
  enableFile: boolean;
}

export interface ValidationConfig {
  defaultMode: ValidationMode;
  maxLineItems: number;
}

export interface AppConfig {
  logging: LoggingConfig;
  validation: ValidationConfig;
  port: number;
  frontendUrl: string;
}

@Injectable()
export class ConfigurationService {
  private readonly config: AppConfig;

  constructor(private configService: ConfigService) {
    this.config = this.loadConfig();
  }

  private loadConfig(): AppConfig {
    return {
      logging: {
        level: this.getString('LOG_LEVEL', 'info'),
        enableConsole: this.getBoolean('LOG_ENABLE_CONSOLE', true),
        enableFile: this.getBoolean('LOG_ENABLE_FILE', false),
      },
      validation: {
        defaultMode: this.parseMode(this.getString('VALIDATION_DEFAULT_MODE', 'first')),
        maxLineItems: this.getNumber('VALIDATION_MAX_LINE_ITEMS', 1000),
      },
      port: this.getNumber('PORT', 4447),
      frontendUrl: this.getString('FRONTEND_URL', 'http://localhost:3000'),
    };
  }

  get logging(): LoggingConfig {
    return this.config.logging;
  }

  get validation(): ValidationConfig {
    return this.config.validation;
  }

  get port(): number {
    return this.config.port;
  }

  get frontendUrl(): string {
    return this.config.frontendUrl;
  }

  validateConfiguration(): void {
    if (!Number.isInteger(this.config.port) || this.config.port <= 0) {
      throw AppError.configurationError('PORT must be a positive integer', {
        port: this.config.port,
      });
    }

    if (!Number.isInteger(this.config.validation.maxLineItems) || this.config.validation.maxLineItems <= 0) {
      throw AppError.configurationError('VALIDATION_MAX_LINE_ITEMS must be a positive integer', {
        maxLineItems: this.config.validation.maxLineItems,
      });
    }
  }

  private getString(key: string, defaultValue: string): string {
    const value = this.configService.get<string>(key);
    return value === undefined || value === '' ? defaultValue : String(value);
  }

  private getNumber(key: string, defaultValue: number): number {
    const value = this.configService.get<string | number>(key);
    if (value === undefined || value === '') return defaultValue;
    return Number(value);
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.configService.get<string | boolean>(key);
    if (value === undefined || value === '') return defaultValue;
    if (typeof value === 'boolean') return value;
    return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
  }

  private parseMode(value: string): ValidationMode {
    const mode = VALIDATION_MODES.find(candidate => candidate === value.trim().toLowerCase());
    if (!mode) {
      throw AppError.configurationError(
        `VALIDATION_DEFAULT_MODE must be one of: ${VALIDATION_MODES.join(', ')}`,
        { value },
      );
    }
    return mode;
  }
}
