import { Injectable, LoggerService as NestLoggerService } from '@nestjs/common';
import { createLogger, format, transports, Logger } from 'winston';
import { ConfigurationService } from '../../config/configuration.service';
import * as path from 'path';

export type LogMetadata = Record<string, unknown>;

export interface PerformanceMetrics {
  operation: string;
  durationMs: number;
  startTime: Date;
  endTime: Date;
}

type LogTransport = transports.ConsoleTransportInstance | transports.FileTransportInstance;

@Injectable()
export class LoggerService implements NestLoggerService {
  private readonly logger: Logger;
  private correlationId?: string;

  constructor(private configService: ConfigurationService) {
    this.logger = this.createLogger();
  }

  private createLogger(): Logger {
    const logConfig = this.configService.logging;
    const logTransports: LogTransport[] = [];

    if (logConfig.enableConsole) {
      logTransports.push(
        new transports.Console({
          format: format.combine(
            format.colorize(),
            format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            format.printf(({ timestamp, level, message, context, correlationId, ...meta }) => {
              let logMessage = `${timestamp} [${level}]`;
              if (context) logMessage += ` [${context}]`;
              if (correlationId) logMessage += ` [${correlationId}]`;
              logMessage += ` ${message}`;

              if (Object.keys(meta).length > 0) {
                logMessage += ` ${JSON.stringify(meta)}`;
              }

              return logMessage;
            })
          ),
        })
      );
    }

    if (logConfig.enableFile) {
      logTransports.push(
        new transports.File({
          filename: path.join(process.cwd(), 'logs', 'app.log'),
          format: format.combine(format.timestamp(), format.json()),
          maxsize: 5242880, // 5MB
          maxFiles: 5,
        })
      );

      logTransports.push(
        new transports.File({
          filename: path.join(process.cwd(), 'logs', 'error.log'),
          level: 'error',
          format: format.combine(format.timestamp(), format.json()),
          maxsize: 5242880, // 5MB
          maxFiles: 5,
        })
      );
    }

    return createLogger({
      level: logConfig.level,
      format: format.combine(
        format.timestamp(),
        format.errors({ stack: true }),
        format.json()
      ),
      transports: logTransports,
      silent: logTransports.length === 0,
    });
  }

  setCorrelationId(correlationId: string): void {
    this.correlationId = correlationId;
  }

  clearCorrelationId(): void {
    this.correlationId = undefined;
  }

  log(message: string, context?: string, metadata?: LogMetadata): void {
    this.logger.info(message, { context, correlationId: this.correlationId, ...metadata });
  }

  error(message: string, trace?: string, context?: string, metadata?: LogMetadata): void {
    this.logger.error(message, {
      context,
      correlationId: this.correlationId,
      stack: trace,
      ...metadata,
    });
  }

  warn(message: string, context?: string, metadata?: LogMetadata): void {
    this.logger.warn(message, { context, correlationId: this.correlationId, ...metadata });
  }

  debug(message: string, context?: string, metadata?: LogMetadata): void {
    this.logger.debug(message, { context, correlationId: this.correlationId, ...metadata });
  }

  verbose(message: string, context?: string, metadata?: LogMetadata): void {
    this.logger.verbose(message, { context, correlationId: this.correlationId, ...metadata });
  }

  logPerformance(metrics: PerformanceMetrics, context?: string, metadata?: LogMetadata): void {
    const level = this.getPerformanceLogLevel(metrics.durationMs);
    const message = `Performance: ${metrics.operation} completed in ${metrics.durationMs}ms`;

    this.logger.log(level, message, {
      context,
      correlationId: this.correlationId,
      performance: {
        operation: metrics.operation,
        durationMs: metrics.durationMs,
        startTime: metrics.startTime.toISOString(),
        endTime: metrics.endTime.toISOString(),
      },
      ...metadata,
    });
  }

  private getPerformanceLogLevel(durationMs: number): string {
    if (durationMs > 5000) return 'error';
    if (durationMs > 2000) return 'warn';
    if (durationMs > 1000) return 'info';
    return 'debug';
  }

  logApiRequest(method: string, url: string, statusCode: number, durationMs: number, metadata?: LogMetadata): void {
    const level = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';
    const message = `API Request: ${method} ${url} - ${statusCode} (${durationMs}ms)`;

    this.logger.log(level, message, {
      correlationId: this.correlationId,
      api: {
        method,
        url,
        statusCode,
        durationMs,
      },
      ...metadata,
    });
  }

  logBusinessEvent(event: string, entity: string, entityId: string, action: string, metadata?: LogMetadata): void {
    this.logger.info(`Business Event: ${event}`, {
      correlationId: this.correlationId,
      business: {
        event,
        entity,
        entityId,
        action,
        timestamp: new Date().toISOString(),
      },
      ...metadata,
    });
  }
}
