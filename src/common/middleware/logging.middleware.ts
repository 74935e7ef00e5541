import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { LoggerService } from '../logger/logger.service';
import { CORRELATION_ID_HEADER, CorrelationIdUtil } from '../utils/correlation-id.util';
import { sanitizeRequestBody } from '../utils/sanitize.util';

@Injectable()
export class LoggingMiddleware implements NestMiddleware {
  constructor(private readonly logger: LoggerService) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const startTime = Date.now();

    const correlationId = CorrelationIdUtil.getOrGenerate(req.headers);

    // Downstream handlers read the same ID from the request headers
    req.headers[CORRELATION_ID_HEADER] = correlationId;
    res.setHeader('X-Correlation-ID', correlationId);
    this.logger.setCorrelationId(correlationId);

    this.logIncomingRequest(req, correlationId);

    res.on('finish', () => {
      this.logOutgoingResponse(req, res, Date.now() - startTime, correlationId);
      this.logger.clearCorrelationId();
    });

    next();
  }

  private logIncomingRequest(req: Request, correlationId: string): void {
    const requestInfo = {
      method: req.method,
      url: req.originalUrl || req.url,
      userAgent: req.headers['user-agent'],
      ip: req.ip,
      contentType: req.headers['content-type'],
      contentLength: req.headers['content-length'],
      query: req.query && Object.keys(req.query).length > 0 ? req.query : undefined,
      body: sanitizeRequestBody(req.body),
    };

    this.logger.log(`Incoming Request: ${requestInfo.method} ${requestInfo.url}`, 'HTTP', {
      request: requestInfo,
      correlationId,
    });
  }

  private logOutgoingResponse(req: Request, res: Response, durationMs: number, correlationId: string): void {
    const url = req.originalUrl || req.url;

    this.logger.logApiRequest(req.method, url, res.statusCode, durationMs, {
      response: {
        statusCode: res.statusCode,
        contentType: res.getHeader('Content-Type'),
      },
      correlationId,
    });

    if (durationMs > 1000) {
      this.logger.warn(`Slow Request: ${req.method} ${url} took ${durationMs}ms`, 'Performance', {
        durationMs,
        correlationId,
      });
    }
  }
}
