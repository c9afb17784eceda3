import { Injectable, NestMiddleware } from '@nestjs/common';
import { NextFunction, Response } from 'express';
import { StructuredLoggerService } from '../logging/structured-logger.service';
import { ContextualRequest } from '../middleware/request-context.middleware';
import { MetricsService } from './metrics.service';

@Injectable()
export class RequestLoggingMiddleware implements NestMiddleware {
  constructor(
    private readonly metrics: MetricsService,
    private readonly logger: StructuredLoggerService
  ) {}

  use(req: ContextualRequest, res: Response, next: NextFunction): void {
    const start = Date.now();

    res.on('finish', () => {
      const durationMs = Date.now() - start;
      // Route templates keep entity ids out of metric labels.
      const route = req.route?.path ? `${req.baseUrl}${req.route.path}` : 'unmatched';
      this.metrics.record(route, req.method, res.statusCode, durationMs);

      const entry = {
        type: 'http_access',
        method: req.method,
        route,
        statusCode: res.statusCode,
        durationMs,
        requestId: req.requestId,
        tenantId: req.principal?.tenantId,
        userId: req.principal?.userId
      };
      if (res.statusCode === 401 || res.statusCode === 403) {
        this.logger.warn(entry, 'RequestLoggingMiddleware');
        return;
      }
      this.logger.log(entry, 'RequestLoggingMiddleware');
    });

    next();
  }
}
