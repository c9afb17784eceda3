import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  NestInterceptor
} from '@nestjs/common';
import { Observable, tap } from 'rxjs';
import { StructuredLoggerService } from '../logging/structured-logger.service';
import { ContextualRequest } from '../middleware/request-context.middleware';

@Injectable()
export class HttpLoggingInterceptor implements NestInterceptor {
  constructor(private readonly logger: StructuredLoggerService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const now = Date.now();
    const request = context.switchToHttp().getRequest<ContextualRequest>();
    const response = context.switchToHttp().getResponse<{ statusCode?: number }>();

    return next.handle().pipe(
      tap({
        next: () => {
          this.logger.log(
            {
              type: 'http_request',
              method: request.method,
              path: request.originalUrl,
              statusCode: response.statusCode,
              durationMs: Date.now() - now,
              requestId: request.requestId,
              userId: request.principal?.userId,
              tenantId: request.principal?.tenantId
            },
            'HttpLoggingInterceptor'
          );
        },
        error: (error: unknown) => {
          const statusCode = error instanceof HttpException ? error.getStatus() : 500;
          const entry = {
            type: 'http_error',
            method: request.method,
            path: request.originalUrl,
            statusCode,
            durationMs: Date.now() - now,
            requestId: request.requestId,
            userId: request.principal?.userId
          };

          // 4xx are expected outcomes of the auth core (401/403/404/409); only 5xx carry a trace.
          if (statusCode < 500) {
            this.logger.warn(entry, 'HttpLoggingInterceptor');
            return;
          }
          this.logger.error(entry, error instanceof Error ? error.stack : undefined, 'HttpLoggingInterceptor');
        }
      })
    );
  }
}
