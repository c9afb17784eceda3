import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { map, Observable } from 'rxjs';
import { PLAIN_RESPONSE_KEY } from '../decorators/plain-response.decorator';
import { ContextualRequest } from '../middleware/request-context.middleware';

type EnvelopeMeta = {
  requestId: string | null;
  timestamp: string;
  count?: number;
};

@Injectable()
export class ResponseEnvelopeInterceptor implements NestInterceptor {
  constructor(private readonly reflector: Reflector) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const isPlain = this.reflector.getAllAndOverride<boolean>(PLAIN_RESPONSE_KEY, [
      context.getHandler(),
      context.getClass()
    ]);
    if (isPlain) {
      return next.handle();
    }

    const request = context.switchToHttp().getRequest<ContextualRequest>();
    return next.handle().pipe(
      map((data: unknown) => {
        const meta: EnvelopeMeta = {
          requestId: request.requestId ?? null,
          timestamp: new Date().toISOString()
        };
        if (Array.isArray(data)) {
          meta.count = data.length;
        }
        return { data, meta };
      })
    );
  }
}
