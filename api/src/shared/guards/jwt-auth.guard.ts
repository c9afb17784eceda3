import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { PrincipalResolverService } from '../auth/principal-resolver.service';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';
import { RequestWithPrincipal } from '../decorators/current-principal.decorator';
import { UnauthenticatedError } from '../errors/app-errors';

/**
 * Resolves the principal before any handler runs, so unauthenticated calls
 * never reach a resource lookup.
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly resolver: PrincipalResolverService
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass()
    ]);

    if (isPublic) {
      return true;
    }

    const request = context.switchToHttp().getRequest<RequestWithPrincipal>();

    const authHeader = request.headers.authorization;
    if (typeof authHeader !== 'string' || !authHeader.startsWith('Bearer ')) {
      throw new UnauthenticatedError('Missing bearer token');
    }

    const token = authHeader.slice('Bearer '.length).trim();
    if (!token) {
      throw new UnauthenticatedError('Missing bearer token');
    }

    request.principal = await this.resolver.resolve(token);
    return true;
  }
}
