import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Principal } from '../auth/auth.types';
import { UnauthenticatedError } from '../errors/app-errors';

export type RequestWithPrincipal = {
  headers: Record<string, string | string[] | undefined>;
  principal?: Principal;
};

export const CurrentPrincipal = createParamDecorator((_: unknown, ctx: ExecutionContext): Principal => {
  const request = ctx.switchToHttp().getRequest<RequestWithPrincipal>();
  if (!request.principal) {
    throw new UnauthenticatedError();
  }
  return request.principal;
});
