import 'reflect-metadata';
import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { Reflector } from '@nestjs/core';
import { Principal } from '../shared/auth/auth.types';
import { Public } from '../shared/decorators/public.decorator';
import { RequestWithPrincipal } from '../shared/decorators/current-principal.decorator';
import { UnauthenticatedError } from '../shared/errors/app-errors';
import { JwtAuthGuard } from '../shared/guards/jwt-auth.guard';
import { TENANT_A, USER_X } from './support/fakes';

class SampleController {
  @Public()
  health(): void {}

  list(): void {}
}

const principal: Principal = { userId: USER_X, tenantId: TENANT_A, role: 'viewer' };

function contextFor(handler: () => void, request: RequestWithPrincipal) {
  return {
    getHandler: () => handler,
    getClass: () => SampleController,
    switchToHttp: () => ({ getRequest: () => request })
  };
}

function buildGuard() {
  const seen: string[] = [];
  const resolver = {
    resolve: async (token: string): Promise<Principal> => {
      seen.push(token);
      return principal;
    }
  };
  return { guard: new JwtAuthGuard(new Reflector(), resolver as never), seen };
}

describe('JwtAuthGuard', () => {
  it('lets public routes through without a token', async () => {
    const { guard, seen } = buildGuard();
    const request: RequestWithPrincipal = { headers: {} };

    assert.equal(await guard.canActivate(contextFor(SampleController.prototype.health, request) as never), true);
    assert.equal(request.principal, undefined);
    assert.deepEqual(seen, []);
  });

  it('attaches the resolved principal for a bearer token', async () => {
    const { guard, seen } = buildGuard();
    const request: RequestWithPrincipal = { headers: { authorization: 'Bearer abc.def.ghi' } };

    assert.equal(await guard.canActivate(contextFor(SampleController.prototype.list, request) as never), true);
    assert.deepEqual(seen, ['abc.def.ghi']);
    assert.equal(request.principal, principal);
  });

  it('rejects missing, non-bearer and empty credentials', async () => {
    const { guard, seen } = buildGuard();

    for (const headers of [{}, { authorization: 'Basic dXNlcjpwYXNz' }, { authorization: 'Bearer    ' }]) {
      await assert.rejects(
        guard.canActivate(contextFor(SampleController.prototype.list, { headers }) as never),
        (error: unknown) => {
          assert.ok(error instanceof UnauthenticatedError);
          assert.equal(error.message, 'Missing bearer token');
          return true;
        }
      );
    }
    assert.deepEqual(seen, []);
  });
});
