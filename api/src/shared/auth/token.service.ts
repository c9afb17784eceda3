import { Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { JsonWebTokenError, JwtPayload, TokenExpiredError, sign, verify } from 'jsonwebtoken';
import { z } from 'zod';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { InvalidTokenError } from '../errors/app-errors';
import { AccessTokenClaims, RefreshTokenClaims, TokenKind, USER_ROLES, UserRole } from './auth.types';

const ALGORITHM = 'HS256';

const accessPayloadSchema = z.object({
  sub: z.string().min(1),
  tid: z.string().min(1),
  role: z.enum(USER_ROLES),
  typ: z.literal('access'),
  exp: z.number().int()
});

const refreshPayloadSchema = z.object({
  sub: z.string().min(1),
  typ: z.literal('refresh'),
  exp: z.number().int()
});

/**
 * Signs and verifies bearer tokens. Claims are signed, not encrypted, so only
 * identity, tenant and role ever go into a payload.
 */
@Injectable()
export class TokenService {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  issueAccess(userId: string, tenantId: string, role: UserRole): string {
    return sign({ tid: tenantId, role, typ: 'access' }, this.config.auth.jwtSecret, {
      algorithm: ALGORITHM,
      subject: userId,
      jwtid: randomUUID(),
      expiresIn: this.config.auth.accessTtlSeconds
    });
  }

  // Carries no tenant or role: renewal re-reads both from the user record.
  issueRefresh(userId: string): string {
    return sign({ typ: 'refresh' }, this.config.auth.jwtSecret, {
      algorithm: ALGORITHM,
      subject: userId,
      jwtid: randomUUID(),
      expiresIn: this.config.auth.refreshTtlSeconds
    });
  }

  parse(token: string, expected: 'access'): AccessTokenClaims;
  parse(token: string, expected: 'refresh'): RefreshTokenClaims;
  parse(token: string, expected: TokenKind): AccessTokenClaims | RefreshTokenClaims {
    const payload = this.verifySignature(token);

    if (payload.typ !== expected) {
      throw new InvalidTokenError(typeof payload.typ === 'string' ? 'kind' : 'claims');
    }

    if (expected === 'access') {
      const claims = accessPayloadSchema.safeParse(payload);
      if (!claims.success) {
        throw new InvalidTokenError('claims');
      }
      return {
        userId: claims.data.sub,
        tenantId: claims.data.tid,
        role: claims.data.role,
        expiresAt: new Date(claims.data.exp * 1000),
        kind: 'access'
      };
    }

    const claims = refreshPayloadSchema.safeParse(payload);
    if (!claims.success) {
      throw new InvalidTokenError('claims');
    }
    return {
      userId: claims.data.sub,
      expiresAt: new Date(claims.data.exp * 1000),
      kind: 'refresh'
    };
  }

  private verifySignature(token: string): JwtPayload {
    let decoded: string | JwtPayload;
    try {
      decoded = verify(token, this.config.auth.jwtSecret, { algorithms: [ALGORITHM] });
    } catch (error) {
      if (error instanceof TokenExpiredError) {
        throw new InvalidTokenError('expired');
      }
      if (error instanceof JsonWebTokenError) {
        throw new InvalidTokenError(error.message === 'invalid signature' ? 'signature' : 'malformed');
      }
      throw error;
    }

    if (typeof decoded === 'string') {
      throw new InvalidTokenError('claims');
    }

    return decoded;
  }
}
