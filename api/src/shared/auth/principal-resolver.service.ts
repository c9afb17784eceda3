import { Injectable } from '@nestjs/common';
import { UsersService } from '../../modules/users/users.service';
import { PostgresService } from '../database/postgres.service';
import { InvalidTokenError, UnauthenticatedError } from '../errors/app-errors';
import { StructuredLoggerService } from '../logging/structured-logger.service';
import { AccessTokenClaims, Principal } from './auth.types';
import { TokenService } from './token.service';

@Injectable()
export class PrincipalResolverService {
  constructor(
    private readonly tokens: TokenService,
    private readonly users: UsersService,
    private readonly db: PostgresService,
    private readonly logger: StructuredLoggerService
  ) {}

  /**
   * Role and tenant come from the token, not from storage: a role change is
   * only picked up when the token is next refreshed. The user row is still
   * checked so tokens of deleted users stop working.
   */
  async resolve(accessToken: string): Promise<Principal> {
    let claims: AccessTokenClaims;
    try {
      claims = this.tokens.parse(accessToken, 'access');
    } catch (error) {
      if (error instanceof InvalidTokenError) {
        this.logger.warn({ type: 'token_rejected', reason: error.reason }, 'PrincipalResolver');
        throw new UnauthenticatedError('Invalid token');
      }
      throw error;
    }

    const user = await this.users.findStoredById(this.db, claims.userId);
    if (!user) {
      this.logger.warn({ type: 'token_rejected', reason: 'unknown_user', userId: claims.userId }, 'PrincipalResolver');
      throw new UnauthenticatedError('User not found');
    }

    return Object.freeze({
      userId: claims.userId,
      tenantId: claims.tenantId,
      role: claims.role
    });
  }
}
