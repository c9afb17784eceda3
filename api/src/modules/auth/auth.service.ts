import { Injectable } from '@nestjs/common';
import { AuthSession, Principal, StoredUser } from '../../shared/auth/auth.types';
import { PasswordHasherService } from '../../shared/auth/password-hasher.service';
import { TokenService } from '../../shared/auth/token.service';
import { PostgresService } from '../../shared/database/postgres.service';
import { InvalidCredentialsError, UnauthenticatedError } from '../../shared/errors/app-errors';
import { StructuredLoggerService } from '../../shared/logging/structured-logger.service';
import { OrganizationsService } from '../organizations/organizations.service';
import { UsersService } from '../users/users.service';
import { LoginInput, RegisterInput } from './auth.schemas';

export type CurrentUserView = Principal & { email: string };

@Injectable()
export class AuthService {
  constructor(
    private readonly db: PostgresService,
    private readonly users: UsersService,
    private readonly organizations: OrganizationsService,
    private readonly hasher: PasswordHasherService,
    private readonly tokens: TokenService,
    private readonly logger: StructuredLoggerService
  ) {}

  /** Creates a tenant together with its first user, who becomes its admin. */
  async register(input: RegisterInput): Promise<AuthSession> {
    const passwordHash = await this.hasher.hash(input.password);

    const user = await this.db.transaction(null, async (tx) => {
      const organization = await this.organizations.create(tx, input.orgName);
      return this.users.insert(tx, {
        tenantId: organization.id,
        email: input.email,
        role: 'admin',
        passwordHash
      });
    });

    this.logger.log({ type: 'tenant_registered', tenantId: user.tenantId, userId: user.id }, 'AuthService');
    return this.issueSession({ id: user.id, tenantId: user.tenantId, role: user.role });
  }

  async login(input: LoginInput): Promise<AuthSession> {
    const user = await this.users.findStoredByEmail(this.db, input.email);

    // Unknown email and wrong password are reported identically and cost the same hash work.
    const valid = user
      ? await this.hasher.verify(input.password, user.passwordHash)
      : await this.hasher.verifyAgainstDecoy(input.password);
    if (!user || !valid) {
      this.logger.warn({ type: 'login_failed', email: input.email }, 'AuthService');
      throw new InvalidCredentialsError();
    }

    return this.issueSession(user);
  }

  /**
   * Rotates both tokens. Tenant and role are read from the current user row,
   * so role changes land here.
   */
  async refresh(refreshToken: string): Promise<AuthSession> {
    const claims = this.tokens.parse(refreshToken, 'refresh');

    const user = await this.users.findStoredById(this.db, claims.userId);
    if (!user) {
      throw new UnauthenticatedError('User not found');
    }

    return this.issueSession(user);
  }

  async me(principal: Principal): Promise<CurrentUserView> {
    const user = await this.users.findStoredById(this.db, principal.userId);
    if (!user) {
      throw new UnauthenticatedError('User not found');
    }

    return { ...principal, email: user.email };
  }

  private issueSession(user: Pick<StoredUser, 'id' | 'tenantId' | 'role'>): AuthSession {
    return {
      accessToken: this.tokens.issueAccess(user.id, user.tenantId, user.role),
      refreshToken: this.tokens.issueRefresh(user.id),
      tokenType: 'bearer',
      userId: user.id,
      tenantId: user.tenantId,
      role: user.role
    };
  }
}
