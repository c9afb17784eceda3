import { Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { Principal, StoredUser, UserRole, isUserRole } from '../../shared/auth/auth.types';
import { PasswordHasherService } from '../../shared/auth/password-hasher.service';
import { ConflictError, NotFoundError, isUniqueViolation } from '../../shared/errors/app-errors';
import { DbExecutor } from '../../shared/database/postgres.service';
import { User } from './user.model';
import { CreateUserInput } from './users.schemas';

type DbUser = {
  id: string;
  org_id: string;
  email: string;
  role: string;
  created_at: string;
};

type DbStoredUser = DbUser & { password_hash: string };

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

@Injectable()
export class UsersService {
  constructor(private readonly hasher: PasswordHasherService) {}

  async findStoredById(db: DbExecutor, userId: string): Promise<StoredUser | null> {
    if (!UUID_PATTERN.test(userId)) {
      return null;
    }

    const res = await db.query<DbStoredUser>(
      'select id, org_id, email, role, password_hash, created_at from users where id = $1 limit 1',
      [userId]
    );
    return res.rows[0] ? this.toStoredUser(res.rows[0]) : null;
  }

  async findStoredByEmail(db: DbExecutor, email: string): Promise<StoredUser | null> {
    const res = await db.query<DbStoredUser>(
      'select id, org_id, email, role, password_hash, created_at from users where email = $1 limit 1',
      [email.trim().toLowerCase()]
    );
    return res.rows[0] ? this.toStoredUser(res.rows[0]) : null;
  }

  /** Inserts a user into the principal's tenant; the tenant is never taken from input. */
  async create(tx: DbExecutor, principal: Principal, input: CreateUserInput): Promise<User> {
    return this.insert(tx, {
      tenantId: principal.tenantId,
      email: input.email,
      role: input.role,
      passwordHash: await this.hasher.hash(input.password)
    });
  }

  async insert(
    tx: DbExecutor,
    input: { tenantId: string; email: string; role: UserRole; passwordHash: string }
  ): Promise<User> {
    try {
      const res = await tx.query<DbUser>(
        `insert into users (id, org_id, email, password_hash, role)
         values ($1, $2, $3, $4, $5)
         returning id, org_id, email, role, created_at`,
        [randomUUID(), input.tenantId, input.email, input.passwordHash, input.role]
      );
      return this.toUser(res.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Email already registered');
      }
      throw error;
    }
  }

  async listByTenant(db: DbExecutor, tenantId: string): Promise<User[]> {
    const res = await db.query<DbUser>(
      `select id, org_id, email, role, created_at
       from users
       where org_id = $1
       order by created_at asc, email asc`,
      [tenantId]
    );

    return res.rows.map((row) => this.toUser(row));
  }

  // A role change reaches the user's tokens at their next refresh.
  async updateRole(tx: DbExecutor, tenantId: string, userId: string, role: UserRole): Promise<User> {
    if (role !== 'admin') {
      // locks the tenant's admins so two concurrent demotions cannot both pass
      const admins = await tx.query<{ id: string }>(
        `select id from users where org_id = $1 and role = 'admin' for update`,
        [tenantId]
      );
      if (admins.rows.length === 1 && admins.rows[0].id === userId) {
        throw new ConflictError('Cannot demote the last admin of the organization');
      }
    }

    const res = await tx.query<DbUser>(
      `update users set role = $3
       where id = $1 and org_id = $2
       returning id, org_id, email, role, created_at`,
      [userId, tenantId, role]
    );

    const row = res.rows[0];
    if (!row) {
      throw new NotFoundError();
    }
    return this.toUser(row);
  }

  private toUser(row: DbUser | undefined): User {
    if (!row) {
      throw new Error('User row missing from query result');
    }

    return {
      id: row.id,
      tenantId: row.org_id,
      email: row.email,
      role: this.toRole(row.role),
      createdAt: row.created_at
    };
  }

  private toStoredUser(row: DbStoredUser): StoredUser {
    return {
      id: row.id,
      tenantId: row.org_id,
      email: row.email,
      role: this.toRole(row.role),
      passwordHash: row.password_hash
    };
  }

  private toRole(value: string): UserRole {
    if (!isUserRole(value)) {
      throw new Error(`Unknown role stored for user: ${value}`);
    }
    return value;
  }
}
