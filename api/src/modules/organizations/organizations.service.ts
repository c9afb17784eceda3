import { Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { DbExecutor } from '../../shared/database/postgres.service';
import { ConflictError, NotFoundError, isUniqueViolation } from '../../shared/errors/app-errors';
import { Organization } from './organization.model';

type DbOrganization = {
  id: string;
  name: string;
  created_at: string;
};

@Injectable()
export class OrganizationsService {
  async create(tx: DbExecutor, name: string): Promise<Organization> {
    try {
      const res = await tx.query<DbOrganization>(
        `insert into organizations (id, name)
         values ($1, $2)
         returning id, name, created_at`,
        [randomUUID(), name]
      );
      return this.toOrganization(res.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Organization name already exists');
      }
      throw error;
    }
  }

  async getOrThrow(db: DbExecutor, id: string): Promise<Organization> {
    const res = await db.query<DbOrganization>(
      'select id, name, created_at from organizations where id = $1 limit 1',
      [id]
    );

    const organization = res.rows[0];
    if (!organization) {
      throw new NotFoundError();
    }

    return this.toOrganization(organization);
  }

  private toOrganization(row: DbOrganization | undefined): Organization {
    if (!row) {
      throw new Error('Organization row missing from query result');
    }

    return {
      id: row.id,
      name: row.name,
      createdAt: row.created_at
    };
  }
}
