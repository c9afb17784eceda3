import { Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { Principal } from '../../shared/auth/auth.types';
import { creationStamp } from '../../shared/auth/authorization';
import { DbExecutor } from '../../shared/database/postgres.service';
import { ConflictError, isUniqueViolation } from '../../shared/errors/app-errors';
import { Tag } from './tag.model';
import { normalizeTagNames } from './tag-names';

type DbTag = {
  id: string;
  name: string;
};

@Injectable()
export class TagsService {
  async create(tx: DbExecutor, principal: Principal, name: string): Promise<Tag> {
    const { tenantId } = creationStamp(principal);
    try {
      const res = await tx.query<DbTag>(
        `insert into tags (id, org_id, name)
         values ($1, $2, $3)
         returning id, name`,
        [randomUUID(), tenantId, name]
      );
      return this.toTag(res.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Tag already exists');
      }
      throw error;
    }
  }

  async listByTenant(db: DbExecutor, tenantId: string): Promise<Tag[]> {
    const res = await db.query<DbTag>(
      'select id, name from tags where org_id = $1 order by name asc',
      [tenantId]
    );
    return res.rows.map((row) => this.toTag(row));
  }

  /** Finds or creates each named tag inside the tenant. */
  async upsertMany(tx: DbExecutor, tenantId: string, names: readonly string[]): Promise<Tag[]> {
    const tags: Tag[] = [];
    for (const name of normalizeTagNames(names)) {
      const res = await tx.query<DbTag>(
        `insert into tags (id, org_id, name)
         values ($1, $2, $3)
         on conflict (org_id, name)
         do update set name = excluded.name
         returning id, name`,
        [randomUUID(), tenantId, name]
      );
      tags.push(this.toTag(res.rows[0]));
    }
    return tags;
  }

  private toTag(row: DbTag | undefined): Tag {
    if (!row) {
      throw new Error('Tag row missing from query result');
    }
    return { id: row.id, name: row.name };
  }
}
