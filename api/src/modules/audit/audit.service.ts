import { Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { Principal } from '../../shared/auth/auth.types';
import { DbExecutor } from '../../shared/database/postgres.service';
import { AuditEntry, AuditEntryInput } from './audit-entry.model';

type DbAuditEntry = {
  id: string;
  org_id: string;
  actor_user_id: string;
  action: string;
  entity: string;
  entity_id: string;
  created_at: string;
};

/**
 * Append-only activity log. Writes go through the caller's transaction so an
 * entry exists exactly when the mutation it describes committed.
 */
@Injectable()
export class AuditService {
  async record(tx: DbExecutor, input: AuditEntryInput): Promise<AuditEntry> {
    const res = await tx.query<DbAuditEntry>(
      `insert into activity_logs (id, org_id, actor_user_id, action, entity, entity_id)
       values ($1, $2, $3, $4, $5, $6)
       returning id, org_id, actor_user_id, action, entity, entity_id, created_at`,
      [randomUUID(), input.tenantId, input.actorUserId, input.action, input.entityKind, input.entityId]
    );

    const row = res.rows[0];
    if (!row) {
      throw new Error('Audit insert returned no row');
    }
    return this.toEntry(row);
  }

  async listForTenant(
    db: DbExecutor,
    principal: Principal,
    page: { limit: number; offset: number }
  ): Promise<AuditEntry[]> {
    const res = await db.query<DbAuditEntry>(
      `select id, org_id, actor_user_id, action, entity, entity_id, created_at
       from activity_logs
       where org_id = $1
       order by created_at desc, id desc
       limit $2 offset $3`,
      [principal.tenantId, page.limit, page.offset]
    );

    return res.rows.map((row) => this.toEntry(row));
  }

  private toEntry(row: DbAuditEntry): AuditEntry {
    return {
      id: row.id,
      actorUserId: row.actor_user_id,
      tenantId: row.org_id,
      action: row.action,
      entityKind: row.entity,
      entityId: row.entity_id,
      createdAt: row.created_at
    };
  }
}
