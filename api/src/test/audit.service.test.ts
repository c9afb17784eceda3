import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { AuditService } from '../modules/audit/audit.service';
import { ADMIN_ID, FakeDb, PROJECT_P1, TENANT_A, rows } from './support/fakes';

const row = {
  id: 'ffffffff-ffff-4fff-8fff-ffffffffffff',
  org_id: TENANT_A,
  actor_user_id: ADMIN_ID,
  action: 'project.delete',
  entity: 'project',
  entity_id: PROJECT_P1,
  created_at: '2026-03-01T10:00:00.000Z'
};

describe('AuditService', () => {
  it('appends one entry through the given executor', async () => {
    const db = new FakeDb(() => rows(row));
    const audit = new AuditService();

    const entry = await audit.record(db as never, {
      actorUserId: ADMIN_ID,
      tenantId: TENANT_A,
      action: 'project.delete',
      entityKind: 'project',
      entityId: PROJECT_P1
    });

    assert.equal(db.calls.length, 1);
    assert.match(db.calls[0].text, /^insert into activity_logs/);
    assert.deepEqual(db.calls[0].values.slice(1), [TENANT_A, ADMIN_ID, 'project.delete', 'project', PROJECT_P1]);
    assert.deepEqual(entry, {
      id: row.id,
      actorUserId: ADMIN_ID,
      tenantId: TENANT_A,
      action: 'project.delete',
      entityKind: 'project',
      entityId: PROJECT_P1,
      createdAt: row.created_at
    });
  });

  it('lists only the principal tenant, newest first', async () => {
    const db = new FakeDb(() => rows(row));
    const audit = new AuditService();

    const entries = await audit.listForTenant(
      db as never,
      { userId: ADMIN_ID, tenantId: TENANT_A, role: 'admin' },
      { limit: 20, offset: 40 }
    );

    assert.equal(entries.length, 1);
    assert.deepEqual(db.calls[0].values, [TENANT_A, 20, 40]);
    assert.match(db.calls[0].text, /where org_id = \$1/);
    assert.match(db.calls[0].text, /order by created_at desc, id desc/);
  });
});
