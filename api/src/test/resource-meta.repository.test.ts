import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { ResourceMetaRepository } from '../shared/database/resource-meta.repository';
import { NotFoundError } from '../shared/errors/app-errors';
import { FakeDb, PROJECT_P1, TENANT_A, USER_X, rows } from './support/fakes';

describe('ResourceMetaRepository', () => {
  const repository = new ResourceMetaRepository();

  it('returns tenant and owner of a project, filtered by tenant', async () => {
    const db = new FakeDb(() => rows({ org_id: TENANT_A, owner_id: USER_X }));

    const meta = await repository.load(db as never, 'project', PROJECT_P1, TENANT_A);

    assert.deepEqual(meta, { tenantId: TENANT_A, ownerUserId: USER_X });
    assert.equal(
      db.calls[0].text,
      'select org_id, owner_id from projects where id = $1 and org_id = $2 limit 1'
    );
    assert.deepEqual(db.calls[0].values, [PROJECT_P1, TENANT_A]);
  });

  it('locks rows for update except the tenant itself', async () => {
    const db = new FakeDb(() => rows({ org_id: TENANT_A, owner_id: null }));

    await repository.load(db as never, 'tag', PROJECT_P1, TENANT_A, { forUpdate: true });
    await repository.load(db as never, 'organization', TENANT_A, TENANT_A, { forUpdate: true });

    assert.ok(db.calls[0].text.endsWith(' limit 1 for update'));
    assert.ok(db.calls[1].text.endsWith(' limit 1'));
  });

  it('throws not found for missing rows, malformed ids and unaddressable kinds', async () => {
    const db = new FakeDb();

    await assert.rejects(repository.load(db as never, 'user', PROJECT_P1, TENANT_A), NotFoundError);
    await assert.rejects(repository.load(db as never, 'project', '42', TENANT_A), NotFoundError);
    await assert.rejects(repository.load(db as never, 'activity', PROJECT_P1, TENANT_A), NotFoundError);

    assert.equal(db.calls.length, 1);
  });
});
