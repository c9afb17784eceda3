import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { seedDemoTenant } from '../scripts/demo-tenant';
import { PasswordHasherService } from '../shared/auth/password-hasher.service';
import { FakeDb, TENANT_A, rows, testConfig } from './support/fakes';

describe('seedDemoTenant', () => {
  it('creates missing users and leaves already registered ones untouched', async () => {
    const db = new FakeDb((text, values) => {
      if (text.includes('insert into organizations')) {
        return rows({ id: TENANT_A });
      }
      if (text.includes('insert into users')) {
        // the editor account already exists, possibly in another tenant
        return values[2] === 'editor@example.com' ? { rows: [], rowCount: 0 } : { rows: [], rowCount: 1 };
      }
      return undefined;
    });

    const report = await seedDemoTenant(db as never, new PasswordHasherService(testConfig()), {
      orgName: 'Demo Org',
      password: 'change-me-please'
    });

    assert.deepEqual(report, {
      orgId: TENANT_A,
      created: ['admin@example.com', 'viewer@example.com'],
      skipped: ['editor@example.com']
    });

    const inserts = db.callsMatching('insert into users');
    assert.equal(inserts.length, 3);
    for (const insert of inserts) {
      assert.match(insert.text, /on conflict \(email\) do nothing$/);
      assert.equal(insert.values[1], TENANT_A);
    }
  });

  it('hashes the seed password with the configured cost', async () => {
    const db = new FakeDb((text) => (text.includes('insert into organizations') ? rows({ id: TENANT_A }) : undefined));

    await seedDemoTenant(db as never, new PasswordHasherService({ auth: { bcryptRounds: 5 } }), {
      orgName: 'Demo Org',
      password: 'change-me-please'
    });

    const [first] = db.callsMatching('insert into users');
    assert.match(String(first.values[3]), /^\$2[aby]\$05\$/);
  });
});
