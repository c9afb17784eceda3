import { Pool } from 'pg';
import { PasswordHasherService } from '../shared/auth/password-hasher.service';
import { loadDatabaseConfig, loadHashingConfig } from '../shared/config/app-config';
import { seedDemoTenant } from './demo-tenant';

const ORG_NAME = process.env.SEED_ORG_NAME ?? 'Demo Org';
const PASSWORD = process.env.SEED_PASSWORD ?? 'change-me-please';

async function main(): Promise<void> {
  const hasher = new PasswordHasherService({ auth: loadHashingConfig(process.env) });
  const pool = new Pool(loadDatabaseConfig(process.env));
  const client = await pool.connect();

  try {
    await client.query('begin');
    const report = await seedDemoTenant(client, hasher, { orgName: ORG_NAME, password: PASSWORD });
    await client.query('commit');

    console.log(`Seeded organization "${ORG_NAME}" (${report.orgId})`);
    for (const email of report.created) {
      console.log(`  created: ${email}`);
    }
    for (const email of report.skipped) {
      console.log(`  skipped (already registered): ${email}`);
    }
  } catch (error) {
    await client.query('rollback');
    throw error;
  } finally {
    client.release();
    await pool.end();
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
