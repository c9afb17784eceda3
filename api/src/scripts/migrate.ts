import { readdirSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { Pool } from 'pg';
import { loadDatabaseConfig } from '../shared/config/app-config';

const MIGRATIONS_DIR = resolve(__dirname, '..', '..', 'sql', 'migrations');

async function main(): Promise<void> {
  const mode = process.argv.includes('--status') ? 'status' : 'apply';
  const pool = new Pool(loadDatabaseConfig(process.env));

  try {
    await pool.query(`
      create table if not exists schema_migrations (
        version varchar(120) primary key,
        applied_at timestamptz not null default now()
      )
    `);

    const files = readdirSync(MIGRATIONS_DIR)
      .filter((name) => name.endsWith('.sql'))
      .sort();

    const appliedRes = await pool.query<{ version: string }>('select version from schema_migrations');
    const applied = new Set(appliedRes.rows.map((row) => row.version));

    if (mode === 'status') {
      for (const file of files) {
        console.log(`${applied.has(file) ? 'APPLIED' : 'PENDING'} ${file}`);
      }
      return;
    }

    for (const file of files) {
      if (applied.has(file)) {
        continue;
      }

      const sql = readFileSync(resolve(MIGRATIONS_DIR, file), 'utf8');
      const client = await pool.connect();

      try {
        await client.query('begin');
        await client.query(sql);
        await client.query('insert into schema_migrations (version) values ($1)', [file]);
        await client.query('commit');
        console.log(`APPLIED ${file}`);
      } catch (error) {
        await client.query('rollback');
        throw error;
      } finally {
        client.release();
      }
    }
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
