import { randomUUID } from 'node:crypto';
import { UserRole } from '../shared/auth/auth.types';
import { PasswordHasherService } from '../shared/auth/password-hasher.service';
import { DbExecutor } from '../shared/database/postgres.service';

export const DEMO_USERS: ReadonlyArray<{ email: string; role: UserRole }> = [
  { email: 'admin@example.com', role: 'admin' },
  { email: 'editor@example.com', role: 'editor' },
  { email: 'viewer@example.com', role: 'viewer' }
];

export type SeedReport = {
  orgId: string;
  created: string[];
  skipped: string[];
};

/**
 * Creates the demo organization and its users if missing. Existing accounts
 * are left alone: a user's tenant, role and password are never rewritten here.
 */
export async function seedDemoTenant(
  tx: DbExecutor,
  hasher: PasswordHasherService,
  options: { orgName: string; password: string }
): Promise<SeedReport> {
  const orgRes = await tx.query<{ id: string }>(
    `insert into organizations (id, name)
     values ($1, $2)
     on conflict (name) do update set name = excluded.name
     returning id`,
    [randomUUID(), options.orgName]
  );
  const orgId = orgRes.rows[0]?.id;
  if (!orgId) {
    throw new Error('Seed organization was not created');
  }

  const passwordHash = await hasher.hash(options.password);
  const report: SeedReport = { orgId, created: [], skipped: [] };

  for (const user of DEMO_USERS) {
    const res = await tx.query(
      `insert into users (id, org_id, email, password_hash, role)
       values ($1, $2, $3, $4, $5)
       on conflict (email) do nothing`,
      [randomUUID(), orgId, user.email, passwordHash, user.role]
    );
    (res.rowCount === 1 ? report.created : report.skipped).push(user.email);
  }

  return report;
}
