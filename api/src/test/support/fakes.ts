import { AppConfig } from '../../shared/config/app-config';
import { StructuredLoggerService } from '../../shared/logging/structured-logger.service';

export const TENANT_A = '11111111-1111-4111-8111-111111111111';
export const TENANT_B = '22222222-2222-4222-8222-222222222222';
export const USER_X = 'aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa';
export const USER_Y = 'bbbbbbbb-bbbb-4bbb-8bbb-bbbbbbbbbbbb';
export const ADMIN_ID = 'cccccccc-cccc-4ccc-8ccc-cccccccccccc';
export const PROJECT_P1 = 'dddddddd-dddd-4ddd-8ddd-dddddddddddd';

export function testConfig(): AppConfig {
  return {
    env: 'test',
    port: 0,
    logLevel: 'silent',
    database: { connectionString: 'postgres://unused' },
    auth: {
      jwtSecret: 'test-secret',
      accessTtlSeconds: 1800,
      refreshTtlSeconds: 604800,
      bcryptRounds: 4
    }
  };
}

export function silentLogger(): StructuredLoggerService {
  return new StructuredLoggerService({ logLevel: 'silent' });
}

export function uniqueViolation(): Error {
  return Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505' });
}

export type FakeQueryResult = { rows: Array<Record<string, unknown>>; rowCount: number };

export type Responder = (text: string, values: unknown[]) => FakeQueryResult | Error | undefined;

export function rows(...items: Array<Record<string, unknown>>): FakeQueryResult {
  return { rows: items, rowCount: items.length };
}

export class FakeDb {
  public calls: Array<{ text: string; values: unknown[] }> = [];

  constructor(private readonly responder: Responder = () => undefined) {}

  async query(text: string, values: unknown[] = []): Promise<FakeQueryResult> {
    this.calls.push({ text, values });
    const result = this.responder(text, values);
    if (result instanceof Error) {
      throw result;
    }
    return result ?? { rows: [], rowCount: 0 };
  }

  callsMatching(fragment: string): Array<{ text: string; values: unknown[] }> {
    return this.calls.filter((call) => call.text.includes(fragment));
  }
}

/** Stands in for PostgresService; the transaction runs on the same recorder. */
export class FakePostgres extends FakeDb {
  public transactions: Array<{ tenantId: string | null; outcome: 'committed' | 'rolled_back' }> = [];

  async transaction<T>(tenantId: string | null, work: (tx: FakeDb) => Promise<T>): Promise<T> {
    try {
      const result = await work(this);
      this.transactions.push({ tenantId, outcome: 'committed' });
      return result;
    } catch (error) {
      this.transactions.push({ tenantId, outcome: 'rolled_back' });
      throw error;
    }
  }
}
