import assert from 'node:assert/strict';
import { before, describe, it } from 'node:test';
import { AuthService } from '../modules/auth/auth.service';
import { OrganizationsService } from '../modules/organizations/organizations.service';
import { UsersService } from '../modules/users/users.service';
import { UserRole } from '../shared/auth/auth.types';
import { PasswordHasherService } from '../shared/auth/password-hasher.service';
import { TokenService } from '../shared/auth/token.service';
import {
  ConflictError,
  InvalidCredentialsError,
  InvalidTokenError,
  UnauthenticatedError
} from '../shared/errors/app-errors';
import { FakePostgres, Responder, TENANT_A, USER_X, rows, silentLogger, testConfig, uniqueViolation } from './support/fakes';

const config = testConfig();
const hasher = new PasswordHasherService(config);
const tokens = new TokenService(config);

let storedHash = '';

before(async () => {
  storedHash = await hasher.hash('correct-password');
});

function userRow(role: UserRole) {
  return {
    id: USER_X,
    org_id: TENANT_A,
    email: 'x@example.com',
    role,
    password_hash: storedHash,
    created_at: '2026-01-01T00:00:00.000Z'
  };
}

function buildAuth(responder: Responder) {
  const db = new FakePostgres(responder);
  const service = new AuthService(
    db as never,
    new UsersService(hasher),
    new OrganizationsService(),
    hasher,
    tokens,
    silentLogger()
  );
  return { db, service };
}

describe('AuthService.login', () => {
  it('rejects a wrong password every time without writing anything, then accepts the right one', async () => {
    const { db, service } = buildAuth((text) =>
      text.includes('from users where email = $1') ? rows(userRow('editor')) : undefined
    );

    for (let attempt = 0; attempt < 3; attempt += 1) {
      await assert.rejects(service.login({ email: 'x@example.com', password: 'wrong-password' }), InvalidCredentialsError);
    }
    assert.equal(db.calls.length, 3);
    assert.ok(db.calls.every((call) => call.text.startsWith('select')));

    const session = await service.login({ email: 'x@example.com', password: 'correct-password' });
    assert.equal(session.userId, USER_X);
    assert.equal(session.tenantId, TENANT_A);
    assert.equal(session.role, 'editor');
    assert.equal(session.tokenType, 'bearer');
    assert.equal(tokens.parse(session.accessToken, 'access').role, 'editor');
    assert.equal(tokens.parse(session.refreshToken, 'refresh').userId, USER_X);
  });

  it('reports an unknown email the same way as a wrong password', async () => {
    const { service } = buildAuth(() => undefined);

    await assert.rejects(service.login({ email: 'nobody@example.com', password: 'correct-password' }), {
      name: 'InvalidCredentialsError',
      message: 'Invalid credentials'
    });
  });

  it('spends a hash comparison on unknown emails too', async () => {
    const decoyChecks: string[] = [];
    class CountingHasher extends PasswordHasherService {
      async verifyAgainstDecoy(plaintext: string): Promise<false> {
        decoyChecks.push(plaintext);
        return super.verifyAgainstDecoy(plaintext);
      }
    }
    const service = new AuthService(
      new FakePostgres() as never,
      new UsersService(hasher),
      new OrganizationsService(),
      new CountingHasher(config),
      tokens,
      silentLogger()
    );

    await assert.rejects(service.login({ email: 'nobody@example.com', password: 'guess' }), InvalidCredentialsError);
    assert.deepEqual(decoyChecks, ['guess']);
  });
});

describe('AuthService.register', () => {
  it('creates the tenant and its first user as admin in one transaction', async () => {
    const { db, service } = buildAuth((text, values) => {
      if (text.includes('insert into organizations')) {
        return rows({ id: TENANT_A, name: values[1], created_at: '2026-01-01T00:00:00.000Z' });
      }
      if (text.includes('insert into users')) {
        return rows({
          id: USER_X,
          org_id: values[1],
          email: values[2],
          role: values[4],
          created_at: '2026-01-01T00:00:00.000Z'
        });
      }
      return undefined;
    });

    const session = await service.register({ orgName: 'Acme', email: 'owner@example.com', password: 'long-enough' });

    assert.equal(session.role, 'admin');
    assert.equal(session.tenantId, TENANT_A);
    assert.deepEqual(db.transactions, [{ tenantId: null, outcome: 'committed' }]);

    const [insertUser] = db.callsMatching('insert into users');
    assert.equal(insertUser.values[1], TENANT_A);
    assert.notEqual(insertUser.values[3], 'long-enough');
    assert.equal(await hasher.verify('long-enough', String(insertUser.values[3])), true);
  });

  it('rolls back and reports a conflict when the organization name is taken', async () => {
    const { db, service } = buildAuth((text) =>
      text.includes('insert into organizations') ? uniqueViolation() : undefined
    );

    await assert.rejects(
      service.register({ orgName: 'Acme', email: 'owner@example.com', password: 'long-enough' }),
      (error: unknown) => {
        assert.ok(error instanceof ConflictError);
        assert.equal(error.message, 'Organization name already exists');
        return true;
      }
    );
    assert.equal(db.callsMatching('insert into users').length, 0);
    assert.deepEqual(db.transactions, [{ tenantId: null, outcome: 'rolled_back' }]);
  });

  it('reports a taken email as a conflict', async () => {
    const { db, service } = buildAuth((text, values) => {
      if (text.includes('insert into organizations')) {
        return rows({ id: TENANT_A, name: values[1], created_at: '2026-01-01T00:00:00.000Z' });
      }
      return text.includes('insert into users') ? uniqueViolation() : undefined;
    });

    await assert.rejects(
      service.register({ orgName: 'Acme', email: 'owner@example.com', password: 'long-enough' }),
      { message: 'Email already registered' }
    );
    assert.deepEqual(db.transactions, [{ tenantId: null, outcome: 'rolled_back' }]);
  });
});

describe('AuthService.refresh', () => {
  it('issues tokens carrying the role currently stored for the user', async () => {
    const { service } = buildAuth((text) =>
      text.includes('from users where id = $1') ? rows(userRow('viewer')) : undefined
    );

    const session = await service.refresh(tokens.issueRefresh(USER_X));

    assert.equal(session.role, 'viewer');
    const claims = tokens.parse(session.accessToken, 'access');
    assert.equal(claims.role, 'viewer');
    assert.equal(claims.tenantId, TENANT_A);
  });

  it('rejects refresh tokens of users that no longer exist', async () => {
    const { service } = buildAuth(() => undefined);

    await assert.rejects(service.refresh(tokens.issueRefresh(USER_X)), UnauthenticatedError);
  });

  it('does not accept an access token for renewal', async () => {
    const { db, service } = buildAuth(() => undefined);

    await assert.rejects(service.refresh(tokens.issueAccess(USER_X, TENANT_A, 'admin')), (error: unknown) => {
      assert.ok(error instanceof InvalidTokenError);
      assert.equal(error.reason, 'kind');
      return true;
    });
    assert.equal(db.calls.length, 0);
  });
});

describe('AuthService.me', () => {
  it('adds the stored email to the principal', async () => {
    const { service } = buildAuth((text) =>
      text.includes('from users where id = $1') ? rows(userRow('editor')) : undefined
    );

    assert.deepEqual(await service.me({ userId: USER_X, tenantId: TENANT_A, role: 'editor' }), {
      userId: USER_X,
      tenantId: TENANT_A,
      role: 'editor',
      email: 'x@example.com'
    });
  });
});
