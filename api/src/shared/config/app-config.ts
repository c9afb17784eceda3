import { z } from 'zod';

export const APP_CONFIG = Symbol('APP_CONFIG');

export const LOG_LEVELS = ['debug', 'log', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const databaseSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  DB_HOST: z.string().min(1).default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_NAME: z.string().min(1).default('portfolio'),
  DB_USER: z.string().min(1).default('app'),
  DB_PASSWORD: z.string().default('app123')
});

const hashingSchema = z.object({
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12)
});

const environmentSchema = databaseSchema
  .merge(hashingSchema)
  .extend({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    JWT_SECRET: z.string().min(1),
    JWT_ACCESS_TTL_SECONDS: z.coerce.number().int().positive().default(30 * 60),
    JWT_REFRESH_TTL_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('log')
  })
  .superRefine((value, ctx) => {
    if (value.NODE_ENV !== 'test' && value.JWT_SECRET.length < 16) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['JWT_SECRET'],
        message: 'JWT_SECRET must be at least 16 characters'
      });
    }
  });

export type DatabaseConfig =
  | { connectionString: string }
  | { host: string; port: number; database: string; user: string; password: string };

export type AuthConfig = {
  jwtSecret: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
  bcryptRounds: number;
};

export type AppConfig = {
  env: 'development' | 'test' | 'production';
  port: number;
  logLevel: LogLevel;
  database: DatabaseConfig;
  auth: AuthConfig;
};

export class InvalidConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment configuration: ${issues.join('; ')}`);
    this.name = 'InvalidConfigError';
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`);
}

function toDatabaseConfig(env: z.infer<typeof databaseSchema>): DatabaseConfig {
  return env.DATABASE_URL
    ? { connectionString: env.DATABASE_URL }
    : {
        host: env.DB_HOST,
        port: env.DB_PORT,
        database: env.DB_NAME,
        user: env.DB_USER,
        password: env.DB_PASSWORD
      };
}

/** Connection settings only; used by the migration and seed scripts. */
export function loadDatabaseConfig(source: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const parsed = databaseSchema.safeParse(source);
  if (!parsed.success) {
    throw new InvalidConfigError(formatIssues(parsed.error));
  }
  return toDatabaseConfig(parsed.data);
}

/** Hash cost only; used by the seed script, which has no signing secret. */
export function loadHashingConfig(source: NodeJS.ProcessEnv = process.env): Pick<AuthConfig, 'bcryptRounds'> {
  const parsed = hashingSchema.safeParse(source);
  if (!parsed.success) {
    throw new InvalidConfigError(formatIssues(parsed.error));
  }
  return { bcryptRounds: parsed.data.BCRYPT_ROUNDS };
}

/**
 * Reads the process environment once. The returned object is the only holder
 * of the signing secret and is handed to the token codec through DI.
 */
export function loadAppConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = environmentSchema.safeParse(source);
  if (!parsed.success) {
    throw new InvalidConfigError(formatIssues(parsed.error));
  }

  const env = parsed.data;
  return {
    env: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    database: toDatabaseConfig(env),
    auth: {
      jwtSecret: env.JWT_SECRET,
      accessTtlSeconds: env.JWT_ACCESS_TTL_SECONDS,
      refreshTtlSeconds: env.JWT_REFRESH_TTL_SECONDS,
      bcryptRounds: env.BCRYPT_ROUNDS
    }
  };
}
