import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3001),
  DATABASE_URL: z.string().min(1).optional(),
  DB_POOL_MAX: z.coerce.number().int().positive().default(20),
  DB_TRANSACTION_TIMEOUT_MS: z.coerce.number().int().min(100).max(60000).default(5000),
  OFFICE_STORE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
  OFFICE_TIMEZONE: z.string().min(1).default('UTC').refine(isValidTimeZone, 'OFFICE_TIMEZONE must be an IANA time zone'),
  SESSION_SECRET: z.string().min(1).optional(),
  ALLOWED_ORIGINS: z.string().optional(),
  BOOKING_MAX_ACTIVE_PER_EMPLOYEE: z.coerce.number().int().min(0).default(0),
  ENABLE_TEST_LOGIN: z.enum(['true', 'false']).default('false'),
}).superRefine((env, ctx) => {
  if (env.OFFICE_STORE_DRIVER === 'postgres' && !env.DATABASE_URL) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['DATABASE_URL'], message: 'DATABASE_URL is required when OFFICE_STORE_DRIVER=postgres' });
  }
  if (env.NODE_ENV === 'production' && !env.SESSION_SECRET) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SESSION_SECRET'], message: 'SESSION_SECRET is required in production' });
  }
});

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

export interface OfficeConfig {
  isProduction: boolean;
  port: number;
  databaseUrl?: string;
  dbPoolMax: number;
  transactionTimeoutMs: number;
  storeDriver: 'postgres' | 'memory';
  timeZone: string;
  sessionSecret?: string;
  allowedOrigins: string[];
  maxActiveBookingsPerEmployee: number;
  /** Exposes POST /api/dev/login outside production. */
  enableTestLogin: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): OfficeConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`[Config] Invalid environment: ${details}`);
  }
  const e = parsed.data;
  return Object.freeze({
    isProduction: e.NODE_ENV === 'production',
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    dbPoolMax: e.DB_POOL_MAX,
    transactionTimeoutMs: e.DB_TRANSACTION_TIMEOUT_MS,
    storeDriver: e.OFFICE_STORE_DRIVER,
    timeZone: e.OFFICE_TIMEZONE,
    sessionSecret: e.SESSION_SECRET,
    allowedOrigins: (e.ALLOWED_ORIGINS ?? '').split(',').map(o => o.trim()).filter(Boolean),
    maxActiveBookingsPerEmployee: e.BOOKING_MAX_ACTIVE_PER_EMPLOYEE,
    enableTestLogin: e.ENABLE_TEST_LOGIN === 'true' && e.NODE_ENV !== 'production',
  });
}

export const config = loadConfig();
