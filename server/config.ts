/**
 * Environment Configuration
 *
 * Fail-fast startup validation: every problem is collected and reported at
 * once, and the server refuses to start on a misconfigured environment.
 *
 * DATABASE_URL and AUTH_TOKEN_SECRET are required only when the HTTP server
 * starts (requireRuntime); tests and tooling can load the rest without them.
 */

import "dotenv/config";
import { z } from "zod";
import { DEFAULT_QUOTE_VALIDITY_DAYS } from "../shared/quoteWorkflow";

/**
 * Treats "0", "false", "off", "no" (case-insensitive) as false
 */
export function parseEnvBoolean(value: string | undefined, defaultValue: boolean = true): boolean {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const normalized = value.toLowerCase().trim();
  return !['0', 'false', 'off', 'no'].includes(normalized);
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  DATABASE_URL: z.string().url("DATABASE_URL must be a valid PostgreSQL connection string").optional(),
  AUTH_TOKEN_SECRET: z.string().min(16, "AUTH_TOKEN_SECRET must be at least 16 characters").optional(),
  QUOTE_VALIDITY_DAYS: z.coerce.number().int().min(1).max(365).default(DEFAULT_QUOTE_VALIDITY_DAYS),
  NOTIFICATION_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(2),
  FEATURE_EMAIL_ENABLED: z.string().optional(),
  SMTP_HOST: z.string().optional(),
  SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(587),
  SMTP_USER: z.string().optional(),
  SMTP_PASSWORD: z.string().optional(),
  EMAIL_FROM: z.string().email().default('quotes@localhost.localdomain'),
  EMAIL_FROM_NAME: z.string().min(1).max(100).default('Quote Desk'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  databaseUrl: string | undefined;
  authTokenSecret: string | undefined;
  quoteValidityDays: number;
  notificationConcurrency: number;
  email: {
    enabled: boolean;
    from: string;
    fromName: string;
    smtp: {
      host: string | undefined;
      port: number;
      user: string | undefined;
      password: string | undefined;
    };
  };
}

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid environment configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  options: { requireRuntime?: boolean } = {}
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const values = parsed.data;
  const problems: string[] = [];

  if (options.requireRuntime) {
    if (!values.DATABASE_URL) problems.push('DATABASE_URL must be set');
    if (!values.AUTH_TOKEN_SECRET) problems.push('AUTH_TOKEN_SECRET must be set');
  }

  const emailEnabled = parseEnvBoolean(values.FEATURE_EMAIL_ENABLED, true);
  if (emailEnabled && values.NODE_ENV === 'production' && !values.SMTP_HOST) {
    problems.push('SMTP_HOST must be set when FEATURE_EMAIL_ENABLED is on in production');
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return {
    nodeEnv: values.NODE_ENV,
    port: values.PORT,
    databaseUrl: values.DATABASE_URL,
    authTokenSecret: values.AUTH_TOKEN_SECRET,
    quoteValidityDays: values.QUOTE_VALIDITY_DAYS,
    notificationConcurrency: values.NOTIFICATION_CONCURRENCY,
    email: {
      enabled: emailEnabled,
      from: values.EMAIL_FROM,
      fromName: values.EMAIL_FROM_NAME,
      smtp: {
        host: values.SMTP_HOST,
        port: values.SMTP_PORT,
        user: values.SMTP_USER,
        password: values.SMTP_PASSWORD,
      },
    },
  };
}
