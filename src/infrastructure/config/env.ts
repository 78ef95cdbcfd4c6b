import { z } from 'zod';
import type { TestModeProbe } from '../../application/index.js';

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

export function parseFlag(value: string | undefined): boolean {
  return value !== undefined && TRUTHY.has(value.trim().toLowerCase());
}

const flag = z.string().optional().transform(parseFlag);

/**
 * Environment variables read at startup. Every value has a local-dev
 * default except the SMTP credentials, which are optional.
 */
export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  BROKER_URL: z.string().url().default('redis://localhost:6379'),
  RESULT_STORE_URL: z.string().url().optional(),
  BROKER_ACK_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  BROKER_MIN_REPLICAS: z.coerce.number().int().min(0).default(0),

  TASK_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(4),
  TASK_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(60_000),
  QUEUE_PREFIX: z.string().min(1).default('notify'),
  WORKER_ID: z.string().min(1).default('worker-1'),
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(5),

  SMTP_HOST: z.string().default('localhost'),
  SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(587),
  SMTP_USERNAME: z.string().optional(),
  SMTP_PASSWORD: z.string().optional(),
  SMTP_FROM: z.string().email().default('no-reply@example.com'),

  SERVER_BASE_URL: z.string().url().default('http://localhost:3000'),
  SUPPORT_EMAIL: z.string().email().default('support@example.com'),

  TEST_MODE: flag,
  NOTIFICATIONS_CONFIG: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  env: Env['NODE_ENV'];
  logLevel: Env['LOG_LEVEL'];
  http: { host: string; port: number };
  broker: { url: string; ackTimeoutMs: number; minReplicas: number };
  resultStore: { url: string; queuePrefix: string };
  tasks: { maxAttempts: number; retryDelayMs: number };
  worker: { id: string; concurrency: number };
  smtp: { host: string; port: number; username?: string; password?: string; from: string };
  mail: { serverBaseUrl: string; supportEmail: string };
  notificationsConfigPath?: string;
}

/**
 * Validates the environment and shapes it into an {@link AppConfig}.
 * Throws one error listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    env: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    http: { host: e.HOST, port: e.PORT },
    broker: { url: e.BROKER_URL, ackTimeoutMs: e.BROKER_ACK_TIMEOUT_MS, minReplicas: e.BROKER_MIN_REPLICAS },
    resultStore: { url: e.RESULT_STORE_URL ?? e.BROKER_URL, queuePrefix: e.QUEUE_PREFIX },
    tasks: { maxAttempts: e.TASK_MAX_ATTEMPTS, retryDelayMs: e.TASK_RETRY_DELAY_MS },
    worker: { id: e.WORKER_ID, concurrency: e.WORKER_CONCURRENCY },
    smtp: {
      host: e.SMTP_HOST,
      port: e.SMTP_PORT,
      ...(e.SMTP_USERNAME !== undefined ? { username: e.SMTP_USERNAME } : {}),
      ...(e.SMTP_PASSWORD !== undefined ? { password: e.SMTP_PASSWORD } : {}),
      from: e.SMTP_FROM,
    },
    mail: { serverBaseUrl: e.SERVER_BASE_URL, supportEmail: e.SUPPORT_EMAIL },
    ...(e.NOTIFICATIONS_CONFIG !== undefined ? { notificationsConfigPath: e.NOTIFICATIONS_CONFIG } : {}),
  };
}

/**
 * Test mode probe backed by the live environment. `TEST_MODE` is read on
 * every call, not once at startup.
 */
export function envTestModeProbe(env: NodeJS.ProcessEnv = process.env): TestModeProbe {
  return () => parseFlag(env['TEST_MODE']);
}
