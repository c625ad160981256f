import { z } from 'zod';
import { ConfigurationError } from './domain/index.js';

export const DEFAULT_QUEUE_CAPACITY = 1000;

/** The service's own read and health API is not recorded unless asked for. */
export const DEFAULT_IGNORED_PATH_PREFIXES = ['/api/v1/telemetry', '/api/v1/requests'];

/**
 * Telemetry pipeline settings. Also accepted programmatically by the
 * telemetry plugin, so callers get the same validation as the env loader.
 */
export const telemetryConfigSchema = z.object({
  databaseUrl: z
    .string({ required_error: 'DATABASE_URL is required' })
    .trim()
    .min(1, 'DATABASE_URL is required'),
  queueCapacity: z.number().int().positive().default(DEFAULT_QUEUE_CAPACITY),
  backoffMs: z.number().int().positive().default(5000),
  maxBackoffMs: z.number().int().positive().optional(),
  drainTimeoutMs: z.number().int().positive().default(5000),
  ensureSchema: z.boolean().default(true),
  ignorePaths: z.array(z.string().min(1)).default([]),
  ignorePathPrefixes: z.array(z.string().min(1)).default(DEFAULT_IGNORED_PATH_PREFIXES),
}).refine(
  (c) => c.maxBackoffMs === undefined || c.maxBackoffMs >= c.backoffMs,
  { message: 'must not be lower than backoffMs', path: ['maxBackoffMs'] },
);

export const serverConfigSchema = z.object({
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  host: z.string().min(1).default('0.0.0.0'),
  port: z.number().int().min(0).max(65535).default(3000),
});

export type TelemetryConfig = z.output<typeof telemetryConfigSchema>;
export type TelemetryConfigInput = z.input<typeof telemetryConfigSchema>;
export type ServerConfig = z.output<typeof serverConfigSchema>;

export interface AppConfig {
  telemetry: TelemetryConfig;
  server: ServerConfig;
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown, label: string): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${label} configuration: ${formatIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}

/** Validates telemetry settings. Throws ConfigurationError. */
export function parseTelemetryConfig(input: unknown): TelemetryConfig {
  return parseWith(telemetryConfigSchema, input, 'telemetry');
}

// Unset and blank variables fall through to schema defaults; anything else
// is handed to zod as-is so malformed values are reported, not defaulted.
function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function envBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return value;
}

function envList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value.split(',').map((item) => item.trim()).filter((item) => item !== '');
}

/**
 * Loads configuration from environment variables.
 *
 * DATABASE_URL is mandatory; every other variable has a default.
 * Throws ConfigurationError so the process refuses to start.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const telemetry = parseTelemetryConfig({
    databaseUrl: env['DATABASE_URL'],
    queueCapacity: envNumber(env['TELEMETRY_QUEUE_CAPACITY']),
    backoffMs: envNumber(env['TELEMETRY_BACKOFF_MS']),
    maxBackoffMs: envNumber(env['TELEMETRY_MAX_BACKOFF_MS']),
    drainTimeoutMs: envNumber(env['TELEMETRY_DRAIN_TIMEOUT_MS']),
    ensureSchema: envBoolean(env['TELEMETRY_ENSURE_SCHEMA']),
    ignorePaths: envList(env['TELEMETRY_IGNORE_PATHS']),
    ignorePathPrefixes: envList(env['TELEMETRY_IGNORE_PATH_PREFIXES']),
  });

  const server = parseWith(serverConfigSchema, {
    logLevel: env['LOG_LEVEL'] === undefined || env['LOG_LEVEL'] === '' ? undefined : env['LOG_LEVEL'],
    host: env['HOST'] === undefined || env['HOST'] === '' ? undefined : env['HOST'],
    port: envNumber(env['PORT']),
  }, 'server');

  return { telemetry, server };
}
