import { z } from 'zod';
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

// setTimeout fires after 1ms for any delay above 2^31-1 ms
export const MAX_TIMER_SECONDS = Math.floor(2147483647 / 1000);

const LoggingSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
  json: z.boolean().default(true),
});

const ConfigSchema = z.object({
  source: z.object({
    projectId: z.string().min(1),
    secretName: z.string().min(1),
    version: z.string().min(1).default('latest'),
    credentialsPath: z.string().min(1).optional(),
  }),
  target: z.object({
    namespace: z.string().min(1),
    secretName: z.string().min(1),
  }),
  sync: z.object({
    intervalSeconds: z.number().int().positive().max(MAX_TIMER_SECONDS).default(300),
    retryBackoffSeconds: z.number().int().positive().max(MAX_TIMER_SECONDS).default(60),
    stepTimeoutSeconds: z.number().int().positive().max(MAX_TIMER_SECONDS).default(30),
    concurrency: z.enum(['join', 'reject']).default('join'),
  }),
  api: z.object({
    token: z.string().min(1).optional(),
    host: z.string().min(1).default('0.0.0.0'),
    port: z.number().int().positive().default(8000),
  }),
  logging: LoggingSchema,
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingSchema>;

export const DEFAULT_CONFIG_FILE = 'secret-sync.config.json';

// Env variable behind each config path, used to make start-up errors actionable
const ENV_NAMES: Record<string, string> = {
  'source.projectId': 'GCP_PROJECT_ID',
  'source.secretName': 'GCP_SECRET_NAME',
  'source.version': 'GCP_SECRET_VERSION',
  'source.credentialsPath': 'GCP_CREDENTIALS_PATH',
  'target.namespace': 'K8S_NAMESPACE',
  'target.secretName': 'K8S_SECRET_NAME',
  'sync.intervalSeconds': 'SYNC_INTERVAL_SECONDS',
  'sync.retryBackoffSeconds': 'SYNC_RETRY_BACKOFF_SECONDS',
  'sync.stepTimeoutSeconds': 'SYNC_STEP_TIMEOUT_SECONDS',
  'sync.concurrency': 'SYNC_CONCURRENCY',
  'api.token': 'API_TOKEN',
  'api.host': 'HOST',
  'api.port': 'PORT',
  'logging.level': 'LOG_LEVEL',
  'logging.json': 'LOG_JSON',
};

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function env(name: string): string | undefined {
  const v = process.env[name];
  return v === undefined || v.trim() === '' ? undefined : v.trim();
}

// Non-numeric input becomes NaN so the schema rejects it instead of silently defaulting
function envNumber(name: string): number | undefined {
  const v = env(name);
  return v === undefined ? undefined : Number(v);
}

function envBoolean(name: string): boolean | undefined {
  const v = env(name)?.toLowerCase();
  if (v === undefined) return undefined;
  return !['0', 'false', 'no', 'off'].includes(v);
}

function readConfigFile(configPath: string): Record<string, unknown> {
  const full = path.resolve(process.cwd(), configPath);
  if (!fs.existsSync(full)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(full, 'utf8'));
  } catch (e) {
    throw new ConfigError(`Failed to parse config file ${full}: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${full} must contain a JSON object`);
  }
  return parsed;
}

function section(file: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = file[name];
  return isRecord(value) ? value : {};
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const key = issue.path.join('.');
    const envName = ENV_NAMES[key];
    return envName ? `${key} (${envName}): ${issue.message}` : `${key}: ${issue.message}`;
  });
}

export function loadLoggingConfig(): LoggingConfig {
  const parsed = LoggingSchema.safeParse({
    level: env('LOG_LEVEL')?.toLowerCase(),
    json: envBoolean('LOG_JSON'),
  });
  // Logging must come up even when the rest of the configuration is broken
  return parsed.success ? parsed.data : { level: 'info', json: true };
}

export function loadConfig(configPath = DEFAULT_CONFIG_FILE): AppConfig {
  const fileRaw = readConfigFile(configPath);
  const merged = {
    source: {
      projectId: env('GCP_PROJECT_ID'),
      secretName: env('GCP_SECRET_NAME'),
      version: env('GCP_SECRET_VERSION'),
      credentialsPath: env('GCP_CREDENTIALS_PATH'),
      ...section(fileRaw, 'source'),
    },
    target: {
      namespace: env('K8S_NAMESPACE'),
      secretName: env('K8S_SECRET_NAME'),
      ...section(fileRaw, 'target'),
    },
    sync: {
      intervalSeconds: envNumber('SYNC_INTERVAL_SECONDS'),
      retryBackoffSeconds: envNumber('SYNC_RETRY_BACKOFF_SECONDS'),
      stepTimeoutSeconds: envNumber('SYNC_STEP_TIMEOUT_SECONDS'),
      concurrency: env('SYNC_CONCURRENCY'),
      ...section(fileRaw, 'sync'),
    },
    api: {
      token: env('API_TOKEN'),
      host: env('HOST'),
      port: envNumber('PORT'),
      ...section(fileRaw, 'api'),
    },
    logging: {
      level: env('LOG_LEVEL')?.toLowerCase(),
      json: envBoolean('LOG_JSON'),
      ...section(fileRaw, 'logging'),
    },
  };
  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = describeIssues(parsed.error);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

/** Copy of the config that is safe to print or log. */
export function redactConfig(cfg: AppConfig): AppConfig {
  return {
    ...cfg,
    api: { ...cfg.api, token: cfg.api.token ? '***' : undefined },
  };
}
