import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../../core/errors.js';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
const AppEnvSchema = z.enum(['dev', 'prod', 'test']);

// config/default.yaml, every field optional
const FileConfigSchema = z
  .object({
    app: z
      .object({
        name: z.string().min(1),
        env: AppEnvSchema,
      })
      .partial(),
    logging: z
      .object({
        level: LogLevelSchema,
        color: z.boolean(),
      })
      .partial(),
    api: z
      .object({
        url: z.string().url(),
        model: z.string().min(1),
        timeoutSeconds: z.number().int().positive(),
        userAgent: z.string().min(1),
      })
      .partial(),
    defaults: z
      .object({
        temperature: z.number(),
        maxTokens: z.number().int().positive(),
      })
      .partial(),
    output: z.object({ dir: z.string().min(1) }).partial(),
    server: z.object({ port: z.number().int().nonnegative() }).partial(),
    certs: z
      .object({
        localBundle: z.string().min(1),
        envFile: z.string().min(1),
      })
      .partial(),
  })
  .partial();

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type AppConfig = z.infer<typeof FileConfigSchema>;

export type AppConfigRequired = {
  app: {
    name: string;
    env: z.infer<typeof AppEnvSchema>;
  };
  logging: {
    level: LogLevel;
    color: boolean;
  };
  api: {
    url: string;
    apiKey?: string;
    model: string;
    timeoutSeconds: number;
    userAgent: string;
  };
  defaults: {
    temperature: number;
    maxTokens: number;
  };
  trust: {
    /** SSL_CERT_FILE or REQUESTS_CA_BUNDLE, when set */
    caBundlePath?: string;
    /** Absolute path of the project-local combined bundle */
    localBundlePath: string;
  };
  output: {
    dir: string;
  };
  server: {
    port: number;
  };
  certs: {
    envFile: string;
  };
};

export const DEFAULT_API_URL = 'https://api.groq.com/openai/v1/chat/completions';
export const DEFAULT_MODEL = 'openai/gpt-oss-20b';
export const DEFAULT_LOCAL_BUNDLE = '.certs/combined-ca-bundle.pem';

export interface LoadConfigOptions {
  /** Environment to read; when omitted, `.env` is loaded into process.env first. */
  env?: NodeJS.ProcessEnv;
  /** Directory holding config/ and .env (default: process.cwd()) */
  cwd?: string;
}

let cachedConfig: AppConfigRequired | null = null;

function readFileConfig(cwd: string): AppConfig {
  const filePath = resolve(cwd, 'config', 'default.yaml');
  if (!existsSync(filePath)) return {};

  const raw = readFileSync(filePath, 'utf-8');
  const parsed = FileConfigSchema.safeParse(parse(raw) ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid config file ${filePath}: ${issues}`);
  }
  return parsed.data;
}

function stringFromEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name];
  return raw && raw.trim() ? raw.trim() : undefined;
}

function numberFromEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = stringFromEnv(env, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (Number.isFinite(value) && value >= 0) return value;
  throw new ConfigurationError(`Invalid numeric env ${name}: ${raw}`);
}

/**
 * Resolve the effective configuration: environment variables, then
 * config/default.yaml, then built-in defaults.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfigRequired {
  const useDefaults = options.env === undefined && options.cwd === undefined;
  if (useDefaults && cachedConfig) return cachedConfig;

  const cwd = options.cwd ?? process.cwd();
  let env = options.env;
  if (!env) {
    loadDotenv({ path: resolve(cwd, '.env') });
    env = process.env;
  }

  const cfg = readFileConfig(cwd);
  const nodeEnv = AppEnvSchema.safeParse(env.NODE_ENV);
  const logLevel = LogLevelSchema.safeParse(stringFromEnv(env, 'LOG_LEVEL')?.toLowerCase());

  const resolved: AppConfigRequired = {
    app: {
      name: cfg.app?.name ?? 'groq-gist',
      env: nodeEnv.success ? nodeEnv.data : (cfg.app?.env ?? 'prod'),
    },
    logging: {
      level: logLevel.success ? logLevel.data : (cfg.logging?.level ?? 'info'),
      color: cfg.logging?.color ?? true,
    },
    api: {
      url: stringFromEnv(env, 'GROQ_API_URL') ?? cfg.api?.url ?? DEFAULT_API_URL,
      apiKey: stringFromEnv(env, 'GROQ_API_KEY'),
      model: stringFromEnv(env, 'GROQ_MODEL') ?? cfg.api?.model ?? DEFAULT_MODEL,
      timeoutSeconds: numberFromEnv(env, 'GROQ_TIMEOUT_SECONDS') ?? cfg.api?.timeoutSeconds ?? 15,
      userAgent: cfg.api?.userAgent ?? 'groq-gist/1.0',
    },
    defaults: {
      temperature: cfg.defaults?.temperature ?? 0.2,
      maxTokens: cfg.defaults?.maxTokens ?? 800,
    },
    trust: {
      caBundlePath: stringFromEnv(env, 'SSL_CERT_FILE') ?? stringFromEnv(env, 'REQUESTS_CA_BUNDLE'),
      localBundlePath: resolve(cwd, cfg.certs?.localBundle ?? DEFAULT_LOCAL_BUNDLE),
    },
    output: {
      dir: stringFromEnv(env, 'OUTPUT_DIR') ?? cfg.output?.dir ?? 'outputs',
    },
    server: {
      port: numberFromEnv(env, 'PORT') ?? cfg.server?.port ?? 8080,
    },
    certs: {
      envFile: resolve(cwd, cfg.certs?.envFile ?? '.env'),
    },
  };

  if (useDefaults) cachedConfig = resolved;
  return resolved;
}

/**
 * The API key is only needed by the paths that talk to the remote API, so it is
 * checked here rather than in loadConfig().
 */
export function requireApiKey(cfg: AppConfigRequired): string {
  if (!cfg.api.apiKey) {
    throw new ConfigurationError(
      'GROQ_API_KEY not set. Put your key in .env or export GROQ_API_KEY in your environment.',
    );
  }
  return cfg.api.apiKey;
}
