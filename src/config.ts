import { parse } from 'smol-toml';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { errnoCode, errorMessage } from './errors.js';
import type { Credentials } from './types.js';

export interface FilesSyncConfig {
  credentials: {
    cachePath: string;
  };
  server: {
    baseUrl?: string;
    token?: string;
  };
  sync: {
    maxConcurrency: number;
    maxRetries: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
    requestTimeoutMs: number;
    pageSize: number;
    preserveTimestamps: boolean;
    exclude: string[];
  };
  history: {
    enabled: boolean;
    path: string;
  };
}

export function getConfigDir(): string {
  return join(homedir(), '.agave');
}

export function getConfigPath(): string {
  return join(getConfigDir(), 'files-sync.toml');
}

export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

export function getDefaultConfig(): FilesSyncConfig {
  const configDir = getConfigDir();
  return {
    credentials: {
      cachePath: join(configDir, 'current'),
    },
    server: {},
    sync: {
      maxConcurrency: 4,
      maxRetries: 3,
      retryBaseDelayMs: 1000,
      retryMaxDelayMs: 30000,
      requestTimeoutMs: 30000,
      pageSize: 100,
      preserveTimestamps: true,
      exclude: [],
    },
    history: {
      enabled: true,
      path: join(configDir, 'files-sync', 'history.db'),
    },
  };
}

function configSchema(defaults: FilesSyncConfig) {
  const optionalString = z
    .string()
    .optional()
    .transform((value) => (value ? value : undefined));

  return z
    .object({
      credentials: z
        .object({
          cachePath: z.string().min(1).default(defaults.credentials.cachePath),
        })
        .default({}),
      server: z
        .object({
          baseUrl: optionalString,
          token: optionalString,
        })
        .default({}),
      sync: z
        .object({
          maxConcurrency: z.number().int().min(1).max(64).default(defaults.sync.maxConcurrency),
          maxRetries: z.number().int().min(0).max(20).default(defaults.sync.maxRetries),
          retryBaseDelayMs: z.number().int().min(0).default(defaults.sync.retryBaseDelayMs),
          retryMaxDelayMs: z.number().int().min(0).default(defaults.sync.retryMaxDelayMs),
          requestTimeoutMs: z.number().int().min(1).default(defaults.sync.requestTimeoutMs),
          pageSize: z.number().int().min(1).max(10000).default(defaults.sync.pageSize),
          preserveTimestamps: z.boolean().default(defaults.sync.preserveTimestamps),
          exclude: z.array(z.string()).default(defaults.sync.exclude),
        })
        .default({}),
      history: z
        .object({
          enabled: z.boolean().default(defaults.history.enabled),
          path: z.string().min(1).default(defaults.history.path),
        })
        .default({}),
    })
    .transform((config) => ({
      ...config,
      credentials: { cachePath: expandHome(config.credentials.cachePath) },
      history: { ...config.history, path: expandHome(config.history.path) },
    }));
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse TOML text into a validated config. Missing keys take their
 * defaults; unknown keys are ignored.
 */
export function parseConfig(raw: string, source = 'config'): FilesSyncConfig {
  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    throw new Error(`Invalid TOML in ${source}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = configSchema(getDefaultConfig()).safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid configuration in ${source}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Load the config file. Only a missing default file falls back to the
 * defaults; a path given explicitly must be readable.
 */
export async function loadConfig(configPath?: string): Promise<FilesSyncConfig> {
  const path = configPath ?? getConfigPath();
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    if (configPath === undefined && errnoCode(err) === 'ENOENT') {
      return getDefaultConfig();
    }
    throw new Error(`Cannot read configuration ${path}: ${errorMessage(err)}`, { cause: err });
  }

  return parseConfig(raw, path);
}

const credentialsCacheSchema = z
  .object({
    access_token: z.string().min(1),
    baseurl: z.string().url(),
  })
  .passthrough();

/**
 * Read the session left behind by the credentials tooling. Values set in
 * the [server] table take precedence over the cache.
 */
export async function loadCredentials(config: FilesSyncConfig): Promise<Credentials> {
  const { baseUrl, token } = config.server;
  if (baseUrl && token) {
    return { accessToken: token, baseUrl };
  }

  const cachePath = config.credentials.cachePath;
  let raw: string;
  try {
    raw = await readFile(cachePath, 'utf-8');
  } catch {
    throw new Error(`No credentials cache at ${cachePath}. Log in with your Agave tooling first.`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new Error(`Credentials cache ${cachePath} is not valid JSON`);
  }

  const result = credentialsCacheSchema.safeParse(json);
  if (!result.success) {
    throw new Error(`Credentials cache ${cachePath} is incomplete: ${describeIssues(result.error)}`);
  }

  return {
    accessToken: token ?? result.data.access_token,
    baseUrl: baseUrl ?? result.data.baseurl,
  };
}
