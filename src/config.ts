/**
 * Server configuration module.
 *
 * Loads config from config/config.{LOGSEQ_MCP_CONFIG}.json and layers
 * environment variables on top:
 *   LOGSEQ_API_URL    - Logseq HTTP API server (default http://localhost:12315)
 *   LOGSEQ_API_TOKEN  - API token configured in Logseq (required)
 *   LOGSEQ_TIMEOUT_MS - per-request timeout
 *   PORT              - port for the JSON-RPC endpoint
 */

import fs from 'fs-extra';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import * as z from 'zod';
import { ConfigError } from './errors.js';

const DEFAULT_CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', 'config');
const DEFAULT_API_URL = 'http://localhost:12315';
const DEFAULT_PORT = 4000;
const DEFAULT_TIMEOUT_MS = 6000;

const FileConfigSchema = z.object({
  apiUrl: z.string().url().optional(),
  port: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive().optional()
});

export type FileConfig = z.infer<typeof FileConfigSchema>;

export interface AppConfig {
  apiUrl: string;
  apiToken: string;
  port: number;
  timeoutMs: number;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configDir?: string;
}

let cachedConfig: AppConfig | null = null;

/**
 * Read the optional config file for the selected environment.
 */
export async function readConfigFile(configName: string, configDir: string = DEFAULT_CONFIG_DIR): Promise<FileConfig> {
  const configFileName = `config.${configName}.json`;
  const configPath = path.join(configDir, configFileName);

  if (!await fs.pathExists(configPath)) {
    console.warn(`[Config] ${configFileName} not found, using defaults`);
    return {};
  }

  const raw: unknown = await fs.readJson(configPath);
  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid ${configFileName}: ${detail}`);
  }

  console.log(`[Config] Loaded config from ${configFileName}`);
  return parsed.data;
}

function readNumber(name: string, value: string | number): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got '${value}'`);
  }
  return n;
}

/**
 * Combine file settings with environment overrides.
 */
export function resolveConfig(fileConfig: FileConfig, env: NodeJS.ProcessEnv): AppConfig {
  const apiToken = env.LOGSEQ_API_TOKEN?.trim();
  if (!apiToken) {
    throw new ConfigError('LOGSEQ_API_TOKEN environment variable required');
  }

  const apiUrl = (env.LOGSEQ_API_URL?.trim() || fileConfig.apiUrl || DEFAULT_API_URL).replace(/\/+$/, '');

  return {
    apiUrl,
    apiToken,
    port: readNumber('PORT', env.PORT ?? fileConfig.port ?? DEFAULT_PORT),
    timeoutMs: readNumber('LOGSEQ_TIMEOUT_MS', env.LOGSEQ_TIMEOUT_MS ?? fileConfig.timeoutMs ?? DEFAULT_TIMEOUT_MS)
  };
}

/**
 * Load configuration. Safe to call multiple times.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const env = options.env ?? process.env;
  const configName = env.LOGSEQ_MCP_CONFIG ?? 'dev';
  const fileConfig = await readConfigFile(configName, options.configDir);

  cachedConfig = resolveConfig(fileConfig, env);
  console.log(`[Config] Using API URL: ${cachedConfig.apiUrl}`);
  return cachedConfig;
}
