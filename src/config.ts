import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { ValidationError } from './errors.js';

export interface HlConfig {
  dbPath: string;
  /** Editor command; falls back to $EDITOR, $VISUAL, then nano. */
  editor?: string;
  agentName: string;
  busyTimeoutMs: number;
  busyRetries: number;
  debug: boolean;
}

type Env = Record<string, string | undefined>;

const ConfigFileSchema = z
  .object({
    dbPath: z.string().min(1).optional(),
    editor: z.string().min(1).optional(),
    agentName: z.string().regex(/^[^\s:]+$/, 'must not contain whitespace or ":"').optional(),
    busyTimeoutMs: z.number().int().min(0).max(60_000).optional(),
    busyRetries: z.number().int().min(0).max(10).optional(),
    debug: z.boolean().optional()
  })
  .strict();

export const DEFAULT_AGENT_NAME = 'claude';

export function stateDir(env: Env = process.env): string {
  const base = env.XDG_STATE_HOME || join(homedir(), '.local', 'state');
  return join(base, 'hl');
}

export function defaultDbPath(env: Env = process.env): string {
  return join(stateDir(env), 'highlights.db');
}

export function configFilePath(env: Env = process.env): string {
  if (env.HL_CONFIG) {
    return env.HL_CONFIG;
  }
  const base = env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(base, 'hl', 'config.yaml');
}

function readConfigFile(path: string): z.infer<typeof ConfigFileSchema> {
  if (!existsSync(path)) {
    return {};
  }
  const parsed: unknown = YAML.parse(readFileSync(path, 'utf8'));
  if (parsed === null || parsed === undefined) {
    return {};
  }
  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid config file ${path}: ${issues}`);
  }
  return result.data;
}

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value === '1' || value.toLowerCase() === 'true';
}

/**
 * Resolves settings from the YAML config file, with HL_* environment
 * variables taking precedence.
 */
export function loadConfig(env: Env = process.env): HlConfig {
  const file = readConfigFile(configFilePath(env));

  const config: HlConfig = {
    dbPath: env.HL_DB_PATH || file.dbPath || defaultDbPath(env),
    agentName: env.HL_AGENT_NAME || file.agentName || DEFAULT_AGENT_NAME,
    busyTimeoutMs: file.busyTimeoutMs ?? 5000,
    busyRetries: file.busyRetries ?? 3,
    debug: envFlag(env.HL_DEBUG) ?? file.debug ?? false
  };
  if (file.editor) {
    config.editor = file.editor;
  }
  return config;
}
