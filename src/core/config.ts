import { z } from 'zod';
import { ConfigError } from './errors.js';

/**
 * Environment-driven configuration, validated once and cached.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

const configSchema = z.object({
  XBRL_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  XBRL_CONCEPT_MAPPINGS: z.string().min(1).optional(),
  XBRL_DOCUMENT_CACHE_SIZE: z.coerce.number().int().positive().default(100),
});

export interface AppConfig {
  logLevel: LogLevel;
  conceptMappingsPath: string | null;
  documentCacheSize: number;
}

let cached: AppConfig | null = null;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse({
    XBRL_LOG_LEVEL: env.XBRL_LOG_LEVEL || undefined,
    XBRL_CONCEPT_MAPPINGS: env.XBRL_CONCEPT_MAPPINGS || undefined,
    XBRL_DOCUMENT_CACHE_SIZE: env.XBRL_DOCUMENT_CACHE_SIZE || undefined,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(issue.message, String(issue.path[0] ?? 'env'));
  }

  return {
    logLevel: parsed.data.XBRL_LOG_LEVEL,
    conceptMappingsPath: parsed.data.XBRL_CONCEPT_MAPPINGS ?? null,
    documentCacheSize: parsed.data.XBRL_DOCUMENT_CACHE_SIZE,
  };
}

export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig();
  return cached;
}

/** Drop the cached config so the next read sees the current environment */
export function resetConfig(): void {
  cached = null;
}
