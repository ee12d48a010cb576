/**
 * Configuration loading and validation
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { defaultCacheDirectory } from './paths';

/**
 * Configuration schema
 */
const RetryConfigSchema = z.object({
  attempts: z.number().int().default(4),
  minDelayMs: z.number().default(250),
  maxDelayMs: z.number().default(5000),
});

const QueryConfigSchema = z.object({
  parallel: z.number().int().default(32),
  services: z.array(z.string()).default([]),
  regions: z.array(z.string()).default([]),
  operations: z.array(z.string()).default([]),
  directory: z.string().default('.'),
  profile: z.string().optional(),
  maxPages: z.number().int().default(100),
  retry: RetryConfigSchema.default({}),
});

const CacheConfigSchema = z.object({
  directory: z.string().optional(),
});

const ConfigSchema = z.object({
  query: QueryConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

/**
 * Config file locations, most specific first
 */
export function configLocations(configPath?: string): string[] {
  if (configPath) {
    return [configPath];
  }
  const home = process.env.HOME || '';
  return [
    '.cloudsweep/config.yaml',
    '.cloudsweep/config.yml',
    join(home, '.cloudsweep/config.yaml'),
    join(home, '.cloudsweep/config.yml'),
  ];
}

/**
 * Parse config file content (YAML; JSON is a subset)
 */
export function parseConfig(content: string): Config {
  const parsed: unknown = parseYaml(content);
  return resolveEnvVars(ConfigSchema.parse(parsed ?? {}));
}

/**
 * Load configuration from file
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  for (const location of configLocations(configPath)) {
    if (existsSync(location)) {
      try {
        const content = await readFile(location, 'utf-8');
        return parseConfig(content);
      } catch (error) {
        console.error(`Error loading config from ${location}:`, error instanceof Error ? error.message : error);
      }
    }
  }

  return DEFAULT_CONFIG;
}

/**
 * Resolve ${VAR} references in string values
 */
function resolveEnvValue(value: string): string {
  if (value.startsWith('${') && value.endsWith('}')) {
    return process.env[value.slice(2, -1)] || '';
  }
  return value;
}

export function resolveEnvVars(config: Config): Config {
  const { query, cache } = config;
  return {
    query: {
      ...query,
      services: query.services.map(resolveEnvValue),
      regions: query.regions.map(resolveEnvValue),
      operations: query.operations.map(resolveEnvValue),
      directory: resolveEnvValue(query.directory),
      profile: query.profile === undefined ? undefined : resolveEnvValue(query.profile) || undefined,
    },
    cache: {
      directory: cache.directory === undefined ? undefined : resolveEnvValue(cache.directory) || undefined,
    },
  };
}

/**
 * Cache directory from config, falling back to the OS default
 */
export function getCacheDirectory(config: Config): string {
  return config.cache.directory ?? defaultCacheDirectory();
}

/**
 * Validate that configured values are usable
 */
export function validateConfig(config: Config): string[] {
  const errors: string[] = [];
  const { query } = config;

  if (query.parallel < 1) {
    errors.push(`query.parallel must be at least 1 (got ${query.parallel}).`);
  }
  if (query.maxPages < 1) {
    errors.push(`query.maxPages must be at least 1 (got ${query.maxPages}).`);
  }
  if (query.retry.attempts < 1) {
    errors.push(`query.retry.attempts must be at least 1 (got ${query.retry.attempts}).`);
  }
  if (query.retry.maxDelayMs < query.retry.minDelayMs) {
    errors.push('query.retry.maxDelayMs must not be lower than query.retry.minDelayMs.');
  }

  return errors;
}
