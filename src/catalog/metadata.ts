/**
 * Service/region metadata
 *
 * Everything the sweep knows about AWS before it makes a call: service
 * models, region availability, listing heuristics and response filters.
 * All of it is versioned data under data/; the region list can be
 * overridden by a cache written with `recreate-caches`.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { loadServiceModels, SERVICE_MODELS_FILE, type ServiceModels } from '../providers/aws/services';
import { PACKAGED_DATA_DIR } from '../utils/paths';

export const REGIONS_FILE = 'service-regions.json';
export const LISTING_RULES_FILE = 'listing-rules.json';
export const RESPONSE_FILTERS_FILE = 'response-filters.json';

export const RegionDataSchema = z.object({
  defaultRegion: z.string().default('us-east-1'),
  partitionRegions: z.array(z.string()),
  services: z.record(z.string(), z.array(z.string())),
});

export const ListingRulesSchema = z.object({
  version: z.number().int(),
  verbPrefixes: z.array(z.string()),
  // Prefixes that only count when followed by a plural noun
  pluralOnlyPrefixes: z.array(z.string()).default([]),
  // Required members that can safely be left unset
  ignoredRequired: z.array(z.string()).default([]),
  include: z.record(z.string(), z.array(z.string())).default({}),
  exclude: z.record(z.string(), z.array(z.string())).default({}),
  parameters: z.record(z.string(), z.record(z.string(), z.record(z.string(), z.unknown()))).default({}),
});

const NoiseRuleSchema = z.object({
  service: z.string(),
  operation: z.string(),
  field: z.string(),
  key: z.string(),
  equals: z.unknown().optional(),
  prefix: z.string().optional(),
});

export const ResponseFiltersSchema = z.object({
  boilerplateKeys: z.array(z.string()),
  serviceBoilerplateKeys: z.record(z.string(), z.array(z.string())).default({}),
  noise: z.array(NoiseRuleSchema).default([]),
});

export type RegionData = z.infer<typeof RegionDataSchema>;
export type ListingRules = z.infer<typeof ListingRulesSchema>;
export type NoiseRule = z.infer<typeof NoiseRuleSchema>;
export type ResponseFilters = z.infer<typeof ResponseFiltersSchema>;

export interface MetadataSource {
  models: ServiceModels;
  regions: RegionData;
  rules: ListingRules;
  filters: ResponseFilters;
  /** Where the region data was read from */
  regionsPath: string;
}

async function readJson<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const content = await readFile(path, 'utf-8');
  return schema.parse(JSON.parse(content));
}

export function loadRegionData(path: string): Promise<RegionData> {
  return readJson(path, RegionDataSchema);
}

/**
 * Pick the cached region data when present, otherwise the packaged copy
 */
export function resolveRegionsPath(cacheDirectory?: string): string {
  if (cacheDirectory) {
    const cached = join(cacheDirectory, REGIONS_FILE);
    if (existsSync(cached)) {
      return cached;
    }
  }
  return join(PACKAGED_DATA_DIR, REGIONS_FILE);
}

/**
 * Load all metadata needed for a sweep
 */
export async function loadMetadata(options: { cacheDirectory?: string; dataDirectory?: string } = {}): Promise<MetadataSource> {
  const dataDirectory = options.dataDirectory ?? PACKAGED_DATA_DIR;
  const regionsPath = options.dataDirectory
    ? join(dataDirectory, REGIONS_FILE)
    : resolveRegionsPath(options.cacheDirectory);

  const [models, regions, rules, filters] = await Promise.all([
    loadServiceModels(join(dataDirectory, SERVICE_MODELS_FILE)),
    loadRegionData(regionsPath),
    readJson(join(dataDirectory, LISTING_RULES_FILE), ListingRulesSchema),
    readJson(join(dataDirectory, RESPONSE_FILTERS_FILE), ResponseFiltersSchema),
  ]);

  return { models, regions, rules, filters, regionsPath };
}
