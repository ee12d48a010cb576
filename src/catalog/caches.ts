/**
 * Region cache maintenance
 *
 * AWS keeps adding regions and services. `recreate-caches` re-derives the
 * region data by checking which endpoints resolve, and writes it either to
 * the user cache or back into the packaged data.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { getServices, type ServiceModels } from '../providers/aws/services';
import { PACKAGED_DATA_DIR } from '../utils/paths';
import { REGIONS_FILE, type RegionData } from './metadata';
import { probeServiceRegions, type HostProbe } from './regions';

export interface RecreateCachesOptions {
  /** Cache directory to write to */
  cacheDirectory: string;
  /** Write into the packaged data instead of the cache */
  updatePackagedValues?: boolean;
  probe?: HostProbe;
  concurrency?: number;
}

export interface RecreateCachesResult {
  path: string;
  data: RegionData;
}

export function regionCacheTarget(options: Pick<RecreateCachesOptions, 'cacheDirectory' | 'updatePackagedValues'>): string {
  return options.updatePackagedValues
    ? join(PACKAGED_DATA_DIR, REGIONS_FILE)
    : join(options.cacheDirectory, REGIONS_FILE);
}

/**
 * Rebuild the service → regions map and persist it. A failing probe rejects
 * before anything is written.
 */
export async function recreateCaches(
  models: ServiceModels,
  current: RegionData,
  options: RecreateCachesOptions
): Promise<RecreateCachesResult> {
  const services = getServices(models);
  const reachable = await probeServiceRegions(
    models,
    services,
    current.partitionRegions,
    current.defaultRegion,
    { probe: options.probe, concurrency: options.concurrency }
  );

  // Nothing resolving at all means the resolver, not AWS, is the problem
  if (Object.values(reachable).every((regions) => regions.length === 0)) {
    throw new Error('No service endpoint resolved; keeping the existing region data. Check DNS and network access.');
  }

  const regional: Record<string, string[]> = {};
  for (const service of services) {
    // Global services fall back to the default region on their own
    if (!models[service]?.global) {
      regional[service] = reachable[service] ?? [];
    }
  }

  const data: RegionData = {
    defaultRegion: current.defaultRegion,
    partitionRegions: [...current.partitionRegions],
    services: regional,
  };

  const path = regionCacheTarget(options);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(data, null, 2) + '\n');

  return { path, data };
}
