/**
 * Region Resolver
 *
 * Answers which regions a service is offered in, from the region data, and
 * can check that belief against live endpoint DNS.
 */

import { lookup } from 'dns/promises';
import { getServiceModel, type ServiceModel, type ServiceModels } from '../providers/aws/services';
import { WorkerPool } from '../query/worker-pool';
import type { RegionData } from './metadata';

/**
 * Resolves a hostname, reporting whether it exists. Rejects when the
 * answer is unknown (resolver down, timeout).
 */
export type HostProbe = (hostname: string) => Promise<boolean>;

// Resolver answers that mean the name does not exist
const MISSING_HOST_CODES = new Set(['ENOTFOUND', 'ENODATA']);

export function createDnsProbe(resolve: (hostname: string) => Promise<unknown> = (hostname) => lookup(hostname)): HostProbe {
  return async (hostname) => {
    try {
      await resolve(hostname);
      return true;
    } catch (error) {
      const code: unknown = error && typeof error === 'object' ? Reflect.get(error, 'code') : undefined;
      if (typeof code === 'string' && MISSING_HOST_CODES.has(code)) {
        return false;
      }
      throw error;
    }
  };
}

export const dnsProbe: HostProbe = createDnsProbe();

/**
 * Endpoint hostname of a service; global services have no region segment
 */
export function endpointHost(model: ServiceModel, region?: string): string {
  return region ? `${model.endpointPrefix}.${region}.amazonaws.com` : `${model.endpointPrefix}.amazonaws.com`;
}

export class RegionResolver {
  constructor(
    private data: RegionData,
    private models: ServiceModels
  ) {}

  get defaultRegion(): string {
    return this.data.defaultRegion;
  }

  get partitionRegions(): string[] {
    return [...this.data.partitionRegions];
  }

  /**
   * Regions a service can be queried in. Global services, and services the
   * region data has no entry for, are queried once in the default region.
   * An empty entry means the service is offered nowhere.
   */
  regionsFor(service: string): string[] {
    const model = getServiceModel(this.models, service);
    if (model.global || !Object.hasOwn(this.data.services, service)) {
      return [this.data.defaultRegion];
    }
    return [...this.data.services[service]];
  }
}

/**
 * Probe which of the candidate regions have a resolvable endpoint, per
 * service. Global services are probed once, against their global host.
 */
export async function probeServiceRegions(
  models: ServiceModels,
  services: string[],
  candidateRegions: string[],
  defaultRegion: string,
  options: { probe?: HostProbe; concurrency?: number } = {}
): Promise<Record<string, string[]>> {
  const probe = options.probe ?? dnsProbe;
  const checks: Array<{ service: string; region: string; host: string }> = [];

  for (const service of services) {
    const model = getServiceModel(models, service);
    if (model.global) {
      checks.push({ service, region: defaultRegion, host: endpointHost(model) });
      continue;
    }
    for (const region of candidateRegions) {
      checks.push({ service, region, host: endpointHost(model, region) });
    }
  }

  const pool = new WorkerPool({ concurrency: options.concurrency ?? 32 });
  const { results } = await pool.run(checks, async (check) => ({ ...check, ok: await probe(check.host) }));

  const reachable: Record<string, string[]> = {};
  for (const service of services) {
    const found = new Set(results.filter((r) => r.service === service && r.ok).map((r) => r.region));
    // Keep candidate order rather than completion order
    const order = getServiceModel(models, service).global ? [defaultRegion] : candidateRegions;
    reachable[service] = order.filter((region) => found.has(region));
  }
  return reachable;
}

export interface RegionDiagnostic {
  service: string;
  /** Regions the region data claims */
  believed: string[];
  /** Regions whose endpoint resolves */
  reachable: string[];
  /** Believed but not reachable */
  missing: string[];
  /** Reachable but not believed */
  extra: string[];
}

/**
 * Compare believed availability against live endpoints
 */
export async function introspectRegions(
  resolver: RegionResolver,
  models: ServiceModels,
  services: string[],
  options: { probe?: HostProbe; concurrency?: number } = {}
): Promise<RegionDiagnostic[]> {
  const reachableByService = await probeServiceRegions(
    models,
    services,
    resolver.partitionRegions,
    resolver.defaultRegion,
    options
  );

  return services.map((service) => {
    const believed = resolver.regionsFor(service);
    const reachable = reachableByService[service] ?? [];
    return {
      service,
      believed,
      reachable,
      missing: believed.filter((region) => !reachable.includes(region)),
      extra: reachable.filter((region) => !believed.includes(region)),
    };
  });
}
