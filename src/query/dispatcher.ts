/**
 * Dispatcher
 *
 * Expands service/region/operation filters into jobs, runs them on a
 * bounded worker pool and classifies every outcome. A failing job never
 * affects its siblings: the sweep is best-effort.
 */

import type { ResponseFilters } from '../catalog/metadata';
import type { OperationCatalog } from '../catalog/operations';
import type { RegionResolver } from '../catalog/regions';
import { classify } from './classifier';
import { Job } from './job';
import { aggregate, type ClassifiedRecord, type ResultGroup } from './listing';
import type { InvocationOutcome, OperationExecutor } from './types';
import { WorkerPool } from './worker-pool';

export const DEFAULT_PARALLELISM = 32;

export interface QuerySelection {
  services: string[];
  /** Empty or missing means every region the service is offered in */
  regions?: string[];
  /** Empty or missing means every listing operation */
  operations?: string[];
}

export interface DispatchOptions extends QuerySelection {
  parallelism?: number;
  profile?: string;
  /** Aborting stops scheduling; running jobs finish */
  signal?: AbortSignal;
}

/**
 * Executor for a single run. `close` releases whatever it holds (clients,
 * sockets) once the run is over.
 */
export interface RunExecutor extends OperationExecutor {
  close?(): Promise<void>;
}

export type DispatchEvent =
  | { type: 'job_start'; job: Job }
  | { type: 'job_end'; job: Job };

export interface DispatcherDeps {
  catalog: OperationCatalog;
  regions: RegionResolver;
  filters: ResponseFilters;
  /** Called once per run; the executor (and its client cache) lives for that run only */
  createExecutor: (options: { profile?: string }) => RunExecutor;
  onEvent?: (event: DispatchEvent) => void;
  now?: () => number;
}

export interface DispatchResult {
  group: ResultGroup;
  /** Classified records in completion order */
  records: ClassifiedRecord[];
  /** Jobs never started because the run was interrupted */
  pending: Job[];
  jobs: Job[];
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}

export class Dispatcher {
  private now: () => number;

  constructor(private deps: DispatcherDeps) {
    this.now = deps.now ?? Date.now;
  }

  /**
   * Cartesian product of services × their regions × their listing
   * operations, narrowed by the filters. Every job key is unique.
   */
  buildJobs(selection: QuerySelection): Job[] {
    const { catalog, regions } = this.deps;
    const regionFilter = selection.regions ?? [];
    const operationFilter = selection.operations ?? [];
    const jobs: Job[] = [];
    const seen = new Set<string>();

    for (const service of unique(selection.services)) {
      if (!catalog.hasService(service)) {
        throw new Error(`Unknown service: ${service}`);
      }

      const serviceRegions = regions
        .regionsFor(service)
        .filter((region) => regionFilter.length === 0 || regionFilter.includes(region));
      const operations = catalog
        .listingOperations(service)
        .filter((operation) => operationFilter.length === 0 || operationFilter.includes(operation));

      for (const region of serviceRegions) {
        for (const operation of operations) {
          const job = new Job(service, region, operation);
          if (!seen.has(job.key)) {
            seen.add(job.key);
            jobs.push(job);
          }
        }
      }
    }

    return jobs;
  }

  async run(options: DispatchOptions): Promise<DispatchResult> {
    const jobs = this.buildJobs(options);
    const pool = new WorkerPool({ concurrency: options.parallelism ?? DEFAULT_PARALLELISM });
    const executor = this.deps.createExecutor({ profile: options.profile });

    try {
      const { results, unstarted } = await pool.run(jobs, (job) => this.runJob(job, executor, options.profile), {
        signal: options.signal,
      });
      return { group: aggregate(results), records: results, pending: unstarted, jobs };
    } finally {
      await executor.close?.();
    }
  }

  private async runJob(job: Job, executor: OperationExecutor, profile?: string): Promise<ClassifiedRecord> {
    const { catalog, filters, onEvent } = this.deps;
    onEvent?.({ type: 'job_start', job });
    const startedAt = this.now();

    let outcome: InvocationOutcome;
    try {
      outcome = await executor.execute({
        service: job.service,
        region: job.region,
        operation: job.operation,
        params: catalog.defaultParameters(job.service, job.operation),
        profile,
      });
    } catch (error) {
      // Executors report API failures as outcomes; this is a bug in one
      outcome = {
        ok: false,
        error: {
          kind: 'unknown',
          code: error instanceof Error ? error.name : 'Error',
          message: error instanceof Error ? error.message : String(error),
        },
      };
    }

    const classification = classify(job, outcome, filters);
    const elapsedMs = this.now() - startedAt;
    job.complete({ ...classification, elapsedMs });
    onEvent?.({ type: 'job_end', job });

    return {
      service: job.service,
      region: job.region,
      operation: job.operation,
      resultClass: classification.resultClass,
      payload: classification.payload,
      elapsedMs,
    };
  }
}
