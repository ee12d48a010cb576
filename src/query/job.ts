/**
 * Job: one (service, region, operation) unit of work
 */

import type { Classification, JobState, ResultClass } from './types';

export interface JobResult extends Classification {
  elapsedMs: number;
}

export function jobKey(service: string, region: string, operation: string): string {
  return `${service}/${region}/${operation}`;
}

export class Job {
  readonly key: string;
  private result: JobResult | null = null;

  constructor(
    readonly service: string,
    readonly region: string,
    readonly operation: string
  ) {
    this.key = jobKey(service, region, operation);
  }

  get state(): JobState {
    return this.result?.resultClass ?? 'PENDING';
  }

  get resultClass(): ResultClass | undefined {
    return this.result?.resultClass;
  }

  get payload(): string[] {
    return this.result ? [...this.result.payload] : [];
  }

  get elapsedMs(): number | undefined {
    return this.result?.elapsedMs;
  }

  isComplete(): boolean {
    return this.result !== null;
  }

  /**
   * Attach the terminal result. A job completes exactly once.
   */
  complete(result: JobResult): void {
    if (this.result) {
      throw new Error(`Job ${this.key} already completed as ${this.result.resultClass}`);
    }
    this.result = { ...result, payload: [...result.payload] };
  }

  toString(): string {
    return `${this.region} ${this.service} ${this.operation}`;
  }
}
