/**
 * Bounded Worker Pool
 *
 * Runs independent work items on a fixed number of concurrent workers that
 * pull from a shared queue. Each worker finishes its item before taking the
 * next one. Aborting stops the queue; items already running are awaited.
 */

export interface WorkerPoolConfig {
  /** Number of concurrently running workers */
  concurrency: number;
}

export interface WorkerPoolRunOptions<T, R> {
  /** Stops handing out new items once aborted */
  signal?: AbortSignal;
  /** Fired as each item completes, in completion order */
  onComplete?: (result: R, item: T) => void;
}

export interface WorkerPoolResult<T, R> {
  /** Results in completion order */
  results: R[];
  /** Items never started because the run was aborted */
  unstarted: T[];
}

const DEFAULT_CONFIG: WorkerPoolConfig = {
  concurrency: 32,
};

export class WorkerPool {
  private config: WorkerPoolConfig;
  private active = 0;

  constructor(config: Partial<WorkerPoolConfig> = {}) {
    const merged = { ...DEFAULT_CONFIG, ...config };
    if (!Number.isInteger(merged.concurrency) || merged.concurrency < 1) {
      throw new Error(`Concurrency must be a positive integer, got ${merged.concurrency}`);
    }
    this.config = merged;
  }

  /**
   * Process every item with `worker`. The worker is expected to report
   * failures in its result. A thrown error stops scheduling, and the run
   * rejects with it once every running item has finished.
   */
  async run<T, R>(
    items: readonly T[],
    worker: (item: T) => Promise<R>,
    options: WorkerPoolRunOptions<T, R> = {}
  ): Promise<WorkerPoolResult<T, R>> {
    const queue = [...items];
    const results: R[] = [];
    const { signal, onComplete } = options;
    const state: { failure?: { error: unknown } } = {};

    const drain = async (): Promise<void> => {
      while (queue.length > 0 && !signal?.aborted && !state.failure) {
        const item = queue.shift();
        if (item === undefined) break;

        this.active++;
        try {
          const result = await worker(item);
          results.push(result);
          onComplete?.(result, item);
        } catch (error) {
          // First failure wins; the other workers finish their current item
          state.failure ??= { error };
        } finally {
          this.active--;
        }
      }
    };

    const workerCount = Math.min(this.config.concurrency, queue.length);
    await Promise.all(Array.from({ length: workerCount }, () => drain()));

    if (state.failure) {
      throw state.failure.error;
    }
    return { results, unstarted: queue };
  }

  /**
   * Number of items currently being processed
   */
  getActiveCount(): number {
    return this.active;
  }

  getConfig(): WorkerPoolConfig {
    return { ...this.config };
  }
}

/**
 * Create a worker pool instance
 */
export function createWorkerPool(config?: Partial<WorkerPoolConfig>): WorkerPool {
  return new WorkerPool(config);
}
