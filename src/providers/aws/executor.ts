/**
 * Dynamic AWS Operation Executor
 *
 * Invokes listing operations by name through cached SDK clients, draining
 * pagination and retrying throttled pages before handing back a tagged
 * outcome.
 */

import type {
  InvocationOutcome,
  OperationCall,
  OperationExecutor,
  ResponsePayload,
} from '../../query/types';
import type { ClientCache } from './client';
import { describeAwsError } from './errors';
import { createAWSRetryRunner, type AWSRetryRunner, type RetryConfig, type RetryInfo } from './retry';
import { getOperationModel, type ServiceModels } from './services';

export interface AwsExecutorOptions {
  /** Upper bound on pages fetched for a single operation */
  maxPages?: number;
  retry?: RetryConfig;
  onRetry?: (call: OperationCall, info: RetryInfo) => void;
}

const DEFAULT_MAX_PAGES = 100;

function isRecord(value: unknown): value is ResponsePayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readToken(response: ResponsePayload, field: string): string | undefined {
  const token = response[field];
  return typeof token === 'string' && token.length > 0 ? token : undefined;
}

/**
 * Combine paginated responses: list fields are concatenated, anything else
 * keeps the value from the last page that carried it
 */
export function mergePages(pages: ResponsePayload[]): ResponsePayload {
  const merged: ResponsePayload = {};

  for (const page of pages) {
    for (const [key, value] of Object.entries(page)) {
      if (value === undefined) continue;
      const previous = merged[key];
      if (Array.isArray(previous) && Array.isArray(value)) {
        merged[key] = [...previous, ...value];
      } else {
        merged[key] = value;
      }
    }
  }

  return merged;
}

/**
 * Executes operations against AWS using SDK v3 clients
 */
export class AwsOperationExecutor implements OperationExecutor {
  private maxPages: number;
  private retryConfig: RetryConfig;
  private onRetry?: AwsExecutorOptions['onRetry'];

  constructor(
    private models: ServiceModels,
    private clients: ClientCache,
    options: AwsExecutorOptions = {}
  ) {
    this.maxPages = Math.max(1, options.maxPages ?? DEFAULT_MAX_PAGES);
    this.retryConfig = options.retry ?? {};
    this.onRetry = options.onRetry;
  }

  async execute(call: OperationCall): Promise<InvocationOutcome> {
    const retry = this.createRetry(call);

    try {
      const client = await this.clients.get(call);
      const pagination = getOperationModel(this.models, call.service, call.operation)?.pagination;
      const label = `${call.service}.${call.operation}@${call.region}`;

      const pages: ResponsePayload[] = [];
      const seenTokens = new Set<string>();
      let nextToken: string | undefined;

      do {
        const params: Record<string, unknown> = { ...call.params };
        if (pagination && nextToken) {
          params[pagination.inputToken] = nextToken;
        }

        const command = await this.clients.createCommand(call.service, call.operation, params);
        const response = await retry(() => client.send(command), label);
        if (!isRecord(response)) {
          throw new Error(`Unexpected response shape from ${label}`);
        }
        pages.push(response);

        nextToken = pagination ? readToken(response, pagination.outputToken) : undefined;
        // Some services echo the last token back instead of omitting it
        if (nextToken && seenTokens.has(nextToken)) break;
        if (nextToken) seenTokens.add(nextToken);
      } while (nextToken && pages.length < this.maxPages);

      return { ok: true, response: mergePages(pages), pages: pages.length };
    } catch (error) {
      return { ok: false, error: describeAwsError(error) };
    }
  }

  /**
   * Release every client built during the run
   */
  async close(): Promise<void> {
    await this.clients.destroy();
  }

  private createRetry(call: OperationCall): AWSRetryRunner {
    const onRetry = this.onRetry;
    return createAWSRetryRunner(this.retryConfig, onRetry ? (info) => onRetry(call, info) : undefined);
  }
}
