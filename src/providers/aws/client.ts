/**
 * AWS Client Cache
 *
 * Constructs SDK v3 clients on demand by dynamically importing the
 * service's package, and shares one client per (service, region, profile)
 * for the lifetime of a run.
 */

import { fromIni } from '@aws-sdk/credential-providers';
import { getServiceModel, type ServiceModels } from './services';

/**
 * The slice of an SDK v3 client the sweep relies on
 */
export interface SdkClient {
  send(command: unknown): Promise<unknown>;
  destroy?(): void;
}

export type ModuleLoader = (packageName: string) => Promise<unknown>;

type Constructor = new (input: Record<string, unknown>) => unknown;

export interface ClientKey {
  service: string;
  region: string;
  profile?: string;
}

// Cache for dynamically imported modules
const moduleCache = new Map<string, unknown>();

/**
 * Dynamically import an AWS SDK module
 */
export async function importModule(packageName: string): Promise<unknown> {
  if (moduleCache.has(packageName)) {
    return moduleCache.get(packageName);
  }

  try {
    const module: unknown = await import(packageName);
    moduleCache.set(packageName, module);
    return module;
  } catch {
    throw new Error(`Failed to import ${packageName}. Run: npm install ${packageName}`);
  }
}

function isConstructor(value: unknown): value is Constructor {
  return typeof value === 'function';
}

function isSdkClient(value: unknown): value is SdkClient {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, 'send') === 'function';
}

function readExport(module: unknown, name: string): unknown {
  if ((typeof module !== 'object' && typeof module !== 'function') || module === null) {
    return undefined;
  }
  return Reflect.get(module, name);
}

export function clientCacheKey({ service, region, profile }: ClientKey): string {
  return `${service}|${region}|${profile ?? 'default'}`;
}

/**
 * Read-through cache of SDK clients, scoped to one run
 *
 * The first caller for a key publishes the pending construction; concurrent
 * callers await the same promise instead of building their own client.
 */
export class ClientCache {
  private clients = new Map<string, Promise<SdkClient>>();

  constructor(
    private models: ServiceModels,
    private loader: ModuleLoader = importModule
  ) {}

  /**
   * Get (or create) the client for a service/region/profile
   */
  get(key: ClientKey): Promise<SdkClient> {
    const cacheKey = clientCacheKey(key);
    const existing = this.clients.get(cacheKey);
    if (existing) {
      return existing;
    }

    // A failed construction is not cached, the next caller tries again
    const created = this.create(key).catch((error: unknown) => {
      this.clients.delete(cacheKey);
      throw error;
    });
    this.clients.set(cacheKey, created);
    return created;
  }

  /**
   * Instantiate the `<Operation>Command` class for an operation
   */
  async createCommand(service: string, operation: string, params: Record<string, unknown>): Promise<unknown> {
    const model = getServiceModel(this.models, service);
    const module = await this.loader(model.sdkPackage);
    const CommandClass = readExport(module, `${operation}Command`);

    if (!isConstructor(CommandClass)) {
      throw new Error(`Could not find ${operation}Command in ${model.sdkPackage}`);
    }
    return new CommandClass(params);
  }

  get size(): number {
    return this.clients.size;
  }

  /**
   * Release the sockets held by every constructed client
   */
  async destroy(): Promise<void> {
    const settled = await Promise.allSettled(this.clients.values());
    for (const result of settled) {
      if (result.status === 'fulfilled') {
        result.value.destroy?.();
      }
    }
    this.clients.clear();
  }

  private async create({ service, region, profile }: ClientKey): Promise<SdkClient> {
    const model = getServiceModel(this.models, service);
    const module = await this.loader(model.sdkPackage);
    const ClientClass = readExport(module, model.clientClass);

    if (!isConstructor(ClientClass)) {
      throw new Error(`Could not find ${model.clientClass} in ${model.sdkPackage}`);
    }

    const client = new ClientClass({
      region,
      // Throttling is retried by the sweep's own backoff
      maxAttempts: 1,
      ...(profile ? { credentials: fromIni({ profile }) } : {}),
    });

    if (!isSdkClient(client)) {
      throw new Error(`${model.clientClass} from ${model.sdkPackage} is not an SDK client`);
    }
    return client;
  }
}
