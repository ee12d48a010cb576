/**
 * AWS Service Definitions
 *
 * Declarative models for the AWS services that can be swept. Each service
 * names its SDK package and client class (loaded dynamically by the client
 * cache) and lists its API operations with their required input members.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { PACKAGED_DATA_DIR } from '../../utils/paths';

const PaginationSchema = z.object({
  // Request member that carries the continuation token
  inputToken: z.string(),
  // Response member the next token is read from
  outputToken: z.string(),
});

const OperationModelSchema = z.object({
  name: z.string().min(1),
  required: z.array(z.string()).default([]),
  pagination: PaginationSchema.optional(),
});

const ServiceModelSchema = z.object({
  sdkPackage: z.string().min(1),
  clientClass: z.string().min(1),
  endpointPrefix: z.string().min(1),
  // Global services have a single endpoint and no regional partition
  global: z.boolean().default(false),
  operations: z.array(OperationModelSchema),
});

export const ServiceModelsSchema = z.record(z.string(), ServiceModelSchema);

export type OperationPagination = z.infer<typeof PaginationSchema>;
export type OperationModel = z.infer<typeof OperationModelSchema>;
export type ServiceModel = z.infer<typeof ServiceModelSchema>;
export type ServiceModels = z.infer<typeof ServiceModelsSchema>;

export const SERVICE_MODELS_FILE = 'service-models.json';

/**
 * Load and validate service models, by default from the packaged data
 */
export async function loadServiceModels(path = join(PACKAGED_DATA_DIR, SERVICE_MODELS_FILE)): Promise<ServiceModels> {
  const content = await readFile(path, 'utf-8');
  return ServiceModelsSchema.parse(JSON.parse(content));
}

/**
 * Sorted short names of all modelled services
 */
export function getServices(models: ServiceModels): string[] {
  return Object.keys(models).sort();
}

/**
 * Look up a service model, failing loudly for unknown names
 */
export function getServiceModel(models: ServiceModels, service: string): ServiceModel {
  const model = Object.hasOwn(models, service) ? models[service] : undefined;
  if (!model) {
    throw new Error(`Unknown service: ${service}`);
  }
  return model;
}

/**
 * Find an operation on a service
 */
export function getOperationModel(
  models: ServiceModels,
  service: string,
  operation: string
): OperationModel | undefined {
  return getServiceModel(models, service).operations.find((op) => op.name === operation);
}
