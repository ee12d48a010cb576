/**
 * Outcome Classifier
 *
 * Turns an invocation outcome into a result class. Successful responses are
 * first stripped of keys every response carries (tokens, request metadata)
 * and of known default resources, so that an account with nothing in it
 * classifies as NOTHING rather than SOMETHING.
 */

import type { NoiseRule, ResponseFilters } from '../catalog/metadata';
import type { Classification, ErrorKind, InvocationOutcome, ResponsePayload, ResultClass } from './types';

export interface ClassifiableJob {
  service: string;
  region: string;
  operation: string;
}

const ERROR_KIND_CLASSES: Record<ErrorKind, ResultClass> = {
  access_denied: 'NO_ACCESS',
  not_subscribed: 'NO_ACCESS',
  unsupported_region: 'NO_ACCESS',
  // The thing being listed does not exist: an empty listing
  not_found: 'NOTHING',
  throttling: 'ERROR',
  validation: 'ERROR',
  transport: 'ERROR',
  unknown: 'ERROR',
};

export function resultClassForError(kind: ErrorKind): ResultClass {
  return ERROR_KIND_CLASSES[kind];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Drop keys present in every response regardless of content
 */
export function stripBoilerplate(service: string, response: ResponsePayload, filters: ResponseFilters): ResponsePayload {
  const ignored = new Set([...filters.boilerplateKeys, ...(filters.serviceBoilerplateKeys[service] ?? [])]);
  const stripped: ResponsePayload = {};

  for (const [key, value] of Object.entries(response)) {
    if (!ignored.has(key)) {
      stripped[key] = value;
    }
  }
  return stripped;
}

function matchesNoise(item: unknown, rule: NoiseRule): boolean {
  if (!isPlainObject(item)) return false;
  const value = item[rule.key];

  if (rule.prefix !== undefined) {
    return typeof value === 'string' && value.startsWith(rule.prefix);
  }
  return rule.equals !== undefined && value === rule.equals;
}

/**
 * Remove default and AWS-managed entries (default VPC, alias/aws/* ...)
 */
export function applyNoiseFilters(
  service: string,
  operation: string,
  response: ResponsePayload,
  filters: ResponseFilters
): ResponsePayload {
  const rules = filters.noise.filter((rule) => rule.service === service && rule.operation === operation);
  if (rules.length === 0) return response;

  const filtered: ResponsePayload = { ...response };
  for (const rule of rules) {
    const items = filtered[rule.field];
    if (Array.isArray(items)) {
      filtered[rule.field] = items.filter((item) => !matchesNoise(item, rule));
    }
  }
  return filtered;
}

/**
 * A field carries content when it is a non-empty list, or an object whose
 * collections carry content. An object holding only scalars (a password
 * policy, a setting) is a record and counts. Bare scalars never do.
 */
export function hasContent(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (!isPlainObject(value)) return false;

  const values = Object.values(value).filter((v) => v !== undefined);
  if (values.length === 0) return false;

  const collections = values.filter((v) => Array.isArray(v) || isPlainObject(v));
  if (collections.length === 0) return true;
  return collections.some(hasContent);
}

/**
 * Field names that carry content after stripping, in response order
 */
export function contentFields(job: ClassifiableJob, response: ResponsePayload, filters: ResponseFilters): string[] {
  const stripped = stripBoilerplate(job.service, response, filters);
  const filtered = applyNoiseFilters(job.service, job.operation, stripped, filters);
  return Object.keys(filtered).filter((key) => hasContent(filtered[key]));
}

/**
 * Classify one invocation outcome. Pure: the same outcome always yields
 * the same classification.
 */
export function classify(job: ClassifiableJob, outcome: InvocationOutcome, filters: ResponseFilters): Classification {
  if (!outcome.ok) {
    const resultClass = resultClassForError(outcome.error.kind);
    return {
      resultClass,
      payload: resultClass === 'NOTHING' ? [] : [`${outcome.error.code}: ${outcome.error.message}`],
    };
  }

  const fields = contentFields(job, outcome.response, filters);
  if (fields.length === 0) {
    return { resultClass: 'NOTHING', payload: [] };
  }
  return { resultClass: 'SOMETHING', payload: fields };
}
