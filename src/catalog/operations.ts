/**
 * Operation Catalog
 *
 * Decides which API operations of a service are listing operations: calls
 * that enumerate inventory, are read-only, and can be made with no input.
 */

import { getServiceModel, getServices, type OperationModel, type ServiceModels } from '../providers/aws/services';
import type { ListingRules } from './metadata';

export type VerbClass = 'Get' | 'List' | 'Describe' | 'Other';

export interface OperationVerb {
  operation: string;
  verb: VerbClass;
}

const VERB_CLASSES: VerbClass[] = ['Get', 'List', 'Describe'];

/**
 * Whether `name` starts with `prefix` as a whole word (ListBuckets, not Listen)
 */
export function startsWithWord(name: string, prefix: string): boolean {
  if (!name.startsWith(prefix) || name.length === prefix.length) return false;
  const next = name.charAt(prefix.length);
  return next !== next.toLowerCase();
}

/**
 * Crude plural check on the trailing noun: Buckets yes, Access/Status no
 */
export function hasPluralNoun(name: string): boolean {
  return /[^su]s$/.test(name);
}

export function classifyVerb(operation: string): VerbClass {
  return VERB_CLASSES.find((verb) => startsWithWord(operation, verb)) ?? 'Other';
}

/**
 * Pure predicate: is this operation safe to auto-invoke as a listing?
 */
export function isListingOperation(service: string, operation: OperationModel, rules: ListingRules): boolean {
  if (rules.exclude[service]?.includes(operation.name)) return false;
  if (rules.include[service]?.includes(operation.name)) return true;

  const verb = rules.verbPrefixes.find((prefix) => startsWithWord(operation.name, prefix));
  if (!verb) return false;
  if (rules.pluralOnlyPrefixes.includes(verb) && !hasPluralNoun(operation.name)) return false;

  const required = operation.required.filter((member) => !rules.ignoredRequired.includes(member));
  return required.length === 0;
}

export class OperationCatalog {
  private listings = new Map<string, string[]>();

  constructor(
    private models: ServiceModels,
    private rules: ListingRules
  ) {}

  getServices(): string[] {
    return getServices(this.models);
  }

  hasService(service: string): boolean {
    return Object.hasOwn(this.models, service);
  }

  /**
   * Listing operations of a service, in model order; curated inclusions
   * the model does not know about come last
   */
  listingOperations(service: string): string[] {
    const cached = this.listings.get(service);
    if (cached) return [...cached];

    const model = getServiceModel(this.models, service);
    const operations = model.operations
      .filter((operation) => isListingOperation(service, operation, this.rules))
      .map((operation) => operation.name);

    const excluded = this.rules.exclude[service] ?? [];
    for (const name of this.rules.include[service] ?? []) {
      if (!operations.includes(name) && !excluded.includes(name)) {
        operations.push(name);
      }
    }

    this.listings.set(service, operations);
    return [...operations];
  }

  /**
   * Every operation of a service with its leading verb, for debugging
   */
  allVerbs(service: string): OperationVerb[] {
    return getServiceModel(this.models, service).operations.map((operation) => ({
      operation: operation.name,
      verb: classifyVerb(operation.name),
    }));
  }

  /**
   * Parameters to invoke a listing operation with
   */
  defaultParameters(service: string, operation: string): Record<string, unknown> {
    return { ...(this.rules.parameters[service]?.[operation] ?? {}) };
  }
}
