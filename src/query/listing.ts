/**
 * Listing files
 *
 * Folds classified jobs into the persisted result group
 * (class → region → service → operations), writes it as JSON, and reads
 * saved listings back for `show`.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { LISTING_FILENAME } from '../utils/paths';
import { RESULT_CLASSES, type ResultClass } from './types';

export interface ListingEntry {
  operation: string;
  result_types: string[];
}

export type RegionListing = Record<string, Record<string, ListingEntry[]>>;

export type ResultGroup = Record<ResultClass, RegionListing>;

/**
 * One classified job, as handed to the aggregator
 */
export interface ClassifiedRecord {
  service: string;
  region: string;
  operation: string;
  resultClass: ResultClass;
  payload: string[];
  elapsedMs?: number;
}

export type ResultCounts = Record<ResultClass, number>;

export const RESULT_MARKERS: Record<ResultClass, string> = {
  NOTHING: '---',
  SOMETHING: '+++',
  NO_ACCESS: '>:|',
  ERROR: '!!!',
};

const ListingEntrySchema = z.object({
  operation: z.string(),
  result_types: z.array(z.string()),
});

const RegionListingSchema = z.record(z.string(), z.record(z.string(), z.array(ListingEntrySchema)));

export const ResultGroupSchema = z.object({
  NOTHING: RegionListingSchema,
  SOMETHING: RegionListingSchema,
  NO_ACCESS: RegionListingSchema,
  ERROR: RegionListingSchema,
});

export function emptyResultGroup(): ResultGroup {
  return { NOTHING: {}, SOMETHING: {}, NO_ACCESS: {}, ERROR: {} };
}

export function emptyCounts(): ResultCounts {
  return { NOTHING: 0, SOMETHING: 0, NO_ACCESS: 0, ERROR: 0 };
}

/**
 * Fold records into a result group, keeping arrival order per service
 */
export function aggregate(records: Iterable<ClassifiedRecord>): ResultGroup {
  const group = emptyResultGroup();

  for (const record of records) {
    const byRegion = group[record.resultClass];
    const byService = (byRegion[record.region] ??= {});
    const entries = (byService[record.service] ??= []);
    entries.push({ operation: record.operation, result_types: [...record.payload] });
  }

  return group;
}

export function countRecords(records: Iterable<ClassifiedRecord>): ResultCounts {
  const counts = emptyCounts();
  for (const record of records) {
    counts[record.resultClass]++;
  }
  return counts;
}

export function countResults(group: ResultGroup): ResultCounts {
  const counts = emptyCounts();
  for (const resultClass of RESULT_CLASSES) {
    for (const services of Object.values(group[resultClass])) {
      for (const entries of Object.values(services)) {
        counts[resultClass] += entries.length;
      }
    }
  }
  return counts;
}

/**
 * Write the result group to `<directory>/cloudsweep.json`, replacing any
 * previous listing
 */
export async function writeResultGroup(group: ResultGroup, directory: string): Promise<string> {
  await mkdir(directory, { recursive: true });
  const path = join(directory, LISTING_FILENAME);
  await writeFile(path, JSON.stringify(group, null, 2) + '\n');
  return path;
}

export type ListingFileSummary =
  | { path: string; ok: true; counts: ResultCounts; group: ResultGroup }
  | { path: string; ok: false; error: string };

function describeLoadError(error: unknown): string {
  if (error instanceof z.ZodError) {
    const issues = error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return `Not a listing file (${issues.join('; ')})`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read one saved listing
 */
export async function loadListingFile(path: string): Promise<ListingFileSummary> {
  try {
    const content = await readFile(path, 'utf-8');
    const group = ResultGroupSchema.parse(JSON.parse(content));
    return { path, ok: true, counts: countResults(group), group };
  } catch (error) {
    return { path, ok: false, error: describeLoadError(error) };
  }
}

/**
 * Read saved listings independently; a bad file only fails itself
 */
export function loadListingFiles(paths: string[]): Promise<ListingFileSummary[]> {
  return Promise.all(paths.map((path) => loadListingFile(path)));
}

export interface FlatListingEntry {
  resultClass: ResultClass;
  region: string;
  service: string;
  operation: string;
  resultTypes: string[];
}

/**
 * Flatten a result group to one entry per operation
 */
export function flattenResultGroup(group: ResultGroup, classes: readonly ResultClass[] = RESULT_CLASSES): FlatListingEntry[] {
  const flat: FlatListingEntry[] = [];
  for (const resultClass of classes) {
    for (const [region, services] of Object.entries(group[resultClass])) {
      for (const [service, entries] of Object.entries(services)) {
        for (const entry of entries) {
          flat.push({ resultClass, region, service, operation: entry.operation, resultTypes: entry.result_types });
        }
      }
    }
  }
  return flat;
}

export function formatListingLine(entry: FlatListingEntry): string {
  const parts = [RESULT_MARKERS[entry.resultClass], entry.region, entry.service, entry.operation];
  if (entry.resultTypes.length > 0) {
    parts.push(entry.resultTypes.join(', '));
  }
  return parts.join(' ');
}

const SUMMARY_CLASSES: readonly ResultClass[] = ['SOMETHING', 'NO_ACCESS', 'ERROR'];

/**
 * Console summary after a query: everything but NOTHING, grouped by class
 * and sorted within each class
 */
export function formatSummaryLines(group: ResultGroup): string[] {
  return SUMMARY_CLASSES.flatMap((resultClass) =>
    flattenResultGroup(group, [resultClass]).map(formatListingLine).sort()
  );
}

/**
 * Full per-operation detail of a listing, all classes
 */
export function formatListingDetail(group: ResultGroup): string[] {
  const lines: string[] = [];
  for (const resultClass of RESULT_CLASSES) {
    const entries = flattenResultGroup(group, [resultClass]).map(formatListingLine).sort();
    lines.push(`${resultClass} (${entries.length})`);
    lines.push(...entries.map((line) => `  ${line}`));
  }
  return lines;
}
