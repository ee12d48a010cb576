/**
 * Filesystem locations shared by the catalog and the CLI
 */

import { homedir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';

/**
 * Directory holding the metadata files shipped with the package
 */
export const PACKAGED_DATA_DIR = fileURLToPath(new URL('../../data/', import.meta.url));

/**
 * Name of the listing file written by `query`
 */
export const LISTING_FILENAME = 'cloudsweep.json';

/**
 * OS-dependent cache directory, e.g. ~/.cache/cloudsweep
 */
export function defaultCacheDirectory(): string {
  const base = process.env.XDG_CACHE_HOME || join(homedir(), '.cache');
  return join(base, 'cloudsweep');
}
