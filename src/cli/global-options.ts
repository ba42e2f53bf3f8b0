import { getDefaultCacheDir } from '../config/loader.js';
import { extractFlags, pickFlag } from './flag-utils.js';

export interface GlobalOptions {
  cacheDir: string;
  version: string;
}

const CACHE_DIR_FLAGS = ['--cache-dir', '-c'] as const;

/** Removes global flags from `args` wherever they appear. */
export function parseGlobalOptions(args: string[], version: string): GlobalOptions {
  const flags = extractFlags(args, CACHE_DIR_FLAGS);
  return {
    cacheDir: pickFlag(flags, CACHE_DIR_FLAGS) ?? getDefaultCacheDir(),
    version,
  };
}
