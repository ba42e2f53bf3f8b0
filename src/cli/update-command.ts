/**
 * ignorepick update - Refresh the template cache
 */

import { updateCache, type FetchLike } from '../templates/fetcher.js';
import type { TemplateIndex } from '../templates/index-file.js';
import { assertNoExtraArgs } from './flag-utils.js';
import type { GlobalOptions } from './global-options.js';
import { printSuccess } from './terminal.js';

export function printUpdateHelp(): void {
  console.log(`Usage: ignorepick update

Download every template from github/gitignore into the cache directory
and rebuild the template index.

Options:
  -h, --help           Show help
`);
}

export async function runUpdate(globals: GlobalOptions, fetchImpl?: FetchLike): Promise<TemplateIndex> {
  return updateCache({
    cacheDir: globals.cacheDir,
    userAgent: `ignorepick/${globals.version}`,
    fetch: fetchImpl,
  });
}

export async function handleUpdateCommand(args: string[], globals: GlobalOptions): Promise<void> {
  assertNoExtraArgs(args, 'update');
  await runUpdate(globals);
  printSuccess('Cache updated');
}
