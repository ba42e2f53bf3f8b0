/**
 * ignorepick list - Print cached template names in columns
 */

import { listTemplateNames, readTemplateIndex } from '../templates/index-file.js';
import { assertNoExtraArgs } from './flag-utils.js';
import type { GlobalOptions } from './global-options.js';
import { calculateColumnLayout, formatColumnarList, writeLines } from './list-formatters.js';

export function printListHelp(): void {
  console.log(`Usage: ignorepick list

List the template names in the local cache.

Options:
  -h, --help           Show help
`);
}

export function handleListCommand(args: string[], globals: GlobalOptions): void {
  assertNoExtraArgs(args, 'list');
  const names = listTemplateNames(readTemplateIndex(globals.cacheDir));
  if (names.length === 0) {
    console.log('No templates found. Run `ignorepick update` first.');
    return;
  }

  const stdout = process.stdout;
  const layout = calculateColumnLayout(names, stdout.isTTY ? stdout.columns : undefined);
  const color = Boolean(stdout.isTTY) && !process.env.NO_COLOR;
  writeLines(formatColumnarList(names, layout, { color }), stdout);
}
