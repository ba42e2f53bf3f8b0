/**
 * ignorepick generate - Pick templates and write a .gitignore
 */

import fs from 'node:fs';
import { getDefaultConfigPath, loadConfig, saveConfig } from '../config/loader.js';
import {
  applySelection,
  buildOptionsList,
  buildPreviousSelection,
  validateConfig,
} from '../config/selection.js';
import { listTemplateNames, readTemplateIndex, type TemplateIndex } from '../templates/index-file.js';
import { ensureOutputDirectory, generateGitignoreContent } from '../templates/gitignore.js';
import { selectItems, type MultiSelectOptions, type SelectionOutcome } from '../tui/multi-select.js';
import { isThemeKind, resolveTheme, type ThemeKind } from '../tui/theme.js';
import { validateOutputPath } from '../validation/paths.js';
import { CliUsageError, IndexNotFoundError } from './errors.js';
import { assertNoExtraArgs, extractFlags, pickFlag } from './flag-utils.js';
import type { GlobalOptions } from './global-options.js';
import { printSuccess } from './terminal.js';
import { runUpdate } from './update-command.js';

export const DEFAULT_OUTPUT = '.gitignore';

export interface GenerateOptions {
  output: string;
  configPath: string;
  theme: ThemeKind | null;
}

export interface GenerateDeps {
  select: (options: MultiSelectOptions) => Promise<SelectionOutcome>;
  loadIndex: (globals: GlobalOptions) => Promise<TemplateIndex>;
}

export type GenerateResult =
  | { kind: 'written'; output: string; selected: string[] }
  | { kind: 'cancelled' }
  | { kind: 'empty' };

export function printGenerateHelp(): void {
  console.log(`Usage: ignorepick [generate] [options]

Open the template picker and write the chosen templates to a .gitignore.
The choice is saved in ignorepick.json and pre-selected next time.

Options:
  --output, -o <path>        Output file (default: .gitignore)
  --config <path>            Config file (default: ./ignorepick.json)
  --theme <light|dark>       Picker colours (default: detected from COLORFGBG)
  -h, --help                 Show help
`);
}

export function parseGenerateFlags(args: string[]): GenerateOptions {
  const flags = extractFlags(args, ['--output', '-o', '--config', '--theme']);
  assertNoExtraArgs(args, 'generate');

  const rawTheme = flags['--theme'];
  let theme: ThemeKind | null = null;
  if (rawTheme !== undefined) {
    if (!isThemeKind(rawTheme)) {
      throw new CliUsageError(`Invalid theme '${rawTheme}'. Expected 'light' or 'dark'.`);
    }
    theme = rawTheme;
  }

  return {
    output: pickFlag(flags, ['--output', '-o']) ?? DEFAULT_OUTPUT,
    configPath: flags['--config'] ?? getDefaultConfigPath(),
    theme,
  };
}

/** Reads the cached index, downloading the templates first when there is none yet. */
export async function loadIndexOrUpdate(globals: GlobalOptions): Promise<TemplateIndex> {
  try {
    return readTemplateIndex(globals.cacheDir);
  } catch (error) {
    if (!(error instanceof IndexNotFoundError)) throw error;
    console.log('No template cache found. Downloading templates for the first time...');
    return runUpdate(globals);
  }
}

const defaultDeps: GenerateDeps = {
  select: selectItems,
  loadIndex: loadIndexOrUpdate,
};

export async function runGenerate(
  options: GenerateOptions,
  globals: GlobalOptions,
  deps: GenerateDeps = defaultDeps
): Promise<GenerateResult> {
  validateOutputPath(options.output);

  const index = await deps.loadIndex(globals);
  const official = listTemplateNames(index);
  if (official.length === 0) {
    console.log('No templates available. Run `ignorepick update` first.');
    return { kind: 'empty' };
  }

  const config = loadConfig(options.configPath);
  validateConfig(official, config);

  const outcome = await deps.select({
    items: buildOptionsList(official, config),
    previousSelection: buildPreviousSelection(official, config),
    theme: resolveTheme({ override: options.theme }),
  });

  if (outcome.kind === 'cancelled') {
    console.log('Selection cancelled. Nothing written.');
    return { kind: 'cancelled' };
  }
  if (outcome.selected.length === 0) {
    console.log('No templates selected.');
    return { kind: 'empty' };
  }

  saveConfig(options.configPath, applySelection(config, outcome.selected));

  ensureOutputDirectory(options.output);
  fs.writeFileSync(options.output, generateGitignoreContent(outcome.selected, index, config), 'utf-8');
  printSuccess(`Generated ${options.output}`);
  return { kind: 'written', output: options.output, selected: outcome.selected };
}

export async function handleGenerateCommand(args: string[], globals: GlobalOptions): Promise<void> {
  await runGenerate(parseGenerateFlags(args), globals);
}
