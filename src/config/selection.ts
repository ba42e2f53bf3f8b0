import { ConfigError } from '../cli/errors.js';
import type { Config } from './loader.js';

function isCustom(config: Config, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(config.custom, name);
}

export function findInvalidTemplates(officialNames: readonly string[], config: Config): string[] {
  const official = new Set(officialNames);
  return config.templates.filter((name) => !official.has(name) && !isCustom(config, name));
}

/** Custom names that collide case-insensitively with an official template. */
export function findShadowedTemplates(
  officialNames: readonly string[],
  config: Config
): { custom: string; official: string }[] {
  const byLowercase = new Map<string, string[]>();
  for (const name of officialNames) {
    const key = name.toLowerCase();
    byLowercase.set(key, [...(byLowercase.get(key) ?? []), name]);
  }

  const shadowed: { custom: string; official: string }[] = [];
  for (const custom of Object.keys(config.custom)) {
    const matches = byLowercase.get(custom.toLowerCase());
    if (!matches || matches.length === 0) continue;
    const official = matches.find((name) => name === custom) ?? matches[0] ?? custom;
    shadowed.push({ custom, official });
  }
  return shadowed;
}

export function validateConfig(officialNames: readonly string[], config: Config): void {
  const invalid = findInvalidTemplates(officialNames, config);
  if (invalid.length > 0) {
    const lines = [
      'The following templates in ignorepick.json do not exist:',
      ...invalid.map((name) => `  - ${name}`),
      '',
      "Run `ignorepick list` to see available templates or define them in the 'custom' section.",
    ];
    throw new ConfigError(lines.join('\n'));
  }

  const shadowed = findShadowedTemplates(officialNames, config);
  if (shadowed.length > 0) {
    const lines = [
      'Custom templates conflict with official templates:',
      ...shadowed.map(({ custom, official }) =>
        custom === official ? `  - ${custom} (exact match)` : `  - ${custom} (conflicts with: ${official})`
      ),
      '',
      'Please rename your custom templates to avoid conflicts with official templates.',
    ];
    throw new ConfigError(lines.join('\n'));
  }
}

/** Custom templates first, then previously chosen official ones, then everything else. */
export function buildOptionsList(officialNames: readonly string[], config: Config): string[] {
  const official = new Set(officialNames);
  const seen = new Set<string>();
  const options: string[] = [];
  const push = (name: string): void => {
    if (seen.has(name)) return;
    seen.add(name);
    options.push(name);
  };

  for (const name of Object.keys(config.custom)) push(name);
  for (const name of config.templates) {
    if (official.has(name)) push(name);
  }
  for (const name of officialNames) push(name);
  return options;
}

/** Previously chosen official templates plus every custom template. */
export function buildPreviousSelection(officialNames: readonly string[], config: Config): string[] {
  const official = new Set(officialNames);
  return [...config.templates.filter((name) => official.has(name)), ...Object.keys(config.custom)];
}

/** Stores the official part of a selection; custom templates are always pre-selected anyway. */
export function applySelection(config: Config, selected: readonly string[]): Config {
  return {
    ...config,
    templates: selected.filter((name) => !isCustom(config, name)),
  };
}
