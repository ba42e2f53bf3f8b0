import fs from 'node:fs';
import path from 'node:path';
import { ConfigError } from '../cli/errors.js';
import type { Config } from '../config/loader.js';
import { readTemplateBody, type TemplateIndex } from './index-file.js';

export const GENERATED_HEADER = '# Generated by ignorepick';

function resolveTemplateBody(name: string, index: TemplateIndex, config: Config): string {
  if (Object.prototype.hasOwnProperty.call(config.custom, name)) {
    return (config.custom[name] ?? []).join('\n');
  }
  const body = readTemplateBody(index, name);
  if (body === null) {
    throw new ConfigError(`Template '${name}' is neither cached nor defined in the 'custom' section.`);
  }
  return body;
}

/**
 * One `### Name ###` section per selected template, in selection order. Custom templates from
 * the config win over cached ones of the same name.
 */
export function generateGitignoreContent(
  selected: readonly string[],
  index: TemplateIndex,
  config: Config
): string {
  const sections = selected.map((name) => {
    const body = resolveTemplateBody(name, index, config).trimEnd();
    return body === '' ? `### ${name} ###` : `### ${name} ###\n${body}`;
  });
  return `${[GENERATED_HEADER, ...sections].join('\n\n')}\n`;
}

export function ensureOutputDirectory(outputPath: string): void {
  const dir = path.dirname(path.resolve(outputPath));
  fs.mkdirSync(dir, { recursive: true });
}
