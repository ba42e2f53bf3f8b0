import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError, IndexNotFoundError } from '../cli/errors.js';

/** Template name → path of the cached `.gitignore` body. */
export const TemplateIndexSchema = z.record(z.string(), z.string());

export type TemplateIndex = z.infer<typeof TemplateIndexSchema>;

const INDEX_FILENAME = 'index.json';

export function getIndexPath(cacheDir: string): string {
  return path.join(cacheDir, INDEX_FILENAME);
}

export function writeTemplateIndex(cacheDir: string, index: TemplateIndex): void {
  const sorted = Object.fromEntries(Object.entries(index).sort(([a], [b]) => compareNames(a, b)));
  fs.writeFileSync(getIndexPath(cacheDir), JSON.stringify(sorted, null, 2), 'utf-8');
}

export function readTemplateIndex(cacheDir: string): TemplateIndex {
  const indexPath = getIndexPath(cacheDir);
  if (!fs.existsSync(indexPath)) {
    throw new IndexNotFoundError(indexPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(indexPath, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(
        'Template index is not valid JSON. Run `ignorepick update` to rebuild it.',
        indexPath
      );
    }
    throw error;
  }

  const parsed = TemplateIndexSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      'Template index has an unexpected shape. Run `ignorepick update` to rebuild it.',
      indexPath
    );
  }
  return parsed.data;
}

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function listTemplateNames(index: TemplateIndex): string[] {
  return Object.keys(index).sort(compareNames);
}

export function readTemplateBody(index: TemplateIndex, name: string): string | null {
  if (!Object.prototype.hasOwnProperty.call(index, name)) return null;
  const cachedPath = index[name];
  return cachedPath === undefined ? null : fs.readFileSync(cachedPath, 'utf-8');
}
