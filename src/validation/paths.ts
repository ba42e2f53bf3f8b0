import fs from 'node:fs';
import path from 'node:path';
import { ValidationError } from '../cli/errors.js';

export const MAX_TEMPLATE_KEY_LENGTH = 255;

const PROTECTED_DIRECTORIES = [
  '/etc/',
  '/sys/',
  '/proc/',
  '/dev/',
  '/boot/',
  '/bin/',
  '/sbin/',
  '/usr/bin/',
  '/usr/sbin/',
];

/** Template keys become cache file names, so they may not climb out of the cache directory. */
export function validateTemplateKey(key: string): void {
  if (key === '') {
    throw new ValidationError('Template key cannot be empty');
  }
  if (key.includes('..')) {
    throw new ValidationError('Template key contains invalid sequence: ..');
  }
  if (key.startsWith('/') || key.startsWith('\\')) {
    throw new ValidationError('Template key cannot start with path separator');
  }
  if (key.includes('\\')) {
    throw new ValidationError('Template key contains invalid character: \\');
  }
  if (key.includes('\0')) {
    throw new ValidationError('Template key contains null byte');
  }
  if (key.length > MAX_TEMPLATE_KEY_LENGTH) {
    throw new ValidationError(`Template key is too long (max: ${MAX_TEMPLATE_KEY_LENGTH} characters)`);
  }
}

function canonicalize(target: string): string {
  try {
    return fs.realpathSync(target);
  } catch {
    // Output files usually do not exist yet.
    return target;
  }
}

export function validateOutputPath(outputPath: string, cwd: string = process.cwd()): void {
  const resolved = canonicalize(path.resolve(cwd, outputPath));
  const root = canonicalize(cwd);

  const relative = path.relative(root, resolved);
  const insideCwd = relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
  if (!insideCwd && outputPath.includes('..')) {
    throw new ValidationError('Output path contains suspicious pattern: ..');
  }

  for (const dir of PROTECTED_DIRECTORIES) {
    if (resolved.startsWith(dir)) {
      throw new ValidationError(`Cannot write to system directory: ${dir}`);
    }
  }
}
