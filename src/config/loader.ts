import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../cli/errors.js';

export const MAX_CUSTOM_TEMPLATE_SIZE = 100 * 1024;
export const MAX_CUSTOM_TEMPLATE_LINES = 10_000;

export const ConfigSchema = z.object({
  templates: z.array(z.string()).default([]),
  custom: z.record(z.string(), z.array(z.string())).default({}),
});

// Early releases stored the selection as a bare array of template names.
const LegacyConfigSchema = z.array(z.string());

export type Config = z.infer<typeof ConfigSchema>;

const CONFIG_FILENAME = 'ignorepick.json';

export function getDefaultConfigPath(startDir: string = process.cwd()): string {
  return path.join(startDir, CONFIG_FILENAME);
}

export function getDefaultCacheDir(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CACHE_HOME || path.join(env.HOME ?? env.USERPROFILE ?? os.homedir(), '.cache');
  return path.join(base, 'ignorepick');
}

export function validateCustomTemplate(name: string, lines: readonly string[]): void {
  if (lines.length > MAX_CUSTOM_TEMPLATE_LINES) {
    throw new ConfigError(
      `Custom template '${name}' has too many lines: ${lines.length} (max: ${MAX_CUSTOM_TEMPLATE_LINES})`
    );
  }

  const totalSize = lines.reduce((sum, line) => sum + Buffer.byteLength(line, 'utf-8'), 0);
  if (totalSize > MAX_CUSTOM_TEMPLATE_SIZE) {
    throw new ConfigError(
      `Custom template '${name}' is too large: ${totalSize} bytes (max: ${MAX_CUSTOM_TEMPLATE_SIZE} bytes)`
    );
  }

  const nulLine = lines.findIndex((line) => line.includes('\0'));
  if (nulLine !== -1) {
    throw new ConfigError(`Custom template '${name}' contains null byte at line ${nulLine + 1}`);
  }
}

export function parseConfig(raw: unknown, configPath?: string): Config {
  const legacy = LegacyConfigSchema.safeParse(raw);
  if (legacy.success) {
    return { templates: legacy.data, custom: {} };
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at '${issue.path.join('.')}'` : '';
    throw new ConfigError(`Invalid config${where}: ${issue?.message ?? 'unknown error'}`, configPath);
  }

  for (const [name, lines] of Object.entries(parsed.data.custom)) {
    try {
      validateCustomTemplate(name, lines);
    } catch (error) {
      if (error instanceof ConfigError) throw new ConfigError(error.message, configPath);
      throw error;
    }
  }
  return parsed.data;
}

/** Missing file means an empty config. */
export function loadConfig(configPath: string = getDefaultConfigPath()): Config {
  if (!fs.existsSync(configPath)) {
    return ConfigSchema.parse({});
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(`Invalid JSON in config file: ${configPath}`);
    }
    throw error;
  }
  return parseConfig(raw, configPath);
}

export function saveConfig(configPath: string, config: Config): void {
  fs.writeFileSync(configPath, `${JSON.stringify(config, null, 2)}\n`, 'utf-8');
}
