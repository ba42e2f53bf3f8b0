import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { FetchError } from '../cli/errors.js';
import { validateTemplateKey } from '../validation/paths.js';
import { writeTemplateIndex, type TemplateIndex } from './index-file.js';

export const GITIGNORE_REPO_API = 'https://api.github.com/repos/github/gitignore';
export const RATE_LIMIT_URL = 'https://api.github.com/rate_limit';
export const MAX_DOWNLOAD_SIZE = 10 * 1024 * 1024;
export const DOWNLOAD_CONCURRENCY = 20;
const PROGRESS_EVERY = 10;

const RepoContentSchema = z.object({
  name: z.string(),
  path: z.string(),
  type: z.string(),
  download_url: z.string().nullable().optional(),
});

const RateLimitResponseSchema = z.object({
  resources: z.object({
    core: z.object({
      limit: z.number(),
      remaining: z.number(),
      reset: z.number(),
    }),
  }),
});

export type RateLimit = z.infer<typeof RateLimitResponseSchema>['resources']['core'];

export type FetchLike = (url: string, init?: { headers?: Record<string, string> }) => Promise<Response>;

export interface TemplateSource {
  /** Repository path without the extension, e.g. `Global/macOS`. */
  key: string;
  name: string;
  downloadUrl: string;
}

export interface UpdateReporter {
  info(line: string): void;
  warn(line: string): void;
  progress(current: number, total: number): void;
}

export const consoleReporter: UpdateReporter = {
  info: (line) => console.log(line),
  warn: (line) => console.error(line),
  progress: (current, total) => {
    process.stdout.write(`\rDownloaded ${current}/${total} templates`);
    if (current === total) process.stdout.write('\n');
  },
};

export interface UpdateOptions {
  cacheDir: string;
  fetch?: FetchLike;
  reporter?: UpdateReporter;
  userAgent?: string;
  concurrency?: number;
}

export interface GitHubClient {
  fetch: FetchLike;
  headers: Record<string, string>;
  reporter: UpdateReporter;
}

async function getJson(client: GitHubClient, url: string): Promise<unknown> {
  const res = await client.fetch(url, { headers: client.headers });
  if (!res.ok) {
    if (res.status === 403) await reportRateLimit(client);
    throw new FetchError(`GitHub API returned status ${res.status}`, url, res.status);
  }
  return res.json();
}

export function formatRateLimit(rate: RateLimit, nowSeconds: number): string[] {
  const wait = Math.max(0, rate.reset - nowSeconds);
  const minutes = Math.floor(wait / 60);
  const seconds = wait % 60;
  return [
    'Rate Limit Information:',
    `  Limit:     ${rate.limit}`,
    `  Remaining: ${rate.remaining}`,
    `  Reset:     ${rate.reset} (in ${minutes}m ${seconds}s)`,
  ];
}

async function reportRateLimit(client: GitHubClient): Promise<void> {
  try {
    const res = await client.fetch(RATE_LIMIT_URL, { headers: client.headers });
    const parsed = RateLimitResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      client.reporter.warn('Rate limit information unavailable.');
      return;
    }
    const lines = formatRateLimit(parsed.data.resources.core, Math.floor(Date.now() / 1000));
    for (const line of lines) client.reporter.warn(line);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    client.reporter.warn(`Rate limit information unavailable: ${msg}`);
  }
}

/** Walks the repository tree with an explicit worklist of directories. */
export async function collectTemplates(client: GitHubClient): Promise<TemplateSource[]> {
  const templates: TemplateSource[] = [];
  const pending: string[] = [''];

  while (pending.length > 0) {
    const dir = pending.shift() ?? '';
    const url = `${GITIGNORE_REPO_API}/contents/${dir}`;
    const parsed = z.array(RepoContentSchema).safeParse(await getJson(client, url));
    if (!parsed.success) {
      throw new FetchError('Unexpected response from GitHub contents API', url);
    }

    for (const entry of parsed.data) {
      if (entry.type === 'file' && entry.name.endsWith('.gitignore') && entry.download_url) {
        const name = entry.name.slice(0, -'.gitignore'.length);
        templates.push({
          key: dir === '' ? name : `${dir}/${name}`,
          name,
          downloadUrl: entry.download_url,
        });
      } else if (entry.type === 'dir') {
        pending.push(entry.path);
      }
    }
  }

  return templates;
}

export function getCacheFilePath(cacheDir: string, key: string): string {
  return path.join(cacheDir, `${key.replaceAll('/', '_')}.gitignore`);
}

export async function downloadTemplate(
  client: GitHubClient,
  cacheDir: string,
  source: TemplateSource
): Promise<string> {
  validateTemplateKey(source.key);
  if (!source.downloadUrl.startsWith('https://')) {
    throw new FetchError(`Download URL must use HTTPS: ${source.downloadUrl}`, source.downloadUrl);
  }

  const res = await client.fetch(source.downloadUrl, { headers: client.headers });
  if (!res.ok) {
    if (res.status === 403) await reportRateLimit(client);
    throw new FetchError(
      `Failed to download template ${source.key}: status ${res.status}`,
      source.downloadUrl,
      res.status
    );
  }

  const declared = Number(res.headers.get('content-length') ?? NaN);
  if (Number.isFinite(declared) && declared > MAX_DOWNLOAD_SIZE) {
    throw new FetchError(
      `Template ${source.key} is too large: ${declared} bytes (max: ${MAX_DOWNLOAD_SIZE} bytes)`,
      source.downloadUrl
    );
  }

  const body = await res.text();
  const size = Buffer.byteLength(body, 'utf-8');
  if (size > MAX_DOWNLOAD_SIZE) {
    throw new FetchError(
      `Template ${source.key} exceeds size limit: ${size} bytes (max: ${MAX_DOWNLOAD_SIZE} bytes)`,
      source.downloadUrl
    );
  }

  const filePath = getCacheFilePath(cacheDir, source.key);
  fs.writeFileSync(filePath, body, 'utf-8');
  return filePath;
}

/** Runs `fn` over `items` with at most `limit` calls in flight. Results keep input order. */
export async function mapSettledWithLimit<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      try {
        results[index] = { status: 'fulfilled', value: await fn(item) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

export async function updateCache(options: UpdateOptions): Promise<TemplateIndex> {
  const reporter = options.reporter ?? consoleReporter;
  const client: GitHubClient = {
    fetch: options.fetch ?? ((url, init) => fetch(url, init)),
    headers: {
      'User-Agent': options.userAgent ?? 'ignorepick',
      Accept: 'application/vnd.github+json',
    },
    reporter,
  };

  fs.mkdirSync(options.cacheDir, { recursive: true });

  reporter.info('Scanning gitignore repository...');
  const sources = await collectTemplates(client);
  reporter.info(`Found ${sources.length} templates. Downloading...`);

  let done = 0;
  const results = await mapSettledWithLimit(
    sources,
    options.concurrency ?? DOWNLOAD_CONCURRENCY,
    async (source) => {
      try {
        return await downloadTemplate(client, options.cacheDir, source);
      } finally {
        done += 1;
        if (done % PROGRESS_EVERY === 0 || done === sources.length) {
          reporter.progress(done, sources.length);
        }
      }
    }
  );

  const index: TemplateIndex = {};
  results.forEach((result, i) => {
    const source = sources[i];
    if (!source) return;
    if (result.status === 'fulfilled') {
      index[source.name] = result.value;
      return;
    }
    const msg = result.reason instanceof Error ? result.reason.message : String(result.reason);
    reporter.warn(`Warning: Failed to download template: ${msg}`);
  });

  writeTemplateIndex(options.cacheDir, index);
  return index;
}
