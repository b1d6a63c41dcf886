import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { describeError, SettingsValidationError } from '../../domain/errors';
import { DEFAULT_TTL_HOURS } from '../fetching/screeningDataSource';
import { DEFAULT_AKTOOLS_URL } from '../../providers/aktoolsProvider';

const ttlSchema = z.number().positive();

const settingsSchema = z.object({
  provider: z.object({
    baseUrl: z.string().url(),
    timeoutMs: z.number().int().positive(),
  }),
  rateLimit: z.object({
    maxCalls: z.number().int().positive(),
    windowMs: z.number().int().positive(),
  }),
  retry: z.object({
    maxAttempts: z.number().int().min(1),
    delayMs: z.number().int().min(0),
  }),
  cache: z.object({
    dir: z.string().min(1),
    ttlHours: z.object({
      stockList: ttlSchema,
      incomeStatements: ttlSchema,
      balanceSheets: ttlSchema,
      dividends: ttlSchema,
      quotes: ttlSchema,
      controllers: ttlSchema,
      additionalIssuances: ttlSchema,
      convertibleBonds: ttlSchema,
      buybacks: ttlSchema,
      pledges: ttlSchema,
    }),
  }),
  universe: z.object({
    snapshotPath: z.string().min(1),
  }),
  pipeline: z.object({
    maxWorkers: z.number().int().min(1).max(64),
    progressEvery: z.number().int().min(1),
  }),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
});

export type ScreenerSettings = z.infer<typeof settingsSchema>;

export function defaultSettings(baseDir: string = process.cwd()): ScreenerSettings {
  return {
    provider: { baseUrl: DEFAULT_AKTOOLS_URL, timeoutMs: 30_000 },
    rateLimit: { maxCalls: 200, windowMs: 60_000 },
    retry: { maxAttempts: 3, delayMs: 2_000 },
    cache: { dir: path.join(baseDir, '.cache'), ttlHours: { ...DEFAULT_TTL_HOURS } },
    universe: { snapshotPath: path.join(baseDir, '.cache', 'stock-list-snapshot.json') },
    pipeline: { maxWorkers: 16, progressEvery: 20 },
    logLevel: 'info',
  };
}

export interface FileSettingsStoreOptions {
  filePath?: string;
  env?: Record<string, string | undefined>;
}

export class FileSettingsStore {
  private readonly filePath: string;
  private readonly env: Record<string, string | undefined>;

  constructor(options?: FileSettingsStoreOptions) {
    this.filePath = options?.filePath ?? path.join(process.cwd(), '.config', 'screener.json');
    this.env = options?.env ?? process.env;
  }

  getFilePath(): string {
    return this.filePath;
  }

  /** File values over defaults, environment over both. A missing file is not an error. */
  async load(): Promise<ScreenerSettings> {
    const fromFile = await this.readFile();
    const merged = applyEnvironment(deepMerge(defaultSettings(), fromFile), this.env);
    const parsed = settingsSchema.safeParse(merged);
    if (!parsed.success) {
      throw new SettingsValidationError(
        this.filePath,
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      );
    }
    return parsed.data;
  }

  async save(settings: ScreenerSettings): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(settings, null, 2), 'utf-8');
  }

  private async readFile(): Promise<unknown> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if ((error as { code?: string }).code === 'ENOENT') {
        return {};
      }
      throw error;
    }

    try {
      return JSON.parse(raw);
    } catch (error) {
      throw new SettingsValidationError(this.filePath, [`not valid JSON (${describeError(error)})`]);
    }
  }
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: PlainObject, override: unknown): PlainObject {
  if (!isPlainObject(override)) {
    return base;
  }
  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

function applyEnvironment(settings: PlainObject, env: Record<string, string | undefined>): PlainObject {
  const overrides: PlainObject = {};
  if (env.SCREENER_PROVIDER_URL) {
    overrides.provider = { baseUrl: env.SCREENER_PROVIDER_URL };
  }
  if (env.SCREENER_CACHE_DIR) {
    overrides.cache = { dir: env.SCREENER_CACHE_DIR };
  }
  if (env.SCREENER_RATE_LIMIT) {
    overrides.rateLimit = { maxCalls: Number(env.SCREENER_RATE_LIMIT) };
  }
  if (env.LOG_LEVEL) {
    overrides.logLevel = env.LOG_LEVEL.trim().toLowerCase();
  }
  return deepMerge(settings, overrides);
}
