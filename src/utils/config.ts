import { homedir } from 'node:os';
import path from 'node:path';

import { z } from 'zod';

import { ValidationError } from '../domain/shared/errors.js';

export const BULK_LOADER_KINDS = ['statement', 'sqlite3'] as const;
export type BulkLoaderKind = (typeof BULK_LOADER_KINDS)[number];

const ConfigSchema = z.object({
  cacheDir: z.string().min(1),
  release: z.string().min(1).optional(),
  rollingRelease: z.string().min(1).default('22.11'),
  bulkLoader: z.enum(BULK_LOADER_KINDS).default('statement'),
  sqlite3Bin: z.string().min(1).default('sqlite3'),
  requestTimeoutMs: z.coerce.number().int().positive().default(60_000),
  declarationKey: z.string().min(1).default('environment.systemPackages'),
  channelBase: z.string().url().default('https://channels.nixos.org'),
});

export type PkgCacheConfig = z.infer<typeof ConfigSchema>;
export type PkgCacheConfigInput = z.input<typeof ConfigSchema>;

export function defaultCacheDir(env: NodeJS.ProcessEnv = process.env): string {
  const home = env.HOME || env.USERPROFILE || homedir();
  const base = env.XDG_CACHE_HOME || path.join(home, '.cache');
  return path.join(base, 'pkgcache');
}

/**
 * Build a validated configuration. Explicit overrides win over environment
 * variables, which win over defaults.
 */
export function loadConfig(
  overrides: Partial<PkgCacheConfigInput> = {},
  env: NodeJS.ProcessEnv = process.env,
): PkgCacheConfig {
  const fromEnv: Partial<Record<keyof PkgCacheConfigInput, string>> = {
    cacheDir: env.PKGCACHE_CACHE_DIR,
    release: env.PKGCACHE_RELEASE,
    rollingRelease: env.PKGCACHE_ROLLING_RELEASE,
    bulkLoader: env.PKGCACHE_BULK_LOADER,
    sqlite3Bin: env.PKGCACHE_SQLITE3_BIN,
    requestTimeoutMs: env.PKGCACHE_TIMEOUT_MS,
    declarationKey: env.PKGCACHE_DECLARATION_KEY,
    channelBase: env.PKGCACHE_CHANNEL_BASE,
  };

  const merged: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fromEnv)) {
    if (value !== undefined && value !== '') {
      merged[key] = value;
    }
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  merged.cacheDir = path.resolve(
    typeof merged.cacheDir === 'string' ? merged.cacheDir : defaultCacheDir(env),
  );

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ValidationError('Invalid pkgcache configuration', parsed.error.flatten().fieldErrors);
  }
  return parsed.data;
}
