import { readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import {
  DEFAULT_ARRAY_ROOT,
  DEFAULT_CACHE_ROOT,
  DEFAULT_MAX_ITEMS,
  DEFAULT_NEW_CONTENT_GRACE_DAYS,
  DEFAULT_ONDECK_COUNT,
  DEFAULT_PLEXDB_ROOT,
  DEFAULT_USER_ROOT,
  DEFAULT_WATCHLIST_COUNT,
  PLEX_LIBRARY_DB_RELATIVE_PATH,
} from '../app.constants';
import { SelectorConfigError } from '../app.errors';

type EnvLike = Record<string, string | undefined>;

export type SelectorBackendKind = 'api' | 'sqlite';

export type SelectorLogLevel = 'error' | 'warn' | 'info' | 'debug';

export type PathMapping = {
  containerPrefix: string;
  hostPrefix: string;
};

export type SelectorSettings = {
  backend: SelectorBackendKind;
  plex: {
    baseUrl: string | null;
    token: string | null;
    sslVerify: boolean;
    databasePath: string;
  };
  libraries: {
    include: string[];
    only: string[];
  };
  promote: {
    onDeckEnabled: boolean;
    onDeckCount: number;
    watchlistEnabled: boolean;
    watchlistCount: number;
    maxItems: number;
  };
  demote: {
    skipIfPlaying: boolean;
    minAgeDays: number;
    newContentGraceDays: number;
    maxItems: number;
  };
  paths: {
    arrayRoot: string;
    cacheRoot: string;
    userRoot: string;
    pathMap: PathMapping[];
  };
  logLevel: SelectorLogLevel;
};

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);

export function envBool(env: EnvLike, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  return TRUE_VALUES.has(raw.toLowerCase());
}

export function envInt(env: EnvLike, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw || !/^[-+]?\d+$/.test(raw)) return fallback;
  const n = Number.parseInt(raw, 10);
  return Number.isSafeInteger(n) ? n : fallback;
}

export function envList(env: EnvLike, key: string): string[] {
  const raw = env[key]?.trim();
  if (!raw) return [];
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function envString(env: EnvLike, key: string): string | null {
  const raw = env[key]?.trim();
  return raw ? raw : null;
}

function stripTrailingSlashes(value: string): string {
  return value.replace(/\/+$/, '');
}

/**
 * Parses `PLEX_PATH_MAP`, e.g. `/data=/mnt/user,/media=/mnt/user`.
 * Malformed pairs and pairs whose container side collapses to nothing are skipped.
 */
export function parsePathMap(raw: string | undefined): PathMapping[] {
  const out: PathMapping[] = [];
  for (const chunk of (raw ?? '').split(',')) {
    const pair = chunk.trim();
    const eq = pair.indexOf('=');
    if (!pair || eq < 0) continue;
    const containerPrefix = stripTrailingSlashes(pair.slice(0, eq).trim());
    const hostPrefix = stripTrailingSlashes(pair.slice(eq + 1).trim());
    if (!containerPrefix) continue;
    out.push({ containerPrefix, hostPrefix });
  }
  return out;
}

function parseBackend(raw: string | null): SelectorBackendKind {
  const v = (raw ?? 'api').toLowerCase();
  if (v === 'api' || v === 'sqlite') return v;
  throw new SelectorConfigError(
    `PLEXCACHE_BACKEND must be "api" or "sqlite" (got "${raw ?? ''}")`,
  );
}

function parseLogLevel(raw: string | null): SelectorLogLevel {
  const v = (raw ?? 'info').toLowerCase();
  if (v === 'error' || v === 'warn' || v === 'info' || v === 'debug') return v;
  return 'info';
}

function normalizeBaseUrl(raw: string): string {
  try {
    const parsed = new URL(raw);
    if (!/^https?:$/i.test(parsed.protocol)) {
      throw new Error('Unsupported protocol');
    }
  } catch {
    throw new SelectorConfigError(
      `PLEX_BASEURL must be a valid http(s) URL (got "${raw}")`,
    );
  }
  return raw;
}

function nonNegative(value: number): number {
  return value > 0 ? value : 0;
}

/**
 * Fills `KEY` from the file named by `KEY_FILE` when `KEY` is unset, so tokens
 * can come from Docker/Kubernetes secrets.
 */
export function applyFileBackedEnv(env: EnvLike): void {
  for (const [fileKey, filePath] of Object.entries(env)) {
    if (!fileKey.endsWith('_FILE')) continue;
    const targetKey = fileKey.slice(0, -'_FILE'.length);
    if (!targetKey || env[targetKey]?.trim()) continue;
    const path = filePath?.trim();
    if (!path) continue;
    try {
      env[targetKey] = readFileSync(path, 'utf8')
        .replace(/\r\n/g, '\n')
        .replace(/\n$/, '');
    } catch {
      // Unreadable secret files surface later as missing configuration.
    }
  }
}

export function resolvePlexDatabasePath(root: string): string {
  return join(root, PLEX_LIBRARY_DB_RELATIVE_PATH);
}

export function loadSelectorSettings(env: EnvLike): SelectorSettings {
  const backend = parseBackend(envString(env, 'PLEXCACHE_BACKEND'));

  const baseUrl = envString(env, 'PLEX_BASEURL');
  const token = envString(env, 'PLEX_TOKEN');
  if (backend === 'api' && (!baseUrl || !token)) {
    throw new SelectorConfigError('PLEX_BASEURL and PLEX_TOKEN required');
  }

  const databasePath = resolvePlexDatabasePath(
    envString(env, 'PLEXCACHE_PLEXDB_PATH') ?? DEFAULT_PLEXDB_ROOT,
  );
  if (backend === 'sqlite' && !statSync(databasePath, { throwIfNoEntry: false })) {
    throw new SelectorConfigError(
      `Plex database not found at: ${databasePath} (check PLEXCACHE_PLEXDB_PATH and the mount)`,
    );
  }

  return {
    backend,
    plex: {
      baseUrl: baseUrl ? normalizeBaseUrl(baseUrl) : null,
      token,
      sslVerify: envBool(env, 'PLEX_SSL_VERIFY', true),
      databasePath,
    },
    libraries: {
      include: envList(env, 'PLEX_LIBRARIES'),
      only: envList(env, 'PLEXCACHE_LIBRARIES_ONLY'),
    },
    promote: {
      onDeckEnabled: envBool(env, 'PLEXCACHE_ONDECK', true),
      onDeckCount: nonNegative(
        envInt(env, 'PLEXCACHE_ONDECK_COUNT', DEFAULT_ONDECK_COUNT),
      ),
      watchlistEnabled: envBool(env, 'PLEXCACHE_WATCHLIST', false),
      watchlistCount: nonNegative(
        envInt(env, 'PLEXCACHE_WATCHLIST_COUNT', DEFAULT_WATCHLIST_COUNT),
      ),
      maxItems: nonNegative(
        envInt(env, 'PLEXCACHE_MAX_ITEMS', DEFAULT_MAX_ITEMS),
      ),
    },
    demote: {
      skipIfPlaying: envBool(env, 'PLEXCACHE_SKIP_IF_PLAYING', true),
      minAgeDays: nonNegative(
        envInt(env, 'PLEXCACHE_MOVE_BACK_MIN_AGE_DAYS', 0),
      ),
      newContentGraceDays: nonNegative(
        envInt(
          env,
          'PLEXCACHE_NEW_CONTENT_GRACE_DAYS',
          DEFAULT_NEW_CONTENT_GRACE_DAYS,
        ),
      ),
      maxItems: nonNegative(envInt(env, 'PLEXCACHE_MOVE_BACK_MAX_ITEMS', 0)),
    },
    paths: {
      arrayRoot: stripTrailingSlashes(
        envString(env, 'PLEXCACHE_ARRAY_ROOT') ?? DEFAULT_ARRAY_ROOT,
      ),
      cacheRoot: stripTrailingSlashes(
        envString(env, 'PLEXCACHE_CACHE_ROOT') ?? DEFAULT_CACHE_ROOT,
      ),
      userRoot: stripTrailingSlashes(
        envString(env, 'PLEXCACHE_USER_ROOT') ?? DEFAULT_USER_ROOT,
      ),
      pathMap: parsePathMap(env.PLEX_PATH_MAP),
    },
    logLevel: parseLogLevel(envString(env, 'PLEXCACHE_LOG_LEVEL')),
  };
}
