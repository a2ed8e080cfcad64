import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SelectorConfigError } from '../app.errors';
import {
  applyFileBackedEnv,
  envBool,
  envInt,
  envList,
  loadSelectorSettings,
  parsePathMap,
} from './selector-settings';

const API_ENV = {
  PLEX_BASEURL: 'http://plex.local:32400',
  PLEX_TOKEN: 'test-token',
};

describe('env parsing helpers', () => {
  it.each([
    ['1', true],
    ['true', true],
    ['YES', true],
    [' on ', true],
    ['0', false],
    ['false', false],
    ['maybe', false],
  ])('envBool(%j) -> %s', (raw, expected) => {
    expect(envBool({ FLAG: raw }, 'FLAG', !expected)).toBe(expected);
  });

  it('envBool falls back when unset or blank', () => {
    expect(envBool({}, 'FLAG', true)).toBe(true);
    expect(envBool({ FLAG: '  ' }, 'FLAG', false)).toBe(false);
  });

  it('envInt accepts signed integers only', () => {
    expect(envInt({ N: ' 42 ' }, 'N', 7)).toBe(42);
    expect(envInt({ N: '-3' }, 'N', 7)).toBe(-3);
    expect(envInt({ N: '4.5' }, 'N', 7)).toBe(7);
    expect(envInt({ N: 'ten' }, 'N', 7)).toBe(7);
    expect(envInt({}, 'N', 7)).toBe(7);
  });

  it('envList trims and drops empty entries', () => {
    expect(envList({ L: ' Movies , ,TV Shows,' }, 'L')).toEqual([
      'Movies',
      'TV Shows',
    ]);
    expect(envList({}, 'L')).toEqual([]);
  });
});

describe('parsePathMap', () => {
  it('parses pairs and strips trailing slashes', () => {
    expect(parsePathMap('/data/=/mnt/user/ , /media=/mnt/user/media')).toEqual([
      { containerPrefix: '/data', hostPrefix: '/mnt/user' },
      { containerPrefix: '/media', hostPrefix: '/mnt/user/media' },
    ]);
  });

  it('skips malformed pairs and empty container prefixes', () => {
    expect(parsePathMap('nonsense,/=/mnt/user,,=/x,/tv=/mnt/user/tv')).toEqual([
      { containerPrefix: '/tv', hostPrefix: '/mnt/user/tv' },
    ]);
    expect(parsePathMap(undefined)).toEqual([]);
  });
});

describe('applyFileBackedEnv', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'selector-env-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads KEY from KEY_FILE when KEY is unset', () => {
    const file = join(dir, 'token');
    writeFileSync(file, 'test-secret\n');
    const env: Record<string, string | undefined> = { PLEX_TOKEN_FILE: file };

    applyFileBackedEnv(env);

    expect(env.PLEX_TOKEN).toBe('test-secret');
  });

  it('leaves an explicit KEY alone', () => {
    const file = join(dir, 'token');
    writeFileSync(file, 'from-file');
    const env: Record<string, string | undefined> = {
      PLEX_TOKEN: 'from-env',
      PLEX_TOKEN_FILE: file,
    };

    applyFileBackedEnv(env);

    expect(env.PLEX_TOKEN).toBe('from-env');
  });

  it('ignores unreadable files', () => {
    const env: Record<string, string | undefined> = {
      PLEX_TOKEN_FILE: join(dir, 'missing'),
    };

    applyFileBackedEnv(env);

    expect(env.PLEX_TOKEN).toBeUndefined();
  });
});

describe('loadSelectorSettings', () => {
  it('applies defaults for the live backend', () => {
    const settings = loadSelectorSettings(API_ENV);

    expect(settings.backend).toBe('api');
    expect(settings.plex).toMatchObject({
      baseUrl: 'http://plex.local:32400',
      token: 'test-token',
      sslVerify: true,
    });
    expect(settings.promote).toEqual({
      onDeckEnabled: true,
      onDeckCount: 30,
      watchlistEnabled: false,
      watchlistCount: 20,
      maxItems: 500,
    });
    expect(settings.demote).toEqual({
      skipIfPlaying: true,
      minAgeDays: 0,
      newContentGraceDays: 30,
      maxItems: 0,
    });
    expect(settings.paths).toEqual({
      arrayRoot: '/mnt/user0',
      cacheRoot: '/mnt/cache',
      userRoot: '/mnt/user',
      pathMap: [],
    });
    expect(settings.logLevel).toBe('info');
  });

  it('requires base URL and token for the live backend', () => {
    expect(() => loadSelectorSettings({ PLEX_TOKEN: 'test-token' })).toThrow(
      new SelectorConfigError('PLEX_BASEURL and PLEX_TOKEN required'),
    );
    expect(() =>
      loadSelectorSettings({ PLEX_BASEURL: 'http://plex.local:32400' }),
    ).toThrow(SelectorConfigError);
  });

  it('rejects a base URL that is not http(s)', () => {
    expect(() =>
      loadSelectorSettings({ ...API_ENV, PLEX_BASEURL: 'ftp://plex.local' }),
    ).toThrow(SelectorConfigError);
  });

  it('rejects an unknown backend', () => {
    expect(() =>
      loadSelectorSettings({ ...API_ENV, PLEXCACHE_BACKEND: 'mysql' }),
    ).toThrow(SelectorConfigError);
  });

  it('fails the snapshot backend when the database file is missing', () => {
    const dir = mkdtempSync(join(tmpdir(), 'selector-db-'));
    try {
      expect(() =>
        loadSelectorSettings({
          PLEXCACHE_BACKEND: 'sqlite',
          PLEXCACHE_PLEXDB_PATH: dir,
        }),
      ).toThrow(SelectorConfigError);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('clamps negative limits to zero and strips root slashes', () => {
    const settings = loadSelectorSettings({
      ...API_ENV,
      PLEXCACHE_MAX_ITEMS: '-5',
      PLEXCACHE_ONDECK_COUNT: '12',
      PLEXCACHE_CACHE_ROOT: '/mnt/fast/',
      PLEX_PATH_MAP: '/data=/mnt/user',
      PLEX_LIBRARIES: 'Movies,TV Shows',
      PLEXCACHE_LOG_LEVEL: 'DEBUG',
    });

    expect(settings.promote.maxItems).toBe(0);
    expect(settings.promote.onDeckCount).toBe(12);
    expect(settings.paths.cacheRoot).toBe('/mnt/fast');
    expect(settings.paths.pathMap).toEqual([
      { containerPrefix: '/data', hostPrefix: '/mnt/user' },
    ]);
    expect(settings.libraries.include).toEqual(['Movies', 'TV Shows']);
    expect(settings.logLevel).toBe('debug');
  });
});
