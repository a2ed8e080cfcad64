import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SelectorConnectionError } from '../app.errors';
import {
  ALL_LIBRARIES,
  createLibraryFilter,
} from '../plex/plex-library-selection.utils';
import {
  PlexLibraryDbFixture,
  seedSampleLibrary,
} from '../testing/plex-library-db.fixture';
import { makeSettings } from '../testing/selector-settings.fixture';
import { PlexDbBackend } from './plex-db.backend';

describe('PlexDbBackend', () => {
  let fixture: PlexLibraryDbFixture;
  let backend: PlexDbBackend;

  beforeEach(async () => {
    fixture = new PlexLibraryDbFixture();
    seedSampleLibrary(fixture);
    backend = new PlexDbBackend(
      makeSettings({
        backend: 'sqlite',
        plex: { databasePath: fixture.databasePath },
      }),
    );
    await backend.connect();
  });

  afterEach(() => {
    backend.close();
    fixture.dispose();
  });

  it('lists accounts with their latest activity', async () => {
    await expect(backend.listAccounts()).resolves.toEqual([
      { id: 1, name: 'admin', lastActivityAt: 5000 },
      { id: 2, name: 'bob', lastActivityAt: 7000 },
    ]);
  });

  it('derives continue watching for one account', async () => {
    const entries = await backend.queryContinueWatching(
      { id: 1, name: 'admin', lastActivityAt: 5000 },
      ALL_LIBRARIES,
    );

    expect(entries).toEqual([
      {
        filePath: '/data/tv/X/S01E02.mkv',
        itemId: '202',
        sortTime: 5000,
        status: 'nextUnwatched',
        kind: 'episode',
        title: 'Second',
        librarySectionTitle: 'TV Shows',
      },
      {
        filePath: '/data/movies/Arrival.mkv',
        itemId: '100',
        sortTime: 4000,
        status: 'partial',
        kind: 'movie',
        title: 'Arrival',
        librarySectionTitle: 'Movies',
      },
      {
        filePath: '/data/movies/Split-cd1.mkv',
        itemId: '300',
        sortTime: 3000,
        status: 'partial',
        kind: 'movie',
        title: 'Split',
        librarySectionTitle: 'Movies',
      },
      {
        filePath: '/data/movies/Split-cd2.mkv',
        itemId: '300',
        sortTime: 3000,
        status: 'partial',
        kind: 'movie',
        title: 'Split',
        librarySectionTitle: 'Movies',
      },
    ]);
  });

  it('keeps each account on its own place in a shared season', async () => {
    const entries = await backend.queryContinueWatching(
      { id: 2, name: 'bob', lastActivityAt: 7000 },
      ALL_LIBRARIES,
    );

    expect(entries.map((e) => [e.itemId, e.status, e.sortTime])).toEqual([
      ['203', 'nextUnwatched', 7000],
    ]);
  });

  it('applies the library filter to continue watching', async () => {
    const entries = await backend.queryContinueWatching(
      { id: 1, name: 'admin', lastActivityAt: 5000 },
      createLibraryFilter({ include: ['TV Shows'], only: [] }),
    );

    expect(entries.map((e) => e.itemId)).toEqual(['202']);
  });

  it('lists watched files with the latest view across accounts', async () => {
    await expect(backend.listWatchedFiles(ALL_LIBRARIES)).resolves.toEqual([
      {
        filePath: '/data/tv/X/S01E01.mkv',
        itemId: '201',
        kind: 'episode',
        title: 'Pilot',
        librarySectionTitle: 'TV Shows',
        addedAt: 1100,
        lastViewedAt: 6000,
      },
      {
        filePath: '/data/tv/X/S01E02.mkv',
        itemId: '202',
        kind: 'episode',
        title: 'Second',
        librarySectionTitle: 'TV Shows',
        addedAt: 1100,
        lastViewedAt: 7000,
      },
    ]);
  });

  it('cannot see playing sessions or watchlists', async () => {
    await expect(backend.listPlayingFiles()).resolves.toEqual(new Set());
    await expect(backend.listWatchlistFiles()).resolves.toEqual([]);
  });
});

describe('PlexDbBackend.connect', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'selector-db-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('fails with SelectorConnectionError when the file is missing', async () => {
    const backend = new PlexDbBackend(
      makeSettings({
        backend: 'sqlite',
        plex: { databasePath: join(dir, 'missing.db') },
      }),
    );

    await expect(backend.connect()).rejects.toBeInstanceOf(
      SelectorConnectionError,
    );
  });

  it('fails with SelectorConnectionError when the file is not a database', async () => {
    const path = join(dir, 'garbage.db');
    writeFileSync(path, 'this is not sqlite, just some text padding it out');
    const backend = new PlexDbBackend(
      makeSettings({ backend: 'sqlite', plex: { databasePath: path } }),
    );

    await expect(backend.connect()).rejects.toBeInstanceOf(
      SelectorConnectionError,
    );
  });
});
