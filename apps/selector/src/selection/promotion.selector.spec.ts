import { PathTranslator } from '../paths/path-translator';
import type { SelectorSettings } from '../settings/selector-settings';
import {
  FakeMediaBackend,
  cwEntry,
} from '../testing/fake-media-backend';
import { makeSettings } from '../testing/selector-settings.fixture';
import { ContinueWatchingResolver } from './continue-watching.resolver';
import { PromotionSelector } from './promotion.selector';

describe('PromotionSelector', () => {
  let backend: FakeMediaBackend;

  function makeSelector(settings: SelectorSettings) {
    return new PromotionSelector(
      settings,
      backend,
      new ContinueWatchingResolver(backend),
      new PathTranslator(settings),
    );
  }

  beforeEach(() => {
    backend = new FakeMediaBackend();
    backend.accounts = [
      { id: 1, name: 'alice', lastActivityAt: 300 },
      { id: 2, name: 'bob', lastActivityAt: 100 },
    ];
  });

  it('translates container paths to array-tier host paths', async () => {
    backend.continueWatching.set(1, [cwEntry('/data/movies/Y.mkv')]);
    const selector = makeSelector(
      makeSettings({
        paths: {
          pathMap: [{ containerPrefix: '/data', hostPrefix: '/mnt/user' }],
        },
      }),
    );

    await expect(selector.select()).resolves.toEqual([
      '/mnt/user0/movies/Y.mkv',
    ]);
  });

  it('unions every account and streams each path once', async () => {
    backend.continueWatching.set(1, [
      cwEntry('/mnt/user/tv/X/S01E02.mkv', { kind: 'episode' }),
    ]);
    backend.continueWatching.set(2, [
      cwEntry('/mnt/user/tv/X/S01E05.mkv', { kind: 'episode' }),
      cwEntry('/mnt/user/tv/X/S01E02.mkv', { kind: 'episode' }),
    ]);
    const emitted: string[] = [];

    const selected = await makeSelector(makeSettings()).select((path) =>
      emitted.push(path),
    );

    expect(selected).toEqual([
      '/mnt/user0/tv/X/S01E02.mkv',
      '/mnt/user0/tv/X/S01E05.mkv',
    ]);
    expect(emitted).toEqual(selected);
  });

  it('appends watchlist files after on-deck files', async () => {
    backend.continueWatching.set(1, [cwEntry('/mnt/user/movies/A.mkv')]);
    backend.watchlist = [
      cwEntry('/mnt/user/movies/A.mkv'),
      cwEntry('/mnt/user/movies/W.mkv'),
    ];

    const selected = await makeSelector(
      makeSettings({ promote: { watchlistEnabled: true } }),
    ).select();

    expect(selected).toEqual([
      '/mnt/user0/movies/A.mkv',
      '/mnt/user0/movies/W.mkv',
    ]);
  });

  it('still promotes on-deck files when the watchlist fails', async () => {
    backend.continueWatching.set(1, [cwEntry('/mnt/user/movies/A.mkv')]);
    backend.watchlist = new Error('plex.tv unreachable');

    const selected = await makeSelector(
      makeSettings({ promote: { watchlistEnabled: true } }),
    ).select();

    expect(selected).toEqual(['/mnt/user0/movies/A.mkv']);
  });

  it('skips on-deck when disabled', async () => {
    backend.continueWatching.set(1, [cwEntry('/mnt/user/movies/A.mkv')]);
    backend.watchlist = [cwEntry('/mnt/user/movies/W.mkv')];

    const selected = await makeSelector(
      makeSettings({
        promote: { onDeckEnabled: false, watchlistEnabled: true },
      }),
    ).select();

    expect(selected).toEqual(['/mnt/user0/movies/W.mkv']);
  });

  it('caps the output at the item limit', async () => {
    backend.continueWatching.set(1, [
      cwEntry('/mnt/user/a.mkv'),
      cwEntry('/mnt/user/b.mkv'),
    ]);
    backend.watchlist = [cwEntry('/mnt/user/c.mkv')];

    const selected = await makeSelector(
      makeSettings({ promote: { watchlistEnabled: true, maxItems: 2 } }),
    ).select();

    expect(selected).toEqual(['/mnt/user0/a.mkv', '/mnt/user0/b.mkv']);
  });

  it('collapses server paths that map to the same host path', async () => {
    backend.continueWatching.set(1, [
      cwEntry('/data/movies/A.mkv'),
      cwEntry('/media/movies/A.mkv'),
    ]);

    const selected = await makeSelector(
      makeSettings({
        paths: {
          pathMap: [
            { containerPrefix: '/data', hostPrefix: '/mnt/user' },
            { containerPrefix: '/media', hostPrefix: '/mnt/user' },
          ],
        },
      }),
    ).select();

    expect(selected).toEqual(['/mnt/user0/movies/A.mkv']);
  });

  it('applies library filters to both sources', async () => {
    backend.continueWatching.set(1, [
      cwEntry('/mnt/user/kids/K.mkv', { librarySectionTitle: 'Kids' }),
      cwEntry('/mnt/user/movies/M.mkv'),
    ]);
    backend.watchlist = [
      cwEntry('/mnt/user/kids/W.mkv', { librarySectionTitle: 'Kids' }),
    ];

    const selected = await makeSelector(
      makeSettings({
        libraries: { include: ['Movies'] },
        promote: { watchlistEnabled: true },
      }),
    ).select();

    expect(selected).toEqual(['/mnt/user0/movies/M.mkv']);
  });
});
