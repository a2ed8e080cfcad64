import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  MEDIA_BACKEND,
  SECONDS_PER_DAY,
  SELECTOR_SETTINGS,
} from '../app.constants';
import { errorMessage } from '../app.errors';
import type { MediaBackend } from '../backends/media-backend';
import { PathTranslator } from '../paths/path-translator';
import {
  ALL_LIBRARIES,
  createLibraryFilter,
} from '../plex/plex-library-selection.utils';
import type { WatchedFile } from '../plex/plex.types';
import type { SelectorSettings } from '../settings/selector-settings';
import { ContinueWatchingResolver } from './continue-watching.resolver';
import type { PathSink } from './promotion.selector';

export type DemotionGuardContext = {
  /** Files some account is mid-way through or plays next, plus watchlist files. */
  protectedPaths: ReadonlySet<string>;
  playingFiles: ReadonlySet<string>;
  /** Views newer than this (epoch seconds) keep the file; null disables. */
  minAgeCutoff: number | null;
  /** Movies added after this (epoch seconds) keep their file; null disables. */
  graceCutoff: number | null;
};

type DemotionGuard = {
  name: string;
  blocks(file: WatchedFile, ctx: DemotionGuardContext): boolean;
};

// Independent predicates; any one of them keeps a file on the cache.
export const DEMOTION_GUARDS: readonly DemotionGuard[] = [
  {
    name: 'continue-watching',
    blocks: (file, ctx) => ctx.protectedPaths.has(file.filePath),
  },
  {
    name: 'playing',
    blocks: (file, ctx) => ctx.playingFiles.has(file.filePath),
  },
  {
    name: 'min-age',
    blocks: (file, ctx) =>
      ctx.minAgeCutoff !== null &&
      file.lastViewedAt !== null &&
      file.lastViewedAt > ctx.minAgeCutoff,
  },
  {
    // Movies only; episodes are never held back by their added date.
    name: 'new-content',
    blocks: (file, ctx) =>
      file.kind === 'movie' &&
      ctx.graceCutoff !== null &&
      file.addedAt !== null &&
      file.addedAt > ctx.graceCutoff,
  },
];

export function findBlockingGuard(
  file: WatchedFile,
  ctx: DemotionGuardContext,
): string | null {
  return DEMOTION_GUARDS.find((g) => g.blocks(file, ctx))?.name ?? null;
}

function cutoffDaysAgo(nowSeconds: number, days: number): number | null {
  return days > 0 ? nowSeconds - days * SECONDS_PER_DAY : null;
}

@Injectable()
export class DemotionSelector {
  private readonly logger = new Logger(DemotionSelector.name);

  constructor(
    @Inject(SELECTOR_SETTINGS) private readonly settings: SelectorSettings,
    @Inject(MEDIA_BACKEND) private readonly backend: MediaBackend,
    private readonly continueWatching: ContinueWatchingResolver,
    private readonly paths: PathTranslator,
  ) {}

  async buildGuardContext(nowMs: number): Promise<DemotionGuardContext> {
    const { demote, promote } = this.settings;

    // Protection ignores the library filters: a file outside them is never a
    // candidate anyway, and a shared file must stay protected.
    const protectedPaths =
      await this.continueWatching.resolveProtectedPaths(ALL_LIBRARIES);

    if (promote.watchlistEnabled) {
      try {
        const files = await this.backend.listWatchlistFiles({
          limit: promote.watchlistCount,
          libraries: ALL_LIBRARIES,
        });
        for (const file of files) protectedPaths.add(file.filePath);
      } catch (err) {
        this.logger.warn(`Watchlist unavailable: ${errorMessage(err)}`);
      }
    }

    let playingFiles = new Set<string>();
    if (demote.skipIfPlaying) {
      try {
        playingFiles = await this.backend.listPlayingFiles();
      } catch (err) {
        this.logger.warn(`Playing sessions unavailable: ${errorMessage(err)}`);
      }
    }

    const nowSeconds = Math.floor(nowMs / 1000);
    return {
      protectedPaths,
      playingFiles,
      minAgeCutoff: cutoffDaysAgo(nowSeconds, demote.minAgeDays),
      graceCutoff: cutoffDaysAgo(nowSeconds, demote.newContentGraceDays),
    };
  }

  /**
   * Watched files that currently have a cache-tier copy and that no guard
   * protects. Returns cache-tier paths in discovery order.
   */
  async select(onSelected?: PathSink, nowMs = Date.now()): Promise<string[]> {
    const { demote } = this.settings;
    const ctx = await this.buildGuardContext(nowMs);

    let candidates: WatchedFile[] = [];
    try {
      candidates = await this.backend.listWatchedFiles(
        createLibraryFilter(this.settings.libraries),
      );
    } catch (err) {
      this.logger.error(`Watched items query failed: ${errorMessage(err)}`);
    }

    // Guards hold whole files: one protected item keeps every item sharing its file.
    const keptPaths = new Set<string>();
    for (const file of candidates) {
      const guard = findBlockingGuard(file, ctx);
      if (!guard) continue;
      keptPaths.add(file.filePath);
      this.logger.debug(`Keeping ${file.title} (${guard}) - ${file.filePath}`);
    }

    const seen = new Set<string>();
    const selected: string[] = [];
    for (const file of candidates) {
      if (demote.maxItems > 0 && selected.length >= demote.maxItems) break;
      if (keptPaths.has(file.filePath)) continue;

      const cachePath = this.paths.toCachePath(file.filePath);
      if (!cachePath || seen.has(cachePath)) continue;
      seen.add(cachePath);
      selected.push(cachePath);
      onSelected?.(cachePath);
    }

    this.logger.log(
      `Selected ${selected.length} of ${candidates.length} watched files to move back`,
    );
    return selected;
  }
}
