import { Inject, Injectable, Logger } from '@nestjs/common';
import { MEDIA_BACKEND, SELECTOR_SETTINGS } from '../app.constants';
import { errorMessage } from '../app.errors';
import type { MediaBackend } from '../backends/media-backend';
import { PathTranslator } from '../paths/path-translator';
import { createLibraryFilter } from '../plex/plex-library-selection.utils';
import type { LibraryFile } from '../plex/plex.types';
import type { SelectorSettings } from '../settings/selector-settings';
import { ContinueWatchingResolver } from './continue-watching.resolver';

export type PathSink = (path: string) => void;

@Injectable()
export class PromotionSelector {
  private readonly logger = new Logger(PromotionSelector.name);

  constructor(
    @Inject(SELECTOR_SETTINGS) private readonly settings: SelectorSettings,
    @Inject(MEDIA_BACKEND) private readonly backend: MediaBackend,
    private readonly continueWatching: ContinueWatchingResolver,
    private readonly paths: PathTranslator,
  ) {}

  /**
   * On-deck files, then watchlist files, deduplicated by path and capped at
   * the global item limit. Returns array-tier host paths; `onSelected` sees
   * each one as soon as it is final.
   */
  async select(onSelected?: PathSink): Promise<string[]> {
    const { promote } = this.settings;
    const libraries = createLibraryFilter(this.settings.libraries);
    const candidates: string[] = [];

    if (promote.onDeckEnabled) {
      const entries = await this.continueWatching.resolveAll({
        libraries,
        perAccountLimit: promote.onDeckCount,
        globalLimit: promote.maxItems,
      });
      for (const entry of entries) candidates.push(entry.filePath);
    }

    if (promote.watchlistEnabled) {
      let files: LibraryFile[] = [];
      try {
        files = await this.backend.listWatchlistFiles({
          limit: promote.watchlistCount,
          libraries,
        });
      } catch (err) {
        this.logger.warn(`Watchlist unavailable: ${errorMessage(err)}`);
      }
      for (const file of files) candidates.push(file.filePath);
    }

    const seen = new Set<string>();
    const seenHostPaths = new Set<string>();
    const selected: string[] = [];
    for (const candidate of candidates) {
      if (promote.maxItems > 0 && selected.length >= promote.maxItems) break;
      if (seen.has(candidate)) continue;
      seen.add(candidate);
      const hostPath = this.paths.toArrayPath(candidate);
      // Two server paths can map onto one host path.
      if (seenHostPaths.has(hostPath)) continue;
      seenHostPaths.add(hostPath);
      selected.push(hostPath);
      onSelected?.(hostPath);
    }

    this.logger.log(
      `Selected ${selected.length} of ${candidates.length} candidates for the cache`,
    );
    return selected;
  }
}
