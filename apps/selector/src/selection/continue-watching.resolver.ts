import { Inject, Injectable, Logger } from '@nestjs/common';
import { MEDIA_BACKEND } from '../app.constants';
import { errorMessage } from '../app.errors';
import type { MediaBackend } from '../backends/media-backend';
import type {
  ContinueWatchingEntry,
  LibraryFilter,
  PlexAccount,
} from '../plex/plex.types';

/** Most recently active first; accounts that never watched anything go last. */
export function rankAccounts(accounts: readonly PlexAccount[]): PlexAccount[] {
  return accounts.slice().sort((a, b) => {
    if (a.lastActivityAt !== b.lastActivityAt) {
      if (a.lastActivityAt === null) return 1;
      if (b.lastActivityAt === null) return -1;
      return b.lastActivityAt - a.lastActivityAt;
    }
    return a.id - b.id;
  });
}

@Injectable()
export class ContinueWatchingResolver {
  private readonly logger = new Logger(ContinueWatchingResolver.name);

  constructor(@Inject(MEDIA_BACKEND) private readonly backend: MediaBackend) {}

  /** `limit` of 0 means uncapped. A failing query yields an empty list. */
  async resolveForAccount(
    account: PlexAccount,
    params: { libraries: LibraryFilter; limit: number },
  ): Promise<ContinueWatchingEntry[]> {
    let entries: ContinueWatchingEntry[];
    try {
      entries = await this.backend.queryContinueWatching(
        account,
        params.libraries,
      );
    } catch (err) {
      this.logger.warn(
        `Continue watching query failed for ${account.name}: ${errorMessage(err)}`,
      );
      return [];
    }
    return params.limit > 0 ? entries.slice(0, params.limit) : entries;
  }

  /**
   * Per-account lists merged in account rank order. A later entry is dropped
   * when either its file path or its item id was already taken. Once the
   * merged list reaches `globalLimit` no further accounts are queried; the
   * account in flight is always kept whole.
   */
  async resolveAll(params: {
    libraries: LibraryFilter;
    perAccountLimit: number;
    globalLimit: number;
  }): Promise<ContinueWatchingEntry[]> {
    const accounts = rankAccounts(await this.backend.listAccounts());
    this.logger.debug(
      `Found ${accounts.length} accounts on ${this.backend.label}, ordered by most recent activity`,
    );

    const merged: ContinueWatchingEntry[] = [];
    const seenPaths = new Set<string>();
    const seenItemIds = new Set<string>();

    for (const account of accounts) {
      if (params.globalLimit > 0 && merged.length >= params.globalLimit) {
        this.logger.debug(
          `Reached item limit, stopping at ${merged.length} continue watching items`,
        );
        break;
      }

      const entries = await this.resolveForAccount(account, {
        libraries: params.libraries,
        limit: params.perAccountLimit,
      });
      if (entries.length) {
        this.logger.log(
          `Adding ${entries.length} continue watching items for ${account.name}`,
        );
      }

      for (const entry of entries) {
        if (seenPaths.has(entry.filePath) || seenItemIds.has(entry.itemId)) {
          continue;
        }
        seenPaths.add(entry.filePath);
        seenItemIds.add(entry.itemId);
        merged.push(entry);
      }
    }

    return merged;
  }

  /**
   * Every file any account could resume or play next, unfiltered and
   * uncapped. Used to protect files from demotion.
   */
  async resolveProtectedPaths(libraries: LibraryFilter): Promise<Set<string>> {
    const accounts = rankAccounts(await this.backend.listAccounts());
    const protectedPaths = new Set<string>();
    for (const account of accounts) {
      const entries = await this.resolveForAccount(account, {
        libraries,
        limit: 0,
      });
      for (const entry of entries) protectedPaths.add(entry.filePath);
    }
    return protectedPaths;
  }
}
