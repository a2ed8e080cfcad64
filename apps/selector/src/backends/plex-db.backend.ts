import {
  Inject,
  Injectable,
  Logger,
  type OnModuleDestroy,
} from '@nestjs/common';
import Database from 'better-sqlite3';
import {
  PLEX_ADMIN_ACCOUNT_ID,
  PLEX_METADATA_TYPE_EPISODE,
  PLEX_METADATA_TYPE_MOVIE,
  SELECTOR_SETTINGS,
} from '../app.constants';
import { SelectorConnectionError, errorMessage } from '../app.errors';
import type {
  ContinueWatchingEntry,
  LibraryFile,
  LibraryFilter,
  PlexAccount,
  PlexMediaKind,
  WatchedFile,
} from '../plex/plex.types';
import {
  classifyContinueWatching,
  type AccountItemState,
} from '../selection/continue-watching.utils';
import type { SelectorSettings } from '../settings/selector-settings';
import type { MediaBackend } from './media-backend';
import {
  ACCOUNTS_SQL,
  ACCOUNT_ITEM_STATES_SQL,
  METADATA_COUNT_SQL,
  WATCHED_FILES_SQL,
  type AccountItemStateRow,
  type AccountRow,
  type WatchedFileRow,
} from './plex-db.queries';

function toMediaKind(metadataType: number): PlexMediaKind | null {
  if (metadataType === PLEX_METADATA_TYPE_MOVIE) return 'movie';
  if (metadataType === PLEX_METADATA_TYPE_EPISODE) return 'episode';
  return null;
}

function toAccountItemState(row: AccountItemStateRow): AccountItemState | null {
  const kind = toMediaKind(row.metadataType);
  if (!kind) return null;
  return {
    itemId: String(row.itemId),
    kind,
    title: row.title ?? '',
    parentId: row.parentId === null ? null : String(row.parentId),
    index: row.itemIndex,
    librarySectionTitle: row.librarySectionTitle,
    filePath: row.filePath,
    addedAt: row.addedAt,
    viewedAt: row.viewedAt,
    viewOffset: row.viewOffset,
    lastViewedAt: row.lastViewedAt,
  };
}

/**
 * Snapshot backend reading the Plex library database directly, read-only.
 * Covers every account without per-user tokens, but cannot see live sessions
 * or watchlists.
 */
@Injectable()
export class PlexDbBackend implements MediaBackend, OnModuleDestroy {
  readonly label = 'plex-db';
  private readonly logger = new Logger(PlexDbBackend.name);
  private db: Database.Database | null = null;

  constructor(
    @Inject(SELECTOR_SETTINGS) private readonly settings: SelectorSettings,
  ) {}

  private get database(): Database.Database {
    if (!this.db) {
      throw new Error('Plex database is not open; call connect() first');
    }
    return this.db;
  }

  async connect(): Promise<void> {
    if (this.db) return;
    const path = this.settings.plex.databasePath;
    try {
      this.db = new Database(path, { readonly: true, fileMustExist: true });
      const row = this.db
        .prepare<[], { count: number }>(METADATA_COUNT_SQL)
        .get();
      this.logger.debug(
        `Opened ${path} read-only, ${row?.count ?? 0} metadata items`,
      );
    } catch (err) {
      this.close();
      throw new SelectorConnectionError(
        `Plex database open failed: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  close(): void {
    if (!this.db) return;
    this.db.close();
    this.db = null;
  }

  onModuleDestroy(): void {
    this.close();
  }

  async listAccounts(): Promise<PlexAccount[]> {
    const rows = this.database.prepare<[], AccountRow>(ACCOUNTS_SQL).all();
    if (!rows.length) {
      return [{ id: PLEX_ADMIN_ACCOUNT_ID, name: 'admin', lastActivityAt: null }];
    }
    return rows.map((row) => ({
      id: row.id,
      name: row.name?.trim() || `ID:${row.id}`,
      lastActivityAt: row.lastViewedAt,
    }));
  }

  async queryContinueWatching(
    account: PlexAccount,
    libraries: LibraryFilter,
  ): Promise<ContinueWatchingEntry[]> {
    const rows = this.database
      .prepare<{ accountId: number }, AccountItemStateRow>(
        ACCOUNT_ITEM_STATES_SQL,
      )
      .all({ accountId: account.id });

    const states: AccountItemState[] = [];
    for (const row of rows) {
      const state = toAccountItemState(row);
      if (state) states.push(state);
    }

    // Filter after classification: a season's progress counts even when only
    // some of its files pass the library filter.
    const entries = classifyContinueWatching(states).filter((entry) =>
      libraries.allows(entry.librarySectionTitle),
    );
    for (const entry of entries) {
      this.logger.debug(
        `[${account.name}] ${entry.title} (${entry.status}) - ${entry.filePath}`,
      );
    }
    return entries;
  }

  async listPlayingFiles(): Promise<Set<string>> {
    // Active sessions live in the server's memory, not in the library database.
    return new Set<string>();
  }

  async listWatchlistFiles(): Promise<LibraryFile[]> {
    // Watchlists are stored on plex.tv, not in the library database.
    return [];
  }

  async listWatchedFiles(libraries: LibraryFilter): Promise<WatchedFile[]> {
    const rows = this.database
      .prepare<[], WatchedFileRow>(WATCHED_FILES_SQL)
      .all();
    const out: WatchedFile[] = [];
    for (const row of rows) {
      const kind = toMediaKind(row.metadataType);
      if (!kind || !libraries.allows(row.librarySectionTitle)) continue;
      out.push({
        filePath: row.filePath,
        itemId: String(row.itemId),
        kind,
        title: row.title ?? '',
        librarySectionTitle: row.librarySectionTitle,
        addedAt: row.addedAt,
        lastViewedAt: row.lastViewedAt,
      });
    }
    return out;
  }
}
