import type {
  ContinueWatchingEntry,
  LibraryFile,
  LibraryFilter,
  PlexAccount,
  WatchedFile,
} from '../plex/plex.types';

/**
 * Read contract shared by the live HTTP backend and the read-only database
 * snapshot backend. Selectors depend on this interface only.
 */
export interface MediaBackend {
  /** Short name for log lines. */
  readonly label: string;

  /** Fails with SelectorConnectionError when the data source is unreachable. */
  connect(): Promise<void>;

  close(): void;

  listAccounts(): Promise<PlexAccount[]>;

  /** Ordered continue-watching entries of one account, one per file. */
  queryContinueWatching(
    account: PlexAccount,
    libraries: LibraryFilter,
  ): Promise<ContinueWatchingEntry[]>;

  /** Files being streamed right now; always empty where sessions are not observable. */
  listPlayingFiles(): Promise<Set<string>>;

  /** Local files backing watchlist entries; entries with no local file are skipped. */
  listWatchlistFiles(params: {
    limit: number;
    libraries: LibraryFilter;
  }): Promise<LibraryFile[]>;

  /** Files of items at least one account has viewed, in discovery order. */
  listWatchedFiles(libraries: LibraryFilter): Promise<WatchedFile[]>;
}
