export type PlexMediaKind = 'movie' | 'episode';

export type PlexAccount = {
  id: number;
  name: string;
  /** Latest view across the account's history (epoch seconds). */
  lastActivityAt: number | null;
};

export type PlexLibrarySection = {
  key: string;
  title: string;
  type: 'movie' | 'show';
};

export type ContinueWatchingStatus = 'partial' | 'nextUnwatched';

export type ContinueWatchingEntry = {
  filePath: string;
  itemId: string;
  /** Epoch seconds; null sorts last. */
  sortTime: number | null;
  status: ContinueWatchingStatus;
  kind: PlexMediaKind;
  title: string;
  librarySectionTitle: string | null;
};

export type LibraryFile = {
  filePath: string;
  itemId: string;
  kind: PlexMediaKind;
  title: string;
  librarySectionTitle: string | null;
};

export type WatchedFile = LibraryFile & {
  addedAt: number | null;
  /** Most recent completed view across all accounts (epoch seconds). */
  lastViewedAt: number | null;
};

export type LibraryFilter = {
  allows(librarySectionTitle: string | null): boolean;
};
