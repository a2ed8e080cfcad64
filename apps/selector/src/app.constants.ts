export const SELECTOR_SETTINGS = Symbol('SELECTOR_SETTINGS');
export const MEDIA_BACKEND = Symbol('MEDIA_BACKEND');

export const EXIT_OK = 0;
export const EXIT_UNEXPECTED = 1;
export const EXIT_CONFIG = 2;
export const EXIT_CONNECTION = 3;

export const DEFAULT_ARRAY_ROOT = '/mnt/user0';
export const DEFAULT_CACHE_ROOT = '/mnt/cache';
// Unraid's user-share view merges cache and array; the disk-only view lives at the array root.
export const DEFAULT_USER_ROOT = '/mnt/user';
export const DEFAULT_PLEXDB_ROOT = '/plexdb';

export const PLEX_LIBRARY_DB_RELATIVE_PATH =
  'Library/Application Support/Plex Media Server/Plug-in Support/Databases/com.plexapp.plugins.library.db';

export const DEFAULT_ONDECK_COUNT = 30;
export const DEFAULT_WATCHLIST_COUNT = 20;
export const DEFAULT_MAX_ITEMS = 500;
export const DEFAULT_NEW_CONTENT_GRACE_DAYS = 30;

// metadata_items.metadata_type, also the `type` filter of section listings
export const PLEX_METADATA_TYPE_MOVIE = 1;
export const PLEX_METADATA_TYPE_EPISODE = 4;

export const PLEX_ADMIN_ACCOUNT_ID = 1;

export const PLEX_HTTP_TIMEOUT_MS = 20_000;
export const PLEX_HTTP_LIBRARY_TIMEOUT_MS = 60_000;

export const SECONDS_PER_DAY = 86_400;
