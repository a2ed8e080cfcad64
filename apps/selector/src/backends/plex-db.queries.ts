// Queries against Plex Media Server's com.plexapp.plugins.library.db.
// metadata_type: 1 = movie, 4 = episode. section_type: 1 = movie, 2 = show.
// Timestamps are epoch seconds.

export type AccountRow = {
  id: number;
  name: string | null;
  lastViewedAt: number | null;
};

export const ACCOUNTS_SQL = `
  SELECT
    a.id AS id,
    a.name AS name,
    MAX(miv.viewed_at) AS lastViewedAt
  FROM accounts a
  LEFT JOIN metadata_item_views miv ON miv.account_id = a.id
  WHERE a.id > 0
  GROUP BY a.id, a.name
  ORDER BY a.id
`;

export type AccountItemStateRow = {
  itemId: number;
  metadataType: number;
  title: string | null;
  parentId: number | null;
  itemIndex: number | null;
  addedAt: number | null;
  librarySectionTitle: string | null;
  filePath: string;
  viewedAt: number | null;
  viewOffset: number;
  lastViewedAt: number | null;
};

/**
 * Every playable (item, file) row with one account's view and playback state
 * folded in. Views and settings are pre-aggregated per guid so repeat views
 * do not multiply rows.
 */
export const ACCOUNT_ITEM_STATES_SQL = `
  SELECT
    mi.id AS itemId,
    mi.metadata_type AS metadataType,
    mi.title AS title,
    mi.parent_id AS parentId,
    mi."index" AS itemIndex,
    mi.added_at AS addedAt,
    ls.name AS librarySectionTitle,
    mp.file AS filePath,
    v.viewed_at AS viewedAt,
    COALESCE(s.view_offset, 0) AS viewOffset,
    s.last_viewed_at AS lastViewedAt
  FROM metadata_items mi
  JOIN library_sections ls ON ls.id = mi.library_section_id
  JOIN media_items med ON med.metadata_item_id = mi.id
  JOIN media_parts mp ON mp.media_item_id = med.id
  LEFT JOIN (
    SELECT guid, MAX(viewed_at) AS viewed_at
    FROM metadata_item_views
    WHERE account_id = @accountId AND viewed_at IS NOT NULL
    GROUP BY guid
  ) v ON v.guid = mi.guid
  LEFT JOIN (
    SELECT
      guid,
      MAX(view_offset) AS view_offset,
      MAX(last_viewed_at) AS last_viewed_at
    FROM metadata_item_settings
    WHERE account_id = @accountId
    GROUP BY guid
  ) s ON s.guid = mi.guid
  WHERE mp.file IS NOT NULL
    AND mp.file <> ''
    AND mi.metadata_type IN (1, 4)
    AND ls.section_type IN (1, 2)
  ORDER BY mi.id, mp.id
`;

export type WatchedFileRow = {
  itemId: number;
  metadataType: number;
  title: string | null;
  addedAt: number | null;
  librarySectionTitle: string | null;
  filePath: string;
  lastViewedAt: number | null;
};

/** Files of items any account has viewed, with the latest view across accounts. */
export const WATCHED_FILES_SQL = `
  SELECT
    mi.id AS itemId,
    mi.metadata_type AS metadataType,
    mi.title AS title,
    mi.added_at AS addedAt,
    ls.name AS librarySectionTitle,
    mp.file AS filePath,
    MAX(miv.viewed_at) AS lastViewedAt
  FROM metadata_items mi
  JOIN metadata_item_views miv ON miv.guid = mi.guid
  JOIN library_sections ls ON ls.id = mi.library_section_id
  JOIN media_items med ON med.metadata_item_id = mi.id
  JOIN media_parts mp ON mp.media_item_id = med.id
  WHERE miv.viewed_at IS NOT NULL
    AND mp.file IS NOT NULL
    AND mp.file <> ''
    AND mi.metadata_type IN (1, 4)
  GROUP BY mi.id, mp.file
  ORDER BY mi.id, mp.file
`;

export const METADATA_COUNT_SQL = 'SELECT COUNT(*) AS count FROM metadata_items';
