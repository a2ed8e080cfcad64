import type {
  ContinueWatchingEntry,
  ContinueWatchingStatus,
  PlexMediaKind,
} from '../plex/plex.types';

/** One (item, file) row as seen by a single account. */
export type AccountItemState = {
  itemId: string;
  kind: PlexMediaKind;
  title: string;
  /** Season id for episodes. */
  parentId: string | null;
  /** Episode number within the season. */
  index: number | null;
  librarySectionTitle: string | null;
  filePath: string;
  addedAt: number | null;
  /** Completed view by this account. */
  viewedAt: number | null;
  viewOffset: number;
  lastViewedAt: number | null;
};

type SeasonStats = {
  watched: number;
  nextIndex: number | null;
  lastActivityAt: number | null;
};

function maxOrNull(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.max(a, b);
}

function minOrNull(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.min(a, b);
}

function collectSeasonStats(
  rows: readonly AccountItemState[],
): Map<string, SeasonStats> {
  const seasons = new Map<string, SeasonStats>();
  for (const row of rows) {
    if (row.kind !== 'episode' || row.parentId === null) continue;
    const stats = seasons.get(row.parentId) ?? {
      watched: 0,
      nextIndex: null,
      lastActivityAt: null,
    };
    if (row.viewedAt !== null) {
      stats.watched += 1;
    } else {
      stats.nextIndex = minOrNull(stats.nextIndex, row.index);
    }
    stats.lastActivityAt = maxOrNull(
      stats.lastActivityAt,
      row.lastViewedAt ?? row.viewedAt,
    );
    seasons.set(row.parentId, stats);
  }
  return seasons;
}

function classify(
  row: AccountItemState,
  season: SeasonStats | undefined,
): ContinueWatchingStatus | null {
  if (row.viewOffset > 0) return 'partial';
  if (
    row.kind === 'episode' &&
    row.viewedAt === null &&
    season !== undefined &&
    season.watched > 0 &&
    row.index !== null &&
    row.index === season.nextIndex
  ) {
    return 'nextUnwatched';
  }
  return null;
}

export function compareContinueWatching(
  a: ContinueWatchingEntry,
  b: ContinueWatchingEntry,
): number {
  if (a.sortTime !== b.sortTime) {
    if (a.sortTime === null) return 1;
    if (b.sortTime === null) return -1;
    return b.sortTime - a.sortTime;
  }
  if (a.itemId !== b.itemId) {
    return a.itemId.localeCompare(b.itemId, undefined, { numeric: true });
  }
  return a.filePath.localeCompare(b.filePath);
}

/**
 * Continue-watching entries for one account: in-progress items plus, per
 * started season, the lowest-numbered episode the account has not viewed.
 *
 * Episodes sort by the latest activity anywhere in their season; movies by
 * their own last view, falling back to when they were added. One entry per file.
 */
export function classifyContinueWatching(
  rows: readonly AccountItemState[],
): ContinueWatchingEntry[] {
  const seasons = collectSeasonStats(rows);
  const entries: ContinueWatchingEntry[] = [];

  for (const row of rows) {
    const season =
      row.parentId === null ? undefined : seasons.get(row.parentId);
    const status = classify(row, season);
    if (!status) continue;
    const sortTime =
      row.kind === 'episode'
        ? (season?.lastActivityAt ?? null)
        : (row.lastViewedAt ?? row.viewedAt ?? row.addedAt);
    entries.push({
      filePath: row.filePath,
      itemId: row.itemId,
      sortTime,
      status,
      kind: row.kind,
      title: row.title,
      librarySectionTitle: row.librarySectionTitle,
    });
  }

  entries.sort(compareContinueWatching);

  const seen = new Set<string>();
  return entries.filter((entry) => {
    if (seen.has(entry.filePath)) return false;
    seen.add(entry.filePath);
    return true;
  });
}
