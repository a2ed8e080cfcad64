import type { LibraryFilter } from './plex.types';

function toNameSet(names: readonly string[]): Set<string> {
  const out = new Set<string>();
  for (const raw of names) {
    const name = raw.trim();
    if (name) out.add(name);
  }
  return out;
}

/**
 * Both lists are name-based allow-lists applied independently: an empty list
 * admits everything, a non-empty list admits only its members.
 */
export function createLibraryFilter(params: {
  include: readonly string[];
  only: readonly string[];
}): LibraryFilter {
  const include = toNameSet(params.include);
  const only = toNameSet(params.only);
  return {
    allows(librarySectionTitle) {
      const title = librarySectionTitle ?? '';
      if (include.size && !include.has(title)) return false;
      if (only.size && !only.has(title)) return false;
      return true;
    },
  };
}

export const ALL_LIBRARIES: LibraryFilter = createLibraryFilter({
  include: [],
  only: [],
});
