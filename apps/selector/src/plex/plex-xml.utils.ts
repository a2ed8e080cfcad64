import { XMLParser } from 'fast-xml-parser';
import type { PlexMediaKind } from './plex.types';

// Attributes arrive already typed by parseAttributeValue (numbers, booleans, strings).
export type PlexMetadata = Record<string, unknown>;

export const plexXmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  parseAttributeValue: true,
  allowBooleanAttributes: true,
  processEntities: false,
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function asObjectArray(value: unknown): Record<string, unknown>[] {
  const items: unknown[] = Array.isArray(value) ? value : [value];
  return items.filter(isPlainObject);
}

export function mediaContainerOf(
  value: unknown,
): Record<string, unknown> | undefined {
  if (!isPlainObject(value)) return undefined;
  const container = value.MediaContainer;
  return isPlainObject(container) ? container : undefined;
}

export function asPlexMetadataArray(
  container: Record<string, unknown> | undefined,
): PlexMetadata[] {
  // Element names differ per endpoint:
  // - /library/onDeck, /status/sessions => Video
  // - /library/sections/:id/all => Video (movies, episodes) or Directory (shows)
  // - discover watchlist => Metadata or Directory
  const items =
    container?.Metadata ?? container?.Video ?? container?.Directory ?? [];
  return asObjectArray(items);
}

export function toStringSafe(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean')
    return String(value);
  return '';
}

export function toInt(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value))
    return Math.trunc(value);
  if (typeof value === 'string' && value.trim()) {
    const n = Number.parseInt(value.trim(), 10);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function toMediaKind(value: unknown): PlexMediaKind | null {
  return value === 'movie' || value === 'episode' ? value : null;
}

/** `Part@file` values of every `Media` element, in document order. */
export function extractPartFiles(item: PlexMetadata): string[] {
  const files: string[] = [];
  for (const media of asObjectArray(item.Media ?? [])) {
    for (const part of asObjectArray(media.Part ?? [])) {
      const file = toStringSafe(part.file).trim();
      if (file) files.push(file);
    }
  }
  return files;
}

export function describeItem(item: PlexMetadata): string {
  const title = toStringSafe(item.title);
  if (item.type !== 'episode') return title;
  const show = toStringSafe(item.grandparentTitle);
  const season = toInt(item.parentIndex);
  const episode = toInt(item.index);
  return `${show} (S${season ?? '?'}E${episode ?? '?'}) ${title}`.trim();
}

export function normalizeBaseUrl(baseUrl: string) {
  return baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
}

export function sanitizeUrlForLogs(raw: string): string {
  try {
    const u = new URL(raw);
    // Never log credentials if the base URL carries user:pass@host.
    u.username = '';
    u.password = '';
    for (const k of ['X-Plex-Token', 'x-plex-token', 'token', 'authToken']) {
      if (u.searchParams.has(k)) u.searchParams.set(k, 'REDACTED');
    }
    return u.toString();
  } catch {
    return raw;
  }
}
