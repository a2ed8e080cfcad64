import { Inject, Injectable, Logger } from '@nestjs/common';
import { PLEX_ADMIN_ACCOUNT_ID, SELECTOR_SETTINGS } from '../app.constants';
import {
  SelectorConfigError,
  SelectorConnectionError,
  errorMessage,
} from '../app.errors';
import { PlexServerService } from '../plex/plex-server.service';
import { PlexWatchlistService } from '../plex/plex-watchlist.service';
import type {
  ContinueWatchingEntry,
  LibraryFile,
  LibraryFilter,
  PlexAccount,
  WatchedFile,
} from '../plex/plex.types';
import {
  describeItem,
  extractPartFiles,
  toInt,
  toMediaKind,
  toStringSafe,
  type PlexMetadata,
} from '../plex/plex-xml.utils';
import type { SelectorSettings } from '../settings/selector-settings';
import type { MediaBackend } from './media-backend';

function librarySectionTitleOf(item: PlexMetadata): string | null {
  return toStringSafe(item.librarySectionTitle).trim() || null;
}

function toLibraryFiles(item: PlexMetadata): LibraryFile[] {
  const kind = toMediaKind(item.type);
  const itemId = toStringSafe(item.ratingKey).trim();
  if (!kind || !itemId) return [];
  return extractPartFiles(item).map((filePath) => ({
    filePath,
    itemId,
    kind,
    title: describeItem(item),
    librarySectionTitle: librarySectionTitleOf(item),
  }));
}

/**
 * Live backend over the Plex Media Server HTTP API. Everything it sees is
 * scoped to the account that owns PLEX_TOKEN.
 */
@Injectable()
export class PlexApiBackend implements MediaBackend {
  readonly label = 'plex-api';
  private readonly logger = new Logger(PlexApiBackend.name);

  constructor(
    @Inject(SELECTOR_SETTINGS) private readonly settings: SelectorSettings,
    private readonly plexServer: PlexServerService,
    private readonly plexWatchlist: PlexWatchlistService,
  ) {}

  private get connection(): { baseUrl: string; token: string } {
    const { baseUrl, token } = this.settings.plex;
    if (!baseUrl || !token) {
      throw new SelectorConfigError('PLEX_BASEURL and PLEX_TOKEN required');
    }
    return { baseUrl, token };
  }

  async connect(): Promise<void> {
    const connection = this.connection;
    try {
      const machineId = await this.plexServer.getMachineIdentifier(connection);
      this.logger.log(`Connected to Plex server ${machineId}`);
    } catch (err) {
      throw new SelectorConnectionError(
        `plex connect failed: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  close(): void {
    // Requests hold no connection between calls.
  }

  async listAccounts(): Promise<PlexAccount[]> {
    let name = 'owner';
    try {
      const accounts = await this.plexServer.listAccounts(this.connection);
      const owner = accounts.find((a) => a.id === PLEX_ADMIN_ACCOUNT_ID);
      if (owner) name = owner.name;
    } catch (err) {
      this.logger.warn(`Plex account list unavailable: ${errorMessage(err)}`);
    }
    // The on-deck hub only reflects the token owner, so that is the one account queried.
    return [{ id: PLEX_ADMIN_ACCOUNT_ID, name, lastActivityAt: null }];
  }

  async queryContinueWatching(
    account: PlexAccount,
    libraries: LibraryFilter,
  ): Promise<ContinueWatchingEntry[]> {
    const items = await this.plexServer.getOnDeck(this.connection);
    const out: ContinueWatchingEntry[] = [];
    const seen = new Set<string>();

    for (const item of items) {
      if (!libraries.allows(librarySectionTitleOf(item))) continue;
      const viewOffset = toInt(item.viewOffset) ?? 0;
      const sortTime = toInt(item.lastViewedAt) ?? toInt(item.addedAt);
      for (const file of toLibraryFiles(item)) {
        if (seen.has(file.filePath)) continue;
        seen.add(file.filePath);
        const status = viewOffset > 0 ? 'partial' : 'nextUnwatched';
        out.push({ ...file, sortTime, status });
        this.logger.debug(
          `[${account.name}] ${file.title} (${status}) - ${file.filePath}`,
        );
      }
    }
    return out;
  }

  async listPlayingFiles(): Promise<Set<string>> {
    const sessions = await this.plexServer.getSessions(this.connection);
    const playing = new Set<string>();
    for (const session of sessions) {
      for (const file of extractPartFiles(session)) playing.add(file);
    }
    return playing;
  }

  async listWatchlistFiles(params: {
    limit: number;
    libraries: LibraryFilter;
  }): Promise<LibraryFile[]> {
    const { token } = this.connection;
    const entries = await this.plexWatchlist.listWatchlist({
      token,
      limit: params.limit,
    });

    const out: LibraryFile[] = [];
    for (const entry of entries) {
      let matches: PlexMetadata[];
      try {
        matches = await this.plexServer.findItemsByGuid({
          ...this.connection,
          guid: entry.guid,
        });
      } catch (err) {
        this.logger.warn(
          `Watchlist lookup failed for "${entry.title}": ${errorMessage(err)}`,
        );
        continue;
      }
      const files = matches
        .filter((item) => params.libraries.allows(librarySectionTitleOf(item)))
        .flatMap(toLibraryFiles);
      if (!files.length) {
        this.logger.debug(`Watchlist "${entry.title}" has no local file`);
      }
      out.push(...files);
    }
    return out;
  }

  async listWatchedFiles(libraries: LibraryFilter): Promise<WatchedFile[]> {
    const sections = await this.plexServer.getSections(this.connection);
    const out: WatchedFile[] = [];

    for (const section of sections) {
      if (!libraries.allows(section.title)) continue;
      let items: PlexMetadata[];
      try {
        items = await this.plexServer.listPlayableItems({
          ...this.connection,
          section,
        });
      } catch (err) {
        this.logger.warn(
          `Skipping library "${section.title}": ${errorMessage(err)}`,
        );
        continue;
      }
      for (const item of items) {
        if ((toInt(item.viewCount) ?? 0) < 1) continue;
        const addedAt = toInt(item.addedAt);
        const lastViewedAt = toInt(item.lastViewedAt);
        for (const file of toLibraryFiles(item)) {
          out.push({ ...file, addedAt, lastViewedAt });
        }
      }
    }
    return out;
  }
}
