import { BadGatewayException, Injectable, Logger } from '@nestjs/common';
import {
  PLEX_HTTP_LIBRARY_TIMEOUT_MS,
  PLEX_HTTP_TIMEOUT_MS,
  PLEX_METADATA_TYPE_EPISODE,
  PLEX_METADATA_TYPE_MOVIE,
} from '../app.constants';
import { fetchPlexXml } from './plex-http';
import type { PlexLibrarySection } from './plex.types';
import {
  asPlexMetadataArray,
  mediaContainerOf,
  normalizeBaseUrl,
  toInt,
  toStringSafe,
  type PlexMetadata,
} from './plex-xml.utils';

type PlexConnection = {
  baseUrl: string;
  token: string;
};

export type PlexServerAccount = {
  id: number;
  name: string;
};

@Injectable()
export class PlexServerService {
  private readonly logger = new Logger(PlexServerService.name);

  async getMachineIdentifier(params: PlexConnection): Promise<string> {
    const container = await this.getContainer(params, 'identity');
    const machineId = toStringSafe(container?.machineIdentifier).trim();
    if (!machineId) {
      throw new BadGatewayException(
        'Failed to read Plex machineIdentifier from /identity',
      );
    }
    return machineId;
  }

  async listAccounts(params: PlexConnection): Promise<PlexServerAccount[]> {
    const container = await this.getContainer(params, 'accounts');
    const out: PlexServerAccount[] = [];
    for (const raw of asPlexMetadataArray({ Metadata: container?.Account })) {
      const id = toInt(raw.id);
      if (id === null) continue;
      out.push({ id, name: toStringSafe(raw.name).trim() || `ID:${id}` });
    }
    return out;
  }

  async getSections(params: PlexConnection): Promise<PlexLibrarySection[]> {
    const container = await this.getContainer(params, 'library/sections');
    const out: PlexLibrarySection[] = [];
    for (const d of asPlexMetadataArray(container)) {
      const key = toStringSafe(d.key).trim();
      const title = toStringSafe(d.title).trim();
      const type = toStringSafe(d.type).trim();
      if (!key || !title) continue;
      if (type !== 'movie' && type !== 'show') continue;
      out.push({ key, title, type });
    }
    return out;
  }

  /** Continue-watching hub of the account that owns the token. */
  async getOnDeck(params: PlexConnection): Promise<PlexMetadata[]> {
    const container = await this.getContainer(params, 'library/onDeck');
    return asPlexMetadataArray(container);
  }

  async getSessions(params: PlexConnection): Promise<PlexMetadata[]> {
    const container = await this.getContainer(params, 'status/sessions');
    return asPlexMetadataArray(container);
  }

  /**
   * Playable items of a section: movies for movie libraries, episodes for show
   * libraries (shows and seasons carry no files).
   */
  async listPlayableItems(
    params: PlexConnection & { section: PlexLibrarySection },
  ): Promise<PlexMetadata[]> {
    const { section } = params;
    const type =
      section.type === 'movie'
        ? PLEX_METADATA_TYPE_MOVIE
        : PLEX_METADATA_TYPE_EPISODE;
    const container = await this.getContainer(
      params,
      `library/sections/${encodeURIComponent(section.key)}/all?type=${type}`,
      PLEX_HTTP_LIBRARY_TIMEOUT_MS,
    );
    return asPlexMetadataArray(container).map((item) => ({
      ...item,
      // Section listings carry the section title on the container only.
      librarySectionTitle: item.librarySectionTitle ?? section.title,
    }));
  }

  /** Local library items matching a global content guid (e.g. plex://movie/...). */
  async findItemsByGuid(
    params: PlexConnection & { guid: string },
  ): Promise<PlexMetadata[]> {
    const container = await this.getContainer(
      params,
      `library/all?guid=${encodeURIComponent(params.guid)}`,
    );
    return asPlexMetadataArray(container).map((item) => ({
      ...item,
      librarySectionTitle:
        item.librarySectionTitle ?? container?.librarySectionTitle,
    }));
  }

  private async getContainer(
    params: PlexConnection,
    path: string,
    timeoutMs = PLEX_HTTP_TIMEOUT_MS,
  ): Promise<Record<string, unknown> | undefined> {
    const url = new URL(path, normalizeBaseUrl(params.baseUrl)).toString();
    const xml = await fetchPlexXml({
      url,
      token: params.token,
      timeoutMs,
      logger: this.logger,
    });
    return mediaContainerOf(xml);
  }
}
