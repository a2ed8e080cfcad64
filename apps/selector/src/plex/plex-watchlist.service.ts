import { BadGatewayException, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { PLEX_HTTP_TIMEOUT_MS } from '../app.constants';
import { errorMessage } from '../app.errors';
import { fetchPlexXml } from './plex-http';
import {
  asPlexMetadataArray,
  mediaContainerOf,
  normalizeBaseUrl,
  toStringSafe,
} from './plex-xml.utils';

export type PlexWatchlistEntry = {
  guid: string;
  title: string;
};

const DISCOVER_BASES = [
  'https://discover.provider.plex.tv/',
  'https://metadata.provider.plex.tv/',
];

@Injectable()
export class PlexWatchlistService {
  private readonly logger = new Logger(PlexWatchlistService.name);
  private readonly clientIdentifier: string;

  constructor() {
    // Plex expects a stable-ish identifier per client.
    this.clientIdentifier = process.env.PLEX_CLIENT_IDENTIFIER ?? randomUUID();
  }

  /**
   * Watchlist of the account that owns the token, newest first as Plex returns it.
   * Entries describe wanted content; they are not necessarily in any local library.
   */
  async listWatchlist(params: {
    token: string;
    limit: number;
  }): Promise<PlexWatchlistEntry[]> {
    const { token, limit } = params;
    let lastErr: unknown = null;

    for (const base of DISCOVER_BASES) {
      const url = new URL(
        'library/sections/watchlist/all?includeGuids=1',
        normalizeBaseUrl(base),
      );
      if (limit > 0) {
        url.searchParams.set('X-Plex-Container-Start', '0');
        url.searchParams.set('X-Plex-Container-Size', String(limit));
      }
      try {
        const xml = await fetchPlexXml({
          url: url.toString(),
          token,
          timeoutMs: PLEX_HTTP_TIMEOUT_MS,
          logger: this.logger,
          headers: { 'X-Plex-Client-Identifier': this.clientIdentifier },
        });
        const entries = asPlexMetadataArray(mediaContainerOf(xml))
          .map((it) => ({
            guid: toStringSafe(it.guid).trim(),
            title: toStringSafe(it.title),
          }))
          .filter((it) => it.guid);
        return limit > 0 ? entries.slice(0, limit) : entries;
      } catch (err) {
        lastErr = err;
        this.logger.debug(
          `Watchlist fetch failed base=${base}: ${errorMessage(err)}`,
        );
      }
    }

    throw new BadGatewayException(
      `Failed to load Plex watchlist: ${errorMessage(lastErr)}`,
    );
  }
}
