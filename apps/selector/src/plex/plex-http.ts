import { BadGatewayException, Logger } from '@nestjs/common';
import { errorMessage } from '../app.errors';
import { plexXmlParser, sanitizeUrlForLogs } from './plex-xml.utils';

export async function fetchPlexXml(params: {
  url: string;
  token: string;
  timeoutMs: number;
  logger: Logger;
  headers?: Record<string, string>;
}): Promise<unknown> {
  const { url, token, timeoutMs, logger } = params;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  const safeUrl = sanitizeUrlForLogs(url);
  const startedAt = Date.now();

  try {
    const res = await fetch(url, {
      method: 'GET',
      headers: {
        ...params.headers,
        Accept: 'application/xml',
        'X-Plex-Token': token,
      },
      signal: controller.signal,
    });

    const text = await res.text().catch(() => '');
    const ms = Date.now() - startedAt;

    if (!res.ok) {
      logger.warn(
        `Plex HTTP GET ${safeUrl} -> ${res.status} (${ms}ms) ${text}`.trim(),
      );
      throw new BadGatewayException(
        `Plex request failed: HTTP ${res.status}`,
      );
    }

    logger.debug(`Plex HTTP GET ${safeUrl} -> ${res.status} (${ms}ms)`);
    const parsed: unknown = plexXmlParser.parse(text);
    return parsed;
  } catch (err) {
    if (err instanceof BadGatewayException) throw err;
    const ms = Date.now() - startedAt;
    logger.warn(
      `Plex HTTP GET ${safeUrl} -> FAILED (${ms}ms): ${errorMessage(err)}`,
    );
    throw new BadGatewayException(`Plex request failed: ${errorMessage(err)}`);
  } finally {
    clearTimeout(timeout);
  }
}
