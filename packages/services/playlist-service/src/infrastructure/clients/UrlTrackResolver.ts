/**
 * UrlTrackResolver
 * Turns a URL into an ad-hoc entry: stream protocols become radio entries,
 * everything else a plain URL entry titled after its last path segment.
 */

import { PlaylistError } from '../../application/errors';
import { getLogger } from '../../config/service-config';
import { TrackEntry, type IUrlResolver } from '../../domains/playlist';

const logger = getLogger('playlist-service-url-resolver');

const FILE_PROTOCOLS = new Set(['http:', 'https:', 'file:']);
const STREAM_PROTOCOLS = new Set(['mms:', 'mmsh:', 'rtsp:', 'rtmp:', 'icy:']);

function titleFromPath(url: URL): string {
  const segment = url.pathname.split('/').filter(Boolean).at(-1);
  if (!segment) return url.href;
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export class UrlTrackResolver implements IUrlResolver {
  async resolve(rawUrl: string): Promise<TrackEntry> {
    let url: URL;
    try {
      url = new URL(rawUrl);
    } catch (error) {
      throw PlaylistError.resolutionFailed(rawUrl, error instanceof Error ? error : undefined);
    }

    if (STREAM_PROTOCOLS.has(url.protocol)) {
      return TrackEntry.radio(url.host || url.href, url.href);
    }
    if (!FILE_PROTOCOLS.has(url.protocol)) {
      logger.debug('Unsupported URL protocol', { url: url.href, protocol: url.protocol });
      throw PlaylistError.resolutionFailed(url.href);
    }
    return TrackEntry.fromUrl(url.href, { title: titleFromPath(url) });
  }
}
