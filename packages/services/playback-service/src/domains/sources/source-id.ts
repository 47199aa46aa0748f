import { PlaybackError } from '../../application/errors';

export const FILE_SCHEME = 'file:';

const VIDEO_ID_RE =
  /^(?:https?:\/\/)?(?:(?:www|music)\.)?(?:youtube\.com\/(?:watch\?(?:.*&)?v=|embed\/|shorts\/)|youtu\.be\/)(?<id>[A-Za-z0-9_-]{11})/;

const MEDIA_URL_RE =
  /^(?:https?:\/\/)?(?:(?:www|music)\.)?(?:youtube\.com\/(?:watch\?(?:.*&)?v=|embed\/|shorts\/|playlist\/)|youtu\.be\/)[A-Za-z0-9_-]{11}/;

const PLAYLIST_URL_RE =
  /^(?:https?:\/\/)?(?:(?:www|music)\.)?(?:youtube\.com\/(?:playlist\?list=|watch\?(?:.*&)?list=|embed\/videoseries\?list=)|youtu\.be\/[A-Za-z0-9_-]{11}\?(?:.*&)?list=)(?<playlistId>[A-Za-z0-9_-]+)(?:[&?].*)?$/;

export type SourceRef = { kind: 'media'; url: string; videoId?: string } | { kind: 'file'; path: string };

export function isMediaUrl(value: string): boolean {
  return MEDIA_URL_RE.test(value);
}

export function getVideoId(value: string): string | undefined {
  return VIDEO_ID_RE.exec(value)?.groups?.id;
}

/** True for playlist links that carry a non-empty `list` query parameter. */
export function isPlaylistUrl(value: string): boolean {
  if (!PLAYLIST_URL_RE.test(value)) return false;
  const withScheme = /^https?:\/\//.test(value) ? value : `https://${value}`;
  try {
    return Boolean(new URL(withScheme).searchParams.get('list'));
  } catch {
    return false;
  }
}

export function fileSource(filePath: string): string {
  return `${FILE_SCHEME}${filePath}`;
}

export function isFileSource(sourceId: string): boolean {
  return sourceId.startsWith(FILE_SCHEME);
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Classify a source id. Accepts `file:` paths, recognised media links (scheme
 * optional) and any other http(s) URL; everything else is rejected.
 */
export function parseSourceId(raw: string): SourceRef {
  const sourceId = raw.trim();
  if (sourceId.length === 0) {
    throw PlaybackError.invalidSource(raw, 'source id is empty');
  }

  if (isFileSource(sourceId)) {
    const filePath = sourceId.slice(FILE_SCHEME.length);
    if (filePath.length === 0) {
      throw PlaybackError.invalidSource(raw, 'file source has no path');
    }
    return { kind: 'file', path: filePath };
  }

  if (isMediaUrl(sourceId) || isHttpUrl(sourceId)) {
    return { kind: 'media', url: sourceId, videoId: getVideoId(sourceId) };
  }

  throw PlaybackError.invalidSource(raw, 'expected a media URL or a file: path');
}
