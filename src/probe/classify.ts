import { StreamKind } from './types';

export const STREAM_CONTENT_TYPES: readonly string[] = [
  'audio/mpeg',
  'audio/mp3',
  'audio/aac',
  'audio/aacp',
  'audio/ogg',
  'audio/opus',
  'audio/flac',
  'audio/wav',
  'audio/x-wav',
  'audio/wave',
  'audio/vnd.wave',
  'audio/mp4',
  'audio/x-m4a',
  'audio/webm',
  'video/mp4',
  'video/webm',
  'video/ogg',
  'video/x-flv',
  'video/mp2t',
  'video/3gpp',
  'video/quicktime',
  'application/vnd.apple.mpegurl',
  'application/x-mpegurl',
  'application/dash+xml',
  'application/octet-stream'
];

const PLAYLIST_EXTENSIONS = new Set(['.m3u', '.m3u8', '.pls', '.asx', '.xspf']);
const AUDIO_EXTENSIONS = new Set(['.mp3', '.aac', '.ogg', '.flac', '.wav', '.m4a']);
const VIDEO_EXTENSIONS = new Set(['.mp4', '.webm', '.flv', '.ts']);

const ICY_HEADERS = ['icy-name', 'icy-metaint'];

function extensionFromPath(pathname: string): string {
  const lastSegment = pathname.slice(pathname.lastIndexOf('/') + 1);
  const index = lastSegment.lastIndexOf('.');
  if (index < 0) {
    return '';
  }
  return lastSegment.slice(index).toLowerCase();
}

/**
 * Advisory kind guess from the URL path. `.asx` and `.xspf` are recognised
 * playlists with no dedicated kind, so they give no hint.
 */
export function kindFromExtension(url: URL): StreamKind | null {
  const extension = extensionFromPath(url.pathname);
  if (!extension) {
    return null;
  }

  if (PLAYLIST_EXTENSIONS.has(extension)) {
    if (extension === '.m3u' || extension === '.m3u8') return 'hls-playlist';
    if (extension === '.pls') return 'pls-playlist';
    return null;
  }

  if (AUDIO_EXTENSIONS.has(extension)) return 'audio';
  if (VIDEO_EXTENSIONS.has(extension)) return 'video';

  return null;
}

export function isStreamContentType(contentType: string): boolean {
  return STREAM_CONTENT_TYPES.some((known) => contentType.includes(known));
}

export function categorizeContentType(contentType: string): StreamKind {
  if (contentType.includes('audio')) return 'audio';
  if (contentType.includes('video')) return 'video';
  if (contentType.includes('mpegurl') || contentType.includes('m3u')) return 'hls-playlist';
  if (contentType.includes('dash')) return 'dash';
  return 'unknown';
}

export function hasIcyHeaders(headers: Headers): boolean {
  return ICY_HEADERS.some((name) => headers.has(name));
}
