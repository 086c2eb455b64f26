/**
 * Markers a URL must contain (at least one) to count as a download link.
 */
export const DEFAULT_VALIDITY_MARKERS: readonly string[] = [
  '.mp4',
  '.m3u8',
  '.mpd',
  '/media/',
  '/video/',
  'stream',
  'download',
];

/**
 * Markers that flag a captured network response as a likely video resource.
 */
export const CAPTURED_VIDEO_PATTERNS: readonly string[] = [
  '.mp4',
  '.m3u8',
  '.mpd',
  '/media/',
  '/video/',
  'stream',
];

/**
 * Embed fragments of known video hosts, matched against iframe sources.
 */
export const DEFAULT_EMBED_HOSTS: readonly string[] = [
  'youtube.com/embed',
  'player.vimeo.com',
  'dailymotion.com/embed',
  'streamable.com/e',
  'jwplayer',
  'brightcove',
  'vidyard',
  'wistia',
  'videojs',
];

const ALLOWED_SCHEMES = ['http://', 'https://'];

/**
 * Returns true when `value` contains at least one of `markers`.
 */
export function containsAny(value: string, markers: readonly string[]): boolean {
  return markers.some(marker => value.includes(marker));
}

/**
 * Decides whether a candidate string qualifies as a download URL:
 * an http(s) URL carrying at least one media or download marker.
 */
export function isValidDownloadUrl(
  candidate: string | null | undefined,
  markers: readonly string[] = DEFAULT_VALIDITY_MARKERS
): candidate is string {
  if (!candidate) {
    return false;
  }
  if (!ALLOWED_SCHEMES.some(scheme => candidate.startsWith(scheme))) {
    return false;
  }
  return containsAny(candidate, markers);
}

/**
 * Decides whether an iframe source points at a known video host.
 */
export function isEmbeddedVideoSource(
  src: string | null | undefined,
  hosts: readonly string[] = DEFAULT_EMBED_HOSTS
): src is string {
  if (!src) {
    return false;
  }
  return containsAny(src, hosts);
}
