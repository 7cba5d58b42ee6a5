import { createHash } from "node:crypto";

const VIDEO_ID_PATTERNS = [
  /(?:youtube\.com\/watch\?.*v=|youtu\.be\/)([a-zA-Z0-9_-]{11})/,
  /youtube\.com\/embed\/([a-zA-Z0-9_-]{11})/,
  /youtube\.com\/shorts\/([a-zA-Z0-9_-]{11})/,
];

/** Video id from watch, youtu.be, embed and shorts URLs; null for anything else. */
export function extractYoutubeVideoId(url: string): string | null {
  for (const pattern of VIDEO_ID_PATTERNS) {
    const match = url.match(pattern);
    if (match?.[1]) return match[1];
  }
  return null;
}

/**
 * URL the fingerprint is computed from. Every YouTube URL form collapses to the
 * watch URL; other URLs are only trimmed.
 */
export function canonicalSourceUrl(url: string): string {
  const videoId = extractYoutubeVideoId(url);
  return videoId ? `https://www.youtube.com/watch?v=${videoId}` : url.trim();
}

/** SHA-256 hex digest of the URL, the join key between a source, its transcript and its articles. */
export function contentIdForUrl(url: string): string {
  return createHash("sha256").update(url, "utf8").digest("hex");
}

export function contentIdForSource(url: string): string {
  return contentIdForUrl(canonicalSourceUrl(url));
}
