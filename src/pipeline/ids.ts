export function toVideoId(videoOrUrl: string): string {
  // Extracts a YouTube video ID from a watch/short/embed URL or returns the input as-is
  const trimmed = videoOrUrl.trim();
  const urlMatch = trimmed.match(/[?&]v=([a-zA-Z0-9_-]{6,})/);
  if (urlMatch) return urlMatch[1];
  const short = trimmed.match(/youtu\.be\/([a-zA-Z0-9_-]{6,})/);
  if (short) return short[1];
  const path = trimmed.match(/youtube\.com\/(?:shorts|embed|live)\/([a-zA-Z0-9_-]{6,})/);
  if (path) return path[1];
  return trimmed;
}
