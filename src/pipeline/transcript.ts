import ky, { type KyInstance, type Options as KyOptions } from 'ky';
import type { TranscriptFragment } from './types';
import {
  errorMessage,
  NoTranscriptFoundError,
  TranscriptFetchError,
  TranscriptsDisabledError,
} from './errors';
import { toVideoId } from './ids';
import { debug } from './log';

const BROWSER_UA =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export interface FetchTranscriptOptions {
  /** Caption language to require; the first track when unset. */
  language?: string;
  timeout?: number;
  /** Injected in tests */
  fetch?: typeof fetch;
}

type CaptionTrack = {
  baseUrl: string;
  languageCode?: string;
};

type PlayerResponse = {
  playabilityStatus?: { status?: string; reason?: string };
  captions?: {
    playerCaptionsTracklistRenderer?: { captionTracks?: CaptionTrack[] };
  };
};

function createHttp(opts: FetchTranscriptOptions): KyInstance {
  const kyOptions: KyOptions = {
    timeout: opts.timeout ?? 30000,
    retry: 0,
    throwHttpErrors: false,
    headers: { 'User-Agent': BROWSER_UA },
  };
  if (opts.fetch) {
    kyOptions.fetch = opts.fetch;
  }
  return ky.create(kyOptions);
}

async function getText(http: KyInstance, videoId: string, url: string, what: string): Promise<string> {
  let res: Response;
  try {
    res = await http.get(url);
  } catch (e) {
    throw new TranscriptFetchError(videoId, `${what} request failed: ${errorMessage(e)}`);
  }
  if (!res.ok) {
    throw new TranscriptFetchError(videoId, `${what} fetch failed: ${res.status}`, res.status);
  }
  return res.text();
}

/**
 * Caption fragments for one video, scraped from the watch page's player
 * response and the timedtext track it points at.
 *
 * Throws TranscriptsDisabledError, NoTranscriptFoundError or
 * TranscriptFetchError so callers can report each case separately.
 */
export async function fetchTranscript(
  videoOrUrl: string,
  opts: FetchTranscriptOptions = {}
): Promise<TranscriptFragment[]> {
  const videoId = toVideoId(videoOrUrl);
  const http = createHttp(opts);

  const pageUrl = `https://www.youtube.com/watch?v=${encodeURIComponent(videoId)}`;
  const html = await getText(http, videoId, pageUrl, 'Watch page');

  const player = extractPlayerResponse(html);
  if (!player) {
    throw new TranscriptFetchError(videoId, 'Could not find ytInitialPlayerResponse in page');
  }
  if (player.playabilityStatus?.status === 'ERROR') {
    throw new TranscriptFetchError(
      videoId,
      `Video unavailable: ${player.playabilityStatus.reason ?? 'unknown reason'}`
    );
  }

  const renderer = player.captions?.playerCaptionsTracklistRenderer;
  if (!renderer) {
    throw new TranscriptsDisabledError(videoId);
  }
  const tracks = renderer.captionTracks ?? [];
  if (tracks.length === 0) {
    throw new NoTranscriptFoundError(videoId, 'no caption tracks available');
  }

  const track = opts.language ? tracks.find((t) => t.languageCode === opts.language) : tracks[0];
  if (!track) {
    throw new NoTranscriptFoundError(videoId, `no caption track in language '${opts.language}'`);
  }
  debug('transcript.track', { videoId, language: track.languageCode });
  const xml = await getText(http, videoId, track.baseUrl, 'Timedtext');

  const fragments = parseTimedText(xml);
  if (fragments.length === 0) {
    throw new NoTranscriptFoundError(videoId, 'caption track is empty');
  }
  return fragments;
}

export function extractPlayerResponse(html: string): PlayerResponse | null {
  const marker = 'var ytInitialPlayerResponse = ';
  const start = html.indexOf(marker);
  if (start === -1) return null;

  const jsonStart = start + marker.length;
  let depth = 0;
  let inString = false;
  let end = -1;
  for (let i = jsonStart; i < html.length; i++) {
    const ch = html[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) {
        end = i + 1;
        break;
      }
    }
  }

  if (end === -1) return null;
  try {
    const parsed: unknown = JSON.parse(html.slice(jsonStart, end));
    return typeof parsed === 'object' && parsed !== null ? parsed : null;
  } catch {
    return null;
  }
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

function decodeEntities(s: string): string {
  return s.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, ent: string) => {
    if (ent[0] !== '#') return NAMED_ENTITIES[ent.toLowerCase()] ?? match;
    const hex = ent[1] === 'x' || ent[1] === 'X';
    const code = parseInt(ent.slice(hex ? 2 : 1), hex ? 16 : 10);
    return code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : match;
  });
}

// Timedtext bodies are escaped twice: "&amp;#39;" is an apostrophe
function htmlDecode(s: string): string {
  return decodeEntities(decodeEntities(s));
}

export function parseTimedText(xml: string): TranscriptFragment[] {
  const fragments: TranscriptFragment[] = [];
  const re = /<text\s+start="([\d.]+)"\s+dur="([\d.]+)"[^>]*>([\s\S]*?)<\/text>/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(xml)) !== null) {
    fragments.push({
      text: htmlDecode(m[3]),
      startSec: Number(m[1]),
      durationSec: Number(m[2]),
    });
  }
  return fragments;
}
