import { ENV, type AssemblyMode } from './env';
import type { ProcessedDocument, RenderedDocument, TranscriptFragment, VideoSummary } from './types';
import { assembleTranscript } from './assemble';
import {
  errorMessage,
  NoTranscriptFoundError,
  ResourceMissingError,
  StyledRenderError,
  TranscriptsDisabledError,
} from './errors';
import { TITLE_PREFIX } from './markup';
import { FORMATS, loadPrompt, type FormatId, type OutputFormat } from './formats';
import { createRenderer, type DocumentRenderer, type RendererKind, type RendererOptions } from './render';
import { REWRITE_ERROR_PREFIX, rewrite } from './rewrite';
import { sleep } from './retry';
import { reporterFor, type SessionContext } from './session';
import type { Reporter } from './report';
import { fetchTranscript } from './transcript';
import { DEFAULT_MAX_VIDEOS, findRecentVideos, type LookupResult } from './youtube';
import { startStep, warn } from './log';

export const OUTPUT_FILENAME = 'tubescribe_output.pdf';
export const OUTPUT_MIME = 'application/pdf';

/** Everything the batch run reaches outside this process, swappable in tests. */
export interface PipelineDeps {
  findRecentVideos: (apiKey: string, channelName: string, maxCount: number) => Promise<LookupResult>;
  fetchTranscript: (videoId: string) => Promise<TranscriptFragment[]>;
  rewrite: (text: string, instructionPrompt: string, apiKey: string) => Promise<string>;
  loadPrompt: (format: OutputFormat) => Promise<string | null>;
  createRenderer: (kind: RendererKind, opts: RendererOptions) => DocumentRenderer;
  sleep: (ms: number) => Promise<void>;
  youtubeApiKey: string;
  geminiApiKey: string;
  fetchDelayMs: number;
  assemblyMode: AssemblyMode;
  fontDir?: string;
}

export function defaultDeps(): PipelineDeps {
  return {
    findRecentVideos: (apiKey, channelName, maxCount) => findRecentVideos(apiKey, channelName, maxCount),
    fetchTranscript: (videoId) => fetchTranscript(videoId, { language: ENV.transcriptLanguage }),
    rewrite: (text, prompt, apiKey) => rewrite(text, prompt, apiKey),
    loadPrompt: (format) => loadPrompt(format),
    createRenderer,
    sleep,
    youtubeApiKey: ENV.youtubeApiKey,
    geminiApiKey: ENV.geminiApiKey,
    fetchDelayMs: ENV.fetchDelayMs,
    assemblyMode: ENV.assemblyMode,
    fontDir: ENV.pdfFontDir || undefined,
  };
}

/**
 * Step 1: look the channel up. Replaces the whole session.
 */
export async function searchChannel(
  ctx: SessionContext,
  deps: PipelineDeps,
  channelName: string,
  maxCount = DEFAULT_MAX_VIDEOS
): Promise<VideoSummary[]> {
  ctx.videos = [];
  ctx.lastDocument = null;
  ctx.messages = [];
  const reporter = reporterFor(ctx);

  const name = channelName.trim();
  if (!name) {
    reporter.warning('Please enter a channel name.');
    return [];
  }

  const result = await deps.findRecentVideos(deps.youtubeApiKey, name, maxCount);
  if (result.error) reporter.error(result.error);
  ctx.videos = result.videos;
  if (ctx.videos.length === 0) {
    reporter.warning('No videos found. Try a different channel name.');
  }
  return ctx.videos;
}

/**
 * Picks videos by id or by 1-based position in `videos`. Unknown selectors
 * are returned separately so the caller can report them.
 */
export function selectVideos(
  videos: readonly VideoSummary[],
  selectors: readonly string[]
): { selected: VideoSummary[]; unknown: string[] } {
  const selected: VideoSummary[] = [];
  const unknown: string[] = [];
  for (const raw of selectors) {
    const sel = raw.trim();
    if (!sel) continue;
    const byId = videos.find((v) => v.videoId === sel);
    const index = /^\d+$/.test(sel) ? Number(sel) - 1 : -1;
    const video = byId ?? (index >= 0 ? videos[index] : undefined);
    if (!video) {
      unknown.push(sel);
    } else if (!selected.includes(video)) {
      selected.push(video);
    }
  }
  return { selected, unknown };
}

interface FetchedTranscript {
  video: VideoSummary;
  fragments: TranscriptFragment[];
}

/**
 * Sequential fetch with a fixed pause after every call. A failed video is
 * reported and skipped; the rest still run.
 */
export async function fetchTranscripts(
  selection: readonly VideoSummary[],
  deps: PipelineDeps,
  reporter: Reporter
): Promise<FetchedTranscript[]> {
  const timer = startStep('transcripts.fetch', { videos: selection.length });
  const fetched: FetchedTranscript[] = [];
  for (const [i, video] of selection.entries()) {
    try {
      const fragments = await deps.fetchTranscript(video.videoId);
      fetched.push({ video, fragments });
      reporter.success(`Got transcript for: ${video.title}`);
    } catch (e) {
      warn('transcript.fetch.fail', { videoId: video.videoId, error: errorMessage(e) });
      if (e instanceof TranscriptsDisabledError) {
        reporter.warning(`Transcripts are disabled for: ${video.title}`);
      } else if (e instanceof NoTranscriptFoundError) {
        reporter.warning(`No transcript found for: ${video.title}`);
      } else {
        reporter.error(`Error fetching transcript for ${video.title}: ${errorMessage(e)}`);
      }
    }
    timer.eta(i + 1, selection.length);
    await deps.sleep(deps.fetchDelayMs);
  }
  timer.end({ fetched: fetched.length });
  return fetched;
}

/**
 * Steps 2-4: transcripts, optional rewrite, one PDF. Returns the document, or
 * null when nothing could be produced. Missing resources and styled render
 * failures are reported and rethrown: they end the whole batch.
 */
export async function runBatch(
  ctx: SessionContext,
  deps: PipelineDeps,
  selection: readonly VideoSummary[],
  formatId: FormatId
): Promise<RenderedDocument | null> {
  ctx.lastDocument = null;
  ctx.messages = [];
  const reporter = reporterFor(ctx);

  if (selection.length === 0) {
    reporter.warning('Please select at least one video.');
    return null;
  }

  const format = FORMATS[formatId];
  const timer = startStep('batch', { format: format.id, videos: selection.length });
  try {
    const prompt = await deps.loadPrompt(format);
    const fetched = await fetchTranscripts(selection, deps, reporter);

    const processed: ProcessedDocument[] = [];
    for (const { video, fragments } of fetched) {
      const original = assembleTranscript(fragments, deps.assemblyMode);
      let content = original;
      if (prompt !== null) {
        reporter.info(`Running '${format.label}' model on: ${video.title}...`);
        content = await deps.rewrite(original, prompt, deps.geminiApiKey);
        if (content.startsWith(REWRITE_ERROR_PREFIX)) {
          reporter.warning(`Model rewrite failed for: ${video.title}`);
        }
      }
      processed.push({ title: `${TITLE_PREFIX}${video.title}`, content });
    }

    if (processed.length === 0) {
      reporter.error('Could not process any transcripts.');
      timer.end({ produced: false });
      return null;
    }

    reporter.info(`Generating ${format.renderer} PDF...`);
    const renderer = deps.createRenderer(format.renderer, { reporter, fontDir: deps.fontDir });
    const bytes = await renderer.render(processed);
    if (bytes.length === 0) {
      reporter.error('Could not generate PDF data.');
      timer.end({ produced: false });
      return null;
    }

    ctx.lastDocument = { filename: OUTPUT_FILENAME, mimeType: OUTPUT_MIME, bytes };
    reporter.success('All transcripts processed and PDF is ready!');
    timer.end({ produced: true, bytes: bytes.length });
    return ctx.lastDocument;
  } catch (e) {
    if (e instanceof ResourceMissingError || e instanceof StyledRenderError) {
      reporter.error(e.message);
    } else {
      reporter.error(`Batch failed: ${errorMessage(e)}`);
    }
    timer.end({ produced: false, failed: true });
    throw e;
  }
}
