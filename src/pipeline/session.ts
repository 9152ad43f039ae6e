import type { RenderedDocument, VideoSummary } from './types';
import { collectingReporter, type Reporter, type UserMessage } from './report';

/**
 * Request/response state for one user: the last channel lookup, the last
 * document and the messages produced along the way. Each search or run
 * replaces what it owns instead of patching it.
 */
export interface SessionContext {
  videos: VideoSummary[];
  lastDocument: RenderedDocument | null;
  messages: UserMessage[];
}

export function createSession(): SessionContext {
  return { videos: [], lastDocument: null, messages: [] };
}

export function reporterFor(ctx: SessionContext): Reporter {
  return collectingReporter(ctx.messages);
}
