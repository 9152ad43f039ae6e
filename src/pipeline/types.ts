/** One timed caption line as delivered by the transcript source. */
export interface TranscriptFragment {
  readonly text: string;
  readonly startSec: number;
  readonly durationSec: number;
}

export interface VideoSummary {
  videoId: string;
  title: string;
}

/** One video's transcript after paragraph assembly. */
export interface AssembledTranscript {
  title: string;
  body: string;
}

/**
 * A section ready for rendering. `content` is either the assembled transcript
 * or model output with loose heading/list markers.
 */
export interface ProcessedDocument {
  title: string;
  content: string;
}

/** Output of markup reconstruction; `markupBody` is Markdown. */
export interface RenderableSection {
  heading: string;
  markupBody: string;
}

export interface RenderedDocument {
  filename: string;
  mimeType: string;
  bytes: Uint8Array;
}
