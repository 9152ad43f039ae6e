import type { ProcessedDocument } from '../types';
import type { Reporter } from '../report';
import { createBasicRenderer } from './basic';
import { createStyledRenderer } from './styled';
import type { StyledEngine } from '../env';

export type RendererKind = 'basic' | 'styled';

/** Turns an ordered list of sections into one PDF. */
export interface DocumentRenderer {
  readonly kind: RendererKind;
  render(sections: readonly ProcessedDocument[]): Promise<Uint8Array>;
}

export interface RendererOptions {
  reporter?: Reporter;
  /** Basic: directory with DejaVuSans.ttf / DejaVuSans-Bold.ttf */
  fontDir?: string;
  /** Styled: theme stylesheet path */
  stylesheetPath?: string;
  /** Styled: HTML-to-PDF engine */
  engine?: StyledEngine;
  engineBin?: string;
}

export function createRenderer(kind: RendererKind, opts: RendererOptions = {}): DocumentRenderer {
  if (kind === 'styled') {
    return createStyledRenderer({
      stylesheetPath: opts.stylesheetPath,
      engine: opts.engine,
      engineBin: opts.engineBin,
    });
  }
  return createBasicRenderer({ fontDir: opts.fontDir, reporter: opts.reporter });
}

export { createBasicRenderer, createStyledRenderer };
