import fs from 'fs-extra';
import path from 'path';
import { jsPDF } from 'jspdf';
import type { ProcessedDocument } from '../types';
import type { DocumentRenderer } from './index';
import { markupToBlocks, type LayoutBlock, type TextRun } from './blocks';
import { errorMessage, ResourceMissingError } from '../errors';
import { logReporter, type Reporter } from '../report';
import { PRODUCT_NAME } from '../markup';
import { startStep, warn } from '../log';

export const FONT_FILES = {
  normal: 'DejaVuSans.ttf',
  bold: 'DejaVuSans-Bold.ttf',
} as const;

const PAGE_MARGIN = 15; // mm
const PT_TO_MM = 0.3528;
const BODY_SIZE = 11;
const HEADING_SIZES: Record<number, number> = { 1: 18, 2: 16, 3: 14, 4: 12, 5: 12, 6: 12 };
const LIST_INDENT = 6;

export interface BasicRendererOptions {
  /** When set, DejaVu fonts are loaded from here and must exist */
  fontDir?: string;
  reporter?: Reporter;
}

interface FontSet {
  family: string;
  /** DejaVu ships no italic cut; core Helvetica does */
  hasItalic: boolean;
  bullet: string;
}

async function loadFonts(doc: jsPDF, fontDir?: string): Promise<FontSet> {
  if (!fontDir) {
    return { family: 'helvetica', hasItalic: true, bullet: '-' };
  }
  for (const [style, file] of Object.entries(FONT_FILES)) {
    const fontPath = path.resolve(fontDir, file);
    if (!(await fs.pathExists(fontPath))) {
      throw new ResourceMissingError(
        fontPath,
        `Add ${FONT_FILES.normal} and ${FONT_FILES.bold} to PDF_FONT_DIR`
      );
    }
    const data = await fs.readFile(fontPath);
    doc.addFileToVFS(file, data.toString('base64'));
    doc.addFont(file, 'DejaVu', style);
  }
  return { family: 'DejaVu', hasItalic: false, bullet: '•' };
}

// WinAnsi extras above 0x7F that jsPDF's core fonts can draw
const WIN_ANSI_EXTRAS = new Set('€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ');

function coreFontCanDraw(ch: string): boolean {
  const code = ch.codePointAt(0) ?? 0;
  if (code === 0x09 || code === 0x0a || code === 0x0d) return true;
  if (code >= 0x20 && code <= 0x7e) return true;
  if (code >= 0xa0 && code <= 0xff) return true;
  return WIN_ANSI_EXTRAS.has(ch);
}

/** Distinct characters the built-in Helvetica cannot encode, in order of appearance. */
export function undrawableChars(text: string): string[] {
  const found = new Set<string>();
  for (const ch of text) {
    if (!coreFontCanDraw(ch)) found.add(ch);
  }
  return [...found];
}

function lineHeight(fontSize: number): number {
  return fontSize * PT_TO_MM * 1.45;
}

/** Cursor-based writer over a jsPDF document with page overflow. */
class PageWriter {
  private y = PAGE_MARGIN;
  private readonly pageWidth: number;
  private readonly pageHeight: number;

  constructor(
    private readonly doc: jsPDF,
    private readonly fonts: FontSet
  ) {
    this.pageWidth = doc.internal.pageSize.getWidth();
    this.pageHeight = doc.internal.pageSize.getHeight();
  }

  private get contentWidth() {
    return this.pageWidth - PAGE_MARGIN * 2;
  }

  private style(bold: boolean, italic: boolean): string {
    const it = italic && this.fonts.hasItalic;
    if (bold && it) return 'bolditalic';
    if (bold) return 'bold';
    if (it) return 'italic';
    return 'normal';
  }

  startPage(first: boolean) {
    if (!first) this.doc.addPage();
    this.y = PAGE_MARGIN;
    this.header();
  }

  private header() {
    this.doc.setFont(this.fonts.family, 'bold');
    this.doc.setFontSize(12);
    this.doc.text(PRODUCT_NAME, this.pageWidth / 2, this.y + lineHeight(12) * 0.7, { align: 'center' });
    this.y += lineHeight(12) + 2;
  }

  private ensureSpace(h: number) {
    if (this.y + h <= this.pageHeight - PAGE_MARGIN) return;
    this.doc.addPage();
    this.y = PAGE_MARGIN;
    this.header();
  }

  gap(mm: number) {
    this.y += mm;
  }

  title(text: string) {
    this.writeRuns([{ text, bold: true, italic: false }], 14);
    this.gap(5);
  }

  /** Word-wrapped runs of mixed bold/italic text. */
  writeRuns(runs: readonly TextRun[], fontSize: number, indent = 0, marker?: string) {
    const lh = lineHeight(fontSize);
    const left = PAGE_MARGIN + indent;
    const maxX = PAGE_MARGIN + this.contentWidth;
    this.doc.setFontSize(fontSize);

    type Placed = { text: string; x: number; style: string };
    let line: Placed[] = [];
    let x = left;

    const flush = () => {
      this.ensureSpace(lh);
      const baseline = this.y + lh * 0.75;
      if (marker !== undefined) {
        this.doc.setFont(this.fonts.family, 'normal');
        this.doc.text(marker, left - LIST_INDENT + 1, baseline);
        marker = undefined;
      }
      for (const p of line) {
        this.doc.setFont(this.fonts.family, p.style);
        this.doc.text(p.text, p.x, baseline);
      }
      this.y += lh;
      line = [];
      x = left;
    };

    for (const run of runs) {
      const style = this.style(run.bold, run.italic);
      this.doc.setFont(this.fonts.family, style);
      const space = this.doc.getTextWidth(' ');
      const segments = run.text.split('\n');
      segments.forEach((segment, i) => {
        if (i > 0) flush();
        for (const word of segment.split(/\s+/).filter(Boolean)) {
          const w = this.doc.getTextWidth(word);
          if (line.length > 0 && x + w > maxX) flush();
          line.push({ text: word, x, style });
          x += w + space;
        }
      });
    }
    if (line.length > 0 || marker !== undefined) flush();
  }

  rule() {
    this.ensureSpace(6);
    this.y += 3;
    this.doc.setDrawColor(200);
    this.doc.line(PAGE_MARGIN, this.y, this.pageWidth - PAGE_MARGIN, this.y);
    this.y += 3;
  }

  blocks(blocks: readonly LayoutBlock[]) {
    for (const block of blocks) {
      switch (block.kind) {
        case 'heading':
          this.gap(2);
          this.writeRuns(
            block.runs.map((r) => ({ ...r, bold: true })),
            HEADING_SIZES[block.level] ?? BODY_SIZE
          );
          this.gap(1);
          break;
        case 'paragraph':
          this.writeRuns(block.runs, BODY_SIZE);
          this.gap(2);
          break;
        case 'listItem':
          this.writeRuns(block.runs, BODY_SIZE, LIST_INDENT * block.depth, block.marker);
          this.gap(1);
          break;
        case 'rule':
          this.rule();
          break;
      }
    }
  }

  /** Unformatted fallback; no markup interpretation at all. */
  plain(text: string) {
    const fontSize = 12;
    const lh = lineHeight(fontSize);
    this.doc.setFont(this.fonts.family, 'normal');
    this.doc.setFontSize(fontSize);
    const lines: string[] = this.doc.splitTextToSize(text, this.contentWidth);
    for (const l of lines) {
      this.ensureSpace(lh);
      this.doc.text(l, PAGE_MARGIN, this.y + lh * 0.75);
      this.y += lh;
    }
  }
}

/**
 * jsPDF renderer: one page (or more) per section, title heading, Markdown
 * laid out as headings/paragraphs/lists. A section whose markup cannot be laid
 * out is written as plain text instead, with a warning naming it.
 */
export function createBasicRenderer(opts: BasicRendererOptions = {}): DocumentRenderer {
  const reporter = opts.reporter ?? logReporter;
  return {
    kind: 'basic',
    async render(sections: readonly ProcessedDocument[]): Promise<Uint8Array> {
      const timer = startStep('render.basic', { sections: sections.length });
      const doc = new jsPDF({ unit: 'mm', format: 'a4', orientation: 'portrait' });
      const fonts = await loadFonts(doc, opts.fontDir);
      const writer = new PageWriter(doc, fonts);

      sections.forEach((section, i) => {
        if (!opts.fontDir) {
          const missing = undrawableChars(`${section.title}\n${section.content}`);
          if (missing.length > 0) {
            warn('render.basic.glyphs', { title: section.title, chars: missing.join('') });
            reporter.warning(
              `"${section.title}" has characters the built-in PDF font cannot draw (${missing.join(' ')}); set PDF_FONT_DIR to use DejaVu fonts`
            );
          }
        }
        writer.startPage(i === 0);
        writer.title(section.title);
        try {
          writer.blocks(markupToBlocks(section.content, fonts.bullet));
        } catch (e) {
          warn('render.basic.fallback', { title: section.title, error: errorMessage(e) });
          reporter.warning(
            `PDF formatting failed for "${section.title}", falling back to plain text: ${errorMessage(e)}`
          );
          writer.plain(section.content);
        }
        writer.gap(lineHeight(BODY_SIZE));
      });

      const bytes = new Uint8Array(doc.output('arraybuffer'));
      timer.end({ bytes: bytes.length, pages: doc.getNumberOfPages() });
      return bytes;
    },
  };
}
