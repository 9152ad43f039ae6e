import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { execa } from 'execa';
import MarkdownIt from 'markdown-it';
import type { ProcessedDocument, RenderableSection } from '../types';
import type { DocumentRenderer } from './index';
import { ENV, type StyledEngine } from '../env';
import { errorMessage, ResourceMissingError, StyledRenderError } from '../errors';
import { toRenderableSection } from '../markup';
import { debug, startStep } from '../log';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const DEFAULT_STYLESHEET = path.resolve(__dirname, '../../../templates/styled-theme.css');

const md = new MarkdownIt();

export interface StyledRendererOptions {
  stylesheetPath?: string;
  engine?: StyledEngine;
  /** Defaults to the engine's own name on PATH */
  engineBin?: string;
}

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

export function sectionHtml(section: RenderableSection): string {
  return `<div class="video-section"><h1>${escapeHtml(section.heading)}</h1>${md.render(section.markupBody)}</div>`;
}

export function buildStyledHtml(sections: readonly RenderableSection[], css: string): string {
  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="UTF-8">
  <title>Tubescribe Summary</title>
  <style>
${css}
  </style>
</head>
<body>
${sections.map(sectionHtml).join('\n')}
</body>
</html>
`;
}

export function engineCommand(
  engine: StyledEngine,
  bin: string | undefined,
  htmlPath: string,
  pdfPath: string
): [string, string[]] {
  if (engine === 'prince') {
    return [bin || 'prince', [htmlPath, '-o', pdfPath]];
  }
  return [bin || 'weasyprint', [htmlPath, pdfPath]];
}

function processOutput(e: unknown): string {
  if (typeof e === 'object' && e !== null && 'stderr' in e && typeof e.stderr === 'string' && e.stderr.trim()) {
    return e.stderr.trim();
  }
  return errorMessage(e);
}

/**
 * Markdown to themed HTML, then to PDF through an external engine
 * (WeasyPrint or Prince). Any failure fails the whole document.
 */
export function createStyledRenderer(opts: StyledRendererOptions = {}): DocumentRenderer {
  const stylesheetPath = opts.stylesheetPath ?? DEFAULT_STYLESHEET;
  const engine = opts.engine ?? ENV.styledEngine;
  const engineBin = opts.engineBin ?? ENV.styledEngineBin;

  return {
    kind: 'styled',
    async render(sections: readonly ProcessedDocument[]): Promise<Uint8Array> {
      if (!(await fs.pathExists(stylesheetPath))) {
        throw new ResourceMissingError(stylesheetPath, 'The styled theme stylesheet is required');
      }
      const css = await fs.readFile(stylesheetPath, 'utf8');
      const renderable = sections.map((s) => toRenderableSection(s.title, s.content));
      const html = buildStyledHtml(renderable, css);

      const timer = startStep('render.styled', { sections: sections.length, engine });
      const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tubescribe-'));
      try {
        const htmlPath = path.join(workDir, 'document.html');
        const pdfPath = path.join(workDir, 'document.pdf');
        await fs.writeFile(htmlPath, html, 'utf8');

        const [cmd, args] = engineCommand(engine, engineBin, htmlPath, pdfPath);
        try {
          await execa(cmd, args, { stdio: 'pipe' });
        } catch (e) {
          throw new StyledRenderError(`${engine} failed: ${processOutput(e)}`, e);
        }

        if (!(await fs.pathExists(pdfPath))) {
          throw new StyledRenderError(`${engine} exited without writing ${pdfPath}`);
        }
        const bytes = new Uint8Array(await fs.readFile(pdfPath));
        if (bytes.length === 0) {
          throw new StyledRenderError(`${engine} produced an empty PDF`);
        }
        timer.end({ bytes: bytes.length });
        return bytes;
      } finally {
        await fs.remove(workDir);
        debug('render.styled.cleanup', { workDir });
      }
    },
  };
}
