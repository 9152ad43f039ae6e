import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import {
  buildStyledHtml,
  createStyledRenderer,
  DEFAULT_STYLESHEET,
  engineCommand,
  escapeHtml,
  sectionHtml,
} from '../src/pipeline/render/styled';
import { createRenderer } from '../src/pipeline/render';
import { ResourceMissingError, StyledRenderError } from '../src/pipeline/errors';

describe('styled HTML', () => {
  it('escapes headings', () => {
    expect(escapeHtml(`Tom & "Jerry" <live> 'ep'`)).toBe(
      'Tom &amp; &quot;Jerry&quot; &lt;live&gt; &#039;ep&#039;'
    );
  });

  it('wraps each section in a page-breaking block', () => {
    expect(sectionHtml({ heading: 'Q&A', markupBody: '### Part 1: Intro\n\ntext' })).toBe(
      '<div class="video-section"><h1>Q&amp;A</h1><h3>Part 1: Intro</h3>\n<p>text</p>\n</div>'
    );
  });

  it('inlines the theme and keeps section order', () => {
    const html = buildStyledHtml(
      [
        { heading: 'One', markupBody: 'a' },
        { heading: 'Two', markupBody: 'b' },
      ],
      'body { color: red; }'
    );
    expect(html).toContain('<title>Tubescribe Summary</title>');
    expect(html).toContain('<style>\nbody { color: red; }\n  </style>');
    expect(html.indexOf('<h1>One</h1>')).toBeLessThan(html.indexOf('<h1>Two</h1>'));
    expect(html.match(/class="video-section"/g)).toHaveLength(2);
  });

  it('ships a theme that breaks pages between sections only', async () => {
    const css = await fs.readFile(DEFAULT_STYLESHEET, 'utf8');
    expect(css).toContain('.video-section {\n    page-break-before: always;');
    expect(css).toContain('.video-section:first-child {\n    page-break-before: auto;');
  });
});

describe('engineCommand', () => {
  it('builds the weasyprint invocation', () => {
    expect(engineCommand('weasyprint', undefined, 'in.html', 'out.pdf')).toEqual([
      'weasyprint',
      ['in.html', 'out.pdf'],
    ]);
  });

  it('builds the prince invocation with a custom binary', () => {
    expect(engineCommand('prince', '/opt/prince/bin/prince', 'in.html', 'out.pdf')).toEqual([
      '/opt/prince/bin/prince',
      ['in.html', '-o', 'out.pdf'],
    ]);
  });
});

describe('styled renderer', () => {
  let dir: string;

  async function stubEngine(body: string): Promise<string> {
    const bin = path.join(dir, 'engine.sh');
    await fs.writeFile(bin, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
    return bin;
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tubescribe-styled-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('returns the bytes the engine wrote', async () => {
    const engineBin = await stubEngine('printf "%%PDF-1.7 stub" > "$2"');
    const renderer = createStyledRenderer({ engine: 'weasyprint', engineBin });
    const bytes = await renderer.render([{ title: 'Video: Talk', content: 'Part 1: Intro\nhello' }]);
    expect(Buffer.from(bytes).toString('latin1')).toBe('%PDF-1.7 stub');
  });

  it('reports the engine stderr on failure', async () => {
    const engineBin = await stubEngine('echo "bad stylesheet" >&2\nexit 3');
    const renderer = createStyledRenderer({ engine: 'weasyprint', engineBin });
    const run = renderer.render([{ title: 'Video: Talk', content: 'hello' }]);
    await expect(run).rejects.toBeInstanceOf(StyledRenderError);
    await expect(run).rejects.toThrow('weasyprint failed: bad stylesheet');
  });

  it('fails when the engine writes nothing', async () => {
    const engineBin = await stubEngine('exit 0');
    const renderer = createStyledRenderer({ engine: 'weasyprint', engineBin });
    await expect(renderer.render([{ title: 'Video: Talk', content: 'hello' }])).rejects.toThrow(
      /^weasyprint exited without writing .*document\.pdf$/
    );
  });

  it('fails on an empty PDF', async () => {
    const engineBin = await stubEngine(': > "$2"');
    const renderer = createStyledRenderer({ engine: 'weasyprint', engineBin });
    await expect(renderer.render([{ title: 'Video: Talk', content: 'hello' }])).rejects.toThrow(
      'weasyprint produced an empty PDF'
    );
  });

  it('fails when the stylesheet is missing', async () => {
    const stylesheetPath = path.join(dir, 'missing.css');
    const renderer = createStyledRenderer({ stylesheetPath, engineBin: await stubEngine('exit 0') });
    const run = renderer.render([{ title: 'Video: Talk', content: 'hello' }]);
    await expect(run).rejects.toBeInstanceOf(ResourceMissingError);
    await expect(run).rejects.toThrow(`Required resource not found: ${stylesheetPath}`);
  });

  it('is selected by kind', () => {
    expect(createRenderer('styled').kind).toBe('styled');
    expect(createRenderer('basic').kind).toBe('basic');
  });
});
