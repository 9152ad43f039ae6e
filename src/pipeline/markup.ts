import type { ProcessedDocument, RenderableSection } from './types';

/** Name printed in the basic PDF page header; models tend to echo it back. */
export const PRODUCT_NAME = 'Tubescribe';

export const LEARNINGS_HEADING = 'Learnings and Actionable Takeaways';

/** Prefix the batch run puts on every section title. */
export const TITLE_PREFIX = 'Video: ';

export interface MarkupRule {
  name: string;
  apply: (text: string) => string;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Line-pattern heuristics that turn loosely structured model output into
 * Markdown. Order matters: each rule sees the output of the previous one.
 */
export const MARKUP_RULES: readonly MarkupRule[] = [
  {
    name: 'strip-bom',
    apply: (t) => t.replace(/\uFEFF/g, ''),
  },
  {
    name: 'strip-product-artifact',
    apply: (t) =>
      t.replace(new RegExp(`\\s*${escapeRegExp(PRODUCT_NAME)}\\s*`, 'g'), '\n').trim(),
  },
  {
    name: 'part-headers',
    apply: (t) => t.replace(/^(Part \d+:.*)$/gm, '### $1'),
  },
  {
    name: 'learnings-header',
    apply: (t) =>
      t.replace(new RegExp(`^(${escapeRegExp(LEARNINGS_HEADING)})$`, 'gm'), '\n---\n## $1'),
  },
  {
    name: 'letter-headers',
    apply: (t) => t.replace(/^([A-Z]\..*)$/gm, '### $1'),
  },
  {
    name: 'unicode-bullets',
    apply: (t) => t.replace(/•/g, '*'),
  },
  {
    // "1. Inbound... 2. Outbound..." and "machine. * Foundational..."
    name: 'split-run-on-lists',
    apply: (t) => t.replace(/( \d+\. )/g, '\n$1').replace(/( \* )/g, '\n$1'),
  },
  {
    // "Funnel: 2. Create..." where no space-number-dot-space pattern exists
    name: 'split-jammed-numbers',
    apply: (t) => t.replace(/(\S) (\d+\.)/g, '$1\n$2'),
  },
  {
    name: 'collapse-blank-lines',
    apply: (t) => t.replace(/\n\n+/g, '\n\n'),
  },
  {
    name: 'trim',
    apply: (t) => t.trim(),
  },
];

export function reconstructMarkup(
  text: string,
  rules: readonly MarkupRule[] = MARKUP_RULES
): string {
  return rules.reduce((acc, rule) => rule.apply(acc), text);
}

/**
 * Runs the reconstructor over "title\ncontent" and splits the first line back
 * off as the heading.
 */
export function toRenderableSection(title: string, content: string): RenderableSection {
  const cleaned = reconstructMarkup(`${title}\n${content}`);
  const newline = cleaned.indexOf('\n');
  const firstLine = newline === -1 ? cleaned : cleaned.slice(0, newline);
  const markupBody = newline === -1 ? '' : cleaned.slice(newline + 1);
  return {
    heading: firstLine.replaceAll(TITLE_PREFIX, '').trim(),
    markupBody,
  };
}

/** A plain text file as one section: first line is the title, the rest is the body. */
export function documentFromText(text: string): ProcessedDocument {
  const nl = text.indexOf('\n');
  if (nl === -1) return { title: text.trim(), content: '' };
  return { title: text.slice(0, nl).trim(), content: text.slice(nl + 1) };
}
