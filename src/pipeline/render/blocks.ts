import MarkdownIt from 'markdown-it';
import { UnsupportedMarkupError } from '../errors';

type Token = ReturnType<MarkdownIt['parse']>[number];

export interface TextRun {
  text: string;
  bold: boolean;
  italic: boolean;
}

export type LayoutBlock =
  | { kind: 'heading'; level: number; runs: TextRun[] }
  | { kind: 'paragraph'; runs: TextRun[] }
  | { kind: 'listItem'; marker: string; depth: number; runs: TextRun[] }
  | { kind: 'rule' };

// Block and inline constructs the basic layout cannot express
const UNSUPPORTED = new Set([
  'html_block',
  'html_inline',
  'fence',
  'code_block',
  'blockquote_open',
  'table_open',
  'image',
]);

const md = new MarkdownIt({ html: true });

function inlineRuns(token: Token): TextRun[] {
  const runs: TextRun[] = [];
  let bold = false;
  let italic = false;
  for (const child of token.children ?? []) {
    if (UNSUPPORTED.has(child.type)) throw new UnsupportedMarkupError(child.type);
    switch (child.type) {
      case 'text':
      case 'code_inline':
        runs.push({ text: child.content, bold, italic });
        break;
      case 'softbreak':
        runs.push({ text: ' ', bold, italic });
        break;
      case 'hardbreak':
        runs.push({ text: '\n', bold, italic });
        break;
      case 'strong_open':
        bold = true;
        break;
      case 'strong_close':
        bold = false;
        break;
      case 'em_open':
        italic = true;
        break;
      case 'em_close':
        italic = false;
        break;
      default:
        // link_open/close, s_open/close and friends carry no text of their own
        break;
    }
  }
  return runs;
}

interface ListFrame {
  ordered: boolean;
  next: number;
}

/**
 * Markdown to the flat block list the basic PDF layout understands. Throws
 * UnsupportedMarkupError for anything outside headings, paragraphs, emphasis,
 * lists and rules.
 */
export function markupToBlocks(markup: string, bullet = '-'): LayoutBlock[] {
  const tokens = md.parse(markup, {});
  const blocks: LayoutBlock[] = [];
  const lists: ListFrame[] = [];
  let headingLevel: number | null = null;
  let pendingMarker: string | null = null;

  for (const token of tokens) {
    if (UNSUPPORTED.has(token.type)) throw new UnsupportedMarkupError(token.type);
    switch (token.type) {
      case 'heading_open':
        headingLevel = Number(token.tag.slice(1)) || 1;
        break;
      case 'heading_close':
        headingLevel = null;
        break;
      case 'bullet_list_open':
        lists.push({ ordered: false, next: 0 });
        break;
      case 'ordered_list_open':
        lists.push({ ordered: true, next: Number(token.attrGet('start') ?? 1) });
        break;
      case 'bullet_list_close':
      case 'ordered_list_close':
        lists.pop();
        break;
      case 'list_item_open': {
        const frame = lists[lists.length - 1];
        pendingMarker = frame?.ordered ? `${frame.next++}.` : bullet;
        break;
      }
      case 'list_item_close':
        if (pendingMarker !== null) {
          blocks.push({ kind: 'listItem', marker: pendingMarker, depth: lists.length, runs: [] });
          pendingMarker = null;
        }
        break;
      case 'hr':
        blocks.push({ kind: 'rule' });
        break;
      case 'inline': {
        const runs = inlineRuns(token);
        if (pendingMarker !== null) {
          blocks.push({ kind: 'listItem', marker: pendingMarker, depth: lists.length, runs });
          pendingMarker = null;
        } else if (headingLevel !== null) {
          blocks.push({ kind: 'heading', level: headingLevel, runs });
        } else {
          blocks.push({ kind: 'paragraph', runs });
        }
        break;
      }
      default:
        break;
    }
  }
  return blocks;
}
