import { describe, it, expect } from 'vitest';
import { markupToBlocks } from '../src/pipeline/render/blocks';
import { UnsupportedMarkupError } from '../src/pipeline/errors';

const plain = (text: string) => ({ text, bold: false, italic: false });

describe('markupToBlocks', () => {
  it('maps headings and emphasis', () => {
    expect(markupToBlocks('# Title\n\nSome **bold** and *it* text.')).toEqual([
      { kind: 'heading', level: 1, runs: [plain('Title')] },
      {
        kind: 'paragraph',
        runs: [
          plain('Some '),
          { text: 'bold', bold: true, italic: false },
          plain(' and '),
          { text: 'it', bold: false, italic: true },
          plain(' text.'),
        ],
      },
    ]);
  });

  it('keeps level 3 headers from the reconstructor', () => {
    expect(markupToBlocks('### Part 1: Intro')).toEqual([
      { kind: 'heading', level: 3, runs: [plain('Part 1: Intro')] },
    ]);
  });

  it('turns soft line breaks into spaces', () => {
    expect(markupToBlocks('line one\nline two')).toEqual([
      { kind: 'paragraph', runs: [plain('line one'), plain(' '), plain('line two')] },
    ]);
  });

  it('numbers ordered lists from their start value', () => {
    expect(markupToBlocks('- one\n- two\n\n3. three\n4. four')).toEqual([
      { kind: 'listItem', marker: '-', depth: 1, runs: [plain('one')] },
      { kind: 'listItem', marker: '-', depth: 1, runs: [plain('two')] },
      { kind: 'listItem', marker: '3.', depth: 1, runs: [plain('three')] },
      { kind: 'listItem', marker: '4.', depth: 1, runs: [plain('four')] },
    ]);
  });

  it('tracks nesting depth and uses the given bullet', () => {
    expect(markupToBlocks('- a\n  - b', '•')).toEqual([
      { kind: 'listItem', marker: '•', depth: 1, runs: [plain('a')] },
      { kind: 'listItem', marker: '•', depth: 2, runs: [plain('b')] },
    ]);
  });

  it('emits rules', () => {
    expect(markupToBlocks('a\n\n---\n\nb')).toEqual([
      { kind: 'paragraph', runs: [plain('a')] },
      { kind: 'rule' },
      { kind: 'paragraph', runs: [plain('b')] },
    ]);
  });

  it.each([
    ['<div>x</div>', 'html_block'],
    ['text <b>x</b>', 'html_inline'],
    ['```\ncode\n```', 'fence'],
    ['> quoted', 'blockquote_open'],
  ])('rejects %j', (markup, tokenType) => {
    expect(() => markupToBlocks(markup)).toThrow(UnsupportedMarkupError);
    expect(() => markupToBlocks(markup)).toThrow(`Unsupported markup: ${tokenType}`);
  });
});
