// Unicode-aware word boundary; \b only knows ASCII letters
const WORD_CHAR = '[\\p{L}\\p{N}_]';

function whole(word: string): RegExp {
  return new RegExp(`(?<!${WORD_CHAR})${word}(?!${WORD_CHAR})`, 'giu');
}

// Applied in order; later entries see the output of earlier ones.
const CONTRACTIONS: ReadonlyArray<readonly [RegExp, string]> = [
  [new RegExp(`(?<!${WORD_CHAR})i\\s+`, 'giu'), 'I '],
  [whole('im'), "I'm"],
  [whole('id'), "I'd"],
  [whole('ive'), "I've"],
  [whole('youre'), "you're"],
  [whole('youve'), "you've"],
  [whole('hes'), "he's"],
  [whole('shes'), "she's"],
  [whole('its'), "it's"],
  [whole('theyre'), "they're"],
  [whole('theyve'), "they've"],
  [whole('weve'), "we've"],
  [whole('were'), "we're"],
  [whole('dont'), "don't"],
  [whole('wont'), "won't"],
  [whole('cant'), "can't"],
  [whole('isnt'), "isn't"],
  [whole('wasnt'), "wasn't"],
  [whole('arent'), "aren't"],
  [whole('didnt'), "didn't"],
  [whole('doesnt'), "doesn't"],
  [whole('havent'), "haven't"],
  [whole('hasnt'), "hasn't"],
  [whole('hadnt'), "hadn't"],
  [whole('wouldnt'), "wouldn't"],
  [whole('shouldnt'), "shouldn't"],
  [whole('couldnt'), "couldn't"],
  [whole('thats'), "that's"],
  [whole('whats'), "what's"],
  [whole('wheres'), "where's"],
];

export function fixContractions(text: string): string {
  let out = text;
  for (const [pattern, replacement] of CONTRACTIONS) {
    out = out.replace(pattern, replacement);
  }
  return out;
}

/**
 * Cleans one caption line (or a whole joined transcript): single spaces,
 * repaired contractions, punctuation glued to the preceding word.
 */
export function normalizeText(raw: string): string {
  let text = raw.replace(/\s+/g, ' ').trim();
  text = fixContractions(text);
  text = text.replace(/\s+([,.!?])/g, '$1');
  text = text.replace(/([,.!?])([\p{L}\p{N}_])/gu, '$1 $2');
  return text;
}
