export const ZWJ = '\u200D';
export const ZWNJ = '\u200C';

const TOKEN_PARTS = /^([\p{P}\p{S}]*)(.*?)([\p{P}\p{S}]*)$/su;
const LATIN = /\p{Script=Latin}/u;
const MALAYALAM = /\p{Script=Malayalam}/u;

/**
 * A whitespace-delimited token split into surrounding punctuation and the word itself
 */
export interface TokenParts {
  lead: string;
  core: string;
  trail: string;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function splitTokens(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

export function splitToken(token: string): TokenParts {
  const match = TOKEN_PARTS.exec(token);
  if (!match) {
    return { lead: '', core: token, trail: '' };
  }
  return { lead: match[1], core: match[2], trail: match[3] };
}

/** Lookup form of a token: punctuation stripped, lowercased */
export function tokenKey(token: string): string {
  return splitToken(token).core.toLowerCase();
}

/** Lookup forms of every word in a text, empty words dropped */
export function textKeys(text: string): string[] {
  return splitTokens(text)
    .map(tokenKey)
    .filter((key) => key.length > 0);
}

export function codePointLength(value: string): number {
  return Array.from(value).length;
}

export function hasLatin(value: string): boolean {
  return LATIN.test(value);
}

export function hasMalayalam(value: string): boolean {
  return MALAYALAM.test(value);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Regular expression for a literal that only matches whole words.
 * Joiners count as word characters so a match never ends inside a conjunct.
 */
export function boundaryPattern(literal: string): RegExp {
  const word = `[\\p{L}\\p{M}\\p{N}${ZWJ}${ZWNJ}]`;
  return new RegExp(`(?<!${word})${escapeRegExp(literal)}(?!${word})`, 'gu');
}

/**
 * Index of the first occurrence of phrase in keys where none of the
 * positions are consumed, or -1
 */
export function findPhrase(
  keys: readonly string[],
  phrase: readonly string[],
  consumed?: readonly boolean[],
): number {
  if (phrase.length === 0) {
    return -1;
  }
  for (let start = 0; start + phrase.length <= keys.length; start++) {
    let matched = true;
    for (let offset = 0; offset < phrase.length; offset++) {
      const position = start + offset;
      if (keys[position] !== phrase[offset] || consumed?.[position]) {
        matched = false;
        break;
      }
    }
    if (matched) {
      return start;
    }
  }
  return -1;
}
