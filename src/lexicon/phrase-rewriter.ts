import { PhraseTable } from '../interfaces';
import { splitToken, splitTokens, tokenKey } from './text.util';

export function createPhraseTable(entries: Iterable<[string, string]>): PhraseTable {
  const map = new Map<string, string>();
  let maxLength = 0;
  for (const [source, target] of entries) {
    const keys = splitTokens(source.normalize('NFC')).map(tokenKey);
    map.set(keys.join(' '), target);
    maxLength = Math.max(maxLength, keys.length);
  }
  return { entries: map, maxLength };
}

/**
 * Greedy longest-match-first phrase substitution over tokens.
 * Punctuation before the first and after the last token of a window is kept;
 * a window never spans a token with inner punctuation.
 */
export function rewritePhrases(tokens: readonly string[], table: PhraseTable): string[] {
  const output: string[] = [];
  let index = 0;

  while (index < tokens.length) {
    let replaced = false;
    const longest = Math.min(table.maxLength, tokens.length - index);

    for (let length = longest; length >= 1 && !replaced; length--) {
      const window = tokens.slice(index, index + length).map(splitToken);
      const broken = window.some(
        (parts, position) =>
          parts.core.length === 0 ||
          (position > 0 && parts.lead.length > 0) ||
          (position < window.length - 1 && parts.trail.length > 0),
      );
      if (broken) {
        continue;
      }

      const key = window.map((parts) => parts.core.toLowerCase()).join(' ');
      const target = table.entries.get(key);
      if (target === undefined) {
        continue;
      }

      const first = window[0];
      const last = window[window.length - 1];
      output.push(...splitTokens(`${first.lead}${target}${last.trail}`));
      index += length;
      replaced = true;
    }

    if (!replaced) {
      output.push(tokens[index]);
      index++;
    }
  }

  return output;
}

export function rewriteText(text: string, table: PhraseTable): string {
  return rewritePhrases(splitTokens(text), table).join(' ');
}
