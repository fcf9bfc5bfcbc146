import type { Token } from "../types.js";
import type { TokenizeOptions, Tokenizer } from "../tokenizer.js";

// articles, conjunctions and the commonest prepositions
const DEFAULT_STOP_WORDS = new Set(["a", "an", "the", "and", "or", "but", "of", "to", "in", "on", "at", "for", "is"]);

const APOSTROPHE = 39;

function isWordCode(code: number): boolean {
  return (code >= 48 && code <= 57) || (code >= 65 && code <= 90) || (code >= 97 && code <= 122);
}

/** End of the word starting at `start`; an apostrophe counts only when a word character follows it. */
function wordEnd(text: string, start: number): number {
  let i = start;
  while (i < text.length) {
    const code = text.charCodeAt(i);
    if (isWordCode(code)) {
      i++;
    } else if (code === APOSTROPHE && isWordCode(text.charCodeAt(i + 1))) {
      i += 2;
    } else {
      break;
    }
  }
  return i;
}

/**
 * ASCII word tokenizer feeding the lexicon ("don't" stays one word).
 * Positions count every word found, including the ones filtered out.
 */
export class SimpleTokenizer implements Tokenizer {
  constructor(private readonly stopWords: ReadonlySet<string> = DEFAULT_STOP_WORDS) {}

  *tokenize(text: string, options?: TokenizeOptions): Iterable<Token> {
    const normalizeCase = options?.normalizeCase ?? true;
    const removeStopWords = options?.removeStopWords ?? false;
    const minLength = options?.minLength ?? 1;

    let position = 0;
    for (let i = 0; i < text.length; ) {
      if (!isWordCode(text.charCodeAt(i))) {
        i++;
        continue;
      }

      const end = wordEnd(text, i);
      const raw = text.slice(i, end);
      const term = normalizeCase ? raw.toLowerCase() : raw;
      i = end;

      const dropped = term.length < minLength || (removeStopWords && this.stopWords.has(term));
      if (!dropped) yield { term, position };
      position++;
    }
  }
}
