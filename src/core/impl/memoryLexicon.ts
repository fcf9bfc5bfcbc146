import type { Term } from "../types.js";
import type { TokenizeOptions, Tokenizer } from "../tokenizer.js";
import type { FrequencyTrie } from "../trie.js";

export interface LearnOptions {
  removeStopWords?: boolean;
  minLength?: number;
}

export interface ListOptions {
  limit?: number;
  /** cursor token returned by previous list call */
  cursor?: string;
}

export interface WordPage {
  words: Term[];
  nextCursor?: string;
}

export interface WordInfo {
  word: Term;
  /** a node exists, i.e. the word is at least a prefix of a stored word */
  known: boolean;
  valid: boolean;
  frequency: number;
}

export interface Suggestion {
  prefix: Term;
  /** suffix to append, null when there is nothing to suggest */
  completion: string | null;
  word: Term | null;
}

export interface LexiconDeps {
  tokenizer: Tokenizer;
  trie: FrequencyTrie;
}

export class MemoryLexicon {
  constructor(private readonly deps: LexiconDeps) {}

  get size(): number {
    return this.deps.trie.size;
  }

  /** Inserts every token of `text` once. Returns the number of tokens inserted. */
  learn(text: string, options?: LearnOptions): number {
    const tokenizeOptions: TokenizeOptions = {
      normalizeCase: true,
      removeStopWords: options?.removeStopWords ?? false,
      minLength: options?.minLength ?? 1,
    };

    let learned = 0;
    for (const tok of this.deps.tokenizer.tokenize(text, tokenizeOptions)) {
      this.deps.trie.add(tok.term);
      learned++;
    }
    return learned;
  }

  addWords(words: Iterable<Term>, count: number = 1): void {
    for (const word of words) this.deps.trie.add(word, count);
  }

  forget(word: Term): void {
    this.deps.trie.remove(word);
  }

  clear(): void {
    this.deps.trie.clear();
  }

  lookup(word: Term): WordInfo {
    const { trie } = this.deps;
    return {
      word,
      known: trie.contains(word),
      valid: trie.isValid(word),
      frequency: trie.frequency(word),
    };
  }

  suggest(prefix: Term, options?: { force?: boolean }): Suggestion {
    const { trie } = this.deps;
    const completion = (options?.force ? trie.completionForced(prefix) : trie.completion(prefix)) ?? null;
    return { prefix, completion, word: completion === null ? null : prefix + completion };
  }

  longestPrefix(text: string): Term {
    return this.deps.trie.longestPrefix(text);
  }

  list(prefix: Term, options?: ListOptions): WordPage {
    const limit = options?.limit ?? 100;
    const all = this.deps.trie.wordsWithPrefix(prefix);

    // cursor is base64 of the offset where the next page starts
    let startIdx = 0;
    if (options?.cursor !== undefined) {
      const decoded = Buffer.from(options.cursor, "base64").toString("utf8");
      if (/^\d+$/.test(decoded)) startIdx = Number(decoded);
    }

    const endIdx = startIdx + limit;
    const page: WordPage = { words: all.slice(startIdx, endIdx) };
    if (endIdx < all.length) {
      page.nextCursor = Buffer.from(String(endIdx), "utf8").toString("base64");
    }
    return page;
  }

  dump(): string {
    return this.deps.trie.toString();
  }
}
