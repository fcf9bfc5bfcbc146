import {
  MemoryLexicon,
  MemoryTrie,
  SimpleTokenizer,
  type LearnOptions,
  type Suggestion,
  type WordInfo,
} from "../core/impl/index.js";

export interface WordListQuery {
  prefix: string;
  limit: number;
  cursor?: string;
}

export interface WordListResponse {
  words: string[];
  nextCursor: string | null;
}

export interface Dictionary {
  size(): number;
  addWords(words: string[], count: number): void;
  learn(text: string, options?: LearnOptions): number;
  remove(word: string): void;
  clear(): void;
  lookup(word: string): WordInfo;
  complete(prefix: string, force: boolean): Suggestion;
  longestPrefix(text: string): string;
  list(q: WordListQuery): WordListResponse;
  dump(): string;
}

/**
 * HTTP-friendly cursor encoding.
 *
 * We store and return the lexicon's cursor token as-is, but wrap it in JSON so we can
 * extend later without breaking clients.
 */
export function encodeCursor(payload: { token: string }): string {
  return Buffer.from(JSON.stringify(payload), "utf8").toString("base64");
}

export function decodeCursor(cursor: string): { token: string } {
  const raw = Buffer.from(cursor, "base64").toString("utf8");
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || !("token" in parsed)) {
    throw new Error("invalid cursor");
  }
  const { token } = parsed;
  if (typeof token !== "string") {
    throw new Error("invalid cursor");
  }
  return { token };
}

export function createInMemoryDictionary(): Dictionary {
  const lexicon = new MemoryLexicon({ tokenizer: new SimpleTokenizer(), trie: new MemoryTrie() });

  return {
    size() {
      return lexicon.size;
    },
    addWords(words, count) {
      lexicon.addWords(words, count);
    },
    learn(text, options) {
      return lexicon.learn(text, options);
    },
    remove(word) {
      lexicon.forget(word);
    },
    clear() {
      lexicon.clear();
    },
    lookup(word) {
      return lexicon.lookup(word);
    },
    complete(prefix, force) {
      return lexicon.suggest(prefix, { force });
    },
    longestPrefix(text) {
      return lexicon.longestPrefix(text);
    },
    list(q) {
      const page = lexicon.list(q.prefix, { limit: q.limit, cursor: q.cursor });
      return { words: page.words, nextCursor: page.nextCursor ?? null };
    },
    dump() {
      return lexicon.dump();
    },
  };
}
