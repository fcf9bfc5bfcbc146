/** Shared core types used by module contracts. */

export type Term = string;

/** Absent input is accepted by every trie operation and degrades to a no-op or empty result. */
export type MaybeTerm = Term | null | undefined;

/** A token produced by a tokenizer. */
export interface Token {
  term: Term;
  /** 0-based position within the source text (token index, not code unit offset). */
  position: number;
}
