import type { MaybeTerm, Term } from "./types.js";

/**
 * Prefix trie that counts insertions and suggests the most frequent completion.
 *
 * Contract notes:
 * - characters are UTF-16 code units, compared as-is
 * - `null`/`undefined` input is never an error: mutations ignore it, lookups answer false/0/""/undefined
 * - enumeration visits children in ascending key order
 * - add, remove and enumeration recurse once per character; keep terms under 4096 code units
 */
export interface FrequencyTrie {
  /** Inserts `term` `count` times (default 1). */
  add(term: MaybeTerm, count?: number): void;
  remove(term: MaybeTerm): void;
  clear(): void;

  /** True when a node exists for `term`, whether or not it is a stored word. */
  contains(term: MaybeTerm): boolean;
  /** True when `term` itself was inserted. */
  isValid(term: MaybeTerm): boolean;
  /** Number of insertions that passed through the node of `term`. */
  frequency(term: MaybeTerm): number;
  /** Longest stored word that prefixes `text`, "" when there is none. */
  longestPrefix(text: MaybeTerm): string;

  /** Suffix along the most frequent children, or undefined when `prefix` is unknown or already a word. */
  completion(prefix: MaybeTerm): string | undefined;
  /** Same as `completion`, but also extends a prefix that is already a word. */
  completionForced(prefix: MaybeTerm): string | undefined;

  words(): Term[];
  wordsWithPrefix(prefix: MaybeTerm): Term[];

  /** Number of distinct stored words. */
  readonly size: number;

  /** Edge characters in breadth-first order. */
  toString(): string;
}
