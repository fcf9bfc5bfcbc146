export type { MaybeTerm, Term, Token } from "./types.js";
export type { FrequencyTrie } from "./trie.js";
export type { TokenizeOptions, Tokenizer } from "./tokenizer.js";
export * from "./impl/index.js";
