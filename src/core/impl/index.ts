export { MemoryTrie } from "./memoryTrie.js";
export { TrieNode } from "./trieNode.js";
export { SimpleTokenizer } from "./simpleTokenizer.js";
export { MemoryLexicon } from "./memoryLexicon.js";
export type {
  LearnOptions,
  LexiconDeps,
  ListOptions,
  Suggestion,
  WordInfo,
  WordPage,
} from "./memoryLexicon.js";
