import { describe, expect, it } from "vitest";
import { MemoryTrie } from "../../index.js";

function trieOf(...words: string[]): MemoryTrie {
  const trie = new MemoryTrie();
  for (const w of words) trie.add(w);
  return trie;
}

describe("MemoryTrie", () => {
  describe("add / lookups", () => {
    it("marks inserted words valid and their prefixes contained", () => {
      const trie = trieOf("hello");
      expect(trie.isValid("hello")).toBe(true);
      expect(trie.contains("hello")).toBe(true);
      expect(trie.contains("hell")).toBe(true);
      expect(trie.isValid("hell")).toBe(false);
      expect(trie.contains("help")).toBe(false);
    });

    it("counts insertions through every node of the path", () => {
      const trie = trieOf("abc", "abc", "abc", "abd");
      expect(trie.frequency("abc")).toBe(3);
      expect(trie.frequency("abd")).toBe(1);
      expect(trie.frequency("ab")).toBe(4);
      expect(trie.frequency("zz")).toBe(0);
      expect(trie.frequency("")).toBe(0);
    });

    it("adds a word several times at once", () => {
      const trie = new MemoryTrie();
      trie.add("go", 3);
      trie.add("go");
      expect(trie.frequency("go")).toBe(4);
      expect(trie.size).toBe(1);
    });

    it("rejects a count that is not a positive integer", () => {
      const trie = new MemoryTrie();
      expect(() => trie.add("a", 0)).toThrow(RangeError);
      expect(() => trie.add("a", 1.5)).toThrow(RangeError);
      expect(trie.contains("a")).toBe(false);
    });

    it("treats absent input as a no-op or empty result", () => {
      const trie = new MemoryTrie();
      trie.add(null);
      trie.add(undefined);
      trie.remove(null);
      expect(trie.size).toBe(0);
      expect(trie.contains(null)).toBe(false);
      expect(trie.isValid(undefined)).toBe(false);
      expect(trie.frequency(null)).toBe(0);
      expect(trie.longestPrefix(null)).toBe("");
      expect(trie.completion(null)).toBeUndefined();
      expect(trie.completionForced(undefined)).toBeUndefined();
      expect(trie.wordsWithPrefix(null)).toEqual([]);
    });

    it("counts distinct words", () => {
      const trie = trieOf("a", "a", "ab");
      expect(trie.size).toBe(2);
      trie.remove("zz");
      expect(trie.size).toBe(2);
      trie.remove("a");
      expect(trie.size).toBe(1);
    });
  });

  describe("longestPrefix", () => {
    it("returns the deepest stored word along the path", () => {
      const trie = trieOf("he", "hello");
      expect(trie.longestPrefix("help")).toBe("he");
      expect(trie.longestPrefix("hello world")).toBe("hello");
      expect(trie.longestPrefix("h")).toBe("");
      expect(trie.longestPrefix("xyz")).toBe("");
    });
  });

  describe("completion", () => {
    it("follows the most frequent branch", () => {
      const trie = trieOf("cat", "car", "car", "car");
      expect(trie.completion("ca")).toBe("r");
      expect(trie.completion("c")).toBe("ar");
      expect(trie.completion("car")).toBeUndefined();
      expect(trie.completion("x")).toBeUndefined();
    });

    it("extends a complete word only when forced", () => {
      const trie = trieOf("cat", "car", "car", "car", "cart");
      expect(trie.completion("car")).toBeUndefined();
      expect(trie.completionForced("car")).toBe("t");
      expect(trie.completionForced("cart")).toBeUndefined();
    });

    it("keeps the first child to reach the top frequency on ties", () => {
      const trie = trieOf("ab", "ac");
      expect(trie.completion("a")).toBe("b");
      trie.add("ac");
      expect(trie.completion("a")).toBe("c");
      trie.add("ab");
      expect(trie.completion("a")).toBe("c");
    });

    it("stops at the first stored word on the way down", () => {
      const trie = trieOf("go", "gone", "gone");
      expect(trie.completion("g")).toBe("o");
      expect(trie.completionForced("go")).toBe("ne");
    });

    it("re-picks the most frequent child once the cached one is pruned", () => {
      const trie = trieOf("ab", "ac", "ac", "ac");
      expect(trie.completion("a")).toBe("c");
      trie.remove("ac");
      expect(trie.completion("a")).toBe("b");
    });

    it("re-picks by who reached the top frequency first, not by insertion order", () => {
      const trie = trieOf("xa", "xc", "xc", "xc", "xb", "xb", "xa");
      expect(trie.completion("x")).toBe("c");
      trie.remove("xc");
      expect(trie.completion("x")).toBe("b");
    });
  });

  describe("remove", () => {
    it("prunes a branch nothing else uses", () => {
      const trie = trieOf("hello");
      trie.remove("hello");
      expect(trie.isValid("hello")).toBe(false);
      expect(trie.contains("h")).toBe(false);
      expect(trie.toString()).toBe("");
    });

    it("keeps nodes that are words or still have children", () => {
      const trie = trieOf("he", "hello");
      trie.remove("hello");
      expect(trie.contains("hel")).toBe(false);
      expect(trie.isValid("he")).toBe(true);
      expect(trie.words()).toEqual(["he"]);

      const other = trieOf("he", "hello");
      other.remove("he");
      expect(other.isValid("he")).toBe(false);
      expect(other.contains("he")).toBe(true);
      expect(other.isValid("hello")).toBe(true);
    });

    it("leaves the trie untouched for a prefix that is not a word", () => {
      const trie = trieOf("hello");
      trie.remove("hell");
      trie.remove("helpful");
      expect(trie.isValid("hello")).toBe(true);
      expect(trie.contains("hell")).toBe(true);
      expect(trie.size).toBe(1);
    });

    it("is idempotent", () => {
      const trie = trieOf("a", "ab");
      trie.remove("ab");
      trie.remove("ab");
      expect(trie.words()).toEqual(["a"]);
      expect(trie.size).toBe(1);
    });

    it("does not decrement frequencies of surviving nodes", () => {
      const trie = trieOf("ab", "ac");
      trie.remove("ac");
      expect(trie.frequency("a")).toBe(2);
    });

    it("removes the empty word without detaching the root", () => {
      const trie = trieOf("", "a");
      trie.remove("");
      expect(trie.isValid("")).toBe(false);
      expect(trie.contains("")).toBe(true);
      expect(trie.words()).toEqual(["a"]);
      expect(trie.size).toBe(1);

      const lone = trieOf("");
      lone.remove("");
      expect(lone.isValid("")).toBe(false);
      expect(lone.contains("")).toBe(true);
      expect(lone.words()).toEqual([]);
      expect(lone.size).toBe(0);
      lone.add("b");
      expect(lone.words()).toEqual(["b"]);
    });

    it("handles words longer than usual", () => {
      const long = "x".repeat(2000);
      const trie = trieOf(long);
      expect(trie.isValid(long)).toBe(true);
      trie.remove(long);
      expect(trie.contains("x")).toBe(false);
    });
  });

  describe("enumeration", () => {
    it("lists words depth-first in key order", () => {
      const trie = trieOf("dog", "cat", "car", "ca", "");
      expect(trie.words()).toEqual(["", "ca", "car", "cat", "dog"]);
    });

    it("filters by prefix", () => {
      const trie = trieOf("cat", "car", "car", "car", "dog");
      expect(trie.wordsWithPrefix("ca")).toEqual(["car", "cat"]);
      expect(trie.wordsWithPrefix("car")).toEqual(["car"]);
      expect(trie.wordsWithPrefix("zz")).toEqual([]);
    });

    it("serializes edges breadth-first", () => {
      const trie = trieOf("cat", "car", "dog");
      expect(trie.toString()).toBe("cdaortg");
    });
  });

  describe("empty string", () => {
    it("is stored on the root", () => {
      const trie = trieOf("");
      expect(trie.isValid("")).toBe(true);
      expect(trie.words()).toEqual([""]);
      expect(trie.frequency("")).toBe(0);
      expect(trie.size).toBe(1);
    });

    it("completes from the root like any other node", () => {
      const trie = trieOf("go");
      expect(trie.completion("")).toBe("go");

      trie.add("");
      expect(trie.completion("")).toBeUndefined();
      expect(trie.completionForced("")).toBe("go");
    });
  });

  describe("clear", () => {
    it("behaves like a new trie afterwards", () => {
      const trie = trieOf("", "abc", "abd");
      trie.clear();
      const fresh = new MemoryTrie();

      for (const probe of ["", "a", "abc"]) {
        expect(trie.contains(probe)).toBe(fresh.contains(probe));
        expect(trie.isValid(probe)).toBe(fresh.isValid(probe));
        expect(trie.frequency(probe)).toBe(fresh.frequency(probe));
        expect(trie.completion(probe)).toBe(fresh.completion(probe));
        expect(trie.longestPrefix(probe)).toBe(fresh.longestPrefix(probe));
      }
      expect(trie.words()).toEqual([]);
      expect(trie.size).toBe(0);
      expect(trie.toString()).toBe("");
    });
  });
});
