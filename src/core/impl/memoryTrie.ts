import type { MaybeTerm, Term } from "../types.js";
import type { FrequencyTrie } from "../trie.js";
import { TrieNode } from "./trieNode.js";

export class MemoryTrie implements FrequencyTrie {
  private readonly root = new TrieNode();
  private wordCount = 0;

  get size(): number {
    return this.wordCount;
  }

  add(term: MaybeTerm, count: number = 1): void {
    if (!Number.isInteger(count) || count < 1) {
      throw new RangeError(`count must be a positive integer, got ${count}`);
    }
    if (term == null) return;
    this.insertAt(this.root, term, 0, count);
  }

  remove(term: MaybeTerm): void {
    if (term == null) return;
    // the root survives even when this reports it as dead
    this.removeAt(this.root, term, 0);
  }

  clear(): void {
    this.root.clear();
    this.wordCount = 0;
  }

  contains(term: MaybeTerm): boolean {
    return this.resolve(term) !== undefined;
  }

  isValid(term: MaybeTerm): boolean {
    return this.resolve(term)?.terminal ?? false;
  }

  frequency(term: MaybeTerm): number {
    return this.resolve(term)?.frequency ?? 0;
  }

  longestPrefix(text: MaybeTerm): string {
    if (text == null) return "";

    let cur = this.root;
    let length = 0;
    for (let i = 0; i < text.length; i++) {
      const next = cur.child(text.charAt(i));
      if (!next) break;
      cur = next;
      if (cur.terminal) length = i + 1;
    }
    return text.slice(0, length);
  }

  completion(prefix: MaybeTerm): string | undefined {
    return this.complete(prefix, false);
  }

  completionForced(prefix: MaybeTerm): string | undefined {
    return this.complete(prefix, true);
  }

  words(): Term[] {
    const out: Term[] = [];
    this.collect(this.root, "", out);
    return out;
  }

  wordsWithPrefix(prefix: MaybeTerm): Term[] {
    if (prefix == null) return [];
    const node = this.resolve(prefix);
    if (!node) return [];

    const out: Term[] = [];
    this.collect(node, prefix, out);
    return out;
  }

  toString(): string {
    const queue: TrieNode[] = [this.root];
    let edges = "";

    for (let head = 0; head < queue.length; head++) {
      const node = queue[head];
      if (!node) break;
      for (const key of node.keys()) {
        const next = node.child(key);
        if (!next) continue;
        edges += key;
        queue.push(next);
      }
    }
    return edges;
  }

  private resolve(term: MaybeTerm): TrieNode | undefined {
    if (term == null) return undefined;

    let cur: TrieNode | undefined = this.root;
    for (let i = 0; i < term.length && cur; i++) {
      cur = cur.child(term.charAt(i));
    }
    return cur;
  }

  private insertAt(node: TrieNode, term: Term, i: number, count: number): void {
    if (i === term.length) {
      if (!node.terminal) this.wordCount++;
      node.terminal = true;
      return;
    }
    const next = node.descend(term.charAt(i), count);
    this.insertAt(next, term, i + 1, count);
  }

  /**
   * Returns `node` when it must stay attached, undefined when the caller should
   * detach it (non-terminal and childless after the removal).
   */
  private removeAt(node: TrieNode, term: Term, i: number): TrieNode | undefined {
    if (i === term.length) {
      if (!node.terminal) return node;
      node.terminal = false;
      this.wordCount--;
      return node.isLeaf() ? undefined : node;
    }

    const key = term.charAt(i);
    const next = node.child(key);
    if (!next) return node;

    if (!this.removeAt(next, term, i + 1)) node.detach(key);
    return !node.terminal && node.isLeaf() ? undefined : node;
  }

  private complete(prefix: MaybeTerm, force: boolean): string | undefined {
    const start = this.resolve(prefix);
    if (!start) return undefined;
    if (start.terminal && !force) return undefined;

    let suffix = "";
    let cur = start;
    let key = cur.mostFrequent;
    while (key !== undefined) {
      const next = cur.child(key);
      if (!next) break;
      suffix += key;
      if (next.terminal) break;
      cur = next;
      key = cur.mostFrequent;
    }
    return suffix.length ? suffix : undefined;
  }

  private collect(node: TrieNode, path: string, out: Term[]): void {
    if (node.terminal) out.push(path);
    for (const key of node.keys()) {
      const next = node.child(key);
      if (next) this.collect(next, path + key, out);
    }
  }
}
