/**
 * One node of a `MemoryTrie`.
 *
 * `frequency` counts insertions through the edge arriving here. `mostFrequent`
 * caches the key of the child with the highest frequency; on ties the first key to
 * reach the maximum keeps the slot.
 */
export class TrieNode {
  readonly children = new Map<string, TrieNode>();
  terminal = false;
  frequency = 0;
  mostFrequent: string | undefined = undefined;
  /** Parent's passage tick at which `frequency` last grew. */
  reachedAt = 0;
  private ticks = 0;

  child(key: string): TrieNode | undefined {
    return this.children.get(key);
  }

  isLeaf(): boolean {
    return this.children.size === 0;
  }

  /** Child keys in ascending code unit order. */
  keys(): string[] {
    return Array.from(this.children.keys()).sort();
  }

  /**
   * Counts `count` passages into the child at `key`, creating it on first use, and
   * refreshes the cached most frequent key.
   */
  descend(key: string, count: number): TrieNode {
    let next = this.children.get(key);
    if (!next) {
      next = new TrieNode();
      this.children.set(key, next);
    }
    next.frequency += count;
    next.reachedAt = ++this.ticks;

    const best = this.mostFrequent === undefined ? undefined : this.children.get(this.mostFrequent);
    if (!best || best.frequency < next.frequency) this.mostFrequent = key;
    return next;
  }

  detach(key: string): void {
    this.children.delete(key);
    if (this.mostFrequent === key) this.mostFrequent = this.pickMostFrequent();
  }

  clear(): void {
    this.children.clear();
    this.terminal = false;
    this.mostFrequent = undefined;
    this.ticks = 0;
  }

  // among equal frequencies the child that got there first wins
  private pickMostFrequent(): string | undefined {
    let bestKey: string | undefined;
    let best: TrieNode | undefined;
    for (const [key, node] of this.children) {
      if (!best || node.frequency > best.frequency || (node.frequency === best.frequency && node.reachedAt < best.reachedAt)) {
        bestKey = key;
        best = node;
      }
    }
    return bestKey;
  }
}
