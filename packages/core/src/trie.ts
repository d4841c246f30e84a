interface TrieNode<V> {
  children: Map<string, TrieNode<V>>;
  value?: { v: V };
}

export interface TrieMatch<V> {
  value: V;
  /** Number of codepoints consumed. */
  length: number;
}

/** Prefix tree over codepoints. The first value inserted for a key is kept. */
export class Trie<V> {
  private readonly root: TrieNode<V> = { children: new Map() };
  private count = 0;

  insert(key: string, value: V): boolean {
    let node = this.root;
    for (const ch of key) {
      let next = node.children.get(ch);
      if (!next) {
        next = { children: new Map() };
        node.children.set(ch, next);
      }
      node = next;
    }
    if (node.value) {
      return false;
    }
    node.value = { v: value };
    this.count += 1;
    return true;
  }

  get(key: string): V | undefined {
    let node: TrieNode<V> | undefined = this.root;
    for (const ch of key) {
      node = node.children.get(ch);
      if (!node) return undefined;
    }
    return node.value?.v;
  }

  longestMatch(chars: readonly string[], start: number): TrieMatch<V> | undefined {
    let node: TrieNode<V> | undefined = this.root;
    let best: TrieMatch<V> | undefined;
    for (let i = start; i < chars.length; i += 1) {
      node = node.children.get(chars[i]);
      if (!node) break;
      if (node.value) {
        best = { value: node.value.v, length: i - start + 1 };
      }
    }
    return best;
  }

  /** Every key that prefixes `chars` at `start`, longest first. */
  matches(chars: readonly string[], start: number): TrieMatch<V>[] {
    let node: TrieNode<V> | undefined = this.root;
    const found: TrieMatch<V>[] = [];
    for (let i = start; i < chars.length; i += 1) {
      node = node.children.get(chars[i]);
      if (!node) break;
      if (node.value) {
        found.push({ value: node.value.v, length: i - start + 1 });
      }
    }
    return found.reverse();
  }

  get size(): number {
    return this.count;
  }
}
