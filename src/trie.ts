export enum TrieResult {
  FAILED = 0,
  PREFIX = 1,
  EXISTS = 2,
}

/** Nested maps keyed by character; the key 0 marks the end of a keyword. */
export type Trie = Map<string | 0, Trie | true>;

function child(trie: Trie, char: string): Trie | undefined {
  const next = trie.get(char);
  return next instanceof Map ? next : undefined;
}

export function newTrie(keywords: Iterable<string>, trie: Trie = new Map()): Trie {
  for (const key of keywords) {
    let current = trie;
    for (const char of key) {
      let next = child(current, char);
      if (!next) {
        next = new Map();
        current.set(char, next);
      }
      current = next;
    }
    current.set(0, true);
  }
  return trie;
}

export function inTrie(trie: Trie, key: string): [TrieResult, Trie] {
  if (key.length === 0) {
    return [TrieResult.FAILED, trie];
  }

  let current = trie;
  for (const char of key) {
    const next = child(current, char);
    if (!next) {
      return [TrieResult.FAILED, current];
    }
    current = next;
  }

  return [current.has(0) ? TrieResult.EXISTS : TrieResult.PREFIX, current];
}
