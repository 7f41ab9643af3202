// ---------------------------------------------------------------------------
// Decimal-digit prefix trie.
//
// Keys are numeric strings; lookups can be done in one shot with `get` or
// one digit at a time by stepping a node with `child`.
// ---------------------------------------------------------------------------

/** A trie node.  `value` is set when the path from the root is a key. */
export interface DigitTrieNode<T> {
  readonly value: T | undefined;
  child(digit: string): DigitTrieNode<T> | undefined;
}

/** A trie whose owner has finished filling it. */
export type ReadonlyDigitTrie<T> = Omit<DigitTrie<T>, "set">;

class MutableNode<T> implements DigitTrieNode<T> {
  value: T | undefined = undefined;
  readonly children = new Map<string, MutableNode<T>>();

  child(digit: string): MutableNode<T> | undefined {
    return this.children.get(digit);
  }
}

export class DigitTrie<T> {
  private readonly rootNode = new MutableNode<T>();
  private count = 0;

  /** Insert or replace the value stored under `key`. */
  set(key: string, value: T): void {
    if (!/^\d+$/.test(key)) {
      throw new RangeError(`Trie keys must be non-empty digit strings, got "${key}"`);
    }

    let node = this.rootNode;
    for (const digit of key) {
      let next = node.children.get(digit);
      if (!next) {
        next = new MutableNode<T>();
        node.children.set(digit, next);
      }
      node = next;
    }

    if (node.value === undefined) this.count++;
    node.value = value;
  }

  get(key: string): T | undefined {
    let node: DigitTrieNode<T> | undefined = this.rootNode;
    for (const digit of key) {
      node = node.child(digit);
      if (!node) return undefined;
    }
    return node.value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /** Entry point for digit-at-a-time walks. */
  get root(): DigitTrieNode<T> {
    return this.rootNode;
  }

  get size(): number {
    return this.count;
  }

  /** All `[key, value]` pairs, in ascending key order. */
  *entries(): IterableIterator<[string, T]> {
    yield* walk(this.rootNode, "");
  }
}

function* walk<T>(node: MutableNode<T>, path: string): IterableIterator<[string, T]> {
  if (node.value !== undefined) yield [path, node.value];
  const digits = [...node.children.keys()].sort();
  for (const digit of digits) {
    const next = node.children.get(digit);
    if (next) yield* walk(next, path + digit);
  }
}
