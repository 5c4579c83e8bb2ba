export type Comparator<K> = (a: K, b: K) => number;

/**
 * A key/value pair stored in a {@link SplayTree}.
 *
 * The key is fixed for the lifetime of the entry. The value may be mutated in
 * place; the tree never copies it.
 */
export interface TreeEntry<K, V> {
  readonly key: K;
  value: V;
}

class SplayNode<K, V> implements TreeEntry<K, V> {
  left: SplayNode<K, V> | null = null;
  right: SplayNode<K, V> | null = null;
  parent: SplayNode<K, V> | null = null;

  constructor(
    readonly key: K,
    public value: V,
  ) {}
}

export const compareNumbers: Comparator<number> = (a, b) => a - b;

/**
 * Self-adjusting binary search tree.
 *
 * Every access (lookup, insertion, neighbor query, deletion) rotates the node it
 * lands on to the root using bottom-up zig, zig-zig and zig-zag steps. When the
 * key is absent, the last node visited on the search path is splayed instead.
 * No balance information is stored: a single operation can cost O(n), but any
 * sequence of m operations costs O((m + n) log n), and runs of accesses near the
 * previous one cost O(1) amortized each.
 *
 * @example
 * ```typescript
 * const tree = new SplayTree<number, string>(compareNumbers);
 * tree.set(10, 'a');
 * tree.set(20, 'b');
 * tree.floor(15)?.key; // 10
 * tree.successor(10)?.key; // 20
 * ```
 */
export class SplayTree<K, V> {
  #root: SplayNode<K, V> | null = null;
  #size = 0;

  constructor(private readonly compare: Comparator<K>) {}

  get size(): number {
    return this.#size;
  }

  /** Key currently at the root, i.e. the most recently accessed one. */
  get rootKey(): K | undefined {
    return this.#root?.key;
  }

  get(key: K): V | undefined {
    return this.#find(key)?.value;
  }

  has(key: K): boolean {
    return this.#find(key) !== null;
  }

  /**
   * Inserts `key` or replaces its value.
   *
   * @returns The entry stored under `key`
   */
  set(key: K, value: V): TreeEntry<K, V> {
    const existing = this.insert(key, () => value);
    existing.value = value;
    return existing;
  }

  /**
   * Returns the entry for `key`, creating it when absent.
   *
   * `create` receives the entry with the greatest key below `key` (or `null`
   * when there is none), so callers can derive the new value from the range
   * being split.
   */
  insert(key: K, create: (floor: TreeEntry<K, V> | null) => V): TreeEntry<K, V> {
    let node = this.#root;
    let parent: SplayNode<K, V> | null = null;
    let floor: SplayNode<K, V> | null = null;
    let cmp = 0;

    while (node) {
      parent = node;
      cmp = this.compare(key, node.key);
      if (cmp === 0) {
        this.#splay(node);
        return node;
      }
      if (cmp < 0) {
        node = node.left;
      } else {
        floor = node;
        node = node.right;
      }
    }

    const created = new SplayNode(key, create(floor));
    created.parent = parent;
    if (!parent) {
      this.#root = created;
    } else if (cmp < 0) {
      parent.left = created;
    } else {
      parent.right = created;
    }
    this.#size += 1;
    this.#splay(created);
    return created;
  }

  /** Greatest entry whose key is less than or equal to `key`. */
  floor(key: K): TreeEntry<K, V> | null {
    return this.#bound(key, (cmp) => cmp >= 0, true);
  }

  /** Least entry whose key is greater than or equal to `key`. */
  ceiling(key: K): TreeEntry<K, V> | null {
    return this.#bound(key, (cmp) => cmp <= 0, false);
  }

  /** Least entry whose key is strictly greater than `key`. */
  successor(key: K): TreeEntry<K, V> | null {
    return this.#bound(key, (cmp) => cmp < 0, false);
  }

  /** Greatest entry whose key is strictly less than `key`. */
  predecessor(key: K): TreeEntry<K, V> | null {
    return this.#bound(key, (cmp) => cmp > 0, true);
  }

  first(): TreeEntry<K, V> | null {
    let node = this.#root;
    while (node?.left) node = node.left;
    if (node) this.#splay(node);
    return node;
  }

  last(): TreeEntry<K, V> | null {
    let node = this.#root;
    while (node?.right) node = node.right;
    if (node) this.#splay(node);
    return node;
  }

  /**
   * Removes `key` from the tree.
   *
   * The node is splayed to the root, then the maximum of its left subtree is
   * splayed to the top of that subtree and adopts the right subtree.
   *
   * @returns True if the key was present
   */
  delete(key: K): boolean {
    const node = this.#find(key);
    if (!node) return false;

    const { left, right } = node;
    node.left = null;
    node.right = null;
    this.#size -= 1;

    if (!left) {
      this.#root = right;
      if (right) right.parent = null;
      return true;
    }

    left.parent = null;
    this.#root = left;
    let max = left;
    while (max.right) max = max.right;
    this.#splay(max);
    max.right = right;
    if (right) right.parent = max;
    return true;
  }

  clear(): void {
    this.#root = null;
    this.#size = 0;
  }

  /** In-order traversal. Does not restructure the tree. */
  *entries(): IterableIterator<TreeEntry<K, V>> {
    const stack: SplayNode<K, V>[] = [];
    let node = this.#root;
    while (node || stack.length > 0) {
      while (node) {
        stack.push(node);
        node = node.left;
      }
      const next = stack.pop();
      if (!next) break;
      yield next;
      node = next.right;
    }
  }

  /** Height of the current shape. An empty tree has depth 0. */
  depth(): number {
    if (!this.#root) return 0;
    let max = 0;
    const stack: Array<[SplayNode<K, V>, number]> = [[this.#root, 1]];
    while (stack.length > 0) {
      const top = stack.pop();
      if (!top) break;
      const [node, level] = top;
      if (level > max) max = level;
      if (node.left) stack.push([node.left, level + 1]);
      if (node.right) stack.push([node.right, level + 1]);
    }
    return max;
  }

  #find(key: K): SplayNode<K, V> | null {
    let node = this.#root;
    let last: SplayNode<K, V> | null = null;
    while (node) {
      last = node;
      const cmp = this.compare(key, node.key);
      if (cmp === 0) {
        this.#splay(node);
        return node;
      }
      node = cmp < 0 ? node.left : node.right;
    }
    if (last) this.#splay(last);
    return null;
  }

  /**
   * Shared walk for the neighbor queries.
   *
   * `accept` decides from `compare(key, node.key)` whether a node is a
   * candidate; `goRightOnAccept` tells which way the search continues after a
   * candidate so that the tightest one wins.
   */
  #bound(
    key: K,
    accept: (cmp: number) => boolean,
    goRightOnAccept: boolean,
  ): SplayNode<K, V> | null {
    let node = this.#root;
    let last: SplayNode<K, V> | null = null;
    let best: SplayNode<K, V> | null = null;

    while (node) {
      last = node;
      const cmp = this.compare(key, node.key);
      if (accept(cmp)) {
        best = node;
        // exact hit is the tightest possible floor or ceiling
        if (cmp === 0) break;
        node = goRightOnAccept ? node.right : node.left;
      } else {
        node = goRightOnAccept ? node.left : node.right;
      }
    }

    const target = best ?? last;
    if (target) this.#splay(target);
    return best;
  }

  #rotate(node: SplayNode<K, V>): void {
    const parent = node.parent;
    if (!parent) return;
    const grandparent = parent.parent;

    if (parent.left === node) {
      parent.left = node.right;
      if (node.right) node.right.parent = parent;
      node.right = parent;
    } else {
      parent.right = node.left;
      if (node.left) node.left.parent = parent;
      node.left = parent;
    }

    parent.parent = node;
    node.parent = grandparent;
    if (!grandparent) {
      this.#root = node;
    } else if (grandparent.left === parent) {
      grandparent.left = node;
    } else {
      grandparent.right = node;
    }
  }

  #splay(node: SplayNode<K, V>): void {
    for (let parent = node.parent; parent; parent = node.parent) {
      const grandparent = parent.parent;
      if (!grandparent) {
        // zig
        this.#rotate(node);
      } else if ((grandparent.left === parent) === (parent.left === node)) {
        // zig-zig
        this.#rotate(parent);
        this.#rotate(node);
      } else {
        // zig-zag
        this.#rotate(node);
        this.#rotate(node);
      }
    }
  }
}
