import {
  ConcurrentModificationError,
  DuplicateKeyError,
  KeyNotFoundError,
  OutOfRangeError
} from './errors.js';

/**
 * Order-statistics AVL tree node
 * Every node caches the height and node count of its own subtree so that
 * rebalancing and rank queries never need to walk a whole subtree
 */
export interface OSTNode<K, V> {
  key: K;                           // The sorting key for this node
  value: V;                         // The data stored at this node
  left: OSTNode<K, V> | null;       // Left child (smaller keys)
  right: OSTNode<K, V> | null;      // Right child (larger keys)
  height: number;                   // Height of this subtree, leaf = 1
  count: number;                    // Nodes in this subtree, leaf = 1
}

/**
 * Read-only view of a node, handed out for structural inspection
 */
export interface ReadonlyOSTNode<K, V> {
  readonly key: K;
  readonly value: V;
  readonly left: ReadonlyOSTNode<K, V> | null;
  readonly right: ReadonlyOSTNode<K, V> | null;
  readonly height: number;
  readonly count: number;
}

export interface TreeEntry<K, V> {
  key: K;
  value: V;
}

function heightOf<K, V>(node: OSTNode<K, V> | null): number {
  return node ? node.height : 0;
}

function countOf<K, V>(node: OSTNode<K, V> | null): number {
  return node ? node.count : 0;
}

/**
 * Self-balancing binary search tree with order statistics
 * Guarantees O(log n) insert, remove, search and k-th largest queries
 *
 * Key properties:
 * - Heights of the two subtrees of any node differ by at most one
 * - Every node knows the size of its subtree, so ranks are found by descent
 * - Mutations recurse down and rewire child links from returned subtree
 *   roots on the way back up; nodes never point at their parent
 */
export class OrderStatisticsTree<K, V> {
  private root: OSTNode<K, V> | null = null;    // Root of the tree
  private size = 0;                              // Live key count for O(1) size queries
  private modificationCount = 0;                 // Bumped on every structural change
  private readonly compareFn: (a: K, b: K) => number;

  /**
   * @param compareFn - Returns <0 if a<b, 0 if a==b, >0 if a>b
   *                    Prices: (a, b) => a - b
   */
  constructor(compareFn: (a: K, b: K) => number) {
    this.compareFn = compareFn;
  }

  /**
   * Inserts a new key-value pair
   * Time complexity: O(log n)
   * @throws DuplicateKeyError if the key is already present; the tree is left untouched
   */
  insert(key: K, value: V): void {
    this.root = this.insertNode(this.root, key, value);
    this.modificationCount++;
  }

  /**
   * Removes a key and returns the value that was stored under it
   * Time complexity: O(log n)
   * @throws KeyNotFoundError if the key is absent; the tree is left untouched
   */
  remove(key: K): V {
    const value = this.get(key);
    this.root = this.removeNode(this.root, key);
    this.modificationCount++;
    return value;
  }

  /**
   * Updates the value stored under an existing key, or inserts the pair
   */
  set(key: K, value: V): void {
    const node = this.findNode(key);
    if (node) {
      node.value = value;
      return;
    }
    this.insert(key, value);
  }

  has(key: K): boolean {
    return this.findNode(key) !== null;
  }

  /**
   * @throws KeyNotFoundError if the key is absent
   */
  get(key: K): V {
    const node = this.findNode(key);
    if (!node) {
      throw new KeyNotFoundError(key);
    }
    return node.value;
  }

  /**
   * Non-throwing lookup
   * @returns The value associated with the key, or null if not found
   */
  find(key: K): V | null {
    const node = this.findNode(key);
    return node ? node.value : null;
  }

  /**
   * Returns the entry ranked k-th when keys are sorted descending (k = 1 is the largest)
   * Descends using cached subtree counts: O(log n) because the tree stays balanced
   * @throws OutOfRangeError unless k is an integer in [1, size]
   */
  kthLargest(k: number): TreeEntry<K, V> {
    if (!Number.isInteger(k) || k < 1 || k > this.size) {
      throw new OutOfRangeError(k, this.size);
    }

    let current = this.root;
    let rank = k;
    while (current) {
      const rightCount = countOf(current.right);
      if (rank === rightCount + 1) {
        return { key: current.key, value: current.value };
      }
      if (rank <= rightCount) {
        current = current.right;
      } else {
        rank -= rightCount + 1;
        current = current.left;
      }
    }

    // Unreachable while the count cache is correct
    throw new OutOfRangeError(k, this.size);
  }

  findMin(): TreeEntry<K, V> | null {
    let node = this.root;
    if (!node) return null;
    while (node.left) {
      node = node.left;
    }
    return { key: node.key, value: node.value };
  }

  findMax(): TreeEntry<K, V> | null {
    let node = this.root;
    if (!node) return null;
    while (node.right) {
      node = node.right;
    }
    return { key: node.key, value: node.value };
  }

  getSize(): number {
    return this.size;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  /**
   * Height of the whole tree, 0 when empty
   */
  getHeight(): number {
    return heightOf(this.root);
  }

  getRoot(): ReadonlyOSTNode<K, V> | null {
    return this.root;
  }

  clear(): void {
    this.root = null;
    this.size = 0;
    this.modificationCount++;
  }

  /**
   * Lazy in-order traversal (ascending key order)
   * Yields fresh entry objects; throws ConcurrentModificationError on the
   * next step if the tree is mutated while the traversal is in progress
   */
  inOrderTraversal(): IterableIterator<TreeEntry<K, V>> {
    return this.traverse(false, this.modificationCount);
  }

  /**
   * Lazy reverse in-order traversal (descending key order)
   */
  reverseOrderTraversal(): IterableIterator<TreeEntry<K, V>> {
    return this.traverse(true, this.modificationCount);
  }

  /**
   * Restartable view: every iteration starts a new ascending traversal
   *
   * Iteration is not a snapshot. Each traversal is tied to the tree as it
   * was when the traversal began; inserting or removing a key before the
   * traversal finishes makes its next step throw ConcurrentModificationError.
   * Collect the keys first (e.g. `Array.from(tree.entries())`) to mutate
   * while walking.
   */
  entries(): Iterable<TreeEntry<K, V>> {
    return {
      [Symbol.iterator]: () => this.inOrderTraversal()
    };
  }

  [Symbol.iterator](): IterableIterator<TreeEntry<K, V>> {
    return this.inOrderTraversal();
  }

  /**
   * Explicit-stack traversal; `descending` mirrors the walk
   * @param expectedModifications - Modification count when the traversal was requested
   */
  private *traverse(descending: boolean, expectedModifications: number): IterableIterator<TreeEntry<K, V>> {
    const stack: OSTNode<K, V>[] = [];
    let current = this.root;

    while (current || stack.length > 0) {
      if (this.modificationCount !== expectedModifications) {
        throw new ConcurrentModificationError();
      }
      while (current) {
        stack.push(current);
        current = descending ? current.right : current.left;
      }
      const node = stack.pop();
      if (!node) break;

      yield { key: node.key, value: node.value };
      current = descending ? node.left : node.right;
    }
  }

  private findNode(key: K): OSTNode<K, V> | null {
    let current = this.root;
    while (current) {
      const cmp = this.compareFn(key, current.key);
      if (cmp < 0) {
        current = current.left;
      } else if (cmp > 0) {
        current = current.right;
      } else {
        return current;
      }
    }
    return null;
  }

  /**
   * Recursive insert returning the new root of the subtree
   * Links are only reassigned after the recursive call returns, so a
   * duplicate key aborts before anything changes
   */
  private insertNode(current: OSTNode<K, V> | null, key: K, value: V): OSTNode<K, V> {
    if (!current) {
      this.size++;
      return { key, value, left: null, right: null, height: 1, count: 1 };
    }

    const cmp = this.compareFn(key, current.key);
    if (cmp < 0) {
      current.left = this.insertNode(current.left, key, value);
    } else if (cmp > 0) {
      current.right = this.insertNode(current.right, key, value);
    } else {
      throw new DuplicateKeyError(key);
    }

    this.refresh(current);
    return this.rebalance(current);
  }

  /**
   * Recursive delete returning the new root of the subtree
   * Two-child nodes take over their in-order successor's entry, then the
   * successor is deleted from the right subtree
   */
  private removeNode(current: OSTNode<K, V> | null, key: K): OSTNode<K, V> | null {
    if (!current) {
      throw new KeyNotFoundError(key);
    }

    const cmp = this.compareFn(key, current.key);
    if (cmp < 0) {
      current.left = this.removeNode(current.left, key);
    } else if (cmp > 0) {
      current.right = this.removeNode(current.right, key);
    } else {
      if (!current.left || !current.right) {
        this.size--;
        return current.left ?? current.right;
      }

      let successor = current.right;
      while (successor.left) {
        successor = successor.left;
      }
      current.key = successor.key;
      current.value = successor.value;
      current.right = this.removeNode(current.right, successor.key);
    }

    this.refresh(current);
    return this.rebalance(current);
  }

  /**
   * Recomputes cached height and count from the (already correct) children
   */
  private refresh(node: OSTNode<K, V>): void {
    node.height = 1 + Math.max(heightOf(node.left), heightOf(node.right));
    node.count = 1 + countOf(node.left) + countOf(node.right);
  }

  /**
   * Left rotation: the right child becomes the subtree root
   *
   *      node                    child
   *     /    \                  /     \
   *    a     child    --->    node     c
   *         /     \          /    \
   *        b       c        a      b
   */
  private rotateLeft(node: OSTNode<K, V>): OSTNode<K, V> {
    const child = node.right;
    if (!child) return node;

    node.right = child.left;
    child.left = node;

    this.refresh(node);
    this.refresh(child);
    return child;
  }

  /**
   * Right rotation: the left child becomes the subtree root
   *
   *        node                child
   *       /    \              /     \
   *    child    c    --->    a      node
   *   /     \                      /    \
   *  a       b                    b      c
   */
  private rotateRight(node: OSTNode<K, V>): OSTNode<K, V> {
    const child = node.left;
    if (!child) return node;

    node.left = child.right;
    child.right = node;

    this.refresh(node);
    this.refresh(child);
    return child;
  }

  /**
   * Restores the AVL property at one node, returning the new subtree root
   * Handles the four classic cases: right-right, right-left, left-left, left-right
   */
  private rebalance(node: OSTNode<K, V>): OSTNode<K, V> {
    const balance = heightOf(node.right) - heightOf(node.left);

    if (balance >= 2 && node.right) {
      if (heightOf(node.right.left) > heightOf(node.right.right)) {
        node.right = this.rotateRight(node.right);  // Right-left: straighten first
      }
      return this.rotateLeft(node);
    }

    if (balance <= -2 && node.left) {
      if (heightOf(node.left.right) > heightOf(node.left.left)) {
        node.left = this.rotateLeft(node.left);     // Left-right: straighten first
      }
      return this.rotateRight(node);
    }

    return node;
  }
}
