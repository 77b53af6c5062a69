import { describe, it, expect, beforeEach } from 'vitest';
import { faker } from '@faker-js/faker';
import { OrderStatisticsTree, type ReadonlyOSTNode } from '../order-statistics-tree.js';
import {
  ConcurrentModificationError,
  DuplicateKeyError,
  KeyNotFoundError,
  OutOfRangeError
} from '../errors.js';

interface SubtreeShape {
  height: number;
  count: number;
}

/**
 * Walks the whole tree and fails on any broken AVL or cache invariant
 */
function checkInvariants<K, V>(
  node: ReadonlyOSTNode<K, V> | null,
  compare: (a: K, b: K) => number
): SubtreeShape {
  if (!node) return { height: 0, count: 0 };

  if (node.left) expect(compare(node.left.key, node.key)).toBeLessThan(0);
  if (node.right) expect(compare(node.right.key, node.key)).toBeGreaterThan(0);

  const left = checkInvariants(node.left, compare);
  const right = checkInvariants(node.right, compare);

  expect(Math.abs(right.height - left.height)).toBeLessThanOrEqual(1);
  expect(node.height).toBe(1 + Math.max(left.height, right.height));
  expect(node.count).toBe(1 + left.count + right.count);

  return { height: node.height, count: node.count };
}

const byNumber = (a: number, b: number) => a - b;

// Key, height and count of every node in pre-order
function describeShape<K, V>(node: ReadonlyOSTNode<K, V> | null): string {
  if (!node) return '.';
  return `(${String(node.key)}:${node.height}:${node.count} ${describeShape(node.left)} ${describeShape(node.right)})`;
}

describe('OrderStatisticsTree', () => {
  let tree: OrderStatisticsTree<number, string>;

  const keys = () => Array.from(tree.inOrderTraversal(), entry => entry.key);

  beforeEach(() => {
    tree = new OrderStatisticsTree<number, string>(byNumber);
  });

  describe('Basic Operations', () => {
    it('should create an empty tree', () => {
      expect(tree.isEmpty()).toBe(true);
      expect(tree.getSize()).toBe(0);
      expect(tree.getHeight()).toBe(0);
      expect(tree.getRoot()).toBe(null);
    });

    it('should insert and look up values', () => {
      tree.insert(10, 'ten');
      tree.insert(5, 'five');
      tree.insert(15, 'fifteen');

      expect(tree.get(10)).toBe('ten');
      expect(tree.get(5)).toBe('five');
      expect(tree.find(15)).toBe('fifteen');
      expect(tree.find(20)).toBe(null);
      expect(tree.has(5)).toBe(true);
      expect(tree.has(6)).toBe(false);
      expect(tree.getSize()).toBe(3);
      expect(tree.isEmpty()).toBe(false);
    });

    it('should reject duplicate keys and leave the tree unchanged', () => {
      tree.insert(10, 'ten');

      expect(() => tree.insert(10, 'TEN')).toThrow(DuplicateKeyError);
      expect(tree.getSize()).toBe(1);
      expect(tree.get(10)).toBe('ten');
    });

    it('should update an existing key with set', () => {
      tree.insert(10, 'ten');
      tree.set(10, 'TEN');
      tree.set(20, 'twenty');

      expect(tree.get(10)).toBe('TEN');
      expect(tree.get(20)).toBe('twenty');
      expect(tree.getSize()).toBe(2);
    });

    it('should remove keys and return their values', () => {
      tree.insert(10, 'ten');
      tree.insert(5, 'five');
      tree.insert(15, 'fifteen');

      expect(tree.remove(10)).toBe('ten');
      expect(tree.has(10)).toBe(false);
      expect(tree.getSize()).toBe(2);
      expect(keys()).toEqual([5, 15]);
    });

    it('should throw KeyNotFoundError for missing keys without mutating', () => {
      tree.insert(10, 'ten');

      expect(() => tree.get(99)).toThrow(KeyNotFoundError);
      expect(() => tree.remove(99)).toThrow(KeyNotFoundError);
      expect(tree.getSize()).toBe(1);
      expect(keys()).toEqual([10]);
    });

    it('should throw KeyNotFoundError on an empty tree', () => {
      expect(() => tree.get(1)).toThrow(KeyNotFoundError);
      expect(() => tree.remove(1)).toThrow(KeyNotFoundError);
      expect(tree.getSize()).toBe(0);
    });

    it('should clear every entry', () => {
      [3, 1, 2].forEach(key => tree.insert(key, `v${key}`));
      tree.clear();

      expect(tree.getSize()).toBe(0);
      expect(tree.getRoot()).toBe(null);
      expect(keys()).toEqual([]);
    });
  });

  describe('Failed Mutations', () => {
    beforeEach(() => {
      [50, 30, 70, 20, 40, 60, 80, 10, 35, 65].forEach(key => tree.insert(key, `v${key}`));
    });

    it('should leave a deep tree untouched after a duplicate insert', () => {
      const before = describeShape(tree.getRoot());

      expect(() => tree.insert(35, 'again')).toThrow(DuplicateKeyError);
      expect(describeShape(tree.getRoot())).toBe(before);
      expect(tree.get(35)).toBe('v35');
      checkInvariants(tree.getRoot(), byNumber);
    });

    it('should leave a deep tree untouched after removing an absent key', () => {
      const before = describeShape(tree.getRoot());

      expect(() => tree.remove(37)).toThrow(KeyNotFoundError);
      expect(describeShape(tree.getRoot())).toBe(before);
      expect(() => tree.remove(75)).toThrow(KeyNotFoundError);
      expect(describeShape(tree.getRoot())).toBe(before);
      expect(tree.getSize()).toBe(10);
      checkInvariants(tree.getRoot(), byNumber);
    });

    it('should build the expected shape', () => {
      expect(tree.getHeight()).toBe(4);
      expect(tree.getRoot()?.left?.right?.left?.key).toBe(35);
    });
  });

  describe('Scenarios', () => {
    it('should order and rank a small tree', () => {
      [20, 10, 45, 5, 25, 1].forEach(key => tree.insert(key, `v${key}`));

      expect(keys()).toEqual([1, 5, 10, 20, 25, 45]);
      expect(tree.kthLargest(1).key).toBe(45);
      expect(tree.kthLargest(6).key).toBe(1);
      checkInvariants(tree.getRoot(), byNumber);
    });

    it('should rotate right when the left side grows too tall', () => {
      [20, 10, 45, 5, 25, 1].forEach(key => tree.insert(key, `v${key}`));

      const root = tree.getRoot();
      expect(root?.key).toBe(20);
      expect(root?.height).toBe(3);
      expect(root?.count).toBe(6);
      expect(root?.left?.key).toBe(5);
      expect(root?.left?.left?.key).toBe(1);
      expect(root?.left?.right?.key).toBe(10);
      expect(root?.right?.key).toBe(45);
      expect(root?.right?.left?.key).toBe(25);
    });

    it('should replace a removed two-child node with its successor', () => {
      [20, 10, 45, 5, 25, 1].forEach(key => tree.insert(key, `v${key}`));

      expect(tree.remove(20)).toBe('v20');

      expect(keys()).toEqual([1, 5, 10, 25, 45]);
      const root = tree.getRoot();
      expect(root?.key).toBe(25);
      expect(root?.value).toBe('v25');
      expect(root?.count).toBe(5);
      expect(root?.right?.key).toBe(45);
      expect(root?.right?.left).toBe(null);
      checkInvariants(tree.getRoot(), byNumber);
    });

    it('should keep ascending insertions logarithmically tall', () => {
      for (let key = 1; key <= 7; key++) {
        tree.insert(key, `v${key}`);
      }

      expect(tree.getHeight()).toBe(3);
      expect(tree.getHeight()).toBeLessThanOrEqual(Math.ceil(1.44 * Math.log2(9)));
      expect(tree.getRoot()?.key).toBe(4);
      expect(tree.getRoot()?.left?.key).toBe(2);
      expect(tree.getRoot()?.right?.key).toBe(6);
    });

    it('should handle the right-left case', () => {
      [10, 30, 20].forEach(key => tree.insert(key, `v${key}`));

      expect(tree.getRoot()?.key).toBe(20);
      expect(tree.getRoot()?.left?.key).toBe(10);
      expect(tree.getRoot()?.right?.key).toBe(30);
    });

    it('should handle the left-right case', () => {
      [30, 10, 20].forEach(key => tree.insert(key, `v${key}`));

      expect(tree.getRoot()?.key).toBe(20);
      expect(tree.getRoot()?.left?.key).toBe(10);
      expect(tree.getRoot()?.right?.key).toBe(30);
    });
  });

  describe('Order Statistics', () => {
    beforeEach(() => {
      [50, 30, 70, 20, 40, 60, 80].forEach(key => tree.insert(key, `v${key}`));
    });

    it('should return the k-th largest entry', () => {
      expect(tree.kthLargest(1)).toEqual({ key: 80, value: 'v80' });
      expect(tree.kthLargest(4)).toEqual({ key: 50, value: 'v50' });
      expect(tree.kthLargest(7)).toEqual({ key: 20, value: 'v20' });
    });

    it('should agree with the ascending sequence for every rank', () => {
      const ascending = keys();
      for (let k = 1; k <= tree.getSize(); k++) {
        expect(tree.kthLargest(k).key).toBe(ascending[tree.getSize() - k]);
      }
    });

    it('should reject ranks outside [1, size]', () => {
      expect(() => tree.kthLargest(0)).toThrow(OutOfRangeError);
      expect(() => tree.kthLargest(8)).toThrow(OutOfRangeError);
      expect(() => tree.kthLargest(-1)).toThrow(OutOfRangeError);
      expect(() => tree.kthLargest(1.5)).toThrow(OutOfRangeError);
      expect(tree.getSize()).toBe(7);
    });

    it('should reject every rank on an empty tree', () => {
      const empty = new OrderStatisticsTree<number, string>(byNumber);
      expect(() => empty.kthLargest(1)).toThrow('1 is outside the range [1, 0]');
    });

    it('should track ranks after removals', () => {
      tree.remove(80);
      tree.remove(50);

      expect(tree.kthLargest(1).key).toBe(70);
      expect(tree.kthLargest(3).key).toBe(40);
      expect(tree.kthLargest(5).key).toBe(20);
    });

    it('should find the minimum and maximum', () => {
      expect(tree.findMin()).toEqual({ key: 20, value: 'v20' });
      expect(tree.findMax()).toEqual({ key: 80, value: 'v80' });
      expect(new OrderStatisticsTree<number, string>(byNumber).findMin()).toBe(null);
    });
  });

  describe('Traversal', () => {
    beforeEach(() => {
      [50, 30, 70, 20, 40].forEach(key => tree.insert(key, `v${key}`));
    });

    it('should traverse in ascending order', () => {
      expect(keys()).toEqual([20, 30, 40, 50, 70]);
    });

    it('should traverse in descending order', () => {
      expect(Array.from(tree.reverseOrderTraversal(), entry => entry.key)).toEqual([70, 50, 40, 30, 20]);
    });

    it('should restart iteration through entries and the iterator protocol', () => {
      const entries = tree.entries();
      expect(Array.from(entries, entry => entry.value)).toEqual(['v20', 'v30', 'v40', 'v50', 'v70']);
      expect(Array.from(entries, entry => entry.value)).toEqual(['v20', 'v30', 'v40', 'v50', 'v70']);
      expect([...tree].map(entry => entry.key)).toEqual([20, 30, 40, 50, 70]);
    });

    it('should be lazy', () => {
      const traversal = tree.inOrderTraversal();
      expect(traversal.next().value).toEqual({ key: 20, value: 'v20' });
      expect(traversal.next().value).toEqual({ key: 30, value: 'v30' });
    });

    it('should fail fast when the tree changes mid-traversal', () => {
      const traversal = tree.inOrderTraversal();
      traversal.next();
      tree.insert(60, 'v60');

      expect(() => traversal.next()).toThrow(ConcurrentModificationError);
    });

    it('should fail fast when removing while looping over entries', () => {
      const seen: number[] = [];

      expect(() => {
        for (const { key } of tree.entries()) {
          seen.push(key);
          if (key === 20) tree.remove(40);
        }
      }).toThrow(ConcurrentModificationError);
      expect(seen).toEqual([20]);
    });

    it('should allow removal while looping over collected entries', () => {
      for (const { key } of Array.from(tree.entries())) {
        if (key >= 40) tree.remove(key);
      }

      expect(keys()).toEqual([20, 30]);
    });

    it('should fail when the tree changes before the first step', () => {
      const traversal = tree.reverseOrderTraversal();
      tree.remove(20);

      expect(() => traversal.next()).toThrow(ConcurrentModificationError);
    });

    it('should allow value updates during traversal', () => {
      const seen: string[] = [];
      for (const entry of tree.inOrderTraversal()) {
        tree.set(entry.key, entry.value.toUpperCase());
        seen.push(entry.value);
      }

      expect(seen).toEqual(['v20', 'v30', 'v40', 'v50', 'v70']);
      expect(tree.get(40)).toBe('V40');
    });

    it('should handle empty tree traversal', () => {
      const empty = new OrderStatisticsTree<number, string>(byNumber);
      expect(Array.from(empty.inOrderTraversal())).toEqual([]);
    });
  });

  describe('Custom Comparison Functions', () => {
    it('should work with string keys', () => {
      const names = new OrderStatisticsTree<string, number>((a, b) => a.localeCompare(b));
      ['mango', 'apple', 'kiwi', 'banana'].forEach((name, i) => names.insert(name, i));

      expect(Array.from(names.inOrderTraversal(), entry => entry.key)).toEqual(['apple', 'banana', 'kiwi', 'mango']);
      expect(names.kthLargest(1).key).toBe('mango');
      expect(names.get('kiwi')).toBe(2);
    });

    it('should work with a descending comparator', () => {
      const descending = new OrderStatisticsTree<number, string>((a, b) => b - a);
      [1, 3, 2].forEach(key => descending.insert(key, `v${key}`));

      expect(Array.from(descending.inOrderTraversal(), entry => entry.key)).toEqual([3, 2, 1]);
      expect(descending.kthLargest(1).key).toBe(1);
    });
  });

  describe('Properties', () => {
    it('should keep every invariant through random inserts and removals', () => {
      faker.seed(1234);
      const model = new Set<number>();

      for (let step = 0; step < 2000; step++) {
        const key = faker.number.int({ min: 0, max: 300 });
        if (model.has(key)) {
          expect(tree.remove(key)).toBe(`v${key}`);
          model.delete(key);
        } else {
          tree.insert(key, `v${key}`);
          model.add(key);
        }

        if (step % 100 === 0) {
          checkInvariants(tree.getRoot(), byNumber);
        }
      }

      checkInvariants(tree.getRoot(), byNumber);
      const expected = Array.from(model).sort(byNumber);
      expect(keys()).toEqual(expected);
      expect(tree.getSize()).toBe(expected.length);
      if (expected.length > 0) {
        expect(tree.kthLargest(1).key).toBe(expected[expected.length - 1]);
        expect(tree.kthLargest(expected.length).key).toBe(expected[0]);
      }
    });

    it('should restore the sequence when an insert is undone', () => {
      [8, 3, 11, 1, 6].forEach(key => tree.insert(key, `v${key}`));
      const before = keys();

      tree.insert(7, 'v7');
      tree.remove(7);

      expect(keys()).toEqual(before);
      expect(tree.getSize()).toBe(5);
      checkInvariants(tree.getRoot(), byNumber);
    });

    it('should give identical answers to repeated queries', () => {
      [8, 3, 11].forEach(key => tree.insert(key, `v${key}`));

      expect(tree.has(3)).toBe(tree.has(3));
      expect(tree.get(11)).toBe(tree.get(11));
      expect(tree.kthLargest(2)).toEqual(tree.kthLargest(2));
    });

    it('should stay within the AVL height bound for large inputs', () => {
      const count = 10000;
      for (let key = 0; key < count; key++) {
        tree.insert(key, `v${key}`);
      }

      expect(tree.getSize()).toBe(count);
      expect(tree.getHeight()).toBeLessThanOrEqual(Math.ceil(1.44 * Math.log2(count + 2)));
    });
  });
});
