import type { IndexEntry, IndexStats, LineNumber, Word } from "../types.js";
import type { EntriesOptions, WordIndex } from "../wordIndex.js";
import type { OccurrenceList } from "../occurrenceList.js";
import { InvalidArgumentError } from "../errors.js";
import { ArrayOccurrenceList } from "./arrayOccurrenceList.js";

const ALLOWED_IMBALANCE = 1;

type Node = {
  readonly word: Word;
  readonly occurrences: OccurrenceList;
  left: Node | undefined;
  right: Node | undefined;
  height: number;
};

function makeNode(word: Word, line: LineNumber): Node {
  const occurrences = new ArrayOccurrenceList();
  occurrences.append(line);
  return { word, occurrences, left: undefined, right: undefined, height: 0 };
}

function height(node: Node | undefined): number {
  return node ? node.height : -1;
}

function compareWords(a: Word, b: Word): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function fixHeight(node: Node): void {
  node.height = Math.max(height(node.left), height(node.right)) + 1;
}

/** Single rotation: `k1` (the left child of `k2`) becomes the subtree root. */
function rotateWithLeftChild(k2: Node, k1: Node): Node {
  k2.left = k1.right;
  k1.right = k2;
  fixHeight(k2);
  k1.height = Math.max(height(k1.left), k2.height) + 1;
  return k1;
}

/** Mirror of `rotateWithLeftChild`. */
function rotateWithRightChild(k1: Node, k2: Node): Node {
  k1.right = k2.left;
  k2.left = k1;
  fixHeight(k1);
  k2.height = Math.max(height(k2.right), k1.height) + 1;
  return k2;
}

/** Left-right case: lift `k2` (right child of `k1`) above `k1`, then above `k3`. */
function doubleWithLeftChild(k3: Node, k1: Node, k2: Node): Node {
  const lifted = rotateWithRightChild(k1, k2);
  k3.left = lifted;
  return rotateWithLeftChild(k3, lifted);
}

/** Right-left case, mirror of `doubleWithLeftChild`. */
function doubleWithRightChild(k1: Node, k3: Node, k2: Node): Node {
  const lifted = rotateWithLeftChild(k3, k2);
  k1.right = lifted;
  return rotateWithRightChild(k1, lifted);
}

/**
 * Restores balance at `node`, assuming both subtrees are balanced and
 * their heights differ by at most two (true after a single insert).
 */
function rebalance(node: Node): Node {
  const { left, right } = node;

  if (left && height(left) - height(right) > ALLOWED_IMBALANCE) {
    const inner = left.right;
    if (inner && height(left.left) < height(inner)) return doubleWithLeftChild(node, left, inner);
    return rotateWithLeftChild(node, left);
  }

  if (right && height(right) - height(left) > ALLOWED_IMBALANCE) {
    const inner = right.left;
    if (inner && height(right.right) < height(inner)) return doubleWithRightChild(node, right, inner);
    return rotateWithRightChild(node, right);
  }

  fixHeight(node);
  return node;
}

/** Returns the verified height of the subtree, or undefined if any invariant is broken. */
function verify(node: Node | undefined, lower: Word | undefined, upper: Word | undefined): number | undefined {
  if (!node) return -1;
  if (lower !== undefined && compareWords(node.word, lower) <= 0) return undefined;
  if (upper !== undefined && compareWords(node.word, upper) >= 0) return undefined;

  const lh = verify(node.left, lower, node.word);
  if (lh === undefined) return undefined;
  const rh = verify(node.right, node.word, upper);
  if (rh === undefined) return undefined;

  if (Math.abs(lh - rh) > ALLOWED_IMBALANCE) return undefined;
  const h = Math.max(lh, rh) + 1;
  return h === node.height ? h : undefined;
}

function toEntry(node: Node): IndexEntry {
  return { word: node.word, lines: node.occurrences.toArray() };
}

/**
 * Height-balanced (AVL) binary search tree keyed by word.
 *
 * Each insert walks down by comparison, then rebalances every node on the way
 * back up; the (possibly rotated) subtree root is written back into the parent's
 * child slot. Insert and lookup are O(log n) whatever the insertion order.
 *
 * Duplicate policy: a line is appended to a word's occurrences only if it is not
 * already there, so a word seen twice on one line is recorded once.
 */
export class AvlWordIndex implements WordIndex {
  private root: Node | undefined;
  private count = 0;

  get size(): number {
    return this.count;
  }

  insert(word: Word, line: LineNumber): void {
    if (word.length === 0) {
      throw new InvalidArgumentError("word must be non-empty", "word");
    }
    if (!Number.isSafeInteger(line) || line < 1) {
      throw new InvalidArgumentError("line number must be a positive integer", "line");
    }

    this.root = this.insertAt(this.root, word, line);
  }

  lookup(word: Word): LineNumber[] {
    return this.find(word)?.occurrences.toArray() ?? [];
  }

  has(word: Word): boolean {
    return this.find(word) !== undefined;
  }

  *entries(options?: EntriesOptions): IterableIterator<IndexEntry> {
    const after = options?.after;
    const stack: Node[] = [];

    // seed the stack with the path to the first word greater than `after`
    let cur = this.root;
    while (cur) {
      if (after !== undefined && compareWords(cur.word, after) <= 0) {
        cur = cur.right;
      } else {
        stack.push(cur);
        cur = cur.left;
      }
    }

    for (let node = stack.pop(); node; node = stack.pop()) {
      yield toEntry(node);
      for (cur = node.right; cur; cur = cur.left) stack.push(cur);
    }
  }

  [Symbol.iterator](): IterableIterator<IndexEntry> {
    return this.entries();
  }

  height(): number {
    return height(this.root);
  }

  isBalanced(): boolean {
    return verify(this.root, undefined, undefined) !== undefined;
  }

  stats(): IndexStats {
    return { words: this.count, height: this.height() };
  }

  private insertAt(node: Node | undefined, word: Word, line: LineNumber): Node {
    if (!node) {
      this.count++;
      return makeNode(word, line);
    }

    const cmp = compareWords(word, node.word);
    if (cmp < 0) {
      node.left = this.insertAt(node.left, word, line);
    } else if (cmp > 0) {
      node.right = this.insertAt(node.right, word, line);
    } else if (!node.occurrences.contains(line)) {
      node.occurrences.append(line);
    }

    return rebalance(node);
  }

  private find(word: Word): Node | undefined {
    let cur = this.root;
    while (cur) {
      const cmp = compareWords(word, cur.word);
      if (cmp === 0) return cur;
      cur = cmp < 0 ? cur.left : cur.right;
    }
    return undefined;
  }
}
