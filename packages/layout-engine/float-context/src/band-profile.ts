import type { Band, FloatSide } from '@float-placement/contracts';
import { SplayTree, compareNumbers, type TreeEntry } from './splay-tree.js';

/** Occupied width on each side of one band. */
export type Extents = {
  left: number;
  right: number;
};

/**
 * Per-side maxima over a vertical range, with the bottom of the last band that
 * attains each one. A placement that overlaps both of those bands cannot be
 * narrower than `left + right`.
 */
export type ExtentMaxima = {
  left: number;
  right: number;
  leftBottom: number;
  rightBottom: number;
};

/**
 * Tolerance for sums of fractional pixel extents.
 */
export const EXTENT_EPSILON = 0.0001;

/**
 * Ordered partition of `[0, ∞)` into maximal bands of constant float intrusion.
 *
 * Each tree node is the top of a band; a band ends where the next node starts,
 * and the last band is unbounded.
 */
export type BandProfile = {
  /** Number of live bands */
  readonly size: number;
  /** The band containing `y` */
  bandAt(y: number): Band;
  /** Ensures a band boundary exists at `y` without changing any extents */
  splitAt(y: number): void;
  /**
   * Raises `side`'s extent to at least `value` for every band fully inside
   * `[top, bottom)`, then merges neighbors that became equal.
   */
  setExtent(top: number, bottom: number, side: FloatSide, value: number): void;
  /** Largest `left + right` over the bands intersecting `[top, bottom)` */
  maxCombinedExtent(top: number, bottom: number): number;
  /** Largest extent per side over the bands intersecting `[top, bottom)` */
  maxExtents(top: number, bottom: number): ExtentMaxima;
  bands(): Band[];
  /** Throws when the partition is malformed. Meant for tests and debug builds. */
  checkInvariants(containingWidth: number): void;
};

const sameExtents = (a: Extents, b: Extents): boolean => a.left === b.left && a.right === b.right;

/**
 * Creates a profile holding a single empty band `[0, ∞)`.
 */
export function createBandProfile(): BandProfile {
  const tree = new SplayTree<number, Extents>(compareNumbers);
  tree.set(0, { left: 0, right: 0 });

  const entryAt = (y: number): TreeEntry<number, Extents> => {
    const entry = tree.floor(y);
    if (!entry) {
      throw new Error(`Band profile has no band containing y=${y}`);
    }
    return entry;
  };

  const bottomOf = (top: number): number => tree.successor(top)?.key ?? Infinity;

  /**
   * Visits the bands intersecting `[top, bottom)` in order. A range with
   * `bottom <= top` is treated as the single point `top`.
   */
  const forEachBandIn = (
    top: number,
    bottom: number,
    visit: (entry: TreeEntry<number, Extents>, bandBottom: number) => void,
  ): void => {
    let entry: TreeEntry<number, Extents> | null = entryAt(top);
    const end = bottom > top ? bottom : top;
    do {
      const next: TreeEntry<number, Extents> | null = tree.successor(entry.key);
      visit(entry, next?.key ?? Infinity);
      entry = next;
    } while (entry && entry.key < end);
  };

  const splitAt = (y: number): void => {
    if (y < 0) {
      throw new Error(`Cannot split band profile above its origin (y=${y})`);
    }
    if (y === Infinity) return;
    tree.insert(y, (floor) => (floor ? { ...floor.value } : { left: 0, right: 0 }));
  };

  /**
   * Deletes every boundary in `[top, bottom]` whose band equals the band
   * above it. Boundaries outside that range were not touched and already
   * separate distinct bands.
   */
  const mergeRange = (top: number, bottom: number): void => {
    const keys: number[] = [];
    for (let entry = tree.ceiling(top); entry && entry.key <= bottom; entry = tree.successor(entry.key)) {
      keys.push(entry.key);
    }

    for (const key of keys) {
      if (key === 0) continue;
      const current = tree.get(key);
      const previous = tree.predecessor(key);
      if (current && previous && sameExtents(previous.value, current)) {
        tree.delete(key);
      }
    }
  };

  const maxExtents = (top: number, bottom: number): ExtentMaxima => {
    const maxima: ExtentMaxima = { left: 0, right: 0, leftBottom: Infinity, rightBottom: Infinity };
    forEachBandIn(top, bottom, (entry, bandBottom) => {
      const { left, right } = entry.value;
      // >= keeps the last band on ties, which is the furthest one to skip past
      if (left >= maxima.left) {
        maxima.left = left;
        maxima.leftBottom = bandBottom;
      }
      if (right >= maxima.right) {
        maxima.right = right;
        maxima.rightBottom = bandBottom;
      }
    });
    return maxima;
  };

  return {
    get size(): number {
      return tree.size;
    },

    bandAt(y: number): Band {
      const entry = entryAt(y);
      return {
        top: entry.key,
        bottom: bottomOf(entry.key),
        left: entry.value.left,
        right: entry.value.right,
      };
    },

    splitAt,

    setExtent(top: number, bottom: number, side: FloatSide, value: number): void {
      if (!(bottom > top)) return;

      // Only bands that start inside the range and end at or before its bottom are raised.
      let entry: TreeEntry<number, Extents> | null = tree.ceiling(top);
      while (entry && entry.key < bottom) {
        const next: TreeEntry<number, Extents> | null = tree.successor(entry.key);
        const bandBottom = next?.key ?? Infinity;
        if (bandBottom <= bottom && entry.value[side] < value) {
          entry.value[side] = value;
        }
        entry = next;
      }

      mergeRange(top, bottom);
    },

    maxCombinedExtent(top: number, bottom: number): number {
      let max = 0;
      forEachBandIn(top, bottom, (entry) => {
        max = Math.max(max, entry.value.left + entry.value.right);
      });
      return max;
    },

    maxExtents,

    bands(): Band[] {
      const result: Band[] = [];
      for (const entry of tree.entries()) {
        const previous = result[result.length - 1];
        if (previous) previous.bottom = entry.key;
        result.push({ top: entry.key, bottom: Infinity, left: entry.value.left, right: entry.value.right });
      }
      return result;
    },

    checkInvariants(containingWidth: number): void {
      let previous: TreeEntry<number, Extents> | null = null;
      for (const entry of tree.entries()) {
        const { left, right } = entry.value;
        if (!previous && entry.key !== 0) {
          throw new Error(`Band profile must start at 0, found first band at ${entry.key}`);
        }
        if (previous && previous.key >= entry.key) {
          throw new Error(`Band tops out of order: ${previous.key} before ${entry.key}`);
        }
        if (previous && sameExtents(previous.value, entry.value)) {
          throw new Error(`Adjacent bands at ${previous.key} and ${entry.key} were not merged`);
        }
        if (left < 0 || right < 0) {
          throw new Error(`Negative extent in band at ${entry.key}`);
        }
        if (left + right > containingWidth + EXTENT_EPSILON) {
          throw new Error(
            `Band at ${entry.key} intrudes ${left + right}px into a ${containingWidth}px containing block`,
          );
        }
        previous = entry;
      }
      if (!previous) {
        throw new Error('Band profile is empty');
      }
      if (previous.value.left !== 0 || previous.value.right !== 0) {
        throw new Error(`Unbounded band at ${previous.key} carries float extents`);
      }
    },
  };
}
