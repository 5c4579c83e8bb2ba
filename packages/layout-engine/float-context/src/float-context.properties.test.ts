/**
 * Placement properties over long deterministic pseudo-random float sequences.
 *
 * Each placement is compared against a brute-force search over the rectangles
 * placed so far, and the band profile is checked after every float.
 */

import { describe, it, expect } from 'vitest';
import type { FloatPlacement, FloatRequest, FloatSide } from '@float-placement/contracts';
import { createFloatContext, type FloatContext } from './float-context.js';

const CONTAINING_WIDTH = 100;

/**
 * Small seeded PRNG (mulberry32) so failures reproduce.
 */
const createRandom = (seed: number): (() => number) => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

const randomInt = (random: () => number, min: number, max: number): number =>
  min + Math.floor(random() * (max - min + 1));

const makeRequests = (seed: number, count: number): Array<Required<FloatRequest>> => {
  const random = createRandom(seed);
  return Array.from({ length: count }, () => ({
    side: random() < 0.5 ? 'left' : 'right',
    width: randomInt(random, 1, CONTAINING_WIDTH),
    height: randomInt(random, 0, 30),
    minTop: randomInt(random, 0, 200),
  }));
};

const overlapsVertically = (a: FloatPlacement, top: number, bottom: number): boolean =>
  a.height > 0 && a.y < bottom && top < a.y + a.height;

/**
 * Reference search: tries minTop and every earlier float edge below it, and
 * returns the first top where the float fits beside everything it overlaps.
 */
const bruteForceTop = (placed: FloatPlacement[], request: Required<FloatRequest>): number => {
  const edges = placed.flatMap((p) => [p.y, p.y + p.height]).filter((y) => y > request.minTop);
  const candidates = [request.minTop, ...edges].sort((a, b) => a - b);

  for (const top of candidates) {
    const bottom = top + request.height;
    let left = 0;
    let right = 0;
    for (const p of placed) {
      if (p.width === 0 || !overlapsVertically(p, top, bottom)) continue;
      if (p.side === 'left') left = Math.max(left, p.x + p.width);
      else right = Math.max(right, CONTAINING_WIDTH - p.x);
    }
    if (CONTAINING_WIDTH - left - right >= request.width) return top;
  }
  throw new Error('no candidate fits');
};

const rectanglesIntersect = (a: FloatPlacement, b: FloatPlacement): boolean =>
  a.x < b.x + b.width && b.x < a.x + a.width && a.y < b.y + b.height && b.y < a.y + a.height;

const expectProfileInvariants = (floats: FloatContext, accepted: number): void => {
  const bands = floats.bands();
  expect(bands.length).toBeLessThanOrEqual(2 * accepted + 1);
  expect(bands[0]?.top).toBe(0);
  for (let i = 0; i < bands.length; i++) {
    const band = bands[i];
    expect(band.left + band.right).toBeLessThanOrEqual(CONTAINING_WIDTH);
    expect(floats.availableWidthAt(band.top)).toBeGreaterThanOrEqual(0);
    const next = bands[i + 1];
    if (next) {
      expect(next.top).toBe(band.bottom);
      expect(next.left === band.left && next.right === band.right).toBe(false);
    }
  }
};

describe('float placement properties', () => {
  it.each([1, 7, 42, 1234])('holds for seed %i', (seed) => {
    const floats = createFloatContext({ containingWidth: CONTAINING_WIDTH, checkInvariants: true });
    const placed: FloatPlacement[] = [];
    const lowest: Record<FloatSide, number> = { left: 0, right: 0 };
    const probes = Array.from({ length: 60 }, (_, i) => i * 4 + 0.5);
    let previousExtents = probes.map(() => ({ left: 0, right: 0 }));

    for (const request of makeRequests(seed, 150)) {
      const expectedTop = request.height > 0 ? bruteForceTop(placed, request) : request.minTop;
      const placement = floats.addFloat(request);

      expect(placement.y).toBe(expectedTop);
      expect(placement.y).toBeGreaterThanOrEqual(request.minTop);
      expect(placement.x).toBeGreaterThanOrEqual(0);
      expect(placement.x + placement.width).toBeLessThanOrEqual(CONTAINING_WIDTH);

      if (placement.width > 0 && placement.height > 0) {
        for (const other of placed) {
          expect(rectanglesIntersect(placement, other)).toBe(false);
        }
      }

      placed.push(placement);
      lowest[placement.side] = Math.max(lowest[placement.side], placement.y + placement.height);
      expect(floats.clearanceY(placement.side)).toBe(lowest[placement.side]);

      expectProfileInvariants(floats, placed.length);

      const extents = probes.map((y) => ({ left: floats.leftExtentAt(y), right: floats.rightExtentAt(y) }));
      extents.forEach((current, i) => {
        expect(current.left).toBeGreaterThanOrEqual(previousExtents[i].left);
        expect(current.right).toBeGreaterThanOrEqual(previousExtents[i].right);
      });
      previousExtents = extents;
    }

    expect(floats.floatCount).toBe(150);
    expect(floats.clearanceY('both')).toBe(Math.max(lowest.left, lowest.right));
  });

  it('handles floats requested in increasing document order', () => {
    const floats = createFloatContext({ containingWidth: CONTAINING_WIDTH, checkInvariants: true });
    for (let i = 0; i < 500; i++) {
      const side: FloatSide = i % 2 === 0 ? 'left' : 'right';
      const placement = floats.addFloat({ side, width: 30, height: 10, minTop: i * 5 });
      expect(placement.y).toBe(i * 5);
    }
    // overlapping same-width floats collapse into a handful of bands
    expect(floats.bandCount).toBe(4);
    expect(floats.availableWidthAt(2497)).toBe(40);
    expect(floats.availableWidthAt(2502)).toBe(70);
    expect(floats.availableWidthAt(2505)).toBe(100);
  });
});
