import type { FloatPlacement } from '@float-placement/contracts';
import { EXTENT_EPSILON, type BandProfile } from './band-profile.js';
import { noopLogger, type FloatLogger } from './debug.js';
import { FloatPlacementError } from './errors.js';
import type { NormalizedFloatRequest } from './validation.js';

/**
 * A placement together with the extent it claims on its side, measured from
 * that side's edge. Only {@link findPlacement} produces these.
 */
export type ProfilePlacement = FloatPlacement & {
  extent: number;
};

export const toFloatPlacement = ({ side, x, y, width, height }: ProfilePlacement): FloatPlacement => ({
  side,
  x,
  y,
  width,
  height,
});

/**
 * Finds the highest position at or below `minTop` where the float fits for its
 * whole height, without changing the profile.
 *
 * The search starts at `minTop` and looks at every band the float would cover.
 * The float fits when the widest left intrusion plus the widest right intrusion
 * across those bands leaves room for its width, within {@link EXTENT_EPSILON}.
 * Otherwise the candidate top jumps past the obstruction: to the earlier of the
 * bottoms of the last bands carrying those maxima. Any top before that point still overlaps both bands,
 * so no feasible position is skipped. The unbounded last band never carries
 * extents, so the search ends once it passes the lowest float.
 *
 * Left floats sit right after the widest left intrusion in their span, right
 * floats right before the widest right intrusion, so a float never overlaps an
 * earlier float of its own side.
 *
 * @throws FloatPlacementError INVALID_WIDTH when the float is wider than the containing block
 */
export function findPlacement(
  profile: BandProfile,
  request: NormalizedFloatRequest,
  containingWidth: number,
  log: FloatLogger = noopLogger,
): ProfilePlacement {
  const { side, width, height, minTop } = request;

  if (width > containingWidth) {
    throw new FloatPlacementError(
      'INVALID_WIDTH',
      `Float width ${width}px exceeds the ${containingWidth}px containing block.`,
      { width, containingWidth },
    );
  }

  if (height === 0) {
    // An empty span covers no band, so it always fits where it was asked for.
    const band = profile.bandAt(minTop);
    if (side === 'left') {
      const x = Math.min(band.left, containingWidth - width);
      return { side, x, y: minTop, width, height, extent: x + width };
    }
    const x = Math.max(0, containingWidth - band.right - width);
    return { side, x, y: minTop, width, height, extent: containingWidth - x };
  }

  let y = minTop;
  let skips = 0;
  for (;;) {
    const maxima = profile.maxExtents(y, y + height);
    if (containingWidth - (maxima.left + maxima.right) >= width - EXTENT_EPSILON) {
      const x = side === 'left' ? maxima.left : Math.max(0, containingWidth - maxima.right - width);
      const extent = (side === 'left' ? maxima.left : maxima.right) + width;
      log('found', side, { x, y, width, height, skips });
      return { side, x, y, width, height, extent };
    }

    const next = Math.min(maxima.leftBottom, maxima.rightBottom);
    if (!(next > y) || next === Infinity) {
      throw new Error(`Float search stalled at y=${y} (next candidate ${next})`);
    }
    log('skip', side, { from: y, to: next, left: maxima.left, right: maxima.right });
    y = next;
    skips += 1;
  }
}

/**
 * Records a placement returned by {@link findPlacement} in the profile.
 *
 * Only accepts a placement found against the same profile with nothing
 * committed in between; the extent is trusted as is. Splits the profile at the
 * float's top and bottom and raises the float's side over that span to the
 * stored extent. Zero-area floats occupy nothing.
 *
 * Returns the public placement without the extent.
 */
export function commitPlacement(profile: BandProfile, placement: ProfilePlacement): FloatPlacement {
  const { side, y, width, height, extent } = placement;
  if (width === 0 || height === 0) return toFloatPlacement(placement);

  const bottom = y + height;
  profile.splitAt(y);
  profile.splitAt(bottom);
  profile.setExtent(y, bottom, side, extent);
  return toFloatPlacement(placement);
}
