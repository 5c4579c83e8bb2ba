import type {
  AvailableSpace,
  Band,
  ClearSide,
  FloatContextOptions,
  FloatPlacement,
  FloatRequest,
  FloatSide,
} from '@float-placement/contracts';
import { createBandProfile } from './band-profile.js';
import { createFloatLogger, isFloatDebugEnabled, isInvariantCheckEnabled } from './debug.js';
import { commitPlacement, findPlacement, toFloatPlacement, type ProfilePlacement } from './placement.js';
import { parseClearSide, parseCoordinate, parseFloatContextOptions, parseFloatRequest } from './validation.js';

/**
 * Float bookkeeping for one block formatting context.
 *
 * Floats are only ever added, in document order; later floats never move
 * earlier ones.
 */
export type FloatContext = {
  readonly containingWidth: number;
  /** Number of live bands in the profile */
  readonly bandCount: number;
  /** Number of floats accepted so far */
  readonly floatCount: number;
  /** Places a float and records it. */
  addFloat(request: FloatRequest): FloatPlacement;
  /** Where {@link FloatContext.addFloat} would place the float, without recording it. */
  probeFloat(request: FloatRequest): FloatPlacement;
  /** Width left between the floats at `y`. */
  availableWidthAt(y: number): number;
  /**
   * Narrowest room for a line box spanning `[y, y + height)`. With the default
   * height of 0 this is the room at `y` alone.
   */
  availableSpaceAt(y: number, height?: number): AvailableSpace;
  leftExtentAt(y: number): number;
  rightExtentAt(y: number): number;
  /** Lowest float bottom on the given side, or 0 when there is none. */
  clearanceY(side: ClearSide): number;
  bands(): Band[];
  /** Multi-line dump of the band profile for debugging. */
  describe(): string;
};

const formatCoordinate = (value: number): string => (value === Infinity ? '∞' : String(value));

/**
 * Creates the float context for one block formatting context.
 *
 * @throws FloatPlacementError INVALID_OPTIONS when containingWidth is not a finite positive number
 *
 * @example
 * ```typescript
 * const floats = createFloatContext({ containingWidth: 100 });
 * floats.addFloat({ side: 'right', width: 30, height: 10 }); // { x: 70, y: 0, ... }
 * floats.addFloat({ side: 'left', width: 80, height: 10 }); // { x: 0, y: 10, ... }
 * floats.clearanceY('both'); // 20
 * ```
 */
export function createFloatContext(options: FloatContextOptions): FloatContext {
  const { containingWidth, debug, checkInvariants } = parseFloatContextOptions(options);
  const log = createFloatLogger(debug ?? isFloatDebugEnabled());
  const verify = checkInvariants ?? isInvariantCheckEnabled();

  const profile = createBandProfile();
  const lowestBottom: Record<FloatSide, number> = { left: 0, right: 0 };
  let floatCount = 0;

  const search = (request: FloatRequest): ProfilePlacement =>
    findPlacement(profile, parseFloatRequest(request), containingWidth, log);

  const bandAt = (y: number, field = 'y'): Band => profile.bandAt(parseCoordinate(y, field));

  return {
    containingWidth,

    get bandCount(): number {
      return profile.size;
    },

    get floatCount(): number {
      return floatCount;
    },

    addFloat(request: FloatRequest): FloatPlacement {
      const placement = commitPlacement(profile, search(request));

      const bottom = placement.y + placement.height;
      lowestBottom[placement.side] = Math.max(lowestBottom[placement.side], bottom);
      floatCount += 1;

      log('placed', placement.side, { x: placement.x, y: placement.y, bottom, bands: profile.size });
      if (verify) profile.checkInvariants(containingWidth);
      return placement;
    },

    probeFloat(request: FloatRequest): FloatPlacement {
      return toFloatPlacement(search(request));
    },

    availableWidthAt(y: number): number {
      const band = bandAt(y);
      return containingWidth - band.left - band.right;
    },

    availableSpaceAt(y: number, height = 0): AvailableSpace {
      const top = parseCoordinate(y, 'y');
      const span = parseCoordinate(height, 'height');
      const maxima = profile.maxExtents(top, top + span);
      return {
        offsetX: maxima.left,
        width: Math.max(0, containingWidth - maxima.left - maxima.right),
      };
    },

    leftExtentAt(y: number): number {
      return bandAt(y).left;
    },

    rightExtentAt(y: number): number {
      return bandAt(y).right;
    },

    clearanceY(side: ClearSide): number {
      switch (parseClearSide(side)) {
        case 'left':
          return lowestBottom.left;
        case 'right':
          return lowestBottom.right;
        case 'both':
          return Math.max(lowestBottom.left, lowestBottom.right);
        case 'none':
          return 0;
      }
    },

    bands(): Band[] {
      return profile.bands();
    },

    describe(): string {
      const bands = profile.bands();
      const lines = [`FloatContext(containingWidth=${containingWidth}): ${bands.length} band(s)`];
      for (const band of bands) {
        lines.push(
          `  [${formatCoordinate(band.top)}, ${formatCoordinate(band.bottom)}) left=${band.left} right=${band.right}`,
        );
      }
      return lines.join('\n');
    },
  };
}
