/**
 * Shared float placement contracts.
 *
 * Coordinates are in the containing block's space: `x` grows rightward from the
 * left content edge, `y` grows downward from the top of the block formatting
 * context. All values are in CSS pixels.
 */

/** Edge a float is pushed toward. */
export type FloatSide = 'left' | 'right';

/** Value of the `clear` property as understood by clearance queries. */
export type ClearSide = FloatSide | 'both' | 'none';

/**
 * A request to place one float.
 *
 * Width and height are the float's margin-box size, already resolved by the
 * caller. The core never computes box dimensions.
 */
export type FloatRequest = {
  side: FloatSide;
  width: number;
  height: number;
  /** Lowest allowed top edge. Defaults to 0. */
  minTop?: number;
};

/** Where a float ended up. */
export type FloatPlacement = {
  side: FloatSide;
  x: number;
  y: number;
  width: number;
  height: number;
};

/**
 * A maximal vertical interval `[top, bottom)` over which the intruded widths are constant.
 * The last band of a profile has `bottom === Infinity`.
 */
export type Band = {
  top: number;
  bottom: number;
  /** Width occupied by left floats, measured from the left edge */
  left: number;
  /** Width occupied by right floats, measured from the right edge */
  right: number;
};

/** Horizontal room left for line boxes after floats intrude. */
export type AvailableSpace = {
  /** Left inset caused by left floats */
  offsetX: number;
  /** Remaining width between the floats */
  width: number;
};

export type FloatContextOptions = {
  /** Width of the containing block. Must be finite and positive. */
  containingWidth: number;
  /** Emit placement traces. Defaults to the FLOAT_DEBUG_LAYOUT environment variable. */
  debug?: boolean;
  /**
   * Verify the band profile after every committed float.
   * Defaults to the FLOAT_CHECK_INVARIANTS environment variable.
   */
  checkInvariants?: boolean;
};
