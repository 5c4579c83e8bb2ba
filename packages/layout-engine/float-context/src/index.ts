/**
 * Float placement for block formatting contexts (CSS 2.1 §9.5.1).
 *
 * The band profile tracks how far left and right floats intrude at every
 * vertical position; the placement search walks it to find the first top where
 * a float fits for its whole height.
 */

export type {
  AvailableSpace,
  Band,
  ClearSide,
  FloatContextOptions,
  FloatPlacement,
  FloatRequest,
  FloatSide,
} from '@float-placement/contracts';

export { createFloatContext, type FloatContext } from './float-context.js';
export { FloatPlacementError, type FloatPlacementErrorCode } from './errors.js';
export { createBandProfile, type BandProfile, type ExtentMaxima, type Extents } from './band-profile.js';
export { SplayTree, compareNumbers, type Comparator, type TreeEntry } from './splay-tree.js';
export { floatRequestSchema, parseFloatRequest, type NormalizedFloatRequest } from './validation.js';
export { FLOAT_DEBUG_ENV, FLOAT_INVARIANTS_ENV } from './debug.js';
