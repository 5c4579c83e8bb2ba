const readEnvFlag = (name: string): boolean =>
  typeof process !== 'undefined' && typeof process.env !== 'undefined' && Boolean(process.env[name]);

export const FLOAT_DEBUG_ENV = 'FLOAT_DEBUG_LAYOUT';
export const FLOAT_INVARIANTS_ENV = 'FLOAT_CHECK_INVARIANTS';

export type FloatLogger = (...args: unknown[]) => void;

export const isFloatDebugEnabled = (): boolean => readEnvFlag(FLOAT_DEBUG_ENV);

export const isInvariantCheckEnabled = (): boolean => readEnvFlag(FLOAT_INVARIANTS_ENV);

export const noopLogger: FloatLogger = () => {};

/**
 * Returns a console logger that stays silent unless `enabled`.
 */
export const createFloatLogger = (enabled: boolean): FloatLogger => {
  if (!enabled) return noopLogger;
  return (...args: unknown[]): void => {
    console.log('[floats]', ...args);
  };
};
