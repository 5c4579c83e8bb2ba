import { describe, it, expect } from 'vitest';
import * as floatContext from './index.js';

describe('package entry', () => {
  it('exposes the float context and keeps the raw commit step internal', () => {
    expect(typeof floatContext.createFloatContext).toBe('function');
    expect(floatContext).not.toHaveProperty('commitPlacement');
    expect(floatContext).not.toHaveProperty('findPlacement');
  });
});
