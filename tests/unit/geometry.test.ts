import { describe, it, expect } from 'vitest';
import { computeTargetSize } from '../../src/image/geometry.js';

describe('computeTargetSize', () => {
  it('should scale both axes by a percentage, rounding down', () => {
    expect(computeTargetSize({ width: 3, height: 3 }, { mode: 'Percent', value: 50 })).toEqual({ width: 1, height: 1 });
    expect(computeTargetSize({ width: 1000, height: 750 }, { mode: 'Percent', value: 100 })).toEqual({ width: 1000, height: 750 });
    expect(computeTargetSize({ width: 30, height: 20 }, { mode: 'Percent', value: 200 })).toEqual({ width: 60, height: 40 });
  });

  it('should derive height from a target width', () => {
    expect(computeTargetSize({ width: 1000, height: 750 }, { mode: 'Width', value: 400 })).toEqual({ width: 400, height: 300 });
  });

  it('should derive width from a target height', () => {
    expect(computeTargetSize({ width: 640, height: 480 }, { mode: 'Height', value: 100 })).toEqual({ width: 133, height: 100 });
  });

  it('should never produce a zero-pixel axis', () => {
    expect(computeTargetSize({ width: 10, height: 3 }, { mode: 'Width', value: 1 })).toEqual({ width: 1, height: 1 });
    expect(computeTargetSize({ width: 1, height: 1 }, { mode: 'Percent', value: 1 })).toEqual({ width: 1, height: 1 });
  });
});
