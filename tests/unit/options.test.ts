import { describe, it, expect } from 'vitest';
import { InvalidOptionsError } from '../../src/errors.js';
import {
  DEFAULT_POLICY,
  resolveFailurePolicy,
  resolveOutputPolicy,
  resolveResizeSpec,
} from '../../src/options.js';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidOptionsError) return err.issues;
    throw err;
  }
  throw new Error('expected InvalidOptionsError');
}

describe('resolveResizeSpec', () => {
  it('should default to half size', () => {
    expect(resolveResizeSpec()).toEqual({ mode: 'Percent', value: 50 });
  });

  it('should keep a valid spec', () => {
    expect(resolveResizeSpec({ mode: 'Width', value: 800 })).toEqual({ mode: 'Width', value: 800 });
  });

  it('should reject values outside 1..10000', () => {
    const low = issuesOf(() => resolveResizeSpec({ mode: 'Width', value: 0 }));
    expect(low).toHaveLength(1);
    expect(low[0]).toMatch(/^resize\.value: /);

    expect(issuesOf(() => resolveResizeSpec({ value: 10_001 }))).toHaveLength(1);
    expect(issuesOf(() => resolveResizeSpec({ value: 2.5 }))).toHaveLength(1);
  });
});

describe('resolveOutputPolicy', () => {
  it('should fill defaults', () => {
    expect(resolveOutputPolicy()).toEqual(DEFAULT_POLICY);
    expect(DEFAULT_POLICY).toEqual({
      format: 'jpg',
      quality: 85,
      stripGps: true,
      stripSerials: true,
      namePattern: 'img_{index}_{date}',
    });
  });

  it('should normalize format spellings', () => {
    expect(resolveOutputPolicy({ format: 'JPEG' }).format).toBe('jpg');
    expect(resolveOutputPolicy({ format: '.PNG' }).format).toBe('png');
    expect(resolveOutputPolicy({ format: ' webp ' }).format).toBe('webp');
  });

  it('should list every problem at once', () => {
    const issues = issuesOf(() => resolveOutputPolicy({ format: 'gif', quality: 101 }));
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^policy\.format: /);
    expect(issues[1]).toMatch(/^policy\.quality: /);
  });
});

describe('resolveFailurePolicy', () => {
  it('should default to fail-fast', () => {
    expect(resolveFailurePolicy()).toBe('fail-fast');
    expect(resolveFailurePolicy('isolate')).toBe('isolate');
  });

  it('should reject unknown policies', () => {
    const issues = issuesOf(() => resolveFailurePolicy('skip'));
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^onError: /);
  });
});
