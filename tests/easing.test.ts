import { describe, it, expect } from 'vitest';
import { getEasing, EASING_STYLES } from '../src/engine/easing';
import type { EasingDirection } from '../src/types/index';

const DIRECTIONS: EasingDirection[] = ['in', 'out', 'inOut'];

// ─── Endpoints ───

describe('Easing endpoints', () => {
  for (const style of EASING_STYLES) {
    for (const direction of DIRECTIONS) {
      it(`${style}/${direction} maps 0 → 0 and 1 → 1`, () => {
        const ease = getEasing(style, direction);
        expect(ease(0)).toBeCloseTo(0, 10);
        expect(ease(1)).toBeCloseTo(1, 10);
      });
    }
  }

  for (const style of EASING_STYLES) {
    it(`${style}/inOut passes through the midpoint`, () => {
      expect(getEasing(style, 'inOut')(0.5)).toBeCloseTo(0.5, 10);
    });
  }
});

// ─── Known values ───

describe('Easing shapes', () => {
  it('linear is the identity', () => {
    const ease = getEasing('linear', 'inOut');
    expect(ease(0.3)).toBeCloseTo(0.3, 10);
  });

  it('cubic in / out / inOut', () => {
    expect(getEasing('cubic', 'in')(0.5)).toBeCloseTo(0.125, 10);
    expect(getEasing('cubic', 'out')(0.5)).toBeCloseTo(0.875, 10);
    expect(getEasing('cubic', 'inOut')(0.25)).toBeCloseTo(0.0625, 10);
    expect(getEasing('cubic', 'inOut')(0.75)).toBeCloseTo(0.9375, 10);
  });

  it('sine in at the midpoint is 1 - cos(π/4)', () => {
    expect(getEasing('sine', 'in')(0.5)).toBeCloseTo(1 - Math.SQRT1_2, 10);
  });

  it('sine inOut follows half a cosine wave', () => {
    // (1 - cos(πt)) / 2 at t = 0.25
    expect(getEasing('sine', 'inOut')(0.25)).toBeCloseTo((1 - Math.SQRT1_2) / 2, 10);
  });

  it('back in dips below zero before rising', () => {
    expect(getEasing('back', 'in')(0.2)).toBeLessThan(0);
  });

  it('inOut curves are symmetric about the midpoint', () => {
    const ease = getEasing('quart', 'inOut');
    expect(ease(0.2) + ease(0.8)).toBeCloseTo(1, 10);
  });
});

// ─── Clamping ───

describe('Easing input clamping', () => {
  it('clamps t below 0 and above 1', () => {
    const ease = getEasing('quad', 'out');
    expect(ease(-0.5)).toBe(0);
    expect(ease(1.5)).toBe(1);
  });
});
