// Easing curves — every style is defined once as its ease-in shape;
// out and inOut are derived by reflection so all three stay consistent.
// All curves map 0 → 0 and 1 → 1. Overshooting styles (back, elastic)
// leave [0, 1] in between.

import type { EasingDirection, EasingFn, EasingStyle } from '../types/index';

const BACK_C1 = 1.70158;
const BACK_C3 = BACK_C1 + 1;
const ELASTIC_C4 = (2 * Math.PI) / 3;

function bounceOut(t: number): number {
  const n1 = 7.5625;
  const d1 = 2.75;
  if (t < 1 / d1) return n1 * t * t;
  if (t < 2 / d1) {
    const u = t - 1.5 / d1;
    return n1 * u * u + 0.75;
  }
  if (t < 2.5 / d1) {
    const u = t - 2.25 / d1;
    return n1 * u * u + 0.9375;
  }
  const u = t - 2.625 / d1;
  return n1 * u * u + 0.984375;
}

const EASE_IN: Record<EasingStyle, EasingFn> = {
  linear: (t) => t,
  quad: (t) => t * t,
  cubic: (t) => t * t * t,
  quart: (t) => t * t * t * t,
  quint: (t) => t * t * t * t * t,
  sine: (t) => 1 - Math.cos((t * Math.PI) / 2),
  exponential: (t) => (t === 0 ? 0 : Math.pow(2, 10 * t - 10)),
  circular: (t) => 1 - Math.sqrt(1 - t * t),
  back: (t) => BACK_C3 * t * t * t - BACK_C1 * t * t,
  bounce: (t) => 1 - bounceOut(1 - t),
  elastic: (t) => {
    if (t === 0 || t === 1) return t;
    return -Math.pow(2, 10 * t - 10) * Math.sin((t * 10 - 10.75) * ELASTIC_C4);
  },
};

function clamp01(t: number): number {
  return t < 0 ? 0 : t > 1 ? 1 : t;
}

export function getEasing(style: EasingStyle, direction: EasingDirection): EasingFn {
  const easeIn = EASE_IN[style];
  switch (direction) {
    case 'in':
      return (t) => easeIn(clamp01(t));
    case 'out':
      return (t) => 1 - easeIn(1 - clamp01(t));
    case 'inOut':
      return (t) => {
        const c = clamp01(t);
        return c < 0.5 ? easeIn(2 * c) / 2 : 1 - easeIn(2 - 2 * c) / 2;
      };
  }
}

export const EASING_STYLES: readonly EasingStyle[] = [
  'linear', 'quad', 'cubic', 'quart', 'quint', 'sine',
  'exponential', 'circular', 'back', 'bounce', 'elastic',
];
