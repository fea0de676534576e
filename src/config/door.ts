// Door config — tunable at runtime, or per controller via resolveDoorConfig()

import type { CloseProfile, DoorConfig } from '../types/index';

export const CLOSE_PROFILES: Record<'sine' | 'cubicStepped', CloseProfile> = {
  // Continuous [3, 6) s with a gentle sine curve — the default
  sine: {
    minDuration: 3,
    maxDuration: 6,
    wholeSeconds: false,
    easing: { style: 'sine', direction: 'inOut' },
  },
  // Whole seconds in [2, 4] with the same cubic curve as opening
  cubicStepped: {
    minDuration: 2,
    maxDuration: 4,
    wholeSeconds: true,
    easing: { style: 'cubic', direction: 'inOut' },
  },
};

export const DOOR_CONFIG: DoorConfig = {
  assemblyName: 'DoorAssembly',
  leftPanelName: 'LeftPanel',
  rightPanelName: 'RightPanel',
  openOffset: { x: 0, y: 0, z: 2.6 },    // units — left panel slide when opening; right mirrors
  openEasing: { style: 'cubic', direction: 'inOut' },
  close: CLOSE_PROFILES.sine,
  missingPanelPolicy: 'abort',             // a missing panel stops the whole pass
};

/** Fresh config with `overrides` merged over DOOR_CONFIG; shares no objects with either */
export function resolveDoorConfig(overrides: Partial<DoorConfig> = {}): DoorConfig {
  const merged = { ...DOOR_CONFIG, ...overrides };
  return {
    ...merged,
    openOffset: { ...merged.openOffset },
    openEasing: { ...merged.openEasing },
    close: { ...merged.close, easing: { ...merged.close.easing } },
  };
}

/**
 * Draw one close duration from the profile.
 * `random` must return values in [0, 1), like Math.random.
 */
export function sampleCloseDuration(profile: CloseProfile, random: () => number = Math.random): number {
  const { minDuration, maxDuration } = profile;
  if (profile.wholeSeconds) {
    const lo = Math.ceil(minDuration);
    const hi = Math.floor(maxDuration);
    return lo + Math.floor(random() * (hi - lo + 1));
  }
  return minDuration + random() * (maxDuration - minDuration);
}
