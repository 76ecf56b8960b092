import type { SettingsAcquisition } from '../../src/capture/settingsCache.js';
import type { LightSnapshot, LightSnapshotProvider } from '../../src/capture/lightMonitor.js';
import type { CaptureSettings, LightSample, Profile, ScheduleDefinition } from '../../src/types.js';

export const ZURICH = { latitude: 47.37, longitude: 8.54, timezone: 'Europe/Zurich' };

export const DEFAULT_SETTINGS: CaptureSettings = {
  iso: 100,
  shutterSpeed: '1/500',
  exposureCompensation: 0,
  awbMode: 1,
  hdrMode: 0,
  bracketCount: 1,
  afMode: 2,
  lensPosition: 0,
  sharpness: 1,
  contrast: 1,
  saturation: 1
};

export function profile(id: string, overrides: Partial<Profile> = {}): Profile {
  return { id, name: id, enabled: true, baseSettings: {}, ...overrides };
}

export function fixedSchedule(
  name: string,
  startTime: string,
  endTime: string,
  overrides: Partial<ScheduleDefinition> = {}
): ScheduleDefinition {
  return {
    name,
    kind: 'fixed_time',
    startTime,
    endTime,
    intervalSeconds: 300,
    enabled: true,
    profiles: ['wide'],
    ...overrides
  };
}

export function lightSample(luxEstimate: number, timestamp = 0): LightSample {
  return { timestamp, luxEstimate, isGoldenHour: false, isBlueHour: false, source: 'static' };
}

export class FixedLight implements LightSnapshotProvider {
  current: LightSnapshot = { sample: null, stale: true, ageMs: null };

  set(luxEstimate: number, stale = false) {
    this.current = { sample: lightSample(luxEstimate), stale, ageMs: 0 };
  }

  snapshot(): LightSnapshot {
    return this.current;
  }
}

export function acquisition(overrides: Partial<SettingsAcquisition> = {}): SettingsAcquisition {
  return {
    settings: DEFAULT_SETTINGS,
    tier: 'cached',
    selectedTier: 'cached',
    degraded: false,
    lightStale: false,
    computedAt: 0,
    basis: null,
    deltaEv: 0,
    errors: [],
    ...overrides
  };
}

/** Collects unhandled rejections for the duration of a test. */
export function watchUnhandledRejections() {
  const reasons: unknown[] = [];
  const listener = (reason: unknown) => {
    reasons.push(reason);
  };
  process.on('unhandledRejection', listener);
  return {
    reasons,
    restore() {
      process.off('unhandledRejection', listener);
    }
  };
}

/** Promise whose settlement the test controls. */
export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export async function waitFor(predicate: () => boolean, timeout = 2000) {
  const start = Date.now();
  while (Date.now() - start < timeout) {
    if (predicate()) {
      return;
    }
    await new Promise(resolve => setTimeout(resolve, 50));
  }
  throw new Error('Timed out waiting for condition');
}
