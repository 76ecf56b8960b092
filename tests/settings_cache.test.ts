import { describe, expect, it, vi } from 'vitest';
import {
  SettingsCache,
  lightDeltaEv,
  TIER_ORDER,
  selectTier,
  type TierContext,
  type TierThresholds
} from '../src/capture/settingsCache.js';
import type { SettingsComputationInput } from '../src/capture/exposure.js';
import type { Focuser } from '../src/capture/device.js';
import type { LightSnapshot, LightSnapshotProvider } from '../src/capture/lightMonitor.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import type { CaptureSettings, LightSample } from '../src/types.js';

const THRESHOLDS: TierThresholds = {
  adaptEv: 1,
  recalcEv: 3,
  refocusEv: 5,
  maxStaleMs: 600_000,
  focusMaxAgeMs: 3_600_000,
  minRefocusIntervalMs: 300_000
};

const DEFAULTS: CaptureSettings = {
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

class FakeLight implements LightSnapshotProvider {
  current: LightSnapshot = { sample: null, stale: true, ageMs: null };

  set(luxEstimate: number, stale = false) {
    const sample: LightSample = { timestamp: 0, luxEstimate, isGoldenHour: false, isBlueHour: false, source: 'static' };
    this.current = { sample, stale, ageMs: 0 };
  }

  snapshot(): LightSnapshot {
    return this.current;
  }
}

function createCache(options: { focuser?: Focuser; lastFocusAt?: number | null } = {}) {
  let now = 1_000_000;
  const light = new FakeLight();
  light.set(1000);
  const compute = vi.fn(async ({ base }: SettingsComputationInput) => ({ ...base, iso: 400, shutterSpeed: '1/250' }));
  const cache = new SettingsCache({
    calculator: { name: 'fake', compute },
    focuser: options.focuser ?? null,
    light,
    defaults: DEFAULTS,
    thresholds: THRESHOLDS,
    lastFocusAt: options.lastFocusAt,
    clock: () => now,
    metrics: new MetricsRegistry()
  });
  return {
    cache,
    light,
    compute,
    advance(ms: number) {
      now += ms;
    },
    now: () => now
  };
}

function context(overrides: Partial<TierContext>): TierContext {
  return { hasEntry: true, ageMs: 0, deltaEv: 0, refocusDue: false, ...overrides };
}

describe('TierSelection', () => {
  it('SelectTier picks the cheapest tier whose predicate holds', () => {
    expect(selectTier(context({ deltaEv: 0.5 }), THRESHOLDS)).toBe('cached');
    expect(selectTier(context({ deltaEv: 1 }), THRESHOLDS)).toBe('light_adapt');
    expect(selectTier(context({ deltaEv: 3 }), THRESHOLDS)).toBe('full_recalc');
    expect(selectTier(context({ ageMs: 600_001 }), THRESHOLDS)).toBe('full_recalc');
    expect(selectTier(context({ hasEntry: false, ageMs: Infinity, deltaEv: Infinity }), THRESHOLDS)).toBe(
      'full_recalc'
    );
    expect(selectTier(context({ refocusDue: true }), THRESHOLDS)).toBe('refocus');
  });

  it('TierIndex never drops as the light delta grows', () => {
    const deltas = [0, 0.25, 0.5, 0.99, 1, 2, 2.99, 3, 4, 4.99, 5, 8, 20];

    for (const ageMs of [0, 60_000, 600_000, 600_001]) {
      const tiers = deltas.map(deltaEv =>
        selectTier(context({ ageMs, deltaEv, refocusDue: deltaEv >= THRESHOLDS.refocusEv }), THRESHOLDS)
      );
      const indexes = tiers.map(tier => TIER_ORDER.indexOf(tier));

      indexes.forEach((index, position) => {
        expect(index).toBeGreaterThanOrEqual(indexes[position - 1] ?? 0);
      });
      if (ageMs === 60_000) {
        expect(tiers).toEqual([
          'cached',
          'cached',
          'cached',
          'cached',
          'light_adapt',
          'light_adapt',
          'light_adapt',
          'full_recalc',
          'full_recalc',
          'full_recalc',
          'refocus',
          'refocus',
          'refocus'
        ]);
      }
    }
  });

  it('LightDelta is infinite without both samples', () => {
    expect(lightDeltaEv(null, null)).toBe(Number.POSITIVE_INFINITY);
  });
});

describe('SettingsCache', () => {
  it('FirstAcquisition computes fresh settings', async () => {
    const { cache, compute } = createCache();

    const result = await cache.acquire();

    expect(result).toMatchObject({
      tier: 'full_recalc',
      selectedTier: 'full_recalc',
      degraded: false,
      lightStale: false,
      computedAt: 1_000_000
    });
    expect(result.settings.iso).toBe(400);
    expect(compute).toHaveBeenCalledTimes(1);
    expect(Object.isFrozen(result.settings)).toBe(true);
  });

  it('SteadyLight reuses the cached entry', async () => {
    const { cache, compute, advance } = createCache();
    await cache.acquire();
    advance(60_000);

    const result = await cache.acquire();

    expect(result.tier).toBe('cached');
    expect(result.computedAt).toBe(1_000_000);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('ModerateChange adapts exposure and keeps the computation time', async () => {
    const { cache, light, compute, advance } = createCache();
    await cache.acquire();
    advance(60_000);
    light.set(2000);

    const result = await cache.acquire();

    expect(result.tier).toBe('light_adapt');
    expect(result.deltaEv).toBe(1);
    expect(result.settings).toMatchObject({ iso: 200, shutterSpeed: '1/250' });
    expect(result.computedAt).toBe(1_000_000);
    expect(result.basis?.luxEstimate).toBe(2000);
    expect(compute).toHaveBeenCalledTimes(1);

    advance(1_000);
    await expect(cache.acquire()).resolves.toMatchObject({ tier: 'cached', deltaEv: 0 });
  });

  it('LargeChange recomputes', async () => {
    const { cache, light, compute, advance } = createCache();
    await cache.acquire();
    advance(60_000);
    light.set(16000);

    const result = await cache.acquire();

    expect(result.tier).toBe('full_recalc');
    expect(result.deltaEv).toBe(4);
    expect(result.computedAt).toBe(1_060_000);
    expect(compute).toHaveBeenCalledTimes(2);
  });

  it('AgedEntry recomputes', async () => {
    const { cache, advance } = createCache();
    await cache.acquire();
    advance(600_001);

    await expect(cache.acquire()).resolves.toMatchObject({ tier: 'full_recalc' });
  });

  it('StaleLight forces a recompute', async () => {
    const { cache, light, advance } = createCache();
    await cache.acquire();
    advance(1_000);
    light.set(1000, true);

    const result = await cache.acquire();

    expect(result).toMatchObject({ tier: 'full_recalc', lightStale: true, deltaEv: Number.POSITIVE_INFINITY });
  });

  it('FailedRecompute falls back to the last known good settings', async () => {
    const { cache, light, compute, advance } = createCache();
    const first = await cache.acquire();
    advance(60_000);
    light.set(16000);
    compute.mockRejectedValueOnce(new Error('meter offline'));

    const result = await cache.acquire();

    expect(result).toMatchObject({
      tier: 'full_recalc',
      selectedTier: 'full_recalc',
      degraded: true,
      computedAt: 1_000_000,
      errors: ['full_recalc: meter offline']
    });
    expect(result.settings).toEqual(first.settings);
  });

  it('FailedFirstRecompute uses the profile defaults', async () => {
    const { cache, compute } = createCache();
    compute.mockRejectedValueOnce(new Error('meter offline'));

    const result = await cache.acquire();

    expect(result.degraded).toBe(true);
    expect(result.computedAt).toBeNull();
    expect(result.settings).toEqual(DEFAULTS);
    expect(cache.peek()).toBeNull();
  });

  it('Refocus runs first without a known focus and pins the lens', async () => {
    const focus = vi.fn(async () => ({ lensPosition: 3.25 }));
    const { cache } = createCache({ focuser: { focus } });

    const result = await cache.acquire();

    expect(result.tier).toBe('refocus');
    expect(result.settings).toMatchObject({ afMode: 0, lensPosition: 3.25 });
    expect(focus).toHaveBeenCalledTimes(1);
    expect(cache.focusState()).toEqual({ lastFocusAt: 1_000_000, lastRefocusAttemptAt: 1_000_000, lensPosition: 3.25 });
  });

  it('FailedRefocus is rate limited', async () => {
    const focus = vi.fn(async (): Promise<{ lensPosition: number }> => {
      throw new Error('lens stuck');
    });
    const { cache, advance } = createCache({ focuser: { focus } });

    const failed = await cache.acquire();
    expect(failed).toMatchObject({
      tier: 'refocus',
      degraded: true,
      errors: ['refocus: Focus failed: lens stuck']
    });

    advance(1_000);
    const next = await cache.acquire();
    expect(next).toMatchObject({ tier: 'full_recalc', degraded: false });
    expect(focus).toHaveBeenCalledTimes(1);
  });

  it('FailedRecalc falls through to refocus', async () => {
    const focus = vi.fn(async () => ({ lensPosition: 1.5 }));
    const { cache, compute } = createCache({ focuser: { focus }, lastFocusAt: 1_000_000 });
    compute.mockRejectedValueOnce(new Error('meter offline'));

    const result = await cache.acquire();

    expect(result).toMatchObject({ tier: 'refocus', selectedTier: 'full_recalc', degraded: false });
    expect(compute).toHaveBeenCalledTimes(2);
    expect(focus).toHaveBeenCalledTimes(1);
  });

  it('ConcurrentAcquisitions run one at a time', async () => {
    const { cache, compute } = createCache();

    const [first, second] = await Promise.all([cache.acquire(), cache.acquire()]);

    expect(first.tier).toBe('full_recalc');
    expect(second.tier).toBe('cached');
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('NewDefaults invalidate the entry', async () => {
    const { cache } = createCache();
    await cache.acquire();

    cache.updateOptions({ defaults: { ...DEFAULTS, saturation: 1.2 } });

    expect(cache.peek()).toBeNull();
    const result = await cache.acquire();
    expect(result.tier).toBe('full_recalc');
    expect(result.settings.saturation).toBe(1.2);
  });
});
