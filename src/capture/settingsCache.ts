import { performance } from 'node:perf_hooks';
import loggerModule, { type EngineLogger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import { SettingsComputationError, errorMessage } from '../errors.js';
import type { CaptureSettings, CaptureSettingsCacheEntry, CaptureTier, LightSample } from '../types.js';
import type { Focuser } from './device.js';
import { adaptExposure, type SettingsCalculator } from './exposure.js';
import { luxDeltaEv, type LightSnapshotProvider } from './lightMonitor.js';

export interface TierThresholds {
  /** Below this EV delta the cached settings are reused as-is. */
  adaptEv: number;
  /** Below this EV delta the cached settings are scaled instead of recomputed. */
  recalcEv: number;
  /** At or above this EV delta the lens is refocused. */
  refocusEv: number;
  maxStaleMs: number;
  focusMaxAgeMs: number;
  minRefocusIntervalMs: number;
}

export type TierContext = {
  hasEntry: boolean;
  /** Infinity without an entry. */
  ageMs: number;
  /** Infinity when either lux reading is missing. */
  deltaEv: number;
  refocusDue: boolean;
};

type TierRule = {
  tier: CaptureTier;
  applies: (context: TierContext, thresholds: TierThresholds) => boolean;
};

export const TIER_ORDER: readonly CaptureTier[] = ['cached', 'light_adapt', 'full_recalc', 'refocus'];

export const TIER_RULES: readonly TierRule[] = [
  {
    tier: 'cached',
    applies: (context, thresholds) =>
      context.hasEntry &&
      !context.refocusDue &&
      context.ageMs <= thresholds.maxStaleMs &&
      context.deltaEv < thresholds.adaptEv
  },
  {
    tier: 'light_adapt',
    applies: (context, thresholds) =>
      context.hasEntry &&
      !context.refocusDue &&
      context.ageMs <= thresholds.maxStaleMs &&
      context.deltaEv < thresholds.recalcEv
  },
  { tier: 'full_recalc', applies: context => !context.refocusDue },
  { tier: 'refocus', applies: () => true }
];

export function selectTier(context: TierContext, thresholds: TierThresholds): CaptureTier {
  for (const rule of TIER_RULES) {
    if (rule.applies(context, thresholds)) {
      return rule.tier;
    }
  }
  return 'refocus';
}

/** Signed EV change from `basis` to `current`; Infinity when either is missing. */
export function signedLightDeltaEv(basis: LightSample | null, current: LightSample | null): number {
  if (!basis || !current) {
    return Number.POSITIVE_INFINITY;
  }
  return luxDeltaEv(basis.luxEstimate, current.luxEstimate);
}

export function lightDeltaEv(basis: LightSample | null, current: LightSample | null): number {
  return Math.abs(signedLightDeltaEv(basis, current));
}

export type SettingsAcquisition = Readonly<{
  settings: Readonly<CaptureSettings>;
  /** Tier that produced the settings. */
  tier: CaptureTier;
  /** Tier the predicates picked before any fallback. */
  selectedTier: CaptureTier;
  degraded: boolean;
  lightStale: boolean;
  computedAt: number | null;
  basis: LightSample | null;
  deltaEv: number;
  errors: readonly string[];
}>;

export type FocusState = {
  lastFocusAt: number | null;
  lastRefocusAttemptAt: number | null;
  lensPosition: number | null;
};

export interface SettingsCacheOptions {
  calculator: SettingsCalculator;
  focuser?: Focuser | null;
  light: LightSnapshotProvider;
  defaults: CaptureSettings;
  thresholds: TierThresholds;
  focusTimeoutMs?: number;
  lastFocusAt?: number | null;
  clock?: () => number;
  logger?: EngineLogger;
  metrics?: MetricsRegistry;
}

type TierInput = {
  entry: CaptureSettingsCacheEntry | null;
  sample: LightSample | null;
  signedDelta: number;
  now: number;
  signal?: AbortSignal;
};

function noop() {}

/**
 * Owns the single settings entry. Acquisitions run one at a time; each picks
 * the cheapest tier whose predicate holds and falls through to the next tier
 * when its action fails.
 */
export class SettingsCache {
  private calculator: SettingsCalculator;
  private readonly focuser: Focuser | null;
  private readonly light: LightSnapshotProvider;
  private defaults: Readonly<CaptureSettings>;
  private thresholds: Readonly<TierThresholds>;
  private readonly focusTimeoutMs: number | undefined;
  private readonly clock: () => number;
  private readonly log: EngineLogger;
  private readonly metrics: MetricsRegistry;
  private entry: Readonly<CaptureSettingsCacheEntry> | null = null;
  private lastFocusAt: number | null;
  private lastRefocusAttemptAt: number | null = null;
  private lensPosition: number | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: SettingsCacheOptions) {
    this.calculator = options.calculator;
    this.focuser = options.focuser ?? null;
    this.light = options.light;
    this.defaults = Object.freeze({ ...options.defaults });
    this.thresholds = Object.freeze({ ...options.thresholds });
    this.focusTimeoutMs = options.focusTimeoutMs;
    this.lastFocusAt = options.lastFocusAt ?? null;
    this.clock = options.clock ?? Date.now;
    this.log = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  acquire(options: { signal?: AbortSignal } = {}): Promise<SettingsAcquisition> {
    const run = this.queue.then(() => this.acquireNow(options.signal));
    this.queue = run.then(noop, noop);
    return run;
  }

  peek(): Readonly<CaptureSettingsCacheEntry> | null {
    return this.entry;
  }

  invalidate() {
    this.entry = null;
  }

  focusState(): FocusState {
    return {
      lastFocusAt: this.lastFocusAt,
      lastRefocusAttemptAt: this.lastRefocusAttemptAt,
      lensPosition: this.lensPosition
    };
  }

  thresholdsSnapshot(): Readonly<TierThresholds> {
    return this.thresholds;
  }

  updateOptions(options: {
    defaults?: CaptureSettings;
    thresholds?: TierThresholds;
    calculator?: SettingsCalculator;
  }) {
    if (options.thresholds) {
      this.thresholds = Object.freeze({ ...options.thresholds });
    }
    if (options.calculator && options.calculator !== this.calculator) {
      this.calculator = options.calculator;
      this.entry = null;
    }
    if (options.defaults) {
      this.defaults = Object.freeze({ ...options.defaults });
      this.entry = null;
    }
  }

  private async acquireNow(signal: AbortSignal | undefined): Promise<SettingsAcquisition> {
    const now = this.clock();
    const snapshot = this.light.snapshot();
    const sample = snapshot.sample;
    const entry = this.entry;
    const signedDelta = snapshot.stale ? Number.POSITIVE_INFINITY : signedLightDeltaEv(entry?.basis ?? null, sample);
    const deltaEv = Math.abs(signedDelta);

    const context: TierContext = {
      hasEntry: entry !== null,
      ageMs: entry ? Math.max(0, now - entry.computedAt) : Number.POSITIVE_INFINITY,
      deltaEv,
      refocusDue: this.isRefocusDue(now, deltaEv)
    };
    const selectedTier = selectTier(context, this.thresholds);
    const errors: string[] = [];

    for (const tier of TIER_ORDER.slice(TIER_ORDER.indexOf(selectedTier))) {
      if (signal?.aborted) {
        errors.push(`${tier}: aborted`);
        break;
      }
      if (!this.canAttempt(tier, entry, signedDelta, now)) {
        continue;
      }

      const started = performance.now();
      try {
        const next = await this.runTier(tier, { entry, sample, signedDelta, now, signal });
        this.metrics.recordSettingsTier(tier, performance.now() - started);
        if (tier !== selectedTier) {
          this.metrics.recordSettingsFallback(selectedTier, tier);
          this.log.warn({ selectedTier, tier, errors }, 'Settings computed by fallback tier');
        }
        this.entry = next;
        return freezeAcquisition({
          settings: next.settings,
          tier,
          selectedTier,
          degraded: false,
          lightStale: snapshot.stale,
          computedAt: next.computedAt,
          basis: next.basis,
          deltaEv,
          errors
        });
      } catch (error) {
        errors.push(`${tier}: ${errorMessage(error)}`);
        this.log.warn({ err: error, tier, selectedTier }, 'Settings tier failed');
      }
    }

    this.metrics.recordSettingsFallback(selectedTier, 'degraded');
    this.log.error(
      { selectedTier, errors, hasEntry: entry !== null },
      'All settings tiers failed; using last known good settings'
    );
    return freezeAcquisition({
      settings: entry?.settings ?? this.baseSettings(),
      tier: selectedTier,
      selectedTier,
      degraded: true,
      lightStale: snapshot.stale,
      computedAt: entry?.computedAt ?? null,
      basis: entry?.basis ?? null,
      deltaEv,
      errors
    });
  }

  private canAttempt(
    tier: CaptureTier,
    entry: CaptureSettingsCacheEntry | null,
    signedDelta: number,
    now: number
  ): boolean {
    switch (tier) {
      case 'cached':
        return entry !== null;
      case 'light_adapt':
        return entry !== null && Number.isFinite(signedDelta);
      case 'full_recalc':
        return true;
      case 'refocus':
        return this.refocusAllowed(now);
      default:
        return false;
    }
  }

  private async runTier(tier: CaptureTier, input: TierInput): Promise<Readonly<CaptureSettingsCacheEntry>> {
    const { entry, sample, signedDelta, now, signal } = input;
    switch (tier) {
      case 'cached':
        if (!entry) {
          throw new SettingsComputationError('No cached settings');
        }
        return entry;
      case 'light_adapt': {
        if (!entry) {
          throw new SettingsComputationError('No cached settings to adapt');
        }
        // brighter light (positive delta) needs less exposure
        const settings = adaptExposure(entry.settings, 2 ** -signedDelta);
        return freezeEntry({ computedAt: entry.computedAt, basis: sample, settings, tier });
      }
      case 'full_recalc':
        return this.recompute(tier, sample, now, signal);
      case 'refocus':
        await this.refocus(now, signal);
        return this.recompute(tier, sample, now, signal);
      default:
        throw new SettingsComputationError(`Unknown tier ${String(tier)}`);
    }
  }

  private async recompute(
    tier: CaptureTier,
    sample: LightSample | null,
    now: number,
    signal: AbortSignal | undefined
  ): Promise<Readonly<CaptureSettingsCacheEntry>> {
    const settings = await this.calculator.compute({ sample, base: this.baseSettings(), signal });
    return freezeEntry({ computedAt: now, basis: sample, settings, tier });
  }

  private async refocus(now: number, signal: AbortSignal | undefined) {
    if (!this.focuser) {
      throw new SettingsComputationError('No focuser configured');
    }
    this.lastRefocusAttemptAt = now;
    try {
      const result = await this.focuser.focus({ signal, timeoutMs: this.focusTimeoutMs });
      this.lensPosition = result.lensPosition;
      this.lastFocusAt = now;
      this.log.info({ lensPosition: result.lensPosition }, 'Refocused lens');
    } catch (error) {
      throw new SettingsComputationError(`Focus failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private baseSettings(): CaptureSettings {
    if (this.lensPosition === null) {
      return { ...this.defaults };
    }
    return { ...this.defaults, afMode: 0, lensPosition: this.lensPosition };
  }

  private refocusAllowed(now: number): boolean {
    if (!this.focuser) {
      return false;
    }
    if (this.lastRefocusAttemptAt === null) {
      return true;
    }
    return now - this.lastRefocusAttemptAt >= this.thresholds.minRefocusIntervalMs;
  }

  private isRefocusDue(now: number, deltaEv: number): boolean {
    if (!this.refocusAllowed(now)) {
      return false;
    }
    if (this.lastFocusAt === null) {
      return true;
    }
    if (now - this.lastFocusAt > this.thresholds.focusMaxAgeMs) {
      return true;
    }
    return Number.isFinite(deltaEv) && deltaEv >= this.thresholds.refocusEv;
  }
}

function freezeEntry(entry: CaptureSettingsCacheEntry): Readonly<CaptureSettingsCacheEntry> {
  return Object.freeze({ ...entry, settings: Object.freeze({ ...entry.settings }) });
}

function freezeAcquisition(acquisition: SettingsAcquisition): SettingsAcquisition {
  return Object.freeze({
    ...acquisition,
    settings: Object.freeze({ ...acquisition.settings }),
    errors: Object.freeze([...acquisition.errors])
  });
}
