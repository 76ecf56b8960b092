import loggerModule, { type EngineLogger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import { PartialBurstFailure, errorMessage } from '../errors.js';
import type {
  CaptureOutcome,
  CaptureSettings,
  CaptureTier,
  LightSample,
  Profile,
  ScheduleWindow
} from '../types.js';
import { exposureCompensationForLux, whiteBalanceForLux } from './curves.js';
import type { CaptureTrigger } from './device.js';

export const AWB_MODE_MANUAL = 6;
export const BURST_DEADLINE_MESSAGE = 'burst deadline exceeded';
export const BURST_ABORTED_MESSAGE = 'burst aborted';

export type BurstContext = {
  scheduleName: string;
  sequence: number;
  tier: CaptureTier;
  degraded: boolean;
  lightSample: LightSample | null;
  signal?: AbortSignal;
};

export type BurstReport = {
  scheduleName: string;
  sequence: number;
  outcomes: CaptureOutcome[];
  attempted: number;
  succeeded: number;
  /** Every attempted profile succeeded (false when nothing was attempted). */
  success: boolean;
  /** At least one profile reached the device. */
  anySuccess: boolean;
  deadlineExceeded: boolean;
  durationMs: number;
  skippedProfiles: string[];
  failure: PartialBurstFailure | null;
};

export interface BurstControllerOptions {
  device: CaptureTrigger;
  requestTimeoutMs?: number;
  burstTimeoutMs?: number;
  clock?: () => number;
  logger?: EngineLogger;
  metrics?: MetricsRegistry;
}

/** base ← profile overrides ← adaptive white balance ← adaptive exposure compensation. */
export function resolveProfileSettings(
  base: CaptureSettings,
  profile: Profile,
  lux: number | null
): CaptureSettings {
  const settings: CaptureSettings = { ...base, ...profile.baseSettings };

  if (profile.adaptiveWb?.enabled) {
    settings.awbMode = AWB_MODE_MANUAL;
    settings.wbTemp = whiteBalanceForLux(profile.adaptiveWb.curve, lux);
  }

  if (profile.adaptiveEv?.enabled && lux !== null) {
    settings.exposureCompensation = exposureCompensationForLux(profile.adaptiveEv.curve, lux);
  }

  return settings;
}

export class BurstController {
  private readonly device: CaptureTrigger;
  private requestTimeoutMs: number;
  private burstTimeoutMs: number;
  private readonly clock: () => number;
  private readonly log: EngineLogger;
  private readonly metrics: MetricsRegistry;

  constructor(options: BurstControllerOptions) {
    this.device = options.device;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 15_000;
    this.burstTimeoutMs = options.burstTimeoutMs ?? 120_000;
    this.clock = options.clock ?? Date.now;
    this.log = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  configure(options: { requestTimeoutMs?: number; burstTimeoutMs?: number }) {
    if (typeof options.requestTimeoutMs === 'number') {
      this.requestTimeoutMs = options.requestTimeoutMs;
    }
    if (typeof options.burstTimeoutMs === 'number') {
      this.burstTimeoutMs = options.burstTimeoutMs;
    }
  }

  /**
   * Captures each enabled profile of the window in order, one request at a
   * time. A failed profile never stops the ones after it.
   */
  async runBurst(
    window: ScheduleWindow,
    profiles: ReadonlyMap<string, Profile>,
    baseSettings: CaptureSettings,
    context: BurstContext
  ): Promise<BurstReport> {
    const startedAt = this.clock();
    const deadline = startedAt + this.burstTimeoutMs;
    const lux = context.lightSample?.luxEstimate ?? null;
    const outcomes: CaptureOutcome[] = [];
    const skippedProfiles: string[] = [];
    let deadlineExceeded = false;

    for (const profileId of window.profiles) {
      const profile = profiles.get(profileId);
      if (!profile || !profile.enabled) {
        skippedProfiles.push(profileId);
        this.log.debug(
          { schedule: context.scheduleName, profile: profileId, known: Boolean(profile) },
          'Skipping profile'
        );
        continue;
      }

      const requestStartedAt = this.clock();
      const base = {
        scheduleName: context.scheduleName,
        profileId,
        timestamp: requestStartedAt,
        sequence: context.sequence,
        tier: context.tier,
        degraded: context.degraded
      };

      if (context.signal?.aborted) {
        outcomes.push({ ...base, success: false, error: BURST_ABORTED_MESSAGE, latencyMs: 0 });
        continue;
      }

      const remaining = deadline - requestStartedAt;
      if (remaining <= 0) {
        deadlineExceeded = true;
        outcomes.push({ ...base, success: false, error: BURST_DEADLINE_MESSAGE, latencyMs: 0 });
        continue;
      }

      try {
        const settings = resolveProfileSettings(baseSettings, profile, lux);
        await this.device.capture(
          { settings, profileId, scheduleName: context.scheduleName, sequence: context.sequence },
          { signal: context.signal, timeoutMs: Math.min(this.requestTimeoutMs, remaining) }
        );
        outcomes.push({ ...base, success: true, error: null, latencyMs: this.clock() - requestStartedAt });
      } catch (error) {
        outcomes.push({
          ...base,
          success: false,
          error: errorMessage(error),
          latencyMs: this.clock() - requestStartedAt
        });
        this.log.warn({ err: error, schedule: context.scheduleName, profile: profileId }, 'Profile capture failed');
      }
    }

    const report = this.summarize(context, outcomes, skippedProfiles, deadlineExceeded, this.clock() - startedAt);
    if (report.attempted > 0) {
      this.metrics.recordBurst(
        report.success ? 'success' : report.anySuccess ? 'partial' : 'failed',
        report.durationMs,
        { deadlineExceeded }
      );
    }
    return report;
  }

  private summarize(
    context: BurstContext,
    outcomes: CaptureOutcome[],
    skippedProfiles: string[],
    deadlineExceeded: boolean,
    durationMs: number
  ): BurstReport {
    const failed = outcomes.filter(outcome => !outcome.success).map(outcome => outcome.profileId);
    const attempted = outcomes.length;
    const succeeded = attempted - failed.length;
    return {
      scheduleName: context.scheduleName,
      sequence: context.sequence,
      outcomes,
      attempted,
      succeeded,
      success: attempted > 0 && failed.length === 0,
      anySuccess: succeeded > 0,
      deadlineExceeded,
      durationMs,
      skippedProfiles,
      failure: failed.length > 0 ? new PartialBurstFailure(failed, attempted) : null
    };
  }
}
