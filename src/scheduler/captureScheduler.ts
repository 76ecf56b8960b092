import { EventEmitter } from 'node:events';
import loggerModule, { type EngineLogger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import { errorMessage } from '../errors.js';
import type { CaptureOutcome, Profile, ScheduleDefinition, ScheduleWindow } from '../types.js';
import type { BurstController, BurstReport } from '../capture/burst.js';
import type { DeviceHealthTracker } from '../capture/healthTracker.js';
import type { LightSnapshotProvider } from '../capture/lightMonitor.js';
import type { SettingsAcquisition } from '../capture/settingsCache.js';
import { isDue, type ScheduleWindowResolver } from '../schedule/windows.js';

export type TickDecision = 'no-active-window' | 'not-due' | 'backoff' | 'in-flight' | 'triggered';

export type ScheduleDecision = {
  schedule: string;
  decision: TickDecision;
  window: ScheduleWindow | null;
  sequence?: number;
};

export type TickReport = {
  at: number;
  backoffUntil: number | null;
  decisions: ScheduleDecision[];
};

export type ScheduleStatus = {
  name: string;
  enabled: boolean;
  lastCapture: string | null;
  progress: number;
  inFlight: boolean;
};

export type CaptureOutcomeSink = (outcome: CaptureOutcome) => void;

export interface SettingsSource {
  acquire(options?: { signal?: AbortSignal }): Promise<SettingsAcquisition>;
}

export interface CaptureSchedulerOptions {
  resolver: ScheduleWindowResolver;
  settings: SettingsSource;
  light: LightSnapshotProvider;
  bursts: Pick<BurstController, 'runBurst'>;
  health: DeviceHealthTracker;
  schedules: readonly ScheduleDefinition[];
  profiles: readonly Profile[];
  sink?: CaptureOutcomeSink;
  tickIntervalMs?: number;
  clock?: () => number;
  logger?: EngineLogger;
  metrics?: MetricsRegistry;
}

type Tables = {
  schedules: readonly ScheduleDefinition[];
  profiles: ReadonlyMap<string, Profile>;
};

type InFlightBurst = {
  promise: Promise<BurstReport | null>;
  controller: AbortController;
  startedAt: number;
  sequence: number;
};

const DEFAULT_TICK_INTERVAL_MS = 30_000;

function buildTables(schedules: readonly ScheduleDefinition[], profiles: readonly Profile[]): Tables {
  return Object.freeze({
    schedules: Object.freeze([...schedules]),
    profiles: new Map(profiles.map(profile => [profile.id, profile]))
  });
}

function delay(ms: number): { promise: Promise<void>; cancel: () => void } {
  let timer: NodeJS.Timeout | undefined;
  const promise = new Promise<void>(resolve => {
    timer = setTimeout(resolve, ms);
  });
  return { promise, cancel: () => clearTimeout(timer) };
}

/**
 * Drives captures: on every tick it resolves the active windows, and for each
 * due window that has no burst running it acquires settings and fires a burst.
 */
export class CaptureScheduler extends EventEmitter {
  private resolver: ScheduleWindowResolver;
  private readonly settings: SettingsSource;
  private readonly light: LightSnapshotProvider;
  private readonly bursts: Pick<BurstController, 'runBurst'>;
  private readonly health: DeviceHealthTracker;
  private readonly sink: CaptureOutcomeSink | null;
  private readonly clock: () => number;
  private readonly log: EngineLogger;
  private readonly metrics: MetricsRegistry;
  private tables: Tables;
  private tickIntervalMs: number;
  private readonly lastCapture = new Map<string, number>();
  private readonly progress = new Map<string, number>();
  private readonly inFlight = new Map<string, InFlightBurst>();
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private lastTick: TickReport | null = null;

  constructor(options: CaptureSchedulerOptions) {
    super();
    this.resolver = options.resolver;
    this.settings = options.settings;
    this.light = options.light;
    this.bursts = options.bursts;
    this.health = options.health;
    this.sink = options.sink ?? null;
    this.clock = options.clock ?? Date.now;
    this.log = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
    this.tables = buildTables(options.schedules, options.profiles);
    this.tickIntervalMs = Math.max(1, options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS);
  }

  get isRunning(): boolean {
    return this.running;
  }

  start() {
    if (this.running) {
      return;
    }
    this.running = true;
    this.log.info(
      { tickIntervalMs: this.tickIntervalMs, schedules: this.tables.schedules.length },
      'Capture scheduler started'
    );
    this.scheduleNext(0);
  }

  /**
   * Stops ticking and gives running bursts until `deadlineMs` to finish;
   * whatever is still running then is aborted.
   */
  async stop(deadlineMs = 15_000): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    const pending = Array.from(this.inFlight.values());
    if (pending.length === 0) {
      this.log.info('Capture scheduler stopped');
      return;
    }

    const grace = delay(deadlineMs);
    const settled = Promise.allSettled(pending.map(entry => entry.promise)).then(() => 'settled' as const);
    const result = await Promise.race([settled, grace.promise.then(() => 'deadline' as const)]);
    grace.cancel();

    if (result === 'deadline') {
      this.log.warn({ inFlight: Array.from(this.inFlight.keys()), deadlineMs }, 'Aborting in-flight bursts');
      for (const entry of this.inFlight.values()) {
        entry.controller.abort();
      }
      await Promise.allSettled(pending.map(entry => entry.promise));
    }
    this.log.info('Capture scheduler stopped');
  }

  configure(options: { tickIntervalMs?: number }) {
    if (typeof options.tickIntervalMs === 'number') {
      this.tickIntervalMs = Math.max(1, options.tickIntervalMs);
    }
  }

  /** Replaces the schedule and profile tables in one step; running bursts keep the tables they started with. */
  updateConfig(schedules: readonly ScheduleDefinition[], profiles: readonly Profile[]) {
    this.tables = buildTables(schedules, profiles);
    this.log.info({ schedules: schedules.length, profiles: profiles.length }, 'Scheduler tables updated');
  }

  /** Swaps window resolution, e.g. after the location changed. Takes effect on the next tick. */
  setResolver(resolver: ScheduleWindowResolver) {
    this.resolver = resolver;
  }

  tick(now: number = this.clock()): TickReport {
    const tables = this.tables;
    const nowDate = new Date(now);
    const backoffUntil = this.health.isInBackoff(now) ? this.health.backoffUntil() : null;
    const resolutions = new Map(
      this.resolver.resolve(tables.schedules, nowDate).map(entry => [entry.window.name, entry])
    );
    const decisions: ScheduleDecision[] = [];

    for (const definition of tables.schedules) {
      if (!definition.enabled) {
        continue;
      }
      const resolution = resolutions.get(definition.name);
      if (!resolution || !resolution.active) {
        decisions.push({ schedule: definition.name, decision: 'no-active-window', window: resolution?.window ?? null });
        continue;
      }
      const { window } = resolution;
      if (backoffUntil !== null) {
        decisions.push({ schedule: definition.name, decision: 'backoff', window });
        continue;
      }
      const running = this.inFlight.get(definition.name);
      if (running) {
        decisions.push({ schedule: definition.name, decision: 'in-flight', window, sequence: running.sequence });
        continue;
      }
      const last = this.lastCapture.get(definition.name);
      if (!isDue(window, last === undefined ? null : new Date(last), nowDate)) {
        decisions.push({ schedule: definition.name, decision: 'not-due', window });
        continue;
      }
      const sequence = this.launch(window, now, tables);
      decisions.push({ schedule: definition.name, decision: 'triggered', window, sequence });
    }

    const report: TickReport = { at: now, backoffUntil, decisions };
    this.lastTick = report;
    this.metrics.recordSchedulerTick(skipReason(decisions));
    this.emit('tick', report);
    return report;
  }

  /** Resolves once every burst running at call time has finished. */
  async whenIdle(): Promise<void> {
    await Promise.allSettled(Array.from(this.inFlight.values()).map(entry => entry.promise));
  }

  lastTickReport(): TickReport | null {
    return this.lastTick;
  }

  status(): ScheduleStatus[] {
    return this.tables.schedules.map(definition => {
      const last = this.lastCapture.get(definition.name);
      return {
        name: definition.name,
        enabled: definition.enabled,
        lastCapture: last === undefined ? null : new Date(last).toISOString(),
        progress: this.progress.get(definition.name) ?? 0,
        inFlight: this.inFlight.has(definition.name)
      };
    });
  }

  private scheduleNext(delayMs: number) {
    if (!this.running) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      try {
        this.tick();
      } catch (error) {
        this.log.error({ err: error }, 'Scheduler tick failed');
      }
      this.scheduleNext(this.tickIntervalMs);
    }, delayMs);
  }

  private launch(window: ScheduleWindow, now: number, tables: Tables): number {
    const sequence = (this.progress.get(window.name) ?? 0) + 1;
    const controller = new AbortController();
    this.lastCapture.set(window.name, now);

    const promise = this.runBurst(window, sequence, tables, controller.signal).finally(() => {
      this.inFlight.delete(window.name);
    });
    this.inFlight.set(window.name, { promise, controller, startedAt: now, sequence });
    this.log.debug({ schedule: window.name, sequence }, 'Burst triggered');
    return sequence;
  }

  private async runBurst(
    window: ScheduleWindow,
    sequence: number,
    tables: Tables,
    signal: AbortSignal
  ): Promise<BurstReport | null> {
    try {
      const acquisition = await this.settings.acquire({ signal });
      const report = await this.bursts.runBurst(window, tables.profiles, acquisition.settings, {
        scheduleName: window.name,
        sequence,
        tier: acquisition.tier,
        degraded: acquisition.degraded,
        lightSample: this.light.snapshot().sample,
        signal
      });

      for (const outcome of report.outcomes) {
        this.deliver(outcome);
      }

      if (report.attempted > 0) {
        if (report.anySuccess) {
          this.health.recordSuccess();
        } else {
          const lastError = report.outcomes[report.outcomes.length - 1]?.error ?? 'capture failed';
          this.health.recordFailure(lastError);
        }
      }

      if (report.success) {
        this.progress.set(window.name, sequence);
      }

      if (report.failure) {
        this.log.warn(
          { schedule: window.name, sequence, failedProfiles: report.failure.failedProfiles },
          report.failure.message
        );
      } else if (report.success) {
        this.log.info(
          { schedule: window.name, sequence, tier: acquisition.tier, degraded: acquisition.degraded },
          'Burst completed'
        );
      }

      this.emit('burst', report);
      return report;
    } catch (error) {
      this.log.error({ err: error, schedule: window.name, sequence }, 'Burst failed unexpectedly');
      return null;
    }
  }

  private deliver(outcome: CaptureOutcome) {
    if (!this.sink) {
      return;
    }
    try {
      this.sink(outcome);
    } catch (error) {
      this.log.error(
        { err: error, schedule: outcome.scheduleName, profile: outcome.profileId },
        `Failed to record capture outcome: ${errorMessage(error)}`
      );
    }
  }
}

function skipReason(decisions: ScheduleDecision[]): string | undefined {
  if (decisions.some(entry => entry.decision === 'triggered')) {
    return undefined;
  }
  if (decisions.some(entry => entry.decision === 'backoff')) {
    return 'backoff';
  }
  if (decisions.some(entry => entry.decision === 'in-flight')) {
    return 'in-flight';
  }
  if (decisions.some(entry => entry.decision === 'not-due')) {
    return 'not-due';
  }
  return 'no-active-window';
}
