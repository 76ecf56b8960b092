import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SolarCalculator } from '../src/astro/solar.js';
import { BurstController } from '../src/capture/burst.js';
import type { CaptureTrigger } from '../src/capture/device.js';
import { DeviceHealthTracker } from '../src/capture/healthTracker.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { ScheduleWindowResolver } from '../src/schedule/windows.js';
import { CaptureScheduler } from '../src/scheduler/captureScheduler.js';
import type { CaptureOutcome, ScheduleDefinition } from '../src/types.js';
import {
  FixedLight,
  ZURICH,
  acquisition,
  deferred,
  fixedSchedule,
  profile,
  watchUnhandledRejections
} from './helpers/fixtures.js';

const TEN_AM = Date.parse('2024-06-21T10:00:00.000Z');

type Harness = ReturnType<typeof createHarness>;

function createHarness(
  options: {
    schedules?: ScheduleDefinition[];
    capture?: CaptureTrigger['capture'];
  } = {}
) {
  const metrics = new MetricsRegistry();
  const outcomes: CaptureOutcome[] = [];
  const implementation: CaptureTrigger['capture'] = options.capture ?? (async () => ({ metadata: {} }));
  const capture = vi.fn(implementation);
  const device: CaptureTrigger = { capture };
  const health = new DeviceHealthTracker({ clock: () => TEN_AM, metrics });
  const acquire = vi.fn(async () => acquisition({ tier: 'light_adapt' }));
  const light = new FixedLight();
  light.set(1200);
  const scheduler = new CaptureScheduler({
    resolver: new ScheduleWindowResolver(new SolarCalculator(ZURICH)),
    settings: { acquire },
    light,
    bursts: new BurstController({ device, metrics }),
    health,
    schedules: options.schedules ?? [fixedSchedule('daytime', '09:00', '17:00', { profiles: ['wide', 'tele'] })],
    profiles: [profile('wide'), profile('tele')],
    sink: outcome => outcomes.push(outcome),
    clock: () => TEN_AM,
    metrics
  });
  return { scheduler, outcomes, capture, acquire, health, metrics };
}

async function tickAndSettle(harness: Harness, now: number) {
  const report = harness.scheduler.tick(now);
  await harness.scheduler.whenIdle();
  return report;
}

describe('CaptureScheduler', () => {
  let rejections: ReturnType<typeof watchUnhandledRejections>;

  beforeEach(() => {
    rejections = watchUnhandledRejections();
  });

  afterEach(() => {
    rejections.restore();
    expect(rejections.reasons).toEqual([]);
  });

  it('DueWindow triggers a burst and delivers every outcome', async () => {
    const harness = createHarness();

    const report = await tickAndSettle(harness, TEN_AM);

    expect(report.decisions).toHaveLength(1);
    expect(report.decisions[0]).toMatchObject({ schedule: 'daytime', decision: 'triggered', sequence: 1 });
    expect(harness.capture).toHaveBeenCalledTimes(2);
    expect(harness.outcomes.map(outcome => [outcome.profileId, outcome.success, outcome.tier])).toEqual([
      ['wide', true, 'light_adapt'],
      ['tele', true, 'light_adapt']
    ]);
    expect(harness.scheduler.status()).toEqual([
      { name: 'daytime', enabled: true, lastCapture: '2024-06-21T10:00:00.000Z', progress: 1, inFlight: false }
    ]);
    expect(harness.scheduler.lastTickReport()).toBe(report);
  });

  it('Interval gates the next burst', async () => {
    const harness = createHarness();
    await tickAndSettle(harness, TEN_AM);

    const early = await tickAndSettle(harness, TEN_AM + 60_000);
    expect(early.decisions[0]?.decision).toBe('not-due');

    const due = await tickAndSettle(harness, TEN_AM + 300_000);
    expect(due.decisions[0]).toMatchObject({ decision: 'triggered', sequence: 2 });
    expect(harness.acquire).toHaveBeenCalledTimes(2);
  });

  it('OutsideWindow reports no active window', () => {
    const harness = createHarness();

    const report = harness.scheduler.tick(Date.parse('2024-06-21T05:00:00.000Z'));

    expect(report.decisions[0]?.decision).toBe('no-active-window');
    expect(report.decisions[0]?.window?.start.toISOString()).toBe('2024-06-21T07:00:00.000Z');
    expect(harness.capture).not.toHaveBeenCalled();
    expect(harness.metrics.snapshot().scheduler).toEqual({ ticks: 1, skipped: { 'no-active-window': 1 } });
  });

  it('RunningBurst is never duplicated', async () => {
    const pending = deferred<{ metadata: Record<string, unknown> }>();
    const harness = createHarness({
      schedules: [fixedSchedule('daytime', '09:00', '17:00')],
      capture: () => pending.promise
    });

    harness.scheduler.tick(TEN_AM);
    const overlapping = harness.scheduler.tick(TEN_AM + 600_000);

    expect(overlapping.decisions[0]).toMatchObject({ decision: 'in-flight', sequence: 1 });
    expect(harness.scheduler.status()[0]?.inFlight).toBe(true);

    pending.resolve({ metadata: {} });
    await harness.scheduler.whenIdle();
    expect(harness.capture).toHaveBeenCalledTimes(1);
    expect(harness.scheduler.status()[0]?.inFlight).toBe(false);
  });

  it('OverlappingWindows fire independently', async () => {
    const harness = createHarness({
      schedules: [fixedSchedule('morning', '08:00', '13:00'), fixedSchedule('midday', '11:00', '14:00')]
    });

    const report = await tickAndSettle(harness, TEN_AM);

    expect(report.decisions.map(entry => entry.decision)).toEqual(['triggered', 'triggered']);
    expect(harness.outcomes.map(outcome => outcome.scheduleName).sort()).toEqual(['midday', 'morning']);
  });

  it('Backoff suspends every window', () => {
    const harness = createHarness();
    for (let attempt = 0; attempt < 3; attempt += 1) {
      harness.health.recordFailure(new Error('timeout'), TEN_AM);
    }

    const report = harness.scheduler.tick(TEN_AM + 1_000);

    expect(report.backoffUntil).toBe(TEN_AM + 60_000);
    expect(report.decisions[0]?.decision).toBe('backoff');
    expect(harness.acquire).not.toHaveBeenCalled();
  });

  it('FailedBurst feeds device health and keeps the sequence', async () => {
    const harness = createHarness({
      capture: async () => {
        throw new Error('connection refused');
      }
    });

    await tickAndSettle(harness, TEN_AM);

    expect(harness.health.snapshot()).toMatchObject({ consecutiveFailures: 1, lastError: 'connection refused' });
    expect(harness.scheduler.status()[0]?.progress).toBe(0);

    const retry = await tickAndSettle(harness, TEN_AM + 300_000);
    expect(retry.decisions[0]).toMatchObject({ decision: 'triggered', sequence: 1 });
  });

  it('PartialBurst counts as device success', async () => {
    const harness = createHarness({
      capture: async request => {
        if (request.profileId === 'tele') {
          throw new Error('tele rejected');
        }
        return { metadata: {} };
      }
    });
    harness.health.recordFailure(new Error('earlier failure'), TEN_AM - 1);

    await tickAndSettle(harness, TEN_AM);

    expect(harness.health.snapshot().consecutiveFailures).toBe(0);
    expect(harness.scheduler.status()[0]?.progress).toBe(0);
  });

  it('UpdatedTables apply on the next tick', async () => {
    const harness = createHarness();

    harness.scheduler.updateConfig([fixedSchedule('evening', '18:00', '21:00')], [profile('wide')]);
    const report = await tickAndSettle(harness, TEN_AM);

    expect(report.decisions).toEqual([
      expect.objectContaining({ schedule: 'evening', decision: 'no-active-window' })
    ]);
    expect(harness.scheduler.status().map(entry => entry.name)).toEqual(['evening']);
  });

  it('SinkErrors do not break the burst', async () => {
    const harness = createHarness();
    const scheduler = new CaptureScheduler({
      resolver: new ScheduleWindowResolver(new SolarCalculator(ZURICH)),
      settings: { acquire: async () => acquisition() },
      light: new FixedLight(),
      bursts: new BurstController({ device: { capture: harness.capture }, metrics: harness.metrics }),
      health: harness.health,
      schedules: [fixedSchedule('daytime', '09:00', '17:00')],
      profiles: [profile('wide')],
      sink: () => {
        throw new Error('disk full');
      },
      metrics: harness.metrics
    });
    const bursts = vi.fn();
    scheduler.on('burst', bursts);

    scheduler.tick(TEN_AM);
    await scheduler.whenIdle();

    expect(bursts).toHaveBeenCalledTimes(1);
    expect(scheduler.status()[0]?.progress).toBe(1);
  });

  it('Stop aborts bursts that outlive the grace period', async () => {
    const signals: AbortSignal[] = [];
    const harness = createHarness({
      schedules: [fixedSchedule('daytime', '09:00', '17:00')],
      capture: (_request, options) =>
        new Promise((_resolve, reject) => {
          const signal = options?.signal;
          if (signal) {
            signals.push(signal);
            signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
          }
        })
    });

    harness.scheduler.tick(TEN_AM);
    await vi.waitFor(() => expect(signals).toHaveLength(1));
    await harness.scheduler.stop(20);

    expect(signals[0]?.aborted).toBe(true);
    expect(harness.outcomes).toEqual([expect.objectContaining({ success: false, error: 'aborted' })]);
    expect(harness.scheduler.status()[0]?.inFlight).toBe(false);
  });

  it('Start ticks immediately and on the interval', async () => {
    vi.useFakeTimers();
    try {
      const harness = createHarness();
      const ticks = vi.fn();
      harness.scheduler.on('tick', ticks);
      harness.scheduler.configure({ tickIntervalMs: 1_000 });

      harness.scheduler.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(ticks).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(2_000);
      expect(ticks).toHaveBeenCalledTimes(3);

      await harness.scheduler.stop();
      await vi.advanceTimersByTimeAsync(5_000);
      expect(ticks).toHaveBeenCalledTimes(3);
    } finally {
      vi.useRealTimers();
    }
  });
});
