import loggerModule from '../logger.js';
import metricsModule, { MetricsRegistry } from '../metrics/index.js';
import { DAY_MS } from '../utils/time.js';
import { countCaptures, pruneCapturesOlderThan, vacuumDatabase } from '../db.js';

type RetentionLogger = Pick<typeof loggerModule, 'info' | 'warn' | 'error'>;

export interface RetentionTaskOptions {
  enabled?: boolean;
  retentionDays: number;
  intervalMs: number;
  vacuum?: boolean;
  clock?: () => number;
  logger?: RetentionLogger;
  metrics?: MetricsRegistry;
}

type NormalizedOptions = {
  enabled: boolean;
  retentionDays: number;
  intervalMs: number;
  vacuum: boolean;
};

export type RetentionRunResult = {
  skipped: boolean;
  reason?: 'disabled';
  removedCaptures: number;
  remainingCaptures: number;
  cutoff: number | null;
  vacuumed: boolean;
};

export class RetentionTask {
  private options: NormalizedOptions;
  private readonly clock: () => number;
  private readonly logger: RetentionLogger;
  private readonly metrics: MetricsRegistry;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private stopped = false;

  constructor(options: RetentionTaskOptions) {
    this.options = normalizeOptions(options);
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  start() {
    if (this.timer) {
      return;
    }
    this.stopped = false;
    this.scheduleNext(0);
  }

  stop() {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  configure(options: RetentionTaskOptions) {
    this.options = normalizeOptions(options);

    if (this.stopped) {
      return;
    }

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    if (this.running) {
      return;
    }

    this.scheduleNext(0);
  }

  runNow(): RetentionRunResult {
    return executeRetentionRun(this.options, this.clock(), this.logger, this.metrics);
  }

  private scheduleNext(delayMs: number) {
    if (this.stopped) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      this.runOnce();
    }, delayMs);
  }

  private runOnce() {
    if (this.running) {
      return;
    }

    this.running = true;
    try {
      this.runNow();
    } catch (error) {
      this.logger.error({ err: error }, 'Retention task failed');
    } finally {
      this.running = false;
      if (!this.stopped && this.options.enabled) {
        this.scheduleNext(this.options.intervalMs);
      }
    }
  }
}

export function startRetentionTask(options: RetentionTaskOptions): RetentionTask {
  const task = new RetentionTask(options);
  task.start();
  return task;
}

export function runRetentionOnce(options: RetentionTaskOptions): RetentionRunResult {
  const normalized = normalizeOptions(options);
  const clock = options.clock ?? Date.now;
  return executeRetentionRun(
    normalized,
    clock(),
    options.logger ?? loggerModule,
    options.metrics ?? metricsModule
  );
}

function normalizeOptions(options: RetentionTaskOptions): NormalizedOptions {
  return {
    enabled: options.enabled !== false,
    retentionDays: Math.max(0, Math.floor(options.retentionDays)),
    intervalMs: Math.max(1000, Math.floor(options.intervalMs)),
    vacuum: options.vacuum === true
  };
}

function executeRetentionRun(
  options: NormalizedOptions,
  now: number,
  logger: RetentionLogger,
  metrics: MetricsRegistry
): RetentionRunResult {
  if (!options.enabled) {
    logger.info({ enabled: false }, 'Retention task skipped');
    return {
      skipped: true,
      reason: 'disabled',
      removedCaptures: 0,
      remainingCaptures: countCaptures(),
      cutoff: null,
      vacuumed: false
    };
  }

  const cutoff = now - options.retentionDays * DAY_MS;
  const removedCaptures = pruneCapturesOlderThan(cutoff);
  const vacuumed = options.vacuum && removedCaptures > 0;
  if (vacuumed) {
    vacuumDatabase();
  }
  const remainingCaptures = countCaptures();

  metrics.increment('retention.runs');
  metrics.increment('retention.removedCaptures', removedCaptures);

  logger.info(
    {
      removedCaptures,
      remainingCaptures,
      retentionDays: options.retentionDays,
      cutoff: new Date(cutoff).toISOString(),
      vacuumed
    },
    'Retention task completed'
  );

  return { skipped: false, removedCaptures, remainingCaptures, cutoff, vacuumed };
}
