import { EventEmitter } from 'node:events';
import loggerModule, { type EngineLogger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import { errorMessage } from '../errors.js';
import type { LightSample, LightSource } from '../types.js';

export interface LightSensor {
  readonly kind: LightSource;
  sample(options: { signal?: AbortSignal }): Promise<LightSample>;
}

export type LightSnapshot = {
  sample: LightSample | null;
  stale: boolean;
  ageMs: number | null;
};

export interface LightSnapshotProvider {
  snapshot(): LightSnapshot;
}

export interface LightMonitorOptions {
  sensor: LightSensor;
  intervalMs?: number;
  staleAfterMs?: number;
  sampleTimeoutMs?: number;
  historySize?: number;
  clock?: () => number;
  logger?: EngineLogger;
  metrics?: MetricsRegistry;
}

const DEFAULT_INTERVAL_MS = 5000;
const DEFAULT_HISTORY_SIZE = 100;
const DEFAULT_CHANGE_LOOKBACK = 10;
const MIN_LUX = 0.01;

export function luxDeltaEv(from: number, to: number): number {
  return Math.log2(Math.max(MIN_LUX, to) / Math.max(MIN_LUX, from));
}

/**
 * Samples ambient light on its own cadence. It is the only writer of the
 * current sample; readers get frozen snapshots.
 */
export class BackgroundLightMonitor extends EventEmitter implements LightSnapshotProvider {
  private sensor: LightSensor;
  private intervalMs: number;
  private staleAfterMs: number;
  private sampleTimeoutMs: number;
  private historySize: number;
  private readonly clock: () => number;
  private readonly log: EngineLogger;
  private readonly metrics: MetricsRegistry;
  private current: LightSample | null = null;
  private readonly samples: LightSample[] = [];
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<LightSample | null> | null = null;
  private abortController: AbortController | null = null;
  private running = false;
  private consecutiveErrors = 0;

  constructor(options: LightMonitorOptions) {
    super();
    this.sensor = options.sensor;
    this.intervalMs = Math.max(1, options.intervalMs ?? DEFAULT_INTERVAL_MS);
    this.staleAfterMs = options.staleAfterMs ?? this.intervalMs * 3;
    this.sampleTimeoutMs = options.sampleTimeoutMs ?? this.intervalMs;
    this.historySize = Math.max(1, options.historySize ?? DEFAULT_HISTORY_SIZE);
    this.clock = options.clock ?? Date.now;
    this.log = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start() {
    if (this.running) {
      return;
    }
    this.running = true;
    this.scheduleNext(0);
    this.log.info({ sensor: this.sensor.kind, intervalMs: this.intervalMs }, 'Light monitor started');
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.abortController?.abort();
    if (this.inFlight) {
      await this.inFlight;
    }
    this.log.info({ sensor: this.sensor.kind }, 'Light monitor stopped');
  }

  configure(options: Partial<Omit<LightMonitorOptions, 'clock' | 'logger' | 'metrics'>>) {
    if (options.sensor) {
      this.sensor = options.sensor;
    }
    if (typeof options.intervalMs === 'number') {
      this.intervalMs = Math.max(1, options.intervalMs);
    }
    if (typeof options.staleAfterMs === 'number') {
      this.staleAfterMs = options.staleAfterMs;
    }
    if (typeof options.sampleTimeoutMs === 'number') {
      this.sampleTimeoutMs = options.sampleTimeoutMs;
    }
    if (typeof options.historySize === 'number') {
      this.historySize = Math.max(1, options.historySize);
      this.trimHistory();
    }
  }

  snapshot(): LightSnapshot {
    const sample = this.current;
    if (!sample) {
      return { sample: null, stale: true, ageMs: null };
    }
    const ageMs = Math.max(0, this.clock() - sample.timestamp);
    return { sample, stale: ageMs > this.staleAfterMs, ageMs };
  }

  history(): LightSample[] {
    return [...this.samples];
  }

  /** Signed EV change between the current sample and one `lookback` samples earlier. */
  changeMagnitude(lookback = DEFAULT_CHANGE_LOOKBACK): number {
    const latest = this.samples[this.samples.length - 1];
    if (!latest || this.samples.length < 2) {
      return 0;
    }
    const index = Math.max(0, this.samples.length - 1 - lookback);
    const reference = this.samples[index];
    if (!reference) {
      return 0;
    }
    return luxDeltaEv(reference.luxEstimate, latest.luxEstimate);
  }

  /** Takes a sample immediately, sharing one already in progress. */
  async sampleOnce(): Promise<LightSample | null> {
    if (this.inFlight) {
      return this.inFlight;
    }
    return this.track(this.collect());
  }

  private scheduleNext(delayMs: number) {
    if (!this.running) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, delayMs);
  }

  private async tick() {
    if (this.inFlight) {
      await this.inFlight;
    } else {
      await this.track(this.collect());
    }
    this.scheduleNext(this.intervalMs);
  }

  private async track(pending: Promise<LightSample | null>): Promise<LightSample | null> {
    this.inFlight = pending;
    try {
      return await pending;
    } finally {
      this.inFlight = null;
    }
  }

  private async collect(): Promise<LightSample | null> {
    const controller = new AbortController();
    this.abortController = controller;
    const timeoutMs = this.sampleTimeoutMs;
    let timer: NodeJS.Timeout | undefined;

    const pending = this.sensor.sample({ signal: controller.signal });
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        pending.then(
          late => this.log.debug({ lux: late.luxEstimate }, 'Discarded late light sample'),
          error => this.log.debug({ err: error }, 'Late light sample failed')
        );
        reject(new Error(`Light sample timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      const sample = await Promise.race([pending, timeout]);
      validateSample(sample);
      this.publish(sample);
      return this.current;
    } catch (error) {
      this.consecutiveErrors += 1;
      this.metrics.recordLightSampleError();
      const level = this.consecutiveErrors === 1 ? 'warn' : 'debug';
      this.log[level](
        { err: error, sensor: this.sensor.kind, consecutiveErrors: this.consecutiveErrors },
        'Light sample failed; keeping previous sample'
      );
      this.emit('sample-error', error);
      return null;
    } finally {
      clearTimeout(timer);
      if (this.abortController === controller) {
        this.abortController = null;
      }
    }
  }

  private publish(sample: LightSample) {
    const frozen = Object.freeze({ ...sample });
    this.current = frozen;
    this.samples.push(frozen);
    this.trimHistory();
    if (this.consecutiveErrors > 0) {
      this.log.info({ sensor: this.sensor.kind, afterErrors: this.consecutiveErrors }, 'Light sampling recovered');
    }
    this.consecutiveErrors = 0;
    this.metrics.recordLightSample(frozen.luxEstimate, frozen.timestamp);
    this.emit('sample', frozen);
  }

  private trimHistory() {
    if (this.samples.length > this.historySize) {
      this.samples.splice(0, this.samples.length - this.historySize);
    }
  }
}

function validateSample(sample: LightSample) {
  if (!Number.isFinite(sample.luxEstimate) || sample.luxEstimate < 0) {
    throw new Error(`Sensor returned invalid lux estimate ${errorMessage(sample.luxEstimate)}`);
  }
  if (!Number.isFinite(sample.timestamp)) {
    throw new Error('Sensor returned a sample without a timestamp');
  }
}
