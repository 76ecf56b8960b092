import { EventEmitter } from 'node:events';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import { errorMessage } from '../errors.js';
import type { DeviceHealth } from '../types.js';

export interface DeviceHealthOptions {
  failureThreshold?: number;
  backoffBaseMs?: number;
  backoffMaxMs?: number;
  clock?: () => number;
  metrics?: MetricsRegistry;
}

export type DeviceHealthPayload = {
  healthy: boolean;
  consecutive_failures: number;
  last_success: string | null;
  last_error: string | null;
};

export type DeviceHealthChange = {
  previous: DeviceHealth;
  current: DeviceHealth;
};

export const DEFAULT_FAILURE_THRESHOLD = 3;
export const DEFAULT_BACKOFF_BASE_MS = 30_000;
export const DEFAULT_BACKOFF_MAX_MS = 300_000;

/** Pause after the last failure: base * 2^(failures - 2), capped. Zero while below the threshold. */
export function backoffDelayMs(
  consecutiveFailures: number,
  options: { failureThreshold: number; backoffBaseMs: number; backoffMaxMs: number }
): number {
  if (consecutiveFailures < options.failureThreshold) {
    return 0;
  }
  const delay = options.backoffBaseMs * 2 ** Math.max(0, consecutiveFailures - 2);
  return Math.min(options.backoffMaxMs, delay);
}

/**
 * Healthy/unhealthy state of the capture device. The scheduler is the only
 * writer; everything else reads snapshots.
 */
export class DeviceHealthTracker extends EventEmitter {
  private failureThreshold: number;
  private backoffBaseMs: number;
  private backoffMaxMs: number;
  private readonly clock: () => number;
  private readonly metrics: MetricsRegistry;
  private state: DeviceHealth = {
    consecutiveFailures: 0,
    isHealthy: true,
    lastSuccessTime: null,
    lastFailureTime: null,
    lastError: null
  };

  constructor(options: DeviceHealthOptions = {}) {
    super();
    this.failureThreshold = Math.max(1, options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD);
    this.backoffBaseMs = options.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS;
    this.backoffMaxMs = options.backoffMaxMs ?? DEFAULT_BACKOFF_MAX_MS;
    this.clock = options.clock ?? Date.now;
    this.metrics = options.metrics ?? metricsModule;
  }

  configure(options: Omit<DeviceHealthOptions, 'clock' | 'metrics'>) {
    if (typeof options.failureThreshold === 'number') {
      this.failureThreshold = Math.max(1, options.failureThreshold);
    }
    if (typeof options.backoffBaseMs === 'number') {
      this.backoffBaseMs = options.backoffBaseMs;
    }
    if (typeof options.backoffMaxMs === 'number') {
      this.backoffMaxMs = options.backoffMaxMs;
    }
    this.update({ isHealthy: this.state.consecutiveFailures < this.failureThreshold });
  }

  recordSuccess(at: number = this.clock()) {
    this.update({ consecutiveFailures: 0, isHealthy: true, lastSuccessTime: at, lastError: null });
  }

  recordFailure(error: unknown, at: number = this.clock()) {
    const consecutiveFailures = this.state.consecutiveFailures + 1;
    this.update({
      consecutiveFailures,
      isHealthy: consecutiveFailures < this.failureThreshold,
      lastFailureTime: at,
      lastError: errorMessage(error)
    });
  }

  snapshot(): DeviceHealth {
    return { ...this.state };
  }

  get isHealthy(): boolean {
    return this.state.isHealthy;
  }

  /** Instant until which captures are paused, or null when not backing off. */
  backoffUntil(): number | null {
    const { consecutiveFailures, lastFailureTime } = this.state;
    const delay = backoffDelayMs(consecutiveFailures, {
      failureThreshold: this.failureThreshold,
      backoffBaseMs: this.backoffBaseMs,
      backoffMaxMs: this.backoffMaxMs
    });
    if (delay === 0 || lastFailureTime === null) {
      return null;
    }
    return lastFailureTime + delay;
  }

  isInBackoff(now: number = this.clock()): boolean {
    const until = this.backoffUntil();
    return until !== null && now < until;
  }

  toHealthPayload(): DeviceHealthPayload {
    return {
      healthy: this.state.isHealthy,
      consecutive_failures: this.state.consecutiveFailures,
      last_success: this.state.lastSuccessTime === null ? null : new Date(this.state.lastSuccessTime).toISOString(),
      last_error: this.state.lastError
    };
  }

  private update(patch: Partial<DeviceHealth>) {
    const previous = this.state;
    const current: DeviceHealth = { ...previous, ...patch };
    this.state = current;
    this.metrics.recordDeviceHealth(current.isHealthy, current.consecutiveFailures);
    if (previous.isHealthy !== current.isHealthy) {
      const change: DeviceHealthChange = { previous: { ...previous }, current: { ...current } };
      this.emit('change', change);
    }
  }
}
