import { EventEmitter } from 'node:events';
import logger, { type EngineLogger } from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import { storeCaptureOutcome } from './db.js';
import type { CaptureOutcome } from './types.js';

export const CAPTURE_CHANNEL = 'capture';

export type CaptureEvent = CaptureOutcome & { id: number | null };

export type EmitCaptureOptions = {
  /** Write the outcome to the capture history (default true). */
  persist?: boolean;
};

interface CaptureEventBusDependencies {
  store: (outcome: CaptureOutcome) => number | void;
  log: EngineLogger;
  metrics?: MetricsRegistry;
}

/**
 * Append-only sink for capture outcomes. Every outcome is persisted (unless
 * the caller opts out), counted and logged before listeners such as the SSE
 * stream see it. Delivery does not depend on the store succeeding.
 */
class CaptureEventBus extends EventEmitter {
  private readonly store: CaptureEventBusDependencies['store'];
  private readonly log: EngineLogger;
  private readonly metrics: MetricsRegistry;

  constructor(dependencies: CaptureEventBusDependencies = { store: storeCaptureOutcome, log: logger }) {
    super();
    this.store = dependencies.store;
    this.log = dependencies.log;
    this.metrics = dependencies.metrics ?? metrics;
  }

  emitCapture(outcome: CaptureOutcome, options: EmitCaptureOptions = {}): CaptureEvent {
    const id = options.persist === false ? null : this.persist(outcome);
    const event: CaptureEvent = Object.freeze({ ...outcome, id });
    this.metrics.recordCaptureOutcome(outcome);

    const context = {
      schedule: outcome.scheduleName,
      profile: outcome.profileId,
      sequence: outcome.sequence,
      tier: outcome.tier,
      degraded: outcome.degraded,
      latencyMs: outcome.latencyMs
    };
    if (outcome.success) {
      this.log.info(context, 'Capture succeeded');
    } else {
      this.log.warn({ ...context, error: outcome.error }, 'Capture failed');
    }

    this.emit(CAPTURE_CHANNEL, event);
    return event;
  }

  /** Store failures never stop delivery; the event then carries no id. */
  private persist(outcome: CaptureOutcome): number | null {
    try {
      const stored = this.store(outcome);
      return typeof stored === 'number' ? stored : null;
    } catch (error) {
      this.metrics.increment('history.store.failures');
      this.log.error(
        { err: error, schedule: outcome.scheduleName, profile: outcome.profileId, sequence: outcome.sequence },
        'Failed to store capture outcome'
      );
      return null;
    }
  }

  onCapture(listener: (event: CaptureEvent) => void): () => void {
    this.on(CAPTURE_CHANNEL, listener);
    return () => {
      this.off(CAPTURE_CHANNEL, listener);
    };
  }
}

const eventBus = new CaptureEventBus();

export default eventBus;
export { CaptureEventBus };
