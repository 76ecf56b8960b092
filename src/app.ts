import metrics, { type MetricsSnapshot } from './metrics/index.js';
import { errorMessage } from './errors.js';

export type HealthStatus = 'ok' | 'idle' | 'starting' | 'stopping' | 'degraded';

export type HealthIndicatorContext = {
  service: {
    status: string;
    startedAt: number | null;
  };
  metrics?: MetricsSnapshot;
  metricsCreatedAt?: string;
};

export type HealthIndicatorResult = {
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type HealthIndicator = (context: HealthIndicatorContext) =>
  | HealthIndicatorResult
  | Promise<HealthIndicatorResult>;

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

type RegisteredIndicator = {
  name: string;
  indicator: HealthIndicator;
};

type RegisteredHook = {
  name: string;
  hook: ShutdownHook;
};

type HealthCheckResult = { name: string; status: HealthStatus; details?: Record<string, unknown> };

type ShutdownHookResult = { name: string; status: 'ok' | 'error'; error?: Error };

function upsert<T extends { name: string }>(entries: T[], entry: T) {
  const existingIndex = entries.findIndex(item => item.name === entry.name);
  if (existingIndex >= 0) {
    entries[existingIndex] = entry;
  } else {
    entries.push(entry);
  }

  return () => {
    const index = entries.findIndex(item => item === entry);
    if (index >= 0) {
      entries.splice(index, 1);
    }
  };
}

/** Health indicators and shutdown hooks for one running engine. */
export class AppLifecycle {
  private readonly healthIndicators: RegisteredIndicator[] = [];
  private readonly shutdownHooks: RegisteredHook[] = [];

  registerHealthIndicator(name: string, indicator: HealthIndicator) {
    return upsert(this.healthIndicators, { name, indicator });
  }

  async collectHealthChecks(context: HealthIndicatorContext): Promise<HealthCheckResult[]> {
    const results: HealthCheckResult[] = [];
    const metricsSnapshot = context.metrics ?? metrics.snapshot();
    const enrichedContext: HealthIndicatorContext = {
      ...context,
      metrics: metricsSnapshot,
      metricsCreatedAt: metricsSnapshot.createdAt
    };
    for (const entry of this.healthIndicators) {
      try {
        const result = await entry.indicator(enrichedContext);
        results.push({ name: entry.name, status: result.status, details: result.details });
      } catch (error) {
        results.push({
          name: entry.name,
          status: 'degraded',
          details: {
            error: errorMessage(error)
          }
        });
      }
    }
    return results;
  }

  registerShutdownHook(name: string, hook: ShutdownHook) {
    return upsert(this.shutdownHooks, { name, hook });
  }

  /** Hooks run in reverse registration order. */
  async runShutdownHooks(context: ShutdownHookContext): Promise<ShutdownHookResult[]> {
    const results: ShutdownHookResult[] = [];
    for (const entry of [...this.shutdownHooks].reverse()) {
      try {
        await entry.hook(context);
        results.push({ name: entry.name, status: 'ok' });
      } catch (error) {
        results.push({
          name: entry.name,
          status: 'error',
          error: error instanceof Error ? error : new Error(String(error))
        });
      }
    }
    return results;
  }

  reset() {
    this.healthIndicators.splice(0, this.healthIndicators.length);
    this.shutdownHooks.splice(0, this.shutdownHooks.length);
  }
}

const appLifecycle = new AppLifecycle();

export function registerHealthIndicator(name: string, indicator: HealthIndicator) {
  return appLifecycle.registerHealthIndicator(name, indicator);
}

export function collectHealthChecks(context: HealthIndicatorContext) {
  return appLifecycle.collectHealthChecks(context);
}

export function registerShutdownHook(name: string, hook: ShutdownHook) {
  return appLifecycle.registerShutdownHook(name, hook);
}

export function runShutdownHooks(context: ShutdownHookContext) {
  return appLifecycle.runShutdownHooks(context);
}

export function resetAppLifecycle() {
  appLifecycle.reset();
}

export default appLifecycle;
