import loggerModule, { setLogLevel, type EngineLogger } from './logger.js';
import metricsModule, { type MetricsRegistry } from './metrics/index.js';
import defaultBus, { type CaptureEventBus } from './eventBus.js';
import configManager, {
  ConfigManager,
  tierThresholdsFrom,
  type CalculatorKind,
  type ConfigReloadEvent,
  type EngineConfig,
  type HistoryConfig
} from './config/index.js';
import appLifecycle, { type AppLifecycle } from './app.js';
import { SolarCalculator, type GeoLocation } from './astro/solar.js';
import { ScheduleWindowResolver } from './schedule/windows.js';
import { HttpCaptureDevice, type CaptureDevice } from './capture/device.js';
import { LuxModelCalculator, MeteredCalculator, type SettingsCalculator } from './capture/exposure.js';
import { BackgroundLightMonitor, type LightSensor } from './capture/lightMonitor.js';
import { MeterLightSensor, SolarLightSensor, StaticLightSensor } from './capture/sensors.js';
import { SettingsCache } from './capture/settingsCache.js';
import { BurstController } from './capture/burst.js';
import { DeviceHealthTracker, type DeviceHealthChange } from './capture/healthTracker.js';
import { CaptureScheduler } from './scheduler/captureScheduler.js';
import { RetentionTask, startRetentionTask, type RetentionTaskOptions } from './tasks/retention.js';
import { startHttpServer, type HttpServerRuntime } from './server/http.js';
import type { EngineHealthReport, EngineStatusSource, WindowSummary } from './server/routes/engine.js';
import { MINUTE_MS } from './utils/time.js';

type EngineBus = Pick<CaptureEventBus, 'emitCapture' | 'onCapture'>;

export interface EngineStartOptions {
  /** Injected configuration; disables file watching. */
  config?: EngineConfig;
  configManager?: ConfigManager;
  bus?: EngineBus;
  device?: CaptureDevice;
  logger?: EngineLogger;
  metrics?: MetricsRegistry;
  /** Registry for the engine's health indicators. */
  lifecycle?: AppLifecycle;
  clock?: () => number;
  /** Serve the HTTP API (default true). */
  http?: boolean;
  /** Start the tick loop and light sampling (default true). */
  autoStart?: boolean;
}

export type EngineRuntime = EngineStatusSource & {
  config: () => EngineConfig;
  scheduler: CaptureScheduler;
  monitor: BackgroundLightMonitor;
  cache: SettingsCache;
  bursts: BurstController;
  health: DeviceHealthTracker;
  retention: () => RetentionTask | null;
  http: HttpServerRuntime | null;
  stop: () => Promise<void>;
};

const DEFAULT_SHUTDOWN_GRACE_MS = 15_000;
const DEFAULT_RETENTION_INTERVAL_MINUTES = 60;

export function buildRetentionOptions(
  history: HistoryConfig,
  logger?: EngineLogger
): RetentionTaskOptions | null {
  if (history.enabled === false) {
    return null;
  }
  return {
    enabled: true,
    retentionDays: history.retentionDays,
    intervalMs: (history.intervalMinutes ?? DEFAULT_RETENTION_INTERVAL_MINUTES) * MINUTE_MS,
    vacuum: history.vacuum === true,
    logger
  };
}

function sameLocation(a: GeoLocation, b: GeoLocation): boolean {
  return a.latitude === b.latitude && a.longitude === b.longitude && a.timezone === b.timezone;
}

function buildCalculator(kind: CalculatorKind, device: CaptureDevice, config: EngineConfig): SettingsCalculator {
  if (kind === 'meter') {
    return new MeteredCalculator(device, { timeoutMs: config.device.meterTimeoutMs });
  }
  return new LuxModelCalculator();
}

function buildSensor(
  config: EngineConfig,
  solar: SolarCalculator,
  device: CaptureDevice,
  clock: () => number
): LightSensor {
  const { lightMonitor } = config;
  switch (lightMonitor.sensor) {
    case 'meter':
      return new MeterLightSensor(device, solar, { timeoutMs: config.device.meterTimeoutMs, clock });
    case 'static':
      return new StaticLightSensor(lightMonitor.staticLux ?? 0, { clock });
    default:
      return new SolarLightSensor(solar, { clock });
  }
}

export async function startEngine(options: EngineStartOptions = {}): Promise<EngineRuntime> {
  const manager = options.configManager ?? configManager;
  const injectedConfig = options.config;
  const bus = options.bus ?? defaultBus;
  const logger = options.logger ?? loggerModule;
  const metrics = options.metrics ?? metricsModule;
  const lifecycle = options.lifecycle ?? appLifecycle;
  const clock = options.clock ?? Date.now;
  const autoStart = options.autoStart !== false;

  let activeConfig = injectedConfig ?? manager.getConfig();
  let solar = new SolarCalculator(activeConfig.location);
  const device =
    options.device ??
    new HttpCaptureDevice({
      baseUrl: activeConfig.device.baseUrl,
      requestTimeoutMs: activeConfig.device.requestTimeoutMs,
      meterTimeoutMs: activeConfig.device.meterTimeoutMs,
      focusTimeoutMs: activeConfig.device.focusTimeoutMs
    });

  const applyConfiguredLogLevel = (value: unknown) => {
    if (typeof value !== 'string') {
      return;
    }
    try {
      setLogLevel(value);
    } catch (error) {
      logger.warn({ err: error, level: value }, 'Failed to apply configured log level');
    }
  };

  applyConfiguredLogLevel(activeConfig.logging.level);

  const monitor = new BackgroundLightMonitor({
    sensor: buildSensor(activeConfig, solar, device, clock),
    intervalMs: activeConfig.lightMonitor.intervalMs,
    staleAfterMs: activeConfig.lightMonitor.staleAfterMs,
    sampleTimeoutMs: activeConfig.lightMonitor.sampleTimeoutMs,
    historySize: activeConfig.lightMonitor.historySize,
    clock,
    logger,
    metrics
  });

  const cache = new SettingsCache({
    calculator: buildCalculator(activeConfig.cache.calculator, device, activeConfig),
    focuser: device,
    light: monitor,
    defaults: activeConfig.defaults,
    thresholds: tierThresholdsFrom(activeConfig.cache),
    focusTimeoutMs: activeConfig.device.focusTimeoutMs,
    clock,
    logger,
    metrics
  });

  const bursts = new BurstController({
    device,
    requestTimeoutMs: activeConfig.device.requestTimeoutMs,
    burstTimeoutMs: activeConfig.scheduler.burstTimeoutMs,
    clock,
    logger,
    metrics
  });

  const health = new DeviceHealthTracker({ ...activeConfig.health, clock, metrics });
  const handleHealthChange = ({ current }: DeviceHealthChange) => {
    if (current.isHealthy) {
      logger.info({ consecutiveFailures: current.consecutiveFailures }, 'Capture device recovered');
    } else {
      logger.warn(
        { consecutiveFailures: current.consecutiveFailures, lastError: current.lastError },
        'Capture device marked unhealthy'
      );
    }
  };
  health.on('change', handleHealthChange);

  let resolver = new ScheduleWindowResolver(solar);
  const scheduler = new CaptureScheduler({
    resolver,
    settings: cache,
    light: monitor,
    bursts,
    health,
    schedules: activeConfig.schedules,
    profiles: activeConfig.profiles,
    sink: outcome => {
      bus.emitCapture(outcome, { persist: activeConfig.history.enabled !== false });
    },
    tickIntervalMs: activeConfig.scheduler.tickIntervalMs,
    clock,
    logger,
    metrics
  });

  let retentionTask: RetentionTask | null = null;
  const configureRetention = (config: EngineConfig) => {
    const retentionOptions = buildRetentionOptions(config.history, logger);
    if (!retentionOptions) {
      if (retentionTask) {
        retentionTask.stop();
        retentionTask = null;
      }
      return;
    }

    if (!retentionTask) {
      retentionTask = autoStart ? startRetentionTask(retentionOptions) : new RetentionTask(retentionOptions);
    } else {
      retentionTask.configure(retentionOptions);
    }
  };

  configureRetention(activeConfig);

  const windows = (at: Date): WindowSummary[] => {
    return resolver.resolve(activeConfig.schedules, at).map(({ window, active }) => ({
      name: window.name,
      date: window.date,
      start: window.start.toISOString(),
      end: window.end.toISOString(),
      interval_seconds: window.intervalMs / 1000,
      profiles: [...window.profiles],
      active
    }));
  };

  const buildHealthReport = (): EngineHealthReport => {
    const now = clock();
    const active = resolver.activeWindows(activeConfig.schedules, new Date(now)).map(window => window.name);
    const inFlight = scheduler
      .status()
      .filter(entry => entry.inFlight)
      .map(entry => entry.name);
    const backoffUntil = health.isInBackoff(now) ? health.backoffUntil() : null;
    const light = monitor.snapshot();
    const lastTick = scheduler.lastTickReport();

    let status: EngineHealthReport['status'] = 'ok';
    let idleReason: EngineHealthReport['idle_reason'] = null;
    if (!scheduler.isRunning) {
      status = 'idle';
      idleReason = 'stopped';
    } else if (!health.isHealthy) {
      status = 'degraded';
      idleReason = backoffUntil !== null ? 'backoff' : 'device-unhealthy';
    } else if (active.length === 0) {
      status = 'idle';
      idleReason = 'no-active-window';
    }

    return {
      status,
      idle_reason: idleReason,
      device: health.toHealthPayload(),
      scheduler: {
        running: scheduler.isRunning,
        last_tick: lastTick ? new Date(lastTick.at).toISOString() : null,
        active_windows: active,
        in_flight: inFlight,
        backoff_until: backoffUntil === null ? null : new Date(backoffUntil).toISOString()
      },
      light: {
        stale: light.stale,
        age_ms: light.ageMs,
        lux: light.sample?.luxEstimate ?? null,
        source: light.sample?.source ?? null
      }
    };
  };

  const buildStatus = (): Record<string, unknown> => {
    const entry = cache.peek();
    const light = monitor.snapshot();
    const lastTick = scheduler.lastTickReport();
    return {
      running: scheduler.isRunning,
      location: {
        name: solar.location.name ?? null,
        latitude: solar.location.latitude,
        longitude: solar.location.longitude,
        timezone: solar.timezone
      },
      schedules: scheduler.status(),
      last_tick: lastTick
        ? {
            at: new Date(lastTick.at).toISOString(),
            decisions: lastTick.decisions.map(decision => ({
              schedule: decision.schedule,
              decision: decision.decision,
              sequence: decision.sequence ?? null
            }))
          }
        : null,
      cache: {
        entry: entry
          ? {
              tier: entry.tier,
              computed_at: new Date(entry.computedAt).toISOString(),
              basis_lux: entry.basis?.luxEstimate ?? null,
              settings: entry.settings
            }
          : null,
        focus: cache.focusState(),
        thresholds: cache.thresholdsSnapshot()
      },
      light: {
        sample: light.sample,
        stale: light.stale,
        age_ms: light.ageMs,
        change_ev: monitor.changeMagnitude()
      },
      device: health.toHealthPayload()
    };
  };

  const unregisterIndicators = [
    lifecycle.registerHealthIndicator('device', () => {
      const payload = health.toHealthPayload();
      return { status: payload.healthy ? 'ok' : 'degraded', details: payload };
    }),
    lifecycle.registerHealthIndicator('scheduler', () => {
      const report = buildHealthReport();
      return {
        status: report.status,
        details: { idleReason: report.idle_reason, ...report.scheduler }
      };
    }),
    lifecycle.registerHealthIndicator('light', () => {
      const snapshot = monitor.snapshot();
      return {
        status: snapshot.stale && monitor.isRunning ? 'degraded' : 'ok',
        details: { stale: snapshot.stale, ageMs: snapshot.ageMs, lux: snapshot.sample?.luxEstimate ?? null }
      };
    })
  ];

  const handleReload = ({ previous, next }: ConfigReloadEvent) => {
    activeConfig = next;

    const locationChanged = !sameLocation(previous.location, next.location);
    if (locationChanged) {
      solar = new SolarCalculator(next.location);
      resolver = new ScheduleWindowResolver(solar);
      scheduler.setResolver(resolver);
    }

    const sensorChanged =
      locationChanged ||
      previous.lightMonitor.sensor !== next.lightMonitor.sensor ||
      previous.lightMonitor.staticLux !== next.lightMonitor.staticLux;
    monitor.configure({
      sensor: sensorChanged ? buildSensor(next, solar, device, clock) : undefined,
      intervalMs: next.lightMonitor.intervalMs,
      staleAfterMs: next.lightMonitor.staleAfterMs,
      sampleTimeoutMs: next.lightMonitor.sampleTimeoutMs,
      historySize: next.lightMonitor.historySize
    });

    const defaultsChanged = JSON.stringify(previous.defaults) !== JSON.stringify(next.defaults);
    cache.updateOptions({
      thresholds: tierThresholdsFrom(next.cache),
      defaults: defaultsChanged ? next.defaults : undefined,
      calculator:
        previous.cache.calculator !== next.cache.calculator
          ? buildCalculator(next.cache.calculator, device, next)
          : undefined
    });

    bursts.configure({
      requestTimeoutMs: next.device.requestTimeoutMs,
      burstTimeoutMs: next.scheduler.burstTimeoutMs
    });
    health.configure(next.health);
    scheduler.configure({ tickIntervalMs: next.scheduler.tickIntervalMs });
    scheduler.updateConfig(next.schedules, next.profiles);
    configureRetention(next);
    applyConfiguredLogLevel(next.logging.level);

    if (previous.device.baseUrl !== next.device.baseUrl) {
      logger.warn(
        { previous: previous.device.baseUrl, next: next.device.baseUrl },
        'Device address changes take effect after a restart'
      );
    }

    logger.info(
      {
        schedules: next.schedules.length,
        profiles: next.profiles.length,
        locationChanged,
        sensor: next.lightMonitor.sensor,
        calculator: next.cache.calculator
      },
      'configuration reloaded'
    );
  };

  const handleManagerError = (error: unknown) => {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.warn({ err, configPath: manager.getPath(), action: 'reload', restored: true }, 'configuration reload failed');
    logger.info({ configPath: manager.getPath(), action: 'reload', restored: true }, 'Configuration rollback applied');
  };

  let stopWatching: (() => void) | null = null;
  if (!injectedConfig) {
    stopWatching = manager.watch();
    manager.on('reload', handleReload);
    manager.on('error', handleManagerError);
  }

  let http: HttpServerRuntime | null = null;
  const engine: EngineStatusSource = {
    deviceHealth: () => health.toHealthPayload(),
    health: buildHealthReport,
    status: buildStatus,
    windows
  };

  if (options.http !== false) {
    http = await startHttpServer({
      port: activeConfig.http.port,
      host: activeConfig.http.host,
      engine,
      bus,
      metrics
    });
  }

  if (autoStart) {
    monitor.start();
    scheduler.start();
  }

  logger.info(
    {
      location: solar.location.name ?? `${solar.location.latitude},${solar.location.longitude}`,
      schedules: activeConfig.schedules.length,
      profiles: activeConfig.profiles.length,
      sensor: activeConfig.lightMonitor.sensor
    },
    'Capture engine started'
  );

  let stopPromise: Promise<void> | null = null;
  const stop = () => {
    if (stopPromise) {
      return stopPromise;
    }
    stopPromise = (async () => {
      if (!injectedConfig) {
        manager.off('reload', handleReload);
        manager.off('error', handleManagerError);
        stopWatching?.();
      }
      for (const unregister of unregisterIndicators) {
        unregister();
      }
      health.off('change', handleHealthChange);

      await scheduler.stop(activeConfig.scheduler.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS);
      await monitor.stop();
      retentionTask?.stop();
      if (http) {
        await http.close();
      }
      logger.info('Capture engine stopped');
    })();
    return stopPromise;
  };

  return {
    ...engine,
    config: () => activeConfig,
    scheduler,
    monitor,
    cache,
    bursts,
    health,
    retention: () => retentionTask,
    http,
    stop
  };
}
