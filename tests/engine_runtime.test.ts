import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { AppLifecycle, collectHealthChecks, resetAppLifecycle } from '../src/app.js';
import type { CaptureDevice, CaptureRequest } from '../src/capture/device.js';
import { ConfigManager, loadConfigFromFile, type EngineConfig } from '../src/config/index.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { buildRetentionOptions, startEngine, type EngineRuntime } from '../src/run-engine.js';
import { waitFor } from './helpers/fixtures.js';

const TEN_AM = Date.parse('2024-06-21T10:00:00.000Z');
const baseConfig = loadConfigFromFile(path.resolve('config/default.json'));

function engineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    ...baseConfig,
    logging: { level: 'silent' },
    http: { port: 0, host: '127.0.0.1' },
    lightMonitor: { sensor: 'static', staticLux: 1000, intervalMs: 5_000, staleAfterMs: 30_000 },
    cache: { ...baseConfig.cache, calculator: 'model' },
    ...overrides
  };
}

function createDevice() {
  return {
    capture: vi.fn(async (_request: CaptureRequest) => ({ metadata: {} })),
    meter: vi.fn(async () => ({ lux: 1000, suggestedIso: null, suggestedShutter: null, colorTempK: null })),
    focus: vi.fn(async () => ({ lensPosition: 2 }))
  } satisfies CaptureDevice;
}

function createLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

function createBus() {
  return { emitCapture: vi.fn(), onCapture: vi.fn(() => () => {}) };
}

describe('EngineRuntime', () => {
  let runtime: EngineRuntime | null = null;
  let device: ReturnType<typeof createDevice>;
  let bus: ReturnType<typeof createBus>;
  let logger: ReturnType<typeof createLogger>;

  beforeEach(() => {
    device = createDevice();
    bus = createBus();
    logger = createLogger();
  });

  afterEach(async () => {
    await runtime?.stop();
    runtime = null;
    resetAppLifecycle();
  });

  function start(config: EngineConfig = engineConfig(), options: { http?: boolean } = {}) {
    return startEngine({
      config,
      device,
      bus,
      logger,
      metrics: new MetricsRegistry(),
      clock: () => TEN_AM,
      http: options.http ?? false,
      autoStart: false
    });
  }

  it('StoppedEngine reports idle with the reason', async () => {
    runtime = await start();

    expect(runtime.health()).toEqual({
      status: 'idle',
      idle_reason: 'stopped',
      device: { healthy: true, consecutive_failures: 0, last_success: null, last_error: null },
      scheduler: { running: false, last_tick: null, active_windows: ['daytime'], in_flight: [], backoff_until: null },
      light: { stale: true, age_ms: null, lux: null, source: null }
    });
    expect(runtime.retention()).not.toBeNull();
  });

  it('Windows list the day with the active one flagged', async () => {
    runtime = await start();

    const windows = runtime.windows(new Date(TEN_AM));

    expect(windows.map(window => [window.name, window.active])).toEqual([
      ['sunrise', false],
      ['daytime', true],
      ['sunset', false]
    ]);
    expect(windows[1]).toEqual({
      name: 'daytime',
      date: '2024-06-21',
      start: '2024-06-21T07:00:00.000Z',
      end: '2024-06-21T15:00:00.000Z',
      interval_seconds: 300,
      profiles: ['a'],
      active: true
    });
  });

  it('RunningEngine captures the due window and reports health', async () => {
    runtime = await start();
    await runtime.monitor.sampleOnce();

    runtime.scheduler.start();
    await waitFor(() => runtime?.scheduler.status().find(entry => entry.name === 'daytime')?.progress === 1);

    expect(device.focus).toHaveBeenCalledTimes(1);
    expect(device.capture).toHaveBeenCalledTimes(1);
    expect(device.capture.mock.calls[0]?.[0]).toMatchObject({
      profileId: 'a',
      scheduleName: 'daytime',
      sequence: 1,
      settings: { awbMode: 6, wbTemp: 4300, exposureCompensation: 0.7, afMode: 0, lensPosition: 2 }
    });
    expect(bus.emitCapture).toHaveBeenCalledWith(
      expect.objectContaining({ profileId: 'a', success: true, tier: 'refocus', degraded: false }),
      { persist: true }
    );
    expect(runtime.status()).toMatchObject({
      running: true,
      cache: {
        entry: { tier: 'refocus', basis_lux: 1000 },
        focus: { lastFocusAt: TEN_AM, lastRefocusAttemptAt: TEN_AM, lensPosition: 2 }
      }
    });
    expect(runtime.health()).toMatchObject({
      status: 'ok',
      idle_reason: null,
      scheduler: { running: true, active_windows: ['daytime'], in_flight: [] },
      light: { stale: false, lux: 1000, source: 'static' }
    });

    for (let attempt = 0; attempt < 3; attempt += 1) {
      runtime.health.recordFailure(new Error('timeout'));
    }
    expect(runtime.health()).toMatchObject({
      status: 'degraded',
      idle_reason: 'backoff',
      scheduler: { backoff_until: '2024-06-21T10:01:00.000Z' }
    });
    expect(logger.warn).toHaveBeenCalledWith(
      { consecutiveFailures: 3, lastError: 'timeout' },
      'Capture device marked unhealthy'
    );
  });

  it('DisabledHistory delivers captures without storing them', async () => {
    runtime = await start(engineConfig({ history: { enabled: false, retentionDays: 7 } }));
    await runtime.monitor.sampleOnce();

    runtime.scheduler.start();
    await waitFor(() => runtime?.scheduler.status().find(entry => entry.name === 'daytime')?.progress === 1);

    expect(bus.emitCapture).toHaveBeenCalledTimes(1);
    expect(bus.emitCapture).toHaveBeenCalledWith(
      expect.objectContaining({ profileId: 'a', scheduleName: 'daytime', success: true }),
      { persist: false }
    );
    expect(runtime.retention()).toBeNull();
  });

  it('InjectedLifecycle receives the health indicators', async () => {
    const lifecycle = new AppLifecycle();
    runtime = await startEngine({
      config: engineConfig(),
      device,
      bus,
      logger,
      metrics: new MetricsRegistry(),
      lifecycle,
      clock: () => TEN_AM,
      http: false,
      autoStart: false
    });

    const checks = await lifecycle.collectHealthChecks({ service: { status: 'idle', startedAt: null } });

    expect(checks.map(check => [check.name, check.status])).toEqual([
      ['device', 'ok'],
      ['scheduler', 'idle'],
      ['light', 'ok']
    ]);
    await expect(collectHealthChecks({ service: { status: 'idle', startedAt: null } })).resolves.toEqual([]);
  });

  it('HttpApi serves the engine', async () => {
    runtime = await start(engineConfig(), { http: true });
    const port = runtime.http?.port;

    const response = await fetch(`http://127.0.0.1:${port}/health`);

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toMatchObject({ status: 'idle', idle_reason: 'stopped' });
  });

  it('RetentionOptions follow the history section', () => {
    expect(buildRetentionOptions({ enabled: false, retentionDays: 7 })).toBeNull();
    expect(buildRetentionOptions({ retentionDays: 14, intervalMinutes: 30, vacuum: true })).toEqual({
      enabled: true,
      retentionDays: 14,
      intervalMs: 1_800_000,
      vacuum: true,
      logger: undefined
    });
    expect(buildRetentionOptions({ retentionDays: 30 })?.intervalMs).toBe(3_600_000);
  });
});

describe('EngineHotReload', () => {
  let tempDir: string;
  let configPath: string;
  let runtime: EngineRuntime | null = null;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'alpenglow-engine-'));
    configPath = path.join(tempDir, 'config.json');
    fs.writeFileSync(configPath, JSON.stringify(engineConfig(), null, 2));
  });

  afterEach(async () => {
    await runtime?.stop();
    runtime = null;
    resetAppLifecycle();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('Reload rebuilds location, schedules and retention', async () => {
    const manager = new ConfigManager(configPath);
    const logger = createLogger();
    runtime = await startEngine({
      configManager: manager,
      device: createDevice(),
      bus: createBus(),
      logger,
      metrics: new MetricsRegistry(),
      clock: () => TEN_AM,
      http: false,
      autoStart: false
    });

    const next = engineConfig({
      location: { name: 'Tromso', latitude: 69.65, longitude: 18.96, timezone: 'Europe/Oslo' },
      device: { ...baseConfig.device, baseUrl: 'http://127.0.0.1:9999' },
      schedules: baseConfig.schedules.filter(schedule => schedule.name === 'daytime'),
      history: { enabled: false, retentionDays: 7 }
    });
    fs.writeFileSync(configPath, JSON.stringify(next, null, 2));
    manager.reload();

    expect(runtime.config().location.timezone).toBe('Europe/Oslo');
    expect(runtime.scheduler.status().map(entry => entry.name)).toEqual(['daytime']);
    expect(runtime.windows(new Date(TEN_AM))).toEqual([
      expect.objectContaining({ name: 'daytime', start: '2024-06-21T07:00:00.000Z', active: true })
    ]);
    expect(runtime.status()).toMatchObject({
      location: { name: 'Tromso', latitude: 69.65, longitude: 18.96, timezone: 'Europe/Oslo' }
    });
    expect(runtime.retention()).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(
      { previous: 'http://127.0.0.1:8090', next: 'http://127.0.0.1:9999' },
      'Device address changes take effect after a restart'
    );
    expect(logger.info).toHaveBeenCalledWith(
      expect.objectContaining({ schedules: 1, locationChanged: true }),
      'configuration reloaded'
    );
  });

  it('ReloadErrors are logged and listeners detach on stop', async () => {
    const manager = new ConfigManager(configPath);
    const logger = createLogger();
    runtime = await startEngine({
      configManager: manager,
      device: createDevice(),
      bus: createBus(),
      logger,
      metrics: new MetricsRegistry(),
      http: false,
      autoStart: false
    });

    manager.emit('error', new Error('config.http.port must be <= 65535'));
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ configPath, action: 'reload', restored: true }),
      'configuration reload failed'
    );

    await runtime.stop();
    expect(manager.listenerCount('reload')).toBe(0);
    expect(manager.listenerCount('error')).toBe(0);
  });
});
