import { afterEach, describe, expect, it, vi } from 'vitest';
import { BackgroundLightMonitor, luxDeltaEv, type LightSensor } from '../src/capture/lightMonitor.js';
import {
  MeterLightSensor,
  SolarLightSensor,
  StaticLightSensor,
  classifyElevation,
  luxForElevation
} from '../src/capture/sensors.js';
import type { LightMeter } from '../src/capture/device.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import type { LightSample } from '../src/types.js';

function elevation(degrees: number) {
  return { getSolarElevation: () => degrees };
}

function meterReturning(lux: number | null, colorTempK: number | null = null): LightMeter {
  return {
    meter: async () => ({ lux, suggestedIso: null, suggestedShutter: null, colorTempK })
  };
}

describe('LightSensors', () => {
  it('ElevationLux follows the clear-sky model', () => {
    expect(luxForElevation(0)).toBe(400);
    expect(luxForElevation(30)).toBe(60400);
    expect(luxForElevation(-6)).toBe(3.4);
    expect(luxForElevation(-20)).toBe(0.001);
  });

  it('ElevationClassification marks golden and blue hour', () => {
    expect(classifyElevation(-6)).toEqual({ isGoldenHour: true, isBlueHour: false });
    expect(classifyElevation(-8)).toEqual({ isGoldenHour: false, isBlueHour: true });
    expect(classifyElevation(6)).toEqual({ isGoldenHour: true, isBlueHour: false });
    expect(classifyElevation(7)).toEqual({ isGoldenHour: false, isBlueHour: false });
  });

  it('SolarSensor samples the model at the clock time', async () => {
    const sensor = new SolarLightSensor(elevation(0), { clock: () => 1_000 });

    await expect(sensor.sample()).resolves.toEqual({
      timestamp: 1_000,
      luxEstimate: 400,
      isGoldenHour: true,
      isBlueHour: false,
      source: 'solar'
    });
  });

  it('MeterSensor reads lux and colour temperature from the device', async () => {
    const sensor = new MeterLightSensor(meterReturning(850, 4200), elevation(20), { clock: () => 2_000 });

    await expect(sensor.sample()).resolves.toEqual({
      timestamp: 2_000,
      luxEstimate: 850,
      isGoldenHour: false,
      isBlueHour: false,
      colorTempK: 4200,
      source: 'meter'
    });
  });

  it('MeterSensor rejects readings without lux', async () => {
    const sensor = new MeterLightSensor(meterReturning(null), elevation(20));

    await expect(sensor.sample()).rejects.toThrow('Meter reading did not include lux');
  });

  it('StaticSensor reports the configured value', async () => {
    const sensor = new StaticLightSensor(120, { isBlueHour: true, clock: () => 5 });
    sensor.setLux(240);

    await expect(sensor.sample()).resolves.toEqual({
      timestamp: 5,
      luxEstimate: 240,
      isGoldenHour: false,
      isBlueHour: true,
      source: 'static'
    });
  });
});

describe('BackgroundLightMonitor', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('LuxDelta is measured in stops', () => {
    expect(luxDeltaEv(100, 400)).toBe(2);
    expect(luxDeltaEv(400, 100)).toBe(-2);
    expect(luxDeltaEv(0, 0.02)).toBe(1);
  });

  it('Snapshot is stale before the first sample', () => {
    const monitor = new BackgroundLightMonitor({ sensor: new StaticLightSensor(10), metrics: new MetricsRegistry() });

    expect(monitor.snapshot()).toEqual({ sample: null, stale: true, ageMs: null });
  });

  it('SampleOnce publishes a frozen sample and ages it with the clock', async () => {
    let now = 10_000;
    const clock = () => now;
    const monitor = new BackgroundLightMonitor({
      sensor: new StaticLightSensor(500, { clock }),
      staleAfterMs: 15_000,
      clock,
      metrics: new MetricsRegistry()
    });
    const published = vi.fn();
    monitor.on('sample', published);

    const sample = await monitor.sampleOnce();

    expect(sample?.luxEstimate).toBe(500);
    expect(Object.isFrozen(sample)).toBe(true);
    expect(published).toHaveBeenCalledTimes(1);

    now = 20_000;
    expect(monitor.snapshot()).toMatchObject({ stale: false, ageMs: 10_000 });
    now = 25_001;
    expect(monitor.snapshot()).toMatchObject({ stale: true, ageMs: 15_001 });
  });

  it('SensorFailure keeps the previous sample', async () => {
    const sensor = new StaticLightSensor(300, { clock: () => 1 });
    const monitor = new BackgroundLightMonitor({ sensor, clock: () => 1, metrics: new MetricsRegistry() });
    await monitor.sampleOnce();

    const failing: LightSensor = {
      kind: 'meter',
      sample: async () => {
        throw new Error('meter offline');
      }
    };
    monitor.configure({ sensor: failing });
    const errors: unknown[] = [];
    monitor.on('sample-error', error => errors.push(error));

    await expect(monitor.sampleOnce()).resolves.toBeNull();
    expect(monitor.snapshot().sample?.luxEstimate).toBe(300);
    expect(errors).toHaveLength(1);
  });

  it('InvalidSamples are rejected', async () => {
    const broken: LightSensor = {
      kind: 'static',
      sample: async () => ({ timestamp: 1, luxEstimate: -5, isGoldenHour: false, isBlueHour: false, source: 'static' })
    };
    const monitor = new BackgroundLightMonitor({ sensor: broken, metrics: new MetricsRegistry() });

    await expect(monitor.sampleOnce()).resolves.toBeNull();
    expect(monitor.snapshot().sample).toBeNull();
  });

  it('SlowSensor times out', async () => {
    const hanging: LightSensor = {
      kind: 'meter',
      sample: () => new Promise<LightSample>(() => {})
    };
    const monitor = new BackgroundLightMonitor({ sensor: hanging, sampleTimeoutMs: 30, metrics: new MetricsRegistry() });
    const errors: unknown[] = [];
    monitor.on('sample-error', error => errors.push(error));

    await expect(monitor.sampleOnce()).resolves.toBeNull();
    expect(errors[0]).toBeInstanceOf(Error);
    expect(errors[0]).toMatchObject({ message: 'Light sample timed out after 30ms' });
  });

  it('History is bounded and feeds the change magnitude', async () => {
    const sensor = new StaticLightSensor(100, { clock: () => 1 });
    const monitor = new BackgroundLightMonitor({ sensor, historySize: 3, clock: () => 1, metrics: new MetricsRegistry() });

    for (const lux of [100, 200, 400, 800]) {
      sensor.setLux(lux);
      await monitor.sampleOnce();
    }

    expect(monitor.history().map(sample => sample.luxEstimate)).toEqual([200, 400, 800]);
    expect(monitor.changeMagnitude()).toBe(2);
    expect(monitor.changeMagnitude(1)).toBe(1);
  });

  it('Start samples immediately and then on the interval', async () => {
    vi.useFakeTimers();
    const sensor = new StaticLightSensor(50);
    const sample = vi.spyOn(sensor, 'sample');
    const monitor = new BackgroundLightMonitor({ sensor, intervalMs: 1_000, metrics: new MetricsRegistry() });

    monitor.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(sample).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1_000);
    expect(sample).toHaveBeenCalledTimes(2);

    await monitor.stop();
    await vi.advanceTimersByTimeAsync(5_000);
    expect(sample).toHaveBeenCalledTimes(2);
    expect(monitor.isRunning).toBe(false);
  });
});
