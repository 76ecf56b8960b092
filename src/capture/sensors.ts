import type { LightSample } from '../types.js';
import type { LightMeter } from './device.js';
import type { LightSensor } from './lightMonitor.js';

export interface ElevationSource {
  getSolarElevation(instant: Date | number): number;
}

// [elevation degrees, lux] for the twilight band, interpolated on log10(lux)
const TWILIGHT_LUX: ReadonlyArray<readonly [number, number]> = [
  [-18, 0.001],
  [-12, 0.01],
  [-6, 3.4],
  [0, 400]
];
const NIGHT_LUX = 0.001;
const HORIZON_LUX = 400;
const ZENITH_DIRECT_LUX = 120000;

/** Clear-sky illuminance for a sun elevation. */
export function luxForElevation(elevation: number): number {
  let lux: number;
  if (elevation >= 0) {
    lux = HORIZON_LUX + ZENITH_DIRECT_LUX * Math.sin((elevation * Math.PI) / 180);
  } else if (elevation <= -18) {
    lux = NIGHT_LUX;
  } else {
    lux = NIGHT_LUX;
    for (let index = 0; index < TWILIGHT_LUX.length - 1; index += 1) {
      const low = TWILIGHT_LUX[index];
      const high = TWILIGHT_LUX[index + 1];
      if (!low || !high || elevation < low[0] || elevation > high[0]) {
        continue;
      }
      const progress = (elevation - low[0]) / (high[0] - low[0]);
      const logLux = Math.log10(low[1]) + progress * (Math.log10(high[1]) - Math.log10(low[1]));
      lux = 10 ** logLux;
      break;
    }
  }
  return Math.round(lux * 1000) / 1000;
}

/** Golden hour spans -6..6 degrees; blue hour -12 up to (not including) -6. */
export function classifyElevation(elevation: number): { isGoldenHour: boolean; isBlueHour: boolean } {
  return {
    isGoldenHour: elevation >= -6 && elevation <= 6,
    isBlueHour: elevation >= -12 && elevation < -6
  };
}

export class SolarLightSensor implements LightSensor {
  readonly kind = 'solar';
  private readonly solar: ElevationSource;
  private readonly clock: () => number;

  constructor(solar: ElevationSource, options: { clock?: () => number } = {}) {
    this.solar = solar;
    this.clock = options.clock ?? Date.now;
  }

  async sample(): Promise<LightSample> {
    const timestamp = this.clock();
    const elevation = this.solar.getSolarElevation(timestamp);
    return {
      timestamp,
      luxEstimate: luxForElevation(elevation),
      ...classifyElevation(elevation),
      source: this.kind
    };
  }
}

/** Reads lux from the device meter; golden and blue hour still come from the sun. */
export class MeterLightSensor implements LightSensor {
  readonly kind = 'meter';
  private readonly meter: LightMeter;
  private readonly solar: ElevationSource;
  private readonly timeoutMs: number | undefined;
  private readonly clock: () => number;

  constructor(
    meter: LightMeter,
    solar: ElevationSource,
    options: { timeoutMs?: number; clock?: () => number } = {}
  ) {
    this.meter = meter;
    this.solar = solar;
    this.timeoutMs = options.timeoutMs;
    this.clock = options.clock ?? Date.now;
  }

  async sample(options: { signal?: AbortSignal } = {}): Promise<LightSample> {
    const reading = await this.meter.meter({ signal: options.signal, timeoutMs: this.timeoutMs });
    if (reading.lux === null) {
      throw new Error('Meter reading did not include lux');
    }
    const timestamp = this.clock();
    const sample: LightSample = {
      timestamp,
      luxEstimate: reading.lux,
      ...classifyElevation(this.solar.getSolarElevation(timestamp)),
      source: this.kind
    };
    if (reading.colorTempK !== null) {
      sample.colorTempK = reading.colorTempK;
    }
    return sample;
  }
}

export class StaticLightSensor implements LightSensor {
  readonly kind = 'static';
  private lux: number;
  private readonly flags: { isGoldenHour: boolean; isBlueHour: boolean };
  private readonly clock: () => number;

  constructor(
    lux: number,
    options: { isGoldenHour?: boolean; isBlueHour?: boolean; clock?: () => number } = {}
  ) {
    this.lux = lux;
    this.flags = { isGoldenHour: options.isGoldenHour ?? false, isBlueHour: options.isBlueHour ?? false };
    this.clock = options.clock ?? Date.now;
  }

  setLux(lux: number) {
    this.lux = lux;
  }

  async sample(): Promise<LightSample> {
    return { timestamp: this.clock(), luxEstimate: this.lux, ...this.flags, source: this.kind };
  }
}
