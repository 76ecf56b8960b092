import { SettingsComputationError, errorMessage } from '../errors.js';
import type { CaptureSettings, LightSample } from '../types.js';
import type { LightMeter, MeterReading } from './device.js';

export const ISO_MIN = 100;
export const ISO_MAX = 3200;
export const SHUTTER_MIN_S = 1 / 8000;
export const SHUTTER_MAX_S = 30;

// Exposure time at ISO 100 is APERTURE^2 * LUX_CALIBRATION / lux (incident meter constant 250)
const APERTURE = 4;
const LUX_CALIBRATION = 2.5;
const PREFERRED_MAX_SHUTTER_S = 1;
const MIN_LUX = 0.001;

const SHUTTER_PATTERN = /^(\d+(?:\.\d+)?)(?:\/(\d+(?:\.\d+)?))?s?$/;

export function parseShutterSpeed(value: string): number {
  const match = SHUTTER_PATTERN.exec(value.trim());
  if (!match) {
    throw new SettingsComputationError(`Invalid shutter speed "${value}"`);
  }
  const numerator = Number(match[1]);
  const denominator = match[2] === undefined ? 1 : Number(match[2]);
  const seconds = numerator / denominator;
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new SettingsComputationError(`Invalid shutter speed "${value}"`);
  }
  return seconds;
}

export function formatShutterSpeed(seconds: number): string {
  if (seconds >= 0.3) {
    return String(Math.round(seconds * 10) / 10);
  }
  return `1/${Math.round(1 / seconds)}`;
}

function clamp(value: number, min: number, max: number) {
  return Math.min(max, Math.max(min, value));
}

/** ISO and shutter for a lux reading, raising ISO before going past one second. */
export function exposureFromLux(lux: number): Pick<CaptureSettings, 'iso' | 'shutterSpeed'> {
  const effectiveLux = Math.max(MIN_LUX, lux);
  let shutter = (APERTURE * APERTURE * LUX_CALIBRATION) / effectiveLux;
  let iso = ISO_MIN;
  while (shutter > PREFERRED_MAX_SHUTTER_S && iso < ISO_MAX) {
    iso *= 2;
    shutter /= 2;
  }
  return { iso, shutterSpeed: formatShutterSpeed(clamp(shutter, SHUTTER_MIN_S, SHUTTER_MAX_S)) };
}

/**
 * Scales total exposure by `factor` (2 = one stop brighter). Gain moves first;
 * whatever the ISO range cannot absorb goes to the shutter.
 */
export function adaptExposure(settings: CaptureSettings, factor: number): CaptureSettings {
  if (!Number.isFinite(factor) || factor <= 0) {
    throw new SettingsComputationError(`Invalid exposure factor ${factor}`);
  }
  const targetIso = settings.iso * factor;
  const iso = clamp(Math.round(targetIso), ISO_MIN, ISO_MAX);
  const residual = targetIso / iso;
  const shutter = clamp(parseShutterSpeed(settings.shutterSpeed) * residual, SHUTTER_MIN_S, SHUTTER_MAX_S);
  return { ...settings, iso, shutterSpeed: formatShutterSpeed(shutter) };
}

export type SettingsComputationInput = {
  sample: LightSample | null;
  base: CaptureSettings;
  signal?: AbortSignal;
};

export interface SettingsCalculator {
  readonly name: string;
  compute(input: SettingsComputationInput): Promise<CaptureSettings>;
}

/** Derives settings from the light monitor's lux estimate without touching the device. */
export class LuxModelCalculator implements SettingsCalculator {
  readonly name = 'model';

  async compute({ sample, base }: SettingsComputationInput): Promise<CaptureSettings> {
    if (!sample) {
      throw new SettingsComputationError('No light sample available for the exposure model');
    }
    return { ...base, ...exposureFromLux(sample.luxEstimate) };
  }
}

/** Runs a metering pass on the device. */
export class MeteredCalculator implements SettingsCalculator {
  readonly name = 'meter';
  private readonly meter: LightMeter;
  private readonly timeoutMs: number | undefined;

  constructor(meter: LightMeter, options: { timeoutMs?: number } = {}) {
    this.meter = meter;
    this.timeoutMs = options.timeoutMs;
  }

  async compute({ sample, base, signal }: SettingsComputationInput): Promise<CaptureSettings> {
    let reading: MeterReading;
    try {
      reading = await this.meter.meter({ signal, timeoutMs: this.timeoutMs });
    } catch (error) {
      throw new SettingsComputationError(`Metering failed: ${errorMessage(error)}`, { cause: error });
    }

    if (reading.suggestedIso !== null && reading.suggestedShutter !== null) {
      // rejects a malformed suggestion before it reaches the device
      parseShutterSpeed(reading.suggestedShutter);
      return {
        ...base,
        iso: clamp(Math.round(reading.suggestedIso), ISO_MIN, ISO_MAX),
        shutterSpeed: reading.suggestedShutter
      };
    }

    const lux = reading.lux ?? sample?.luxEstimate ?? null;
    if (lux === null) {
      throw new SettingsComputationError('Metering returned neither suggested exposure nor lux');
    }
    return { ...base, ...exposureFromLux(lux) };
  }
}
