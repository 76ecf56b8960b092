import SunCalc from 'suncalc';
import { InvalidLocationError } from '../errors.js';
import type { SolarAnchor } from '../types.js';
import { isValidTimeZone, localDateKey, zonedTimeToInstant } from '../utils/time.js';

export interface GeoLocation {
  latitude: number;
  longitude: number;
  timezone: string;
  elevationM?: number;
  name?: string;
}

export interface SolarTimes {
  /** Local calendar day (YYYY-MM-DD) in the location's timezone. */
  date: string;
  sunrise: Date | null;
  sunset: Date | null;
  solarNoon: Date | null;
  dawn: Date | null;
  dusk: Date | null;
}

export interface SolarCalculatorOptions {
  cacheDays?: number;
}

const DEFAULT_CACHE_DAYS = 7;

export function validateLocation(location: GeoLocation): void {
  const { latitude, longitude, timezone } = location;
  if (typeof latitude !== 'number' || !Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    throw new InvalidLocationError(`Latitude ${latitude} is outside [-90, 90]`);
  }
  if (typeof longitude !== 'number' || !Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new InvalidLocationError(`Longitude ${longitude} is outside [-180, 180]`);
  }
  if (!isValidTimeZone(timezone)) {
    throw new InvalidLocationError(`Unknown timezone "${timezone}"`);
  }
}

/**
 * Sunrise, sunset and related events for one location. Results are memoised
 * per local calendar day so the scheduler can ask on every tick.
 */
export class SolarCalculator {
  readonly location: Readonly<GeoLocation>;
  private readonly cacheDays: number;
  private readonly cache = new Map<string, SolarTimes>();

  constructor(location: GeoLocation, options: SolarCalculatorOptions = {}) {
    validateLocation(location);
    this.location = Object.freeze({ ...location });
    this.cacheDays = Math.max(1, options.cacheDays ?? DEFAULT_CACHE_DAYS);
  }

  get timezone(): string {
    return this.location.timezone;
  }

  getSolarTimes(date: Date | string): SolarTimes {
    const dateKey = typeof date === 'string' ? date : localDateKey(date, this.location.timezone);
    const cached = this.cache.get(dateKey);
    if (cached) {
      return cached;
    }

    // suncalc picks the solar day closest to the given instant, so ask at local noon
    const reference = zonedTimeToInstant(dateKey, '12:00', this.location.timezone);
    const times = SunCalc.getTimes(
      reference,
      this.location.latitude,
      this.location.longitude,
      this.location.elevationM ?? 0
    );

    const result: SolarTimes = Object.freeze({
      date: dateKey,
      sunrise: validInstant(times.sunrise),
      sunset: validInstant(times.sunset),
      solarNoon: validInstant(times.solarNoon),
      dawn: validInstant(times.dawn),
      dusk: validInstant(times.dusk)
    });

    this.cache.set(dateKey, result);
    this.pruneCache();
    return result;
  }

  anchorTime(date: Date | string, anchor: SolarAnchor): Date | null {
    const times = this.getSolarTimes(date);
    switch (anchor) {
      case 'sunrise':
        return times.sunrise;
      case 'sunset':
        return times.sunset;
      case 'dawn':
        return times.dawn;
      case 'dusk':
        return times.dusk;
      case 'noon':
        return times.solarNoon;
      default:
        return null;
    }
  }

  /** Sun elevation above the horizon in degrees. */
  getSolarElevation(instant: Date | number): number {
    const date = typeof instant === 'number' ? new Date(instant) : instant;
    const position = SunCalc.getPosition(date, this.location.latitude, this.location.longitude);
    return (position.altitude * 180) / Math.PI;
  }

  cachedDates(): string[] {
    return Array.from(this.cache.keys());
  }

  private pruneCache() {
    while (this.cache.size > this.cacheDays) {
      const oldest = this.cache.keys().next();
      if (oldest.done) {
        return;
      }
      this.cache.delete(oldest.value);
    }
  }
}

function validInstant(value: Date | undefined): Date | null {
  if (!value || Number.isNaN(value.getTime())) {
    return null;
  }
  return value;
}
