import type { SolarCalculator } from '../astro/solar.js';
import type { ScheduleDefinition, ScheduleWindow } from '../types.js';
import { MINUTE_MS, localDateKey, shiftDateKey, zonedTimeToInstant } from '../utils/time.js';

export type WindowResolution = {
  window: ScheduleWindow;
  active: boolean;
};

export class ScheduleWindowResolver {
  private readonly solar: SolarCalculator;
  private readonly timezone: string;

  constructor(solar: SolarCalculator, timezone: string = solar.timezone) {
    this.solar = solar;
    this.timezone = timezone;
  }

  /**
   * Window for a definition on a local calendar day. Returns null when the
   * solar anchor does not occur that day (polar day or night).
   */
  windowFor(definition: ScheduleDefinition, dateKey: string): ScheduleWindow | null {
    const intervalMs = definition.intervalSeconds * 1000;

    if (definition.kind === 'solar_relative') {
      const anchor = this.solar.anchorTime(dateKey, definition.anchor ?? 'sunrise');
      if (!anchor) {
        return null;
      }
      const start = new Date(anchor.getTime() + (definition.offsetMinutes ?? 0) * MINUTE_MS);
      const end = new Date(start.getTime() + Math.max(0, definition.durationMinutes ?? 0) * MINUTE_MS);
      return freezeWindow({ name: definition.name, date: dateKey, start, end, intervalMs, profiles: definition.profiles });
    }

    if (!definition.startTime || !definition.endTime) {
      return null;
    }

    const start = zonedTimeToInstant(dateKey, definition.startTime, this.timezone);
    let end = zonedTimeToInstant(dateKey, definition.endTime, this.timezone);
    if (end.getTime() <= start.getTime()) {
      end = zonedTimeToInstant(shiftDateKey(dateKey, 1), definition.endTime, this.timezone);
    }
    return freezeWindow({ name: definition.name, date: dateKey, start, end, intervalMs, profiles: definition.profiles });
  }

  /**
   * One window per enabled definition for the local day containing `now`.
   * A window derived from the previous day wins while it still contains
   * `now`, so schedules running across midnight keep their anchor.
   */
  resolveWindows(definitions: readonly ScheduleDefinition[], now: Date): ScheduleWindow[] {
    return this.resolve(definitions, now).map(entry => entry.window);
  }

  activeWindows(definitions: readonly ScheduleDefinition[], now: Date): ScheduleWindow[] {
    return this.resolve(definitions, now)
      .filter(entry => entry.active)
      .map(entry => entry.window);
  }

  resolve(definitions: readonly ScheduleDefinition[], now: Date): WindowResolution[] {
    const today = localDateKey(now, this.timezone);
    const yesterday = shiftDateKey(today, -1);
    const results: WindowResolution[] = [];

    for (const definition of definitions) {
      if (!definition.enabled) {
        continue;
      }

      const previous = this.windowFor(definition, yesterday);
      if (previous && containsInstant(previous, now)) {
        results.push({ window: previous, active: true });
        continue;
      }

      const current = this.windowFor(definition, today);
      if (current) {
        results.push({ window: current, active: containsInstant(current, now) });
      }
    }

    return results;
  }
}

export function containsInstant(window: ScheduleWindow, now: Date): boolean {
  const time = now.getTime();
  return time >= window.start.getTime() && time <= window.end.getTime();
}

export function isDue(window: ScheduleWindow, lastCapture: Date | null, now: Date): boolean {
  if (!containsInstant(window, now)) {
    return false;
  }
  if (!lastCapture) {
    return true;
  }
  return now.getTime() - lastCapture.getTime() >= window.intervalMs;
}

function freezeWindow(window: ScheduleWindow): ScheduleWindow {
  return Object.freeze({ ...window, profiles: [...window.profiles] });
}
