import curveData from '../../data/curves.json' with { type: 'json' };
import type { ExposureCurve, WhiteBalanceCurve } from '../types.js';

/** [lux, value] pairs ordered by descending lux. */
export type CurvePoint = readonly [number, number];

export const DEFAULT_WB_TEMP_K = 5500;
export const DEFAULT_EXPOSURE_COMPENSATION = 0;

const WHITE_BALANCE_CURVES: ReadonlyMap<string, readonly CurvePoint[]> = loadCurves(curveData.whiteBalance);
const WHITE_BALANCE_ALIASES: ReadonlyMap<string, string> = new Map(Object.entries(curveData.whiteBalanceAliases));
const EXPOSURE_CURVES: ReadonlyMap<string, readonly CurvePoint[]> = loadCurves(curveData.exposureCompensation);

function loadCurves(source: Record<string, number[][]>): Map<string, readonly CurvePoint[]> {
  const curves = new Map<string, readonly CurvePoint[]>();
  for (const [name, rows] of Object.entries(source)) {
    const points: CurvePoint[] = [];
    for (const row of rows) {
      const [lux, value] = row;
      if (row.length !== 2 || typeof lux !== 'number' || typeof value !== 'number') {
        throw new Error(`Curve "${name}" contains a malformed point`);
      }
      points.push([lux, value]);
    }
    points.sort((a, b) => b[0] - a[0]);
    curves.set(name, Object.freeze(points));
  }
  return curves;
}

export function whiteBalanceCurveNames(): string[] {
  return [...WHITE_BALANCE_CURVES.keys(), ...WHITE_BALANCE_ALIASES.keys()].sort();
}

export function exposureCurveNames(): string[] {
  return Array.from(EXPOSURE_CURVES.keys()).sort();
}

export function isWhiteBalanceCurve(name: string): name is WhiteBalanceCurve {
  return WHITE_BALANCE_CURVES.has(name) || WHITE_BALANCE_ALIASES.has(name);
}

export function isExposureCurve(name: string): name is ExposureCurve {
  return EXPOSURE_CURVES.has(name);
}

function resolveWhiteBalancePoints(name: string): readonly CurvePoint[] {
  const target = WHITE_BALANCE_ALIASES.get(name) ?? name;
  const points = WHITE_BALANCE_CURVES.get(target);
  if (!points) {
    throw new Error(`Unknown white balance curve "${name}"`);
  }
  return points;
}

/**
 * Linear interpolation between neighbouring points, clamped to the first and
 * last point outside the table's lux range.
 */
export function interpolateCurve(points: readonly CurvePoint[], lux: number, fallback: number): number {
  const first = points[0];
  const last = points[points.length - 1];
  if (!first || !last) {
    return fallback;
  }
  if (lux >= first[0]) {
    return first[1];
  }
  if (lux <= last[0]) {
    return last[1];
  }

  for (let index = 0; index < points.length - 1; index += 1) {
    const high = points[index];
    const low = points[index + 1];
    if (!high || !low) {
      break;
    }
    if (lux <= high[0] && lux >= low[0]) {
      const span = high[0] - low[0];
      const progress = span === 0 ? 0 : (high[0] - lux) / span;
      return high[1] - progress * (high[1] - low[1]);
    }
  }

  return fallback;
}

/** Colour temperature in kelvin for the light level; 5500 K when lux is unknown. */
export function whiteBalanceForLux(curve: WhiteBalanceCurve, lux: number | null | undefined): number {
  if (typeof lux !== 'number' || !Number.isFinite(lux)) {
    return DEFAULT_WB_TEMP_K;
  }
  return Math.trunc(interpolateCurve(resolveWhiteBalancePoints(curve), lux, DEFAULT_WB_TEMP_K));
}

export function exposureCompensationForLux(curve: ExposureCurve, lux: number): number {
  const points = EXPOSURE_CURVES.get(curve);
  if (!points) {
    throw new Error(`Unknown exposure curve "${curve}"`);
  }
  const value = interpolateCurve(points, lux, DEFAULT_EXPOSURE_COMPENSATION);
  return Math.round(value * 100) / 100;
}
