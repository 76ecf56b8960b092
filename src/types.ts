export type ScheduleKind = 'solar_relative' | 'fixed_time';

export type SolarAnchor = 'sunrise' | 'sunset' | 'dawn' | 'dusk' | 'noon';

export interface ScheduleDefinition {
  name: string;
  kind: ScheduleKind;
  anchor?: SolarAnchor;
  offsetMinutes?: number;
  durationMinutes?: number;
  startTime?: string;
  endTime?: string;
  intervalSeconds: number;
  enabled: boolean;
  profiles: string[];
}

export interface ScheduleWindow {
  name: string;
  /** Local calendar day (YYYY-MM-DD) the window was derived from. */
  date: string;
  start: Date;
  end: Date;
  intervalMs: number;
  profiles: string[];
}

export type LightSource = 'solar' | 'meter' | 'static';

export interface LightSample {
  timestamp: number;
  luxEstimate: number;
  isGoldenHour: boolean;
  isBlueHour: boolean;
  colorTempK?: number;
  source: LightSource;
}

export interface CaptureSettings {
  iso: number;
  /** "1/500" for fractions of a second, "2.5" for whole seconds. */
  shutterSpeed: string;
  exposureCompensation: number;
  awbMode: number;
  wbTemp?: number;
  hdrMode: number;
  bracketCount: number;
  afMode: number;
  lensPosition: number;
  sharpness: number;
  contrast: number;
  saturation: number;
}

export type CaptureTier = 'cached' | 'light_adapt' | 'full_recalc' | 'refocus';

export interface CaptureSettingsCacheEntry {
  computedAt: number;
  basis: LightSample | null;
  settings: CaptureSettings;
  tier: CaptureTier;
}

export type WhiteBalanceCurve = 'warm' | 'balanced' | 'conservative' | 'adaptive';

export type ExposureCurve = 'adaptive';

export interface AdaptiveCurveSelection<TCurve extends string> {
  enabled: boolean;
  curve: TCurve;
}

export interface Profile {
  id: string;
  name: string;
  enabled: boolean;
  baseSettings: Partial<CaptureSettings>;
  adaptiveWb?: AdaptiveCurveSelection<WhiteBalanceCurve>;
  adaptiveEv?: AdaptiveCurveSelection<ExposureCurve>;
}

export interface CaptureOutcome {
  scheduleName: string;
  profileId: string;
  timestamp: number;
  success: boolean;
  error: string | null;
  latencyMs: number;
  sequence: number;
  tier: CaptureTier;
  degraded: boolean;
}

export interface DeviceHealth {
  consecutiveFailures: number;
  isHealthy: boolean;
  lastSuccessTime: number | null;
  lastFailureTime: number | null;
  lastError: string | null;
}
