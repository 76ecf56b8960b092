export type EngineErrorCode =
  | 'CONFIG_INVALID'
  | 'INVALID_LOCATION'
  | 'DEVICE_UNREACHABLE'
  | 'SETTINGS_COMPUTATION'
  | 'PARTIAL_BURST_FAILURE';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends EngineError {
  readonly issues: string[];

  constructor(issues: string[] | string) {
    const list = Array.isArray(issues) ? issues : [issues];
    super('CONFIG_INVALID', list.join('; '));
    this.issues = list;
  }
}

export class InvalidLocationError extends EngineError {
  constructor(message: string) {
    super('INVALID_LOCATION', message);
  }
}

export class DeviceUnreachableError extends EngineError {
  readonly status: number | null;

  constructor(message: string, options: { status?: number | null; cause?: unknown } = {}) {
    super('DEVICE_UNREACHABLE', message, { cause: options.cause });
    this.status = options.status ?? null;
  }
}

export class SettingsComputationError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SETTINGS_COMPUTATION', message, options);
  }
}

/** Summary of a burst where some profiles failed. Attached to burst reports, not thrown. */
export class PartialBurstFailure extends EngineError {
  readonly failedProfiles: string[];
  readonly attempted: number;

  constructor(failedProfiles: string[], attempted: number) {
    super(
      'PARTIAL_BURST_FAILURE',
      `${failedProfiles.length} of ${attempted} profile captures failed: ${failedProfiles.join(', ')}`
    );
    this.failedProfiles = failedProfiles;
    this.attempted = attempted;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
