import { DeviceUnreachableError, errorMessage } from '../errors.js';
import type { CaptureSettings } from '../types.js';
import { isRecord } from '../utils/guards.js';

export type DeviceCallOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
};

export type CaptureRequest = {
  settings: CaptureSettings;
  profileId: string;
  scheduleName: string;
  sequence: number;
};

export type CaptureResult = {
  metadata: Record<string, unknown>;
};

export type MeterReading = {
  lux: number | null;
  suggestedIso: number | null;
  suggestedShutter: string | null;
  colorTempK: number | null;
};

export type FocusResult = {
  lensPosition: number;
};

export interface CaptureTrigger {
  capture(request: CaptureRequest, options?: DeviceCallOptions): Promise<CaptureResult>;
}

export interface LightMeter {
  meter(options?: DeviceCallOptions): Promise<MeterReading>;
}

export interface Focuser {
  focus(options?: DeviceCallOptions): Promise<FocusResult>;
}

export interface CaptureDevice extends CaptureTrigger, LightMeter, Focuser {}

export interface HttpCaptureDeviceOptions {
  baseUrl: string;
  requestTimeoutMs?: number;
  meterTimeoutMs?: number;
  focusTimeoutMs?: number;
  fetch?: typeof fetch;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 15000;

/** Wire shape of `POST /capture`. */
export function toCapturePayload(request: CaptureRequest): Record<string, unknown> {
  const { settings } = request;
  const payload: Record<string, unknown> = {
    iso: settings.iso,
    shutter_speed: settings.shutterSpeed,
    exposure_compensation: settings.exposureCompensation,
    awb_mode: settings.awbMode,
    hdr_mode: settings.hdrMode,
    bracket_count: settings.bracketCount,
    af_mode: settings.afMode,
    lens_position: settings.lensPosition,
    sharpness: settings.sharpness,
    contrast: settings.contrast,
    saturation: settings.saturation,
    profile: request.profileId,
    schedule: request.scheduleName,
    sequence: request.sequence
  };
  if (typeof settings.wbTemp === 'number') {
    payload.wb_temp = settings.wbTemp;
  }
  return payload;
}

export class HttpCaptureDevice implements CaptureDevice {
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly meterTimeoutMs: number;
  private readonly focusTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpCaptureDeviceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.meterTimeoutMs = options.meterTimeoutMs ?? this.requestTimeoutMs;
    this.focusTimeoutMs = options.focusTimeoutMs ?? this.requestTimeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async capture(request: CaptureRequest, options: DeviceCallOptions = {}): Promise<CaptureResult> {
    const body = await this.request('POST', '/capture', {
      body: toCapturePayload(request),
      timeoutMs: options.timeoutMs ?? this.requestTimeoutMs,
      signal: options.signal
    });
    return { metadata: body };
  }

  async meter(options: DeviceCallOptions = {}): Promise<MeterReading> {
    const body = await this.request('GET', '/meter', {
      timeoutMs: options.timeoutMs ?? this.meterTimeoutMs,
      signal: options.signal
    });
    return {
      lux: readNumber(body.lux),
      suggestedIso: readNumber(body.suggested_iso),
      suggestedShutter: readShutter(body.suggested_shutter),
      colorTempK: readNumber(body.color_temp_k)
    };
  }

  async focus(options: DeviceCallOptions = {}): Promise<FocusResult> {
    const body = await this.request('POST', '/focus', {
      body: {},
      timeoutMs: options.timeoutMs ?? this.focusTimeoutMs,
      signal: options.signal
    });
    const lensPosition = readNumber(body.lens_position);
    if (lensPosition === null) {
      throw new DeviceUnreachableError('Focus response did not include lens_position');
    }
    return { lensPosition };
  }

  private async request(
    method: 'GET' | 'POST',
    pathname: string,
    options: { body?: Record<string, unknown>; timeoutMs: number; signal?: AbortSignal }
  ): Promise<Record<string, unknown>> {
    const url = `${this.baseUrl}${pathname}`;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.timeoutMs);
    const unlink = linkSignal(options.signal, controller);

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: options.body ? { 'Content-Type': 'application/json' } : undefined,
        body: options.body ? JSON.stringify(options.body) : undefined,
        signal: controller.signal
      });
      text = await response.text();
    } catch (error) {
      if (timedOut) {
        throw new DeviceUnreachableError(`${method} ${pathname} timed out after ${options.timeoutMs}ms`, {
          cause: error
        });
      }
      if (options.signal?.aborted) {
        throw new DeviceUnreachableError(`${method} ${pathname} aborted`, { cause: error });
      }
      throw new DeviceUnreachableError(`${method} ${pathname} failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timer);
      unlink();
    }

    if (!response.ok) {
      const detail = text.trim().slice(0, 200);
      throw new DeviceUnreachableError(
        `${method} ${pathname} returned HTTP ${response.status}${detail ? `: ${detail}` : ''}`,
        { status: response.status }
      );
    }

    return parseBody(text);
  }
}

function linkSignal(source: AbortSignal | undefined, target: AbortController): () => void {
  if (!source) {
    return () => {};
  }
  if (source.aborted) {
    target.abort();
    return () => {};
  }
  const onAbort = () => target.abort();
  source.addEventListener('abort', onAbort, { once: true });
  return () => source.removeEventListener('abort', onAbort);
}

function parseBody(text: string): Record<string, unknown> {
  if (!text.trim()) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { raw: text };
  }
  if (isRecord(parsed)) {
    return parsed;
  }
  return { value: parsed };
}

function readNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function readShutter(value: unknown): string | null {
  if (typeof value === 'string' && value.trim() !== '') {
    return value.trim();
  }
  if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
    return String(value);
  }
  return null;
}
