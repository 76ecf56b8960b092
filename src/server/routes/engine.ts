import type { IncomingMessage, ServerResponse } from 'node:http';
import { URL } from 'node:url';
import metricsModule, { type MetricsRegistry } from '../../metrics/index.js';
import type { DeviceHealthPayload } from '../../capture/healthTracker.js';
import { sendJson } from '../respond.js';

export type IdleReason = 'no-active-window' | 'backoff' | 'device-unhealthy' | 'stopped';

export type EngineHealthReport = {
  status: 'ok' | 'idle' | 'degraded';
  idle_reason: IdleReason | null;
  device: DeviceHealthPayload;
  scheduler: {
    running: boolean;
    last_tick: string | null;
    active_windows: string[];
    in_flight: string[];
    backoff_until: string | null;
  };
  light: {
    stale: boolean;
    age_ms: number | null;
    lux: number | null;
    source: string | null;
  };
};

export type WindowSummary = {
  name: string;
  date: string;
  start: string;
  end: string;
  interval_seconds: number;
  profiles: string[];
  active: boolean;
};

export interface EngineStatusSource {
  deviceHealth(): DeviceHealthPayload;
  health(): EngineHealthReport;
  status(): Record<string, unknown>;
  windows(at: Date): WindowSummary[];
}

type Handler = (req: IncomingMessage, res: ServerResponse, url: URL) => boolean;

export interface EngineRouterOptions {
  engine: EngineStatusSource;
  metrics?: MetricsRegistry;
}

export class EngineRouter {
  private readonly engine: EngineStatusSource;
  private readonly metrics: MetricsRegistry;
  private readonly handlers: Handler[];

  constructor(options: EngineRouterOptions) {
    this.engine = options.engine;
    this.metrics = options.metrics ?? metricsModule;
    this.handlers = [
      (req, res, url) => this.handleDeviceHealth(req, res, url),
      (req, res, url) => this.handleHealth(req, res, url),
      (req, res, url) => this.handleStatus(req, res, url),
      (req, res, url) => this.handleWindows(req, res, url),
      (req, res, url) => this.handleMetrics(req, res, url)
    ];
  }

  handle(req: IncomingMessage, res: ServerResponse): boolean {
    if (!req.url) {
      return false;
    }

    const url = new URL(req.url, 'http://localhost');
    for (const handler of this.handlers) {
      if (handler(req, res, url)) {
        return true;
      }
    }

    return false;
  }

  private handleDeviceHealth(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/health/device') {
      return false;
    }
    sendJson(res, 200, this.engine.deviceHealth());
    return true;
  }

  private handleHealth(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/health') {
      return false;
    }
    const report = this.engine.health();
    sendJson(res, report.status === 'degraded' ? 503 : 200, report);
    return true;
  }

  private handleStatus(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/status') {
      return false;
    }
    sendJson(res, 200, this.engine.status());
    return true;
  }

  private handleWindows(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/windows') {
      return false;
    }
    const at = url.searchParams.get('at');
    let instant = new Date();
    if (at) {
      const parsed = new Date(at);
      if (Number.isNaN(parsed.getTime())) {
        sendJson(res, 400, { error: `Invalid "at" parameter: ${at}` });
        return true;
      }
      instant = parsed;
    }
    sendJson(res, 200, { at: instant.toISOString(), windows: this.engine.windows(instant) });
    return true;
  }

  private handleMetrics(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/metrics') {
      return false;
    }
    if (url.searchParams.get('format') === 'json') {
      sendJson(res, 200, this.metrics.snapshot());
      return true;
    }
    res.writeHead(200, { 'Content-Type': 'text/plain; version=0.0.4' });
    res.end(this.metrics.exportPrometheus());
    return true;
  }
}

export function createEngineRouter(options: EngineRouterOptions) {
  return new EngineRouter(options);
}
