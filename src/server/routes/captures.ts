import type { IncomingMessage, ServerResponse } from 'node:http';
import { URL } from 'node:url';
import logger from '../../logger.js';
import { listCaptures, type CaptureRecord, type ListCapturesOptions } from '../../db.js';
import type { CaptureEvent, CaptureEventBus } from '../../eventBus.js';
import { sendJson } from '../respond.js';

type Handler = (req: IncomingMessage, res: ServerResponse, url: URL) => boolean;

type StreamFilters = Pick<ListCapturesOptions, 'schedule' | 'profile' | 'success'>;

type ClientState = {
  heartbeat: NodeJS.Timeout;
  filters: StreamFilters;
};

export interface CapturesRouterOptions {
  bus: Pick<CaptureEventBus, 'onCapture'>;
  heartbeatMs?: number;
  list?: typeof listCaptures;
}

const BACKLOG_PAGE_SIZE = 100;

export class CapturesRouter {
  private readonly clients = new Map<ServerResponse, ClientState>();
  private readonly handlers: Handler[];
  private readonly heartbeatMs: number;
  private readonly list: typeof listCaptures;
  private readonly unsubscribe: () => void;

  constructor(options: CapturesRouterOptions) {
    this.heartbeatMs = options.heartbeatMs ?? 15000;
    this.list = options.list ?? listCaptures;
    this.handlers = [
      (req, res, url) => this.handleList(req, res, url),
      (req, res, url) => this.handleStream(req, res, url)
    ];
    this.unsubscribe = options.bus.onCapture(this.handleCapture);
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

  get clientCount(): number {
    return this.clients.size;
  }

  close() {
    this.unsubscribe();
    for (const [client, state] of this.clients) {
      clearInterval(state.heartbeat);
      client.end();
    }
    this.clients.clear();
  }

  private readonly handleCapture = (event: CaptureEvent) => {
    const payload = JSON.stringify(formatCapture(event));
    for (const [client, state] of this.clients) {
      if (client.writableEnded) {
        clearInterval(state.heartbeat);
        this.clients.delete(client);
        continue;
      }

      if (!matchesFilters(event, state.filters)) {
        continue;
      }

      try {
        writeCaptureBlock(client, event.id, payload);
      } catch (error) {
        logger.debug({ err: error }, 'Dropping capture stream client');
        clearInterval(state.heartbeat);
        client.end();
        this.clients.delete(client);
      }
    }
  };

  private handleList(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/captures') {
      return false;
    }

    const options = parseListOptions(url);
    const result = this.list(options);
    sendJson(res, 200, {
      items: result.items.map(formatCapture),
      total: result.total,
      limit: options.limit ?? undefined,
      offset: options.offset ?? undefined
    });
    return true;
  }

  private handleStream(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/captures/stream') {
      return false;
    }

    const filters = extractStreamFilters(url);
    const retryMs = resolveRetryInterval(url.searchParams);
    const lastEventId = resolveLastEventId(req, url);

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive'
    });
    res.write(': connected\n');
    res.write(`retry: ${retryMs}\n\n`);

    const heartbeat = setInterval(() => {
      if (res.writableEnded || !sendHeartbeat(res)) {
        clearInterval(heartbeat);
        this.clients.delete(res);
      }
    }, this.heartbeatMs);

    if (typeof heartbeat.unref === 'function') {
      heartbeat.unref();
    }

    this.clients.set(res, { heartbeat, filters });

    if (lastEventId !== null) {
      this.pushBacklog(res, filters, lastEventId);
    }

    let cleanedUp = false;
    const cleanup = () => {
      if (cleanedUp) {
        return;
      }
      cleanedUp = true;

      req.off('close', cleanup);
      req.off('error', cleanup);
      res.off('error', cleanup);
      res.off('close', cleanup);

      const client = this.clients.get(res);
      if (client) {
        clearInterval(client.heartbeat);
      }
      this.clients.delete(res);
    };

    req.on('close', cleanup);
    req.on('error', cleanup);
    res.on('error', cleanup);
    res.on('close', cleanup);
    return true;
  }

  private pushBacklog(target: ServerResponse, filters: StreamFilters, lastEventId: number) {
    let cursor = lastEventId;
    try {
      for (;;) {
        const page = this.list({ ...filters, afterId: cursor, limit: BACKLOG_PAGE_SIZE, offset: 0 });
        for (const entry of page.items) {
          if (target.writableEnded) {
            return;
          }
          writeCaptureBlock(target, entry.id, JSON.stringify(formatCapture(entry)));
          cursor = entry.id;
        }
        if (page.items.length < BACKLOG_PAGE_SIZE) {
          return;
        }
      }
    } catch (error) {
      logger.warn({ err: error, lastEventId: cursor }, 'Failed to stream capture backlog');
    }
  }
}

export function createCapturesRouter(options: CapturesRouterOptions) {
  return new CapturesRouter(options);
}

export type CaptureSummary = {
  id: number | null;
  timestamp: string;
  schedule: string;
  profile: string;
  success: boolean;
  error: string | null;
  latency_ms: number;
  sequence: number;
  tier: string;
  degraded: boolean;
};

function formatCapture(capture: CaptureEvent | CaptureRecord): CaptureSummary {
  return {
    id: capture.id,
    timestamp: new Date(capture.timestamp).toISOString(),
    schedule: capture.scheduleName,
    profile: capture.profileId,
    success: capture.success,
    error: capture.error,
    latency_ms: capture.latencyMs,
    sequence: capture.sequence,
    tier: capture.tier,
    degraded: capture.degraded
  };
}

function writeCaptureBlock(target: ServerResponse, id: number | null, payload: string) {
  if (typeof id === 'number') {
    target.write(`id: ${id}\n`);
  }
  target.write('event: capture\n');
  target.write(`data: ${payload}\n\n`);
}

function sendHeartbeat(res: ServerResponse): boolean {
  try {
    res.write('event: heartbeat\n');
    res.write(`data: ${JSON.stringify({ ts: Date.now() })}\n\n`);
    return true;
  } catch (error) {
    logger.debug({ err: error }, 'Capture stream heartbeat failed');
    return false;
  }
}

function matchesFilters(event: CaptureEvent, filters: StreamFilters): boolean {
  if (filters.schedule && event.scheduleName !== filters.schedule) {
    return false;
  }
  if (filters.profile && event.profileId !== filters.profile) {
    return false;
  }
  if (typeof filters.success === 'boolean' && event.success !== filters.success) {
    return false;
  }
  return true;
}

function extractStreamFilters(url: URL): StreamFilters {
  const { schedule, profile, success } = parseListOptions(url);
  const filters: StreamFilters = {};
  if (schedule) {
    filters.schedule = schedule;
  }
  if (profile) {
    filters.profile = profile;
  }
  if (typeof success === 'boolean') {
    filters.success = success;
  }
  return filters;
}

export function parseListOptions(url: URL): ListCapturesOptions {
  const params = url.searchParams;
  const toNumber = (value: string | null) => {
    if (value === null) {
      return undefined;
    }
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  };

  const options: ListCapturesOptions = {};
  const limit = toNumber(params.get('limit'));
  const offset = toNumber(params.get('offset'));
  const since = resolveDateParam(params.get('since'));
  const until = resolveDateParam(params.get('until'));

  if (typeof limit === 'number') {
    options.limit = limit;
  }
  if (typeof offset === 'number') {
    options.offset = offset;
  }
  if (typeof since === 'number') {
    options.since = since;
  }
  if (typeof until === 'number') {
    options.until = until;
  }

  const schedule = params.get('schedule');
  if (schedule) {
    options.schedule = schedule;
  }

  const profile = params.get('profile');
  if (profile) {
    options.profile = profile;
  }

  const success = params.get('success');
  if (success === 'true' || success === '1') {
    options.success = true;
  } else if (success === 'false' || success === '0') {
    options.success = false;
  }

  return options;
}

function resolveDateParam(value: string | null): number | undefined {
  if (!value) {
    return undefined;
  }
  const numeric = Number(value);
  if (Number.isFinite(numeric)) {
    return numeric;
  }
  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    return undefined;
  }
  return parsed;
}

function resolveRetryInterval(params: URLSearchParams): number {
  const retryMs = params.get('retryMs');
  if (!retryMs) {
    return 5000;
  }
  const parsed = Number(retryMs);
  if (!Number.isFinite(parsed)) {
    return 5000;
  }
  return Math.max(1000, Math.min(Math.floor(parsed), 60000));
}

function resolveLastEventId(req: IncomingMessage, url: URL): number | null {
  const parseId = (value: string | null | undefined): number | null => {
    if (!value) {
      return null;
    }
    const trimmed = value.trim();
    if (!trimmed) {
      return null;
    }
    const parsed = Number(trimmed);
    if (!Number.isFinite(parsed)) {
      return null;
    }
    const normalized = Math.floor(parsed);
    return normalized >= 0 ? normalized : null;
  };

  const header = req.headers['last-event-id'];
  return parseId(url.searchParams.get('lastEventId')) ?? parseId(typeof header === 'string' ? header : null);
}
