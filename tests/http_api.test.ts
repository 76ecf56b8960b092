import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ReadableStreamDefaultReader } from 'node:stream/web';
import { TextDecoder } from 'node:util';
import { clearCaptures, storeCaptureOutcome } from '../src/db.js';
import { CaptureEventBus } from '../src/eventBus.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { startHttpServer, type HttpServerRuntime } from '../src/server/http.js';
import type { EngineHealthReport, EngineStatusSource, WindowSummary } from '../src/server/routes/engine.js';
import type { CaptureOutcome } from '../src/types.js';

const NOW = Date.parse('2024-06-21T10:00:00.000Z');

type SseBlock = { event: string; id: string | null; data: string | null; comments: string[] };

function healthReport(overrides: Partial<EngineHealthReport> = {}): EngineHealthReport {
  return {
    status: 'ok',
    idle_reason: null,
    device: { healthy: true, consecutive_failures: 0, last_success: null, last_error: null },
    scheduler: { running: true, last_tick: null, active_windows: ['daytime'], in_flight: [], backoff_until: null },
    light: { stale: false, age_ms: 100, lux: 1200, source: 'solar' },
    ...overrides
  };
}

const WINDOWS: WindowSummary[] = [
  {
    name: 'daytime',
    date: '2024-06-21',
    start: '2024-06-21T07:00:00.000Z',
    end: '2024-06-21T15:00:00.000Z',
    interval_seconds: 300,
    profiles: ['wide'],
    active: true
  }
];

function createEngine() {
  let report = healthReport();
  const engine: EngineStatusSource & { setReport(next: EngineHealthReport): void } = {
    deviceHealth: () => report.device,
    health: () => report,
    status: () => ({ running: true, schedules: [] }),
    windows: vi.fn((_at: Date) => WINDOWS),
    setReport(next) {
      report = next;
    }
  };
  return engine;
}

function outcome(overrides: Partial<CaptureOutcome> = {}): CaptureOutcome {
  return {
    scheduleName: 'daytime',
    profileId: 'wide',
    timestamp: NOW,
    success: true,
    error: null,
    latencyMs: 80,
    sequence: 1,
    tier: 'cached',
    degraded: false,
    ...overrides
  };
}

function parseBlock(chunk: string): SseBlock {
  const block: SseBlock = { event: 'message', id: null, data: null, comments: [] };
  for (const line of chunk.split('\n')) {
    if (line.startsWith(':')) {
      block.comments.push(line.slice(1).trim());
    } else if (line.startsWith('event:')) {
      block.event = line.slice(6).trim();
    } else if (line.startsWith('id:')) {
      block.id = line.slice(3).trim();
    } else if (line.startsWith('data:')) {
      block.data = line.slice(5).trim();
    }
  }
  return block;
}

async function readBlocks(
  reader: ReadableStreamDefaultReader<Uint8Array>,
  until: (blocks: SseBlock[]) => boolean
): Promise<SseBlock[]> {
  const decoder = new TextDecoder();
  const blocks: SseBlock[] = [];
  let buffer = '';
  while (!until(blocks)) {
    const { done, value } = await reader.read();
    if (done) {
      throw new Error('stream ended early');
    }
    buffer += decoder.decode(value, { stream: true });
    let boundary = buffer.indexOf('\n\n');
    while (boundary >= 0) {
      blocks.push(parseBlock(buffer.slice(0, boundary)));
      buffer = buffer.slice(boundary + 2);
      boundary = buffer.indexOf('\n\n');
    }
  }
  return blocks;
}

function captureBlocks(blocks: SseBlock[]) {
  return blocks.filter(block => block.event === 'capture');
}

describe('HttpApi', () => {
  let runtime: HttpServerRuntime;
  let engine: ReturnType<typeof createEngine>;
  let bus: CaptureEventBus;
  let metrics: MetricsRegistry;
  let baseUrl: string;

  beforeEach(async () => {
    clearCaptures();
    engine = createEngine();
    metrics = new MetricsRegistry();
    bus = new CaptureEventBus({
      store: storeCaptureOutcome,
      log: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
      metrics
    });
    runtime = await startHttpServer({ port: 0, host: '127.0.0.1', engine, bus, metrics, heartbeatMs: 60_000 });
    baseUrl = `http://127.0.0.1:${runtime.port}`;
  });

  afterEach(async () => {
    await runtime.close();
  });

  it('Health returns 200 while ok or idle and 503 when degraded', async () => {
    const ok = await fetch(`${baseUrl}/health`);
    expect(ok.status).toBe(200);
    expect(ok.headers.get('content-type')).toBe('application/json');
    await expect(ok.json()).resolves.toEqual(healthReport());

    engine.setReport(healthReport({ status: 'idle', idle_reason: 'no-active-window' }));
    const idle = await fetch(`${baseUrl}/health`);
    expect(idle.status).toBe(200);
    await expect(idle.json()).resolves.toMatchObject({ status: 'idle', idle_reason: 'no-active-window' });

    engine.setReport(
      healthReport({
        status: 'degraded',
        idle_reason: 'backoff',
        device: { healthy: false, consecutive_failures: 3, last_success: null, last_error: 'timeout' }
      })
    );
    const degraded = await fetch(`${baseUrl}/health`);
    expect(degraded.status).toBe(503);
    await expect(degraded.json()).resolves.toMatchObject({ status: 'degraded', idle_reason: 'backoff' });
  });

  it('DeviceHealth reports the tracker payload', async () => {
    const response = await fetch(`${baseUrl}/health/device`);

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({
      healthy: true,
      consecutive_failures: 0,
      last_success: null,
      last_error: null
    });
  });

  it('Status returns the engine status', async () => {
    const response = await fetch(`${baseUrl}/status`);

    await expect(response.json()).resolves.toEqual({ running: true, schedules: [] });
  });

  it('Windows resolve at the requested instant', async () => {
    const response = await fetch(`${baseUrl}/api/windows?at=2024-06-21T10:00:00Z`);

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({ at: '2024-06-21T10:00:00.000Z', windows: WINDOWS });
    expect(engine.windows).toHaveBeenCalledWith(new Date('2024-06-21T10:00:00.000Z'));
  });

  it('Windows reject an invalid instant', async () => {
    const response = await fetch(`${baseUrl}/api/windows?at=nope`);

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toEqual({ error: 'Invalid "at" parameter: nope' });
  });

  it('Metrics export Prometheus text and JSON', async () => {
    bus.emitCapture(outcome());

    const text = await fetch(`${baseUrl}/metrics`);
    expect(text.headers.get('content-type')).toBe('text/plain; version=0.0.4');
    const lines = (await text.text()).split('\n');
    expect(lines).toContain('# TYPE alpenglow_captures_total counter');
    expect(lines).toContain('alpenglow_captures_total{result="success"} 1');
    expect(lines).toContain('alpenglow_captures_by_profile_total{profile="wide",result="success"} 1');

    const json = await fetch(`${baseUrl}/metrics?format=json`);
    await expect(json.json()).resolves.toMatchObject({ captures: { total: 1, succeeded: 1, failed: 0 } });
  });

  it('Captures list newest first with filters', async () => {
    bus.emitCapture(outcome({ timestamp: NOW - 2_000 }));
    bus.emitCapture(outcome({ timestamp: NOW - 1_000, profileId: 'tele', success: false, error: 'busy' }));

    const all = await fetch(`${baseUrl}/api/captures?limit=10`);
    await expect(all.json()).resolves.toMatchObject({
      total: 2,
      limit: 10,
      items: [
        {
          profile: 'tele',
          timestamp: '2024-06-21T09:59:59.000Z',
          schedule: 'daytime',
          success: false,
          error: 'busy',
          latency_ms: 80,
          tier: 'cached',
          degraded: false
        },
        { profile: 'wide', success: true }
      ]
    });

    const failed = await fetch(`${baseUrl}/api/captures?success=false`);
    await expect(failed.json()).resolves.toMatchObject({ total: 1 });
  });

  it('UnknownRoutes return 404', async () => {
    const response = await fetch(`${baseUrl}/nowhere`);

    expect(response.status).toBe(404);
    await expect(response.json()).resolves.toEqual({ error: 'Not found' });
  });

  it('RouteErrors return 500', async () => {
    engine.health = () => {
      throw new Error('engine exploded');
    };

    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(500);
    await expect(response.json()).resolves.toEqual({ error: 'Internal server error' });
  });

  it('CaptureStream pushes matching outcomes', async () => {
    const controller = new AbortController();
    const response = await fetch(`${baseUrl}/api/captures/stream?profile=tele&retryMs=2000`, {
      signal: controller.signal
    });
    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('text/event-stream');
    const reader = response.body?.getReader();
    if (!reader) {
      throw new Error('missing reader');
    }

    const [greeting] = await readBlocks(reader, blocks => blocks.length >= 1);
    expect(greeting?.comments).toEqual(['connected']);
    expect(greeting?.data).toBeNull();

    bus.emitCapture(outcome({ profileId: 'wide' }));
    const tele = bus.emitCapture(outcome({ profileId: 'tele', sequence: 3 }));

    const blocks = await readBlocks(reader, seen => captureBlocks(seen).length >= 1);
    const [event] = captureBlocks(blocks);
    expect(event?.id).toBe(String(tele.id));
    expect(JSON.parse(event?.data ?? '{}')).toMatchObject({ profile: 'tele', sequence: 3, success: true });

    controller.abort();
    await reader.cancel().catch(() => undefined);
  });

  it('CaptureStream replays the backlog after Last-Event-ID', async () => {
    const first = bus.emitCapture(outcome({ sequence: 1 }));
    const second = bus.emitCapture(outcome({ sequence: 2, timestamp: NOW + 1_000 }));
    const third = bus.emitCapture(outcome({ sequence: 3, timestamp: NOW + 2_000 }));

    const controller = new AbortController();
    const response = await fetch(`${baseUrl}/api/captures/stream`, {
      headers: { 'Last-Event-ID': String(first.id) },
      signal: controller.signal
    });
    const reader = response.body?.getReader();
    if (!reader) {
      throw new Error('missing reader');
    }

    const blocks = await readBlocks(reader, seen => captureBlocks(seen).length >= 2);
    expect(captureBlocks(blocks).map(block => block.id)).toEqual([String(second.id), String(third.id)]);

    controller.abort();
    await reader.cancel().catch(() => undefined);
  });

  it('CaptureStream replays a backlog larger than one page in order', async () => {
    const ids: number[] = [];
    for (let sequence = 1; sequence <= 150; sequence += 1) {
      ids.push(storeCaptureOutcome(outcome({ sequence, timestamp: NOW + sequence })));
    }

    const controller = new AbortController();
    const response = await fetch(`${baseUrl}/api/captures/stream?lastEventId=${ids[0]}`, {
      signal: controller.signal
    });
    const reader = response.body?.getReader();
    if (!reader) {
      throw new Error('missing reader');
    }

    const blocks = await readBlocks(reader, seen => captureBlocks(seen).length >= 149);
    const replayed = captureBlocks(blocks).map(block => Number(block.id));
    expect(replayed).toEqual(ids.slice(1));

    controller.abort();
    await reader.cancel().catch(() => undefined);
  });
});
