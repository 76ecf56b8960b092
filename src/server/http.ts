import http from 'node:http';
import defaultBus, { type CaptureEventBus } from '../eventBus.js';
import logger from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import { createCapturesRouter } from './routes/captures.js';
import { createEngineRouter, type EngineStatusSource } from './routes/engine.js';
import { sendJson } from './respond.js';

export interface HttpServerOptions {
  port?: number;
  host?: string;
  engine: EngineStatusSource;
  bus?: Pick<CaptureEventBus, 'onCapture'>;
  metrics?: MetricsRegistry;
  heartbeatMs?: number;
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: () => Promise<void>;
}

export async function startHttpServer(options: HttpServerOptions): Promise<HttpServerRuntime> {
  const port = options.port ?? 3000;
  const host = options.host ?? '0.0.0.0';
  const metrics = options.metrics ?? metricsModule;

  const engineRouter = createEngineRouter({ engine: options.engine, metrics });
  const capturesRouter = createCapturesRouter({
    bus: options.bus ?? defaultBus,
    heartbeatMs: options.heartbeatMs
  });

  const server = http.createServer((req, res) => {
    try {
      if (engineRouter.handle(req, res)) {
        return;
      }

      if (capturesRouter.handle(req, res)) {
        return;
      }

      sendJson(res, 404, { error: 'Not found' });
    } catch (error) {
      logger.error({ err: error }, 'HTTP request failed');
      sendJson(res, 500, { error: 'Internal server error' });
    }
  });

  server.on('close', () => {
    capturesRouter.close();
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  logger.info({ port: actualPort, host }, 'HTTP server listening');

  return {
    server,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        // SSE clients hold their sockets open; end them before waiting on close
        capturesRouter.close();
        server.closeIdleConnections();
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      })
  };
}

export default startHttpServer;
