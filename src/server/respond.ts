import type { ServerResponse } from 'node:http';

export function sendJson(res: ServerResponse, status: number, payload: unknown) {
  if (!res.headersSent) {
    res.writeHead(status, { 'Content-Type': 'application/json' });
  }
  res.end(JSON.stringify(payload));
}
