import path from 'node:path';
import process from 'node:process';
import { DEFAULT_CONFIG_PATH, loadConfigFromFile, type HttpConfig } from '../src/config/index.js';
import { errorMessage } from '../src/errors.js';
import type { EngineHealthReport } from '../src/server/routes/engine.js';
import { isRecord } from '../src/utils/guards.js';

type Writable = Pick<NodeJS.WritableStream, 'write'>;

type IoStreams = {
  stdout: Writable;
  stderr: Writable;
};

function printUsage(target: Writable) {
  target.write(
    [
      'Alpenglow healthcheck helper',
      '',
      'Usage:',
      '  npx tsx scripts/healthcheck.ts [--ready] [--pretty] [--config path] [--timeout ms]',
      '',
      'Queries GET /health on the running engine at the configured http.host and http.port.',
      '',
      'Options:',
      '  --ready        Emit readiness payload instead of the health report',
      '  --health       Force health report output (default)',
      '  --pretty       Pretty-print JSON output with indentation',
      '  -c, --config <path>  Read http.host and http.port from this configuration file',
      '  --timeout <ms> Give up on the engine after this many milliseconds (default 5000)',
      '  -h, --help     Show this help message'
    ].join('\n') + '\n'
  );
}

type Mode = 'health' | 'ready';

type ParsedArgs = {
  mode: Mode;
  pretty: boolean;
  help: boolean;
  errors: string[];
  configPath: string | null;
  timeoutMs: number;
};

type HealthStatus = EngineHealthReport['status'];

export type EngineReadiness = {
  ready: boolean;
  status: HealthStatus;
  idleReason: EngineHealthReport['idle_reason'];
  reason: string | null;
};

const DEFAULT_TIMEOUT_MS = 5000;
const HEALTH_STATUSES: readonly HealthStatus[] = ['ok', 'idle', 'degraded'];

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    mode: 'health',
    pretty: false,
    help: false,
    errors: [],
    configPath: null,
    timeoutMs: DEFAULT_TIMEOUT_MS
  };
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) {
      continue;
    }

    if (token === '--config' || token === '-c') {
      const next = argv[index + 1];
      if (!next) {
        parsed.errors.push('Missing value for --config');
      } else {
        parsed.configPath = next;
        index += 1;
      }
      continue;
    }

    if (token === '--timeout' || token.startsWith('--timeout=')) {
      const value = token === '--timeout' ? argv[index + 1] : token.slice('--timeout='.length);
      if (token === '--timeout') {
        index += 1;
      }
      const timeoutMs = Number(value);
      if (!value || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
        parsed.errors.push('Invalid value for --timeout');
      } else {
        parsed.timeoutMs = timeoutMs;
      }
      continue;
    }

    if (token.startsWith('--config=')) {
      const value = token.slice('--config='.length);
      if (value) {
        parsed.configPath = value;
      } else {
        parsed.errors.push('Missing value for --config');
      }
      continue;
    }

    if (token.startsWith('-c=')) {
      const value = token.slice(3);
      if (value) {
        parsed.configPath = value;
      } else {
        parsed.errors.push('Missing value for -c');
      }
      continue;
    }

    if (token.startsWith('-c') && token.length > 2) {
      const value = token.slice(2);
      if (value) {
        parsed.configPath = value;
      } else {
        parsed.errors.push('Missing value for -c');
      }
      continue;
    }

    switch (token) {
      case '--ready':
      case 'ready':
        parsed.mode = 'ready';
        break;
      case '--health':
      case 'health':
        parsed.mode = 'health';
        break;
      case '--pretty':
      case '-p':
        parsed.pretty = true;
        break;
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      case '--json':
      case '-j':
        break;
      default:
        parsed.errors.push(`Unknown option: ${token}`);
        break;
    }
  }
  return parsed;
}

/** Wildcard listen addresses are reached through the loopback interface. */
export function healthUrl(http: HttpConfig): string {
  const host = !http.host || http.host === '0.0.0.0' || http.host === '::' ? '127.0.0.1' : http.host;
  const authority = host.includes(':') ? `[${host}]` : host;
  return `http://${authority}:${http.port}/health`;
}

function isHealthReport(value: unknown): value is EngineHealthReport {
  if (!isRecord(value)) {
    return false;
  }
  const { status } = value;
  return typeof status === 'string' && HEALTH_STATUSES.some(candidate => candidate === status);
}

export function buildEngineReadiness(report: EngineHealthReport): EngineReadiness {
  const stopped = report.status === 'idle' && report.idle_reason === 'stopped';
  const ready = report.status === 'ok' || (report.status === 'idle' && !stopped);
  let reason: string | null = null;
  if (stopped) {
    reason = 'engine-stopped';
  } else if (!ready) {
    reason = `health-${report.status}`;
  }
  return { ready, status: report.status, idleReason: report.idle_reason, reason };
}

async function fetchHealth(url: string, timeoutMs: number): Promise<{ httpStatus: number; report: EngineHealthReport }> {
  const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  const body: unknown = await response.json();
  if (!isHealthReport(body)) {
    throw new Error(`Unexpected health response (HTTP ${response.status})`);
  }
  return { httpStatus: response.status, report: body };
}

export async function runHealthcheck(argv: string[], streams: IoStreams = {
  stdout: process.stdout,
  stderr: process.stderr
}): Promise<number> {
  const args = parseArgs(argv);
  if (args.help) {
    if (args.errors.length > 0) {
      args.errors.forEach(error => {
        streams.stderr.write(`${error}\n`);
      });
      return 1;
    }
    printUsage(streams.stdout);
    return 0;
  }

  if (args.errors.length > 0) {
    args.errors.forEach(error => {
      streams.stderr.write(`${error}\n`);
    });
    printUsage(streams.stdout);
    return 1;
  }

  let url: string;
  try {
    url = healthUrl(loadConfigFromFile(args.configPath ?? DEFAULT_CONFIG_PATH).http);
  } catch (error) {
    streams.stderr.write(`Failed to load configuration: ${errorMessage(error)}\n`);
    return 1;
  }

  let result: { httpStatus: number; report: EngineHealthReport };
  try {
    result = await fetchHealth(url, args.timeoutMs);
  } catch (error) {
    streams.stderr.write(`Engine unreachable at ${url}: ${errorMessage(error)}\n`);
    return 1;
  }

  const write = (payload: unknown) => {
    const output = args.pretty ? JSON.stringify(payload, null, 2) : JSON.stringify(payload);
    streams.stdout.write(`${output}\n`);
  };

  if (args.mode === 'ready') {
    const readiness = buildEngineReadiness(result.report);
    write(readiness);
    return readiness.ready ? 0 : 1;
  }

  write(result.report);
  return result.httpStatus === 200 && result.report.status !== 'degraded' ? 0 : 1;
}

const scriptName = path.basename(process.argv[1] ?? '');

if (scriptName === 'healthcheck.ts' || scriptName === 'healthcheck.js') {
  runHealthcheck(process.argv.slice(2)).then(code => {
    process.exitCode = code;
  }).catch(error => {
    process.stderr.write(`Healthcheck failed: ${errorMessage(error)}\n`);
    process.exitCode = 1;
  });
}
