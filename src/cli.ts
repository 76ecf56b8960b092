import process from 'node:process';
import path from 'node:path';
import { performance } from 'node:perf_hooks';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, getLogLevel, setLogLevel } from './logger.js';
import metrics, { type MetricsSnapshot } from './metrics/index.js';
import {
  collectHealthChecks,
  registerShutdownHook,
  runShutdownHooks,
  type HealthStatus
} from './app.js';
import configManager, { loadConfigFromFile, type EngineConfig } from './config/index.js';
import { ConfigError, errorMessage } from './errors.js';
import { SolarCalculator } from './astro/solar.js';
import { ScheduleWindowResolver, containsInstant } from './schedule/windows.js';
import { closeDatabase } from './db.js';
import { runRetentionOnce } from './tasks/retention.js';
import type { ScheduleWindow } from './types.js';
import type { EngineHealthReport } from './server/routes/engine.js';
import { formatLocalClock, parseDateKey } from './utils/time.js';
import packageJson from '../package.json' with { type: 'json' };

type ServiceStatus = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

type EngineRuntime = {
  stop: () => void | Promise<void>;
  health: () => EngineHealthReport;
};

type ShutdownHookSummary = {
  name: string;
  status: 'ok' | 'error';
  error?: string;
};

type HealthPayload = {
  status: HealthStatus;
  state: ServiceStatus;
  uptimeSeconds: number;
  startedAt: string | null;
  timestamp: string;
  checks: Array<{
    name: string;
    status: HealthStatus;
    details?: Record<string, unknown>;
  }>;
  engine: EngineHealthReport | null;
  metrics: MetricsSnapshot;
  metricsCapturedAt: string;
  metricsSummary: {
    captures: { total: number; succeeded: number; failed: number; degraded: number };
    bursts: { total: number; partial: number; failed: number };
    lastCaptureAt: string | null;
  };
  application: {
    name: string;
    version: string;
    shutdown: {
      lastAt: string | null;
      lastReason: string | null;
      lastSignal: NodeJS.Signals | null;
      lastError: string | null;
      hooks: ShutdownHookSummary[];
    };
  };
};

type ReadinessPayload = {
  ready: boolean;
  status: HealthStatus;
  state: ServiceStatus;
  timestamp: string;
  startedAt: string | null;
  reason: string | null;
  idleReason: string | null;
  metrics: {
    captures: number;
    failedCaptures: number;
    snapshotCapturedAt: string;
  };
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

const HEALTH_EXIT_CODES: Record<HealthStatus, number> = {
  ok: 0,
  idle: 0,
  degraded: 1,
  starting: 2,
  stopping: 3
};

const USAGE_LINES = [
  'Alpenglow CLI',
  '',
  'Usage:',
  '  alpenglow start        Start the capture engine',
  '  alpenglow stop         Stop the running engine',
  '  alpenglow status [--json]  Print service status summary',
  '  alpenglow health       Print health JSON',
  '  alpenglow ready        Print readiness JSON',
  '  alpenglow windows [--date YYYY-MM-DD] [--config path] [--json]  Print capture windows',
  '  alpenglow validate [--config path]  Validate a configuration file',
  '  alpenglow log-level    Get or set the active log level',
  '  alpenglow retention run [--config path]  Prune capture history once'
];

const LOG_LEVEL_USAGE = [
  'Alpenglow log level commands',
  '',
  'Usage:',
  '  alpenglow log-level            Show the current log level',
  '  alpenglow log-level get        Show the current log level',
  '  alpenglow log-level set <level>  Change the active log level',
  '  alpenglow log-level <level>      Shortcut for set',
  '',
  `Available levels: ${getAvailableLogLevels().join(', ')}`
].join('\n');

const RETENTION_USAGE = [
  'Alpenglow retention commands',
  '',
  'Usage:',
  '  alpenglow retention run [--config path]  Delete captures older than history.retentionDays'
].join('\n');

const state: {
  status: ServiceStatus;
  startedAt: number | null;
  runtime: EngineRuntime | null;
  stopResolver: (() => void) | null;
  shuttingDown: boolean;
  shutdownPromise: Promise<void> | null;
  lastShutdownError: Error | null;
  lastShutdownHooks: ShutdownHookSummary[];
  lastShutdownAt: number | null;
  lastShutdownReason: string | null;
  lastShutdownSignal: NodeJS.Signals | null;
} = {
  status: 'idle',
  startedAt: null,
  runtime: null,
  stopResolver: null,
  shuttingDown: false,
  shutdownPromise: null,
  lastShutdownError: null,
  lastShutdownHooks: [],
  lastShutdownAt: null,
  lastShutdownReason: null,
  lastShutdownSignal: null
};

function resetServiceState() {
  state.status = 'idle';
  state.startedAt = null;
  state.runtime = null;
  state.stopResolver = null;
  state.shuttingDown = false;
  state.shutdownPromise = null;
  state.lastShutdownError = null;
  state.lastShutdownHooks = [];
  state.lastShutdownAt = null;
  state.lastShutdownReason = null;
  state.lastShutdownSignal = null;
}

export function getServiceState() {
  return { status: state.status, startedAt: state.startedAt };
}

function resolveOverallStatus(checks: HealthPayload['checks']): HealthStatus {
  if (state.status === 'starting') {
    return 'starting';
  }
  if (state.status === 'stopping') {
    return 'stopping';
  }
  if (checks.some(check => check.status === 'degraded')) {
    return 'degraded';
  }
  if (state.status !== 'running' || checks.some(check => check.status === 'idle')) {
    return 'idle';
  }
  return 'ok';
}

export async function buildHealthPayload(): Promise<HealthPayload> {
  const snapshot = metrics.snapshot();
  const errorCount = snapshot.logs.byLevel.error ?? 0;
  const fatalCount = snapshot.logs.byLevel.fatal ?? 0;
  const now = Date.now();
  const uptimeSeconds = state.startedAt ? Math.max(0, (now - state.startedAt) / 1000) : 0;

  const checks = await collectHealthChecks({
    service: { status: state.status, startedAt: state.startedAt },
    metrics: snapshot
  });

  const shutdownSummary = {
    lastAt: state.lastShutdownAt ? new Date(state.lastShutdownAt).toISOString() : null,
    lastReason: state.lastShutdownReason,
    lastSignal: state.lastShutdownSignal,
    lastError: state.lastShutdownError ? state.lastShutdownError.message : null,
    hooks: state.lastShutdownHooks.map(hook => ({ ...hook }))
  };

  const allChecks: HealthPayload['checks'] = [
    {
      name: 'logger',
      status: errorCount > 0 || fatalCount > 0 ? 'degraded' : 'ok',
      details: { levels: snapshot.logs.byLevel }
    },
    ...checks
  ];

  return {
    status: resolveOverallStatus(allChecks),
    state: state.status,
    uptimeSeconds,
    startedAt: state.startedAt ? new Date(state.startedAt).toISOString() : null,
    timestamp: new Date(now).toISOString(),
    checks: allChecks,
    engine: state.runtime ? state.runtime.health() : null,
    metrics: snapshot,
    metricsCapturedAt: snapshot.createdAt,
    metricsSummary: {
      captures: {
        total: snapshot.captures.total,
        succeeded: snapshot.captures.succeeded,
        failed: snapshot.captures.failed,
        degraded: snapshot.captures.degraded
      },
      bursts: {
        total: snapshot.bursts.total,
        partial: snapshot.bursts.partial,
        failed: snapshot.bursts.failed
      },
      lastCaptureAt: snapshot.captures.lastCaptureAt
    },
    application: {
      name: packageJson.name ?? 'alpenglow',
      version: packageJson.version ?? '0.0.0',
      shutdown: shutdownSummary
    }
  };
}

export async function runCli(argv = process.argv.slice(2), io: CliIo = DEFAULT_IO): Promise<number> {
  if (argv.includes('--health')) {
    return outputHealth(io);
  }

  if (argv.includes('--ready')) {
    return outputReadiness(io);
  }

  const command = argv[0] ?? 'start';

  switch (command) {
    case 'start': {
      return startDaemon(io);
    }
    case 'stop': {
      return stopDaemon(io);
    }
    case 'status': {
      const json = argv.includes('--json') || argv.includes('-j');
      return printStatus(io, { json });
    }
    case 'health': {
      return outputHealth(io);
    }
    case 'ready': {
      return outputReadiness(io);
    }
    case 'windows': {
      return runWindowsCommand(argv.slice(1), io);
    }
    case 'validate': {
      return runValidateCommand(argv.slice(1), io);
    }
    case 'log-level': {
      return runLogLevelCommand(argv.slice(1), io);
    }
    case 'retention': {
      return runRetentionCommand(argv.slice(1), io);
    }
    case 'help':
    case '--help':
    case '-h': {
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    }
    default: {
      io.stderr.write(`Unknown command: ${command}\n`);
      return 1;
    }
  }
}

type CommonArgs = {
  config?: string;
  date?: string;
  json: boolean;
  errors: string[];
};

function parseCommonArgs(args: string[], allowed: ReadonlySet<string>): CommonArgs {
  const parsed: CommonArgs = { json: false, errors: [] };
  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (arg === '--json' || arg === '-j') {
      parsed.json = true;
      continue;
    }
    const separator = arg.indexOf('=');
    const flag = separator >= 0 ? arg.slice(0, separator) : arg;
    const inline = separator >= 0 ? arg.slice(separator + 1) : undefined;
    if ((flag === '--config' || flag === '-c') && allowed.has('config')) {
      const value = inline ?? args[++index];
      if (!value) {
        parsed.errors.push('Missing value for --config');
      } else {
        parsed.config = value;
      }
      continue;
    }
    if ((flag === '--date' || flag === '-d') && allowed.has('date')) {
      const value = inline ?? args[++index];
      if (!value) {
        parsed.errors.push('Missing value for --date');
      } else {
        parsed.date = value;
      }
      continue;
    }
    parsed.errors.push(`Unknown option: ${arg}`);
  }
  return parsed;
}

function loadCliConfig(configPath: string | undefined): EngineConfig {
  return configPath ? loadConfigFromFile(configPath) : configManager.getConfig();
}

function writeConfigFailure(error: unknown, io: CliIo) {
  if (error instanceof ConfigError) {
    io.stderr.write('Configuration invalid:\n');
    for (const issue of error.issues) {
      io.stderr.write(`  - ${issue}\n`);
    }
    return;
  }
  io.stderr.write(`${errorMessage(error)}\n`);
}

async function runValidateCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseCommonArgs(args, new Set(['config']));
  if (parsed.errors.length > 0) {
    io.stderr.write(`${parsed.errors.join('\n')}\n`);
    return 1;
  }

  const target = path.resolve(parsed.config ?? configManager.getPath());
  try {
    const config = loadConfigFromFile(target);
    io.stdout.write(
      `Configuration valid: ${target} (${config.schedules.length} schedules, ${config.profiles.length} profiles)\n`
    );
    return 0;
  } catch (error) {
    writeConfigFailure(error, io);
    return 1;
  }
}

type WindowLine = {
  name: string;
  date: string;
  start: string;
  end: string;
  localStart: string;
  localEnd: string;
  intervalSeconds: number;
  profiles: string[];
  active: boolean;
};

async function runWindowsCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseCommonArgs(args, new Set(['config', 'date']));
  if (parsed.errors.length > 0) {
    io.stderr.write(`${parsed.errors.join('\n')}\n`);
    return 1;
  }

  let config: EngineConfig;
  try {
    config = loadCliConfig(parsed.config);
  } catch (error) {
    writeConfigFailure(error, io);
    return 1;
  }

  const solar = new SolarCalculator(config.location);
  const resolver = new ScheduleWindowResolver(solar);
  const now = new Date();
  let windows: ScheduleWindow[];
  if (parsed.date) {
    try {
      parseDateKey(parsed.date);
    } catch (error) {
      io.stderr.write(`${errorMessage(error)}\n`);
      return 1;
    }
    const dateKey = parsed.date;
    windows = config.schedules
      .filter(definition => definition.enabled)
      .map(definition => resolver.windowFor(definition, dateKey))
      .filter((window): window is ScheduleWindow => window !== null);
  } else {
    windows = resolver.resolveWindows(config.schedules, now);
  }

  const lines: WindowLine[] = windows.map(window => ({
    name: window.name,
    date: window.date,
    start: window.start.toISOString(),
    end: window.end.toISOString(),
    localStart: formatLocalClock(window.start, solar.timezone),
    localEnd: formatLocalClock(window.end, solar.timezone),
    intervalSeconds: window.intervalMs / 1000,
    profiles: [...window.profiles],
    active: containsInstant(window, now)
  }));

  if (parsed.json) {
    io.stdout.write(`${JSON.stringify({ timezone: solar.timezone, windows: lines })}\n`);
    return 0;
  }

  if (lines.length === 0) {
    io.stdout.write('No capture windows\n');
    return 0;
  }

  for (const line of lines) {
    const marker = line.active ? ' (active)' : '';
    io.stdout.write(
      `${line.name} ${line.date} ${line.localStart}-${line.localEnd} every ${line.intervalSeconds}s [${line.profiles.join(', ')}]${marker}\n`
    );
  }
  return 0;
}

async function runRetentionCommand(args: string[], io: CliIo): Promise<number> {
  const [first, ...rest] = args;
  if (!first || first === 'help' || first === '--help' || first === '-h') {
    io.stdout.write(`${RETENTION_USAGE}\n`);
    return 0;
  }
  if (first !== 'run') {
    io.stderr.write(`Unknown retention subcommand: ${first}\n`);
    io.stderr.write(`${RETENTION_USAGE}\n`);
    return 1;
  }

  const parsed = parseCommonArgs(rest, new Set(['config']));
  if (parsed.errors.length > 0) {
    io.stderr.write(`${parsed.errors.join('\n')}\n`);
    return 1;
  }

  let config: EngineConfig;
  try {
    config = loadCliConfig(parsed.config);
  } catch (error) {
    writeConfigFailure(error, io);
    return 1;
  }

  if (config.history.enabled === false) {
    io.stdout.write('Capture history is disabled\n');
    return 0;
  }

  try {
    const result = runRetentionOnce({
      retentionDays: config.history.retentionDays,
      intervalMs: (config.history.intervalMinutes ?? 60) * 60_000,
      vacuum: config.history.vacuum === true
    });
    io.stdout.write(
      `Retention removed ${result.removedCaptures} captures (${result.remainingCaptures} remaining)\n`
    );
    return 0;
  } catch (error) {
    logger.error({ err: error }, 'Retention run failed');
    io.stderr.write(`Retention run failed: ${errorMessage(error)}\n`);
    return 1;
  }
}

type ShutdownHookExecution = {
  summaries: ShutdownHookSummary[];
  summary: { ok: number; failed: number };
  error: Error | null;
};

async function executeShutdownHooks(context: {
  reason: string;
  signal?: NodeJS.Signals;
}): Promise<ShutdownHookExecution> {
  const results = await runShutdownHooks(context);
  const summaries: ShutdownHookSummary[] = [];
  let ok = 0;
  let failed = 0;
  let firstError: Error | null = null;

  for (const result of results) {
    if (result.status === 'error') {
      const error = result.error ?? new Error('shutdown hook failed');
      if (!firstError) {
        firstError = error;
      }
      failed += 1;
      summaries.push({ name: result.name, status: 'error', error: error.message });
      logger.error({ err: error, hook: result.name }, 'Shutdown hook failed');
    } else {
      ok += 1;
      summaries.push({ name: result.name, status: 'ok' });
      logger.debug({ hook: result.name }, 'Shutdown hook executed');
    }
  }

  const summary = { ok, failed };
  logger.info({ hooks: summaries, summary }, 'Shutdown hooks completed');

  return { summaries, summary, error: firstError };
}

async function runLogLevelCommand(args: string[], io: CliIo): Promise<number> {
  const [first, second] = args;
  const available = getAvailableLogLevels();

  if (!first || first === 'get') {
    io.stdout.write(`${getLogLevel()}\n`);
    return 0;
  }

  if (first === 'help' || first === '--help' || first === '-h') {
    io.stdout.write(`${LOG_LEVEL_USAGE}\n`);
    return 0;
  }

  if (first === 'set') {
    if (!second) {
      io.stderr.write('Missing value for log level\n');
      io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
      return 1;
    }
    return applyLogLevel(second, io);
  }

  if (first.startsWith('-')) {
    io.stderr.write(`Unknown option: ${first}\n`);
    io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
    return 1;
  }

  if (!available.includes(first.toLowerCase())) {
    io.stderr.write(`Unknown log level "${first}" (available: ${available.join(', ')})\n`);
    return 1;
  }

  return applyLogLevel(first, io);
}

function applyLogLevel(level: string, io: CliIo): number {
  try {
    const normalized = setLogLevel(level);
    io.stdout.write(`Log level set to ${normalized}\n`);
    return 0;
  } catch (error) {
    io.stderr.write(`${errorMessage(error)}\n`);
    return 1;
  }
}

async function startDaemon(io: CliIo): Promise<number> {
  if (state.status === 'running') {
    io.stdout.write('Capture engine is already running\n');
    return 0;
  }

  const module = await import('./run-engine.js');
  const startEngine: () => Promise<EngineRuntime> = () => module.startEngine();

  state.status = 'starting';
  state.shuttingDown = false;

  let runtime: EngineRuntime;
  try {
    runtime = await metrics.time('engine.startup.ms', () => startEngine());
  } catch (error) {
    state.status = 'stopped';
    state.runtime = null;
    logger.error({ err: error }, 'Capture engine failed to start');
    io.stderr.write('Capture engine failed to start. Check logs for details.\n');
    return 1;
  }

  if (state.status !== 'starting') {
    try {
      await Promise.resolve(runtime.stop());
    } catch (error) {
      logger.warn({ err: error }, 'Engine stop failed after aborted start');
    }
    const abortedMessage = state.lastShutdownError
      ? 'Capture engine start aborted due to shutdown error\n'
      : 'Capture engine start aborted by shutdown request\n';
    io.stderr.write(abortedMessage);
    return state.lastShutdownError ? 1 : 0;
  }

  registerShutdownHook('capture-store', () => {
    closeDatabase();
  });

  state.runtime = runtime;
  state.status = 'running';
  state.startedAt = Date.now();
  logger.info({ startedAt: state.startedAt }, 'Capture engine daemon started');
  io.stdout.write('Capture engine started\n');

  await new Promise<void>(resolve => {
    state.stopResolver = resolve;
    registerSignalHandlers();
  });

  return 0;
}

async function stopDaemon(io: CliIo): Promise<number> {
  if ((state.status === 'idle' || state.status === 'stopped') && !state.runtime) {
    state.lastShutdownAt = null;
    state.lastShutdownError = null;
    state.lastShutdownHooks = [];
    state.lastShutdownReason = null;
    state.lastShutdownSignal = null;
    io.stdout.write('Capture engine is not running\n');
    return 0;
  }

  const error = await performShutdown('cli-stop');
  if (error) {
    io.stderr.write('Capture engine encountered an error while stopping. Check logs for details.\n');
    return 1;
  }

  const payload = await buildHealthPayload();
  if (state.lastShutdownHooks.length > 0) {
    const failures = state.lastShutdownHooks.filter(hook => hook.status === 'error');
    const successes = state.lastShutdownHooks.length - failures.length;
    io.stdout.write(`Shutdown hooks executed: ${successes} ok, ${failures.length} failed\n`);
    for (const hook of failures) {
      io.stderr.write(`Hook ${hook.name} failed: ${hook.error ?? 'unknown error'}\n`);
    }
  }
  io.stdout.write(`Capture engine stopped (status: ${payload.status})\n`);
  return resolveHealthExitCode(payload.status);
}

async function printStatus(io: CliIo, options: { json?: boolean } = {}): Promise<number> {
  const payload = await buildHealthPayload();
  if (options.json) {
    io.stdout.write(`${JSON.stringify(payload)}\n`);
    return resolveHealthExitCode(payload.status);
  }
  const summary = [`Alpenglow status: ${payload.state}`, `Health: ${payload.status}`];

  if (payload.engine?.idle_reason) {
    summary.push(`Idle reason: ${payload.engine.idle_reason}`);
  }

  const { captures } = payload.metricsSummary;
  if (captures.total > 0) {
    summary.push(`Captures - succeeded: ${captures.succeeded}, failed: ${captures.failed}`);
  }

  const lastError = payload.metrics.logs.lastErrorMessage;
  if (lastError) {
    summary.push(`Last error: ${lastError}`);
  }

  io.stdout.write(summary.join('\n') + '\n');
  return resolveHealthExitCode(payload.status);
}

function registerSignalHandlers() {
  const handleSignal = (signal: NodeJS.Signals) => {
    performShutdown('signal', signal).catch(error => {
      logger.error({ err: error, signal }, 'Signal shutdown failed');
    });
  };

  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT', 'SIGQUIT'];
  for (const signal of signals) {
    process.once(signal, handleSignal);
  }
}

function resolveHealthExitCode(status: HealthStatus) {
  return HEALTH_EXIT_CODES[status] ?? 1;
}

export { resolveHealthExitCode };

async function performShutdown(reason: string, signal?: NodeJS.Signals): Promise<Error | null> {
  if (state.status === 'idle' || state.status === 'stopped') {
    return null;
  }

  if (state.shuttingDown && state.shutdownPromise) {
    await state.shutdownPromise;
    return state.lastShutdownError;
  }

  state.shuttingDown = true;
  state.status = 'stopping';
  state.lastShutdownError = null;
  state.lastShutdownHooks = [];
  state.lastShutdownReason = reason;
  state.lastShutdownSignal = signal ?? null;
  state.lastShutdownAt = Date.now();
  logger.info({ reason, signal }, 'Capture engine shutting down');

  const shutdownTask = (async () => {
    const runtime = state.runtime;
    let shutdownDurationMs: number | null = null;
    try {
      const startedAt = performance.now();
      await metrics.time('engine.shutdown.ms', async () => {
        if (runtime) {
          await Promise.resolve(runtime.stop());
        }
      });
      shutdownDurationMs = performance.now() - startedAt;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      state.lastShutdownError = err;
      logger.error({ err }, 'Error during shutdown');
    } finally {
      try {
        const { summaries, error: hookError } = await executeShutdownHooks({ reason, signal });
        state.lastShutdownHooks = summaries;
        if (hookError && !state.lastShutdownError) {
          state.lastShutdownError = hookError;
        }
      } catch (hookError) {
        const err = hookError instanceof Error ? hookError : new Error(String(hookError));
        logger.error({ err }, 'Shutdown hooks threw unexpectedly');
        if (!state.lastShutdownError) {
          state.lastShutdownError = err;
        }
        state.lastShutdownHooks = [{ name: 'shutdown-hooks', status: 'error', error: err.message }];
      }

      state.runtime = null;
      state.status = 'stopped';
      state.startedAt = null;
      state.stopResolver?.();
      state.stopResolver = null;
      state.shuttingDown = false;
      state.shutdownPromise = null;
      if (shutdownDurationMs !== null) {
        logger.info({ reason, signal, shutdownDurationMs }, 'Capture engine stopped gracefully');
      }
    }
  })();

  state.shutdownPromise = shutdownTask;
  await shutdownTask;
  return state.lastShutdownError;
}

async function outputHealth(io: CliIo): Promise<number> {
  const payload = await buildHealthPayload();
  io.stdout.write(`${JSON.stringify(payload)}\n`);
  return resolveHealthExitCode(payload.status);
}

function buildReadinessPayload(health: HealthPayload): ReadinessPayload {
  const ready = (health.status === 'ok' || health.status === 'idle') && health.state === 'running';
  let reason: string | null = null;

  if (!ready) {
    if (health.state !== 'running') {
      reason = `service-${health.state}`;
    } else {
      reason = `health-${health.status}`;
    }
  }

  return {
    ready,
    status: health.status,
    state: health.state,
    timestamp: health.timestamp,
    startedAt: health.startedAt,
    reason,
    idleReason: health.engine?.idle_reason ?? null,
    metrics: {
      captures: health.metricsSummary.captures.total,
      failedCaptures: health.metricsSummary.captures.failed,
      snapshotCapturedAt: health.metricsCapturedAt
    }
  } satisfies ReadinessPayload;
}

async function outputReadiness(io: CliIo): Promise<number> {
  const health = await buildHealthPayload();
  const readiness = buildReadinessPayload(health);
  io.stdout.write(`${JSON.stringify(readiness)}\n`);
  return readiness.ready ? 0 : 1;
}

export { buildReadinessPayload };

export const __test__ = {
  getState: () => ({ ...state }),
  setRuntime(
    runtime: EngineRuntime | null,
    options: { status?: ServiceStatus; startedAt?: number | null } = {}
  ) {
    resetServiceState();
    if (runtime) {
      state.runtime = runtime;
      state.status = options.status ?? 'running';
      state.startedAt = typeof options.startedAt === 'number' ? options.startedAt : Date.now();
    }
  },
  reset: resetServiceState,
  performShutdown
};

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'Alpenglow CLI failed');
      process.exit(1);
    }
  );
}
