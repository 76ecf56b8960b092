import { performance } from 'node:perf_hooks';
import type { CaptureOutcome, CaptureTier } from '../types.js';

type CounterMap = Record<string, number>;

type HistogramConfig = {
  buckets: number[];
  format: (bucket: number, previous?: number) => string;
};

type HistogramSnapshot = Record<string, number>;

type LatencySnapshot = {
  count: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
};

type CaptureMetricsSnapshot = {
  total: number;
  succeeded: number;
  failed: number;
  degraded: number;
  byProfile: Record<string, { succeeded: number; failed: number }>;
  bySchedule: Record<string, { succeeded: number; failed: number }>;
  lastCaptureAt: string | null;
  lastFailure: { profile: string; schedule: string; error: string | null; at: string } | null;
};

type BurstMetricsSnapshot = {
  total: number;
  succeeded: number;
  partial: number;
  failed: number;
  deadlineExceeded: number;
};

type SettingsMetricsSnapshot = {
  byTier: CounterMap;
  fallbacks: CounterMap;
  degraded: number;
};

type LightMetricsSnapshot = {
  samples: number;
  errors: number;
  lastLux: number | null;
  lastSampleAt: string | null;
};

type DeviceMetricsSnapshot = {
  healthy: boolean;
  consecutiveFailures: number;
  transitions: CounterMap;
};

type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: CounterMap;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
    currentLevel: string;
  };
  counters: CounterMap;
  latencies: Record<string, LatencySnapshot>;
  histograms: Record<string, HistogramSnapshot>;
  captures: CaptureMetricsSnapshot;
  bursts: BurstMetricsSnapshot;
  settings: SettingsMetricsSnapshot;
  light: LightMetricsSnapshot;
  device: DeviceMetricsSnapshot;
  scheduler: {
    ticks: number;
    skipped: CounterMap;
  };
};

type PrometheusHistogramOptions = {
  metricName?: string;
  help?: string;
  labels?: Record<string, string>;
};

type PrometheusLogLevelOptions = {
  metricName?: string;
  help?: string;
  labels?: Record<string, string>;
};

type BurstResultKind = 'success' | 'partial' | 'failed';

const METRIC_PREFIX = 'alpenglow';

const DEFAULT_HISTOGRAM: HistogramConfig = {
  buckets: [25, 50, 100, 250, 500, 1000, 2000, 5000, 10000],
  format: (bucket, previous) => {
    if (typeof previous === 'undefined') {
      return `<${bucket}`;
    }
    return previous === bucket ? `${bucket}` : `${previous}-${bucket}`;
  }
};

const PINO_LEVEL_ORDER = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

class MetricsRegistry {
  private readonly logLevelCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private readonly counters = new Map<string, number>();
  private readonly latencyStats = new Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>();
  private readonly histograms = new Map<string, Map<string, number>>();
  private readonly histogramStats = new Map<string, { sum: number; count: number }>();
  private readonly histogramConfigs = new Map<string, HistogramConfig>();
  private readonly capturesByProfile = new Map<string, { succeeded: number; failed: number }>();
  private readonly capturesBySchedule = new Map<string, { succeeded: number; failed: number }>();
  private captureTotals = { total: 0, succeeded: 0, failed: 0, degraded: 0 };
  private lastCaptureAt: number | null = null;
  private lastCaptureFailure: { profile: string; schedule: string; error: string | null; at: number } | null =
    null;
  private burstTotals: BurstMetricsSnapshot = {
    total: 0,
    succeeded: 0,
    partial: 0,
    failed: 0,
    deadlineExceeded: 0
  };
  private readonly tierCounters = new Map<string, number>();
  private readonly tierFallbacks = new Map<string, number>();
  private degradedSettings = 0;
  private lightSamples = 0;
  private lightErrors = 0;
  private lastLux: number | null = null;
  private lastLightSampleAt: number | null = null;
  private deviceHealthy = true;
  private deviceConsecutiveFailures = 0;
  private readonly deviceTransitions = new Map<string, number>();
  private schedulerTicks = 0;
  private readonly schedulerSkips = new Map<string, number>();
  private readonly resetListeners = new Set<() => void>();

  reset() {
    this.logLevelCounters.clear();
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.counters.clear();
    this.latencyStats.clear();
    this.histograms.clear();
    this.histogramStats.clear();
    this.histogramConfigs.clear();
    this.capturesByProfile.clear();
    this.capturesBySchedule.clear();
    this.captureTotals = { total: 0, succeeded: 0, failed: 0, degraded: 0 };
    this.lastCaptureAt = null;
    this.lastCaptureFailure = null;
    this.burstTotals = { total: 0, succeeded: 0, partial: 0, failed: 0, deadlineExceeded: 0 };
    this.tierCounters.clear();
    this.tierFallbacks.clear();
    this.degradedSettings = 0;
    this.lightSamples = 0;
    this.lightErrors = 0;
    this.lastLux = null;
    this.lastLightSampleAt = null;
    this.deviceHealthy = true;
    this.deviceConsecutiveFailures = 0;
    this.deviceTransitions.clear();
    this.schedulerTicks = 0;
    this.schedulerSkips.clear();
    for (const listener of this.resetListeners) {
      listener();
    }
  }

  onReset(listener: () => void) {
    this.resetListeners.add(listener);
    return () => {
      this.resetListeners.delete(listener);
    };
  }

  increment(counter: string, amount = 1) {
    this.counters.set(counter, (this.counters.get(counter) ?? 0) + amount);
  }

  incrementLogLevel(level: string, context?: { message?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string) {
    this.currentLogLevel = level.toLowerCase();
  }

  recordCaptureOutcome(outcome: CaptureOutcome) {
    this.captureTotals.total += 1;
    if (outcome.success) {
      this.captureTotals.succeeded += 1;
    } else {
      this.captureTotals.failed += 1;
      this.lastCaptureFailure = {
        profile: outcome.profileId,
        schedule: outcome.scheduleName,
        error: outcome.error,
        at: outcome.timestamp
      };
    }
    if (outcome.degraded) {
      this.captureTotals.degraded += 1;
    }
    this.lastCaptureAt = outcome.timestamp;

    bumpOutcome(this.capturesByProfile, outcome.profileId, outcome.success);
    bumpOutcome(this.capturesBySchedule, outcome.scheduleName, outcome.success);

    this.observeLatency('capture.request', outcome.latencyMs);
    this.observeHistogram('capture.request', outcome.latencyMs);
  }

  recordBurst(result: BurstResultKind, durationMs: number, options: { deadlineExceeded?: boolean } = {}) {
    this.burstTotals.total += 1;
    if (result === 'success') {
      this.burstTotals.succeeded += 1;
    } else if (result === 'partial') {
      this.burstTotals.partial += 1;
    } else {
      this.burstTotals.failed += 1;
    }
    if (options.deadlineExceeded) {
      this.burstTotals.deadlineExceeded += 1;
    }
    this.observeLatency('burst.duration', durationMs);
    this.observeHistogram('burst.duration', durationMs);
  }

  recordSettingsTier(tier: CaptureTier, durationMs: number) {
    this.tierCounters.set(tier, (this.tierCounters.get(tier) ?? 0) + 1);
    this.observeLatency(`settings.${tier}`, durationMs);
  }

  recordSettingsFallback(from: CaptureTier, to: CaptureTier | 'degraded') {
    const key = `${from}->${to}`;
    this.tierFallbacks.set(key, (this.tierFallbacks.get(key) ?? 0) + 1);
    if (to === 'degraded') {
      this.degradedSettings += 1;
    }
  }

  recordLightSample(lux: number, at: number) {
    this.lightSamples += 1;
    this.lastLux = lux;
    this.lastLightSampleAt = at;
  }

  recordLightSampleError() {
    this.lightErrors += 1;
  }

  recordDeviceHealth(healthy: boolean, consecutiveFailures: number) {
    if (healthy !== this.deviceHealthy) {
      const key = healthy ? 'recovered' : 'unhealthy';
      this.deviceTransitions.set(key, (this.deviceTransitions.get(key) ?? 0) + 1);
    }
    this.deviceHealthy = healthy;
    this.deviceConsecutiveFailures = consecutiveFailures;
  }

  recordSchedulerTick(skipReason?: string) {
    this.schedulerTicks += 1;
    if (skipReason) {
      this.schedulerSkips.set(skipReason, (this.schedulerSkips.get(skipReason) ?? 0) + 1);
    }
  }

  observeLatency(metric: string, durationMs: number) {
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  observeHistogram(metric: string, value: number, config: HistogramConfig = DEFAULT_HISTOGRAM) {
    const histogramConfig = this.histogramConfigs.get(metric) ?? config;
    let histogram = this.histograms.get(metric);
    if (!histogram) {
      histogram = new Map<string, number>();
      this.histograms.set(metric, histogram);
      this.histogramConfigs.set(metric, histogramConfig);
    }

    if (Number.isFinite(value)) {
      const stats = this.histogramStats.get(metric);
      if (stats) {
        stats.sum += value;
        stats.count += 1;
      } else {
        this.histogramStats.set(metric, { sum: value, count: 1 });
      }
    }

    const bucketLabel = resolveHistogramBucket(value, histogramConfig);
    histogram.set(bucketLabel, (histogram.get(bucketLabel) ?? 0) + 1);
  }

  async time<T>(metric: string, fn: () => Promise<T> | T): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.observeLatency(metric, performance.now() - start);
    }
  }

  exportLogLevelMetrics() {
    return {
      byLevel: mapLogLevelCounters(this.logLevelCounters),
      lastErrorAt: this.lastErrorAt ? new Date(this.lastErrorAt).toISOString() : null,
      lastErrorMessage: this.lastErrorMessage,
      currentLevel: this.currentLogLevel
    };
  }

  exportLogLevelCountersForPrometheus(options: PrometheusLogLevelOptions = {}) {
    const metricName = sanitizePrometheusMetricName(options.metricName ?? `${METRIC_PREFIX}_log_level_total`);
    const lines: string[] = [];
    if (options.help) {
      lines.push(`# HELP ${metricName} ${escapePrometheusHelp(options.help)}`);
    }
    lines.push(`# TYPE ${metricName} counter`);
    const baseLabels = options.labels ?? {};
    for (const [level, value] of Object.entries(mapLogLevelCounters(this.logLevelCounters))) {
      lines.push(`${metricName}${formatPrometheusLabels({ ...baseLabels, level })} ${formatPrometheusValue(value)}`);
    }
    return lines.join('\n');
  }

  exportHistogramForPrometheus(metric: string, options: PrometheusHistogramOptions = {}): string {
    const histogram = this.histograms.get(metric);
    if (!histogram) {
      return '';
    }
    const histogramConfig = this.histogramConfigs.get(metric) ?? DEFAULT_HISTOGRAM;
    const stats = this.histogramStats.get(metric);
    return formatPrometheusHistogram(metric, histogram, histogramConfig, stats, options);
  }

  exportPrometheus(): string {
    const sections: string[] = [];

    sections.push(
      formatPrometheusCounter('captures_total', 'Capture requests by result', [
        { labels: { result: 'success' }, value: this.captureTotals.succeeded },
        { labels: { result: 'failure' }, value: this.captureTotals.failed }
      ])
    );

    const profileSamples = Array.from(this.capturesByProfile.entries()).flatMap(([profile, counts]) => [
      { labels: { profile, result: 'success' }, value: counts.succeeded },
      { labels: { profile, result: 'failure' }, value: counts.failed }
    ]);
    if (profileSamples.length > 0) {
      sections.push(formatPrometheusCounter('captures_by_profile_total', 'Capture requests by profile', profileSamples));
    }

    sections.push(
      formatPrometheusCounter('bursts_total', 'Bursts by result', [
        { labels: { result: 'success' }, value: this.burstTotals.succeeded },
        { labels: { result: 'partial' }, value: this.burstTotals.partial },
        { labels: { result: 'failed' }, value: this.burstTotals.failed }
      ])
    );

    const tierSamples = Array.from(this.tierCounters.entries()).map(([tier, value]) => ({
      labels: { tier },
      value
    }));
    if (tierSamples.length > 0) {
      sections.push(formatPrometheusCounter('settings_tier_total', 'Settings acquisitions by tier', tierSamples));
    }

    sections.push(
      formatPrometheusGauge('device_healthy', 'Capture device health (1 healthy, 0 unhealthy)', [
        { labels: {}, value: this.deviceHealthy ? 1 : 0 }
      ])
    );
    sections.push(
      formatPrometheusGauge('device_consecutive_failures', 'Consecutive failed bursts', [
        { labels: {}, value: this.deviceConsecutiveFailures }
      ])
    );

    if (this.lastLux !== null) {
      sections.push(
        formatPrometheusGauge('light_lux', 'Most recent ambient light estimate', [
          { labels: {}, value: this.lastLux }
        ])
      );
    }

    for (const metric of ['capture.request', 'burst.duration']) {
      const histogram = this.exportHistogramForPrometheus(metric, {
        metricName: `${METRIC_PREFIX}_${metric}_ms`
      });
      if (histogram) {
        sections.push(histogram);
      }
    }

    sections.push(this.exportLogLevelCountersForPrometheus({ help: 'Log lines by level' }));

    return `${sections.filter(section => section.length > 0).join('\n')}\n`;
  }

  snapshot(): MetricsSnapshot {
    return {
      createdAt: new Date().toISOString(),
      logs: this.exportLogLevelMetrics(),
      counters: mapFrom(this.counters),
      latencies: mapFromLatencies(this.latencyStats),
      histograms: Object.fromEntries(
        Array.from(this.histograms.entries()).map(([metric, histogram]) => [metric, mapFrom(histogram)])
      ),
      captures: {
        total: this.captureTotals.total,
        succeeded: this.captureTotals.succeeded,
        failed: this.captureTotals.failed,
        degraded: this.captureTotals.degraded,
        byProfile: mapFromOutcomes(this.capturesByProfile),
        bySchedule: mapFromOutcomes(this.capturesBySchedule),
        lastCaptureAt: this.lastCaptureAt ? new Date(this.lastCaptureAt).toISOString() : null,
        lastFailure: this.lastCaptureFailure
          ? {
              profile: this.lastCaptureFailure.profile,
              schedule: this.lastCaptureFailure.schedule,
              error: this.lastCaptureFailure.error,
              at: new Date(this.lastCaptureFailure.at).toISOString()
            }
          : null
      },
      bursts: { ...this.burstTotals },
      settings: {
        byTier: mapFrom(this.tierCounters),
        fallbacks: mapFrom(this.tierFallbacks),
        degraded: this.degradedSettings
      },
      light: {
        samples: this.lightSamples,
        errors: this.lightErrors,
        lastLux: this.lastLux,
        lastSampleAt: this.lastLightSampleAt ? new Date(this.lastLightSampleAt).toISOString() : null
      },
      device: {
        healthy: this.deviceHealthy,
        consecutiveFailures: this.deviceConsecutiveFailures,
        transitions: mapFrom(this.deviceTransitions)
      },
      scheduler: {
        ticks: this.schedulerTicks,
        skipped: mapFrom(this.schedulerSkips)
      }
    };
  }
}

function bumpOutcome(map: Map<string, { succeeded: number; failed: number }>, key: string, success: boolean) {
  const current = map.get(key) ?? { succeeded: 0, failed: 0 };
  if (success) {
    current.succeeded += 1;
  } else {
    current.failed += 1;
  }
  map.set(key, current);
}

function mapLogLevelCounters(source: Map<string, number>): CounterMap {
  const ordered: Array<[string, number]> = [];
  for (const level of PINO_LEVEL_ORDER) {
    const value = source.get(level);
    if (typeof value === 'number') {
      ordered.push([level, value]);
    }
  }
  for (const [level, value] of source) {
    if (!PINO_LEVEL_ORDER.some(known => known === level)) {
      ordered.push([level, value]);
    }
  }
  return Object.fromEntries(ordered);
}

function mapFrom(source: Map<string, number>): CounterMap {
  return Object.fromEntries(source);
}

function mapFromOutcomes(
  source: Map<string, { succeeded: number; failed: number }>
): Record<string, { succeeded: number; failed: number }> {
  return Object.fromEntries(
    Array.from(source.entries()).map(([key, value]) => [key, { succeeded: value.succeeded, failed: value.failed }])
  );
}

function mapFromLatencies(
  source: Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>
): Record<string, LatencySnapshot> {
  return Object.fromEntries(
    Array.from(source.entries()).map(([metric, stats]) => [
      metric,
      {
        count: stats.count,
        avgMs: stats.count > 0 ? stats.totalMs / stats.count : 0,
        minMs: Number.isFinite(stats.minMs) ? stats.minMs : 0,
        maxMs: stats.maxMs
      }
    ])
  );
}

function formatPrometheusHistogram(
  metricKey: string,
  histogram: Map<string, number>,
  config: HistogramConfig,
  stats: { sum: number; count: number } | undefined,
  options: PrometheusHistogramOptions
): string {
  const metricName = sanitizePrometheusMetricName(options.metricName ?? `${METRIC_PREFIX}_${metricKey}`);
  const lines: string[] = [];
  if (options.help) {
    lines.push(`# HELP ${metricName} ${escapePrometheusHelp(options.help)}`);
  }
  lines.push(`# TYPE ${metricName} histogram`);

  const baseLabels = options.labels ?? {};
  const baseLabelString = formatPrometheusLabels(baseLabels);

  let cumulative = 0;
  let previous: number | undefined;
  for (const bucket of config.buckets) {
    cumulative += histogram.get(config.format(bucket, previous)) ?? 0;
    lines.push(
      `${metricName}_bucket${formatPrometheusLabels({ ...baseLabels, le: formatPrometheusValue(bucket) })} ${formatPrometheusValue(cumulative)}`
    );
    previous = bucket;
  }

  const overflowCount = histogram.get(`${config.buckets[config.buckets.length - 1]}+`) ?? 0;
  const totalCount = Math.max(cumulative + overflowCount, stats?.count ?? 0);
  lines.push(`${metricName}_bucket${formatPrometheusLabels({ ...baseLabels, le: '+Inf' })} ${formatPrometheusValue(totalCount)}`);
  lines.push(`${metricName}_sum${baseLabelString} ${formatPrometheusValue(stats?.sum ?? 0)}`);
  lines.push(`${metricName}_count${baseLabelString} ${formatPrometheusValue(totalCount)}`);

  return lines.join('\n');
}

type PrometheusSample = { labels: Record<string, string>; value: number };

function formatPrometheusCounter(metricKey: string, help: string, samples: PrometheusSample[]): string {
  return formatPrometheusSeries(metricKey, 'counter', help, samples);
}

function formatPrometheusGauge(metricKey: string, help: string, samples: PrometheusSample[]): string {
  return formatPrometheusSeries(metricKey, 'gauge', help, samples);
}

function formatPrometheusSeries(
  metricKey: string,
  type: 'counter' | 'gauge',
  help: string,
  samples: PrometheusSample[]
): string {
  const metricName = sanitizePrometheusMetricName(`${METRIC_PREFIX}_${metricKey}`);
  const lines = [`# HELP ${metricName} ${escapePrometheusHelp(help)}`, `# TYPE ${metricName} ${type}`];
  for (const sample of samples) {
    lines.push(`${metricName}${formatPrometheusLabels(sample.labels)} ${formatPrometheusValue(sample.value)}`);
  }
  return lines.join('\n');
}

function sanitizePrometheusMetricName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    return `${METRIC_PREFIX}_metric`;
  }
  if (/^[0-9]/.test(lower)) {
    return `${METRIC_PREFIX}_${lower}`;
  }
  return lower;
}

function sanitizePrometheusLabelName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    return 'label';
  }
  if (/^[0-9]/.test(lower)) {
    return `_${lower}`;
  }
  return lower;
}

function escapePrometheusLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function escapePrometheusHelp(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, ' ');
}

function formatPrometheusLabels(labels: Record<string, string>): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return '';
  }
  const normalized = entries.map(([key, value]) => [sanitizePrometheusLabelName(key), value] as const);
  normalized.sort(([a], [b]) => a.localeCompare(b));
  const rendered = normalized.map(([key, value]) => `${key}="${escapePrometheusLabelValue(value)}"`);
  return `{${rendered.join(',')}}`;
}

function formatPrometheusValue(value: number): string {
  if (!Number.isFinite(value) || value === 0) {
    return '0';
  }
  if (Number.isInteger(value)) {
    return value.toString();
  }
  const fixed = value.toFixed(6).replace(/0+$/, '').replace(/\.$/, '');
  return fixed.length > 0 ? fixed : '0';
}

function resolveHistogramBucket(value: number, config: HistogramConfig) {
  const { buckets, format } = config;
  let previous = 0;
  for (const bucket of buckets) {
    if (value < bucket) {
      return format(bucket, previous === 0 ? undefined : previous);
    }
    previous = bucket;
  }
  return `${buckets[buckets.length - 1]}+`;
}

const defaultRegistry = new MetricsRegistry();

export type {
  BurstResultKind,
  HistogramConfig,
  HistogramSnapshot,
  MetricsSnapshot,
  PrometheusHistogramOptions,
  PrometheusLogLevelOptions
};
export { MetricsRegistry };
export default defaultRegistry;
