import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import { validateLocation, type GeoLocation } from '../astro/solar.js';
import { isExposureCurve, isWhiteBalanceCurve } from '../capture/curves.js';
import { parseShutterSpeed } from '../capture/exposure.js';
import type { TierThresholds } from '../capture/settingsCache.js';
import { ConfigError, errorMessage } from '../errors.js';
import type { CaptureSettings, Profile, ScheduleDefinition } from '../types.js';
import { isRecord } from '../utils/guards.js';
import { isClockTime } from '../utils/time.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type DatabaseConfig = {
  path: string;
};

export type HttpConfig = {
  port: number;
  host?: string;
};

export type DeviceConfig = {
  baseUrl: string;
  requestTimeoutMs: number;
  meterTimeoutMs?: number;
  focusTimeoutMs?: number;
};

export type SchedulerConfig = {
  tickIntervalMs: number;
  burstTimeoutMs: number;
  shutdownGraceMs?: number;
};

export type HealthConfig = {
  failureThreshold: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
};

export type CalculatorKind = 'meter' | 'model';

export type CacheConfig = TierThresholds & {
  calculator: CalculatorKind;
};

export type SensorKind = 'solar' | 'meter' | 'static';

export type LightMonitorConfig = {
  sensor: SensorKind;
  staticLux?: number;
  intervalMs: number;
  staleAfterMs?: number;
  sampleTimeoutMs?: number;
  historySize?: number;
};

export type HistoryConfig = {
  enabled?: boolean;
  retentionDays: number;
  intervalMinutes?: number;
  vacuum?: boolean;
};

export type EngineConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  database: DatabaseConfig;
  http: HttpConfig;
  location: GeoLocation;
  device: DeviceConfig;
  scheduler: SchedulerConfig;
  health: HealthConfig;
  cache: CacheConfig;
  lightMonitor: LightMonitorConfig;
  history: HistoryConfig;
  defaults: CaptureSettings;
  profiles: Profile[];
  schedules: ScheduleDefinition[];
};

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
};

const SETTINGS_PROPERTIES: Record<string, JsonSchema> = {
  iso: { type: 'number', minimum: 1 },
  shutterSpeed: { type: 'string' },
  exposureCompensation: { type: 'number', minimum: -10, maximum: 10 },
  awbMode: { type: 'number', minimum: 0 },
  wbTemp: { type: 'number', minimum: 1000, maximum: 20000 },
  hdrMode: { type: 'number', minimum: 0 },
  bracketCount: { type: 'number', minimum: 1 },
  afMode: { type: 'number', minimum: 0 },
  lensPosition: { type: 'number', minimum: 0 },
  sharpness: { type: 'number', minimum: 0 },
  contrast: { type: 'number', minimum: 0 },
  saturation: { type: 'number', minimum: 0 }
};

const adaptiveCurveSchema: JsonSchema = {
  type: 'object',
  required: ['enabled', 'curve'],
  additionalProperties: false,
  properties: {
    enabled: { type: 'boolean' },
    curve: { type: 'string' }
  }
};

const engineConfigSchema: JsonSchema = {
  type: 'object',
  required: [
    'app',
    'logging',
    'database',
    'http',
    'location',
    'device',
    'scheduler',
    'health',
    'cache',
    'lightMonitor',
    'history',
    'defaults',
    'profiles',
    'schedules'
  ],
  additionalProperties: true,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string' }
      }
    },
    database: {
      type: 'object',
      required: ['path'],
      additionalProperties: false,
      properties: {
        path: { type: 'string' }
      }
    },
    http: {
      type: 'object',
      required: ['port'],
      additionalProperties: false,
      properties: {
        port: { type: 'number', minimum: 0, maximum: 65535 },
        host: { type: 'string' }
      }
    },
    location: {
      type: 'object',
      required: ['latitude', 'longitude', 'timezone'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' },
        latitude: { type: 'number' },
        longitude: { type: 'number' },
        timezone: { type: 'string' },
        elevationM: { type: 'number' }
      }
    },
    device: {
      type: 'object',
      required: ['baseUrl', 'requestTimeoutMs'],
      additionalProperties: false,
      properties: {
        baseUrl: { type: 'string' },
        requestTimeoutMs: { type: 'number', minimum: 1 },
        meterTimeoutMs: { type: 'number', minimum: 1 },
        focusTimeoutMs: { type: 'number', minimum: 1 }
      }
    },
    scheduler: {
      type: 'object',
      required: ['tickIntervalMs', 'burstTimeoutMs'],
      additionalProperties: false,
      properties: {
        tickIntervalMs: { type: 'number', minimum: 1 },
        burstTimeoutMs: { type: 'number', minimum: 1 },
        shutdownGraceMs: { type: 'number', minimum: 0 }
      }
    },
    health: {
      type: 'object',
      required: ['failureThreshold', 'backoffBaseMs', 'backoffMaxMs'],
      additionalProperties: false,
      properties: {
        failureThreshold: { type: 'number', minimum: 1 },
        backoffBaseMs: { type: 'number', minimum: 0 },
        backoffMaxMs: { type: 'number', minimum: 0 }
      }
    },
    cache: {
      type: 'object',
      required: [
        'calculator',
        'adaptEv',
        'recalcEv',
        'refocusEv',
        'maxStaleMs',
        'focusMaxAgeMs',
        'minRefocusIntervalMs'
      ],
      additionalProperties: false,
      properties: {
        calculator: { type: 'string', enum: ['meter', 'model'] },
        adaptEv: { type: 'number', minimum: 0 },
        recalcEv: { type: 'number', minimum: 0 },
        refocusEv: { type: 'number', minimum: 0 },
        maxStaleMs: { type: 'number', minimum: 0 },
        focusMaxAgeMs: { type: 'number', minimum: 0 },
        minRefocusIntervalMs: { type: 'number', minimum: 0 }
      }
    },
    lightMonitor: {
      type: 'object',
      required: ['sensor', 'intervalMs'],
      additionalProperties: false,
      properties: {
        sensor: { type: 'string', enum: ['solar', 'meter', 'static'] },
        staticLux: { type: 'number', minimum: 0 },
        intervalMs: { type: 'number', minimum: 1 },
        staleAfterMs: { type: 'number', minimum: 0 },
        sampleTimeoutMs: { type: 'number', minimum: 1 },
        historySize: { type: 'number', minimum: 1 }
      }
    },
    history: {
      type: 'object',
      required: ['retentionDays'],
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        retentionDays: { type: 'number', minimum: 0 },
        intervalMinutes: { type: 'number', minimum: 1 },
        vacuum: { type: 'boolean' }
      }
    },
    defaults: {
      type: 'object',
      required: [
        'iso',
        'shutterSpeed',
        'exposureCompensation',
        'awbMode',
        'hdrMode',
        'bracketCount',
        'afMode',
        'lensPosition',
        'sharpness',
        'contrast',
        'saturation'
      ],
      additionalProperties: false,
      properties: SETTINGS_PROPERTIES
    },
    profiles: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'name', 'enabled', 'baseSettings'],
        additionalProperties: false,
        properties: {
          id: { type: 'string' },
          name: { type: 'string' },
          enabled: { type: 'boolean' },
          baseSettings: { type: 'object', additionalProperties: false, properties: SETTINGS_PROPERTIES },
          adaptiveWb: adaptiveCurveSchema,
          adaptiveEv: adaptiveCurveSchema
        }
      }
    },
    schedules: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name', 'kind', 'intervalSeconds', 'enabled', 'profiles'],
        additionalProperties: false,
        properties: {
          name: { type: 'string' },
          kind: { type: 'string', enum: ['solar_relative', 'fixed_time'] },
          anchor: { type: 'string', enum: ['sunrise', 'sunset', 'dawn', 'dusk', 'noon'] },
          offsetMinutes: { type: 'number' },
          durationMinutes: { type: 'number', minimum: 0 },
          startTime: { type: 'string' },
          endTime: { type: 'string' },
          intervalSeconds: { type: 'number', minimum: 1 },
          enabled: { type: 'boolean' },
          profiles: { type: 'array', items: { type: 'string' } }
        }
      }
    }
  }
};

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    const additional = schema.additionalProperties;
    if (additional === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (additional && typeof additional === 'object') {
      for (const key of Object.keys(value)) {
        if (definedProperties.has(key)) {
          continue;
        }
        errors.push(...validateAgainstSchema(additional, value[key], `${pathLabel}.${key}`));
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in value)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const items = schema.items;
    if (items) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(items, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean') {
    if (typeof value !== 'boolean') {
      errors.push(`${pathLabel} must be a boolean`);
    }
    return errors;
  }

  return errors;
}

function conformsToSchema(value: unknown, errors: string[]): value is EngineConfig {
  errors.push(...validateAgainstSchema(engineConfigSchema, value, 'config'));
  return errors.length === 0;
}

export function validateConfig(config: unknown): asserts config is EngineConfig {
  const errors: string[] = [];
  if (!conformsToSchema(config, errors)) {
    throw new ConfigError(errors);
  }
  validateLogicalConfig(config);
}

export function parseConfig(contents: string): EngineConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    throw new ConfigError(`Failed to parse configuration: ${errorMessage(error)}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): EngineConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

export function tierThresholdsFrom(cache: CacheConfig): TierThresholds {
  return {
    adaptEv: cache.adaptEv,
    recalcEv: cache.recalcEv,
    refocusEv: cache.refocusEv,
    maxStaleMs: cache.maxStaleMs,
    focusMaxAgeMs: cache.focusMaxAgeMs,
    minRefocusIntervalMs: cache.minRefocusIntervalMs
  };
}

function checkShutter(value: string | undefined, label: string, messages: string[]) {
  if (value === undefined) {
    return;
  }
  try {
    parseShutterSpeed(value);
  } catch (error) {
    messages.push(`${label}: ${errorMessage(error)}`);
  }
}

function validateLogicalConfig(config: EngineConfig) {
  const messages: string[] = [];

  try {
    validateLocation(config.location);
  } catch (error) {
    messages.push(`config.location: ${errorMessage(error)}`);
  }

  if (config.cache.adaptEv > config.cache.recalcEv) {
    messages.push('config.cache.adaptEv must not exceed config.cache.recalcEv');
  }
  if (config.cache.recalcEv > config.cache.refocusEv) {
    messages.push('config.cache.recalcEv must not exceed config.cache.refocusEv');
  }

  if (config.health.backoffBaseMs > config.health.backoffMaxMs) {
    messages.push('config.health.backoffBaseMs must not exceed config.health.backoffMaxMs');
  }

  if (config.lightMonitor.sensor === 'static' && typeof config.lightMonitor.staticLux !== 'number') {
    messages.push('config.lightMonitor.staticLux is required for the static sensor');
  }

  checkShutter(config.defaults.shutterSpeed, 'config.defaults.shutterSpeed', messages);

  const profileIds = new Set<string>();
  config.profiles.forEach((profile, index) => {
    const label = `config.profiles[${index}]`;
    const id = profile.id.trim();
    if (!id) {
      messages.push(`${label}.id must not be empty`);
    } else if (profileIds.has(id)) {
      messages.push(`${label}.id "${id}" is duplicated`);
    }
    profileIds.add(id);

    checkShutter(profile.baseSettings.shutterSpeed, `${label}.baseSettings.shutterSpeed`, messages);

    if (profile.adaptiveWb && !isWhiteBalanceCurve(profile.adaptiveWb.curve)) {
      messages.push(`${label}.adaptiveWb.curve "${profile.adaptiveWb.curve}" is not a known white balance curve`);
    }
    if (profile.adaptiveEv && !isExposureCurve(profile.adaptiveEv.curve)) {
      messages.push(`${label}.adaptiveEv.curve "${profile.adaptiveEv.curve}" is not a known exposure curve`);
    }
  });

  const scheduleNames = new Set<string>();
  config.schedules.forEach((schedule, index) => {
    const label = `config.schedules[${index}]`;
    const name = schedule.name.trim();
    if (!name) {
      messages.push(`${label}.name must not be empty`);
    } else if (scheduleNames.has(name)) {
      messages.push(`${label}.name "${name}" is duplicated`);
    }
    scheduleNames.add(name);

    if (schedule.kind === 'solar_relative') {
      if (!schedule.anchor) {
        messages.push(`${label}.anchor is required for solar_relative schedules`);
      }
      if (typeof schedule.durationMinutes !== 'number' || schedule.durationMinutes <= 0) {
        messages.push(`${label}.durationMinutes must be > 0 for solar_relative schedules`);
      }
    } else {
      for (const key of ['startTime', 'endTime'] as const) {
        const value = schedule[key];
        if (typeof value !== 'string') {
          messages.push(`${label}.${key} is required for fixed_time schedules`);
        } else if (!isClockTime(value)) {
          messages.push(`${label}.${key} "${value}" must be HH:MM`);
        }
      }
    }

    if (schedule.profiles.length === 0) {
      messages.push(`${label}.profiles must reference at least one profile`);
    }
    for (const profileId of schedule.profiles) {
      if (!profileIds.has(profileId)) {
        messages.push(`${label}.profiles references unknown profile "${profileId}"`);
      }
    }
  });

  if (messages.length > 0) {
    throw new ConfigError(messages);
  }
}

export type ConfigReloadEvent = {
  previous: EngineConfig;
  next: EngineConfig;
};

export const DEFAULT_CONFIG_PATH = 'config/default.json';

export class ConfigManager extends EventEmitter {
  private currentConfig: EngineConfig;
  private readonly filePath: string;
  private watcher: fs.FSWatcher | null = null;
  private watchRefs = 0;
  private reloadTimer: NodeJS.Timeout | null = null;
  private lastGoodRaw: string;
  private restoring = false;
  private restoreTimer: NodeJS.Timeout | null = null;

  constructor(filePath = path.resolve(process.cwd(), DEFAULT_CONFIG_PATH)) {
    super();
    this.filePath = path.resolve(filePath);
    const { config, raw } = this.loadFromDisk();
    this.currentConfig = config;
    this.lastGoodRaw = raw;
  }

  getConfig(): EngineConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): EngineConfig {
    const { config: next, raw } = this.loadFromDisk();
    const previous = this.currentConfig;
    this.currentConfig = next;
    this.lastGoodRaw = raw;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }

  watch(): () => void {
    if (!this.watcher) {
      this.watcher = this.createWatcher();
    }

    this.watchRefs += 1;

    return () => {
      this.watchRefs = Math.max(0, this.watchRefs - 1);
      if (this.watchRefs === 0) {
        if (this.reloadTimer) {
          clearTimeout(this.reloadTimer);
          this.reloadTimer = null;
        }
        this.closeWatcher();
      }
    };
  }

  private scheduleReload() {
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
    }

    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      try {
        this.reload();
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        if (this.listenerCount('error') > 0) {
          this.emit('error', err);
        }
        this.restorePreviousConfig();
      }
    }, 100);
  }

  private recreateWatcher() {
    this.closeWatcher();
    this.watcher = this.createWatcher();
  }

  private closeWatcher() {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    if (this.restoreTimer) {
      clearTimeout(this.restoreTimer);
      this.restoreTimer = null;
    }
    this.restoring = false;
  }

  private createWatcher() {
    return fs.watch(this.filePath, { persistent: false }, eventType => {
      if (this.restoring) {
        return;
      }

      if (eventType === 'rename') {
        this.recreateWatcher();
      }
      this.scheduleReload();
    });
  }

  private loadFromDisk(): { config: EngineConfig; raw: string } {
    const contents = fs.readFileSync(this.filePath, 'utf-8');
    const config = parseConfig(contents);
    return { config, raw: contents };
  }

  private restorePreviousConfig() {
    if (!this.lastGoodRaw) {
      return;
    }

    this.restoring = true;
    try {
      fs.writeFileSync(this.filePath, this.lastGoodRaw, 'utf-8');
    } catch (error) {
      if (this.listenerCount('error') > 0) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.emit('error', err);
      }
    } finally {
      if (this.restoreTimer) {
        clearTimeout(this.restoreTimer);
      }
      this.restoreTimer = setTimeout(() => {
        this.restoring = false;
        this.restoreTimer = null;
      }, 200);
    }
  }
}

const defaultManager = new ConfigManager();

export default defaultManager;
export { engineConfigSchema };
