import fs from 'fs';
import path from 'path';
import { TUYA_REGION_HOSTS, isLogLevel, parseDeviceList } from 'tuya-telemetry-core';
import type { DeviceEntry, LogLevel } from 'tuya-telemetry-core';
import { getProcessedEnv } from './envLoader';
import type { ProcessedEnv } from './envLoader';

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * ערכי ברירת המחדל. כל מפתח ניתן לדריסה במשתנה סביבה ששמו נגזר מהנתיב באובייקט,
 * בתוספת הקידומת TUYA: `exporter.refreshPeriod` => `TUYA_EXPORTER_REFRESH_PERIOD`.
 */
const defaultConfig = {
  exporter: {
    port: 7979,
    refreshPeriod: 60, // שניות
    metricsPath: '/metrics',
    shutdownTimeoutMs: 5000,
    requestTimeoutMs: 10000,
  },
  loglevel: 'info',
  region: '',
  apiKey: '',
  apiSecret: '',
  deviceId: '',
  credentialsFile: 'tinytuya.json',
};

const ENV_PREFIX = 'tuya';

export interface ExporterConfig {
  server: {
    port: number;
    metricsPath: string;
  };
  polling: {
    pollIntervalMs: number;
    shutdownTimeoutMs: number;
    requestTimeoutMs: number;
  };
  logLevel: LogLevel;
  tuya: {
    region: string;
    apiKey: string;
    apiSecret: string;
  };
  devices: DeviceEntry[];
}

// פונקציית עזר להמרת camelCase ל-SNAKE_CASE
const camelToSnakeCase = (str: string) => str.replace(/[A-Z]/g, letter => `_${letter}`).toUpperCase();

export const envVarName = (configPath: string[]): string =>
  [ENV_PREFIX, ...configPath].map(camelToSnakeCase).join('_');

// שמות הרמות של הגרסה הקודמת (DEBUG, WARNING...) לצד השמות של winston
const LOG_LEVEL_ALIASES: Record<string, LogLevel> = {
  warning: 'warn',
  critical: 'error',
  fatal: 'error',
};

interface CredentialsFile {
  apiRegion?: string;
  apiKey?: string;
  apiSecret?: string;
  apiDeviceID?: string;
}

function readNumber(env: ProcessedEnv, configPath: string[], fallback: number): number {
  const name = envVarName(configPath);
  const value = env[name];
  if (value === undefined || value === '') {
    return fallback;
  }
  if (typeof value !== 'number') {
    throw new ConfigError(`${name} must be a number, got "${value}"`);
  }
  return value;
}

function readString(rawEnv: NodeJS.ProcessEnv, configPath: string[], fallback: string): string {
  const value = rawEnv[envVarName(configPath)]?.trim();
  return value ? value : fallback;
}

function requirePositive(configPath: string[], value: number, integer: boolean): number {
  if (value <= 0 || (integer && !Number.isInteger(value))) {
    throw new ConfigError(`${envVarName(configPath)} must be a positive${integer ? ' integer' : ' number'}, got ${value}`);
  }
  return value;
}

export function normalizeLogLevel(raw: string): LogLevel {
  const lowered = raw.trim().toLowerCase();
  const level = LOG_LEVEL_ALIASES[lowered] ?? lowered;
  if (!isLogLevel(level)) {
    throw new ConfigError(`${envVarName(['loglevel'])} has unknown level "${raw}"`);
  }
  return level;
}

/**
 * קורא את קובץ פרטי הגישה (tinytuya.json), אם קיים. משמש כגיבוי למשתני סביבה חסרים.
 */
export function readCredentialsFile(filePath: string): CredentialsFile {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Credentials file ${filePath} is not valid JSON`, { cause: error });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Credentials file ${filePath} must contain a JSON object`);
  }

  const credentials: CredentialsFile = {};
  for (const key of ['apiRegion', 'apiKey', 'apiSecret', 'apiDeviceID'] as const) {
    const value: unknown = Reflect.get(parsed, key);
    if (typeof value === 'string' && value.trim() !== '') {
      credentials[key] = value.trim();
    }
  }
  return credentials;
}

/**
 * בונה את התצורה הסופית ממשתני הסביבה, מקובץ פרטי הגישה ומערכי ברירת המחדל.
 * @throws {ConfigError} כשחסרים פרטי גישה או שערך אינו תקין.
 */
export function loadConfig(rawEnv: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): ExporterConfig {
  const env = getProcessedEnv(rawEnv);
  const exporterDefaults = defaultConfig.exporter;

  const port = requirePositive(['exporter', 'port'], readNumber(env, ['exporter', 'port'], exporterDefaults.port), true);
  if (port > 65535) {
    throw new ConfigError(`${envVarName(['exporter', 'port'])} must be at most 65535, got ${port}`);
  }
  const refreshPeriod = requirePositive(
    ['exporter', 'refreshPeriod'],
    readNumber(env, ['exporter', 'refreshPeriod'], exporterDefaults.refreshPeriod),
    false,
  );
  const shutdownTimeoutMs = requirePositive(
    ['exporter', 'shutdownTimeoutMs'],
    readNumber(env, ['exporter', 'shutdownTimeoutMs'], exporterDefaults.shutdownTimeoutMs),
    true,
  );
  const requestTimeoutMs = requirePositive(
    ['exporter', 'requestTimeoutMs'],
    readNumber(env, ['exporter', 'requestTimeoutMs'], exporterDefaults.requestTimeoutMs),
    true,
  );

  const metricsPath = readString(rawEnv, ['exporter', 'metricsPath'], exporterDefaults.metricsPath);
  if (!metricsPath.startsWith('/')) {
    throw new ConfigError(`${envVarName(['exporter', 'metricsPath'])} must start with "/", got "${metricsPath}"`);
  }

  const logLevel = normalizeLogLevel(readString(rawEnv, ['loglevel'], defaultConfig.loglevel));

  const credentialsPath = path.resolve(cwd, readString(rawEnv, ['credentialsFile'], defaultConfig.credentialsFile));
  const fromFile = readCredentialsFile(credentialsPath);

  const region = readString(rawEnv, ['region'], fromFile.apiRegion ?? defaultConfig.region).toLowerCase();
  const apiKey = readString(rawEnv, ['apiKey'], fromFile.apiKey ?? defaultConfig.apiKey);
  const apiSecret = readString(rawEnv, ['apiSecret'], fromFile.apiSecret ?? defaultConfig.apiSecret);
  const devices = parseDeviceList(readString(rawEnv, ['deviceId'], fromFile.apiDeviceID ?? defaultConfig.deviceId));

  const missing: string[] = [];
  if (!region) missing.push(envVarName(['region']));
  if (!apiKey) missing.push(envVarName(['apiKey']));
  if (!apiSecret) missing.push(envVarName(['apiSecret']));
  if (devices.length === 0) missing.push(envVarName(['deviceId']));
  if (missing.length > 0) {
    throw new ConfigError(`Missing required configuration: ${missing.join(', ')}`);
  }

  if (!TUYA_REGION_HOSTS[region]) {
    throw new ConfigError(`${envVarName(['region'])} "${region}" is not one of: ${Object.keys(TUYA_REGION_HOSTS).join(', ')}`);
  }

  const seen = new Set<string>();
  const seenNames = new Set<string>();
  for (const { id, name } of devices) {
    if (!id) {
      throw new ConfigError(`${envVarName(['deviceId'])} contains an entry without an id`);
    }
    if (seen.has(id)) {
      throw new ConfigError(`${envVarName(['deviceId'])} lists device ${id} more than once`);
    }
    seen.add(id);
    if (name) {
      if (seenNames.has(name)) {
        throw new ConfigError(`${envVarName(['deviceId'])} uses the name "${name}" more than once`);
      }
      seenNames.add(name);
    }
  }

  return {
    server: { port, metricsPath },
    polling: {
      pollIntervalMs: refreshPeriod * 1000,
      shutdownTimeoutMs,
      requestTimeoutMs,
    },
    logLevel,
    tuya: { region, apiKey, apiSecret },
    devices,
  };
}
