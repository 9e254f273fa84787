import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, envVarName, loadConfig, normalizeLogLevel, readCredentialsFile } from './config';

const requiredEnv = {
  TUYA_REGION: 'EU',
  TUYA_API_KEY: 'test-key',
  TUYA_API_SECRET: 'test-secret',
  TUYA_DEVICE_ID: 'bf01,bf02=Bedroom',
};

describe('loadConfig', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tuya-exporter-config-'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('משלים ערכי ברירת מחדל כשרק פרטי הגישה מוגדרים', () => {
    expect(loadConfig(requiredEnv, workDir)).toEqual({
      server: { port: 7979, metricsPath: '/metrics' },
      polling: { pollIntervalMs: 60000, shutdownTimeoutMs: 5000, requestTimeoutMs: 10000 },
      logLevel: 'info',
      tuya: { region: 'eu', apiKey: 'test-key', apiSecret: 'test-secret' },
      devices: [{ id: 'bf01' }, { id: 'bf02', name: 'Bedroom' }],
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      ...requiredEnv,
      TUYA_EXPORTER_PORT: '9100',
      TUYA_EXPORTER_REFRESH_PERIOD: '2.5',
      TUYA_EXPORTER_METRICS_PATH: '/probe',
      TUYA_EXPORTER_SHUTDOWN_TIMEOUT_MS: '1500',
      TUYA_EXPORTER_REQUEST_TIMEOUT_MS: '3000',
      TUYA_LOGLEVEL: 'DEBUG',
    }, workDir);

    expect(config.server).toEqual({ port: 9100, metricsPath: '/probe' });
    expect(config.polling).toEqual({ pollIntervalMs: 2500, shutdownTimeoutMs: 1500, requestTimeoutMs: 3000 });
    expect(config.logLevel).toBe('debug');
  });

  it('reports every missing credential at once', () => {
    expect(() => loadConfig({}, workDir)).toThrow(
      new ConfigError('Missing required configuration: TUYA_REGION, TUYA_API_KEY, TUYA_API_SECRET, TUYA_DEVICE_ID'),
    );
  });

  it('falls back to the credentials file for values the environment leaves out', () => {
    fs.writeFileSync(path.join(workDir, 'tinytuya.json'), JSON.stringify({
      apiRegion: 'us',
      apiKey: 'file-key',
      apiSecret: 'test-secret',
      apiDeviceID: 'bf10',
    }));

    const config = loadConfig({ TUYA_API_KEY: 'test-key' }, workDir);

    expect(config.tuya).toEqual({ region: 'us', apiKey: 'test-key', apiSecret: 'test-secret' });
    expect(config.devices).toEqual([{ id: 'bf10' }]);
  });

  it('resolves TUYA_CREDENTIALS_FILE against the working directory', () => {
    fs.mkdirSync(path.join(workDir, 'secrets'));
    fs.writeFileSync(path.join(workDir, 'secrets', 'cloud.json'), JSON.stringify({
      apiRegion: 'in',
      apiKey: 'test-key',
      apiSecret: 'test-secret',
      apiDeviceID: 'bf20=Garage',
    }));

    const config = loadConfig({ TUYA_CREDENTIALS_FILE: 'secrets/cloud.json' }, workDir);

    expect(config.tuya.region).toBe('in');
    expect(config.devices).toEqual([{ id: 'bf20', name: 'Garage' }]);
  });

  it.each([
    [{ TUYA_EXPORTER_PORT: 'abc' }, 'TUYA_EXPORTER_PORT must be a number, got "abc"'],
    [{ TUYA_EXPORTER_PORT: '0' }, 'TUYA_EXPORTER_PORT must be a positive integer, got 0'],
    [{ TUYA_EXPORTER_PORT: '70000' }, 'TUYA_EXPORTER_PORT must be at most 65535, got 70000'],
    [{ TUYA_EXPORTER_REFRESH_PERIOD: '-5' }, 'TUYA_EXPORTER_REFRESH_PERIOD must be a positive number, got -5'],
    [{ TUYA_EXPORTER_METRICS_PATH: 'metrics' }, 'TUYA_EXPORTER_METRICS_PATH must start with "/", got "metrics"'],
    [{ TUYA_LOGLEVEL: 'verbose' }, 'TUYA_LOGLEVEL has unknown level "verbose"'],
    [{ TUYA_REGION: 'mars' }, 'TUYA_REGION "mars" is not one of: cn, us, us-e, eu, eu-w, in'],
    [{ TUYA_DEVICE_ID: 'bf01,bf01=Again' }, 'TUYA_DEVICE_ID lists device bf01 more than once'],
    [{ TUYA_DEVICE_ID: '=Nameless' }, 'TUYA_DEVICE_ID contains an entry without an id'],
    [{ TUYA_DEVICE_ID: 'bf01=Kitchen,bf02=Kitchen' }, 'TUYA_DEVICE_ID uses the name "Kitchen" more than once'],
  ])('rejects %j', (override, message) => {
    expect(() => loadConfig({ ...requiredEnv, ...override }, workDir)).toThrow(new ConfigError(message));
  });
});

describe('readCredentialsFile', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tuya-exporter-credentials-'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('returns nothing when the file does not exist', () => {
    expect(readCredentialsFile(path.join(workDir, 'missing.json'))).toEqual({});
  });

  it('keeps only non-empty string fields', () => {
    const filePath = path.join(workDir, 'tinytuya.json');
    fs.writeFileSync(filePath, JSON.stringify({ apiKey: ' test-key ', apiSecret: '', apiRegion: 3 }));

    expect(readCredentialsFile(filePath)).toEqual({ apiKey: 'test-key' });
  });

  it('rejects a file that is not a JSON object', () => {
    const filePath = path.join(workDir, 'tinytuya.json');
    fs.writeFileSync(filePath, '{ not json');
    expect(() => readCredentialsFile(filePath)).toThrow(`Credentials file ${filePath} is not valid JSON`);

    fs.writeFileSync(filePath, '[]');
    expect(() => readCredentialsFile(filePath)).toThrow(`Credentials file ${filePath} must contain a JSON object`);
  });
});

describe('config helpers', () => {
  it('derives environment variable names from config paths', () => {
    expect(envVarName(['exporter', 'refreshPeriod'])).toBe('TUYA_EXPORTER_REFRESH_PERIOD');
    expect(envVarName(['apiSecret'])).toBe('TUYA_API_SECRET');
  });

  it.each([
    ['WARNING', 'warn'],
    ['critical', 'error'],
    [' Info ', 'info'],
    ['trace', 'trace'],
  ])('normalizes log level %s to %s', (raw, expected) => {
    expect(normalizeLogLevel(raw)).toBe(expected);
  });
});
