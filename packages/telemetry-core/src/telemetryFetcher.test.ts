import { describe, expect, it, vi } from 'vitest';
import { TelemetryFetcher, toBatteryState } from './telemetryFetcher';
import { FetchError, NetworkError } from './errors';
import type { Device, TelemetryApi } from './types';

const device: Device = { id: 'bf-test-01', name: 'Living room' };
const FETCH_TIME = 1_700_000_100_000;

function createApi(devicePayload: unknown, specification: unknown = { status: [] }) {
  const api = {
    getDevice: vi.fn(async (_id: string, _signal?: AbortSignal): Promise<unknown> => devicePayload),
    getDeviceSpecification: vi.fn(async (_id: string, _signal?: AbortSignal): Promise<unknown> => specification),
  } satisfies TelemetryApi;
  return api;
}

function createFetcher(api: TelemetryApi) {
  return new TelemetryFetcher(api, { now: () => FETCH_TIME });
}

describe('TelemetryFetcher', () => {
  it('ממיר עשיריות מעלה לצלזיוס ומחלץ לחות וסוללה', async () => {
    const api = createApi({
      id: 'bf-test-01',
      update_time: 1_700_000_000,
      status: [
        { code: 'va_temperature', value: 215 },
        { code: 'va_humidity', value: 48 },
        { code: 'battery_state', value: 'middle' },
      ],
    });

    const reading = await createFetcher(api).fetch(device);

    expect(reading).toEqual({
      temperatureCelsius: 21.5,
      humidityPercent: 48,
      batteryState: 'middle',
      observedAt: 1_700_000_000_000,
      observedAtSource: 'device',
      fetchedAt: FETCH_TIME,
    });
    expect(Object.isFrozen(reading)).toBe(true);
  });

  it('משתמש ב-scale מהמפרט של ההתקן ושולף את המפרט פעם אחת בלבד', async () => {
    const api = createApi(
      { id: 'bf-test-01', status: [{ code: 'temp_current', value: 2150 }, { code: 'humidity_value', value: 605 }] },
      {
        status: [
          { code: 'temp_current', type: 'Integer', values: '{"unit":"℃","min":-200,"max":600,"scale":2,"step":1}' },
          { code: 'humidity_value', type: 'Integer', values: '{"unit":"%","scale":1}' },
        ],
      },
    );
    const fetcher = createFetcher(api);

    const first = await fetcher.fetch(device);
    await fetcher.fetch(device);

    expect(first.temperatureCelsius).toBe(21.5);
    expect(first.humidityPercent).toBe(60.5);
    expect(api.getDevice).toHaveBeenCalledTimes(2);
    expect(api.getDeviceSpecification).toHaveBeenCalledTimes(1);
  });

  it('keeps fetching when one specification entry is broken', async () => {
    const api = createApi(
      { id: 'bf-test-01', status: [{ code: 'va_temperature', value: 215 }] },
      { status: [{ code: 'va_humidity', type: 'Integer', values: 'not json' }] },
    );
    const fetcher = createFetcher(api);

    const first = await fetcher.fetch(device);
    const second = await fetcher.fetch(device);

    expect(first.temperatureCelsius).toBe(21.5);
    expect(second.temperatureCelsius).toBe(21.5);
    expect(api.getDeviceSpecification).toHaveBeenCalledTimes(1);
  });

  it('prefers the newest data point timestamp over the device update time', async () => {
    const api = createApi({
      id: 'bf-test-01',
      update_time: 1_700_000_000,
      status: [
        { code: 'va_temperature', value: 200, t: 1_700_000_050_000 },
        { code: 'va_humidity', value: 40, t: 1_700_000_040_000 },
      ],
    });

    const reading = await createFetcher(api).fetch(device);

    expect(reading.observedAt).toBe(1_700_000_050_000);
    expect(reading.observedAtSource).toBe('datapoint');
  });

  it('falls back to the fetch time when the platform reports no timestamp', async () => {
    const api = createApi({ id: 'bf-test-01', status: [{ code: 'va_temperature', value: 190 }] });

    const reading = await createFetcher(api).fetch(device);

    expect(reading.observedAt).toBe(FETCH_TIME);
    expect(reading.observedAtSource).toBe('fetch');
  });

  it('leaves out fields the device does not report or reports as non-numeric', async () => {
    const api = createApi({
      id: 'bf-test-01',
      status: [{ code: 'va_temperature', value: 'n/a' }, { code: 'switch_led', value: true }],
    });

    const reading = await createFetcher(api).fetch(device);

    expect('temperatureCelsius' in reading).toBe(false);
    expect('humidityPercent' in reading).toBe(false);
    expect(reading.batteryState).toBe('unknown');
  });

  it('wraps API failures in a FetchError carrying the device id', async () => {
    const api = createApi(null);
    api.getDevice.mockRejectedValueOnce(new NetworkError('connect ECONNREFUSED'));

    const error = await createFetcher(api).fetch(device).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ kind: 'network', deviceId: 'bf-test-01', message: 'connect ECONNREFUSED' });
  });

  it('reports an unexpected payload shape as malformed_response', async () => {
    const api = createApi('not a device');

    await expect(createFetcher(api).fetch(device)).rejects.toMatchObject({
      kind: 'malformed_response',
      deviceId: 'bf-test-01',
    });
    expect(api.getDeviceSpecification).not.toHaveBeenCalled();
  });

  it('passes the abort signal to the API', async () => {
    const api = createApi({ id: 'bf-test-01', status: [] });
    const controller = new AbortController();

    await createFetcher(api).fetch(device, controller.signal);

    expect(api.getDevice).toHaveBeenCalledWith('bf-test-01', controller.signal);
    expect(api.getDeviceSpecification).toHaveBeenCalledWith('bf-test-01', controller.signal);
  });
});

describe('toBatteryState', () => {
  it.each([
    ['low', 'low'],
    ['middle', 'middle'],
    ['high', 'high'],
    ['unknown', 'unknown'],
    [' HIGH ', 'high'],
    ['full', 'unknown'],
    [undefined, 'unknown'],
    [3, 'unknown'],
  ])('maps %j to %s', (raw, expected) => {
    expect(toBatteryState(raw)).toBe(expected);
  });
});
