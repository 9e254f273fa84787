import { describe, expect, it } from 'vitest';
import { MetricStore } from './metricStore';
import { DeviceRegistry } from './deviceRegistry';
import { NetworkError, NotFoundError } from './errors';
import type { Reading } from './types';

const registry = new DeviceRegistry([
  { id: 'bf01', name: 'Kitchen' },
  { id: 'bf02', name: 'Bedroom' },
]);

const reading: Reading = {
  temperatureCelsius: 21.5,
  humidityPercent: 48,
  batteryState: 'high',
  observedAt: 1_000,
  observedAtSource: 'device',
  fetchedAt: 2_000,
};

describe('MetricStore', () => {
  it('starts every registered device with no reading and no failures', () => {
    const store = new MetricStore(registry);

    expect(store.snapshot()).toEqual([
      { device: { id: 'bf01', name: 'Kitchen' }, consecutiveFailures: 0 },
      { device: { id: 'bf02', name: 'Bedroom' }, consecutiveFailures: 0 },
    ]);
  });

  it('שומר את הקריאה האחרונה בכשלון ומגדיל את מונה הכשלונות', () => {
    const store = new MetricStore(registry, { now: () => 5_000 });
    const afterSuccess = store.update('bf01', reading);

    store.update('bf01', new NetworkError('timeout', 'bf01'));
    const afterSecondFailure = store.update('bf01', new NotFoundError('gone', 'bf01'));

    expect(afterSecondFailure.latest).toBe(afterSuccess.latest);
    expect(afterSecondFailure.lastSuccessAt).toBe(2_000);
    expect(afterSecondFailure.consecutiveFailures).toBe(2);
    expect(afterSecondFailure.lastError).toEqual({ kind: 'not_found', message: 'gone', occurredAt: 5_000 });
  });

  it('clears the error and resets the counter on success', () => {
    const store = new MetricStore(registry);
    store.update('bf01', new NetworkError('timeout', 'bf01'));

    const status = store.update('bf01', { ...reading, fetchedAt: 3_000 });

    expect(status.consecutiveFailures).toBe(0);
    expect(status.lastError).toBeUndefined();
    expect(status.lastSuccessAt).toBe(3_000);
    expect(status.latest?.temperatureCelsius).toBe(21.5);
  });

  it('replaces entries instead of mutating them', () => {
    const store = new MetricStore(registry);
    const before = store.get('bf01');

    const after = store.update('bf01', reading);

    expect(after).not.toBe(before);
    expect(before).toEqual({ device: { id: 'bf01', name: 'Kitchen' }, consecutiveFailures: 0 });
    expect(Object.isFrozen(after)).toBe(true);
    expect(Object.isFrozen(after.latest)).toBe(true);
  });

  it('keeps updates of one device away from the others', () => {
    const store = new MetricStore(registry);

    store.update('bf01', reading);
    store.update('bf02', new NetworkError('timeout', 'bf02'));

    const [kitchen, bedroom] = store.snapshot();
    expect(kitchen?.latest).toEqual(reading);
    expect(kitchen?.consecutiveFailures).toBe(0);
    expect(bedroom?.latest).toBeUndefined();
    expect(bedroom?.consecutiveFailures).toBe(1);
  });

  it('rejects updates for an unregistered device', () => {
    const store = new MetricStore(registry);
    expect(() => store.update('bf99', reading)).toThrow('Unknown device id: bf99');
  });
});
