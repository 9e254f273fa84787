import { Gauge, Registry } from 'prom-client';
import type { Clock, MetricExporterOptions } from './types';
import { BATTERY_STATES } from './types';
import type { MetricStore } from './metricStore';

export const METRIC_NAMES = {
  temperature: 'tuya_sensor_temperature_celsius',
  humidity: 'tuya_sensor_relative_humidity_percent',
  dataAge: 'tuya_data_age_seconds',
  batteryState: 'tuya_battery_state',
} as const;

/**
 * @hebrew צרכן לקריאה בלבד של חנות המטריקות, מופעל בכל בקשת scrape.
 *
 * כל קריאה ל-`render` לוקחת תמונת מצב אחת מהחנות ובונה Registry חדש של prom-client,
 * כך ש-scrapes מקבילים לא חולקים מצב ואין מטמון בין scrapes.
 */
export class MetricExporter {
  private readonly store: MetricStore;
  private readonly now: Clock;

  constructor(store: MetricStore, options?: MetricExporterOptions) {
    this.store = store;
    this.now = options?.now ?? Date.now;
  }

  public get contentType(): string {
    return Registry.PROMETHEUS_CONTENT_TYPE;
  }

  public async render(): Promise<string> {
    const snapshot = this.store.snapshot();
    const renderedAt = this.now();
    const registry = new Registry();

    const temperature = new Gauge({
      name: METRIC_NAMES.temperature,
      help: 'Current temperature',
      labelNames: ['device'],
      registers: [registry],
    });
    const humidity = new Gauge({
      name: METRIC_NAMES.humidity,
      help: 'Relative humidity',
      labelNames: ['device'],
      registers: [registry],
    });
    const dataAge = new Gauge({
      name: METRIC_NAMES.dataAge,
      help: 'Data age for each sensor',
      labelNames: ['device'],
      registers: [registry],
    });
    const batteryState = new Gauge({
      name: METRIC_NAMES.batteryState,
      help: 'Tuya Battery State',
      labelNames: ['device', METRIC_NAMES.batteryState],
      registers: [registry],
    });

    for (const { device, latest } of snapshot) {
      // התקן בלי קריאה מוצלחת קיים לוגית אבל לא מייצא סדרות
      if (!latest) {
        continue;
      }
      const labels = { device: device.name };

      if (latest.temperatureCelsius !== undefined) {
        temperature.set(labels, latest.temperatureCelsius);
      }
      if (latest.humidityPercent !== undefined) {
        humidity.set(labels, latest.humidityPercent);
      }
      dataAge.set(labels, Math.max(0, renderedAt - latest.observedAt) / 1000);

      for (const state of BATTERY_STATES) {
        batteryState.set(
          { device: device.name, [METRIC_NAMES.batteryState]: state },
          latest.batteryState === state ? 1 : 0,
        );
      }
    }

    return registry.metrics();
  }
}
