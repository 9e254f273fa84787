import {
  createModuleLogger,
  DeviceRegistry,
  MetricExporter,
  MetricStore,
  PollScheduler,
  TelemetryFetcher,
} from 'tuya-telemetry-core';
import type { Clock, Device, DeviceStatus, FetchError, PollCycleSummary, TelemetryApi } from 'tuya-telemetry-core';
import type { ExporterConfig } from './config';

const logger = createModuleLogger('PollingService');

export interface PollingService {
  registry: DeviceRegistry;
  store: MetricStore;
  scheduler: PollScheduler;
  exporter: MetricExporter;
}

/**
 * @hebrew מרכיב את מנוע התשאול: רשם, חנות, שולף, מתזמן ומייצא.
 * החנות נוצרת כאן ומועברת בהפניה למתזמן ולמייצא; אין מצב גלובלי.
 */
export function createPollingService(
  devices: Device[],
  api: TelemetryApi,
  polling: ExporterConfig['polling'],
  now: Clock = Date.now,
): PollingService {
  const registry = new DeviceRegistry(devices);
  const store = new MetricStore(registry, { now });
  const fetcher = new TelemetryFetcher(api, { now });
  const scheduler = new PollScheduler(registry, fetcher, store, {
    pollIntervalMs: polling.pollIntervalMs,
    shutdownTimeoutMs: polling.shutdownTimeoutMs,
  });
  const exporter = new MetricExporter(store, { now });

  initializeSchedulerEvents(scheduler);
  return { registry, store, scheduler, exporter };
}

function initializeSchedulerEvents(scheduler: PollScheduler): void {
  scheduler.on('readingupdated', (device: Device, status: DeviceStatus) => {
    logger.debug(`Reading updated: ${device.name} (${device.id})`, { latest: status.latest });
  });

  scheduler.on('fetchfailed', (device: Device, error: FetchError, status: DeviceStatus) => {
    // auth ו-not_found לא חולפות בין מחזורים
    if (error.kind === 'auth' || error.kind === 'not_found') {
      logger.error(`Device ${device.name} (${device.id}) keeps failing with ${error.kind}; check the credentials and device id`, {
        consecutiveFailures: status.consecutiveFailures,
      });
    }
  });

  scheduler.on('fetchskipped', (device: Device) => {
    logger.warn(`Fetch for ${device.name} (${device.id}) is slower than the poll period`);
  });

  scheduler.on('cyclecomplete', (summary: PollCycleSummary) => {
    if (summary.failed > 0 || summary.skipped > 0) {
      logger.info('Poll cycle finished with problems', { summary });
    }
  });

  scheduler.on('started', () => {
    logger.info('PollScheduler started successfully.');
  });

  scheduler.on('stopped', () => {
    logger.info('PollScheduler stopped.');
  });
}
