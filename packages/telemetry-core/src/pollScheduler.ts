import { EventEmitter } from 'events';
import type { Device, PollCycleSummary, PollSchedulerOptions, Reading, ReadingFetcher } from './types';
import type { DeviceRegistry } from './deviceRegistry';
import type { MetricStore } from './metricStore';
import { toFetchError } from './errors';
import { createModuleLogger } from './logger';
import { settleWithin } from './utils';

const logger = createModuleLogger('PollScheduler');

export type PollSchedulerState = 'idle' | 'polling' | 'stopped';

type DeviceOutcome = 'succeeded' | 'failed' | 'discarded';

/**
 * @internal
 * מתזמן התשאול: מחזור אחד בכל `pollIntervalMs`, שליפה בלתי תלויה לכל התקן,
 * ולכל היותר שליפה פתוחה אחת לכל התקן (מדלגים, לא צוברים).
 *
 * אירועים: `started`, `stopped`, `readingupdated`, `fetchfailed`, `fetchskipped`, `cyclecomplete`.
 */
export class PollScheduler extends EventEmitter {
  private readonly options: Required<PollSchedulerOptions>;
  private readonly registry: DeviceRegistry;
  private readonly fetcher: ReadingFetcher;
  private readonly store: MetricStore;
  private readonly inFlight = new Map<string, Promise<DeviceOutcome>>();
  private pollIntervalId: NodeJS.Timeout | null = null;
  private abortController = new AbortController();
  private isRunning = false;
  private stopRequested = false;

  constructor(registry: DeviceRegistry, fetcher: ReadingFetcher, store: MetricStore, options?: PollSchedulerOptions) {
    super();
    this.registry = registry;
    this.fetcher = fetcher;
    this.store = store;
    this.options = {
      pollIntervalMs: options?.pollIntervalMs ?? 60000, // דקה
      shutdownTimeoutMs: options?.shutdownTimeoutMs ?? 5000,
    };
  }

  public get state(): PollSchedulerState {
    if (this.stopRequested) {
      return 'stopped';
    }
    return this.inFlight.size > 0 ? 'polling' : 'idle';
  }

  /**
   * @hebrew מריץ מחזור ראשון מיד ואז מחזור בכל מרווח.
   */
  public start(): void {
    if (this.isRunning) {
      logger.warn('PollScheduler is already running. Start request ignored.');
      return;
    }
    this.isRunning = true;
    this.stopRequested = false;
    this.abortController = new AbortController();

    this.runScheduledCycle();
    this.pollIntervalId = setInterval(() => this.runScheduledCycle(), this.options.pollIntervalMs);
    logger.info(`Polling ${this.registry.size} device(s) every ${this.options.pollIntervalMs}ms.`);
    this.emit('started');
  }

  /**
   * @hebrew מחזור תשאול יחיד. מסתיים כשכל השליפות שהמחזור הזה הפעיל הסתיימו.
   */
  public async pollOnce(): Promise<PollCycleSummary> {
    const summary: PollCycleSummary = { attempted: 0, succeeded: 0, failed: 0, skipped: 0 };
    if (this.stopRequested) {
      return summary;
    }

    const launched: Promise<DeviceOutcome>[] = [];
    for (const device of this.registry.list()) {
      if (this.inFlight.has(device.id)) {
        summary.skipped++;
        logger.debug(`Previous fetch for ${device.name} (${device.id}) still running, skipping this tick`);
        this.emit('fetchskipped', device);
        continue;
      }
      summary.attempted++;
      launched.push(this.pollDevice(device));
    }

    for (const outcome of await Promise.all(launched)) {
      if (outcome === 'succeeded') summary.succeeded++;
      else if (outcome === 'failed') summary.failed++;
    }

    logger.debug('Poll cycle complete', { summary });
    this.emit('cyclecomplete', summary);
    return summary;
  }

  /**
   * @hebrew עוצר את הטיימר, מבטל שליפות פתוחות וממתין להן עד `shutdownTimeoutMs`.
   * אחרי הקריאה לא מתבצעת שום כתיבה לחנות.
   */
  public async stop(): Promise<void> {
    if (!this.isRunning && this.inFlight.size === 0) {
      logger.warn('PollScheduler is not running. Stop request ignored.');
      return;
    }
    logger.info('Stopping PollScheduler...');
    this.stopRequested = true;
    this.isRunning = false;

    if (this.pollIntervalId) {
      clearInterval(this.pollIntervalId);
      this.pollIntervalId = null;
    }

    this.abortController.abort();
    if (this.inFlight.size > 0) {
      const settled = await settleWithin(this.inFlight.values(), this.options.shutdownTimeoutMs);
      if (!settled) {
        logger.warn(`${this.inFlight.size} fetch(es) still pending after ${this.options.shutdownTimeoutMs}ms, abandoning them`);
        // שליפה נטושה לא חוסמת את ההתקן בהפעלה הבאה
        this.inFlight.clear();
      }
    }

    this.emit('stopped');
    logger.info('PollScheduler stopped.');
  }

  private runScheduledCycle(): void {
    this.pollOnce().catch((error: unknown) => {
      logger.error('Unexpected error in poll cycle:', error);
    });
  }

  private pollDevice(device: Device): Promise<DeviceOutcome> {
    const signal = this.abortController.signal;
    const task = this.fetcher.fetch(device, signal).then(
      (reading: Reading): DeviceOutcome => {
        // האות שייך להפעלה שבה השליפה התחילה, גם אם המתזמן הופעל מחדש מאז
        if (signal.aborted) {
          return 'discarded';
        }
        const status = this.store.update(device.id, reading);
        this.emit('readingupdated', device, status);
        return 'succeeded';
      },
      (error: unknown): DeviceOutcome => {
        if (signal.aborted) {
          return 'discarded';
        }
        const fetchError = toFetchError(error, device.id);
        const status = this.store.update(device.id, fetchError);
        logger.warn(`Fetch failed for ${device.name} (${device.id}): ${fetchError.message}`, {
          kind: fetchError.kind,
          consecutiveFailures: status.consecutiveFailures,
        });
        this.emit('fetchfailed', device, fetchError, status);
        return 'failed';
      },
    ).finally(() => {
      if (this.inFlight.get(device.id) === task) {
        this.inFlight.delete(device.id);
      }
    });

    this.inFlight.set(device.id, task);
    return task;
  }
}
