import type { Clock, DeviceStatus, Reading } from './types';
import type { DeviceRegistry } from './deviceRegistry';
import { FetchError } from './errors';

export type PollOutcome = Reading | FetchError;

/**
 * @hebrew החנות המשותפת של המצב האחרון לכל התקן.
 *
 * כל רשומה היא אובייקט קפוא שמוחלף בהשמה סינכרונית אחת, ולכן קורא (scrape) לעולם
 * לא רואה רשומה כתובה למחצה, ועדכונים של התקנים שונים באותו מחזור לא דורסים זה את זה.
 * הכותב היחיד הוא מתזמן התשאול.
 */
export class MetricStore {
  private readonly registry: DeviceRegistry;
  private readonly entries = new Map<string, DeviceStatus>();
  private readonly now: Clock;

  constructor(registry: DeviceRegistry, options?: { now?: Clock }) {
    this.registry = registry;
    this.now = options?.now ?? Date.now;
    for (const device of registry.list()) {
      this.entries.set(device.id, Object.freeze({ device, consecutiveFailures: 0 }));
    }
  }

  /**
   * @hebrew נקודת הכניסה היחידה שמשנה את החנות.
   * הצלחה מחליפה את `latest`, מנקה את `lastError` ומאפסת את מונה הכשלונות.
   * כשלון שומר את `latest` הקודם כמו שהוא.
   */
  public update(deviceId: string, outcome: PollOutcome): DeviceStatus {
    const current = this.entries.get(deviceId);
    if (!current) {
      throw new Error(`Unknown device id: ${deviceId}`);
    }

    let next: DeviceStatus;
    if (outcome instanceof FetchError) {
      next = {
        device: current.device,
        ...(current.latest ? { latest: current.latest } : {}),
        ...(current.lastSuccessAt !== undefined ? { lastSuccessAt: current.lastSuccessAt } : {}),
        lastError: Object.freeze({ kind: outcome.kind, message: outcome.message, occurredAt: this.now() }),
        consecutiveFailures: current.consecutiveFailures + 1,
      };
    } else {
      next = {
        device: current.device,
        latest: Object.freeze({ ...outcome }),
        lastSuccessAt: outcome.fetchedAt,
        consecutiveFailures: 0,
      };
    }

    const frozen = Object.freeze(next);
    this.entries.set(deviceId, frozen);
    return frozen;
  }

  public get(deviceId: string): DeviceStatus | undefined {
    return this.entries.get(deviceId);
  }

  /**
   * @hebrew תמונת מצב עקבית של כל הרשומות, בסדר הרישום.
   */
  public snapshot(): readonly DeviceStatus[] {
    const result: DeviceStatus[] = [];
    for (const device of this.registry.list()) {
      const entry = this.entries.get(device.id);
      if (entry) {
        result.push(entry);
      }
    }
    return Object.freeze(result);
  }
}
