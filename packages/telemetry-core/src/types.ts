// טיפוסי המודל של ה-exporter: התקנים, קריאות, ומצב התקן בחנות המטריקות.
import type { FetchErrorKind } from './errors';

/**
 * @hebrew התקן חיישן רשום. נבנה פעם אחת בעליית התהליך ואינו משתנה.
 */
export interface Device {
  /** @hebrew המזהה שהוקצה על ידי פלטפורמת הענן. */
  readonly id: string;
  /** @hebrew שם התצוגה, משמש כתווית `device` בכל הסדרות. */
  readonly name: string;
}

export const BATTERY_STATES = ['unknown', 'low', 'middle', 'high'] as const;

export type BatteryState = typeof BATTERY_STATES[number];

/**
 * @hebrew מאיפה נלקח `observedAt`: חותמת הזמן של נקודת הנתונים, זמן העדכון של ההתקן,
 * או זמן סיום השליפה כשהפלטפורמה לא דיווחה דבר.
 */
export type ObservedAtSource = 'datapoint' | 'device' | 'fetch';

/**
 * @hebrew קריאה מנורמלת של התקן אחד, תוצאה של שליפה מוצלחת.
 * כל חותמות הזמן במילישניות מאז epoch.
 */
export interface Reading {
  readonly temperatureCelsius?: number;
  readonly humidityPercent?: number;
  readonly batteryState: BatteryState;
  readonly observedAt: number;
  readonly observedAtSource: ObservedAtSource;
  readonly fetchedAt: number;
}

export interface ErrorInfo {
  readonly kind: FetchErrorKind;
  readonly message: string;
  readonly occurredAt: number;
}

/**
 * @hebrew רשומה בחנות המטריקות. מוחלפת כיחידה אחת בכל עדכון, לעולם לא משתנה במקום.
 */
export interface DeviceStatus {
  readonly device: Device;
  readonly latest?: Reading;
  readonly lastError?: ErrorInfo;
  readonly consecutiveFailures: number;
  readonly lastSuccessAt?: number;
}

/**
 * @hebrew הממשק האטום מול ה-API המרוחק. כל מתודה מחזירה את שדה ה-`result` הגולמי
 * של מעטפת התגובה, או נדחית עם FetchError.
 */
export interface TelemetryApi {
  getDevice(deviceId: string, signal?: AbortSignal): Promise<unknown>;
  getDeviceSpecification(deviceId: string, signal?: AbortSignal): Promise<unknown>;
}

/**
 * @hebrew מקור קריאות עבור המתזמן. נדחה עם FetchError.
 */
export interface ReadingFetcher {
  fetch(device: Device, signal?: AbortSignal): Promise<Reading>;
}

export type Clock = () => number;

export interface TelemetryFetcherOptions {
  now?: Clock;
  /**
   * @hebrew ה-scale (חזקה של 10) לקוד שלא מופיע במפרט של ההתקן.
   */
  defaultScales?: Record<string, number>;
}

export interface PollSchedulerOptions {
  /**
   * @hebrew מרווח בין מחזורי תשאול (במילישניות).
   * @default 60000
   */
  pollIntervalMs?: number;
  /**
   * @hebrew כמה זמן להמתין לשליפות פתוחות בעצירה לפני שמוותרים עליהן.
   * @default 5000
   */
  shutdownTimeoutMs?: number;
}

export interface PollCycleSummary {
  attempted: number;
  succeeded: number;
  failed: number;
  skipped: number;
}

export interface MetricExporterOptions {
  now?: Clock;
}
