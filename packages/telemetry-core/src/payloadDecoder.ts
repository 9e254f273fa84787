// פענוח ה-payload הדינמי של הענן למבנה עם שדות אופציונליים ובדיקת נוכחות מפורשת לכל שדה.
import { MalformedResponseError } from './errors';
import { createModuleLogger } from './logger';

const logger = createModuleLogger('PayloadDecoder');

export interface DecodedDataPoint {
  code: string;
  value: unknown;
  /** @hebrew חותמת הזמן של נקודת הנתונים (ms), אם הפלטפורמה סיפקה. */
  observedAt?: number;
}

export interface DecodedDevice {
  id: string;
  name?: string;
  category?: string;
  online?: boolean;
  /** @hebrew זמן העדכון האחרון של ההתקן (ms). */
  updateTime?: number;
  dataPoints: DecodedDataPoint[];
}

// מתחת לסף הזה חותמת זמן נחשבת לשניות (הענן מחזיר update_time בשניות ו-t במילישניות)
const SECONDS_EPOCH_LIMIT = 1e12;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function optionalTimestamp(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return undefined;
  }
  return value < SECONDS_EPOCH_LIMIT ? value * 1000 : value;
}

/**
 * @hebrew מפענח את תוצאת `GET /v1.0/devices/{id}`.
 * נקודות נתונים בלי `code` מדולגות; גוף שאינו אובייקט או בלי `id` הוא תגובה פגומה.
 * @throws {MalformedResponseError}
 */
export function decodeDevicePayload(raw: unknown, deviceId?: string): DecodedDevice {
  if (!isRecord(raw)) {
    throw new MalformedResponseError('Device payload is not an object', deviceId);
  }
  const id = optionalString(raw, 'id');
  if (!id) {
    throw new MalformedResponseError('Device payload has no id', deviceId);
  }

  let status: unknown[] = [];
  if (raw.status !== undefined) {
    if (!Array.isArray(raw.status)) {
      throw new MalformedResponseError('Device payload status is not a list', deviceId);
    }
    status = raw.status;
  }

  const dataPoints: DecodedDataPoint[] = [];
  for (const entry of status) {
    if (!isRecord(entry)) {
      continue;
    }
    const code = optionalString(entry, 'code');
    if (!code) {
      continue;
    }
    const observedAt = optionalTimestamp(entry, 't');
    dataPoints.push(observedAt === undefined ? { code, value: entry.value } : { code, value: entry.value, observedAt });
  }

  const decoded: DecodedDevice = { id, dataPoints };
  const name = optionalString(raw, 'name');
  if (name) decoded.name = name;
  const category = optionalString(raw, 'category');
  if (category) decoded.category = category;
  if (typeof raw.online === 'boolean') decoded.online = raw.online;
  const updateTime = optionalTimestamp(raw, 'update_time');
  if (updateTime !== undefined) decoded.updateTime = updateTime;
  return decoded;
}

/**
 * @hebrew מפענח את תוצאת `GET /v1.0/devices/{id}/specifications` למפה מקוד לערך ה-scale.
 * רק רשומות מסוג Integer שה-`values` שלהן (מחרוזת JSON תקינה) מכיל `scale` נכנסות למפה.
 * @throws {MalformedResponseError} כשהתשובה כולה אינה אובייקט.
 */
export function decodeScales(raw: unknown, deviceId?: string): Map<string, number> {
  if (!isRecord(raw)) {
    throw new MalformedResponseError('Specification payload is not an object', deviceId);
  }
  const scales = new Map<string, number>();
  const status = raw.status;
  if (!Array.isArray(status)) {
    return scales;
  }

  for (const entry of status) {
    if (!isRecord(entry) || entry.type !== 'Integer') {
      continue;
    }
    const code = optionalString(entry, 'code');
    const values = entry.values;
    if (!code || typeof values !== 'string') {
      continue;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(values);
    } catch (error) {
      // רשומה פגומה אחת לא פוסלת את שאר המפרט; הקוד ישתמש ב-scale ברירת המחדל
      logger.debug(`Ignoring specification entry ${code} of device ${deviceId ?? 'unknown'}: values are not valid JSON`, { error });
      continue;
    }
    if (isRecord(parsed)) {
      const scale = Number(parsed.scale);
      if (parsed.scale !== undefined && Number.isFinite(scale)) {
        scales.set(code, scale);
      }
    }
  }
  return scales;
}
