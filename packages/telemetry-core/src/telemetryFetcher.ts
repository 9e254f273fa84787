import type { BatteryState, Clock, Device, ObservedAtSource, Reading, ReadingFetcher, TelemetryApi, TelemetryFetcherOptions } from './types';
import { BATTERY_STATES } from './types';
import { toFetchError } from './errors';
import { decodeDevicePayload, decodeScales } from './payloadDecoder';
import type { DecodedDataPoint } from './payloadDecoder';
import { createModuleLogger } from './logger';

const logger = createModuleLogger('TelemetryFetcher');

export const TEMPERATURE_CODES: readonly string[] = ['va_temperature', 'temp_current'];
export const HUMIDITY_CODES: readonly string[] = ['va_humidity', 'humidity_value'];
export const BATTERY_CODE = 'battery_state';

// חיישני טמפרטורה מדווחים בעשיריות מעלה, לחות באחוזים שלמים
const DEFAULT_SCALES: Record<string, number> = {
  va_temperature: 1,
  temp_current: 1,
  va_humidity: 0,
  humidity_value: 0,
};

/**
 * @hebrew ממפה ערך סוללה גולמי לאחד מארבעת המצבים. ערך לא מוכר או חסר הופך ל-unknown.
 */
export function toBatteryState(raw: unknown): BatteryState {
  if (typeof raw !== 'string') {
    return 'unknown';
  }
  const normalized = raw.trim().toLowerCase();
  return BATTERY_STATES.find(state => state === normalized) ?? 'unknown';
}

/**
 * @hebrew שולף את המצב הנוכחי של התקן מה-API ומתרגם אותו ל-Reading מנורמל.
 * אין ניסיונות חוזרים כאן; מדיניות הניסיון החוזר היא של המתזמן.
 */
export class TelemetryFetcher implements ReadingFetcher {
  private readonly api: TelemetryApi;
  private readonly now: Clock;
  private readonly defaultScales: Record<string, number>;
  // מפרט נקודות הנתונים לא משתנה בזמן חיי ההתקן, נשלף פעם אחת לכל התקן
  private readonly scalesByDevice = new Map<string, Map<string, number>>();

  constructor(api: TelemetryApi, options?: TelemetryFetcherOptions) {
    this.api = api;
    this.now = options?.now ?? Date.now;
    this.defaultScales = { ...DEFAULT_SCALES, ...options?.defaultScales };
  }

  /**
   * @hebrew שולף קריאה עבור התקן.
   * @throws {FetchError} עם מזהה ההתקן וסוג התקלה.
   */
  public async fetch(device: Device, signal?: AbortSignal): Promise<Reading> {
    try {
      const raw = await this.api.getDevice(device.id, signal);
      const decoded = decodeDevicePayload(raw, device.id);
      const scales = await this.getScales(device, signal);
      const fetchedAt = this.now();

      let temperatureCelsius: number | undefined;
      let humidityPercent: number | undefined;
      let batteryState: BatteryState = 'unknown';
      let newestDataPoint: number | undefined;

      const noteObserved = (point: DecodedDataPoint) => {
        if (point.observedAt !== undefined && (newestDataPoint === undefined || point.observedAt > newestDataPoint)) {
          newestDataPoint = point.observedAt;
        }
      };

      for (const point of decoded.dataPoints) {
        if (TEMPERATURE_CODES.includes(point.code)) {
          const value = this.scaleValue(point, scales, device);
          if (value !== undefined) {
            temperatureCelsius = value;
            noteObserved(point);
          }
        } else if (HUMIDITY_CODES.includes(point.code)) {
          const value = this.scaleValue(point, scales, device);
          if (value !== undefined) {
            humidityPercent = value;
            noteObserved(point);
          }
        } else if (point.code === BATTERY_CODE) {
          batteryState = toBatteryState(point.value);
          noteObserved(point);
        }
      }

      let observedAt = fetchedAt;
      let observedAtSource: ObservedAtSource = 'fetch';
      if (newestDataPoint !== undefined) {
        observedAt = newestDataPoint;
        observedAtSource = 'datapoint';
      } else if (decoded.updateTime !== undefined) {
        observedAt = decoded.updateTime;
        observedAtSource = 'device';
      } else {
        logger.debug(`Device ${device.id} reported no update time, using fetch time`);
      }

      const reading: Reading = {
        ...(temperatureCelsius !== undefined ? { temperatureCelsius } : {}),
        ...(humidityPercent !== undefined ? { humidityPercent } : {}),
        batteryState,
        observedAt,
        observedAtSource,
        fetchedAt,
      };
      logger.trace(`Fetched reading for ${device.name}`, { reading });
      return Object.freeze(reading);
    } catch (error) {
      throw toFetchError(error, device.id);
    }
  }

  private async getScales(device: Device, signal?: AbortSignal): Promise<Map<string, number>> {
    const cached = this.scalesByDevice.get(device.id);
    if (cached) {
      return cached;
    }
    const raw = await this.api.getDeviceSpecification(device.id, signal);
    const scales = decodeScales(raw, device.id);
    this.scalesByDevice.set(device.id, scales);
    logger.debug(`Loaded ${scales.size} scale factors for device ${device.id}`, { scales: Object.fromEntries(scales) });
    return scales;
  }

  private scaleValue(point: DecodedDataPoint, scales: Map<string, number>, device: Device): number | undefined {
    if (typeof point.value !== 'number' || !Number.isFinite(point.value)) {
      logger.debug(`Ignoring non-numeric ${point.code} value from device ${device.id}`, { value: point.value });
      return undefined;
    }
    const scale = scales.get(point.code) ?? this.defaultScales[point.code] ?? 0;
    return point.value / 10 ** scale;
  }
}
