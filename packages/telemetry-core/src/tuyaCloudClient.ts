// לקוח ל-Tuya Cloud OpenAPI: חתימת בקשות, ניהול טוקן וסיווג שגיאות ל-FetchError.
import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { createHash, createHmac } from 'node:crypto';
import type { Clock, TelemetryApi } from './types';
import {
  AuthError,
  FetchError,
  MalformedResponseError,
  NetworkError,
  NotFoundError,
  RateLimitedError,
} from './errors';
import { isRecord } from './payloadDecoder';
import { createModuleLogger } from './logger';

const logger = createModuleLogger('TuyaCloudClient');

export const TUYA_REGION_HOSTS: Readonly<Record<string, string>> = {
  cn: 'https://openapi.tuyacn.com',
  us: 'https://openapi.tuyaus.com',
  'us-e': 'https://openapi-ueaz.tuyaus.com',
  eu: 'https://openapi.tuyaeu.com',
  'eu-w': 'https://openapi-weaz.tuyaeu.com',
  in: 'https://openapi.tuyain.com',
};

// קודי שגיאה במעטפת התגובה
const AUTH_ERROR_CODES = new Set([1004, 1010, 1011]); // sign invalid, token invalid, token expired
const NOT_FOUND_ERROR_CODES = new Set([1106]); // permission deny: ההתקן לא משויך לפרויקט

const TOKEN_REFRESH_MARGIN_MS = 60 * 1000;

export interface TuyaCloudClientOptions {
  region: string;
  apiKey: string;
  apiSecret: string;
  /** @default 10000 */
  timeoutMs?: number;
  /** @hebrew מופע axios חלופי (למשל עם adapter בבדיקות). */
  http?: AxiosInstance;
  now?: Clock;
}

export interface SignatureInput {
  method: string;
  path: string;
  body?: string;
  clientId: string;
  secret: string;
  accessToken?: string;
  timestamp: string;
  nonce?: string;
}

/**
 * @hebrew מחשב את החתימה של בקשה (HMAC-SHA256, hex באותיות גדולות).
 * המחרוזת החתומה: clientId + accessToken + t + nonce + stringToSign,
 * כאשר stringToSign = METHOD\nSHA256(body)\n\nPATH.
 */
export function signRequest(input: SignatureInput): string {
  const contentHash = createHash('sha256').update(input.body ?? '').digest('hex');
  const stringToSign = [input.method.toUpperCase(), contentHash, '', input.path].join('\n');
  const payload = input.clientId + (input.accessToken ?? '') + input.timestamp + (input.nonce ?? '') + stringToSign;
  return createHmac('sha256', input.secret).update(payload).digest('hex').toUpperCase();
}

interface AccessToken {
  value: string;
  expiresAt: number;
}

export class TuyaCloudClient implements TelemetryApi {
  private readonly apiKey: string;
  private readonly apiSecret: string;
  private readonly http: AxiosInstance;
  private readonly now: Clock;
  private token: AccessToken | null = null;
  private tokenRequest: Promise<AccessToken> | null = null;

  constructor(options: TuyaCloudClientOptions) {
    const baseURL = TUYA_REGION_HOSTS[options.region];
    if (!baseURL) {
      throw new Error(`Unknown Tuya region '${options.region}'. Expected one of: ${Object.keys(TUYA_REGION_HOSTS).join(', ')}`);
    }
    this.apiKey = options.apiKey;
    this.apiSecret = options.apiSecret;
    this.now = options.now ?? Date.now;
    this.http = options.http ?? axios.create();
    this.http.defaults.baseURL = baseURL;
    this.http.defaults.timeout = options.timeoutMs ?? 10000;
  }

  /**
   * @hebrew משיג טוקן גישה. נקרא פעם אחת בעלייה כדי לזהות פרטי גישה שגויים מוקדם.
   * @throws {AuthError | NetworkError | MalformedResponseError}
   */
  public async authenticate(signal?: AbortSignal): Promise<void> {
    await this.getAccessToken(signal);
  }

  public async getDevice(deviceId: string, signal?: AbortSignal): Promise<unknown> {
    return this.request(`/v1.0/devices/${encodeURIComponent(deviceId)}`, signal);
  }

  public async getDeviceSpecification(deviceId: string, signal?: AbortSignal): Promise<unknown> {
    return this.request(`/v1.0/devices/${encodeURIComponent(deviceId)}/specifications`, signal);
  }

  private async request(path: string, signal?: AbortSignal): Promise<unknown> {
    const token = await this.getAccessToken(signal);
    try {
      return await this.send(path, token.value, signal);
    } catch (error) {
      if (error instanceof AuthError && this.token === token) {
        // הטוקן נדחה, הקריאה הבאה תבקש טוקן חדש
        logger.debug('Access token rejected, dropping cached token');
        this.token = null;
      }
      throw error;
    }
  }

  private async getAccessToken(signal?: AbortSignal): Promise<AccessToken> {
    if (this.token && this.token.expiresAt - TOKEN_REFRESH_MARGIN_MS > this.now()) {
      return this.token;
    }
    // בקשת טוקן אחת משותפת לכל השליפות המקבילות
    if (!this.tokenRequest) {
      this.tokenRequest = this.requestToken(signal).finally(() => {
        this.tokenRequest = null;
      });
    }
    return this.tokenRequest;
  }

  private async requestToken(signal?: AbortSignal): Promise<AccessToken> {
    logger.debug('Requesting new access token');
    const result = await this.send('/v1.0/token?grant_type=1', undefined, signal);
    if (!isRecord(result) || typeof result.access_token !== 'string' || typeof result.expire_time !== 'number') {
      throw new MalformedResponseError('Token response is missing access_token or expire_time');
    }
    const token: AccessToken = {
      value: result.access_token,
      expiresAt: this.now() + result.expire_time * 1000,
    };
    this.token = token;
    logger.info(`Obtained access token, valid for ${result.expire_time}s`);
    return token;
  }

  private async send(path: string, accessToken: string | undefined, signal?: AbortSignal): Promise<unknown> {
    const timestamp = String(this.now());
    const sign = signRequest({
      method: 'GET',
      path,
      clientId: this.apiKey,
      secret: this.apiSecret,
      accessToken,
      timestamp,
    });

    const headers: Record<string, string> = {
      client_id: this.apiKey,
      sign,
      t: timestamp,
      sign_method: 'HMAC-SHA256',
    };
    if (accessToken) {
      headers.access_token = accessToken;
    }

    let body: unknown;
    try {
      const response = await this.http.get<unknown>(path, { headers, signal, responseType: 'json' });
      body = response.data;
    } catch (error) {
      throw classifyTransportError(error, path);
    }
    return unwrapEnvelope(body, path);
  }
}

function classifyTransportError(error: unknown, path: string): FetchError {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const message = `GET ${path} failed: ${error.message}`;
    if (status === 401 || status === 403) return new AuthError(message, undefined, { cause: error });
    if (status === 404) return new NotFoundError(message, undefined, { cause: error });
    if (status === 429) return new RateLimitedError(message, undefined, { cause: error });
    return new NetworkError(message, undefined, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(`GET ${path} failed: ${message}`, undefined, { cause: error });
}

/**
 * @hebrew מחלץ את `result` ממעטפת התגובה `{ success, result, code, msg }` או זורק שגיאה מסווגת.
 */
export function unwrapEnvelope(body: unknown, path: string): unknown {
  if (!isRecord(body) || typeof body.success !== 'boolean') {
    throw new MalformedResponseError(`GET ${path} returned an unexpected body`);
  }
  if (body.success) {
    return body.result;
  }

  const code = typeof body.code === 'number' ? body.code : Number(body.code);
  const message = `GET ${path} failed with code ${String(body.code)}: ${typeof body.msg === 'string' ? body.msg : 'no message'}`;
  if (AUTH_ERROR_CODES.has(code)) {
    throw new AuthError(message);
  }
  if (NOT_FOUND_ERROR_CODES.has(code)) {
    throw new NotFoundError(message);
  }
  throw new NetworkError(message);
}
