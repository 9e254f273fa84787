// מחלקות השגיאה של שליפת טלמטריה. כל סוג מייצג מדיניות שונה בצד המתזמן.

export type FetchErrorKind = 'auth' | 'network' | 'not_found' | 'malformed_response' | 'rate_limited';

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly deviceId?: string;

  constructor(kind: FetchErrorKind, message: string, deviceId?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FetchError';
    this.kind = kind;
    this.deviceId = deviceId;
  }
}

// פרטי גישה שגויים או טוקן שפג. קטלני בעלייה, מתמשך בזמן תשאול.
export class AuthError extends FetchError {
  constructor(message: string, deviceId?: string, options?: { cause?: unknown }) {
    super('auth', message, deviceId, options);
    this.name = 'AuthError';
  }
}

export class NetworkError extends FetchError {
  constructor(message: string, deviceId?: string, options?: { cause?: unknown }) {
    super('network', message, deviceId, options);
    this.name = 'NetworkError';
  }
}

// ההתקן הוסר מהחשבון בענן
export class NotFoundError extends FetchError {
  constructor(message: string, deviceId?: string, options?: { cause?: unknown }) {
    super('not_found', message, deviceId, options);
    this.name = 'NotFoundError';
  }
}

export class MalformedResponseError extends FetchError {
  constructor(message: string, deviceId?: string, options?: { cause?: unknown }) {
    super('malformed_response', message, deviceId, options);
    this.name = 'MalformedResponseError';
  }
}

export class RateLimitedError extends FetchError {
  constructor(message: string, deviceId?: string, options?: { cause?: unknown }) {
    super('rate_limited', message, deviceId, options);
    this.name = 'RateLimitedError';
  }
}

export function createFetchError(
  kind: FetchErrorKind,
  message: string,
  deviceId?: string,
  options?: { cause?: unknown },
): FetchError {
  switch (kind) {
    case 'auth':
      return new AuthError(message, deviceId, options);
    case 'network':
      return new NetworkError(message, deviceId, options);
    case 'not_found':
      return new NotFoundError(message, deviceId, options);
    case 'malformed_response':
      return new MalformedResponseError(message, deviceId, options);
    case 'rate_limited':
      return new RateLimitedError(message, deviceId, options);
  }
}

/**
 * @hebrew ממיר כל שגיאה ל-FetchError שמשויך להתקן.
 * שגיאה שאינה FetchError (באג, ביטול) נחשבת לתקלת רשת חולפת.
 */
export function toFetchError(error: unknown, deviceId: string): FetchError {
  if (error instanceof FetchError) {
    if (error.deviceId === deviceId) {
      return error;
    }
    return createFetchError(error.kind, error.message, deviceId, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(message, deviceId, { cause: error });
}
