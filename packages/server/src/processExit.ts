/**
 * @hebrew לוגר שאפשר לסגור ולחכות שהטרנספורטים שלו יסיימו לכתוב (winston.Logger).
 */
export interface FlushableLogger {
  once(event: 'finish', listener: () => void): unknown;
  end(): unknown;
}

export interface ExitAfterLoggingOptions {
  exit?: (code: number) => void;
  /**
   * @hebrew כמה זמן לחכות לטרנספורט תקוע (למשל Logtail בלי רשת) לפני שיוצאים בכל זאת.
   * @default 3000
   */
  timeoutMs?: number;
}

/**
 * @hebrew סוגר את הלוגר ויוצא מהתהליך רק אחרי שהרשומות האחרונות נכתבו,
 * או אחרי `timeoutMs`, המוקדם מביניהם.
 */
export function exitAfterLogging(logger: FlushableLogger, code: number, options?: ExitAfterLoggingOptions): void {
  const exit = options?.exit ?? ((exitCode: number) => process.exit(exitCode));
  let exited = false;
  const exitOnce = () => {
    if (exited) {
      return;
    }
    exited = true;
    clearTimeout(timer);
    exit(code);
  };

  const timer = setTimeout(exitOnce, options?.timeoutMs ?? 3000);
  logger.once('finish', exitOnce);
  logger.end();
}
