import * as winston from 'winston';
import { Logtail } from '@logtail/node';
import { LogtailTransport } from '@logtail/winston';
import type { ILogtailLog } from '@logtail/types';

/*
```sh
LOG_LEVEL=debug LOG_MODULES=PollScheduler,TelemetryFetcher npm start
```
*/

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

const logLevels: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

// winston.Logger עם המתודות של הרמות המותאמות (trace וכו')
export type ModuleLogger = winston.Logger & {
  [level in LogLevel]: winston.LeveledLogMethod;
};

const logColors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  debug: 'blue',
  trace: 'magenta',
};

winston.addColors(logColors);

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

// --- פורמטים ---

const splitModuleList = (value: string): string[] =>
  value.split(',').map(m => m.trim()).filter(m => m);

// הסתרת מודולים לפי LOG_HIDE_MODULES
const hideByModuleNameFormat = winston.format((info) => {
  const logHideModulesEnv = process.env.LOG_HIDE_MODULES;
  if (logHideModulesEnv && logHideModulesEnv.trim() !== '' && typeof info.label === 'string') {
    if (splitModuleList(logHideModulesEnv).includes(info.label)) {
      return false;
    }
  }
  return info;
});

// הצגה סלקטיבית לפי LOG_MODULES ("*" או ריק = הכל)
const filterByModuleNameFormat = winston.format((info) => {
  const logModulesEnv = process.env.LOG_MODULES;
  if (!logModulesEnv || logModulesEnv.trim() === '' || logModulesEnv.trim() === '*') {
    return info;
  }
  if (typeof info.label === 'string') {
    const allowedModules = splitModuleList(logModulesEnv);
    if (allowedModules.length > 0 && !allowedModules.includes(info.label)) {
      return false;
    }
  }
  return info;
});

/**
 * ממיר את המטא-דאטה של רשומת לוג למחרוזת `key=value`.
 * שגיאות מודפסות עם ה-stack שלהן, ואובייקטים דמויי שגיאה (עם code/errno וכו') בצורה מקוצרת.
 */
export function formatLogMetadata(metadata: Record<string, unknown>): string {
  const entries = Object.entries(metadata);
  if (entries.length === 0) {
    return '';
  }

  const metaString = entries
    .map(([key, value]) => {
      if (value instanceof Error) {
        return `${key}=${value.name}: ${value.message}${value.stack ? `\nStack: ${value.stack}` : ''}`;
      }
      if (typeof value === 'object' && value !== null &&
          ('code' in value || 'errno' in value || 'syscall' in value)) {
        const parts: string[] = [];
        for (const field of ['message', 'code', 'errno', 'syscall', 'address', 'port'] as const) {
          if (field in value) {
            parts.push(`${field}: ${JSON.stringify(Reflect.get(value, field))}`);
          }
        }
        return `${key}=PotentialError: { ${parts.join(', ')} }`;
      }
      try {
        return `${key}=${JSON.stringify(value)}`;
      } catch {
        return `${key}=[UnstringifiableObject]`;
      }
    })
    .join(' ');

  return metaString ? ` ${metaString}` : '';
}

// שדות ש-winston מוסיף בעצמו ואין להדפיס אותם כמטא-דאטה
function splitInfo(info: winston.Logform.TransformableInfo): { stack?: unknown; meta: Record<string, unknown> } {
  const {
    level, message, timestamp, label,
    module: _module, environment: _environment,
    stack,
    ...meta
  } = info;
  return { stack, meta };
}

function formatLine(info: winston.Logform.TransformableInfo, levelString: string): string {
  let line = `${String(info.timestamp)} [${String(info.environment).toUpperCase()}] [${levelString}]`;
  if (typeof info.module === 'string') {
    line += ` (${info.module})`;
  }
  line += `: ${String(info.message)}`;

  const { stack, meta } = splitInfo(info);
  line += formatLogMetadata(meta);
  if (typeof stack === 'string') {
    line += `\n${stack}`;
  }
  return line;
}

// פורמט טקסט ללא צבעים (לקובץ)
export const fileFormat = () => winston.format.combine(
  hideByModuleNameFormat(),
  filterByModuleNameFormat(),
  winston.format.printf((info) => {
    const originalLevel = info[Symbol.for('level')];
    const levelString = typeof originalLevel === 'string' ? originalLevel.toUpperCase() : 'UNKNOWN_LEVEL';
    return formatLine(info, levelString);
  }),
);

export const consoleFormat = () => winston.format.combine(
  hideByModuleNameFormat(),
  filterByModuleNameFormat(),
  winston.format.printf((info) => formatLine(info, info.level.toUpperCase())),
  winston.format.colorize({ colors: logColors, message: true, level: true, all: true }),
);

// --- טרנספורטים ---

function setupLogtailTransport(moduleName: string, environment: string): winston.transport | null {
  const logtailSourceToken = process.env.LOGTAIL_SOURCE_TOKEN;
  const logtailIngestingHost = process.env.LOGTAIL_INGESTING_HOST;
  const logToLogtail = process.env.LOG_TO_LOGTAIL === 'true';

  if (!logToLogtail) {
    return null;
  }
  if (!logtailSourceToken || !logtailIngestingHost) {
    console.warn(`[LoggerSetup] LOG_TO_LOGTAIL=true but LOGTAIL_SOURCE_TOKEN or LOGTAIL_INGESTING_HOST is missing. Logtail is disabled for module: ${moduleName}.`);
    return null;
  }

  try {
    const logtail = new Logtail(logtailSourceToken, {
      endpoint: `https://${logtailIngestingHost}`,
    });

    const envLocation = process.env.ENV_LOCATION;

    // Logtail לא מכיר את רמת trace, ממפים אותה ל-debug ושומרים את המקור
    async function addCustomContext(log: ILogtailLog): Promise<ILogtailLog> {
      const withContext: ILogtailLog = { ...log };
      Reflect.set(withContext, 'environment', environment);
      if (envLocation) {
        Reflect.set(withContext, 'env_location', envLocation);
      }
      if (Reflect.get(withContext, 'level') === 'trace') {
        Reflect.set(withContext, 'original_level', 'trace');
        Reflect.set(withContext, 'level', 'debug');
      }
      return withContext;
    }

    logtail.use(addCustomContext);
    return new LogtailTransport(logtail);
  } catch (error) {
    console.warn(`[LoggerSetup] Failed to initialize Logtail transport for module: ${moduleName}.`, error);
    return null;
  }
}

// כל הלוגרים שנוצרו, כדי ש-setLogLevel יחול גם על לוגרים שנוצרו לפני טעינת התצורה
const moduleLoggers = new Set<ModuleLogger>();
let levelOverride: LogLevel | null = null;

function initialLevel(): LogLevel {
  if (levelOverride) {
    return levelOverride;
  }
  const fromEnv = process.env.LOG_LEVEL?.trim().toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

function isModuleLogger(logger: winston.Logger): logger is ModuleLogger {
  return LOG_LEVELS.every(level => typeof Reflect.get(logger, level) === 'function');
}

export const createModuleLogger = (moduleName: string): ModuleLogger => {
  const environment = process.env.NODE_ENV || 'unknown';
  const logToFile = process.env.LOG_TO_FILE === 'true';
  const activeTransports: winston.transport[] = [];

  if (process.env.LOG_TO_CONSOLE === 'true' || process.env.LOG_TO_CONSOLE === undefined) {
    activeTransports.push(new winston.transports.Console({ format: consoleFormat() }));
  }

  if (logToFile) {
    activeTransports.push(new winston.transports.File({
      filename: process.env.LOG_FILE_PATH || 'logs/exporter.log',
      format: fileFormat(),
      maxsize: 5242880, // 5MB
      maxFiles: 5,
      tailable: true,
    }));
  }

  const logtailTransport = setupLogtailTransport(moduleName, environment);
  if (logtailTransport) {
    activeTransports.push(logtailTransport);
  }

  // winston מתלונן על לוגר ללא טרנספורטים
  if (activeTransports.length === 0) {
    activeTransports.push(new winston.transports.Console({ silent: true }));
  }

  const logger = winston.createLogger({
    level: initialLevel(),
    levels: logLevels,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format((info) => {
        info.environment = environment;
        info.module = moduleName;
        info.label = moduleName; // המסננים לפי מודול עובדים על label
        return info;
      })(),
      winston.format.errors({ stack: true }),
    ),
    transports: activeTransports,
    exceptionHandlers: logToFile
      ? [new winston.transports.File({ filename: process.env.LOG_EXCEPTIONS_PATH || 'logs/exceptions.log', format: fileFormat() })]
      : undefined,
    rejectionHandlers: logToFile
      ? [new winston.transports.File({ filename: process.env.LOG_REJECTIONS_PATH || 'logs/rejections.log', format: fileFormat() })]
      : undefined,
    exitOnError: false,
  });

  if (!isModuleLogger(logger)) {
    throw new Error(`Logger for module ${moduleName} is missing custom level methods`);
  }
  moduleLoggers.add(logger);
  return logger;
};

/**
 * קובע את סף הלוג לכל הלוגרים הקיימים ולאלה שייווצרו בהמשך.
 */
export function setLogLevel(level: LogLevel): void {
  levelOverride = level;
  for (const logger of moduleLoggers) {
    logger.level = level;
  }
}

export default createModuleLogger;
