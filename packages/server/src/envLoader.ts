import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

// קובץ .env בשורש הריפו
const parentEnvPath = path.resolve(moduleDir, '../../../.env');

// קובץ .env מקומי של חבילת השרת (packages/server/.env)
const localEnvPath = path.resolve(moduleDir, '../.env');

const loadEnvFile = (filePath: string, override: boolean = false) => {
  if (!fs.existsSync(filePath)) {
    return;
  }
  const result = dotenv.config({ path: filePath, override });
  if (result.error) {
    console.warn(`[EnvLoader] Error loading .env file from ${filePath}:`, result.error.message);
  }
};

// 1. קובץ השורש הוא הבסיס, בלי override
loadEnvFile(parentEnvPath);

// 2. הקובץ המקומי דורס ערכים זהים מקובץ השורש
loadEnvFile(localEnvPath, true);

export type ProcessedEnv = Record<string, string | number | undefined>;

/**
 * בודק אם מחרוזת ניתנת להמרה למספר ללא איבוד מידע
 * ("1" ו-"1.0" כן, "0x10", "1e400" ו-"" לא).
 */
export function isStringLosslesslyNumeric(value: unknown): value is string {
  if (typeof value !== 'string' || value.trim() === '') {
    return false;
  }
  const num = Number(value);
  if (!isFinite(num)) {
    return false;
  }
  return String(num) === value || num === parseFloat(value);
}

/**
 * מעבד את משתני הסביבה וממיר ערכים מספריים למספרים.
 * יש להשתמש בתוצאה במקום לגשת ישירות ל-process.env.
 */
export const getProcessedEnv = (source: NodeJS.ProcessEnv = process.env): ProcessedEnv => {
  const processed: ProcessedEnv = {};
  for (const [key, value] of Object.entries(source)) {
    processed[key] = isStringLosslesslyNumeric(value) ? Number(value) : value;
  }
  return processed;
};
