import 'dotenv/config';

export type Locale = 'ru' | 'en';
export type LogLevel = 'info' | 'error';

const pick = <T extends string>(key: string, allowed: readonly T[], fallback: T): T => {
  const val = process.env[key];
  const match = allowed.find((a) => a === val);
  return match ?? fallback;
};

export const CONFIG = {
  locale: pick<Locale>('WORKOUT_LOCALE', ['ru', 'en'], 'ru'),
  logLevel: pick<LogLevel>('LOG_LEVEL', ['info', 'error'], 'info')
};
