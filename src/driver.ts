import { readPackage } from './engine/workout-factory.js';
import { summarize } from './engine/workout-metrics.js';
import { renderMetrics } from './utils/format-metrics.js';
import { logError, logInfo } from './utils/logger.js';
import type { Locale } from './config.js';

export type RawPackage = readonly [workoutType: string, params: readonly number[]];

export function runPackages(
  packages: readonly RawPackage[],
  write: (line: string) => void,
  locale?: Locale
): string[] {
  const lines: string[] = [];
  for (const [workoutType, params] of packages) {
    const workout = readPackage(workoutType, params);
    const metrics = summarize(workout);
    const line = renderMetrics(metrics, locale);
    logInfo('workout processed', { workoutType, calories: metrics.caloriesKcal });
    write(line);
    lines.push(line);
  }
  return lines;
}

export function main(packages: readonly RawPackage[], write: (line: string) => void): void {
  try {
    runPackages(packages, write);
  } catch (err) {
    logError('workout processing failed', { err });
    process.exitCode = 1;
  }
}
