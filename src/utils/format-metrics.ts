import type { Metrics } from '../domain/workout.js';
import { CONFIG, type Locale } from '../config.js';

// Plain fixed-point at any magnitude; exact binary ties round half to even.
const FIXED3 = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 3,
  maximumFractionDigits: 3,
  useGrouping: false,
  roundingMode: 'halfEven'
});

const fixed3 = (value: number): string => FIXED3.format(value);

const TEMPLATES: Record<Locale, (m: Metrics) => string> = {
  ru: (m) =>
    `Тип тренировки: ${m.trainingType}; ` +
    `Длительность: ${fixed3(m.durationHours)} ч.; ` +
    `Дистанция: ${fixed3(m.distanceKm)} км; ` +
    `Ср. скорость: ${fixed3(m.meanSpeedKmh)} км/ч; ` +
    `Потрачено ккал: ${fixed3(m.caloriesKcal)}.`,
  en: (m) =>
    `Training type: ${m.trainingType}; ` +
    `Duration: ${fixed3(m.durationHours)} h; ` +
    `Distance: ${fixed3(m.distanceKm)} km; ` +
    `Avg. speed: ${fixed3(m.meanSpeedKmh)} km/h; ` +
    `Calories burned: ${fixed3(m.caloriesKcal)}.`
};

export function renderMetrics(metrics: Metrics, locale: Locale = CONFIG.locale): string {
  return TEMPLATES[locale](metrics);
}
