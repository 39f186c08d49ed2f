import { describe, it, expect } from 'vitest';
import { renderMetrics } from '../src/utils/format-metrics.js';
import { summarize } from '../src/engine/workout-metrics.js';
import { readPackage } from '../src/engine/workout-factory.js';

const metrics = {
  trainingType: 'Swimming',
  durationHours: 1,
  distanceKm: 0.9935999999999999,
  meanSpeedKmh: 1,
  caloriesKcal: 336
};

describe('metrics formatter', () => {
  it('renders russian line with three decimals', () => {
    expect(renderMetrics(metrics, 'ru')).toBe(
      'Тип тренировки: Swimming; Длительность: 1.000 ч.; Дистанция: 0.994 км; ' +
      'Ср. скорость: 1.000 км/ч; Потрачено ккал: 336.000.'
    );
  });

  it('renders english line in the same order', () => {
    expect(renderMetrics(metrics, 'en')).toBe(
      'Training type: Swimming; Duration: 1.000 h; Distance: 0.994 km; ' +
      'Avg. speed: 1.000 km/h; Calories burned: 336.000.'
    );
  });

  it('keeps three decimals for large values', () => {
    const line = renderMetrics({ ...metrics, caloriesKcal: 12345.6789 }, 'en');
    expect(line.endsWith('Calories burned: 12345.679.')).toBe(true);
  });

  it('never switches to exponent notation', () => {
    const line = renderMetrics({ ...metrics, caloriesKcal: 1e21 }, 'ru');
    expect(line.endsWith('Потрачено ккал: 1000000000000000000000.000.')).toBe(true);
  });

  it('renders huge computed calories in fixed point', () => {
    const line = renderMetrics(summarize(readPackage('RUN', [15000, 1, 1e22])), 'ru');
    expect(line).toMatch(/Потрачено ккал: \d+\.\d{3}\.$/);
  });

  it('rounds exact ties half to even', () => {
    const line = renderMetrics({ ...metrics, durationHours: 0.0625 }, 'ru');
    expect(line).toContain('Длительность: 0.062 ч.;');
    expect(renderMetrics({ ...metrics, durationHours: 0.1875 }, 'en')).toContain('Duration: 0.188 h;');
  });
});
