import type { Metrics, WorkoutRecord } from '../domain/workout.js';
import { CaloriesNotImplementedError } from './errors.js';
import { CALORIE_COEF, DISPLAY_NAME, MIN_IN_HOUR, M_IN_KM, STEP_LENGTH_M } from './constants.js';

export function distanceKm(w: WorkoutRecord): number {
  return (w.action * STEP_LENGTH_M[w.code]) / M_IN_KM;
}

export function meanSpeedKmh(w: WorkoutRecord): number {
  if (w.code === 'SWM') {
    return (w.poolLengthM * w.poolLaps) / M_IN_KM / w.durationHours;
  }
  return distanceKm(w) / w.durationHours;
}

export function spentCalories(w: WorkoutRecord): number {
  const speed = meanSpeedKmh(w);
  const durationMin = w.durationHours * MIN_IN_HOUR;

  switch (w.code) {
    case 'RUN': {
      const { speedMultiplier, speedShift } = CALORIE_COEF.RUN;
      return ((speedMultiplier * speed - speedShift) * w.weightKg / M_IN_KM) * durationMin;
    }
    case 'WLK': {
      const { weightMultiplier, heightTermMultiplier } = CALORIE_COEF.WLK;
      // Floor division: the term stays 0 until speed² reaches heightCm.
      const heightTerm = Math.floor(speed ** 2 / w.heightCm);
      return (weightMultiplier * w.weightKg + heightTerm * heightTermMultiplier * w.weightKg) * durationMin;
    }
    case 'SWM': {
      const { speedShift, weightMultiplier } = CALORIE_COEF.SWM;
      return (speed + speedShift) * weightMultiplier * w.weightKg;
    }
    default: {
      const unhandled: never = w;
      throw new CaloriesNotImplementedError(describeTag(unhandled));
    }
  }
}

function describeTag(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'code' in value) return String(value.code);
  return String(value);
}

export function summarize(w: WorkoutRecord): Metrics {
  return Object.freeze({
    trainingType: DISPLAY_NAME[w.code],
    durationHours: w.durationHours,
    distanceKm: distanceKm(w),
    meanSpeedKmh: meanSpeedKmh(w),
    caloriesKcal: spentCalories(w)
  });
}
