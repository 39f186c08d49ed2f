import type { WorkoutCode } from '../domain/workout.js';

export const M_IN_KM = 1000;
export const MIN_IN_HOUR = 60;

export const STEP_LENGTH_M: Record<WorkoutCode, number> = {
  RUN: 0.65,
  WLK: 0.65,
  SWM: 1.38
};

export const DISPLAY_NAME: Record<WorkoutCode, string> = {
  RUN: 'Running',
  WLK: 'SportsWalking',
  SWM: 'Swimming'
};

export const CALORIE_COEF = {
  RUN: { speedMultiplier: 18, speedShift: 20 },
  WLK: { weightMultiplier: 0.035, heightTermMultiplier: 0.029 },
  SWM: { speedShift: 1.1, weightMultiplier: 2 }
} as const;
