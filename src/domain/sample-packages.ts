import type { WorkoutPackage } from './workout.js';

export const SAMPLE_PACKAGES: readonly WorkoutPackage[] = [
  ['SWM', [720, 1, 80, 25, 40]],
  ['RUN', [15000, 1, 75]],
  ['WLK', [9000, 1, 75, 180]]
];
