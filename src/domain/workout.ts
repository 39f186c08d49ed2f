export type WorkoutCode = 'RUN' | 'WLK' | 'SWM';

export const WORKOUT_CODES: readonly WorkoutCode[] = ['RUN', 'WLK', 'SWM'];

interface WorkoutBase {
  action: number; // steps or strokes
  durationHours: number;
  weightKg: number;
}

export interface RunningWorkout extends WorkoutBase {
  code: 'RUN';
}

export interface SportsWalkingWorkout extends WorkoutBase {
  code: 'WLK';
  heightCm: number;
}

export interface SwimmingWorkout extends WorkoutBase {
  code: 'SWM';
  poolLengthM: number;
  poolLaps: number;
}

export type WorkoutRecord = RunningWorkout | SportsWalkingWorkout | SwimmingWorkout;

// Positional order of the raw sensor package for each code.
export interface WorkoutParamsByCode {
  RUN: readonly [action: number, durationHours: number, weightKg: number];
  WLK: readonly [action: number, durationHours: number, weightKg: number, heightCm: number];
  SWM: readonly [action: number, durationHours: number, weightKg: number, poolLengthM: number, poolLaps: number];
}

export type WorkoutPackage = {
  [C in WorkoutCode]: readonly [code: C, params: WorkoutParamsByCode[C]];
}[WorkoutCode];

export interface Metrics {
  readonly trainingType: string;
  readonly durationHours: number;
  readonly distanceKm: number;
  readonly meanSpeedKmh: number;
  readonly caloriesKcal: number;
}

export function isWorkoutCode(value: string): value is WorkoutCode {
  return WORKOUT_CODES.some((c) => c === value);
}
