import { z } from 'zod';
import type { WorkoutCode } from './workout.js';

const action = z.number().int().nonnegative();
const durationHours = z.number().positive().finite();
const weightKg = z.number().positive().finite();

export const RunningParamsSchema = z.object({
  action,
  durationHours,
  weightKg
});

export const SportsWalkingParamsSchema = z.object({
  action,
  durationHours,
  weightKg,
  heightCm: z.number().positive().finite()
});

export const SwimmingParamsSchema = z.object({
  action,
  durationHours,
  weightKg,
  poolLengthM: z.number().positive().finite(),
  poolLaps: z.number().int().nonnegative()
});

export const PARAM_FIELDS = {
  RUN: ['action', 'durationHours', 'weightKg'],
  WLK: ['action', 'durationHours', 'weightKg', 'heightCm'],
  SWM: ['action', 'durationHours', 'weightKg', 'poolLengthM', 'poolLaps']
} as const satisfies Record<WorkoutCode, readonly string[]>;
