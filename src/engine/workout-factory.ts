import type { ZodIssue } from 'zod';
import {
  isWorkoutCode,
  type WorkoutCode,
  type WorkoutParamsByCode,
  type WorkoutRecord
} from '../domain/workout.js';
import {
  PARAM_FIELDS,
  RunningParamsSchema,
  SportsWalkingParamsSchema,
  SwimmingParamsSchema
} from '../domain/schemas.js';
import { InvalidWorkoutParamsError, UnknownWorkoutTypeError, WorkoutArityError } from './errors.js';

function zipParams(fields: readonly string[], params: readonly number[]): Record<string, number> {
  const named: Record<string, number> = {};
  fields.forEach((field, idx) => {
    named[field] = params[idx];
  });
  return named;
}

function invalid(code: WorkoutCode, issues: ZodIssue[]): never {
  throw new InvalidWorkoutParamsError(code, issues);
}

/**
 * Builds a workout from a raw sensor package.
 * `params` are positional, in the order listed in PARAM_FIELDS for the code.
 */
export function readPackage(workoutType: string, params: readonly number[]): WorkoutRecord {
  if (!isWorkoutCode(workoutType)) throw new UnknownWorkoutTypeError(workoutType);

  const fields = PARAM_FIELDS[workoutType];
  if (params.length !== fields.length) {
    throw new WorkoutArityError(workoutType, fields, params.length);
  }
  const named = zipParams(fields, params);

  switch (workoutType) {
    case 'RUN': {
      const res = RunningParamsSchema.safeParse(named);
      return res.success ? { code: 'RUN', ...res.data } : invalid(workoutType, res.error.issues);
    }
    case 'WLK': {
      const res = SportsWalkingParamsSchema.safeParse(named);
      return res.success ? { code: 'WLK', ...res.data } : invalid(workoutType, res.error.issues);
    }
    case 'SWM': {
      const res = SwimmingParamsSchema.safeParse(named);
      return res.success ? { code: 'SWM', ...res.data } : invalid(workoutType, res.error.issues);
    }
  }
}

export function createWorkout<C extends WorkoutCode>(code: C, params: WorkoutParamsByCode[C]): WorkoutRecord {
  return readPackage(code, params);
}
