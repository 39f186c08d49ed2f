import type { ZodIssue } from 'zod';

export type WorkoutErrorCode =
  | 'UNKNOWN_WORKOUT_TYPE'
  | 'WORKOUT_ARITY'
  | 'INVALID_WORKOUT_PARAMS'
  | 'CALORIES_NOT_IMPLEMENTED';

export class WorkoutError extends Error {
  readonly code: WorkoutErrorCode;

  constructor(code: WorkoutErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnknownWorkoutTypeError extends WorkoutError {
  constructor(readonly workoutType: string) {
    super('UNKNOWN_WORKOUT_TYPE', `${workoutType} - неизвестный тип тренировки.`);
  }
}

export class WorkoutArityError extends WorkoutError {
  constructor(
    readonly workoutType: string,
    readonly expected: readonly string[],
    readonly received: number
  ) {
    super(
      'WORKOUT_ARITY',
      `${workoutType}: ожидаются поля (${expected.join(', ')}), получено значений: ${received}.`
    );
  }
}

export class InvalidWorkoutParamsError extends WorkoutError {
  constructor(readonly workoutType: string, readonly issues: ZodIssue[]) {
    const details = issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    super('INVALID_WORKOUT_PARAMS', `${workoutType}: некорректные данные датчиков (${details}).`);
  }
}

export class CaloriesNotImplementedError extends WorkoutError {
  constructor(readonly workoutType: string) {
    super('CALORIES_NOT_IMPLEMENTED', `Для тренировки ${workoutType} не определён расчёт калорий!`);
  }
}
