import { differenceInCalendarDays } from 'date-fns';
import { FreeTimeQuery } from '../types/calendar.js';
import { parseDateInput } from './date.js';
import {
  InvalidBufferError,
  InvalidDateError,
  InvalidRangeError,
  InvalidWorkingHoursError
} from './errors.js';

export const DEFAULT_MAX_RANGE_DAYS = 62;

export interface FreeTimeQueryInput {
  startDate: string | Date;
  endDate: string | Date;
  workStartHour: number;
  workEndHour: number;
  bufferBefore: number;
  bufferAfter: number;
  minimumSlotMinutes?: number;
  skipWeekends?: boolean;
  ignoreAllDay?: boolean;
}

export type QueryValidationError =
  | InvalidDateError
  | InvalidRangeError
  | InvalidWorkingHoursError
  | InvalidBufferError;

export type QueryValidationResult =
  | { success: true; query: FreeTimeQuery }
  | { success: false; error: QueryValidationError };

function resolveDate(value: string | Date, label: string): Date | InvalidDateError {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime())
      ? new InvalidDateError(`${label} is not a valid date`)
      : value;
  }
  return parseDateInput(value) ?? new InvalidDateError(`${label} must be in YYYY-MM-DD format: ${value}`);
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * 空き時間検索の入力を検証する
 * エンジン側では再検証しないので、呼び出し前に必ず通すこと
 */
export function validateFreeTimeQuery(
  input: FreeTimeQueryInput,
  options: { maxRangeDays?: number } = {}
): QueryValidationResult {
  const maxRangeDays = options.maxRangeDays ?? DEFAULT_MAX_RANGE_DAYS;

  const startDate = resolveDate(input.startDate, 'Start date');
  if (startDate instanceof InvalidDateError) {
    return { success: false, error: startDate };
  }
  const endDate = resolveDate(input.endDate, 'End date');
  if (endDate instanceof InvalidDateError) {
    return { success: false, error: endDate };
  }

  if (startDate > endDate) {
    return { success: false, error: new InvalidRangeError('Start date must be before end date.') };
  }
  const days = differenceInCalendarDays(endDate, startDate) + 1;
  if (days > maxRangeDays) {
    return {
      success: false,
      error: new InvalidRangeError(`Date range is too long: ${days} days (max ${maxRangeDays})`)
    };
  }

  const { workStartHour, workEndHour } = input;
  if (!Number.isInteger(workStartHour) || !Number.isInteger(workEndHour)) {
    return { success: false, error: new InvalidWorkingHoursError('Working hours must be whole hours.') };
  }
  if (workStartHour < 0 || workEndHour > 24) {
    return { success: false, error: new InvalidWorkingHoursError('Working hours must be between 0 and 24.') };
  }
  if (workStartHour >= workEndHour) {
    return { success: false, error: new InvalidWorkingHoursError('Start time must be before end time.') };
  }

  const minimumSlotMinutes = input.minimumSlotMinutes ?? 0;
  const buffers: Array<[string, number]> = [
    ['Buffer before', input.bufferBefore],
    ['Buffer after', input.bufferAfter],
    ['Minimum slot length', minimumSlotMinutes]
  ];
  for (const [label, value] of buffers) {
    if (!isNonNegativeInteger(value)) {
      return {
        success: false,
        error: new InvalidBufferError(`${label} must be a non-negative number of minutes: ${value}`)
      };
    }
  }

  return {
    success: true,
    query: {
      startDate,
      endDate,
      workStartHour,
      workEndHour,
      bufferBefore: input.bufferBefore,
      bufferAfter: input.bufferAfter,
      minimumSlotMinutes,
      skipWeekends: input.skipWeekends ?? false,
      ignoreAllDay: input.ignoreAllDay ?? false
    }
  };
}
