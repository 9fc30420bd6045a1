import { describe, it, expect } from 'vitest';
import { validateFreeTimeQuery, FreeTimeQueryInput } from './validation.js';
import {
  InvalidBufferError,
  InvalidDateError,
  InvalidRangeError,
  InvalidWorkingHoursError
} from './errors.js';

const createInput = (overrides: Partial<FreeTimeQueryInput> = {}): FreeTimeQueryInput => ({
  startDate: '2025-01-20',
  endDate: '2025-01-23',
  workStartHour: 9,
  workEndHour: 17,
  bufferBefore: 0,
  bufferAfter: 0,
  ...overrides
});

describe('validateFreeTimeQuery', () => {
  it('should accept a valid query and fill in defaults', () => {
    expect(validateFreeTimeQuery(createInput({ bufferBefore: 15 }))).toEqual({
      success: true,
      query: {
        startDate: new Date(2025, 0, 20),
        endDate: new Date(2025, 0, 23),
        workStartHour: 9,
        workEndHour: 17,
        bufferBefore: 15,
        bufferAfter: 0,
        minimumSlotMinutes: 0,
        skipWeekends: false,
        ignoreAllDay: false
      }
    });
  });

  it('should accept a single-day range and a window ending at midnight', () => {
    const result = validateFreeTimeQuery(createInput({ endDate: '2025-01-20', workStartHour: 0, workEndHour: 24 }));
    expect(result.success).toBe(true);
  });

  it('should reject a start date after the end date', () => {
    const result = validateFreeTimeQuery(createInput({ startDate: '2025-01-24' }));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(InvalidRangeError);
      expect(result.error.message).toBe('Start date must be before end date.');
      expect(result.error.code).toBe('INVALID_RANGE');
    }
  });

  it('should reject ranges longer than the limit', () => {
    const result = validateFreeTimeQuery(createInput({ endDate: '2025-01-29' }), { maxRangeDays: 7 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(InvalidRangeError);
      expect(result.error.message).toBe('Date range is too long: 10 days (max 7)');
    }
  });

  it('should reject malformed dates', () => {
    const result = validateFreeTimeQuery(createInput({ endDate: '01/23/2025' }));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(InvalidDateError);
      expect(result.error.message).toBe('End date must be in YYYY-MM-DD format: 01/23/2025');
    }
  });

  it.each([
    [17, 9, 'Start time must be before end time.'],
    [9, 9, 'Start time must be before end time.'],
    [-1, 17, 'Working hours must be between 0 and 24.'],
    [9, 25, 'Working hours must be between 0 and 24.'],
    [9.5, 17, 'Working hours must be whole hours.'],
    [Number.NaN, 17, 'Working hours must be whole hours.']
  ])('should reject working hours %s-%s', (workStartHour, workEndHour, message) => {
    const result = validateFreeTimeQuery(createInput({ workStartHour, workEndHour }));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(InvalidWorkingHoursError);
      expect(result.error.message).toBe(message);
    }
  });

  it('should reject negative buffers', () => {
    const result = validateFreeTimeQuery(createInput({ bufferAfter: -15 }));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(InvalidBufferError);
      expect(result.error.message).toBe('Buffer after must be a non-negative number of minutes: -15');
    }
  });

  it('should accept buffers outside the usual choices', () => {
    expect(validateFreeTimeQuery(createInput({ bufferBefore: 7, bufferAfter: 90 })).success).toBe(true);
  });
});
