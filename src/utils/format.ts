import chalk from 'chalk';
import { format } from 'date-fns';
import { FreeTimeQuery, FreeTimesByDate, TimeSlot } from '../types/calendar.js';
import { parseDateInput, toDateKey } from './date.js';
import { totalFreeMinutes } from './availability.js';

/**
 * 9a, 10:30a, 12p のような短い12時間表記
 */
export function formatCompactTime(date: Date): string {
  const hour = Number(format(date, 'h'));
  const minutes = format(date, 'mm');
  const ampm = format(date, 'a').toLowerCase()[0];

  return minutes !== '00' ? `${hour}:${minutes}${ampm}` : `${hour}${ampm}`;
}

export function formatSlot(slot: TimeSlot): string {
  return `${formatCompactTime(slot.start)}-${formatCompactTime(slot.end)}`;
}

export function formatSlots(slots: TimeSlot[]): string {
  return slots.map(formatSlot).join(', ');
}

// M/D (Mon)
export function formatDateLabel(date: Date): string {
  return `${format(date, 'M/d')} (${format(date, 'EEE')})`;
}

export function formatDayLine(date: Date, slots: TimeSlot[], timezoneLabel: string): string {
  const label = chalk.bold(formatDateLabel(date));
  if (slots.length === 0) {
    return `${label}: ${chalk.gray('No free time slots available')}`;
  }
  const suffix = timezoneLabel ? ` ${timezoneLabel}` : '';
  return `${label}: ${chalk.green(formatSlots(slots))}${suffix}`;
}

export function formatDuration(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  if (hours === 0) return `${rest}m`;
  return rest === 0 ? `${hours}h` : `${hours}h ${rest}m`;
}

/**
 * 日付キー (yyyy-MM-dd) を Date に戻す
 */
export function dateFromKey(key: string): Date {
  const date = parseDateInput(key);
  if (!date) {
    throw new Error(`Invalid date key: ${key}`);
  }
  return date;
}

export interface FreeTimesJson {
  success: true;
  source: string;
  timezoneLabel: string;
  workingHours: { start: number; end: number };
  buffer: { before: number; after: number };
  days: Array<{
    date: string;
    weekday: string;
    freeMinutes: number;
    slots: Array<{ start: string; end: string }>;
  }>;
}

/**
 * JSON出力用に整形（時刻はタイムゾーンなしの HH:mm）
 */
export function toJsonOutput(
  result: FreeTimesByDate,
  query: FreeTimeQuery,
  source: string,
  timezoneLabel: string
): FreeTimesJson {
  return {
    success: true,
    source,
    timezoneLabel,
    workingHours: { start: query.workStartHour, end: query.workEndHour },
    buffer: { before: query.bufferBefore, after: query.bufferAfter },
    days: Array.from(result.entries()).map(([key, slots]) => {
      const date = dateFromKey(key);
      return {
        date: key,
        weekday: format(date, 'EEE'),
        freeMinutes: totalFreeMinutes(slots),
        slots: slots.map(slot => ({
          start: format(slot.start, 'HH:mm'),
          // 営業時間の終わりが24時の場合は翌日0時になる
          end: toDateKey(slot.end) === key ? format(slot.end, 'HH:mm') : '24:00'
        }))
      };
    })
  };
}
