import { format, parse, isValid, startOfDay, addDays, eachDayOfInterval, isWeekend } from 'date-fns';

const DATE_KEY_FORMAT = 'yyyy-MM-dd';

export function toDateKey(date: Date): string {
  return format(date, DATE_KEY_FORMAT);
}

/**
 * YYYY-MM-DD 形式の文字列をその日の0時（ローカル時刻）に変換
 * 形式が不正、または存在しない日付の場合はnull
 */
export function parseDateInput(input: string): Date | null {
  const trimmed = input.trim();
  const parsed = parse(trimmed, DATE_KEY_FORMAT, new Date());
  if (!isValid(parsed) || toDateKey(parsed) !== trimmed) {
    return null;
  }
  return startOfDay(parsed);
}

/**
 * デフォルトの検索期間：明日から3日後まで
 */
export function getDefaultDateRange(now: Date = new Date()): { start: Date; end: Date } {
  const start = addDays(startOfDay(now), 1);
  return {
    start,
    end: addDays(start, 3)
  };
}

export function eachDateInRange(start: Date, end: Date, options: { skipWeekends?: boolean } = {}): Date[] {
  if (start > end) {
    return [];
  }
  const dates = eachDayOfInterval({ start: startOfDay(start), end: startOfDay(end) });
  return options.skipWeekends ? dates.filter(date => !isWeekend(date)) : dates;
}

/**
 * その日の [00:00, 翌00:00) を返す
 */
export function getDayBounds(date: Date): { start: Date; end: Date } {
  const start = startOfDay(date);
  return { start, end: addDays(start, 1) };
}
