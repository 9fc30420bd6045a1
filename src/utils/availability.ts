import { addMinutes, addDays, set, startOfDay, differenceInMinutes } from 'date-fns';
import {
  BufferConfig,
  CalendarDocument,
  EventInstance,
  FreeTimeQuery,
  FreeTimesByDate,
  TimeSlot
} from '../types/calendar.js';
import { CalendarLoader } from '../services/calendar-loader.js';
import { eachDateInRange, toDateKey } from './date.js';

export type { TimeSlot };

function atHour(day: Date, hour: number): Date {
  // 経過時間ではなく時計の時刻で合わせる（夏時間の切り替え日でもずれない）
  return hour === 24 ? addDays(day, 1) : set(day, { hours: hour });
}

/**
 * 指定日の営業時間帯を作成（workEndHour=24 は翌日0時）
 */
export function buildWorkingWindow(date: Date, workStartHour: number, workEndHour: number): TimeSlot {
  const day = startOfDay(date);
  return {
    start: atHour(day, workStartHour),
    end: atHour(day, workEndHour)
  };
}

/**
 * イベントの前後にバッファを付ける。営業時間帯でのクリップはしない
 */
export function applyBuffer(event: TimeSlot, buffer: BufferConfig): TimeSlot {
  return {
    start: addMinutes(event.start, -buffer.bufferBefore),
    end: addMinutes(event.end, buffer.bufferAfter)
  };
}

/**
 * 空き時間のリストから1つの予定を差し引く
 *
 * 各スロットについて、予定が完全に外側（境界で接するだけの場合も含む）なら
 * そのまま残し、重なる場合は予定の前後に残る部分だけを順番を保って残す。
 */
export function subtractBusy(free: TimeSlot[], busy: TimeSlot): TimeSlot[] {
  // 長さを持たない予定は何も塞がない
  if (busy.end <= busy.start) {
    return free;
  }

  const updated: TimeSlot[] = [];
  for (const slot of free) {
    if (busy.start >= slot.end || busy.end <= slot.start) {
      updated.push(slot);
      continue;
    }
    if (busy.start > slot.start) {
      updated.push({ start: slot.start, end: busy.start });
    }
    if (busy.end < slot.end) {
      updated.push({ start: busy.end, end: slot.end });
    }
  }
  return updated;
}

/**
 * 1日分の空き時間を計算
 * 予定は渡された順に適用する（ソートしない）
 */
export function findFreeSlotsForDay(
  date: Date,
  events: EventInstance[],
  query: FreeTimeQuery
): TimeSlot[] {
  const { workStartHour, workEndHour, minimumSlotMinutes = 0, ignoreAllDay = false } = query;

  let free: TimeSlot[] = [buildWorkingWindow(date, workStartHour, workEndHour)];

  for (const event of events) {
    if (ignoreAllDay && event.allDay) {
      continue;
    }
    free = subtractBusy(free, applyBuffer(event, query));
  }

  if (minimumSlotMinutes > 0) {
    free = free.filter(slot => differenceInMinutes(slot.end, slot.start) >= minimumSlotMinutes);
  }

  return free;
}

/**
 * 期間内の各日について空き時間を計算する
 *
 * カレンダーの展開は期間全体に対して一度だけ行い、日ごとに振り分ける。
 * クエリの検証は呼び出し側の責任（validateFreeTimeQuery を参照）。
 */
export function computeFreeTimes(
  document: CalendarDocument,
  query: FreeTimeQuery,
  loader: CalendarLoader = new CalendarLoader()
): FreeTimesByDate {
  const dates = eachDateInRange(query.startDate, query.endDate, { skipWeekends: query.skipWeekends });
  const result: FreeTimesByDate = new Map();

  if (dates.length === 0) {
    return result;
  }

  const instances = loader.instancesBetween(
    document,
    startOfDay(query.startDate),
    addDays(startOfDay(query.endDate), 1)
  );
  const eventsByDate = loader.groupInstancesByDate(instances, dates);

  for (const date of dates) {
    const key = toDateKey(date);
    result.set(key, findFreeSlotsForDay(date, eventsByDate.get(key) ?? [], query));
  }

  return result;
}

/**
 * 空き時間の合計（分）
 */
export function totalFreeMinutes(slots: TimeSlot[]): number {
  return slots.reduce((total, slot) => total + differenceInMinutes(slot.end, slot.start), 0);
}
