import type ICAL from 'ical.js';

/**
 * 開始・終了のペア。どちらもタイムゾーンを落としたローカル時刻として扱う
 */
export interface TimeSlot {
  start: Date;
  end: Date;
}

export interface EventInstance {
  uid: string;
  summary: string;
  start: Date;
  end: Date;
  allDay: boolean;
  recurring: boolean;
}

export interface CalendarDocument {
  source: string;
  name?: string;
  // RECURRENCE-IDの例外は親イベントに関連付け済み
  events: InstanceType<typeof ICAL.Event>[];
}

export interface BufferConfig {
  bufferBefore: number; // minutes
  bufferAfter: number;  // minutes
}

export interface FreeTimeQuery extends BufferConfig {
  startDate: Date;
  endDate: Date;
  workStartHour: number; // 0-23
  workEndHour: number;   // 1-24
  minimumSlotMinutes?: number;
  skipWeekends?: boolean;
  ignoreAllDay?: boolean;
}

// キーは yyyy-MM-dd、挿入順は日付順
export type FreeTimesByDate = Map<string, TimeSlot[]>;
