import * as fs from 'fs/promises';
import chalk from 'chalk';
import ICAL from 'ical.js';
import { parseISO } from 'date-fns';
import { CalendarDocument, EventInstance } from '../types/calendar.js';
import { FetchError, ParseError } from '../utils/errors.js';
import { getDayBounds, toDateKey } from '../utils/date.js';

type IcalEvent = InstanceType<typeof ICAL.Event>;
type IcalTime = InstanceType<typeof ICAL.Time>;

export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

export interface CalendarLoaderOptions {
  timeoutMs?: number;
}

function isRemoteSource(source: string): boolean {
  return /^(https?|webcal):\/\//i.test(source);
}

/**
 * webcal:// は購読用のスキームなので https:// に置き換えて取得する
 */
export function toFetchUrl(source: string): string {
  return source.replace(/^webcal:\/\//i, 'https://');
}

/**
 * タイムゾーン情報を捨てて壁時計の時刻だけを残す
 * VALUE=DATE の場合はその日の0時
 */
export function toNaiveDate(time: IcalTime): Date {
  return parseISO(time.toString().replace(/Z$/, ''));
}

function overlapsRange(start: Date, end: Date, rangeStart: Date, rangeEnd: Date): boolean {
  if (start >= rangeEnd) {
    return false;
  }
  // 長さ0のイベントは開始時刻が範囲内なら含める
  if (start.getTime() === end.getTime()) {
    return start >= rangeStart;
  }
  return end > rangeStart;
}

export class CalendarLoader {
  private timeoutMs: number;

  constructor(options: CalendarLoaderOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  }

  async load(source: string): Promise<CalendarDocument> {
    const text = isRemoteSource(source)
      ? await this.fetchText(toFetchUrl(source))
      : await this.readText(source);

    if (process.env.DEBUG) {
      console.log(chalk.gray(`Loaded ${text.length} characters from ${source}`));
    }

    return this.parse(text, source);
  }

  parse(text: string, source: string): CalendarDocument {
    const root = this.parseComponent(text, source);
    if (!root || root.name !== 'vcalendar') {
      throw new ParseError(`Invalid calendar data from ${source}: no VCALENDAR component found`);
    }

    const masters = new Map<string, IcalEvent>();
    const events: IcalEvent[] = [];
    const exceptions: IcalEvent[] = [];

    try {
      for (const vevent of root.getAllSubcomponents('vevent')) {
        if (!vevent.hasProperty('dtstart')) {
          throw new ParseError(`Invalid event in ${source}: VEVENT without DTSTART`);
        }
        const event = new ICAL.Event(vevent);
        if (event.isRecurrenceException()) {
          exceptions.push(event);
          continue;
        }
        events.push(event);
        if (!masters.has(event.uid)) {
          masters.set(event.uid, event);
        }
      }

      // RECURRENCE-IDで上書きされた回を親イベントに紐付ける
      for (const exception of exceptions) {
        const master = masters.get(exception.uid);
        if (master) {
          master.relateException(exception);
        } else {
          // 親が無い例外は単発イベントとして扱う
          events.push(exception);
        }
      }
    } catch (error) {
      if (error instanceof ParseError) {
        throw error;
      }
      throw new ParseError(`Invalid event in ${source}: ${error instanceof Error ? error.message : String(error)}`, error);
    }

    const nameValue = root.getFirstPropertyValue('x-wr-calname');
    return {
      source,
      name: typeof nameValue === 'string' ? nameValue : undefined,
      events
    };
  }

  /**
   * [rangeStart, rangeEnd) と重なる全てのイベントインスタンスを展開する
   */
  instancesBetween(document: CalendarDocument, rangeStart: Date, rangeEnd: Date): EventInstance[] {
    const instances: EventInstance[] = [];

    for (const event of document.events) {
      if (!event.isRecurring()) {
        const start = toNaiveDate(event.startDate);
        const end = toNaiveDate(event.endDate);
        if (overlapsRange(start, end, rangeStart, rangeEnd)) {
          instances.push({
            uid: event.uid,
            summary: event.summary ?? '',
            start,
            end,
            allDay: event.startDate.isDate,
            recurring: false
          });
        }
        continue;
      }

      const iterator = event.iterator();
      for (let next = iterator.next(); next; next = iterator.next()) {
        // 元の発生時刻が範囲を過ぎたら打ち切る
        if (toNaiveDate(next) >= rangeEnd) {
          break;
        }
        const details = event.getOccurrenceDetails(next);
        const start = toNaiveDate(details.startDate);
        const end = toNaiveDate(details.endDate);
        if (overlapsRange(start, end, rangeStart, rangeEnd)) {
          instances.push({
            uid: event.uid,
            summary: details.item.summary ?? '',
            start,
            end,
            allDay: details.startDate.isDate,
            recurring: true
          });
        }
      }
    }

    return instances;
  }

  /**
   * 一度展開したインスタンスを日付ごとに振り分ける
   * 複数日にまたがるイベントは重なる日すべてに入る
   */
  groupInstancesByDate(instances: EventInstance[], dates: Date[]): Map<string, EventInstance[]> {
    const grouped = new Map<string, EventInstance[]>();

    for (const date of dates) {
      const { start, end } = getDayBounds(date);
      const dayInstances = instances.filter(instance =>
        overlapsRange(instance.start, instance.end, start, end)
      );
      grouped.set(toDateKey(date), dayInstances);

      if (process.env.DEBUG) {
        console.log(chalk.gray(`${toDateKey(date)}: ${dayInstances.length} event(s)`));
      }
    }

    return grouped;
  }

  private parseComponent(text: string, source: string) {
    try {
      return ICAL.Component.fromString(text);
    } catch (error) {
      throw new ParseError(`Invalid calendar data from ${source}: ${error instanceof Error ? error.message : String(error)}`, error);
    }
  }

  private async fetchText(url: string): Promise<string> {
    if (process.env.DEBUG) {
      console.log(chalk.gray(`Fetching calendar: ${url}`));
    }

    const response = await fetch(url, {
      headers: { Accept: 'text/calendar, */*' },
      signal: AbortSignal.timeout(this.timeoutMs)
    }).catch((error: unknown) => {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new FetchError(`Timed out after ${this.timeoutMs}ms fetching ${url}`, undefined, error);
      }
      throw new FetchError(`Failed to fetch calendar from ${url}: ${error instanceof Error ? error.message : String(error)}`, undefined, error);
    });

    if (!response.ok) {
      throw new FetchError(
        `Failed to fetch calendar from ${url}: HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`,
        response.status
      );
    }

    try {
      return await response.text();
    } catch (error) {
      throw new FetchError(`Failed to read calendar response from ${url}`, response.status, error);
    }
  }

  private async readText(filePath: string): Promise<string> {
    try {
      return await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new FetchError(`Calendar file not found: ${filePath}`, undefined, error);
      }
      throw new FetchError(`Failed to read calendar file ${filePath}: ${error instanceof Error ? error.message : String(error)}`, undefined, error);
    }
  }
}
