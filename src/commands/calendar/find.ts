import chalk from 'chalk';
import { addDays } from 'date-fns';
import { CalendarLoader } from '../../services/calendar-loader.js';
import { computeFreeTimes, totalFreeMinutes } from '../../utils/availability.js';
import { loadConfig, saveConfig, Config } from '../../utils/config.js';
import { getDefaultDateRange, parseDateInput, toDateKey } from '../../utils/date.js';
import { FreeSlotsError, isSourceError } from '../../utils/errors.js';
import { dateFromKey, formatDayLine, formatDuration, toJsonOutput } from '../../utils/format.js';
import { promptFreeTimeOptions } from '../../utils/interactive.js';
import { FreeTimeQueryInput, validateFreeTimeQuery } from '../../utils/validation.js';

export interface FindOptions {
  start?: string;
  end?: string;
  from?: string;
  to?: string;
  bufferBefore?: string;
  bufferAfter?: string;
  minDuration?: string;
  skipWeekends?: boolean;
  ignoreAllDay?: boolean;
  tzLabel?: string;
  interactive?: boolean;
  json?: boolean;
  config?: string;
}

function toNumber(value: string | undefined, fallback: number): number {
  return value === undefined ? fallback : Number(value);
}

/**
 * コマンドラインのオプションから検索条件を組み立てる
 * --start だけが指定された場合、終了日は開始日の3日後
 */
export function buildQueryInput(options: FindOptions, config: Config, now: Date = new Date()): FreeTimeQueryInput {
  const defaults = getDefaultDateRange(now);
  const start = options.start ?? toDateKey(defaults.start);
  let end = options.end;
  if (!end) {
    const parsedStart = parseDateInput(start);
    end = toDateKey(parsedStart ? addDays(parsedStart, 3) : defaults.end);
  }

  return {
    startDate: start,
    endDate: end,
    workStartHour: toNumber(options.from, config.workStartHour),
    workEndHour: toNumber(options.to, config.workEndHour),
    bufferBefore: toNumber(options.bufferBefore, config.bufferBefore),
    bufferAfter: toNumber(options.bufferAfter, config.bufferAfter),
    minimumSlotMinutes: toNumber(options.minDuration, config.minimumSlotMinutes),
    skipWeekends: options.skipWeekends ?? false,
    ignoreAllDay: options.ignoreAllDay ?? false
  };
}

async function promptQueryInput(base: FreeTimeQueryInput, options: FindOptions): Promise<FreeTimeQueryInput> {
  const defaults = getDefaultDateRange();
  const answers = await promptFreeTimeOptions({
    startDate: typeof base.startDate === 'string' ? parseDateInput(base.startDate) ?? defaults.start : base.startDate,
    endDate: typeof base.endDate === 'string' ? parseDateInput(base.endDate) ?? defaults.end : base.endDate,
    workStartHour: base.workStartHour,
    workEndHour: base.workEndHour,
    bufferBefore: base.bufferBefore,
    bufferAfter: base.bufferAfter
  });

  if (answers.saveAsDefault) {
    await saveConfig({
      workStartHour: answers.workStartHour,
      workEndHour: answers.workEndHour,
      bufferBefore: answers.bufferBefore,
      bufferAfter: answers.bufferAfter
    }, options.config);
    console.log(chalk.gray('Saved defaults.'));
  }

  return {
    ...base,
    startDate: answers.startDate,
    endDate: answers.endDate,
    workStartHour: answers.workStartHour,
    workEndHour: answers.workEndHour,
    bufferBefore: answers.bufferBefore,
    bufferAfter: answers.bufferAfter
  };
}

function reportError(error: unknown, json?: boolean): void {
  const message = error instanceof Error ? error.message : String(error);

  if (json) {
    const code = error instanceof FreeSlotsError ? error.code : 'UNKNOWN';
    console.log(JSON.stringify({ success: false, error: { code, message } }, null, 2));
  } else {
    console.error(chalk.red('Failed to find free time slots:'), message);
    if (isSourceError(error)) {
      console.error(chalk.gray('Please check if the ICS URL is valid and accessible.'));
    }
  }
  process.exitCode = 1;
}

export async function findFreeSlots(source: string | undefined, options: FindOptions = {}): Promise<void> {
  try {
    const config = await loadConfig(options.config);
    let input = buildQueryInput(options, config);

    if (options.interactive) {
      input = await promptQueryInput(input, options);
    }

    // 入力の検証
    const validation = validateFreeTimeQuery(input, { maxRangeDays: config.maxRangeDays });
    if (!validation.success) {
      reportError(validation.error, options.json);
      return;
    }
    const { query } = validation;

    const calendarSource = source || config.calendarUrl;
    if (!calendarSource) {
      reportError(new Error('No calendar URL given. Pass one as an argument or run: free-slots config set calendarUrl <url>'), options.json);
      return;
    }

    const timezoneLabel = options.tzLabel ?? config.timezoneLabel;
    const loader = new CalendarLoader({ timeoutMs: config.fetchTimeoutMs });

    if (!options.json) {
      console.log(chalk.blue('Fetching calendar data and finding free time slots...'));
    }

    const document = await loader.load(calendarSource);
    const freeTimes = computeFreeTimes(document, query, loader);

    // JSON output for LLM integration
    if (options.json) {
      console.log(JSON.stringify(toJsonOutput(freeTimes, query, calendarSource, timezoneLabel), null, 2));
      return;
    }

    if (freeTimes.size === 0) {
      console.log(chalk.gray('No free time slots found in the selected date range.'));
      return;
    }

    const title = document.name ? `\nAvailable Free Time Slots (${document.name}):` : '\nAvailable Free Time Slots:';
    console.log(chalk.bold(title));
    console.log(chalk.gray('─'.repeat(50)));

    let totalMinutes = 0;
    for (const [key, slots] of freeTimes) {
      console.log(formatDayLine(dateFromKey(key), slots, timezoneLabel));
      totalMinutes += totalFreeMinutes(slots);
    }

    console.log(chalk.gray('─'.repeat(50)));
    console.log(chalk.gray(`Total free time: ${formatDuration(totalMinutes)} across ${freeTimes.size} day(s)`));
  } catch (error) {
    reportError(error, options.json);
  }
}
