import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { buildQueryInput, findFreeSlots } from './find.js';
import { getDefaultConfig } from '../../utils/config.js';

// Mock fs/promises
vi.mock('fs/promises', () => ({
  readFile: vi.fn(),
  writeFile: vi.fn(),
  mkdir: vi.fn()
}));

vi.mock('inquirer', () => ({
  default: {
    prompt: vi.fn()
  }
}));

const TEAM_CALENDAR = [
  'BEGIN:VCALENDAR',
  'VERSION:2.0',
  'PRODID:-//free-slots//test//EN',
  'BEGIN:VEVENT',
  'UID:lunch',
  'SUMMARY:Lunch',
  'DTSTART:20250120T120000Z',
  'DTEND:20250120T130000Z',
  'END:VEVENT',
  'BEGIN:VEVENT',
  'UID:standup',
  'SUMMARY:Standup',
  'DTSTART:20250120T090000Z',
  'DTEND:20250120T093000Z',
  'RRULE:FREQ=DAILY;COUNT=3',
  'END:VEVENT',
  'END:VCALENDAR'
].join('\r\n');

const notFound = () => Object.assign(new Error('ENOENT'), { code: 'ENOENT' });

function logLines(): unknown[] {
  return vi.mocked(console.log).mock.calls.map(call => call[0]);
}

describe('findFreeSlots', () => {
  beforeEach(async () => {
    vi.clearAllMocks();
    const fs = await import('fs/promises');
    // 設定ファイルは存在せず、.ics だけ読める
    vi.mocked(fs.readFile).mockImplementation(async (filePath) => {
      if (String(filePath) === '/calendars/team.ics') {
        return TEAM_CALENDAR;
      }
      throw notFound();
    });
  });

  afterEach(() => {
    process.exitCode = undefined;
  });

  it('should print free slots as JSON', async () => {
    await findFreeSlots('/calendars/team.ics', { start: '2025-01-20', end: '2025-01-21', json: true });

    expect(console.log).toHaveBeenCalledTimes(1);
    const output = JSON.parse(String(logLines()[0]));
    expect(output).toEqual({
      success: true,
      source: '/calendars/team.ics',
      timezoneLabel: 'ET',
      workingHours: { start: 9, end: 17 },
      buffer: { before: 0, after: 0 },
      days: [
        {
          date: '2025-01-20',
          weekday: 'Mon',
          freeMinutes: 390,
          slots: [
            { start: '09:30', end: '12:00' },
            { start: '13:00', end: '17:00' }
          ]
        },
        {
          date: '2025-01-21',
          weekday: 'Tue',
          freeMinutes: 450,
          slots: [{ start: '09:30', end: '17:00' }]
        }
      ]
    });
    expect(process.exitCode).toBeUndefined();
  });

  it('should print one line per day', async () => {
    await findFreeSlots('/calendars/team.ics', {
      start: '2025-01-20',
      end: '2025-01-22',
      from: '10',
      to: '16',
      bufferAfter: '15',
      tzLabel: 'PT'
    });

    const lines = logLines();
    expect(lines).toContain('1/20 (Mon): 10a-12p, 1:15p-4p PT');
    expect(lines).toContain('1/21 (Tue): 10a-4p PT');
    expect(lines).toContain('1/22 (Wed): 10a-4p PT');
    expect(lines).toContain('Total free time: 16h 45m across 3 day(s)');
  });

  it('should report validation errors without loading the calendar', async () => {
    const fs = await import('fs/promises');

    await findFreeSlots('/calendars/team.ics', { start: '2025-01-22', end: '2025-01-20' });

    expect(console.error).toHaveBeenCalledWith('Failed to find free time slots:', 'Start date must be before end date.');
    expect(fs.readFile).not.toHaveBeenCalledWith('/calendars/team.ics', 'utf-8');
    expect(process.exitCode).toBe(1);
  });

  it('should report invalid working hours', async () => {
    await findFreeSlots('/calendars/team.ics', { start: '2025-01-20', end: '2025-01-20', from: '17', to: '9' });

    expect(console.error).toHaveBeenCalledWith('Failed to find free time slots:', 'Start time must be before end time.');
    expect(process.exitCode).toBe(1);
  });

  it('should give a hint when the calendar cannot be loaded', async () => {
    await findFreeSlots('/calendars/missing.ics', { start: '2025-01-20', end: '2025-01-20' });

    expect(console.error).toHaveBeenCalledWith('Failed to find free time slots:', 'Calendar file not found: /calendars/missing.ics');
    expect(console.error).toHaveBeenCalledWith('Please check if the ICS URL is valid and accessible.');
    expect(process.exitCode).toBe(1);
  });

  it('should report errors as JSON in JSON mode', async () => {
    await findFreeSlots('/calendars/missing.ics', { start: '2025-01-20', end: '2025-01-20', json: true });

    expect(JSON.parse(String(logLines()[0]))).toEqual({
      success: false,
      error: { code: 'FETCH_FAILED', message: 'Calendar file not found: /calendars/missing.ics' }
    });
    expect(process.exitCode).toBe(1);
  });

  it('should require a calendar source', async () => {
    await findFreeSlots(undefined, { start: '2025-01-20', end: '2025-01-20' });

    expect(console.error).toHaveBeenCalledWith(
      'Failed to find free time slots:',
      'No calendar URL given. Pass one as an argument or run: free-slots config set calendarUrl <url>'
    );
    expect(process.exitCode).toBe(1);
  });

  it('should use the answers from interactive mode', async () => {
    const inquirer = (await import('inquirer')).default;
    vi.mocked(inquirer.prompt).mockResolvedValue({
      startDate: '2025-01-21',
      endDate: '2025-01-21',
      workStartHour: 9,
      workEndHour: 12,
      bufferBefore: 30,
      bufferAfter: 0,
      saveAsDefault: false
    });

    await findFreeSlots('/calendars/team.ics', { interactive: true });

    expect(inquirer.prompt).toHaveBeenCalledTimes(1);
    expect(logLines()).toContain('1/21 (Tue): 9:30a-12p ET');
  });
});

describe('buildQueryInput', () => {
  const now = new Date(2025, 0, 20, 15, 0);

  it('should default to tomorrow through three days later', () => {
    expect(buildQueryInput({}, getDefaultConfig(), now)).toEqual({
      startDate: '2025-01-21',
      endDate: '2025-01-24',
      workStartHour: 9,
      workEndHour: 17,
      bufferBefore: 0,
      bufferAfter: 0,
      minimumSlotMinutes: 0,
      skipWeekends: false,
      ignoreAllDay: false
    });
  });

  it('should end three days after a given start date', () => {
    const input = buildQueryInput({ start: '2025-02-10' }, getDefaultConfig(), now);
    expect(input.startDate).toBe('2025-02-10');
    expect(input.endDate).toBe('2025-02-13');
  });

  it('should prefer options over configured defaults', () => {
    const config = { ...getDefaultConfig(), workStartHour: 8, bufferBefore: 10 };
    const input = buildQueryInput({ from: '7', bufferAfter: '5' }, config, now);
    expect(input.workStartHour).toBe(7);
    expect(input.bufferBefore).toBe(10);
    expect(input.bufferAfter).toBe(5);
  });
});
