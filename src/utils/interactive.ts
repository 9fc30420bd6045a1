import inquirer from 'inquirer';
import { addDays } from 'date-fns';
import { parseDateInput, toDateKey } from './date.js';

export const BUFFER_CHOICES = [0, 15, 30, 45, 60];

export interface FreeTimeAnswers {
  startDate: string;
  endDate: string;
  workStartHour: number;
  workEndHour: number;
  bufferBefore: number;
  bufferAfter: number;
  saveAsDefault: boolean;
}

export interface FreeTimePromptDefaults {
  startDate: Date;
  endDate: Date;
  workStartHour: number;
  workEndHour: number;
  bufferBefore: number;
  bufferAfter: number;
}

function formatHourChoice(hour: number) {
  return { name: `${hour.toString().padStart(2, '0')}:00`, value: hour };
}

function formatBufferChoice(minutes: number) {
  return { name: `${minutes} min`, value: minutes };
}

/**
 * 設定値が定型の選択肢に無い場合も選べるように加える
 */
export function bufferChoicesFor(current: number): number[] {
  if (BUFFER_CHOICES.includes(current)) {
    return BUFFER_CHOICES;
  }
  return [...BUFFER_CHOICES, current].sort((a, b) => a - b);
}

function validateDate(input: string): boolean | string {
  return parseDateInput(input) !== null || 'Please enter a date in YYYY-MM-DD format';
}

/**
 * 検索条件を対話的に入力する
 */
export async function promptFreeTimeOptions(defaults: FreeTimePromptDefaults): Promise<FreeTimeAnswers> {
  return inquirer.prompt<FreeTimeAnswers>([
    {
      type: 'input',
      name: 'startDate',
      message: 'Start date (YYYY-MM-DD):',
      default: toDateKey(defaults.startDate),
      validate: validateDate
    },
    {
      type: 'input',
      name: 'endDate',
      message: 'End date (YYYY-MM-DD):',
      // 開始日から3日後をデフォルトにする
      default: (answers: Partial<FreeTimeAnswers>) => {
        const start = answers.startDate ? parseDateInput(answers.startDate) : null;
        return toDateKey(start ? addDays(start, 3) : defaults.endDate);
      },
      validate: (input: string, answers?: Partial<FreeTimeAnswers>) => {
        const valid = validateDate(input);
        if (valid !== true) return valid;
        const start = answers?.startDate ? parseDateInput(answers.startDate) : null;
        const end = parseDateInput(input);
        if (start && end && start > end) {
          return 'Start date must be before end date.';
        }
        return true;
      }
    },
    {
      type: 'list',
      name: 'workStartHour',
      message: 'Start Time:',
      choices: Array.from({ length: 24 }, (_, hour) => formatHourChoice(hour)),
      default: defaults.workStartHour
    },
    {
      type: 'list',
      name: 'workEndHour',
      message: 'End Time:',
      // 開始時刻より後の時刻だけを選択肢にする
      choices: (answers: Partial<FreeTimeAnswers>) => {
        const first = (answers.workStartHour ?? 0) + 1;
        return Array.from({ length: 25 - first }, (_, i) => formatHourChoice(first + i));
      },
      default: (answers: Partial<FreeTimeAnswers>) =>
        Math.max(0, defaults.workEndHour - (answers.workStartHour ?? 0) - 1)
    },
    {
      type: 'list',
      name: 'bufferBefore',
      message: 'Buffer before events (minutes):',
      choices: bufferChoicesFor(defaults.bufferBefore).map(formatBufferChoice),
      default: bufferChoicesFor(defaults.bufferBefore).indexOf(defaults.bufferBefore)
    },
    {
      type: 'list',
      name: 'bufferAfter',
      message: 'Buffer after events (minutes):',
      choices: bufferChoicesFor(defaults.bufferAfter).map(formatBufferChoice),
      default: bufferChoicesFor(defaults.bufferAfter).indexOf(defaults.bufferAfter)
    },
    {
      type: 'confirm',
      name: 'saveAsDefault',
      message: 'Save working hours and buffers as defaults?',
      default: false
    }
  ]);
}
