import { vi } from 'vitest';
import chalk from 'chalk';

// タイムゾーンを固定（日付の計算をローカル時刻で行うため）
process.env.TZ = 'UTC';

// Mock environment variables for testing
delete process.env.FREE_SLOTS_CALENDAR_URL;
delete process.env.FREE_SLOTS_TIMEZONE_LABEL;
delete process.env.FREE_SLOTS_FETCH_TIMEOUT_MS;
delete process.env.DEBUG;

// 出力の比較をしやすくするため色を無効化
chalk.level = 0;

// Suppress console output during tests unless explicitly needed
global.console = {
  ...console,
  log: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  info: vi.fn(),
  debug: vi.fn(),
};
