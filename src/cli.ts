import { Command } from 'commander';
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { findFreeSlots } from './commands/calendar/find.js';
import { showConfig } from './commands/config/show.js';
import { setConfig } from './commands/config/set.js';
import { doctor } from './commands/doctor.js';

// Get package.json version dynamically
const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
const { version } = z.object({ version: z.string() }).parse(packageJson);

export function createCLI(): Command {
  const program = new Command();

  program
    .name('free-slots')
    .description('CLI tool for finding free time slots in an iCalendar feed')
    .version(version);

  // 空き時間検索コマンド
  program
    .command('find [source]')
    .description('Find free time slots within working hours (source: ICS URL or file, defaults to configured calendarUrl)')
    .option('-s, --start <date>', 'Start date (YYYY-MM-DD, default: tomorrow)')
    .option('-e, --end <date>', 'End date (YYYY-MM-DD, default: start date + 3 days)')
    .option('--from <hour>', 'Working hours start (0-23, default: 9)')
    .option('--to <hour>', 'Working hours end (1-24, default: 17)')
    .option('-b, --buffer-before <minutes>', 'Buffer before each event in minutes (default: 0)')
    .option('-a, --buffer-after <minutes>', 'Buffer after each event in minutes (default: 0)')
    .option('-m, --min-duration <minutes>', 'Hide free slots shorter than this many minutes')
    .option('--skip-weekends', 'Leave Saturdays and Sundays out of the result')
    .option('--ignore-all-day', 'Do not treat all-day events as busy')
    .option('--tz-label <label>', 'Timezone label shown after each day (display only, default: ET)')
    .option('-i, --interactive', 'Interactive mode')
    .option('--json', 'Output in JSON format for LLM integration')
    .option('-c, --config <file>', 'Path to a custom config YAML file')
    .action((source, options) => findFreeSlots(source, options));

  // 設定コマンドグループ
  const config = program
    .command('config')
    .description('Configuration management');

  config
    .command('show')
    .description('Show the current configuration')
    .option('-c, --config <file>', 'Path to a custom config YAML file')
    .option('--json', 'Output in JSON format')
    .action(showConfig);

  config
    .command('set <key> <value>')
    .description('Set a configuration value (e.g. calendarUrl, workStartHour, bufferBefore)')
    .option('-c, --config <file>', 'Path to a custom config YAML file')
    .action((key, value, options) => setConfig(key, value, options));

  // Doctorコマンド
  program
    .command('doctor')
    .description('Check your environment setup')
    .option('-c, --config <file>', 'Path to a custom config YAML file')
    .action(doctor);

  return program;
}
