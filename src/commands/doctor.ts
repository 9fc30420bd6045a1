import chalk from 'chalk';
import { CalendarLoader } from '../services/calendar-loader.js';
import { Config, getConfigPath, loadConfig } from '../utils/config.js';

export interface CheckResult {
  name: string;
  status: 'ok' | 'error' | 'warning';
  message: string;
}

export function checkNodeVersion(nodeVersion: string = process.version): CheckResult {
  const majorVersion = parseInt(nodeVersion.split('.')[0].substring(1));

  if (majorVersion >= 20) {
    return {
      name: 'Node.js',
      status: 'ok',
      message: `${nodeVersion} (>= 20.0.0 required)`
    };
  }
  return {
    name: 'Node.js',
    status: 'error',
    message: `${nodeVersion} (>= 20.0.0 required) - Please upgrade Node.js`
  };
}

export async function runChecks(configPath?: string): Promise<CheckResult[]> {
  const checks: CheckResult[] = [checkNodeVersion()];

  // 設定ファイル
  let config: Config | null = null;
  try {
    config = await loadConfig(configPath);
    checks.push({
      name: 'Configuration',
      status: 'ok',
      message: `Loaded (${configPath || getConfigPath()})`
    });
  } catch (error) {
    checks.push({
      name: 'Configuration',
      status: 'error',
      message: error instanceof Error ? error.message : String(error)
    });
  }

  if (!config) {
    return checks;
  }

  if (!config.calendarUrl) {
    checks.push({
      name: 'Calendar',
      status: 'warning',
      message: 'No calendar URL configured. Run: free-slots config set calendarUrl <url>'
    });
    return checks;
  }

  // カレンダーの取得と解析
  try {
    const loader = new CalendarLoader({ timeoutMs: config.fetchTimeoutMs });
    const document = await loader.load(config.calendarUrl);
    const name = document.name ? ` "${document.name}"` : '';
    checks.push({
      name: 'Calendar',
      status: 'ok',
      message: `Calendar${name} loaded with ${document.events.length} event(s)`
    });
  } catch (error) {
    checks.push({
      name: 'Calendar',
      status: 'error',
      message: error instanceof Error ? error.message : String(error)
    });
  }

  return checks;
}

export async function doctor(options: { config?: string } = {}): Promise<void> {
  console.log(chalk.bold('\n🩺 free-slots Doctor\n'));
  console.log('Checking your environment...\n');

  const checks = await runChecks(options.config);

  // Display results
  console.log(chalk.gray('─'.repeat(60)));

  checks.forEach(check => {
    const icon = check.status === 'ok' ? '✅' :
                 check.status === 'warning' ? '⚠️ ' : '❌';
    const color = check.status === 'ok' ? chalk.green :
                  check.status === 'warning' ? chalk.yellow : chalk.red;

    console.log(`${icon} ${chalk.bold(check.name)}`);
    console.log(`   ${color(check.message)}`);
    console.log();
  });

  console.log(chalk.gray('─'.repeat(60)));

  // Summary
  const errors = checks.filter(c => c.status === 'error').length;
  const warnings = checks.filter(c => c.status === 'warning').length;

  if (errors > 0) {
    console.log(chalk.red(`\n❌ ${errors} error(s) found. Please fix them before using free-slots.`));
    process.exitCode = 1;
  } else if (warnings > 0) {
    console.log(chalk.yellow(`\n⚠️  ${warnings} warning(s) found. Some features may not work properly.`));
  } else {
    console.log(chalk.green('\n✅ All checks passed! You\'re ready to use free-slots.'));
  }

  // Quick start guide
  console.log(chalk.bold('\n📚 Quick Start:'));
  console.log(chalk.gray('─'.repeat(60)));
  console.log('Find free slots:     ' + chalk.cyan('free-slots find'));
  console.log('Custom hours:        ' + chalk.cyan('free-slots find --from 10 --to 18 -b 15 -a 15'));
  console.log('Interactive mode:    ' + chalk.cyan('free-slots find --interactive'));
  console.log();
}
