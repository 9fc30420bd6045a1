import chalk from 'chalk';
import { getConfigPath, loadConfig } from '../../utils/config.js';

export async function showConfig(options: { config?: string; json?: boolean } = {}): Promise<void> {
  try {
    const config = await loadConfig(options.config);

    if (options.json) {
      console.log(JSON.stringify(config, null, 2));
      return;
    }

    console.log(chalk.bold(`\nConfiguration (${options.config || getConfigPath()}):`));
    console.log(chalk.gray('─'.repeat(50)));
    Object.entries(config).forEach(([key, value]) => {
      console.log(`${chalk.cyan(key.padEnd(20))} ${value === undefined ? chalk.gray('(not set)') : String(value)}`);
    });
    console.log(chalk.gray('─'.repeat(50)));
  } catch (error) {
    console.error(chalk.red('Failed to load configuration:'), error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}
