import chalk from 'chalk';
import { isConfigKey, setConfigValue } from '../../utils/config.js';

export async function setConfig(key: string, value: string, options: { config?: string } = {}): Promise<void> {
  try {
    const config = await setConfigValue(key, value, options.config);
    const saved = isConfigKey(key) ? config[key] : value;
    console.log(chalk.green(`✓ ${key} = ${String(saved)}`));
  } catch (error) {
    console.error(chalk.red('Failed to update configuration:'), error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}
