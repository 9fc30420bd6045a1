import * as fs from 'fs/promises';
import * as path from 'path';
import { homedir } from 'os';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';

// 設定ファイルのスキーマ
const ConfigSchema = z.object({
  calendarUrl: z.string().min(1).optional(),
  timezoneLabel: z.string().default('ET'),
  workStartHour: z.number().int().min(0).max(23).default(9),
  workEndHour: z.number().int().min(1).max(24).default(17),
  bufferBefore: z.number().int().min(0).default(0),
  bufferAfter: z.number().int().min(0).default(0),
  minimumSlotMinutes: z.number().int().min(0).default(0),
  fetchTimeoutMs: z.number().int().positive().default(10_000),
  maxRangeDays: z.number().int().positive().default(62),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigKey = keyof Config;

const NUMERIC_KEYS: ConfigKey[] = [
  'workStartHour',
  'workEndHour',
  'bufferBefore',
  'bufferAfter',
  'minimumSlotMinutes',
  'fetchTimeoutMs',
  'maxRangeDays',
];

// 設定ファイルのパス
export const getConfigPath = () => path.join(homedir(), '.free-slots', 'config.yaml');

export function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(ConfigSchema.shape, key);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join(', ');
}

/**
 * 設定ファイルを読み込む（値は未検証）
 * required=false の場合、ファイルが無ければ空の設定として扱う
 */
async function readConfigFile(filePath: string, required: boolean): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      if (required) {
        throw new ConfigError(`Config file not found: ${filePath}`, error);
      }
      return {};
    }
    throw new ConfigError(`Failed to read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`, error);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${filePath}: ${error instanceof Error ? error.message : String(error)}`, error);
  }

  // 空ファイル
  if (parsed === undefined || parsed === null) {
    return {};
  }

  const record = z.record(z.unknown()).safeParse(parsed);
  if (!record.success) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping of settings`);
  }
  return record.data;
}

/**
 * 設定を読み込む
 * 優先順位：環境変数 > 設定ファイル > デフォルト値
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  const filePath = configPath || getConfigPath();
  const merged = await readConfigFile(filePath, !!configPath);

  // 環境変数で上書き
  if (process.env.FREE_SLOTS_CALENDAR_URL) {
    merged.calendarUrl = process.env.FREE_SLOTS_CALENDAR_URL;
  }
  if (process.env.FREE_SLOTS_TIMEZONE_LABEL) {
    merged.timezoneLabel = process.env.FREE_SLOTS_TIMEZONE_LABEL;
  }
  if (process.env.FREE_SLOTS_FETCH_TIMEOUT_MS) {
    merged.fetchTimeoutMs = Number(process.env.FREE_SLOTS_FETCH_TIMEOUT_MS);
  }

  // バリデーション
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${filePath}: ${formatIssues(result.error)}`, result.error);
  }
  return result.data;
}

/**
 * デフォルト設定
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * 設定値を1つ更新して保存する
 * 数値項目は文字列から変換してから検証する
 */
export async function setConfigValue(key: string, value: string, configPath?: string): Promise<Config> {
  if (!isConfigKey(key)) {
    throw new ConfigError(`Unknown config key: ${key}. Valid keys: ${Object.keys(ConfigSchema.shape).join(', ')}`);
  }

  const filePath = configPath || getConfigPath();
  const current = await readConfigFile(filePath, false);
  const trimmed = value.trim();
  const candidate = NUMERIC_KEYS.includes(key) && trimmed !== '' && !Number.isNaN(Number(trimmed))
    ? Number(trimmed)
    : value;

  const next = { ...current, [key]: candidate };
  const result = ConfigSchema.safeParse(next);
  if (!result.success) {
    throw new ConfigError(`Invalid value for ${key}: ${formatIssues(result.error)}`, result.error);
  }

  await saveConfigFile(filePath, next);
  return result.data;
}

async function saveConfigFile(filePath: string, values: Record<string, unknown>): Promise<void> {
  // ディレクトリを作成
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, yaml.dump(values), 'utf-8');
}

/**
 * 設定を保存する（既存のファイル内容とマージ）
 */
export async function saveConfig(config: Partial<Config>, configPath?: string): Promise<void> {
  const filePath = configPath || getConfigPath();
  const current = await readConfigFile(filePath, false);
  const next = { ...current, ...config };

  const result = ConfigSchema.safeParse(next);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`, result.error);
  }
  await saveConfigFile(filePath, next);
}
