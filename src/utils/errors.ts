export type FreeSlotsErrorCode =
  | 'FETCH_FAILED'
  | 'PARSE_FAILED'
  | 'INVALID_RANGE'
  | 'INVALID_WORKING_HOURS'
  | 'INVALID_BUFFER'
  | 'INVALID_DATE'
  | 'INVALID_CONFIG';

export class FreeSlotsError extends Error {
  constructor(
    message: string,
    public readonly code: FreeSlotsErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'FreeSlotsError';
  }
}

/**
 * カレンダーの取得に失敗（ネットワーク、HTTPステータス、タイムアウト、ファイル読み込み）
 */
export class FetchError extends FreeSlotsError {
  constructor(message: string, public readonly status?: number, cause?: unknown) {
    super(message, 'FETCH_FAILED', cause);
    this.name = 'FetchError';
  }
}

export class ParseError extends FreeSlotsError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PARSE_FAILED', cause);
    this.name = 'ParseError';
  }
}

export class InvalidRangeError extends FreeSlotsError {
  constructor(message: string) {
    super(message, 'INVALID_RANGE');
    this.name = 'InvalidRangeError';
  }
}

export class InvalidWorkingHoursError extends FreeSlotsError {
  constructor(message: string) {
    super(message, 'INVALID_WORKING_HOURS');
    this.name = 'InvalidWorkingHoursError';
  }
}

export class InvalidBufferError extends FreeSlotsError {
  constructor(message: string) {
    super(message, 'INVALID_BUFFER');
    this.name = 'InvalidBufferError';
  }
}

export class InvalidDateError extends FreeSlotsError {
  constructor(message: string) {
    super(message, 'INVALID_DATE');
    this.name = 'InvalidDateError';
  }
}

export class ConfigError extends FreeSlotsError {
  constructor(message: string, cause?: unknown) {
    super(message, 'INVALID_CONFIG', cause);
    this.name = 'ConfigError';
  }
}

/**
 * 取得・解析の失敗かどうか（URLの確認を促すヒントを出す対象）
 */
export function isSourceError(error: unknown): error is FetchError | ParseError {
  return error instanceof FetchError || error instanceof ParseError;
}
