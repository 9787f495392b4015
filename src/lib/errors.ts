/**
 * Error Types
 * 站點選取相關錯誤
 */

/**
 * 站點目錄無法載入
 */
export class SourceUnavailableError extends Error {
  public readonly code = 'SOURCE_UNAVAILABLE';
  public readonly resourceKey: string;

  constructor(message: string, resourceKey: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'SourceUnavailableError';
    this.resourceKey = resourceKey;
  }
}

/**
 * 篩選參數格式錯誤
 */
export class InvalidFilterInputError extends Error {
  public readonly code = 'INVALID_FILTER_INPUT';

  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message);
    this.name = 'InvalidFilterInputError';
  }
}
