/**
 * 應用程式錯誤類型
 */
export enum ErrorType {
  /** 輸入格式錯誤（缺少必要參數等），於任何 I/O 前拒絕 */
  INVALID_INPUT = 'INVALID_INPUT',

  /** CI 平台 API 驗證失敗 */
  AUTH_ERROR = 'AUTH_ERROR',

  /** 無法確認專案存取權限 */
  ACCESS_ERROR = 'ACCESS_ERROR',

  /** 專案或 run 不存在 */
  PROJECT_NOT_FOUND = 'PROJECT_NOT_FOUND',

  /** 網路連線錯誤 */
  NETWORK_ERROR = 'NETWORK_ERROR',

  /** API 速率限制 */
  RATE_LIMIT_ERROR = 'RATE_LIMIT_ERROR',

  /** CI 平台 API 錯誤 */
  API_ERROR = 'API_ERROR',

  /** API 回應不符合預期格式（如時間戳無法解析） */
  INVALID_RESPONSE = 'INVALID_RESPONSE',

  /** 篩選後沒有任何 run */
  EMPTY_RESULT = 'EMPTY_RESULT',

  /** 配置檔案錯誤 */
  CONFIG_ERROR = 'CONFIG_ERROR',

  /** 未預期的內部錯誤 */
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}

/**
 * 應用程式錯誤模型
 */
export class AppError extends Error {
  constructor(
    public type: ErrorType,
    public message: string,
    public originalError?: Error
  ) {
    super(message)
    this.name = 'AppError'
  }
}

/**
 * 將任意 throw 值轉為 Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}
