/**
 * CI 平台 API 錯誤轉換
 *
 * 將 Octokit / Gitbeaker 拋出的錯誤轉為 AppError
 */

import { AppError, ErrorType, toError } from '../../models/error.js'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function readNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined
}

/**
 * 取得 HTTP 狀態碼
 *
 * 支援格式：
 * - error.status（Octokit RequestError）
 * - error.cause.response.status（Gitbeaker 包裝錯誤）
 * - error.response.status
 * - error.description 含狀態碼（Gitbeaker description）
 */
export function getHTTPStatus(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined

  const direct = readNumber(error.status)
  if (direct !== undefined) return direct

  const cause = error.cause
  if (isRecord(cause) && isRecord(cause.response)) {
    const status = readNumber(cause.response.status)
    if (status !== undefined) return status
  }

  if (isRecord(error.response)) {
    const status = readNumber(error.response.status)
    if (status !== undefined) return status
  }

  if (typeof error.description === 'string') {
    const match = error.description.match(/\b(401|403|404|429|500|502|503)\b/)
    if (match && match[1]) {
      return parseInt(match[1], 10)
    }
  }

  return undefined
}

/**
 * 檢查是否為網路錯誤
 */
export function isNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) return false

  const message = error.message.toLowerCase()
  return message.includes('network') ||
         message.includes('enotfound') ||
         message.includes('econnrefused') ||
         message.includes('econnreset') ||
         message.includes('timeout') ||
         message.includes('fetch failed')
}

/**
 * 將平台 API 錯誤轉為 AppError
 *
 * 已是 AppError 的錯誤（如回應驗證失敗）原樣回傳
 *
 * @param error - 原始錯誤
 * @param platform - 平台名稱（用於訊息）
 */
export function toProviderError(error: unknown, platform: string): AppError {
  if (error instanceof AppError) return error

  const originalError = toError(error)
  const status = getHTTPStatus(error)

  switch (status) {
    case 401:
      return new AppError(ErrorType.AUTH_ERROR, `${platform} authentication failed (401)`, originalError)
    case 403:
      return new AppError(ErrorType.ACCESS_ERROR, `${platform} access denied (403)`, originalError)
    case 404:
      return new AppError(ErrorType.PROJECT_NOT_FOUND, `${platform} resource not found (404)`, originalError)
    case 429:
      return new AppError(ErrorType.RATE_LIMIT_ERROR, `${platform} API rate limit exceeded (429)`, originalError)
  }

  if (isNetworkError(error)) {
    return new AppError(
      ErrorType.NETWORK_ERROR,
      `cannot reach ${platform}: ${originalError.message}`,
      originalError
    )
  }

  return new AppError(
    ErrorType.API_ERROR,
    status !== undefined
      ? `${platform} API error (${status}): ${originalError.message}`
      : `${platform} API error: ${originalError.message}`,
    originalError
  )
}
