/**
 * 日期工具函式
 *
 * 提供 CI 平台時間戳解析、分析視窗計算等功能
 */

import { differenceInMilliseconds, isValid, parseISO, subHours } from 'date-fns'
import { AppError, ErrorType } from '../models/error.js'
import { TIME_CONSTANTS } from '../constants/time-constants.js'

/**
 * CI 平台時間戳格式：UTC，秒精度，可帶小數秒（GitLab 會帶毫秒）
 * 例如：2025-10-20T10:00:00Z、2025-10-20T10:00:00.000Z
 */
const WIRE_TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?Z$/

/**
 * 解析 CI 平台回傳的時間戳
 *
 * 格式不符代表平台回應違反約定，直接拋出錯誤（不略過）
 *
 * @param value 時間戳字串
 * @param field 欄位名稱（用於錯誤訊息）
 * @throws AppError INVALID_RESPONSE
 */
export function parseWireTimestamp(value: string, field: string): Date {
  if (!WIRE_TIMESTAMP_PATTERN.test(value)) {
    throw new AppError(
      ErrorType.INVALID_RESPONSE,
      `invalid timestamp in ${field}: "${value}"`
    )
  }

  const date = parseISO(value)
  if (!isValid(date)) {
    throw new AppError(
      ErrorType.INVALID_RESPONSE,
      `invalid timestamp in ${field}: "${value}"`
    )
  }

  return date
}

/**
 * 解析可為空的時間戳（尚未完成的 job 沒有完成時間）
 */
export function parseOptionalWireTimestamp(
  value: string | null | undefined,
  field: string
): Date | null {
  if (value === null || value === undefined || value === '') return null
  return parseWireTimestamp(value, field)
}

/**
 * 格式化為 CI 平台時間戳格式（秒精度）
 *
 * @example
 * formatWireTimestamp(new Date('2025-10-20T10:00:00.000Z')) // '2025-10-20T10:00:00Z'
 */
export function formatWireTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z')
}

/**
 * 計算分析視窗起點（now − days × 24 小時）
 *
 * 以固定 24 小時計算，不受日光節約時間影響
 */
export function getWindowCutoff(now: Date, days: number): Date {
  return subHours(now, days * TIME_CONSTANTS.HOURS_PER_DAY)
}

/**
 * 計算兩個時間點之間的分鐘數（可含小數）
 */
export function minutesBetween(start: Date, end: Date): number {
  const ms = differenceInMilliseconds(end, start)
  return ms / (TIME_CONSTANTS.MS_PER_SECOND * TIME_CONSTANTS.SECONDS_PER_MINUTE)
}
