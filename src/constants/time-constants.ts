/**
 * Time Conversion Constants
 *
 * 用於執行時間與分析視窗計算的時間轉換常數。
 */

/**
 * 時間單位轉換常數
 */
export const TIME_CONSTANTS = {
  /** 每分鐘秒數 */
  SECONDS_PER_MINUTE: 60,

  /** 每天小時數 */
  HOURS_PER_DAY: 24,

  /** 每秒毫秒數 */
  MS_PER_SECOND: 1000,
} as const;
