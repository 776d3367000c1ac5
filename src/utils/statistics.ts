/**
 * 統計工具函數
 *
 * @module utils/statistics
 */

/**
 * 計算平均值
 *
 * @param numbers - 數字陣列
 * @returns 平均值，若陣列為空則返回 0
 *
 * @example
 * ```typescript
 * const avg = mean([1, 2, 3, 4, 5])
 * // avg = 3
 * ```
 */
export function mean(numbers: readonly number[]): number {
  if (numbers.length === 0) return 0

  const sum = numbers.reduce((acc, n) => acc + n, 0)
  return sum / numbers.length
}

/**
 * 計算百分比（part / total × 100）
 *
 * @returns 百分比，total 為 0 時返回 0
 */
export function percentage(part: number, total: number): number {
  if (total === 0) return 0
  return (part / total) * 100
}
