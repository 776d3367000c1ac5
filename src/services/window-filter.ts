/**
 * 分析視窗篩選器
 *
 * 用途：只保留最近 N 天內建立的 run
 */

import { isAfter } from 'date-fns';
import type { Run } from '../types/pipeline-health.js';
import { getWindowCutoff } from '../utils/date-utils.js';

/**
 * 視窗篩選選項
 */
export interface WindowFilterOptions {
  /** 目前時間（預設為呼叫當下） */
  now?: Date;
  /** 是否略過篩選（以單一 run 選擇器取得時為 true） */
  bypass?: boolean;
}

/**
 * 篩選建立時間嚴格晚於 (now − days) 的 run
 *
 * - days ≤ 0 表示不限時間範圍
 * - bypass 時原樣回傳（指定的單一 run 不論多舊都會分析）
 *
 * @param runs - Run 清單
 * @param days - 視窗天數
 * @param options - 篩選選項
 * @returns 篩選後的 run 清單（保留原順序）
 */
export function filterRunsByWindow(
  runs: readonly Run[],
  days: number,
  options: WindowFilterOptions = {}
): Run[] {
  if (options.bypass || days <= 0) {
    return [...runs];
  }

  const cutoff = getWindowCutoff(options.now ?? new Date(), days);
  return runs.filter(run => isAfter(run.createdAt, cutoff));
}
