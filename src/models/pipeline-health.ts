/**
 * Pipeline 健康度模型
 *
 * 用途：從 run 清單計算健康指標
 * - 各結果數量統計
 * - 成功率計算
 * - 平均執行時間
 */

import type { Run, RunStatistics } from '../types/pipeline-health.js';
import { AppError, ErrorType } from './error.js';
import { minutesBetween } from '../utils/date-utils.js';
import { mean, percentage } from '../utils/statistics.js';
import { ANALYSIS_ERROR_MESSAGES } from '../constants/analysis-messages.js';

/**
 * Pipeline 健康度指標計算器
 */
export class PipelineHealthMetrics {
  /**
   * 計算 run 統計
   *
   * 成功率分母為全部 run 數（含執行中），與只計已完成 run 的算法不同
   *
   * @param runs - 已篩選的 run 清單
   * @returns Run 統計
   * @throws AppError EMPTY_RESULT 當清單為空
   */
  static calculate(runs: readonly Run[]): RunStatistics {
    const totalRuns = runs.length;

    if (totalRuns === 0) {
      throw new AppError(ErrorType.EMPTY_RESULT, ANALYSIS_ERROR_MESSAGES.noRuns);
    }

    // 1. 統計各結果 run 數量（non_terminal 只計入總數）
    const successfulRuns = runs.filter(r => r.outcome === 'success').length;
    const failedRuns = runs.filter(r => r.outcome === 'failure').length;
    const cancelledRuns = runs.filter(r => r.outcome === 'cancelled').length;

    // 2. 執行時間樣本：僅 success / failure
    const durations = runs
      .filter(r => r.outcome === 'success' || r.outcome === 'failure')
      .map(r => this.durationMinutes(r));

    return {
      totalRuns,
      successfulRuns,
      failedRuns,
      cancelledRuns,
      successRate: percentage(successfulRuns, totalRuns),
      averageDurationMinutes: mean(durations),
    };
  }

  /**
   * 單一 run 的執行時間（分鐘）= 最後更新時間 − 建立時間
   */
  static durationMinutes(run: Run): number {
    return minutesBetween(run.createdAt, run.updatedAt);
  }
}
