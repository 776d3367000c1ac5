/**
 * Job 失敗分析模型
 *
 * 用途：依 job 名稱統計失敗次數
 */

import type { FailureRecord } from '../types/pipeline-health.js';

/**
 * 單一 job 名稱的失敗統計
 */
export interface JobFailureCount {
  jobName: string;
  failureCount: number;
}

/**
 * Job 失敗分析器
 */
export class JobFailureAnalyzer {
  /**
   * 依 job 名稱統計失敗次數
   *
   * 結果依各 job 名稱第一次出現的順序排列
   *
   * @param failures - 失敗記錄
   * @returns 各 job 名稱的失敗次數
   */
  static countByJobName(failures: readonly FailureRecord[]): JobFailureCount[] {
    const counts = new Map<string, number>();

    for (const failure of failures) {
      counts.set(failure.jobName, (counts.get(failure.jobName) ?? 0) + 1);
    }

    return Array.from(counts.entries()).map(([jobName, failureCount]) => ({
      jobName,
      failureCount,
    }));
  }
}
