/**
 * 建議分類器服務
 *
 * 用途：依閾值規則從統計與失敗記錄產生建議
 * 規則依固定順序評估：成功率 → 執行時間 → 重複失敗的 job
 */

import type {
  FailureRecord,
  Recommendation,
  RecommendationThresholds,
  RunStatistics,
} from '../types/pipeline-health.js';
import { JobFailureAnalyzer } from '../models/job-failure.js';

/**
 * 預設閾值
 */
export const DEFAULT_THRESHOLDS: Readonly<RecommendationThresholds> = {
  successRate: 80,
  durationMinutes: 30,
  failurePatternMinCount: 2,
};

/**
 * 建議分類器
 */
export class RecommendationClassifier {
  constructor(
    private readonly thresholds: RecommendationThresholds = { ...DEFAULT_THRESHOLDS }
  ) {}

  /**
   * 產生建議清單
   *
   * @param statistics - Run 統計
   * @param failures - 失敗記錄
   * @returns 依規則評估順序排列的建議
   */
  classify(
    statistics: Readonly<RunStatistics>,
    failures: readonly FailureRecord[]
  ): Recommendation[] {
    const recommendations: Recommendation[] = [];

    const successRate = this.successRateRule(statistics.successRate);
    if (successRate) recommendations.push(successRate);

    const duration = this.durationRule(statistics.averageDurationMinutes);
    if (duration) recommendations.push(duration);

    recommendations.push(...this.failurePatternRule(failures));

    return recommendations;
  }

  /**
   * 成功率規則：低於閾值（嚴格小於）時提出 high 建議
   */
  successRateRule(successRate: number): Recommendation | null {
    if (successRate >= this.thresholds.successRate) return null;

    return {
      type: 'success_rate',
      priority: 'high',
      message: `Low success rate (${successRate.toFixed(1)}%). Review recent failures and consider improving test coverage.`,
    };
  }

  /**
   * 執行時間規則：平均執行時間高於閾值（嚴格大於）時提出 medium 建議
   */
  durationRule(averageDurationMinutes: number): Recommendation | null {
    if (averageDurationMinutes <= this.thresholds.durationMinutes) return null;

    return {
      type: 'duration',
      priority: 'medium',
      message: `Long average pipeline duration (${averageDurationMinutes.toFixed(1)} minutes). Consider optimizing pipeline steps or using caching.`,
    };
  }

  /**
   * 重複失敗規則：同名 job 失敗次數達閾值時，每個 job 名稱一則 high 建議
   *
   * 只失敗一次的 job 不會產生建議
   */
  failurePatternRule(failures: readonly FailureRecord[]): Recommendation[] {
    return JobFailureAnalyzer.countByJobName(failures)
      .filter(({ failureCount }) => failureCount >= this.thresholds.failurePatternMinCount)
      .map(({ jobName, failureCount }) => ({
        type: 'failure_pattern' as const,
        priority: 'high' as const,
        message: `Job '${jobName}' failed ${failureCount} times. Review and fix recurring issues.`,
      }));
  }
}
