/**
 * RecommendationClassifier 單元測試
 *
 * 目的：驗證三條規則的閾值邊界與輸出順序
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_THRESHOLDS,
  RecommendationClassifier,
} from '../../../src/services/recommendation-classifier.js';
import type { FailureRecord, RunStatistics } from '../../../src/types/pipeline-health.js';

function stats(successRate: number, averageDurationMinutes: number): RunStatistics {
  return {
    totalRuns: 10,
    successfulRuns: Math.round(successRate / 10),
    failedRuns: 10 - Math.round(successRate / 10),
    cancelledRuns: 0,
    successRate,
    averageDurationMinutes,
  };
}

function failure(jobName: string, runId: string): FailureRecord {
  return { jobName, runId, failedAt: null };
}

describe('RecommendationClassifier', () => {
  const classifier = new RecommendationClassifier();

  describe('成功率規則', () => {
    it('成功率剛好 80% 時不提出建議', () => {
      expect(classifier.classify(stats(80, 0), [])).toEqual([]);
    });

    it('成功率 70% 時提出 high 建議', () => {
      expect(classifier.classify(stats(70, 0), [])).toEqual([
        {
          type: 'success_rate',
          priority: 'high',
          message: 'Low success rate (70.0%). Review recent failures and consider improving test coverage.',
        },
      ]);
    });

    it('訊息中的成功率取一位小數', () => {
      const recommendation = classifier.successRateRule(200 / 3);

      expect(recommendation?.message).toBe(
        'Low success rate (66.7%). Review recent failures and consider improving test coverage.'
      );
    });
  });

  describe('執行時間規則', () => {
    it('平均剛好 30 分鐘時不提出建議', () => {
      expect(classifier.durationRule(30)).toBeNull();
    });

    it('平均 45 分鐘時提出 medium 建議', () => {
      expect(classifier.durationRule(45)).toEqual({
        type: 'duration',
        priority: 'medium',
        message: 'Long average pipeline duration (45.0 minutes). Consider optimizing pipeline steps or using caching.',
      });
    });
  });

  describe('重複失敗規則', () => {
    it('同名 job 失敗 2 次提出建議，只失敗 1 次的不提出', () => {
      const failures = [failure('build', '1'), failure('lint', '1'), failure('build', '2')];

      expect(classifier.failurePatternRule(failures)).toEqual([
        {
          type: 'failure_pattern',
          priority: 'high',
          message: "Job 'build' failed 2 times. Review and fix recurring issues.",
        },
      ]);
    });

    it('每個 job 名稱一則建議，依第一次出現的順序', () => {
      const failures = [
        failure('test', '1'),
        failure('build', '1'),
        failure('build', '2'),
        failure('test', '2'),
        failure('test', '3'),
      ];

      const messages = classifier.failurePatternRule(failures).map(r => r.message);

      expect(messages).toEqual([
        "Job 'test' failed 3 times. Review and fix recurring issues.",
        "Job 'build' failed 2 times. Review and fix recurring issues.",
      ]);
    });
  });

  describe('classify()', () => {
    it('依成功率 → 執行時間 → 重複失敗的順序輸出', () => {
      const result = classifier.classify(stats(50, 40), [failure('deploy', '1'), failure('deploy', '2')]);

      expect(result.map(r => r.type)).toEqual(['success_rate', 'duration', 'failure_pattern']);
    });

    it('套用自訂閾值', () => {
      const strict = new RecommendationClassifier({
        ...DEFAULT_THRESHOLDS,
        successRate: 95,
        durationMinutes: 10,
        failurePatternMinCount: 3,
      });

      const result = strict.classify(stats(90, 12), [failure('build', '1'), failure('build', '2')]);

      expect(result.map(r => r.type)).toEqual(['success_rate', 'duration']);
    });
  });
});
