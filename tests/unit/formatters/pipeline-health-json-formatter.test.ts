/**
 * Pipeline 健康度 JSON 格式化器單元測試
 */

import { describe, it, expect } from 'vitest';
import {
  formatAnalysisJson,
  toAnalysisPayload,
  toSummaryPayload,
} from '../../../src/formatters/pipeline-health-json-formatter.js';
import { ErrorType } from '../../../src/models/error.js';
import type { AnalysisSuccess } from '../../../src/types/pipeline-health.js';

const success: AnalysisSuccess = {
  status: 'success',
  statistics: {
    totalRuns: 3,
    successfulRuns: 1,
    failedRuns: 2,
    cancelledRuns: 0,
    successRate: 100 / 3,
    averageDurationMinutes: 12.34,
  },
  recommendations: [
    {
      type: 'success_rate',
      priority: 'high',
      message: 'Low success rate (33.3%). Review recent failures and consider improving test coverage.',
    },
  ],
  failures: [
    { jobName: 'build', failedAt: new Date('2025-10-20T10:05:00.000Z'), runId: '2' },
    { jobName: 'test', failedAt: null, runId: '3' },
  ],
  inspection: {
    failures: [],
    inspectedRuns: 2,
    skippedRuns: [],
  },
};

describe('pipeline-health-json-formatter', () => {
  it('toSummaryPayload() 以一位小數字串輸出成功率與平均時間', () => {
    expect(toSummaryPayload(success.statistics)).toEqual({
      total_runs: 3,
      successful_runs: 1,
      failed_runs: 2,
      cancelled_runs: 0,
      success_rate: '33.3%',
      average_duration: '12.3 minutes',
    });
  });

  it('toAnalysisPayload() 轉換成功結果', () => {
    expect(toAnalysisPayload(success)).toEqual({
      summary: {
        total_runs: 3,
        successful_runs: 1,
        failed_runs: 2,
        cancelled_runs: 0,
        success_rate: '33.3%',
        average_duration: '12.3 minutes',
      },
      recommendations: [
        {
          type: 'success_rate',
          priority: 'high',
          message: 'Low success rate (33.3%). Review recent failures and consider improving test coverage.',
        },
      ],
      recent_failures: [
        { job_name: 'build', failed_at: '2025-10-20T10:05:00Z' },
        { job_name: 'test', failed_at: null },
      ],
    });
  });

  it('錯誤結果只含 error 欄位', () => {
    expect(
      toAnalysisPayload({ status: 'error', errorType: ErrorType.ACCESS_ERROR, error: 'Repository access verification failed' })
    ).toEqual({ error: 'Repository access verification failed' });
  });

  it('formatAnalysisJson() 以兩個空白縮排', () => {
    const json = formatAnalysisJson({ status: 'error', errorType: ErrorType.EMPTY_RESULT, error: 'none' });

    expect(json).toBe('{\n  "error": "none"\n}');
  });
});
