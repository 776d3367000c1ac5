/**
 * Pipeline 健康度 JSON 格式化器
 *
 * 將分析結果轉為對外的 payload 格式（snake_case，百分比與分鐘數為一位小數字串）
 */

import type {
  AnalysisPayload,
  AnalysisResult,
  AnalysisSuccess,
  AnalysisSuccessPayload,
  RunStatistics,
  SummaryPayload,
} from '../types/pipeline-health.js';
import { formatWireTimestamp } from '../utils/date-utils.js';

/**
 * 格式化統計為 summary payload
 */
export function toSummaryPayload(statistics: RunStatistics): SummaryPayload {
  return {
    total_runs: statistics.totalRuns,
    successful_runs: statistics.successfulRuns,
    failed_runs: statistics.failedRuns,
    cancelled_runs: statistics.cancelledRuns,
    success_rate: `${statistics.successRate.toFixed(1)}%`,
    average_duration: `${statistics.averageDurationMinutes.toFixed(1)} minutes`,
  };
}

/**
 * 格式化成功結果
 */
export function toSuccessPayload(result: AnalysisSuccess): AnalysisSuccessPayload {
  return {
    summary: toSummaryPayload(result.statistics),
    recommendations: result.recommendations.map(r => ({
      type: r.type,
      priority: r.priority,
      message: r.message,
    })),
    recent_failures: result.failures.map(f => ({
      job_name: f.jobName,
      failed_at: f.failedAt ? formatWireTimestamp(f.failedAt) : null,
    })),
  };
}

/**
 * 格式化分析結果為 payload
 */
export function toAnalysisPayload(result: AnalysisResult): AnalysisPayload {
  if (result.status === 'error') {
    return { error: result.error };
  }
  return toSuccessPayload(result);
}

/**
 * 格式化分析結果為 JSON 字串
 */
export function formatAnalysisJson(result: AnalysisResult): string {
  return JSON.stringify(toAnalysisPayload(result), null, 2);
}
