/**
 * Pipeline 健康度分析型別定義
 */

import type { ErrorType } from '../models/error.js';

// ============================================================================
// Run / Job 相關型別
// ============================================================================

/**
 * 正規化後的執行結果
 *
 * 平台回傳的其他狀態（running、skipped、timed_out 等）一律為 non_terminal，
 * 計入總數但不計入任何具名類別
 */
export type RunOutcome = 'success' | 'failure' | 'cancelled' | 'non_terminal';

/**
 * CI 平台
 */
export type ProviderName = 'github' | 'gitlab';

/**
 * 取得 run 的 job 清單所需的參照
 */
export interface JobsReference {
  /** 專案識別 */
  readonly project: string;
  /** Run ID */
  readonly runId: string;
}

/**
 * Pipeline 執行記錄（GitHub workflow run / GitLab pipeline）
 */
export interface Run {
  /** Run ID */
  readonly id: string;
  /** 正規化後的結果 */
  readonly outcome: RunOutcome;
  /** 平台原始狀態值 */
  readonly rawOutcome: string | null;
  /** 建立時間 */
  readonly createdAt: Date;
  /** 最後更新時間 */
  readonly updatedAt: Date;
  /** 取得 job 清單用的參照 */
  readonly jobsRef: JobsReference;
}

/**
 * Run 中的個別 job
 */
export interface Job {
  /** Job 名稱（不同 run 之間可重複） */
  readonly name: string;
  /** 正規化後的結果 */
  readonly outcome: RunOutcome;
  /** 平台原始狀態值 */
  readonly rawOutcome: string | null;
  /** 完成時間（null 表示尚未完成） */
  readonly completedAt: Date | null;
}

// ============================================================================
// 請求
// ============================================================================

/**
 * 分析請求
 */
export interface AnalysisRequest {
  /** 專案識別（owner/name、GitLab 專案路徑或 ID、或 URL） */
  project: string;
  /** Workflow 選擇器（GitLab 對應 ref） */
  workflow?: string;
  /** 單一 run 選擇器；指定時忽略天數視窗與 workflow */
  runId?: string;
  /** 分析天數（預設 7，≤ 0 表示不限） */
  days?: number;
  /** 外部取消訊號 */
  signal?: AbortSignal;
}

// ============================================================================
// 統計與失敗記錄
// ============================================================================

/**
 * Run 統計
 */
export interface RunStatistics {
  totalRuns: number;
  successfulRuns: number;
  failedRuns: number;
  cancelledRuns: number;
  /** 成功率百分比（successful / total × 100，不裁切） */
  successRate: number;
  /** 平均執行時間（分鐘，僅計 success / failure 的 run） */
  averageDurationMinutes: number;
}

/**
 * 失敗 job 記錄（僅來自 outcome 為 failure 的 run）
 */
export interface FailureRecord {
  jobName: string;
  failedAt: Date | null;
  runId: string;
}

/**
 * 因 job 清單擷取失敗而略過的 run
 */
export interface SkippedRun {
  runId: string;
  reason: string;
}

/**
 * 失敗檢查結果（允許部分失敗）
 */
export interface FailureInspection {
  failures: FailureRecord[];
  /** 成功取得 job 清單的 run 數 */
  inspectedRuns: number;
  skippedRuns: SkippedRun[];
}

// ============================================================================
// 建議
// ============================================================================

export type RecommendationType = 'success_rate' | 'duration' | 'failure_pattern';

export type RecommendationPriority = 'high' | 'medium';

export interface Recommendation {
  type: RecommendationType;
  priority: RecommendationPriority;
  message: string;
}

/**
 * 建議規則閾值
 */
export interface RecommendationThresholds {
  /** 成功率低於此值（%）時提出建議 */
  successRate: number;
  /** 平均執行時間高於此值（分鐘）時提出建議 */
  durationMinutes: number;
  /** 同名 job 失敗次數達此值時提出建議 */
  failurePatternMinCount: number;
}

// ============================================================================
// 分析結果
// ============================================================================

export interface AnalysisSuccess {
  status: 'success';
  statistics: RunStatistics;
  recommendations: Recommendation[];
  failures: FailureRecord[];
  inspection: FailureInspection;
}

export interface AnalysisFailure {
  status: 'error';
  errorType: ErrorType;
  error: string;
}

export type AnalysisResult = AnalysisSuccess | AnalysisFailure;

// ============================================================================
// 輸出格式（wire payload）
// ============================================================================

export interface SummaryPayload {
  total_runs: number;
  successful_runs: number;
  failed_runs: number;
  cancelled_runs: number;
  /** 如 "80.0%" */
  success_rate: string;
  /** 如 "45.0 minutes" */
  average_duration: string;
}

export interface RecentFailurePayload {
  job_name: string;
  failed_at: string | null;
}

export interface AnalysisSuccessPayload {
  summary: SummaryPayload;
  recommendations: Recommendation[];
  recent_failures: RecentFailurePayload[];
}

export interface AnalysisErrorPayload {
  error: string;
}

export type AnalysisPayload = AnalysisSuccessPayload | AnalysisErrorPayload;
