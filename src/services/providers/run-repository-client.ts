/**
 * Run Repository Client 介面
 *
 * 分析引擎透過此介面取得 run 與 job 資料，不直接依賴任何 CI 平台
 */

import type { Job, Run } from '../../types/pipeline-health.js';

/**
 * 單次呼叫選項
 */
export interface RequestOptions {
  /** 外部取消訊號 */
  signal?: AbortSignal;
}

/**
 * Run 選擇器
 */
export interface RunSelector {
  /** Workflow 選擇器（縮小列出的 run 範圍） */
  workflow?: string;
  /** 單一 run ID（指定時忽略 workflow） */
  runId?: string;
}

/**
 * Run Repository Client
 *
 * 所有方法失敗時拋出 AppError，錯誤類型區分「找不到」與其他平台錯誤
 */
export interface RunRepositoryClient {
  /** 平台名稱（用於日誌） */
  readonly name: string;

  /**
   * 確認專案可存取
   */
  verifyAccess(project: string, options?: RequestOptions): Promise<void>;

  /**
   * 列出 run；指定 runId 時只回傳該 run
   */
  listRuns(project: string, selector?: RunSelector, options?: RequestOptions): Promise<Run[]>;

  /**
   * 依 run.jobsRef 列出 run 的 job
   */
  listJobs(run: Run, options?: RequestOptions): Promise<Job[]>;
}
