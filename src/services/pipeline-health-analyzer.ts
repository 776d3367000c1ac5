/**
 * Pipeline 健康分析器服務
 *
 * 用途：整合視窗篩選、統計、失敗檢查與建議分類
 * 流程：驗證輸入 → 確認存取 → 列出 run → 篩選 → 統計 → 檢查失敗 → 分類建議
 *
 * 統計之前的任一步驟失敗即回傳錯誤結果（不重試）；
 * 統計之後的 job 擷取失敗只略過該 run
 */

import type {
  AnalysisFailure,
  AnalysisRequest,
  AnalysisResult,
  AnalysisSuccess,
  RecommendationThresholds,
  Run,
} from '../types/pipeline-health.js';
import type { RunRepositoryClient } from './providers/run-repository-client.js';
import { AppError, ErrorType, toError } from '../models/error.js';
import { PipelineHealthMetrics } from '../models/pipeline-health.js';
import { filterRunsByWindow } from './window-filter.js';
import { FailureInspector } from './failure-inspector.js';
import { DEFAULT_THRESHOLDS, RecommendationClassifier } from './recommendation-classifier.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';
import { ANALYSIS_ERROR_MESSAGES } from '../constants/analysis-messages.js';

export { ANALYSIS_ERROR_MESSAGES };

/** 預設分析天數 */
export const DEFAULT_WINDOW_DAYS = 7;

/**
 * 分析器選項
 */
export interface PipelineHealthAnalyzerOptions {
  /** 建議規則閾值（未指定的項目使用預設值） */
  thresholds?: Partial<RecommendationThresholds>;
  /** job 擷取並發上限 */
  concurrency?: number;
  /** 請求未指定天數時使用的天數 */
  defaultDays?: number;
  logger?: Logger;
  /** 目前時間來源（測試用） */
  now?: () => Date;
}

/**
 * Pipeline 健康分析器
 *
 * 每次 analyze() 皆建立獨立的資料，呼叫之間不保留任何狀態
 */
export class PipelineHealthAnalyzer {
  private readonly inspector: FailureInspector;
  private readonly classifier: RecommendationClassifier;
  private readonly defaultDays: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly client: RunRepositoryClient,
    options: PipelineHealthAnalyzerOptions = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.defaultDays = options.defaultDays ?? DEFAULT_WINDOW_DAYS;
    this.now = options.now ?? (() => new Date());
    this.inspector = new FailureInspector(client, {
      concurrency: options.concurrency,
      logger: this.logger,
    });
    this.classifier = new RecommendationClassifier({
      ...DEFAULT_THRESHOLDS,
      ...options.thresholds,
    });
  }

  /**
   * 分析 Pipeline 健康狀態
   *
   * 取消訊號觸發時直接拋出取消原因，不回傳任何部分結果
   *
   * @param request - 分析請求
   * @returns 成功或錯誤結果
   */
  async analyze(request: AnalysisRequest): Promise<AnalysisResult> {
    const startedAt = Date.now();

    try {
      const result = await this.execute(request);
      this.logger.performance('pipeline 健康分析', Date.now() - startedAt);
      return result;
    } catch (error) {
      if (request.signal?.aborted) {
        throw request.signal.reason;
      }
      return this.toFailure(error);
    }
  }

  private async execute(request: AnalysisRequest): Promise<AnalysisSuccess> {
    const { signal } = request;

    // 1. 驗證輸入（任何 I/O 之前）
    const project = (request.project ?? '').trim();
    if (project.length === 0) {
      throw new AppError(ErrorType.INVALID_INPUT, ANALYSIS_ERROR_MESSAGES.missingProject);
    }

    const days = request.days ?? this.defaultDays;
    if (!Number.isInteger(days)) {
      throw new AppError(ErrorType.INVALID_INPUT, `Invalid day window: ${days}`);
    }

    const runId = request.runId?.trim() || undefined;

    // 2. 確認專案存取權限
    signal?.throwIfAborted();
    this.logger.debug(`確認專案存取權限: ${project}（${this.client.name}）`);
    try {
      await this.client.verifyAccess(project, { signal });
    } catch (error) {
      // 專案識別格式錯誤在呼叫 API 前即被拒絕，屬於輸入錯誤
      if (error instanceof AppError && error.type === ErrorType.INVALID_INPUT) {
        throw error;
      }
      throw new AppError(ErrorType.ACCESS_ERROR, ANALYSIS_ERROR_MESSAGES.accessFailed, toError(error));
    }

    // 3. 列出 run（單一 run 選擇器忽略 workflow）
    signal?.throwIfAborted();
    let runs: Run[];
    try {
      runs = await this.client.listRuns(
        project,
        runId ? { runId } : { workflow: request.workflow },
        { signal }
      );
    } catch (error) {
      const cause = toError(error);
      throw new AppError(
        error instanceof AppError ? error.type : ErrorType.API_ERROR,
        `${ANALYSIS_ERROR_MESSAGES.fetchFailed}: ${cause.message}`,
        cause
      );
    }

    // 4. 篩選分析視窗
    const filtered = filterRunsByWindow(runs, days, {
      now: this.now(),
      bypass: runId !== undefined,
    });
    this.logger.debug(`取得 ${runs.length} 個 run，視窗內 ${filtered.length} 個`);

    if (filtered.length === 0) {
      throw new AppError(ErrorType.EMPTY_RESULT, ANALYSIS_ERROR_MESSAGES.noRuns);
    }

    // 5. 統計
    const statistics = PipelineHealthMetrics.calculate(filtered);

    // 6. 檢查失敗的 job（部分失敗不中斷）
    const inspection = await this.inspector.inspect(filtered, statistics.failedRuns, signal);
    if (inspection.skippedRuns.length > 0) {
      this.logger.warn(`${inspection.skippedRuns.length} 個失敗 run 的 job 無法取得，已略過`);
    }

    // 7. 分類建議
    const recommendations = this.classifier.classify(statistics, inspection.failures);

    return {
      status: 'success',
      statistics,
      recommendations,
      failures: inspection.failures,
      inspection,
    };
  }

  /**
   * 將錯誤轉為錯誤結果
   */
  private toFailure(error: unknown): AnalysisFailure {
    if (error instanceof AppError) {
      this.logger.debug(`分析終止: ${error.type} - ${error.message}`);
      return { status: 'error', errorType: error.type, error: error.message };
    }

    this.logger.error('pipeline 健康分析發生未預期的錯誤', error);
    return {
      status: 'error',
      errorType: ErrorType.INTERNAL_ERROR,
      error: ANALYSIS_ERROR_MESSAGES.analysisFailed,
    };
  }
}
