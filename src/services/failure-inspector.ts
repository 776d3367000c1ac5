/**
 * 失敗檢查服務
 *
 * 用途：擷取失敗 run 的 job 清單，收集失敗的 job
 * - 各 run 的 job 擷取互不相依，以固定上限並發執行
 * - 單一 run 擷取失敗只略過該 run，不中斷整體分析
 */

import type {
  FailureInspection,
  FailureRecord,
  Job,
  Run,
} from '../types/pipeline-health.js';
import type { RunRepositoryClient } from './providers/run-repository-client.js';
import { processBatchItems } from '../utils/batch-processor.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';

/**
 * 失敗檢查選項
 */
export interface FailureInspectorOptions {
  /** 同時擷取 job 清單的 run 數上限（預設 5） */
  concurrency?: number;
  logger?: Logger;
}

/**
 * 失敗檢查器
 */
export class FailureInspector {
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(
    private readonly client: RunRepositoryClient,
    options: FailureInspectorOptions = {}
  ) {
    this.concurrency = options.concurrency ?? 5;
    this.logger = (options.logger ?? defaultLogger).child('failure-inspector');
  }

  /**
   * 檢查失敗的 run
   *
   * failedRuns 為 0 時直接回傳空結果，不呼叫任何 API
   *
   * @param runs - 已篩選的 run 清單
   * @param failedRuns - 失敗 run 數（來自統計）
   * @param signal - 取消訊號
   * @returns 失敗記錄與略過的 run
   */
  async inspect(
    runs: readonly Run[],
    failedRuns: number,
    signal?: AbortSignal
  ): Promise<FailureInspection> {
    if (failedRuns === 0) {
      return { failures: [], inspectedRuns: 0, skippedRuns: [] };
    }

    const failed = runs.filter(run => run.outcome === 'failure');
    this.logger.debug(`檢查 ${failed.length} 個失敗 run 的 job（並發上限 ${this.concurrency}）`);

    const batch = await processBatchItems(
      failed,
      (run) => this.client.listJobs(run, { signal }),
      { batchSize: this.concurrency, signal }
    );

    // 單一匯集點：依 run 順序附加，同一 run 內維持 job 順序
    const inspection: FailureInspection = {
      failures: [],
      inspectedRuns: 0,
      skippedRuns: [],
    };

    for (const result of batch.results) {
      if (result.status === 'fulfilled') {
        inspection.inspectedRuns++;
        inspection.failures.push(...FailureInspector.collectFailures(result.item, result.value));
      } else {
        // 取消不屬於單一 run 的失敗，直接往外拋
        signal?.throwIfAborted();

        this.logger.warn(`無法擷取 run ${result.item.id} 的 jobs，已略過: ${result.error.message}`);
        inspection.skippedRuns.push({
          runId: result.item.id,
          reason: result.error.message,
        });
      }
    }

    return inspection;
  }

  /**
   * 從單一 run 的 job 清單取出失敗記錄
   */
  static collectFailures(run: Run, jobs: readonly Job[]): FailureRecord[] {
    return jobs
      .filter(job => job.outcome === 'failure')
      .map(job => ({
        jobName: job.name,
        failedAt: job.completedAt,
        runId: run.id,
      }));
  }
}
