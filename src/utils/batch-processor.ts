/**
 * 並發批次處理工具
 *
 * 將獨立的 I/O 分批並發執行（每批最多 batchSize 個），
 * 使用 Promise.allSettled 確保部分失敗不影響整體執行
 *
 * @module utils/batch-processor
 */

/**
 * 批次處理選項
 */
export interface BatchProcessOptions {
  /** 批次大小，即同時進行的最大數量（預設 5） */
  batchSize?: number
  /** 取消訊號；每批開始前檢查 */
  signal?: AbortSignal
}

/**
 * 單一項目的處理結果
 */
export type BatchItemResult<T, R> =
  | { status: 'fulfilled'; item: T; index: number; value: R }
  | { status: 'rejected'; item: T; index: number; error: Error }

/**
 * 批次處理結果
 */
export interface BatchResult<T, R> {
  /** 依輸入順序排列的各項結果 */
  results: Array<BatchItemResult<T, R>>
}

/**
 * 批次處理項目清單
 *
 * 結果依輸入順序排列，與各項完成的先後無關；
 * processor 同步拋出的例外與 reject 一樣只記為該項目失敗
 *
 * @param items - 要處理的項目清單
 * @param processor - 處理函數
 * @param options - 批次處理選項
 * @returns 批次處理結果
 *
 * @example
 * ```typescript
 * const result = await processBatchItems(
 *   failedRuns,
 *   async (run) => client.listJobs(run),
 *   { batchSize: 5 }
 * )
 * ```
 */
export async function processBatchItems<T, R>(
  items: readonly T[],
  processor: (item: T, index: number) => Promise<R>,
  options: BatchProcessOptions = {}
): Promise<BatchResult<T, R>> {
  const { signal } = options
  const batchSize = Math.max(1, Math.floor(options.batchSize ?? 5))

  const results: Array<BatchItemResult<T, R>> = []

  for (let i = 0; i < items.length; i += batchSize) {
    signal?.throwIfAborted()

    const batch = items.slice(i, i + batchSize)
    const settled = await Promise.allSettled(
      batch.map(async (item, batchIndex) => processor(item, i + batchIndex))
    )

    settled.forEach((outcome, batchIndex) => {
      const index = i + batchIndex
      const item = batch[batchIndex]

      if (outcome.status === 'fulfilled') {
        results.push({ status: 'fulfilled', item, index, value: outcome.value })
      } else {
        const error =
          outcome.reason instanceof Error
            ? outcome.reason
            : new Error(String(outcome.reason))
        results.push({ status: 'rejected', item, index, error })
      }
    })
  }

  return { results }
}
