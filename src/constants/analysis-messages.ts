/**
 * 分析錯誤訊息
 *
 * 作為錯誤結果的 error 欄位內容，統計與分析流程共用
 */
export const ANALYSIS_ERROR_MESSAGES = {
  missingProject: 'Missing required parameters: project owner and name are required',
  accessFailed: 'Repository access verification failed',
  fetchFailed: 'Failed to fetch pipeline data',
  noRuns: 'No pipeline runs found for the specified criteria',
  analysisFailed: 'Pipeline analysis failed',
} as const;
