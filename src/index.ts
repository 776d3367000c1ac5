export { run } from '@oclif/core'

export * from './types/pipeline-health.js'
export { AppError, ErrorType } from './models/error.js'
export { PipelineHealthMetrics } from './models/pipeline-health.js'
export { JobFailureAnalyzer } from './models/job-failure.js'
export { fromGitHubJob, fromGitHubRun, fromGitLabJob, fromGitLabPipeline } from './models/run.js'
export { filterRunsByWindow } from './services/window-filter.js'
export { FailureInspector } from './services/failure-inspector.js'
export { DEFAULT_THRESHOLDS, RecommendationClassifier } from './services/recommendation-classifier.js'
export {
  ANALYSIS_ERROR_MESSAGES,
  DEFAULT_WINDOW_DAYS,
  PipelineHealthAnalyzer,
  type PipelineHealthAnalyzerOptions,
} from './services/pipeline-health-analyzer.js'
export type { RequestOptions, RunRepositoryClient, RunSelector } from './services/providers/run-repository-client.js'
export { GitHubActionsClient } from './services/providers/github-actions-client.js'
export { GitLabPipelineClient } from './services/providers/gitlab-pipeline-client.js'
export { createRunRepositoryClient } from './services/providers/client-factory.js'
export { ConfigLoader, type HealthConfig } from './services/config/config-loader.js'
export { formatAnalysisJson, toAnalysisPayload } from './formatters/pipeline-health-json-formatter.js'
export { formatPipelineHealthReport } from './formatters/pipeline-health-table-formatter.js'
export { createLogger, Logger, LogLevel } from './utils/logger.js'
