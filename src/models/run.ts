/**
 * Run / Job 資料模型
 *
 * 將 CI 平台 API 回應轉換為固定欄位的 Run / Job 記錄，
 * 轉換時以 Zod 驗證欄位；未知或缺少的狀態一律視為 non_terminal
 */

import { z } from 'zod'
import type { Job, Run, RunOutcome } from '../types/pipeline-health.js'
import { AppError, ErrorType } from './error.js'
import { parseOptionalWireTimestamp, parseWireTimestamp } from '../utils/date-utils.js'
import { Logger, logger as defaultLogger } from '../utils/logger.js'

// ============================================================================
// API 回應 schema（僅驗證使用到的欄位）
// ============================================================================

/**
 * GitHub Actions workflow run
 * 對應 GitHub API: /repos/:owner/:repo/actions/runs
 */
export const GitHubRunSchema = z.object({
  id: z.union([z.number(), z.string()]),
  status: z.string().nullish(),
  conclusion: z.string().nullish(),
  created_at: z.string(),
  updated_at: z.string(),
})

/**
 * GitHub Actions job
 * 對應 GitHub API: /repos/:owner/:repo/actions/runs/:run_id/jobs
 */
export const GitHubJobSchema = z.object({
  name: z.string(),
  conclusion: z.string().nullish(),
  completed_at: z.string().nullish(),
})

/**
 * GitLab pipeline
 * 對應 GitLab API: /projects/:id/pipelines
 */
export const GitLabPipelineSchema = z.object({
  id: z.union([z.number(), z.string()]),
  status: z.string().nullish(),
  created_at: z.string(),
  updated_at: z.string(),
})

/**
 * GitLab job
 * 對應 GitLab API: /projects/:id/pipelines/:pipeline_id/jobs
 */
export const GitLabJobSchema = z.object({
  name: z.string(),
  status: z.string().nullish(),
  finished_at: z.string().nullish(),
})

// ============================================================================
// 狀態正規化
// ============================================================================

/**
 * 正規化 GitHub conclusion
 *
 * 僅 success / failure / cancelled 為具名結果，
 * 其餘（null、skipped、timed_out、action_required 等）為 non_terminal
 */
export function normalizeGitHubConclusion(conclusion: string | null | undefined): RunOutcome {
  switch (conclusion) {
    case 'success':
      return 'success'
    case 'failure':
      return 'failure'
    case 'cancelled':
      return 'cancelled'
    default:
      return 'non_terminal'
  }
}

/**
 * 正規化 GitLab status（failed / canceled 對應 failure / cancelled）
 */
export function normalizeGitLabStatus(status: string | null | undefined): RunOutcome {
  switch (status) {
    case 'success':
      return 'success'
    case 'failed':
      return 'failure'
    case 'canceled':
      return 'cancelled'
    default:
      return 'non_terminal'
  }
}

// ============================================================================
// 轉換函式
// ============================================================================

/**
 * 以 schema 驗證 API 回應，失敗時拋出 INVALID_RESPONSE
 */
function parseResponse<S extends z.ZodTypeAny>(schema: S, raw: unknown, label: string): z.infer<S> {
  const result = schema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
      .join('; ')
    throw new AppError(ErrorType.INVALID_RESPONSE, `invalid ${label} response (${issues})`)
  }
  return result.data
}

/**
 * 從 GitHub API 回應轉換為 Run
 *
 * @throws AppError INVALID_RESPONSE 當欄位缺少或時間戳格式錯誤
 */
export function fromGitHubRun(raw: unknown, project: string): Run {
  const data = parseResponse(GitHubRunSchema, raw, 'workflow run')
  const id = String(data.id)

  return {
    id,
    outcome: normalizeGitHubConclusion(data.conclusion),
    rawOutcome: data.conclusion ?? data.status ?? null,
    createdAt: parseWireTimestamp(data.created_at, `run ${id} created_at`),
    updatedAt: parseWireTimestamp(data.updated_at, `run ${id} updated_at`),
    jobsRef: { project, runId: id },
  }
}

/**
 * 解析 job 完成時間
 *
 * 格式錯誤只影響該 job：記錄警告並視為沒有完成時間，同一 run 的其他 job 照常保留
 */
function parseJobCompletedAt(value: string | null | undefined, field: string, log: Logger): Date | null {
  try {
    return parseOptionalWireTimestamp(value, field)
  } catch (error) {
    if (!(error instanceof AppError)) throw error
    log.warn(`${error.message}，完成時間視為 null`)
    return null
  }
}

/**
 * 從 GitHub API 回應轉換為 Job
 */
export function fromGitHubJob(raw: unknown, log: Logger = defaultLogger): Job {
  const data = parseResponse(GitHubJobSchema, raw, 'job')

  return {
    name: data.name,
    outcome: normalizeGitHubConclusion(data.conclusion),
    rawOutcome: data.conclusion ?? null,
    completedAt: parseJobCompletedAt(data.completed_at, `job "${data.name}" completed_at`, log),
  }
}

/**
 * 從 GitLab API 回應轉換為 Run
 */
export function fromGitLabPipeline(raw: unknown, project: string): Run {
  const data = parseResponse(GitLabPipelineSchema, raw, 'pipeline')
  const id = String(data.id)

  return {
    id,
    outcome: normalizeGitLabStatus(data.status),
    rawOutcome: data.status ?? null,
    createdAt: parseWireTimestamp(data.created_at, `pipeline ${id} created_at`),
    updatedAt: parseWireTimestamp(data.updated_at, `pipeline ${id} updated_at`),
    jobsRef: { project, runId: id },
  }
}

/**
 * 從 GitLab API 回應轉換為 Job
 */
export function fromGitLabJob(raw: unknown, log: Logger = defaultLogger): Job {
  const data = parseResponse(GitLabJobSchema, raw, 'job')

  return {
    name: data.name,
    outcome: normalizeGitLabStatus(data.status),
    rawOutcome: data.status ?? null,
    completedAt: parseJobCompletedAt(data.finished_at, `job "${data.name}" finished_at`, log),
  }
}
