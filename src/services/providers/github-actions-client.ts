import { Octokit } from '@octokit/rest'
import type { Job, Run } from '../../types/pipeline-health.js'
import type { RequestOptions, RunRepositoryClient, RunSelector } from './run-repository-client.js'
import { AppError, ErrorType } from '../../models/error.js'
import { fromGitHubJob, fromGitHubRun } from '../../models/run.js'
import { parseGitHubRepository } from '../../utils/project-parser.js'
import { toProviderError } from './provider-errors.js'
import { Logger, logger as defaultLogger } from '../../utils/logger.js'

/**
 * GitHub Actions 客戶端設定
 */
export interface GitHubActionsClientConfig {
  /** Personal Access Token（公開 repository 可省略） */
  token?: string
  /** API base URL（GitHub Enterprise 使用，預設 https://api.github.com） */
  baseUrl?: string
  /** 每次列出的 run 數量上限（預設 100） */
  perPage?: number
  /** 注入既有的 Octokit 實例 */
  octokit?: Octokit
  logger?: Logger
}

/**
 * GitHub Actions 客戶端
 *
 * 透過 GitHub REST API 取得 workflow run 與 job
 */
export class GitHubActionsClient implements RunRepositoryClient {
  readonly name = 'github'

  private readonly octokit: Octokit
  private readonly perPage: number
  private readonly logger: Logger

  constructor(config: GitHubActionsClientConfig = {}) {
    this.octokit = config.octokit ?? new Octokit({
      auth: config.token,
      baseUrl: config.baseUrl || 'https://api.github.com',
    })
    this.perPage = config.perPage ?? 100
    this.logger = config.logger ?? defaultLogger
  }

  /**
   * 確認 repository 可存取
   *
   * @throws AppError 當 API 呼叫失敗時
   */
  async verifyAccess(project: string, options: RequestOptions = {}): Promise<void> {
    const { owner, repo } = parseGitHubRepository(project)
    this.logger.apiCall('GET', `/repos/${owner}/${repo}`)

    try {
      await this.octokit.rest.repos.get({ owner, repo, request: { signal: options.signal } })
    } catch (error) {
      throw toProviderError(error, 'GitHub')
    }
  }

  /**
   * 列出 workflow run
   *
   * - 指定 runId：只取得該 run
   * - 指定 workflow：該 workflow（ID 或檔名）的 run
   * - 其他：repository 所有 run
   *
   * @throws AppError 當 API 呼叫失敗或回應格式不符時
   */
  async listRuns(project: string, selector: RunSelector = {}, options: RequestOptions = {}): Promise<Run[]> {
    const { owner, repo } = parseGitHubRepository(project)
    const request = { signal: options.signal }

    try {
      if (selector.runId) {
        const runId = this.parseRunId(selector.runId)
        this.logger.apiCall('GET', `/repos/${owner}/${repo}/actions/runs/${runId}`)
        const { data } = await this.octokit.rest.actions.getWorkflowRun({
          owner,
          repo,
          run_id: runId,
          request,
        })
        return [fromGitHubRun(data, project)]
      }

      if (selector.workflow) {
        this.logger.apiCall('GET', `/repos/${owner}/${repo}/actions/workflows/${selector.workflow}/runs`)
        const { data } = await this.octokit.rest.actions.listWorkflowRuns({
          owner,
          repo,
          workflow_id: selector.workflow,
          per_page: this.perPage,
          request,
        })
        return data.workflow_runs.map(run => fromGitHubRun(run, project))
      }

      this.logger.apiCall('GET', `/repos/${owner}/${repo}/actions/runs`)
      const { data } = await this.octokit.rest.actions.listWorkflowRunsForRepo({
        owner,
        repo,
        per_page: this.perPage,
        request,
      })
      return data.workflow_runs.map(run => fromGitHubRun(run, project))
    } catch (error) {
      throw toProviderError(error, 'GitHub')
    }
  }

  /**
   * 列出 run 的 job
   *
   * @throws AppError 當 API 呼叫失敗或回應格式不符時
   */
  async listJobs(run: Run, options: RequestOptions = {}): Promise<Job[]> {
    const { owner, repo } = parseGitHubRepository(run.jobsRef.project)
    const runId = this.parseRunId(run.jobsRef.runId)
    this.logger.apiCall('GET', `/repos/${owner}/${repo}/actions/runs/${runId}/jobs`)

    try {
      const { data } = await this.octokit.rest.actions.listJobsForWorkflowRun({
        owner,
        repo,
        run_id: runId,
        per_page: this.perPage,
        request: { signal: options.signal },
      })
      return data.jobs.map(job => fromGitHubJob(job, this.logger))
    } catch (error) {
      throw toProviderError(error, 'GitHub')
    }
  }

  private parseRunId(runId: string): number {
    const trimmed = runId.trim()
    if (!/^\d+$/.test(trimmed)) {
      throw new AppError(ErrorType.INVALID_INPUT, `invalid run id: ${runId}`)
    }
    return parseInt(trimmed, 10)
  }
}
