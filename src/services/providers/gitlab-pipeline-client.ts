import { Gitlab } from '@gitbeaker/rest'
import type { Job, Run } from '../../types/pipeline-health.js'
import type { RequestOptions, RunRepositoryClient, RunSelector } from './run-repository-client.js'
import { AppError, ErrorType } from '../../models/error.js'
import { fromGitLabJob, fromGitLabPipeline } from '../../models/run.js'
import { parseGitLabProject } from '../../utils/project-parser.js'
import { toProviderError } from './provider-errors.js'
import { Logger, logger as defaultLogger } from '../../utils/logger.js'

/**
 * GitLab 客戶端設定
 */
export interface GitLabPipelineClientConfig {
  /** Personal Access Token */
  token: string
  /** GitLab 伺服器 URL（選用，預設為 gitlab.com） */
  host?: string
  /** 每次列出的 pipeline 數量上限（預設 100） */
  perPage?: number
  logger?: Logger
}

/**
 * GitLab CI 客戶端
 *
 * 透過 GitLab API 取得 pipeline 與 job；workflow 選擇器對應 pipeline 的 ref
 */
export class GitLabPipelineClient implements RunRepositoryClient {
  readonly name = 'gitlab'

  private client: InstanceType<typeof Gitlab>
  private readonly perPage: number
  private readonly logger: Logger

  /**
   * 建立 GitLabPipelineClient 實例
   *
   * @param config - 連線設定（包含 token、host 等）
   */
  constructor(config: GitLabPipelineClientConfig) {
    this.client = new Gitlab({
      token: config.token,
      host: config.host || 'https://gitlab.com'
    })
    this.perPage = config.perPage ?? 100
    this.logger = config.logger ?? defaultLogger
  }

  /**
   * 確認專案可存取
   *
   * @throws AppError 當 API 呼叫失敗時
   */
  async verifyAccess(project: string, options: RequestOptions = {}): Promise<void> {
    const { identifier } = parseGitLabProject(project)
    options.signal?.throwIfAborted()
    this.logger.apiCall('GET', `/projects/${identifier}`)

    try {
      await this.client.Projects.show(identifier)
    } catch (error) {
      throw toProviderError(error, 'GitLab')
    }
  }

  /**
   * 列出 pipeline
   *
   * @throws AppError 當 API 呼叫失敗或回應格式不符時
   */
  async listRuns(project: string, selector: RunSelector = {}, options: RequestOptions = {}): Promise<Run[]> {
    const { identifier } = parseGitLabProject(project)
    options.signal?.throwIfAborted()

    try {
      if (selector.runId) {
        const pipelineId = this.parsePipelineId(selector.runId)
        this.logger.apiCall('GET', `/projects/${identifier}/pipelines/${pipelineId}`)
        const pipeline = await this.client.Pipelines.show(identifier, pipelineId)
        return [fromGitLabPipeline(pipeline, project)]
      }

      this.logger.apiCall('GET', `/projects/${identifier}/pipelines`, { ref: selector.workflow })
      const pipelines = await this.client.Pipelines.all(identifier, {
        ref: selector.workflow,
        perPage: this.perPage,
        maxPages: 1,
      })
      return pipelines.map(pipeline => fromGitLabPipeline(pipeline, project))
    } catch (error) {
      throw toProviderError(error, 'GitLab')
    }
  }

  /**
   * 列出 pipeline 的 job
   *
   * @throws AppError 當 API 呼叫失敗或回應格式不符時
   */
  async listJobs(run: Run, options: RequestOptions = {}): Promise<Job[]> {
    const { identifier } = parseGitLabProject(run.jobsRef.project)
    const pipelineId = this.parsePipelineId(run.jobsRef.runId)
    options.signal?.throwIfAborted()
    this.logger.apiCall('GET', `/projects/${identifier}/pipelines/${pipelineId}/jobs`)

    try {
      const jobs = await this.client.Jobs.all(identifier, {
        pipelineId,
        perPage: this.perPage,
      })
      return jobs.map(job => fromGitLabJob(job, this.logger))
    } catch (error) {
      throw toProviderError(error, 'GitLab')
    }
  }

  private parsePipelineId(runId: string): number {
    const trimmed = runId.trim()
    if (!/^\d+$/.test(trimmed)) {
      throw new AppError(ErrorType.INVALID_INPUT, `invalid pipeline id: ${runId}`)
    }
    return parseInt(trimmed, 10)
  }
}
