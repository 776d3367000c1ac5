import type { ProviderName } from '../../types/pipeline-health.js'
import type { RunRepositoryClient } from './run-repository-client.js'
import { AppError, ErrorType } from '../../models/error.js'
import { parseGitLabProject } from '../../utils/project-parser.js'
import { GitHubActionsClient } from './github-actions-client.js'
import { GitLabPipelineClient } from './gitlab-pipeline-client.js'
import type { Logger } from '../../utils/logger.js'

/** 各平台讀取 token 的環境變數 */
export const TOKEN_ENV_VARS: Record<ProviderName, string> = {
  github: 'GITHUB_TOKEN',
  gitlab: 'GITLAB_TOKEN',
}

export interface ClientFactoryOptions {
  provider: ProviderName
  /** 專案識別（GitLab 可從 URL 推得 host） */
  project?: string
  token?: string
  host?: string
  perPage?: number
  logger?: Logger
}

/**
 * 依平台建立 RunRepositoryClient
 *
 * @throws AppError 當 GitLab 未提供 token 時
 */
export function createRunRepositoryClient(options: ClientFactoryOptions): RunRepositoryClient {
  if (options.provider === 'github') {
    return new GitHubActionsClient({
      token: options.token,
      baseUrl: options.host,
      perPage: options.perPage,
      logger: options.logger,
    })
  }

  if (!options.token) {
    throw new AppError(
      ErrorType.INVALID_INPUT,
      `請提供 GitLab Personal Access Token（使用 --token 或設定環境變數 ${TOKEN_ENV_VARS.gitlab}）`
    )
  }

  // URL 形式的專案識別帶有 host，未指定 --host 時沿用
  const projectHost = options.project?.trim() ? parseGitLabProject(options.project).host : undefined

  return new GitLabPipelineClient({
    token: options.token,
    host: options.host ?? projectHost,
    perPage: options.perPage,
    logger: options.logger,
  })
}
