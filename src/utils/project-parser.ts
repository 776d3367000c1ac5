import { AppError, ErrorType } from '../models/error.js'

/**
 * GitHub repository 識別
 */
export interface GitHubRepository {
  owner: string
  repo: string
}

/**
 * GitLab 專案識別
 */
export interface GitLabProject {
  /** 數字 ID 或專案路徑（namespace/project） */
  identifier: string
  /** 從 URL 解析出的 host */
  host?: string
}

function requireInput(input: string): string {
  if (!input || input.trim().length === 0) {
    throw new AppError(ErrorType.INVALID_INPUT, '專案識別不可為空')
  }
  return input.trim()
}

/**
 * 嘗試解析 URL，回傳 host 與去除 .git 後綴的路徑
 */
function parseUrl(input: string): { host: string; path: string } | null {
  try {
    const url = new URL(input)
    const pathMatch = url.pathname.match(/^\/(.+?)\/?$/)
    if (pathMatch && pathMatch[1]) {
      return {
        host: `${url.protocol}//${url.host}`,
        path: pathMatch[1].replace(/\.git$/, '')
      }
    }
  } catch {
    // 不是有效的 URL，由呼叫端以其他格式解析
  }
  return null
}

/**
 * 解析 GitHub repository 識別
 *
 * 支援格式：
 * - owner/name: "octo-org/octo-repo"
 * - 完整 URL: "https://github.com/octo-org/octo-repo"
 *
 * @throws AppError 當輸入格式無效時
 */
export function parseGitHubRepository(input: string): GitHubRepository {
  const trimmedInput = requireInput(input)
  const path = parseUrl(trimmedInput)?.path ?? trimmedInput

  const match = path.match(/^([^/\s]+)\/([^/\s]+)$/)
  if (!match || !match[1] || !match[2]) {
    throw new AppError(
      ErrorType.INVALID_INPUT,
      `無效的 repository 識別格式：${trimmedInput}（應為 owner/name）`
    )
  }

  return { owner: match[1], repo: match[2].replace(/\.git$/, '') }
}

/**
 * 從使用者輸入解析 GitLab 專案識別
 *
 * 支援格式：
 * - 數字 ID: "12345"
 * - 專案路徑: "gitlab-org/gitlab"（支援多層子群組）
 * - 完整 URL: "https://gitlab.com/gitlab-org/gitlab"
 *
 * @throws AppError 當輸入格式無效時
 */
export function parseGitLabProject(input: string): GitLabProject {
  const trimmedInput = requireInput(input)

  // 若為純數字，視為專案 ID（保持字串格式）
  if (/^\d+$/.test(trimmedInput)) {
    return { identifier: trimmedInput }
  }

  const url = parseUrl(trimmedInput)
  if (url) {
    return { identifier: url.path, host: url.host }
  }

  if (/^[^/\s]+(?:\/[^/\s]+)+$/.test(trimmedInput)) {
    return { identifier: trimmedInput }
  }

  throw new AppError(
    ErrorType.INVALID_INPUT,
    `無效的專案識別格式：${trimmedInput}`
  )
}
