import { AppError, ErrorType } from '../models/error.js'
import type { AnalysisFailure } from '../types/pipeline-health.js'

/**
 * 錯誤訊息格式化器
 *
 * 將分析錯誤轉換為終端機輸出（錯誤原文 + 正體中文建議動作）
 */
export class ErrorFormatter {
  /**
   * 錯誤類型對應的建議動作
   */
  private static readonly SUGGESTED_ACTIONS: Record<ErrorType, string[]> = {
    [ErrorType.INVALID_INPUT]: [
      'GitHub 專案格式：owner/name 或 https://github.com/owner/name',
      'GitLab 專案格式：數字 ID、namespace/project 或完整 URL',
      '--days 必須為整數'
    ],
    [ErrorType.AUTH_ERROR]: [
      '請檢查 Personal Access Token 是否正確且尚未過期',
      '使用 --token 參數或設定環境變數 GITHUB_TOKEN / GITLAB_TOKEN'
    ],
    [ErrorType.ACCESS_ERROR]: [
      '確認專案識別正確且專案確實存在',
      '檢查 Token 是否具有讀取 CI 資料的權限（GitHub: actions:read，GitLab: read_api）'
    ],
    [ErrorType.PROJECT_NOT_FOUND]: [
      '確認專案識別與 run ID 正確',
      '若指定 --workflow，請確認 workflow ID 或檔名存在'
    ],
    [ErrorType.NETWORK_ERROR]: [
      '檢查網路連線是否正常',
      '確認伺服器 URL 正確（使用 --host）'
    ],
    [ErrorType.RATE_LIMIT_ERROR]: [
      '請稍後再試（通常需等待 1 分鐘）',
      '使用 Token 可提高 API 請求上限'
    ],
    [ErrorType.API_ERROR]: [
      '請稍後再試',
      '使用 --verbose 查看 API 呼叫紀錄'
    ],
    [ErrorType.INVALID_RESPONSE]: [
      'CI 平台回傳的資料格式不符預期',
      '使用 --verbose 查看 API 呼叫紀錄'
    ],
    [ErrorType.EMPTY_RESULT]: [
      '嘗試增加 --days 天數',
      '移除 --workflow 以分析所有 workflow'
    ],
    [ErrorType.CONFIG_ERROR]: [
      '檢查 .ci-health.yml 或 ~/.ci-health/config.yml 的內容',
      '使用 --config 指定其他配置檔'
    ],
    [ErrorType.INTERNAL_ERROR]: [
      '使用 --verbose 重新執行以取得詳細資訊'
    ]
  }

  /**
   * 錯誤類型的英文標籤
   */
  private static readonly TYPE_LABELS: Record<ErrorType, string> = {
    [ErrorType.INVALID_INPUT]: 'Validation',
    [ErrorType.AUTH_ERROR]: 'Authentication',
    [ErrorType.ACCESS_ERROR]: 'Access',
    [ErrorType.PROJECT_NOT_FOUND]: 'Not Found',
    [ErrorType.NETWORK_ERROR]: 'Network',
    [ErrorType.RATE_LIMIT_ERROR]: 'Rate Limit',
    [ErrorType.API_ERROR]: 'API Error',
    [ErrorType.INVALID_RESPONSE]: 'Invalid Response',
    [ErrorType.EMPTY_RESULT]: 'No Data',
    [ErrorType.CONFIG_ERROR]: 'Configuration',
    [ErrorType.INTERNAL_ERROR]: 'Internal'
  }

  /**
   * 格式化錯誤訊息
   *
   * 格式:
   * Error: <TYPE> - <REASON>
   * Suggestion: <ACTIONABLE_ADVICE>
   * [--verbose: Technical details]
   *
   * @param verbose - 是否顯示技術細節（--verbose 模式）
   */
  static format(error: AppError, verbose: boolean = false): string {
    let output = this.formatFailure({ status: 'error', errorType: error.type, error: error.message })

    // --verbose 模式顯示技術細節
    if (verbose && error.originalError) {
      output += '\nTechnical Details (--verbose):\n'
      output += `  Original Message: ${error.originalError.message}\n`

      if (error.originalError.stack) {
        output += '  Stack Trace:\n'
        const stackLines = error.originalError.stack.split('\n').slice(0, 5)
        stackLines.forEach(line => {
          output += `    ${line}\n`
        })
      }
    }

    return output
  }

  /**
   * 格式化分析錯誤結果
   */
  static formatFailure(failure: AnalysisFailure): string {
    const actions = this.getSuggestedActions(failure.errorType)
    let output = `Error: ${this.TYPE_LABELS[failure.errorType]} - ${failure.error}\n`

    if (actions.length > 0) {
      output += '\nSuggestion:\n'
      actions.forEach(action => {
        output += `  • ${action}\n`
      })
    }

    return output
  }

  /**
   * 取得建議動作列表
   */
  static getSuggestedActions(type: ErrorType): string[] {
    return this.SUGGESTED_ACTIONS[type]
  }
}
