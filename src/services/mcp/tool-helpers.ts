/**
 * MCP 工具回應輔助函數
 */

import type { AnalysisPayload } from '../../types/pipeline-health.js'

/**
 * 將資料包成 MCP 工具的 JSON 文字回應
 */
export function toolResponse(data: unknown) {
  return {
    content: [
      {
        type: 'text' as const,
        text: typeof data === 'string' ? data : JSON.stringify(data, null, 2),
      },
    ],
  }
}

/**
 * MCP 工具錯誤回應（非分析結果的例外，如取消）
 */
export function toolError(error: unknown) {
  return {
    content: [
      {
        type: 'text' as const,
        text: `Error: ${error instanceof Error ? error.message : String(error)}`,
      },
    ],
    isError: true as const,
  }
}

/**
 * 分析結果回應；錯誤結果加上 isError 標記
 */
export function payloadResponse(payload: AnalysisPayload) {
  if ('error' in payload) {
    return { ...toolResponse(payload), isError: true as const }
  }
  return toolResponse(payload)
}
