/**
 * analyze_pipeline_results MCP 工具
 *
 * 將 PipelineHealthAnalyzer 以 MCP 工具形式提供，回傳與 --json 相同的資料格式
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { z } from 'zod'
import type { AnalysisRequest } from '../../types/pipeline-health.js'
import type { PipelineHealthAnalyzer } from '../pipeline-health-analyzer.js'
import { toAnalysisPayload } from '../../formatters/pipeline-health-json-formatter.js'
import { payloadResponse, toolError } from './tool-helpers.js'
import { Logger, logger as defaultLogger } from '../../utils/logger.js'

export const ANALYZE_TOOL_NAME = 'analyze_pipeline_results'

/**
 * 工具輸入 schema
 */
export const analyzeToolInputSchema = {
  repo_owner: z.string().describe('Repository owner（GitLab 為 namespace）'),
  repo_name: z.string().describe('Repository name'),
  workflow_id: z
    .union([z.string(), z.number().int()])
    .optional()
    .describe('Workflow ID 或檔名（GitLab 為 ref）'),
  run_id: z
    .union([z.string(), z.number().int()])
    .optional()
    .describe('只分析單一 run；指定時忽略 workflow_id 與 days'),
  days: z.number().int().optional().describe('分析最近幾天（預設 7；≤ 0 表示不限）'),
}

const AnalyzeToolInput = z.object(analyzeToolInputSchema)
export type AnalyzeToolInput = z.infer<typeof AnalyzeToolInput>

/**
 * 將工具輸入轉為分析請求
 *
 * owner 或 name 任一為空時 project 為空字串，由分析器回報缺少參數
 */
export function toAnalysisRequest(input: AnalyzeToolInput, signal?: AbortSignal): AnalysisRequest {
  const owner = input.repo_owner.trim()
  const name = input.repo_name.trim()

  return {
    project: owner && name ? `${owner}/${name}` : '',
    workflow: input.workflow_id === undefined ? undefined : String(input.workflow_id),
    runId: input.run_id === undefined ? undefined : String(input.run_id),
    days: input.days,
    signal,
  }
}

/**
 * 執行一次工具呼叫
 */
export async function handleAnalyzePipelineResults(
  analyzer: PipelineHealthAnalyzer,
  input: AnalyzeToolInput,
  signal?: AbortSignal,
  log: Logger = defaultLogger
) {
  const startedAt = Date.now()

  try {
    const result = await analyzer.analyze(toAnalysisRequest(input, signal))
    log.info(`[${ANALYZE_TOOL_NAME}] ${result.status} (${Date.now() - startedAt}ms)`)
    return payloadResponse(toAnalysisPayload(result))
  } catch (error) {
    log.error(`[${ANALYZE_TOOL_NAME}] 執行中止`, error)
    return toolError(error)
  }
}

/**
 * 在 MCP server 註冊 analyze_pipeline_results 工具
 */
export function registerPipelineHealthTool(
  server: Pick<McpServer, 'registerTool'>,
  analyzer: PipelineHealthAnalyzer,
  log: Logger = defaultLogger
): void {
  server.registerTool(
    ANALYZE_TOOL_NAME,
    {
      title: 'Analyze Pipeline Results',
      description:
        'Analyze CI pipeline health for a repository over a trailing window of days: run counts, success rate, average duration, recurring job failures and improvement recommendations.',
      inputSchema: analyzeToolInputSchema,
    },
    async (input, extra) => handleAnalyzePipelineResults(analyzer, input, extra.signal, log)
  )
}
