/**
 * MCP 伺服器指令
 *
 * 以 stdio 提供 analyze_pipeline_results 工具；stdout 保留給協定，日誌一律寫到 stderr
 */

import { Command, Flags } from '@oclif/core';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { ProviderName } from '../types/pipeline-health.js';
import { PipelineHealthAnalyzer } from '../services/pipeline-health-analyzer.js';
import { ConfigLoader } from '../services/config/config-loader.js';
import { createRunRepositoryClient, TOKEN_ENV_VARS } from '../services/providers/client-factory.js';
import { ANALYZE_TOOL_NAME, registerPipelineHealthTool } from '../services/mcp/pipeline-health-tool.js';
import { ErrorFormatter } from '../utils/error-formatter.js';
import { AppError } from '../models/error.js';
import { createLogger } from '../utils/logger.js';

export default class Mcp extends Command {
  static override description = '啟動 MCP 伺服器（stdio），提供 analyze_pipeline_results 工具';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --provider gitlab --host https://gitlab.example.com',
  ];

  static override flags = {
    provider: Flags.string({
      description: 'CI 平台',
      options: ['github', 'gitlab'],
      default: 'github',
    }),
    token: Flags.string({
      char: 't',
      description: 'Personal Access Token（或使用環境變數 GITHUB_TOKEN / GITLAB_TOKEN）',
    }),
    host: Flags.string({
      description: 'GitLab 實例 URL 或 GitHub Enterprise API URL',
    }),
    config: Flags.string({
      description: '配置檔路徑',
    }),
    verbose: Flags.boolean({
      char: 'v',
      description: '詳細輸出（除錯用）',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Mcp);
    const log = createLogger({ stderr: true, useColors: false, showTimestamp: true, verbose: flags.verbose });
    const provider: ProviderName = flags.provider === 'gitlab' ? 'gitlab' : 'github';

    let server: McpServer;
    try {
      const { config } = new ConfigLoader().load({ cliConfigPath: flags.config });
      const client = createRunRepositoryClient({
        provider,
        token: flags.token ?? process.env[TOKEN_ENV_VARS[provider]],
        host: flags.host,
        logger: log,
      });
      const analyzer = new PipelineHealthAnalyzer(client, {
        thresholds: config.thresholds,
        concurrency: config.concurrency,
        defaultDays: config.windowDays,
        logger: log,
      });

      server = new McpServer({ name: 'ci-pipeline-health', version: this.config.version });
      registerPipelineHealthTool(server, analyzer, log);
    } catch (error) {
      if (error instanceof AppError) {
        this.error(ErrorFormatter.format(error, flags.verbose), { exit: 1 });
      }
      throw error;
    }

    process.once('SIGINT', () => {
      log.info('關閉 MCP 伺服器...');
      server.close().then(
        () => process.exit(0),
        (error: unknown) => {
          log.error('關閉 MCP 伺服器失敗', error);
          process.exit(1);
        }
      );
    });

    await server.connect(new StdioServerTransport());
    log.info(`MCP 伺服器已啟動（stdio，平台: ${providerLabel(provider)}），工具: ${ANALYZE_TOOL_NAME}`);
  }
}

function providerLabel(provider: ProviderName): string {
  return provider === 'github' ? 'GitHub Actions' : 'GitLab CI';
}
