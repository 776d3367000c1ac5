/**
 * CI Pipeline 健康度分析指令
 *
 * 用途：分析專案在最近 N 天內的 pipeline 健康狀態
 * - Run 成功率與平均執行時間
 * - 失敗 run 中最常失敗的 job
 * - 改善建議（成功率、執行時間、重複失敗）
 */

import { Command, Flags } from '@oclif/core';
import type { AnalysisResult, ProviderName } from '../types/pipeline-health.js';
import { PipelineHealthAnalyzer } from '../services/pipeline-health-analyzer.js';
import { ConfigLoader } from '../services/config/config-loader.js';
import { createRunRepositoryClient, TOKEN_ENV_VARS } from '../services/providers/client-factory.js';
import { formatAnalysisJson } from '../formatters/pipeline-health-json-formatter.js';
import { formatPipelineHealthReport } from '../formatters/pipeline-health-table-formatter.js';
import { ErrorFormatter } from '../utils/error-formatter.js';
import { AppError } from '../models/error.js';
import { logger } from '../utils/logger.js';

const PROVIDERS: readonly ProviderName[] = ['github', 'gitlab'];

export default class CIHealth extends Command {
  static override description = 'CI Pipeline 健康度分析：成功率、平均執行時間、重複失敗的 job 與改善建議';

  static override examples = [
    '<%= config.bin %> <%= command.id %> --project octo-org/octo-repo',
    '<%= config.bin %> <%= command.id %> --project octo-org/octo-repo --workflow ci.yml --days 14',
    '<%= config.bin %> <%= command.id %> --project octo-org/octo-repo --run 123456789 --json',
    '<%= config.bin %> <%= command.id %> --provider gitlab --project my-group/my-project --host https://gitlab.example.com',
  ];

  static override flags = {
    project: Flags.string({
      char: 'p',
      description: '專案識別（owner/name、GitLab 專案路徑或 ID、或 URL）（或使用環境變數 CI_HEALTH_PROJECT）',
      env: 'CI_HEALTH_PROJECT',
    }),
    provider: Flags.string({
      description: 'CI 平台',
      options: [...PROVIDERS],
      default: 'github',
    }),
    token: Flags.string({
      char: 't',
      description: 'Personal Access Token（或使用環境變數 GITHUB_TOKEN / GITLAB_TOKEN）',
    }),
    host: Flags.string({
      description: 'GitLab 實例 URL 或 GitHub Enterprise API URL',
    }),
    workflow: Flags.string({
      char: 'w',
      description: 'Workflow ID 或檔名（GitLab 為 ref）',
    }),
    run: Flags.string({
      char: 'r',
      description: '只分析單一 run（忽略 --workflow 與 --days）',
    }),
    days: Flags.integer({
      char: 'd',
      description: '分析最近幾天（≤ 0 表示不限，預設 7 或配置檔的 window_days）',
    }),
    config: Flags.string({
      description: '配置檔路徑（預設依序尋找 .ci-health.yml、~/.ci-health/config.yml）',
    }),
    concurrency: Flags.integer({
      description: '同時擷取 job 的 run 數上限',
      min: 1,
      max: 20,
    }),
    json: Flags.boolean({
      description: '輸出 JSON 格式（用於整合）',
      default: false,
    }),
    verbose: Flags.boolean({
      char: 'v',
      description: '詳細輸出（除錯用）',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(CIHealth);

    if (flags.verbose) {
      logger.setOptions({ verbose: true });
    }

    const provider = this.parseProvider(flags.provider);
    const controller = new AbortController();
    const onInterrupt = (): void => controller.abort(new Error('分析已取消'));
    process.once('SIGINT', onInterrupt);

    let result: AnalysisResult;
    let windowDays: number;
    try {
      const { config, source, source_path } = new ConfigLoader().load({ cliConfigPath: flags.config });
      logger.debug(`配置來源: ${source}${source_path ? `（${source_path}）` : ''}`);
      windowDays = flags.days ?? config.windowDays;

      const client = createRunRepositoryClient({
        provider,
        project: flags.project,
        token: flags.token ?? process.env[TOKEN_ENV_VARS[provider]],
        host: flags.host,
        logger,
      });

      const analyzer = new PipelineHealthAnalyzer(client, {
        thresholds: config.thresholds,
        concurrency: flags.concurrency ?? config.concurrency,
        defaultDays: config.windowDays,
        logger,
      });

      result = await analyzer.analyze({
        project: flags.project ?? '',
        workflow: flags.workflow,
        runId: flags.run,
        days: windowDays,
        signal: controller.signal,
      });
    } catch (error) {
      this.handleError(error, flags.verbose);
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }

    if (flags.json) {
      this.log(formatAnalysisJson(result));
      if (result.status === 'error') {
        this.exit(1);
      }
      return;
    }

    if (result.status === 'error') {
      this.error(ErrorFormatter.formatFailure(result), { exit: 1 });
    }

    this.log(
      formatPipelineHealthReport(result, {
        project: flags.project ?? '',
        days: flags.run ? null : windowDays,
      })
    );
  }

  private parseProvider(value: string): ProviderName {
    const provider = PROVIDERS.find((name) => name === value);
    if (!provider) {
      this.error(`不支援的 CI 平台: ${value}`, { exit: 2 });
    }
    return provider;
  }

  /**
   * 錯誤處理
   */
  private handleError(error: unknown, verbose: boolean): never {
    if (error instanceof AppError) {
      this.error(ErrorFormatter.format(error, verbose), { exit: 1 });
    }
    if (error instanceof Error) {
      this.error(`Error: ${error.message}`, { exit: 1 });
    }
    this.error(`Error: ${String(error)}`, { exit: 1 });
  }
}
