/**
 * Pipeline 健康度表格格式化器
 *
 * 用途：將分析結果格式化為易讀的終端輸出
 */

import Table from 'cli-table3';
import chalk from 'chalk';
import type {
  AnalysisSuccess,
  FailureInspection,
  Recommendation,
  RecommendationPriority,
  RunStatistics,
} from '../types/pipeline-health.js';
import { JobFailureAnalyzer } from '../models/job-failure.js';
import { formatWireTimestamp } from '../utils/date-utils.js';

/**
 * 報告標頭資訊
 */
export interface ReportContext {
  project: string;
  /** 分析天數（≤ 0 表示不限；單一 run 時為 null） */
  days: number | null;
}

/**
 * 格式化統計區塊
 */
export function formatStatistics(statistics: RunStatistics): string {
  const table = new Table({
    head: [chalk.bold('指標'), chalk.bold('數值')],
    colWidths: [20, 20],
  });

  table.push(
    ['總 Run 數', String(statistics.totalRuns)],
    ['成功', chalk.green(String(statistics.successfulRuns))],
    ['失敗', chalk.red(String(statistics.failedRuns))],
    ['取消', chalk.gray(String(statistics.cancelledRuns))],
    ['成功率', `${statistics.successRate.toFixed(1)}%`],
    ['平均執行時間', `${statistics.averageDurationMinutes.toFixed(1)} 分鐘`]
  );

  return table.toString();
}

/**
 * 格式化建議清單
 */
export function formatRecommendations(recommendations: Recommendation[]): string {
  if (recommendations.length === 0) {
    return chalk.green('✅ 無建議事項，pipeline 狀態良好');
  }

  const lines = [chalk.yellow(`💡 建議事項（${recommendations.length} 項）:`)];
  for (const recommendation of recommendations) {
    lines.push(`  ${priorityBadge(recommendation.priority)} ${recommendation.message}`);
  }
  return lines.join('\n');
}

/**
 * 格式化失敗 job 統計
 */
export function formatFailures(inspection: FailureInspection): string {
  const lines: string[] = [];

  if (inspection.failures.length === 0) {
    lines.push(chalk.green('✅ 無失敗 job 記錄'));
  } else {
    const table = new Table({
      head: [chalk.bold('Job'), chalk.bold('失敗次數'), chalk.bold('最後失敗時間')],
      colWidths: [40, 12, 24],
    });

    for (const { jobName, failureCount } of JobFailureAnalyzer.countByJobName(inspection.failures)) {
      const latest = inspection.failures
        .filter(f => f.jobName === jobName && f.failedAt !== null)
        .map(f => f.failedAt?.getTime() ?? 0)
        .reduce((max, t) => Math.max(max, t), 0);

      table.push([
        jobName,
        String(failureCount),
        latest > 0 ? formatWireTimestamp(new Date(latest)) : '-',
      ]);
    }

    lines.push(chalk.red(`⚠️  失敗的 Job（${inspection.failures.length} 筆）:`));
    lines.push(table.toString());
  }

  if (inspection.skippedRuns.length > 0) {
    lines.push(
      chalk.gray(`（${inspection.skippedRuns.length} 個失敗 run 的 job 無法取得：` +
        inspection.skippedRuns.map(s => s.runId).join(', ') + '）')
    );
  }

  return lines.join('\n');
}

/**
 * 格式化完整的健康度報告
 */
export function formatPipelineHealthReport(result: AnalysisSuccess, context: ReportContext): string {
  const sections: string[] = [];

  sections.push('');
  sections.push(chalk.bold('═'.repeat(65)));
  sections.push(chalk.bold(`Pipeline 健康度報告：${context.project}（${describeWindow(context.days)}）`));
  sections.push(chalk.bold('═'.repeat(65)));
  sections.push(formatStatistics(result.statistics));
  sections.push('');
  sections.push(formatRecommendations(result.recommendations));
  sections.push('');
  sections.push(formatFailures(result.inspection));
  sections.push(chalk.bold('═'.repeat(65)));
  sections.push('');

  return sections.join('\n');
}

// ============================================================================
// 輔助函數
// ============================================================================

function describeWindow(days: number | null): string {
  if (days === null) return '單一 run';
  if (days <= 0) return '不限時間';
  return `最近 ${days} 天`;
}

function priorityBadge(priority: RecommendationPriority): string {
  switch (priority) {
    case 'high':
      return chalk.red('[HIGH]  ');
    case 'medium':
      return chalk.yellow('[MEDIUM]');
  }
}
