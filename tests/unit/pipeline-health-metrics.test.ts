/**
 * PipelineHealthMetrics 單元測試
 *
 * 目的：
 * - 測試各結果數量與成功率計算
 * - 測試平均執行時間（僅 success / failure 計入）
 */

import { describe, it, expect } from 'vitest';
import { PipelineHealthMetrics } from '../../src/models/pipeline-health.js';
import { AppError, ErrorType } from '../../src/models/error.js';
import { createRun } from '../helpers/run-factory.js';

describe('PipelineHealthMetrics', () => {
  describe('calculate() - 數量與成功率', () => {
    it('8 成功 + 2 失敗時成功率為 80%', () => {
      const runs = [
        ...Array.from({ length: 8 }, (_, i) => createRun(`s${i}`, 'success')),
        createRun('f1', 'failure'),
        createRun('f2', 'failure'),
      ];

      const stats = PipelineHealthMetrics.calculate(runs);

      expect(stats.totalRuns).toBe(10);
      expect(stats.successfulRuns).toBe(8);
      expect(stats.failedRuns).toBe(2);
      expect(stats.cancelledRuns).toBe(0);
      expect(stats.successRate).toBe(80);
      expect(stats.averageDurationMinutes).toBe(0);
    });

    it('成功率分母包含執行中與取消的 run', () => {
      const runs = [
        createRun('1', 'success'),
        createRun('2', 'non_terminal'),
        createRun('3', 'cancelled'),
        createRun('4', 'failure'),
      ];

      const stats = PipelineHealthMetrics.calculate(runs);

      expect(stats.totalRuns).toBe(4);
      expect(stats.cancelledRuns).toBe(1);
      expect(stats.successRate).toBe(25);
    });

    it('只有執行中的 run 時成功率為 0 且平均時間為 0', () => {
      const stats = PipelineHealthMetrics.calculate([
        createRun('1', 'non_terminal', '2025-10-20T10:00:00Z', '2025-10-20T11:00:00Z'),
      ]);

      expect(stats.successRate).toBe(0);
      expect(stats.averageDurationMinutes).toBe(0);
    });

    it('空清單拋出 EMPTY_RESULT', () => {
      expect(() => PipelineHealthMetrics.calculate([])).toThrow(AppError);
      try {
        PipelineHealthMetrics.calculate([]);
      } catch (error) {
        expect(error).toBeInstanceOf(AppError);
        if (error instanceof AppError) {
          expect(error.type).toBe(ErrorType.EMPTY_RESULT);
          expect(error.message).toBe('No pipeline runs found for the specified criteria');
        }
      }
    });
  });

  describe('calculate() - 平均執行時間', () => {
    it('以 updatedAt − createdAt 計算分鐘數', () => {
      const stats = PipelineHealthMetrics.calculate([
        createRun('1', 'success', '2025-10-20T00:00:00Z', '2025-10-20T00:45:00Z'),
      ]);

      expect(stats.averageDurationMinutes).toBe(45);
    });

    it('取 success 與 failure 的平均，忽略 cancelled 與 non_terminal', () => {
      const stats = PipelineHealthMetrics.calculate([
        createRun('1', 'success', '2025-10-20T00:00:00Z', '2025-10-20T00:10:00Z'),
        createRun('2', 'failure', '2025-10-20T01:00:00Z', '2025-10-20T01:20:00Z'),
        createRun('3', 'cancelled', '2025-10-20T02:00:00Z', '2025-10-20T04:00:00Z'),
        createRun('4', 'non_terminal', '2025-10-20T03:00:00Z', '2025-10-20T05:00:00Z'),
      ]);

      expect(stats.averageDurationMinutes).toBe(15);
    });

    it('支援秒級精度', () => {
      const run = createRun('1', 'success', '2025-10-20T00:00:00Z', '2025-10-20T00:01:30Z');

      expect(PipelineHealthMetrics.durationMinutes(run)).toBe(1.5);
    });
  });
});
