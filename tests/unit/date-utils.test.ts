/**
 * 日期工具單元測試
 */

import { describe, it, expect } from 'vitest';
import {
  formatWireTimestamp,
  getWindowCutoff,
  minutesBetween,
  parseOptionalWireTimestamp,
  parseWireTimestamp,
} from '../../src/utils/date-utils.js';
import { AppError, ErrorType } from '../../src/models/error.js';

describe('date-utils', () => {
  describe('parseWireTimestamp()', () => {
    it('解析秒精度的 UTC 時間戳', () => {
      expect(parseWireTimestamp('2025-10-20T10:00:00Z', 'created_at').toISOString()).toBe(
        '2025-10-20T10:00:00.000Z'
      );
    });

    it('接受小數秒', () => {
      expect(parseWireTimestamp('2025-10-20T10:00:00.250Z', 'created_at').getTime()).toBe(
        Date.UTC(2025, 9, 20, 10, 0, 0, 250)
      );
    });

    it.each([
      ['2025-10-20 10:00:00'],
      ['2025-10-20T10:00:00+08:00'],
      ['2025-10-20'],
      ['not-a-date'],
      ['2025-13-45T10:00:00Z'],
    ])('拒絕不符格式的值 %s', (value) => {
      expect(() => parseWireTimestamp(value, 'created_at')).toThrow(
        `invalid timestamp in created_at: "${value}"`
      );
    });

    it('錯誤類型為 INVALID_RESPONSE', () => {
      try {
        parseWireTimestamp('yesterday', 'updated_at');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(AppError);
        expect(error instanceof AppError ? error.type : undefined).toBe(ErrorType.INVALID_RESPONSE);
      }
    });
  });

  describe('parseOptionalWireTimestamp()', () => {
    it('null、undefined 與空字串回傳 null', () => {
      expect(parseOptionalWireTimestamp(null, 'completed_at')).toBeNull();
      expect(parseOptionalWireTimestamp(undefined, 'completed_at')).toBeNull();
      expect(parseOptionalWireTimestamp('', 'completed_at')).toBeNull();
    });

    it('有值時與 parseWireTimestamp 相同', () => {
      expect(parseOptionalWireTimestamp('2025-10-20T10:05:00Z', 'completed_at')?.toISOString()).toBe(
        '2025-10-20T10:05:00.000Z'
      );
    });
  });

  describe('formatWireTimestamp()', () => {
    it('輸出秒精度並去除毫秒', () => {
      expect(formatWireTimestamp(new Date('2025-10-20T10:00:00.789Z'))).toBe('2025-10-20T10:00:00Z');
    });
  });

  describe('getWindowCutoff()', () => {
    it('回傳 now 減去 days × 24 小時', () => {
      expect(getWindowCutoff(new Date('2025-10-20T12:00:00Z'), 7).toISOString()).toBe(
        '2025-10-13T12:00:00.000Z'
      );
    });
  });

  describe('minutesBetween()', () => {
    it('回傳可含小數的分鐘數', () => {
      expect(minutesBetween(new Date('2025-10-20T00:00:00Z'), new Date('2025-10-20T00:45:30Z'))).toBe(45.5);
    });
  });
});
