/**
 * 配置載入服務
 *
 * 多層優先級載入（CLI → 專案 → 全域 → 預設值）
 *
 * @module services/config/config-loader
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { RecommendationThresholds } from '../../types/pipeline-health.js';
import { AppError, ErrorType, toError } from '../../models/error.js';
import { DEFAULT_THRESHOLDS } from '../recommendation-classifier.js';
import { DEFAULT_WINDOW_DAYS } from '../pipeline-health-analyzer.js';
import { logger } from '../../utils/logger.js';

/** 專案配置檔名 */
export const PROJECT_CONFIG_FILENAME = '.ci-health.yml';

/** 預設 job 擷取並發上限 */
export const DEFAULT_CONCURRENCY = 5;

/**
 * 配置檔 schema（snake_case，對應 YAML 鍵名）
 */
export const HealthConfigFileSchema = z
  .object({
    window_days: z.number().int().min(0).optional(),
    concurrency: z.number().int().min(1).max(20).optional(),
    thresholds: z
      .object({
        success_rate: z.number().min(0).max(100).optional(),
        duration_minutes: z.number().positive().optional(),
        failure_pattern_min_count: z.number().int().min(2).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type HealthConfigFile = z.infer<typeof HealthConfigFileSchema>;

/**
 * 解析後的分析配置
 */
export interface HealthConfig {
  windowDays: number;
  concurrency: number;
  thresholds: RecommendationThresholds;
}

/**
 * 配置載入結果
 */
export interface ConfigLoadResult {
  config: HealthConfig;
  /** 配置來源 */
  source: 'cli' | 'project' | 'global' | 'default';
  /** 配置檔案路徑（使用預設值時為 undefined） */
  source_path?: string;
}

/**
 * 配置載入選項
 */
export interface ConfigLoadOptions {
  /** CLI 參數指定的配置路徑 */
  cliConfigPath?: string;
  /** 專案根目錄路徑（預設為目前工作目錄） */
  projectPath?: string;
  /** 全域配置路徑（預設為 ~/.ci-health/config.yml） */
  globalConfigPath?: string;
}

/**
 * 配置載入器
 *
 * 只採用優先級最高的單一配置檔，未指定的欄位以預設值補齊
 */
export class ConfigLoader {
  /**
   * 載入配置
   *
   * @throws AppError CONFIG_ERROR 當配置檔無法解析或驗證失敗時
   */
  load(options: ConfigLoadOptions = {}): ConfigLoadResult {
    // 1. CLI 參數指定的配置檔（必須存在）
    if (options.cliConfigPath) {
      const configPath = path.resolve(options.cliConfigPath);
      if (!fs.existsSync(configPath)) {
        throw new AppError(ErrorType.CONFIG_ERROR, `配置檔案不存在: ${configPath}`);
      }
      return { config: this.loadFromFile(configPath), source: 'cli', source_path: configPath };
    }

    // 2. 專案配置
    const projectConfigPath = path.join(options.projectPath ?? process.cwd(), PROJECT_CONFIG_FILENAME);
    if (fs.existsSync(projectConfigPath)) {
      return { config: this.loadFromFile(projectConfigPath), source: 'project', source_path: projectConfigPath };
    }

    // 3. 全域配置
    const globalConfigPath = options.globalConfigPath ?? ConfigLoader.getGlobalConfigPath();
    if (fs.existsSync(globalConfigPath)) {
      return { config: this.loadFromFile(globalConfigPath), source: 'global', source_path: globalConfigPath };
    }

    logger.debug('未找到配置檔，使用預設值');
    return { config: ConfigLoader.resolve({}), source: 'default' };
  }

  /**
   * 取得全域配置路徑
   */
  static getGlobalConfigPath(): string {
    return path.join(os.homedir(), '.ci-health', 'config.yml');
  }

  /**
   * 以預設值補齊配置檔內容
   */
  static resolve(file: HealthConfigFile): HealthConfig {
    return {
      windowDays: file.window_days ?? DEFAULT_WINDOW_DAYS,
      concurrency: file.concurrency ?? DEFAULT_CONCURRENCY,
      thresholds: {
        successRate: file.thresholds?.success_rate ?? DEFAULT_THRESHOLDS.successRate,
        durationMinutes: file.thresholds?.duration_minutes ?? DEFAULT_THRESHOLDS.durationMinutes,
        failurePatternMinCount:
          file.thresholds?.failure_pattern_min_count ?? DEFAULT_THRESHOLDS.failurePatternMinCount,
      },
    };
  }

  /**
   * 解析 YAML 內容並驗證
   *
   * 空白檔案視為空配置
   *
   * @throws AppError CONFIG_ERROR
   */
  static parse(content: string, source: string): HealthConfig {
    let raw: unknown;
    try {
      raw = yaml.load(content);
    } catch (error) {
      if (error instanceof yaml.YAMLException) {
        throw new AppError(ErrorType.CONFIG_ERROR, `YAML 格式錯誤（${source}）: ${error.message}`, error);
      }
      throw error;
    }

    const result = HealthConfigFileSchema.safeParse(raw ?? {});
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('\n');
      throw new AppError(ErrorType.CONFIG_ERROR, `配置驗證失敗（${source}）:\n${details}`);
    }

    return ConfigLoader.resolve(result.data);
  }

  private loadFromFile(filePath: string): HealthConfig {
    logger.debug(`載入配置檔: ${filePath}`);
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      throw new AppError(ErrorType.CONFIG_ERROR, `無法讀取配置檔案: ${filePath}`, toError(error));
    }
    return ConfigLoader.parse(content, filePath);
  }
}
