/**
 * Logger 工具 - 用於記錄應用程式日誌
 */

import chalk from 'chalk';

/**
 * 日誌等級
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

/**
 * Logger 配置選項
 */
export interface LoggerOptions {
  /** 是否啟用 verbose 模式（顯示 DEBUG 訊息） */
  verbose?: boolean;
  /** 最小日誌等級 */
  minLevel?: LogLevel;
  /** 是否使用顏色（預設：true） */
  useColors?: boolean;
  /** 是否顯示時間戳（預設：false） */
  showTimestamp?: boolean;
  /** 日誌前綴 */
  prefix?: string;
  /** 所有等級都寫到 stderr（MCP stdio 模式下 stdout 保留給協定） */
  stderr?: boolean;
}

type LogWriter = (message: string, ...args: unknown[]) => void;

/**
 * Logger 類別
 */
export class Logger {
  private options: Required<LoggerOptions>;

  constructor(options: LoggerOptions = {}) {
    this.options = {
      verbose: options.verbose ?? false,
      minLevel: options.minLevel ?? (options.verbose ? LogLevel.DEBUG : LogLevel.INFO),
      useColors: options.useColors ?? true,
      showTimestamp: options.showTimestamp ?? false,
      prefix: options.prefix ?? '',
      stderr: options.stderr ?? false,
    };
  }

  /**
   * 更新 Logger 配置
   */
  setOptions(options: Partial<LoggerOptions>): void {
    this.options = {
      ...this.options,
      ...options,
    };

    // 如果啟用 verbose，自動降低最小日誌等級到 DEBUG
    if (options.verbose && options.minLevel === undefined) {
      this.options.minLevel = LogLevel.DEBUG;
    }
  }

  /**
   * 檢查是否應該輸出該等級的日誌
   */
  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.options.minLevel;
  }

  /**
   * 格式化日誌訊息
   */
  private formatMessage(level: LogLevel, message: string): string {
    let formatted = '';

    if (this.options.showTimestamp) {
      formatted += `[${new Date().toISOString()}] `;
    }

    if (this.options.prefix) {
      formatted += `[${this.options.prefix}] `;
    }

    const levelLabel = this.getLevelLabel(level);
    formatted += (this.options.useColors ? this.colorizeLevel(level, levelLabel) : levelLabel) + ' ';

    return formatted + message;
  }

  /**
   * 取得日誌等級標籤
   */
  private getLevelLabel(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return '[DEBUG]';
      case LogLevel.INFO:
        return '[INFO] ';
      case LogLevel.WARN:
        return '[WARN] ';
      case LogLevel.ERROR:
        return '[ERROR]';
      default:
        return '[LOG]  ';
    }
  }

  /**
   * 為日誌等級標籤添加顏色
   */
  private colorizeLevel(level: LogLevel, label: string): string {
    switch (level) {
      case LogLevel.DEBUG:
        return chalk.gray(label);
      case LogLevel.INFO:
        return chalk.blue(label);
      case LogLevel.WARN:
        return chalk.yellow(label);
      case LogLevel.ERROR:
        return chalk.red(label);
      default:
        return label;
    }
  }

  /**
   * 取得對應等級的輸出函數
   */
  private writer(level: LogLevel): LogWriter {
    if (this.options.stderr) return console.error;

    switch (level) {
      case LogLevel.DEBUG:
        return console.debug;
      case LogLevel.INFO:
        return console.info;
      case LogLevel.WARN:
        return console.warn;
      default:
        return console.error;
    }
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.isLevelEnabled(level)) return;
    this.writer(level)(this.formatMessage(level, message), ...args);
  }

  /**
   * DEBUG 等級日誌（僅在 verbose 模式下顯示）
   */
  debug(message: string, ...args: unknown[]): void {
    this.write(LogLevel.DEBUG, message, args);
  }

  /**
   * INFO 等級日誌
   */
  info(message: string, ...args: unknown[]): void {
    this.write(LogLevel.INFO, message, args);
  }

  /**
   * WARN 等級日誌
   */
  warn(message: string, ...args: unknown[]): void {
    this.write(LogLevel.WARN, message, args);
  }

  /**
   * ERROR 等級日誌；verbose 模式下附上 stack
   */
  error(message: string, error?: unknown): void {
    if (!this.isLevelEnabled(LogLevel.ERROR)) return;

    const formatted = this.formatMessage(LogLevel.ERROR, message);
    const write = this.writer(LogLevel.ERROR);

    if (error instanceof Error) {
      write(formatted, error.message);
      if (this.options.verbose && error.stack) {
        write(chalk.gray(error.stack));
      }
    } else if (error !== undefined) {
      write(formatted, error);
    } else {
      write(formatted);
    }
  }

  /**
   * 記錄 API 呼叫
   */
  apiCall(method: string, endpoint: string, params?: Record<string, unknown>): void {
    const message = `API 呼叫: ${method} ${endpoint}`;
    if (params && Object.keys(params).length > 0) {
      this.debug(message, params);
    } else {
      this.debug(message);
    }
  }

  /**
   * 記錄效能指標
   */
  performance(operation: string, durationMs: number): void {
    this.debug(`效能: ${operation} 完成於 ${durationMs}ms`);
  }

  /**
   * 建立子 Logger（帶有額外前綴）
   */
  child(prefix: string): Logger {
    const childPrefix = this.options.prefix
      ? `${this.options.prefix}:${prefix}`
      : prefix;

    return new Logger({
      ...this.options,
      prefix: childPrefix,
    });
  }
}

/**
 * 全域預設 Logger 實例
 */
export const logger = new Logger();

/**
 * 建立 Logger 實例
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}
