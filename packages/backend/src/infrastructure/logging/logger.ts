/**
 * 日志模块，基于 Winston 实现结构化、分级别的日志输出
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import fs from 'node:fs';
import path from 'node:path';
import type { AppConfig } from '@config/config.js';

/**
 * 定义日志器接口，支持不同级别的日志输出
 */
export interface Logger {
  /**
   * 输出调试级别日志
   * @param message - 日志消息
   * @param args - 额外参数
   */
  debug(message: string, ...args: unknown[]): void;
  /**
   * 输出信息级别日志
   * @param message - 日志消息
   * @param args - 额外参数
   */
  info(message: string, ...args: unknown[]): void;
  /**
   * 输出警告级别日志
   * @param message - 日志消息
   * @param args - 额外参数
   */
  warn(message: string, ...args: unknown[]): void;
  /**
   * 输出错误级别日志
   * @param message - 日志消息
   * @param args - 额外参数
   */
  error(message: string, ...args: unknown[]): void;
}

/**
 * 创建一个 Winston Logger 实例
 * @param config - 应用程序配置，用于获取日志级别与轮转策略
 * @returns 配置好的日志器实例
 */
export function createLogger(config: Pick<AppConfig, 'log'>): Logger {
  const { combine, timestamp, json, colorize, simple } = winston.format;

  // 控制台输出带颜色和简洁格式
  const consoleTransport = new winston.transports.Console({
    format: combine(colorize(), simple()),
  });
  const fileTransport = createFileTransport(config);

  return winston.createLogger({
    level: config.log.level,
    format: combine(timestamp(), json()),
    transports: fileTransport
      ? [consoleTransport, fileTransport]
      : [consoleTransport],
  });
}

/**
 * 创建按日期滚动的文件传输器，目录不可写时返回 null
 * @param config - 日志配置
 * @returns 文件传输器
 */
function createFileTransport(
  config: Pick<AppConfig, 'log'>,
): DailyRotateFile | null {
  const logsDir = path.resolve(process.cwd(), config.log.dirname || 'logs');
  try {
    fs.mkdirSync(logsDir, { recursive: true });
  } catch (error) {
    process.stderr.write(
      `logger: file transport disabled (${error instanceof Error ? error.message : String(error)})\n`,
    );
    return null;
  }

  return new DailyRotateFile({
    dirname: logsDir,
    filename: 'process-monitor-%DATE%.log',
    datePattern: config.log.datePattern || 'YYYY-MM-DD',
    zippedArchive: config.log.zippedArchive ?? true,
    maxSize: config.log.maxSize || '20m',
    // 支持天数(如 '14d')或数量(如 '30')。
    maxFiles: config.log.maxFiles || '14d',
    level: config.log.level,
  });
}

/**
 * 配置加载之前使用的日志器，仅输出到控制台
 * @returns 控制台日志器
 */
export function createBootstrapLogger(): Logger {
  const { combine, timestamp, colorize, simple } = winston.format;
  return winston.createLogger({
    level: 'info',
    format: combine(timestamp(), colorize(), simple()),
    transports: [new winston.transports.Console()],
  });
}
