import type { Logger } from '@logging/logger.js';
import type { ISystemMetricRepository } from '@domain/repositories/ISystemMetricRepository.js';
import type { IProcessMetricRepository } from '@domain/repositories/IProcessMetricRepository.js';
import type { IAlertRepository } from '@domain/repositories/IAlertRepository.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * 数据保留期（天）
 */
export const RetentionDays = {
  SYSTEM_METRICS: 30,
  PROCESS_METRICS: 7,
  RESOLVED_ALERTS: 90,
} as const;

export interface CleanupResult {
  systemMetrics: number;
  processMetrics: number;
  alerts: number;
}

/**
 * 过期数据清理服务
 */
export class RetentionService {
  constructor(
    private readonly systemMetricRepository: ISystemMetricRepository,
    private readonly processMetricRepository: IProcessMetricRepository,
    private readonly alertRepository: IAlertRepository,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * 依次清理系统指标、进程指标和已解决告警
   * 每一步独立执行，任一步失败都会在全部尝试后重新抛出第一个错误
   * @returns 各表删除的行数
   */
  async cleanup(): Promise<CleanupResult> {
    const now = this.now();
    const errors: unknown[] = [];

    const run = async (
      label: string,
      task: () => Promise<number>,
    ): Promise<number> => {
      try {
        const deleted = await task();
        this.logger.info(`清理${label}完成`, { deleted });
        return deleted;
      } catch (error) {
        errors.push(error);
        this.logger.error(`清理${label}失败`, {
          error: error instanceof Error ? error.message : String(error),
        });
        return 0;
      }
    };

    const result: CleanupResult = {
      systemMetrics: await run('系统指标', () =>
        this.systemMetricRepository.deleteOlderThan(
          now - RetentionDays.SYSTEM_METRICS * DAY_MS,
        ),
      ),
      processMetrics: await run('进程指标', () =>
        this.processMetricRepository.deleteOlderThan(
          now - RetentionDays.PROCESS_METRICS * DAY_MS,
        ),
      ),
      alerts: await run('已解决告警', () =>
        this.alertRepository.deleteResolvedBefore(
          now - RetentionDays.RESOLVED_ALERTS * DAY_MS,
        ),
      ),
    };

    if (errors.length > 0) {
      const [first] = errors;
      throw first instanceof Error ? first : new Error(String(first));
    }
    return result;
  }
}
