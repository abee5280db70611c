import type { SystemMetric } from '@infrastructure/database/entities/SystemMetric.js';

/**
 * 新系统指标
 */
export interface NewSystemMetric {
  hostname: string;
  metric_type: string;
  metric_value: number;
  metric_unit: string | null;
  tags: Record<string, string>;
  timestamp: number;
}

/**
 * 指标查询条件
 */
export interface MetricQuery {
  metricType?: string;
  hostname?: string;
  /** 起始时间（毫秒，含） */
  startTime?: number;
  /** 结束时间（毫秒，含） */
  endTime?: number;
  limit: number;
  offset: number;
}

/**
 * 按主机与指标类型汇总的统计
 */
export interface MetricSummaryRow {
  hostname: string;
  metric_type: string;
  avg_value: number;
  max_value: number;
  min_value: number;
  sample_count: number;
}

export interface ISystemMetricRepository {
  /**
   * 在单个事务中写入一批指标，全部成功或全部回滚
   */
  saveBatch(metrics: NewSystemMetric[]): Promise<SystemMetric[]>;

  /**
   * 获取时间窗口内某类型的最新样本，按时间倒序
   */
  findRecent(options: {
    metricType: string;
    since: number;
    hostname?: string;
    limit: number;
  }): Promise<SystemMetric[]>;

  query(query: MetricQuery): Promise<SystemMetric[]>;

  summarize(since: number, hostname?: string): Promise<MetricSummaryRow[]>;

  /**
   * 删除采样时间早于 cutoff 的指标
   * @returns 删除的行数
   */
  deleteOlderThan(cutoff: number): Promise<number>;
}
