import type { ProcessMetric } from '@infrastructure/database/entities/ProcessMetric.js';
import type { MetricQuery } from './ISystemMetricRepository.js';

/**
 * 新进程指标
 */
export interface NewProcessMetric {
  process_id: number;
  process_name: string;
  hostname: string;
  cpu_percent: number | null;
  memory_mb: number | null;
  memory_percent: number | null;
  disk_read_bytes: number | null;
  disk_write_bytes: number | null;
  network_sent_bytes: number | null;
  network_recv_bytes: number | null;
  status: string | null;
  timestamp: number;
}

export interface IProcessMetricRepository {
  /**
   * 在单个事务中写入一批进程指标
   */
  saveBatch(metrics: NewProcessMetric[]): Promise<ProcessMetric[]>;

  /**
   * 获取时间窗口内某进程的最新样本，按时间倒序
   */
  findRecent(options: {
    processName: string;
    since: number;
    hostname?: string;
    limit: number;
  }): Promise<ProcessMetric[]>;

  query(query: MetricQuery & { processName?: string }): Promise<ProcessMetric[]>;

  deleteOlderThan(cutoff: number): Promise<number>;
}
