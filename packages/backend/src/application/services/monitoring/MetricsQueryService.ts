import type { SystemMetric } from '@infrastructure/database/entities/SystemMetric.js';
import type { ProcessMetric } from '@infrastructure/database/entities/ProcessMetric.js';
import type {
  ISystemMetricRepository,
  MetricQuery,
} from '@domain/repositories/ISystemMetricRepository.js';
import type { IProcessMetricRepository } from '@domain/repositories/IProcessMetricRepository.js';
import {
  CacheKeys,
  type IFastCache,
} from '@domain/repositories/IFastCache.js';
import type { LatestMetricEntry } from '@domain/entities/types.js';

export interface SystemMetricResponse {
  id: string;
  hostname: string;
  metric_type: string;
  metric_value: number;
  metric_unit: string | null;
  tags: Record<string, string>;
  timestamp: string;
  created_at: string;
}

export interface ProcessMetricResponse {
  id: string;
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
  timestamp: string;
  created_at: string;
}

export interface LatestMetricsResponse {
  hostname: string;
  metrics: Record<string, LatestMetricEntry>;
  timestamp: string;
}

export function serializeSystemMetric(metric: SystemMetric): SystemMetricResponse {
  return {
    id: metric.id,
    hostname: metric.hostname,
    metric_type: metric.metric_type,
    metric_value: metric.metric_value,
    metric_unit: metric.metric_unit,
    tags: metric.tags,
    timestamp: new Date(metric.timestamp).toISOString(),
    created_at: new Date(metric.created_at).toISOString(),
  };
}

export function serializeProcessMetric(
  metric: ProcessMetric,
): ProcessMetricResponse {
  return {
    id: metric.id,
    process_id: metric.process_id,
    process_name: metric.process_name,
    hostname: metric.hostname,
    cpu_percent: metric.cpu_percent,
    memory_mb: metric.memory_mb,
    memory_percent: metric.memory_percent,
    disk_read_bytes: metric.disk_read_bytes,
    disk_write_bytes: metric.disk_write_bytes,
    network_sent_bytes: metric.network_sent_bytes,
    network_recv_bytes: metric.network_recv_bytes,
    status: metric.status,
    timestamp: new Date(metric.timestamp).toISOString(),
    created_at: new Date(metric.created_at).toISOString(),
  };
}

/**
 * 指标查询服务
 */
export class MetricsQueryService {
  constructor(
    private readonly systemMetricRepository: ISystemMetricRepository,
    private readonly processMetricRepository: IProcessMetricRepository,
    private readonly cache: IFastCache,
    private readonly now: () => number = Date.now,
  ) {}

  async querySystemMetrics(query: MetricQuery): Promise<SystemMetricResponse[]> {
    const rows = await this.systemMetricRepository.query(query);
    return rows.map(serializeSystemMetric);
  }

  async queryProcessMetrics(
    query: MetricQuery & { processName?: string },
  ): Promise<ProcessMetricResponse[]> {
    const rows = await this.processMetricRepository.query(query);
    return rows.map(serializeProcessMetric);
  }

  /**
   * 从缓存读取主机的最新指标
   * @param hostname 主机名
   * @returns 指标类型 -> 最新值
   */
  getLatestMetrics(hostname: string): LatestMetricsResponse {
    const prefix = CacheKeys.latestMetric(hostname, '');
    const metrics: Record<string, LatestMetricEntry> = {};
    for (const key of this.cache.keys(CacheKeys.latestMetricPattern(hostname))) {
      const entry = this.cache.get<LatestMetricEntry>(key);
      if (entry) {
        metrics[key.slice(prefix.length)] = entry;
      }
    }
    return {
      hostname,
      metrics,
      timestamp: new Date(this.now()).toISOString(),
    };
  }
}
