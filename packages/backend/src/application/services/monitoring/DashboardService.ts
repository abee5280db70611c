import type { ISystemMetricRepository } from '@domain/repositories/ISystemMetricRepository.js';
import {
  CacheKeys,
  type IFastCache,
} from '@domain/repositories/IFastCache.js';
import type {
  AlertStats,
  ServiceHealthCheck,
  SystemOverview,
} from '@domain/entities/types.js';
import type { AlertService } from '@application/services/alerting/AlertService.js';
import type { HealthProber } from './HealthProber.js';

export interface DashboardOverview {
  systems: SystemOverview[];
  alerts: AlertStats;
  services: ServiceHealthCheck[];
  healthy_services: number;
  total_services: number;
  timestamp: string;
}

export interface MetricsSummary {
  hostname: string | null;
  hours: number;
  /** 主机 -> 指标类型 -> 统计 */
  summary: Record<
    string,
    Record<string, { avg: number; max: number; min: number; sample_count: number }>
  >;
  timestamp: string;
}

/**
 * 仪表板数据服务，只读取缓存和聚合查询
 */
export class DashboardService {
  constructor(
    private readonly systemMetricRepository: ISystemMetricRepository,
    private readonly alertService: AlertService,
    private readonly healthProber: HealthProber,
    private readonly cache: IFastCache,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * 汇总缓存中的主机概览、服务健康和告警统计
   */
  async getOverview(): Promise<DashboardOverview> {
    const systems: SystemOverview[] = [];
    for (const key of this.cache.keys(CacheKeys.systemHealthPattern())) {
      const overview = this.cache.get<SystemOverview>(key);
      if (overview) {
        systems.push(overview);
      }
    }

    const services = this.healthProber.getCachedServiceHealth();
    const alerts = await this.alertService.getAlertStats();

    return {
      systems,
      alerts,
      services,
      healthy_services: services.filter((s) => s.status === 'healthy').length,
      total_services: services.length,
      timestamp: new Date(this.now()).toISOString(),
    };
  }

  /**
   * 按主机和指标类型统计最近若干小时的指标
   * @param hours 统计窗口（小时）
   * @param hostname 可选主机名
   */
  async getMetricsSummary(
    hours: number,
    hostname?: string,
  ): Promise<MetricsSummary> {
    const since = this.now() - hours * 60 * 60 * 1000;
    const rows = await this.systemMetricRepository.summarize(since, hostname);

    const summary: MetricsSummary['summary'] = {};
    for (const row of rows) {
      const host = summary[row.hostname] ?? {};
      summary[row.hostname] = host;
      host[row.metric_type] = {
        avg: Math.round(row.avg_value * 100) / 100,
        max: row.max_value,
        min: row.min_value,
        sample_count: row.sample_count,
      };
    }

    return {
      hostname: hostname ?? null,
      hours,
      summary,
      timestamp: new Date(this.now()).toISOString(),
    };
  }
}
