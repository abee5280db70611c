import type { AppConfig } from '@config/config.js';
import type { MetricsCollector } from '@application/services/monitoring/MetricsCollector.js';
import type { HealthProber } from '@application/services/monitoring/HealthProber.js';
import type { RetentionService } from '@application/services/monitoring/RetentionService.js';
import type { AlertRuleEngine } from '@application/services/alerting/AlertRuleEngine.js';
import type { PeriodicTask } from './TaskManager.js';

const SECOND = 1000;

/**
 * 告警检查间隔
 */
export const ALERT_CHECK_INTERVAL_MS = 60 * SECOND;
/**
 * 数据清理间隔
 */
export const CLEANUP_INTERVAL_MS = 3600 * SECOND;

export interface MonitoringTaskDeps {
  metricsCollector: MetricsCollector;
  healthProber: HealthProber;
  alertRuleEngine: AlertRuleEngine;
  retentionService: RetentionService;
}

/**
 * 构建四个后台监控循环
 * @param deps 服务依赖
 * @param config 监控配置
 * @returns 任务定义
 */
export function createMonitoringTasks(
  deps: MonitoringTaskDeps,
  config: Pick<AppConfig, 'monitoring'>,
): PeriodicTask[] {
  return [
    {
      name: 'metrics_collection',
      intervalMs: config.monitoring.metricsCollectionInterval * SECOND,
      backoffMs: 30 * SECOND,
      run: async (signal) => {
        await deps.metricsCollector.collectSystemMetrics();
        if (signal.aborted) return;
        await deps.metricsCollector.collectProcessMetrics(
          config.monitoring.monitoredProcesses,
        );
        if (signal.aborted) return;
        await deps.metricsCollector.getSystemOverview();
      },
    },
    {
      name: 'health_check',
      intervalMs: config.monitoring.healthCheckInterval * SECOND,
      backoffMs: 30 * SECOND,
      run: async () => {
        await deps.healthProber.checkServiceHealth();
      },
    },
    {
      name: 'alert_check',
      intervalMs: ALERT_CHECK_INTERVAL_MS,
      backoffMs: 30 * SECOND,
      run: async () => {
        await deps.alertRuleEngine.checkSystemAlerts();
      },
    },
    {
      name: 'cleanup',
      intervalMs: CLEANUP_INTERVAL_MS,
      backoffMs: 300 * SECOND,
      run: async () => {
        await deps.retentionService.cleanup();
      },
    },
  ];
}
