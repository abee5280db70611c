import type { DataSource } from 'typeorm';
import type { Logger } from '@logging/logger.js';
import type { AppConfig } from '@config/config.js';
import type { TelemetrySource } from '@domain/telemetry/TelemetrySource.js';
import type { IFastCache } from '@domain/repositories/IFastCache.js';
import { initializeDataSource } from '@infrastructure/database/config.js';
import {
  AlertRepository,
  AlertRuleRepository,
  ProcessMetricRepository,
  SystemMetricRepository,
} from '@infrastructure/database/repositories/index.js';
import { FastCache } from '@infrastructure/cache/FastCache.js';
import {
  FetchProbeClient,
  type ProbeClient,
} from '@infrastructure/http/FetchProbeClient.js';
import { SystemInformationTelemetry } from '@infrastructure/telemetry/SystemInformationTelemetry.js';
import { TaskManager } from '@infrastructure/scheduling/TaskManager.js';
import { createMonitoringTasks } from '@infrastructure/scheduling/monitoringTasks.js';
import { MetricsCollector } from '@application/services/monitoring/MetricsCollector.js';
import { HealthProber } from '@application/services/monitoring/HealthProber.js';
import { RetentionService } from '@application/services/monitoring/RetentionService.js';
import { MetricsQueryService } from '@application/services/monitoring/MetricsQueryService.js';
import { DashboardService } from '@application/services/monitoring/DashboardService.js';
import { AlertService } from '@application/services/alerting/AlertService.js';
import { AlertRuleService } from '@application/services/alerting/AlertRuleService.js';
import { AlertRuleEngine } from '@application/services/alerting/AlertRuleEngine.js';
import type { ApiServices } from '../../api.js';

/**
 * 基础设施组件
 */
export interface Infrastructure {
  dataSource: DataSource;
  cache: FastCache;
  probeClient: FetchProbeClient;
  telemetry: TelemetrySource;
}

/**
 * 组装服务所需的依赖，测试中可替换探测客户端与遥测数据源
 */
export interface ServiceDependencies {
  dataSource: DataSource;
  cache: IFastCache;
  probeClient: ProbeClient;
  telemetry: TelemetrySource;
}

/**
 * 初始化数据库、缓存、HTTP 探测客户端与遥测数据源
 * @param config 应用配置
 * @param logger 日志记录器
 * @returns 基础设施组件
 */
export async function initializeInfrastructure(
  config: AppConfig,
  logger: Logger,
): Promise<Infrastructure> {
  const dataSource = await initializeDataSource(config, logger);
  return {
    dataSource,
    cache: new FastCache({}, logger),
    probeClient: new FetchProbeClient({
      connectTimeoutMs: config.monitoring.healthCheckTimeoutMs,
    }),
    telemetry: new SystemInformationTelemetry(),
  };
}

/**
 * 组装应用服务和后台任务管理器
 * @param infrastructure 基础设施组件
 * @param config 应用配置
 * @param logger 日志记录器
 * @returns 应用服务集合
 */
export function initializeServices(
  infrastructure: ServiceDependencies,
  config: AppConfig,
  logger: Logger,
): ApiServices {
  const { dataSource, cache, telemetry, probeClient } = infrastructure;

  const systemMetricRepository = new SystemMetricRepository(dataSource, logger);
  const processMetricRepository = new ProcessMetricRepository(dataSource, logger);
  const alertRepository = new AlertRepository(dataSource, logger);
  const alertRuleRepository = new AlertRuleRepository(dataSource, logger);

  const alertService = new AlertService(alertRepository, cache, logger);
  const alertRuleService = new AlertRuleService(alertRuleRepository, logger);
  const alertRuleEngine = new AlertRuleEngine(
    alertRuleRepository,
    alertRepository,
    systemMetricRepository,
    processMetricRepository,
    alertService,
    cache,
    { responseTimeThresholdMs: config.alerting.responseTimeThresholdMs },
    logger,
  );

  const metricsCollector = new MetricsCollector(
    telemetry,
    systemMetricRepository,
    processMetricRepository,
    cache,
    logger,
  );
  const healthProber = new HealthProber(
    probeClient,
    cache,
    alertService,
    {
      serviceEndpoints: config.monitoring.serviceEndpoints,
      timeoutMs: config.monitoring.healthCheckTimeoutMs,
      healthCheckInterval: config.monitoring.healthCheckInterval,
    },
    logger,
  );
  const retentionService = new RetentionService(
    systemMetricRepository,
    processMetricRepository,
    alertRepository,
    logger,
  );

  const taskManager = new TaskManager(
    createMonitoringTasks(
      { metricsCollector, healthProber, alertRuleEngine, retentionService },
      config,
    ),
    logger,
  );

  return {
    metricsCollector,
    healthProber,
    metricsQueryService: new MetricsQueryService(
      systemMetricRepository,
      processMetricRepository,
      cache,
    ),
    dashboardService: new DashboardService(
      systemMetricRepository,
      alertService,
      healthProber,
      cache,
    ),
    alertService,
    alertRuleService,
    alertRuleEngine,
    taskManager,
    logger,
  };
}
