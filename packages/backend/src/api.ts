import express from 'express';
import type { Logger } from '@logging/logger.js';
import type { MetricsCollector } from '@application/services/monitoring/MetricsCollector.js';
import type { HealthProber } from '@application/services/monitoring/HealthProber.js';
import type { MetricsQueryService } from '@application/services/monitoring/MetricsQueryService.js';
import type { DashboardService } from '@application/services/monitoring/DashboardService.js';
import type { AlertService } from '@application/services/alerting/AlertService.js';
import type { AlertRuleService } from '@application/services/alerting/AlertRuleService.js';
import type { AlertRuleEngine } from '@application/services/alerting/AlertRuleEngine.js';
import type { TaskManager } from '@infrastructure/scheduling/TaskManager.js';
import {
  createAlertRoutes,
  createAlertRuleRoutes,
  createDashboardRoutes,
  createMetricsRoutes,
  createSystemRoutes,
} from '@api/routes/index.js';

export const SERVICE_NAME = 'Process Monitor API';
export const SERVICE_VERSION = '1.0.0';

/**
 * @interface ApiServices
 * @description API 层所需的应用服务集合
 */
export interface ApiServices {
  metricsCollector: MetricsCollector;
  healthProber: HealthProber;
  metricsQueryService: MetricsQueryService;
  dashboardService: DashboardService;
  alertService: AlertService;
  alertRuleService: AlertRuleService;
  alertRuleEngine: AlertRuleEngine;
  taskManager: TaskManager;
  logger: Logger;
}

/**
 * @function createApiRouter
 * @description 创建并配置Express API路由器
 *   路由只负责解构参数、调用应用服务、封装响应，
 *   错误交给全局错误处理中间件统一处理
 * @param {ApiServices} services - 应用服务实例
 * @returns {express.Router} 配置好的 Express 路由实例
 */
export function createApiRouter(services: ApiServices): express.Router {
  const router = express.Router();

  /**
   * @api {get} /health 存活检查
   */
  router.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      timestamp: new Date().toISOString(),
    });
  });

  router.use(
    createSystemRoutes(services.metricsCollector, services.healthProber),
  );
  router.use(
    createMetricsRoutes(
      services.metricsCollector,
      services.metricsQueryService,
      services.logger,
    ),
  );
  router.use(createAlertRoutes(services.alertService, services.alertRuleEngine));
  router.use(createAlertRuleRoutes(services.alertRuleService));
  router.use(
    createDashboardRoutes(services.dashboardService, services.taskManager),
  );

  return router;
}
