import express from 'express';
import type { MetricsCollector } from '@application/services/monitoring/MetricsCollector.js';
import type { HealthProber } from '@application/services/monitoring/HealthProber.js';

/**
 * 创建系统状态相关的API路由
 *
 * @param metricsCollector - 指标采集服务
 * @param healthProber - 服务健康探测器
 * @returns 配置好的 Express 路由实例
 */
export function createSystemRoutes(
  metricsCollector: MetricsCollector,
  healthProber: HealthProber,
): express.Router {
  const router = express.Router();

  /**
   * @api {get} /system/overview 获取实时主机概览
   */
  router.get('/system/overview', (_req, res, next) => {
    metricsCollector
      .getSystemOverview()
      .then((overview) => res.json(overview))
      .catch(next);
  });

  /**
   * @api {get} /system/health 立即探测所有注册的服务
   */
  router.get('/system/health', (_req, res, next) => {
    healthProber
      .checkServiceHealth()
      .then((checks) => res.json(checks))
      .catch(next);
  });

  return router;
}
