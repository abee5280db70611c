import express from 'express';
import { validate } from '@middleware/validate.js';
import { MetricsSummaryRequestSchema } from '@api/contracts/monitoring.js';
import type { DashboardService } from '@application/services/monitoring/DashboardService.js';
import type { TaskManager } from '@infrastructure/scheduling/TaskManager.js';

/**
 * 创建仪表板与运行状态相关的API路由
 *
 * @param dashboardService - 仪表板服务
 * @param taskManager - 后台任务管理器
 * @returns 配置好的 Express 路由实例
 */
export function createDashboardRoutes(
  dashboardService: DashboardService,
  taskManager: TaskManager,
): express.Router {
  const router = express.Router();

  router.get('/dashboard/overview', (_req, res, next) => {
    dashboardService
      .getOverview()
      .then((overview) => res.json(overview))
      .catch(next);
  });

  /**
   * @api {get} /dashboard/metrics/summary 指标汇总
   * @apiQuery {Number{1-168}} [hours=24] 统计窗口（小时）
   */
  router.get(
    '/dashboard/metrics/summary',
    validate(MetricsSummaryRequestSchema, async ({ query }, _req, res) => {
      const summary = await dashboardService.getMetricsSummary(
        query.hours,
        query.hostname,
      );
      res.json(summary);
    }),
  );

  /**
   * @api {get} /status 后台任务状态
   */
  router.get('/status', (_req, res) => {
    res.json(taskManager.getStatus());
  });

  return router;
}
