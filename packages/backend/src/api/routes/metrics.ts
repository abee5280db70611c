import express from 'express';
import type { Logger } from '@logging/logger.js';
import { validate } from '@middleware/validate.js';
import {
  CollectMetricsRequestSchema,
  LatestMetricsRequestSchema,
  ProcessMetricsQuerySchema,
  SystemMetricsQuerySchema,
} from '@api/contracts/monitoring.js';
import type { MetricsCollector } from '@application/services/monitoring/MetricsCollector.js';
import type { MetricsQueryService } from '@application/services/monitoring/MetricsQueryService.js';

/**
 * 创建指标相关的API路由
 *
 * @param metricsCollector - 指标采集服务
 * @param metricsQueryService - 指标查询服务
 * @param logger - 日志记录器
 * @returns 配置好的 Express 路由实例
 */
export function createMetricsRoutes(
  metricsCollector: MetricsCollector,
  metricsQueryService: MetricsQueryService,
  logger: Logger,
): express.Router {
  const router = express.Router();

  /**
   * @api {post} /metrics/collect 触发一次后台采集
   * @apiQuery {Boolean} [collect_processes=true] 是否同时采集进程指标
   * @apiSuccess (202) {String} message
   */
  router.post(
    '/metrics/collect',
    validate(CollectMetricsRequestSchema, async ({ query }, _req, res) => {
      const collect = async () => {
        await metricsCollector.collectSystemMetrics();
        if (query.collect_processes) {
          await metricsCollector.collectProcessMetrics();
        }
      };
      collect().catch((error) => {
        logger.error('手动指标采集失败', {
          error: error instanceof Error ? error.message : String(error),
        });
      });

      res.status(202).json({
        message: 'Metrics collection started',
        collect_processes: query.collect_processes,
      });
    }),
  );

  /**
   * @api {get} /metrics/system 查询系统指标
   */
  router.get(
    '/metrics/system',
    validate(SystemMetricsQuerySchema, async ({ query }, _req, res) => {
      const metrics = await metricsQueryService.querySystemMetrics({
        metricType: query.metric_type,
        hostname: query.hostname,
        startTime: query.start_time,
        endTime: query.end_time,
        limit: query.limit,
        offset: query.offset,
      });
      res.json(metrics);
    }),
  );

  /**
   * @api {get} /metrics/processes 查询进程指标
   */
  router.get(
    '/metrics/processes',
    validate(ProcessMetricsQuerySchema, async ({ query }, _req, res) => {
      const metrics = await metricsQueryService.queryProcessMetrics({
        processName: query.process_name,
        hostname: query.hostname,
        startTime: query.start_time,
        endTime: query.end_time,
        limit: query.limit,
        offset: query.offset,
      });
      res.json(metrics);
    }),
  );

  /**
   * @api {get} /metrics/latest/:hostname 从缓存读取主机的最新指标
   */
  router.get(
    '/metrics/latest/:hostname',
    validate(LatestMetricsRequestSchema, async ({ params }, _req, res) => {
      res.json(metricsQueryService.getLatestMetrics(params.hostname));
    }),
  );

  return router;
}
