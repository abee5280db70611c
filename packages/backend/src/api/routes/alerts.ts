import express from 'express';
import { validate } from '@middleware/validate.js';
import {
  AlertIdRequestSchema,
  CheckAlertsRequestSchema,
  CreateAlertRequestSchema,
  ListAlertsRequestSchema,
  UpdateAlertRequestSchema,
} from '@api/contracts/monitoring.js';
import {
  serializeAlert,
  type AlertService,
} from '@application/services/alerting/AlertService.js';
import type { AlertRuleEngine } from '@application/services/alerting/AlertRuleEngine.js';

/**
 * 创建告警相关的API路由
 *
 * @param alertService - 告警服务
 * @param alertRuleEngine - 告警规则引擎
 * @returns 配置好的 Express 路由实例
 */
export function createAlertRoutes(
  alertService: AlertService,
  alertRuleEngine: AlertRuleEngine,
): express.Router {
  const router = express.Router();

  router.get(
    '/alerts',
    validate(ListAlertsRequestSchema, async ({ query }, _req, res) => {
      const alerts = await alertService.listAlerts(query);
      res.json(alerts.map(serializeAlert));
    }),
  );

  /**
   * @api {post} /alerts 手动创建告警
   */
  router.post(
    '/alerts',
    validate(CreateAlertRequestSchema, async ({ body }, _req, res) => {
      const alert = await alertService.createAlert({
        alert_type: body.alert_type,
        severity: body.severity,
        source: body.source,
        title: body.title,
        description: body.description ?? null,
        alert_metadata: body.alert_metadata,
        rule_id: null,
      });
      res.status(201).json(serializeAlert(alert));
    }),
  );

  // 必须在 /alerts/:id 之前注册
  router.get('/alerts/stats', (_req, res, next) => {
    alertService
      .getAlertStats()
      .then((stats) => res.json(stats))
      .catch(next);
  });

  /**
   * @api {post} /alerts/check 立即评估所有启用的规则
   * @apiQuery {String} [hostname] 仅评估该主机的指标
   */
  router.post(
    '/alerts/check',
    validate(CheckAlertsRequestSchema, async ({ query }, _req, res) => {
      const result = await alertRuleEngine.checkSystemAlerts(query.hostname);
      res.json({
        alerts_created: result.alerts.length,
        alerts: result.alerts.map(serializeAlert),
      });
    }),
  );

  router.get(
    '/alerts/:id',
    validate(AlertIdRequestSchema, async ({ params }, _req, res) => {
      const alert = await alertService.getAlert(params.id);
      res.json(serializeAlert(alert));
    }),
  );

  /**
   * @api {patch} /alerts/:id 更新告警状态
   */
  router.patch(
    '/alerts/:id',
    validate(UpdateAlertRequestSchema, async ({ params, body }, _req, res) => {
      const alert = await alertService.updateAlert(params.id, body);
      res.json(serializeAlert(alert));
    }),
  );

  return router;
}
