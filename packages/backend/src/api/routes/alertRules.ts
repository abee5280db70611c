import express from 'express';
import { validate } from '@middleware/validate.js';
import {
  AlertRuleIdRequestSchema,
  CreateAlertRuleRequestSchema,
  ListAlertRulesRequestSchema,
  UpdateAlertRuleRequestSchema,
} from '@api/contracts/monitoring.js';
import {
  serializeAlertRule,
  type AlertRuleService,
} from '@application/services/alerting/AlertRuleService.js';

/**
 * 创建告警规则相关的API路由
 *
 * @param alertRuleService - 告警规则服务
 * @returns 配置好的 Express 路由实例
 */
export function createAlertRuleRoutes(
  alertRuleService: AlertRuleService,
): express.Router {
  const router = express.Router();

  router.get(
    '/alert-rules',
    validate(ListAlertRulesRequestSchema, async ({ query }, _req, res) => {
      const rules = await alertRuleService.listRules({
        skip: query.skip,
        limit: query.limit,
        activeOnly: query.active_only,
      });
      res.json(rules.map(serializeAlertRule));
    }),
  );

  /**
   * @api {post} /alert-rules 创建告警规则
   * @apiError (409) CONFLICT 规则名称已存在
   */
  router.post(
    '/alert-rules',
    validate(CreateAlertRuleRequestSchema, async ({ body }, _req, res) => {
      const rule = await alertRuleService.createRule(body);
      res.status(201).json(serializeAlertRule(rule));
    }),
  );

  router.get(
    '/alert-rules/:id',
    validate(AlertRuleIdRequestSchema, async ({ params }, _req, res) => {
      const rule = await alertRuleService.getRule(params.id);
      res.json(serializeAlertRule(rule));
    }),
  );

  router.patch(
    '/alert-rules/:id',
    validate(UpdateAlertRuleRequestSchema, async ({ params, body }, _req, res) => {
      const rule = await alertRuleService.updateRule(params.id, body);
      res.json(serializeAlertRule(rule));
    }),
  );

  router.delete(
    '/alert-rules/:id',
    validate(AlertRuleIdRequestSchema, async ({ params }, _req, res) => {
      await alertRuleService.deleteRule(params.id);
      res.json({ message: 'Alert rule deleted successfully' });
    }),
  );

  return router;
}
