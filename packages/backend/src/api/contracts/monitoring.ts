import { z } from 'zod';
import {
  ALERT_SEVERITIES,
  ALERT_STATUSES,
  RULE_TYPES,
} from '@domain/entities/types.js';

/**
 * 查询字符串中的布尔值，只接受 true / false
 */
const booleanQuery = (defaultValue: boolean) =>
  z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value === 'true'));

/**
 * 时间参数，接受毫秒时间戳或 ISO 8601 字符串
 */
const timeQuery = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined) {
      return undefined;
    }
    const time = /^\d+$/.test(value) ? Number(value) : Date.parse(value);
    if (Number.isNaN(time)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Expected epoch milliseconds or an ISO 8601 timestamp',
      });
      return z.NEVER;
    }
    return time;
  });

const limitQuery = z.coerce.number().int().min(1).max(1000).default(100);
const offsetQuery = z.coerce.number().int().min(0).default(0);

const IdParamsSchema = z.object({
  id: z.string().min(1),
});

/**
 * GET /metrics/system
 */
export const SystemMetricsQuerySchema = z.object({
  query: z.object({
    metric_type: z.string().min(1).optional(),
    hostname: z.string().min(1).optional(),
    start_time: timeQuery,
    end_time: timeQuery,
    limit: limitQuery,
    offset: offsetQuery,
  }),
});

/**
 * GET /metrics/processes
 */
export const ProcessMetricsQuerySchema = z.object({
  query: SystemMetricsQuerySchema.shape.query
    .omit({ metric_type: true })
    .extend({
      process_name: z.string().min(1).optional(),
    }),
});

export const LatestMetricsRequestSchema = z.object({
  params: z.object({ hostname: z.string().min(1) }),
});

export const CollectMetricsRequestSchema = z.object({
  query: z.object({ collect_processes: booleanQuery(true) }),
});

export const ListAlertsRequestSchema = z.object({
  query: z.object({
    skip: offsetQuery,
    limit: limitQuery,
    status: z.enum(ALERT_STATUSES).optional(),
    severity: z.enum(ALERT_SEVERITIES).optional(),
  }),
});

/**
 * 手动创建告警，不关联规则
 */
export const CreateAlertRequestSchema = z.object({
  body: z.object({
    alert_type: z.string().min(1).max(50),
    severity: z.enum(ALERT_SEVERITIES),
    source: z.string().min(1).max(255),
    title: z.string().min(1).max(255),
    description: z.string().nullable().optional(),
    alert_metadata: z.record(z.unknown()).default({}),
  }),
});

export const AlertIdRequestSchema = z.object({
  params: IdParamsSchema,
});

export const UpdateAlertRequestSchema = z.object({
  params: IdParamsSchema,
  body: z.object({
    status: z.enum(ALERT_STATUSES).optional(),
    acknowledged_by: z.string().min(1).optional(),
    resolved_by: z.string().min(1).optional(),
  }),
});

export const CheckAlertsRequestSchema = z.object({
  query: z.object({ hostname: z.string().min(1).optional() }),
});

export const ListAlertRulesRequestSchema = z.object({
  query: z.object({
    skip: offsetQuery,
    limit: limitQuery,
    active_only: booleanQuery(false),
  }),
});

const AlertRuleBodySchema = z.object({
  name: z.string().min(1).max(255),
  description: z.string().nullable().optional(),
  rule_type: z.enum(RULE_TYPES),
  condition: z.record(z.unknown()),
  severity: z.enum(ALERT_SEVERITIES),
  notification_channels: z.array(z.string()).optional(),
  cooldown_minutes: z.number().int().min(0).optional(),
  is_active: z.boolean().optional(),
});

export const CreateAlertRuleRequestSchema = z.object({
  body: AlertRuleBodySchema,
});

export const UpdateAlertRuleRequestSchema = z.object({
  params: IdParamsSchema,
  body: AlertRuleBodySchema.partial(),
});

export const AlertRuleIdRequestSchema = z.object({
  params: IdParamsSchema,
});

export const MetricsSummaryRequestSchema = z.object({
  query: z.object({
    hostname: z.string().min(1).optional(),
    hours: z.coerce.number().int().min(1).max(168).default(24),
  }),
});
