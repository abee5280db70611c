import { z } from 'zod';
import {
  COMPARISON_OPERATORS,
  PROCESS_METRIC_FIELDS,
  type ComparisonOperator,
} from '@domain/entities/types.js';
import { InvalidRuleConditionError } from '@domain/errors/MonitoringErrors.js';

/**
 * 默认的规则时间窗口（分钟）
 */
export const DEFAULT_TIME_WINDOW_MINUTES = 5;

export const SystemMetricConditionSchema = z.object({
  metric_type: z.string().min(1),
  operator: z.enum(COMPARISON_OPERATORS),
  threshold: z.number().finite(),
  time_window_minutes: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_TIME_WINDOW_MINUTES),
});

export const ServiceHealthConditionSchema = z.object({
  service_name: z.string().min(1),
  max_response_time_ms: z.number().int().positive().optional(),
});

export const ProcessMetricConditionSchema = z.object({
  process_name: z.string().min(1),
  metric_field: z.enum(PROCESS_METRIC_FIELDS),
  operator: z.enum(COMPARISON_OPERATORS),
  threshold: z.number().finite(),
  time_window_minutes: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_TIME_WINDOW_MINUTES),
});

export type SystemMetricCondition = z.infer<typeof SystemMetricConditionSchema>;
export type ServiceHealthCondition = z.infer<
  typeof ServiceHealthConditionSchema
>;
export type ProcessMetricCondition = z.infer<
  typeof ProcessMetricConditionSchema
>;

/**
 * 规则类型与条件的封闭联合，按 rule_type 区分
 */
export const RuleConditionSchema = z.discriminatedUnion('rule_type', [
  z.object({
    rule_type: z.literal('system_metric'),
    condition: SystemMetricConditionSchema,
  }),
  z.object({
    rule_type: z.literal('service_health'),
    condition: ServiceHealthConditionSchema,
  }),
  z.object({
    rule_type: z.literal('process_metric'),
    condition: ProcessMetricConditionSchema,
  }),
]);

export type RuleCondition = z.infer<typeof RuleConditionSchema>;

/**
 * 解析并校验规则条件
 * @param ruleType - 规则类型
 * @param condition - 存储的条件对象
 * @returns 带类型标签的条件
 * @throws InvalidRuleConditionError 条件与规则类型不匹配时
 */
export function parseRuleCondition(
  ruleType: string,
  condition: unknown,
): RuleCondition {
  const result = RuleConditionSchema.safeParse({
    rule_type: ruleType,
    condition,
  });
  if (!result.success) {
    throw new InvalidRuleConditionError(
      ruleType,
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }
  return result.data;
}

/**
 * 按操作符比较当前值与阈值
 *
 * `==` 为精确相等，对连续采样值几乎不会触发
 * @param value - 当前值
 * @param operator - 比较操作符
 * @param threshold - 阈值
 * @returns 是否满足条件
 */
export function compareValue(
  value: number,
  operator: ComparisonOperator,
  threshold: number,
): boolean {
  switch (operator) {
    case '>':
      return value > threshold;
    case '<':
      return value < threshold;
    case '>=':
      return value >= threshold;
    case '<=':
      return value <= threshold;
    case '==':
      return value === threshold;
  }
}
