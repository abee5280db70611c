import { describe, expect, it } from '@jest/globals';
import {
  compareValue,
  parseRuleCondition,
} from '@domain/alerting/RuleCondition.js';
import { InvalidRuleConditionError } from '@domain/errors/MonitoringErrors.js';

describe('RuleCondition', () => {
  describe('parseRuleCondition', () => {
    it('应该解析 system_metric 条件并补全默认时间窗口', () => {
      const parsed = parseRuleCondition('system_metric', {
        metric_type: 'cpu_usage_percent',
        operator: '>',
        threshold: 80,
      });

      expect(parsed).toEqual({
        rule_type: 'system_metric',
        condition: {
          metric_type: 'cpu_usage_percent',
          operator: '>',
          threshold: 80,
          time_window_minutes: 5,
        },
      });
    });

    it('应该解析 service_health 条件，max_response_time_ms 可省略', () => {
      const parsed = parseRuleCondition('service_health', {
        service_name: 'chat-service',
      });

      expect(parsed).toEqual({
        rule_type: 'service_health',
        condition: { service_name: 'chat-service' },
      });
    });

    it('应该解析 process_metric 条件', () => {
      const parsed = parseRuleCondition('process_metric', {
        process_name: 'nginx',
        metric_field: 'memory_mb',
        operator: '>=',
        threshold: 512,
        time_window_minutes: 10,
      });

      expect(parsed.rule_type).toBe('process_metric');
      expect(parsed.condition).toEqual({
        process_name: 'nginx',
        metric_field: 'memory_mb',
        operator: '>=',
        threshold: 512,
        time_window_minutes: 10,
      });
    });

    it('条件与规则类型不匹配时应该抛出 InvalidRuleConditionError', () => {
      expect(() =>
        parseRuleCondition('process_metric', {
          metric_type: 'cpu_usage_percent',
          operator: '>',
          threshold: 80,
        }),
      ).toThrow(InvalidRuleConditionError);
    });

    it('应该拒绝未知的进程指标字段并报告字段路径', () => {
      try {
        parseRuleCondition('process_metric', {
          process_name: 'nginx',
          metric_field: 'open_files',
          operator: '>',
          threshold: 10,
        });
        throw new Error('expected parseRuleCondition to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidRuleConditionError);
        if (error instanceof InvalidRuleConditionError) {
          expect(error.ruleType).toBe('process_metric');
          expect(error.issues.map((issue) => issue.path)).toEqual([
            'condition.metric_field',
          ]);
        }
      }
    });

    it('应该拒绝未知的规则类型', () => {
      expect(() =>
        parseRuleCondition('disk_smart', { metric_type: 'x' }),
      ).toThrow(InvalidRuleConditionError);
    });

    it('应该拒绝未知的比较操作符', () => {
      expect(() =>
        parseRuleCondition('system_metric', {
          metric_type: 'cpu_usage_percent',
          operator: '!=',
          threshold: 80,
        }),
      ).toThrow(InvalidRuleConditionError);
    });
  });

  describe('compareValue', () => {
    it.each([
      [92, '>', 80, true],
      [80, '>', 80, false],
      [80, '>=', 80, true],
      [79.9, '<', 80, true],
      [80, '<=', 80, true],
      [81, '<=', 80, false],
      [80, '==', 80, true],
      [80.0001, '==', 80, false],
    ] as const)('%p %s %p 应该为 %p', (value, operator, threshold, expected) => {
      expect(compareValue(value, operator, threshold)).toBe(expected);
    });
  });
});
