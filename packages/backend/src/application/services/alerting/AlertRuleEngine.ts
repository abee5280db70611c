import type { Logger } from '@logging/logger.js';
import type { Alert } from '@infrastructure/database/entities/Alert.js';
import type { AlertRule } from '@infrastructure/database/entities/AlertRule.js';
import type { IAlertRuleRepository } from '@domain/repositories/IAlertRuleRepository.js';
import type {
  IAlertRepository,
  NewAlert,
} from '@domain/repositories/IAlertRepository.js';
import type { ISystemMetricRepository } from '@domain/repositories/ISystemMetricRepository.js';
import type { IProcessMetricRepository } from '@domain/repositories/IProcessMetricRepository.js';
import {
  CacheKeys,
  type IFastCache,
} from '@domain/repositories/IFastCache.js';
import {
  compareValue,
  parseRuleCondition,
  type ProcessMetricCondition,
  type ServiceHealthCondition,
  type SystemMetricCondition,
} from '@domain/alerting/RuleCondition.js';
import { InvalidRuleConditionError } from '@domain/errors/MonitoringErrors.js';
import type { ServiceHealthCheck } from '@domain/entities/types.js';
import type { AlertService } from './AlertService.js';

/**
 * 时间窗口内最多读取的样本数
 */
const RECENT_SAMPLE_LIMIT = 10;

/**
 * 单条规则的评估结果
 */
export type RuleEvaluation =
  | { ok: true; alert: Alert | null; skipped?: 'cooldown' }
  | { ok: false; error: Error };

/**
 * 一批规则的评估结果
 */
export interface RuleBatchResult {
  alerts: Alert[];
  evaluated: number;
  skipped: number;
  failed: Array<{ ruleId: string; ruleName: string; message: string }>;
}

export interface AlertRuleEngineOptions {
  /** service_health 规则未指定 max_response_time_ms 时的阈值（毫秒） */
  responseTimeThresholdMs: number;
  now?: () => number;
}

/**
 * 告警规则引擎
 * 逐条评估启用的规则，按规则冷却时间抑制重复告警
 */
export class AlertRuleEngine {
  private readonly now: () => number;

  constructor(
    private readonly ruleRepository: IAlertRuleRepository,
    private readonly alertRepository: IAlertRepository,
    private readonly systemMetricRepository: ISystemMetricRepository,
    private readonly processMetricRepository: IProcessMetricRepository,
    private readonly alertService: AlertService,
    private readonly cache: IFastCache,
    private readonly options: AlertRuleEngineOptions,
    private readonly logger: Logger,
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * 评估所有启用的规则
   * 单条规则失败只记录日志，不影响其余规则
   * @param hostname 可选，仅评估该主机的指标
   * @returns 批量评估结果
   */
  async checkSystemAlerts(hostname?: string): Promise<RuleBatchResult> {
    const rules = await this.ruleRepository.findActive();
    const result: RuleBatchResult = {
      alerts: [],
      evaluated: 0,
      skipped: 0,
      failed: [],
    };

    for (const rule of rules) {
      const evaluation = await this.evaluateRule(rule, hostname);
      if (!evaluation.ok) {
        result.failed.push({
          ruleId: rule.id,
          ruleName: rule.name,
          message: evaluation.error.message,
        });
        continue;
      }
      if (evaluation.skipped) {
        result.skipped++;
        continue;
      }
      result.evaluated++;
      if (evaluation.alert) {
        result.alerts.push(evaluation.alert);
      }
    }

    this.logger.info('告警规则检查完成', {
      hostname,
      rules: rules.length,
      evaluated: result.evaluated,
      skipped: result.skipped,
      failed: result.failed.length,
      alertsCreated: result.alerts.length,
    });
    return result;
  }

  /**
   * 评估单条规则
   * @param rule 告警规则
   * @param hostname 可选主机名
   * @returns 评估结果，不抛出异常
   */
  async evaluateRule(rule: AlertRule, hostname?: string): Promise<RuleEvaluation> {
    try {
      if (await this.isInCooldown(rule)) {
        this.logger.debug('告警规则处于冷却期，跳过', { ruleId: rule.id });
        return { ok: true, alert: null, skipped: 'cooldown' };
      }

      const typed = parseRuleCondition(rule.rule_type, rule.condition);
      let candidate: NewAlert | null;
      switch (typed.rule_type) {
        case 'system_metric':
          candidate = await this.evaluateSystemMetric(
            rule,
            typed.condition,
            hostname,
          );
          break;
        case 'service_health':
          candidate = this.evaluateServiceHealth(rule, typed.condition);
          break;
        case 'process_metric':
          candidate = await this.evaluateProcessMetric(
            rule,
            typed.condition,
            hostname,
          );
          break;
      }

      if (!candidate) {
        return { ok: true, alert: null };
      }
      const alert = await this.alertService.createAlert(candidate);
      return { ok: true, alert };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      if (err instanceof InvalidRuleConditionError) {
        this.logger.warn('告警规则条件无效，跳过', {
          ruleId: rule.id,
          ruleName: rule.name,
          error: err.message,
        });
      } else {
        this.logger.error('评估告警规则失败', {
          ruleId: rule.id,
          ruleName: rule.name,
          error: err.message,
        });
      }
      return { ok: false, error: err };
    }
  }

  private async isInCooldown(rule: AlertRule): Promise<boolean> {
    if (rule.cooldown_minutes <= 0) {
      return false;
    }
    const since = this.now() - rule.cooldown_minutes * 60_000;
    return this.alertRepository.existsForRuleSince(rule.id, since);
  }

  private async evaluateSystemMetric(
    rule: AlertRule,
    condition: SystemMetricCondition,
    hostname?: string,
  ): Promise<NewAlert | null> {
    const samples = await this.systemMetricRepository.findRecent({
      metricType: condition.metric_type,
      since: this.now() - condition.time_window_minutes * 60_000,
      hostname,
      limit: RECENT_SAMPLE_LIMIT,
    });
    const latest = samples[0];
    if (!latest) {
      return null;
    }

    const value = latest.metric_value;
    if (!compareValue(value, condition.operator, condition.threshold)) {
      return null;
    }

    return {
      alert_type: 'system_metric',
      severity: rule.severity,
      source: `system:${latest.hostname}`,
      title: `${rule.name} - ${condition.metric_type} Alert`,
      description: `${condition.metric_type} is ${value}${latest.metric_unit ?? ''} (threshold: ${condition.operator} ${condition.threshold})`,
      alert_metadata: {
        rule_id: rule.id,
        metric_type: condition.metric_type,
        current_value: value,
        threshold: condition.threshold,
        operator: condition.operator,
        hostname: latest.hostname,
        metric_unit: latest.metric_unit,
      },
      rule_id: rule.id,
    };
  }

  /**
   * 只读取健康检查缓存，不在评估中发起探测
   */
  private evaluateServiceHealth(
    rule: AlertRule,
    condition: ServiceHealthCondition,
  ): NewAlert | null {
    const health = this.cache.get<ServiceHealthCheck>(
      CacheKeys.serviceHealth(condition.service_name),
    );
    if (!health) {
      return null;
    }

    const maxResponseTime =
      condition.max_response_time_ms ?? this.options.responseTimeThresholdMs;
    const unhealthy = health.status !== 'healthy';
    const slow =
      health.response_time_ms !== null &&
      health.response_time_ms > maxResponseTime;
    if (!unhealthy && !slow) {
      return null;
    }

    const responseTime =
      health.response_time_ms !== null
        ? ` (response time: ${health.response_time_ms}ms)`
        : '';
    return {
      alert_type: 'service_health',
      severity: rule.severity,
      source: `service:${condition.service_name}`,
      title: `${rule.name} - Service Health Alert`,
      description: `Service ${condition.service_name} is ${health.status}${responseTime}`,
      alert_metadata: {
        rule_id: rule.id,
        service_name: condition.service_name,
        status: health.status,
        response_time_ms: health.response_time_ms,
        max_response_time_ms: maxResponseTime,
        error_message: health.error_message,
      },
      rule_id: rule.id,
    };
  }

  private async evaluateProcessMetric(
    rule: AlertRule,
    condition: ProcessMetricCondition,
    hostname?: string,
  ): Promise<NewAlert | null> {
    const samples = await this.processMetricRepository.findRecent({
      processName: condition.process_name,
      since: this.now() - condition.time_window_minutes * 60_000,
      hostname,
      limit: RECENT_SAMPLE_LIMIT,
    });
    const latest = samples[0];
    if (!latest) {
      return null;
    }

    const value = latest[condition.metric_field];
    if (value === null) {
      return null;
    }
    if (!compareValue(value, condition.operator, condition.threshold)) {
      return null;
    }

    return {
      alert_type: 'process_metric',
      severity: rule.severity,
      source: `process:${latest.hostname}:${condition.process_name}`,
      title: `${rule.name} - Process Alert`,
      description: `Process ${condition.process_name} ${condition.metric_field} is ${value} (threshold: ${condition.operator} ${condition.threshold})`,
      alert_metadata: {
        rule_id: rule.id,
        process_name: condition.process_name,
        process_id: latest.process_id,
        metric_field: condition.metric_field,
        current_value: value,
        threshold: condition.threshold,
        operator: condition.operator,
        hostname: latest.hostname,
      },
      rule_id: rule.id,
    };
  }
}
