import type { Logger } from '@logging/logger.js';
import type { AppConfig } from '@config/config.js';
import { AppError } from '@api/contracts/error.js';
import type { AlertRule } from '@infrastructure/database/entities/AlertRule.js';
import type {
  IAlertRuleRepository,
  NewAlertRule,
} from '@domain/repositories/IAlertRuleRepository.js';
import {
  parseRuleCondition,
  type RuleCondition,
} from '@domain/alerting/RuleCondition.js';
import {
  DuplicateRuleNameError,
  InvalidRuleConditionError,
} from '@domain/errors/MonitoringErrors.js';
import type { AlertSeverity, RuleType } from '@domain/entities/types.js';

export interface CreateAlertRuleInput {
  name: string;
  description?: string | null;
  rule_type: RuleType;
  condition: Record<string, unknown>;
  severity: AlertSeverity;
  notification_channels?: string[];
  cooldown_minutes?: number;
  is_active?: boolean;
}

export type UpdateAlertRuleInput = Partial<CreateAlertRuleInput>;

export interface AlertRuleResponse {
  id: string;
  name: string;
  description: string | null;
  rule_type: RuleType;
  condition: Record<string, unknown>;
  severity: AlertSeverity;
  notification_channels: string[];
  cooldown_minutes: number;
  is_active: boolean;
  created_at: string;
  updated_at: string;
}

export function serializeAlertRule(rule: AlertRule): AlertRuleResponse {
  return {
    id: rule.id,
    name: rule.name,
    description: rule.description,
    rule_type: rule.rule_type,
    condition: rule.condition,
    severity: rule.severity,
    notification_channels: rule.notification_channels,
    cooldown_minutes: rule.cooldown_minutes,
    is_active: rule.is_active,
    created_at: new Date(rule.created_at).toISOString(),
    updated_at: new Date(rule.updated_at).toISOString(),
  };
}

/**
 * 告警规则管理服务
 */
export class AlertRuleService {
  constructor(
    private readonly ruleRepository: IAlertRuleRepository,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * 创建告警规则，名称重复时返回冲突
   * @param input 规则数据
   * @returns 已保存的规则
   */
  async createRule(input: CreateAlertRuleInput): Promise<AlertRule> {
    const typed = this.validateCondition(input.rule_type, input.condition);
    await this.assertNameAvailable(input.name);

    const rule: NewAlertRule = {
      name: input.name,
      description: input.description ?? null,
      rule_type: typed.rule_type,
      condition: typed.condition,
      severity: input.severity,
      notification_channels: input.notification_channels ?? [],
      cooldown_minutes: input.cooldown_minutes ?? 15,
      is_active: input.is_active ?? true,
      created_at: this.now(),
    };

    const created = await this.persist(rule.name, () =>
      this.ruleRepository.create(rule),
    );
    this.logger.info('告警规则已创建', {
      ruleId: created.id,
      name: created.name,
      ruleType: created.rule_type,
    });
    return created;
  }

  /**
   * 获取单个规则
   * @param id 规则ID
   * @returns 规则
   */
  async getRule(id: string): Promise<AlertRule> {
    const rule = await this.ruleRepository.findById(id);
    if (!rule) {
      throw AppError.createNotFoundError(`Alert rule with ID ${id} not found`);
    }
    return rule;
  }

  async listRules(options: {
    skip: number;
    limit: number;
    activeOnly: boolean;
  }): Promise<AlertRule[]> {
    return this.ruleRepository.list(options);
  }

  /**
   * 更新告警规则
   * 规则类型或条件变化时按新的组合重新校验
   * @param id 规则ID
   * @param input 需要更新的字段
   * @returns 更新后的规则
   */
  async updateRule(id: string, input: UpdateAlertRuleInput): Promise<AlertRule> {
    const rule = await this.getRule(id);

    if (input.name !== undefined && input.name !== rule.name) {
      await this.assertNameAvailable(input.name);
      rule.name = input.name;
    }

    if (input.rule_type !== undefined || input.condition !== undefined) {
      const typed = this.validateCondition(
        input.rule_type ?? rule.rule_type,
        input.condition ?? rule.condition,
      );
      rule.rule_type = typed.rule_type;
      rule.condition = typed.condition;
    }

    if (input.description !== undefined) {
      rule.description = input.description;
    }
    if (input.severity !== undefined) {
      rule.severity = input.severity;
    }
    if (input.notification_channels !== undefined) {
      rule.notification_channels = input.notification_channels;
    }
    if (input.cooldown_minutes !== undefined) {
      rule.cooldown_minutes = input.cooldown_minutes;
    }
    if (input.is_active !== undefined) {
      rule.is_active = input.is_active;
    }

    rule.updated_at = this.now();
    const saved = await this.persist(rule.name, () =>
      this.ruleRepository.save(rule),
    );
    this.logger.info('告警规则已更新', { ruleId: id });
    return saved;
  }

  async deleteRule(id: string): Promise<void> {
    const deleted = await this.ruleRepository.delete(id);
    if (!deleted) {
      throw AppError.createNotFoundError(`Alert rule with ID ${id} not found`);
    }
    this.logger.info('告警规则已删除', { ruleId: id });
  }

  /**
   * 规则表为空时写入默认的 CPU / 内存 / 磁盘规则
   * @param thresholds 告警阈值配置
   * @returns 新建的规则数量
   */
  async ensureDefaultRules(thresholds: AppConfig['alerting']): Promise<number> {
    if ((await this.ruleRepository.count()) > 0) {
      return 0;
    }

    const defaults: CreateAlertRuleInput[] = [
      {
        name: 'High CPU Usage',
        description: 'CPU usage above the configured threshold',
        rule_type: 'system_metric',
        condition: {
          metric_type: 'cpu_usage_percent',
          operator: '>',
          threshold: thresholds.cpuThreshold,
        },
        severity: 'high',
      },
      {
        name: 'High Memory Usage',
        description: 'Memory usage above the configured threshold',
        rule_type: 'system_metric',
        condition: {
          metric_type: 'memory_usage_percent',
          operator: '>',
          threshold: thresholds.memoryThreshold,
        },
        severity: 'high',
      },
      {
        name: 'High Disk Usage',
        description: 'Disk usage above the configured threshold',
        rule_type: 'system_metric',
        condition: {
          metric_type: 'disk_usage_percent',
          operator: '>',
          threshold: thresholds.diskThreshold,
        },
        severity: 'critical',
      },
    ];

    for (const rule of defaults) {
      await this.createRule(rule);
    }
    this.logger.info('已创建默认告警规则', { count: defaults.length });
    return defaults.length;
  }

  private validateCondition(
    ruleType: string,
    condition: Record<string, unknown>,
  ): RuleCondition {
    try {
      return parseRuleCondition(ruleType, condition);
    } catch (error) {
      if (error instanceof InvalidRuleConditionError) {
        throw AppError.createValidationError(
          { issues: error.issues },
          error.message,
        );
      }
      throw error;
    }
  }

  private async assertNameAvailable(name: string): Promise<void> {
    const existing = await this.ruleRepository.findByName(name);
    if (existing) {
      throw this.nameConflict(name, existing.id);
    }
  }

  /**
   * 写入规则；预检查之后被并发写入抢占名称时同样返回冲突
   */
  private async persist(
    name: string,
    write: () => Promise<AlertRule>,
  ): Promise<AlertRule> {
    try {
      return await write();
    } catch (error) {
      if (error instanceof DuplicateRuleNameError) {
        const existing = await this.ruleRepository.findByName(name);
        throw this.nameConflict(name, existing?.id);
      }
      throw error;
    }
  }

  private nameConflict(name: string, ruleId: string | undefined): AppError {
    return AppError.createConflictError(
      `Alert rule with name "${name}" already exists`,
      ruleId === undefined ? undefined : { ruleId },
    );
  }
}
