import type { AlertRule } from '@infrastructure/database/entities/AlertRule.js';
import type {
  AlertSeverity,
  RuleType,
} from '@domain/entities/types.js';

/**
 * 新告警规则
 */
export interface NewAlertRule {
  name: string;
  description: string | null;
  rule_type: RuleType;
  condition: Record<string, unknown>;
  severity: AlertSeverity;
  notification_channels: string[];
  cooldown_minutes: number;
  is_active: boolean;
  created_at?: number;
}

export interface IAlertRuleRepository {
  /**
   * 名称冲突时抛出 DuplicateRuleNameError，save 同理
   */
  create(rule: NewAlertRule): Promise<AlertRule>;

  findById(id: string): Promise<AlertRule | null>;

  findByName(name: string): Promise<AlertRule | null>;

  /**
   * 获取所有启用的规则，按名称排序
   */
  findActive(): Promise<AlertRule[]>;

  list(options: {
    skip: number;
    limit: number;
    activeOnly: boolean;
  }): Promise<AlertRule[]>;

  count(): Promise<number>;

  save(rule: AlertRule): Promise<AlertRule>;

  /**
   * @returns 是否删除了规则
   */
  delete(id: string): Promise<boolean>;
}
