import { Entity, Column, Index, Check } from 'typeorm';
import { MutableEntity } from './BaseEntity.js';
import type {
  AlertSeverity,
  RuleType,
} from '@domain/entities/types.js';

/**
 * 告警规则实体
 * 对应数据库中的alert_rules表
 */
@Entity('alert_rules')
@Index(['name'], { unique: true })
@Index(['is_active'])
@Check(`name != ''`)
@Check(
  `rule_type IN ('system_metric', 'service_health', 'process_metric')`,
)
@Check(`severity IN ('critical', 'high', 'medium', 'low', 'info')`)
@Check(`cooldown_minutes >= 0`)
export class AlertRule extends MutableEntity {
  /**
   * 规则名称，全局唯一
   */
  @Column({ type: 'varchar', length: 255, nullable: false })
  name!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'varchar', length: 50, nullable: false })
  rule_type!: RuleType;

  /**
   * 结构化条件，结构由 rule_type 决定
   */
  @Column({ type: 'simple-json', nullable: false })
  condition!: Record<string, unknown>;

  @Column({ type: 'varchar', length: 20, nullable: false })
  severity!: AlertSeverity;

  /**
   * 通知渠道，由独立的通知服务消费
   */
  @Column({ type: 'simple-json', nullable: false })
  notification_channels!: string[];

  /**
   * 冷却时间（分钟），0 表示不冷却
   */
  @Column({ type: 'integer', nullable: false, default: 15 })
  cooldown_minutes!: number;

  @Column({ type: 'boolean', nullable: false, default: true })
  is_active!: boolean;
}
