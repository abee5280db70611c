import { Entity, Column, Index, Check, ManyToOne, JoinColumn } from 'typeorm';
import { MutableEntity, bigintTransformer } from './BaseEntity.js';
import { AlertRule } from './AlertRule.js';
import type { AlertSeverity, AlertStatus } from '@domain/entities/types.js';

/**
 * 告警实体
 * 对应数据库中的alerts表
 */
@Entity('alerts')
@Index(['rule_id', 'created_at'])
@Index(['status'])
@Index(['severity'])
@Check(`severity IN ('critical', 'high', 'medium', 'low', 'info')`)
@Check(`status IN ('active', 'acknowledged', 'resolved', 'suppressed')`)
export class Alert extends MutableEntity {
  /**
   * 告警类型，例如 system_metric、service_health
   */
  @Column({ type: 'varchar', length: 50, nullable: false })
  alert_type!: string;

  @Column({ type: 'varchar', length: 20, nullable: false })
  severity!: AlertSeverity;

  /**
   * 告警来源，例如 system:{hostname}、service:{name}
   */
  @Column({ type: 'varchar', length: 255, nullable: false })
  source!: string;

  @Column({ type: 'varchar', length: 500, nullable: false })
  title!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'simple-json', nullable: false })
  alert_metadata!: Record<string, unknown>;

  /**
   * 触发规则ID，用于冷却查询；规则删除后置空
   */
  @Column({ type: 'varchar', length: 36, nullable: true })
  rule_id!: string | null;

  @ManyToOne(() => AlertRule, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'rule_id' })
  rule?: AlertRule | null;

  @Column({
    type: 'varchar',
    length: 20,
    nullable: false,
    default: 'active',
  })
  status!: AlertStatus;

  @Column({
    type: 'bigint',
    nullable: true,
    transformer: bigintTransformer,
  })
  acknowledged_at!: number | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  acknowledged_by!: string | null;

  @Column({
    type: 'bigint',
    nullable: true,
    transformer: bigintTransformer,
  })
  resolved_at!: number | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  resolved_by!: string | null;
}
