import { Entity, Column, Index } from 'typeorm';
import { BaseEntity, bigintTransformer } from './BaseEntity.js';

/**
 * 系统指标实体
 * 对应数据库中的system_metrics表，写入后不再修改
 */
@Entity('system_metrics')
@Index(['hostname', 'metric_type', 'timestamp'])
@Index(['timestamp'])
export class SystemMetric extends BaseEntity {
  @Column({ type: 'varchar', length: 255, nullable: false, comment: '主机名' })
  hostname!: string;

  /**
   * 指标类型，例如 cpu_usage_percent
   */
  @Column({ type: 'varchar', length: 100, nullable: false })
  metric_type!: string;

  @Column({ type: 'double precision', nullable: false, comment: '指标值' })
  metric_value!: number;

  @Column({ type: 'varchar', length: 20, nullable: true, comment: '指标单位' })
  metric_unit!: string | null;

  @Column({ type: 'simple-json', nullable: false, comment: '附加标签' })
  tags!: Record<string, string>;

  /**
   * 采样时间戳（毫秒）
   */
  @Column({
    type: 'bigint',
    nullable: false,
    transformer: bigintTransformer,
  })
  timestamp!: number;
}
