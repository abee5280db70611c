import { Entity, Column, Index } from 'typeorm';
import { BaseEntity, bigintTransformer } from './BaseEntity.js';

/**
 * 进程指标实体
 * 对应数据库中的process_metrics表，数据量大，保留期较短
 */
@Entity('process_metrics')
@Index(['process_name', 'hostname', 'timestamp'])
@Index(['timestamp'])
export class ProcessMetric extends BaseEntity {
  @Column({ type: 'integer', nullable: false, comment: '进程PID' })
  process_id!: number;

  @Column({ type: 'varchar', length: 255, nullable: false })
  process_name!: string;

  @Column({ type: 'varchar', length: 255, nullable: false })
  hostname!: string;

  @Column({ type: 'double precision', nullable: true })
  cpu_percent!: number | null;

  @Column({ type: 'double precision', nullable: true, comment: 'RSS（MB）' })
  memory_mb!: number | null;

  @Column({ type: 'double precision', nullable: true })
  memory_percent!: number | null;

  @Column({
    type: 'bigint',
    nullable: true,
    transformer: bigintTransformer,
  })
  disk_read_bytes!: number | null;

  @Column({
    type: 'bigint',
    nullable: true,
    transformer: bigintTransformer,
  })
  disk_write_bytes!: number | null;

  @Column({
    type: 'bigint',
    nullable: true,
    transformer: bigintTransformer,
  })
  network_sent_bytes!: number | null;

  @Column({
    type: 'bigint',
    nullable: true,
    transformer: bigintTransformer,
  })
  network_recv_bytes!: number | null;

  @Column({ type: 'varchar', length: 50, nullable: true, comment: '进程状态' })
  status!: string | null;

  @Column({
    type: 'bigint',
    nullable: false,
    transformer: bigintTransformer,
  })
  timestamp!: number;
}
