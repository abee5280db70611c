import {
  PrimaryColumn,
  Column,
  BeforeInsert,
  type ValueTransformer,
} from 'typeorm';
import { v4 as uuidv4 } from 'uuid';

/**
 * bigint 列转换器（毫秒时间戳、字节计数）
 * SQLite 返回 number，PostgreSQL 的 bigint 返回 string
 */
export const bigintTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) =>
    value === null || value === undefined ? null : Number(value),
};

/**
 * 基础实体类
 * 包含所有实体的通用字段：UUID 主键与创建时间
 */
export abstract class BaseEntity {
  /**
   * 主键ID
   * 使用自定义UUID生成，兼容SQLite和PostgreSQL
   */
  @PrimaryColumn({
    type: 'varchar',
    length: 36,
    comment: '主键ID，使用UUID v4格式',
  })
  id!: string;

  /**
   * 创建时间戳（毫秒）
   */
  @Column({
    type: 'bigint',
    nullable: false,
    transformer: bigintTransformer,
    comment: '创建时间戳（毫秒）',
  })
  created_at!: number;

  /**
   * 在插入前生成UUID和设置时间戳
   */
  @BeforeInsert()
  generateIdAndCreatedAt() {
    if (!this.id) {
      this.id = uuidv4();
    }
    if (!this.created_at) {
      this.created_at = Date.now();
    }
  }
}

/**
 * 可变实体基类，额外维护更新时间
 */
export abstract class MutableEntity extends BaseEntity {
  /**
   * 更新时间戳（毫秒）
   */
  @Column({
    type: 'bigint',
    nullable: false,
    transformer: bigintTransformer,
    comment: '更新时间戳（毫秒）',
  })
  updated_at!: number;

  /**
   * 插入时与创建时间一致；之后由服务按自身时钟写入
   */
  @BeforeInsert()
  initUpdatedAt() {
    if (!this.updated_at) {
      this.updated_at = this.created_at || Date.now();
    }
  }
}
