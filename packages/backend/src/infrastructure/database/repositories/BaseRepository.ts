import {
  DataSource,
  QueryFailedError,
  Repository,
  type DeepPartial,
  type EntityTarget,
  type FindOptionsWhere,
} from 'typeorm';
import type { Logger } from '@logging/logger.js';
import type { BaseEntity } from '../entities/BaseEntity.js';

/**
 * 判断是否为唯一约束冲突
 * PostgreSQL 返回 23505，better-sqlite3 返回 SQLITE_CONSTRAINT_UNIQUE
 * @param error 原始错误
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  const code =
    typeof driverError === 'object' && driverError !== null && 'code' in driverError
      ? driverError.code
      : undefined;
  return code === '23505' || code === 'SQLITE_CONSTRAINT_UNIQUE';
}

/**
 * 基础TypeORM Repository类
 * 提供通用的CRUD操作和错误处理
 */
export class BaseRepository<T extends BaseEntity> {
  protected readonly repository: Repository<T>;

  constructor(
    protected readonly dataSource: DataSource,
    protected readonly entity: EntityTarget<T>,
    protected readonly logger: Logger,
  ) {
    this.repository = dataSource.getRepository(entity);
  }

  /**
   * 记录错误并重新抛出
   * @param message 日志消息
   * @param error 原始错误
   * @param meta 附加上下文
   */
  protected handleError(
    message: string,
    error: unknown,
    meta?: Record<string, unknown>,
  ): never {
    this.logger.error(message, {
      ...meta,
      error: error instanceof Error ? error.message : String(error),
    });
    if (error instanceof Error) throw error;
    throw new Error(String(error));
  }

  /**
   * 根据ID查找实体
   * @param id 实体ID
   * @returns 实体或null
   */
  async findById(id: string): Promise<T | null> {
    try {
      return await this.repository
        .createQueryBuilder('entity')
        .where('entity.id = :id', { id })
        .getOne();
    } catch (error) {
      this.handleError('根据ID查找实体失败', error, { id });
    }
  }

  /**
   * 创建并保存实体
   * @param data 实体数据
   * @returns 保存后的实体
   */
  async create(data: DeepPartial<T>): Promise<T> {
    try {
      const entity = this.repository.create(data);
      return await this.repository.save(entity);
    } catch (error) {
      this.handleError('创建实体失败', error);
    }
  }

  /**
   * 保存已有实体的修改
   * @param entity 实体
   * @returns 保存后的实体
   */
  async save(entity: T): Promise<T> {
    try {
      return await this.repository.save(entity);
    } catch (error) {
      this.handleError('保存实体失败', error, { id: entity.id });
    }
  }

  /**
   * 在独立事务中按条件删除
   * @param where 删除条件
   * @returns 删除的行数
   */
  protected async deleteWhereInTransaction(
    where: FindOptionsWhere<T>,
  ): Promise<number> {
    const result = await this.dataSource.transaction((manager) =>
      manager.delete(this.entity, where),
    );
    return result.affected ?? 0;
  }
}
