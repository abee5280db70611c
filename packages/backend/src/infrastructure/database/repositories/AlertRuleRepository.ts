import { DataSource } from 'typeorm';
import type { Logger } from '@logging/logger.js';
import type {
  IAlertRuleRepository,
  NewAlertRule,
} from '@domain/repositories/IAlertRuleRepository.js';
import { DuplicateRuleNameError } from '@domain/errors/MonitoringErrors.js';
import { AlertRule } from '../entities/AlertRule.js';
import { BaseRepository, isUniqueViolation } from './BaseRepository.js';

/**
 * AlertRule Repository实现
 */
export class AlertRuleRepository
  extends BaseRepository<AlertRule>
  implements IAlertRuleRepository
{
  constructor(dataSource: DataSource, logger: Logger) {
    super(dataSource, AlertRule, logger);
  }

  /**
   * 创建规则，名称冲突时抛出 DuplicateRuleNameError
   * @param rule 规则数据
   * @returns 已保存的规则
   */
  async create(rule: NewAlertRule): Promise<AlertRule> {
    try {
      return await super.create(rule);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateRuleNameError(rule.name);
      }
      throw error;
    }
  }

  async save(rule: AlertRule): Promise<AlertRule> {
    try {
      return await super.save(rule);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateRuleNameError(rule.name);
      }
      throw error;
    }
  }

  /**
   * 根据名称查找规则
   * @param name 规则名称
   * @returns 规则或null
   */
  async findByName(name: string): Promise<AlertRule | null> {
    try {
      return await this.repository.findOne({ where: { name } });
    } catch (error) {
      this.handleError('根据名称查找告警规则失败', error, { name });
    }
  }

  /**
   * 获取启用的告警规则
   * @returns 按名称排序的规则
   */
  async findActive(): Promise<AlertRule[]> {
    try {
      return await this.repository.find({
        where: { is_active: true },
        order: { name: 'ASC' },
      });
    } catch (error) {
      this.handleError('获取启用的告警规则失败', error);
    }
  }

  async list(options: {
    skip: number;
    limit: number;
    activeOnly: boolean;
  }): Promise<AlertRule[]> {
    try {
      return await this.repository.find({
        where: options.activeOnly ? { is_active: true } : {},
        order: { name: 'ASC' },
        skip: options.skip,
        take: options.limit,
      });
    } catch (error) {
      this.handleError('获取告警规则列表失败', error);
    }
  }

  async count(): Promise<number> {
    try {
      return await this.repository.count();
    } catch (error) {
      this.handleError('统计告警规则失败', error);
    }
  }

  async delete(id: string): Promise<boolean> {
    try {
      const result = await this.repository.delete({ id });
      return (result.affected ?? 0) > 0;
    } catch (error) {
      this.handleError('删除告警规则失败', error, { id });
    }
  }
}
