import { DataSource, LessThan, type FindOptionsWhere } from 'typeorm';
import type { Logger } from '@logging/logger.js';
import type {
  AlertCounts,
  AlertListQuery,
  IAlertRepository,
  NewAlert,
} from '@domain/repositories/IAlertRepository.js';
import {
  ALERT_SEVERITIES,
  ALERT_STATUSES,
  type AlertSeverity,
  type AlertStatus,
} from '@domain/entities/types.js';
import { Alert } from '../entities/Alert.js';
import { BaseRepository } from './BaseRepository.js';

interface RawCountRow {
  key: string;
  count: string | number;
}

/**
 * Alert Repository实现
 */
export class AlertRepository
  extends BaseRepository<Alert>
  implements IAlertRepository
{
  constructor(dataSource: DataSource, logger: Logger) {
    super(dataSource, Alert, logger);
  }

  async create(alert: NewAlert): Promise<Alert> {
    return super.create({ ...alert, status: 'active' });
  }

  /**
   * 分页获取告警，按创建时间倒序
   * @param query 查询条件
   * @returns 告警数组
   */
  async list(query: AlertListQuery): Promise<Alert[]> {
    const where: FindOptionsWhere<Alert> = {};
    if (query.status) {
      where.status = query.status;
    }
    if (query.severity) {
      where.severity = query.severity;
    }

    try {
      return await this.repository.find({
        where,
        order: { created_at: 'DESC' },
        skip: query.skip,
        take: query.limit,
      });
    } catch (error) {
      this.handleError('获取告警列表失败', error);
    }
  }

  async existsForRuleSince(ruleId: string, since: number): Promise<boolean> {
    try {
      const count = await this.repository
        .createQueryBuilder('alert')
        .where('alert.rule_id = :ruleId', { ruleId })
        .andWhere('alert.created_at >= :since', { since })
        .getCount();
      return count > 0;
    } catch (error) {
      this.handleError('查询规则冷却状态失败', error, { ruleId });
    }
  }

  /**
   * 按状态与级别分组计数
   * @returns 分组计数
   */
  async countGrouped(): Promise<AlertCounts> {
    try {
      const [total, statusRows, severityRows] = await Promise.all([
        this.repository.count(),
        this.groupCount('status'),
        this.groupCount('severity'),
      ]);

      const byStatus: Partial<Record<AlertStatus, number>> = {};
      for (const row of statusRows) {
        const status = ALERT_STATUSES.find((value) => value === row.key);
        if (status) {
          byStatus[status] = Number(row.count);
        }
      }

      const bySeverity: Partial<Record<AlertSeverity, number>> = {};
      for (const row of severityRows) {
        const severity = ALERT_SEVERITIES.find((value) => value === row.key);
        if (severity) {
          bySeverity[severity] = Number(row.count);
        }
      }

      return { total, byStatus, bySeverity };
    } catch (error) {
      this.handleError('统计告警失败', error);
    }
  }

  async deleteResolvedBefore(cutoff: number): Promise<number> {
    try {
      return await this.deleteWhereInTransaction({
        status: 'resolved',
        updated_at: LessThan(cutoff),
      });
    } catch (error) {
      this.handleError('清理已解决告警失败', error, { cutoff });
    }
  }

  private groupCount(column: 'status' | 'severity'): Promise<RawCountRow[]> {
    return this.repository
      .createQueryBuilder('alert')
      .select(`alert.${column}`, 'key')
      .addSelect('COUNT(alert.id)', 'count')
      .groupBy(`alert.${column}`)
      .getRawMany<RawCountRow>();
  }
}
