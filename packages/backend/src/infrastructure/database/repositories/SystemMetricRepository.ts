import { DataSource, LessThan, MoreThanOrEqual, type FindOptionsWhere } from 'typeorm';
import type { Logger } from '@logging/logger.js';
import type {
  ISystemMetricRepository,
  MetricQuery,
  MetricSummaryRow,
  NewSystemMetric,
} from '@domain/repositories/ISystemMetricRepository.js';
import { SystemMetric } from '../entities/SystemMetric.js';
import { BaseRepository } from './BaseRepository.js';

interface RawSummaryRow {
  hostname: string;
  metric_type: string;
  avg_value: string | number;
  max_value: string | number;
  min_value: string | number;
  sample_count: string | number;
}

/**
 * SystemMetric Repository实现
 */
export class SystemMetricRepository
  extends BaseRepository<SystemMetric>
  implements ISystemMetricRepository
{
  /**
   * 创建SystemMetricRepository实例
   * @param dataSource TypeORM数据源
   * @param logger 日志记录器
   */
  constructor(dataSource: DataSource, logger: Logger) {
    super(dataSource, SystemMetric, logger);
  }

  async saveBatch(metrics: NewSystemMetric[]): Promise<SystemMetric[]> {
    if (metrics.length === 0) {
      return [];
    }
    try {
      return await this.dataSource.transaction(async (manager) => {
        const entities = metrics.map((metric) =>
          manager.create(SystemMetric, metric),
        );
        return manager.save(entities);
      });
    } catch (error) {
      this.handleError('批量写入系统指标失败', error, {
        count: metrics.length,
      });
    }
  }

  async findRecent(options: {
    metricType: string;
    since: number;
    hostname?: string;
    limit: number;
  }): Promise<SystemMetric[]> {
    const where: FindOptionsWhere<SystemMetric> = {
      metric_type: options.metricType,
      timestamp: MoreThanOrEqual(options.since),
    };
    if (options.hostname) {
      where.hostname = options.hostname;
    }

    try {
      return await this.repository.find({
        where,
        order: { timestamp: 'DESC' },
        take: options.limit,
      });
    } catch (error) {
      this.handleError('获取最新系统指标失败', error, {
        metricType: options.metricType,
      });
    }
  }

  /**
   * 按条件分页查询系统指标，按时间倒序
   * @param query 查询条件
   * @returns 系统指标数组
   */
  async query(query: MetricQuery): Promise<SystemMetric[]> {
    try {
      const qb = this.repository.createQueryBuilder('metric');
      if (query.metricType) {
        qb.andWhere('metric.metric_type = :metricType', {
          metricType: query.metricType,
        });
      }
      if (query.hostname) {
        qb.andWhere('metric.hostname = :hostname', {
          hostname: query.hostname,
        });
      }
      if (query.startTime !== undefined) {
        qb.andWhere('metric.timestamp >= :startTime', {
          startTime: query.startTime,
        });
      }
      if (query.endTime !== undefined) {
        qb.andWhere('metric.timestamp <= :endTime', {
          endTime: query.endTime,
        });
      }
      return await qb
        .orderBy('metric.timestamp', 'DESC')
        .skip(query.offset)
        .take(query.limit)
        .getMany();
    } catch (error) {
      this.handleError('查询系统指标失败', error);
    }
  }

  /**
   * 按主机和指标类型汇总 since 之后的样本
   * @param since 起始时间（毫秒）
   * @param hostname 可选主机名
   * @returns 汇总行
   */
  async summarize(since: number, hostname?: string): Promise<MetricSummaryRow[]> {
    try {
      const qb = this.repository
        .createQueryBuilder('metric')
        .select('metric.hostname', 'hostname')
        .addSelect('metric.metric_type', 'metric_type')
        .addSelect('AVG(metric.metric_value)', 'avg_value')
        .addSelect('MAX(metric.metric_value)', 'max_value')
        .addSelect('MIN(metric.metric_value)', 'min_value')
        .addSelect('COUNT(metric.id)', 'sample_count')
        .where('metric.timestamp >= :since', { since });
      if (hostname) {
        qb.andWhere('metric.hostname = :hostname', { hostname });
      }
      const rows = await qb
        .groupBy('metric.hostname')
        .addGroupBy('metric.metric_type')
        .orderBy('metric.hostname', 'ASC')
        .addOrderBy('metric.metric_type', 'ASC')
        .getRawMany<RawSummaryRow>();

      // PostgreSQL 聚合结果为字符串
      return rows.map((row) => ({
        hostname: row.hostname,
        metric_type: row.metric_type,
        avg_value: Number(row.avg_value),
        max_value: Number(row.max_value),
        min_value: Number(row.min_value),
        sample_count: Number(row.sample_count),
      }));
    } catch (error) {
      this.handleError('汇总系统指标失败', error, { since, hostname });
    }
  }

  async deleteOlderThan(cutoff: number): Promise<number> {
    try {
      return await this.deleteWhereInTransaction({
        timestamp: LessThan(cutoff),
      });
    } catch (error) {
      this.handleError('清理过期系统指标失败', error, { cutoff });
    }
  }
}
