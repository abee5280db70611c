import { DataSource, LessThan, MoreThanOrEqual, type FindOptionsWhere } from 'typeorm';
import type { Logger } from '@logging/logger.js';
import type {
  IProcessMetricRepository,
  NewProcessMetric,
} from '@domain/repositories/IProcessMetricRepository.js';
import type { MetricQuery } from '@domain/repositories/ISystemMetricRepository.js';
import { ProcessMetric } from '../entities/ProcessMetric.js';
import { BaseRepository } from './BaseRepository.js';

/**
 * ProcessMetric Repository实现
 */
export class ProcessMetricRepository
  extends BaseRepository<ProcessMetric>
  implements IProcessMetricRepository
{
  constructor(dataSource: DataSource, logger: Logger) {
    super(dataSource, ProcessMetric, logger);
  }

  async saveBatch(metrics: NewProcessMetric[]): Promise<ProcessMetric[]> {
    if (metrics.length === 0) {
      return [];
    }
    try {
      return await this.dataSource.transaction(async (manager) => {
        const entities = metrics.map((metric) =>
          manager.create(ProcessMetric, metric),
        );
        return manager.save(entities);
      });
    } catch (error) {
      this.handleError('批量写入进程指标失败', error, {
        count: metrics.length,
      });
    }
  }

  async findRecent(options: {
    processName: string;
    since: number;
    hostname?: string;
    limit: number;
  }): Promise<ProcessMetric[]> {
    const where: FindOptionsWhere<ProcessMetric> = {
      process_name: options.processName,
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
      this.handleError('获取最新进程指标失败', error, {
        processName: options.processName,
      });
    }
  }

  async query(
    query: MetricQuery & { processName?: string },
  ): Promise<ProcessMetric[]> {
    try {
      const qb = this.repository.createQueryBuilder('metric');
      if (query.processName) {
        qb.andWhere('metric.process_name = :processName', {
          processName: query.processName,
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
      this.handleError('查询进程指标失败', error);
    }
  }

  async deleteOlderThan(cutoff: number): Promise<number> {
    try {
      return await this.deleteWhereInTransaction({
        timestamp: LessThan(cutoff),
      });
    } catch (error) {
      this.handleError('清理过期进程指标失败', error, { cutoff });
    }
  }
}
