import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import {
  EventSubscriber,
  type DataSource,
  type EntitySubscriberInterface,
  type InsertEvent,
} from 'typeorm';
import { MetricsCollector } from '@application/services/monitoring/MetricsCollector.js';
import { FastCache } from '@infrastructure/cache/FastCache.js';
import { SystemMetric } from '@infrastructure/database/entities/SystemMetric.js';
import {
  ProcessMetricRepository,
  SystemMetricRepository,
} from '@infrastructure/database/repositories/index.js';
import {
  FakeTelemetry,
  createLoggerMock,
  createProcessHandle,
  createTestDataSource,
} from '../../utils/test-mocks.js';

/**
 * 写入内存指标时模拟数据库故障
 */
@EventSubscriber()
class FailOnMemoryMetric implements EntitySubscriberInterface<SystemMetric> {
  listenTo() {
    return SystemMetric;
  }

  afterInsert(event: InsertEvent<SystemMetric>): void {
    if (event.entity.metric_type === 'memory_usage_percent') {
      throw new Error('simulated write failure');
    }
  }
}

describe('MetricsCollector 持久化', () => {
  let dataSource: DataSource;
  let cache: FastCache;

  afterEach(async () => {
    cache.destroy();
    await dataSource.destroy();
  });

  describe('正常写入', () => {
    let collector: MetricsCollector;
    let systemMetrics: SystemMetricRepository;

    beforeEach(async () => {
      dataSource = await createTestDataSource();
      cache = new FastCache({ cleanupInterval: 0 });
      const logger = createLoggerMock();
      systemMetrics = new SystemMetricRepository(dataSource, logger);
      collector = new MetricsCollector(
        new FakeTelemetry(undefined, [
          createProcessHandle({ pid: 1, name: 'node' }),
        ]),
        systemMetrics,
        new ProcessMetricRepository(dataSource, logger),
        cache,
        logger,
      );
    });

    it('系统指标应该落库并可查询', async () => {
      const saved = await collector.collectSystemMetrics();
      const stored = await systemMetrics.query({
        hostname: 'test-host',
        limit: 1000,
        offset: 0,
      });

      expect(saved).toHaveLength(24);
      expect(stored).toHaveLength(24);
    });

    it('进程指标应该落库', async () => {
      const saved = await collector.collectProcessMetrics();

      expect(saved).toHaveLength(1);
      expect(saved[0]?.id).toMatch(/^[0-9a-f-]{36}$/);
    });
  });

  describe('写入中途失败', () => {
    it('整批回滚且不刷新缓存', async () => {
      dataSource = await createTestDataSource([FailOnMemoryMetric]);
      cache = new FastCache({ cleanupInterval: 0 });
      const logger = createLoggerMock();
      const systemMetrics = new SystemMetricRepository(dataSource, logger);
      const collector = new MetricsCollector(
        new FakeTelemetry(),
        systemMetrics,
        new ProcessMetricRepository(dataSource, logger),
        cache,
        logger,
      );

      const saved = await collector.collectSystemMetrics();

      expect(saved).toEqual([]);
      expect(
        await systemMetrics.query({ limit: 1000, offset: 0 }),
      ).toHaveLength(0);
      expect(cache.keys('latest:*')).toEqual([]);
      expect(logger.error).toHaveBeenCalledWith('采集系统指标失败', {
        error: 'simulated write failure',
      });
    });
  });
});
