import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import type { DataSource } from 'typeorm';
import {
  AlertRepository,
  AlertRuleRepository,
  ProcessMetricRepository,
  SystemMetricRepository,
} from '@infrastructure/database/repositories/index.js';
import { Alert } from '@infrastructure/database/entities/Alert.js';
import type { NewSystemMetric } from '@domain/repositories/ISystemMetricRepository.js';
import type { NewProcessMetric } from '@domain/repositories/IProcessMetricRepository.js';
import type { NewAlert } from '@domain/repositories/IAlertRepository.js';
import type { NewAlertRule } from '@domain/repositories/IAlertRuleRepository.js';
import { DuplicateRuleNameError } from '@domain/errors/MonitoringErrors.js';
import { createLoggerMock, createTestDataSource } from '../../utils/test-mocks.js';

const T0 = Date.parse('2024-01-15T12:00:00.000Z');
const MINUTE = 60_000;

function systemMetric(overrides: Partial<NewSystemMetric>): NewSystemMetric {
  return {
    hostname: 'host-a',
    metric_type: 'cpu_usage_percent',
    metric_value: 10,
    metric_unit: '%',
    tags: {},
    timestamp: T0,
    ...overrides,
  };
}

function processMetric(overrides: Partial<NewProcessMetric>): NewProcessMetric {
  return {
    process_id: 100,
    process_name: 'node',
    hostname: 'host-a',
    cpu_percent: 1,
    memory_mb: 64,
    memory_percent: 0.5,
    disk_read_bytes: null,
    disk_write_bytes: null,
    network_sent_bytes: null,
    network_recv_bytes: null,
    status: 'running',
    timestamp: T0,
    ...overrides,
  };
}

function alertRule(overrides: Partial<NewAlertRule>): NewAlertRule {
  return {
    name: 'High CPU Usage',
    description: null,
    rule_type: 'system_metric',
    condition: { metric_type: 'cpu_usage_percent', operator: '>', threshold: 80 },
    severity: 'high',
    notification_channels: [],
    cooldown_minutes: 15,
    is_active: true,
    ...overrides,
  };
}

function newAlert(overrides: Partial<NewAlert>): NewAlert {
  return {
    alert_type: 'system_metric',
    severity: 'high',
    source: 'system:host-a',
    title: 'CPU Alert',
    description: null,
    alert_metadata: {},
    rule_id: null,
    created_at: T0,
    ...overrides,
  };
}

describe('Repositories', () => {
  let dataSource: DataSource;
  let logger: ReturnType<typeof createLoggerMock>;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    logger = createLoggerMock();
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  describe('SystemMetricRepository', () => {
    let repository: SystemMetricRepository;

    beforeEach(() => {
      repository = new SystemMetricRepository(dataSource, logger);
    });

    it('批量写入后应该能读回完整字段', async () => {
      const [saved] = await repository.saveBatch([
        systemMetric({ metric_value: 42.5, tags: { zone: 'a' } }),
      ]);

      expect(saved?.id).toMatch(/^[0-9a-f-]{36}$/);
      const [loaded] = await repository.query({ limit: 10, offset: 0 });
      expect(loaded).toMatchObject({
        hostname: 'host-a',
        metric_type: 'cpu_usage_percent',
        metric_value: 42.5,
        metric_unit: '%',
        tags: { zone: 'a' },
        timestamp: T0,
      });
    });

    it('空批次应该直接返回', async () => {
      await expect(repository.saveBatch([])).resolves.toEqual([]);
    });

    it('findRecent 应该只返回窗口内样本并按时间倒序', async () => {
      await repository.saveBatch([
        systemMetric({ metric_value: 1, timestamp: T0 - 10 * MINUTE }),
        systemMetric({ metric_value: 2, timestamp: T0 - 4 * MINUTE }),
        systemMetric({ metric_value: 3, timestamp: T0 - MINUTE }),
        systemMetric({ metric_value: 4, timestamp: T0, hostname: 'host-b' }),
        systemMetric({
          metric_value: 5,
          timestamp: T0,
          metric_type: 'memory_usage_percent',
        }),
      ]);

      const recent = await repository.findRecent({
        metricType: 'cpu_usage_percent',
        since: T0 - 5 * MINUTE,
        limit: 10,
      });
      const onHostA = await repository.findRecent({
        metricType: 'cpu_usage_percent',
        since: T0 - 5 * MINUTE,
        hostname: 'host-a',
        limit: 10,
      });

      expect(recent.map((metric) => metric.metric_value)).toEqual([4, 3, 2]);
      expect(onHostA.map((metric) => metric.metric_value)).toEqual([3, 2]);
    });

    it('query 应该支持过滤与分页', async () => {
      await repository.saveBatch(
        [0, 1, 2, 3, 4].map((i) =>
          systemMetric({ metric_value: i, timestamp: T0 + i * MINUTE }),
        ),
      );

      const page = await repository.query({
        metricType: 'cpu_usage_percent',
        startTime: T0 + MINUTE,
        endTime: T0 + 4 * MINUTE,
        limit: 2,
        offset: 1,
      });

      expect(page.map((metric) => metric.metric_value)).toEqual([3, 2]);
    });

    it('summarize 应该按主机和指标类型聚合', async () => {
      await repository.saveBatch([
        systemMetric({ metric_value: 10, timestamp: T0 - MINUTE }),
        systemMetric({ metric_value: 20, timestamp: T0 }),
        systemMetric({ metric_value: 90, timestamp: T0 - 120 * MINUTE }),
        systemMetric({ metric_value: 50, hostname: 'host-b' }),
      ]);

      const rows = await repository.summarize(T0 - 60 * MINUTE);

      expect(rows).toEqual([
        {
          hostname: 'host-a',
          metric_type: 'cpu_usage_percent',
          avg_value: 15,
          max_value: 20,
          min_value: 10,
          sample_count: 2,
        },
        {
          hostname: 'host-b',
          metric_type: 'cpu_usage_percent',
          avg_value: 50,
          max_value: 50,
          min_value: 50,
          sample_count: 1,
        },
      ]);
    });

    it('deleteOlderThan 应该只删除早于截止时间的样本', async () => {
      await repository.saveBatch([
        systemMetric({ timestamp: T0 - 2 * MINUTE }),
        systemMetric({ timestamp: T0 - MINUTE }),
        systemMetric({ timestamp: T0 }),
      ]);

      const deleted = await repository.deleteOlderThan(T0 - MINUTE);

      expect(deleted).toBe(1);
      expect(await repository.query({ limit: 10, offset: 0 })).toHaveLength(2);
    });
  });

  describe('ProcessMetricRepository', () => {
    let repository: ProcessMetricRepository;

    beforeEach(() => {
      repository = new ProcessMetricRepository(dataSource, logger);
    });

    it('findRecent 应该按进程名与窗口过滤', async () => {
      await repository.saveBatch([
        processMetric({ cpu_percent: 5, timestamp: T0 - 10 * MINUTE }),
        processMetric({ cpu_percent: 6, timestamp: T0 - MINUTE }),
        processMetric({ process_name: 'nginx', cpu_percent: 7 }),
      ]);

      const recent = await repository.findRecent({
        processName: 'node',
        since: T0 - 5 * MINUTE,
        limit: 10,
      });

      expect(recent.map((metric) => metric.cpu_percent)).toEqual([6]);
    });

    it('query 应该支持按进程名过滤并保留空值', async () => {
      await repository.saveBatch([
        processMetric({ process_name: 'nginx', memory_mb: null }),
        processMetric({ process_name: 'node' }),
      ]);

      const rows = await repository.query({
        processName: 'nginx',
        limit: 10,
        offset: 0,
      });

      expect(rows).toHaveLength(1);
      expect(rows[0]?.memory_mb).toBeNull();
      expect(rows[0]?.disk_read_bytes).toBeNull();
    });
  });

  describe('AlertRuleRepository', () => {
    let repository: AlertRuleRepository;

    beforeEach(() => {
      repository = new AlertRuleRepository(dataSource, logger);
    });

    it('findActive 应该只返回启用的规则并按名称排序', async () => {
      await repository.create(alertRule({ name: 'Zeta' }));
      await repository.create(alertRule({ name: 'Alpha' }));
      await repository.create(alertRule({ name: 'Disabled', is_active: false }));

      const active = await repository.findActive();

      expect(active.map((rule) => rule.name)).toEqual(['Alpha', 'Zeta']);
    });

    it('条件与通知渠道应该按结构保存', async () => {
      const created = await repository.create(
        alertRule({ notification_channels: ['email', 'slack'] }),
      );

      const loaded = await repository.findByName('High CPU Usage');

      expect(loaded?.id).toBe(created.id);
      expect(loaded?.condition).toEqual({
        metric_type: 'cpu_usage_percent',
        operator: '>',
        threshold: 80,
      });
      expect(loaded?.notification_channels).toEqual(['email', 'slack']);
    });

    it('规则名称应该唯一', async () => {
      await repository.create(alertRule({}));

      await expect(repository.create(alertRule({}))).rejects.toBeInstanceOf(
        DuplicateRuleNameError,
      );
      expect(logger.error).toHaveBeenCalledWith(
        '创建实体失败',
        expect.objectContaining({ error: expect.stringContaining('UNIQUE') }),
      );
    });

    it('改名与已有规则冲突时抛出 DuplicateRuleNameError', async () => {
      await repository.create(alertRule({}));
      const other = await repository.create(alertRule({ name: 'Other' }));
      other.name = 'High CPU Usage';

      await expect(repository.save(other)).rejects.toMatchObject({
        name: 'DuplicateRuleNameError',
        ruleName: 'High CPU Usage',
      });
    });

    it('删除规则应该把关联告警的 rule_id 置空', async () => {
      const rule = await repository.create(alertRule({}));
      const alerts = new AlertRepository(dataSource, logger);
      const alert = await alerts.create(newAlert({ rule_id: rule.id }));

      await expect(repository.delete(rule.id)).resolves.toBe(true);
      await expect(repository.delete(rule.id)).resolves.toBe(false);

      const reloaded = await alerts.findById(alert.id);
      expect(reloaded?.rule_id).toBeNull();
    });
  });

  describe('AlertRepository', () => {
    let repository: AlertRepository;
    let ruleId: string;

    beforeEach(async () => {
      repository = new AlertRepository(dataSource, logger);
      const rule = await new AlertRuleRepository(dataSource, logger).create(
        alertRule({}),
      );
      ruleId = rule.id;
    });

    it('新告警应该处于 active 状态', async () => {
      const alert = await repository.create(newAlert({ alert_metadata: { a: 1 } }));

      expect(alert.status).toBe('active');
      expect(alert.created_at).toBe(T0);
      expect(alert.updated_at).toBe(T0);
      expect(alert.acknowledged_at).toBeNull();
      expect((await repository.findById(alert.id))?.alert_metadata).toEqual({ a: 1 });
    });

    it('existsForRuleSince 应该只统计该规则在时间点之后的告警', async () => {
      await repository.create(newAlert({ rule_id: ruleId, created_at: T0 }));

      await expect(repository.existsForRuleSince(ruleId, T0)).resolves.toBe(true);
      await expect(repository.existsForRuleSince(ruleId, T0 + 1)).resolves.toBe(false);
    });

    it('list 应该按创建时间倒序并支持过滤', async () => {
      await repository.create(newAlert({ title: 'first', created_at: T0 }));
      await repository.create(
        newAlert({ title: 'second', severity: 'critical', created_at: T0 + MINUTE }),
      );
      await repository.create(newAlert({ title: 'third', created_at: T0 + 2 * MINUTE }));

      const all = await repository.list({ skip: 0, limit: 10 });
      const critical = await repository.list({
        skip: 0,
        limit: 10,
        severity: 'critical',
      });
      const paged = await repository.list({ skip: 1, limit: 1 });

      expect(all.map((alert) => alert.title)).toEqual(['third', 'second', 'first']);
      expect(critical.map((alert) => alert.title)).toEqual(['second']);
      expect(paged.map((alert) => alert.title)).toEqual(['second']);
    });

    it('countGrouped 应该按状态和级别计数', async () => {
      await repository.create(newAlert({ severity: 'critical' }));
      await repository.create(newAlert({ severity: 'high' }));
      const acknowledged = await repository.create(newAlert({ severity: 'high' }));
      acknowledged.status = 'acknowledged';
      await repository.save(acknowledged);

      const counts = await repository.countGrouped();

      expect(counts).toEqual({
        total: 3,
        byStatus: { active: 2, acknowledged: 1 },
        bySeverity: { critical: 1, high: 2 },
      });
    });

    it('deleteResolvedBefore 应该只删除过期的已解决告警', async () => {
      const raw = dataSource.getRepository(Alert);
      const oldResolved = raw.create({
        ...newAlert({ title: 'old resolved' }),
        status: 'resolved',
        updated_at: T0 - 100 * 24 * 60 * MINUTE,
      });
      const recentResolved = raw.create({
        ...newAlert({ title: 'recent resolved' }),
        status: 'resolved',
        updated_at: T0,
      });
      const oldActive = raw.create({
        ...newAlert({ title: 'old active' }),
        status: 'active',
        updated_at: T0 - 100 * 24 * 60 * MINUTE,
      });
      await raw.save([oldResolved, recentResolved, oldActive]);

      const deleted = await repository.deleteResolvedBefore(
        T0 - 90 * 24 * 60 * MINUTE,
      );

      expect(deleted).toBe(1);
      const remaining = await repository.list({ skip: 0, limit: 10 });
      expect(remaining.map((alert) => alert.title).sort()).toEqual([
        'old active',
        'recent resolved',
      ]);
    });
  });
});
