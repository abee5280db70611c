import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import type { DataSource } from 'typeorm';
import {
  ALERT_CHECK_INTERVAL_MS,
  CLEANUP_INTERVAL_MS,
  createMonitoringTasks,
  type MonitoringTaskDeps,
} from '@infrastructure/scheduling/monitoringTasks.js';
import { initializeServices } from '@infrastructure/di/services.js';
import { validateConfig, type AppConfig } from '@config/config.js';
import { FastCache } from '@infrastructure/cache/FastCache.js';
import { RetentionService } from '@application/services/monitoring/RetentionService.js';
import {
  AlertRepository,
  ProcessMetricRepository,
  SystemMetricRepository,
} from '@infrastructure/database/repositories/index.js';
import type { PeriodicTask } from '@infrastructure/scheduling/TaskManager.js';
import {
  FakeProbeClient,
  FakeTelemetry,
  createLoggerMock,
  createTestDataSource,
} from '../../utils/test-mocks.js';

function taskNamed(tasks: PeriodicTask[], name: string): PeriodicTask {
  const task = tasks.find((candidate) => candidate.name === name);
  if (!task) {
    throw new Error(`missing task ${name}`);
  }
  return task;
}

describe('createMonitoringTasks', () => {
  let dataSource: DataSource;
  let cache: FastCache;
  let config: AppConfig;
  let deps: MonitoringTaskDeps;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    cache = new FastCache({ cleanupInterval: 0 });
    const logger = createLoggerMock();
    config = validateConfig({
      METRICS_COLLECTION_INTERVAL: '15',
      HEALTH_CHECK_INTERVAL: '45',
      MONITORED_PROCESSES: 'node,nginx',
      SERVICE_ENDPOINTS: '{}',
    });
    const services = initializeServices(
      {
        dataSource,
        cache,
        probeClient: new FakeProbeClient({}),
        telemetry: new FakeTelemetry(),
      },
      config,
      logger,
    );
    deps = {
      metricsCollector: services.metricsCollector,
      healthProber: services.healthProber,
      alertRuleEngine: services.alertRuleEngine,
      retentionService: new RetentionService(
        new SystemMetricRepository(dataSource, logger),
        new ProcessMetricRepository(dataSource, logger),
        new AlertRepository(dataSource, logger),
        logger,
      ),
    };
  });

  afterEach(async () => {
    cache.destroy();
    await dataSource.destroy();
  });

  it('应该按配置生成四个任务的间隔和退避时间', () => {
    const tasks = createMonitoringTasks(deps, config);

    expect(
      tasks.map((task) => [task.name, task.intervalMs, task.backoffMs]),
    ).toEqual([
      ['metrics_collection', 15_000, 30_000],
      ['health_check', 45_000, 30_000],
      ['alert_check', ALERT_CHECK_INTERVAL_MS, 30_000],
      ['cleanup', CLEANUP_INTERVAL_MS, 300_000],
    ]);
    expect(ALERT_CHECK_INTERVAL_MS).toBe(60_000);
    expect(CLEANUP_INTERVAL_MS).toBe(3_600_000);
  });

  it('采集任务应该依次采集系统指标、关注的进程和主机概览', async () => {
    const collectSystem = jest.spyOn(deps.metricsCollector, 'collectSystemMetrics');
    const collectProcesses = jest.spyOn(deps.metricsCollector, 'collectProcessMetrics');
    const overview = jest.spyOn(deps.metricsCollector, 'getSystemOverview');

    await taskNamed(createMonitoringTasks(deps, config), 'metrics_collection').run(
      new AbortController().signal,
    );

    expect(collectSystem).toHaveBeenCalledTimes(1);
    expect(collectProcesses).toHaveBeenCalledWith(['node', 'nginx']);
    expect(overview).toHaveBeenCalledTimes(1);
    expect(cache.has('health:test-host')).toBe(true);
  });

  it('收到中止信号后采集任务应该在步骤之间结束', async () => {
    const controller = new AbortController();
    jest
      .spyOn(deps.metricsCollector, 'collectSystemMetrics')
      .mockImplementation(async () => {
        controller.abort();
        return [];
      });
    const collectProcesses = jest.spyOn(deps.metricsCollector, 'collectProcessMetrics');

    await taskNamed(createMonitoringTasks(deps, config), 'metrics_collection').run(
      controller.signal,
    );

    expect(collectProcesses).not.toHaveBeenCalled();
  });

  it('其余任务应该调用对应的服务', async () => {
    const health = jest.spyOn(deps.healthProber, 'checkServiceHealth');
    const alerts = jest.spyOn(deps.alertRuleEngine, 'checkSystemAlerts');
    const cleanup = jest.spyOn(deps.retentionService, 'cleanup');
    const tasks = createMonitoringTasks(deps, config);
    const signal = new AbortController().signal;

    await taskNamed(tasks, 'health_check').run(signal);
    await taskNamed(tasks, 'alert_check').run(signal);
    await taskNamed(tasks, 'cleanup').run(signal);

    expect(health).toHaveBeenCalledTimes(1);
    expect(alerts).toHaveBeenCalledWith();
    expect(cleanup).toHaveBeenCalledTimes(1);
  });
});
