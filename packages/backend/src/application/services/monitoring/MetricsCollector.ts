import type { Logger } from '@logging/logger.js';
import type { SystemMetric } from '@infrastructure/database/entities/SystemMetric.js';
import type { ProcessMetric } from '@infrastructure/database/entities/ProcessMetric.js';
import type {
  ISystemMetricRepository,
  NewSystemMetric,
} from '@domain/repositories/ISystemMetricRepository.js';
import type {
  IProcessMetricRepository,
  NewProcessMetric,
} from '@domain/repositories/IProcessMetricRepository.js';
import {
  CacheKeys,
  CacheTTL,
  type IFastCache,
} from '@domain/repositories/IFastCache.js';
import type {
  HostSnapshot,
  ProcessHandle,
  TelemetrySource,
} from '@domain/telemetry/TelemetrySource.js';
import { ProcessUnavailableError } from '@domain/errors/MonitoringErrors.js';
import type {
  LatestMetricEntry,
  SystemOverview,
} from '@domain/entities/types.js';

const MB = 1024 * 1024;
const GB = 1024 * 1024 * 1024;

type MetricSample = [metricType: string, value: number, unit: string];

/**
 * 将主机快照展开为指标样本
 * 平台不支持的指标不会出现在结果中
 * @param snapshot 主机快照
 * @returns [指标类型, 值, 单位] 列表
 */
export function flattenHostSnapshot(snapshot: HostSnapshot): MetricSample[] {
  const samples: MetricSample[] = [
    ['cpu_usage_percent', snapshot.cpu.usagePercent, '%'],
    ['cpu_count', snapshot.cpu.count, 'count'],
  ];
  if (snapshot.cpu.frequencyMhz !== null) {
    samples.push(['cpu_frequency_mhz', snapshot.cpu.frequencyMhz, 'MHz']);
  }

  samples.push(
    ['memory_total_mb', toUnit(snapshot.memory.totalBytes, MB), 'MB'],
    ['memory_available_mb', toUnit(snapshot.memory.availableBytes, MB), 'MB'],
    ['memory_used_mb', toUnit(snapshot.memory.usedBytes, MB), 'MB'],
    ['memory_usage_percent', snapshot.memory.usagePercent, '%'],
    ['swap_total_mb', toUnit(snapshot.swap.totalBytes, MB), 'MB'],
    ['swap_used_mb', toUnit(snapshot.swap.usedBytes, MB), 'MB'],
    ['swap_usage_percent', snapshot.swap.usagePercent, '%'],
    ['disk_total_gb', toUnit(snapshot.disk.totalBytes, GB), 'GB'],
    ['disk_used_gb', toUnit(snapshot.disk.usedBytes, GB), 'GB'],
    ['disk_free_gb', toUnit(snapshot.disk.freeBytes, GB), 'GB'],
    ['disk_usage_percent', snapshot.disk.usagePercent, '%'],
  );

  if (snapshot.diskIo) {
    samples.push(
      ['disk_read_bytes', snapshot.diskIo.readBytes, 'bytes'],
      ['disk_write_bytes', snapshot.diskIo.writeBytes, 'bytes'],
      ['disk_read_count', snapshot.diskIo.readCount, 'count'],
      ['disk_write_count', snapshot.diskIo.writeCount, 'count'],
    );
  }

  samples.push(
    ['network_bytes_sent', snapshot.network.bytesSent, 'bytes'],
    ['network_bytes_recv', snapshot.network.bytesRecv, 'bytes'],
  );
  if (snapshot.network.packetsSent !== null) {
    samples.push(['network_packets_sent', snapshot.network.packetsSent, 'packets']);
  }
  if (snapshot.network.packetsRecv !== null) {
    samples.push(['network_packets_recv', snapshot.network.packetsRecv, 'packets']);
  }

  samples.push(['uptime_seconds', snapshot.uptimeSeconds, 'seconds']);

  if (snapshot.loadAverage) {
    const [one, five, fifteen] = snapshot.loadAverage;
    samples.push(
      ['load_avg_1min', one, 'load'],
      ['load_avg_5min', five, 'load'],
      ['load_avg_15min', fifteen, 'load'],
    );
  }
  return samples;
}

function toUnit(bytes: number, unit: number): number {
  return Math.round((bytes / unit) * 100) / 100;
}

/**
 * 指标采集服务
 * 先在事务中落库，提交成功后再刷新缓存
 */
export class MetricsCollector {
  private readonly now: () => number;

  constructor(
    private readonly telemetry: TelemetrySource,
    private readonly systemMetricRepository: ISystemMetricRepository,
    private readonly processMetricRepository: IProcessMetricRepository,
    private readonly cache: IFastCache,
    private readonly logger: Logger,
    now?: () => number,
  ) {
    this.now = now ?? Date.now;
  }

  /**
   * 采集主机指标
   * 采样或写入失败时不写缓存，返回空数组
   * @returns 已写入的指标
   */
  async collectSystemMetrics(): Promise<SystemMetric[]> {
    try {
      const snapshot = await this.telemetry.sampleHost();
      const timestamp = this.now();
      const rows: NewSystemMetric[] = flattenHostSnapshot(snapshot).map(
        ([metricType, value, unit]) => ({
          hostname: snapshot.hostname,
          metric_type: metricType,
          metric_value: value,
          metric_unit: unit,
          tags: {},
          timestamp,
        }),
      );

      const saved = await this.systemMetricRepository.saveBatch(rows);

      for (const metric of saved) {
        const entry: LatestMetricEntry = {
          value: metric.metric_value,
          unit: metric.metric_unit,
          timestamp: new Date(metric.timestamp).toISOString(),
          tags: metric.tags,
        };
        this.cache.set(
          CacheKeys.latestMetric(metric.hostname, metric.metric_type),
          entry,
          CacheTTL.LATEST_METRIC,
        );
      }

      this.logger.debug('系统指标采集完成', {
        hostname: snapshot.hostname,
        count: saved.length,
      });
      return saved;
    } catch (error) {
      this.logger.error('采集系统指标失败', {
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }

  /**
   * 采集进程指标
   * @param targetNames 进程名白名单，任一项是进程名的子串（不区分大小写）即保留
   * @returns 已写入的进程指标
   */
  async collectProcessMetrics(targetNames?: string[]): Promise<ProcessMetric[]> {
    try {
      const hostname = this.telemetry.getHostname();
      const timestamp = this.now();
      const handles = filterProcesses(
        await this.telemetry.listProcesses(),
        targetNames,
      );

      const rows: NewProcessMetric[] = [];
      for (const handle of handles) {
        try {
          const sample = await handle.read();
          rows.push({
            process_id: sample.pid,
            process_name: sample.name,
            hostname,
            cpu_percent: sample.cpuPercent,
            memory_mb:
              sample.memoryRssBytes === null
                ? null
                : toUnit(sample.memoryRssBytes, MB),
            memory_percent: sample.memoryPercent,
            disk_read_bytes: sample.diskReadBytes,
            disk_write_bytes: sample.diskWriteBytes,
            network_sent_bytes: null,
            network_recv_bytes: null,
            status: sample.status,
            timestamp,
          });
        } catch (error) {
          // 进程已退出或无权访问
          if (error instanceof ProcessUnavailableError) {
            continue;
          }
          throw error;
        }
      }

      const saved = await this.processMetricRepository.saveBatch(rows);
      this.logger.debug('进程指标采集完成', { hostname, count: saved.length });
      return saved;
    } catch (error) {
      this.logger.error('采集进程指标失败', {
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }

  /**
   * 获取实时主机概览并缓存
   * @returns 主机概览
   */
  async getSystemOverview(): Promise<SystemOverview> {
    const snapshot = await this.telemetry.sampleHost();
    const overview: SystemOverview = {
      hostname: snapshot.hostname,
      cpu_usage: snapshot.cpu.usagePercent,
      memory_usage: snapshot.memory.usagePercent,
      disk_usage: snapshot.disk.usagePercent,
      network_io: {
        bytes_sent: snapshot.network.bytesSent,
        bytes_recv: snapshot.network.bytesRecv,
        packets_sent: snapshot.network.packetsSent,
        packets_recv: snapshot.network.packetsRecv,
      },
      process_count: snapshot.processCount,
      uptime_seconds: snapshot.uptimeSeconds,
      last_updated: new Date(this.now()).toISOString(),
    };

    this.cache.set(
      CacheKeys.systemHealth(snapshot.hostname),
      overview,
      CacheTTL.SYSTEM_HEALTH,
    );
    return overview;
  }
}

function filterProcesses(
  handles: ProcessHandle[],
  targetNames?: string[],
): ProcessHandle[] {
  if (!targetNames || targetNames.length === 0) {
    return handles;
  }
  const needles = targetNames.map((name) => name.toLowerCase());
  return handles.filter((handle) => {
    const name = handle.name.toLowerCase();
    return needles.some((needle) => name.includes(needle));
  });
}
