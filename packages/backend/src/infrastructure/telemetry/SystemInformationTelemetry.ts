import os from 'node:os';
import { readFile } from 'node:fs/promises';
import * as si from 'systeminformation';
import type {
  HostSnapshot,
  ProcessHandle,
  ProcessSample,
  TelemetrySource,
} from '@domain/telemetry/TelemetrySource.js';
import { ProcessUnavailableError } from '@domain/errors/MonitoringErrors.js';

type FsSize = si.Systeminformation.FsSizeData;

/**
 * 枚举结果中生成句柄所需的字段
 */
export type ListedProcess = Pick<
  si.Systeminformation.ProcessesProcessData,
  'pid' | 'name' | 'cpu' | 'mem' | 'memRss' | 'state'
>;

/**
 * 读取单个进程时访问操作系统的方式
 */
export interface ProcessInspector {
  platform: NodeJS.Platform;
  readFile(path: string): Promise<string>;
  /** 发送 0 号信号，进程不存在时抛出 ESRCH */
  signalZero(pid: number): void;
}

const nodeProcessInspector: ProcessInspector = {
  platform: process.platform,
  readFile: (path) => readFile(path, 'utf8'),
  signalZero: (pid) => {
    process.kill(pid, 0);
  },
};

interface ProcessIo {
  readBytes: number;
  writeBytes: number;
}

/**
 * 解析 /proc/<pid>/io
 * @returns 缺少 read_bytes 或 write_bytes 时为 null
 */
export function parseProcIo(text: string): ProcessIo | null {
  const fields = new Map<string, number>();
  for (const line of text.split('\n')) {
    const [key, value] = line.split(':');
    if (key && value !== undefined) {
      fields.set(key.trim(), Number(value.trim()));
    }
  }
  const readBytes = fields.get('read_bytes');
  const writeBytes = fields.get('write_bytes');
  if (readBytes === undefined || writeBytes === undefined) {
    return null;
  }
  if (!Number.isFinite(readBytes) || !Number.isFinite(writeBytes)) {
    return null;
  }
  return { readBytes, writeBytes };
}

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;
}

const GONE_CODES = new Set(['ENOENT', 'ESRCH']);
const DENIED_CODES = new Set(['EACCES', 'EPERM']);

/**
 * 在读取时确认进程仍然存在，并尽量补充磁盘 I/O
 * Linux 读取 /proc/<pid>/io，其他平台只做存活探测
 * @throws ProcessUnavailableError 进程已退出
 */
async function readProcessIo(
  pid: number,
  inspector: ProcessInspector,
): Promise<ProcessIo | null> {
  try {
    if (inspector.platform === 'linux') {
      return parseProcIo(await inspector.readFile(`/proc/${pid}/io`));
    }
    inspector.signalZero(pid);
    return null;
  } catch (error) {
    const code = errorCode(error);
    if (code !== undefined && GONE_CODES.has(code)) {
      throw new ProcessUnavailableError(pid, 'process exited');
    }
    // 其他用户的进程：存在但不可读
    if (code !== undefined && DENIED_CODES.has(code)) {
      return null;
    }
    throw error;
  }
}

/**
 * 把枚举结果包装成句柄；CPU 与内存取枚举时的值，磁盘 I/O 在读取时采样
 * @param proc 枚举到的进程
 * @param inspector 操作系统访问方式
 * @returns 进程句柄
 */
export function toProcessHandle(
  proc: ListedProcess,
  inspector: ProcessInspector = nodeProcessInspector,
): ProcessHandle {
  return {
    pid: proc.pid,
    name: proc.name,
    read: async (): Promise<ProcessSample> => {
      const io = await readProcessIo(proc.pid, inspector);
      return {
        pid: proc.pid,
        name: proc.name,
        cpuPercent: Number.isFinite(proc.cpu) ? round(proc.cpu) : null,
        // memRss 单位为 KB
        memoryRssBytes: Number.isFinite(proc.memRss) ? proc.memRss * 1024 : null,
        memoryPercent: Number.isFinite(proc.mem) ? round(proc.mem) : null,
        diskReadBytes: io?.readBytes ?? null,
        diskWriteBytes: io?.writeBytes ?? null,
        status: proc.state || null,
      };
    },
  };
}

/**
 * 基于 systeminformation 的遥测数据源
 */
export class SystemInformationTelemetry implements TelemetrySource {
  constructor(
    private readonly inspector: ProcessInspector = nodeProcessInspector,
  ) {}

  getHostname(): string {
    return os.hostname();
  }

  /**
   * 采集主机级别指标
   * @returns 主机快照
   */
  async sampleHost(): Promise<HostSnapshot> {
    const [load, cpu, mem, fsSizes, networkStats, processes] =
      await Promise.all([
        si.currentLoad(),
        si.cpu(),
        si.mem(),
        si.fsSize(),
        si.networkStats('*'),
        si.processes(),
      ]);
    const diskIo = await this.sampleDiskIo();
    const disk = pickRootFilesystem(fsSizes);

    const swapUsagePercent =
      mem.swaptotal > 0 ? (mem.swapused / mem.swaptotal) * 100 : 0;

    return {
      hostname: this.getHostname(),
      cpu: {
        usagePercent: round(load.currentLoad),
        count: cpu.cores,
        frequencyMhz: cpu.speed > 0 ? Math.round(cpu.speed * 1000) : null,
      },
      memory: {
        totalBytes: mem.total,
        availableBytes: mem.available,
        usedBytes: mem.total - mem.available,
        usagePercent:
          mem.total > 0 ? round(((mem.total - mem.available) / mem.total) * 100) : 0,
      },
      swap: {
        totalBytes: mem.swaptotal,
        usedBytes: mem.swapused,
        usagePercent: round(swapUsagePercent),
      },
      disk: {
        totalBytes: disk?.size ?? 0,
        usedBytes: disk?.used ?? 0,
        freeBytes: disk?.available ?? 0,
        usagePercent: round(disk?.use ?? 0),
      },
      diskIo,
      network: {
        bytesSent: networkStats.reduce((sum, stat) => sum + stat.tx_bytes, 0),
        bytesRecv: networkStats.reduce((sum, stat) => sum + stat.rx_bytes, 0),
        // systeminformation 不提供包计数
        packetsSent: null,
        packetsRecv: null,
      },
      uptimeSeconds: Math.floor(si.time().uptime),
      loadAverage: process.platform === 'win32' ? null : toTriple(os.loadavg()),
      processCount: processes.all,
    };
  }

  /**
   * 枚举当前进程
   * @returns 进程句柄列表
   */
  async listProcesses(): Promise<ProcessHandle[]> {
    const { list } = await si.processes();
    return list.map((proc) => toProcessHandle(proc, this.inspector));
  }

  private async sampleDiskIo(): Promise<HostSnapshot['diskIo']> {
    // 部分平台（如 Windows、容器内）返回 null
    const [counts, bytes]: [
      si.Systeminformation.DisksIoData | null,
      si.Systeminformation.FsStatsData | null,
    ] = await Promise.all([si.disksIO(), si.fsStats()]);
    if (!counts || !bytes) {
      return null;
    }
    return {
      readBytes: bytes.rx,
      writeBytes: bytes.wx,
      readCount: counts.rIO,
      writeCount: counts.wIO,
    };
  }
}

function pickRootFilesystem(fsSizes: FsSize[]): FsSize | undefined {
  return (
    fsSizes.find((entry) => entry.mount === '/') ??
    fsSizes.find((entry) => /^[A-Za-z]:/.test(entry.mount)) ??
    fsSizes[0]
  );
}

function toTriple(values: number[]): [number, number, number] {
  return [round(values[0] ?? 0), round(values[1] ?? 0), round(values[2] ?? 0)];
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}
