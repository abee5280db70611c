/**
 * 主机遥测数据源接口
 * @description 采集服务只依赖此接口，具体实现可以是 systeminformation 或测试替身
 */

/**
 * 一次主机采样的结果，字节为单位
 */
export interface HostSnapshot {
  hostname: string;
  cpu: {
    usagePercent: number;
    count: number;
    /** 未知时为 null */
    frequencyMhz: number | null;
  };
  memory: {
    totalBytes: number;
    availableBytes: number;
    usedBytes: number;
    usagePercent: number;
  };
  swap: {
    totalBytes: number;
    usedBytes: number;
    usagePercent: number;
  };
  disk: {
    totalBytes: number;
    usedBytes: number;
    freeBytes: number;
    usagePercent: number;
  };
  /** 平台不支持时为 null */
  diskIo: {
    readBytes: number;
    writeBytes: number;
    readCount: number;
    writeCount: number;
  } | null;
  network: {
    bytesSent: number;
    bytesRecv: number;
    packetsSent: number | null;
    packetsRecv: number | null;
  };
  uptimeSeconds: number;
  /** 1/5/15 分钟平均负载，平台不支持时为 null */
  loadAverage: [number, number, number] | null;
  processCount: number;
}

/**
 * 单个进程的采样
 */
export interface ProcessSample {
  pid: number;
  name: string;
  cpuPercent: number | null;
  memoryRssBytes: number | null;
  memoryPercent: number | null;
  diskReadBytes: number | null;
  diskWriteBytes: number | null;
  status: string | null;
}

/**
 * 进程句柄，读取时进程可能已退出或拒绝访问
 */
export interface ProcessHandle {
  pid: number;
  name: string;
  /**
   * 读取进程指标
   * @throws ProcessUnavailableError 进程已消失或无权访问
   */
  read(): Promise<ProcessSample>;
}

export interface TelemetrySource {
  /**
   * 本机主机名，主机指标与进程指标共用
   */
  getHostname(): string;

  /**
   * 采集主机级别指标
   */
  sampleHost(): Promise<HostSnapshot>;

  /**
   * 枚举当前存活的进程
   */
  listProcesses(): Promise<ProcessHandle[]>;
}
