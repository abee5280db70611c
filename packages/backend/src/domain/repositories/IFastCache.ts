/**
 * 快速缓存接口
 * @description 带过期时间的键值存储，支持按模式枚举键和频道发布订阅。
 * 缓存内容可随时丢失，只影响读取的新鲜度，不影响正确性
 */
export interface IFastCache {
  /**
   * 读取缓存值，不存在或已过期时返回 null
   */
  get<T>(key: string): T | null;

  /**
   * 写入缓存值（后写覆盖先写）
   * @param ttlSeconds 过期时间（秒）
   */
  set<T>(key: string, value: T, ttlSeconds: number): void;

  delete(key: string): boolean;

  has(key: string): boolean;

  /**
   * 按 glob 模式（`*`、`?`，`\` 转义下一个字符）列出未过期的键
   */
  keys(pattern?: string): string[];

  /**
   * 向频道发布消息
   * @returns 收到消息的订阅者数量
   */
  publish(channel: string, message: string): number;

  /**
   * 订阅频道
   * @returns 取消订阅函数
   */
  subscribe(channel: string, listener: (message: string) => void): () => void;
}

/**
 * 转义 glob 元字符，使其在 keys() 中按字面匹配
 */
export function escapeGlob(value: string): string {
  return value.replace(/[\\*?]/g, '\\$&');
}

export const CacheKeys = {
  latestMetric: (hostname: string, metricType: string) =>
    `latest:${hostname}:${metricType}`,
  latestMetricPattern: (hostname: string) => `latest:${escapeGlob(hostname)}:*`,
  systemHealth: (hostname: string) => `health:${hostname}`,
  systemHealthPattern: () => 'health:*',
  serviceHealth: (serviceName: string) => `service_health:${serviceName}`,
  serviceHealthPattern: () => 'service_health:*',
} as const;

export const CacheTTL = {
  /** 最新指标值（秒） */
  LATEST_METRIC: 600,
  /** 主机概览（秒） */
  SYSTEM_HEALTH: 120,
} as const;

export const ALERTS_CHANNEL = 'alerts';
