import type { Logger } from '@logging/logger.js';
import type { IFastCache } from '@domain/repositories/IFastCache.js';

/**
 * 缓存项
 */
interface CacheItem {
  /** 以 JSON 形式保存，读写之间不共享引用 */
  serialized: string;
  expiresAt: number;
  createdAt: number;
}

/**
 * 缓存配置
 */
export interface FastCacheConfig {
  /** 过期项清理间隔（毫秒），0 表示不启动后台清理 */
  cleanupInterval?: number;
  /** 时钟，测试中可替换 */
  now?: () => number;
}

/**
 * 缓存统计
 */
export interface FastCacheStats {
  hits: number;
  misses: number;
  sets: number;
  deletes: number;
  evictions: number;
  currentSize: number;
  published: number;
}

/**
 * 进程内快速缓存
 * 以 Map 存储带过期时间的值，后台定时清理，并提供频道发布订阅
 */
export class FastCache implements IFastCache {
  private readonly cache: Map<string, CacheItem> = new Map();
  private readonly channels: Map<string, Set<(message: string) => void>> =
    new Map();
  private readonly now: () => number;
  private cleanupTimer: NodeJS.Timeout | null = null;
  private stats: FastCacheStats = {
    hits: 0,
    misses: 0,
    sets: 0,
    deletes: 0,
    evictions: 0,
    currentSize: 0,
    published: 0,
  };

  /**
   * 创建快速缓存实例
   * @param config - 缓存配置
   * @param logger - 日志记录器
   */
  constructor(
    config: FastCacheConfig = {},
    private readonly logger?: Logger,
  ) {
    this.now = config.now ?? Date.now;
    const cleanupInterval = config.cleanupInterval ?? 60000;

    if (cleanupInterval > 0) {
      this.cleanupTimer = setInterval(() => this.cleanup(), cleanupInterval);
      this.cleanupTimer.unref();
    }
  }

  get<T>(key: string): T | null {
    const item = this.cache.get(key);

    if (!item) {
      this.stats.misses++;
      return null;
    }

    if (this.isExpired(item)) {
      this.cache.delete(key);
      this.stats.misses++;
      this.stats.evictions++;
      this.stats.currentSize = this.cache.size;
      return null;
    }

    this.stats.hits++;
    return JSON.parse(item.serialized);
  }

  set<T>(key: string, value: T, ttlSeconds: number): void {
    const now = this.now();
    this.cache.set(key, {
      serialized: JSON.stringify(value),
      expiresAt: now + ttlSeconds * 1000,
      createdAt: now,
    });
    this.stats.sets++;
    this.stats.currentSize = this.cache.size;
    this.logger?.debug('缓存项已设置', { key, ttlSeconds });
  }

  delete(key: string): boolean {
    const deleted = this.cache.delete(key);
    if (deleted) {
      this.stats.deletes++;
      this.stats.currentSize = this.cache.size;
    }
    return deleted;
  }

  has(key: string): boolean {
    const item = this.cache.get(key);
    if (!item) {
      return false;
    }

    if (this.isExpired(item)) {
      this.cache.delete(key);
      this.stats.evictions++;
      this.stats.currentSize = this.cache.size;
      return false;
    }

    return true;
  }

  /**
   * 获取匹配模式的未过期键
   * @param pattern glob 模式，默认 `*`
   * @returns 缓存键数组（按字典序）
   */
  keys(pattern = '*'): string[] {
    const matcher = globToRegExp(pattern);
    const result: string[] = [];
    for (const [key, item] of this.cache.entries()) {
      if (!this.isExpired(item) && matcher.test(key)) {
        result.push(key);
      }
    }
    return result.sort();
  }

  publish(channel: string, message: string): number {
    const listeners = this.channels.get(channel);
    this.stats.published++;
    if (!listeners || listeners.size === 0) {
      return 0;
    }

    let delivered = 0;
    for (const listener of [...listeners]) {
      try {
        listener(message);
        delivered++;
      } catch (error) {
        // 订阅者异常不影响发布方与其他订阅者
        this.logger?.warn('频道订阅者处理消息失败', {
          channel,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return delivered;
  }

  subscribe(channel: string, listener: (message: string) => void): () => void {
    let listeners = this.channels.get(channel);
    if (!listeners) {
      listeners = new Set();
      this.channels.set(channel, listeners);
    }
    listeners.add(listener);

    return () => {
      const current = this.channels.get(channel);
      current?.delete(listener);
      if (current && current.size === 0) {
        this.channels.delete(channel);
      }
    };
  }

  /**
   * 获取缓存统计信息
   * @returns 缓存统计
   */
  getStats(): FastCacheStats {
    return { ...this.stats };
  }

  /**
   * 清理过期项
   * @returns 清理的数量
   */
  cleanup(): number {
    let cleanedCount = 0;

    for (const [key, item] of this.cache.entries()) {
      if (this.isExpired(item)) {
        this.cache.delete(key);
        cleanedCount++;
      }
    }

    this.stats.currentSize = this.cache.size;
    this.stats.evictions += cleanedCount;

    if (cleanedCount > 0) {
      this.logger?.debug('清理过期缓存项', { count: cleanedCount });
    }
    return cleanedCount;
  }

  /**
   * 销毁缓存
   */
  destroy(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }

    this.cache.clear();
    this.channels.clear();
    this.stats.currentSize = 0;
    this.logger?.debug('缓存已销毁');
  }

  private isExpired(item: CacheItem): boolean {
    return this.now() >= item.expiresAt;
  }
}

function globToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char === '\\' && i + 1 < pattern.length) {
      i++;
      source += escapeRegExp(pattern[i]);
    } else if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else {
      source += escapeRegExp(char);
    }
  }
  return new RegExp(`^${source}$`);
}

function escapeRegExp(char: string): string {
  return char.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
