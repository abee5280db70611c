import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { FastCache } from '@infrastructure/cache/FastCache.js';
import { CacheKeys, escapeGlob } from '@domain/repositories/IFastCache.js';
import { ManualClock, createLoggerMock } from '../../utils/test-mocks.js';

describe('FastCache', () => {
  let clock: ManualClock;
  let logger: ReturnType<typeof createLoggerMock>;
  let cache: FastCache;

  beforeEach(() => {
    clock = new ManualClock(1_000_000);
    logger = createLoggerMock();
    cache = new FastCache({ cleanupInterval: 0, now: clock.now }, logger);
  });

  afterEach(() => {
    cache.destroy();
  });

  describe('读写与过期', () => {
    it('应该在 TTL 内返回写入的值', () => {
      cache.set('latest:h1:cpu_usage_percent', { value: 42 }, 600);

      expect(cache.get('latest:h1:cpu_usage_percent')).toEqual({ value: 42 });
      expect(cache.has('latest:h1:cpu_usage_percent')).toBe(true);
    });

    it('应该在过期后返回 null', () => {
      cache.set('k', 'v', 10);
      clock.advance(10_000);

      expect(cache.get('k')).toBeNull();
      expect(cache.has('k')).toBe(false);
    });

    it('后写入的值应该覆盖先写入的值', () => {
      cache.set('k', 1, 60);
      cache.set('k', 2, 60);

      expect(cache.get<number>('k')).toBe(2);
    });

    it('读取结果不应与写入的对象共享引用', () => {
      const value = { tags: { role: 'db' } };
      cache.set('k', value, 60);
      value.tags.role = 'changed';

      expect(cache.get('k')).toEqual({ tags: { role: 'db' } });
    });

    it('应该删除键并更新统计', () => {
      cache.set('k', 1, 60);

      expect(cache.delete('k')).toBe(true);
      expect(cache.delete('k')).toBe(false);
      expect(cache.getStats().deletes).toBe(1);
    });
  });

  describe('keys', () => {
    it('应该按 glob 模式返回未过期的键', () => {
      cache.set('latest:h1:cpu_usage_percent', 1, 600);
      cache.set('latest:h1:memory_usage_percent', 2, 600);
      cache.set('latest:h2:cpu_usage_percent', 3, 600);
      cache.set('health:h1', {}, 5);
      clock.advance(6_000);

      expect(cache.keys('latest:h1:*')).toEqual([
        'latest:h1:cpu_usage_percent',
        'latest:h1:memory_usage_percent',
      ]);
      expect(cache.keys('health:*')).toEqual([]);
      expect(cache.keys('latest:h?:cpu_usage_percent')).toEqual([
        'latest:h1:cpu_usage_percent',
        'latest:h2:cpu_usage_percent',
      ]);
    });

    it('模式中的正则特殊字符应按字面匹配', () => {
      cache.set('service_health:a.b', 1, 60);
      cache.set('service_health:aXb', 2, 60);

      expect(cache.keys('service_health:a.b')).toEqual(['service_health:a.b']);
    });

    it('反斜杠转义的通配符按字面匹配', () => {
      cache.set('latest:h*:cpu_usage_percent', 1, 600);
      cache.set('latest:h1:cpu_usage_percent', 2, 600);

      expect(escapeGlob('h*?\\')).toBe('h\\*\\?\\\\');
      expect(cache.keys(CacheKeys.latestMetricPattern('h*'))).toEqual([
        'latest:h*:cpu_usage_percent',
      ]);
      expect(cache.keys(CacheKeys.latestMetricPattern('h?'))).toEqual([]);
    });
  });

  describe('cleanup', () => {
    it('应该清理过期项并返回数量', () => {
      cache.set('a', 1, 1);
      cache.set('b', 2, 100);
      clock.advance(2_000);

      expect(cache.cleanup()).toBe(1);
      expect(cache.getStats().currentSize).toBe(1);
    });

    it('应该按间隔自动清理', () => {
      jest.useFakeTimers();
      try {
        const timed = new FastCache({ cleanupInterval: 1000, now: clock.now });
        timed.set('a', 1, 1);
        clock.advance(2_000);
        jest.advanceTimersByTime(1000);

        expect(timed.getStats().evictions).toBe(1);
        timed.destroy();
      } finally {
        jest.useRealTimers();
      }
    });
  });

  describe('发布订阅', () => {
    it('应该把消息投递给所有订阅者并返回数量', () => {
      const received: string[] = [];
      cache.subscribe('alerts', (message) => received.push(`a:${message}`));
      cache.subscribe('alerts', (message) => received.push(`b:${message}`));

      expect(cache.publish('alerts', 'hello')).toBe(2);
      expect(received).toEqual(['a:hello', 'b:hello']);
    });

    it('没有订阅者时应该返回 0', () => {
      expect(cache.publish('alerts', 'hello')).toBe(0);
    });

    it('取消订阅后不再收到消息', () => {
      const listener = jest.fn<(message: string) => void>();
      const unsubscribe = cache.subscribe('alerts', listener);
      unsubscribe();

      expect(cache.publish('alerts', 'hello')).toBe(0);
      expect(listener).not.toHaveBeenCalled();
    });

    it('订阅者抛出异常不应影响其他订阅者', () => {
      const healthy = jest.fn<(message: string) => void>();
      cache.subscribe('alerts', () => {
        throw new Error('listener failed');
      });
      cache.subscribe('alerts', healthy);

      expect(cache.publish('alerts', 'hello')).toBe(1);
      expect(healthy).toHaveBeenCalledWith('hello');
      expect(logger.warn).toHaveBeenCalledWith('频道订阅者处理消息失败', {
        channel: 'alerts',
        error: 'listener failed',
      });
    });
  });
});
