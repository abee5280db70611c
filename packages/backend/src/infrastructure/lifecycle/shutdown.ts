import type { Server } from 'node:http';
import type { DataSource } from 'typeorm';
import type { Logger } from '@logging/logger.js';
import type { TaskManager } from '@infrastructure/scheduling/TaskManager.js';
import type { FastCache } from '@infrastructure/cache/FastCache.js';
import type { FetchProbeClient } from '@infrastructure/http/FetchProbeClient.js';

export interface ShutdownTargets {
  taskManager: TaskManager;
  server: Server;
  dataSource: DataSource;
  cache: FastCache;
  probeClient: FetchProbeClient;
}

/**
 * 关闭 HTTP 服务器
 */
function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * 设置优雅关闭处理
 *
 * @param targets - 需要关闭的资源
 * @param logger - 日志器实例
 * @param exit - 进程退出函数
 * @returns 优雅关闭函数
 */
export function setupGracefulShutdown(
  targets: ShutdownTargets,
  logger: Logger,
  exit: (code: number) => void = (code) => process.exit(code),
): (signal: string) => Promise<void> {
  let shuttingDown = false;

  const gracefulShutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`收到 ${signal}，正在优雅关闭应用...`);

    try {
      // 先停止后台循环，正在执行的任务会完成
      await targets.taskManager.stop();
      await closeServer(targets.server);
      await targets.probeClient.close();
      if (targets.dataSource.isInitialized) {
        await targets.dataSource.destroy();
      }
      targets.cache.destroy();

      logger.info('应用已优雅关闭');
      exit(0);
    } catch (error) {
      logger.error('优雅关闭失败', {
        error: error instanceof Error ? error.message : String(error),
      });
      exit(1);
    }
  };

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  return gracefulShutdown;
}
