import 'reflect-metadata';
import {
  createBootstrapLogger,
  createLogger,
  type Logger,
} from './infrastructure/logging/logger.js';
import { validateConfig, type AppConfig } from './infrastructure/config/config.js';
import { createApp, startServer } from './app.js';
import {
  initializeInfrastructure,
  initializeServices,
} from './infrastructure/di/services.js';
import { setupGracefulShutdown } from './infrastructure/lifecycle/shutdown.js';

/**
 * 应用程序主入口点
 *
 * @description 负责加载配置、初始化数据库与服务、启动 HTTP 服务器和后台任务
 */
async function main(): Promise<void> {
  let logger: Logger = createBootstrapLogger();
  try {
    // 1. 加载并校验应用程序配置
    const config: AppConfig = validateConfig();

    // 2. 创建日志器实例
    logger = createLogger(config);
    logger.info('应用程序启动', {
      nodeVersion: process.version,
      platform: process.platform,
      env: process.env.NODE_ENV || 'development',
    });

    // 3. 初始化基础设施组件
    const infrastructure = await initializeInfrastructure(config, logger);

    // 4. 初始化应用服务
    const services = initializeServices(infrastructure, config, logger);
    await services.alertRuleService.ensureDefaultRules(config.alerting);

    // 5. 创建并启动 Express 应用程序
    const app = createApp(services, config, logger);
    const server = await startServer(app, config, logger);

    // 6. 启动后台任务
    services.taskManager.start();

    // 7. 设置优雅关闭处理
    setupGracefulShutdown(
      {
        taskManager: services.taskManager,
        server,
        dataSource: infrastructure.dataSource,
        cache: infrastructure.cache,
        probeClient: infrastructure.probeClient,
      },
      logger,
    );
  } catch (error) {
    logger.error(
      `应用启动期间发生致命错误: ${error instanceof Error ? error.message : String(error)}`,
    );
    process.exit(1);
  }
}

// 启动应用程序
void main();
