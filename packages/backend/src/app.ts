import express from 'express';
import type { Server } from 'node:http';
import type { Logger } from '@logging/logger.js';
import type { AppConfig } from '@config/config.js';
import { createApiRouter, type ApiServices } from './api.js';
import { createErrorHandler } from './api/middleware/error-handler.js';

/**
 * 创建和配置Express应用程序
 *
 * @param services - 应用程序服务实例
 * @param config - 应用程序配置
 * @param logger - 日志器实例
 * @returns 配置好的Express应用程序实例
 */
export function createApp(
  services: ApiServices,
  config: Pick<AppConfig, 'api'>,
  logger: Logger,
): express.Application {
  const app = express();

  // 配置中间件
  app.use(express.json({ limit: '1mb' }));

  // 配置 CORS 中间件
  const allowAnyOrigin = config.api.corsOrigins.includes('*');
  app.use(
    (
      req: express.Request,
      res: express.Response,
      next: express.NextFunction,
    ) => {
      const origin = req.headers.origin;
      if (allowAnyOrigin) {
        res.header('Access-Control-Allow-Origin', origin ?? '*');
      } else if (origin && config.api.corsOrigins.includes(origin)) {
        res.header('Access-Control-Allow-Origin', origin);
        res.header('Vary', 'Origin');
      }
      res.header(
        'Access-Control-Allow-Methods',
        'GET, POST, PUT, DELETE, OPTIONS, PATCH',
      );
      res.header(
        'Access-Control-Allow-Headers',
        'Content-Type, Authorization, X-Requested-With, Accept, Origin',
      );
      res.header('Access-Control-Allow-Credentials', 'true');
      res.header('Access-Control-Max-Age', '86400');

      // 处理 OPTIONS 预检请求
      if (req.method === 'OPTIONS') {
        res.sendStatus(200);
        return;
      }

      next();
    },
  );

  // 挂载路由
  app.use('/api', createApiRouter(services));

  // 添加错误处理中间件
  app.use(createErrorHandler(logger));

  logger.info('Express 应用程序已配置路由和错误处理');
  return app;
}

/**
 * 启动HTTP服务器
 *
 * @param app - Express应用程序实例
 * @param config - API配置
 * @param logger - 日志器实例
 * @returns 已开始监听的服务器
 */
export function startServer(
  app: express.Application,
  config: Pick<AppConfig, 'api'>,
  logger: Logger,
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(config.api.port, config.api.host, () => {
      logger.info(
        `API 服务器正在运行于 http://${config.api.host}:${config.api.port}`,
      );
      resolve(server);
    });
    server.once('error', reject);
  });
}
