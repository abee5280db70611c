import fs from 'node:fs';
import path from 'node:path';
import { DataSource, type DataSourceOptions } from 'typeorm';
import type { Logger } from '@logging/logger.js';
import type { AppConfig } from '@config/config.js';
import { SystemMetric } from './entities/SystemMetric.js';
import { ProcessMetric } from './entities/ProcessMetric.js';
import { AlertRule } from './entities/AlertRule.js';
import { Alert } from './entities/Alert.js';

/**
 * 所有实体，直接导入实体类而不是使用字符串路径
 */
export const ENTITIES = [SystemMetric, ProcessMetric, AlertRule, Alert];

/**
 * 创建TypeORM数据源配置
 * @param config 应用配置
 * @param logger 日志记录器
 * @returns TypeORM数据源配置
 */
export function createTypeORMConfig(
  config: Pick<AppConfig, 'db'>,
  logger: Logger,
): DataSourceOptions {
  const isDevelopment = process.env.NODE_ENV === 'development';

  if (config.db.type === 'postgres' && config.db.postgres) {
    logger.info('配置PostgreSQL数据库连接', {
      host: config.db.postgres.host,
      database: config.db.postgres.database,
    });
    return {
      type: 'postgres',
      host: config.db.postgres.host,
      port: config.db.postgres.port,
      username: config.db.postgres.username,
      password: config.db.postgres.password,
      database: config.db.postgres.database,
      ssl: config.db.postgres.ssl || false,
      entities: ENTITIES,
      synchronize: true,
      logging: isDevelopment,
    };
  }

  // 默认使用SQLite
  const dbPath = config.db.path || './data/process-monitor.sqlite';
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }
  logger.info(`配置SQLite数据库连接: ${dbPath}`);
  return {
    type: 'better-sqlite3',
    database: dbPath,
    entities: ENTITIES,
    synchronize: true,
    logging: isDevelopment,
  };
}

/**
 * 创建并初始化TypeORM数据源
 * @param config 应用配置
 * @param logger 日志记录器
 * @returns 已初始化的数据源
 */
export async function initializeDataSource(
  config: Pick<AppConfig, 'db'>,
  logger: Logger,
): Promise<DataSource> {
  const dataSource = new DataSource(createTypeORMConfig(config, logger));
  await dataSource.initialize();
  logger.info('数据库连接已初始化', { type: dataSource.options.type });
  return dataSource;
}
