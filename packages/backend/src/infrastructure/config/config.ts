import dotenv from 'dotenv';
dotenv.config();

/**
 * 应用程序配置对象的接口定义
 */
export type AppConfig = {
  api: { port: number; host: string; corsOrigins: string[] };
  db: {
    type: 'sqlite' | 'postgres';
    path?: string;
    postgres?: {
      host: string;
      port: number;
      username: string;
      password: string;
      database: string;
      ssl?: boolean;
    };
  };
  log: {
    level: string;
    // 以下为可选的日志轮转配置（不填则采用默认值）
    dirname?: string;
    maxFiles?: string | number;
    maxSize?: string;
    datePattern?: string;
    zippedArchive?: boolean;
  };
  monitoring: {
    /** 指标采集间隔（秒） */
    metricsCollectionInterval: number;
    /** 服务健康检查间隔（秒） */
    healthCheckInterval: number;
    /** 单次探测超时（毫秒） */
    healthCheckTimeoutMs: number;
    /** 采集循环关注的进程名 */
    monitoredProcesses: string[];
    /** 服务名 -> 健康检查 URL */
    serviceEndpoints: Record<string, string>;
  };
  alerting: {
    cpuThreshold: number;
    memoryThreshold: number;
    diskThreshold: number;
    /** service_health 规则未指定 max_response_time_ms 时的默认值（毫秒） */
    responseTimeThresholdMs: number;
  };
};

/**
 * 默认的服务健康检查注册表
 */
export const DEFAULT_SERVICE_ENDPOINTS: Readonly<Record<string, string>> = {
  'websocket-gateway': 'http://websocket-gateway:8000/health',
  'chat-service': 'http://chat-service:8001/health',
  'presence-service': 'http://presence-service:8002/health',
  'summary-engine': 'http://summary-engine:8003/health',
  'notification-worker': 'http://notification-worker:8004/health',
  'admin-ui': 'http://admin-ui:3000/api/health',
};

export const DEFAULT_MONITORED_PROCESSES: readonly string[] = [
  'python',
  'node',
  'nginx',
  'postgres',
  'redis-server',
  'docker',
  'containerd',
  'uvicorn',
];

/**
 * 校验字符串参数，确保非空，并去除可能的引号
 *
 * @param value - 要校验的值
 * @param name - 参数名称
 * @returns 校验后的字符串
 */
function validateString(value: unknown, name: string): string {
  if (!value || String(value).trim() === '') {
    throw new Error(`validateConfig: Missing ${name}`);
  }
  return String(value)
    .replace(/^"(.*)"$/, '$1')
    .replace(/^'(.*)'$/, '$1');
}

/**
 * 校验正整数参数，缺省时使用默认值
 *
 * @param value - 要校验的值
 * @param name - 参数名称
 * @param defaultValue - 默认值
 * @returns 校验后的数字
 */
function validateNumber(
  value: unknown,
  name: string,
  defaultValue: number,
): number {
  const num = Number(value === undefined || value === '' ? defaultValue : value);
  if (isNaN(num) || !Number.isInteger(num) || num <= 0) {
    throw new Error(`validateConfig: Invalid ${name}`);
  }
  return num;
}

/**
 * 校验百分比阈值（0-100，可为小数）
 * @param value - 要校验的值
 * @param name - 参数名称
 * @param defaultValue - 默认值
 * @returns 阈值
 */
function validatePercent(
  value: unknown,
  name: string,
  defaultValue: number,
): number {
  const num = Number(value === undefined || value === '' ? defaultValue : value);
  if (isNaN(num) || num < 0 || num > 100) {
    throw new Error(`validateConfig: Invalid ${name}`);
  }
  return num;
}

function parseList(value: string | undefined, fallback: readonly string[]): string[] {
  if (!value || value.trim() === '') {
    return [...fallback];
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * 解析 SERVICE_ENDPOINTS（JSON 对象：服务名 -> URL）
 * @param value - 环境变量原始值
 * @returns 服务注册表
 */
function parseServiceEndpoints(
  value: string | undefined,
): Record<string, string> {
  if (!value || value.trim() === '') {
    return { ...DEFAULT_SERVICE_ENDPOINTS };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new Error('validateConfig: Invalid SERVICE_ENDPOINTS');
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('validateConfig: Invalid SERVICE_ENDPOINTS');
  }

  const endpoints: Record<string, string> = {};
  for (const [name, url] of Object.entries(parsed)) {
    if (typeof url !== 'string' || url.trim() === '') {
      throw new Error(`validateConfig: Invalid SERVICE_ENDPOINTS.${name}`);
    }
    endpoints[name] = url;
  }
  return endpoints;
}

/**
 * 读取并校验配置
 *
 * @param env - 环境变量对象
 * @returns 验证后的配置对象
 */
export function validateConfig(env = process.env): AppConfig {
  // 数据库配置
  const DB_TYPE = env.DB_TYPE || 'sqlite';
  if (DB_TYPE !== 'sqlite' && DB_TYPE !== 'postgres') {
    throw new Error('validateConfig: Invalid DB_TYPE');
  }

  let dbConfig: AppConfig['db'];

  if (DB_TYPE === 'postgres') {
    dbConfig = {
      type: 'postgres',
      postgres: {
        host: validateString(env.POSTGRES_HOST, 'POSTGRES_HOST'),
        port: validateNumber(env.POSTGRES_PORT, 'POSTGRES_PORT', 5432),
        username: validateString(env.POSTGRES_USERNAME, 'POSTGRES_USERNAME'),
        password: validateString(env.POSTGRES_PASSWORD, 'POSTGRES_PASSWORD'),
        database: validateString(env.POSTGRES_DATABASE, 'POSTGRES_DATABASE'),
        ssl: env.POSTGRES_SSL === 'true',
      },
    };
  } else {
    dbConfig = {
      type: 'sqlite',
      path: validateString(
        env.DB_PATH || './data/process-monitor.sqlite',
        'DB_PATH',
      ),
    };
  }

  const API_PORT = validateNumber(env.API_PORT || env.PORT, 'API_PORT', 8005);

  return {
    api: {
      port: API_PORT,
      host: env.HOST || '0.0.0.0',
      corsOrigins: parseList(env.CORS_ORIGINS, ['*']),
    },
    db: dbConfig,
    log: {
      level: env.LOG_LEVEL || 'info',
      dirname: env.LOG_DIR || 'logs',
      maxFiles: env.LOG_MAX_FILES || '14d',
      maxSize: env.LOG_MAX_SIZE || '20m',
      datePattern: env.LOG_DATE_PATTERN || 'YYYY-MM-DD',
      zippedArchive: env.LOG_ZIPPED_ARCHIVE !== 'false',
    },
    monitoring: {
      metricsCollectionInterval: validateNumber(
        env.METRICS_COLLECTION_INTERVAL,
        'METRICS_COLLECTION_INTERVAL',
        30,
      ),
      healthCheckInterval: validateNumber(
        env.HEALTH_CHECK_INTERVAL,
        'HEALTH_CHECK_INTERVAL',
        60,
      ),
      healthCheckTimeoutMs: validateNumber(
        env.HEALTH_CHECK_TIMEOUT_MS,
        'HEALTH_CHECK_TIMEOUT_MS',
        10000,
      ),
      monitoredProcesses: parseList(
        env.MONITORED_PROCESSES,
        DEFAULT_MONITORED_PROCESSES,
      ),
      serviceEndpoints: parseServiceEndpoints(env.SERVICE_ENDPOINTS),
    },
    alerting: {
      cpuThreshold: validatePercent(
        env.CPU_ALERT_THRESHOLD,
        'CPU_ALERT_THRESHOLD',
        80,
      ),
      memoryThreshold: validatePercent(
        env.MEMORY_ALERT_THRESHOLD,
        'MEMORY_ALERT_THRESHOLD',
        85,
      ),
      diskThreshold: validatePercent(
        env.DISK_ALERT_THRESHOLD,
        'DISK_ALERT_THRESHOLD',
        90,
      ),
      responseTimeThresholdMs: validateNumber(
        env.RESPONSE_TIME_ALERT_THRESHOLD,
        'RESPONSE_TIME_ALERT_THRESHOLD',
        5000,
      ),
    },
  };
}
