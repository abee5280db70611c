import type { Logger } from '@logging/logger.js';
import {
  CacheKeys,
  type IFastCache,
} from '@domain/repositories/IFastCache.js';
import {
  severityForHealthStatus,
  type ServiceHealthCheck,
} from '@domain/entities/types.js';
import {
  ProbeTimeoutError,
  type ProbeClient,
} from '@infrastructure/http/FetchProbeClient.js';
import type { AlertService } from '@application/services/alerting/AlertService.js';

export interface HealthProberOptions {
  /** 服务名 -> 健康检查 URL */
  serviceEndpoints: Record<string, string>;
  timeoutMs: number;
  /** 健康检查间隔（秒），用于推导缓存 TTL */
  healthCheckInterval: number;
  now?: () => number;
}

/**
 * 服务健康探测器
 */
export class HealthProber {
  private readonly now: () => number;
  private readonly cacheTtlSeconds: number;

  constructor(
    private readonly client: ProbeClient,
    private readonly cache: IFastCache,
    private readonly alertService: AlertService,
    private readonly options: HealthProberOptions,
    private readonly logger: Logger,
  ) {
    this.now = options.now ?? Date.now;
    this.cacheTtlSeconds = Math.max(options.healthCheckInterval * 2, 120);
  }

  /**
   * 并发探测所有注册的服务，写入缓存并为不健康的服务创建告警
   * 不抛出异常
   * @returns 每个服务的探测结果
   */
  async checkServiceHealth(): Promise<ServiceHealthCheck[]> {
    const entries = Object.entries(this.options.serviceEndpoints);
    const results = await Promise.all(
      entries.map(([name, endpoint]) => this.probe(name, endpoint)),
    );

    for (const result of results) {
      this.cache.set(
        CacheKeys.serviceHealth(result.service_name),
        result,
        this.cacheTtlSeconds,
      );
      if (result.status !== 'healthy') {
        await this.raiseAlert(result);
      }
    }

    const healthy = results.filter((r) => r.status === 'healthy').length;
    this.logger.info('服务健康检查完成', {
      total: results.length,
      healthy,
    });
    return results;
  }

  /**
   * 读取缓存中的服务健康状态，不发起探测
   */
  getCachedServiceHealth(): ServiceHealthCheck[] {
    const checks: ServiceHealthCheck[] = [];
    for (const key of this.cache.keys(CacheKeys.serviceHealthPattern())) {
      const check = this.cache.get<ServiceHealthCheck>(key);
      if (check) {
        checks.push(check);
      }
    }
    return checks;
  }

  private async probe(
    name: string,
    endpoint: string,
  ): Promise<ServiceHealthCheck> {
    const startedAt = this.now();
    const base = { service_name: name, endpoint };

    try {
      const response = await this.client.get(endpoint, this.options.timeoutMs);
      const responseTime = Math.round(this.now() - startedAt);
      const healthy = response.status >= 200 && response.status < 300;
      return {
        ...base,
        status: healthy ? 'healthy' : 'unhealthy',
        response_time_ms: responseTime,
        last_checked: new Date(this.now()).toISOString(),
        error_message: healthy ? null : `HTTP ${response.status}`,
      };
    } catch (error) {
      if (error instanceof ProbeTimeoutError) {
        return {
          ...base,
          status: 'timeout',
          response_time_ms: null,
          last_checked: new Date(this.now()).toISOString(),
          error_message: 'Request timeout',
        };
      }
      return {
        ...base,
        status: 'unhealthy',
        response_time_ms: null,
        last_checked: new Date(this.now()).toISOString(),
        error_message: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private async raiseAlert(check: ServiceHealthCheck): Promise<void> {
    try {
      await this.alertService.createAlert({
        alert_type: 'service_health',
        severity: severityForHealthStatus(check.status),
        source: `service:${check.service_name}`,
        title: `Service ${check.service_name} Health Alert`,
        description: `Service ${check.service_name} is ${check.status}: ${check.error_message ?? 'No additional details'}`,
        alert_metadata: {
          service_name: check.service_name,
          endpoint: check.endpoint,
          status: check.status,
          response_time_ms: check.response_time_ms,
          error_message: check.error_message,
          auto_generated: true,
        },
        rule_id: null,
      });
    } catch (error) {
      this.logger.error('创建服务健康告警失败', {
        serviceName: check.service_name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
