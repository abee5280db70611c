/**
 * 监控与告警领域的基础类型
 */

export const ALERT_SEVERITIES = [
  'critical',
  'high',
  'medium',
  'low',
  'info',
] as const;
export type AlertSeverity = (typeof ALERT_SEVERITIES)[number];

export const ALERT_STATUSES = [
  'active',
  'acknowledged',
  'resolved',
  'suppressed',
] as const;
export type AlertStatus = (typeof ALERT_STATUSES)[number];

export const RULE_TYPES = [
  'system_metric',
  'service_health',
  'process_metric',
] as const;
export type RuleType = (typeof RULE_TYPES)[number];

export const COMPARISON_OPERATORS = ['>', '<', '>=', '<=', '=='] as const;
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

/**
 * process_metric 规则可比较的进程指标字段
 */
export const PROCESS_METRIC_FIELDS = [
  'cpu_percent',
  'memory_mb',
  'memory_percent',
  'disk_read_bytes',
  'disk_write_bytes',
  'network_sent_bytes',
  'network_recv_bytes',
] as const;
export type ProcessMetricField = (typeof PROCESS_METRIC_FIELDS)[number];

export const SERVICE_HEALTH_STATUSES = [
  'healthy',
  'unhealthy',
  'timeout',
] as const;
export type ServiceHealthStatus = (typeof SERVICE_HEALTH_STATUSES)[number];

/**
 * 单个服务的健康检查结果，仅存在于快速缓存中
 */
export interface ServiceHealthCheck {
  service_name: string;
  endpoint: string;
  status: ServiceHealthStatus;
  response_time_ms: number | null;
  /** ISO 8601 */
  last_checked: string;
  error_message: string | null;
}

/**
 * 主机概览快照
 */
export interface SystemOverview {
  hostname: string;
  cpu_usage: number;
  memory_usage: number;
  disk_usage: number;
  network_io: {
    bytes_sent: number;
    bytes_recv: number;
    packets_sent: number | null;
    packets_recv: number | null;
  };
  process_count: number;
  uptime_seconds: number;
  /** ISO 8601 */
  last_updated: string;
}

/**
 * `latest:{hostname}:{metric_type}` 缓存项
 */
export interface LatestMetricEntry {
  value: number;
  unit: string | null;
  /** ISO 8601 */
  timestamp: string;
  tags: Record<string, string>;
}

/**
 * 告警统计
 */
export interface AlertStats {
  total_alerts: number;
  active_alerts: number;
  acknowledged_alerts: number;
  resolved_alerts: number;
  critical_alerts: number;
  high_alerts: number;
  medium_alerts: number;
  low_alerts: number;
  info_alerts: number;
}

/**
 * 由服务健康状态推导告警级别
 * @param status - 健康状态
 * @returns 告警级别
 */
export function severityForHealthStatus(
  status: ServiceHealthStatus,
): AlertSeverity {
  switch (status) {
    case 'unhealthy':
      return 'critical';
    case 'timeout':
      return 'high';
    default:
      return 'medium';
  }
}
