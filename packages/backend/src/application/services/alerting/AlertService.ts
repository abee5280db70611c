import type { Logger } from '@logging/logger.js';
import { AppError } from '@api/contracts/error.js';
import type { Alert } from '@infrastructure/database/entities/Alert.js';
import type {
  AlertListQuery,
  IAlertRepository,
  NewAlert,
} from '@domain/repositories/IAlertRepository.js';
import {
  ALERTS_CHANNEL,
  type IFastCache,
} from '@domain/repositories/IFastCache.js';
import type {
  AlertSeverity,
  AlertStats,
  AlertStatus,
} from '@domain/entities/types.js';

/**
 * 告警的对外表示，时间为 ISO 8601
 */
export interface AlertResponse {
  id: string;
  alert_type: string;
  severity: AlertSeverity;
  source: string;
  title: string;
  description: string | null;
  alert_metadata: Record<string, unknown>;
  rule_id: string | null;
  status: AlertStatus;
  acknowledged_at: string | null;
  acknowledged_by: string | null;
  resolved_at: string | null;
  resolved_by: string | null;
  created_at: string;
  updated_at: string;
}

export interface AlertUpdate {
  status?: AlertStatus;
  acknowledged_by?: string;
  resolved_by?: string;
}

/**
 * 将告警实体转换为对外表示
 * @param alert 告警实体
 * @returns 告警响应
 */
export function serializeAlert(alert: Alert): AlertResponse {
  return {
    id: alert.id,
    alert_type: alert.alert_type,
    severity: alert.severity,
    source: alert.source,
    title: alert.title,
    description: alert.description,
    alert_metadata: alert.alert_metadata,
    rule_id: alert.rule_id,
    status: alert.status,
    acknowledged_at: toIso(alert.acknowledged_at),
    acknowledged_by: alert.acknowledged_by,
    resolved_at: toIso(alert.resolved_at),
    resolved_by: alert.resolved_by,
    created_at: new Date(alert.created_at).toISOString(),
    updated_at: new Date(alert.updated_at).toISOString(),
  };
}

function toIso(value: number | null): string | null {
  return value === null ? null : new Date(value).toISOString();
}

/**
 * 告警服务
 * 负责告警的持久化、发布与生命周期管理
 */
export class AlertService {
  /**
   * 创建告警服务实例
   * @param alertRepository 告警仓库
   * @param cache 快速缓存（用于发布告警）
   * @param logger 日志记录器
   * @param now 时钟
   */
  constructor(
    private readonly alertRepository: IAlertRepository,
    private readonly cache: IFastCache,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * 持久化告警并发布到 alerts 频道
   * 发布失败只记录日志，持久化失败向上抛出
   * @param input 告警数据
   * @returns 已保存的告警
   */
  async createAlert(input: NewAlert): Promise<Alert> {
    const alert = await this.alertRepository.create({
      ...input,
      created_at: this.now(),
    });

    this.logger.info('告警已创建', {
      alertId: alert.id,
      ruleId: alert.rule_id,
      severity: alert.severity,
      source: alert.source,
    });

    try {
      this.cache.publish(ALERTS_CHANNEL, JSON.stringify(serializeAlert(alert)));
    } catch (error) {
      this.logger.warn('发布告警失败', {
        alertId: alert.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    return alert;
  }

  /**
   * 获取单个告警
   * @param id 告警ID
   * @returns 告警
   */
  async getAlert(id: string): Promise<Alert> {
    const alert = await this.alertRepository.findById(id);
    if (!alert) {
      throw AppError.createNotFoundError(`Alert with ID ${id} not found`);
    }
    return alert;
  }

  async listAlerts(query: AlertListQuery): Promise<Alert[]> {
    return this.alertRepository.list(query);
  }

  /**
   * 更新告警状态
   * 首次确认时记录 acknowledged_at，首次解决时记录 resolved_at
   * @param id 告警ID
   * @param update 更新内容
   * @returns 更新后的告警
   */
  async updateAlert(id: string, update: AlertUpdate): Promise<Alert> {
    const alert = await this.getAlert(id);
    const now = this.now();

    if (update.status) {
      alert.status = update.status;
      if (update.status === 'acknowledged' && alert.acknowledged_at === null) {
        alert.acknowledged_at = now;
      }
      if (update.status === 'resolved' && alert.resolved_at === null) {
        alert.resolved_at = now;
      }
    }
    if (update.acknowledged_by !== undefined) {
      alert.acknowledged_by = update.acknowledged_by;
    }
    if (update.resolved_by !== undefined) {
      alert.resolved_by = update.resolved_by;
    }

    alert.updated_at = now;
    const saved = await this.alertRepository.save(alert);
    this.logger.info('告警已更新', { alertId: id, status: saved.status });
    return saved;
  }

  /**
   * 统计告警数量
   * @returns 按状态与级别的统计
   */
  async getAlertStats(): Promise<AlertStats> {
    const counts = await this.alertRepository.countGrouped();
    return {
      total_alerts: counts.total,
      active_alerts: counts.byStatus.active ?? 0,
      acknowledged_alerts: counts.byStatus.acknowledged ?? 0,
      resolved_alerts: counts.byStatus.resolved ?? 0,
      critical_alerts: counts.bySeverity.critical ?? 0,
      high_alerts: counts.bySeverity.high ?? 0,
      medium_alerts: counts.bySeverity.medium ?? 0,
      low_alerts: counts.bySeverity.low ?? 0,
      info_alerts: counts.bySeverity.info ?? 0,
    };
  }
}
