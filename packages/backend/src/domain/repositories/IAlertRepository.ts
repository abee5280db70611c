import type { Alert } from '@infrastructure/database/entities/Alert.js';
import type {
  AlertSeverity,
  AlertStatus,
} from '@domain/entities/types.js';

/**
 * 新告警
 */
export interface NewAlert {
  alert_type: string;
  severity: AlertSeverity;
  source: string;
  title: string;
  description: string | null;
  alert_metadata: Record<string, unknown>;
  rule_id: string | null;
  /** 缺省为写入时间 */
  created_at?: number;
}

export interface AlertListQuery {
  skip: number;
  limit: number;
  status?: AlertStatus;
  severity?: AlertSeverity;
}

/**
 * 分组计数
 */
export interface AlertCounts {
  total: number;
  byStatus: Partial<Record<AlertStatus, number>>;
  bySeverity: Partial<Record<AlertSeverity, number>>;
}

export interface IAlertRepository {
  create(alert: NewAlert): Promise<Alert>;

  findById(id: string): Promise<Alert | null>;

  list(query: AlertListQuery): Promise<Alert[]>;

  save(alert: Alert): Promise<Alert>;

  /**
   * 规则在 since 之后是否已产生过告警（冷却判断）
   */
  existsForRuleSince(ruleId: string, since: number): Promise<boolean>;

  countGrouped(): Promise<AlertCounts>;

  /**
   * 删除 updated_at 早于 cutoff 的已解决告警
   */
  deleteResolvedBefore(cutoff: number): Promise<number>;
}
