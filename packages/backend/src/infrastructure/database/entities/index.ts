export { BaseEntity, MutableEntity } from './BaseEntity.js';
export { SystemMetric } from './SystemMetric.js';
export { ProcessMetric } from './ProcessMetric.js';
export { AlertRule } from './AlertRule.js';
export { Alert } from './Alert.js';
