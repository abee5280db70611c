export { BaseRepository } from './BaseRepository.js';
export { SystemMetricRepository } from './SystemMetricRepository.js';
export { ProcessMetricRepository } from './ProcessMetricRepository.js';
export { AlertRepository } from './AlertRepository.js';
export { AlertRuleRepository } from './AlertRuleRepository.js';
