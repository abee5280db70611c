/**
 * API路由模块主导出文件
 */

export * from './alertRules.js';
export * from './alerts.js';
export * from './dashboard.js';
export * from './metrics.js';
export * from './system.js';
