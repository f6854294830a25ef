// Main entry point for StackSet rollouts
export * from './types/index.js';
export * from './config/loader.js';
export * from './config/settings.js';
export * from './config/types.js';
export * from './config/validator.js';
export * from './provisioning/errors.js';
export * from './provisioning/types.js';
export * from './provisioning/stack-set-gateway.js';
export * from './orchestration/types.js';
export * from './orchestration/plan.js';
export * from './orchestration/operation-poller.js';
export * from './orchestration/reconciler.js';
export * from './orchestration/definition-sync.js';
export * from './orchestration/drivers.js';
export * from './orchestration/status.js';
export * from './reporting/console-reporter.js';
export * from './templates/definition-loader.js';
export * from './reporting/summary.js';
