export * from './domain/types.js';
export * from './domain/errors.js';
export * from './domain/result.js';
export * from './domain/schemas.js';
export * from './services/validation/index.js';
export * from './services/confidence/index.js';
export * from './services/supervision/index.js';
export { loadConfig, DEFAULT_SUPERVISION_CONFIG, supervisionConfigSchema, appConfigSchema } from './infrastructure/config.js';
export type { AppConfig, SupervisionConfig, ConfidenceWeights, AlertThresholds } from './infrastructure/config.js';
export { createApp } from './api/app.js';
