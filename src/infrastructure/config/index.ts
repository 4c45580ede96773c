export { loadEngineConfig, applyEnvOverrides, DEFAULT_CONFIG } from './engine-config.js';
export type { EngineConfig } from './engine-config.js';
