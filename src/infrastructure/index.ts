export { enginePlugin } from './engine/index.js';
export type { EngineServices, EnginePluginOptions } from './engine/index.js';
export { loadEngineConfig, applyEnvOverrides, DEFAULT_CONFIG } from './config/index.js';
export type { EngineConfig } from './config/index.js';
