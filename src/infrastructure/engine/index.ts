export { default as enginePlugin } from './engine-plugin.js';
export type { EngineServices, EnginePluginOptions } from './engine-plugin.js';
