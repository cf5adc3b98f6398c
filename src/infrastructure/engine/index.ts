export { default as enginePlugin } from './engine-plugin.js';
export type { EnginePluginOptions } from './engine-plugin.js';
