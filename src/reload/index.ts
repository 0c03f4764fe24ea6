export { ConfigLoader } from './ConfigLoader.js';
export type {
  ConfigLoaderOptions,
  ReloadHandler,
  ErrorHandler,
  ValidationHandler
} from './ConfigLoader.js';
export { parseConfigDocument, mergeConfig, cloneConfig, isPlainObject } from './parse.js';
export type { ConfigObject } from './parse.js';
