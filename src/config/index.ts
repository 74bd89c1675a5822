export {
  loadConfig,
  buildRenderConfig,
  type ConfigLoadResult,
  type ConfigLoadOptions,
  type RenderOverrides,
} from './config-manager.js';
export {
  UserConfigSchema,
  RenderConfigSchema,
  OutputFormatSchema,
  type ValidatedUserConfig,
} from './schema.js';
