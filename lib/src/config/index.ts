/**
 * Configuration Module
 */

export {
  CacheSettingsSchema,
  type CacheSettings,
  AppConfigSchema,
  type AppConfig,
  type AppConfigInput,
} from './types.js';

export { parseAppConfig, loadAppConfig, loadPromptTemplate } from './loader.js';
