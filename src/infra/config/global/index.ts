export {
  GlobalConfigManager,
  loadGlobalConfig,
  invalidateGlobalConfigCache,
} from './globalConfig.js';
