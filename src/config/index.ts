export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  validateConfig,
  DEFAULT_CONFIG_FILE,
  CONFIG_ENV,
} from "./manager.js";
export type { ConfigChange, ConfigIssue } from "./manager.js";
