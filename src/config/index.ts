export {
  loadConfig,
  logFilePath,
  buildConfig,
  parseSettings,
  defaultSettingsPath,
  requireCredential,
  resolveDatabase,
  saveDatabase,
  type AppConfig,
  type Credentials,
  type DeepReadonly,
} from './settings.js';
