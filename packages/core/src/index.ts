export * from './dtype';
export * from './shape';
export * from './layout';
export * from './errors';
export {
  CONFIG,
  DEFAULT_CONFIG,
  ENV_KEYS,
  loadConfig,
  type LayoutConfig,
  type LogLevelName,
} from './config';
export { Logger, LogLevel, logLevelFromName, setGlobalLogLevel, getGlobalLogLevel } from './logger';
