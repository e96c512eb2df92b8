// CLI exports for @cipherpost/server
export {
  createRelayDaemon,
  type RelayDaemon,
  type RelayDaemonConfig,
} from "./bootstrap.js";
export {
  buildRelayDaemonConfig,
  InvalidConfigError,
  loadConfig,
  readCipherpostHomeFromEnv,
  type CliConfigOverrides,
} from "./config.js";
export { createRootLogger, resolveLogConfig, type LogLevel, type LogFormat } from "./logger.js";
export {
  loadPersistedConfig,
  PersistedConfigError,
  PersistedConfigSchema,
  type PersistedConfig,
} from "./persisted-config.js";
