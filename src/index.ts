/**
 * Tapekeeper - retention-lock and reclaim automation for virtual tape libraries
 *
 * Main library exports for programmatic usage
 */

// Domain
export * from './domain/index.js'

// Types
export type {
  Workflow,
  Mechanism,
  SettleKind,
  RetentionSettings,
  BaseSettings,
  LockSettings,
  ReclaimSettings,
  Settings,
  Credentials
} from './types.js'

// Configuration
export {
  loadSettings,
  loadParameters,
  buildLockSettings,
  buildReclaimSettings,
  expandEnvVars
} from './lib/config-loader.js'

export { readCredentials, encodeCredentials } from './lib/credentials.js'

// Remote
export { SshCommandExecutor } from './remote/executor.js'
export type { CommandExecutor, CommandResult, SshExecutorOptions } from './remote/executor.js'
export { NetworkerCatalog } from './remote/catalog.js'
export type { CatalogClient, LabelRequest } from './remote/catalog.js'
export { applianceCommands, catalogCommands } from './remote/commands.js'

// Runtime support
export { createLogger, createSilentLogger } from './lib/logger.js'
export type { Logger } from './lib/logger.js'
export { fixedDelayPolicy, immediatePolicy, DEFAULT_SETTLE_SECONDS } from './lib/consistency.js'
export type { ConsistencyPolicy } from './lib/consistency.js'
export { FileReportSink } from './lib/report-writer.js'
export type { ReportSink } from './lib/report-writer.js'
export { sizeToBytes } from './lib/size.js'

// Errors
export {
  TapekeeperError,
  ConfigError,
  ConfigNotFoundError,
  InvalidConfigError,
  MissingConfigKeyError,
  CredentialError,
  ClassificationError,
  UnsupportedSizeUnitError,
  InvalidTimestampError,
  RemoteCommandError,
  isTapekeeperError,
  isConfigError
} from './lib/errors.js'
