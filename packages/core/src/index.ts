/**
 * @rssh/core
 *
 * Core logic for rssh
 * Provides the alias store, credential vault, session builder, interactive shell and file transfers
 */

// Export errors
export { ErrorCode, RsshError, isRsshError, errorMessage } from "./errors.js";
export type { ErrorContext, RsshErrorOptions } from "./errors.js";

// Export Config module
export {
  AliasStore,
  AliasManager,
  SettingsManager,
  DEFAULT_SETTINGS,
  getRsshHome,
  getAliasStorePath,
  getSettingsPath,
} from "./config/index.js";
export type { AliasMapping, AliasRecord, AliasStoreData, LoggingSettings, RsshSettings } from "./config/index.js";

// Export Credentials module
export { KeyringVault, VAULT_SERVICE } from "./credentials/index.js";
export type { CredentialVault } from "./credentials/index.js";

// Export SSH module
export {
  SessionBuilder,
  KeyAuthState,
  PasswordAuthState,
  NodeSshTransport,
  NodeSshSession,
  BufferedShellChannel,
  Ssh2SftpSession,
  classifyTransportError,
  DEFAULT_SSH_PORT,
  parseConnectionString,
  parsePort,
  validatePort,
  formatTarget,
  TransportError,
  TransportStage,
  SessionEvent,
} from "./ssh/index.js";
export type {
  AliasLookup,
  SessionBuilderOptions,
  NodeSshTransportOptions,
  ConnectionTarget,
  CredentialPrompter,
  PtySize,
  SessionListener,
  SftpSession,
  ShellChannel,
  ShellStream,
  Transport,
  TransportCredentials,
  TransportSession,
} from "./ssh/index.js";

// Export Shell module
export {
  runShell,
  pump,
  translateKey,
  keyEventFromKeypress,
  KeypressInput,
  ProcessTerminal,
  RawModeGuard,
  StreamDisplay,
  KeyEventKind,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_TERM,
} from "./shell/index.js";
export type {
  Display,
  InputSource,
  KeyCode,
  KeyEvent,
  NamedKey,
  RawModeStream,
  ResizeEvent,
  ShellIo,
  ShellOptions,
  TerminalControl,
  TerminalEvent,
  TerminalModeGuard,
  TerminalOutput,
} from "./shell/index.js";

// Export Transfer module
export { TransferEngine, TransferDirection, remoteBaseName, createProgressMeter, silentReporter } from "./transfer/index.js";
export type { ProgressReporter, TransferDescriptor } from "./transfer/index.js";

// Export Utils module
export { logger, initLogger, getLogger, LogLevel, formatBytes, formatPercent } from "./utils/index.js";
export type { Logger, LoggerConfig } from "./utils/index.js";
