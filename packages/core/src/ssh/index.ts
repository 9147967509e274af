/**
 * SSH Module - Connection targets, transport and authentication
 */
export { SessionBuilder, KeyAuthState, PasswordAuthState } from "./session-builder.js";
export type { AliasLookup, SessionBuilderOptions } from "./session-builder.js";
export { NodeSshTransport, NodeSshSession, classifyTransportError } from "./transport.js";
export type { NodeSshTransportOptions } from "./transport.js";
export { BufferedShellChannel, Ssh2SftpSession } from "./channel.js";
export type { ShellStream } from "./channel.js";
export { DEFAULT_SSH_PORT, parseConnectionString, parsePort, validatePort, formatTarget } from "./target.js";
export { TransportError, TransportStage, SessionEvent } from "./types.js";
export type {
  ConnectionTarget,
  CredentialPrompter,
  PtySize,
  SessionListener,
  SftpSession,
  ShellChannel,
  Transport,
  TransportCredentials,
  TransportSession,
} from "./types.js";
