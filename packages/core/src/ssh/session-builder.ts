/**
 * Session Builder
 * Resolves an alias to a target and authenticates against it
 */

import { logger } from "../utils/logger.js";
import { ErrorCode, RsshError, errorMessage, isRsshError } from "../errors.js";
import { VAULT_SERVICE } from "../credentials/vault.js";
import type { CredentialVault } from "../credentials/vault.js";
import { formatTarget, parseConnectionString } from "./target.js";
import type {
  ConnectionTarget,
  CredentialPrompter,
  SessionListener,
  Transport,
  TransportCredentials,
  TransportSession,
} from "./types.js";
import { SessionEvent, TransportError, TransportStage } from "./types.js";

/**
 * Public-key authentication states.
 * KEY_TRIED is only entered from UNAUTHENTICATED, and it is the only state
 * that prompts, so there is at most one passphrase prompt per call.
 */
export enum KeyAuthState {
  UNAUTHENTICATED = "unauthenticated",
  KEY_TRIED = "key-tried",
  PASSPHRASE_TRIED = "passphrase-tried",
  DONE = "done",
  FAILED = "failed",
}

/**
 * Password authentication states
 */
export enum PasswordAuthState {
  UNAUTHENTICATED = "unauthenticated",
  VAULT_CHECKED = "vault-checked",
  PROMPTED = "prompted",
  DONE = "done",
  FAILED = "failed",
}

/**
 * Where aliases are looked up
 */
export interface AliasLookup {
  get(alias: string): Promise<string | undefined>;
}

export interface SessionBuilderOptions {
  aliases: AliasLookup;
  vault: CredentialVault;
  transport: Transport;
  prompter: CredentialPrompter;
  listener?: SessionListener;
}

/**
 * Outcome of one connection attempt that got as far as authentication
 */
type AuthAttempt = { session: TransportSession; failure?: undefined } | { session?: undefined; failure: TransportError };

/**
 * Session Builder class
 */
export class SessionBuilder {
  private aliases: AliasLookup;
  private vault: CredentialVault;
  private transport: Transport;
  private prompter: CredentialPrompter;
  private listener?: SessionListener;

  constructor(options: SessionBuilderOptions) {
    this.aliases = options.aliases;
    this.vault = options.vault;
    this.transport = options.transport;
    this.prompter = options.prompter;
    this.listener = options.listener;
  }

  /**
   * Open an authenticated session for a saved alias.
   * Uses public-key authentication when an identity file is given, the stored or prompted password otherwise.
   */
  public async establishSession(alias: string, port: number, identityPath?: string): Promise<TransportSession> {
    const connectionString = await this.aliases.get(alias);
    if (connectionString === undefined) {
      throw new RsshError(ErrorCode.ALIAS_NOT_FOUND, `Alias '${alias}' not found.`, { context: { alias } });
    }

    let target: ConnectionTarget;
    try {
      target = parseConnectionString(connectionString, port);
    } catch (error) {
      if (isRsshError(error)) {
        throw new RsshError(error.code, error.message, { cause: error, context: { ...error.context, alias } });
      }
      throw error;
    }

    this.listener?.(SessionEvent.CONNECTING, target);

    const session = identityPath
      ? await this.authenticateWithKey(alias, target, identityPath)
      : await this.authenticateWithPassword(alias, connectionString, target);

    logger.info("Authenticated", { alias, target: formatTarget(target), method: identityPath ? "publickey" : "password" });
    this.listener?.(SessionEvent.AUTHENTICATED, target);
    return session;
  }

  /**
   * Key, then at most one passphrase retry
   */
  private async authenticateWithKey(
    alias: string,
    target: ConnectionTarget,
    identityPath: string
  ): Promise<TransportSession> {
    let state: KeyAuthState = KeyAuthState.UNAUTHENTICATED;
    let last: AuthAttempt | undefined;

    while (state !== KeyAuthState.DONE && state !== KeyAuthState.FAILED) {
      switch (state) {
        case KeyAuthState.UNAUTHENTICATED:
          last = await this.attempt(alias, target, { privateKeyPath: identityPath });
          state = KeyAuthState.KEY_TRIED;
          break;

        case KeyAuthState.KEY_TRIED:
          if (last?.session) {
            state = KeyAuthState.DONE;
          } else if (last?.failure?.passphraseRequired) {
            logger.debug("Private key needs a passphrase", { identityPath });
            const passphrase = await this.prompter.promptPassphrase(identityPath);
            last = await this.attempt(alias, target, { privateKeyPath: identityPath, passphrase });
            state = KeyAuthState.PASSPHRASE_TRIED;
          } else {
            state = KeyAuthState.FAILED;
          }
          break;

        case KeyAuthState.PASSPHRASE_TRIED:
          state = last?.session ? KeyAuthState.DONE : KeyAuthState.FAILED;
          break;
      }
    }

    if (state === KeyAuthState.DONE && last?.session) {
      return last.session;
    }

    const reason = last?.failure ? last.failure.message : "unknown error";
    throw new RsshError(ErrorCode.AUTH_FAILED, `Authentication failed with key ${identityPath}: ${reason}`, {
      cause: last?.failure,
      context: { alias, host: target.host, identityPath },
    });
  }

  /**
   * Stored password, or a prompted one offered for saving
   */
  private async authenticateWithPassword(
    alias: string,
    connectionString: string,
    target: ConnectionTarget
  ): Promise<TransportSession> {
    let state: PasswordAuthState = PasswordAuthState.UNAUTHENTICATED;
    let storedSecret: string | undefined;
    let last: AuthAttempt | undefined;
    let reason = "unknown error";

    while (state !== PasswordAuthState.DONE && state !== PasswordAuthState.FAILED) {
      switch (state) {
        case PasswordAuthState.UNAUTHENTICATED:
          storedSecret = await this.readStoredSecret(alias);
          state = PasswordAuthState.VAULT_CHECKED;
          break;

        case PasswordAuthState.VAULT_CHECKED:
          if (storedSecret !== undefined) {
            // A rejected stored password is not re-prompted
            last = await this.attempt(alias, target, { password: storedSecret });
            if (last.session) {
              state = PasswordAuthState.DONE;
            } else {
              reason = `the stored password was rejected: ${last.failure.message}`;
              state = PasswordAuthState.FAILED;
            }
          } else {
            state = PasswordAuthState.PROMPTED;
          }
          break;

        case PasswordAuthState.PROMPTED: {
          const password = await this.prompter.promptPassword(connectionString);
          if (!password) {
            reason = "no stored password and none was entered";
            state = PasswordAuthState.FAILED;
            break;
          }

          last = await this.attempt(alias, target, { password });
          if (!last.session) {
            reason = `please check your username/password (${last.failure.message})`;
            state = PasswordAuthState.FAILED;
            break;
          }

          const session = last.session;
          try {
            if (await this.prompter.confirmSavePassword(alias)) {
              await this.savePassword(alias, password);
            }
          } catch (error) {
            session.close();
            throw error;
          }
          state = PasswordAuthState.DONE;
          break;
        }
      }
    }

    if (state === PasswordAuthState.DONE && last?.session) {
      return last.session;
    }

    throw new RsshError(ErrorCode.AUTH_FAILED, `Authentication failed for '${alias}': ${reason}`, {
      cause: last?.failure,
      context: { alias, host: target.host },
    });
  }

  /**
   * One connect + authenticate round. Connect and handshake failures end the whole operation.
   */
  private async attempt(
    alias: string,
    target: ConnectionTarget,
    credentials: TransportCredentials
  ): Promise<AuthAttempt> {
    try {
      return { session: await this.transport.connect(target, credentials) };
    } catch (error) {
      const failure =
        error instanceof TransportError
          ? error
          : new TransportError(TransportStage.CONNECT, errorMessage(error), { cause: error });
      const context = { alias, host: target.host, port: target.port };

      switch (failure.stage) {
        case TransportStage.CONNECT:
          throw new RsshError(
            ErrorCode.CONNECT_FAILED,
            `Failed to connect to ${target.host}:${target.port}: ${failure.message}`,
            { cause: failure, context }
          );
        case TransportStage.HANDSHAKE:
          throw new RsshError(
            ErrorCode.HANDSHAKE_FAILED,
            `SSH handshake with ${target.host}:${target.port} failed: ${failure.message}`,
            { cause: failure, context }
          );
        case TransportStage.AUTHENTICATE:
          return { failure };
      }
    }
  }

  /**
   * A vault that cannot be read behaves like an empty one: the user is asked instead
   */
  private async readStoredSecret(alias: string): Promise<string | undefined> {
    try {
      return await this.vault.getSecret(VAULT_SERVICE, alias);
    } catch (error) {
      logger.warn("Could not read stored password, asking instead", { alias, error: errorMessage(error) });
      return undefined;
    }
  }

  private async savePassword(alias: string, password: string): Promise<void> {
    try {
      await this.vault.setSecret(VAULT_SERVICE, alias, password);
    } catch (error) {
      if (isRsshError(error)) {
        throw error;
      }
      throw new RsshError(ErrorCode.CREDENTIAL_STORE_ERROR, `Failed to save password for '${alias}': ${errorMessage(error)}`, {
        cause: error,
        context: { alias },
      });
    }
  }
}
