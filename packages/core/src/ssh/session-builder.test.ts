import { beforeEach, describe, expect, it, vi } from "vitest";
import { ErrorCode } from "../errors.js";
import { VAULT_SERVICE } from "../credentials/vault.js";
import { FakePrompter, FakeTransport, MemoryVault } from "../testing/fakes.js";
import { SessionBuilder } from "./session-builder.js";
import type { AliasLookup } from "./session-builder.js";
import { SessionEvent, TransportError, TransportStage } from "./types.js";
import type { SessionListener } from "./types.js";

const KEY_PATH = "/home/u/.ssh/id_ed25519";

function passphraseError(): TransportError {
  return new TransportError(TransportStage.AUTHENTICATE, "Encrypted private OpenSSH key detected, but no passphrase given", {
    passphraseRequired: true,
  });
}

function rejected(): TransportError {
  return new TransportError(TransportStage.AUTHENTICATE, "All configured authentication methods failed");
}

describe("SessionBuilder", () => {
  let aliases: Record<string, string>;
  let lookup: AliasLookup;
  let vault: MemoryVault;

  const builder = (transport: FakeTransport, prompter = new FakePrompter(), listener?: SessionListener) =>
    new SessionBuilder({ aliases: lookup, vault, transport, prompter, listener });

  beforeEach(() => {
    aliases = { box: "u@10.0.0.1" };
    lookup = { get: async (alias) => aliases[alias] };
    vault = new MemoryVault();
  });

  describe("password authentication", () => {
    it("uses the stored password without prompting", async () => {
      vault.secrets.set(`${VAULT_SERVICE}/box`, "s3cret");
      const transport = new FakeTransport(["ok"]);
      const prompter = new FakePrompter();

      const session = await builder(transport, prompter).establishSession("box", 22);

      expect(session.target).toEqual({ user: "u", host: "10.0.0.1", port: 22 });
      expect(transport.attempts).toEqual([{ password: "s3cret" }]);
      expect(prompter.promptPassword).not.toHaveBeenCalled();
    });

    it("prompts when nothing is stored and saves on confirmation", async () => {
      const transport = new FakeTransport(["ok"]);
      const prompter = new FakePrompter("test-passphrase", "test-password", true);

      await builder(transport, prompter).establishSession("box", 2222);

      expect(prompter.promptPassword).toHaveBeenCalledWith("u@10.0.0.1");
      expect(prompter.confirmSavePassword).toHaveBeenCalledWith("box");
      expect(transport.sessions[0].target.port).toBe(2222);
      expect(vault.secrets.get(`${VAULT_SERVICE}/box`)).toBe("test-password");
    });

    it("does not save when the user declines", async () => {
      const transport = new FakeTransport(["ok"]);

      await builder(transport, new FakePrompter("test-passphrase", "test-password", false)).establishSession("box", 22);

      expect(vault.secrets.size).toBe(0);
    });

    it("fails without re-prompting when the stored password is rejected", async () => {
      vault.secrets.set(`${VAULT_SERVICE}/box`, "stale");
      const transport = new FakeTransport([rejected()]);
      const prompter = new FakePrompter();

      await expect(builder(transport, prompter).establishSession("box", 22)).rejects.toMatchObject({
        code: ErrorCode.AUTH_FAILED,
        message: "Authentication failed for 'box': the stored password was rejected: All configured authentication methods failed",
      });
      expect(prompter.promptPassword).not.toHaveBeenCalled();
      expect(transport.attempts).toHaveLength(1);
    });

    it("fails when a prompted password is rejected", async () => {
      const transport = new FakeTransport([rejected()]);
      const prompter = new FakePrompter();

      await expect(builder(transport, prompter).establishSession("box", 22)).rejects.toMatchObject({
        code: ErrorCode.AUTH_FAILED,
      });
      expect(prompter.confirmSavePassword).not.toHaveBeenCalled();
    });

    it("fails without connecting when no password is entered", async () => {
      const transport = new FakeTransport(["ok"]);

      await expect(
        builder(transport, new FakePrompter("test-passphrase", "")).establishSession("box", 22)
      ).rejects.toThrow("Authentication failed for 'box': no stored password and none was entered");
      expect(transport.attempts).toHaveLength(0);
    });

    it("asks instead when the vault cannot be read", async () => {
      vi.spyOn(vault, "getSecret").mockRejectedValue(new Error("keychain locked"));
      const transport = new FakeTransport(["ok"]);
      const prompter = new FakePrompter();

      await builder(transport, prompter).establishSession("box", 22);

      expect(prompter.promptPassword).toHaveBeenCalledTimes(1);
      expect(transport.attempts).toEqual([{ password: "test-password" }]);
    });

    it("closes the session when saving the password fails", async () => {
      vault.failOnSet = new Error("keychain locked");
      const transport = new FakeTransport(["ok"]);

      await expect(
        builder(transport, new FakePrompter("test-passphrase", "test-password", true)).establishSession("box", 22)
      ).rejects.toMatchObject({ code: ErrorCode.CREDENTIAL_STORE_ERROR });
      expect(transport.sessions[0].closed).toBe(true);
    });

    it("closes the session when the save prompt fails", async () => {
      const transport = new FakeTransport(["ok"]);
      const prompter = new FakePrompter();
      prompter.confirmSavePassword.mockRejectedValueOnce(new Error("prompt closed"));

      await expect(builder(transport, prompter).establishSession("box", 22)).rejects.toThrow("prompt closed");
      expect(transport.sessions[0].closed).toBe(true);
      expect(await vault.getSecret(VAULT_SERVICE, "box")).toBeUndefined();
    });
  });

  describe("key authentication", () => {
    it("authenticates with the key alone", async () => {
      const transport = new FakeTransport(["ok"]);
      const prompter = new FakePrompter();

      await builder(transport, prompter).establishSession("box", 22, KEY_PATH);

      expect(transport.attempts).toEqual([{ privateKeyPath: KEY_PATH }]);
      expect(prompter.promptPassphrase).not.toHaveBeenCalled();
      expect(prompter.promptPassword).not.toHaveBeenCalled();
    });

    it("retries once with a prompted passphrase", async () => {
      const transport = new FakeTransport([passphraseError(), "ok"]);
      const prompter = new FakePrompter();

      await builder(transport, prompter).establishSession("box", 22, KEY_PATH);

      expect(prompter.promptPassphrase).toHaveBeenCalledTimes(1);
      expect(prompter.promptPassphrase).toHaveBeenCalledWith(KEY_PATH);
      expect(transport.attempts).toEqual([
        { privateKeyPath: KEY_PATH },
        { privateKeyPath: KEY_PATH, passphrase: "test-passphrase" },
      ]);
    });

    it("prompts for the passphrase at most once", async () => {
      const transport = new FakeTransport([passphraseError(), passphraseError(), "ok"]);
      const prompter = new FakePrompter();

      await expect(builder(transport, prompter).establishSession("box", 22, KEY_PATH)).rejects.toMatchObject({
        code: ErrorCode.AUTH_FAILED,
      });
      expect(prompter.promptPassphrase).toHaveBeenCalledTimes(1);
      expect(transport.attempts).toHaveLength(2);
    });

    it("fails without prompting when the key is refused", async () => {
      const transport = new FakeTransport([rejected()]);
      const prompter = new FakePrompter();

      await expect(builder(transport, prompter).establishSession("box", 22, KEY_PATH)).rejects.toThrow(
        `Authentication failed with key ${KEY_PATH}: All configured authentication methods failed`
      );
      expect(prompter.promptPassphrase).not.toHaveBeenCalled();
    });

    it("never falls back to the vault", async () => {
      vault.secrets.set(`${VAULT_SERVICE}/box`, "s3cret");
      const transport = new FakeTransport([rejected()]);

      await expect(builder(transport).establishSession("box", 22, KEY_PATH)).rejects.toMatchObject({
        code: ErrorCode.AUTH_FAILED,
      });
      expect(transport.attempts).toEqual([{ privateKeyPath: KEY_PATH }]);
    });
  });

  describe("connection failures", () => {
    it("maps a connect failure to ConnectFailed", async () => {
      const transport = new FakeTransport([new TransportError(TransportStage.CONNECT, "connect ECONNREFUSED 10.0.0.1:22")]);

      await expect(builder(transport).establishSession("box", 22)).rejects.toMatchObject({
        code: ErrorCode.CONNECT_FAILED,
        message: "Failed to connect to 10.0.0.1:22: connect ECONNREFUSED 10.0.0.1:22",
      });
    });

    it("maps a handshake failure to HandshakeFailed", async () => {
      const transport = new FakeTransport([new TransportError(TransportStage.HANDSHAKE, "Timed out while waiting for handshake")]);

      await expect(builder(transport).establishSession("box", 22, KEY_PATH)).rejects.toMatchObject({
        code: ErrorCode.HANDSHAKE_FAILED,
      });
    });

    it("treats an unclassified error as a connect failure", async () => {
      const transport = new FakeTransport([new Error("getaddrinfo ENOTFOUND")]);

      await expect(builder(transport).establishSession("box", 22)).rejects.toMatchObject({
        code: ErrorCode.CONNECT_FAILED,
      });
    });
  });

  describe("alias resolution", () => {
    it("fails for an unknown alias before connecting", async () => {
      const transport = new FakeTransport();

      await expect(builder(transport).establishSession("ghost", 22)).rejects.toMatchObject({
        code: ErrorCode.ALIAS_NOT_FOUND,
      });
      expect(transport.attempts).toHaveLength(0);
    });

    it("fails for a malformed stored connection string", async () => {
      aliases.broken = "no-user-here";
      const transport = new FakeTransport();

      await expect(builder(transport).establishSession("broken", 22)).rejects.toMatchObject({
        code: ErrorCode.INVALID_CONNECTION_STRING,
        context: { connectionString: "no-user-here", alias: "broken" },
      });
      expect(transport.attempts).toHaveLength(0);
    });
  });

  it("notifies the listener while connecting", async () => {
    vault.secrets.set(`${VAULT_SERVICE}/box`, "s3cret");
    const listener = vi.fn<SessionListener>();

    await builder(new FakeTransport(["ok"]), new FakePrompter(), listener).establishSession("box", 22);

    const target = { user: "u", host: "10.0.0.1", port: 22 };
    expect(listener.mock.calls).toEqual([
      [SessionEvent.CONNECTING, target],
      [SessionEvent.AUTHENTICATED, target],
    ]);
  });
});
