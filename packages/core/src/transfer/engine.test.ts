import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ErrorCode } from "../errors.js";
import { FakeSession } from "../testing/fakes.js";
import { TransferEngine, remoteBaseName } from "./engine.js";
import { TransferDirection } from "./types.js";
import type { ProgressReporter, TransferDescriptor } from "./types.js";

const TARGET = { user: "u", host: "10.0.0.1", port: 22 };

type ReportedEvent = { event: "start" | "update" | "finish" | "fail"; bytes: number; error?: string };

class RecordingReporter implements ProgressReporter {
  public readonly events: ReportedEvent[] = [];

  public start(transfer: Readonly<TransferDescriptor>): void {
    this.events.push({ event: "start", bytes: transfer.bytesTransferred });
  }

  public update(transfer: Readonly<TransferDescriptor>): void {
    this.events.push({ event: "update", bytes: transfer.bytesTransferred });
  }

  public finish(transfer: Readonly<TransferDescriptor>): void {
    this.events.push({ event: "finish", bytes: transfer.bytesTransferred });
  }

  public fail(transfer: Readonly<TransferDescriptor>, error: Error): void {
    this.events.push({ event: "fail", bytes: transfer.bytesTransferred, error: error.message });
  }

  public updates(): number[] {
    return this.events.filter((e) => e.event === "update").map((e) => e.bytes);
  }
}

describe("remoteBaseName", () => {
  it.each([
    ["/var/log/app.log", "app.log"],
    ["notes.txt", "notes.txt"],
    ["/home/u/.bashrc", ".bashrc"],
  ])("takes the name of %s", (remotePath, name) => {
    expect(remoteBaseName(remotePath)).toBe(name);
  });

  it.each(["", "/", "/var/log/", "/var/log/.", "/var/.."])("has no name for %j", (remotePath) => {
    expect(remoteBaseName(remotePath)).toBeUndefined();
  });
});

describe("TransferEngine", () => {
  let dir: string;
  let session: FakeSession;
  let reporter: RecordingReporter;
  let engine: TransferEngine;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "rssh-transfer-"));
    session = new FakeSession(TARGET);
    reporter = new RecordingReporter();
    engine = new TransferEngine(reporter);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("upload", () => {
    it("copies the file into the remote directory under its own name", async () => {
      const localPath = path.join(dir, "report.txt");
      const content = Buffer.alloc(1024, "x");
      await fs.writeFile(localPath, content);

      const transfer = await engine.upload(session, localPath, "/home/u/in");

      expect(transfer).toEqual({
        localPath,
        remotePath: "/home/u/in/report.txt",
        direction: TransferDirection.UPLOAD,
        totalBytes: 1024,
        bytesTransferred: 1024,
      });
      expect(session.sftp.files.get("/home/u/in/report.txt")).toEqual(content);
      expect(session.sftp.closed).toBe(true);
      expect(session.closed).toBe(true);
    });

    it("reports growing progress from start to finish", async () => {
      const localPath = path.join(dir, "big.bin");
      await fs.writeFile(localPath, Buffer.alloc(200 * 1024, 1));

      await engine.upload(session, localPath, "/tmp");

      const updates = reporter.updates();
      expect(updates.length).toBeGreaterThan(1);
      expect(updates).toEqual([...updates].sort((a, b) => a - b));
      expect(updates[updates.length - 1]).toBe(200 * 1024);
      expect(reporter.events[0]).toEqual({ event: "start", bytes: 0 });
      expect(reporter.events[reporter.events.length - 1]).toEqual({ event: "finish", bytes: 200 * 1024 });
    });

    it("refuses a directory before opening SFTP", async () => {
      await expect(engine.upload(session, dir, "/tmp")).rejects.toMatchObject({ code: ErrorCode.NOT_A_FILE });
      expect(session.openSftp).not.toHaveBeenCalled();
      expect(session.closed).toBe(true);
    });

    it("refuses a missing file", async () => {
      const missing = path.join(dir, "missing.txt");
      await expect(engine.upload(session, missing, "/tmp")).rejects.toThrow(
        `Local path ${missing} is not a file. Please provide a path to a file to upload.`
      );
    });

    it("fails with TransferFailed when the remote write fails", async () => {
      const localPath = path.join(dir, "report.txt");
      await fs.writeFile(localPath, "data");
      session.sftp.failWrites = new Error("Permission denied");

      await expect(engine.upload(session, localPath, "/root")).rejects.toMatchObject({
        code: ErrorCode.TRANSFER_FAILED,
        message: `Upload of ${localPath} failed: Permission denied`,
      });
      expect(reporter.events[reporter.events.length - 1]).toMatchObject({
        event: "fail",
        error: `Upload of ${localPath} failed: Permission denied`,
      });
      expect(session.sftp.closed).toBe(true);
      expect(session.closed).toBe(true);
    });

    it("is not affected by a failing reporter", async () => {
      const localPath = path.join(dir, "report.txt");
      await fs.writeFile(localPath, "data");
      const failing: ProgressReporter = {
        start: () => {
          throw new Error("terminal gone");
        },
        update: () => {
          throw new Error("terminal gone");
        },
        finish: () => undefined,
        fail: () => undefined,
      };

      const transfer = await new TransferEngine(failing).upload(session, localPath, "/tmp");

      expect(transfer.bytesTransferred).toBe(4);
      expect(session.sftp.files.get("/tmp/report.txt")?.toString()).toBe("data");
    });
  });

  describe("download", () => {
    beforeEach(() => {
      session.sftp.files.set("/var/log/app.log", Buffer.from("hello world"));
    });

    it("creates the destination directory and keeps the remote name", async () => {
      const localDir = path.join(dir, "logs", "today");

      const transfer = await engine.download(session, "/var/log/app.log", localDir);

      expect(transfer).toEqual({
        localPath: path.join(localDir, "app.log"),
        remotePath: "/var/log/app.log",
        direction: TransferDirection.DOWNLOAD,
        totalBytes: 11,
        bytesTransferred: 11,
      });
      expect(await fs.readFile(path.join(localDir, "app.log"), "utf-8")).toBe("hello world");
      expect(session.closed).toBe(true);
    });

    it("downloads into an existing directory", async () => {
      await engine.download(session, "/var/log/app.log", dir);
      expect(await fs.readFile(path.join(dir, "app.log"), "utf-8")).toBe("hello world");
    });

    it("reports a total of 0 when the server gives no size", async () => {
      session.sftp.reportedSize = undefined;

      const transfer = await engine.download(session, "/var/log/app.log", dir);

      expect(transfer.totalBytes).toBe(0);
      expect(transfer.bytesTransferred).toBe(11);
    });

    it("refuses a local file as destination before opening SFTP", async () => {
      const localFile = path.join(dir, "taken");
      await fs.writeFile(localFile, "");

      await expect(engine.download(session, "/var/log/app.log", localFile)).rejects.toMatchObject({
        code: ErrorCode.DESTINATION_IS_FILE,
      });
      expect(session.openSftp).not.toHaveBeenCalled();
      expect(session.closed).toBe(true);
    });

    it("refuses a remote directory path", async () => {
      await expect(engine.download(session, "/var/log/", dir)).rejects.toMatchObject({
        code: ErrorCode.INVALID_REMOTE_PATH,
      });
      expect(session.openSftp).not.toHaveBeenCalled();
    });

    it("fails with TransferFailed for a missing remote file", async () => {
      await expect(engine.download(session, "/var/log/missing.log", dir)).rejects.toMatchObject({
        code: ErrorCode.TRANSFER_FAILED,
        message: "Download of /var/log/missing.log failed: No such file: /var/log/missing.log",
      });
      expect(session.sftp.closed).toBe(true);
      await expect(fs.stat(path.join(dir, "missing.log"))).rejects.toMatchObject({ code: "ENOENT" });
    });

    it("keeps an existing local file when the remote file cannot be opened", async () => {
      session.sftp.files.set("/srv/data.bin", Buffer.from("remote"));
      session.sftp.failOpen = new Error("Permission denied");
      await fs.writeFile(path.join(dir, "data.bin"), "precious");

      await expect(engine.download(session, "/srv/data.bin", dir)).rejects.toMatchObject({
        code: ErrorCode.TRANSFER_FAILED,
        message: "Download of /srv/data.bin failed: Permission denied",
      });
      expect(await fs.readFile(path.join(dir, "data.bin"), "utf-8")).toBe("precious");
      expect(session.closed).toBe(true);
    });
  });

  describe("validateUpload", () => {
    it("resolves to the size of a local file", async () => {
      const localPath = path.join(dir, "report.txt");
      await fs.writeFile(localPath, "12345");

      await expect(engine.validateUpload(localPath)).resolves.toBe(5);
    });

    it("refuses a directory", async () => {
      await expect(engine.validateUpload(dir)).rejects.toMatchObject({ code: ErrorCode.NOT_A_FILE });
    });
  });

  describe("validateDownload", () => {
    it("accepts a missing destination without creating it", async () => {
      const localDir = path.join(dir, "later");

      await expect(engine.validateDownload("/var/log/app.log", localDir)).resolves.toBeUndefined();
      await expect(fs.stat(localDir)).rejects.toMatchObject({ code: "ENOENT" });
    });

    it("refuses a local file as destination", async () => {
      const localFile = path.join(dir, "taken");
      await fs.writeFile(localFile, "");

      await expect(engine.validateDownload("/var/log/app.log", localFile)).rejects.toMatchObject({
        code: ErrorCode.DESTINATION_IS_FILE,
      });
    });

    it.each(["/var/log/", "/var/log/..", ""])("refuses the remote path %j", async (remotePath) => {
      await expect(engine.validateDownload(remotePath, dir)).rejects.toMatchObject({
        code: ErrorCode.INVALID_REMOTE_PATH,
      });
    });
  });
});
