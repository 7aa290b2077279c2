import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import { BackendExecutionError, SafeMirrorError } from "../src/errors";
import { SyncExecutor } from "../src/executor";
import { PrivilegeBroker } from "../src/privilege";
import type { BackupRecord, SyncRequest } from "../src/types";
import { FakeRunner, mirrorInProcess, UNPRIVILEGED, withTempDir, writeFile } from "./helpers";

function request(root: string, overrides: Partial<SyncRequest> = {}): SyncRequest {
  return {
    sourcePath: path.join(root, "src"),
    destinationPath: path.join(root, "dst"),
    mode: "mirror",
    backend: "rsync",
    options: { extraArgs: [] },
    ...overrides
  };
}

function backupAt(backupPath: string): BackupRecord {
  return { originPath: "/unused", backupPath, createdAt: new Date(0) };
}

void test("a successful run walks every state up to done", async () => {
  await withTempDir(async (root) => {
    const runner = new FakeRunner();
    const lines: string[] = [];
    const executor = new SyncExecutor(request(root), {
      runner,
      broker: new PrivilegeBroker(UNPRIVILEGED, runner),
      print: (line) => lines.push(line)
    });

    assert.equal(executor.state, "validated");
    executor.markPreviewed();
    assert.equal(executor.state, "previewed");
    executor.markBackedUp(null);
    assert.equal(executor.state, "backed-up");
    await executor.execute();

    assert.equal(executor.state, "done");
    assert.equal(runner.calls.length, 1);
    assert.equal(runner.calls[0].command, "rsync");
    assert.deepStrictEqual(lines, [
      `Running: rsync -aH --delete --info=progress2 -- ${root}/src/ ${root}/dst/`
    ]);
  });
});

void test("cp mirror empties the destination, hidden entries included, before copying", async () => {
  await withTempDir(async (root) => {
    const current = request(root, { backend: "cp" });
    await writeFile(path.join(current.sourcePath, "keep.txt"), "new");
    await writeFile(path.join(current.destinationPath, ".stale"), "old");
    await writeFile(path.join(current.destinationPath, "gone", "file"), "old");

    const seenBeforeCopy: string[][] = [];
    const runner = new FakeRunner(async (spec) => {
      seenBeforeCopy.push(await fs.readdir(current.destinationPath));
      return await mirrorInProcess(spec);
    });
    const executor = new SyncExecutor(current, {
      runner,
      broker: new PrivilegeBroker(UNPRIVILEGED, runner)
    });
    executor.markPreviewed();
    executor.markBackedUp(null);
    await executor.execute();

    assert.deepStrictEqual(seenBeforeCopy, [[]]);
    assert.deepStrictEqual(await fs.readdir(current.destinationPath), ["keep.txt"]);
    assert.equal(await fs.readFile(path.join(current.destinationPath, "keep.txt"), "utf8"), "new");
  });
});

void test("a non-zero exit fails the run and names the backup", async () => {
  await withTempDir(async (root) => {
    const runner = new FakeRunner(() => ({ status: 23, signal: null }));
    const executor = new SyncExecutor(request(root), {
      runner,
      broker: new PrivilegeBroker(UNPRIVILEGED, runner)
    });
    executor.markPreviewed();
    executor.markBackedUp(backupAt("/tmp/dst.backup"));

    await assert.rejects(executor.execute(), (error: unknown) => {
      assert.ok(error instanceof BackendExecutionError);
      assert.equal(error.message, "rsync exited with 23");
      assert.equal(error.status, 23);
      assert.equal(error.backupPath, "/tmp/dst.backup");
      assert.equal(error.code, 1);
      return true;
    });
    assert.equal(executor.state, "failed");
  });
});

void test("a backend missing from PATH surfaces as BackendUnavailable", async () => {
  await withTempDir(async (root) => {
    const runner = new FakeRunner(() => {
      throw Object.assign(new Error("spawn rclone ENOENT"), {
        code: "ENOENT",
        syscall: "spawn rclone"
      });
    });
    const executor = new SyncExecutor(request(root, { backend: "rclone" }), {
      runner,
      broker: new PrivilegeBroker(UNPRIVILEGED, runner)
    });
    executor.markPreviewed();
    executor.markBackedUp(null);

    await assert.rejects(executor.execute(), {
      name: "SafeMirrorError",
      kind: "BackendUnavailable",
      message: "rclone was not found on PATH"
    });
    assert.equal(executor.state, "failed");
  });
});

void test("execute refuses to run before the backup step", async () => {
  await withTempDir(async (root) => {
    const runner = new FakeRunner();
    const executor = new SyncExecutor(request(root), {
      runner,
      broker: new PrivilegeBroker(UNPRIVILEGED, runner)
    });
    executor.markPreviewed();

    await assert.rejects(executor.execute(), {
      message: "Invalid executor transition: previewed -> executing"
    });
    assert.equal(runner.calls.length, 0);
    assert.throws(() => executor.markPreviewed(), /previewed -> previewed/);
  });
});

void test("abort is final and ignored once the run has ended", () => {
  const runner = new FakeRunner();
  const executor = new SyncExecutor(request("/nowhere"), {
    runner,
    broker: new PrivilegeBroker(UNPRIVILEGED, runner)
  });
  executor.abort();
  assert.equal(executor.state, "aborted");
  executor.abort();
  assert.equal(executor.state, "aborted");
  assert.throws(() => executor.markPreviewed(), /aborted -> previewed/);
});

void test("an interrupt during the backend run reports the backup path", async () => {
  await withTempDir(async (root) => {
    const controller = new AbortController();
    const runner = new FakeRunner(() => {
      controller.abort();
      return { status: null, signal: "SIGINT" };
    });
    const executor = new SyncExecutor(request(root), {
      runner,
      broker: new PrivilegeBroker(UNPRIVILEGED, runner)
    });
    executor.markPreviewed();
    executor.markBackedUp(backupAt("/tmp/dst.20240102T030405006.abc123"));

    await assert.rejects(executor.execute(controller.signal), (error: unknown) => {
      assert.ok(error instanceof SafeMirrorError);
      assert.equal(error.kind, "Interrupted");
      assert.equal(error.code, 130);
      assert.equal(
        error.message,
        "Aborted by user. Previous data backed up to: /tmp/dst.20240102T030405006.abc123"
      );
      return true;
    });
    assert.equal(executor.state, "aborted");
  });
});

void test("checkpoint stops a cancelled run before anything executes", () => {
  const runner = new FakeRunner();
  const executor = new SyncExecutor(request("/nowhere"), {
    runner,
    broker: new PrivilegeBroker(UNPRIVILEGED, runner)
  });
  const controller = new AbortController();
  executor.checkpoint(controller.signal);
  assert.equal(executor.state, "validated");

  controller.abort();
  assert.throws(() => executor.checkpoint(controller.signal), {
    kind: "Interrupted",
    message: "Aborted by user."
  });
  assert.equal(executor.state, "aborted");
  assert.equal(runner.calls.length, 0);
});
