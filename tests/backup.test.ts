import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import { createBackup, describeBackup, formatBackupTimestamp, NO_BACKUP } from "../src/backup";
import { SafeMirrorError } from "../src/errors";
import { listFiles } from "../src/preview";
import { withTempDir, writeFile } from "./helpers";

const STAMP = new Date(2024, 0, 2, 3, 4, 5, 6);

void test("formatBackupTimestamp renders local time down to milliseconds", () => {
  assert.equal(formatBackupTimestamp(STAMP), "20240102T030405006");
  assert.equal(formatBackupTimestamp(new Date(2023, 11, 31, 23, 59, 59, 999)), "20231231T235959999");
});

void test("createBackup copies every file of the destination", async () => {
  await withTempDir(async (root) => {
    const destination = path.join(root, "dest");
    const tempRoot = path.join(root, "backups");
    await fs.mkdir(tempRoot);
    await writeFile(path.join(destination, "notes.txt"), "keep me");
    await writeFile(path.join(destination, ".config", "settings"), "x=1");
    await writeFile(path.join(destination, "deep", "er", "blob.bin"), Buffer.alloc(4096, 7));

    const backup = await createBackup(destination, { tempRoot, now: STAMP });
    assert.ok(backup);
    assert.equal(backup.originPath, destination);
    assert.equal(backup.createdAt, STAMP);
    assert.equal(path.dirname(backup.backupPath), tempRoot);
    assert.match(path.basename(backup.backupPath), /^dest\.20240102T030405006\.[A-Za-z0-9]{6}$/);
    assert.equal(describeBackup(backup), backup.backupPath);

    const original = await listFiles(destination);
    const copied = await listFiles(backup.backupPath);
    assert.deepStrictEqual(
      copied.map(({ relativePath, sizeBytes }) => ({ relativePath, sizeBytes })),
      original.map(({ relativePath, sizeBytes }) => ({ relativePath, sizeBytes }))
    );
    assert.equal(await fs.readFile(path.join(backup.backupPath, "notes.txt"), "utf8"), "keep me");
  });
});

void test("createBackup returns null for a missing destination and creates nothing", async () => {
  await withTempDir(async (root) => {
    const tempRoot = path.join(root, "backups");
    await fs.mkdir(tempRoot);

    const backup = await createBackup(path.join(root, "absent"), { tempRoot, now: STAMP });
    assert.equal(backup, null);
    assert.equal(describeBackup(backup), NO_BACKUP);
    assert.deepStrictEqual(await fs.readdir(tempRoot), []);
  });
});

void test("backups taken at the same instant get distinct directories", async () => {
  await withTempDir(async (root) => {
    const destination = path.join(root, "dest");
    await writeFile(path.join(destination, "a"), "a");

    const first = await createBackup(destination, { tempRoot: root, now: STAMP });
    const second = await createBackup(destination, { tempRoot: root, now: STAMP });
    assert.ok(first && second);
    assert.notEqual(first.backupPath, second.backupPath);
  });
});

void test("backup directories are private to the current user", async () => {
  await withTempDir(async (root) => {
    const destination = path.join(root, "dest");
    await writeFile(path.join(destination, "a"), "a");

    const backup = await createBackup(destination, { tempRoot: root });
    assert.ok(backup);
    const stat = await fs.stat(backup.backupPath);
    assert.equal(stat.mode & 0o777, 0o700);
  });
});

void test("createBackup reports BackupFailed when the temp root is unusable", async () => {
  await withTempDir(async (root) => {
    const destination = path.join(root, "dest");
    await writeFile(path.join(destination, "a"), "a");

    await assert.rejects(
      createBackup(destination, { tempRoot: path.join(root, "no", "such", "dir"), now: STAMP }),
      (error: unknown) =>
        error instanceof SafeMirrorError &&
        error.kind === "BackupFailed" &&
        error.message.startsWith(`Backup of ${destination} failed: ENOENT`)
    );
  });
});

void test("createBackup refuses a backup directory inside the destination", async () => {
  await withTempDir(async (root) => {
    const destination = path.join(root, "dest");
    const tempRoot = path.join(destination, "backups");
    await writeFile(path.join(destination, "a"), "a");
    await fs.mkdir(tempRoot);

    for (const candidate of [tempRoot, destination]) {
      await assert.rejects(createBackup(destination, { tempRoot: candidate, now: STAMP }), {
        kind: "BackupFailed",
        message: `Backup of ${destination} refused: backup directory ${candidate} lies inside it`
      });
    }
    assert.deepStrictEqual(await fs.readdir(tempRoot), []);
    assert.deepStrictEqual((await fs.readdir(destination)).sort(), ["a", "backups"]);
  });
});
