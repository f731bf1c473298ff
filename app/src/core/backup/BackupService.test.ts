import { mkdir, mkdtemp, readFile, readdir, rm, utimes, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { WorkspaceService } from "../workspace/WorkspaceService";
import { BackupService, flattenPath, formatStamp } from "./BackupService";

describe("BackupService", () => {
  let root: string;
  let workspace: WorkspaceService;
  let seconds: number;
  const now = () => new Date(2024, 0, 15, 10, 30, seconds);

  beforeEach(async () => {
    seconds = 0;
    root = await mkdtemp(path.join(os.tmpdir(), "linepatch-backup-"));
    workspace = new WorkspaceService(root);
    await mkdir(path.join(root, "src"));
    await writeFile(path.join(root, "src", "app.py"), "v1\n");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it("names backups after the flattened path and a local timestamp", async () => {
    const backups = new BackupService(workspace, { now });
    const created = await backups.createBackup("src/app.py");
    expect(path.basename(created)).toBe("src__app.py.20240115_103000.bak");
    expect(await readFile(created, "utf8")).toBe("v1\n");
    expect(flattenPath("a\\b/c.txt")).toBe("a__b__c.txt");
    expect(formatStamp(new Date(2023, 11, 31, 23, 5, 9))).toBe("20231231_230509");
  });

  it("adds a sequence suffix within the same second and lists newest first", async () => {
    const backups = new BackupService(workspace, { now });
    await backups.createBackup("src/app.py");
    await writeFile(path.join(root, "src", "app.py"), "v2\n");
    await backups.createBackup("src/app.py");

    const list = await backups.listBackups("src/app.py");
    expect(list.map((b) => b.fileName)).toEqual([
      "src__app.py.20240115_103000.1.bak",
      "src__app.py.20240115_103000.bak",
    ]);
    expect(list[0].seq).toBe(1);
    expect((await backups.latestBackup("src/app.py"))?.fileName).toBe("src__app.py.20240115_103000.1.bak");
  });

  it("keeps only the newest rotationCount backups of each file", async () => {
    await writeFile(path.join(root, "other.txt"), "o\n");
    const backups = new BackupService(workspace, { now, rotationCount: 2 });
    await backups.createBackup("other.txt");
    for (seconds = 0; seconds < 3; seconds++) await backups.createBackup("src/app.py");

    const names = (await backups.listBackups("src/app.py")).map((b) => b.fileName);
    expect(names).toEqual(["src__app.py.20240115_103002.bak", "src__app.py.20240115_103001.bak"]);
    expect(await backups.listBackups("other.txt")).toHaveLength(1);
    expect(await backups.listBackups()).toHaveLength(3);
  });

  it("restores the latest backup over the file", async () => {
    const backups = new BackupService(workspace, { now });
    await backups.createBackup("src/app.py");
    await writeFile(path.join(root, "src", "app.py"), "broken\n");

    const used = await backups.restoreLatest("src/app.py");
    expect(used.fileName).toBe("src__app.py.20240115_103000.bak");
    expect(await readFile(path.join(root, "src", "app.py"), "utf8")).toBe("v1\n");
  });

  it("never overwrites a backup whose name was taken after listing", async () => {
    class StaleListing extends BackupService {
      protected override async existingNames(): Promise<Set<string>> {
        return new Set();
      }
    }
    const backups = new StaleListing(workspace, { now });
    const first = await backups.createBackup("src/app.py");
    await writeFile(path.join(root, "src", "app.py"), "v2\n");
    const second = await backups.createBackup("src/app.py");

    expect(path.basename(second)).toBe("src__app.py.20240115_103000.1.bak");
    expect(await readFile(first, "utf8")).toBe("v1\n");
    expect(await readFile(second, "utf8")).toBe("v2\n");
  });

  it("returns the new backup when rotation fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    class BrokenRotation extends BackupService {
      override async rotate(): Promise<number> {
        throw new Error("permission denied");
      }
    }
    const backups = new BrokenRotation(workspace, { now });
    const created = await backups.createBackup("src/app.py");

    expect(path.basename(created)).toBe("src__app.py.20240115_103000.bak");
    expect(await readFile(created, "utf8")).toBe("v1\n");
    expect(warn).toHaveBeenCalledWith("[BackupService] rotation failed for src/app.py: permission denied");
  });

  it("fails to restore when there is no backup", async () => {
    const backups = new BackupService(workspace, { now });
    await expect(backups.restoreLatest("src/app.py")).rejects.toMatchObject({
      code: "FileNotFound",
      message: "No backups found for src/app.py",
    });
  });

  it("wraps copy errors as BackupFailure", async () => {
    const backups = new BackupService(workspace, { now });
    await expect(backups.createBackup("missing.txt")).rejects.toMatchObject({ code: "BackupFailure" });
    await expect(backups.createBackup("missing.txt")).rejects.toThrow(/^Could not back up missing\.txt: /);
  });

  it("deletes backups older than the cutoff", async () => {
    const backups = new BackupService(workspace, { now });
    const old = await backups.createBackup("src/app.py");
    seconds = 1;
    await backups.createBackup("src/app.py");
    const aged = new Date(now().getTime() - 40 * 24 * 60 * 60 * 1000);
    await utimes(old, aged, aged);

    expect(await backups.cleanupOlderThan(30)).toBe(1);
    expect(await readdir(backups.directory)).toEqual(["src__app.py.20240115_103001.bak"]);
  });

  it("lists nothing before the backup directory exists", async () => {
    expect(await new BackupService(workspace).listBackups()).toEqual([]);
  });
});
