import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BackupService } from "../backup/BackupService";
import { PatchHistory } from "../history/PatchHistory";
import { PatchEngine } from "../patch/PatchEngine";
import { WorkspaceService } from "../workspace/WorkspaceService";
import { FixLibrary, categoryLabel, fixIdFromName, parseFix } from "./FixLibrary";
import { PredefinedFixes } from "./PredefinedFixes";

describe("FixLibrary", () => {
  let root: string;
  let workspace: WorkspaceService;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "linepatch-fixes-"));
    workspace = new WorkspaceService(root);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it("loads the built-in bundles by category", async () => {
    const library = new FixLibrary(workspace);
    await library.load();
    expect(library.all()).toHaveLength(9);
    expect(library.categories()).toEqual([
      { id: "code_quality", label: "Code Quality", count: 4 },
      { id: "migration", label: "Migration", count: 2 },
      { id: "security", label: "Security", count: 3 },
    ]);
    expect(library.byCategory("migration").map((f) => f.id)).toEqual(["collections_abc_imports", "django_re_path"]);
    expect(library.isCustom("narrow_bare_except")).toBe(false);
  });

  it("searches id, name, description and category", async () => {
    const library = new FixLibrary(workspace);
    await library.load();
    expect(library.search("debug").map((f) => f.id)).toEqual([
      "disable_debug_setting",
      "flask_debug_off",
      "remove_js_debugger",
    ]);
    expect(library.search("MIGRATION")).toHaveLength(2);
  });

  it("loads user bundles, overriding built-ins and skipping bad entries", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const dir = path.join(root, ".linepatch", "fixes");
    await mkdir(dir, { recursive: true });
    await writeFile(
      path.join(dir, "team.json"),
      JSON.stringify([
        { id: "narrow_bare_except", name: "Team except", patches: [{ kind: "append", code: ["# ok"] }] },
        { id: "empty", name: "Empty", patches: [] },
      ])
    );
    await writeFile(path.join(dir, "broken.json"), "{");

    const library = new FixLibrary(workspace);
    await library.load();
    const overridden = library.get("narrow_bare_except");
    expect(overridden).toMatchObject({
      name: "Team except",
      category: "custom",
      severity: "medium",
      fileGlobPatterns: ["**/*"],
      description: "",
    });
    expect(library.isCustom("narrow_bare_except")).toBe(true);
    expect(library.get("empty")).toBeNull();
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it("creates and saves a custom bundle", async () => {
    const library = new FixLibrary(workspace);
    await library.load();
    const fix = library.createCustom({
      name: "  Drop Print Calls ",
      description: "remove prints",
      patches: [{ kind: "replace_pattern_all", pattern: "^\\s*print\\(", code: ["pass"] }],
      fileGlobPatterns: ["*.py"],
    });
    expect(fix).toMatchObject({ id: "drop_print_calls", name: "Drop Print Calls", author: "User", version: "1.0" });

    const file = await library.saveCustom("drop_print_calls");
    expect(file).toBe(path.join(root, ".linepatch", "fixes", "drop_print_calls.json"));
    const reparsed = parseFix(JSON.parse(await readFile(file, "utf8")));
    expect(reparsed.ok && reparsed.value).toEqual(fix);

    const reloaded = new FixLibrary(workspace);
    await reloaded.load();
    expect(reloaded.isCustom("drop_print_calls")).toBe(true);

    await expect(library.saveCustom("nope")).rejects.toMatchObject({ message: "Unknown fix: nope" });
    expect(() => library.createCustom({ name: " ", description: "", patches: [] })).toThrow("fix name must not be empty");
  });

  it("reports the failing patch of a bad bundle", () => {
    const r = parseFix({ id: "x", name: "X", patches: [{ kind: "append", code: ["a"] }, { kind: "append" }] });
    expect(r.ok || r.error.message).toBe("x patch 2: append: missing code");
  });

  it("labels and ids", () => {
    expect(categoryLabel("code_quality")).toBe("Code Quality");
    expect(fixIdFromName("Fix  Imports")).toBe("fix_imports");
  });
});

describe("PredefinedFixes", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "linepatch-predef-"));
    await writeFile(path.join(root, "a.py"), "try:\n    x()\nexcept:\n    pass\n");
    await writeFile(path.join(root, "b.py"), "print(1)\n");
    await writeFile(path.join(root, "c.txt"), "except:\n");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const setup = async () => {
    const workspace = new WorkspaceService(root);
    const engine = new PatchEngine({ workspace, backups: new BackupService(workspace) });
    const history = new PatchHistory(engine);
    const library = new FixLibrary(workspace);
    await library.load();
    const now = () => new Date(Date.UTC(2024, 0, 15, 9, 0, 0));
    return { history, fixes: new PredefinedFixes(library, engine, history, now) };
  };

  it("previews without writing", async () => {
    const { fixes } = await setup();
    const run = await fixes.preview("narrow_bare_except");
    expect(run.files.map((f) => [f.filePath, f.result.ok])).toEqual([
      ["a.py", true],
      ["b.py", false],
    ]);
    expect(await readFile(path.join(root, "a.py"), "utf8")).toBe("try:\n    x()\nexcept:\n    pass\n");
  });

  it("applies to matching files, records the run and is undoable", async () => {
    const { fixes, history } = await setup();
    const run = await fixes.apply("narrow_bare_except");

    expect(run.files.filter((f) => f.result.written).map((f) => f.filePath)).toEqual(["a.py"]);
    expect(await readFile(path.join(root, "a.py"), "utf8")).toBe("try:\n    x()\nexcept Exception:\n    pass\n");
    expect(await readFile(path.join(root, "c.txt"), "utf8")).toBe("except:\n");
    expect(fixes.appliedFixes()).toEqual([
      {
        fixId: "narrow_bare_except",
        name: "Narrow Bare except",
        timestamp: "2024-01-15T09:00:00.000Z",
        filesAffected: 1,
        totalFiles: 2,
      },
    ]);

    expect(history.peekUndo()?.requests[0].description).toBe("Predefined fix: Narrow Bare except");
    await history.undo();
    expect(await readFile(path.join(root, "a.py"), "utf8")).toBe("try:\n    x()\nexcept:\n    pass\n");
  });

  it("rejects an unknown fix id", async () => {
    const { fixes } = await setup();
    await expect(fixes.apply("nope")).rejects.toMatchObject({ code: "ValidationFailed", message: "Unknown fix: nope" });
  });
});
