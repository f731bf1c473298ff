// app/src/cli/runCli.ts
// Command dispatch for the linepatch binary. Returns an exit code; never calls process.exit.

import { readFile } from "node:fs/promises";
import path from "node:path";
import { parseArgs } from "node:util";
import type chalk from "chalk";
import { PatchError, errorMessage } from "../core/patch/errors";
import { writePatchFile } from "../core/patch/diff";
import type { PatchResult } from "../core/patch/PatchEngine";
import { applyPatchRequests } from "../core/patch/PatchEngine";
import type { PatchRequest } from "../core/patch/PatchRequest";
import { parsePatchRequests } from "../core/patch/PatchRequest";
import { CONFIG_KEYS, isConfigKey, parseConfigValue, resetPatchConfig, setConfigValue } from "../core/project/patchConfig";
import type { PatchSession } from "../core/session";
import { openSession } from "../core/session";

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CliOptions {
  io?: CliIO;
  color?: chalk.Chalk;
  cwd?: string;
  now?: () => Date;
}

export const USAGE = [
  "Usage: linepatch [--root <dir>] <command> [args]",
  "",
  "Commands:",
  "  apply <file> --patches <json|file> [--dry-run] [--no-backup] [--side-by-side] [--out file.patch]",
  "  preview <file> --patches <json|file> [--side-by-side] [--out file.patch]",
  "  search <pattern> [globs...]",
  "  show <file> [--start n] [--count n] [--stats]",
  "  ls [dir]",
  "  fixes list [--category c] [--search q]",
  "  fixes show|preview|apply <id>",
  "  batch replace <pattern> --with <text> [globs...] [--preview]",
  "  batch search <pattern> [globs...]",
  "  batch analyze [globs...] [--pattern p]...",
  "  undo | redo",
  "  history [--search q] [--summary] [--export file] [--clear]",
  "  restore <file> [--backup path]",
  "  backups list [file] | backups cleanup [--days n]",
  "  config get [key] | config set <key> <value> | config reset",
];

function parseCli(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      root: { type: "string" },
      patches: { type: "string" },
      "dry-run": { type: "boolean" },
      "no-backup": { type: "boolean" },
      "side-by-side": { type: "boolean" },
      out: { type: "string" },
      start: { type: "string" },
      count: { type: "string" },
      stats: { type: "boolean" },
      category: { type: "string" },
      search: { type: "string" },
      with: { type: "string" },
      preview: { type: "boolean" },
      pattern: { type: "string", multiple: true },
      summary: { type: "boolean" },
      export: { type: "string" },
      clear: { type: "boolean" },
      backup: { type: "string" },
      days: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });
}

type CliValues = ReturnType<typeof parseCli>["values"];

function positiveInt(name: string, text: string | undefined, fallback: number): number {
  if (text === undefined) return fallback;
  const n = Number(text);
  if (!Number.isInteger(n) || n < 1) throw new PatchError("ValidationFailed", `--${name} must be a positive integer, got "${text}"`);
  return n;
}

function need(value: string | undefined, what: string): string {
  if (value === undefined || value === "") throw new PatchError("MissingField", `missing ${what}`);
  return value;
}

/** `--patches` takes inline JSON or a path to a JSON file; a single object is a one-item batch. */
async function loadPatches(arg: string | undefined, cwd: string): Promise<PatchRequest[]> {
  const source = need(arg, "--patches");
  const text = /^\s*[[{]/.test(source) ? source : await readFile(path.resolve(cwd, source), "utf8");
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    throw new PatchError("ValidationFailed", `--patches is not valid JSON: ${errorMessage(e)}`);
  }
  const parsed = parsePatchRequests(Array.isArray(data) ? data : [data]);
  if (!parsed.ok) throw new PatchError(parsed.error.code, `patch ${parsed.index + 1}: ${parsed.error.message}`);
  return parsed.value;
}

class Cli {
  constructor(
    private readonly s: PatchSession,
    private readonly io: CliIO,
    private readonly cwd: string
  ) {}

  private print(lines: readonly string[]): void {
    for (const line of lines) this.io.out(line);
  }

  async apply(args: string[], values: CliValues, dryRun: boolean): Promise<number> {
    const file = need(args[0], "file");
    const requests = await loadPatches(values.patches, this.cwd);
    this.print(this.s.renderer.renderPatchQueue(requests));
    // the side-by-side view needs the lines as they were before a write
    const before = values["side-by-side"]
      ? await this.s.workspace.loadFile(file, { maxBytes: this.s.config.maxFileSizeMb * 1024 * 1024 })
      : null;
    const result = dryRun
      ? await this.s.engine.preview(file, requests)
      : values["no-backup"]
        ? await this.applyWithoutBackup(file, requests)
        : await this.s.history.applyAndRecord(file, requests);
    this.print(this.s.renderer.renderApplyResult(result));

    if (before && result.ok) {
      const after = applyPatchRequests(before.lines, requests, this.s.engine.matcher).lines;
      this.print(this.s.renderer.renderSideBySideDiff(before.lines, after, result.filePath));
    } else if (result.diff.length > 0) {
      this.print(this.s.renderer.renderDiff(result.diff));
    }

    if (values.out !== undefined && result.ok) {
      const target = path.resolve(this.cwd, values.out);
      await writePatchFile(target, result.diff);
      this.io.out(`Patch written to ${target}`);
    }
    return result.ok ? 0 : 1;
  }

  private async applyWithoutBackup(file: string, requests: PatchRequest[]): Promise<PatchResult> {
    const result = await this.s.engine.apply(file, requests, { backup: false });
    await this.s.history.record(requests, result);
    return result;
  }

  async search(args: string[]): Promise<number> {
    const pattern = need(args[0], "pattern");
    const globs = args.length > 1 ? args.slice(1) : ["**/*"];
    this.print(this.s.renderer.renderSearchResults(await this.s.batch.search(pattern, globs)));
    return 0;
  }

  async show(args: string[], values: CliValues): Promise<number> {
    const { info, lines } = await this.s.workspace.loadFile(need(args[0], "file"));
    if (values.stats) {
      this.print(this.s.renderer.renderFileStatistics(info, lines));
      return 0;
    }
    const start = positiveInt("start", values.start, 1);
    const count = positiveInt("count", values.count, this.s.config.maxPreviewLines);
    this.print(this.s.renderer.renderFilePreview(info, lines, start, count));
    return 0;
  }

  async ls(args: string[]): Promise<number> {
    const listing = await this.s.workspace.listDirectory(args[0] ?? ".");
    for (const d of listing.directories) this.io.out(`${d.name}/`);
    for (const f of listing.files) this.io.out(`${f.name}  ${f.size}`);
    return 0;
  }

  async fixes(args: string[], values: CliValues): Promise<number> {
    const [sub, id] = args;
    const lib = this.s.library;
    switch (sub ?? "list") {
      case "list": {
        const list = values.search ? lib.search(values.search) : values.category ? lib.byCategory(values.category) : lib.all();
        if (!values.search && !values.category) {
          for (const c of lib.categories()) this.io.out(`${c.label} (${c.id}): ${c.count}`);
          this.io.out("");
        }
        for (const f of list) this.io.out(`${f.id}  [${f.severity}] ${f.name}`);
        return 0;
      }
      case "show": {
        const fix = lib.get(need(id, "fix id"));
        if (!fix) throw new PatchError("ValidationFailed", `Unknown fix: ${id}`);
        this.print([
          `${fix.name} (${fix.id})`,
          fix.description,
          `Category: ${fix.category}  Severity: ${fix.severity}`,
          `Files: ${fix.fileGlobPatterns.join(", ")}`,
          ...this.s.renderer.renderPatchQueue(fix.patches),
        ]);
        return 0;
      }
      case "preview":
      case "apply": {
        const run = sub === "apply" ? await this.s.fixes.apply(need(id, "fix id")) : await this.s.fixes.preview(need(id, "fix id"));
        let changed = 0;
        for (const { result } of run.files) {
          if (!result.ok) continue;
          changed++;
          this.print(this.s.renderer.renderApplyResult(result));
          this.print(this.s.renderer.renderDiff(result.diff));
        }
        this.io.out(`${run.fix.name}: ${changed}/${run.files.length} files ${sub === "apply" ? "patched" : "would change"}`);
        return 0;
      }
      default:
        throw new PatchError("ValidationFailed", `unknown fixes command: ${sub}`);
    }
  }

  async batch(args: string[], values: CliValues): Promise<number> {
    const [sub, ...rest] = args;
    switch (sub) {
      case "search":
        return this.search(rest);
      case "replace": {
        const pattern = need(rest[0], "pattern");
        const replacement = need(values.with, "--with").split(/\r?\n/);
        const globs = rest.length > 1 ? rest.slice(1) : ["**/*"];
        if (values.preview) {
          const previews = await this.s.batch.previewFindReplace(pattern, replacement, globs);
          for (const p of previews) this.print(this.s.renderer.renderDiff(p.diff));
          this.io.out(`${previews.length} files would change`);
          return 0;
        }
        const summary = await this.s.batch.findReplace(pattern, replacement, globs);
        for (const r of summary.results) {
          if (r.changed) this.io.out(`${r.filePath}: ${r.changes} replaced`);
          else if (!r.ok) this.io.err(`${r.filePath}: ${r.error ?? "failed"}`);
        }
        this.io.out(`${summary.changesApplied} replacements in ${summary.filesChanged}/${summary.filesProcessed} files`);
        return summary.results.every((r) => r.ok) ? 0 : 1;
      }
      case "analyze": {
        const globs = rest.length > 0 ? rest : ["**/*"];
        const a = await this.s.batch.analyze(globs, values.pattern ?? []);
        this.io.out(`Files: ${a.files}  Lines: ${a.totalLines}  Bytes: ${a.totalBytes}`);
        for (const [ext, st] of Object.entries(a.byExtension).sort(([x], [y]) => x.localeCompare(y))) {
          this.io.out(`  ${ext}: ${st.files} files, ${st.lines} lines`);
        }
        for (const [p, n] of Object.entries(a.patternCounts)) this.io.out(`  /${p}/: ${n} lines`);
        return 0;
      }
      default:
        throw new PatchError("ValidationFailed", `unknown batch command: ${sub ?? "(none)"}`);
    }
  }

  async undo(): Promise<number> {
    const entry = await this.s.history.undo();
    this.io.out(`Restored ${entry.filePath} from ${path.basename(entry.backupPath ?? "")}`);
    return 0;
  }

  async redo(): Promise<number> {
    const { entry, result } = await this.s.history.redo();
    this.print(this.s.renderer.renderApplyResult(result));
    if (!result.written) this.io.err(`Redo of ${entry.filePath} did not apply`);
    return result.written ? 0 : 1;
  }

  async history(values: CliValues): Promise<number> {
    const h = this.s.history;
    if (values.clear) {
      await h.clear();
      this.io.out("History cleared");
      return 0;
    }
    if (values.export) {
      const target = path.resolve(this.cwd, values.export);
      await h.exportTo(target);
      this.io.out(`History exported to ${target}`);
      return 0;
    }
    if (values.summary) {
      const s = h.sessionSummary();
      this.print([
        `Operations: ${s.totalOperations}`,
        `Files modified: ${s.filesModified}`,
        `Patches: ${s.successfulPatches} applied, ${s.failedPatches} failed`,
        `Undo: ${s.undoAvailable}  Redo: ${s.redoAvailable}`,
      ]);
      return 0;
    }
    const entries = values.search ? h.search(values.search) : h.entries();
    if (entries.length === 0) this.io.out("No history");
    for (const e of [...entries].reverse()) {
      this.io.out(`${e.timestamp}  ${e.filePath}  ${e.successfulCount} applied, ${e.failedCount} failed`);
    }
    return 0;
  }

  async restore(args: string[], values: CliValues): Promise<number> {
    const file = need(args[0], "file");
    if (values.backup) {
      await this.s.backups.restoreFrom(path.resolve(this.cwd, values.backup), file);
      this.io.out(`Restored ${file} from ${path.basename(values.backup)}`);
    } else {
      const b = await this.s.backups.restoreLatest(file);
      this.io.out(`Restored ${file} from ${b.fileName}`);
    }
    return 0;
  }

  async backups(args: string[], values: CliValues): Promise<number> {
    const [sub, file] = args;
    if (sub === "cleanup") {
      const days = positiveInt("days", values.days, this.s.config.backupKeepDays);
      const n = await this.s.backups.cleanupOlderThan(days);
      this.io.out(`Deleted ${n} backups older than ${days} days`);
      return 0;
    }
    if (sub !== undefined && sub !== "list") throw new PatchError("ValidationFailed", `unknown backups command: ${sub}`);
    const list = await this.s.backups.listBackups(file);
    if (list.length === 0) this.io.out("No backups");
    for (const b of list) this.io.out(`${b.fileName}  ${b.size}`);
    return 0;
  }

  async config(args: string[]): Promise<number> {
    const [sub, key, value] = args;
    const root = this.s.workspace.root;
    switch (sub ?? "get") {
      case "get": {
        const keys = key === undefined ? CONFIG_KEYS : [key];
        for (const k of keys) {
          if (!isConfigKey(k)) throw new PatchError("ConfigInvalid", `Unknown config key: ${k}`);
          this.io.out(`${k} = ${String(this.s.config[k])}`);
        }
        return 0;
      }
      case "set": {
        const k = need(key, "config key");
        if (!isConfigKey(k)) throw new PatchError("ConfigInvalid", `Unknown config key: ${k}`);
        const next = await setConfigValue(root, k, parseConfigValue(k, need(value, "config value")));
        this.io.out(`${k} = ${String(next[k])}`);
        return 0;
      }
      case "reset":
        await resetPatchConfig(root);
        this.io.out("Config reset to defaults");
        return 0;
      default:
        throw new PatchError("ValidationFailed", `unknown config command: ${sub}`);
    }
  }
}

export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const io: CliIO = options.io ?? { out: (l) => console.log(l), err: (l) => console.error(l) };
  const cwd = options.cwd ?? process.cwd();

  let parsed: ReturnType<typeof parseCli>;
  try {
    parsed = parseCli(argv);
  } catch (e) {
    io.err(`error: ${errorMessage(e)}`);
    return 2;
  }
  const { values, positionals } = parsed;
  const [command, ...args] = positionals;
  if (values.help || command === undefined || command === "help") {
    for (const line of USAGE) io.out(line);
    return command === undefined && !values.help ? 2 : 0;
  }

  try {
    const session = await openSession(path.resolve(cwd, values.root ?? "."), { color: options.color, now: options.now });
    const cli = new Cli(session, io, cwd);
    switch (command) {
      case "apply":
        return await cli.apply(args, values, values["dry-run"] ?? false);
      case "preview":
        return await cli.apply(args, values, true);
      case "search":
        return await cli.search(args);
      case "show":
        return await cli.show(args, values);
      case "ls":
        return await cli.ls(args);
      case "fixes":
        return await cli.fixes(args, values);
      case "batch":
        return await cli.batch(args, values);
      case "undo":
        return await cli.undo();
      case "redo":
        return await cli.redo();
      case "history":
        return await cli.history(values);
      case "restore":
        return await cli.restore(args, values);
      case "backups":
        return await cli.backups(args, values);
      case "config":
        return await cli.config(args);
      default:
        io.err(`error: unknown command: ${command}`);
        return 2;
    }
  } catch (e) {
    io.err(`error: ${errorMessage(e)}`);
    return 1;
  }
}
