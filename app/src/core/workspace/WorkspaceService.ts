/**
 * Workspace service: resolve paths under a root, read files as line buffers,
 * write them back, list directories and find files by glob.
 * All patch writes go through PatchEngine, which calls writeLines here.
 */

import { createHash } from "node:crypto";
import { mkdir, readdir, readFile, stat, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";
import { minimatch } from "minimatch";
import { PatchError, errorMessage, toError } from "../patch/errors";
import type { DirEntry, DirectoryListing, FileInfo, LineFormat, LoadedFile } from "../types";
import { joinLines, splitLines } from "./lineBuffer";

export const STATE_DIR = ".linepatch";

const HARD_IGNORES = new Set([
  "node_modules", "dist", "build", "out", ".git", ".next", ".nuxt",
  "target", "bin", "obj", "__pycache__", ".venv", STATE_DIR,
]);
const MAX_TREE_DEPTH = 20;
const MAX_HISTORY = 10;

const LANGUAGES: Record<string, string> = {
  ".py": "python",
  ".js": "javascript", ".jsx": "javascript", ".mjs": "javascript", ".cjs": "javascript",
  ".ts": "typescript", ".tsx": "typescript", ".mts": "typescript", ".cts": "typescript",
  ".java": "java",
  ".cpp": "cpp", ".cc": "cpp", ".cxx": "cpp", ".hpp": "cpp",
  ".c": "c", ".h": "c",
  ".html": "html", ".htm": "html",
  ".css": "css", ".scss": "css", ".less": "css",
  ".md": "markdown", ".markdown": "markdown",
  ".json": "json",
  ".xml": "xml",
  ".yaml": "yaml", ".yml": "yaml",
  ".sql": "sql",
  ".sh": "bash", ".bash": "bash",
  ".php": "php",
  ".rb": "ruby",
  ".go": "go",
  ".rs": "rust",
};

export function detectLanguage(filePath: string): string {
  return LANGUAGES[path.extname(filePath).toLowerCase()] ?? "text";
}

export function toPosix(p: string): string {
  return p.replace(/\\/g, "/");
}

function isMissing(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}

// ignoreBOM keeps a leading BOM in the text so a rewrite preserves it.
const strictUtf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export interface LoadFileOptions {
  /** Refuse files larger than this many bytes. */
  maxBytes?: number;
}

export interface WorkspaceOptions {
  showHiddenFiles?: boolean;
}

export class WorkspaceService {
  private readonly _root: string;
  private _history: string[] = [];
  showHiddenFiles: boolean;

  constructor(root: string, options: WorkspaceOptions = {}) {
    this._root = path.resolve(root);
    this.showHiddenFiles = options.showHiddenFiles ?? false;
  }

  get root(): string {
    return this._root;
  }

  get stateDir(): string {
    return path.join(this._root, STATE_DIR);
  }

  /** Absolute paths and ~ pass through; anything else is relative to the root. */
  resolvePath(p: string): string {
    if (p === "~" || p.startsWith("~/")) return path.join(homedir(), p.slice(1));
    return path.isAbsolute(p) ? path.normalize(p) : path.resolve(this._root, p);
  }

  /** Root-relative, forward slashes. Paths outside the root stay absolute. */
  relativePath(p: string): string {
    const abs = this.resolvePath(p);
    const rel = path.relative(this._root, abs);
    if (rel === "") return ".";
    if (rel.startsWith("..") || path.isAbsolute(rel)) return toPosix(abs);
    return toPosix(rel);
  }

  async exists(p: string): Promise<boolean> {
    try {
      await stat(this.resolvePath(p));
      return true;
    } catch {
      return false;
    }
  }

  async isFile(p: string): Promise<boolean> {
    try {
      return (await stat(this.resolvePath(p))).isFile();
    } catch {
      return false;
    }
  }

  async readText(p: string): Promise<string> {
    const abs = this.resolvePath(p);
    try {
      return await readFile(abs, "utf8");
    } catch (e) {
      if (isMissing(e)) throw new PatchError("FileNotFound", `File not found: ${this.relativePath(p)}`, toError(e));
      throw new PatchError("ReadFailure", `Could not read ${this.relativePath(p)}: ${errorMessage(e)}`, toError(e));
    }
  }

  /**
   * Read a file as a line buffer plus metadata.
   * Files over `maxBytes` are refused before they are read. Bytes that are not
   * valid UTF-8 raise ReadFailure rather than decoding to U+FFFD.
   */
  async loadFile(p: string, options: LoadFileOptions = {}): Promise<LoadedFile> {
    const abs = this.resolvePath(p);
    const rel = this.relativePath(p);
    let raw: Buffer;
    let size: number;
    let modifiedAt: string;
    try {
      const st = await stat(abs);
      if (!st.isFile()) throw new PatchError("ReadFailure", `Not a file: ${rel}`);
      if (options.maxBytes !== undefined && st.size > options.maxBytes) {
        throw new PatchError(
          "ReadFailure",
          `${rel} is too large: ${st.size} bytes exceeds the ${options.maxBytes} byte limit`
        );
      }
      raw = await readFile(abs);
      size = st.size;
      modifiedAt = st.mtime.toISOString();
    } catch (e) {
      if (e instanceof PatchError) throw e;
      if (isMissing(e)) throw new PatchError("FileNotFound", `File not found: ${rel}`, toError(e));
      throw new PatchError("ReadFailure", `Could not read ${rel}: ${errorMessage(e)}`, toError(e));
    }

    let text: string;
    try {
      text = strictUtf8.decode(raw);
    } catch (e) {
      throw new PatchError("ReadFailure", `${rel} is not valid UTF-8`, toError(e));
    }

    const { lines, format } = splitLines(text);
    const info: FileInfo = {
      path: abs,
      relativePath: this.relativePath(abs),
      size,
      lineCount: lines.length,
      extension: path.extname(abs).toLowerCase(),
      language: detectLanguage(abs),
      hash: createHash("md5").update(raw).digest("hex"),
      modifiedAt,
      format,
    };
    return { info, lines };
  }

  async writeText(p: string, content: string): Promise<void> {
    const abs = this.resolvePath(p);
    await mkdir(path.dirname(abs), { recursive: true });
    await writeFile(abs, content, "utf8");
  }

  async writeLines(p: string, lines: readonly string[], format: LineFormat): Promise<void> {
    await this.writeText(p, joinLines(lines, format));
  }

  private _hidden(name: string): boolean {
    return name.startsWith(".") && !this.showHiddenFiles;
  }

  async listDirectory(relPath = "."): Promise<DirectoryListing> {
    const abs = this.resolvePath(relPath);
    const entries = await readdir(abs, { withFileTypes: true });
    const directories: DirEntry[] = [];
    const files: DirEntry[] = [];

    for (const e of entries) {
      if (this._hidden(e.name)) continue;
      if (e.isDirectory()) {
        directories.push({ name: e.name, isDir: true, size: 0 });
      } else if (e.isFile()) {
        let size = 0;
        try {
          size = (await stat(path.join(abs, e.name))).size;
        } catch (err) {
          console.warn(`[WorkspaceService] stat failed for ${e.name}: ${errorMessage(err)}`);
        }
        files.push({ name: e.name, isDir: false, size });
      }
    }

    const byName = (a: DirEntry, b: DirEntry) => a.name.localeCompare(b.name);
    return { path: this.relativePath(abs), directories: directories.sort(byName), files: files.sort(byName) };
  }

  /** Every file under `baseDir`, root-relative, skipping ignored and hidden directories. */
  async walkFiles(baseDir = "."): Promise<string[]> {
    const out: string[] = [];
    const walk = async (abs: string, depth: number): Promise<void> => {
      if (depth > MAX_TREE_DEPTH) return;
      const entries = await readdir(abs, { withFileTypes: true });
      for (const e of entries) {
        const child = path.join(abs, e.name);
        if (e.isDirectory()) {
          if (HARD_IGNORES.has(e.name) || this._hidden(e.name)) continue;
          await walk(child, depth + 1);
        } else if (e.isFile()) {
          out.push(this.relativePath(child));
        }
      }
    };
    await walk(this.resolvePath(baseDir), 0);
    return out.sort();
  }

  /**
   * Files under `baseDir` whose root-relative path matches any glob.
   * Globs without a slash match the basename anywhere (`*.py`).
   */
  async findFiles(globs: readonly string[], baseDir = "."): Promise<string[]> {
    if (globs.length === 0) return [];
    const all = await this.walkFiles(baseDir);
    return all.filter((rel) => globs.some((g) => minimatch(rel, g, { matchBase: true, dot: this.showHiddenFiles })));
  }

  addToHistory(p: string): void {
    const rel = this.relativePath(p);
    this._history = [rel, ...this._history.filter((h) => h !== rel)].slice(0, MAX_HISTORY);
  }

  history(): string[] {
    return [...this._history];
  }
}
