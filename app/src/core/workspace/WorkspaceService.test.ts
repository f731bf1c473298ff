import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { WorkspaceService, detectLanguage } from "./WorkspaceService";

describe("WorkspaceService", () => {
  let root: string;
  let ws: WorkspaceService;

  const put = async (rel: string, content: string) => {
    const abs = path.join(root, rel);
    await mkdir(path.dirname(abs), { recursive: true });
    await writeFile(abs, content);
  };

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "linepatch-ws-"));
    ws = new WorkspaceService(root);
    await put("src/a.py", "print(1)\n");
    await put("src/b.js", "x\r\ny");
    await put("README.md", "# hi\n");
    await put(".env", "SECRET=test-secret\n");
    await put(".hidden/x.py", "pass\n");
    await put("node_modules/m/index.js", "module.exports = 1;\n");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("resolves and relativizes paths against the root", () => {
    expect(ws.resolvePath("src/a.py")).toBe(path.join(root, "src", "a.py"));
    expect(ws.relativePath(path.join(root, "src", "a.py"))).toBe("src/a.py");
    expect(ws.relativePath(root)).toBe(".");
    expect(ws.relativePath("/elsewhere/f.txt")).toBe("/elsewhere/f.txt");
    expect(ws.resolvePath("~/notes.txt")).toBe(path.join(os.homedir(), "notes.txt"));
  });

  it("loads a file with metadata", async () => {
    const { info, lines } = await ws.loadFile("src/a.py");
    expect(lines).toEqual(["print(1)"]);
    expect(info).toMatchObject({
      relativePath: "src/a.py",
      size: 9,
      lineCount: 1,
      extension: ".py",
      language: "python",
      hash: "dee5c46989f5ec092311188f4fe829c3",
      format: { eol: "\n", trailingNewline: true },
    });
  });

  it("reads CRLF files without a final newline", async () => {
    const { info, lines } = await ws.loadFile("src/b.js");
    expect(lines).toEqual(["x", "y"]);
    expect(info.format).toEqual({ eol: "\r\n", trailingNewline: false });
  });

  it("raises FileNotFound for a missing file and ReadFailure for a directory", async () => {
    await expect(ws.loadFile("missing.txt")).rejects.toMatchObject({
      code: "FileNotFound",
      message: "File not found: missing.txt",
    });
    await expect(ws.loadFile("src")).rejects.toMatchObject({ code: "ReadFailure", message: "Not a file: src" });
    await expect(ws.readText("nope")).rejects.toMatchObject({ code: "FileNotFound" });
  });

  it("rejects bytes that are not valid UTF-8", async () => {
    await writeFile(path.join(root, "latin1.txt"), Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x0a, 0x78, 0x0a]));
    await expect(ws.loadFile("latin1.txt")).rejects.toMatchObject({
      code: "ReadFailure",
      message: "latin1.txt is not valid UTF-8",
    });
  });

  it("keeps a leading byte order mark in the first line", async () => {
    await writeFile(path.join(root, "bom.txt"), Buffer.from([0xef, 0xbb, 0xbf, 0x61, 0x0a]));
    const { lines } = await ws.loadFile("bom.txt");
    expect(lines).toEqual(["\uFEFFa"]);
  });

  it("refuses files over maxBytes before reading them", async () => {
    await expect(ws.loadFile("src/a.py", { maxBytes: 8 })).rejects.toMatchObject({
      code: "ReadFailure",
      message: "src/a.py is too large: 9 bytes exceeds the 8 byte limit",
    });
    expect((await ws.loadFile("src/a.py", { maxBytes: 9 })).lines).toEqual(["print(1)"]);
  });

  it("writes lines back in the given format, creating directories", async () => {
    await ws.writeLines("out/new.txt", ["a", "b"], { eol: "\r\n", trailingNewline: true });
    expect(await ws.readText("out/new.txt")).toBe("a\r\nb\r\n");
    expect(await ws.isFile("out/new.txt")).toBe(true);
    expect(await ws.isFile("out")).toBe(false);
    expect(await ws.exists("out")).toBe(true);
  });

  it("lists a directory without hidden entries", async () => {
    const listing = await ws.listDirectory();
    expect(listing.path).toBe(".");
    expect(listing.directories.map((d) => d.name)).toEqual(["node_modules", "src"]);
    expect(listing.files).toEqual([{ name: "README.md", isDir: false, size: 5 }]);

    ws.showHiddenFiles = true;
    const shown = (await ws.listDirectory()).files.map((f) => f.name);
    expect([...shown].sort()).toEqual([".env", "README.md"]);
  });

  it("walks files skipping ignored and hidden directories", async () => {
    expect(await ws.walkFiles()).toEqual(["README.md", "src/a.py", "src/b.js"]);
    expect(await ws.walkFiles("src")).toEqual(["src/a.py", "src/b.js"]);
  });

  it("finds files by basename and path globs", async () => {
    expect(await ws.findFiles(["*.py"])).toEqual(["src/a.py"]);
    expect(await ws.findFiles(["src/*.js", "*.md"])).toEqual(["README.md", "src/b.js"]);
    expect(await ws.findFiles([])).toEqual([]);

    ws.showHiddenFiles = true;
    expect(await ws.findFiles(["*.py"])).toEqual([".hidden/x.py", "src/a.py"]);
  });

  it("keeps a short most-recent-first history without duplicates", () => {
    ws.addToHistory("a.txt");
    ws.addToHistory("b.txt");
    ws.addToHistory(path.join(root, "a.txt"));
    expect(ws.history()).toEqual(["a.txt", "b.txt"]);
    for (let i = 0; i < 12; i++) ws.addToHistory(`f${i}.txt`);
    expect(ws.history()).toHaveLength(10);
    expect(ws.history()[0]).toBe("f11.txt");
  });
});

describe("detectLanguage", () => {
  it("maps known extensions case-insensitively and falls back to text", () => {
    expect(detectLanguage("x.TSX")).toBe("typescript");
    expect(detectLanguage("Makefile")).toBe("text");
  });
});
