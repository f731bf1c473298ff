import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  CONFIG_KEYS,
  DEFAULT_CONFIG,
  normalizePatchConfig,
  parseConfigValue,
  readPatchConfig,
  resetPatchConfig,
  setConfigValue,
} from "./patchConfig";

describe("patchConfig", () => {
  let root: string;
  const configFile = () => path.join(root, ".linepatch", "config.json");

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "linepatch-config-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it("uses defaults when no config file exists", async () => {
    expect(await readPatchConfig(root)).toEqual(DEFAULT_CONFIG);
    expect(CONFIG_KEYS).toHaveLength(11);
  });

  it("falls back per key for invalid values", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const config = normalizePatchConfig({ autoBackup: false, maxPreviewLines: 5, diffContextLines: "3", extra: 1 });
    expect(config).toEqual({ ...DEFAULT_CONFIG, autoBackup: false });
    expect(warn).toHaveBeenCalledWith("[patchConfig] invalid maxPreviewLines (5), using default 50");
    expect(warn).toHaveBeenCalledWith('[patchConfig] invalid diffContextLines ("3"), using default 3');
  });

  it("uses defaults for unparseable JSON", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    await mkdir(path.dirname(configFile()), { recursive: true });
    await writeFile(configFile(), "{ not json");
    expect(await readPatchConfig(root)).toEqual(DEFAULT_CONFIG);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("sets, persists and resets one value", async () => {
    const next = await setConfigValue(root, "backupRotationCount", 3);
    expect(next.backupRotationCount).toBe(3);
    expect((await readPatchConfig(root)).backupRotationCount).toBe(3);
    expect(JSON.parse(await readFile(configFile(), "utf8"))).toEqual({ ...DEFAULT_CONFIG, backupRotationCount: 3 });

    expect(await resetPatchConfig(root)).toEqual(DEFAULT_CONFIG);
    expect((await readPatchConfig(root)).backupRotationCount).toBe(10);
  });

  it("rejects unknown keys and out-of-range values", async () => {
    await expect(setConfigValue(root, "colour", true)).rejects.toMatchObject({
      code: "ConfigInvalid",
      message: "Unknown config key: colour",
    });
    await expect(setConfigValue(root, "maxPreviewLines", 5)).rejects.toMatchObject({
      code: "ConfigInvalid",
      message: "Invalid value for maxPreviewLines: Number must be greater than or equal to 10",
    });
    await expect(setConfigValue(root, "autoBackup", "yes")).rejects.toMatchObject({ code: "ConfigInvalid" });
  });

  it("bounds the file size limit", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(DEFAULT_CONFIG.maxFileSizeMb).toBe(10);
    expect(normalizePatchConfig({ maxFileSizeMb: 0 }).maxFileSizeMb).toBe(10);
    expect(warn).toHaveBeenCalledWith("[patchConfig] invalid maxFileSizeMb (0), using default 10");
    expect((await setConfigValue(root, "maxFileSizeMb", 250)).maxFileSizeMb).toBe(250);
    await expect(setConfigValue(root, "maxFileSizeMb", 1001)).rejects.toMatchObject({
      message: "Invalid value for maxFileSizeMb: Number must be less than or equal to 1000",
    });
  });

  it("parses CLI strings by the key's type", () => {
    expect(parseConfigValue("autoBackup", "false")).toBe(false);
    expect(parseConfigValue("diffContextLines", "5")).toBe(5);
    expect(() => parseConfigValue("autoBackup", "no")).toThrow('autoBackup must be true or false, got "no"');
    expect(() => parseConfigValue("diffContextLines", "")).toThrow('diffContextLines must be a number, got ""');
  });
});
