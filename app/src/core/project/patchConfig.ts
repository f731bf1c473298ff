/**
 * Read/write workspace config at .linepatch/config.json
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { PatchError, errorMessage } from "../patch/errors";
import type { PatchConfig } from "../types";

export const CONFIG_PATH = ".linepatch/config.json";

export const DEFAULT_CONFIG: Readonly<PatchConfig> = {
  autoBackup: true,
  confirmApplications: true,
  maxPreviewLines: 50,
  enableSyntaxHints: true,
  backupKeepDays: 30,
  showHiddenFiles: false,
  enableAdvancedFeatures: false,
  backupRotationCount: 10,
  diffContextLines: 3,
  requireBackup: false,
  maxFileSizeMb: 10,
};

const intIn = (min: number, max: number) => z.number().int().min(min).max(max);

export type ConfigKey = keyof PatchConfig;

const fieldSchemas: { [K in ConfigKey]: z.ZodType<PatchConfig[K]> } = {
  autoBackup: z.boolean(),
  confirmApplications: z.boolean(),
  maxPreviewLines: intIn(10, 200),
  enableSyntaxHints: z.boolean(),
  backupKeepDays: intIn(1, 365),
  showHiddenFiles: z.boolean(),
  enableAdvancedFeatures: z.boolean(),
  backupRotationCount: intIn(1, 100),
  diffContextLines: intIn(0, 20),
  requireBackup: z.boolean(),
  maxFileSizeMb: intIn(1, 1000),
};

export const CONFIG_KEYS = Object.keys(DEFAULT_CONFIG).filter(isConfigKey);

export function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(fieldSchemas, key);
}

function configFile(workspaceRoot: string): string {
  return path.join(workspaceRoot, CONFIG_PATH);
}

function pick<K extends ConfigKey>(key: K, raw: unknown): PatchConfig[K] {
  if (raw === undefined) return DEFAULT_CONFIG[key];
  const schema: z.ZodType<PatchConfig[K]> = fieldSchemas[key];
  const r = schema.safeParse(raw);
  if (r.success) return r.data;
  console.warn(`[patchConfig] invalid ${key} (${JSON.stringify(raw)}), using default ${DEFAULT_CONFIG[key]}`);
  return DEFAULT_CONFIG[key];
}

/** Merge a parsed JSON object over the defaults; bad values fall back one by one. */
export function normalizePatchConfig(data: unknown): PatchConfig {
  const obj: Record<string, unknown> = typeof data === "object" && data !== null && !Array.isArray(data) ? { ...data } : {};
  return {
    autoBackup: pick("autoBackup", obj.autoBackup),
    confirmApplications: pick("confirmApplications", obj.confirmApplications),
    maxPreviewLines: pick("maxPreviewLines", obj.maxPreviewLines),
    enableSyntaxHints: pick("enableSyntaxHints", obj.enableSyntaxHints),
    backupKeepDays: pick("backupKeepDays", obj.backupKeepDays),
    showHiddenFiles: pick("showHiddenFiles", obj.showHiddenFiles),
    enableAdvancedFeatures: pick("enableAdvancedFeatures", obj.enableAdvancedFeatures),
    backupRotationCount: pick("backupRotationCount", obj.backupRotationCount),
    diffContextLines: pick("diffContextLines", obj.diffContextLines),
    requireBackup: pick("requireBackup", obj.requireBackup),
    maxFileSizeMb: pick("maxFileSizeMb", obj.maxFileSizeMb),
  };
}

export async function readPatchConfig(workspaceRoot: string): Promise<PatchConfig> {
  let raw: string;
  try {
    raw = await readFile(configFile(workspaceRoot), "utf8");
  } catch {
    return { ...DEFAULT_CONFIG };
  }
  try {
    return normalizePatchConfig(JSON.parse(raw));
  } catch (e) {
    console.warn(`[patchConfig] ${CONFIG_PATH} is not valid JSON, using defaults: ${errorMessage(e)}`);
    return { ...DEFAULT_CONFIG };
  }
}

export async function writePatchConfig(workspaceRoot: string, config: PatchConfig): Promise<void> {
  const file = configFile(workspaceRoot);
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, JSON.stringify(config, null, 2) + "\n", "utf8");
}

/**
 * Coerce a CLI string into the key's type: "true"/"false" for flags, integers
 * for counts.
 */
export function parseConfigValue(key: ConfigKey, text: string): PatchConfig[ConfigKey] {
  const expected = typeof DEFAULT_CONFIG[key];
  if (expected === "boolean") {
    if (text === "true") return true;
    if (text === "false") return false;
    throw new PatchError("ConfigInvalid", `${key} must be true or false, got "${text}"`);
  }
  const n = Number(text);
  if (text.trim() === "" || !Number.isFinite(n)) {
    throw new PatchError("ConfigInvalid", `${key} must be a number, got "${text}"`);
  }
  return n;
}

/** Validate and persist one setting. Throws ConfigInvalid on a bad key or value. */
export async function setConfigValue(workspaceRoot: string, key: string, value: unknown): Promise<PatchConfig> {
  if (!isConfigKey(key)) throw new PatchError("ConfigInvalid", `Unknown config key: ${key}`);
  const schema: z.ZodType<PatchConfig[ConfigKey]> = fieldSchemas[key];
  const r = schema.safeParse(value);
  if (!r.success) {
    const issue = r.error.issues[0];
    throw new PatchError("ConfigInvalid", `Invalid value for ${key}: ${issue ? issue.message : "rejected"}`);
  }
  const current = await readPatchConfig(workspaceRoot);
  const next = normalizePatchConfig({ ...current, [key]: r.data });
  await writePatchConfig(workspaceRoot, next);
  return next;
}

export async function resetPatchConfig(workspaceRoot: string): Promise<PatchConfig> {
  const config = { ...DEFAULT_CONFIG };
  await writePatchConfig(workspaceRoot, config);
  return config;
}
