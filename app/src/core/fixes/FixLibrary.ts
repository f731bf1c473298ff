/**
 * FixLibrary: predefined fix bundles. Built-ins ship as builtinFixes.json;
 * user bundles are JSON files in .linepatch/fixes/. Both are data only.
 */

import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { PatchError, errorMessage } from "../patch/errors";
import type { PatchRequest } from "../patch/PatchRequest";
import { parsePatchRequests } from "../patch/PatchRequest";
import type { FixSeverity, PredefinedFix } from "../types";
import type { WorkspaceService } from "../workspace/WorkspaceService";
import builtinFixes from "./builtinFixes.json";

export const FIXES_DIR = "fixes";

const fixSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(""),
  category: z.string().min(1).default("custom"),
  severity: z.enum(["low", "medium", "high", "critical"]).default("medium"),
  fileGlobPatterns: z.array(z.string()).min(1).default(["**/*"]),
  patches: z.array(z.unknown()).min(1),
  author: z.string().optional(),
  version: z.string().optional(),
});

export interface CustomFixInput {
  name: string;
  description: string;
  patches: PatchRequest[];
  category?: string;
  severity?: FixSeverity;
  fileGlobPatterns?: string[];
  author?: string;
  version?: string;
}

export interface FixCategory {
  id: string;
  label: string;
  count: number;
}

/** code_quality -> Code Quality */
export function categoryLabel(category: string): string {
  return category
    .split("_")
    .filter(Boolean)
    .map((w) => w[0].toUpperCase() + w.slice(1))
    .join(" ");
}

export function fixIdFromName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, "_");
}

/** Validate one bundle from an untyped source. */
export function parseFix(raw: unknown): { ok: true; value: PredefinedFix } | { ok: false; error: PatchError } {
  const shape = fixSchema.safeParse(raw);
  if (!shape.success) {
    const issue = shape.error.issues[0];
    const where = issue?.path.join(".") || "fix";
    return { ok: false, error: new PatchError("ValidationFailed", `${where}: ${issue?.message ?? "invalid value"}`) };
  }
  const patches = parsePatchRequests(shape.data.patches);
  if (!patches.ok) {
    return {
      ok: false,
      error: new PatchError("ValidationFailed", `${shape.data.id} patch ${patches.index + 1}: ${patches.error.message}`),
    };
  }
  return { ok: true, value: { ...shape.data, patches: patches.value } };
}

export class FixLibrary {
  private fixes = new Map<string, PredefinedFix>();
  private custom = new Set<string>();

  constructor(private readonly workspace: WorkspaceService) {}

  get directory(): string {
    return path.join(this.workspace.stateDir, FIXES_DIR);
  }

  /** Load built-ins, then user bundles; a user bundle replaces a built-in with the same id. */
  async load(): Promise<void> {
    this.fixes.clear();
    this.custom.clear();
    for (const raw of builtinFixes) {
      const r = parseFix(raw);
      if (r.ok) this.fixes.set(r.value.id, r.value);
      else console.warn(`[FixLibrary] skipping built-in fix: ${r.error.message}`);
    }

    let names: string[];
    try {
      names = (await readdir(this.directory)).filter((n) => n.endsWith(".json")).sort();
    } catch {
      return;
    }
    for (const name of names) {
      let data: unknown;
      try {
        data = JSON.parse(await readFile(path.join(this.directory, name), "utf8"));
      } catch (e) {
        console.warn(`[FixLibrary] could not read ${name}: ${errorMessage(e)}`);
        continue;
      }
      for (const raw of Array.isArray(data) ? data : [data]) {
        const r = parseFix(raw);
        if (!r.ok) {
          console.warn(`[FixLibrary] skipping ${name}: ${r.error.message}`);
          continue;
        }
        this.fixes.set(r.value.id, r.value);
        this.custom.add(r.value.id);
      }
    }
  }

  all(): PredefinedFix[] {
    return [...this.fixes.values()];
  }

  get(id: string): PredefinedFix | null {
    return this.fixes.get(id) ?? null;
  }

  isCustom(id: string): boolean {
    return this.custom.has(id);
  }

  categories(): FixCategory[] {
    const counts = new Map<string, number>();
    for (const f of this.fixes.values()) counts.set(f.category, (counts.get(f.category) ?? 0) + 1);
    return [...counts.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([id, count]) => ({ id, label: categoryLabel(id), count }));
  }

  byCategory(category: string): PredefinedFix[] {
    return this.all().filter((f) => f.category === category);
  }

  /** Case-insensitive match on id, name, description or category. */
  search(query: string): PredefinedFix[] {
    const q = query.toLowerCase();
    return this.all().filter((f) =>
      [f.id, f.name, f.description, f.category].some((field) => field.toLowerCase().includes(q))
    );
  }

  createCustom(input: CustomFixInput): PredefinedFix {
    const id = fixIdFromName(input.name);
    if (!id) throw new PatchError("ValidationFailed", "fix name must not be empty");
    if (input.patches.length === 0) throw new PatchError("ValidationFailed", `${id}: a fix needs at least one patch`);
    const fix: PredefinedFix = {
      id,
      name: input.name.trim(),
      description: input.description,
      category: input.category ?? "custom",
      severity: input.severity ?? "medium",
      fileGlobPatterns: input.fileGlobPatterns ?? ["**/*"],
      patches: [...input.patches],
      author: input.author ?? "User",
      version: input.version ?? "1.0",
    };
    this.fixes.set(id, fix);
    this.custom.add(id);
    return fix;
  }

  /** Write a bundle to .linepatch/fixes/<id>.json; returns the file path. */
  async saveCustom(id: string): Promise<string> {
    const fix = this.get(id);
    if (!fix) throw new PatchError("ValidationFailed", `Unknown fix: ${id}`);
    await mkdir(this.directory, { recursive: true });
    const file = path.join(this.directory, `${id}.json`);
    await writeFile(file, JSON.stringify(fix, null, 2) + "\n", "utf8");
    return file;
  }
}
