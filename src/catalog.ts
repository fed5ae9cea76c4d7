import fs from "node:fs";
import path from "node:path";
import { randomBytes } from "node:crypto";
import type { CatalogStore, ProjectRecord } from "./types.ts";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object";
}

function asString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

export function toProjectRecord(value: unknown): ProjectRecord | null {
  if (!isObject(value) || Array.isArray(value)) return null;
  return {
    name: asString(value.name),
    path: asString(value.path),
    command: asString(value.command),
    link: asString(value.link),
    category: asString(value.category),
  };
}

/**
 * Reads the catalog file. A missing, unreadable or malformed file yields an
 * empty catalog rather than an error; entries that are not objects are dropped.
 */
export function loadCatalog(filePath: string): ProjectRecord[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, { encoding: "utf8" }));
  } catch {
    return [];
  }
  if (!Array.isArray(parsed)) return [];

  const records: ProjectRecord[] = [];
  for (const entry of parsed) {
    const record = toProjectRecord(entry);
    if (record) records.push(record);
  }
  return records;
}

export function writeCatalog(filePath: string, records: readonly ProjectRecord[]): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const ordered = records.map((r) => ({
    name: r.name,
    path: r.path,
    command: r.command,
    link: r.link,
    category: r.category,
  }));
  const tmpPath = `${filePath}.tmp-${process.pid}-${Date.now()}-${randomBytes(3).toString("hex")}`;
  try {
    fs.writeFileSync(tmpPath, JSON.stringify(ordered, null, 2) + "\n", { encoding: "utf8" });
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
}

export function createFileCatalogStore(filePath: string): CatalogStore {
  return {
    load: () => loadCatalog(filePath),
    save: (records) => writeCatalog(filePath, records),
  };
}
