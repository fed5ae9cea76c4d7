import type { ProjectRecord } from "./types.ts";
import type { ColumnId, ColumnLayout } from "./layout.ts";

export const UNCATEGORIZED = "N/A";
export const HEADER_SENTINEL = -1;
export const HEADER_ICON = "📂";

export type DisplayRow =
  | { kind: "header"; category: string; cells: string[] }
  | { kind: "record"; sortedIndex: number; cells: string[] };

export type Projection = {
  rows: DisplayRow[];
  // Per display row: position in the sorted copy, or HEADER_SENTINEL.
  indexMap: number[];
};

export function displayCategory(record: ProjectRecord): string {
  return record.category === "" ? UNCATEGORIZED : record.category;
}

function categoryKey(record: ProjectRecord): string {
  return displayCategory(record).toLowerCase();
}

function isUncategorized(record: ProjectRecord): boolean {
  return categoryKey(record) === UNCATEGORIZED.toLowerCase();
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Category (uncategorized last), then name; both case-insensitive. */
export function compareRecords(a: ProjectRecord, b: ProjectRecord): number {
  const aLast = isUncategorized(a);
  const bLast = isUncategorized(b);
  if (aLast !== bLast) return aLast ? 1 : -1;

  const byCategory = compareText(categoryKey(a), categoryKey(b));
  if (byCategory !== 0) return byCategory;
  return compareText(a.name.toLowerCase(), b.name.toLowerCase());
}

// Array.prototype.sort is stable, so equal keys keep catalog order.
export function sortRecords(records: readonly ProjectRecord[]): ProjectRecord[] {
  return records.slice().sort(compareRecords);
}

export function sameIdentity(a: ProjectRecord, b: ProjectRecord): boolean {
  return a.name === b.name && a.path === b.path && a.command === b.command;
}

export function cellValue(record: ProjectRecord, column: ColumnId): string {
  switch (column) {
    case "name":
      return record.name;
    case "path":
      return record.path;
    case "command":
      return record.command;
    case "category":
      return displayCategory(record);
    case "link":
      return record.link;
  }
}

export function buildProjection(records: readonly ProjectRecord[], layout: ColumnLayout): Projection {
  const sorted = sortRecords(records);
  const rows: DisplayRow[] = [];
  const indexMap: number[] = [];

  let lastKey: string | null = null;
  sorted.forEach((record, sortedIndex) => {
    const key = categoryKey(record);
    if (key !== lastKey) {
      const category = displayCategory(record);
      const cells = layout.columns.map((_, i) => (i === 0 ? `${HEADER_ICON} ${category}` : ""));
      rows.push({ kind: "header", category, cells });
      indexMap.push(HEADER_SENTINEL);
      lastKey = key;
    }

    rows.push({
      kind: "record",
      sortedIndex,
      cells: layout.columns.map((c) => cellValue(record, c.id)),
    });
    indexMap.push(sortedIndex);
  });

  return { rows, indexMap };
}
