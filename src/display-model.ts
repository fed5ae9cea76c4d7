import type { CatalogStore, FieldOrdinal, ProjectRecord } from "./types.ts";
import { fieldKey } from "./types.ts";
import { computeColumnLayout, maxScrollOffset, type ColumnLayout } from "./layout.ts";
import { buildProjection, HEADER_SENTINEL, sameIdentity, sortRecords, type Projection } from "./projection.ts";

export type Viewport = {
  width: number;
  height: number;
  scrollOffset: number;
};

export const DEFAULT_VIEWPORT: Viewport = { width: 100, height: 24, scrollOffset: 0 };

/**
 * Owns the catalog and the projection derived from it.
 *
 * Display rows never address the catalog directly: headers are interleaved and
 * the rows are re-sorted, so every row-addressed lookup goes through the index
 * map and then back to the catalog by (name, path, command). Two records that
 * share all three resolve to the first one in catalog order.
 */
export class DisplayModel {
  private records: ProjectRecord[];
  private store: CatalogStore;
  private viewport: Viewport;
  private currentLayout: ColumnLayout;
  private currentProjection: Projection;
  private saveError: Error | null = null;

  constructor(store: CatalogStore, viewport: Viewport = DEFAULT_VIEWPORT) {
    this.store = store;
    this.records = store.load();
    this.viewport = { ...viewport };
    this.currentLayout = this.computeLayout();
    this.currentProjection = buildProjection(this.records, this.currentLayout);
  }

  get catalog(): readonly ProjectRecord[] {
    return this.records;
  }

  get projection(): Projection {
    return this.currentProjection;
  }

  get layout(): ColumnLayout {
    return this.currentLayout;
  }

  rebuildProjection(): void {
    this.currentProjection = buildProjection(this.records, this.currentLayout);
  }

  recordForDisplayRow(rowIndex: number): ProjectRecord | null {
    const index = this.originalIndexForDisplayRow(rowIndex);
    return index === null ? null : (this.records[index] ?? null);
  }

  originalIndexForDisplayRow(rowIndex: number): number | null {
    const sortedIndex = this.currentProjection.indexMap[rowIndex];
    if (sortedIndex === undefined || sortedIndex === HEADER_SENTINEL) return null;

    const sorted = sortRecords(this.records);
    const target = sorted[sortedIndex];
    if (!target) return null;

    const index = this.records.findIndex((r) => sameIdentity(r, target));
    return index === -1 ? null : index;
  }

  /**
   * Row of a catalog entry. Exact twins keep catalog order through the stable
   * sort, so the n-th twin in the catalog is the n-th matching row.
   */
  displayRowForOriginalIndex(originalIndex: number): number | null {
    const record = this.records[originalIndex];
    if (!record) return null;

    let skip = 0;
    for (let i = 0; i < originalIndex; i++) {
      const other = this.records[i];
      if (other && sameIdentity(other, record)) skip++;
    }

    const sorted = sortRecords(this.records);
    const rows = this.currentProjection.indexMap;
    for (let row = 0; row < rows.length; row++) {
      const sortedIndex = rows[row];
      if (sortedIndex === undefined || sortedIndex === HEADER_SENTINEL) continue;
      const target = sorted[sortedIndex];
      if (!target || !sameIdentity(target, record)) continue;
      if (skip === 0) return row;
      skip--;
    }
    return null;
  }

  addRecord(record: ProjectRecord): number {
    this.records.push({ ...record });
    this.commit();
    return this.records.length - 1;
  }

  deleteRecord(originalIndex: number): ProjectRecord | null {
    if (!this.isValidIndex(originalIndex)) return null;
    const [removed] = this.records.splice(originalIndex, 1);
    this.commit();
    return removed ?? null;
  }

  getField(originalIndex: number, field: FieldOrdinal): string | null {
    const record = this.records[originalIndex];
    return record ? record[fieldKey(field)] : null;
  }

  setField(originalIndex: number, field: FieldOrdinal, value: string): boolean {
    const record = this.records[originalIndex];
    if (!record) return false;
    record[fieldKey(field)] = value;
    this.commit();
    return true;
  }

  reload(): void {
    this.records = this.store.load();
    this.rebuildProjection();
  }

  resize(width: number, height: number): void {
    this.viewport = { ...this.viewport, width, height };
    this.relayout();
  }

  scrollColumns(delta: 1 | -1): boolean {
    const next = this.currentLayout.offset + delta;
    if (next < 0 || next > maxScrollOffset(this.currentLayout)) return false;
    this.viewport = { ...this.viewport, scrollOffset: next };
    this.relayout();
    return true;
  }

  /** Returns the error from the last failed save, and clears it. */
  takeSaveError(): Error | null {
    const err = this.saveError;
    this.saveError = null;
    return err;
  }

  private isValidIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.records.length;
  }

  private relayout(): void {
    this.currentLayout = this.computeLayout();
    this.viewport.scrollOffset = this.currentLayout.offset;
    this.rebuildProjection();
  }

  private computeLayout(): ColumnLayout {
    return computeColumnLayout(this.viewport.width, this.viewport.height, this.viewport.scrollOffset);
  }

  private commit(): void {
    this.persist();
    this.rebuildProjection();
  }

  private persist(): void {
    try {
      this.store.save(this.records);
      this.saveError = null;
    } catch (err) {
      this.saveError = err instanceof Error ? err : new Error(String(err));
    }
  }
}
