import { stepField, type FieldOrdinal } from "./types.ts";
import type { DisplayModel } from "./display-model.ts";

/** The single-line text widget the session edits through. */
export interface TextEntry {
  getValue(): string;
  setValue(value: string): void;
  readonly cursor: number;
  setCursor(position: number): void;
  focus(): void;
  blur(): void;
  // Returns false when the key means nothing to the widget.
  handleKey(key: string): boolean;
}

export type EditState =
  | { kind: "idle" }
  | { kind: "editing"; originalIndex: number; field: FieldOrdinal };

export class EditSession {
  private model: DisplayModel;
  private entry: TextEntry;
  private current: EditState = { kind: "idle" };

  constructor(model: DisplayModel, entry: TextEntry) {
    this.model = model;
    this.entry = entry;
  }

  get state(): EditState {
    return this.current;
  }

  get active(): boolean {
    return this.current.kind === "editing";
  }

  get buffer(): string {
    return this.active ? this.entry.getValue() : "";
  }

  start(displayRow: number): boolean {
    if (this.active) return false;
    if (this.model.catalog.length === 0) return false;
    const originalIndex = this.model.originalIndexForDisplayRow(displayRow);
    if (originalIndex === null) return false;
    return this.startAt(originalIndex);
  }

  /** Starts on a catalog index directly, for records that have no row of their own yet. */
  startAt(originalIndex: number): boolean {
    if (this.active) return false;
    if (this.model.getField(originalIndex, 0) === null) return false;

    this.current = { kind: "editing", originalIndex, field: 0 };
    this.load();
    this.entry.focus();
    return true;
  }

  // Typed input is written back before switching fields.
  move(step: 1 | -1): boolean {
    if (this.current.kind !== "editing") return false;
    this.store();
    this.current = { ...this.current, field: stepField(this.current.field, step) };
    this.load();
    return true;
  }

  /** Writes the buffer and ends the session. Returns the edited catalog index. */
  commit(): number | null {
    if (this.current.kind !== "editing") return null;
    const { originalIndex } = this.current;
    this.store();
    this.close();
    return originalIndex;
  }

  cancel(): void {
    if (!this.active) return;
    this.close();
  }

  forward(key: string): boolean {
    if (!this.active) return false;
    return this.entry.handleKey(key);
  }

  private store(): void {
    if (this.current.kind !== "editing") return;
    this.model.setField(this.current.originalIndex, this.current.field, this.entry.getValue());
  }

  private load(): void {
    if (this.current.kind !== "editing") return;
    const value = this.model.getField(this.current.originalIndex, this.current.field) ?? "";
    this.entry.setValue(value);
    this.entry.setCursor(value.length);
  }

  private close(): void {
    this.current = { kind: "idle" };
    this.entry.blur();
    this.entry.setValue("");
  }
}
