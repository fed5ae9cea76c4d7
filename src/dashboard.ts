import type { ProjectRecord } from "./types.ts";
import type { ColumnSpec } from "./layout.ts";
import type { DisplayModel } from "./display-model.ts";
import type { Launcher } from "./launcher.ts";
import type { StatusLine } from "./status.ts";
import { EditSession, type TextEntry } from "./edit-session.ts";

/** The table widget: rows in, cursor out. */
export interface GridView {
  setColumns(columns: ColumnSpec[]): void;
  setRows(rows: string[][]): void;
  cursor(): number;
  setCursor(row: number): void;
  // Cursor movement keys (arrows, paging); returns false for anything else.
  navigate(key: string): boolean;
}

export type DashboardDeps = {
  model: DisplayModel;
  grid: GridView;
  entry: TextEntry;
  launcher: Launcher;
  status: StatusLine;
  quit(): void;
};

export const NEW_PROJECT: ProjectRecord = {
  name: "New Project",
  path: "/path/to/project",
  command: "command",
  link: "",
  category: "",
};

export class Dashboard {
  readonly edit: EditSession;
  private deps: DashboardDeps;

  constructor(deps: DashboardDeps) {
    this.deps = deps;
    this.edit = new EditSession(deps.model, deps.entry);
    this.sync();
  }

  async handleKey(key: string): Promise<void> {
    if (key === "ctrl+c") return this.deps.quit();
    if (this.edit.active) return this.handleEditKey(key);
    return this.handleNormalKey(key);
  }

  resize(width: number, height: number): void {
    this.deps.model.resize(width, height);
    this.sync();
  }

  private async handleNormalKey(key: string): Promise<void> {
    switch (key) {
      case "q":
        return this.deps.quit();
      case "e":
        this.edit.start(this.deps.grid.cursor());
        return;
      case "n":
      case "a":
        return this.addProject();
      case "d":
      case "delete":
        return this.deleteSelected();
      case " ":
      case "enter":
        return this.launchSelected();
      case "r":
        return this.reload();
      case "o":
        return this.openSelectedLink();
      case "left":
        return this.scroll(-1);
      case "right":
        return this.scroll(1);
      default:
        this.deps.grid.navigate(key);
    }
  }

  private handleEditKey(key: string): void {
    switch (key) {
      case "esc":
        this.edit.cancel();
        return;
      case "enter": {
        const index = this.edit.commit();
        this.sync();
        if (index !== null) this.follow(index);
        this.report("✅ Project updated");
        return;
      }
      case "tab":
      case "shift+tab": {
        const state = this.edit.state;
        this.edit.move(key === "tab" ? 1 : -1);
        this.sync();
        if (state.kind === "editing") this.follow(state.originalIndex);
        this.reportSaveError();
        return;
      }
      default:
        this.edit.forward(key);
    }
  }

  private addProject(): void {
    const index = this.deps.model.addRecord({ ...NEW_PROJECT });
    this.sync();
    this.follow(index);
    // Placeholders repeat, so the row under the cursor may resolve to an older twin.
    this.edit.startAt(index);
    this.report("➕ New project added");
  }

  private deleteSelected(): void {
    const index = this.deps.model.originalIndexForDisplayRow(this.deps.grid.cursor());
    if (index === null) return;
    const removed = this.deps.model.deleteRecord(index);
    if (!removed) return;
    this.sync();
    this.report(`🗑️ Deleted ${removed.name}`);
  }

  private async launchSelected(): Promise<void> {
    const record = this.deps.model.recordForDisplayRow(this.deps.grid.cursor());
    if (!record) return;
    const outcome = await this.deps.launcher.launch(record);
    this.deps.status.show(outcome.message);
  }

  private async openSelectedLink(): Promise<void> {
    const record = this.deps.model.recordForDisplayRow(this.deps.grid.cursor());
    if (!record) return;
    const outcome = await this.deps.launcher.openLink(record);
    this.deps.status.show(outcome.message);
  }

  private reload(): void {
    this.deps.model.reload();
    this.sync();
    this.deps.status.show("🔄 Refreshed");
  }

  private scroll(delta: 1 | -1): void {
    if (this.deps.model.scrollColumns(delta)) this.sync();
  }

  /** Pushes the current projection to the grid and keeps the cursor in range. */
  sync(): void {
    const { model, grid } = this.deps;
    const rows = model.projection.rows.map((r) => r.cells);
    grid.setColumns(model.layout.columns);
    grid.setRows(rows);
    const cursor = grid.cursor();
    const clamped = Math.min(Math.max(0, cursor), Math.max(0, rows.length - 1));
    if (clamped !== cursor) grid.setCursor(clamped);
  }

  private follow(originalIndex: number): void {
    const row = this.deps.model.displayRowForOriginalIndex(originalIndex);
    if (row !== null) this.deps.grid.setCursor(row);
  }

  private report(message: string): void {
    const err = this.deps.model.takeSaveError();
    this.deps.status.show(err ? `⚠️ ${message}, but saving failed: ${err.message}` : message);
  }

  private reportSaveError(): void {
    const err = this.deps.model.takeSaveError();
    if (err) this.deps.status.show(`⚠️ Saving failed: ${err.message}`);
  }
}
