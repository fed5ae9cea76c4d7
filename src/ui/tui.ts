import type { Widgets } from "blessed";
import { blessed } from "./blessed.ts";
import { getBlessedTerminalOverride } from "./term.ts";
import { normalizeKey, type BlessedKey } from "./keys.ts";
import { LineEditor } from "./line-editor.ts";
import type { ColumnSpec } from "../layout.ts";
import type { DisplayModel } from "../display-model.ts";
import type { Launcher } from "../launcher.ts";
import { StatusLine, type StatusMessage } from "../status.ts";
import { Dashboard, type GridView } from "../dashboard.ts";
import { FIELD_KEYS, FIELD_LABELS } from "../types.ts";

const colors = {
  accent: "#5fd7af",
  key: "#00afff",
  border: "#585858",
  selected: {
    bg: "#5f00af",
    fg: "#ffffaf",
  },
};

const toneColors: Record<StatusMessage["tone"], string> = {
  info: "#5fd7af",
  warning: "#ffd75f",
  error: "#ff0000",
};

export function escapeTags(text: string): string {
  return text.replace(/[{}]/g, (ch) => (ch === "{" ? "{open}" : "{close}"));
}

function styledKey(key: string): string {
  return `{${colors.key}-fg}${key}{/}`;
}

function styledHelp(items: Array<[string, string]>): string {
  return items
    .map(([key, desc]) => `${styledKey(key)}: {${colors.accent}-fg}${desc}{/}`)
    .join(" {gray-fg}•{/gray-fg} ");
}

export function fitCell(text: string, width: number): string {
  const chars = [...text.replace(/\s+/g, " ")];
  const room = Math.max(1, width - 1);
  const clipped = chars.length > room ? [...chars.slice(0, Math.max(0, room - 1)), "…"] : chars;
  return clipped.join("") + " ".repeat(Math.max(0, width - clipped.length));
}

export function formatRow(cells: string[], columns: ColumnSpec[]): string {
  return columns.map((col, i) => fitCell(cells[i] ?? "", col.width)).join("").trimEnd();
}

function terminalSize(): { width: number; height: number } {
  return { width: process.stdout.columns || 100, height: process.stdout.rows || 24 };
}

function createListGrid(list: Widgets.ListElement, columnsBox: Widgets.BoxElement, pageSize: () => number): GridView {
  let columns: ColumnSpec[] = [];
  let rowCount = 0;
  let selected = 0;

  list.on("select item", (_item: unknown, index: number) => {
    selected = index;
  });

  function select(row: number) {
    selected = Math.min(Math.max(0, row), Math.max(0, rowCount - 1));
    if (rowCount) list.select(selected);
  }

  return {
    setColumns(next) {
      columns = next;
      columnsBox.setContent(formatRow(next.map((c) => c.title), next));
    },
    setRows(rows) {
      rowCount = rows.length;
      const keep = selected;
      list.setItems(rows.map((r) => formatRow(r, columns)));
      select(keep);
    },
    cursor: () => selected,
    setCursor: (row) => select(row),
    navigate(key) {
      switch (key) {
        case "up":
        case "k":
          select(selected - 1);
          return true;
        case "down":
        case "j":
          select(selected + 1);
          return true;
        case "pageup":
          select(selected - pageSize());
          return true;
        case "pagedown":
          select(selected + pageSize());
          return true;
        case "home":
        case "g":
          select(0);
          return true;
        case "end":
        case "G":
          select(rowCount - 1);
          return true;
        default:
          return false;
      }
    },
  };
}

export async function runDashboardTui(args: {
  model: DisplayModel;
  launcher: Launcher;
  statusMs: number;
  catalogPath: string;
}): Promise<void> {
  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    throw new Error("deck dashboard requires a TTY.");
  }

  return await new Promise<void>((resolve, reject) => {
    const term = getBlessedTerminalOverride();
    const screen = blessed.screen({ smartCSR: true, fullUnicode: true, title: "launchdeck", terminal: term });

    const header = blessed.box({
      parent: screen,
      top: 0,
      left: 0,
      height: 1,
      width: "100%",
      content: ` {bold}{${colors.accent}-fg}🚀 launchdeck{/}{/bold} {gray-fg}· ${escapeTags(args.catalogPath)}{/gray-fg}`,
      tags: true,
    });

    const columnsBox = blessed.box({
      parent: screen,
      top: 1,
      left: 1,
      height: 1,
      width: "100%-2",
      content: "",
      style: { bold: true },
    });

    const listStyle = {
      border: { fg: colors.border },
      selected: { bg: colors.selected.bg, fg: colors.selected.fg },
    };
    const list = blessed.list({
      parent: screen,
      top: 2,
      left: 0,
      width: "100%",
      height: "100%-5",
      mouse: true,
      border: "line",
      style: listStyle,
    });

    const emptyHint = blessed.box({
      parent: screen,
      top: "center",
      left: "center",
      width: 44,
      height: 5,
      content: "No projects configured yet.\n\nPress {bold}n{/bold} to add your first project!",
      tags: true,
      align: "center",
      hidden: true,
    });

    const footer = blessed.box({
      parent: screen,
      bottom: 0,
      left: 0,
      height: 3,
      width: "100%",
      content: "",
      tags: true,
    });

    const entry = new LineEditor();
    const status = new StatusLine(args.statusMs);
    const grid = createListGrid(list, columnsBox, () => Math.max(1, args.model.layout.tableHeight - 1));

    let finished = false;
    let footerTimer: ReturnType<typeof setTimeout> | null = null;
    function stopFooterTimer() {
      if (footerTimer) clearTimeout(footerTimer);
      footerTimer = null;
    }

    function done() {
      if (finished) return;
      finished = true;
      stopFooterTimer();
      screen.destroy();
      resolve();
    }

    function fail(err: unknown) {
      if (finished) return;
      finished = true;
      stopFooterTimer();
      const message = err instanceof Error ? err.message : String(err);
      try {
        screen.destroy();
      } finally {
        reject(new Error(message));
      }
    }

    const { width, height } = terminalSize();
    args.model.resize(width, height);
    const dashboard = new Dashboard({ model: args.model, grid, entry, launcher: args.launcher, status, quit: done });

    function footerContent(): string {
      const lines: string[] = [];
      const state = dashboard.edit.state;
      if (state.kind === "editing") {
        const { before, at, after } = entry.segments();
        const label = FIELD_LABELS[FIELD_KEYS[state.field]];
        lines.push(
          ` Editing {bold}${label}{/bold}: ${escapeTags(before)}{inverse}${escapeTags(at)}{/inverse}${escapeTags(after)}`,
        );
        lines.push(
          " " +
            styledHelp([
              ["tab", "next field"],
              ["shift+tab", "previous field"],
              ["enter", "save"],
              ["esc", "cancel"],
            ]),
        );
      } else {
        const layout = args.model.layout;
        const nav: Array<[string, string]> = [["↑↓", "navigate"]];
        if (layout.totalColumns > layout.visibleCount) nav.push(["←→", "scroll columns"]);
        lines.push(" " + styledHelp([...nav, ["space/enter", "launch"], ["e", "edit"]]));
        lines.push(
          " " +
            styledHelp([
              ["n/a", "add"],
              ["d/delete", "delete"],
              ["r", "refresh"],
              ["o", "open link"],
              ["q", "quit"],
            ]),
        );
      }

      const current = status.current();
      lines.push(current ? ` > {${toneColors[current.tone]}-fg}${escapeTags(current.text)}{/}` : "");
      return lines.join("\n");
    }

    function paint() {
      if (finished) return;
      if (args.model.catalog.length === 0) emptyHint.show();
      else emptyHint.hide();
      footer.setContent(footerContent());
      screen.render();

      // Repaint once the status message has expired.
      stopFooterTimer();
      if (status.current()) footerTimer = setTimeout(paint, args.statusMs);
    }

    screen.on("keypress", (ch: string | undefined, key: BlessedKey | undefined) => {
      const name = normalizeKey(ch, key);
      if (!name) return;
      dashboard.handleKey(name).then(paint).catch(fail);
    });

    screen.on("resize", () => {
      const size = terminalSize();
      dashboard.resize(size.width, size.height);
      paint();
    });

    header.setFront();
    footer.setFront();
    paint();
  });
}
