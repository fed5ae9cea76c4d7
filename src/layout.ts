export type ColumnId = "name" | "path" | "command" | "category" | "link";

export type ColumnSpec = {
  id: ColumnId;
  title: string;
  width: number;
};

// Display order; differs from the edit-field order in types.ts.
export const ALL_COLUMNS: readonly ColumnSpec[] = [
  { id: "name", title: "Name", width: 30 },
  { id: "path", title: "Path", width: 35 },
  { id: "command", title: "Command", width: 35 },
  { id: "category", title: "Category", width: 15 },
  { id: "link", title: "Link", width: 30 },
];

// Borders and cell padding around the table.
export const FRAME_WIDTH = 6;
export const FRAME_HEIGHT = 6;
export const MIN_TABLE_HEIGHT = 5;

export type ColumnLayout = {
  columns: ColumnSpec[];
  offset: number;
  visibleCount: number;
  totalColumns: number;
  availableWidth: number;
  tableHeight: number;
};

export function computeColumnLayout(
  width: number,
  height: number,
  scrollOffset: number,
  all: readonly ColumnSpec[] = ALL_COLUMNS,
): ColumnLayout {
  const availableWidth = Math.max(1, width - FRAME_WIDTH);
  const tableHeight = Math.max(MIN_TABLE_HEIGHT, height - FRAME_HEIGHT);

  let used = 0;
  let visibleCount = 0;
  for (const col of all) {
    if (used + col.width > availableWidth) break;
    used += col.width;
    visibleCount++;
  }
  const forced = visibleCount === 0;
  if (forced) visibleCount = 1;

  const maxOffset = Math.max(0, all.length - visibleCount);
  const offset = Math.min(Math.max(0, scrollOffset), maxOffset);

  const columns = all.slice(offset, offset + visibleCount).map((c) => ({ ...c }));
  const last = columns.at(-1);
  if (last) {
    if (forced) {
      last.width = availableWidth;
    } else {
      // The count is measured from the first column, so a scrolled window can
      // overrun; the last column absorbs the difference either way.
      const usedWidth = columns.reduce((sum, c) => sum + c.width, 0);
      last.width = Math.max(1, last.width + availableWidth - usedWidth);
    }
  }

  return {
    columns,
    offset,
    visibleCount,
    totalColumns: all.length,
    availableWidth,
    tableHeight,
  };
}

export function maxScrollOffset(layout: ColumnLayout): number {
  return Math.max(0, layout.totalColumns - layout.visibleCount);
}
