export type BlessedKey = {
  name?: string;
  full?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
};

const NAMED: Record<string, string> = {
  enter: "enter",
  escape: "esc",
  space: " ",
  tab: "tab",
  "S-tab": "shift+tab",
  backspace: "backspace",
  delete: "delete",
  left: "left",
  right: "right",
  up: "up",
  down: "down",
  home: "home",
  end: "end",
  pageup: "pageup",
  pagedown: "pagedown",
};

function isPrintable(ch: string): boolean {
  return [...ch].length === 1 && !/[\u0000-\u001f\u007f]/.test(ch);
}

/**
 * Maps a blessed keypress to the canonical names the dashboard dispatches on
 * ("enter", "shift+tab", "ctrl+c", "a", "A", ...). Returns null for events to
 * drop: blessed reports Enter as both "return" and "enter".
 */
export function normalizeKey(ch: string | undefined, key: BlessedKey | undefined): string | null {
  const name = key?.name;
  if (name === "return") return null;

  if (key?.ctrl && name) return `ctrl+${name}`;

  const full = key?.full;
  if (full && NAMED[full]) return NAMED[full] ?? null;
  if (name && !key?.shift && NAMED[name]) return NAMED[name] ?? null;

  if (ch && !key?.meta && isPrintable(ch)) return ch;
  return null;
}
