export function getBlessedTerminalOverride(): string | undefined {
  const override = process.env.LAUNCHDECK_TUI_TERM?.trim() || process.env.LAUNCHDECK_BLESSED_TERM?.trim();
  if (override) return override;

  // blessed ships no terminfo for Ghostty.
  const term = (process.env.TERM ?? "").toLowerCase();
  if (term.includes("ghostty")) return "xterm-256color";

  return undefined;
}
