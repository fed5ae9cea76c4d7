export type StatusTone = "info" | "warning" | "error";

export type StatusMessage = {
  text: string;
  tone: StatusTone;
};

export const DEFAULT_STATUS_MS = 3000;

export function statusTone(text: string): StatusTone {
  if (text.includes("❌") || text.includes("Failed")) return "error";
  if (text.includes("⚠️")) return "warning";
  return "info";
}

// Expiry is checked when the footer is drawn; nothing is scheduled.
export class StatusLine {
  private text = "";
  private expiresAt = 0;
  private durationMs: number;

  constructor(durationMs = DEFAULT_STATUS_MS) {
    this.durationMs = durationMs;
  }

  show(text: string, now = Date.now()): void {
    this.text = text;
    this.expiresAt = now + this.durationMs;
  }

  current(now = Date.now()): StatusMessage | null {
    if (!this.text || now >= this.expiresAt) return null;
    return { text: this.text, tone: statusTone(this.text) };
  }

  clear(): void {
    this.text = "";
    this.expiresAt = 0;
  }
}
