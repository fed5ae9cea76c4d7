import type { TextEntry } from "../edit-session.ts";

export const MAX_INPUT_LENGTH = 200;

/** Single-line text buffer with a cursor, driven by canonical key names. */
export class LineEditor implements TextEntry {
  private chars: string[] = [];
  private position = 0;
  private focused = false;
  private limit: number;

  constructor(limit = MAX_INPUT_LENGTH) {
    this.limit = limit;
  }

  get cursor(): number {
    return this.position;
  }

  get isFocused(): boolean {
    return this.focused;
  }

  getValue(): string {
    return this.chars.join("");
  }

  setValue(value: string): void {
    this.chars = [...value].slice(0, this.limit);
    this.position = Math.min(this.position, this.chars.length);
  }

  // Positions count characters, not UTF-16 units.
  setCursor(position: number): void {
    this.position = Math.min(Math.max(0, position), this.chars.length);
  }

  focus(): void {
    this.focused = true;
  }

  blur(): void {
    this.focused = false;
  }

  handleKey(key: string): boolean {
    switch (key) {
      case "left":
        this.setCursor(this.position - 1);
        return true;
      case "right":
        this.setCursor(this.position + 1);
        return true;
      case "home":
      case "ctrl+a":
        this.setCursor(0);
        return true;
      case "end":
      case "ctrl+e":
        this.setCursor(this.chars.length);
        return true;
      case "backspace":
        if (this.position > 0) {
          this.chars.splice(this.position - 1, 1);
          this.position--;
        }
        return true;
      case "delete":
        this.chars.splice(this.position, 1);
        return true;
      case "ctrl+u":
        this.chars.splice(0, this.position);
        this.position = 0;
        return true;
      case "ctrl+k":
        this.chars.splice(this.position);
        return true;
    }
    if ([...key].length !== 1) return false;
    if (this.chars.length >= this.limit) return true;
    this.chars.splice(this.position, 0, key);
    this.position++;
    return true;
  }

  /** The value split around the cursor, for drawing the caret. */
  segments(): { before: string; at: string; after: string } {
    return {
      before: this.chars.slice(0, this.position).join(""),
      at: this.chars[this.position] ?? " ",
      after: this.chars.slice(this.position + 1).join(""),
    };
  }
}
