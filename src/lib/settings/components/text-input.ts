import color from "picocolors";
import type { KeyPress } from "../keys.js";

export type EchoMode = "normal" | "password";

export interface TextInputOptions {
  value?: string;
  placeholder?: string;
  charLimit?: number;
  echoMode?: EchoMode;
}

const MASK = "•";

/**
 * Single-line text input with a cursor
 */
export class TextInput {
  private _value = "";
  private _cursor = 0;
  placeholder = "";
  charLimit = 0;
  echoMode: EchoMode = "normal";
  focused = false;

  get value(): string {
    return this._value;
  }

  get cursor(): number {
    return this._cursor;
  }

  setValue(value: string): void {
    this._value = this.charLimit > 0 ? value.slice(0, this.charLimit) : value;
    this._cursor = this._value.length;
  }

  /**
   * Reconfigure the input for a new screen
   */
  reset(options: TextInputOptions = {}): void {
    this.placeholder = options.placeholder ?? "";
    this.charLimit = options.charLimit ?? 0;
    this.echoMode = options.echoMode ?? "normal";
    this.setValue(options.value ?? "");
    this.focus();
  }

  clear(): void {
    this._value = "";
    this._cursor = 0;
  }

  focus(): void {
    this.focused = true;
  }

  blur(): void {
    this.focused = false;
  }

  /**
   * Apply an editing key. Returns false when the key is not an editing key.
   */
  update(key: KeyPress): boolean {
    if (!this.focused) return false;

    if (key.ctrl) {
      switch (key.name) {
        case "u":
          this._value = this._value.slice(this._cursor);
          this._cursor = 0;
          return true;
        case "a":
          this._cursor = 0;
          return true;
        case "e":
          this._cursor = this._value.length;
          return true;
        default:
          return false;
      }
    }

    switch (key.name) {
      case "backspace":
        if (this._cursor > 0) {
          this._value = this._value.slice(0, this._cursor - 1) + this._value.slice(this._cursor);
          this._cursor--;
        }
        return true;
      case "delete":
        this._value = this._value.slice(0, this._cursor) + this._value.slice(this._cursor + 1);
        return true;
      case "left":
        this._cursor = Math.max(0, this._cursor - 1);
        return true;
      case "right":
        this._cursor = Math.min(this._value.length, this._cursor + 1);
        return true;
      case "home":
        this._cursor = 0;
        return true;
      case "end":
        this._cursor = this._value.length;
        return true;
    }

    if (key.char === undefined || key.meta || key.char < " ") {
      return false;
    }
    if (this.charLimit > 0 && this._value.length >= this.charLimit) {
      return true;
    }

    this._value = this._value.slice(0, this._cursor) + key.char + this._value.slice(this._cursor);
    this._cursor++;
    return true;
  }

  view(): string {
    if (this._value.length === 0) {
      const cursor = this.focused ? color.inverse(" ") : "";
      return cursor + color.dim(this.placeholder);
    }

    const shown = this.echoMode === "password" ? MASK.repeat(this._value.length) : this._value;
    if (!this.focused) return shown;

    const before = shown.slice(0, this._cursor);
    const at = shown.slice(this._cursor, this._cursor + 1) || " ";
    const after = shown.slice(this._cursor + 1);
    return before + color.inverse(at) + after;
  }
}
