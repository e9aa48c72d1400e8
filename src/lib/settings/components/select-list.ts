import color from "picocolors";
import { S_POINTER } from "./layout.js";

export interface ListItem<Value> {
  value: Value;
  label: string;
  description?: string;
}

/**
 * Vertical list with a single selection
 */
export class SelectList<Value> {
  private _items: ListItem<Value>[] = [];
  private _index = 0;

  get items(): readonly ListItem<Value>[] {
    return this._items;
  }

  get index(): number {
    return this._index;
  }

  /**
   * Replace every item. The selection is kept when still in range.
   */
  setItems(items: ListItem<Value>[]): void {
    this._items = [...items];
    this._index = Math.min(this._index, Math.max(0, this._items.length - 1));
  }

  select(index: number): void {
    if (this._items.length === 0) {
      this._index = 0;
      return;
    }
    this._index = Math.max(0, Math.min(index, this._items.length - 1));
  }

  up(): void {
    this.select(this._index - 1);
  }

  down(): void {
    this.select(this._index + 1);
  }

  selected(): ListItem<Value> | undefined {
    return this._items[this._index];
  }

  /**
   * Render a window of items around the selection
   */
  render(maxItems: number = Number.POSITIVE_INFINITY): string {
    if (this._items.length === 0) {
      return color.dim("  (empty)");
    }

    const visible = Math.max(1, Math.min(maxItems, this._items.length));
    let start = 0;
    if (this._index >= visible) {
      start = this._index - visible + 1;
    }
    const end = Math.min(start + visible, this._items.length);

    const lines: string[] = [];
    if (start > 0) lines.push(color.dim("  ..."));

    for (let i = start; i < end; i++) {
      const item = this._items[i];
      const active = i === this._index;
      const label = active ? `${color.cyan(S_POINTER)} ${color.bold(item.label)}` : `  ${item.label}`;
      lines.push(label);
      if (item.description) {
        lines.push(`    ${color.dim(item.description)}`);
      }
    }

    if (end < this._items.length) lines.push(color.dim("  ..."));
    return lines.join("\n");
  }
}
