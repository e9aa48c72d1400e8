import { describe, it, expect } from "vitest";
import { Layout, S_BULLET } from "../../../src/lib/settings/components/layout.js";
import { SelectList } from "../../../src/lib/settings/components/select-list.js";
import { TextInput } from "../../../src/lib/settings/components/text-input.js";
import { key } from "../../../src/lib/settings/keys.js";
import { plain } from "./harness.js";

function typeInto(input: TextInput, text: string): void {
  for (const char of text) {
    input.update(key(char));
  }
}

describe("TextInput", () => {
  it("inserts typed characters at the cursor", () => {
    const input = new TextInput();
    input.reset();
    typeInto(input, "mai");
    input.update(key("left"));
    typeInto(input, "n");

    expect(input.value).toBe("mani");
    expect(input.cursor).toBe(3);
  });

  it("edits with backspace, delete, home and end", () => {
    const input = new TextInput();
    input.reset({ value: "rules" });

    input.update(key("backspace"));
    expect(input.value).toBe("rule");

    input.update(key("home"));
    input.update(key("delete"));
    expect(input.value).toBe("ule");
    expect(input.cursor).toBe(0);

    input.update(key("end"));
    expect(input.cursor).toBe(3);
  });

  it("clears to the start of the line with ctrl+u", () => {
    const input = new TextInput();
    input.reset({ value: "~/old/path" });
    input.update(key("left"));
    input.update(key("left"));
    input.update(key("u", { ctrl: true }));

    expect(input.value).toBe("th");
    expect(input.cursor).toBe(0);
  });

  it("stops at the character limit", () => {
    const input = new TextInput();
    input.reset({ charLimit: 3 });
    typeInto(input, "abcdef");

    expect(input.value).toBe("abc");
  });

  it("truncates a preset value to the limit", () => {
    const input = new TextInput();
    input.reset({ value: "abcdef", charLimit: 4 });
    expect(input.value).toBe("abcd");
  });

  it("ignores keys when blurred and reports non-editing keys", () => {
    const input = new TextInput();
    input.reset();
    expect(input.update(key("enter"))).toBe(false);
    expect(input.update(key("c", { ctrl: true }))).toBe(false);

    input.blur();
    expect(input.update(key("a"))).toBe(false);
    expect(input.value).toBe("");
  });

  it("masks a password", () => {
    const input = new TextInput();
    input.reset({ echoMode: "password" });
    typeInto(input, "test");
    input.blur();

    expect(input.view()).toBe("••••");
  });

  it("shows the placeholder when empty", () => {
    const input = new TextInput();
    input.reset({ placeholder: "my-rules" });
    input.blur();

    expect(plain(input.view())).toBe("my-rules");
  });
});

describe("SelectList", () => {
  const items = ["one", "two", "three"].map((value) => ({ value, label: value }));

  it("moves within bounds", () => {
    const list = new SelectList<string>();
    list.setItems(items);

    list.up();
    expect(list.index).toBe(0);
    list.down();
    list.down();
    list.down();
    expect(list.index).toBe(2);
    expect(list.selected()?.value).toBe("three");
  });

  it("keeps the selection in range when items shrink", () => {
    const list = new SelectList<string>();
    list.setItems(items);
    list.select(2);
    list.setItems(items.slice(0, 1));

    expect(list.index).toBe(0);
  });

  it("has no selection when empty", () => {
    const list = new SelectList<string>();
    expect(list.selected()).toBeUndefined();
    expect(plain(list.render())).toBe("  (empty)");
  });

  it("windows long lists around the selection", () => {
    const list = new SelectList<string>();
    list.setItems(items);
    list.select(2);

    expect(plain(list.render(2)).split("\n")).toEqual(["  ...", "  two", expect.stringContaining("three")]);
  });

  it("renders descriptions under their labels", () => {
    const list = new SelectList<string>();
    list.setItems([
      { value: "a", label: "Alpha", description: "~/rules" },
      { value: "b", label: "Beta" },
    ]);
    list.select(1);

    expect(plain(list.render()).split("\n")).toEqual([
      "  Alpha",
      "    ~/rules",
      expect.stringContaining("Beta"),
    ]);
  });
});

describe("Layout", () => {
  it("stacks title, subtitle, body, error and help", () => {
    const layout = new Layout();
    layout.setError(new Error("path cannot be empty"));

    const text = plain(
      layout.render({ title: "Title", subtitle: "Sub", helpText: "esc: back" }, "Body")
    );

    expect(text.split("\n")).toEqual([
      "Title",
      "Sub",
      "",
      "Body",
      "",
      `${S_BULLET} path cannot be empty`,
      "",
      "esc: back",
    ]);
  });

  it("leaves the error out when the body shows it", () => {
    const layout = new Layout();
    layout.setError(new Error("boom"));

    const text = plain(layout.render({ title: "Title", inlineError: false }, "Body"));
    expect(text.split("\n")).toEqual(["Title", "", "Body"]);
  });

  it("forgets a cleared error", () => {
    const layout = new Layout();
    layout.setError(new Error("boom"));
    layout.clearError();

    expect(layout.getError()).toBeUndefined();
  });
});
