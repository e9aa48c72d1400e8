import { stdin, stdout } from "node:process";
import readline, { type Key, type ReadLine } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { ReadStream, WriteStream } from "node:tty";
import { wrapAnsi } from "fast-wrap-ansi";
import { cursor, erase } from "sisteransi";
import { QuitRequestedError, toError } from "../errors.js";
import type { SettingsController } from "./controller.js";
import { fromReadline } from "./keys.js";
import type { Command, SettingsEvent } from "./messages.js";
import { renderView } from "./views.js";

function setRawMode(input: Readable, value: boolean): void {
  if (input instanceof ReadStream && input.isTTY) input.setRawMode(value);
}

const getColumns = (output: Writable): number =>
  output instanceof WriteStream ? output.columns : 80;

const getRows = (output: Writable): number => (output instanceof WriteStream ? output.rows : 24);

function diffLines(prev: string, next: string) {
  const prevLines = prev.split("\n");
  const nextLines = next.split("\n");
  const lines: number[] = [];

  for (let i = 0; i < Math.max(prevLines.length, nextLines.length); i++) {
    if (prevLines[i] !== nextLines[i]) {
      lines.push(i);
    }
  }

  if (lines.length === 0) return null;
  return lines;
}

export interface SettingsHostOptions {
  input?: Readable;
  output?: Writable;
}

/**
 * Drives a SettingsController against a terminal: keys in, frames out, and
 * one command at a time in submission order.
 */
export class SettingsHost {
  private readonly controller: SettingsController;
  private readonly input: Readable;
  private readonly output: Writable;
  private rl: ReadLine | undefined;
  private prevFrame = "";
  private queue: Command[] = [];
  private draining = false;
  private closed = false;
  private settle: { resolve: () => void; reject: (error: Error) => void } | undefined;

  constructor(controller: SettingsController, options: SettingsHostOptions = {}) {
    this.controller = controller;
    this.input = options.input ?? stdin;
    this.output = options.output ?? stdout;
    this.onKeypress = this.onKeypress.bind(this);
    this.onResize = this.onResize.bind(this);
    this.onInputClosed = this.onInputClosed.bind(this);
  }

  /**
   * Resolves when the user quits. Rejects on an unexpected controller error.
   */
  run(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.settle = { resolve, reject };

      this.rl = readline.createInterface({
        input: this.input,
        tabSize: 2,
        prompt: "",
        escapeCodeTimeout: 50,
        terminal: true,
      });
      readline.emitKeypressEvents(this.input, this.rl);
      this.rl.on("close", this.onInputClosed);

      this.input.on("keypress", this.onKeypress);
      this.output.on("resize", this.onResize);
      setRawMode(this.input, true);
      this.output.write(cursor.hide);

      this.dispatch({
        type: "resize",
        columns: getColumns(this.output),
        rows: getRows(this.output),
      });
    });
  }

  private onKeypress(char: string | undefined, key: Key | undefined): void {
    this.dispatch({ type: "key", key: fromReadline(char, key) });
  }

  // Piped input reached EOF, or readline handled ctrl+c itself
  private onInputClosed(): void {
    this.finish(new QuitRequestedError());
  }

  private onResize(): void {
    this.prevFrame = "";
    this.output.write(erase.screen + cursor.to(0, 0));
    this.dispatch({ type: "resize", columns: getColumns(this.output), rows: getRows(this.output) });
  }

  private dispatch(event: SettingsEvent): void {
    if (this.closed) return;

    let command: Command | undefined;
    try {
      command = this.controller.update(event);
    } catch (error) {
      this.finish(error);
      return;
    }

    this.render();
    if (command) {
      this.enqueue(command);
    }
  }

  private enqueue(command: Command): void {
    this.queue.push(command);
    if (!this.draining) {
      this.drain().catch((error: unknown) => this.finish(error));
    }
  }

  private async drain(): Promise<void> {
    this.draining = true;
    try {
      let command = this.queue.shift();
      while (command && !this.closed) {
        let event: SettingsEvent | undefined;
        try {
          event = await command();
        } catch (error) {
          event = this.controller.failureFor(error);
          if (!event) {
            this.controller.log.error("Command failed outside a flow", {
              state: this.controller.state,
              error: toError(error).message,
            });
          }
        }

        if (event) this.dispatch(event);
        command = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private finish(error: unknown): void {
    if (this.closed) return;
    this.close();

    if (error instanceof QuitRequestedError) {
      this.settle?.resolve();
    } else {
      this.settle?.reject(toError(error));
    }
  }

  private close(): void {
    this.closed = true;
    this.queue = [];
    this.input.removeListener("keypress", this.onKeypress);
    this.output.off("resize", this.onResize);
    setRawMode(this.input, false);
    this.rl?.close();
    this.rl = undefined;
    this.output.write(cursor.show + "\n");
  }

  private restoreCursor(): void {
    const lines = this.prevFrame.split("\n").length - 1;
    this.output.write(cursor.move(-999, -lines));
  }

  private render(): void {
    const frame = wrapAnsi(renderView(this.controller), getColumns(this.output), {
      hard: true,
      trim: false,
    });
    if (frame === this.prevFrame) return;

    if (this.prevFrame) {
      const changed = diffLines(this.prevFrame, frame);
      this.restoreCursor();
      if (changed) {
        const firstChanged = changed[0];
        if (firstChanged > 0) {
          this.output.write(cursor.move(0, firstChanged));
        }
        this.output.write(erase.down());
        this.output.write(frame.split("\n").slice(firstChanged).join("\n"));
        this.prevFrame = frame;
        return;
      }
      this.output.write(erase.down());
    }

    this.output.write(frame);
    this.prevFrame = frame;
  }
}
