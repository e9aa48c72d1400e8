import color from "picocolors";
import isUnicodeSupported from "is-unicode-supported";

const unicode = isUnicodeSupported();
const unicodeOr = (c: string, fallback: string) => (unicode ? c : fallback);

export const S_BAR = unicodeOr("│", "|");
export const S_BAR_END = unicodeOr("└", "—");
export const S_BULLET = unicodeOr("•", "-");
export const S_POINTER = unicodeOr("❯", ">");

export interface LayoutConfig {
  title: string;
  subtitle?: string;
  helpText?: string;
  // Error screens print their error in the body instead of the slot
  inlineError?: boolean;
}

/**
 * Screen frame: title, subtitle, body, error slot and help text
 */
export class Layout {
  private error: Error | undefined;

  getError(): Error | undefined {
    return this.error;
  }

  setError(error: Error): void {
    this.error = error;
  }

  clearError(): void {
    this.error = undefined;
  }

  render(config: LayoutConfig, body: string): string {
    const lines: string[] = [color.bold(config.title)];

    if (config.subtitle) {
      lines.push(color.dim(config.subtitle));
    }
    lines.push("");
    lines.push(body);

    if (this.error && config.inlineError !== false) {
      lines.push("");
      lines.push(color.red(`${S_BULLET} ${this.error.message}`));
    }

    if (config.helpText) {
      lines.push("");
      lines.push(color.dim(config.helpText));
    }

    return lines.join("\n");
  }
}
