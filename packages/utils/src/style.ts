export type StyleToken =
  | "reset"
  | "dim"
  | "bold"
  | "red"
  | "yellow"
  | "green"
  | "cyan"
  | "gray"
  | "white"
  | "bgRed"
  | "bgGreen";

const ANSI: Record<StyleToken, string> = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  green: "\x1b[32m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  white: "\x1b[97m",
  bgRed: "\x1b[41m",
  bgGreen: "\x1b[42m",
};

/**
 * ANSI styling for console output. Disabled by config or the NO_COLOR env var.
 */
export class Style {
  private readonly noColor: boolean;

  constructor(args: { noColor: boolean }) {
    this.noColor = args.noColor || process.env.NO_COLOR !== undefined;
  }

  enabled(): boolean {
    return !this.noColor;
  }

  token(t: StyleToken): string {
    if (this.noColor) return "";
    return ANSI[t];
  }

  /**
   * e.g. style.wrap("ERROR", "bold", "red") => "\x1b[1m\x1b[31mERROR\x1b[0m"
   */
  wrap(text: string, ...tokens: StyleToken[]): string {
    if (this.noColor || tokens.length === 0) return text;
    return tokens.map(t => ANSI[t]).join("") + text + ANSI.reset;
  }

  /** Buy side in green, sell side in red. */
  side(text: string, side: "buy" | "sell"): string {
    return this.wrap(text, side === "buy" ? "green" : "red");
  }

  /** Colour by sign of a numeric string; zero and unparsable values stay plain. */
  signed(text: string, value: string): string {
    const n = Number(value);
    if (!Number.isFinite(n) || n === 0) return text;
    return this.wrap(text, n > 0 ? "green" : "red");
  }

  /** Prefix marker for error lines, e.g. "! " */
  alert(text: string): string {
    return this.wrap(text, "bold", "red");
  }
}
