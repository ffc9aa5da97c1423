/**
 * Where command output goes. Everything user-facing, errors included,
 * is written through `log` to stdout.
 */
export interface Output {
  /** Whether ANSI colours may be used */
  color: boolean;
  log(line: string): void;
}

export const consoleOutput: Output = {
  color: Boolean(process.stdout.isTTY) && !process.env.NO_COLOR,
  log: (line) => console.log(line),
};

export type Colors = Record<"green" | "red" | "yellow" | "cyan" | "dim" | "bold", (s: string) => string>;

// ANSI colors (identity functions when disabled)
export function colors(enabled: boolean): Colors {
  const wrap = (code: string) => (s: string) => (enabled ? `\x1b[${code}m${s}\x1b[0m` : s);
  return {
    green: wrap("32"),
    red: wrap("31"),
    yellow: wrap("33"),
    cyan: wrap("36"),
    dim: wrap("2"),
    bold: wrap("1"),
  };
}
