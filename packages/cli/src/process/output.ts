export const COLORS = {
  cyan: "\x1b[36m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  gray: "\x1b[90m",
  reset: "\x1b[0m",
} as const;

export function logInfo(message: string): void {
  console.log(`${COLORS.cyan}[trip-etl]${COLORS.reset} ${message}`);
}

export function logWarn(message: string): void {
  console.warn(`${COLORS.yellow}[trip-etl]${COLORS.reset} ${message}`);
}

export function logError(message: string): void {
  console.error(`${COLORS.red}[trip-etl]${COLORS.reset} ${message}`);
}

export function logGray(message: string): void {
  console.log(`${COLORS.gray}${message}${COLORS.reset}`);
}

type Cell = string | number;

/** Renders rows as a left-aligned plain-text table with a header rule. */
export function formatTable(
  columns: readonly string[],
  rows: readonly (readonly Cell[])[],
): string {
  const text = rows.map((row) => row.map((cell) => String(cell)));
  const widths = columns.map((column, index) =>
    Math.max(column.length, ...text.map((row) => (row[index] ?? "").length)),
  );
  const line = (cells: readonly string[]) =>
    cells
      .map((cell, index) => cell.padEnd(widths[index]))
      .join("  ")
      .trimEnd();

  return [
    line(columns),
    line(widths.map((width) => "-".repeat(width))),
    ...text.map(line),
  ].join("\n");
}
