import stringWidth from "string-width";

export type TableOptions = {
  indent?: string;
  padding?: number;
};

/**
 * Align rows into columns, tabwriter style: every cell but the last in a row
 * is padded to its column's widest cell plus `padding`. Widths are display
 * widths, so cells may carry ANSI colors or wide characters.
 */
export function formatTable(rows: readonly (readonly string[])[], options: TableOptions = {}): string[] {
  const { indent = "", padding = 2 } = options;
  const widths: number[] = [];

  for (const row of rows) {
    row.slice(0, -1).forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, stringWidth(cell));
    });
  }

  return rows.map((row) => {
    const cells = row.map((cell, i) =>
      i === row.length - 1 ? cell : cell + " ".repeat(widths[i] - stringWidth(cell) + padding),
    );
    return (indent + cells.join("")).trimEnd();
  });
}
