export interface TableOptions {
  /** Applied to each padded body cell, e.g. to color it without breaking alignment. */
  formatCell?: (padded: string, raw: string, columnIndex: number) => string;
}

export function renderTable(headers: string[], rows: string[][], options: TableOptions = {}): string {
  if (rows.length === 0) {
    return "";
  }

  const widths = headers.map((header, idx) => {
    const cellLengths = rows.map((row) => (row[idx] ?? "").length);
    return Math.max(header.length, ...cellLengths);
  });
  const format = options.formatCell ?? ((padded: string) => padded);

  const headerLine = headers.map((header, idx) => header.padEnd(widths[idx])).join("  ");
  const divider = widths.map((width) => "-".repeat(width)).join("  ");
  const body = rows
    .map((row) =>
      row
        .map((cell, idx) => format((cell ?? "").padEnd(widths[idx]), cell ?? "", idx))
        .join("  ")
        .trimEnd()
    )
    .join("\n");

  return `${headerLine.trimEnd()}\n${divider}\n${body}`;
}
