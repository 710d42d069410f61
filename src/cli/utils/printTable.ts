/**
 * memtree CLI - Table Formatter Utility
 * Lays tabular data out in aligned columns
 */

export function formatTable(headers: string[], rows: string[][]): string[] {
  if (rows.length === 0) {
    return ["(empty)"];
  }

  // Calculate column widths
  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, colIndex) =>
    allRows.reduce((width, row) => Math.max(width, (row[colIndex] || "").length), 0)
  );

  const formatRow = (row: string[]) =>
    row
      .map((cell, i) => (cell || "").padEnd(colWidths[i]))
      .join(" │ ")
      .trimEnd();

  const separator = colWidths.map((width) => "─".repeat(width)).join("─┼─");

  return [formatRow(headers), separator, ...rows.map(formatRow)];
}
