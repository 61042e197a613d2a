/**
 * Plain ASCII tables for terminal output.
 */

/** Split `text` into lines of at most `width` characters, breaking on spaces. */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  let current = "";

  for (const word of text.split(/\s+/).filter(Boolean)) {
    // Hard-split words that cannot fit on any line (long URLs)
    let rest = word;
    while (rest.length > width) {
      if (current) {
        lines.push(current);
        current = "";
      }
      lines.push(rest.slice(0, width));
      rest = rest.slice(width);
    }
    if (!rest) continue;

    if (!current) {
      current = rest;
    } else if (current.length + 1 + rest.length <= width) {
      current += ` ${rest}`;
    } else {
      lines.push(current);
      current = rest;
    }
  }

  if (current || lines.length === 0) lines.push(current);
  return lines;
}

/**
 * Render rows under `columns`, each column capped so the whole table stays
 * near `totalWidth` characters.
 */
export function renderTable(columns: string[], rows: string[][], totalWidth: number): string {
  const cap = Math.max(4, Math.floor(totalWidth / columns.length) - 3);

  const wrapped = [columns, ...rows].map((row) => row.map((cell) => wrapText(cell, cap)));
  const widths = columns.map((_, c) =>
    Math.max(...wrapped.map((row) => Math.max(...row[c].map((line) => line.length)))),
  );

  const border = `+${widths.map((w) => "-".repeat(w + 2)).join("+")}+`;
  const renderRow = (cells: string[][]): string[] => {
    const height = Math.max(...cells.map((lines) => lines.length));
    const out: string[] = [];
    for (let i = 0; i < height; i++) {
      out.push(`| ${cells.map((lines, c) => (lines[i] ?? "").padEnd(widths[c])).join(" | ")} |`);
    }
    return out;
  };

  const [head, ...body] = wrapped;
  return [
    border,
    ...renderRow(head),
    border,
    ...body.flatMap(renderRow),
    border,
  ].join("\n");
}
