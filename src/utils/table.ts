// Slack has no table primitive, so pipe tables are redrawn as aligned
// monospace text inside a code fence.

const FENCE = "```";

const SEPARATOR_RE = /^\|[\s\-|:]+\|$/;

export type Row = string[];

/** A trimmed line that starts and ends with a pipe. */
export function isTableRow(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.includes("|") && trimmed.startsWith("|") && trimmed.endsWith("|");
}

export function isSeparatorRow(line: string): boolean {
  return SEPARATOR_RE.test(line.trim());
}

export function splitCells(line: string): Row {
  return line
    .trim()
    .split("|")
    .slice(1, -1)
    .map((cell) => cell.trim());
}

// Display text drops emphasis markers entirely
function displayText(cell: string): string {
  return cell.replace(/\*/g, "");
}

// Code points, so an emoji counts once
function displayWidth(text: string): number {
  return [...text].length;
}

function padCell(text: string, width: number): string {
  return text + " ".repeat(Math.max(0, width - displayWidth(text)));
}

/** Max display length per header column. Cells past the header are ignored. */
export function columnWidths(rows: Row[]): number[] {
  if (rows.length === 0) return [];
  const numCols = rows[0].length;
  const widths: number[] = new Array(numCols).fill(0);
  for (const row of rows) {
    row.slice(0, numCols).forEach((cell, i) => {
      widths[i] = Math.max(widths[i], displayWidth(displayText(cell)));
    });
  }
  return widths;
}

/**
 * Render parsed rows as aligned lines. A dashed separator follows the header
 * when there is at least one body row. Short rows render only the cells they
 * have.
 */
export function formatTable(rows: Row[]): string[] {
  if (rows.length === 0) return [];
  const widths = columnWidths(rows);

  const out: string[] = [];
  rows.forEach((row, idx) => {
    out.push(
      row
        .slice(0, widths.length)
        .map((cell, i) => padCell(displayText(cell), widths[i]))
        .join(" | "),
    );
    if (idx === 0 && rows.length > 1) {
      out.push(widths.map((w) => "-".repeat(w)).join("-|-"));
    }
  });
  return out;
}

/** Fence a raw block of table lines, dropping separator rows first. */
export function renderTableBlock(lines: string[]): string[] {
  const rows = lines.filter((l) => !isSeparatorRow(l)).map(splitCells);
  return [FENCE, ...formatTable(rows), FENCE];
}

/**
 * Replace every run of table rows with its fenced rendering. Everything else
 * passes through in order.
 */
export function reflowTables(text: string): string {
  const out: string[] = [];
  let block: string[] = [];
  let state: "text" | "table" = "text";

  for (const line of text.split("\n")) {
    if (isTableRow(line)) {
      state = "table";
      block.push(line);
      continue;
    }
    if (state === "table") {
      out.push(...renderTableBlock(block));
      block = [];
      state = "text";
    }
    out.push(line);
  }
  if (state === "table") out.push(...renderTableBlock(block));

  return out.join("\n");
}
