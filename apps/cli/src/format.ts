type Cell = string | number | boolean | null | undefined;

/** "m:ss", or "h:mm:ss" once an hour has passed. */
export function formatElapsed(ms: number): string {
  const seconds = Math.floor(Math.max(0, ms) / 1000);
  const h = Math.floor(seconds / 3600);
  const m = Math.floor(seconds / 60) % 60;
  const s = String(seconds % 60).padStart(2, "0");
  return h > 0 ? `${h}:${String(m).padStart(2, "0")}:${s}` : `${m}:${s}`;
}

export function truncate(s: string, n: number): string {
  if (s.length <= n) return s;
  return n <= 3 ? s.slice(0, Math.max(0, n)) : `${s.slice(0, n - 3)}...`;
}

/** Left-aligned columns keyed by the first row, two spaces apart. */
export function formatTable(rows: ReadonlyArray<Record<string, Cell>>): string[] {
  const first = rows[0];
  if (!first) return [];
  const columns = Object.keys(first);
  const grid = rows.map((row) => columns.map((col) => (row[col] == null ? "" : String(row[col]))));
  const widths = columns.map((col, i) => Math.max(col.length, ...grid.map((cells) => cells[i].length)));
  const line = (cells: string[]) => cells.map((cell, i) => cell.padEnd(widths[i])).join("  ");
  return [line(columns), line(widths.map((w) => "-".repeat(w))), ...grid.map(line)];
}

export function printTable(rows: ReadonlyArray<Record<string, Cell>>): void {
  for (const row of formatTable(rows)) console.log(row);
}
