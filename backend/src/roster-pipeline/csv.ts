import fs from "node:fs";
import path from "node:path";
import Papa from "papaparse";

export type CsvRow = Record<string, string>;

export type CsvTable = {
  fields: string[];
  rows: CsvRow[];
};

export function parseCsv(text: string): CsvTable {
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const parsed = Papa.parse<Record<string, unknown>>(input, {
    header: true,
    skipEmptyLines: true,
  });

  const fields = (parsed.meta.fields ?? []).filter((field) => field !== "");
  const rows = parsed.data.map((record) => {
    const row: CsvRow = {};
    for (const field of fields) {
      const value = record[field];
      row[field] = typeof value === "string" ? value : "";
    }
    return row;
  });

  return { fields, rows };
}

export function formatCsv(table: CsvTable): string {
  const data = table.rows.map((row) => table.fields.map((field) => row[field] ?? ""));
  return Papa.unparse({ fields: table.fields, data }, { newline: "\n" }) + "\n";
}

export function readCsv(filePath: string): CsvTable {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) throw new Error(`CSV not found: ${resolved}`);
  return parseCsv(fs.readFileSync(resolved, "utf8"));
}

export function writeCsv(filePath: string, table: CsvTable): string {
  const resolved = path.resolve(filePath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, formatCsv(table), "utf8");
  return resolved;
}

// Keeps the existing column order and appends only the missing columns.
export function appendColumns(fields: readonly string[], extra: readonly string[]): string[] {
  const out = [...fields];
  for (const column of extra) {
    if (!out.includes(column)) out.push(column);
  }
  return out;
}

export function findColumn(fields: readonly string[], name: string): string | null {
  const wanted = name.trim().toLowerCase();
  return fields.find((field) => field.trim().toLowerCase() === wanted) ?? null;
}

export function cell(row: CsvRow, column: string): string {
  return (row[column] ?? "").trim();
}
