import { readFile, writeFile } from "node:fs/promises";
import Papa from "papaparse";
import { RECORD_TYPE } from "./extract.ts";
import type { RecordTable, Scalar, TableRow } from "./types.ts";

export function tableToCsv(table: RecordTable): string {
  const data = table.rows.map((row) =>
    table.columns.map((column) =>
      column === RECORD_TYPE ? row.recordType : row.values[column] ?? ""
    )
  );
  return Papa.unparse({ fields: table.columns, data }, { newline: "\n" }) + "\n";
}

function toScalar(value: unknown): Scalar | undefined {
  if (typeof value === "string") return value === "" ? undefined : value;
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "boolean") return value;
  // dynamicTyping turns ISO timestamps into Dates; keep the extracted form.
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? undefined : value.toISOString();
  return undefined;
}

/** Parse a CSV written by {@link tableToCsv} back into a table. */
export function csvToTable(text: string): RecordTable {
  const parsed = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    dynamicTyping: true,
    skipEmptyLines: true,
  });

  const columns = parsed.meta.fields ?? [];
  if (!columns.includes(RECORD_TYPE)) {
    throw new Error(`CSV has no "${RECORD_TYPE}" column`);
  }

  const rows: TableRow[] = [];
  for (const raw of parsed.data) {
    const recordType = raw[RECORD_TYPE];
    if (typeof recordType !== "string" || recordType === "") continue;
    const values: Record<string, Scalar> = {};
    for (const column of columns) {
      if (column === RECORD_TYPE) continue;
      const value = toScalar(raw[column]);
      if (value !== undefined) values[column] = value;
    }
    rows.push({ recordType, values });
  }
  return { columns, rows };
}

export async function writeTableCsv(table: RecordTable, path: string): Promise<void> {
  await writeFile(path, tableToCsv(table), "utf-8");
}

export async function readTableCsv(path: string): Promise<RecordTable> {
  return csvToTable(await readFile(path, "utf-8"));
}

/** Two-column `Metric,Value` CSV. */
export function metricsToCsv(metrics: ReadonlyArray<readonly [string, Scalar]>): string {
  return Papa.unparse({ fields: ["Metric", "Value"], data: metrics.map(([k, v]) => [k, v]) }, { newline: "\n" }) + "\n";
}
