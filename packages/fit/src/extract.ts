import type { FieldValue, FitMessage, RecordTable, Result, Scalar, TableRow } from "./types.ts";

export const RECORD_TYPE = "record_type";
export const UNITS_SUFFIX = "_units";

export interface ExtractOptions {
  /** Emit a `<field>_units` column next to every field that carries a unit. */
  includeUnits?: boolean;
}

function toCell(value: FieldValue): Scalar | undefined {
  if (value === null || value === undefined) return undefined;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value.toISOString();
  }
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string" || typeof value === "boolean") return value;
  const parts = value
    .map((v) => toCell(v))
    .filter((v): v is Scalar => v !== undefined);
  return parts.length > 0 ? parts.join("|") : undefined;
}

/**
 * Flatten decoded messages into one table row per message.
 *
 * Columns are the union of field names in first-seen order. With
 * `includeUnits`, a unit seen on any message of a record type is repeated on
 * every row of that type, so a row lacking the value still names the unit.
 */
export function extractRecords(messages: readonly FitMessage[], options: ExtractOptions = {}): Result<RecordTable> {
  if (messages.length === 0) {
    return { ok: false, reason: "no-data", message: "No data found in FIT file" };
  }

  const fieldOrder: string[] = [];
  const seenFields = new Set<string>();
  const unitFields = new Set<string>();
  // record type → field → unit
  const unitsByType = new Map<string, Map<string, string>>();

  const baseRows: { recordType: string; values: Record<string, Scalar> }[] = [];

  for (const message of messages) {
    const values: Record<string, Scalar> = {};
    for (const [field, raw] of Object.entries(message.fields)) {
      const cell = toCell(raw);
      if (cell === undefined) continue;
      if (!seenFields.has(field)) {
        seenFields.add(field);
        fieldOrder.push(field);
      }
      values[field] = cell;

      const unit = message.units?.[field];
      if (options.includeUnits && unit) {
        let typeUnits = unitsByType.get(message.type);
        if (!typeUnits) {
          typeUnits = new Map();
          unitsByType.set(message.type, typeUnits);
        }
        if (!typeUnits.has(field)) typeUnits.set(field, unit);
        unitFields.add(field);
      }
    }
    baseRows.push({ recordType: message.type, values });
  }

  const columns = [RECORD_TYPE];
  for (const field of fieldOrder) {
    columns.push(field);
    if (unitFields.has(field)) columns.push(`${field}${UNITS_SUFFIX}`);
  }

  const rows: TableRow[] = baseRows.map(({ recordType, values }) => {
    const typeUnits = unitsByType.get(recordType);
    if (!typeUnits) return { recordType, values };
    const withUnits: Record<string, Scalar> = { ...values };
    for (const [field, unit] of typeUnits) {
      withUnits[`${field}${UNITS_SUFFIX}`] = unit;
    }
    return { recordType, values: withUnits };
  });

  return { ok: true, value: { columns, rows } };
}

/** Record types present in the table, in first-seen order. */
export function recordTypes(table: RecordTable): string[] {
  return [...new Set(table.rows.map((r) => r.recordType))];
}
