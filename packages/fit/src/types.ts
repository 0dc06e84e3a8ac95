/** Types shared across the FIT conversion pipeline */

export type Scalar = string | number | boolean;

/** A raw field value as handed over by the binary decoder. */
export type FieldValue = Scalar | Date | null | undefined | ReadonlyArray<Scalar | Date | null | undefined>;

/** One decoded message: type tag, field values and optional field units. */
export interface FitMessage {
  type: string;
  fields: Readonly<Record<string, FieldValue>>;
  units?: Readonly<Record<string, string>>;
}

/** One row of the flat table; absent fields are simply missing keys. */
export interface TableRow {
  recordType: string;
  values: Readonly<Record<string, Scalar>>;
}

export interface RecordTable {
  /** `record_type` first, then every field (and `_units`) column in first-seen order. */
  columns: string[];
  rows: TableRow[];
}

// ── Typed row views ─────────────────────────────────────────────

/** Aggregate fields shared by sessions and laps. */
export interface SegmentFields {
  startTime?: string;
  timestamp?: string;
  sport?: string;
  subSport?: string;
  totalElapsedTime?: number;
  totalTimerTime?: number;
  totalDistance?: number;
  totalCalories?: number;
  avgSpeed?: number;
  maxSpeed?: number;
  avgHeartRate?: number;
  maxHeartRate?: number;
  avgCadence?: number;
  maxCadence?: number;
  avgPower?: number;
  maxPower?: number;
  totalAscent?: number;
  totalDescent?: number;
  totalStrokes?: number;
}

export interface SessionRow extends SegmentFields {
  kind: "session";
}

export interface LapRow extends SegmentFields {
  kind: "lap";
  /** 1-based position among the activity's laps. */
  lap: number;
  swolf?: number;
}

export interface SampleRow {
  kind: "record";
  timestamp?: string;
  heartRate?: number;
  speed?: number;
  altitude?: number;
  cadence?: number;
  power?: number;
  distance?: number;
  temperature?: number;
  positionLat?: number;
  positionLong?: number;
}

export interface OtherRow {
  kind: "other";
  recordType: string;
  values: Readonly<Record<string, Scalar>>;
}

export type ActivityRow = SessionRow | LapRow | SampleRow | OtherRow;

/** Everything the aggregate, chart and summary stages read. */
export interface Activity {
  /** Basename used for output files, e.g. `2024-05-01_morning-run`. */
  name: string;
  table: RecordTable;
  session: SessionRow;
  laps: LapRow[];
  samples: SampleRow[];
  /** Session sport, or the caller's override. */
  sport: string;
}

// ── Results ─────────────────────────────────────────────────────

export type Stage = "read" | "decode" | "extract" | "csv" | "aggregate" | "charts" | "summary";

export interface NoData {
  ok: false;
  reason: "no-data";
  message: string;
}

export type Result<T> = { ok: true; value: T } | NoData;
