import { recordTypes } from "./extract.ts";
import {
  PLACEHOLDER,
  formatHeartRate,
  formatMinutesSeconds,
  speedOrPace,
  speedUnitFor,
  type SpeedUnit,
} from "./metrics.ts";
import { laps as lapRows, samples as sampleRows, sessions, toActivityRows } from "./rows.ts";
import type {
  Activity,
  ActivityRow,
  LapRow,
  RecordTable,
  Result,
  SampleRow,
  Scalar,
  SessionRow,
} from "./types.ts";

// ── Session & laps ───────────────────────────────────────────────

/** The first session row. Files normally carry exactly one. */
export function selectSession(rows: readonly ActivityRow[]): Result<SessionRow> {
  const [session] = sessions(rows);
  if (!session) {
    return { ok: false, reason: "no-data", message: "No session data found" };
  }
  return { ok: true, value: session };
}

/** Lap rows in source order, numbered 1..N. */
export function collectLaps(rows: readonly ActivityRow[]): LapRow[] {
  return lapRows(rows);
}

export function buildActivity(table: RecordTable, name: string, sportOverride?: string): Result<Activity> {
  const rows = toActivityRows(table.rows);
  const session = selectSession(rows);
  if (!session.ok) return session;

  return {
    ok: true,
    value: {
      name,
      table,
      session: session.value,
      laps: collectLaps(rows),
      samples: sampleRows(rows),
      sport: sportOverride ?? session.value.sport ?? "activity",
    },
  };
}

// ── Lap table ────────────────────────────────────────────────────

export interface LapTableRow {
  lap: number;
  distance: string;
  time: string;
  avgHr: string;
  paceOrSpeed: string;
}

export interface LapTable {
  unit: SpeedUnit;
  headers: [string, string, string, string, string];
  rows: LapTableRow[];
}

/**
 * Per-lap table, or undefined for fewer than two laps: a single lap says
 * nothing the session summary doesn't.
 */
export function buildLapTable(laps: readonly LapRow[], sport: string | undefined): LapTable | undefined {
  if (laps.length < 2) return undefined;
  const unit = speedUnitFor(sport);
  return {
    unit,
    headers: ["Lap", "Distance (km)", "Time", "Avg HR", unit === "pace" ? "Pace" : "Speed"],
    rows: laps.map((lap) => ({
      lap: lap.lap,
      distance: ((lap.totalDistance ?? 0) / 1000).toFixed(2),
      time: formatMinutesSeconds(lap.totalElapsedTime ?? 0),
      avgHr: formatHeartRate(lap.avgHeartRate),
      paceOrSpeed: speedOrPace(lap.avgSpeed, sport)?.text ?? PLACEHOLDER,
    })),
  };
}

// ── Sample statistics ────────────────────────────────────────────

export type SampleMetric = "heartRate" | "cadence" | "speed" | "power" | "altitude" | "temperature";

export interface Stats {
  avg: number;
  max: number;
  min: number;
  count: number;
}

function stats(values: number[]): Stats | undefined {
  if (values.length === 0) return undefined;
  let sum = 0;
  let max = -Infinity;
  let min = Infinity;
  for (const v of values) {
    sum += v;
    if (v > max) max = v;
    if (v < min) min = v;
  }
  return { avg: sum / values.length, max, min, count: values.length };
}

/** Statistics over the metric's recorded values, optionally positive only. */
export function sampleStats(
  samples: readonly SampleRow[],
  metric: SampleMetric,
  { positiveOnly = false } = {},
): Stats | undefined {
  const values: number[] = [];
  for (const s of samples) {
    const v = s[metric];
    if (v === undefined) continue;
    if (positiveOnly && !(v > 0)) continue;
    values.push(v);
  }
  return stats(values);
}

// ── Metric summary ───────────────────────────────────────────────

const SESSION_SUMMARY_FIELDS = [
  "sport", "sub_sport", "total_elapsed_time", "total_timer_time",
  "total_distance", "total_calories", "avg_speed", "max_speed",
  "avg_heart_rate", "max_heart_rate", "avg_cadence", "max_cadence",
  "avg_power", "max_power", "total_ascent", "total_descent",
  "start_time", "timestamp",
] as const;

const RECORD_SUMMARY_METRICS: ReadonlyArray<readonly [string, SampleMetric]> = [
  ["heart_rate", "heartRate"],
  ["cadence", "cadence"],
  ["speed", "speed"],
  ["power", "power"],
  ["altitude", "altitude"],
  ["temperature", "temperature"],
];

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function formatTimestamp(value: Scalar): Scalar {
  if (typeof value !== "string") return value;
  const d = new Date(value);
  if (Number.isNaN(d.getTime()) || !/^\d{4}-\d{2}-\d{2}T/.test(value)) return value;
  return d.toISOString().replace("T", " ").slice(0, 19);
}

/** Seconds in each HR zone, from the session or its time_in_zone message. */
export function hrZoneTimes(table: RecordTable): number[] {
  const sources = table.rows.filter(
    (r) => r.recordType === "session" ||
      (r.recordType === "time_in_zone" && r.values.reference_mesg === "session"),
  );
  for (const row of sources) {
    const raw = row.values.time_in_hr_zone;
    if (raw === undefined) continue;
    const zones = String(raw)
      .split("|")
      .map(Number)
      .filter((n) => Number.isFinite(n));
    if (zones.length > 0) return zones;
  }
  return [];
}

/** Ordered `Metric,Value` pairs describing the whole workout. */
export function summarizeWorkout(table: RecordTable): [string, Scalar][] {
  const summary = new Map<string, Scalar>();
  const session = table.rows.find((r) => r.recordType === "session");

  if (session) {
    for (const field of SESSION_SUMMARY_FIELDS) {
      const value = session.values[field];
      if (value === undefined) continue;
      summary.set(field, field === "start_time" || field === "timestamp" ? formatTimestamp(value) : value);
      const unit = session.values[`${field}_units`];
      if (unit !== undefined) summary.set(`${field}_units`, unit);
    }
  }

  const samples = sampleRows(toActivityRows(table.rows));
  for (const [column, metric] of RECORD_SUMMARY_METRICS) {
    const s = sampleStats(samples, metric);
    if (!s) continue;
    if (!summary.has(`avg_${column}`)) summary.set(`avg_${column}`, round2(s.avg));
    if (!summary.has(`max_${column}`)) summary.set(`max_${column}`, s.max);
    if (metric !== "cadence" && !summary.has(`min_${column}`)) summary.set(`min_${column}`, s.min);
  }

  const laps = lapRows(toActivityRows(table.rows));
  if (laps.length > 0) {
    summary.set("number_of_laps", laps.length);
    const distances = laps.map((l) => l.totalDistance).filter((v): v is number => v !== undefined);
    if (distances.length > 0) {
      summary.set("avg_lap_distance", round2(distances.reduce((a, b) => a + b, 0) / distances.length));
    }
    const times = laps.map((l) => l.totalElapsedTime).filter((v): v is number => v !== undefined);
    if (times.length > 0) {
      summary.set("avg_lap_time", round2(times.reduce((a, b) => a + b, 0) / times.length));
    }
  }

  hrZoneTimes(table).forEach((seconds, i) => {
    summary.set(`time_in_hr_zone_${i}`, seconds);
  });

  summary.set("available_data_types", recordTypes(table).join(", "));
  return [...summary.entries()];
}
