import type {
  ActivityRow,
  LapRow,
  SampleRow,
  Scalar,
  SegmentFields,
  SessionRow,
  TableRow,
} from "./types.ts";

type Values = Readonly<Record<string, Scalar>>;

/** First finite number among the given columns. */
function num(values: Values, ...columns: string[]): number | undefined {
  for (const column of columns) {
    const v = values[column];
    if (typeof v === "number" && Number.isFinite(v)) return v;
    if (typeof v === "string" && v.trim() !== "") {
      const parsed = Number(v);
      if (Number.isFinite(parsed)) return parsed;
    }
  }
  return undefined;
}

function str(values: Values, column: string): string | undefined {
  const v = values[column];
  if (v === undefined) return undefined;
  return String(v);
}

function segmentFields(values: Values): SegmentFields {
  return {
    startTime: str(values, "start_time"),
    timestamp: str(values, "timestamp"),
    sport: str(values, "sport"),
    subSport: str(values, "sub_sport"),
    totalElapsedTime: num(values, "total_elapsed_time"),
    totalTimerTime: num(values, "total_timer_time"),
    totalDistance: num(values, "total_distance"),
    totalCalories: num(values, "total_calories"),
    avgSpeed: num(values, "avg_speed", "enhanced_avg_speed"),
    maxSpeed: num(values, "max_speed", "enhanced_max_speed"),
    avgHeartRate: num(values, "avg_heart_rate"),
    maxHeartRate: num(values, "max_heart_rate"),
    avgCadence: num(values, "avg_cadence", "avg_running_cadence"),
    maxCadence: num(values, "max_cadence", "max_running_cadence"),
    avgPower: num(values, "avg_power"),
    maxPower: num(values, "max_power"),
    totalAscent: num(values, "total_ascent"),
    totalDescent: num(values, "total_descent"),
    totalStrokes: num(values, "total_strokes", "total_cycles"),
  };
}

export function toSample(values: Values): SampleRow {
  return {
    kind: "record",
    timestamp: str(values, "timestamp"),
    heartRate: num(values, "heart_rate"),
    speed: num(values, "speed", "enhanced_speed"),
    altitude: num(values, "altitude", "enhanced_altitude"),
    cadence: num(values, "cadence"),
    power: num(values, "power"),
    distance: num(values, "distance"),
    temperature: num(values, "temperature"),
    positionLat: num(values, "position_lat"),
    positionLong: num(values, "position_long"),
  };
}

/**
 * View table rows through the tagged row union. Laps are numbered by their
 * position among lap rows, starting at 1.
 */
export function toActivityRows(rows: readonly TableRow[]): ActivityRow[] {
  let lap = 0;
  return rows.map((row): ActivityRow => {
    switch (row.recordType) {
      case "session":
        return { kind: "session", ...segmentFields(row.values) };
      case "lap":
        lap += 1;
        return { kind: "lap", lap, ...segmentFields(row.values), swolf: num(row.values, "swolf") };
      case "record":
        return toSample(row.values);
      default:
        return { kind: "other", recordType: row.recordType, values: row.values };
    }
  });
}

export function sessions(rows: readonly ActivityRow[]): SessionRow[] {
  return rows.filter((r): r is SessionRow => r.kind === "session");
}

export function samples(rows: readonly ActivityRow[]): SampleRow[] {
  return rows.filter((r): r is SampleRow => r.kind === "record");
}

export function laps(rows: readonly ActivityRow[]): LapRow[] {
  return rows.filter((r): r is LapRow => r.kind === "lap");
}
