import { buildActivity } from "../aggregate.ts";
import { extractRecords } from "../extract.ts";
import type { Activity, FitMessage, RecordTable } from "../types.ts";

export const START = Date.UTC(2024, 4, 1, 7, 0, 0);

export function recordMessage(offsetSeconds: number, fields: FitMessage["fields"]): FitMessage {
  return {
    type: "record",
    fields: { timestamp: new Date(START + offsetSeconds * 1000), ...fields },
    units: { heart_rate: "bpm", speed: "m/s", altitude: "m", cadence: "rpm", power: "watts" },
  };
}

/** Two-lap 10 km run: laps at 2.5 and 3.0 m/s, average HR 140. */
export function runningMessages(): FitMessage[] {
  const records = Array.from({ length: 6 }, (_, i) =>
    recordMessage(i * 10, { heart_rate: 130 + i * 2, speed: 2.5 + i * 0.1, altitude: 100 + i, cadence: 80 + i }));
  return [
    { type: "file_id", fields: { type: "activity", manufacturer: "garmin" } },
    ...records,
    {
      type: "lap",
      fields: { total_distance: 5000, total_elapsed_time: 2000, avg_speed: 2.5, avg_heart_rate: 135 },
      units: { total_distance: "m", total_elapsed_time: "s", avg_speed: "m/s", avg_heart_rate: "bpm" },
    },
    {
      type: "lap",
      fields: { total_distance: 5000, total_elapsed_time: 1000, avg_speed: 3.0 },
      units: { total_distance: "m", total_elapsed_time: "s", avg_speed: "m/s" },
    },
    {
      type: "session",
      fields: {
        sport: "running",
        start_time: new Date(START),
        total_distance: 10000,
        total_elapsed_time: 3000,
        avg_heart_rate: 140,
        max_heart_rate: 165,
      },
      units: { total_distance: "m", total_elapsed_time: "s", avg_heart_rate: "bpm", max_heart_rate: "bpm" },
    },
  ];
}

export function tableOf(messages: readonly FitMessage[], includeUnits = true): RecordTable {
  const result = extractRecords(messages, { includeUnits });
  if (!result.ok) throw new Error(result.message);
  return result.value;
}

export function activityOf(messages: readonly FitMessage[], sport?: string): Activity {
  const result = buildActivity(tableOf(messages), "test_activity", sport);
  if (!result.ok) throw new Error(result.message);
  return result.value;
}
