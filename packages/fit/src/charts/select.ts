import { formatPace, isRunning, titleCase } from "../metrics.ts";
import type { Activity } from "../types.ts";

export type BasicChart =
  | "heart_rate"
  | "speed"
  | "pace"
  | "elevation"
  | "cadence"
  | "power"
  | "hr_speed"
  | "lap_analysis";

export type AdvancedChart =
  | "hr_zones"
  | "hr_vs_pace"
  | "stride_analysis"
  | "power_zones"
  | "cadence_vs_power"
  | "swim_lap_times"
  | "swim_swolf"
  | "swim_stroke_rate";

export type ChartMetric = BasicChart | AdvancedChart;

export interface ChartSpec {
  metric: ChartMetric;
  title: string;
  unit: string;
  format: (value: number) => string;
  tier: "basic" | "advanced";
}

export interface ChartFlags {
  basic: boolean;
  /** Implies basic. */
  advanced: boolean;
}

const round0 = (v: number): string => String(Math.round(v));
const round1 = (v: number): string => v.toFixed(1);

function hasColumn(activity: Activity, ...columns: string[]): boolean {
  return columns.some((c) => activity.table.columns.includes(c));
}

export function hasHeartRate(activity: Activity): boolean {
  return activity.samples.some((s) => s.heartRate !== undefined);
}

export function hasSpeed(activity: Activity): boolean {
  return hasColumn(activity, "speed", "enhanced_speed");
}

export function hasElevation(activity: Activity): boolean {
  return hasColumn(activity, "altitude", "enhanced_altitude");
}

function basicCharts(activity: Activity): ChartSpec[] {
  const sport = titleCase(activity.sport);
  const running = isRunning(activity.sport);
  const specs: ChartSpec[] = [];
  const hr = hasHeartRate(activity);
  const speed = hasSpeed(activity);

  if (hr) {
    specs.push({ metric: "heart_rate", title: `Heart Rate During ${sport}`, unit: "bpm", format: round0, tier: "basic" });
  }
  if (speed) {
    specs.push(running
      ? { metric: "pace", title: `Running Pace During ${sport}`, unit: "min/km", format: formatPace, tier: "basic" }
      : { metric: "speed", title: `Speed During ${sport}`, unit: "km/h", format: round1, tier: "basic" });
  }
  if (hasElevation(activity)) {
    specs.push({ metric: "elevation", title: `Elevation Profile for ${sport}`, unit: "m", format: round0, tier: "basic" });
  }
  if (hasColumn(activity, "cadence")) {
    specs.push({ metric: "cadence", title: `Cadence During ${sport}`, unit: running ? "spm" : "rpm", format: round0, tier: "basic" });
  }
  if (hasColumn(activity, "power")) {
    specs.push({ metric: "power", title: `Power Output During ${sport}`, unit: "W", format: round0, tier: "basic" });
  }
  if (hr && speed) {
    specs.push({ metric: "hr_speed", title: `Heart Rate and Speed During ${sport}`, unit: "bpm / km/h", format: round1, tier: "basic" });
  }
  if (activity.laps.length >= 2) {
    specs.push(running
      ? { metric: "lap_analysis", title: `Lap Analysis for ${sport}`, unit: "min/km", format: formatPace, tier: "basic" }
      : { metric: "lap_analysis", title: `Lap Analysis for ${sport}`, unit: "km/h", format: round1, tier: "basic" });
  }
  return specs;
}

function advancedCharts(activity: Activity): ChartSpec[] {
  const sport = activity.sport.toLowerCase();
  const specs: ChartSpec[] = [];
  const hr = hasHeartRate(activity);
  const advanced = (metric: AdvancedChart, title: string, unit: string, format: ChartSpec["format"]): void => {
    specs.push({ metric, title, unit, format, tier: "advanced" });
  };

  if (hr) advanced("hr_zones", "Time in Heart Rate Zones", "min", round1);

  if (sport === "running") {
    if (hr && hasSpeed(activity)) advanced("hr_vs_pace", "Heart Rate vs. Pace Relationship", "bpm", round0);
    if (hasSpeed(activity) && hasColumn(activity, "cadence")) {
      advanced("stride_analysis", "Stride Length vs. Pace Relationship", "m", (v) => v.toFixed(2));
    }
  } else if (sport === "cycling" || sport === "biking") {
    if (hasColumn(activity, "power")) advanced("power_zones", "Power Zone Distribution", "s", round0);
    if (hasColumn(activity, "power") && hasColumn(activity, "cadence")) {
      advanced("cadence_vs_power", "Cadence vs. Power Relationship", "W", round0);
    }
  } else if (sport === "swimming") {
    if (activity.laps.length >= 2) {
      advanced("swim_lap_times", "Swimming Lap Times", "min", (v) => v.toFixed(2));
      if (activity.laps.some((l) => l.swolf !== undefined || l.totalStrokes !== undefined)) {
        advanced("swim_swolf", "SWOLF Score by Lap (Lower is Better)", "SWOLF", round0);
      }
      if (activity.laps.some((l) => l.totalStrokes !== undefined)) {
        advanced("swim_stroke_rate", "Stroke Rate by Lap", "strokes/min", round1);
      }
    }
  }
  return specs;
}

/**
 * Charts to render for an activity, decided by column presence only.
 * The advanced tier is added on top of the basic set, never instead of it.
 */
export function selectCharts(activity: Activity, flags: ChartFlags): ChartSpec[] {
  if (!flags.basic && !flags.advanced) return [];
  const specs = basicCharts(activity);
  return flags.advanced ? [...specs, ...advancedCharts(activity)] : specs;
}
