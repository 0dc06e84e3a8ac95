import { mkdir, readdir, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { errorMessage } from "@fitbook/shared";
import { selectSession } from "./aggregate.ts";
import type { ChartData } from "./charts/data.ts";
import { writeChart, type ChartOutcome } from "./charts/write.ts";
import { readTableCsv } from "./csv.ts";
import { formatPace, paceFromSpeed, speedOrPace, speedToKmh, titleCase } from "./metrics.ts";
import { toActivityRows } from "./rows.ts";

export const COMPARISON_REPORT = "workout_comparison.md";
export const DEFAULT_COMPARE_DAYS = 90;

export interface WorkoutSummary {
  file: string;
  /** `YYYY-MM-DD`, when the session carries a timestamp. */
  date?: string;
  sport: string;
  distanceKm: number;
  durationMin: number;
  avgHeartRate?: number;
  maxHeartRate?: number;
  /** m/s */
  avgSpeed?: number;
  avgSpeedKmh?: number;
  /** Minutes per km. */
  pace?: number;
  avgPower?: number;
  calories?: number;
  avgCadence?: number;
  elevationGain?: number;
}

export interface FindWorkoutsOptions {
  /** Case-insensitive substring of the session sport. */
  sport?: string;
  days?: number;
  now?: Date;
}

/** Read the session of a workout CSV; undefined when it has none. */
export async function readWorkoutSummary(path: string): Promise<WorkoutSummary | undefined> {
  const table = await readTableCsv(path);
  const found = selectSession(toActivityRows(table.rows));
  if (!found.ok) return undefined;
  const s = found.value;
  const when = s.timestamp ?? s.startTime;
  return {
    file: path,
    date: when && /^\d{4}-\d{2}-\d{2}/.test(when) ? when.slice(0, 10) : undefined,
    sport: titleCase(s.sport ?? "activity"),
    distanceKm: (s.totalDistance ?? 0) / 1000,
    durationMin: (s.totalElapsedTime ?? 0) / 60,
    avgHeartRate: s.avgHeartRate,
    maxHeartRate: s.maxHeartRate,
    avgSpeed: s.avgSpeed,
    avgSpeedKmh: s.avgSpeed === undefined ? undefined : speedToKmh(s.avgSpeed),
    pace: paceFromSpeed(s.avgSpeed),
    avgPower: s.avgPower,
    calories: s.totalCalories,
    avgCadence: s.avgCadence,
    elevationGain: s.totalAscent,
  };
}

async function csvFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && e.name.toLowerCase().endsWith(".csv") && !e.name.includes("_summary"))
      .map((e) => join(dir, e.name));
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return [];
    throw e;
  }
}

/**
 * Workout CSVs in `dir` and its `chatgpt_ready` subdirectory, modified within
 * the last `days`, oldest first. Unreadable files are passed to `onSkip`.
 */
export async function findWorkoutCsvs(
  dir: string,
  { sport, days = DEFAULT_COMPARE_DAYS, now = new Date() }: FindWorkoutsOptions = {},
  onSkip?: (path: string, reason: string) => void,
): Promise<string[]> {
  const cutoff = now.getTime() - days * 86_400_000;
  const candidates = [...(await csvFiles(dir)), ...(await csvFiles(join(dir, "chatgpt_ready")))];
  const kept: { path: string; mtime: number }[] = [];

  for (const path of candidates) {
    const { mtimeMs } = await stat(path);
    if (mtimeMs < cutoff) continue;
    if (sport) {
      try {
        const summary = await readWorkoutSummary(path);
        if (summary && !summary.sport.toLowerCase().includes(sport.toLowerCase())) continue;
      } catch (e) {
        onSkip?.(path, errorMessage(e));
        continue;
      }
    }
    kept.push({ path, mtime: mtimeMs });
  }
  return kept.sort((a, b) => a.mtime - b.mtime).map((f) => f.path);
}

// ── Comparison ──────────────────────────────────────────────────

export interface MetricStats {
  label: string;
  avg: number;
  min: number;
  max: number;
  total: number;
}

export interface WeekTotal {
  /** ISO week, e.g. `2024-W18`. */
  week: string;
  workouts: number;
  distanceKm: number;
  calories: number;
}

export interface Comparison {
  /** Oldest first; undated workouts last. */
  workouts: WorkoutSummary[];
  from?: string;
  to?: string;
  stats: MetricStats[];
  weekly: WeekTotal[];
}

/** ISO-8601 week of a `YYYY-MM-DD` date. */
export function isoWeek(date: string): string {
  const d = new Date(`${date.slice(0, 10)}T00:00:00Z`);
  const day = d.getUTCDay() || 7;
  // Thursday of the same week decides the year.
  d.setUTCDate(d.getUTCDate() + 4 - day);
  const yearStart = Date.UTC(d.getUTCFullYear(), 0, 1);
  const week = Math.ceil(((d.getTime() - yearStart) / 86_400_000 + 1) / 7);
  return `${d.getUTCFullYear()}-W${String(week).padStart(2, "0")}`;
}

function metricStats(label: string, values: ReadonlyArray<number | undefined>): MetricStats | undefined {
  const present = values.filter((v): v is number => v !== undefined);
  if (present.length === 0) return undefined;
  const total = present.reduce((a, b) => a + b, 0);
  return { label, avg: total / present.length, min: Math.min(...present), max: Math.max(...present), total };
}

export function compareWorkouts(summaries: readonly WorkoutSummary[]): Comparison {
  const workouts = [...summaries].sort((a, b) => {
    if (a.date === b.date) return 0;
    if (a.date === undefined) return 1;
    if (b.date === undefined) return -1;
    return a.date < b.date ? -1 : 1;
  });
  const dates = workouts.flatMap((w) => (w.date ? [w.date] : []));

  const stats = [
    metricStats("Distance (km)", workouts.map((w) => w.distanceKm)),
    metricStats("Duration (min)", workouts.map((w) => w.durationMin)),
    metricStats("Calories", workouts.map((w) => w.calories)),
    metricStats("Avg HR (bpm)", workouts.map((w) => w.avgHeartRate)),
  ].filter((s): s is MetricStats => s !== undefined);

  const weeks = new Map<string, WeekTotal>();
  for (const w of workouts) {
    if (!w.date) continue;
    const week = isoWeek(w.date);
    const total = weeks.get(week) ?? { week, workouts: 0, distanceKm: 0, calories: 0 };
    total.workouts += 1;
    total.distanceKm += w.distanceKm;
    total.calories += w.calories ?? 0;
    weeks.set(week, total);
  }

  return { workouts, from: dates[0], to: dates.at(-1), stats, weekly: [...weeks.values()] };
}

// ── Trend charts ────────────────────────────────────────────────

export type TrendChart = "distance_trend" | "heart_rate_trend" | "pace_improvement" | "power_trend" | "weekly_summary";

export function trendCharts(comparison: Comparison): { name: TrendChart; data: ChartData }[] {
  const dated = comparison.workouts.filter((w) => w.date !== undefined);
  const charts: { name: TrendChart; data: ChartData }[] = [];
  if (dated.length === 0) return charts;

  charts.push({
    name: "distance_trend",
    data: {
      kind: "line",
      title: "Workout Distance Over Time",
      xKey: "date",
      xLabel: "Date",
      yLabel: "Distance (km)",
      series: [{ key: "distance", label: "Distance", color: "#1565c0" }],
      rows: dated.map((w) => ({ date: w.date, distance: Number(w.distanceKm.toFixed(2)) })),
    },
  });

  if (dated.some((w) => w.avgHeartRate !== undefined)) {
    charts.push({
      name: "heart_rate_trend",
      data: {
        kind: "line",
        title: "Heart Rate Trends",
        xKey: "date",
        xLabel: "Date",
        yLabel: "Heart Rate (bpm)",
        series: [
          { key: "avg_hr", label: "Avg HR", color: "#d32f2f" },
          { key: "max_hr", label: "Max HR", color: "#ff8a65" },
        ],
        rows: dated.map((w) => ({ date: w.date, avg_hr: w.avgHeartRate, max_hr: w.maxHeartRate })),
      },
    });
  }

  const runs = dated.filter((w) => w.sport.toLowerCase() === "running" && w.pace !== undefined);
  if (runs.length > 0) {
    charts.push({
      name: "pace_improvement",
      data: {
        kind: "line",
        title: "Running Pace Improvement",
        xKey: "date",
        xLabel: "Date",
        yLabel: "Pace (min/km)",
        series: [{ key: "pace", label: "Pace", color: "#2e7d32" }],
        rows: runs.map((w) => ({ date: w.date, pace: w.pace })),
        invertY: true,
        formatY: formatPace,
      },
    });
  }

  const rides = dated.filter((w) => w.sport.toLowerCase() === "cycling" && w.avgPower !== undefined);
  if (rides.length > 0) {
    charts.push({
      name: "power_trend",
      data: {
        kind: "line",
        title: "Cycling Power Trend",
        xKey: "date",
        xLabel: "Date",
        yLabel: "Average Power (watts)",
        series: [{ key: "power", label: "Avg power", color: "#ef6c00" }],
        rows: rides.map((w) => ({ date: w.date, power: w.avgPower })),
      },
    });
  }

  if (comparison.weekly.length > 1) {
    charts.push({
      name: "weekly_summary",
      data: {
        kind: "bar",
        title: "Weekly Training Volume",
        xKey: "week",
        xLabel: "Week",
        yLabel: "Distance (km)",
        series: [{ key: "distance", label: "Distance", color: "#1565c0" }],
        rows: comparison.weekly.map((w) => ({ week: w.week, distance: Number(w.distanceKm.toFixed(2)) })),
      },
    });
  }
  return charts;
}

// ── Report ──────────────────────────────────────────────────────

function cell(value: number | undefined, digits: number, unit = ""): string {
  return value === undefined ? "-" : `${value.toFixed(digits)}${unit}`;
}

export function formatComparison(comparison: Comparison, chartFiles: readonly string[] = []): string {
  const { workouts, stats, weekly } = comparison;
  const out: string[] = ["# Workout Comparison", ""];
  const range = comparison.from && comparison.to ? ` from ${comparison.from} to ${comparison.to}` : "";
  out.push(`Analysis of ${workouts.length} workout${workouts.length === 1 ? "" : "s"}${range}.`, "");

  if (stats.length > 0) {
    out.push("## Summary Statistics", "");
    out.push("| Metric | Average | Minimum | Maximum | Total |");
    out.push("| --- | --- | --- | --- | --- |");
    for (const s of stats) {
      out.push(`| ${s.label} | ${s.avg.toFixed(1)} | ${s.min.toFixed(1)} | ${s.max.toFixed(1)} | ${s.total.toFixed(1)} |`);
    }
    out.push("");
  }

  if (weekly.length > 0) {
    out.push("## Weekly Totals", "");
    out.push("| Week | Workouts | Distance (km) | Calories |");
    out.push("| --- | --- | --- | --- |");
    for (const w of weekly) {
      out.push(`| ${w.week} | ${w.workouts} | ${w.distanceKm.toFixed(2)} | ${Math.round(w.calories)} |`);
    }
    out.push("");
  }

  if (chartFiles.length > 0) {
    out.push("## Trend Charts", "");
    for (const file of chartFiles) {
      const name = file.replace(/\.png$/, "");
      out.push(`![${titleCase(name)}](${file})`);
    }
    out.push("");
  }

  out.push("## Analyzed Workouts", "");
  out.push("| Date | Sport | Distance | Duration | Avg HR | Pace/Speed |");
  out.push("| --- | --- | --- | --- | --- | --- |");
  for (const w of [...workouts].reverse()) {
    const speed = speedOrPace(w.avgSpeed, w.sport)?.text ?? "-";
    out.push(
      `| ${w.date ?? "Unknown"} | ${w.sport} | ${cell(w.distanceKm, 2, " km")} | ${cell(w.durationMin, 0, " min")} | ${cell(w.avgHeartRate, 0, " bpm")} | ${speed} |`,
    );
  }
  out.push("");
  return out.join("\n");
}

export interface ComparisonOutput {
  report: string;
  charts: ChartOutcome[];
}

/** Trend charts plus `workout_comparison.md` in `outDir`. */
export async function writeComparison(comparison: Comparison, outDir: string): Promise<ComparisonOutput> {
  await mkdir(outDir, { recursive: true });
  const charts: ChartOutcome[] = [];
  for (const { name, data } of trendCharts(comparison)) {
    try {
      charts.push({ metric: name, path: await writeChart(data, join(outDir, `${name}.png`)) });
    } catch (e) {
      charts.push({ metric: name, error: errorMessage(e) });
    }
  }
  const files = charts.flatMap((c) => ("path" in c ? [`${c.metric}.png`] : []));
  const report = join(outDir, COMPARISON_REPORT);
  await writeFile(report, formatComparison(comparison, files), "utf-8");
  return { report, charts };
}
