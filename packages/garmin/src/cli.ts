#!/usr/bin/env -S node --import tsx
import { Command, InvalidArgumentError } from "commander";
import { errorMessage, loadSettings, error as showError } from "@fitbook/shared";
import * as out from "@fitbook/shared/output";
import { saveActivity, syncActivities, writeDailyCsv } from "./export.ts";
import { daysBefore, garminProvider } from "./providers/garmin.ts";
import { DOWNLOAD_FORMATS, type ActivityProvider, type DownloadFormat } from "./types.ts";

const provider: ActivityProvider = garminProvider;

// ── Formatting helpers ───────────────────────────────────────────

function secToMin(s: number): string {
  return `${Math.round(s / 60)} min`;
}

function km(meters: number | null): string {
  if (meters == null) return "—";
  return `${(meters / 1000).toFixed(1)} km`;
}

function n(v: number | null): string {
  if (v == null) return "—";
  return String(Math.round(v));
}

function parseDays(days: string | undefined, fallback: number): number {
  const d = parseInt(days ?? String(fallback), 10);
  if (!Number.isInteger(d) || d <= 0) throw new InvalidArgumentError("Days must be a positive integer.");
  return d;
}

function parseDate(value: string): string {
  const valid = /^\d{4}-\d{2}-\d{2}$/.test(value) && !Number.isNaN(Date.parse(`${value}T00:00:00Z`));
  if (!valid || daysBefore(value, 0) !== value) {
    throw new InvalidArgumentError("Expected a date as YYYY-MM-DD.");
  }
  return value;
}

function parseFormat(value: string): DownloadFormat {
  const format = DOWNLOAD_FORMATS.find((f) => f === value.toLowerCase());
  if (!format) throw new InvalidArgumentError(`Expected one of: ${DOWNLOAD_FORMATS.join(", ")}`);
  return format;
}

// ── Program ──────────────────────────────────────────────────────

const program = new Command();
program.name("garmin").description("Garmin Connect activity and health downloads").version("0.3.0");

program
  .command("activities [days]")
  .description("Workouts: name, duration, distance, HR, calories")
  .action(async (days?: string) => {
    const d = parseDays(days, 7);
    const data = await provider.activities(d);
    out.heading(`Activities — last ${d} days`);
    out.blank();
    if (data.length === 0) { out.info("No activity data."); return; }

    out.table(
      ["ID", "Date", "Name", "Type", "Duration", "Distance", "AvgHR", "kcal", "Elev"],
      data.map((r) => [
        String(r.activityId), r.date, r.name, r.type, secToMin(r.durationSeconds), km(r.distanceMeters),
        n(r.avgHr), n(r.calories),
        r.elevationGain != null ? `${Math.round(r.elevationGain)}m` : "—",
      ]),
    );
  });

program
  .command("download <id>")
  .description("Download one activity into exports/activities")
  .option("-f, --format <format>", "fit, tcx, gpx, kml or csv", parseFormat, "fit")
  .action(async (id: string, opts: { format: DownloadFormat }) => {
    const activityId = parseInt(id, 10);
    if (!Number.isInteger(activityId)) throw new Error(`Invalid activity id: ${id}`);
    const path = await saveActivity(provider, activityId, opts.format, loadSettings().activitiesDir);
    out.success(`Activity downloaded to ${path}`);
  });

program
  .command("sync [days]")
  .description("Download recent activities not yet in exports/activities")
  .option("-f, --format <format>", "fit, tcx, gpx, kml or csv", parseFormat, "fit")
  .action(async (days: string | undefined, opts: { format: DownloadFormat }) => {
    const d = parseDays(days, 7);
    const dir = loadSettings().activitiesDir;
    out.heading(`Syncing activities — last ${d} days`);
    const outcomes = await syncActivities(provider, dir, d, opts.format, (outcome, activity) => {
      switch (outcome.status) {
        case "downloaded":
          out.success(`${activity.date} ${activity.name}: ${outcome.path}`);
          break;
        case "skipped":
          out.info(`${activity.date} ${activity.name}: already downloaded`);
          break;
        case "failed":
          out.warn(`${activity.date} ${activity.name}: ${outcome.error}`);
          break;
      }
    });
    out.blank();
    const count = (status: string) => outcomes.filter((o) => o.status === status).length;
    out.tally({ Downloaded: count("downloaded"), Skipped: count("skipped"), Failed: count("failed") });
    if (count("failed") > 0) process.exitCode = 1;
  });

program
  .command("health [days]")
  .description("Daily summaries to exports/health/daily_<from>_<to>.csv")
  .option("-d, --date <YYYY-MM-DD>", "Last day to include (default: today)", parseDate)
  .action(async (days: string | undefined, opts: { date?: string }) => {
    const d = parseDays(days, 7);
    const { days: data, skipped } = await provider.daily(d, opts.date);
    out.heading(`Daily Summary — ${d} days${opts.date ? ` to ${opts.date}` : ""}`);
    out.blank();
    for (const day of skipped) out.warn(`${day.date}: ${day.error}`);
    if (data.length === 0) { out.info("No data."); return; }

    out.table(
      ["Date", "Steps", "Distance", "Active kcal", "RHR", "Min HR", "Max HR", "Avg Stress", "BB Wake", "Floors"],
      data.map((r) => [
        r.date, String(r.totalSteps), km(r.distanceMeters), String(Math.round(r.activeKcal)),
        n(r.restingHr), n(r.minHr), n(r.maxHr), n(r.avgStress), n(r.bbAtWake), n(r.floorsAscended),
      ]),
    );
    const path = await writeDailyCsv(data, loadSettings().healthDir);
    if (path) {
      out.blank();
      out.success(`Saved ${path}`);
    }
  });

// ── Run ──────────────────────────────────────────────────────────

try {
  await program.parseAsync(process.argv);
} catch (e: unknown) {
  showError(errorMessage(e));
  process.exit(1);
}
