import { existsSync } from "node:fs";
import { mkdir, readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import Papa from "papaparse";
import { errorMessage } from "@fitbook/shared";
import type { ActivityProvider, ActivitySummary, DailySummary, DownloadFormat } from "./types.ts";

export type SyncOutcome =
  | { activityId: number; status: "downloaded"; path: string }
  | { activityId: number; status: "skipped" }
  | { activityId: number; status: "failed"; error: string };

/** Download one activity into `dir`; returns the written path. */
export async function saveActivity(
  provider: ActivityProvider,
  activity: number | ActivitySummary,
  format: DownloadFormat,
  dir: string,
): Promise<string> {
  const file = await provider.downloadActivity(activity, format);
  await mkdir(dir, { recursive: true });
  const path = join(dir, file.fileName);
  await writeFile(path, file.data);
  return path;
}

/** Activity ids already present in `dir`, read from the `_<id>.<ext>` suffix. */
export async function downloadedIds(dir: string, format: DownloadFormat): Promise<Set<number>> {
  if (!existsSync(dir)) return new Set();
  const suffix = new RegExp(`_(\\d+)\\.${format}$`, "i");
  const ids = new Set<number>();
  for (const name of await readdir(dir)) {
    const match = suffix.exec(name);
    if (match) ids.add(Number(match[1]));
  }
  return ids;
}

/**
 * Download every recent activity not yet in `dir`, one after another.
 * A failed download is reported and the rest continue.
 */
export async function syncActivities(
  provider: ActivityProvider,
  dir: string,
  days: number,
  format: DownloadFormat,
  onOutcome?: (outcome: SyncOutcome, activity: ActivitySummary) => void,
): Promise<SyncOutcome[]> {
  const have = await downloadedIds(dir, format);
  const outcomes: SyncOutcome[] = [];
  for (const activity of await provider.activities(days)) {
    let outcome: SyncOutcome;
    if (have.has(activity.activityId)) {
      outcome = { activityId: activity.activityId, status: "skipped" };
    } else {
      try {
        const path = await saveActivity(provider, activity, format, dir);
        outcome = { activityId: activity.activityId, status: "downloaded", path };
      } catch (e) {
        outcome = { activityId: activity.activityId, status: "failed", error: errorMessage(e) };
      }
    }
    outcomes.push(outcome);
    onOutcome?.(outcome, activity);
  }
  return outcomes;
}

const DAILY_COLUMNS: (keyof DailySummary)[] = [
  "date", "totalSteps", "distanceMeters", "activeKcal", "restingHr",
  "minHr", "maxHr", "avgStress", "bbAtWake", "floorsAscended",
];

export function dailyToCsv(rows: readonly DailySummary[]): string {
  const data = rows.map((r) => DAILY_COLUMNS.map((c) => r[c] ?? ""));
  return Papa.unparse({ fields: DAILY_COLUMNS, data }, { newline: "\n" }) + "\n";
}

/** `daily_<first>_<last>.csv` in `dir`; undefined when there are no rows. */
export async function writeDailyCsv(rows: readonly DailySummary[], dir: string): Promise<string | undefined> {
  const first = rows[0];
  const last = rows.at(-1);
  if (!first || !last) return undefined;
  await mkdir(dir, { recursive: true });
  const path = join(dir, `daily_${first.date}_${last.date}.csv`);
  await writeFile(path, dailyToCsv(rows), "utf-8");
  return path;
}
