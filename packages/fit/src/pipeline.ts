import { mkdir, readFile, readdir, stat, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join, relative } from "node:path";
import { errorMessage, type Settings } from "@fitbook/shared";
import { buildActivity, summarizeWorkout } from "./aggregate.ts";
import { selectCharts } from "./charts/select.ts";
import { writeCharts, type ChartOutcome } from "./charts/write.ts";
import { csvToTable, metricsToCsv, writeTableCsv } from "./csv.ts";
import { decodeFit, type DecodedFit } from "./decode.ts";
import { extractRecords } from "./extract.ts";
import { formatSummary } from "./summary.ts";
import type { RecordTable, Stage } from "./types.ts";

export interface ProcessOptions {
  charts?: boolean;
  /** Implies charts. */
  advanced?: boolean;
  sport?: string;
  /** Skip the detailed per-message CSV. */
  summaryOnly?: boolean;
  /** Defaults to the summaries directory (FIT) or the CSV's own directory. */
  outputDir?: string;
}

export type ProcessStatus = "ok" | "no-data" | "failed";

export interface ProcessReport {
  file: string;
  status: ProcessStatus;
  /** Stage that stopped processing, when status is not "ok". */
  stage?: Stage;
  message?: string;
  /** Files written, in the order they were written. */
  outputs: string[];
  charts: ChartOutcome[];
  warnings: string[];
}

function newReport(file: string): ProcessReport {
  return { file, status: "ok", outputs: [], charts: [], warnings: [] };
}

function stop(report: ProcessReport, status: Exclude<ProcessStatus, "ok">, stage: Stage, message: string): ProcessReport {
  return { ...report, status, stage, message };
}

/** `morning_run.fit` → `morning_run`. */
export function activityBaseName(path: string): string {
  return basename(path, extname(path));
}

async function analyzeTable(
  report: ProcessReport,
  table: RecordTable,
  base: string,
  outDir: string,
  options: ProcessOptions,
  settings: Settings,
): Promise<ProcessReport> {
  const summaryCsv = join(outDir, `${base}_summary.csv`);
  try {
    await writeFile(summaryCsv, metricsToCsv(summarizeWorkout(table)), "utf-8");
    report.outputs.push(summaryCsv);
  } catch (e) {
    return stop(report, "failed", "csv", errorMessage(e));
  }

  const activity = buildActivity(table, base, options.sport);
  if (!activity.ok) return stop(report, "no-data", "aggregate", activity.message);

  const specs = selectCharts(activity.value, {
    basic: options.charts === true || options.advanced === true,
    advanced: options.advanced === true,
  });
  const chartsDir = join(outDir, settings.chartsDirName);
  try {
    report.charts = await writeCharts(specs, activity.value, chartsDir);
  } catch (e) {
    report.warnings.push(`Charts skipped: ${errorMessage(e)}`);
  }

  const markdown = join(outDir, `${base}.md`);
  try {
    const { session, laps, samples, sport } = activity.value;
    const charts = report.charts.flatMap((c) =>
      "path" in c ? [{ metric: c.metric, path: relative(outDir, c.path).split("\\").join("/") }] : []);
    await writeFile(markdown, formatSummary({ session, laps, samples, sport, charts }), "utf-8");
    report.outputs.push(markdown);
  } catch (e) {
    return stop(report, "failed", "summary", errorMessage(e));
  }
  return report;
}

/**
 * FIT file → detailed CSV, metric summary CSV, charts and markdown.
 * Never throws: every failure is reported with the stage it happened in.
 */
export async function processFitFile(path: string, options: ProcessOptions, settings: Settings): Promise<ProcessReport> {
  const report = newReport(path);
  const base = activityBaseName(path);
  const outDir = options.outputDir ?? settings.summariesDir;

  let bytes: Uint8Array;
  try {
    bytes = new Uint8Array(await readFile(path));
  } catch (e) {
    return stop(report, "failed", "read", errorMessage(e));
  }

  let decoded: DecodedFit;
  try {
    decoded = decodeFit(bytes);
  } catch (e) {
    return stop(report, "failed", "decode", errorMessage(e));
  }
  report.warnings.push(...decoded.warnings);

  const extracted = extractRecords(decoded.messages, { includeUnits: settings.includeUnits });
  if (!extracted.ok) return stop(report, "no-data", "extract", extracted.message);
  const table = extracted.value;

  try {
    await mkdir(outDir, { recursive: true });
    if (!options.summaryOnly) {
      const csv = join(outDir, `${base}.csv`);
      await writeTableCsv(table, csv);
      report.outputs.push(csv);
    }
  } catch (e) {
    return stop(report, "failed", "csv", errorMessage(e));
  }

  return analyzeTable(report, table, base, outDir, options, settings);
}

/** Re-run the summary, charts and markdown for a CSV written earlier. */
export async function analyzeCsvFile(path: string, options: ProcessOptions, settings: Settings): Promise<ProcessReport> {
  const report = newReport(path);
  const outDir = options.outputDir ?? dirname(path);

  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (e) {
    return stop(report, "failed", "read", errorMessage(e));
  }

  let table: RecordTable;
  try {
    table = csvToTable(text);
    await mkdir(outDir, { recursive: true });
  } catch (e) {
    return stop(report, "failed", "csv", errorMessage(e));
  }
  if (table.rows.length === 0) return stop(report, "no-data", "extract", "No rows found in CSV file");

  return analyzeTable(report, table, activityBaseName(path), outDir, options, settings);
}

/** A `.fit` file is converted first; anything else is read as a CSV written earlier. */
export async function analyzeFile(path: string, options: ProcessOptions, settings: Settings): Promise<ProcessReport> {
  return isFitName(basename(path))
    ? processFitFile(path, options, settings)
    : analyzeCsvFile(path, options, settings);
}

/** Files one after another; each report stands alone. */
export async function processBatch(
  paths: readonly string[],
  options: ProcessOptions,
  settings: Settings,
  onReport?: (report: ProcessReport, index: number) => void,
): Promise<ProcessReport[]> {
  const reports: ProcessReport[] = [];
  for (const [i, path] of paths.entries()) {
    const report = await processFitFile(path, options, settings);
    reports.push(report);
    onReport?.(report, i);
  }
  return reports;
}

// ── Discovery ───────────────────────────────────────────────────

function isFitName(name: string): boolean {
  return name.toLowerCase().endsWith(".fit");
}

/** `.fit` files under `dir`, sorted by path. */
export async function findFitFiles(dir: string, { recursive = false } = {}): Promise<string[]> {
  const found: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (recursive) found.push(...(await findFitFiles(path, { recursive })));
    } else if (entry.isFile() && isFitName(entry.name)) {
      found.push(path);
    }
  }
  return found.sort();
}

/** Most recently modified `.fit` file anywhere under `dir`. */
export async function findLatestFitFile(dir: string): Promise<string | undefined> {
  let latest: { path: string; mtime: number } | undefined;
  for (const path of await findFitFiles(dir, { recursive: true })) {
    const { mtimeMs } = await stat(path);
    if (!latest || mtimeMs > latest.mtime) latest = { path, mtime: mtimeMs };
  }
  return latest?.path;
}
