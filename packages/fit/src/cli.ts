#!/usr/bin/env -S node --import tsx
import { join, resolve } from "node:path";
import { Command, InvalidArgumentError } from "commander";
import {
  errorMessage,
  loadSettings,
  settingsSchema,
  updateSettings,
  readConfig,
  SETTINGS_MODULE,
  getModuleConfigPath,
  error as showError,
  type SettingsFile,
} from "@fitbook/shared";
import * as out from "@fitbook/shared/output";
import {
  analyzeFile,
  findFitFiles,
  findLatestFitFile,
  processBatch,
  processFitFile,
  type ProcessOptions,
  type ProcessReport,
} from "./pipeline.ts";
import {
  DEFAULT_COMPARE_DAYS,
  compareWorkouts,
  findWorkoutCsvs,
  readWorkoutSummary,
  writeComparison,
  type WorkoutSummary,
} from "./compare.ts";

// ── Helpers ──────────────────────────────────────────────────────

function positiveInt(value: string): number {
  const n = parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

interface ChartOpts {
  charts?: boolean;
  advanced?: boolean;
  sport?: string;
  summaryOnly?: boolean;
  output?: string;
  json?: boolean;
}

function toProcessOptions(opts: ChartOpts): ProcessOptions {
  return {
    charts: opts.charts,
    advanced: opts.advanced,
    sport: opts.sport,
    summaryOnly: opts.summaryOnly,
    outputDir: opts.output === undefined ? undefined : resolve(opts.output),
  };
}

function printReport(report: ProcessReport): void {
  switch (report.status) {
    case "ok":
      out.success(`Processed ${report.file}`);
      break;
    case "no-data":
      out.warn(`${report.file}: nothing to process (${report.message ?? "no data"})`);
      break;
    case "failed":
      out.error(`${report.file}: ${report.stage ?? "unknown"} stage failed: ${report.message ?? "unknown error"}`);
      break;
  }
  for (const w of report.warnings) out.warn(w);
  for (const path of report.outputs) out.file(path);
  for (const chart of report.charts) {
    if ("path" in chart) out.file(chart.path);
    else out.warn(`${chart.metric} chart failed: ${chart.error}`);
  }
}

function finish(reports: readonly ProcessReport[]): void {
  if (reports.some((r) => r.status === "failed")) process.exitCode = 1;
}

// ── Program ──────────────────────────────────────────────────────

const program = new Command();
program.name("fit").description("FIT activity files to CSV, charts and markdown summaries").version("0.3.0");

function withChartOptions(cmd: Command): Command {
  return cmd
    .option("-c, --charts", "Generate basic charts")
    .option("-a, --advanced", "Generate basic and advanced charts")
    .option("-s, --sport <sport>", "Override the session sport")
    .option("-o, --output <dir>", "Output directory")
    .option("--json", "Print the report as JSON");
}

withChartOptions(
  program
    .command("process <file>")
    .description("Convert one FIT file")
    .option("--summary-only", "Skip the detailed CSV"),
).action(async (file: string, opts: ChartOpts) => {
  const report = await processFitFile(resolve(file), toProcessOptions(opts), loadSettings());
  if (opts.json) out.json(report);
  else printReport(report);
  finish([report]);
});

withChartOptions(
  program
    .command("batch [dir]")
    .description("Convert every FIT file in a directory (default: exports/activities)")
    .option("-r, --recursive", "Include subdirectories")
    .option("--summary-only", "Skip the detailed CSV"),
).action(async (dir: string | undefined, opts: ChartOpts & { recursive?: boolean }) => {
  const settings = loadSettings();
  const root = dir === undefined ? settings.activitiesDir : resolve(dir);
  const files = await findFitFiles(root, { recursive: opts.recursive === true });
  if (files.length === 0) {
    out.info(`No FIT files found in ${root}`);
    return;
  }
  if (!opts.json) out.heading(`Processing ${files.length} FIT file${files.length === 1 ? "" : "s"}`);

  const reports = await processBatch(files, toProcessOptions(opts), settings, (report) => {
    if (!opts.json) printReport(report);
  });

  if (opts.json) {
    out.json(reports);
  } else {
    out.blank();
    const count = (status: ProcessReport["status"]) => reports.filter((r) => r.status === status).length;
    out.tally({ Processed: count("ok"), "No data": count("no-data"), Failed: count("failed") });
  }
  finish(reports);
});

withChartOptions(
  program
    .command("latest")
    .description("Convert the most recently downloaded FIT file")
    .option("-d, --dir <dir>", "Directory to search (default: exports/activities)"),
).action(async (opts: ChartOpts & { dir?: string }) => {
  const settings = loadSettings();
  const root = opts.dir === undefined ? settings.activitiesDir : resolve(opts.dir);
  const latest = await findLatestFitFile(root);
  if (!latest) {
    out.info(`No FIT files found in ${root}`);
    return;
  }
  const report = await processFitFile(latest, toProcessOptions(opts), settings);
  if (opts.json) out.json(report);
  else printReport(report);
  finish([report]);
});

withChartOptions(
  program
    .command("analyze <file>")
    .description("Summary, charts and markdown from a CSV written earlier, or from a FIT file"),
).action(async (file: string, opts: ChartOpts) => {
  const report = await analyzeFile(resolve(file), toProcessOptions(opts), loadSettings());
  if (opts.json) out.json(report);
  else printReport(report);
  finish([report]);
});

program
  .command("compare [dir]")
  .description("Compare workouts over time (default: exports)")
  .option("-s, --sport <sport>", "Only this sport")
  .option("-d, --days <n>", "Look back this many days", positiveInt, DEFAULT_COMPARE_DAYS)
  .option("-o, --output <dir>", "Output directory (default: <dir>/comparison_charts)")
  .action(async (dir: string | undefined, opts: { sport?: string; days: number; output?: string }) => {
    const settings = loadSettings();
    const root = dir === undefined ? settings.exportsDir : resolve(dir);
    const files = await findWorkoutCsvs(root, { sport: opts.sport, days: opts.days }, (path, reason) => {
      out.warn(`Skipping ${path}: ${reason}`);
    });

    const summaries: WorkoutSummary[] = [];
    for (const file of files) {
      try {
        const summary = await readWorkoutSummary(file);
        if (summary) summaries.push(summary);
      } catch (e) {
        out.warn(`Skipping ${file}: ${errorMessage(e)}`);
      }
    }
    if (summaries.length === 0) {
      out.info("No workouts found matching the criteria.");
      return;
    }

    const outDir = opts.output === undefined ? join(root, "comparison_charts") : resolve(opts.output);
    const { report, charts } = await writeComparison(compareWorkouts(summaries), outDir);
    out.success(`Compared ${summaries.length} workouts: ${report}`);
    for (const chart of charts) {
      if ("path" in chart) out.file(chart.path);
      else out.warn(`${chart.metric} chart failed: ${chart.error}`);
    }
  });

// ── Config ───────────────────────────────────────────────────────

const config = program.command("config").description("Show or change settings");

config
  .command("show")
  .description("Print effective settings")
  .action(() => {
    const settings = loadSettings();
    out.subheading(`Config file: ${getModuleConfigPath(SETTINGS_MODULE)}`);
    out.table(
      ["Setting", "Value"],
      Object.entries(settings).map(([k, v]) => [k, String(v)]),
    );
    if (readConfig(SETTINGS_MODULE, settingsSchema) === null) out.info("Using defaults (no config file).");
  });

type SettingKey = keyof SettingsFile;

function isSettingKey(key: string): key is SettingKey {
  return key in settingsSchema.shape;
}

function settingPatch(key: SettingKey, value: string): Partial<SettingsFile> {
  switch (key) {
    case "includeUnits":
      if (value !== "true" && value !== "false") throw new Error("includeUnits must be true or false");
      return { includeUnits: value === "true" };
    case "exportsDir":
      return { exportsDir: value };
    case "chartsDirName":
      return { chartsDirName: value };
  }
}

config
  .command("set <key> <value>")
  .description("Set exportsDir, chartsDirName or includeUnits")
  .action((key: string, value: string) => {
    if (!isSettingKey(key)) {
      throw new Error(`Unknown setting "${key}". Expected one of: ${Object.keys(settingsSchema.shape).join(", ")}`);
    }
    const next = updateSettings(settingPatch(key, value));
    out.success(`Saved ${key} = ${String(next[key])}`);
  });

// ── Run ──────────────────────────────────────────────────────────

try {
  await program.parseAsync(process.argv);
} catch (e: unknown) {
  showError(errorMessage(e));
  process.exit(1);
}
