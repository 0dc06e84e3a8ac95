import { mkdtemp, mkdir, readFile, rm, utimes, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Settings } from "@fitbook/shared";
import type { ChartData } from "../charts/data.ts";

vi.mock("../decode.ts", () => ({ decodeFit: vi.fn() }));
vi.mock("../charts/render.tsx", () => ({
  renderChartPng: vi.fn((data: ChartData) => {
    if (data.title.startsWith("Elevation")) throw new Error("renderer exploded");
    return Buffer.from("png");
  }),
}));

import { decodeFit } from "../decode.ts";
import {
  analyzeCsvFile,
  analyzeFile,
  findFitFiles,
  findLatestFitFile,
  processBatch,
  processFitFile,
} from "../pipeline.ts";
import { runningMessages } from "./fixtures.ts";

const decodeMock = vi.mocked(decodeFit);

let dir: string;
let settings: Settings;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "fitbook-pipeline-"));
  settings = {
    exportsDir: dir,
    activitiesDir: join(dir, "activities"),
    summariesDir: join(dir, "chatgpt_ready"),
    healthDir: join(dir, "health"),
    chartsDirName: "charts",
    includeUnits: true,
  };
  await mkdir(settings.activitiesDir, { recursive: true });
  decodeMock.mockReset();
  decodeMock.mockReturnValue({ messages: runningMessages(), warnings: [] });
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function fitFile(name: string): Promise<string> {
  const path = join(settings.activitiesDir, name);
  await writeFile(path, "not really fit");
  return path;
}

describe("processFitFile", () => {
  it("writes the CSV, metric summary and markdown", async () => {
    const report = await processFitFile(await fitFile("run.fit"), {}, settings);
    const out = settings.summariesDir;
    expect(report.status).toBe("ok");
    expect(report.outputs).toEqual([join(out, "run.csv"), join(out, "run_summary.csv"), join(out, "run.md")]);
    expect(report.charts).toEqual([]);

    const csv = await readFile(join(out, "run.csv"), "utf-8");
    expect(csv.split("\n")[0]?.startsWith("record_type,type,manufacturer,timestamp,")).toBe(true);
    const summary = await readFile(join(out, "run_summary.csv"), "utf-8");
    expect(summary.split("\n").slice(0, 3)).toEqual(["Metric,Value", "sport,running", "total_elapsed_time,3000"]);
    const md = await readFile(join(out, "run.md"), "utf-8");
    expect(md.split("\n")[0]).toBe("# Running Activity: 2024-05-01");
  });

  it("skips the detailed CSV in summary-only mode", async () => {
    const report = await processFitFile(await fitFile("run.fit"), { summaryOnly: true }, settings);
    expect(report.outputs).toEqual([
      join(settings.summariesDir, "run_summary.csv"),
      join(settings.summariesDir, "run.md"),
    ]);
  });

  it("reports no-data for an empty file without writing anything", async () => {
    decodeMock.mockReturnValue({ messages: [], warnings: [] });
    const report = await processFitFile(await fitFile("empty.fit"), {}, settings);
    expect(report).toMatchObject({ status: "no-data", stage: "extract", message: "No data found in FIT file", outputs: [] });
  });

  it("keeps the CSVs when the session is missing", async () => {
    decodeMock.mockReturnValue({ messages: runningMessages().filter((m) => m.type !== "session"), warnings: [] });
    const report = await processFitFile(await fitFile("nosession.fit"), {}, settings);
    expect(report.status).toBe("no-data");
    expect(report.stage).toBe("aggregate");
    expect(report.outputs).toEqual([
      join(settings.summariesDir, "nosession.csv"),
      join(settings.summariesDir, "nosession_summary.csv"),
    ]);
  });

  it("reports the failing stage", async () => {
    decodeMock.mockImplementation(() => {
      throw new Error("FIT file failed integrity check (truncated or corrupt)");
    });
    const decodeFailure = await processFitFile(await fitFile("bad.fit"), {}, settings);
    expect(decodeFailure).toMatchObject({ status: "failed", stage: "decode" });

    const readFailure = await processFitFile(join(dir, "missing.fit"), {}, settings);
    expect(readFailure).toMatchObject({ status: "failed", stage: "read" });
  });

  it("passes decoder warnings through", async () => {
    decodeMock.mockReturnValue({ messages: runningMessages(), warnings: ["CRC mismatch"] });
    const report = await processFitFile(await fitFile("run.fit"), {}, settings);
    expect(report.status).toBe("ok");
    expect(report.warnings).toEqual(["CRC mismatch"]);
  });

  it("reports a failed chart and still writes the others and the summary", async () => {
    const report = await processFitFile(await fitFile("run.fit"), { charts: true }, settings);
    const charts = join(settings.summariesDir, "charts");
    expect(report.status).toBe("ok");
    expect(report.charts).toEqual([
      { metric: "heart_rate", path: join(charts, "run_heart_rate.png") },
      { metric: "pace", path: join(charts, "run_pace.png") },
      { metric: "elevation", error: "renderer exploded" },
      { metric: "cadence", path: join(charts, "run_cadence.png") },
      { metric: "hr_speed", path: join(charts, "run_hr_speed.png") },
      { metric: "lap_analysis", path: join(charts, "run_lap_analysis.png") },
    ]);
    const md = await readFile(join(settings.summariesDir, "run.md"), "utf-8");
    expect(md).toContain("![Heart Rate](charts/run_heart_rate.png)");
    expect(md).not.toContain("run_elevation.png");
  });

  it("writes into the requested directory", async () => {
    const outputDir = join(dir, "elsewhere");
    const report = await processFitFile(await fitFile("run.fit"), { outputDir }, settings);
    expect(report.outputs[0]).toBe(join(outputDir, "run.csv"));
  });
});

describe("analyzeCsvFile", () => {
  it("rebuilds the summary from a CSV written earlier", async () => {
    await processFitFile(await fitFile("run.fit"), { summaryOnly: false }, settings);
    const md = join(settings.summariesDir, "run.md");
    await rm(md);

    const report = await analyzeCsvFile(join(settings.summariesDir, "run.csv"), {}, settings);
    expect(report.status).toBe("ok");
    expect(report.outputs).toEqual([join(settings.summariesDir, "run_summary.csv"), md]);
    expect(await readFile(md, "utf-8")).toContain("| 1 | 5.00 | 33:20 | 135 | 6:40/km |");
  });

  it("fails at the csv stage for a file without record types", async () => {
    const path = join(dir, "other.csv");
    await writeFile(path, "a,b\n1,2\n");
    expect(await analyzeCsvFile(path, {}, settings)).toMatchObject({ status: "failed", stage: "csv" });
  });
});

describe("analyzeFile", () => {
  it("converts a FIT file before analyzing it", async () => {
    const report = await analyzeFile(await fitFile("run.FIT"), {}, settings);
    const out = settings.summariesDir;
    expect(decodeMock).toHaveBeenCalledTimes(1);
    expect(report.status).toBe("ok");
    expect(report.outputs).toEqual([join(out, "run.csv"), join(out, "run_summary.csv"), join(out, "run.md")]);
  });

  it("reads other files as CSV", async () => {
    await processFitFile(await fitFile("run.fit"), {}, settings);
    decodeMock.mockClear();

    const report = await analyzeFile(join(settings.summariesDir, "run.csv"), {}, settings);
    expect(decodeMock).not.toHaveBeenCalled();
    expect(report.outputs).toEqual([join(settings.summariesDir, "run_summary.csv"), join(settings.summariesDir, "run.md")]);
  });
});

describe("processBatch", () => {
  it("keeps going after a failed file", async () => {
    const first = await fitFile("a.fit");
    const third = await fitFile("c.fit");
    const seen: string[] = [];
    const reports = await processBatch([first, join(dir, "b.fit"), third], {}, settings, (r) => seen.push(r.status));
    expect(reports.map((r) => r.status)).toEqual(["ok", "failed", "ok"]);
    expect(seen).toEqual(["ok", "failed", "ok"]);
    expect(existsSync(join(settings.summariesDir, "c.md"))).toBe(true);
  });
});

describe("discovery", () => {
  it("finds FIT files, recursing on request", async () => {
    const top = await fitFile("b.FIT");
    await fitFile("a.fit");
    await writeFile(join(settings.activitiesDir, "notes.txt"), "");
    await mkdir(join(settings.activitiesDir, "2024"));
    await writeFile(join(settings.activitiesDir, "2024", "old.fit"), "");

    expect(await findFitFiles(settings.activitiesDir)).toEqual([join(settings.activitiesDir, "a.fit"), top]);
    expect(await findFitFiles(settings.activitiesDir, { recursive: true })).toEqual([
      join(settings.activitiesDir, "2024", "old.fit"),
      join(settings.activitiesDir, "a.fit"),
      top,
    ]);
  });

  it("picks the most recently modified file", async () => {
    const older = await fitFile("older.fit");
    const newer = await fitFile("newer.fit");
    await utimes(older, new Date("2024-05-02T00:00:00Z"), new Date("2024-05-02T00:00:00Z"));
    await utimes(newer, new Date("2024-05-01T00:00:00Z"), new Date("2024-05-01T00:00:00Z"));
    expect(await findLatestFitFile(settings.activitiesDir)).toBe(older);
    await mkdir(join(dir, "empty"));
    expect(await findLatestFitFile(join(dir, "empty"))).toBeUndefined();
  });
});
