import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { errorMessage } from "@fitbook/shared";
import type { Activity } from "../types.ts";
import { buildChartData, type ChartData } from "./data.ts";
import { renderChartPng } from "./render.tsx";
import type { ChartMetric, ChartSpec } from "./select.ts";

export type ChartOutcome =
  | { metric: string; path: string }
  | { metric: string; error: string };

export function chartFileName(base: string, metric: ChartMetric | string): string {
  return `${base}_${metric}.png`;
}

export async function writeChart(data: ChartData, path: string): Promise<string> {
  await writeFile(path, renderChartPng(data));
  return path;
}

/** Render every selected chart; a failing chart is reported and the rest still render. */
export async function writeCharts(specs: readonly ChartSpec[], activity: Activity, dir: string): Promise<ChartOutcome[]> {
  if (specs.length === 0) return [];
  await mkdir(dir, { recursive: true });
  const outcomes: ChartOutcome[] = [];
  for (const spec of specs) {
    try {
      const path = join(dir, chartFileName(activity.name, spec.metric));
      await writeChart(buildChartData(spec, activity), path);
      outcomes.push({ metric: spec.metric, path });
    } catch (e) {
      outcomes.push({ metric: spec.metric, error: errorMessage(e) });
    }
  }
  return outcomes;
}
