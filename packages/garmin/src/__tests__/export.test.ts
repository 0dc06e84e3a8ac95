import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { dailyToCsv, downloadedIds, syncActivities, writeDailyCsv } from "../export.ts";
import type { ActivityProvider, ActivitySummary, DailySummary } from "../types.ts";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "fitbook-garmin-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function activity(activityId: number): ActivitySummary {
  return {
    activityId,
    date: "2024-05-01",
    startTimeLocal: "2024-05-01 07:30:00",
    name: "Run",
    type: "running",
    durationSeconds: 1800,
    distanceMeters: 5000,
    avgHr: null,
    maxHr: null,
    calories: null,
    elevationGain: null,
  };
}

function fakeProvider(list: ActivitySummary[], failing: number[] = []): ActivityProvider {
  return {
    name: "fake",
    activities: async () => list,
    downloadActivity: vi.fn(async (a: number | ActivitySummary) => {
      const id = typeof a === "number" ? a : a.activityId;
      if (failing.includes(id)) throw new Error(`HTTP 500 GET /download/${id}`);
      return { fileName: `run_${id}.fit`, data: Buffer.from(`fit ${id}`) };
    }),
    daily: async () => ({ days: [], skipped: [] }),
  };
}

const day: DailySummary = {
  date: "2024-05-01",
  totalSteps: 8000,
  distanceMeters: 6000.5,
  activeKcal: 400,
  restingHr: 52,
  minHr: null,
  maxHr: 150,
  avgStress: null,
  bbAtWake: 80,
  floorsAscended: 3,
};

describe("downloadedIds", () => {
  it("reads ids from file name suffixes", async () => {
    await writeFile(join(dir, "2024-05-01_073000_running_7.fit"), "");
    await writeFile(join(dir, "2024-05-02_080000_9.FIT"), "");
    await writeFile(join(dir, "notes_11.txt"), "");
    expect([...(await downloadedIds(dir, "fit"))].sort()).toEqual([7, 9]);
  });

  it("is empty for a missing directory", async () => {
    expect((await downloadedIds(join(dir, "absent"), "fit")).size).toBe(0);
  });
});

describe("syncActivities", () => {
  it("skips existing files and keeps going after a failure", async () => {
    await writeFile(join(dir, "run_1.fit"), "old");
    const provider = fakeProvider([activity(1), activity(2), activity(3), activity(4)], [3]);
    const seen: number[] = [];

    const outcomes = await syncActivities(provider, dir, 7, "fit", (o) => seen.push(o.activityId));

    expect(outcomes).toEqual([
      { activityId: 1, status: "skipped" },
      { activityId: 2, status: "downloaded", path: join(dir, "run_2.fit") },
      { activityId: 3, status: "failed", error: "HTTP 500 GET /download/3" },
      { activityId: 4, status: "downloaded", path: join(dir, "run_4.fit") },
    ]);
    expect(seen).toEqual([1, 2, 3, 4]);
    expect(provider.downloadActivity).toHaveBeenCalledTimes(3);
    expect(await readFile(join(dir, "run_2.fit"), "utf-8")).toBe("fit 2");
    expect((await readdir(dir)).sort()).toEqual(["run_1.fit", "run_2.fit", "run_4.fit"]);
  });
});

describe("daily CSV", () => {
  it("writes one row per day with blanks for missing values", () => {
    expect(dailyToCsv([day])).toBe(
      "date,totalSteps,distanceMeters,activeKcal,restingHr,minHr,maxHr,avgStress,bbAtWake,floorsAscended\n" +
        "2024-05-01,8000,6000.5,400,52,,150,,80,3\n",
    );
  });

  it("names the file after the first and last date", async () => {
    const path = await writeDailyCsv([day, { ...day, date: "2024-05-07" }], join(dir, "health"));
    expect(path).toBe(join(dir, "health", "daily_2024-05-01_2024-05-07.csv"));
  });

  it("writes nothing without rows", async () => {
    expect(await writeDailyCsv([], dir)).toBeUndefined();
  });
});
