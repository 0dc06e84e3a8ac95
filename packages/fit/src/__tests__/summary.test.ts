import { describe, it, expect } from "vitest";
import { formatSummary } from "../summary.ts";
import type { LapRow, SessionRow } from "../types.ts";

const runSession: SessionRow = {
  kind: "session",
  sport: "running",
  totalDistance: 10000,
  totalElapsedTime: 3000,
  avgHeartRate: 140,
};

const runLaps: LapRow[] = [
  { kind: "lap", lap: 1, avgSpeed: 2.5 },
  { kind: "lap", lap: 2, avgSpeed: 3.0 },
];

describe("formatSummary", () => {
  it("reports the ten-kilometre run end to end", () => {
    const lines = formatSummary({ session: runSession, laps: runLaps, samples: [] }).split("\n");
    expect(lines[0]).toBe("# Running Activity");
    expect(lines).toContain("- **Distance:** 10.00 km");
    expect(lines).toContain("- **Duration:** 50 minutes 0 seconds");
    expect(lines).toContain("- **Heart Rate:** avg 140 bpm");
    expect(lines).toContain("| Lap | Distance (km) | Time | Avg HR | Pace |");
    expect(lines).toContain("| 1 | 0.00 | 0:00 | — | 6:40/km |");
    expect(lines).toContain("| 2 | 0.00 | 0:00 | — | 5:33/km |");
    expect(lines).toContain(
      "This was a running workout covering 10.0 km. The 140 bpm average heart rate indicates a moderate intensity effort. " +
        "This was a long-distance run, good for endurance building.",
    );
  });

  it("bands the unrounded average heart rate", () => {
    const md = formatSummary({ session: { ...runSession, avgHeartRate: 149.6 }, laps: [], samples: [] });
    expect(md).toContain("The 150 bpm average heart rate indicates a moderate intensity effort.");
  });

  it("keeps the sections in a fixed order", () => {
    const md = formatSummary({
      session: runSession,
      laps: runLaps,
      samples: [],
      charts: [{ metric: "heart_rate", path: "charts/run_heart_rate.png" }],
    });
    const order = ["## Key Metrics", "## Laps", "## Performance Assessment", "## Reflection Questions", "## Charts"]
      .map((h) => md.indexOf(h));
    expect(order.every((pos) => pos > 0)).toBe(true);
    expect([...order].sort((a, b) => a - b)).toEqual(order);
    expect(md).toContain("![Heart Rate](charts/run_heart_rate.png)");
  });

  it("omits the lap table and charts when there is nothing to show", () => {
    const md = formatSummary({ session: runSession, laps: [runLaps[0] ?? { kind: "lap", lap: 1 }], samples: [] });
    expect(md).not.toContain("## Laps");
    expect(md).not.toContain("## Charts");
  });

  it("dates the headline and shows pace, cadence and elevation for runs", () => {
    const lines = formatSummary({
      session: {
        ...runSession,
        startTime: "2024-05-01T07:00:00.000Z",
        avgSpeed: 10 / 3,
        maxSpeed: 4,
        avgCadence: 85,
        totalAscent: 120.4,
        totalDescent: 118,
      },
      laps: [],
      samples: [],
    }).split("\n");
    expect(lines[0]).toBe("# Running Activity: 2024-05-01");
    expect(lines).toContain("- **Average Pace:** 5:00/km (best 4:10/km)");
    expect(lines).toContain("- **Cadence:** 170 spm");
    expect(lines).toContain("- **Elevation:** gain 120 m, loss 118 m");
  });

  it("uses speed for rides", () => {
    const md = formatSummary({
      session: { kind: "session", sport: "cycling", avgSpeed: 5, maxSpeed: 10, totalDistance: 30000 },
      laps: [
        { kind: "lap", lap: 1, avgSpeed: 5 },
        { kind: "lap", lap: 2, avgSpeed: 6 },
      ],
      samples: [],
    });
    expect(md).toContain("- **Average Speed:** 18.0 km/h (max 36.0 km/h)");
    expect(md).toContain("| Lap | Distance (km) | Time | Avg HR | Speed |");
    expect(md).toContain("| 2 | 0.00 | 0:00 | — | 21.6 km/h |");
    expect(md).toContain("This was a mid-length ride for aerobic base building.");
  });

  it("asks sport-specific reflection questions", () => {
    const lines = formatSummary({ session: { kind: "session", sport: "swimming" }, laps: [], samples: [] }).split("\n");
    expect(lines).toContain("1. How does this swimming workout compare to my recent sessions?");
    expect(lines).toContain("2. How consistent were my lap times and stroke counts?");
    expect(lines).toContain("4. What would be appropriate recovery and follow-up workouts?");
  });

  it("prefers the caller's sport", () => {
    const md = formatSummary({ session: runSession, laps: runLaps, samples: [], sport: "cycling" });
    expect(md.startsWith("# Cycling Activity\n")).toBe(true);
    expect(md).toContain("| 1 | 0.00 | 0:00 | — | 9.0 km/h |");
  });
});
