import { buildLapTable, sampleStats } from "./aggregate.ts";
import {
  cadenceDisplay,
  formatDistanceKm,
  formatDurationWords,
  formatHeartRate,
  intensityBand,
  isRunning,
  speedOrPace,
  titleCase,
} from "./metrics.ts";
import type { LapRow, SampleRow, SessionRow } from "./types.ts";

export interface SummaryChart {
  metric: string;
  /** Relative to the summary file. */
  path: string;
}

export interface SummaryInput {
  session: SessionRow;
  laps: readonly LapRow[];
  samples: readonly SampleRow[];
  /** Overrides the session sport. */
  sport?: string;
  charts?: readonly SummaryChart[];
}

function activityDate(session: SessionRow): string | undefined {
  const raw = session.startTime ?? session.timestamp;
  if (!raw) return undefined;
  const match = /^\d{4}-\d{2}-\d{2}/.exec(raw);
  return match ? match[0] : raw;
}

function averageCadence(session: SessionRow, samples: readonly SampleRow[]): number | undefined {
  if (session.avgCadence !== undefined && session.avgCadence > 0) return session.avgCadence;
  return sampleStats(samples, "cadence", { positiveOnly: true })?.avg;
}

function keyMetrics(session: SessionRow, samples: readonly SampleRow[], sport: string): string[] {
  const lines: string[] = [];
  if (session.totalDistance !== undefined) {
    lines.push(`- **Distance:** ${formatDistanceKm(session.totalDistance)}`);
  }
  if (session.totalElapsedTime !== undefined) {
    lines.push(`- **Duration:** ${formatDurationWords(session.totalElapsedTime)}`);
  }
  if (session.totalCalories !== undefined) {
    lines.push(`- **Calories:** ${Math.round(session.totalCalories)} kcal`);
  }

  const hr: string[] = [];
  if (session.avgHeartRate !== undefined) hr.push(`avg ${formatHeartRate(session.avgHeartRate)} bpm`);
  if (session.maxHeartRate !== undefined) hr.push(`max ${formatHeartRate(session.maxHeartRate)} bpm`);
  if (hr.length > 0) lines.push(`- **Heart Rate:** ${hr.join(", ")}`);

  const avg = speedOrPace(session.avgSpeed, sport);
  if (avg) {
    const best = speedOrPace(session.maxSpeed, sport);
    const label = avg.unit === "pace" ? "Average Pace" : "Average Speed";
    const extra = best ? ` (${avg.unit === "pace" ? "best" : "max"} ${best.text})` : "";
    lines.push(`- **${label}:** ${avg.text}${extra}`);
  }

  const cadence = averageCadence(session, samples);
  if (cadence !== undefined) {
    const { value, unit } = cadenceDisplay(cadence, sport);
    lines.push(`- **Cadence:** ${value} ${unit}`);
  }

  if (session.totalAscent !== undefined || session.totalDescent !== undefined) {
    const parts: string[] = [];
    if (session.totalAscent !== undefined) parts.push(`gain ${Math.round(session.totalAscent)} m`);
    if (session.totalDescent !== undefined) parts.push(`loss ${Math.round(session.totalDescent)} m`);
    lines.push(`- **Elevation:** ${parts.join(", ")}`);
  }
  return lines;
}

function distanceRemark(km: number, sport: string): string | undefined {
  switch (sport.toLowerCase()) {
    case "running":
      if (km < 5) return "This was a short training run; consistency and gradual volume increases matter most here.";
      if (km < 10) return "This was a solid mid-distance run for building aerobic fitness.";
      return "This was a long-distance run, good for endurance building.";
    case "cycling":
      if (km < 20) return "This was a short ride, suited to recovery or focused interval work.";
      if (km < 60) return "This was a mid-length ride for aerobic base building.";
      return "This was a long ride, good for endurance building.";
    default:
      return undefined;
  }
}

function cadenceRemark(cadence: number, sport: string): string | undefined {
  const { value } = cadenceDisplay(cadence, sport);
  if (isRunning(sport)) {
    if (value < 160) return `Cadence of ${value} spm is below the usual 170-180 spm range.`;
    if (value > 190) return `Cadence of ${value} spm is very high; check that stride length keeps up.`;
    return `Cadence of ${value} spm is in an efficient range.`;
  }
  if (sport.toLowerCase() === "cycling") {
    if (value < 70) return `Cadence of ${value} rpm is low; 85-95 rpm is usually more efficient.`;
    if (value > 95) return `Cadence of ${value} rpm is high, which eases joint load.`;
    return `Cadence of ${value} rpm is in an efficient range.`;
  }
  return undefined;
}

function assessment(session: SessionRow, samples: readonly SampleRow[], sport: string): string {
  const name = sport.toLowerCase();
  const sentences: string[] = [];
  if (session.totalDistance !== undefined) {
    sentences.push(`This was a ${name} workout covering ${(session.totalDistance / 1000).toFixed(1)} km.`);
  } else {
    sentences.push(`This was a ${name} workout.`);
  }

  if (session.avgHeartRate !== undefined && session.avgHeartRate > 0) {
    const bpm = Math.round(session.avgHeartRate);
    sentences.push(`The ${bpm} bpm average heart rate indicates a ${intensityBand(session.avgHeartRate)} intensity effort.`);
  }

  if (session.totalDistance !== undefined) {
    const remark = distanceRemark(session.totalDistance / 1000, sport);
    if (remark) sentences.push(remark);
  }

  const cadence = averageCadence(session, samples);
  if (cadence !== undefined) {
    const remark = cadenceRemark(cadence, sport);
    if (remark) sentences.push(remark);
  }
  return sentences.join(" ");
}

function reflectionQuestions(sport: string): string[] {
  const name = sport.toLowerCase();
  const specific: Record<string, [string, string]> = {
    running: [
      "Was my pacing even across the laps, or did I fade towards the end?",
      "Does my heart rate match the effort I intended for this run?",
    ],
    cycling: [
      "How steady was my power and cadence over the ride?",
      "Which climbs or efforts pushed my heart rate highest?",
    ],
    swimming: [
      "How consistent were my lap times and stroke counts?",
      "Where could my stroke efficiency improve?",
    ],
  };
  const [second, third] = specific[name] ?? [
    `What aspects of this ${name} workout indicate good performance?`,
    "Which metrics changed most during the workout?",
  ];
  return [
    `How does this ${name} workout compare to my recent sessions?`,
    second,
    third,
    "What would be appropriate recovery and follow-up workouts?",
  ];
}

/**
 * Markdown summary of one activity. Every output path formats through here
 * so distances, durations and paces always round the same way.
 */
export function formatSummary(input: SummaryInput): string {
  const { session, laps, samples } = input;
  const sport = input.sport ?? session.sport ?? "activity";
  const date = activityDate(session);
  const out: string[] = [];

  out.push(date ? `# ${titleCase(sport)} Activity: ${date}` : `# ${titleCase(sport)} Activity`, "");

  out.push("## Key Metrics", "");
  const metrics = keyMetrics(session, samples, sport);
  out.push(...(metrics.length > 0 ? metrics : ["No session metrics recorded."]), "");

  const lapTable = buildLapTable(laps, sport);
  if (lapTable) {
    out.push("## Laps", "");
    out.push(`| ${lapTable.headers.join(" | ")} |`);
    out.push(`|${lapTable.headers.map(() => " --- ").join("|")}|`);
    for (const row of lapTable.rows) {
      out.push(`| ${row.lap} | ${row.distance} | ${row.time} | ${row.avgHr} | ${row.paceOrSpeed} |`);
    }
    out.push("");
  }

  out.push("## Performance Assessment", "", assessment(session, samples, sport), "");

  out.push("## Reflection Questions", "");
  reflectionQuestions(sport).forEach((q, i) => out.push(`${i + 1}. ${q}`));
  out.push("");

  const charts = input.charts ?? [];
  if (charts.length > 0) {
    out.push("## Charts", "");
    for (const chart of charts) {
      out.push(`![${titleCase(chart.metric)}](${chart.path})`);
    }
    out.push("");
  }

  return out.join("\n");
}
