import { cadenceDisplay, formatPace, isRunning, paceFromSpeed, speedOrPace, speedToKmh } from "../metrics.ts";
import type { Activity, SampleRow } from "../types.ts";
import type { ChartMetric, ChartSpec } from "./select.ts";

export type ChartRow = Record<string, number | string | undefined>;

export interface SeriesDef {
  key: string;
  label: string;
  color: string;
  axis?: "left" | "right";
}

export interface ChartData {
  kind: "line" | "bar" | "scatter";
  title: string;
  xKey: string;
  xLabel: string;
  yLabel: string;
  yRightLabel?: string;
  series: SeriesDef[];
  rows: ChartRow[];
  /** Lower is better (pace). */
  invertY?: boolean;
  formatY?: (value: number) => string;
  /** Horizontal reference line, e.g. the lap average. */
  reference?: { value: number; label: string };
}

const DEFAULT_MAX_HR = 190;
/** Largest gap a single sample may stand for when summing time in zones. */
const MAX_SAMPLE_SECONDS = 30;

export const HR_ZONES: ReadonlyArray<readonly [string, number, number]> = [
  ["Zone 1 (Recovery)", 0.5, 0.6],
  ["Zone 2 (Easy)", 0.6, 0.7],
  ["Zone 3 (Aerobic)", 0.7, 0.8],
  ["Zone 4 (Threshold)", 0.8, 0.9],
  ["Zone 5 (Maximum)", 0.9, 1.0],
];

export const POWER_ZONES: ReadonlyArray<readonly [string, number, number]> = [
  ["Zone 1 (Recovery)", 0, 0.55],
  ["Zone 2 (Endurance)", 0.55, 0.75],
  ["Zone 3 (Tempo)", 0.75, 0.9],
  ["Zone 4 (Threshold)", 0.9, 1.05],
  ["Zone 5 (VO2 Max)", 1.05, 1.2],
  ["Zone 6 (Anaerobic)", 1.2, 1.5],
  ["Zone 7 (Sprint)", 1.5, Infinity],
];

function parseTime(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const t = Date.parse(value);
  return Number.isNaN(t) ? undefined : t;
}

/** Minutes since the first timestamped sample; sample index when there are none. */
export function elapsedMinutes(samples: readonly SampleRow[]): number[] {
  const times = samples.map((s) => parseTime(s.timestamp));
  const start = times.find((t): t is number => t !== undefined);
  if (start === undefined) return samples.map((_, i) => i);
  return times.map((t, i) => (t === undefined ? i : (t - start) / 60000));
}

/** Seconds each sample stands for: the gap to the next one, capped. */
export function sampleSeconds(samples: readonly SampleRow[]): number[] {
  const times = samples.map((s) => parseTime(s.timestamp));
  return times.map((t, i) => {
    const next = times[i + 1];
    if (t === undefined || next === undefined) return 1;
    const gap = (next - t) / 1000;
    return gap > 0 ? Math.min(gap, MAX_SAMPLE_SECONDS) : 1;
  });
}

export function rollingMean(values: ReadonlyArray<number | undefined>, window: number): (number | undefined)[] {
  return values.map((_, i) => {
    let sum = 0;
    let n = 0;
    for (let j = Math.max(0, i - window + 1); j <= i; j++) {
      const v = values[j];
      if (v !== undefined) {
        sum += v;
        n += 1;
      }
    }
    return n > 0 ? sum / n : undefined;
  });
}

/** Threshold power estimate from the session: the larger of 76% max and 107% avg. */
export function estimateFtp(activity: Activity): number {
  let ftp = 250;
  const { maxPower, avgPower } = activity.session;
  if (maxPower !== undefined) ftp = Math.trunc(maxPower * 0.76);
  if (avgPower !== undefined) ftp = Math.max(ftp, Math.trunc(avgPower * 1.07));
  return ftp;
}

/** Time (minutes) spent in each heart-rate zone, plus above max. */
export function heartRateZoneMinutes(activity: Activity): { zone: string; minutes: number }[] {
  const maxHr = activity.session.maxHeartRate ?? DEFAULT_MAX_HR;
  const seconds = sampleSeconds(activity.samples);
  const totals = HR_ZONES.map(([zone]) => ({ zone, minutes: 0 }));
  const above = { zone: "Above Max", minutes: 0 };

  activity.samples.forEach((s, i) => {
    const hr = s.heartRate;
    if (hr === undefined) return;
    const dt = (seconds[i] ?? 1) / 60;
    if (hr >= maxHr) {
      above.minutes += dt;
      return;
    }
    const index = HR_ZONES.findIndex(([, lo, hi]) => hr >= maxHr * lo && hr < maxHr * hi);
    const bucket = totals[index];
    if (bucket) bucket.minutes += dt;
  });
  return [...totals, above];
}

export function powerZoneSeconds(activity: Activity): { zone: string; seconds: number }[] {
  const ftp = estimateFtp(activity);
  const seconds = sampleSeconds(activity.samples);
  const totals = POWER_ZONES.map(([zone]) => ({ zone, seconds: 0 }));
  activity.samples.forEach((s, i) => {
    const power = s.power;
    if (power === undefined) return;
    const index = POWER_ZONES.findIndex(([, lo, hi]) => power >= ftp * lo && power < ftp * hi);
    const bucket = totals[index];
    if (bucket) bucket.seconds += seconds[i] ?? 1;
  });
  return totals;
}

function timeSeries(
  activity: Activity,
  key: string,
  pick: (s: SampleRow) => number | undefined,
): ChartRow[] {
  const minutes = elapsedMinutes(activity.samples);
  const rows: ChartRow[] = [];
  activity.samples.forEach((s, i) => {
    const v = pick(s);
    if (v !== undefined) rows.push({ minutes: minutes[i], [key]: v });
  });
  return rows;
}

function average(values: number[]): number | undefined {
  return values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : undefined;
}

type Builder = (spec: ChartSpec, activity: Activity) => ChartData;

const TIME_AXIS = { xKey: "minutes", xLabel: "Time (minutes)" } as const;

const builders: Record<ChartMetric, Builder> = {
  heart_rate: (spec, activity) => ({
    kind: "line",
    title: spec.title,
    ...TIME_AXIS,
    yLabel: "Heart Rate (bpm)",
    series: [{ key: "heart_rate", label: "Heart rate", color: "#d32f2f" }],
    rows: timeSeries(activity, "heart_rate", (s) => s.heartRate),
  }),

  pace: (spec, activity) => ({
    kind: "line",
    title: spec.title,
    ...TIME_AXIS,
    yLabel: "Pace (min/km)",
    series: [{ key: "pace", label: "Pace", color: "#1565c0" }],
    // Near-standstill samples would dominate the axis.
    rows: timeSeries(activity, "pace", (s) => (s.speed !== undefined && s.speed > 0.3 ? paceFromSpeed(s.speed) : undefined)),
    invertY: true,
    formatY: formatPace,
  }),

  speed: (spec, activity) => ({
    kind: "line",
    title: spec.title,
    ...TIME_AXIS,
    yLabel: "Speed (km/h)",
    series: [{ key: "speed_kmh", label: "Speed", color: "#1565c0" }],
    rows: timeSeries(activity, "speed_kmh", (s) => (s.speed === undefined ? undefined : speedToKmh(s.speed))),
  }),

  elevation: (spec, activity) => {
    const minutes = elapsedMinutes(activity.samples);
    const smooth = rollingMean(activity.samples.map((s) => s.altitude), 10);
    const rows: ChartRow[] = [];
    smooth.forEach((v, i) => {
      if (v !== undefined) rows.push({ minutes: minutes[i], altitude: v });
    });
    const gain = activity.session.totalAscent;
    return {
      kind: "line",
      title: gain === undefined ? spec.title : `${spec.title} (Total Gain: ${Math.trunc(gain)}m)`,
      ...TIME_AXIS,
      yLabel: "Altitude (m)",
      series: [{ key: "altitude", label: "Altitude", color: "#2e7d32" }],
      rows,
    };
  },

  cadence: (spec, activity) => ({
    kind: "line",
    title: spec.title,
    ...TIME_AXIS,
    yLabel: `Cadence (${spec.unit})`,
    series: [{ key: "cadence", label: "Cadence", color: "#6a1b9a" }],
    rows: timeSeries(activity, "cadence", (s) =>
      s.cadence === undefined ? undefined : cadenceDisplay(s.cadence, activity.sport).value),
  }),

  power: (spec, activity) => {
    const minutes = elapsedMinutes(activity.samples);
    const smooth = rollingMean(activity.samples.map((s) => s.power), 30);
    const rows: ChartRow[] = [];
    activity.samples.forEach((s, i) => {
      if (s.power !== undefined) rows.push({ minutes: minutes[i], power: s.power, power_smooth: smooth[i] });
    });
    return {
      kind: "line",
      title: spec.title,
      ...TIME_AXIS,
      yLabel: "Power (watts)",
      series: [
        { key: "power", label: "Power", color: "#ef6c00" },
        { key: "power_smooth", label: "30s avg", color: "#c62828" },
      ],
      rows,
    };
  },

  hr_speed: (spec, activity) => {
    const minutes = elapsedMinutes(activity.samples);
    const rows: ChartRow[] = [];
    activity.samples.forEach((s, i) => {
      if (s.heartRate === undefined && s.speed === undefined) return;
      rows.push({
        minutes: minutes[i],
        heart_rate: s.heartRate,
        speed_kmh: s.speed === undefined ? undefined : speedToKmh(s.speed),
      });
    });
    return {
      kind: "line",
      title: spec.title,
      ...TIME_AXIS,
      yLabel: "Heart Rate (bpm)",
      yRightLabel: "Speed (km/h)",
      series: [
        { key: "heart_rate", label: "Heart rate", color: "#d32f2f", axis: "left" },
        { key: "speed_kmh", label: "Speed", color: "#1565c0", axis: "right" },
      ],
      rows,
    };
  },

  lap_analysis: (spec, activity) => {
    const running = isRunning(activity.sport);
    return {
      kind: "bar",
      title: spec.title,
      xKey: "lap",
      xLabel: "Lap Number",
      yLabel: running ? "Avg Pace (min/km)" : "Avg Speed (km/h)",
      series: [{ key: "value", label: running ? "Pace" : "Speed", color: "#1565c0" }],
      rows: activity.laps.map((lap) => ({
        lap: lap.lap,
        value: speedOrPace(lap.avgSpeed, activity.sport)?.value,
      })),
      formatY: spec.format,
    };
  },

  hr_zones: (spec, activity) => ({
    kind: "bar",
    title: spec.title,
    xKey: "zone",
    xLabel: "Heart Rate Zone",
    yLabel: "Time (minutes)",
    series: [{ key: "minutes", label: "Minutes", color: "#43a047" }],
    rows: heartRateZoneMinutes(activity).map(({ zone, minutes }) => ({ zone, minutes })),
  }),

  hr_vs_pace: (spec, activity) => ({
    kind: "scatter",
    title: spec.title,
    xKey: "pace",
    xLabel: "Pace (min/km)",
    yLabel: "Heart Rate (bpm)",
    series: [{ key: "heart_rate", label: "Heart rate", color: "#d32f2f" }],
    rows: activity.samples.flatMap((s) => {
      const pace = s.speed !== undefined && s.speed > 0.5 ? paceFromSpeed(s.speed) : undefined;
      return pace !== undefined && s.heartRate !== undefined ? [{ pace, heart_rate: s.heartRate }] : [];
    }),
  }),

  stride_analysis: (spec, activity) => ({
    kind: "scatter",
    title: spec.title,
    xKey: "pace",
    xLabel: "Pace (min/km)",
    yLabel: "Stride Length (m)",
    series: [{ key: "stride", label: "Stride length", color: "#00897b" }],
    rows: activity.samples.flatMap((s) => {
      if (s.speed === undefined || s.cadence === undefined || !(s.speed > 0.2) || !(s.cadence > 0)) return [];
      // Running cadence counts one foot, so each cycle is a full stride.
      const stride = s.speed / (s.cadence / 60);
      const pace = paceFromSpeed(s.speed);
      return stride > 0.5 && stride < 3 && pace !== undefined ? [{ pace, stride }] : [];
    }),
  }),

  power_zones: (_spec, activity) => ({
    kind: "bar",
    title: `Power Zone Distribution (FTP Estimate: ${estimateFtp(activity)} watts)`,
    xKey: "zone",
    xLabel: "Power Zone",
    yLabel: "Time (seconds)",
    series: [{ key: "seconds", label: "Seconds", color: "#8e24aa" }],
    rows: powerZoneSeconds(activity).map(({ zone, seconds }) => ({ zone, seconds })),
  }),

  cadence_vs_power: (spec, activity) => ({
    kind: "scatter",
    title: spec.title,
    xKey: "cadence",
    xLabel: "Cadence (rpm)",
    yLabel: "Power (watts)",
    series: [{ key: "power", label: "Power", color: "#ef6c00" }],
    rows: activity.samples.flatMap((s) =>
      s.cadence !== undefined && s.power !== undefined && s.cadence > 0 && s.power > 0
        ? [{ cadence: s.cadence, power: s.power }]
        : []),
  }),

  swim_lap_times: (spec, activity) => {
    const rows = activity.laps.map((lap) => ({
      lap: lap.lap,
      minutes: (lap.totalElapsedTime ?? lap.totalTimerTime ?? 0) / 60,
    }));
    const avg = average(rows.map((r) => r.minutes));
    return {
      kind: "bar",
      title: spec.title,
      xKey: "lap",
      xLabel: "Lap Number",
      yLabel: "Time (minutes)",
      series: [{ key: "minutes", label: "Lap time", color: "#4fc3f7" }],
      rows,
      reference: avg === undefined ? undefined : { value: avg, label: `Avg: ${avg.toFixed(2)} min` },
    };
  },

  swim_swolf: (spec, activity) => {
    const rows = activity.laps.map((lap) => ({
      lap: lap.lap,
      swolf: lap.swolf ?? (lap.totalStrokes === undefined
        ? undefined
        : lap.totalStrokes + (lap.totalElapsedTime ?? lap.totalTimerTime ?? 0)),
    }));
    const avg = average(rows.flatMap((r) => (r.swolf === undefined ? [] : [r.swolf])));
    return {
      kind: "line",
      title: spec.title,
      xKey: "lap",
      xLabel: "Lap Number",
      yLabel: "SWOLF Score",
      series: [{ key: "swolf", label: "SWOLF", color: "#00897b" }],
      rows,
      reference: avg === undefined ? undefined : { value: avg, label: `Avg: ${avg.toFixed(1)}` },
    };
  },

  swim_stroke_rate: (spec, activity) => ({
    kind: "line",
    title: spec.title,
    xKey: "lap",
    xLabel: "Lap Number",
    yLabel: "Strokes per Minute",
    series: [{ key: "rate", label: "Stroke rate", color: "#6a1b9a" }],
    rows: activity.laps.map((lap) => {
      const seconds = lap.totalElapsedTime ?? lap.totalTimerTime;
      return {
        lap: lap.lap,
        rate: lap.totalStrokes !== undefined && seconds ? lap.totalStrokes / (seconds / 60) : undefined,
      };
    }),
  }),
};

export function buildChartData(spec: ChartSpec, activity: Activity): ChartData {
  return builders[spec.metric](spec, activity);
}
