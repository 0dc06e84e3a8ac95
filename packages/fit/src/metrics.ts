/**
 * Unit conversion and display formatting shared by every output path
 * (lap table, lap chart, markdown summary, workout comparison).
 */

export const MS_TO_KMH = 3.6;
export const PLACEHOLDER = "—";

export type IntensityBand = "low" | "moderate" | "high";

/** Average heart rate below this is "low". */
export const MODERATE_HR_BPM = 120;
/** Average heart rate at or above this is "high". */
export const HIGH_HR_BPM = 150;

export function isRunning(sport: string | undefined): boolean {
  return sport?.toLowerCase() === "running";
}

export function speedToKmh(speedMs: number): number {
  return speedMs * MS_TO_KMH;
}

/** Minutes per km, or undefined when there is no positive speed. */
export function paceFromSpeed(speedMs: number | undefined): number | undefined {
  if (speedMs === undefined || !(speedMs > 0)) return undefined;
  return 60 / (speedMs * MS_TO_KMH);
}

/** `5.5` → `"5:30"`; whole minutes plus the remainder rounded to the second. */
export function formatPace(paceMinutes: number): string {
  let minutes = Math.floor(paceMinutes);
  let seconds = Math.round((paceMinutes - minutes) * 60);
  if (seconds === 60) {
    minutes += 1;
    seconds = 0;
  }
  return `${minutes}:${String(seconds).padStart(2, "0")}`;
}

/** Inverse of {@link formatPace}: `"5:30"` → `5.5`. */
export function parsePace(text: string): number | undefined {
  const match = /^(\d+):([0-5]\d)$/.exec(text.trim());
  if (!match) return undefined;
  return Number(match[1]) + Number(match[2]) / 60;
}

export type SpeedDisplay =
  | { unit: "pace"; value: number; text: string }
  | { unit: "speed"; value: number; text: string };

export type SpeedUnit = SpeedDisplay["unit"];

export function speedUnitFor(sport: string | undefined): SpeedUnit {
  return isRunning(sport) ? "pace" : "speed";
}

/**
 * The one sport-conditional unit choice: pace (min/km) for running, speed
 * (km/h) for everything else. Running without a positive speed has no pace.
 */
export function speedOrPace(speedMs: number | undefined, sport: string | undefined): SpeedDisplay | undefined {
  if (speedMs === undefined) return undefined;
  if (isRunning(sport)) {
    const pace = paceFromSpeed(speedMs);
    if (pace === undefined) return undefined;
    return { unit: "pace", value: pace, text: `${formatPace(pace)}/km` };
  }
  const kmh = speedToKmh(speedMs);
  return { unit: "speed", value: kmh, text: `${kmh.toFixed(1)} km/h` };
}

export function intensityBand(avgHeartRate: number): IntensityBand {
  if (avgHeartRate < MODERATE_HR_BPM) return "low";
  if (avgHeartRate < HIGH_HR_BPM) return "moderate";
  return "high";
}

/** Running cadence is recorded per foot; show steps per minute. */
export function cadenceDisplay(cadence: number, sport: string | undefined): { value: number; unit: "spm" | "rpm" } {
  return isRunning(sport)
    ? { value: Math.round(cadence) * 2, unit: "spm" }
    : { value: Math.round(cadence), unit: "rpm" };
}

// ── Formatting ───────────────────────────────────────────────────

export function formatDistanceKm(meters: number): string {
  return `${(meters / 1000).toFixed(2)} km`;
}

/** `125` → `"2:05"`, `3725` → `"1:02:05"`. */
export function formatClock(totalSeconds: number): string {
  const rounded = Math.round(totalSeconds);
  const h = Math.floor(rounded / 3600);
  const m = Math.floor((rounded % 3600) / 60);
  const s = rounded % 60;
  if (h > 0) return `${h}:${String(m).padStart(2, "0")}:${String(s).padStart(2, "0")}`;
  return `${m}:${String(s).padStart(2, "0")}`;
}

/** Lap times: always `M:SS`, minutes not folded into hours. */
export function formatMinutesSeconds(totalSeconds: number): string {
  const rounded = Math.round(totalSeconds);
  return `${Math.floor(rounded / 60)}:${String(rounded % 60).padStart(2, "0")}`;
}

/** `3000` → `"50 minutes 0 seconds"`. */
export function formatDurationWords(totalSeconds: number): string {
  const rounded = Math.round(totalSeconds);
  return `${Math.floor(rounded / 60)} minutes ${rounded % 60} seconds`;
}

export function formatHeartRate(bpm: number | undefined): string {
  if (bpm === undefined || !(bpm > 0)) return PLACEHOLDER;
  return String(Math.round(bpm));
}

export function titleCase(text: string): string {
  return text
    .split(/[\s_]+/)
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
    .join(" ");
}
