/** Activity as listed by the fitness platform */
export interface ActivitySummary {
  activityId: number;
  /** `YYYY-MM-DD` (local) */
  date: string;
  /** Local start, e.g. `2024-05-01 07:30:00` */
  startTimeLocal: string | null;
  name: string;
  type: string;
  durationSeconds: number;
  distanceMeters: number | null;
  avgHr: number | null;
  maxHr: number | null;
  calories: number | null;
  elevationGain: number | null;
}

export interface DailySummary {
  date: string;
  totalSteps: number;
  distanceMeters: number;
  activeKcal: number;
  restingHr: number | null;
  minHr: number | null;
  maxHr: number | null;
  avgStress: number | null;
  bbAtWake: number | null;
  floorsAscended: number;
}

export interface SkippedDay {
  date: string;
  error: string;
}

export interface DailyResult {
  /** Oldest first. */
  days: DailySummary[];
  skipped: SkippedDay[];
}

export type DownloadFormat = "fit" | "tcx" | "gpx" | "kml" | "csv";

export const DOWNLOAD_FORMATS: readonly DownloadFormat[] = ["fit", "tcx", "gpx", "kml", "csv"];

export interface ActivityFile {
  fileName: string;
  data: Buffer;
}

/** Every activity data provider must implement this interface */
export interface ActivityProvider {
  name: string;
  activities(days: number): Promise<ActivitySummary[]>;
  /** The activity in `format`, named after its start time, type and name. */
  downloadActivity(activity: number | ActivitySummary, format: DownloadFormat): Promise<ActivityFile>;
  /** `days` days ending at `until` (`YYYY-MM-DD`, default today); a failed day is skipped. */
  daily(days: number, until?: string): Promise<DailyResult>;
}
