import AdmZip from "adm-zip";
import { z } from "zod";
import { ConfigError, HttpClient, errorMessage } from "@fitbook/shared";
import type {
  ActivityFile,
  ActivityProvider,
  ActivitySummary,
  DailyResult,
  DownloadFormat,
} from "../types.ts";

const BASE_URL = "https://connectapi.garmin.com";
const UA = "com.garmin.android.apps.connectmobile";

export const TOKEN_ENV = "GARMIN_ACCESS_TOKEN";

// ── Response schemas ─────────────────────────────────────────────

const num = z.number().nullish().transform((v) => v ?? null);

const activitySchema = z.object({
  activityId: z.number(),
  activityName: z.string().nullish(),
  startTimeLocal: z.string().nullish(),
  startTimeGMT: z.string().nullish(),
  activityType: z.object({ typeKey: z.string() }).nullish(),
  duration: num,
  distance: num,
  averageHR: num,
  maxHR: num,
  calories: num,
  elevationGain: num,
});

const activityDetailSchema = z.object({
  activityId: z.number(),
  activityName: z.string().nullish(),
  activityTypeDTO: z.object({ typeKey: z.string() }).nullish(),
  summaryDTO: z
    .object({
      startTimeLocal: z.string().nullish(),
      duration: num,
      distance: num,
      averageHR: num,
      maxHR: num,
      calories: num,
      elevationGain: num,
    })
    .nullish(),
});

const dailySchema = z.object({
  calendarDate: z.string().nullish(),
  totalSteps: num,
  totalDistanceMeters: num,
  activeKilocalories: num,
  restingHeartRate: num,
  minHeartRate: num,
  maxHeartRate: num,
  averageStressLevel: num,
  bodyBatteryAtWakeTime: num,
  floorsAscended: num,
});

const profileSchema = z.object({
  displayName: z.string().nullish(),
  userName: z.string().nullish(),
});

// ── Helpers ──────────────────────────────────────────────────────

/** Local calendar date as `YYYY-MM-DD`. */
export function localDate(d = new Date()): string {
  const pad = (v: number) => String(v).padStart(2, "0");
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** `date` moved back `days` calendar days. */
export function daysBefore(date: string, days: number): string {
  const d = new Date(`${date}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() - days);
  return d.toISOString().slice(0, 10);
}

function toActivitySummary(a: z.infer<typeof activitySchema>): ActivitySummary {
  const start = a.startTimeLocal ?? a.startTimeGMT ?? null;
  return {
    activityId: a.activityId,
    date: (start ?? "").slice(0, 10),
    startTimeLocal: start,
    name: a.activityName ?? "Unknown",
    type: a.activityType?.typeKey ?? "unknown",
    durationSeconds: a.duration ?? 0,
    distanceMeters: a.distance,
    avgHr: a.averageHR,
    maxHr: a.maxHR,
    calories: a.calories,
    elevationGain: a.elevationGain,
  };
}

function fromDetail(d: z.infer<typeof activityDetailSchema>): ActivitySummary {
  const s = d.summaryDTO;
  const start = s?.startTimeLocal ?? null;
  return {
    activityId: d.activityId,
    date: (start ?? "").slice(0, 10),
    startTimeLocal: start,
    name: d.activityName ?? "Unknown",
    type: d.activityTypeDTO?.typeKey ?? "unknown",
    durationSeconds: s?.duration ?? 0,
    distanceMeters: s?.distance ?? null,
    avgHr: s?.averageHR ?? null,
    maxHr: s?.maxHR ?? null,
    calories: s?.calories ?? null,
    elevationGain: s?.elevationGain ?? null,
  };
}

/**
 * `2024-05-01_073000_running_Morning_Run_123.fit`. Falls back to `now` when
 * the activity has no start time.
 */
export function activityFileName(activity: ActivitySummary, format: DownloadFormat, now = new Date()): string {
  const start = (activity.startTimeLocal ?? now.toISOString())
    .replace("T", "_")
    .replace(" ", "_")
    .replace(/:/g, "")
    .split(".")[0] ?? "";
  const parts = [start];
  if (activity.type !== "unknown" && activity.type !== "activity") parts.push(activity.type);
  if (activity.name && activity.name !== "Unknown") parts.push(activity.name.replace(/\s+/g, "_"));
  parts.push(String(activity.activityId));
  return `${parts.join("_")}.${format}`.replace(/[/\\]/g, "_");
}

function isFitBytes(data: Buffer): boolean {
  return data.length >= 12 && data.toString("ascii", 8, 12) === ".FIT";
}

/** Original-format downloads arrive zipped; returns the `.fit` inside. */
export function extractFitFromZip(data: Buffer): Buffer {
  if (isFitBytes(data)) return data;
  const entry = new AdmZip(data)
    .getEntries()
    .find((e) => !e.isDirectory && e.entryName.toLowerCase().endsWith(".fit"));
  if (!entry) throw new Error("Download contains no .fit file");
  return entry.getData();
}

function downloadPath(id: number, format: DownloadFormat): string {
  return format === "fit"
    ? `/download-service/files/activity/${id}`
    : `/download-service/export/${format}/activity/${id}`;
}

// ── Provider ─────────────────────────────────────────────────────

export interface GarminProviderOptions {
  /** Access token lookup; defaults to the GARMIN_ACCESS_TOKEN variable. */
  token?: () => string | undefined;
  baseUrl?: string;
}

export function createGarminProvider(options: GarminProviderOptions = {}): ActivityProvider {
  const token = options.token ?? (() => process.env[TOKEN_ENV]);
  const http = new HttpClient({
    baseUrl: options.baseUrl ?? BASE_URL,
    headers: async () => {
      const value = token();
      if (!value) throw new ConfigError(`${TOKEN_ENV} is not set. Export a Garmin Connect OAuth2 access token.`);
      return { "User-Agent": UA, Authorization: `Bearer ${value}` };
    },
  });

  let displayName: string | undefined;
  async function getDisplayName(): Promise<string> {
    if (displayName) return displayName;
    const profile = await http.get("/userprofile-service/socialProfile", profileSchema);
    const name = profile?.displayName || profile?.userName;
    if (!name) throw new Error("Could not determine display name from profile");
    displayName = name;
    return name;
  }

  return {
    name: "garmin",

    async activities(days) {
      const raw = await http.get("/activitylist-service/activities/search/activities", z.array(activitySchema), {
        start: "0",
        limit: "100",
        startDate: daysBefore(localDate(), days - 1),
        endDate: localDate(),
      });
      return (raw ?? []).map(toActivitySummary).sort((a, b) => a.date.localeCompare(b.date));
    },

    async downloadActivity(activity, format) {
      let summary: ActivitySummary;
      if (typeof activity === "number") {
        const detail = await http.get(`/activity-service/activity/${activity}`, activityDetailSchema);
        if (!detail) throw new Error(`Activity ${activity} not found`);
        summary = fromDetail(detail);
      } else {
        summary = activity;
      }
      const raw = await http.getBuffer(downloadPath(summary.activityId, format));
      const file: ActivityFile = {
        fileName: activityFileName(summary, format),
        data: format === "fit" ? extractFitFromZip(raw) : raw,
      };
      return file;
    },

    async daily(days, until = localDate()) {
      const name = await getDisplayName();
      const result: DailyResult = { days: [], skipped: [] };
      for (let i = days - 1; i >= 0; i--) {
        const date = daysBefore(until, i);
        let raw: z.infer<typeof dailySchema> | undefined;
        try {
          raw = await http.get(`/usersummary-service/usersummary/daily/${name}`, dailySchema, { calendarDate: date });
        } catch (e) {
          result.skipped.push({ date, error: errorMessage(e) });
          continue;
        }
        if (!raw) continue;
        result.days.push({
          date: raw.calendarDate ?? date,
          totalSteps: raw.totalSteps ?? 0,
          distanceMeters: raw.totalDistanceMeters ?? 0,
          activeKcal: raw.activeKilocalories ?? 0,
          restingHr: raw.restingHeartRate,
          minHr: raw.minHeartRate,
          maxHr: raw.maxHeartRate,
          avgStress: raw.averageStressLevel,
          bbAtWake: raw.bodyBatteryAtWakeTime,
          floorsAscended: raw.floorsAscended ?? 0,
        });
      }
      return result;
    },
  };
}

export const garminProvider: ActivityProvider = createGarminProvider();
