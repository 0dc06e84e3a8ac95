import { existsSync, mkdirSync, readFileSync, openSync, writeSync, closeSync, chmodSync } from "node:fs";
import { join, resolve } from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import { ConfigError } from "./errors.ts";

export const SETTINGS_MODULE = "fitbook";

export function getConfigDir(): string {
  const dir = process.env.FITBOOK_CONFIG_DIR ?? join(homedir(), ".config", SETTINGS_MODULE);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  return dir;
}

export function getModuleConfigPath(module: string): string {
  return join(getConfigDir(), `${module}.json`);
}

/**
 * Read and validate `<configDir>/<module>.json`.
 * Returns null when the file does not exist; throws ConfigError when it
 * exists but is not valid JSON or does not match the schema.
 */
export function readConfig<S extends z.ZodTypeAny>(module: string, schema: S): z.infer<S> | null {
  const path = getModuleConfigPath(module);
  if (!existsSync(path)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch {
    throw new ConfigError(`Invalid JSON in ${path}`);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config in ${path}: ${issues}`);
  }
  return parsed.data;
}

export function writeConfig<T>(module: string, data: T): void {
  const filePath = getModuleConfigPath(module);
  const content = JSON.stringify(data, null, 2) + "\n";
  // Created with 0o600 from the start.
  const fd = openSync(filePath, "w", 0o600);
  try {
    writeSync(fd, content);
  } finally {
    closeSync(fd);
  }
  chmodSync(filePath, 0o600);
}

// ── Settings ─────────────────────────────────────────────────────

export const settingsSchema = z.object({
  exportsDir: z.string().min(1).default("exports"),
  chartsDirName: z.string().min(1).default("charts"),
  includeUnits: z.boolean().default(true),
});

export type SettingsFile = z.infer<typeof settingsSchema>;

/** Resolved settings handed to every pipeline call. */
export interface Settings {
  exportsDir: string;
  activitiesDir: string;
  summariesDir: string;
  healthDir: string;
  chartsDirName: string;
  includeUnits: boolean;
}

export function resolveSettings(file: SettingsFile, cwd = process.cwd()): Settings {
  const exportsDir = resolve(cwd, process.env.FITBOOK_EXPORTS_DIR ?? file.exportsDir);
  return {
    exportsDir,
    activitiesDir: join(exportsDir, "activities"),
    summariesDir: join(exportsDir, "chatgpt_ready"),
    healthDir: join(exportsDir, "health"),
    chartsDirName: file.chartsDirName,
    includeUnits: file.includeUnits,
  };
}

export function loadSettings(cwd = process.cwd()): Settings {
  const file = readConfig(SETTINGS_MODULE, settingsSchema) ?? settingsSchema.parse({});
  return resolveSettings(file, cwd);
}

export function updateSettings(patch: Partial<SettingsFile>): SettingsFile {
  const current = readConfig(SETTINGS_MODULE, settingsSchema) ?? settingsSchema.parse({});
  const next = settingsSchema.parse({ ...current, ...patch });
  writeConfig(SETTINGS_MODULE, next);
  return next;
}
