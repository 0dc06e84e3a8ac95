import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigError } from "../errors.ts";
import {
  SETTINGS_MODULE,
  getModuleConfigPath,
  loadSettings,
  readConfig,
  resolveSettings,
  settingsSchema,
  updateSettings,
} from "../config.ts";

let dir: string;
const exportsOverride = process.env.FITBOOK_EXPORTS_DIR;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "fitbook-config-"));
  vi.stubEnv("FITBOOK_CONFIG_DIR", dir);
  delete process.env.FITBOOK_EXPORTS_DIR;
});

afterEach(() => {
  vi.unstubAllEnvs();
  if (exportsOverride !== undefined) process.env.FITBOOK_EXPORTS_DIR = exportsOverride;
  rmSync(dir, { recursive: true, force: true });
});

describe("settings", () => {
  it("uses defaults without a config file", () => {
    expect(loadSettings("/work")).toEqual({
      exportsDir: "/work/exports",
      activitiesDir: "/work/exports/activities",
      summariesDir: "/work/exports/chatgpt_ready",
      healthDir: "/work/exports/health",
      chartsDirName: "charts",
      includeUnits: true,
    });
  });

  it("lets the environment move the exports directory", () => {
    vi.stubEnv("FITBOOK_EXPORTS_DIR", "/data/fit");
    const settings = resolveSettings(settingsSchema.parse({}), "/work");
    expect(settings.exportsDir).toBe("/data/fit");
    expect(settings.summariesDir).toBe("/data/fit/chatgpt_ready");
  });

  it("saves updates with owner-only permissions", () => {
    expect(updateSettings({ chartsDirName: "plots" })).toEqual({
      exportsDir: "exports",
      chartsDirName: "plots",
      includeUnits: true,
    });
    const path = getModuleConfigPath(SETTINGS_MODULE);
    expect(statSync(path).mode & 0o777).toBe(0o600);
    expect(JSON.parse(readFileSync(path, "utf-8"))).toEqual({
      exportsDir: "exports",
      chartsDirName: "plots",
      includeUnits: true,
    });
    expect(loadSettings("/work").chartsDirName).toBe("plots");
  });
});

describe("readConfig", () => {
  it("returns null for a missing file", () => {
    expect(readConfig("absent", settingsSchema)).toBeNull();
  });

  it("rejects invalid JSON", () => {
    writeFileSync(join(dir, "broken.json"), "{");
    expect(() => readConfig("broken", settingsSchema)).toThrow(ConfigError);
  });

  it("names the invalid field", () => {
    writeFileSync(join(dir, "bad.json"), JSON.stringify({ includeUnits: "yes" }));
    expect(() => readConfig("bad", settingsSchema)).toThrow(/includeUnits: Expected boolean, received string/);
  });
});
