import { describe, it, expect } from "vitest";
import { Encoder, Profile } from "@garmin/fitsdk";
import type { FileIdMesg, LapMesg, RecordMesg, SessionMesg } from "@garmin/fitsdk";
import { FitDecodeError, decodeFit, toFitMessage, toSnakeCase } from "../decode.ts";
import { extractRecords } from "../extract.ts";
import { START } from "./fixtures.ts";

function mesgNum(name: string): number {
  const num = Profile.MesgNum[name];
  if (num === undefined) throw new Error(`Unknown message ${name}`);
  return num;
}

const at = (seconds: number) => new Date(START + seconds * 1000);

/** Four records at 2.5 m/s, two 20 s laps and a running session. */
function encodeRun(): Uint8Array {
  const encoder = new Encoder();
  const fileId: FileIdMesg = { type: "activity", manufacturer: "development", product: 0, timeCreated: at(0) };
  encoder.onMesg(mesgNum("FILE_ID"), fileId);

  for (let i = 0; i < 4; i++) {
    const record: RecordMesg = { timestamp: at(i * 10), heartRate: 130 + i, speed: 2.5, altitude: 100 + i, cadence: 80 };
    encoder.onMesg(mesgNum("RECORD"), record);
  }
  for (let i = 0; i < 2; i++) {
    const lap: LapMesg = {
      timestamp: at(i * 20 + 20),
      startTime: at(i * 20),
      totalElapsedTime: 20,
      totalDistance: 50,
      avgSpeed: 2.5,
    };
    encoder.onMesg(mesgNum("LAP"), lap);
  }
  const session: SessionMesg = {
    timestamp: at(40),
    startTime: at(0),
    sport: "running",
    totalElapsedTime: 40,
    totalDistance: 100,
    avgHeartRate: 131,
  };
  encoder.onMesg(mesgNum("SESSION"), session);
  return encoder.close();
}

describe("toSnakeCase", () => {
  it("splits camelCase profile names", () => {
    expect(toSnakeCase("heartRate")).toBe("heart_rate");
    expect(toSnakeCase("fileId")).toBe("file_id");
    expect(toSnakeCase("timeInHrZone")).toBe("time_in_hr_zone");
    expect(toSnakeCase("speed1s")).toBe("speed1s");
  });
});

describe("toFitMessage", () => {
  it("names the message and carries profile units", () => {
    const record: RecordMesg = { speed: 2.5, heartRate: 140 };
    expect(toFitMessage(mesgNum("RECORD"), record)).toEqual({
      type: "record",
      fields: { speed: 2.5, heart_rate: 140 },
      units: { speed: "m/s", heart_rate: "bpm" },
    });
  });

  it("takes the unit of component fields", () => {
    const session: SessionMesg = { avgSpeed: 3, maxSpeed: 4, totalDistance: 10000 };
    expect(toFitMessage(mesgNum("SESSION"), session).units).toEqual({
      avg_speed: "m/s",
      max_speed: "m/s",
      total_distance: "m",
    });
  });

  it("keeps unknown message numbers", () => {
    const message: RecordMesg = { heartRate: 120 };
    expect(toFitMessage(65000, message)).toEqual({ type: "mesg_65000", fields: { heart_rate: 120 }, units: {} });
  });
});

describe("decodeFit", () => {
  it("returns messages in file order", () => {
    const { messages, warnings } = decodeFit(encodeRun());
    expect(warnings).toEqual([]);
    expect(messages.map((m) => m.type)).toEqual([
      "file_id", "record", "record", "record", "record", "lap", "lap", "session",
    ]);
  });

  it("decodes scaled values, dates and enums", () => {
    const { messages } = decodeFit(encodeRun());
    const record = messages[1];
    expect(record?.fields.timestamp).toEqual(at(0));
    expect(record?.fields.heart_rate).toBe(130);
    expect(record?.fields.speed).toBeCloseTo(2.5);
    expect(record?.fields.altitude).toBeCloseTo(100);
    expect(record?.units).toMatchObject({ heart_rate: "bpm", speed: "m/s", altitude: "m", cadence: "rpm" });

    const session = messages[7];
    expect(session?.fields.sport).toBe("running");
    expect(session?.fields.total_distance).toBeCloseTo(100);
    expect(session?.units).toMatchObject({ total_distance: "m" });
  });

  it("gives speed and altitude their units columns", () => {
    const result = extractRecords(decodeFit(encodeRun()).messages, { includeUnits: true });
    if (!result.ok) throw new Error("expected a table");
    const { columns } = result.value;
    expect(columns.indexOf("speed_units")).toBe(columns.indexOf("speed") + 1);
    expect(columns.indexOf("altitude_units")).toBe(columns.indexOf("altitude") + 1);
  });

  it("rejects data that is not FIT", () => {
    const bytes = new TextEncoder().encode("definitely not a FIT file");
    expect(() => decodeFit(bytes)).toThrow(FitDecodeError);
    expect(() => decodeFit(bytes)).toThrow("Not a FIT file");
  });

  it("rejects a truncated file", () => {
    const bytes = encodeRun();
    expect(() => decodeFit(bytes.slice(0, bytes.length - 10))).toThrow("FIT file failed integrity check");
  });
});
