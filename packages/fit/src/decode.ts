import { Decoder, Profile, Stream } from "@garmin/fitsdk";
import type { DecoderOptions, Mesg, ProfileField } from "@garmin/fitsdk";
import type { FieldValue, FitMessage, Scalar } from "./types.ts";

export class FitDecodeError extends Error {
  constructor(message: string, public details: unknown[] = []) {
    super(message);
    this.name = "FitDecodeError";
  }
}

interface MessageProfile {
  name: string;
  units: Record<string, string>;
}

/** `heartRate` → `heart_rate`, `fileId` → `file_id`. */
export function toSnakeCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/([A-Z])([A-Z][a-z])/g, "$1_$2")
    .toLowerCase();
}

/** Component fields list one unit per component; the first names the field's own. */
function unitOf(units: ProfileField["units"]): string | undefined {
  const unit = typeof units === "string" ? units : units.find((u) => u !== "");
  return unit || undefined;
}

let profileCache: Map<number, MessageProfile> | null = null;

function messageProfiles(): Map<number, MessageProfile> {
  if (profileCache) return profileCache;
  const profiles = new Map<number, MessageProfile>();
  for (const message of Object.values(Profile.messages)) {
    const units: Record<string, string> = {};
    for (const field of Object.values(message.fields)) {
      const unit = unitOf(field.units);
      if (unit) units[field.name] = unit;
      for (const sub of field.subFields) {
        const subUnit = unitOf(sub.units);
        if (subUnit && !(sub.name in units)) units[sub.name] = subUnit;
      }
    }
    profiles.set(message.num, { name: toSnakeCase(message.name), units });
  }
  profileCache = profiles;
  return profiles;
}

function toFieldValue(value: unknown): FieldValue | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  if (typeof value === "bigint") return Number(value);
  if (value instanceof Date) return value;
  if (Array.isArray(value)) {
    const items: (Scalar | Date)[] = [];
    for (const item of value) {
      if (typeof item === "string" || typeof item === "number" || typeof item === "boolean" || item instanceof Date) {
        items.push(item);
      }
    }
    return items;
  }
  // Nested objects (developer fields) have no flat representation.
  return undefined;
}

/**
 * Turn one decoder message into a FitMessage with snake_case field names
 * and the profile's units.
 */
export function toFitMessage(messageNumber: number, message: Mesg): FitMessage {
  const profile = messageProfiles().get(messageNumber);
  const fields: Record<string, FieldValue> = {};
  const units: Record<string, string> = {};

  for (const [key, raw] of Object.entries(message)) {
    if (key === "mesgNum" || key === "developerFields") continue;
    const value = toFieldValue(raw);
    if (value === undefined) continue;
    const name = toSnakeCase(key);
    fields[name] = value;
    const unit = profile?.units[key];
    if (unit) units[name] = unit;
  }

  return { type: profile?.name ?? `mesg_${messageNumber}`, fields, units };
}

export interface DecodedFit {
  messages: FitMessage[];
  /** Non-fatal decoder errors; the messages before them are kept. */
  warnings: string[];
}

/** Decode FIT bytes into messages in file order. */
export function decodeFit(bytes: Uint8Array): DecodedFit {
  const decoder = new Decoder(Stream.fromByteArray(bytes));
  if (!decoder.isFIT()) {
    throw new FitDecodeError("Not a FIT file");
  }
  if (!decoder.checkIntegrity()) {
    throw new FitDecodeError("FIT file failed integrity check (truncated or corrupt)");
  }

  const messages: FitMessage[] = [];
  const options: DecoderOptions = {
    mesgListener: (messageNumber, message) => {
      messages.push(toFitMessage(messageNumber, message));
    },
    applyScaleAndOffset: true,
    expandSubFields: true,
    expandComponents: true,
    convertTypesToStrings: true,
    convertDateTimesToDates: true,
    includeUnknownData: false,
    mergeHeartRates: true,
  };
  const { errors } = decoder.read(options);

  const warnings = errors.map((e) => e.message);
  if (warnings.length > 0 && messages.length === 0) {
    throw new FitDecodeError(`FIT decoding failed: ${warnings[0]}`, errors);
  }
  return { messages, warnings };
}
