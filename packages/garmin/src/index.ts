export * from "./types.ts";
export * from "./export.ts";
export { activityFileName, createGarminProvider, extractFitFromZip, garminProvider, TOKEN_ENV } from "./providers/garmin.ts";
