export * from "./config.ts";
export * from "./errors.ts";
export * from "./http.ts";
export { error } from "./output.ts";
