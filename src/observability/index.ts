export * from "./logger";
export * from "./stats";
export * from "./types";
