export * from "./aggregate";
export * from "./advice";
export * from "./classify";
export * from "./errors";
export * from "./normalize";
export * from "./orchestrator";
export * from "./present";
export * from "./session";
export type * from "./types";
