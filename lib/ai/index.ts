export * from "./errors";
export * from "./prompt";
export * from "./service";
export type { GenerationService, ProviderCall, ProviderResult } from "./types";
