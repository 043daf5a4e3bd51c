export * from "./constants";
export * from "./errors";
export * from "./schemas/rounds";
export * from "./schemas/bundle";
export type * from "./backends";
