export * from "./types/chart";
export * from "./types/tools";
