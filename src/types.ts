export * from "./types/config";
export * from "./types/plugin";
