export * from "./types/error";
export * from "./types/meta";
export * from "./types/utilities";
export * from "./types/symbols";
