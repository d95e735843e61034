export * from "./types";
export * from "./rules";
export * from "./catalog";
export * from "./history";
export * from "./prescription";
export * from "./progression";
