export * from "./archive-csv";
export * from "./atomic-write";
export * from "./file-lock";
export * from "./history-loader";
export * from "./paths";
export * from "./rollup";
export * from "./state-store";
export * from "./strength-signal";
export * from "./wal";
