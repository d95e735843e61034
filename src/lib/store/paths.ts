import path from "node:path";

export type DataPaths = {
  dataDir: string;
  walDir: string;
  walPath: string;
  statePath: string;
  archivePath: string;
  strengthSignalPath: string;
};

export function resolveDataPaths(dataDir: string): DataPaths {
  const walDir = path.join(dataDir, "wal");
  return {
    dataDir,
    walDir,
    walPath: path.join(walDir, "microdose_sessions.wal"),
    statePath: path.join(walDir, "state.json"),
    archivePath: path.join(dataDir, "sessions.csv"),
    strengthSignalPath: path.join(dataDir, "strength", "signal.json"),
  };
}
