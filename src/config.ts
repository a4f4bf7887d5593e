import path from "node:path";
import { expandHome, normalizeRoots } from "./utils.js";

export type AccessMode = "open" | "strict";
export type StorageBackend = "json" | "sqlite";
export type LauncherKind = "detached" | "tmux" | "macos";

export type DispatchPolicy = {
  staleAfterMs: number;
  dedupWindowMs: number;
};

export type Config = {
  serverName: string;
  serverVersion: string;
  dataDir: string;
  logDir: string;
  storage: StorageBackend;
  dbPath: string;
  mode: AccessMode;
  roots: string[];
  launcher: LauncherKind;
  policy: DispatchPolicy;
  backendsPath?: string;
};

export const DEFAULT_POLICY: DispatchPolicy = {
  staleAfterMs: 10 * 60 * 1000,
  dedupWindowMs: 5 * 60 * 1000,
};

function parseArgValue(args: string[], key: string): string | undefined {
  const idx = args.indexOf(key);
  if (idx === -1 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

function parseDuration(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : fallback;
}

function pickLauncher(raw: string): LauncherKind {
  if (raw === "tmux" || raw === "macos") return raw;
  return "detached";
}

export function loadConfig(
  args: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Config {
  const read = (flag: string, envKey: string): string | undefined =>
    parseArgValue(args, flag) || env[envKey] || undefined;

  const serverName = read("--server-name", "CONDUCTOR_SERVER_NAME") ?? "conductor-mcp";
  const serverVersion = read("--server-version", "CONDUCTOR_SERVER_VERSION") ?? "0.1.0";

  const mode = read("--mode", "CONDUCTOR_MODE") ?? "open";

  const rootsRaw = read("--roots", "CONDUCTOR_ROOTS") ?? process.cwd();
  const roots = normalizeRoots(
    rootsRaw
      .split(",")
      .map((root: string) => root.trim())
      .filter(Boolean)
  );

  const dataDir = path.resolve(expandHome(read("--data-dir", "CONDUCTOR_DATA_DIR") ?? "~/.conductor/data"));
  const logDir = path.resolve(expandHome(read("--log-dir", "CONDUCTOR_LOG_DIR") ?? "~/.conductor/logs"));

  const storage = read("--storage", "CONDUCTOR_STORAGE") ?? "sqlite";
  const dbPathRaw = read("--db-path", "CONDUCTOR_DB_PATH") ?? path.join(dataDir, "ledger.db");

  const backendsRaw = read("--backends", "CONDUCTOR_BACKENDS");

  return {
    serverName,
    serverVersion,
    dataDir,
    logDir,
    storage: storage === "json" ? "json" : "sqlite",
    dbPath: path.resolve(expandHome(dbPathRaw)),
    mode: mode === "strict" ? "strict" : "open",
    roots,
    launcher: pickLauncher(read("--launcher", "CONDUCTOR_LAUNCHER") ?? "detached"),
    policy: {
      staleAfterMs: parseDuration(read("--stale-after-ms", "CONDUCTOR_STALE_AFTER_MS"), DEFAULT_POLICY.staleAfterMs),
      dedupWindowMs: parseDuration(read("--dedup-window-ms", "CONDUCTOR_DEDUP_WINDOW_MS"), DEFAULT_POLICY.dedupWindowMs),
    },
    backendsPath: backendsRaw ? path.resolve(expandHome(backendsRaw)) : undefined,
  };
}

/** Flags that must be forwarded to child processes so they open the same ledger. */
export function configArgs(config: Config): string[] {
  return [
    "--data-dir", config.dataDir,
    "--log-dir", config.logDir,
    "--storage", config.storage,
    "--db-path", config.dbPath,
    ...(config.backendsPath ? ["--backends", config.backendsPath] : []),
  ];
}
