import { spawn, spawnSync } from "node:child_process";
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { shellQuote } from "./backends.js";
import { configArgs, type Config, type LauncherKind } from "./config.js";
import { debug } from "./log.js";
import { ensureDir } from "./utils.js";

export type RunRequest = {
  taskId: string;
  projectPath: string;
  promptFile: string;
  agentKind: string;
  model?: string;
  additionalPaths?: string[];
  /** Agent session the run continues instead of starting fresh. */
  resumeSessionId?: string;
};

export type LaunchResult = {
  launcher: LauncherKind;
  pid?: number;
  detail: string;
};

export interface Launcher {
  readonly kind: LauncherKind;
  launch(request: RunRequest): Promise<LaunchResult>;
}

/** How to start this package's CLI from a child process, under tsx when running from sources. */
export function cliInvocation(): { command: string; args: string[] } {
  const selfPath = path.resolve(fileURLToPath(import.meta.url));
  const baseDir = path.dirname(selfPath);
  if (selfPath.endsWith(".ts")) {
    return { command: process.execPath, args: ["--import", "tsx", path.join(baseDir, "cli.ts")] };
  }
  return { command: process.execPath, args: [path.join(baseDir, "cli.js")] };
}

export function runArgs(request: RunRequest, config: Config): string[] {
  return [
    "run",
    "--task-id", request.taskId,
    "--project", request.projectPath,
    "--prompt-file", request.promptFile,
    "--agent", request.agentKind,
    ...(request.model ? ["--model", request.model] : []),
    ...(request.additionalPaths ?? []).flatMap((dir) => ["--add-dir", dir]),
    ...(request.resumeSessionId ? ["--resume", request.resumeSessionId] : []),
    ...configArgs(config),
  ];
}

export function runCommandLine(request: RunRequest, config: Config): string {
  const { command, args } = cliInvocation();
  return [command, ...args, ...runArgs(request, config)].map(shellQuote).join(" ");
}

export function windowName(taskId: string): string {
  return `task-${taskId.slice(0, 8)}`;
}

/** Background process with its output in `<logDir>/runs/<taskId>.log`. */
export class DetachedLauncher implements Launcher {
  readonly kind = "detached" as const;

  constructor(private config: Config) {}

  async launch(request: RunRequest): Promise<LaunchResult> {
    const runsDir = path.join(this.config.logDir, "runs");
    await ensureDir(runsDir);
    const logPath = path.join(runsDir, `${request.taskId}.log`);
    const log = await fs.open(logPath, "a");
    try {
      const { command, args } = cliInvocation();
      const child = spawn(command, [...args, ...runArgs(request, this.config)], {
        cwd: request.projectPath,
        detached: true,
        stdio: ["ignore", log.fd, log.fd],
        env: process.env,
      });
      await new Promise<void>((resolve, reject) => {
        child.once("spawn", () => resolve());
        child.once("error", reject);
      });
      child.unref();
      debug(`detached runner ${child.pid ?? "?"} for ${request.taskId}`);
      return { launcher: this.kind, pid: child.pid, detail: logPath };
    } finally {
      await log.close();
    }
  }
}

function runTmux(args: string[]) {
  const result = spawnSync("tmux", args, { stdio: "pipe", encoding: "utf8" });
  if (result.error) throw result.error;
  return { status: result.status ?? 0, stderr: result.stderr };
}

function ensureTmuxAvailable() {
  try {
    const { status } = runTmux(["-V"]);
    if (status !== 0) throw new Error("tmux not available");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`tmux not found or not available: ${message}`);
  }
}

/** A new window per task in a shared tmux session. */
export class TmuxLauncher implements Launcher {
  readonly kind = "tmux" as const;

  constructor(private config: Config, private session = "conductor") {}

  async launch(request: RunRequest): Promise<LaunchResult> {
    ensureTmuxAvailable();
    const name = windowName(request.taskId);
    const command = runCommandLine(request, this.config);
    const hasSession = runTmux(["has-session", "-t", this.session]).status === 0;
    const args = hasSession
      ? ["new-window", "-d", "-t", this.session, "-n", name, "-c", request.projectPath, command]
      : ["new-session", "-d", "-s", this.session, "-n", name, "-c", request.projectPath, command];
    const { status, stderr } = runTmux(args);
    if (status !== 0) {
      throw new Error(`tmux exited with ${status}: ${stderr.trim()}`);
    }
    return { launcher: this.kind, detail: `${this.session}:${name}` };
  }
}

export function escapeForAppleScript(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

/** A Terminal.app window; closing it delivers SIGHUP to the runner. */
export class MacosLauncher implements Launcher {
  readonly kind = "macos" as const;

  constructor(private config: Config) {}

  async launch(request: RunRequest): Promise<LaunchResult> {
    if (process.platform !== "darwin") {
      throw new Error("macos launcher is only supported on macOS");
    }
    const command = `cd ${shellQuote(request.projectPath)} && ${runCommandLine(request, this.config)}`;
    const script = `tell application "Terminal" to do script "${escapeForAppleScript(command)}"`;
    debug(`osascript: ${script}`);
    const child = spawn("osascript", ["-e", script], { detached: true, stdio: "ignore" });
    await new Promise<void>((resolve, reject) => {
      child.once("spawn", () => resolve());
      child.once("error", reject);
    });
    child.unref();
    return { launcher: this.kind, detail: "Terminal" };
  }
}

export function createLauncher(config: Config): Launcher {
  switch (config.launcher) {
    case "tmux":
      return new TmuxLauncher(config);
    case "macos":
      return new MacosLauncher(config);
    default:
      return new DetachedLauncher(config);
  }
}
