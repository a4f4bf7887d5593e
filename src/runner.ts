import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import fs from "node:fs/promises";
import readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import { buildAgentCommand, resolveBackend, type BackendTable } from "./backends.js";
import { OutputClassifier, renderSummary } from "./classifier.js";
import { renderChunk } from "./format.js";
import type { TaskAnnotation, TaskLedger } from "./ledger.js";
import { nullEventLog, type EventLog } from "./log.js";
import { LifecycleReporter, TerminationGuard, type ReportOutcome } from "./reporter.js";
import { errorMessage, headChars } from "./utils.js";

export type AgentExit = {
  code: number | null;
  signal: NodeJS.Signals | null;
};

/** The running agent as the runner sees it. */
export type AgentProcess = {
  pid?: number;
  stdin: Writable | null;
  stdout: Readable | null;
  stderr: Readable | null;
  exited: Promise<AgentExit>;
  kill(signal: NodeJS.Signals): void;
};

export type StartAgent = (command: string, cwd: string) => AgentProcess;

/**
 * Starts the agent in its own process group, so that `kill` reaches the
 * shell and everything the agent started.
 */
export const spawnAgent: StartAgent = (command, cwd) => {
  const child = spawn(command, {
    shell: true,
    cwd,
    env: process.env,
    stdio: ["pipe", "pipe", "pipe"],
    detached: process.platform !== "win32",
  });
  const exited = new Promise<AgentExit>((resolve, reject) => {
    child.once("error", reject);
    child.once("close", (code, signal) => resolve({ code, signal }));
  });
  const kill = (signal: NodeJS.Signals) => {
    if (child.pid === undefined || child.exitCode !== null || child.signalCode !== null) return;
    if (process.platform === "win32") {
      child.kill(signal);
      return;
    }
    try {
      process.kill(-child.pid, signal);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== "ESRCH") throw error;
    }
  };
  return { pid: child.pid, stdin: child.stdin, stdout: child.stdout, stderr: child.stderr, exited, kill };
};

export type RunTaskOptions = {
  taskId: string;
  projectPath: string;
  promptFile: string;
  agentKind: string;
  model?: string;
  addDirs?: string[];
  /** Agent session to continue instead of starting a new one. */
  resumeSessionId?: string;
  ledger: TaskLedger;
  backends: BackendTable;
  eventLog?: EventLog;
  output?: Writable;
  startAgent?: StartAgent;
  signalTarget?: EventEmitter;
  exit?: (code: number) => void;
  now?: () => Date;
  keepPromptFile?: boolean;
};

export type RunTaskResult = {
  outcome: ReportOutcome;
  success: boolean;
  summary?: string;
  error?: string;
};

function collectLines(stream: Readable | null, onLine: (line: string) => void): Promise<void> {
  if (!stream) return Promise.resolve();
  const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
  rl.on("line", onLine);
  return new Promise((resolve) => rl.once("close", () => resolve()));
}

function exitError(exit: AgentExit): string {
  if (exit.signal) return `agent killed by ${exit.signal}`;
  return `agent exited with code ${exit.code ?? "unknown"}`;
}

/**
 * Body of the execution process: runs one agent to completion, shows a
 * compact live view and makes exactly one terminal report for the task.
 */
export async function runTask(options: RunTaskOptions): Promise<RunTaskResult> {
  const { taskId, ledger } = options;
  const log = options.eventLog ?? nullEventLog;
  const output = options.output ?? process.stdout;
  const now = options.now ?? (() => new Date());
  const reporter = new LifecycleReporter(ledger, { eventLog: log });
  const guard = new TerminationGuard(reporter, taskId, { target: options.signalTarget, exit: options.exit }).install();

  const annotate = (annotation: TaskAnnotation): Promise<void> =>
    ledger.annotate(taskId, annotation).then(
      () => undefined,
      (error: unknown) => log.append("annotate_failed", { taskId, ...annotation, error: errorMessage(error) })
    );

  const fail = async (error: string): Promise<RunTaskResult> => {
    if (guard.aborted !== undefined) {
      output.write(`\n✗ ${error}\n`);
      return { outcome: "already_terminal", success: false, error };
    }
    const outcome = await reporter.reportFailure(taskId, error);
    guard.markReported();
    output.write(`\n✗ ${error}\n`);
    return { outcome, success: false, error };
  };

  try {
    await annotate({ runnerPid: process.pid });

    const backend = resolveBackend(options.backends, options.agentKind);
    if (!backend) return await fail(`unknown agent kind: ${options.agentKind}`);

    let prompt: string;
    try {
      prompt = await fs.readFile(options.promptFile, "utf8");
    } catch (error) {
      return await fail(`cannot read prompt file: ${errorMessage(error)}`);
    }

    const agentCommand = buildAgentCommand(backend, {
      prompt,
      model: options.model,
      addDirs: options.addDirs,
      resumeSessionId: options.resumeSessionId,
    });
    output.write(`── ${backend.title}${agentCommand.model ? ` (${agentCommand.model})` : ""} · task ${taskId}\n`);
    output.write(`── ${options.projectPath}\n`);
    await log.append("run_start", {
      taskId,
      agentKind: backend.kind,
      model: agentCommand.model,
      pid: process.pid,
      resumeSessionId: options.resumeSessionId,
    });

    const classifier = new OutputClassifier({ startedAt: now() });
    let atLineStart = true;
    let sessionId: string | undefined;
    const pending: Promise<unknown>[] = [];

    const onLine = (line: string, source: "stdout" | "stderr") => {
      for (const entry of classifier.feed(line)) {
        const chunk = renderChunk(entry, atLineStart);
        if (chunk !== undefined && chunk !== "") {
          output.write(chunk);
          atLineStart = chunk.endsWith("\n");
        }
        if (entry.event.kind === "unknown" || (entry.event.kind === "raw" && source === "stdout")) {
          pending.push(log.append("stream_unparsed", { taskId, source, line: headChars(line, 200) }));
        }
      }
      if (classifier.sessionId && classifier.sessionId !== sessionId) {
        sessionId = classifier.sessionId;
        pending.push(annotate({ sessionId }));
      }
    };

    let agent: AgentProcess;
    try {
      agent = (options.startAgent ?? spawnAgent)(agentCommand.command, options.projectPath);
    } catch (error) {
      return await fail(`failed to start agent: ${errorMessage(error)}`);
    }
    guard.onAbort(() => agent.kill("SIGTERM"));

    if (agent.stdin) {
      agent.stdin.on("error", (error) => {
        pending.push(log.append("stdin_error", { taskId, error: errorMessage(error) }));
      });
      agent.stdin.end(agentCommand.stdin ?? "");
    }

    const streams = Promise.all([
      collectLines(agent.stdout, (line) => onLine(line, "stdout")),
      collectLines(agent.stderr, (line) => onLine(line, "stderr")),
    ]);

    let exit: AgentExit;
    try {
      [exit] = await Promise.all([agent.exited, streams]);
    } catch (error) {
      guard.onAbort(undefined);
      await Promise.all(pending);
      return await fail(`failed to start agent: ${errorMessage(error)}`);
    }
    guard.onAbort(undefined);
    await Promise.all(pending);

    if (!atLineStart) output.write("\n");
    const summary = renderSummary(classifier.summarize(now()));
    await log.append("run_exit", { taskId, code: exit.code, signal: exit.signal });

    if (exit.code !== 0) return await fail(exitError(exit));

    const outcome = await reporter.reportSuccess(taskId, classifier.modifiedFiles, summary, classifier.transcript);
    guard.markReported();
    output.write(`\n✓ ${summary}\n`);
    return { outcome, success: true, summary };
  } catch (error) {
    if (!guard.reported && guard.aborted === undefined) {
      guard.markReported();
      await reporter.reportFailure(taskId, `runner error: ${errorMessage(error)}`).catch((reportError: unknown) => {
        process.stderr.write(`Failed to report task ${taskId}: ${errorMessage(reportError)}\n`);
      });
    }
    throw error;
  } finally {
    guard.dispose();
    if (!options.keepPromptFile) {
      await fs.rm(options.promptFile, { force: true });
    }
  }
}
