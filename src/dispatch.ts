import fs from "node:fs/promises";
import path from "node:path";
import { resolveBackend, type AgentBackend, type BackendTable } from "./backends.js";
import type { Config, DispatchPolicy } from "./config.js";
import { DispatchGuard, type AdmitDecision } from "./guard.js";
import type { LaunchResult, Launcher } from "./launchers.js";
import type { TaskLedger, TaskRecord, TaskStatus } from "./ledger.js";
import { nullEventLog, type EventLog } from "./log.js";
import { buildPrompt } from "./prompts.js";
import {
  LifecycleReporter,
  isProcessRunning,
  sweepAbandoned,
  type ReportOutcome,
} from "./reporter.js";
import { checkSpec, isSpecContent, type SpecTier, type TaskSpec } from "./taskspec.js";
import { ensureDir, errorMessage, isDirectory, resolvePath } from "./utils.js";

export type DispatchRequest = {
  projectPath: string;
  content: string;
  agentKind: string;
  model?: string;
  additionalPaths?: string[];
};

export type DispatchResponse =
  | {
      status: "launched";
      taskId: string;
      agentKind: string;
      agent: string;
      model: string;
      projectPath: string;
      additionalPaths: string[];
      launcher: LaunchResult["launcher"];
      detail: string;
      mode: "spec" | "prose";
      specName?: string;
      specTier?: SpecTier;
      /** Set on follow-ups: the task whose agent session this one continues. */
      resumedFrom?: string;
      sessionId?: string;
      reclaimedTaskId?: string;
    }
  | { status: "already_running" | "duplicate"; taskId: string; message: string }
  | { status: "launch_failed"; taskId: string; error: string };

export type FollowUpRequest = {
  taskId: string;
  content: string;
};

export type FollowUpResponse = DispatchResponse | { status: "not_found"; taskId: string };

type LaunchInput = {
  projectPath: string;
  content: string;
  backend: AgentBackend;
  model?: string;
  additionalPaths: string[];
  spec?: TaskSpec;
  resume?: { taskId: string; sessionId: string };
};

export type TaskSummary = {
  taskId: string;
  status: TaskStatus;
  agentKind: string;
};

export type TaskLookup = TaskRecord | { status: "not_found"; taskId: string };

export type ManualReport =
  | { outcome: "completed"; summary: string; filesModified?: string[] }
  | { outcome: "failed"; error: string };

export type ServiceStatus = {
  running: TaskRecord[];
  policy: DispatchPolicy;
  launcher: string;
  storage: string;
  agents: string[];
};

export type DispatchServiceDeps = {
  config: Config;
  ledger: TaskLedger;
  backends: BackendTable;
  launcher: Launcher;
  eventLog?: EventLog;
  guard?: DispatchGuard;
  reporter?: LifecycleReporter;
  isAlive?: (pid: number) => boolean;
};

/** Rejects a malformed `## Spec:` task before it reaches admission. */
function checkContent(content: string): TaskSpec | undefined {
  if (!isSpecContent(content)) return undefined;
  const checked = checkSpec(content);
  if (!checked.valid) throw new Error(`Invalid spec: ${checked.errors.join("; ")}`);
  return checked.spec;
}

function blockedMessage(decision: Extract<AdmitDecision, { kind: "blocked" }>, projectPath: string): string {
  if (decision.reason === "already_running") {
    return `Project ${projectPath} already has a running task (${decision.existingTaskId}). Check it with task_get.`;
  }
  return `The same request was dispatched recently as task ${decision.existingTaskId}. Check it with task_get instead of resending.`;
}

/**
 * Validates dispatch requests, runs admission and starts the execution
 * process. Returns as soon as the process is launched.
 */
export class DispatchService {
  private readonly config: Config;
  private readonly ledger: TaskLedger;
  private readonly backends: BackendTable;
  private readonly launcher: Launcher;
  private readonly log: EventLog;
  private readonly guard: DispatchGuard;
  private readonly reporter: LifecycleReporter;
  private readonly isAlive: (pid: number) => boolean;

  constructor(deps: DispatchServiceDeps) {
    this.config = deps.config;
    this.ledger = deps.ledger;
    this.backends = deps.backends;
    this.launcher = deps.launcher;
    this.log = deps.eventLog ?? nullEventLog;
    this.guard = deps.guard ?? new DispatchGuard(deps.ledger, { policy: deps.config.policy, eventLog: this.log });
    this.reporter = deps.reporter ?? new LifecycleReporter(deps.ledger, { eventLog: this.log });
    this.isAlive = deps.isAlive ?? isProcessRunning;
  }

  get promptsDir(): string {
    return path.join(this.config.dataDir, "prompts");
  }

  async dispatch(request: DispatchRequest): Promise<DispatchResponse> {
    const content = request.content.trim();
    if (!content) throw new Error("content is required");
    const spec = checkContent(content);

    const backend = resolveBackend(this.backends, request.agentKind);
    if (!backend) {
      throw new Error(
        `Unknown agent kind: ${request.agentKind}. Known: ${Object.keys(this.backends).sort().join(", ")}`
      );
    }

    const projectPath = resolvePath(request.projectPath, this.config.mode, this.config.roots);
    if (!(await isDirectory(projectPath))) {
      throw new Error(`Path does not exist: ${projectPath}`);
    }

    const additionalPaths: string[] = [];
    for (const extra of request.additionalPaths ?? []) {
      const resolved = resolvePath(extra, this.config.mode, this.config.roots);
      if (await isDirectory(resolved)) additionalPaths.push(resolved);
    }

    return this.admitAndLaunch({ projectPath, content, backend, model: request.model, additionalPaths, spec });
  }

  /**
   * Continues the agent session of an earlier task with new instructions.
   * The follow-up is a task of its own and goes through the same admission.
   */
  async followUp(request: FollowUpRequest): Promise<FollowUpResponse> {
    const content = request.content.trim();
    if (!content) throw new Error("content is required");
    const spec = checkContent(content);

    const previous = await this.ledger.get(request.taskId);
    if (!previous) return { status: "not_found", taskId: request.taskId };

    const backend = resolveBackend(this.backends, previous.agentKind);
    if (!backend) throw new Error(`Unknown agent kind: ${previous.agentKind}`);
    if (!backend.resumeFlag) throw new Error(`${backend.title} cannot resume a session`);
    if (!previous.sessionId) throw new Error(`Task ${previous.taskId} has no recorded session to resume`);

    return this.admitAndLaunch({
      projectPath: previous.projectPath,
      content,
      backend,
      model: previous.model,
      additionalPaths: [],
      spec,
      resume: { taskId: previous.taskId, sessionId: previous.sessionId },
    });
  }

  private async admitAndLaunch(input: LaunchInput): Promise<DispatchResponse> {
    const { projectPath, content, backend, additionalPaths } = input;
    await this.sweep();
    const decision = await this.guard.admit({
      projectPath,
      content,
      agentKind: backend.kind,
      model: input.model,
    });

    if (decision.kind === "blocked") {
      return {
        status: decision.reason,
        taskId: decision.existingTaskId,
        message: blockedMessage(decision, projectPath),
      };
    }

    const { taskId } = decision;
    const promptFile = path.join(this.promptsDir, `${taskId}.txt`);
    let launched: LaunchResult;
    try {
      await ensureDir(this.promptsDir);
      await fs.writeFile(promptFile, buildPrompt(content, { additionalPaths }), "utf8");
      launched = await this.launcher.launch({
        taskId,
        projectPath,
        promptFile,
        agentKind: backend.kind,
        model: input.model,
        additionalPaths,
        resumeSessionId: input.resume?.sessionId,
      });
    } catch (error) {
      const message = `launch failed: ${errorMessage(error)}`;
      await this.reporter.reportFailure(taskId, message);
      await fs.rm(promptFile, { force: true });
      await this.log.append("launch_failed", { taskId, error: message });
      return { status: "launch_failed", taskId, error: message };
    }

    if (launched.pid !== undefined) {
      try {
        await this.ledger.annotate(taskId, { runnerPid: launched.pid });
      } catch (error) {
        // The runner records its own pid once it starts.
        await this.log.append("annotate_failed", { taskId, runnerPid: launched.pid, error: errorMessage(error) });
      }
    }
    await this.log.append("launch", {
      taskId,
      launcher: launched.launcher,
      pid: launched.pid,
      detail: launched.detail,
      ...(input.resume ? { resumedFrom: input.resume.taskId } : {}),
    });

    return {
      status: "launched",
      taskId,
      agentKind: backend.kind,
      agent: backend.title,
      model: input.model ?? backend.defaultModel ?? "default",
      projectPath,
      additionalPaths,
      launcher: launched.launcher,
      detail: launched.detail,
      mode: input.spec ? "spec" : "prose",
      ...(input.spec ? { specName: input.spec.name, specTier: input.spec.tier } : {}),
      ...(input.resume ? { resumedFrom: input.resume.taskId, sessionId: input.resume.sessionId } : {}),
      ...(decision.reclaimedTaskId ? { reclaimedTaskId: decision.reclaimedTaskId } : {}),
    };
  }

  async getTask(taskId: string): Promise<TaskLookup> {
    await this.sweep();
    return (await this.ledger.get(taskId)) ?? { status: "not_found", taskId };
  }

  async listRecent(limit: number): Promise<TaskSummary[]> {
    await this.sweep();
    const records = await this.ledger.listRecent(limit);
    return records.map((record) => ({ taskId: record.taskId, status: record.status, agentKind: record.agentKind }));
  }

  async report(taskId: string, report: ManualReport): Promise<ReportOutcome> {
    if (report.outcome === "completed") {
      return this.reporter.reportSuccess(taskId, report.filesModified ?? [], report.summary);
    }
    return this.reporter.reportFailure(taskId, report.error);
  }

  async status(): Promise<ServiceStatus> {
    await this.sweep();
    return {
      running: await this.ledger.listRunning(),
      policy: this.config.policy,
      launcher: this.launcher.kind,
      storage: this.config.storage,
      agents: Object.keys(this.backends).sort(),
    };
  }

  /** Fails running tasks whose runner process has exited. */
  async sweep(): Promise<string[]> {
    const swept = await sweepAbandoned(this.ledger, this.reporter, this.isAlive);
    if (swept.length > 0) await this.log.append("sweep", { taskIds: swept });
    return swept;
  }
}
