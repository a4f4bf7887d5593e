import type { EventEmitter } from "node:events";
import { isTransientLedgerError } from "./errors.js";
import type { TaskLedger, TransitionResult } from "./ledger.js";
import { nullEventLog, type EventLog } from "./log.js";
import { SUMMARY_LIMIT, TRANSCRIPT_LIMIT } from "./classifier.js";
import { errorMessage, headChars, sleep, tailChars } from "./utils.js";

export type ReportOutcome = "recorded" | "already_terminal" | "not_found";

export const ABNORMAL_TERMINATION_ERROR = "terminated before completion";

export type ReporterOptions = {
  attempts?: number;
  backoffMs?: number;
  eventLog?: EventLog;
  sleep?: (ms: number) => Promise<void>;
};

function outcomeOf(result: TransitionResult): ReportOutcome {
  return result.ok ? "recorded" : result.reason;
}

/**
 * Terminal-state channel from the execution process back to the ledger.
 * A report against a task that already finished is a no-op.
 */
export class LifecycleReporter {
  private attempts: number;
  private backoffMs: number;
  private log: EventLog;
  private wait: (ms: number) => Promise<void>;

  constructor(private ledger: TaskLedger, options: ReporterOptions = {}) {
    this.attempts = Math.max(1, options.attempts ?? 5);
    this.backoffMs = options.backoffMs ?? 200;
    this.log = options.eventLog ?? nullEventLog;
    this.wait = options.sleep ?? sleep;
  }

  async reportSuccess(taskId: string, filesModified: string[], summary: string, cliOutput?: string): Promise<ReportOutcome> {
    const boundedSummary = headChars(summary, SUMMARY_LIMIT);
    const boundedOutput = cliOutput === undefined ? undefined : tailChars(cliOutput, TRANSCRIPT_LIMIT);
    const outcome = outcomeOf(
      await this.withRetry("report_success", taskId, () =>
        this.ledger.complete(taskId, filesModified, boundedSummary, boundedOutput)
      )
    );
    await this.log.append("report", { taskId, kind: "success", outcome });
    return outcome;
  }

  async reportFailure(taskId: string, error: string): Promise<ReportOutcome> {
    const outcome = outcomeOf(await this.withRetry("report_failure", taskId, () => this.ledger.fail(taskId, error)));
    await this.log.append("report", { taskId, kind: "failure", error, outcome });
    return outcome;
  }

  async reportAbnormalTermination(taskId: string): Promise<ReportOutcome> {
    return this.reportFailure(taskId, ABNORMAL_TERMINATION_ERROR);
  }

  private async withRetry<T>(action: string, taskId: string, fn: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (!isTransientLedgerError(error) || attempt >= this.attempts) throw error;
        await this.log.append("report_retry", { taskId, action, attempt, error: errorMessage(error) });
        await this.wait(this.backoffMs * attempt);
      }
    }
  }
}

const SIGNAL_EXIT_CODES: Partial<Record<NodeJS.Signals, number>> = {
  SIGHUP: 129,
  SIGINT: 130,
  SIGTERM: 143,
};

export type TerminationGuardOptions = {
  signals?: NodeJS.Signals[];
  target?: EventEmitter;
  exit?: (code: number) => void;
};

/**
 * Reports abnormal termination once if the execution process is killed or
 * crashes before it reported a terminal state itself. Nothing runs if the
 * process is killed with SIGKILL; the abandonment sweep covers that case.
 */
export class TerminationGuard {
  private settled = false;
  private abortedWith?: number;
  private abortHook?: () => void;
  private readonly signals: NodeJS.Signals[];
  private readonly target: EventEmitter;
  private readonly exit: (code: number) => void;
  private readonly listeners: Array<[string, (...args: unknown[]) => void]> = [];

  constructor(
    private reporter: LifecycleReporter,
    private taskId: string,
    options: TerminationGuardOptions = {}
  ) {
    this.signals = options.signals ?? ["SIGINT", "SIGTERM", "SIGHUP"];
    this.target = options.target ?? process;
    this.exit = options.exit ?? ((code) => process.exit(code));
  }

  get reported(): boolean {
    return this.settled;
  }

  /** Exit code of the signal or crash that took the process down, if one did. */
  get aborted(): number | undefined {
    return this.abortedWith;
  }

  /** Runs before the termination report, at most once. Used to stop the agent. */
  onAbort(hook: (() => void) | undefined): void {
    this.abortHook = hook;
  }

  install(): this {
    for (const signal of this.signals) {
      this.listen(signal, () => this.abort(SIGNAL_EXIT_CODES[signal] ?? 1));
    }
    this.listen("uncaughtException", (error) => {
      process.stderr.write(`Uncaught error in task ${this.taskId}: ${errorMessage(error)}\n`);
      this.abort(1);
    });
    return this;
  }

  dispose(): void {
    for (const [event, listener] of this.listeners) this.target.off(event, listener);
    this.listeners.length = 0;
  }

  /** Called once the runner has made its own terminal report. */
  markReported(): void {
    this.settled = true;
  }

  async fire(): Promise<ReportOutcome | undefined> {
    if (this.settled) return undefined;
    this.settled = true;
    return this.reporter.reportAbnormalTermination(this.taskId);
  }

  private listen(event: string, listener: (...args: unknown[]) => void): void {
    this.target.on(event, listener);
    this.listeners.push([event, listener]);
  }

  private abort(code: number): void {
    this.abortedWith ??= code;
    const hook = this.abortHook;
    this.abortHook = undefined;
    if (hook) {
      try {
        hook();
      } catch (error) {
        process.stderr.write(`Failed to stop the agent of ${this.taskId}: ${errorMessage(error)}\n`);
      }
    }
    this.fire().then(
      () => this.exit(code),
      (error: unknown) => {
        process.stderr.write(`Failed to report termination of ${this.taskId}: ${errorMessage(error)}\n`);
        this.exit(code);
      }
    );
  }
}

export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return (error as NodeJS.ErrnoException).code === "EPERM";
  }
}

/**
 * Fails every running task whose execution process is gone. Tasks that
 * never recorded a pid are left to staleness reclamation.
 */
export async function sweepAbandoned(
  ledger: TaskLedger,
  reporter: LifecycleReporter,
  isAlive: (pid: number) => boolean = isProcessRunning
): Promise<string[]> {
  const swept: string[] = [];
  for (const record of await ledger.listRunning()) {
    if (record.runnerPid === undefined || isAlive(record.runnerPid)) continue;
    const outcome = await reporter.reportAbnormalTermination(record.taskId);
    if (outcome === "recorded") swept.push(record.taskId);
  }
  return swept;
}
