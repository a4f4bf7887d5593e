import crypto from "node:crypto";
import { DEFAULT_POLICY, type DispatchPolicy } from "./config.js";
import { newRunningRecord, windowStart, type TaskLedger, type TaskRecord } from "./ledger.js";
import { nullEventLog, type EventLog } from "./log.js";

export const STALE_TASK_ERROR = "stale: exceeded maximum task duration";

export type BlockReason = "already_running" | "duplicate";

export type AdmitDecision =
  | { kind: "admitted"; taskId: string; record: TaskRecord; reclaimedTaskId?: string }
  | { kind: "blocked"; reason: BlockReason; existingTaskId: string; reclaimedTaskId?: string };

export type AdmitRequest = {
  projectPath: string;
  content: string;
  agentKind: string;
  model?: string;
};

export type FingerprintFn = (content: string) => string;

export type GuardOptions = {
  policy?: Partial<DispatchPolicy>;
  fingerprint?: FingerprintFn;
  now?: () => Date;
  newId?: () => string;
  eventLog?: EventLog;
};

/** sha256 of the content with runs of whitespace collapsed. */
export function fingerprintContent(content: string): string {
  const normalized = content.trim().replace(/\s+/g, " ");
  return crypto.createHash("sha256").update(normalized).digest("hex");
}

/**
 * Admission control in front of the ledger: one running task per project,
 * no identical request inside the dedup window. Steps 2-4 of every
 * admission run inside a single exclusive ledger section.
 */
export class DispatchGuard {
  private policy: DispatchPolicy;
  private fingerprint: FingerprintFn;
  private now: () => Date;
  private newId: () => string;
  private log: EventLog;

  constructor(private ledger: TaskLedger, options: GuardOptions = {}) {
    this.policy = { ...DEFAULT_POLICY, ...options.policy };
    this.fingerprint = options.fingerprint ?? fingerprintContent;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? (() => crypto.randomUUID());
    this.log = options.eventLog ?? nullEventLog;
  }

  async admit(request: AdmitRequest): Promise<AdmitDecision> {
    const fingerprint = this.fingerprint(request.content);
    const now = this.now();
    const nowMs = now.getTime();
    const taskId = this.newId();

    const decision = await this.ledger.exclusive((view): AdmitDecision => {
      let reclaimedTaskId: string | undefined;

      const running = view.findRunning(request.projectPath);
      if (running) {
        const age = nowMs - Date.parse(running.createdAt);
        if (age <= this.policy.staleAfterMs) {
          return { kind: "blocked", reason: "already_running", existingTaskId: running.taskId };
        }
        view.markFailed(running.taskId, STALE_TASK_ERROR, now.toISOString());
        reclaimedTaskId = running.taskId;
      }

      const duplicate = view.findRecentByFingerprint(fingerprint, windowStart(this.policy.dedupWindowMs, now));
      if (duplicate && duplicate.taskId !== reclaimedTaskId) {
        return { kind: "blocked", reason: "duplicate", existingTaskId: duplicate.taskId, reclaimedTaskId };
      }

      const record = newRunningRecord({
        taskId,
        projectPath: request.projectPath,
        agentKind: request.agentKind,
        model: request.model,
        contentFingerprint: fingerprint,
        createdAt: now.toISOString(),
      });
      view.insert(record);
      return { kind: "admitted", taskId, record, reclaimedTaskId };
    });

    await this.log.append("admission", {
      projectPath: request.projectPath,
      agentKind: request.agentKind,
      decision: decision.kind,
      taskId: decision.kind === "admitted" ? decision.taskId : decision.existingTaskId,
      ...(decision.kind === "blocked" ? { reason: decision.reason } : {}),
      ...(decision.reclaimedTaskId ? { reclaimedTaskId: decision.reclaimedTaskId } : {}),
    });
    return decision;
  }
}
