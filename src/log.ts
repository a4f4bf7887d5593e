import fs from "node:fs/promises";
import path from "node:path";
import { ensureDir, errorMessage, nowIso } from "./utils.js";

export interface EventLog {
  append(event: string, payload?: Record<string, unknown>): Promise<void>;
}

function debugEnabled(): boolean {
  return Boolean(process.env.CONDUCTOR_DEBUG);
}

export function debug(message: string): void {
  if (debugEnabled()) process.stderr.write(`[conductor] ${message}\n`);
}

/**
 * JSON-lines event log. A failed write is reported on stderr and never
 * propagates to the operation being logged.
 */
export class FileEventLog implements EventLog {
  private readonly logPath: string;
  private ready?: Promise<void>;

  constructor(private readonly logDir: string) {
    this.logPath = path.join(logDir, "events.jsonl");
  }

  async append(event: string, payload: Record<string, unknown> = {}): Promise<void> {
    const line = JSON.stringify({ ts: nowIso(), event, ...payload });
    try {
      this.ready ??= ensureDir(this.logDir);
      await this.ready;
      await fs.appendFile(this.logPath, `${line}\n`, "utf8");
    } catch (error) {
      this.ready = undefined;
      process.stderr.write(`event log write failed (${event}): ${errorMessage(error)}\n`);
    }
    debug(line);
  }
}

export const nullEventLog: EventLog = {
  async append() {
    return undefined;
  },
};
