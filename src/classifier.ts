import path from "node:path";
import { classifyCommand, maskOutput, type CommandClass } from "./masker.js";
import { decodeLine, type AgentEvent, type ToolKind } from "./stream.js";
import { renderChunk, type ClassifiedEvent, type CommandResult } from "./format.js";
import { headChars, tailChars } from "./utils.js";

export const TRANSCRIPT_LIMIT = 4000;
export const RESULT_HISTORY = 10;
export const SUMMARY_LIMIT = 500;

export type RunSummary = {
  durationMs: number;
  toolCalls: Record<ToolKind, number>;
  totalToolCalls: number;
  errors: number;
  unparsableLines: number;
  filesRead: string[];
  filesModified: string[];
  sessionId?: string;
  lastCommand?: string;
  lastCommandClass?: CommandClass;
  commandResults: CommandResult[];
  finalOk?: boolean;
};

export type ClassifierOptions = {
  startedAt?: Date;
  transcriptLimit?: number;
  resultHistory?: number;
};

function emptyCounts(): Record<ToolKind, number> {
  return { read: 0, edit: 0, shell: 0, search: 0, list: 0, todo: 0, other: 0 };
}

/**
 * Folds decoded agent events into counters and a bounded transcript.
 * Everything it knows comes from the lines fed to it, so replaying the
 * same lines rebuilds the same state.
 */
export class OutputClassifier {
  private readonly startedAt: Date;
  private readonly transcriptLimit: number;
  private readonly resultHistory: number;
  private readonly counts = emptyCounts();
  private readonly filesRead: string[] = [];
  private readonly filesModified: string[] = [];
  private readonly results: CommandResult[] = [];
  private errors = 0;
  private unparsable = 0;
  private session?: string;
  private pendingCommand?: string;
  private lastCommand?: string;
  private finalOk?: boolean;
  private text = "";

  constructor(options: ClassifierOptions = {}) {
    this.startedAt = options.startedAt ?? new Date();
    this.transcriptLimit = options.transcriptLimit ?? TRANSCRIPT_LIMIT;
    this.resultHistory = options.resultHistory ?? RESULT_HISTORY;
  }

  static replay(lines: Iterable<string>, options: ClassifierOptions = {}): OutputClassifier {
    const classifier = new OutputClassifier(options);
    for (const line of lines) classifier.feed(line);
    return classifier;
  }

  get sessionId(): string | undefined {
    return this.session;
  }

  get transcript(): string {
    return this.text;
  }

  get modifiedFiles(): string[] {
    return [...this.filesModified];
  }

  feed(line: string): ClassifiedEvent[] {
    return decodeLine(line).map((event) => this.consume(event));
  }

  consume(event: AgentEvent): ClassifiedEvent {
    const entry: ClassifiedEvent = { event };
    switch (event.kind) {
      case "system":
        if (event.sessionId) this.session = event.sessionId;
        break;
      case "tool_call":
        this.counts[event.toolKind] += 1;
        if (event.toolKind === "read" && event.path) addDistinct(this.filesRead, event.path);
        if (event.toolKind === "edit" && event.path) addDistinct(this.filesModified, event.path);
        if (event.toolKind === "shell" && event.command) {
          this.pendingCommand = event.command;
          this.lastCommand = event.command;
        }
        break;
      case "tool_result": {
        const command = event.command ?? this.pendingCommand;
        this.pendingCommand = undefined;
        if (command) {
          this.lastCommand = command;
          entry.command = this.recordCommand(command, event.content, event.isError);
          if (!entry.command.ok) this.errors += 1;
        } else if (event.isError) {
          this.errors += 1;
        }
        break;
      }
      case "result":
        if (event.sessionId) this.session = event.sessionId;
        if (event.ok !== undefined) this.finalOk = event.ok;
        break;
      case "error":
        this.errors += 1;
        break;
      case "raw":
        this.unparsable += 1;
        break;
      default:
        break;
    }
    this.appendTranscript(entry);
    return entry;
  }

  summarize(now: Date = new Date()): RunSummary {
    const totalToolCalls = Object.values(this.counts).reduce((sum, count) => sum + count, 0);
    return {
      durationMs: Math.max(0, now.getTime() - this.startedAt.getTime()),
      toolCalls: { ...this.counts },
      totalToolCalls,
      errors: this.errors,
      unparsableLines: this.unparsable,
      filesRead: [...this.filesRead],
      filesModified: [...this.filesModified],
      sessionId: this.session,
      lastCommand: this.lastCommand,
      lastCommandClass: this.lastCommand ? classifyCommand(this.lastCommand) : undefined,
      commandResults: [...this.results],
      finalOk: this.finalOk,
    };
  }

  private recordCommand(command: string, content: string, isError: boolean): CommandResult {
    const commandClass = classifyCommand(command);
    const masked = maskOutput(content, commandClass);
    const result: CommandResult = {
      command,
      commandClass,
      ok: !isError && masked.errors.length === 0,
      masked,
    };
    this.results.push(result);
    if (this.results.length > this.resultHistory) this.results.shift();
    return result;
  }

  private appendTranscript(entry: ClassifiedEvent): void {
    const atLineStart = this.text === "" || this.text.endsWith("\n");
    const chunk = renderChunk(entry, atLineStart);
    if (chunk === undefined) return;
    this.text = tailChars(this.text + chunk, this.transcriptLimit);
  }
}

function addDistinct(list: string[], value: string): void {
  if (!list.includes(value)) list.push(value);
}

function fileList(files: string[]): string {
  const names = files.slice(0, 5).map((file) => path.basename(file));
  const more = files.length > 5 ? `, +${files.length - 5} more` : "";
  return `${names.join(", ")}${more}`;
}

/** One-line completion summary, never longer than SUMMARY_LIMIT characters. */
export function renderSummary(summary: RunSummary): string {
  const parts = [
    `Duration: ${Math.round(summary.durationMs / 1000)}s`,
    `Files read: ${summary.filesRead.length}`,
    `Files modified: ${summary.filesModified.length}` +
      (summary.filesModified.length > 0 ? ` (${fileList(summary.filesModified)})` : ""),
    `Tool calls: ${summary.totalToolCalls}`,
    `Errors: ${summary.errors}`,
  ];
  const last = summary.commandResults[summary.commandResults.length - 1];
  if (last) parts.push(`Last check: ${last.masked.summary}`);
  if (summary.unparsableLines > 0) parts.push(`Unparsed lines: ${summary.unparsableLines}`);
  return headChars(parts.join(", "), SUMMARY_LIMIT);
}
