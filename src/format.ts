import type { MaskedOutput, CommandClass } from "./masker.js";
import type { AgentEvent, ToolKind } from "./stream.js";
import { headChars } from "./utils.js";

export type CommandResult = {
  command: string;
  commandClass: CommandClass;
  ok: boolean;
  masked: MaskedOutput;
};

/** An event as seen by the classifier, with the masked result when it closed a shell command. */
export type ClassifiedEvent = {
  event: AgentEvent;
  command?: CommandResult;
};

const DETAIL_WIDTH = 120;

const LABELS: Record<ToolKind, string> = {
  read: "READ",
  edit: "EDIT",
  shell: "BASH",
  search: "SEARCH",
  list: "LIST",
  todo: "TODO",
  other: "TOOL",
};

function firstLine(text: string): string {
  return text.trim().split("\n")[0] ?? "";
}

function toolDetail(event: Extract<AgentEvent, { kind: "tool_call" }>): string {
  switch (event.toolKind) {
    case "shell":
      return event.command ?? "";
    case "search":
      return event.pattern ?? event.path ?? "";
    case "todo": {
      const todos = event.todos ?? [];
      const done = todos.filter((todo) => todo.status === "completed").length;
      return `${done}/${todos.length} done`;
    }
    case "other":
      return event.path ?? event.tool;
    default:
      return event.path ?? "";
  }
}

/** Plain-text rendering of one event, or undefined when it has nothing to show. */
export function formatEvent(entry: ClassifiedEvent): string | undefined {
  const { event } = entry;
  switch (event.kind) {
    case "system":
      if (event.sessionId) return `── session ${event.sessionId}${event.model ? ` (${event.model})` : ""}`;
      return event.model ? `── model ${event.model}` : undefined;
    case "text":
      return event.text;
    case "tool_call":
      return `[${LABELS[event.toolKind]}] ${headChars(toolDetail(event), DETAIL_WIDTH)}`.trimEnd();
    case "tool_result":
      if (entry.command) {
        return `  ${entry.command.ok ? "✓" : "✗"} ${entry.command.masked.summary}`;
      }
      return event.isError ? `  ✗ ${headChars(firstLine(event.content), DETAIL_WIDTH)}` : undefined;
    case "result":
      return event.ok === false ? "── finished with errors" : "── finished";
    case "error":
      return `✗ error: ${event.message}`;
    case "raw":
      return event.line;
    case "unknown":
      return undefined;
  }
}

/**
 * The chunk to append to a running text stream. Agent text is written as
 * it arrives; everything else goes on a line of its own.
 */
export function renderChunk(entry: ClassifiedEvent, atLineStart: boolean): string | undefined {
  const text = formatEvent(entry);
  if (text === undefined) return undefined;
  if (entry.event.kind === "text") return text;
  return `${atLineStart ? "" : "\n"}${text}\n`;
}
