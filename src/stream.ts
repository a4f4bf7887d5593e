import { isRecord } from "./utils.js";

export type ToolKind = "read" | "edit" | "shell" | "search" | "list" | "todo" | "other";

export type TodoItem = {
  content: string;
  status: string;
};

export type AgentEvent =
  | { kind: "system"; sessionId?: string; model?: string }
  | { kind: "text"; text: string }
  | {
      kind: "tool_call";
      tool: string;
      toolKind: ToolKind;
      path?: string;
      command?: string;
      pattern?: string;
      todos?: TodoItem[];
    }
  | { kind: "tool_result"; isError: boolean; content: string; command?: string }
  | { kind: "result"; ok?: boolean; text?: string; sessionId?: string }
  | { kind: "error"; message: string }
  | { kind: "raw"; line: string }
  | { kind: "unknown"; type: string };

const TOOL_KINDS: Record<string, ToolKind> = {
  read: "read",
  read_file: "read",
  read_many_files: "read",
  write: "edit",
  edit: "edit",
  multiedit: "edit",
  notebookedit: "edit",
  write_file: "edit",
  edit_file: "edit",
  replace: "edit",
  bash: "shell",
  shell: "shell",
  run_shell_command: "shell",
  glob: "search",
  grep: "search",
  findfiles: "search",
  searchtext: "search",
  search_file_content: "search",
  ls: "list",
  list_directory: "list",
  readfolder: "list",
  todowrite: "todo",
  writetodos: "todo",
  write_todos: "todo",
};

export function toolKindOf(tool: string): ToolKind {
  return TOOL_KINDS[tool.toLowerCase()] ?? "other";
}

function str(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function firstString(data: Record<string, unknown>, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = str(data[key]);
    if (value) return value;
  }
  return undefined;
}

function readTodos(value: unknown): TodoItem[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter(isRecord).map((item) => ({
    content: str(item.content) ?? str(item.description) ?? "",
    status: str(item.status) ?? "pending",
  }));
}

function toolCall(tool: string, input: unknown): AgentEvent {
  const data = isRecord(input) ? input : {};
  const toolKind = toolKindOf(tool);
  return {
    kind: "tool_call",
    tool,
    toolKind,
    path: firstString(data, ["file_path", "path", "absolute_path", "notebook_path", "dir_path"]),
    command: firstString(data, ["command", "cmd"]),
    pattern: firstString(data, ["pattern", "query"]),
    todos: toolKind === "todo" ? readTodos(data.todos) : undefined,
  };
}

/** Tool result payloads arrive as a string or as a list of text blocks. */
function resultText(value: unknown): string {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) {
    return value
      .map((block) => (isRecord(block) ? str(block.text) ?? "" : typeof block === "string" ? block : ""))
      .join("\n");
  }
  if (value === undefined || value === null) return "";
  return JSON.stringify(value);
}

function contentBlocks(data: Record<string, unknown>): Record<string, unknown>[] {
  const message = isRecord(data.message) ? data.message : {};
  return Array.isArray(message.content) ? message.content.filter(isRecord) : [];
}

function decodeStreamEvent(data: Record<string, unknown>): AgentEvent[] {
  const event = isRecord(data.event) ? data.event : {};
  const type = str(event.type);
  if (type === "content_block_delta") {
    const delta = isRecord(event.delta) ? event.delta : {};
    const text = str(delta.text);
    return delta.type === "text_delta" && text ? [{ kind: "text", text }] : [];
  }
  if (type === "message_start") {
    const message = isRecord(event.message) ? event.message : {};
    const model = str(message.model);
    return model ? [{ kind: "system", model }] : [];
  }
  return [];
}

function decodeCodexItem(type: string, item: Record<string, unknown>): AgentEvent[] {
  const itemType = str(item.type) ?? str(item.item_type);
  if (itemType === "command_execution") {
    const command = str(item.command);
    if (type === "item.started") return [toolCall("shell", { command })];
    const exitCode = item.exit_code;
    return [
      {
        kind: "tool_result",
        isError: typeof exitCode === "number" ? exitCode !== 0 : item.status === "failed",
        content: str(item.aggregated_output) ?? "",
        command,
      },
    ];
  }
  if (type !== "item.completed") return [];
  if (itemType === "agent_message") {
    const text = str(item.text);
    return text ? [{ kind: "text", text }] : [];
  }
  if (itemType === "file_change" && Array.isArray(item.changes)) {
    return item.changes.filter(isRecord).map((change) => toolCall("edit", { path: str(change.path) }));
  }
  if (itemType === "error") {
    return [{ kind: "error", message: str(item.message) ?? "unknown error" }];
  }
  return [];
}

function decodeObject(data: Record<string, unknown>): AgentEvent[] {
  const type = str(data.type) ?? "";

  switch (type) {
    case "system":
    case "init":
      return [{ kind: "system", sessionId: str(data.session_id), model: str(data.model) }];
    case "thread.started":
      return [{ kind: "system", sessionId: str(data.thread_id) }];
    case "stream_event":
      return decodeStreamEvent(data);
    case "assistant":
      return contentBlocks(data)
        .filter((block) => block.type === "tool_use")
        .map((block) => toolCall(str(block.name) ?? "?", block.input));
    case "user":
      return contentBlocks(data)
        .filter((block) => block.type === "tool_result")
        .map((block) => ({ kind: "tool_result", isError: block.is_error === true, content: resultText(block.content) }));
    case "tool":
    case "tool_use":
      return [toolCall(str(data.tool) ?? str(data.tool_name) ?? str(data.name) ?? "?", data.parameters ?? data.input ?? data)];
    case "tool_result":
      return [
        {
          kind: "tool_result",
          isError: data.status === "error" || data.is_error === true,
          content: resultText(data.output ?? data.content),
        },
      ];
    case "message": {
      const text = str(data.content);
      return data.role === "assistant" && text ? [{ kind: "text", text }] : [];
    }
    case "result": {
      let ok: boolean | undefined;
      if (typeof data.passed === "boolean") ok = data.passed;
      else if (typeof data.is_error === "boolean") ok = !data.is_error;
      else if (typeof data.status === "string") ok = data.status === "success";
      return [{ kind: "result", ok, text: str(data.result), sessionId: str(data.session_id) }];
    }
    case "turn.completed":
      return [{ kind: "result", ok: true }];
    case "turn.failed": {
      const error = isRecord(data.error) ? data.error : {};
      return [{ kind: "error", message: str(error.message) ?? "turn failed" }];
    }
    case "error": {
      const nested = isRecord(data.error) ? str(data.error.message) : undefined;
      return [{ kind: "error", message: str(data.message) ?? nested ?? str(data.error) ?? "unknown error" }];
    }
    case "item.started":
    case "item.updated":
    case "item.completed":
      return isRecord(data.item) ? decodeCodexItem(type, data.item) : [];
    default:
      return [{ kind: "unknown", type }];
  }
}

/**
 * Decodes one line of agent stdout. Lines that are not JSON objects come
 * back as a single `raw` event; blank lines produce nothing.
 */
export function decodeLine(line: string): AgentEvent[] {
  const trimmed = line.trim();
  if (!trimmed) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return [{ kind: "raw", line: trimmed }];
  }
  if (!isRecord(parsed)) return [{ kind: "raw", line: trimmed }];
  return decodeObject(parsed);
}
