import fs from "node:fs/promises";
import { isRecord } from "./utils.js";

export type AgentBackend = {
  kind: string;
  title: string;
  /** Base shell command; flags are appended to it. */
  command: string;
  usesStdin: boolean;
  defaultModel?: string;
  modelFlag?: string;
  addDirFlag?: string;
  /** `repeat`: one flag per directory; `comma`: one flag with a comma-separated list. */
  addDirStyle?: "repeat" | "comma";
  resumeFlag?: string;
};

export type BackendTable = Record<string, AgentBackend>;

export const DEFAULT_BACKENDS: BackendTable = {
  claude: {
    kind: "claude",
    title: "Claude Code",
    command:
      "claude -p --permission-mode bypassPermissions --output-format stream-json --include-partial-messages --verbose --max-turns 50",
    usesStdin: true,
    defaultModel: "sonnet",
    modelFlag: "--model",
    addDirFlag: "--add-dir",
    addDirStyle: "repeat",
    resumeFlag: "--resume",
  },
  gemini: {
    kind: "gemini",
    title: "Gemini CLI",
    command: "gemini --output-format stream-json --approval-mode yolo",
    usesStdin: true,
    defaultModel: "gemini-2.5-pro",
    modelFlag: "-m",
    addDirFlag: "--include-directories",
    addDirStyle: "comma",
  },
  codex: {
    kind: "codex",
    title: "OpenAI Codex",
    command: "codex exec --json --full-auto",
    usesStdin: false,
    defaultModel: "gpt-5-codex",
    modelFlag: "--model",
  },
};

const KIND_ALIASES: Record<string, string> = {
  "claude-code": "claude",
  "claude-cli": "claude",
  "gemini-cli": "gemini",
  "codex-cli": "codex",
};

export function resolveBackend(backends: BackendTable, requested: string): AgentBackend | undefined {
  const key = requested.trim().toLowerCase();
  if (!key) return undefined;
  return backends[key] ?? backends[KIND_ALIASES[key] ?? ""];
}

function readBackend(kind: string, value: unknown, base?: AgentBackend): AgentBackend {
  if (!isRecord(value)) throw new Error(`Backend "${kind}" must be an object`);
  const text = (key: string): string | undefined => {
    const field = value[key];
    if (field === undefined) return undefined;
    if (typeof field !== "string") throw new Error(`Backend "${kind}": ${key} must be a string`);
    return field;
  };
  const command = text("command") ?? base?.command;
  if (!command) throw new Error(`Backend "${kind}": command is required`);
  const usesStdin = value.usesStdin ?? base?.usesStdin ?? true;
  if (typeof usesStdin !== "boolean") throw new Error(`Backend "${kind}": usesStdin must be a boolean`);
  const addDirStyle = text("addDirStyle") ?? base?.addDirStyle;
  if (addDirStyle !== undefined && addDirStyle !== "repeat" && addDirStyle !== "comma") {
    throw new Error(`Backend "${kind}": addDirStyle must be "repeat" or "comma"`);
  }
  return {
    kind,
    title: text("title") ?? base?.title ?? kind,
    command,
    usesStdin,
    defaultModel: text("defaultModel") ?? base?.defaultModel,
    modelFlag: text("modelFlag") ?? base?.modelFlag,
    addDirFlag: text("addDirFlag") ?? base?.addDirFlag,
    addDirStyle,
    resumeFlag: text("resumeFlag") ?? base?.resumeFlag,
  };
}

/** Parses a backend table; entries override or extend the defaults field by field. */
export function parseBackends(raw: unknown, defaults: BackendTable = DEFAULT_BACKENDS): BackendTable {
  if (!isRecord(raw)) throw new Error("Backends file must contain a JSON object keyed by agent kind");
  const table: BackendTable = { ...defaults };
  for (const [kind, value] of Object.entries(raw)) {
    const key = kind.toLowerCase();
    table[key] = readBackend(key, value, defaults[key]);
  }
  return table;
}

export async function loadBackends(filePath?: string): Promise<BackendTable> {
  if (!filePath) return { ...DEFAULT_BACKENDS };
  const raw = await fs.readFile(filePath, "utf8");
  return parseBackends(JSON.parse(raw));
}

export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_./:=@%+-]+$/.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export type AgentInvocation = {
  prompt: string;
  model?: string;
  addDirs?: string[];
  resumeSessionId?: string;
};

export type AgentCommand = {
  command: string;
  stdin?: string;
  model?: string;
};

export function buildAgentCommand(backend: AgentBackend, invocation: AgentInvocation): AgentCommand {
  const parts = [backend.command];
  const model = invocation.model ?? backend.defaultModel;

  if (invocation.resumeSessionId && backend.resumeFlag) {
    parts.push(backend.resumeFlag, shellQuote(invocation.resumeSessionId));
  }
  if (model && backend.modelFlag) {
    parts.push(backend.modelFlag, shellQuote(model));
  }
  const addDirs = invocation.addDirs ?? [];
  if (addDirs.length > 0 && backend.addDirFlag) {
    if (backend.addDirStyle === "comma") {
      parts.push(backend.addDirFlag, shellQuote(addDirs.join(",")));
    } else {
      for (const dir of addDirs) parts.push(backend.addDirFlag, shellQuote(dir));
    }
  }

  if (backend.usesStdin) {
    return { command: parts.join(" "), stdin: invocation.prompt, model };
  }
  parts.push(shellQuote(invocation.prompt));
  return { command: parts.join(" "), model };
}
