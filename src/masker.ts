export type CommandClass = "test" | "typecheck" | "lint" | "other";

export type ErrorLocation = {
  file: string;
  line: number;
  message: string;
};

export type MaskedOutput = {
  summary: string;
  errors: ErrorLocation[];
  snippet?: string;
};

export const MAX_SNIPPET_LINES = 20;
export const MAX_MASKED_SIZE = 2000;
const MAX_ERRORS_WHEN_CUT = 10;

const TEST_PATTERNS = [
  /\bpytest\b/,
  /\bpython3? -m unittest\b/,
  /\b(jest|vitest|mocha|ava)\b/,
  /\b(npm|pnpm|yarn|bun)( run)? test\b/,
  /\bgo test\b/,
  /\bcargo test\b/,
];
const TYPECHECK_PATTERNS = [/\bmypy\b/, /\btsc\b/, /\bpyright\b/, /\bvue-tsc\b/];
const LINT_PATTERNS = [/\bruff\b/, /\bflake8\b/, /\beslint\b/, /\bpylint\b/, /\bbiome\b/, /lint/];

/** Coarse class of a shell command, by pattern. Anything unrecognized is `other`. */
export function classifyCommand(command: string | undefined): CommandClass {
  if (!command) return "other";
  const text = command.toLowerCase();
  if (TEST_PATTERNS.some((pattern) => pattern.test(text))) return "test";
  if (TYPECHECK_PATTERNS.some((pattern) => pattern.test(text))) return "typecheck";
  if (LINT_PATTERNS.some((pattern) => pattern.test(text))) return "lint";
  return "other";
}

function lastLines(text: string, count: number): string {
  return text.trim().split("\n").slice(-count).join("\n");
}

function countOf(raw: string, pattern: RegExp): number {
  const match = pattern.exec(raw);
  return match ? Number(match[1]) : 0;
}

function maskTest(raw: string): MaskedOutput {
  const passed = countOf(raw, /(\d+)\s+passed/);
  const failed = countOf(raw, /(\d+)\s+failed/);
  const errored = countOf(raw, /(\d+)\s+errors?\b/);

  if (failed + errored === 0) {
    if (passed > 0) return { summary: `✓ ${passed} passed`, errors: [] };
    return { summary: "? Unknown test output", errors: [], snippet: lastLines(raw, MAX_SNIPPET_LINES) };
  }

  const errors: ErrorLocation[] = [];
  for (const match of raw.matchAll(/FAILED\s+([^:\s]+)::(\S+?)\s*-\s*(.+)/g)) {
    const file = match[1];
    const lineMatch = new RegExp(`${escapeRegExp(file)}:(\\d+):`).exec(raw);
    errors.push({ file, line: lineMatch ? Number(lineMatch[1]) : 0, message: match[3].trim() });
  }
  if (errors.length === 0) {
    for (const match of raw.matchAll(/^\s*FAIL\s+(\S+)(?:\s+>\s+(.+))?$/gm)) {
      errors.push({ file: match[1], line: 0, message: (match[2] ?? "failed").trim() });
    }
  }

  const parts: string[] = [];
  if (failed) parts.push(`${failed} failed`);
  if (errored) parts.push(`${errored} error`);
  if (passed) parts.push(`${passed} passed`);
  return { summary: `✗ ${parts.join(", ")}`, errors, snippet: lastLines(raw, MAX_SNIPPET_LINES) };
}

function maskTypecheck(raw: string): MaskedOutput {
  const errors: ErrorLocation[] = [];
  for (const match of raw.matchAll(/^([^\s:]+):(\d+):(?:\d+:)?\s*error:\s*(.+?)(?:\s+\[[\w-]+\])?$/gm)) {
    errors.push({ file: match[1], line: Number(match[2]), message: match[3].trim() });
  }
  for (const match of raw.matchAll(/^([^\s(]+)\((\d+),\d+\):\s*error\s+(TS\d+:\s*.+)$/gm)) {
    errors.push({ file: match[1], line: Number(match[2]), message: match[3].trim() });
  }

  const found = /Found\s+(\d+)\s+errors?/.exec(raw);
  const count = found ? Number(found[1]) : errors.length;
  if (count > 0) {
    return { summary: `✗ typecheck: ${count} errors`, errors, snippet: lastLines(raw, MAX_SNIPPET_LINES) };
  }
  if (found || /\bSuccess\b/.test(raw)) {
    return { summary: "✓ typecheck: clean", errors: [] };
  }
  return { summary: "? Unknown typecheck output", errors: [], snippet: lastLines(raw, MAX_SNIPPET_LINES) };
}

function maskLint(raw: string): MaskedOutput {
  const errors: ErrorLocation[] = [];
  for (const match of raw.matchAll(/^([^\s:]+):(\d+):\d+:\s*([A-Z]+\d+\s+.+?)$/gm)) {
    errors.push({ file: match[1], line: Number(match[2]), message: match[3].trim() });
  }
  if (errors.length > 0) {
    return { summary: `✗ lint: ${errors.length} errors`, errors, snippet: lastLines(raw, MAX_SNIPPET_LINES) };
  }
  return { summary: "✓ lint: clean", errors: [] };
}

function maskOther(raw: string): MaskedOutput {
  return { summary: "? Unknown output", errors: [], snippet: lastLines(raw, MAX_SNIPPET_LINES) };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function errorsSize(errors: ErrorLocation[]): number {
  return errors.reduce((total, error) => total + error.file.length + String(error.line).length + error.message.length, 0);
}

export function maskedSize(output: MaskedOutput): number {
  return output.summary.length + errorsSize(output.errors) + (output.snippet?.length ?? 0);
}

function enforceLimit(output: MaskedOutput): MaskedOutput {
  if (maskedSize(output) <= MAX_MASKED_SIZE) return output;

  const room = MAX_MASKED_SIZE - output.summary.length - errorsSize(output.errors);
  if (room > 0 && output.snippet) {
    return { ...output, snippet: output.snippet.slice(-room) };
  }

  const errors = output.errors.slice(0, MAX_ERRORS_WHEN_CUT);
  while (errors.length > 0 && output.summary.length + errorsSize(errors) > MAX_MASKED_SIZE) {
    errors.pop();
  }
  return { summary: output.summary, errors };
}

/**
 * Compacts the output of one command into a fixed-shape record no larger
 * than MAX_MASKED_SIZE characters. Only `raw` is consulted.
 */
export function maskOutput(raw: string, type: CommandClass): MaskedOutput {
  if (!raw.trim()) return { summary: "No output", errors: [] };
  try {
    switch (type) {
      case "test":
        return enforceLimit(maskTest(raw));
      case "typecheck":
        return enforceLimit(maskTypecheck(raw));
      case "lint":
        return enforceLimit(maskLint(raw));
      default:
        return enforceLimit(maskOther(raw));
    }
  } catch {
    return enforceLimit({ summary: "? Parse error", errors: [], snippet: lastLines(raw, MAX_SNIPPET_LINES) });
  }
}
