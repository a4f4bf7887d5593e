import fs from "node:fs/promises";
import path from "node:path";

export function expandHome(input: string): string {
  if (!input.startsWith("~")) return input;
  const home = process.env.HOME;
  if (!home) return input;
  return path.join(home, input.slice(1));
}

export function normalizeRoots(roots: string[]): string[] {
  return roots
    .map((root) => expandHome(root))
    .map((root) => path.resolve(root));
}

/**
 * Canonical form of a project path, used as the admission-control scope.
 * Two spellings of the same directory must map to the same key.
 */
export function normalizeProjectPath(input: string): string {
  const resolved = path.resolve(expandHome(input.trim()));
  const root = path.parse(resolved).root;
  if (resolved.length > root.length && resolved.endsWith(path.sep)) {
    return resolved.slice(0, -1);
  }
  return resolved;
}

export function isPathUnderRoot(targetPath: string, root: string): boolean {
  const rel = path.relative(root, targetPath);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

export function resolvePath(inputPath: string, mode: "open" | "strict", roots: string[]): string {
  const resolved = normalizeProjectPath(inputPath);
  if (mode === "open") return resolved;
  for (const root of roots) {
    if (isPathUnderRoot(resolved, root)) return resolved;
  }
  throw new Error(`Path not allowed in strict mode: ${resolved}`);
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(dirPath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function nowIso(): string {
  return new Date().toISOString();
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Keeps the last `max` characters, marking the cut. */
export function tailChars(text: string, max: number): string {
  if (text.length <= max) return text;
  if (max <= 1) return text.slice(text.length - max);
  return `…${text.slice(text.length - max + 1)}`;
}

/** Keeps the first `max` characters, marking the cut. */
export function headChars(text: string, max: number): string {
  if (text.length <= max) return text;
  if (max <= 1) return text.slice(0, max);
  return `${text.slice(0, max - 1)}…`;
}
