import { buildSpecPrompt, isSpecContent, parseSpec } from "./taskspec.js";

export const SYSTEM_PROMPT =
  "Write clean, modular, efficient code. " +
  "Keep each unit to a single responsibility and do not repeat yourself. " +
  "Follow the naming conventions already used in the project. No unnecessary comments.";

export type PromptOptions = {
  additionalPaths?: string[];
  systemPrompt?: string;
};

/**
 * Full prompt handed to the agent: the task, any extra read-only paths, then
 * the fixed instructions. Content that opens with `## Spec:` is expanded into
 * an implementation brief and throws when it does not parse.
 */
export function buildPrompt(content: string, options: PromptOptions = {}): string {
  const sections = [isSpecContent(content) ? buildSpecPrompt(parseSpec(content)) : content.trim()];
  const extra = options.additionalPaths ?? [];
  if (extra.length > 0) {
    sections.push(`Related projects you may read from:\n${extra.map((dir) => `- ${dir}`).join("\n")}`);
  }
  sections.push(options.systemPrompt ?? SYSTEM_PROMPT);
  return sections.join("\n\n");
}

export function getOrchestratorPrompt(): string {
  return `You are the ORCHESTRATOR for this conductor session. You hand coding work to agent CLIs and track it; you do not edit files yourself.

BEFORE DISPATCHING:
1. Gather the requirements from the user until the task is complete and unambiguous
2. Confirm the EXACT absolute project path. Never guess it; ask if unsure
3. Pick the agent: claude, gemini or codex (and a model only if the user asks for one)

DISPATCHING:
- Call dispatch_task({ projectPath, content, agentKind, model?, additionalPaths? })
- For a contract-style task, start content with "## Spec: Name [HOTFIX|FEATURE|SYSTEM]" followed by ### sections
  (Interface, Must Do, Must Not Do, Edge Cases, Validation, Target Path). A malformed spec is rejected before anything runs
- "launched": the agent is running in its own process. Tell the user and note the taskId
- "already_running": another task holds this project. Report its taskId and check it with task_get
- "duplicate": the same request was sent in the last few minutes. Check the existing taskId instead of resending
- "launch_failed": nothing is running; report the error

FOLLOWING UP:
- task_get({ taskId }) returns the record: status, summary, filesModified, error
- task_list_recent({ limit }) lists the latest tasks
- status_get shows running tasks and the admission policy
- task_followup({ taskId, content }) sends more instructions to the same agent session once the task has finished (claude only)
- Only one task runs per project at a time. Do not poll in a tight loop; check back when the user asks

IF A TASK IS STUCK:
- A task whose runner died is failed automatically ("terminated before completion")
- A task running longer than the staleness limit is reclaimed by the next dispatch to its project
- task_report({ taskId, outcome: "failed", error }) closes a task by hand when you know it is dead`;
}
