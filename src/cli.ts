import { loadConfig, type Config } from "./config.js";
import { createLedger, type TaskLedger } from "./ledger.js";
import { FileEventLog } from "./log.js";
import { getOrchestratorPrompt } from "./prompts.js";

type ParsedArgs = {
  positional: string[];
  args: Record<string, string | boolean>;
  repeated: Record<string, string[]>;
};

function parseArgs(argv: string[]): ParsedArgs {
  const args: Record<string, string | boolean> = {};
  const repeated: Record<string, string[]> = {};
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token.startsWith("--")) {
      const value = argv[i + 1];
      if (!value || value.startsWith("--")) {
        args[token] = true;
      } else {
        args[token] = value;
        (repeated[token] ??= []).push(value);
        i += 1;
      }
    } else {
      positional.push(token);
    }
  }
  return { positional, args, repeated };
}

function stringArg(args: ParsedArgs["args"], key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" ? value : undefined;
}

function requireArg(args: ParsedArgs["args"], key: string): string {
  const value = stringArg(args, key);
  if (!value) throw new Error(`${key} is required`);
  return value;
}

function printHelp() {
  const text = `conductor-mcp - Dispatch coding tasks to agent CLIs and track them

Usage:
  conductor-mcp server [--mode open|strict] [--roots <paths>] [--storage sqlite|json] [--launcher detached|tmux|macos]
  conductor-mcp run --task-id <id> --project <path> --prompt-file <path> --agent <kind> [--model <name>] [--add-dir <path>]... [--resume <session>]
  conductor-mcp report --task-id <id> --outcome completed|failed [--summary <text>] [--files <a,b>] [--error <text>]
  conductor-mcp tasks [--limit <n>]
  conductor-mcp task <id>
  conductor-mcp sweep
  conductor-mcp dashboard [--host <host>] [--port <port>] [--poll-ms <ms>]
  conductor-mcp prompts

Commands:
  server      Start the MCP server (called by the orchestrating client)
  run         Run one agent for a dispatched task and record its outcome
  report      Record the outcome of a running task by hand
  tasks       List recent tasks
  task        Show one task record as JSON
  sweep       Fail running tasks whose runner process has exited
  dashboard   Start the web dashboard
  prompts     Print the orchestrator guide

Shared options:
  --data-dir <path>  --log-dir <path>  --db-path <path>  --backends <file>
  --stale-after-ms <ms>  --dedup-window-ms <ms>
`;
  process.stdout.write(text);
}

async function openLedger(config: Config, eventLog: FileEventLog): Promise<TaskLedger> {
  const ledger = createLedger(config, eventLog);
  await ledger.init();
  return ledger;
}

async function main() {
  const { positional, args, repeated } = parseArgs(process.argv.slice(2));
  const command = positional[0] ?? "server";

  if (command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return;
  }

  if (command === "prompts") {
    process.stdout.write(`${getOrchestratorPrompt()}\n`);
    return;
  }

  if (command === "server") {
    const { startServer } = await import("./server.js");
    await startServer();
    return;
  }

  if (command === "dashboard") {
    const { startDashboard } = await import("./dashboard.js");
    const port = typeof args["--port"] === "string" ? Number(args["--port"]) : undefined;
    const host = stringArg(args, "--host");
    const pollMs = typeof args["--poll-ms"] === "string" ? Number(args["--poll-ms"]) : undefined;
    await startDashboard({ port, host, pollMs });
    return;
  }

  const config = loadConfig();
  const eventLog = new FileEventLog(config.logDir);

  if (command === "run") {
    const { runTask } = await import("./runner.js");
    const { loadBackends } = await import("./backends.js");
    const taskId = requireArg(args, "--task-id");
    const projectPath = requireArg(args, "--project");
    const promptFile = requireArg(args, "--prompt-file");
    const agentKind = requireArg(args, "--agent");
    const ledger = await openLedger(config, eventLog);
    try {
      const result = await runTask({
        taskId,
        projectPath,
        promptFile,
        agentKind,
        model: stringArg(args, "--model"),
        addDirs: repeated["--add-dir"] ?? [],
        resumeSessionId: stringArg(args, "--resume"),
        ledger,
        backends: await loadBackends(config.backendsPath),
        eventLog,
      });
      process.exitCode = result.success ? 0 : 1;
    } finally {
      await ledger.close();
    }
    return;
  }

  if (command === "report") {
    const { LifecycleReporter } = await import("./reporter.js");
    const taskId = requireArg(args, "--task-id");
    const outcome = requireArg(args, "--outcome");
    const ledger = await openLedger(config, eventLog);
    try {
      const reporter = new LifecycleReporter(ledger, { eventLog });
      let result: string;
      if (outcome === "completed") {
        const files = (stringArg(args, "--files") ?? "")
          .split(",")
          .map((file) => file.trim())
          .filter(Boolean);
        result = await reporter.reportSuccess(taskId, files, requireArg(args, "--summary"));
      } else if (outcome === "failed") {
        result = await reporter.reportFailure(taskId, requireArg(args, "--error"));
      } else {
        throw new Error("--outcome must be completed or failed");
      }
      process.stdout.write(`${taskId}: ${result}\n`);
      if (result === "not_found") process.exitCode = 1;
    } finally {
      await ledger.close();
    }
    return;
  }

  if (command === "tasks") {
    const limit = typeof args["--limit"] === "string" ? Number(args["--limit"]) : 20;
    if (!Number.isInteger(limit) || limit < 1) throw new Error("--limit must be a positive integer");
    const ledger = await openLedger(config, eventLog);
    try {
      const records = await ledger.listRecent(limit);
      if (records.length === 0) {
        process.stdout.write("No tasks recorded.\n");
      }
      for (const record of records) {
        process.stdout.write(
          `${record.taskId}  ${record.status.padEnd(9)}  ${record.agentKind.padEnd(6)}  ${record.createdAt}  ${record.projectPath}\n`
        );
      }
    } finally {
      await ledger.close();
    }
    return;
  }

  if (command === "task") {
    const taskId = positional[1];
    if (!taskId) throw new Error("task id is required");
    const ledger = await openLedger(config, eventLog);
    try {
      const record = await ledger.get(taskId);
      if (!record) throw new Error(`Task not found: ${taskId}`);
      process.stdout.write(`${JSON.stringify(record, null, 2)}\n`);
    } finally {
      await ledger.close();
    }
    return;
  }

  if (command === "sweep") {
    const { LifecycleReporter, isProcessRunning, sweepAbandoned } = await import("./reporter.js");
    const ledger = await openLedger(config, eventLog);
    try {
      const reporter = new LifecycleReporter(ledger, { eventLog });
      const swept = await sweepAbandoned(ledger, reporter, isProcessRunning);
      if (swept.length > 0) await eventLog.append("sweep", { taskIds: swept });
      process.stdout.write(swept.length > 0 ? `Failed ${swept.length} abandoned task(s): ${swept.join(", ")}\n` : "Nothing to sweep.\n");
    } finally {
      await ledger.close();
    }
    return;
  }

  throw new Error(`Unknown command: ${command}`);
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${message}\n`);
  process.exit(1);
});
