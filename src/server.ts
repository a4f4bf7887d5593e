import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { loadBackends } from "./backends.js";
import { loadConfig, type Config } from "./config.js";
import { DispatchService, type ManualReport } from "./dispatch.js";
import { createLauncher } from "./launchers.js";
import { createLedger } from "./ledger.js";
import { FileEventLog } from "./log.js";
import { getOrchestratorPrompt } from "./prompts.js";
import { errorMessage, isRecord } from "./utils.js";

export type ConductorServerDeps = {
  config: Config;
  service: DispatchService;
};

function getString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function getNumber(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

function getStringArray(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const strings = value.filter((item): item is string => typeof item === "string");
  return strings.length === value.length ? strings : undefined;
}

function jsonResponse(data: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify(data, null, 2),
      },
    ],
  };
}

function errorResponse(message: string) {
  return {
    content: [
      {
        type: "text" as const,
        text: message,
      },
    ],
    isError: true,
  };
}

const tools = [
  {
    name: "dispatch_task",
    description:
      "Hand a coding task to an agent CLI (claude, gemini or codex) running in its own process. Returns immediately. " +
      "Only one task runs per project; an identical request sent within the dedup window is refused.",
    inputSchema: {
      type: "object",
      properties: {
        projectPath: { type: "string", description: "Absolute path of the project the agent works in" },
        content: {
          type: "string",
          description: "The task, with full requirements. Start with '## Spec: Name [TIER]' to send a structured spec",
        },
        agentKind: { type: "string", description: "claude, gemini or codex (aliases such as claude-code are accepted)" },
        model: { type: "string", description: "Model override; the agent's default when omitted" },
        additionalPaths: {
          type: "array",
          items: { type: "string" },
          description: "Related project directories the agent may read; missing ones are skipped",
        },
      },
      required: ["projectPath", "content", "agentKind"],
      additionalProperties: false,
    },
  },
  {
    name: "task_followup",
    description:
      "Send further instructions to the agent session of a finished task. Starts a new task on the same project " +
      "that resumes the earlier session; only agents that can resume (claude) support it.",
    inputSchema: {
      type: "object",
      properties: {
        taskId: { type: "string", description: "The task whose session to continue" },
        content: { type: "string", description: "The follow-up instructions" },
      },
      required: ["taskId", "content"],
      additionalProperties: false,
    },
  },
  {
    name: "task_get",
    description: "Get a task record: status, summary, filesModified, error and the tail of the agent output",
    inputSchema: {
      type: "object",
      properties: {
        taskId: { type: "string" },
      },
      required: ["taskId"],
      additionalProperties: false,
    },
  },
  {
    name: "task_list_recent",
    description: "List the most recent tasks, newest first",
    inputSchema: {
      type: "object",
      properties: {
        limit: { type: "number", description: "Default: 10" },
      },
      additionalProperties: false,
    },
  },
  {
    name: "task_report",
    description:
      "Record the outcome of a running task by hand. Use it to close a task whose agent you know has finished or died. " +
      "Reports against a finished task are ignored.",
    inputSchema: {
      type: "object",
      properties: {
        taskId: { type: "string" },
        outcome: { type: "string", enum: ["completed", "failed"] },
        summary: { type: "string", description: "Required when outcome is completed" },
        filesModified: { type: "array", items: { type: "string" } },
        error: { type: "string", description: "Required when outcome is failed" },
      },
      required: ["taskId", "outcome"],
      additionalProperties: false,
    },
  },
  {
    name: "status_get",
    description: "Get coordinator config, running tasks and the admission policy",
    inputSchema: {
      type: "object",
      properties: {},
      additionalProperties: false,
    },
  },
  {
    name: "orchestrator_guide",
    description: "How to use these tools as the orchestrating session",
    inputSchema: {
      type: "object",
      properties: {},
      additionalProperties: false,
    },
  },
];

function readReport(args: Record<string, unknown>): ManualReport {
  const outcome = getString(args.outcome);
  if (outcome === "completed") {
    const summary = getString(args.summary);
    if (!summary) throw new Error("summary is required when outcome is completed");
    return { outcome, summary, filesModified: getStringArray(args.filesModified) };
  }
  if (outcome === "failed") {
    const error = getString(args.error);
    if (!error) throw new Error("error is required when outcome is failed");
    return { outcome, error };
  }
  throw new Error("outcome must be completed or failed");
}

export function createConductorServer(deps: ConductorServerDeps): Server {
  const { config, service } = deps;

  const server = new Server(
    { name: config.serverName, version: config.serverVersion },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    try {
      const { name, arguments: rawArgs } = request.params;
      const args = isRecord(rawArgs) ? rawArgs : {};

      switch (name) {
        case "dispatch_task": {
          const projectPath = getString(args.projectPath) ?? getString(args.project_path);
          const content = getString(args.content);
          const agentKind = getString(args.agentKind) ?? getString(args.agent_kind);
          if (!projectPath) throw new Error("projectPath is required");
          if (!content) throw new Error("content is required");
          if (!agentKind) throw new Error("agentKind is required");
          const response = await service.dispatch({
            projectPath,
            content,
            agentKind,
            model: getString(args.model),
            additionalPaths: getStringArray(args.additionalPaths) ?? getStringArray(args.additional_paths),
          });
          return jsonResponse(response);
        }
        case "task_followup": {
          const taskId = getString(args.taskId) ?? getString(args.task_id);
          const content = getString(args.content);
          if (!taskId) throw new Error("taskId is required");
          if (!content) throw new Error("content is required");
          return jsonResponse(await service.followUp({ taskId, content }));
        }
        case "task_get": {
          const taskId = getString(args.taskId) ?? getString(args.task_id);
          if (!taskId) throw new Error("taskId is required");
          return jsonResponse(await service.getTask(taskId));
        }
        case "task_list_recent": {
          const limit = getNumber(args.limit) ?? 10;
          if (!Number.isInteger(limit) || limit < 1) throw new Error("limit must be a positive integer");
          return jsonResponse({ tasks: await service.listRecent(limit) });
        }
        case "task_report": {
          const taskId = getString(args.taskId) ?? getString(args.task_id);
          if (!taskId) throw new Error("taskId is required");
          const result = await service.report(taskId, readReport(args));
          return jsonResponse({ taskId, result });
        }
        case "status_get": {
          const state = await service.status();
          return jsonResponse({
            config: {
              mode: config.mode,
              roots: config.roots,
              dataDir: config.dataDir,
              logDir: config.logDir,
              storage: config.storage,
              dbPath: config.dbPath,
              launcher: config.launcher,
            },
            policy: state.policy,
            agents: state.agents,
            running: state.running.map((record) => ({
              taskId: record.taskId,
              projectPath: record.projectPath,
              agentKind: record.agentKind,
              createdAt: record.createdAt,
              runnerPid: record.runnerPid,
            })),
          });
        }
        case "orchestrator_guide": {
          return { content: [{ type: "text" as const, text: getOrchestratorPrompt() }] };
        }
        default:
          return errorResponse(`Unknown tool: ${name}`);
      }
    } catch (error) {
      return errorResponse(errorMessage(error));
    }
  });

  return server;
}

export async function startServer() {
  const config = loadConfig();
  const eventLog = new FileEventLog(config.logDir);
  const ledger = createLedger(config, eventLog);
  await ledger.init();
  const service = new DispatchService({
    config,
    ledger,
    backends: await loadBackends(config.backendsPath),
    launcher: createLauncher(config),
    eventLog,
  });
  const server = createConductorServer({ config, service });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  await eventLog.append("server_start", { storage: config.storage, launcher: config.launcher });
}
