import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { DEFAULT_BACKENDS } from './backends.js';
import { loadConfig, type Config } from './config.js';
import { DispatchService } from './dispatch.js';
import type { LaunchResult, Launcher, RunRequest } from './launchers.js';
import { JsonLedger } from './ledger.js';
import { createConductorServer } from './server.js';
import { isRecord } from './utils.js';

class FakeLauncher implements Launcher {
  readonly kind = 'detached' as const;
  requests: RunRequest[] = [];

  async launch(request: RunRequest): Promise<LaunchResult> {
    this.requests.push(request);
    return { launcher: this.kind, pid: 4242, detail: 'fake' };
  }
}

type ToolResult = Awaited<ReturnType<Client['callTool']>>;

function toolText(result: ToolResult): string {
  const content = Array.isArray(result.content) ? result.content : [];
  const first: unknown = content[0];
  return isRecord(first) && typeof first.text === 'string' ? first.text : '';
}

describe('Conductor MCP server', () => {
  let tempDir: string;
  let projectPath: string;
  let config: Config;
  let ledger: JsonLedger;
  let launcher: FakeLauncher;
  let server: Server;
  let client: Client;

  async function call(name: string, args: Record<string, unknown> = {}) {
    const result = await client.callTool({ name, arguments: args });
    const text = toolText(result);
    return { isError: result.isError === true, text };
  }

  async function callJson(name: string, args: Record<string, unknown> = {}) {
    const { isError, text } = await call(name, args);
    if (isError) throw new Error(`${name} failed: ${text}`);
    return JSON.parse(text);
  }

  beforeEach(async () => {
    tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'conductor-server-')));
    projectPath = path.join(tempDir, 'proj');
    await fs.mkdir(projectPath);
    config = loadConfig(
      ['--data-dir', path.join(tempDir, 'data'), '--log-dir', path.join(tempDir, 'logs'), '--storage', 'json', '--roots', tempDir],
      {}
    );
    ledger = new JsonLedger(config.dataDir);
    await ledger.init();
    launcher = new FakeLauncher();
    const service = new DispatchService({
      config,
      ledger,
      backends: DEFAULT_BACKENDS,
      launcher,
      isAlive: (pid) => pid === 4242,
    });

    server = createConductorServer({ config, service });
    client = new Client({ name: 'conductor-test-client', version: '1.0.0' }, { capabilities: {} });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should list the coordinator tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name)).toEqual([
      'dispatch_task',
      'task_followup',
      'task_get',
      'task_list_recent',
      'task_report',
      'status_get',
      'orchestrator_guide',
    ]);
  });

  it('should launch a task and refuse a second one for the same project', async () => {
    const launched = await callJson('dispatch_task', { projectPath, content: 'Add tests', agentKind: 'gemini' });
    expect(launched).toMatchObject({
      status: 'launched',
      agentKind: 'gemini',
      agent: 'Gemini CLI',
      projectPath,
      launcher: 'detached',
    });
    expect(launcher.requests).toHaveLength(1);

    const blocked = await callJson('dispatch_task', { projectPath, content: 'Other work', agentKind: 'claude' });
    expect(blocked.status).toBe('already_running');
    expect(blocked.taskId).toBe(launched.taskId);
    expect(launcher.requests).toHaveLength(1);
  });

  it('should resume a finished task through task_followup', async () => {
    const first = await callJson('dispatch_task', { projectPath, content: 'Add tests', agentKind: 'claude' });
    await ledger.annotate(first.taskId, { sessionId: 'sess-3' });
    await callJson('task_report', { taskId: first.taskId, outcome: 'completed', summary: 'added' });

    const followUp = await callJson('task_followup', { taskId: first.taskId, content: 'Cover the error path too' });
    expect(followUp).toMatchObject({ status: 'launched', resumedFrom: first.taskId, sessionId: 'sess-3', projectPath });
    expect(launcher.requests[1].resumeSessionId).toBe('sess-3');

    expect(await call('task_followup', { taskId: first.taskId })).toEqual({ isError: true, text: 'content is required' });
  });

  it('should reject a malformed spec', async () => {
    expect(await call('dispatch_task', { projectPath, content: '## Spec: broken', agentKind: 'claude' })).toEqual({
      isError: true,
      text: "Invalid spec: Invalid spec header. Expected format: '## Spec: FeatureName [TIER]'",
    });
    expect(launcher.requests).toEqual([]);
  });

  it('should accept snake_case argument names', async () => {
    const launched = await callJson('dispatch_task', { project_path: projectPath, content: 'Add tests', agent_kind: 'codex' });
    expect(launched.status).toBe('launched');

    const record = await callJson('task_get', { task_id: launched.taskId });
    expect(record.agentKind).toBe('codex');
  });

  it('should surface validation errors as error results', async () => {
    expect(await call('dispatch_task', { projectPath, content: '', agentKind: 'claude' })).toEqual({
      isError: true,
      text: 'content is required',
    });
    expect(await call('dispatch_task', { projectPath, content: 'x', agentKind: 'cursor' })).toEqual({
      isError: true,
      text: 'Unknown agent kind: cursor. Known: claude, codex, gemini',
    });
    expect(await call('task_list_recent', { limit: 0 })).toEqual({
      isError: true,
      text: 'limit must be a positive integer',
    });
    expect(await call('no_such_tool')).toEqual({ isError: true, text: 'Unknown tool: no_such_tool' });
  });

  it('should return not_found for unknown task ids', async () => {
    expect(await callJson('task_get', { taskId: 'missing' })).toEqual({ status: 'not_found', taskId: 'missing' });
  });

  it('should record a manual report once', async () => {
    const launched = await callJson('dispatch_task', { projectPath, content: 'Refactor', agentKind: 'claude' });

    const first = await callJson('task_report', {
      taskId: launched.taskId,
      outcome: 'completed',
      summary: 'Refactored the router',
      filesModified: ['src/router.ts'],
    });
    expect(first).toEqual({ taskId: launched.taskId, result: 'recorded' });

    const second = await callJson('task_report', { taskId: launched.taskId, outcome: 'failed', error: 'late' });
    expect(second).toEqual({ taskId: launched.taskId, result: 'already_terminal' });

    const record = await callJson('task_get', { taskId: launched.taskId });
    expect(record).toMatchObject({
      status: 'completed',
      summary: 'Refactored the router',
      filesModified: ['src/router.ts'],
    });
    expect(record.error).toBeUndefined();
  });

  it('should require the field that matches the reported outcome', async () => {
    expect(await call('task_report', { taskId: 'x', outcome: 'completed' })).toEqual({
      isError: true,
      text: 'summary is required when outcome is completed',
    });
    expect(await call('task_report', { taskId: 'x', outcome: 'failed' })).toEqual({
      isError: true,
      text: 'error is required when outcome is failed',
    });
    expect(await call('task_report', { taskId: 'x', outcome: 'paused' })).toEqual({
      isError: true,
      text: 'outcome must be completed or failed',
    });
  });

  it('should list recent tasks and report status', async () => {
    const launched = await callJson('dispatch_task', { projectPath, content: 'Docs', agentKind: 'claude' });

    expect(await callJson('task_list_recent', { limit: 5 })).toEqual({
      tasks: [{ taskId: launched.taskId, status: 'running', agentKind: 'claude' }],
    });

    const status = await callJson('status_get');
    expect(status.policy).toEqual({ staleAfterMs: 600000, dedupWindowMs: 300000 });
    expect(status.agents).toEqual(['claude', 'codex', 'gemini']);
    expect(status.config.storage).toBe('json');
    expect(status.running).toEqual([
      {
        taskId: launched.taskId,
        projectPath,
        agentKind: 'claude',
        createdAt: expect.any(String),
        runnerPid: 4242,
      },
    ]);
  });

  it('should return the orchestrator guide as text', async () => {
    const { isError, text } = await call('orchestrator_guide');
    expect(isError).toBe(false);
    expect(text).toContain('dispatch_task');
  });
});
