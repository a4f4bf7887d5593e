import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { DEFAULT_BACKENDS } from './backends.js';
import { loadConfig, type Config } from './config.js';
import { DispatchService } from './dispatch.js';
import type { LaunchResult, Launcher, RunRequest } from './launchers.js';
import { LedgerError } from './errors.js';
import { JsonLedger, type TaskAnnotation, type TransitionResult } from './ledger.js';
import { SYSTEM_PROMPT, buildPrompt } from './prompts.js';

class FakeLauncher implements Launcher {
  readonly kind = 'detached' as const;
  requests: RunRequest[] = [];
  failWith?: Error;

  constructor(public pid?: number) {}

  async launch(request: RunRequest): Promise<LaunchResult> {
    if (this.failWith) throw this.failWith;
    this.requests.push(request);
    return { launcher: this.kind, pid: this.pid, detail: 'fake' };
  }
}

class LockedAnnotationLedger extends JsonLedger {
  async annotate(_taskId: string, _annotation: TaskAnnotation): Promise<TransitionResult> {
    throw new LedgerError('lock_timeout', 'Timed out waiting for ledger lock');
  }
}

const LOGIN_SPEC = `## Spec: Login [feature]
Sign users in with email and password.

### Must Do
- Return a session token on success

### Edge Cases
- wrong password → 401

### Validation
\`\`\`yaml
tests: npm test
\`\`\`
`;

describe('DispatchService', () => {
  let tempDir: string;
  let projectPath: string;
  let config: Config;
  let ledger: JsonLedger;
  let launcher: FakeLauncher;
  let alive: Set<number>;
  let service: DispatchService;

  beforeEach(async () => {
    tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'conductor-dispatch-')));
    projectPath = path.join(tempDir, 'proj');
    await fs.mkdir(projectPath);
    config = loadConfig(
      ['--data-dir', path.join(tempDir, 'data'), '--log-dir', path.join(tempDir, 'logs'), '--storage', 'json', '--roots', tempDir],
      {}
    );
    ledger = new JsonLedger(config.dataDir);
    await ledger.init();
    launcher = new FakeLauncher(777);
    alive = new Set([777]);
    service = new DispatchService({
      config,
      ledger,
      backends: DEFAULT_BACKENDS,
      launcher,
      isAlive: (pid) => alive.has(pid),
    });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should admit, write the prompt and launch the runner', async () => {
    const response = await service.dispatch({ projectPath, content: 'Add a health endpoint', agentKind: 'claude' });
    if (response.status !== 'launched') throw new Error(`unexpected ${response.status}`);

    expect(response).toMatchObject({
      agentKind: 'claude',
      agent: 'Claude Code',
      model: 'sonnet',
      projectPath,
      additionalPaths: [],
      launcher: 'detached',
      detail: 'fake',
    });

    const promptFile = path.join(config.dataDir, 'prompts', `${response.taskId}.txt`);
    expect(launcher.requests).toEqual([
      { taskId: response.taskId, projectPath, promptFile, agentKind: 'claude', model: undefined, additionalPaths: [] },
    ]);
    expect(await fs.readFile(promptFile, 'utf8')).toBe(`Add a health endpoint\n\n${SYSTEM_PROMPT}`);

    const record = await ledger.get(response.taskId);
    expect(record?.status).toBe('running');
    expect(record?.runnerPid).toBe(777);
  });

  it('should block a second dispatch while the project is busy', async () => {
    const first = await service.dispatch({ projectPath, content: 'task one', agentKind: 'claude' });
    const second = await service.dispatch({ projectPath, content: 'task two', agentKind: 'gemini' });

    expect(second).toEqual({
      status: 'already_running',
      taskId: first.taskId,
      message: `Project ${projectPath} already has a running task (${first.taskId}). Check it with task_get.`,
    });
    expect(launcher.requests).toHaveLength(1);
  });

  it('should block a duplicate of a finished task', async () => {
    const first = await service.dispatch({ projectPath, content: 'fix bug', agentKind: 'claude' });
    expect(await service.report(first.taskId, { outcome: 'failed', error: 'agent crashed' })).toBe('recorded');

    const again = await service.dispatch({ projectPath, content: 'fix bug', agentKind: 'claude' });
    expect(again).toMatchObject({ status: 'duplicate', taskId: first.taskId });
  });

  it('should fail the new task when the launcher fails', async () => {
    launcher.failWith = new Error('tmux not found');
    const response = await service.dispatch({ projectPath, content: 'fix bug', agentKind: 'claude' });

    expect(response).toEqual({ status: 'launch_failed', taskId: response.taskId, error: 'launch failed: tmux not found' });
    const record = await ledger.get(response.taskId);
    expect(record?.status).toBe('failed');
    expect(record?.error).toBe('launch failed: tmux not found');
    await expect(fs.stat(path.join(config.dataDir, 'prompts', `${response.taskId}.txt`))).rejects.toMatchObject({
      code: 'ENOENT',
    });

    launcher.failWith = undefined;
    const retry = await service.dispatch({ projectPath, content: 'another fix', agentKind: 'claude' });
    expect(retry.status).toBe('launched');
  });

  it('should validate the request', async () => {
    await expect(service.dispatch({ projectPath, content: '   ', agentKind: 'claude' })).rejects.toThrow(
      'content is required'
    );
    await expect(service.dispatch({ projectPath, content: 'x', agentKind: 'cursor' })).rejects.toThrow(
      'Unknown agent kind: cursor. Known: claude, codex, gemini'
    );
    await expect(
      service.dispatch({ projectPath: path.join(tempDir, 'missing'), content: 'x', agentKind: 'claude' })
    ).rejects.toThrow(`Path does not exist: ${path.join(tempDir, 'missing')}`);
  });

  it('should enforce roots in strict mode', async () => {
    const strict = new DispatchService({
      config: { ...config, mode: 'strict', roots: [projectPath] },
      ledger,
      backends: DEFAULT_BACKENDS,
      launcher,
    });
    await expect(strict.dispatch({ projectPath: tempDir, content: 'x', agentKind: 'claude' })).rejects.toThrow(
      `Path not allowed in strict mode: ${tempDir}`
    );
  });

  it('should resolve agent aliases and keep only existing additional paths', async () => {
    const shared = path.join(tempDir, 'shared');
    await fs.mkdir(shared);
    const response = await service.dispatch({
      projectPath: `${projectPath}/`,
      content: 'Sync types',
      agentKind: 'Claude-Code',
      model: 'opus',
      additionalPaths: [shared, path.join(tempDir, 'nope')],
    });
    if (response.status !== 'launched') throw new Error(`unexpected ${response.status}`);

    expect(response.agentKind).toBe('claude');
    expect(response.model).toBe('opus');
    expect(response.projectPath).toBe(projectPath);
    expect(response.additionalPaths).toEqual([shared]);
    const prompt = await fs.readFile(launcher.requests[0].promptFile, 'utf8');
    expect(prompt).toBe(buildPrompt('Sync types', { additionalPaths: [shared] }));
  });

  it('should return a not_found value for unknown tasks', async () => {
    expect(await service.getTask('nope')).toEqual({ status: 'not_found', taskId: 'nope' });
  });

  it('should list recent tasks as id, status and agent', async () => {
    const first = await service.dispatch({ projectPath, content: 'one', agentKind: 'codex' });
    await service.report(first.taskId, { outcome: 'completed', summary: 'done', filesModified: ['a.ts'] });
    expect(await service.listRecent(5)).toEqual([{ taskId: first.taskId, status: 'completed', agentKind: 'codex' }]);
  });

  it('should fail tasks whose runner has died before answering queries', async () => {
    const response = await service.dispatch({ projectPath, content: 'long job', agentKind: 'claude' });
    alive.delete(777);

    const record = await service.getTask(response.taskId);
    expect(record.status).toBe('failed');
    if ('error' in record) expect(record.error).toBe('terminated before completion');
  });

  it('should report status with running tasks and policy', async () => {
    const response = await service.dispatch({ projectPath, content: 'job', agentKind: 'claude' });
    const status = await service.status();
    expect(status.running.map((record) => record.taskId)).toEqual([response.taskId]);
    expect(status.policy).toEqual({ staleAfterMs: 600000, dedupWindowMs: 300000 });
    expect(status.launcher).toBe('detached');
    expect(status.storage).toBe('json');
    expect(status.agents).toEqual(['claude', 'codex', 'gemini']);
  });

  it('should still return the task id when the runner pid cannot be stored', async () => {
    const busy = new LockedAnnotationLedger(config.dataDir);
    await busy.init();
    const flaky = new DispatchService({ config, ledger: busy, backends: DEFAULT_BACKENDS, launcher });

    const response = await flaky.dispatch({ projectPath, content: 'Add a health endpoint', agentKind: 'claude' });
    if (response.status !== 'launched') throw new Error(`unexpected ${response.status}`);

    expect(launcher.requests.map((request) => request.taskId)).toEqual([response.taskId]);
    const record = await busy.get(response.taskId);
    expect(record?.status).toBe('running');
    expect(record?.runnerPid).toBeUndefined();
  });

  it('should turn a spec into an implementation brief', async () => {
    const response = await service.dispatch({ projectPath, content: LOGIN_SPEC, agentKind: 'claude' });
    if (response.status !== 'launched') throw new Error(`unexpected ${response.status}`);

    expect(response).toMatchObject({ mode: 'spec', specName: 'Login', specTier: 'FEATURE' });
    const prompt = await fs.readFile(launcher.requests[0].promptFile, 'utf8');
    expect(prompt).toBe(buildPrompt(LOGIN_SPEC));
    expect(prompt.startsWith('# Spec-Driven Implementation\n')).toBe(true);
  });

  it('should mark plain content as prose', async () => {
    const response = await service.dispatch({ projectPath, content: 'Add a health endpoint', agentKind: 'claude' });
    if (response.status !== 'launched') throw new Error(`unexpected ${response.status}`);
    expect(response.mode).toBe('prose');
    expect(response.specName).toBeUndefined();
  });

  it('should reject a malformed spec before admission', async () => {
    const content = '## Spec: Login [URGENT]\n\n### Validation\nlint: eslint .';
    await expect(service.dispatch({ projectPath, content, agentKind: 'claude' })).rejects.toThrow(
      "Invalid spec: Invalid tier 'URGENT'. Valid tiers: HOTFIX, FEATURE, SYSTEM; Validation block must specify 'tests' command"
    );
    expect(await ledger.listRecent(10)).toEqual([]);
    expect(launcher.requests).toEqual([]);
  });

  describe('followUp', () => {
    const finishedTask = async (content: string, agentKind = 'claude', sessionId: string | undefined = 'sess-1') => {
      const first = await service.dispatch({ projectPath, content, agentKind, model: 'opus' });
      if (sessionId) await ledger.annotate(first.taskId, { sessionId });
      await service.report(first.taskId, { outcome: 'completed', summary: 'done' });
      return first.taskId;
    };

    it('should resume the session of the earlier task', async () => {
      const previous = await finishedTask('Add a health endpoint');
      const response = await service.followUp({ taskId: previous, content: 'Also add a readiness endpoint' });
      if (response.status !== 'launched') throw new Error(`unexpected ${response.status}`);

      expect(response).toMatchObject({
        agentKind: 'claude',
        model: 'opus',
        projectPath,
        mode: 'prose',
        resumedFrom: previous,
        sessionId: 'sess-1',
      });
      expect(response.taskId).not.toBe(previous);
      expect(launcher.requests[1]).toMatchObject({
        taskId: response.taskId,
        projectPath,
        agentKind: 'claude',
        model: 'opus',
        resumeSessionId: 'sess-1',
      });
      expect(await fs.readFile(launcher.requests[1].promptFile, 'utf8')).toBe(
        `Also add a readiness endpoint\n\n${SYSTEM_PROMPT}`
      );
    });

    it('should go through admission for the project', async () => {
      const first = await service.dispatch({ projectPath, content: 'long job', agentKind: 'claude' });
      await ledger.annotate(first.taskId, { sessionId: 'sess-2' });

      const response = await service.followUp({ taskId: first.taskId, content: 'and then this' });
      expect(response).toMatchObject({ status: 'already_running', taskId: first.taskId });
      expect(launcher.requests).toHaveLength(1);
    });

    it('should refuse tasks it cannot resume', async () => {
      expect(await service.followUp({ taskId: 'nope', content: 'more' })).toEqual({ status: 'not_found', taskId: 'nope' });

      const codexTask = await finishedTask('Add a metrics endpoint', 'codex');
      await expect(service.followUp({ taskId: codexTask, content: 'more' })).rejects.toThrow(
        'OpenAI Codex cannot resume a session'
      );

      const sessionless = await finishedTask('Add a status endpoint', 'claude', undefined);
      await expect(service.followUp({ taskId: sessionless, content: 'more' })).rejects.toThrow(
        `Task ${sessionless} has no recorded session to resume`
      );
      await expect(service.followUp({ taskId: sessionless, content: ' ' })).rejects.toThrow('content is required');
    });
  });
});
