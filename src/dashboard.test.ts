import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { buildSnapshot, routeRequest } from './dashboard.js';
import { JsonLedger } from './ledger.js';

describe('Dashboard', () => {
  let tempDir: string;
  let ledger: JsonLedger;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'conductor-dashboard-'));
    ledger = new JsonLedger(tempDir);
    await ledger.init();
    await ledger.create({
      taskId: 'task-a',
      projectPath: '/work/a',
      agentKind: 'claude',
      contentFingerprint: 'fp-a',
      createdAt: '2026-01-01T10:00:00.000Z',
    });
    await ledger.create({
      taskId: 'task-b',
      projectPath: '/work/b',
      agentKind: 'codex',
      contentFingerprint: 'fp-b',
      createdAt: '2026-01-01T11:00:00.000Z',
    });
    await ledger.complete('task-b', ['x.ts'], 'done');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should list recent tasks newest first', async () => {
    const response = await routeRequest(ledger, '/api/tasks?limit=1');
    expect(response.status).toBe(200);
    expect(response.contentType).toBe('application/json');
    const body = JSON.parse(response.body);
    expect(body.tasks.map((task: { taskId: string }) => task.taskId)).toEqual(['task-b']);
  });

  it('should reject a bad limit', async () => {
    const response = await routeRequest(ledger, '/api/tasks?limit=zero');
    expect(response.status).toBe(400);
    expect(JSON.parse(response.body)).toEqual({ error: 'limit must be a positive integer' });
  });

  it('should return one task or 404', async () => {
    const found = await routeRequest(ledger, '/api/tasks/task-a');
    expect(found.status).toBe(200);
    expect(JSON.parse(found.body)).toMatchObject({ taskId: 'task-a', status: 'running', projectPath: '/work/a' });

    const missing = await routeRequest(ledger, '/api/tasks/nope');
    expect(missing.status).toBe(404);
    expect(JSON.parse(missing.body)).toEqual({ error: 'Task not found', taskId: 'nope' });
  });

  it('should serve the page outside the api', async () => {
    const response = await routeRequest(ledger, '/');
    expect(response.status).toBe(200);
    expect(response.contentType).toBe('text/html; charset=utf-8');
    expect(response.body.startsWith('<!doctype html>')).toBe(true);

    expect((await routeRequest(ledger, '/api/other')).status).toBe(404);
  });

  it('should build a snapshot with the running count', async () => {
    const snapshot = await buildSnapshot(ledger);
    expect(snapshot.type).toBe('snapshot');
    expect(snapshot.running).toBe(1);
    expect(snapshot.tasks.map((task) => [task.taskId, task.status])).toEqual([
      ['task-b', 'completed'],
      ['task-a', 'running'],
    ]);
  });
});
