import { describe, it, expect } from 'vitest';
import { decodeLine, toolKindOf } from './stream.js';

describe('decodeLine', () => {
  it('should decode the generic tool and result shapes', () => {
    expect(decodeLine('{"type":"tool","tool":"bash","cmd":"pytest -q"}')).toEqual([
      {
        kind: 'tool_call',
        tool: 'bash',
        toolKind: 'shell',
        path: undefined,
        command: 'pytest -q',
        pattern: undefined,
        todos: undefined,
      },
    ]);
    expect(decodeLine('{"type":"result","passed":true}')).toEqual([
      { kind: 'result', ok: true, text: undefined, sessionId: undefined },
    ]);
  });

  it('should turn non-JSON and non-object lines into raw events', () => {
    expect(decodeLine('not json')).toEqual([{ kind: 'raw', line: 'not json' }]);
    expect(decodeLine('[1,2]')).toEqual([{ kind: 'raw', line: '[1,2]' }]);
    expect(decodeLine('42')).toEqual([{ kind: 'raw', line: '42' }]);
  });

  it('should produce nothing for blank lines', () => {
    expect(decodeLine('')).toEqual([]);
    expect(decodeLine('   ')).toEqual([]);
  });

  it('should tag unrecognized types as unknown', () => {
    expect(decodeLine('{"type":"heartbeat"}')).toEqual([{ kind: 'unknown', type: 'heartbeat' }]);
    expect(decodeLine('{"no":"type"}')).toEqual([{ kind: 'unknown', type: '' }]);
  });

  describe('claude stream-json', () => {
    it('should read the session id from the system event', () => {
      const line = JSON.stringify({ type: 'system', subtype: 'init', session_id: 'sess-1', model: 'sonnet' });
      expect(decodeLine(line)).toEqual([{ kind: 'system', sessionId: 'sess-1', model: 'sonnet' }]);
    });

    it('should emit one tool call per tool_use block and skip text blocks', () => {
      const line = JSON.stringify({
        type: 'assistant',
        message: {
          content: [
            { type: 'text', text: 'Looking at the file' },
            { type: 'tool_use', name: 'Read', input: { file_path: '/p/a.ts' } },
            { type: 'tool_use', name: 'Edit', input: { file_path: '/p/b.ts' } },
          ],
        },
      });
      const events = decodeLine(line);
      expect(events).toHaveLength(2);
      expect(events[0]).toMatchObject({ kind: 'tool_call', tool: 'Read', toolKind: 'read', path: '/p/a.ts' });
      expect(events[1]).toMatchObject({ kind: 'tool_call', tool: 'Edit', toolKind: 'edit', path: '/p/b.ts' });
    });

    it('should join text blocks of a tool result', () => {
      const line = JSON.stringify({
        type: 'user',
        message: {
          content: [
            {
              type: 'tool_result',
              is_error: true,
              content: [
                { type: 'text', text: 'line one' },
                { type: 'text', text: 'line two' },
              ],
            },
          ],
        },
      });
      expect(decodeLine(line)).toEqual([{ kind: 'tool_result', isError: true, content: 'line one\nline two' }]);
    });

    it('should take text from streamed deltas', () => {
      const line = JSON.stringify({
        type: 'stream_event',
        event: { type: 'content_block_delta', delta: { type: 'text_delta', text: 'Hello' } },
      });
      expect(decodeLine(line)).toEqual([{ kind: 'text', text: 'Hello' }]);
    });

    it('should map is_error on the final result', () => {
      const line = JSON.stringify({ type: 'result', subtype: 'success', is_error: false, result: 'done', session_id: 's2' });
      expect(decodeLine(line)).toEqual([{ kind: 'result', ok: true, text: 'done', sessionId: 's2' }]);
    });
  });

  describe('gemini stream-json', () => {
    it('should decode init, tool_use, tool_result and assistant messages', () => {
      expect(decodeLine('{"type":"init","session_id":"g-1","model":"gemini-2.5-pro"}')).toEqual([
        { kind: 'system', sessionId: 'g-1', model: 'gemini-2.5-pro' },
      ]);
      expect(
        decodeLine('{"type":"tool_use","tool_name":"run_shell_command","parameters":{"command":"npm test"}}')[0]
      ).toMatchObject({ kind: 'tool_call', tool: 'run_shell_command', toolKind: 'shell', command: 'npm test' });
      expect(decodeLine('{"type":"tool_result","status":"error","output":"boom"}')).toEqual([
        { kind: 'tool_result', isError: true, content: 'boom' },
      ]);
      expect(decodeLine('{"type":"message","role":"assistant","content":"Done."}')).toEqual([
        { kind: 'text', text: 'Done.' },
      ]);
      expect(decodeLine('{"type":"message","role":"user","content":"prompt"}')).toEqual([]);
    });

    it('should decode error events', () => {
      expect(decodeLine('{"type":"error","message":"quota exceeded"}')).toEqual([
        { kind: 'error', message: 'quota exceeded' },
      ]);
    });
  });

  describe('codex exec --json', () => {
    it('should pair command start and completion', () => {
      const started = decodeLine(
        '{"type":"item.started","item":{"id":"i1","type":"command_execution","command":"go test ./..."}}'
      );
      expect(started[0]).toMatchObject({ kind: 'tool_call', toolKind: 'shell', command: 'go test ./...' });

      const completed = decodeLine(
        '{"type":"item.completed","item":{"id":"i1","type":"command_execution","command":"go test ./...","aggregated_output":"FAIL","exit_code":1}}'
      );
      expect(completed).toEqual([{ kind: 'tool_result', isError: true, content: 'FAIL', command: 'go test ./...' }]);
    });

    it('should emit an edit per changed file', () => {
      const events = decodeLine(
        '{"type":"item.completed","item":{"type":"file_change","changes":[{"path":"a.ts","kind":"update"},{"path":"b.ts","kind":"add"}]}}'
      );
      expect(events.map((event) => (event.kind === 'tool_call' ? event.path : undefined))).toEqual(['a.ts', 'b.ts']);
    });

    it('should read the thread id as session id', () => {
      expect(decodeLine('{"type":"thread.started","thread_id":"t-9"}')).toEqual([{ kind: 'system', sessionId: 't-9' }]);
    });
  });
});

describe('toolKindOf', () => {
  it('should map tool names case-insensitively', () => {
    expect(toolKindOf('MultiEdit')).toBe('edit');
    expect(toolKindOf('Grep')).toBe('search');
    expect(toolKindOf('LS')).toBe('list');
    expect(toolKindOf('TodoWrite')).toBe('todo');
    expect(toolKindOf('WebFetch')).toBe('other');
  });
});
