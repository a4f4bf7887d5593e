import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { shellQuote } from './backends.js';
import { loadConfig } from './config.js';
import {
  DetachedLauncher,
  MacosLauncher,
  TmuxLauncher,
  cliInvocation,
  createLauncher,
  escapeForAppleScript,
  runArgs,
  runCommandLine,
  windowName,
  type RunRequest,
} from './launchers.js';

const config = loadConfig(['--data-dir', '/d', '--log-dir', '/l', '--storage', 'json', '--db-path', '/d/ledger.db'], {});

const request: RunRequest = {
  taskId: '0123456789abcdef',
  projectPath: '/work/app',
  promptFile: '/d/prompts/0123456789abcdef.txt',
  agentKind: 'claude',
};

describe('Launchers', () => {
  describe('runArgs', () => {
    it('should name the task, the agent and the shared storage', () => {
      expect(runArgs(request, config)).toEqual([
        'run',
        '--task-id', '0123456789abcdef',
        '--project', '/work/app',
        '--prompt-file', '/d/prompts/0123456789abcdef.txt',
        '--agent', 'claude',
        '--data-dir', '/d',
        '--log-dir', '/l',
        '--storage', 'json',
        '--db-path', '/d/ledger.db',
      ]);
    });

    it('should forward the model and every additional path', () => {
      const args = runArgs({ ...request, model: 'opus', additionalPaths: ['/work/api', '/work/lib'] }, config);
      expect(args.slice(9, 15)).toEqual(['--model', 'opus', '--add-dir', '/work/api', '--add-dir', '/work/lib']);
    });

    it('should pass the session to resume ahead of the storage flags', () => {
      const args = runArgs({ ...request, resumeSessionId: 'sess-7' }, config);
      expect(args.slice(9, 13)).toEqual(['--resume', 'sess-7', '--data-dir', '/d']);
    });
  });

  describe('cliInvocation', () => {
    it('should run the CLI sources through tsx', () => {
      const here = path.dirname(fileURLToPath(import.meta.url));
      expect(cliInvocation()).toEqual({
        command: process.execPath,
        args: ['--import', 'tsx', path.join(here, 'cli.ts')],
      });
    });

    it('should quote the full command line', () => {
      const { command, args } = cliInvocation();
      const expected = [command, ...args, ...runArgs(request, config)].map(shellQuote).join(' ');
      expect(runCommandLine(request, config)).toBe(expected);
      expect(runCommandLine(request, config).endsWith('--db-path /d/ledger.db')).toBe(true);
    });
  });

  it('should name windows after the task id prefix', () => {
    expect(windowName('0123456789abcdef')).toBe('task-01234567');
  });

  it('should escape quotes and backslashes for AppleScript', () => {
    expect(escapeForAppleScript(`cd '/a b' && echo "hi" \\ done`)).toBe(`cd '/a b' && echo \\"hi\\" \\\\ done`);
  });

  it('should pick the launcher from config', () => {
    expect(createLauncher(config)).toBeInstanceOf(DetachedLauncher);
    expect(createLauncher({ ...config, launcher: 'tmux' })).toBeInstanceOf(TmuxLauncher);
    expect(createLauncher({ ...config, launcher: 'macos' }).kind).toBe('macos');
  });

  it.skipIf(process.platform === 'darwin')('should refuse the Terminal launcher off macOS', async () => {
    await expect(new MacosLauncher(config).launch(request)).rejects.toThrow(
      'macos launcher is only supported on macOS'
    );
  });
});
