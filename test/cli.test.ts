/**
 * CLI Command Tests
 *
 * Runs the read-only commands end to end against a temporary runs directory.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createProgram, runCli } from '../src/control-plane/cli.js';
import { resetConfig } from '../src/config/index.js';
import { RunStore } from '../src/orchestrator/run-store.js';
import { createRun } from '../src/types/run.js';

describe('CLI', () => {
  describe('createProgram', () => {
    it('should register every command', () => {
      const names = createProgram().commands.map((c) => c.name());

      expect(names).toEqual(['new', 'revise', 'resume', 'show', 'list', 'status']);
    });

    it('should expose the constraint flags on new and revise', () => {
      const program = createProgram();

      for (const name of ['new', 'revise']) {
        const command = program.commands.find((c) => c.name() === name);
        const flags = command?.options.map((o) => o.long);
        expect(flags).toEqual(
          expect.arrayContaining(['--timeframe', '--region', '--max-words', '--depth', '--focus', '--json'])
        );
      }
    });
  });

  describe('commands', () => {
    let root: string;
    let logSpy: MockInstance<typeof console.log>;
    let errorSpy: MockInstance<typeof console.error>;

    beforeEach(async () => {
      root = await mkdtemp(join(tmpdir(), 'cli-test-'));
      vi.stubEnv('RESEARCH_RELAY_RUNS_DIR', root);
      vi.stubEnv('NO_COLOR', '1');
      resetConfig();
      logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

      await new RunStore(root).save({
        ...createRun({
          runId: 'abc12345',
          promptText: 'Prompt',
          inputs: { topic: 'Tide tables', constraints: {} },
        }),
        jobId: 'job-1',
        status: 'completed',
        reportMarkdown: '# Tide tables\n\nBody',
      });
    });

    afterEach(async () => {
      vi.restoreAllMocks();
      vi.unstubAllEnvs();
      resetConfig();
      process.exitCode = undefined;
      await rm(root, { recursive: true, force: true });
    });

    function stdout(): string[] {
      return logSpy.mock.calls.map((call) => String(call[0]));
    }

    function stderr(): string[] {
      return errorSpy.mock.calls.map((call) => String(call[0]));
    }

    it('should print only the report with show --raw', async () => {
      await runCli(['node', 'research-relay', 'show', 'abc12345', '--raw']);

      expect(stdout()).toEqual(['# Tide tables\n\nBody']);
      expect(process.exitCode).toBeUndefined();
    });

    it('should report a missing version in show', async () => {
      await runCli(['node', 'research-relay', 'show', 'abc12345', '--version', '3']);

      expect(stderr()).toEqual(['✗ Run not found: abc12345 (version 3)']);
      expect(process.exitCode).toBe(1);
    });

    it('should reject an invalid run id in show', async () => {
      await runCli(['node', 'research-relay', 'show', 'a/b']);

      expect(stderr()).toEqual([
        '✗ Validation failed:\n  • runId: Run ID may only contain letters, digits, "-" and "_"',
      ]);
      expect(process.exitCode).toBe(1);
    });

    it('should print the run index with list --json', async () => {
      await runCli(['node', 'research-relay', 'list', '--json']);

      const output: unknown = JSON.parse(stdout()[0] ?? '[]');
      expect(output).toMatchObject([{ runId: 'abc12345', topic: 'Tide tables', latestVersion: 1 }]);
    });

    it('should require an API key for status', async () => {
      vi.stubEnv('GEMINI_API_KEY', '');

      await runCli(['node', 'research-relay', 'status', 'job-1']);

      expect(stderr()).toEqual([
        '✗ GEMINI_API_KEY is not set. Add it to your environment or a .env file.',
      ]);
      expect(process.exitCode).toBe(1);
    });
  });
});
