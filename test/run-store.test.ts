/**
 * Run Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { RunStore, generateRunId } from '../src/orchestrator/run-store.js';
import { createRun, type ResearchRun } from '../src/types/run.js';
import type { SourceMap } from '../src/types/citation.js';

function completedRun(overrides: Partial<ResearchRun> = {}): ResearchRun {
  return {
    ...createRun({
      runId: 'abc12345',
      promptText: 'Research tide tables',
      inputs: {
        topic: 'Tide tables',
        constraints: { region: 'Europe', maxWords: 500 },
        questions: ['How were they computed?'],
      },
    }),
    jobId: 'job-1',
    status: 'completed',
    reportMarkdown: '# Tide tables\n\nBody',
    usage: { promptTokens: 1000, outputTokens: 500, totalTokens: 1500, thinkingTokens: 0 },
    createdAt: new Date('2025-03-01T10:00:00.000Z'),
    ...overrides,
  };
}

describe('RunStore', () => {
  let root: string;
  let store: RunStore;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'run-store-test-'));
    store = new RunStore(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('save and load', () => {
    it('should round-trip the latest version', async () => {
      const run = completedRun();

      await store.save(run);
      const loaded = await store.loadLatest('abc12345');

      expect(loaded).toEqual(run);
    });

    it('should write the prompt, report and snake_case index', async () => {
      await store.save(completedRun());

      const prompt = await readFile(join(root, 'abc12345', 'prompt_v1.md'), 'utf-8');
      const report = await readFile(join(root, 'abc12345', 'report_v1.md'), 'utf-8');
      const meta: unknown = JSON.parse(await readFile(join(root, 'abc12345', 'meta.json'), 'utf-8'));

      expect(prompt).toBe('Research tide tables');
      expect(report).toBe('# Tide tables\n\nBody');
      expect(meta).toMatchObject({
        run_id: 'abc12345',
        topic: 'Tide tables',
        created_at: '2025-03-01T10:00:00.000Z',
        latest_version: 1,
        versions: [
          {
            version: 1,
            job_id: 'job-1',
            status: 'completed',
            previous_job_id: null,
            usage: { prompt_tokens: 1000, output_tokens: 500, total_tokens: 1500 },
          },
        ],
      });
    });

    it('should replace the entry when a version is saved again', async () => {
      await store.save(completedRun({ status: 'running', reportMarkdown: null }));
      await store.save(completedRun());

      const meta = await store.loadMetadata('abc12345');

      expect(meta?.versions).toHaveLength(1);
      expect(meta?.versions[0]?.status).toBe('completed');
    });

    it('should keep earlier versions when a revision is saved', async () => {
      await store.save(completedRun());
      await store.save(
        completedRun({
          version: 2,
          promptText: 'Revise it',
          jobId: 'job-2',
          previousJobId: 'job-1',
          feedback: 'More detail',
          reportMarkdown: 'Revised body',
          createdAt: new Date('2025-03-02T10:00:00.000Z'),
        })
      );

      const latest = await store.loadLatest('abc12345');
      const first = await store.loadVersion('abc12345', 1);
      const meta = await store.loadMetadata('abc12345');

      expect(latest?.version).toBe(2);
      expect(latest?.previousJobId).toBe('job-1');
      expect(latest?.feedback).toBe('More detail');
      expect(first?.reportMarkdown).toBe('# Tide tables\n\nBody');
      expect(meta?.latestVersion).toBe(2);
      expect(meta?.createdAt.toISOString()).toBe('2025-03-01T10:00:00.000Z');
    });

    it('should return null for unknown runs and versions', async () => {
      await store.save(completedRun());

      expect(await store.loadLatest('missing')).toBeNull();
      expect(await store.loadVersion('abc12345', 3)).toBeNull();
    });

    it('should fall back to the first 100 prompt characters as topic', async () => {
      await store.save(completedRun({ inputs: null, promptText: 'x'.repeat(150) }));

      const meta = await store.loadMetadata('abc12345');

      expect(meta?.topic).toBe('x'.repeat(100));
    });

    it('should treat an unparseable index as missing', async () => {
      await mkdir(join(root, 'broken'), { recursive: true });
      await writeFile(join(root, 'broken', 'meta.json'), '{not json', 'utf-8');

      expect(await store.loadMetadata('broken')).toBeNull();
    });
  });

  describe('listAll', () => {
    it('should list runs newest first', async () => {
      await store.save(completedRun({ runId: 'older001' }));
      await store.save(
        completedRun({ runId: 'newer001', createdAt: new Date('2025-04-01T00:00:00.000Z') })
      );

      const runs = await store.listAll();

      expect(runs.map((r) => r.runId)).toEqual(['newer001', 'older001']);
    });

    it('should skip directories without a valid index', async () => {
      await store.save(completedRun());
      await mkdir(join(root, 'stray'), { recursive: true });

      const runs = await store.listAll();

      expect(runs.map((r) => r.runId)).toEqual(['abc12345']);
    });

    it('should return an empty list when the root does not exist', async () => {
      const missing = new RunStore(join(root, 'does-not-exist'));

      expect(await missing.listAll()).toEqual([]);
    });
  });

  describe('sources', () => {
    it('should round-trip sources including resolved URLs', async () => {
      const sources: SourceMap = new Map([
        ['1', { title: 'One', url: 'https://one.example' }],
        ['2', { title: 'Two', url: 'https://wrapped.example', finalUrl: 'https://two.example' }],
      ]);

      await store.saveSources('abc12345', 1, sources);
      const loaded = await store.loadSources('abc12345', 1);
      const raw: unknown = JSON.parse(
        await readFile(join(root, 'abc12345', 'sources_v1.json'), 'utf-8')
      );

      expect(loaded).toEqual(sources);
      expect(raw).toEqual({
        '1': { title: 'One', url: 'https://one.example', final_url: null },
        '2': { title: 'Two', url: 'https://wrapped.example', final_url: 'https://two.example' },
      });
    });

    it('should return null when no sources were saved', async () => {
      expect(await store.loadSources('abc12345', 1)).toBeNull();
    });
  });

  describe('getReportPath', () => {
    it('should point at the latest report', async () => {
      await store.save(completedRun());

      expect(await store.getReportPath('abc12345')).toBe(join(root, 'abc12345', 'report_v1.md'));
    });

    it('should return null when no report was written', async () => {
      await store.save(completedRun({ status: 'running', reportMarkdown: null }));

      expect(await store.getReportPath('abc12345')).toBeNull();
    });
  });
});

describe('generateRunId', () => {
  it('should produce 8 lowercase hex characters', () => {
    expect(generateRunId()).toMatch(/^[0-9a-f]{8}$/);
  });
});
