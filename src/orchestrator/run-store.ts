/**
 * Run data persistence.
 * Stores versioned prompts, reports, sources and the per-run index.
 */

import { readdir } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { customAlphabet } from 'nanoid';
import { RunStatus, type ResearchRun, type RunMetadata } from '../types/run.js';
import type { SourceMap } from '../types/citation.js';
import { RunPaths } from '../artifacts/paths.js';
import { readJson, writeJson, readText, writeText, fileExists } from '../artifacts/json.js';
import { createLogger } from '../utils/logger.js';
import {
  metadataRecordSchema,
  sourcesRecordSchema,
  toVersionRecord,
  toSourcesRecord,
  fromMetadataRecord,
  fromSourcesRecord,
  type MetadataRecord,
} from './persisted.js';

const log = createLogger('run-store');

const TOPIC_FALLBACK_LENGTH = 100;

/**
 * 8-character lowercase hex run ids.
 */
export const generateRunId = customAlphabet('0123456789abcdef', 8);

export class RunStore {
  private readonly paths: RunPaths;

  constructor(root: string) {
    this.paths = new RunPaths(root);
  }

  get root(): string {
    return this.paths.root;
  }

  /**
   * Save one run version: prompt, report when present, then the index entry.
   * Saving the same version again replaces its entry.
   */
  async save(run: ResearchRun): Promise<void> {
    await writeText(this.paths.promptPath(run.runId, run.version), run.promptText);

    if (run.reportMarkdown) {
      await writeText(this.paths.reportPath(run.runId, run.version), run.reportMarkdown);
    }

    await this.updateMetadata(run);
    log.debug({ runId: run.runId, version: run.version, status: run.status }, 'Run saved');
  }

  /**
   * Load the run index. Returns null when it is missing or unreadable.
   */
  async loadMetadata(runId: string): Promise<RunMetadata | null> {
    const record = await this.readMetadataRecord(runId);
    return record ? fromMetadataRecord(record) : null;
  }

  async loadLatest(runId: string): Promise<ResearchRun | null> {
    const meta = await this.loadMetadata(runId);
    if (!meta || meta.latestVersion === 0) {
      return null;
    }
    return this.hydrate(meta, meta.latestVersion);
  }

  /**
   * Load a specific version. Returns null when its prompt was never written.
   */
  async loadVersion(runId: string, version: number): Promise<ResearchRun | null> {
    const meta = await this.loadMetadata(runId);
    if (!meta) {
      return null;
    }
    return this.hydrate(meta, version);
  }

  /**
   * Index of every run, newest first.
   */
  async listAll(): Promise<RunMetadata[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(this.paths.root, { withFileTypes: true });
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const runs: RunMetadata[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory()) {
        continue;
      }
      const meta = await this.loadMetadata(entry.name);
      if (meta) {
        runs.push(meta);
      }
    }

    return runs.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async saveSources(runId: string, version: number, sources: SourceMap): Promise<void> {
    await writeJson(this.paths.sourcesPath(runId, version), toSourcesRecord(sources));
    log.debug({ runId, version, count: sources.size }, 'Sources saved');
  }

  async loadSources(runId: string, version: number): Promise<SourceMap | null> {
    const path = this.paths.sourcesPath(runId, version);
    const data = await this.readJsonSafely(path);
    if (data === null) {
      return null;
    }

    const result = sourcesRecordSchema.safeParse(data);
    if (!result.success) {
      log.warn({ runId, version, errors: result.error.errors }, 'Invalid sources file');
      return null;
    }
    return fromSourcesRecord(result.data);
  }

  /**
   * Path of a version's report (latest by default), or null if none was written.
   */
  async getReportPath(runId: string, version?: number): Promise<string | null> {
    let target = version;
    if (target === undefined) {
      const meta = await this.loadMetadata(runId);
      if (!meta) {
        return null;
      }
      target = meta.latestVersion;
    }
    const path = this.paths.reportPath(runId, target);
    return (await fileExists(path)) ? path : null;
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  private async hydrate(meta: RunMetadata, version: number): Promise<ResearchRun | null> {
    const promptText = await readText(this.paths.promptPath(meta.runId, version));
    if (promptText === null) {
      return null;
    }

    const reportMarkdown = await readText(this.paths.reportPath(meta.runId, version));
    const record = meta.versions.find((v) => v.version === version);

    return {
      runId: meta.runId,
      version,
      jobId: record?.jobId ?? null,
      promptText,
      reportMarkdown,
      status: record?.status ?? RunStatus.PENDING,
      createdAt: record?.createdAt ?? meta.createdAt,
      feedback: record?.feedback ?? null,
      previousJobId: record?.previousJobId ?? null,
      usage: record?.usage ?? null,
      inputs: record?.inputs ?? null,
      error: record?.error ?? null,
    };
  }

  private async updateMetadata(run: ResearchRun): Promise<void> {
    const topic = run.inputs ? run.inputs.topic : run.promptText.slice(0, TOPIC_FALLBACK_LENGTH);
    const existing = await this.readMetadataRecord(run.runId);

    const meta: MetadataRecord = existing ?? {
      run_id: run.runId,
      topic,
      created_at: run.createdAt.toISOString(),
      versions: [],
      latest_version: 0,
    };

    if (existing && run.inputs) {
      meta.topic = topic;
    }

    const record = toVersionRecord(run);
    const index = meta.versions.findIndex((v) => v.version === run.version);
    if (index >= 0) {
      meta.versions[index] = record;
    } else {
      meta.versions.push(record);
    }
    meta.latest_version = Math.max(...meta.versions.map((v) => v.version));

    await writeJson(this.paths.metadataPath(run.runId), meta);
  }

  private async readMetadataRecord(runId: string): Promise<MetadataRecord | null> {
    const data = await this.readJsonSafely(this.paths.metadataPath(runId));
    if (data === null) {
      return null;
    }

    const result = metadataRecordSchema.safeParse(data);
    if (!result.success) {
      log.warn({ runId, errors: result.error.errors }, 'Invalid run metadata');
      return null;
    }
    return result.data;
  }

  private async readJsonSafely(path: string): Promise<unknown> {
    try {
      return await readJson(path);
    } catch (error) {
      if (error instanceof SyntaxError) {
        log.warn({ path, err: error }, 'Unparseable JSON file');
        return null;
      }
      throw error;
    }
  }
}
