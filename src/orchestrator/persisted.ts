/**
 * On-disk shapes of the run index and sources blobs (snake_case), with
 * conversions to and from the in-memory types.
 */

import { z } from 'zod';
import {
  RunStatus,
  ResearchDepth,
  type RunInputs,
  type RunMetadata,
  type ResearchRun,
  type TokenUsage,
  type VersionRecord,
} from '../types/run.js';
import type { SourceMap } from '../types/citation.js';

const usageRecordSchema = z.object({
  prompt_tokens: z.number().int().nonnegative(),
  output_tokens: z.number().int().nonnegative(),
  total_tokens: z.number().int().nonnegative(),
  thinking_tokens: z.number().int().nonnegative().default(0),
});

const constraintsRecordSchema = z.object({
  timeframe: z.string().nullish(),
  region: z.string().nullish(),
  max_words: z.number().int().positive().nullish(),
  focus_areas: z.array(z.string()).nullish(),
  depth: z.nativeEnum(ResearchDepth).nullish(),
});

const inputsRecordSchema = z.object({
  topic: z.string(),
  constraints: constraintsRecordSchema.default({}),
  questions: z.array(z.string()).nullish(),
});

const versionRecordSchema = z.object({
  version: z.number().int().positive(),
  job_id: z.string().nullable(),
  created_at: z.string(),
  status: z.nativeEnum(RunStatus),
  feedback: z.string().nullable().default(null),
  previous_job_id: z.string().nullable().default(null),
  usage: usageRecordSchema.nullable().default(null),
  inputs: inputsRecordSchema.nullable().default(null),
  error: z.string().nullable().default(null),
});

export const metadataRecordSchema = z.object({
  run_id: z.string().min(1),
  topic: z.string(),
  created_at: z.string(),
  versions: z.array(versionRecordSchema),
  latest_version: z.number().int().nonnegative(),
});

export const sourcesRecordSchema = z.record(
  z.string(),
  z.object({
    title: z.string(),
    url: z.string(),
    final_url: z.string().nullish(),
  })
);

export type UsageRecord = z.infer<typeof usageRecordSchema>;
export type InputsRecord = z.infer<typeof inputsRecordSchema>;
export type VersionRecordData = z.infer<typeof versionRecordSchema>;
export type MetadataRecord = z.infer<typeof metadataRecordSchema>;
export type SourcesRecord = z.infer<typeof sourcesRecordSchema>;

// ============================================================================
// In-memory -> disk
// ============================================================================

export function toUsageRecord(usage: TokenUsage): UsageRecord {
  return {
    prompt_tokens: usage.promptTokens,
    output_tokens: usage.outputTokens,
    total_tokens: usage.totalTokens,
    thinking_tokens: usage.thinkingTokens,
  };
}

export function toInputsRecord(inputs: RunInputs): InputsRecord {
  const { constraints } = inputs;
  return {
    topic: inputs.topic,
    constraints: {
      timeframe: constraints.timeframe ?? null,
      region: constraints.region ?? null,
      max_words: constraints.maxWords ?? null,
      focus_areas: constraints.focusAreas ?? null,
      depth: constraints.depth ?? null,
    },
    questions: inputs.questions ?? null,
  };
}

export function toVersionRecord(run: ResearchRun): VersionRecordData {
  return {
    version: run.version,
    job_id: run.jobId,
    created_at: run.createdAt.toISOString(),
    status: run.status,
    feedback: run.feedback,
    previous_job_id: run.previousJobId,
    usage: run.usage ? toUsageRecord(run.usage) : null,
    inputs: run.inputs ? toInputsRecord(run.inputs) : null,
    error: run.error,
  };
}

export function toSourcesRecord(sources: SourceMap): SourcesRecord {
  const record: SourcesRecord = {};
  for (const [ordinal, source] of sources) {
    record[ordinal] = {
      title: source.title,
      url: source.url,
      final_url: source.finalUrl ?? null,
    };
  }
  return record;
}

// ============================================================================
// Disk -> in-memory
// ============================================================================

export function fromUsageRecord(record: UsageRecord): TokenUsage {
  return {
    promptTokens: record.prompt_tokens,
    outputTokens: record.output_tokens,
    totalTokens: record.total_tokens,
    thinkingTokens: record.thinking_tokens,
  };
}

export function fromInputsRecord(record: InputsRecord): RunInputs {
  const { constraints } = record;
  const inputs: RunInputs = {
    topic: record.topic,
    constraints: {
      ...(constraints.timeframe ? { timeframe: constraints.timeframe } : {}),
      ...(constraints.region ? { region: constraints.region } : {}),
      ...(constraints.max_words ? { maxWords: constraints.max_words } : {}),
      ...(constraints.focus_areas ? { focusAreas: constraints.focus_areas } : {}),
      ...(constraints.depth ? { depth: constraints.depth } : {}),
    },
  };
  if (record.questions) {
    inputs.questions = record.questions;
  }
  return inputs;
}

export function fromVersionRecord(record: VersionRecordData): VersionRecord {
  return {
    version: record.version,
    jobId: record.job_id,
    createdAt: new Date(record.created_at),
    status: record.status,
    feedback: record.feedback,
    previousJobId: record.previous_job_id,
    usage: record.usage ? fromUsageRecord(record.usage) : null,
    inputs: record.inputs ? fromInputsRecord(record.inputs) : null,
    error: record.error,
  };
}

export function fromMetadataRecord(record: MetadataRecord): RunMetadata {
  return {
    runId: record.run_id,
    topic: record.topic,
    createdAt: new Date(record.created_at),
    versions: record.versions.map(fromVersionRecord),
    latestVersion: record.latest_version,
  };
}

export function fromSourcesRecord(record: SourcesRecord): SourceMap {
  const sources: SourceMap = new Map();
  for (const [ordinal, source] of Object.entries(record)) {
    sources.set(ordinal, {
      title: source.title,
      url: source.url,
      ...(source.final_url ? { finalUrl: source.final_url } : {}),
    });
  }
  return sources;
}
