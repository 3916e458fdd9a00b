// src/config/reportConfig.ts
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { InvalidInputError } from '../utils/errors';

export const DEFAULT_CONFIG_PATH = path.join(process.cwd(), 'config', 'report-config.json');

export const ReportConfigSchema = z.object({
  // Model
  modelId: z.string().min(1).default('patent-strategy-llm'),
  modelVersion: z.string().default('1.0.0'),
  maxContextTokens: z.number().int().positive().default(12000),
  maxOutputTokens: z.number().int().positive().default(4096),
  temperature: z.number().min(0).max(2).default(0.3),
  timeoutMs: z.number().int().positive().default(60000),
  // Prompt assembly
  defaultLanguage: z.string().min(1).default('en'),
  templateVersion: z.string().min(1).default('v1'),
  instructionReserveTokens: z.number().int().min(0).default(300),
  // Retrieval
  ragEnabled: z.boolean().default(true),
  ragTopK: z.number().int().positive().default(10),
  similarityThreshold: z.number().min(0).max(1).default(0.7),
  chunkSize: z.number().int().positive().default(512),
  chunkOverlap: z.number().int().default(64),
  rerankerMultiplier: z.number().int().positive().default(3),
  // 0 means "same as the query's topK"
  rerankerTopK: z.number().int().min(0).default(5),
  indexConcurrency: z.number().int().positive().default(8),
  contextTokenBudget: z.number().int().min(0).default(4000),
  // Report generation
  citationVerifyThreshold: z.number().min(0).max(1).default(0.8),
  citationVerifyTimeoutMs: z.number().int().positive().default(3000),
  streamFlushBytes: z.number().int().positive().default(1024),
  streamBufferSize: z.number().int().positive().default(16)
});

export type ReportConfig = z.infer<typeof ReportConfigSchema>;
export type ReportConfigOverrides = Partial<ReportConfig>;

type EnvKind = 'string' | 'number' | 'boolean';

const ENV_BINDINGS: Array<[string, keyof ReportConfig, EnvKind]> = [
  ['REPORT_MODEL_ID', 'modelId', 'string'],
  ['REPORT_MODEL_VERSION', 'modelVersion', 'string'],
  ['REPORT_MAX_CONTEXT_TOKENS', 'maxContextTokens', 'number'],
  ['REPORT_MAX_OUTPUT_TOKENS', 'maxOutputTokens', 'number'],
  ['REPORT_TIMEOUT_MS', 'timeoutMs', 'number'],
  ['REPORT_DEFAULT_LANGUAGE', 'defaultLanguage', 'string'],
  ['REPORT_TEMPLATE_VERSION', 'templateVersion', 'string'],
  ['LLM_TEMPERATURE', 'temperature', 'number'],
  ['RAG_ENABLED', 'ragEnabled', 'boolean'],
  ['RAG_TOP_K', 'ragTopK', 'number'],
  ['RAG_SIMILARITY_THRESHOLD', 'similarityThreshold', 'number'],
  ['RAG_CHUNK_SIZE', 'chunkSize', 'number'],
  ['RAG_CHUNK_OVERLAP', 'chunkOverlap', 'number'],
  ['RAG_RERANKER_MULTIPLIER', 'rerankerMultiplier', 'number'],
  ['RAG_RERANKER_TOP_K', 'rerankerTopK', 'number'],
  ['RAG_INDEX_CONCURRENCY', 'indexConcurrency', 'number'],
  ['RAG_CONTEXT_TOKEN_BUDGET', 'contextTokenBudget', 'number'],
  ['CITATION_VERIFY_THRESHOLD', 'citationVerifyThreshold', 'number'],
  ['CITATION_VERIFY_TIMEOUT_MS', 'citationVerifyTimeoutMs', 'number'],
  ['STREAM_FLUSH_BYTES', 'streamFlushBytes', 'number'],
  ['STREAM_BUFFER_SIZE', 'streamBufferSize', 'number']
];

let dotenvLoaded = false;

function parseEnvValue(raw: string, kind: EnvKind): unknown {
  switch (kind) {
    case 'number':
      return Number(raw.trim());
    case 'boolean': {
      const normalized = raw.trim().toLowerCase();
      if (normalized === 'true' || normalized === '1') return true;
      if (normalized === 'false' || normalized === '0') return false;
      return raw;
    }
    default:
      return raw;
  }
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [name, key, kind] of ENV_BINDINGS) {
    const raw = env[name];
    if (raw !== undefined && raw !== '') {
      values[key] = parseEnvValue(raw, kind);
    }
  }
  return values;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidInputError(`invalid config file ${configPath}: ${reason}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new InvalidInputError(`invalid config file ${configPath}: expected a JSON object`);
  }
  return { ...parsed };
}

function validate(raw: Record<string, unknown>): ReportConfig {
  const result = ReportConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidInputError(`invalid report configuration: ${details}`);
  }
  return result.data;
}

/**
 * Schema defaults only. No file or environment lookups.
 */
export function defaultReportConfig(): ReportConfig {
  return ReportConfigSchema.parse({});
}

/**
 * Defaults, then config/report-config.json, then environment, then overrides.
 */
export function loadReportConfig(
  overrides: ReportConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  configPath: string = DEFAULT_CONFIG_PATH
): ReportConfig {
  if (!dotenvLoaded) {
    dotenv.config();
    dotenvLoaded = true;
  }

  return validate({
    ...readConfigFile(configPath),
    ...readEnv(env),
    ...overrides
  });
}

/**
 * Fills a partial config (as accepted by service constructors) with defaults.
 */
export function resolveReportConfig(partial: ReportConfigOverrides = {}): ReportConfig {
  return validate({ ...partial });
}
