// src/services/llm/providers.ts
import { ChatAnthropic } from '@langchain/anthropic';
import { Embeddings } from '@langchain/core/embeddings';
import { ChatGoogleGenerativeAI, GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import { ChatOpenAI, OpenAIEmbeddings } from '@langchain/openai';
import { ReportConfig } from '../../config/reportConfig';
import { InvalidInputError } from '../../utils/errors';
import { ChatModel } from './LangChainModelBackend';

export type LLMProvider = 'openai' | 'anthropic' | 'google';
export type EmbeddingProvider = 'openai' | 'google';

export const LLM_PROVIDERS: readonly LLMProvider[] = ['openai', 'anthropic', 'google'];

export interface ChatModelOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  apiKey?: string;
}

const DEFAULT_MODELS: Record<LLMProvider, string> = {
  openai: 'gpt-4o',
  anthropic: 'claude-3-5-sonnet-20240620',
  google: 'gemini-1.5-pro'
};

const DEFAULT_EMBEDDING_MODELS: Record<EmbeddingProvider, string> = {
  openai: 'text-embedding-3-small',
  google: 'text-embedding-004'
};

const API_KEY_ENV: Record<LLMProvider, string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  google: 'GOOGLE_API_KEY'
};

export function isLLMProvider(value: unknown): value is LLMProvider {
  return typeof value === 'string' && LLM_PROVIDERS.some(p => p === value);
}

/** Provider from LLM_PROVIDER, defaulting to openai. */
export function providerFromEnv(env: NodeJS.ProcessEnv = process.env): LLMProvider {
  const value = env.LLM_PROVIDER?.trim().toLowerCase();
  if (!value) return 'openai';
  if (!isLLMProvider(value)) {
    throw new InvalidInputError(`unsupported LLM provider: ${value}`);
  }
  return value;
}

function resolveApiKey(provider: LLMProvider, apiKey: string | undefined, env: NodeJS.ProcessEnv): string {
  const key = apiKey || env[API_KEY_ENV[provider]];
  if (!key) {
    throw new InvalidInputError(`no API key for ${provider}: set ${API_KEY_ENV[provider]}`);
  }
  return key;
}

export function createChatModel(
  provider: LLMProvider,
  options: ChatModelOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ChatModel {
  const apiKey = resolveApiKey(provider, options.apiKey, env);
  const model = options.model || env.LLM_MODEL || DEFAULT_MODELS[provider];
  const { temperature, maxTokens } = options;

  switch (provider) {
    case 'openai': {
      const chat: ChatModel = new ChatOpenAI({ apiKey, model, temperature, maxTokens });
      return chat;
    }
    case 'anthropic': {
      const chat: ChatModel = new ChatAnthropic({ apiKey, model, temperature, maxTokens });
      return chat;
    }
    case 'google': {
      const chat: ChatModel = new ChatGoogleGenerativeAI({ apiKey, model, temperature, maxOutputTokens: maxTokens });
      return chat;
    }
  }
}

/** Chat model for LLM_PROVIDER with the report config's sampling settings. */
export function chatModelFromConfig(
  config: Pick<ReportConfig, 'maxOutputTokens' | 'temperature'>,
  env: NodeJS.ProcessEnv = process.env
): ChatModel {
  return createChatModel(
    providerFromEnv(env),
    { temperature: config.temperature, maxTokens: config.maxOutputTokens },
    env
  );
}

export function createEmbeddings(
  provider: EmbeddingProvider,
  options: { model?: string; apiKey?: string } = {},
  env: NodeJS.ProcessEnv = process.env
): Embeddings {
  const apiKey = resolveApiKey(provider, options.apiKey, env);
  const model = options.model || env.EMBEDDING_MODEL || DEFAULT_EMBEDDING_MODELS[provider];

  switch (provider) {
    case 'openai':
      return new OpenAIEmbeddings({ apiKey, model });
    case 'google':
      return new GoogleGenerativeAIEmbeddings({ apiKey, model });
  }
}
