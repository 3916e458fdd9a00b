// src/services/llm/LangChainModelBackend.ts
import { AIMessage, AIMessageChunk, BaseMessage, HumanMessage, MessageContent, SystemMessage, UsageMetadata } from '@langchain/core/messages';
import { Message } from '../../types/analysis.types';
import { ModelBackend, PredictRequest, PredictResponse } from '../../types/backend.types';
import { Logger } from '../../utils/logger';
import { decodeMessages, encodeCount } from '../report/modelOutput';

/** The calls the backend makes on a LangChain chat model. Any BaseChatModel fits. */
export interface ChatModel {
  invoke(input: BaseMessage[], options?: { signal?: AbortSignal }): Promise<AIMessageChunk>;
  stream(input: BaseMessage[], options?: { signal?: AbortSignal }): Promise<AsyncIterable<AIMessageChunk>>;
}

export interface LangChainBackendOptions {
  /** Prompt sent by `healthy()`; when unset the check only confirms the backend is open. */
  healthCheckPrompt?: string;
  logger?: Logger;
}

/** Concatenated text parts of a LangChain message body. */
export function messageText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }
  return content
    .map(part => {
      const text = Reflect.get(part, 'text');
      return part.type === 'text' && typeof text === 'string' ? text : '';
    })
    .join('');
}

export function toLangChainMessages(messages: Message[]): BaseMessage[] {
  return messages.map(message => {
    switch (message.role) {
      case 'system':
        return new SystemMessage(message.content);
      case 'assistant':
        return new AIMessage(message.content);
      default:
        return new HumanMessage(message.content);
    }
  });
}

function usageOutputs(usage: UsageMetadata | undefined): Record<string, Buffer> {
  if (!usage) return {};
  return {
    prompt_tokens: encodeCount(usage.input_tokens),
    completion_tokens: encodeCount(usage.output_tokens),
    total_tokens: encodeCount(usage.total_tokens)
  };
}

/**
 * ModelBackend over any LangChain chat model. Request messages come from the
 * JSON input; the reply text and token usage are returned as byte outputs.
 */
export class LangChainModelBackend implements ModelBackend {
  private logger: Logger;
  private closed = false;

  constructor(
    private model: ChatModel,
    private options: LangChainBackendOptions = {}
  ) {
    this.logger = options.logger ?? new Logger('LangChainModelBackend');
  }

  async predict(req: PredictRequest, signal?: AbortSignal): Promise<PredictResponse> {
    this.ensureOpen();
    const start = Date.now();
    const reply = await this.model.invoke(toLangChainMessages(decodeMessages(req)), { signal });
    const inferenceTimeMs = Date.now() - start;
    this.logger.debug(`${req.modelName} replied in ${inferenceTimeMs}ms`);

    return {
      modelName: req.modelName,
      modelVersion: req.modelVersion,
      outputs: {
        text: Buffer.from(messageText(reply.content), 'utf-8'),
        ...usageOutputs(reply.usage_metadata)
      },
      inferenceTimeMs,
      metadata: req.metadata
    };
  }

  async predictStream(req: PredictRequest, signal?: AbortSignal): Promise<AsyncIterable<PredictResponse>> {
    this.ensureOpen();
    const stream = await this.model.stream(toLangChainMessages(decodeMessages(req)), { signal });

    async function* responses(): AsyncGenerator<PredictResponse> {
      for await (const chunk of stream) {
        yield {
          modelName: req.modelName,
          modelVersion: req.modelVersion,
          outputs: {
            text: Buffer.from(messageText(chunk.content), 'utf-8'),
            ...usageOutputs(chunk.usage_metadata)
          }
        };
      }
    }
    return responses();
  }

  async healthy(signal?: AbortSignal): Promise<void> {
    this.ensureOpen();
    if (this.options.healthCheckPrompt) {
      await this.model.invoke([new HumanMessage(this.options.healthCheckPrompt)], { signal });
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new Error('model backend is closed');
    }
  }
}
