// src/services/report/modelOutput.ts
import { Message } from '../../types/analysis.types';
import { PredictRequest, PredictResponse } from '../../types/backend.types';
import { TokenUsage } from '../../types/report.types';

/** Model text from the `text` output, falling back to `output`. */
export function responseText(resp: PredictResponse): string {
  const bytes = resp.outputs.text ?? resp.outputs.output;
  return bytes ? bytes.toString('utf-8') : '';
}

function decodeCount(bytes: Buffer | undefined): number {
  if (!bytes) return 0;
  try {
    const value: unknown = JSON.parse(bytes.toString('utf-8'));
    return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? Math.floor(value) : 0;
  } catch {
    return 0;
  }
}

/**
 * Prompt, completion and total token counts. A missing total is the sum of
 * the other two; anything undecodable counts as 0.
 */
export function extractTokenUsage(resp: PredictResponse | undefined): TokenUsage {
  if (!resp) {
    return { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
  }
  const promptTokens = decodeCount(resp.outputs.prompt_tokens);
  const completionTokens = decodeCount(resp.outputs.completion_tokens);
  const total = resp.outputs.total_tokens ? decodeCount(resp.outputs.total_tokens) : 0;
  return {
    promptTokens,
    completionTokens,
    totalTokens: total > 0 ? total : promptTokens + completionTokens
  };
}

export function encodeCount(value: number): Buffer {
  return Buffer.from(JSON.stringify(value), 'utf-8');
}

export interface PredictRequestInit {
  modelName: string;
  modelVersion?: string;
  messages: Message[];
  task: string;
  requestId: string;
  stream: boolean;
}

export function buildPredictRequest(init: PredictRequestInit): PredictRequest {
  const metadata: Record<string, string> = {
    task: init.task,
    request_id: init.requestId,
    stream: String(init.stream)
  };

  return {
    modelName: init.modelName,
    modelVersion: init.modelVersion,
    inputData: Buffer.from(JSON.stringify({ messages: init.messages }), 'utf-8'),
    inputFormat: 'JSON',
    metadata
  };
}

function isMessage(value: unknown): value is Message {
  if (typeof value !== 'object' || value === null) return false;
  const role = Reflect.get(value, 'role');
  const content = Reflect.get(value, 'content');
  return (role === 'system' || role === 'user' || role === 'assistant') && typeof content === 'string';
}

/** Messages carried by a JSON request; a Text request is one user message. */
export function decodeMessages(req: PredictRequest): Message[] {
  const text = req.inputData.toString('utf-8');
  if (req.inputFormat === 'Text') {
    return [{ role: 'user', content: text }];
  }
  const parsed: unknown = JSON.parse(text);
  const messages = typeof parsed === 'object' && parsed !== null ? Reflect.get(parsed, 'messages') : undefined;
  if (!Array.isArray(messages) || !messages.every(isMessage)) {
    throw new Error('predict request carries no valid messages');
  }
  return messages;
}
