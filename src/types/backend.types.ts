// src/types/backend.types.ts

export type InputFormat = 'JSON' | 'Text';

export interface PredictRequest {
  modelName: string;
  modelVersion?: string;
  inputData: Buffer;
  inputFormat: InputFormat;
  metadata: Record<string, string>;
}

export interface PredictResponse {
  modelName: string;
  modelVersion?: string;
  /** Raw byte outputs keyed by name: `text` or `output`, plus token counts. */
  outputs: Record<string, Buffer>;
  inferenceTimeMs?: number;
  metadata?: Record<string, string>;
}

/**
 * Inference backend. Every call observes the abort signal.
 */
export interface ModelBackend {
  predict(req: PredictRequest, signal?: AbortSignal): Promise<PredictResponse>;
  predictStream(req: PredictRequest, signal?: AbortSignal): Promise<AsyncIterable<PredictResponse>>;
  healthy(signal?: AbortSignal): Promise<void>;
  close(): Promise<void>;
}
