// src/utils/errors.ts

/**
 * Caller-supplied input is unusable. Never retried.
 */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export class TemplateNotFoundError extends Error {
  readonly templateName: string;

  constructor(templateName: string) {
    super(`Template ${templateName} not found`);
    this.name = 'TemplateNotFoundError';
    this.templateName = templateName;
  }
}

/**
 * The model answered with no text at all.
 */
export class EmptyModelOutputError extends Error {
  constructor(message = 'empty LLM output') {
    super(message);
    this.name = 'EmptyModelOutputError';
  }
}

export type GenerationStage = 'prompt' | 'predict' | 'stream';

/**
 * Hard failure of an upstream step, wrapped with the stage it happened in.
 */
export class ReportGenerationError extends Error {
  readonly stage: GenerationStage;
  readonly cause: unknown;

  constructor(stage: GenerationStage, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${stage} failed: ${reason}`);
    this.name = 'ReportGenerationError';
    this.stage = stage;
    this.cause = cause;
  }
}

export interface BatchFailure {
  documentId: string;
  error: Error;
}

export class BatchIndexError extends Error {
  readonly failures: BatchFailure[];
  readonly total: number;

  constructor(failures: BatchFailure[], total: number) {
    const details = failures.map(f => `${f.documentId}: ${f.error.message}`).join('; ');
    super(`batch index partial failure (${failures.length}/${total} failed): ${details}`);
    this.name = 'BatchIndexError';
    this.failures = failures;
    this.total = total;
  }
}

export class ExportFormatNotImplementedError extends Error {
  readonly format: string;

  constructor(format: string) {
    super(`export format ${format} not implemented`);
    this.name = 'ExportFormatNotImplementedError';
    this.format = format;
  }
}

export function isExportNotImplemented(error: unknown): error is ExportFormatNotImplementedError {
  return error instanceof ExportFormatNotImplementedError;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
