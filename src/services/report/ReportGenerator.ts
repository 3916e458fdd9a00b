// src/services/report/ReportGenerator.ts
import { randomUUID } from 'crypto';
import { ReportConfig, ReportConfigOverrides, resolveReportConfig } from '../../config/reportConfig';
import { AnalysisTask, BuiltPrompt, OutputFormat, PromptParams, describeTask, isAnalysisTask } from '../../types/analysis.types';
import { ModelBackend, PredictResponse } from '../../types/backend.types';
import { RAGQuery, RAGResult } from '../../types/rag.types';
import {
  Citation,
  ExportFormat,
  Report,
  ReportChunk,
  ReportContent,
  ReportRequest,
  ReportValidation
} from '../../types/report.types';
import { abortPromise, withTimeout } from '../../utils/async';
import { BoundedChannel } from '../../utils/channel';
import { InvalidInputError, ReportGenerationError } from '../../utils/errors';
import { Logger, describeError } from '../../utils/logger';
import { NoopReportMetrics, ReportMetrics } from '../metrics/ReportMetrics';
import { PromptManager } from '../prompt/PromptManager';
import { CitationRetriever, invalidReportValidation, validateReportContent, verifyCitations } from './QualityScorer';
import { degradedContent, parseLLMOutput } from './OutputParser';
import { buildPredictRequest, extractTokenUsage, responseText } from './modelOutput';
import { exportReport } from './ReportExporter';
import { detectSectionHint, shouldFlush } from './streaming';

/** Retrieval surface the generator needs; RagEngine satisfies it. */
export interface ReportRetriever extends CitationRetriever {
  retrieveAndRerank(query: RAGQuery, signal?: AbortSignal): Promise<RAGResult>;
}

export interface ReportGeneratorOptions {
  backend: ModelBackend;
  promptManager: PromptManager;
  rag?: ReportRetriever;
  metrics?: ReportMetrics;
  logger?: Logger;
  config?: ReportConfigOverrides;
}

interface PreparedRequest {
  task: AnalysisTask;
  requestId: string;
  outputFormat: OutputFormat;
  title: string;
  prompt: BuiltPrompt;
  ragUsed: boolean;
  ragChunksUsed: number;
  rerankerApplied: boolean;
}

/**
 * Drives one report: retrieval, prompt assembly, model call, parsing,
 * optional validation and metrics. Retrieval, parsing and validation
 * failures degrade; prompt and model failures are thrown.
 */
export class ReportGenerator {
  private backend: ModelBackend;
  private promptManager: PromptManager;
  private rag?: ReportRetriever;
  private metrics: ReportMetrics;
  private logger: Logger;
  private config: ReportConfig;

  constructor(options: ReportGeneratorOptions) {
    if (!options.backend) {
      throw new InvalidInputError('model backend is required');
    }
    if (!options.promptManager) {
      throw new InvalidInputError('prompt manager is required');
    }
    this.backend = options.backend;
    this.promptManager = options.promptManager;
    this.rag = options.rag;
    this.metrics = options.metrics ?? new NoopReportMetrics();
    this.logger = options.logger ?? new Logger('ReportGenerator');
    this.config = resolveReportConfig(options.config);
  }

  async generateReport(req: ReportRequest | undefined, signal?: AbortSignal): Promise<Report> {
    const start = Date.now();
    const prepared = await this.prepare(req, signal);

    let resp: PredictResponse;
    try {
      const predictRequest = this.predictRequest(prepared, false);
      resp = await withTimeout(s => this.backend.predict(predictRequest, s), this.config.timeoutMs, signal);
    } catch (error) {
      this.metrics.recordInference(prepared.task, Date.now() - start, false);
      this.logger.error(`model predict failed for request ${prepared.requestId}`, error);
      throw new ReportGenerationError('predict', error);
    }

    const raw = responseText(resp);
    let content: ReportContent;
    try {
      content = parseLLMOutput(raw, prepared.outputFormat, prepared.title);
    } catch (error) {
      this.logger.warn(`unusable model output for request ${prepared.requestId}: ${describeError(error)}`);
      content = degradedContent(raw, prepared.title);
    }

    let validation: ReportValidation | undefined;
    if (req?.qualityCheck) {
      try {
        const checked = await this.checkContent(content, signal);
        content = { ...content, citations: checked.citations };
        validation = checked.validation;
        this.metrics.recordReportQuality(prepared.task, validation.qualityScore);
      } catch (error) {
        this.logger.warn(`quality validation failed for request ${prepared.requestId}: ${describeError(error)}`);
      }
    }

    const latencyMs = Date.now() - start;
    this.metrics.recordInference(prepared.task, latencyMs, true);
    this.logger.info(`generated ${prepared.task} report for request ${prepared.requestId} in ${latencyMs}ms`);

    return {
      reportId: randomUUID(),
      task: prepared.task,
      content,
      metadata: {
        modelId: this.config.modelId,
        modelVersion: this.config.modelVersion,
        requestId: prepared.requestId,
        ragEnabled: prepared.ragUsed,
        ragChunksUsed: prepared.ragChunksUsed,
        rerankerApplied: prepared.rerankerApplied,
        promptTokensEstimate: prepared.prompt.estimatedTokens,
        truncationApplied: prepared.prompt.truncationApplied,
        templateVersion: prepared.prompt.templateVersion
      },
      ...(validation ? { validation } : {}),
      generatedAt: new Date(),
      latencyMs,
      tokensUsed: extractTokenUsage(resp)
    };
  }

  /**
   * Streams the model output as chunks. Flushes on paragraph boundaries or
   * when the buffer grows past `streamFlushBytes`; always ends with one
   * `isComplete` chunk carrying the unflushed remainder.
   */
  async generateReportStream(req: ReportRequest | undefined, signal?: AbortSignal): Promise<AsyncIterable<ReportChunk>> {
    const start = Date.now();
    const prepared = await this.prepare(req, signal);

    let stream: AsyncIterable<PredictResponse>;
    try {
      stream = await this.backend.predictStream(this.predictRequest(prepared, true), signal);
    } catch (error) {
      this.metrics.recordInference(prepared.task, Date.now() - start, false);
      this.logger.error(`model stream failed to open for request ${prepared.requestId}`, error);
      throw new ReportGenerationError('stream', error);
    }

    const channel = new BoundedChannel<ReportChunk>(this.config.streamBufferSize);
    this.pump(stream, channel, prepared, start, signal).catch(error =>
      this.logger.error(`stream producer stopped unexpectedly for request ${prepared.requestId}`, error)
    );
    return channel;
  }

  parseLLMOutput(raw: string, format: OutputFormat, title?: string): ReportContent {
    return parseLLMOutput(raw, format, title);
  }

  /**
   * Verifies citations against the retriever (when one is configured) and
   * scores the report. The report itself is not modified.
   */
  async validateReport(report: Report | undefined, signal?: AbortSignal): Promise<ReportValidation> {
    if (!report || !report.content) {
      return invalidReportValidation('report has no content');
    }
    const checked = await this.checkContent(report.content, signal);
    return checked.validation;
  }

  exportReport(report: Report | undefined, format: ExportFormat): Buffer {
    return exportReport(report, format);
  }

  private async checkContent(
    content: ReportContent,
    signal?: AbortSignal
  ): Promise<{ citations: Citation[]; validation: ReportValidation }> {
    const citations = this.rag
      ? await verifyCitations(content.citations, this.rag, {
          threshold: this.config.citationVerifyThreshold,
          timeoutMs: this.config.citationVerifyTimeoutMs,
          signal,
          logger: this.logger
        })
      : content.citations;
    return { citations, validation: validateReportContent({ ...content, citations }) };
  }

  private predictRequest(prepared: PreparedRequest, stream: boolean) {
    return buildPredictRequest({
      modelName: this.config.modelId,
      modelVersion: this.config.modelVersion,
      messages: prepared.prompt.messages,
      task: prepared.task,
      requestId: prepared.requestId,
      stream
    });
  }

  /** Retrieval (best effort) and prompt assembly shared by both entry points. */
  private async prepare(req: ReportRequest | undefined, signal?: AbortSignal): Promise<PreparedRequest> {
    if (!req) {
      throw new InvalidInputError('report request is required');
    }
    if (!isAnalysisTask(req.task)) {
      throw new InvalidInputError(`invalid analysis task: ${String(req.task)}`);
    }

    const requestId = req.requestId || randomUUID();
    const outputFormat = req.outputFormat ?? req.params?.outputFormat ?? OutputFormat.Narrative;
    const params: PromptParams = { ...(req.params ?? {}), outputFormat };

    let ragUsed = false;
    let ragChunksUsed = 0;
    let rerankerApplied = false;
    if (this.config.ragEnabled && this.rag && params.userQuery) {
      try {
        const result = await this.rag.retrieveAndRerank({ queryText: params.userQuery, topK: this.config.ragTopK }, signal);
        params.ragContext = [...(params.ragContext ?? []), ...result.chunks];
        ragUsed = true;
        ragChunksUsed = result.chunks.length;
        rerankerApplied = result.rerankerApplied;
      } catch (error) {
        this.logger.warn(`RAG retrieval failed for request ${requestId}, continuing without context: ${describeError(error)}`);
      }
    }

    let prompt: BuiltPrompt;
    try {
      prompt = this.promptManager.buildPrompt(req.task, params);
    } catch (error) {
      this.logger.error(`prompt build failed for request ${requestId}`, error);
      throw new ReportGenerationError('prompt', error);
    }

    return {
      task: req.task,
      requestId,
      outputFormat,
      title: req.title || describeTask(req.task),
      prompt,
      ragUsed,
      ragChunksUsed,
      rerankerApplied
    };
  }

  private async pump(
    stream: AsyncIterable<PredictResponse>,
    channel: BoundedChannel<ReportChunk>,
    prepared: PreparedRequest,
    start: number,
    signal?: AbortSignal
  ): Promise<void> {
    const iterator = stream[Symbol.asyncIterator]();
    const abort = signal ? abortPromise(signal) : undefined;
    let buffer = '';
    let chunkIndex = 0;
    let sectionHint = '';
    let failure: string | undefined;

    try {
      while (!channel.isClosed) {
        const pending = iterator.next();
        if (abort) {
          // the losing next() may still settle later
          pending.catch(error => this.logger.debug(`stream read after cancel: ${describeError(error)}`));
        }
        const next = abort ? await Promise.race([pending, abort.promise]) : await pending;
        if (next.done) {
          break;
        }

        const text = responseText(next.value);
        if (!text) {
          continue;
        }
        buffer += text;
        sectionHint = detectSectionHint(buffer) || sectionHint;

        if (shouldFlush(buffer, this.config.streamFlushBytes)) {
          const sent = await channel.send({ chunkIndex, content: buffer, sectionHint, isComplete: false }, signal);
          if (!sent) {
            // an undelivered flush rides on the final chunk
            break;
          }
          chunkIndex++;
          buffer = '';
        }
      }
    } catch (error) {
      if (signal?.aborted) {
        this.logger.info(`stream cancelled for request ${prepared.requestId}`);
      } else {
        failure = describeError(error);
        this.logger.warn(`model stream failed for request ${prepared.requestId}: ${failure}`);
      }
    } finally {
      abort?.dispose();
    }

    if (iterator.return) {
      const closing = iterator.return().catch(error =>
        this.logger.warn(`closing model stream failed: ${describeError(error)}`)
      );
      // a cancelled read may still hold the iterator; don't wait on it
      if (!signal?.aborted) {
        await closing;
      }
    }

    const final: ReportChunk = { chunkIndex, content: buffer, sectionHint, isComplete: true };
    if (failure) {
      final.error = failure;
    }
    channel.closeWith(final);
    this.metrics.recordInference(prepared.task, Date.now() - start, failure === undefined);
  }
}
