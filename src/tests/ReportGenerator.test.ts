// src/tests/ReportGenerator.test.ts
import { InMemoryReportMetrics } from '../services/metrics/ReportMetrics';
import { PromptManager } from '../services/prompt/PromptManager';
import { ReportGenerator, ReportRetriever } from '../services/report/ReportGenerator';
import { decodeMessages, encodeCount } from '../services/report/modelOutput';
import { AnalysisTask } from '../types/analysis.types';
import { ModelBackend, PredictRequest, PredictResponse } from '../types/backend.types';
import { RAGChunk, RAGQuery, RAGResult } from '../types/rag.types';
import { ExportFormat, ReportChunk } from '../types/report.types';
import { InvalidInputError, ReportGenerationError } from '../utils/errors';

const NARRATIVE_OUTPUT = [
  '# FTO Report',
  '',
  '## Executive Summary',
  'No blocking patents were found for compound X.',
  '',
  '## Analysis',
  'US10000001B2 has expired and US10000002B2 claims a different salt form.',
  '',
  '## Conclusions',
  '- Clear to proceed (confidence: 80%)',
  '',
  '## Recommendations',
  '- Monitor US10000002B2 for continuations'
].join('\n');

interface BackendScript {
  text?: string;
  error?: Error;
  pieces?: string[];
  streamError?: Error;
}

class FakeBackend implements ModelBackend {
  requests: PredictRequest[] = [];

  constructor(private script: BackendScript) {}

  async predict(req: PredictRequest): Promise<PredictResponse> {
    this.requests.push(req);
    if (this.script.error) {
      throw this.script.error;
    }
    return {
      modelName: req.modelName,
      outputs: {
        text: Buffer.from(this.script.text ?? '', 'utf-8'),
        prompt_tokens: encodeCount(120),
        completion_tokens: encodeCount(80)
      }
    };
  }

  async predictStream(req: PredictRequest): Promise<AsyncIterable<PredictResponse>> {
    this.requests.push(req);
    const pieces = this.script.pieces ?? [];
    const failure = this.script.streamError;
    async function* generate(): AsyncGenerator<PredictResponse> {
      for (const piece of pieces) {
        yield { modelName: req.modelName, outputs: { text: Buffer.from(piece, 'utf-8') } };
      }
      if (failure) {
        throw failure;
      }
    }
    return generate();
  }

  async healthy(): Promise<void> {}

  async close(): Promise<void> {}
}

const RAG_CHUNKS: RAGChunk[] = [
  {
    chunkId: 'c1',
    documentId: 'US9000001',
    content: 'Compound X is claimed in a crystalline salt form.',
    score: 0.82,
    rerankerScore: 0.95,
    source: 'Patent',
    metadata: {},
    tokenCount: 12
  },
  {
    chunkId: 'c2',
    documentId: 'US9000002',
    content: 'A method of synthesis using a palladium catalyst.',
    score: 0.78,
    rerankerScore: 0.6,
    source: 'Patent',
    metadata: {},
    tokenCount: 11
  }
];

class FakeRetriever implements ReportRetriever {
  lookups: string[] = [];

  constructor(
    private retrieval: RAGResult | Error,
    private citationScores: Record<string, number> = {}
  ) {}

  async retrieveAndRerank(): Promise<RAGResult> {
    if (this.retrieval instanceof Error) {
      throw this.retrieval;
    }
    return this.retrieval;
  }

  async retrieve(query: RAGQuery): Promise<RAGResult> {
    this.lookups.push(query.queryText);
    const score = this.citationScores[query.queryText] ?? 0;
    return {
      chunks: [{ ...RAG_CHUNKS[0], score, rerankerScore: undefined }],
      totalFound: 1,
      searchLatencyMs: 1,
      rerankerApplied: false
    };
  }
}

function rerankedResult(): RAGResult {
  return { chunks: RAG_CHUNKS, totalFound: 2, searchLatencyMs: 3, rerankerApplied: true };
}

async function collect(stream: AsyncIterable<ReportChunk>): Promise<ReportChunk[]> {
  const chunks: ReportChunk[] = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return chunks;
}

describe('ReportGenerator', () => {
  let metrics: InMemoryReportMetrics;

  beforeEach(() => {
    metrics = new InMemoryReportMetrics();
  });

  function generator(backend: ModelBackend, rag?: ReportRetriever): ReportGenerator {
    return new ReportGenerator({ backend, promptManager: new PromptManager(), rag, metrics });
  }

  describe('generateReport', () => {
    it('should fill report metadata from retrieval, prompt and model usage', async () => {
      const backend = new FakeBackend({ text: NARRATIVE_OUTPUT });
      const report = await generator(backend, new FakeRetriever(rerankedResult())).generateReport({
        task: AnalysisTask.FTO,
        requestId: 'req-42',
        params: { userQuery: 'Is compound X free to operate in the US?' }
      });

      expect(report.task).toBe(AnalysisTask.FTO);
      expect(report.content.title).toBe('FTO Report');
      expect(report.content.executiveSummary).toBe('No blocking patents were found for compound X.');
      expect(report.metadata).toMatchObject({
        modelId: 'patent-strategy-llm',
        modelVersion: '1.0.0',
        requestId: 'req-42',
        ragEnabled: true,
        ragChunksUsed: 2,
        rerankerApplied: true,
        truncationApplied: false,
        templateVersion: 'v1'
      });
      expect(report.metadata.promptTokensEstimate).toBeGreaterThan(0);
      expect(report.tokensUsed).toEqual({ promptTokens: 120, completionTokens: 80, totalTokens: 200 });
      expect(report.validation).toBeUndefined();
      expect(report.reportId).toMatch(/^[0-9a-f-]{36}$/);
      expect(metrics.snapshot().inference.fto).toMatchObject({ count: 1, failures: 0 });
    });

    it('should send the retrieved context and request metadata to the model', async () => {
      const backend = new FakeBackend({ text: NARRATIVE_OUTPUT });
      await generator(backend, new FakeRetriever(rerankedResult())).generateReport({
        task: AnalysisTask.FTO,
        requestId: 'req-7',
        params: { userQuery: 'Is compound X free to operate?' }
      });

      const [request] = backend.requests;
      expect(request.metadata).toEqual({
        task: 'fto',
        request_id: 'req-7',
        stream: 'false'
      });
      const messages = decodeMessages(request);
      expect(messages.map(m => m.role)).toEqual(['system', 'user']);
      expect(messages[1].content).toContain(
        '## Retrieved Context (RAG)\n[Patent US9000001]\nCompound X is claimed in a crystalline salt form.\n\n[Patent US9000002]\nA method of synthesis using a palladium catalyst.'
      );
    });

    it('should generate a new request id when none is given', async () => {
      const report = await generator(new FakeBackend({ text: NARRATIVE_OUTPUT })).generateReport({
        task: AnalysisTask.FTO
      });
      expect(report.metadata.requestId).toMatch(/^[0-9a-f-]{36}$/);
      expect(report.metadata.ragEnabled).toBe(false);
    });

    it('should continue without context when retrieval fails', async () => {
      const backend = new FakeBackend({ text: NARRATIVE_OUTPUT });
      const report = await generator(backend, new FakeRetriever(new Error('vector store offline'))).generateReport({
        task: AnalysisTask.FTO,
        params: { userQuery: 'Is compound X free to operate?' }
      });

      expect(report.metadata.ragEnabled).toBe(false);
      expect(report.metadata.ragChunksUsed).toBe(0);
      expect(report.metadata.rerankerApplied).toBe(false);
      expect(decodeMessages(backend.requests[0])[1].content).not.toContain('## Retrieved Context (RAG)');
    });

    it('should wrap model failures with the predict stage', async () => {
      const backend = new FakeBackend({ error: new Error('model offline') });
      const promise = generator(backend).generateReport({ task: AnalysisTask.FTO });

      await expect(promise).rejects.toThrow(ReportGenerationError);
      await expect(promise).rejects.toMatchObject({ stage: 'predict', message: 'predict failed: model offline' });
      expect(metrics.snapshot().inference.fto).toMatchObject({ count: 1, failures: 1 });
    });

    it('should degrade empty model output to an invalid single-section report', async () => {
      const report = await generator(new FakeBackend({ text: '  \n' })).generateReport({
        task: AnalysisTask.Valuation,
        qualityCheck: true
      });

      expect(report.content.sections).toEqual([{ title: 'Full Analysis', content: '', order: 1 }]);
      expect(report.content.executiveSummary).toBe('');
      expect(report.content.rawOutput).toBe('  \n');
      expect(report.validation?.isValid).toBe(false);
      expect(report.validation?.issues.map(i => i.issueType)).toEqual([
        'missing_summary',
        'missing_conclusions',
        'insufficient_length'
      ]);
      expect(metrics.snapshot().inference.valuation).toMatchObject({ count: 1, failures: 0 });
    });

    it('should reject a missing request', async () => {
      await expect(generator(new FakeBackend({ text: NARRATIVE_OUTPUT })).generateReport(undefined)).rejects.toThrow(
        InvalidInputError
      );
    });

    it('should verify citations and attach validation when a quality check is requested', async () => {
      const rag = new FakeRetriever(rerankedResult(), { US10000001B2: 0.9, US10000002B2: 0.1 });
      const report = await generator(new FakeBackend({ text: NARRATIVE_OUTPUT }), rag).generateReport({
        task: AnalysisTask.FTO,
        qualityCheck: true
      });

      expect(rag.lookups.sort()).toEqual(['US10000001B2', 'US10000002B2']);
      expect(report.content.citations.map(c => [c.source, c.verificationStatus])).toEqual([
        ['US10000001B2', 'Verified'],
        ['US10000002B2', 'NotFound']
      ]);
      expect(report.validation?.citationVerification).toEqual({
        total: 2,
        verifiedCount: 1,
        notFoundCount: 1,
        unverifiedCount: 0
      });
      expect(report.validation?.citationScore).toBe(0.5);
      expect(report.validation?.issues.map(i => i.issueType)).toContain('citation_not_found');
      expect(metrics.snapshot().qualityScores.fto).toHaveLength(1);
    });
  });

  describe('generateReportStream', () => {
    it('should flush on paragraph boundaries and end with one complete chunk', async () => {
      const backend = new FakeBackend({ pieces: ['## Analysis\n', 'First part.\n\n', '## Risks\n', 'tail'] });
      const stream = await generator(backend).generateReportStream({ task: AnalysisTask.FTO });
      const chunks = await collect(stream);

      expect(chunks).toEqual([
        { chunkIndex: 0, content: '## Analysis\nFirst part.\n\n', sectionHint: 'Analysis', isComplete: false },
        { chunkIndex: 1, content: '## Risks\ntail', sectionHint: 'Risks', isComplete: true }
      ]);
      expect(backend.requests[0].metadata.stream).toBe('true');
      expect(metrics.snapshot().inference.fto).toMatchObject({ count: 1, failures: 0 });
    });

    it('should report a mid-stream failure on the final chunk', async () => {
      const backend = new FakeBackend({ pieces: ['partial'], streamError: new Error('connection reset') });
      const chunks = await collect(await generator(backend).generateReportStream({ task: AnalysisTask.FTO }));

      expect(chunks).toEqual([
        { chunkIndex: 0, content: 'partial', sectionHint: '', isComplete: true, error: 'connection reset' }
      ]);
      expect(metrics.snapshot().inference.fto).toMatchObject({ count: 1, failures: 1 });
    });

    it('should stop early when the consumer breaks out', async () => {
      const pieces = ['one\n\n', 'two\n\n', 'three\n\n', 'four\n\n'];
      const stream = await generator(new FakeBackend({ pieces })).generateReportStream({ task: AnalysisTask.FTO });

      const seen: string[] = [];
      for await (const chunk of stream) {
        seen.push(chunk.content);
        break;
      }
      expect(seen).toEqual(['one\n\n']);
    });

    it('should end with one final chunk and close the model stream when cancelled', async () => {
      let upstreamClosed = false;
      const backend: ModelBackend = {
        predict: async () => {
          throw new Error('not used');
        },
        predictStream: async req => {
          async function* generate(): AsyncGenerator<PredictResponse> {
            try {
              for (let i = 0; i < 10; i++) {
                yield { modelName: req.modelName, outputs: { text: Buffer.from(`part ${i}\n\n`, 'utf-8') } };
              }
            } finally {
              upstreamClosed = true;
            }
          }
          return generate();
        },
        healthy: async () => {},
        close: async () => {}
      };
      const reports = new ReportGenerator({
        backend,
        promptManager: new PromptManager(),
        metrics,
        config: { streamBufferSize: 1 }
      });
      const controller = new AbortController();
      const stream = await reports.generateReportStream({ task: AnalysisTask.FTO }, controller.signal);

      // the producer is now blocked on a full buffer
      await new Promise(resolve => setTimeout(resolve, 10));
      controller.abort();
      await new Promise(resolve => setTimeout(resolve, 10));

      expect(upstreamClosed).toBe(true);
      expect(metrics.snapshot().inference.fto).toMatchObject({ count: 1, failures: 0 });
      expect(await collect(stream)).toEqual([
        { chunkIndex: 0, content: 'part 0\n\n', sectionHint: '', isComplete: false },
        { chunkIndex: 1, content: 'part 1\n\n', sectionHint: '', isComplete: true }
      ]);
    });
  });

  describe('validateReport', () => {
    it('should flag a missing report', async () => {
      const validation = await generator(new FakeBackend({})).validateReport(undefined);
      expect(validation.isValid).toBe(false);
      expect(validation.issues).toEqual([
        { issueType: 'missing_content', severity: 'error', description: 'report has no content' }
      ]);
    });

    it('should not modify the report it validates', async () => {
      const rag = new FakeRetriever(rerankedResult(), { US10000001B2: 0.9 });
      const reports = generator(new FakeBackend({ text: NARRATIVE_OUTPUT }), rag);
      const report = await reports.generateReport({ task: AnalysisTask.FTO });

      const validation = await reports.validateReport(report);
      expect(validation.citationVerification.verifiedCount).toBe(1);
      expect(report.content.citations.every(c => c.verificationStatus === 'Unverified')).toBe(true);
    });
  });

  it('should export through the report exporter', async () => {
    const reports = generator(new FakeBackend({ text: NARRATIVE_OUTPUT }));
    const report = await reports.generateReport({ task: AnalysisTask.FTO });
    const markdown = reports.exportReport(report, ExportFormat.Markdown).toString('utf-8');
    expect(markdown.startsWith('# FTO Report\n\n## Executive Summary\n\nNo blocking patents were found for compound X.\n')).toBe(true);
  });
});
