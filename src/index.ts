// src/index.ts
export * from './types/rag.types';
export * from './types/backend.types';
export * from './types/analysis.types';
export * from './types/report.types';

export * from './config/reportConfig';
export * from './utils/errors';
export { Logger, describeError } from './utils/logger';
export { estimateTokens, truncateToTokens, extractTailTokens } from './utils/tokenEstimator';
export { BoundedChannel, Semaphore } from './utils/channel';
export { TimeoutError, withTimeout } from './utils/async';

export { DocumentChunker, ChunkerConfig, splitClaimsSection, splitClaims } from './services/rag/DocumentChunker';
export { buildContext, formatSourceAnnotation, effectiveScore } from './services/rag/ContextBuilder';
export { RagEngine, RagEngineOptions } from './services/rag/RagEngine';
export { InMemoryVectorStore, cosineSimilarity } from './services/rag/InMemoryVectorStore';
export { HashingEmbedder } from './services/rag/HashingEmbedder';

export { TemplateRegistry } from './services/prompt/TemplateRegistry';
export { PromptManager, PromptManagerOptions } from './services/prompt/PromptManager';

export { ReportGenerator, ReportGeneratorOptions, ReportRetriever } from './services/report/ReportGenerator';
export { parseLLMOutput, classifyRiskLevel, buildRiskAssessment } from './services/report/OutputParser';
export { extractCitations } from './services/report/CitationExtractor';
export {
  validateReportContent,
  verifyCitations,
  computeLengthScore,
  computeActionabilityScore,
  computeStructureScore,
  computeCitationScore
} from './services/report/QualityScorer';
export { exportReport, renderMarkdown, reportFromJSON } from './services/report/ReportExporter';
export { extractTokenUsage, buildPredictRequest } from './services/report/modelOutput';

export { ReportMetrics, NoopReportMetrics, InMemoryReportMetrics, MetricsSnapshot } from './services/metrics/ReportMetrics';

export { ChatModel, LangChainModelBackend } from './services/llm/LangChainModelBackend';
export { LangChainTextEmbedder } from './services/llm/LangChainTextEmbedder';
export { chatModelFromConfig, createChatModel, createEmbeddings, providerFromEnv, LLMProvider } from './services/llm/providers';
