// src/types/report.types.ts
import { AnalysisTask, OutputFormat, PromptParams } from './analysis.types';

export enum ExportFormat {
  JSON = 'json',
  Markdown = 'markdown',
  PDF = 'pdf',
  DOCX = 'docx'
}

export type CitationSourceType =
  | 'Patent'
  | 'CaseLaw'
  | 'ExaminationGuideline'
  | 'Statute'
  | 'ScientificPaper'
  | 'Other';

export type VerificationStatus = 'Unverified' | 'Verified' | 'NotFound';

export interface Citation {
  id: string;
  source: string;
  sourceType: CitationSourceType;
  verificationStatus: VerificationStatus;
  url?: string;
}

export interface ReportTable {
  title?: string;
  headers: string[];
  rows: string[][];
}

export interface ReportFigure {
  caption: string;
  url?: string;
}

export interface ReportSection {
  title: string;
  content: string;
  order: number;
  subSections?: ReportSection[];
  tables?: ReportTable[];
  figures?: ReportFigure[];
}

export interface Conclusion {
  statement: string;
  confidence?: number;
  supportingEvidence?: string[];
}

export type Priority = 'High' | 'Medium' | 'Low';

export interface Recommendation {
  action: string;
  priority: Priority;
  rationale?: string;
  timeline?: string;
}

export type RiskLevel = 'Critical' | 'High' | 'Medium' | 'Low' | 'Negligible';

export interface RiskFactor {
  description: string;
  likelihood: number;
  impact: number;
  score: number;
  mitigation?: string;
}

export interface RiskAssessment {
  overallLevel: RiskLevel;
  overallScore: number;
  factors: RiskFactor[];
}

export interface ReportContent {
  title: string;
  executiveSummary: string;
  sections: ReportSection[];
  conclusions: Conclusion[];
  recommendations: Recommendation[];
  riskAssessment?: RiskAssessment;
  citations: Citation[];
  rawOutput: string;
}

export interface ReportMetadata {
  modelId: string;
  modelVersion: string;
  requestId: string;
  ragEnabled: boolean;
  ragChunksUsed: number;
  rerankerApplied: boolean;
  promptTokensEstimate: number;
  truncationApplied: boolean;
  templateVersion: string;
}

export type ValidationIssueType =
  | 'missing_summary'
  | 'missing_sections'
  | 'missing_conclusions'
  | 'citation_not_found'
  | 'insufficient_length'
  | 'missing_content';

export type IssueSeverity = 'error' | 'warning' | 'info';

export interface ValidationIssue {
  issueType: ValidationIssueType;
  severity: IssueSeverity;
  description: string;
}

export interface CitationVerificationSummary {
  total: number;
  verifiedCount: number;
  notFoundCount: number;
  unverifiedCount: number;
}

export interface ReportValidation {
  isValid: boolean;
  qualityScore: number;
  structureScore: number;
  citationScore: number;
  lengthScore: number;
  actionabilityScore: number;
  issues: ValidationIssue[];
  citationVerification: CitationVerificationSummary;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface Report {
  reportId: string;
  task: AnalysisTask;
  content: ReportContent;
  metadata: ReportMetadata;
  validation?: ReportValidation;
  generatedAt: Date;
  latencyMs: number;
  tokensUsed: TokenUsage;
}

export interface ReportRequest {
  task: AnalysisTask;
  params?: PromptParams;
  outputFormat?: OutputFormat;
  qualityCheck?: boolean;
  requestId?: string;
  title?: string;
}

export interface ReportChunk {
  chunkIndex: number;
  content: string;
  sectionHint: string;
  isComplete: boolean;
  error?: string;
}
