// src/types/analysis.types.ts
import { RAGChunk } from './rag.types';

export enum AnalysisTask {
  FTO = 'fto',
  InfringementRisk = 'infringement_risk',
  PatentLandscape = 'patent_landscape',
  PortfolioStrategy = 'portfolio_strategy',
  Valuation = 'valuation',
  ClaimDrafting = 'claim_drafting',
  PriorArtSearch = 'prior_art_search',
  OfficeActionResponse = 'office_action_response'
}

export enum OutputFormat {
  Structured = 'structured',
  Narrative = 'narrative',
  Bullet = 'bullet'
}

export enum DetailLevel {
  Summary = 'summary',
  Standard = 'standard',
  Detailed = 'detailed',
  Expert = 'expert'
}

export const ANALYSIS_TASKS: readonly AnalysisTask[] = Object.values(AnalysisTask);

const TASK_DESCRIPTIONS: Record<AnalysisTask, string> = {
  [AnalysisTask.FTO]: 'Freedom-to-Operate Analysis',
  [AnalysisTask.InfringementRisk]: 'Infringement Risk Assessment',
  [AnalysisTask.PatentLandscape]: 'Patent Landscape Analysis',
  [AnalysisTask.PortfolioStrategy]: 'Portfolio Strategy Review',
  [AnalysisTask.Valuation]: 'Patent Valuation',
  [AnalysisTask.ClaimDrafting]: 'Claim Drafting',
  [AnalysisTask.PriorArtSearch]: 'Prior Art Search',
  [AnalysisTask.OfficeActionResponse]: 'Office Action Response'
};

export function isAnalysisTask(value: unknown): value is AnalysisTask {
  return typeof value === 'string' && ANALYSIS_TASKS.some(task => task === value);
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && Object.values(OutputFormat).some(format => format === value);
}

export function describeTask(task: AnalysisTask): string {
  return TASK_DESCRIPTIONS[task];
}

export interface MoleculeContext {
  name: string;
  smiles?: string;
  molecularFormula?: string;
  targets?: string[];
  indications?: string[];
  developmentStage?: string;
}

export interface PatentContext {
  patentNumber: string;
  title?: string;
  abstract?: string;
  keyClaims?: string[];
  applicant?: string;
  priorityDate?: string;
  legalStatus?: string;
}

export type ClaimType = 'INDEPENDENT' | 'DEPENDENT' | 'METHOD' | 'PRODUCT' | 'USE';

export interface ClaimAnalysisContext {
  claimNumber: number;
  claimType: ClaimType;
  text?: string;
  scopeScore?: number;
  features: string[];
}

export interface PriorArtContext {
  sourceId: string;
  description: string;
  relevance?: string;
}

/**
 * Everything one prompt build needs. The query is never truncated.
 */
export interface PromptParams {
  targetMolecule?: MoleculeContext;
  relevantPatents?: PatentContext[];
  claimAnalysis?: ClaimAnalysisContext[];
  priorArt?: PriorArtContext[];
  ragContext?: RAGChunk[];
  userQuery?: string;
  outputFormat?: OutputFormat;
  language?: string;
  detailLevel?: DetailLevel;
  jurisdictionFocus?: string[];
}

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface BuiltPrompt {
  systemPrompt: string;
  userPrompt: string;
  messages: Message[];
  estimatedTokens: number;
  truncationApplied: boolean;
  templateVersion: string;
}

export type TemplateCategory = 'system' | 'custom';

export interface TemplateInfo {
  name: string;
  version: string;
  category: TemplateCategory;
}
