// src/services/prompt/PromptManager.ts
import { ReportConfig, ReportConfigOverrides, resolveReportConfig } from '../../config/reportConfig';
import {
  AnalysisTask,
  BuiltPrompt,
  ClaimAnalysisContext,
  MoleculeContext,
  PatentContext,
  PriorArtContext,
  PromptParams,
  TemplateInfo,
  isAnalysisTask
} from '../../types/analysis.types';
import { RAGChunk } from '../../types/rag.types';
import { InvalidInputError } from '../../utils/errors';
import { Logger } from '../../utils/logger';
import { estimateTokens, truncateToTokens } from '../../utils/tokenEstimator';
import { formatContextEntry, sortByEffectiveScore } from '../rag/ContextBuilder';
import {
  detailInstruction,
  formatInstruction,
  jurisdictionInstructions,
  languageInstruction,
  taskInstruction
} from './instructions';
import { SYSTEM_PROMPT_TEMPLATES, systemTemplateName } from './systemPrompts';
import { TemplateRegistry, TemplateView } from './TemplateRegistry';

export type ContextSectionKey = 'molecule' | 'patents' | 'claims' | 'priorArt' | 'rag';

export interface ContextSection {
  key: ContextSectionKey;
  label: string;
  text: string;
  tokens: number;
}

export const SECTION_LABELS: Record<ContextSectionKey, string> = {
  molecule: 'Molecule Information',
  patents: 'Relevant Patents',
  claims: 'Claim Analysis',
  priorArt: 'Prior Art',
  rag: 'Retrieved Context (RAG)'
};

// Rendering order of the user prompt
export const DISPLAY_ORDER: ContextSectionKey[] = ['molecule', 'patents', 'claims', 'priorArt', 'rag'];

// Lowest priority first: the first section here is the first to be cut
export const TRUNCATION_ORDER: ContextSectionKey[] = ['rag', 'priorArt', 'patents', 'claims', 'molecule'];

function listLine(label: string, values?: string[]): string | undefined {
  return values && values.length > 0 ? `${label}: ${values.join(', ')}` : undefined;
}

function valueLine(label: string, value?: string): string | undefined {
  return value ? `${label}: ${value}` : undefined;
}

function compact(lines: Array<string | undefined>): string {
  return lines.filter((line): line is string => Boolean(line)).join('\n');
}

export function formatMolecule(molecule?: MoleculeContext): string {
  if (!molecule) return '';
  return compact([
    valueLine('Name', molecule.name),
    valueLine('SMILES', molecule.smiles),
    valueLine('Molecular Formula', molecule.molecularFormula),
    listLine('Targets', molecule.targets),
    listLine('Indications', molecule.indications),
    valueLine('Development Stage', molecule.developmentStage)
  ]);
}

export function formatPatents(patents: PatentContext[] = []): string {
  return patents
    .map(patent => {
      const header = patent.title ? `Patent ${patent.patentNumber}: ${patent.title}` : `Patent ${patent.patentNumber}`;
      const claims = (patent.keyClaims ?? []).map(claim => `  - ${claim}`);
      return compact([
        header,
        valueLine('  Applicant', patent.applicant),
        valueLine('  Priority Date', patent.priorityDate),
        valueLine('  Legal Status', patent.legalStatus),
        valueLine('  Abstract', patent.abstract),
        claims.length > 0 ? `  Key Claims:\n${claims.join('\n')}` : undefined
      ]);
    })
    .join('\n\n');
}

export function formatClaims(claims: ClaimAnalysisContext[] = []): string {
  return claims
    .map(claim => {
      const scope = claim.scopeScore !== undefined ? `, scope ${claim.scopeScore.toFixed(2)}` : '';
      const header = `Claim ${claim.claimNumber} (${claim.claimType}${scope})${claim.text ? `: ${claim.text}` : ''}`;
      return compact([header, claim.features.length > 0 ? `  Technical features: ${claim.features.join('; ')}` : undefined]);
    })
    .join('\n\n');
}

export function formatPriorArt(priorArt: PriorArtContext[] = []): string {
  return priorArt
    .map(item => `- [${item.sourceId}] ${item.description}${item.relevance ? ` (relevance: ${item.relevance})` : ''}`)
    .join('\n');
}

export function formatRagContext(chunks: RAGChunk[] = []): string {
  return sortByEffectiveScore(chunks).map(formatContextEntry).join('').trim();
}

export function buildContextSections(params: PromptParams): Record<ContextSectionKey, ContextSection> {
  const texts: Record<ContextSectionKey, string> = {
    molecule: formatMolecule(params.targetMolecule),
    patents: formatPatents(params.relevantPatents),
    claims: formatClaims(params.claimAnalysis),
    priorArt: formatPriorArt(params.priorArt),
    rag: formatRagContext(params.ragContext)
  };

  const section = (key: ContextSectionKey): ContextSection => ({
    key,
    label: SECTION_LABELS[key],
    text: texts[key],
    tokens: estimateTokens(texts[key])
  });

  return {
    molecule: section('molecule'),
    patents: section('patents'),
    claims: section('claims'),
    priorArt: section('priorArt'),
    rag: section('rag')
  };
}

/**
 * Cuts sections, lowest priority first, until their total fits `budget`.
 * A section that is smaller than the remaining excess is dropped whole;
 * otherwise it is shortened just enough. Returns whether anything was cut.
 */
export function fitSectionsToBudget(sections: Record<ContextSectionKey, ContextSection>, budget: number): boolean {
  const total = DISPLAY_ORDER.reduce((sum, key) => sum + sections[key].tokens, 0);
  let excess = total - Math.max(0, budget);
  if (excess <= 0) {
    return false;
  }

  for (const key of TRUNCATION_ORDER) {
    if (excess <= 0) break;
    const section = sections[key];
    if (section.tokens === 0) continue;

    if (section.tokens <= excess) {
      excess -= section.tokens;
      sections[key] = { ...section, text: '', tokens: 0 };
    } else {
      const text = truncateToTokens(section.text, section.tokens - excess);
      sections[key] = { ...section, text, tokens: estimateTokens(text) };
      excess = 0;
    }
  }
  return true;
}

export interface PromptManagerOptions {
  config?: ReportConfigOverrides;
  registry?: TemplateRegistry;
  logger?: Logger;
}

/**
 * Builds token-budgeted system and user prompts for each analysis task
 * and exposes the template registry the system prompts live in.
 */
export class PromptManager {
  private config: ReportConfig;
  private registry: TemplateRegistry;
  private logger: Logger;

  constructor(options: PromptManagerOptions = {}) {
    this.config = resolveReportConfig(options.config);
    this.registry = options.registry ?? new TemplateRegistry(this.config.templateVersion);
    this.logger = options.logger ?? new Logger('PromptManager');

    for (const [task, body] of Object.entries(SYSTEM_PROMPT_TEMPLATES)) {
      if (isAnalysisTask(task) && !this.registry.has(systemTemplateName(task))) {
        this.registry.register(systemTemplateName(task), body, {
          version: this.config.templateVersion,
          category: 'system'
        });
      }
    }
  }

  buildPrompt(task: AnalysisTask, params: PromptParams = {}): BuiltPrompt {
    const systemPrompt = this.getSystemPrompt(task, params.jurisdictionFocus);
    const query = params.userQuery ?? '';

    const systemTokens = estimateTokens(systemPrompt);
    const queryTokens = estimateTokens(query);
    const budget = Math.max(
      0,
      this.config.maxContextTokens - systemTokens - queryTokens - this.config.instructionReserveTokens
    );

    const sections = buildContextSections(params);
    const truncationApplied = fitSectionsToBudget(sections, budget);
    if (truncationApplied) {
      this.logger.info(`context truncated to ${budget} tokens for task ${task}`);
    }

    const blocks: string[] = [];
    for (const key of DISPLAY_ORDER) {
      const section = sections[key];
      if (section.text) {
        blocks.push(`## ${section.label}\n${section.text}`);
      }
    }
    blocks.push(`## Instructions\n${this.buildInstructions(task, params)}`);
    if (query) {
      blocks.push(`## User Query\n${query}`);
    }
    const userPrompt = blocks.join('\n\n');

    return {
      systemPrompt,
      userPrompt,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt }
      ],
      estimatedTokens: systemTokens + estimateTokens(userPrompt),
      truncationApplied,
      templateVersion: this.config.templateVersion
    };
  }

  getSystemPrompt(task: AnalysisTask, jurisdictionFocus: string[] = []): string {
    if (!isAnalysisTask(task)) {
      throw new InvalidInputError(`invalid analysis task: ${String(task)}`);
    }
    const jurisdictions = jurisdictionFocus.map(j => j.trim().toUpperCase()).filter(Boolean);
    return this.registry
      .render(systemTemplateName(task), { jurisdictions, hasJurisdictions: jurisdictions.length > 0 })
      .trim();
  }

  registerTemplate(name: string, body: string): void {
    this.registry.register(name, body, { version: this.config.templateVersion, category: 'custom' });
    this.logger.debug(`registered template ${name}`);
  }

  renderTemplate(name: string, data: TemplateView = {}): string {
    return this.registry.render(name, data);
  }

  listTemplates(): TemplateInfo[] {
    return this.registry.list();
  }

  estimateTokenCount(text: string): number {
    return estimateTokens(text);
  }

  private buildInstructions(task: AnalysisTask, params: PromptParams): string {
    return [
      taskInstruction(task),
      formatInstruction(params.outputFormat),
      languageInstruction(params.language || this.config.defaultLanguage),
      detailInstruction(params.detailLevel),
      ...jurisdictionInstructions(params.jurisdictionFocus)
    ].join('\n\n');
  }
}
