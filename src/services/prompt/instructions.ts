// src/services/prompt/instructions.ts
import { AnalysisTask, DetailLevel, OutputFormat } from '../../types/analysis.types';

const TASK_INSTRUCTIONS: Record<AnalysisTask, string> = {
  [AnalysisTask.FTO]:
    'Assess freedom to operate for the target molecule. Identify blocking patents, the claims that read on the target, their legal status and expiry, and feasible design-around options.',
  [AnalysisTask.InfringementRisk]:
    'Assess infringement risk claim by claim. For each risk, give its likelihood and impact and the claim elements it depends on.',
  [AnalysisTask.PatentLandscape]:
    'Summarise the patent landscape: leading assignees, technology clusters, filing trends and white spaces.',
  [AnalysisTask.PortfolioStrategy]:
    'Evaluate the portfolio and recommend concrete filing, maintenance and licensing actions with priorities.',
  [AnalysisTask.Valuation]:
    'Estimate the relative value of the patents and explain the legal, technical and commercial drivers.',
  [AnalysisTask.ClaimDrafting]:
    'Draft a claim set for the invention, starting with the broadest defensible independent claim.',
  [AnalysisTask.PriorArtSearch]:
    'Rank the most relevant prior art and map each reference to the claim features it discloses.',
  [AnalysisTask.OfficeActionResponse]:
    'Draft responses to each rejection with supporting arguments and proposed claim amendments.'
};

const FORMAT_INSTRUCTIONS: Record<OutputFormat, string> = {
  [OutputFormat.Structured]:
    'Respond with structured JSON only, using the keys: title, executive_summary, sections (title, content), conclusions (statement, confidence), recommendations (action, priority, rationale, timeline) and risk_assessment (overall_level, overall_score, factors).',
  [OutputFormat.Narrative]:
    'Write a narrative report using Markdown headings (## Heading) for each section, including an Executive Summary, Conclusions and Recommendations.',
  [OutputFormat.Bullet]:
    'Respond as a bullet list: the first bullet is a one-sentence summary, each following bullet is one key finding.'
};

const DETAIL_INSTRUCTIONS: Record<DetailLevel, string> = {
  [DetailLevel.Summary]: 'Keep the analysis at summary-level: a brief summary of the key findings only.',
  [DetailLevel.Standard]: 'Provide a standard level of detail covering each key finding with its reasoning.',
  [DetailLevel.Detailed]: 'Provide a detailed analysis, discussing each relevant patent and claim individually.',
  [DetailLevel.Expert]:
    'Provide an expert-level analysis for patent practitioners, with claim construction, statutory citations and case law where relevant.'
};

const JURISDICTION_NOTES: Record<string, string> = {
  US: 'For the US, apply 35 U.S.C. (§§101, 102, 103, 112 and 271), the MPEP and Federal Circuit case law.',
  CN: 'For China, apply the Chinese Patent Law (Articles 22, 26 and 59) and the CNIPA Patent Examination Guidelines.',
  EP: 'For Europe, apply the EPC (Articles 52 to 57 and 69) and EPO Boards of Appeal case law.',
  JP: 'For Japan, apply the Japanese Patent Act (Articles 29 and 70) and JPO Examination Guidelines.',
  KR: 'For Korea, apply the Korean Patent Act and KIPO Examination Guidelines.'
};

export function taskInstruction(task: AnalysisTask): string {
  return TASK_INSTRUCTIONS[task];
}

export function formatInstruction(format: OutputFormat = OutputFormat.Narrative): string {
  return FORMAT_INSTRUCTIONS[format] ?? FORMAT_INSTRUCTIONS[OutputFormat.Narrative];
}

export function languageInstruction(language: string): string {
  const normalized = language.trim().toLowerCase();
  if (normalized.startsWith('zh')) {
    return '请用中文回答。';
  }
  if (!normalized || normalized.startsWith('en')) {
    return 'Please respond in English.';
  }
  return `Please respond in the language with code "${language.trim()}".`;
}

export function detailInstruction(level: DetailLevel = DetailLevel.Standard): string {
  return DETAIL_INSTRUCTIONS[level] ?? DETAIL_INSTRUCTIONS[DetailLevel.Standard];
}

/**
 * Legal framework notes for each focus jurisdiction, plus a comparative
 * analysis request when more than one is given.
 */
export function jurisdictionInstructions(jurisdictions: string[] = []): string[] {
  const codes = [...new Set(jurisdictions.map(j => j.trim().toUpperCase()).filter(Boolean))];
  const notes = codes.map(code => JURISDICTION_NOTES[code] ?? `For ${code}, apply the national patent law of ${code}.`);
  if (codes.length > 1) {
    notes.push(`Provide a comparative analysis across ${codes.join(', ')}, highlighting where the outcome differs between jurisdictions.`);
  }
  return notes;
}
