// src/services/report/QualityScorer.ts
import { RAGQuery, RAGResult } from '../../types/rag.types';
import {
  Citation,
  CitationVerificationSummary,
  Recommendation,
  ReportContent,
  ReportSection,
  ReportValidation,
  ValidationIssue
} from '../../types/report.types';
import { withTimeout } from '../../utils/async';
import { Logger, describeError } from '../../utils/logger';
import { effectiveScore } from '../rag/ContextBuilder';

export const QUALITY_WEIGHTS = {
  structure: 0.3,
  citations: 0.3,
  length: 0.2,
  actionability: 0.2
} as const;

export const VALIDITY_THRESHOLD = 0.5;

/** Anything that can look a citation up; RagEngine satisfies it. */
export interface CitationRetriever {
  retrieve(query: RAGQuery, signal?: AbortSignal): Promise<RAGResult>;
}

export interface VerifyOptions {
  threshold: number;
  timeoutMs: number;
  topK?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Looks every unverified citation up concurrently. A lookup whose best
 * match reaches `threshold` verifies the citation; a patent with no such
 * match becomes NotFound. Verified citations are never downgraded, and a
 * failed lookup leaves the status unchanged.
 */
export async function verifyCitations(
  citations: Citation[],
  retriever: CitationRetriever,
  options: VerifyOptions
): Promise<Citation[]> {
  const logger = options.logger ?? new Logger('CitationVerifier');

  return Promise.all(
    citations.map(async (citation): Promise<Citation> => {
      if (citation.verificationStatus === 'Verified') {
        return citation;
      }
      try {
        const result = await withTimeout(
          signal => retriever.retrieve({ queryText: citation.source, topK: options.topK ?? 3 }, signal),
          options.timeoutMs,
          options.signal
        );
        const best = result.chunks.reduce((max, chunk) => Math.max(max, effectiveScore(chunk)), 0);
        if (result.chunks.length > 0 && best >= options.threshold) {
          return { ...citation, verificationStatus: 'Verified' };
        }
        if (citation.sourceType === 'Patent') {
          return { ...citation, verificationStatus: 'NotFound' };
        }
        return citation;
      } catch (error) {
        logger.warn(`citation lookup failed for ${citation.source}: ${describeError(error)}`);
        return citation;
      }
    })
  );
}

export function summarizeCitations(citations: Citation[]): CitationVerificationSummary {
  const count = (status: Citation['verificationStatus']) =>
    citations.filter(c => c.verificationStatus === status).length;
  return {
    total: citations.length,
    verifiedCount: count('Verified'),
    notFoundCount: count('NotFound'),
    unverifiedCount: count('Unverified')
  };
}

function sectionTextLength(sections: ReportSection[] = []): number {
  return sections.reduce(
    (sum, section) => sum + section.content.trim().length + sectionTextLength(section.subSections),
    0
  );
}

/** Characters of report prose: summary, sections, conclusions and recommendations. */
export function contentLength(content: ReportContent): number {
  return (
    content.executiveSummary.trim().length +
    sectionTextLength(content.sections) +
    content.conclusions.reduce((sum, c) => sum + c.statement.length, 0) +
    content.recommendations.reduce((sum, r) => sum + r.action.length, 0)
  );
}

export function computeLengthScore(chars: number | undefined): number {
  if (chars === undefined || chars <= 0) return 0;
  if (chars < 200) return 0.2;
  if (chars < 500) return 0.4;
  if (chars < 1000) return 0.6;
  if (chars < 2000) return 0.8;
  return 1.0;
}

export function computeActionabilityScore(recommendations: Recommendation[]): number {
  if (recommendations.length === 0) {
    return 0.2;
  }
  const total = recommendations.reduce((sum, rec) => {
    let score = 0;
    if (rec.action.trim()) score += 0.4;
    if (rec.priority) score += 0.2;
    if (rec.rationale?.trim()) score += 0.2;
    if (rec.timeline?.trim()) score += 0.2;
    return sum + score;
  }, 0);
  return total / recommendations.length;
}

export function computeStructureScore(content: ReportContent, issues: ValidationIssue[] = []): number {
  let score = 1.0;
  if (!content.executiveSummary.trim()) {
    score -= 0.4;
    issues.push({ issueType: 'missing_summary', severity: 'error', description: 'report has no executive summary' });
  }
  if (content.sections.length === 0) {
    score -= 0.3;
    issues.push({ issueType: 'missing_sections', severity: 'error', description: 'report has no sections' });
  }
  if (content.conclusions.length === 0) {
    score -= 0.3;
    issues.push({ issueType: 'missing_conclusions', severity: 'warning', description: 'report has no conclusions' });
  }
  return Math.max(0, score);
}

export function computeCitationScore(citations: Citation[]): number {
  if (citations.length === 0) {
    return 1.0;
  }
  return summarizeCitations(citations).verifiedCount / citations.length;
}

export function invalidReportValidation(description: string): ReportValidation {
  return {
    isValid: false,
    qualityScore: 0,
    structureScore: 0,
    citationScore: 0,
    lengthScore: 0,
    actionabilityScore: 0,
    issues: [{ issueType: 'missing_content', severity: 'error', description }],
    citationVerification: { total: 0, verifiedCount: 0, notFoundCount: 0, unverifiedCount: 0 }
  };
}

/**
 * Weighted quality score over structure, citation verification, length
 * and recommendation actionability. Citation statuses are taken as given.
 */
export function validateReportContent(content: ReportContent | undefined): ReportValidation {
  if (!content) {
    return invalidReportValidation('report has no content');
  }

  const issues: ValidationIssue[] = [];
  const structureScore = computeStructureScore(content, issues);
  const citationScore = computeCitationScore(content.citations);

  const chars = contentLength(content);
  const lengthScore = computeLengthScore(chars);
  if (chars < 200) {
    issues.push({
      issueType: 'insufficient_length',
      severity: 'warning',
      description: `report content is only ${chars} characters`
    });
  }

  for (const citation of content.citations) {
    if (citation.verificationStatus === 'NotFound') {
      issues.push({
        issueType: 'citation_not_found',
        severity: 'warning',
        description: `citation ${citation.source} could not be found in the knowledge base`
      });
    }
  }

  const actionabilityScore = computeActionabilityScore(content.recommendations);
  const qualityScore =
    QUALITY_WEIGHTS.structure * structureScore +
    QUALITY_WEIGHTS.citations * citationScore +
    QUALITY_WEIGHTS.length * lengthScore +
    QUALITY_WEIGHTS.actionability * actionabilityScore;

  return {
    isValid: issues.length === 0 || qualityScore >= VALIDITY_THRESHOLD,
    qualityScore,
    structureScore,
    citationScore,
    lengthScore,
    actionabilityScore,
    issues,
    citationVerification: summarizeCitations(content.citations)
  };
}
