// src/tests/QualityScorer.test.ts
import {
  CitationRetriever,
  computeActionabilityScore,
  computeLengthScore,
  validateReportContent,
  verifyCitations
} from '../services/report/QualityScorer';
import { RAGQuery, RAGResult } from '../types/rag.types';
import { Citation, ReportContent } from '../types/report.types';

function citation(id: string, source: string, overrides: Partial<Citation> = {}): Citation {
  return { id, source, sourceType: 'Patent', verificationStatus: 'Unverified', ...overrides };
}

function resultWithScore(score: number): RAGResult {
  return {
    chunks: [
      { chunkId: 'k', documentId: 'd', content: 'match', score, source: 'Patent', metadata: {}, tokenCount: 2 }
    ],
    totalFound: 1,
    searchLatencyMs: 1,
    rerankerApplied: false
  };
}

class ScriptedRetriever implements CitationRetriever {
  queries: string[] = [];

  constructor(private scores: Record<string, number | Error | 'hang'>) {}

  async retrieve(query: RAGQuery): Promise<RAGResult> {
    this.queries.push(query.queryText);
    const outcome = this.scores[query.queryText];
    if (outcome instanceof Error) throw outcome;
    if (outcome === 'hang') return new Promise<RAGResult>(() => undefined);
    return resultWithScore(outcome ?? 0);
  }
}

const FULL_CONTENT: ReportContent = {
  title: 'Report',
  executiveSummary: 'a'.repeat(300),
  sections: [{ title: 'A', content: 'b'.repeat(300), order: 1 }],
  conclusions: [{ statement: 'c'.repeat(100) }],
  recommendations: [{ action: 'd'.repeat(100), priority: 'High', rationale: 'because', timeline: 'Q3' }],
  citations: [],
  rawOutput: ''
};

describe('QualityScorer', () => {
  describe('verifyCitations', () => {
    it('should verify, mark missing patents and leave the rest', async () => {
      const retriever = new ScriptedRetriever({
        US10000001B2: 0.9,
        US10000004B2: 0.5,
        'MPEP §2141': 0.5,
        US10000003B2: new Error('search offline')
      });
      const citations = [
        citation('cite-1', 'US10000001B2'),
        citation('cite-2', 'MPEP §2141', { sourceType: 'ExaminationGuideline' }),
        citation('cite-3', 'US10000002B2', { verificationStatus: 'Verified' }),
        citation('cite-4', 'US10000003B2'),
        citation('cite-5', 'US10000004B2')
      ];

      const verified = await verifyCitations(citations, retriever, { threshold: 0.8, timeoutMs: 1000 });

      expect(verified.map(c => c.verificationStatus)).toEqual([
        'Verified',
        'Unverified',
        'Verified',
        'Unverified',
        'NotFound'
      ]);
      expect(retriever.queries).not.toContain('US10000002B2');
      expect(citations[0].verificationStatus).toBe('Unverified');
    });

    it('should leave a citation unchanged when the lookup times out', async () => {
      const retriever = new ScriptedRetriever({ US10000001B2: 'hang' });
      const [result] = await verifyCitations([citation('cite-1', 'US10000001B2')], retriever, {
        threshold: 0.8,
        timeoutMs: 10
      });

      expect(result.verificationStatus).toBe('Unverified');
    });
  });

  describe('scores', () => {
    it('should step the length score', () => {
      expect(computeLengthScore(undefined)).toBe(0);
      expect(computeLengthScore(0)).toBe(0);
      expect(computeLengthScore(199)).toBe(0.2);
      expect(computeLengthScore(200)).toBe(0.4);
      expect(computeLengthScore(999)).toBe(0.6);
      expect(computeLengthScore(1500)).toBe(0.8);
      expect(computeLengthScore(2000)).toBe(1);
    });

    it('should score recommendation actionability', () => {
      expect(computeActionabilityScore([])).toBe(0.2);
      expect(computeActionabilityScore([{ action: 'File', priority: 'High' }])).toBeCloseTo(0.6);
      expect(
        computeActionabilityScore([
          { action: 'File', priority: 'High', rationale: 'broad', timeline: 'Q1' },
          { action: 'Wait', priority: 'Low' }
        ])
      ).toBeCloseTo(0.8);
    });
  });

  describe('validateReportContent', () => {
    it('should score a complete report', () => {
      const validation = validateReportContent(FULL_CONTENT);

      expect(validation.structureScore).toBe(1);
      expect(validation.citationScore).toBe(1);
      expect(validation.lengthScore).toBe(0.6);
      expect(validation.actionabilityScore).toBeCloseTo(1);
      expect(validation.qualityScore).toBeCloseTo(0.92);
      expect(validation.issues).toEqual([]);
      expect(validation.isValid).toBe(true);
    });

    it('should report every structural gap of an empty report', () => {
      const validation = validateReportContent({
        ...FULL_CONTENT,
        executiveSummary: '',
        sections: [],
        conclusions: [],
        recommendations: []
      });

      expect(validation.issues.map(i => i.issueType)).toEqual([
        'missing_summary',
        'missing_sections',
        'missing_conclusions',
        'insufficient_length'
      ]);
      expect(validation.structureScore).toBeCloseTo(0);
      expect(validation.qualityScore).toBeCloseTo(0.34);
      expect(validation.isValid).toBe(false);
    });

    it('should flag citations that were not found', () => {
      const validation = validateReportContent({
        ...FULL_CONTENT,
        citations: [
          citation('cite-1', 'US10000001B2', { verificationStatus: 'Verified' }),
          citation('cite-2', 'US10000009B2', { verificationStatus: 'NotFound' })
        ]
      });

      expect(validation.citationScore).toBe(0.5);
      expect(validation.citationVerification).toEqual({
        total: 2,
        verifiedCount: 1,
        notFoundCount: 1,
        unverifiedCount: 0
      });
      expect(validation.issues).toEqual([
        {
          issueType: 'citation_not_found',
          severity: 'warning',
          description: 'citation US10000009B2 could not be found in the knowledge base'
        }
      ]);
      expect(validation.isValid).toBe(true);
    });

    it('should mark missing content invalid', () => {
      const validation = validateReportContent(undefined);
      expect(validation.isValid).toBe(false);
      expect(validation.issues[0].issueType).toBe('missing_content');
    });
  });
});
