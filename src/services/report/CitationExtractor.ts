// src/services/report/CitationExtractor.ts
import { Citation, CitationSourceType } from '../../types/report.types';

interface CitationPattern {
  name: string;
  regex: RegExp;
  format?: (match: RegExpExecArray) => string;
}

// Declaration order is extraction order.
const CITATION_PATTERNS: CitationPattern[] = [
  { name: 'US', regex: /\bUS\s?(?:\d{4}\/\d{7}|\d{7,11})(?:\s?[ABE]\d?)?\b/g },
  { name: 'CN', regex: /\bCN\s?\d{8,12}(?:\.\d)?(?:\s?[ABCUY]\d?)?\b/g },
  { name: 'EP', regex: /\bEP\s?\d{6,7}(?:\s?[AB]\d?)?\b/g },
  { name: 'WO', regex: /\bWO\s?(?:\d{4}\/\d{5,6}|\d{10})(?:\s?A\d)?\b/g },
  { name: 'JP', regex: /\bJP\s?(?:\d{4}-?\d{6}|\d{7,10})(?:\s?[AB]\d?)?\b/g },
  {
    name: 'MPEP',
    regex: /\bMPEP\s*§?\s*(\d{3,4}(?:\.\d+)*)/g,
    format: match => `MPEP §${match[1]}`
  },
  {
    name: 'USC',
    regex: /\b(\d{1,2})\s*U\.S\.C\.\s*§*\s*(\d+[a-z]?)/g,
    format: match => `${match[1]} U.S.C. §${match[2]}`
  }
];

const PATENT_PREFIX = /^(US|CN|EP|WO|JP|KR|DE|GB|FR)\s?\d/i;

/** Key used for deduplication: uppercase, whitespace removed. */
export function normalizeCitationSource(source: string): string {
  return source.replace(/\s+/g, '').toUpperCase();
}

export function classifyCitationSource(source: string): CitationSourceType {
  if (PATENT_PREFIX.test(source)) {
    return 'Patent';
  }
  if (/MPEP|examination guideline|审查指南/i.test(source)) {
    return 'ExaminationGuideline';
  }
  if (/U\.S\.C\.|C\.F\.R\.|\bEPC\b|patent law|专利法/i.test(source)) {
    return 'Statute';
  }
  if (/\sv\.?\s|F\.\s?\d?d\b|F\.\s?Supp|S\.\s?Ct\./.test(source)) {
    return 'CaseLaw';
  }
  if (/\bdoi\b|journal|et al\./i.test(source)) {
    return 'ScientificPaper';
  }
  return 'Other';
}

export function citationUrl(source: string, type: CitationSourceType): string | undefined {
  if (type !== 'Patent') {
    return undefined;
  }
  return `https://patents.google.com/patent/${source.replace(/[\s/-]/g, '').toUpperCase()}`;
}

/**
 * Patent numbers, MPEP sections and U.S. Code sections found in `text`,
 * deduplicated on the normalized source. Every citation starts Unverified.
 */
export function extractCitations(text: string): Citation[] {
  const seen = new Set<string>();
  const citations: Citation[] = [];
  if (!text) {
    return citations;
  }

  for (const pattern of CITATION_PATTERNS) {
    const regex = new RegExp(pattern.regex.source, pattern.regex.flags);
    let match: RegExpExecArray | null;
    while ((match = regex.exec(text)) !== null) {
      const source = pattern.format ? pattern.format(match) : match[0].replace(/\s+/g, ' ').trim();
      const key = normalizeCitationSource(source);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);

      const sourceType = classifyCitationSource(source);
      citations.push({
        id: `cite-${citations.length + 1}`,
        source,
        sourceType,
        verificationStatus: 'Unverified',
        url: citationUrl(source, sourceType)
      });
    }
  }

  return citations;
}
