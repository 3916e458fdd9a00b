// src/tests/CitationExtractor.test.ts
import { classifyCitationSource, extractCitations, normalizeCitationSource } from '../services/report/CitationExtractor';

const TEXT =
  'Claims of US10000001B2 read on the product. See also US10000001B2, CN112345678A and EP1234567B1. ' +
  'Under MPEP § 2141 and 35 U.S.C. §103 the claims are obvious.';

describe('CitationExtractor', () => {
  it('should extract each supported scheme once in declaration order', () => {
    const citations = extractCitations(TEXT);

    expect(citations.map(c => [c.id, c.source, c.sourceType])).toEqual([
      ['cite-1', 'US10000001B2', 'Patent'],
      ['cite-2', 'CN112345678A', 'Patent'],
      ['cite-3', 'EP1234567B1', 'Patent'],
      ['cite-4', 'MPEP §2141', 'ExaminationGuideline'],
      ['cite-5', '35 U.S.C. §103', 'Statute']
    ]);
    expect(citations.every(c => c.verificationStatus === 'Unverified')).toBe(true);
  });

  it('should deduplicate a repeated patent number', () => {
    const citations = extractCitations('US10000001B2 is cited twice: US10000001B2.');
    expect(citations).toHaveLength(1);
  });

  it('should be idempotent', () => {
    expect(extractCitations(TEXT)).toEqual(extractCitations(TEXT));
  });

  it('should link patents only', () => {
    const [patent, , , mpep] = extractCitations(TEXT);
    expect(patent.url).toBe('https://patents.google.com/patent/US10000001B2');
    expect(mpep.url).toBeUndefined();
  });

  it('should return nothing for empty text', () => {
    expect(extractCitations('')).toEqual([]);
  });

  it('should classify free-form sources', () => {
    expect(classifyCitationSource('Amgen v. Sanofi')).toBe('CaseLaw');
    expect(classifyCitationSource('Smith et al., Journal of Medicinal Chemistry')).toBe('ScientificPaper');
    expect(classifyCitationSource('Chinese Patent Law Article 22')).toBe('Statute');
    expect(classifyCitationSource('internal memo')).toBe('Other');
  });

  it('should normalize sources for comparison', () => {
    expect(normalizeCitationSource('us 10000001 b2')).toBe('US10000001B2');
  });
});
