// src/tests/DocumentChunker.test.ts
import { DocumentChunker, splitClaims, splitClaimsSection, splitSentences } from '../services/rag/DocumentChunker';
import { Document } from '../types/rag.types';

const PATENT_TEXT = [
  'A compound for treating disease.',
  '',
  'The compound is stable.',
  '',
  'Claims',
  '1. A compound of formula I.',
  '2. The compound of claim 1, wherein R is methyl.',
  '3. A method of treating cancer',
  'comprising administering the compound.'
].join('\n');

function patent(content: string, metadata?: Record<string, string>): Document {
  return { documentId: 'P1', title: 'Test patent', content, source: 'Patent', metadata };
}

describe('DocumentChunker', () => {
  let chunker: DocumentChunker;

  beforeEach(() => {
    chunker = new DocumentChunker();
  });

  describe('configuration', () => {
    it('should default the chunk size to 512 tokens', () => {
      expect(chunker.chunkSize).toBe(512);
      expect(chunker.chunkOverlap).toBe(0);
    });

    it('should clamp overlap to a quarter of the size when too large', () => {
      expect(new DocumentChunker({ chunkSize: 100, chunkOverlap: 150 }).chunkOverlap).toBe(25);
      expect(new DocumentChunker({ chunkSize: 100, chunkOverlap: -5 }).chunkOverlap).toBe(0);
    });
  });

  describe('patent documents', () => {
    it('should produce one chunk per numbered claim in order', () => {
      const chunks = chunker.chunk(patent(PATENT_TEXT, { patent_number: 'US10000001B2' }));
      const claims = chunks.filter(c => c.metadata.section === 'claims');

      expect(claims.map(c => c.metadata.claim_number)).toEqual(['1', '2', '3']);
      expect(claims.map(c => c.chunkId)).toEqual(['P1-claim-1', 'P1-claim-2', 'P1-claim-3']);
      expect(claims[2].content).toBe('3. A method of treating cancer comprising administering the compound.');
      expect(claims[0].metadata.patent_number).toBe('US10000001B2');
    });

    it('should chunk the description before the claims', () => {
      const chunks = chunker.chunk(patent(PATENT_TEXT));

      expect(chunks[0].chunkId).toBe('P1-desc-0');
      expect(chunks[0].content).toBe('A compound for treating disease.\n\nThe compound is stable.');
      expect(chunks[0].metadata.section).toBe('description');
      expect(chunks.map(c => c.index)).toEqual([0, 1, 2, 3]);
    });

    it('should recognise Chinese claim headings', () => {
      const content = '本发明涉及一种化合物。\n\n权利要求书\n1、一种化合物。\n2、根据权利要求1所述的化合物。';
      const claims = chunker.chunk(patent(content)).filter(c => c.metadata.section === 'claims');

      expect(claims.map(c => c.metadata.claim_number)).toEqual(['1', '2']);
      expect(claims[0].content).toBe('1、一种化合物。');
    });

    it('should fall back to blank-line blocks when claims are not numbered', () => {
      expect(splitClaims('A compound.\n\nA method of use.')).toEqual([
        { text: 'A compound.' },
        { text: 'A method of use.' }
      ]);
    });

    it('should keep text that follows the claims heading on the same line', () => {
      const split = splitClaimsSection('Intro\nWhat is claimed is: 1. A widget.\n2. A gadget.');
      expect(split.description).toBe('Intro\n');
      expect(split.claims).toBe('1. A widget.\n2. A gadget.');
    });
  });

  describe('generic documents', () => {
    const doc = (content: string): Document => ({
      documentId: 'D1',
      title: 'Guideline',
      content,
      source: 'ExaminationGuideline'
    });

    it('should return no chunks for empty content', () => {
      expect(chunker.chunk(doc(''))).toEqual([]);
      expect(chunker.chunk(doc('   \n\n  '))).toEqual([]);
    });

    it('should pack paragraphs up to the chunk size', () => {
      const small = new DocumentChunker({ chunkSize: 10, chunkOverlap: 0 });
      const chunks = small.chunk(doc('aaaa bbbb cccc\n\ndddd eeee ffff\n\ngggg hhhh iiii'));

      expect(chunks.map(c => c.content)).toEqual(['aaaa bbbb cccc\n\ndddd eeee ffff', 'gggg hhhh iiii']);
      expect(chunks.map(c => c.chunkId)).toEqual(['D1-chunk-0', 'D1-chunk-1']);
      expect(chunks[0].tokenCount).toBe(8);
    });

    it('should seed the next chunk with the overlap tail', () => {
      const overlapping = new DocumentChunker({ chunkSize: 10, chunkOverlap: 2 });
      const chunks = overlapping.chunk(doc('aaaa bbbb cccc\n\ndddd eeee ffff\n\ngggg hhhh iiii'));

      expect(chunks[1].content).toBe('eee ffff\n\ngggg hhhh iiii');
    });

    it('should split an oversized paragraph into sentences', () => {
      const small = new DocumentChunker({ chunkSize: 5, chunkOverlap: 0 });
      const chunks = small.chunk(doc('One two three four. Five six seven eight. Nine ten.'));

      expect(chunks.map(c => c.content)).toEqual(['One two three four.', 'Five six seven eight.', 'Nine ten.']);
    });
  });

  describe('splitSentences', () => {
    it('should end sentences only before whitespace or end of text', () => {
      expect(splitSentences('Dose 2.5 mg. Twice daily!')).toEqual(['Dose 2.5 mg.', ' Twice daily!']);
    });
  });
});
