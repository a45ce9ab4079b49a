import { chunkText, joinSentences, reassembleChunks, splitIntoChunks, splitSentences } from '../../src/pipeline/chunker';

describe('Chunker', () => {
  describe('splitSentences', () => {
    it('should keep terminal punctuation with each sentence', () => {
      expect(splitSentences('One. Two! Three? Four')).toEqual(['One.', 'Two!', 'Three?', 'Four']);
    });

    it('should split on full-width punctuation', () => {
      expect(splitSentences('你好。世界！')).toEqual(['你好。', '世界！']);
    });
  });

  describe('joinSentences', () => {
    it('should join with a space after half-width punctuation', () => {
      expect(joinSentences('One.', 'Two.')).toBe('One. Two.');
    });

    it('should join directly after full-width punctuation', () => {
      expect(joinSentences('你好。', '世界。')).toBe('你好。世界。');
    });

    it('should return the right side when the left is empty', () => {
      expect(joinSentences('', 'Two.')).toBe('Two.');
    });
  });

  describe('splitIntoChunks', () => {
    it('should return short text as a single chunk', () => {
      expect(splitIntoChunks('Short text.', 100)).toEqual(['Short text.']);
    });

    it('should return no chunks for blank text', () => {
      expect(splitIntoChunks('  \n ', 100)).toEqual([]);
    });

    it('should pack sentences greedily up to the budget', () => {
      expect(splitIntoChunks('One. Two. Three.', 10)).toEqual(['One. Two.', 'Three.']);
    });

    it('should pack full-width sentences without spaces', () => {
      expect(splitIntoChunks('你好。世界。再见。', 6)).toEqual(['你好。世界。', '再见。']);
    });

    it('should keep line breaks between sentences from different lines', () => {
      expect(splitIntoChunks('First line.\nSecond line.\nThird line here.', 30)).toEqual([
        'First line.\nSecond line.',
        'Third line here.',
      ]);
    });

    it('should cut an oversized sentence at whitespace', () => {
      expect(splitIntoChunks('alpha beta gamma delta', 11)).toEqual(['alpha beta', 'gamma delta']);
    });

    it('should cut hard when there is no whitespace', () => {
      expect(splitIntoChunks('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
    });

    it('should never produce a chunk over the budget', () => {
      const text = 'Lorem ipsum dolor sit amet. '.repeat(40) + 'Unbroken'.repeat(20);
      for (const chunk of splitIntoChunks(text, 50)) {
        expect(chunk.length).toBeLessThanOrEqual(50);
      }
    });

    it('should be deterministic', () => {
      const text = 'A first sentence. A second one! And a third? '.repeat(10);
      expect(splitIntoChunks(text, 40)).toEqual(splitIntoChunks(text, 40));
    });
  });

  describe('chunkText', () => {
    it('should record where each chunk attaches to the previous one', () => {
      expect(chunkText('Alpha beta. Gamma delta.\nEpsilon.', 12)).toEqual([
        { text: 'Alpha beta.', boundary: 'line' },
        { text: 'Gamma delta.', boundary: 'sentence' },
        { text: 'Epsilon.', boundary: 'line' },
      ]);
    });

    it('should mark the pieces of a cut sentence', () => {
      expect(chunkText('alpha beta gamma delta', 11).map(chunk => chunk.boundary)).toEqual(['line', 'word']);
      expect(chunkText('abcdefghij', 4).map(chunk => chunk.boundary)).toEqual(['line', 'split', 'split']);
    });

    const samples: Array<[string, number]> = [
      ['Alpha beta. Gamma delta.\nEpsilon.', 12],
      ['One. Two.\nThree.', 6],
      ['你好。世界！\n再见。', 4],
      ['Short one. This sentence is definitely longer than the budget allows.\nTail.', 20],
      ['Supercalifragilisticexpialidocious! Go. Now.\nNext line here.', 10],
      ['First line.\nSecond line has two sentences. Here is the second.\nThird.', 25],
      ['A first sentence. A second one! And a third? Then a fourth.', 18],
    ];

    it.each(samples)('should reassemble %j back into its lines', (text, budget) => {
      const chunks = chunkText(text, budget);
      for (const chunk of chunks) {
        expect(chunk.text.length).toBeLessThanOrEqual(budget);
      }

      const rebuilt = reassembleChunks(chunks.map((chunk, index) => ({
        index,
        sourceText: chunk.text,
        boundary: chunk.boundary,
      })));

      expect(rebuilt).toBe(text);
      expect(rebuilt.split('\n').map(splitSentences)).toEqual(text.split('\n').map(splitSentences));
    });
  });

  describe('reassembleChunks', () => {
    it('should rejoin translated chunks at their boundaries', () => {
      expect(reassembleChunks([
        { index: 2, sourceText: 'Three.', translatedText: 'Trois.', boundary: 'line' },
        { index: 0, sourceText: 'One.', translatedText: 'Un.', boundary: 'line' },
        { index: 1, sourceText: 'Two.', translatedText: 'Deux.', boundary: 'sentence' },
      ])).toBe('Un. Deux.\nTrois.');
    });

    it('should join translated texts in index order', () => {
      expect(reassembleChunks([
        { index: 1, sourceText: 'b', translatedText: 'B' },
        { index: 0, sourceText: 'a', translatedText: 'A' },
        { index: 2, sourceText: 'c' },
      ])).toBe('A\nB\nc');
    });
  });
});
