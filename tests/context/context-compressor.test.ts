import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  cleanContentText,
  compressContext,
  compressionStats,
  extractContentText,
  trimToLimit,
} from '@prepscout/agents';

describe('context compressor', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('cleanContentText', () => {
    it('drops tags and symbols and straightens quotes and dashes', () => {
      expect(cleanContentText('<p>It’s “quoted” — ok</p> <b>#tag</b> $5')).toBe(`It's "quoted" - ok tag 5`);
    });

    it('keeps accented and non-Latin letters', () => {
      expect(cleanContentText('Le café résumé.')).toBe('Le café résumé.');
      expect(cleanContentText('闭包是一个函数。')).toBe('闭包是一个函数');
    });
  });

  describe('extractContentText', () => {
    it('prefers a non-blank snippet over the body', () => {
      expect(extractContentText({ relevanceScore: 1, snippet: ' Short snippet ', body: 'Long body' })).toBe(
        'Short snippet',
      );
      expect(extractContentText({ relevanceScore: 1, snippet: '   ', body: 'Long body' })).toBe('Long body');
      expect(extractContentText({ relevanceScore: 1 })).toBe('');
    });
  });

  describe('trimToLimit', () => {
    it('returns short text unchanged', () => {
      expect(trimToLimit('Short.', 30)).toBe('Short.');
    });

    it('keeps whole sentences that fit', () => {
      expect(trimToLimit('First sentence here. Second sentence is longer.', 30)).toBe('First sentence here.');
    });

    it('hard-cuts with an ellipsis when no sentence fits', () => {
      expect(trimToLimit('a'.repeat(40), 20)).toBe(`${'a'.repeat(17)}...`);
    });

    it('never exceeds a limit too small for an ellipsis', () => {
      expect(trimToLimit('abcdef', 2)).toBe('ab');
      expect(trimToLimit('abcdef', 3)).toBe('abc');
      expect(trimToLimit('abcdef', 0)).toBe('');
    });
  });

  describe('compressContext', () => {
    it('drops items below the floor and labels the rest best first', () => {
      const result = compressContext([
        { relevanceScore: 0.5, body: 'Mid', source: 'Medium' },
        { relevanceScore: 0.1, body: 'Low', source: 'Reddit' },
        { relevanceScore: 0.9, body: 'High', source: 'GitHub' },
      ]);

      expect(result).toEqual({
        text: 'Source 1: High\n\nSource 2: Mid',
        originalCount: 3,
        acceptedCount: 2,
        estimatedTokens: 7,
        effectiveThreshold: 0.5,
        sourcesUsed: ['GitHub', 'Medium'],
      });
    });

    it('stops when the next piece does not fit and little room is left', () => {
      const body = 'x'.repeat(350);
      const result = compressContext(
        [
          { relevanceScore: 0.9, body },
          { relevanceScore: 0.8, body },
        ],
        { maxTokens: 100 },
      );
      expect(result.acceptedCount).toBe(1);
      expect(result.effectiveThreshold).toBe(0.9);
    });

    it('shortens the last piece to fit the remaining budget', () => {
      const body = 'y'.repeat(250);
      const result = compressContext(
        [
          { relevanceScore: 0.9, body },
          { relevanceScore: 0.9, body },
          { relevanceScore: 0.9, body },
        ],
        { maxTokens: 100 },
      );
      expect(result.acceptedCount).toBe(2);
      expect(result.text).toBe(`Source 1: ${'y'.repeat(250)}\n\nSource 2: ${'y'.repeat(100)}...`);
    });

    it('keeps the best item when it is written in a non-Latin script', () => {
      const result = compressContext([
        { relevanceScore: 0.9, body: '闭包是一个函数。' },
        { relevanceScore: 0.8, body: 'Le café résumé.' },
      ]);
      expect(result.text).toBe('Source 1: 闭包是一个函数\n\nSource 2: Le café résumé.');
      expect(result.acceptedCount).toBe(2);
      expect(result.effectiveThreshold).toBe(0.8);
    });

    it('keeps piece text within maxTokens × 4 for any mix of sizes and limits', () => {
      for (const count of [1, 7, 40]) {
        for (const size of [12, 260, 1500]) {
          for (const perItemCharLimit of [20, 350, 2000]) {
            for (const maxTokens of [30, 100, 500]) {
              const items = Array.from({ length: count }, (_, i) => ({
                relevanceScore: 1 - i / 100,
                body: `Item ${i} says hello. `.repeat(Math.ceil(size / 20)).slice(0, size),
              }));
              const result = compressContext(items, { maxTokens, perItemCharLimit });

              let overhead = 0;
              for (let i = 0; i < result.acceptedCount; i++) overhead += `Source ${i + 1}: `.length;
              overhead += Math.max(0, result.acceptedCount - 1) * 2;

              expect(result.text.length - overhead).toBeLessThanOrEqual(maxTokens * 4);
            }
          }
        }
      }
    });

    it('skips items with no text and labels missing sources Unknown', () => {
      const result = compressContext([
        { relevanceScore: 0.9, source: 'GitHub' },
        { relevanceScore: 0.6, body: 'Useful notes' },
      ]);
      expect(result.text).toBe('Source 1: Useful notes');
      expect(result.sourcesUsed).toEqual(['Unknown']);
      expect(result.effectiveThreshold).toBe(0.6);
    });

    it('returns an empty context when nothing qualifies', () => {
      expect(compressContext([{ relevanceScore: 0.1, body: 'x' }])).toEqual({
        text: '',
        originalCount: 1,
        acceptedCount: 0,
        estimatedTokens: 0,
        effectiveThreshold: 0.3,
        sourcesUsed: [],
      });
    });
  });

  describe('compressionStats', () => {
    it('reports sizes and distributions', () => {
      const items = [
        { relevanceScore: 0.9, body: 'abc', source: 'GitHub' },
        { relevanceScore: 0.5, body: 'defg', source: 'GitHub' },
        { relevanceScore: 0.1, body: 'h' },
      ];
      const stats = compressionStats(items, compressContext(items));

      expect(stats.originalChars).toBe(8);
      expect(stats.compressedChars).toBe(29);
      expect(stats.compressionRatio).toBeCloseTo(3.625);
      expect(stats.sizeReduction).toBeCloseTo(-262.5);
      expect(stats.originalPieces).toBe(3);
      expect(stats.compressedPieces).toBe(2);
      expect(stats.relevanceDistribution).toEqual({ high: 1, medium: 1, low: 1 });
      expect(stats.sourceDistribution).toEqual({ GitHub: 2, Unknown: 1 });
    });

    it('is all zeros for no input', () => {
      const stats = compressionStats([], compressContext([]));
      expect(stats.compressionRatio).toBe(0);
      expect(stats.sizeReduction).toBe(0);
      expect(stats.originalChars).toBe(0);
    });
  });
});
