import { byRelevance, byTextMatch, sumFound } from './result-merger';
import { ScoredHit, SearchHit } from './interfaces/search.interface';

const hit = (id: string, textMatchScore: number | bigint, vectorDistance?: number): SearchHit => ({
  document: { collection: 'c', id, extraFields: {} },
  textMatchScore: BigInt(textMatchScore),
  sourceCollection: 'c',
  ...(vectorDistance !== undefined && { vectorDistance }),
});

const scored = (id: string, relevance: number): ScoredHit => ({
  document: { collection: 'c', id, extraFields: {} },
  relevance,
});

describe('result merger', () => {
  describe('byTextMatch', () => {
    it('should order by text match descending', () => {
      const ordered = byTextMatch([hit('a', 5), hit('b', 10), hit('c', 8)]);

      expect(ordered.map(h => h.document.id)).toEqual(['b', 'c', 'a']);
    });

    it('should tell apart scores that differ only past double precision', () => {
      const ordered = byTextMatch([
        hit('lower', 578730123365187697n, 0.1),
        hit('higher', 578730123365187705n, 0.9),
      ]);

      expect(ordered.map(h => h.document.id)).toEqual(['higher', 'lower']);
    });

    it('should break ties by vector distance ascending', () => {
      const ordered = byTextMatch([hit('far', 7, 0.9), hit('near', 7, 0.1)]);

      expect(ordered.map(h => h.document.id)).toEqual(['near', 'far']);
    });

    it('should rank a missing distance after any real one', () => {
      const ordered = byTextMatch([hit('none', 7), hit('huge', 7, 5000)]);

      expect(ordered.map(h => h.document.id)).toEqual(['huge', 'none']);
    });

    it('should not modify its input', () => {
      const input = [hit('a', 1), hit('b', 2)];

      byTextMatch(input);

      expect(input.map(h => h.document.id)).toEqual(['a', 'b']);
    });
  });

  describe('byRelevance', () => {
    it('should order by relevance and keep input order for ties', () => {
      const ordered = byRelevance([scored('a', 10), scored('b', 50), scored('c', 10), scored('d', 50)]);

      expect(ordered.map(h => h.document.id)).toEqual(['b', 'd', 'a', 'c']);
    });
  });

  it('should sum the found counts', () => {
    expect(sumFound([{ found: 2 }, { found: 0 }, { found: 5 }])).toBe(7);
    expect(sumFound([])).toBe(0);
  });
});
