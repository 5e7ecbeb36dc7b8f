import { EvaluationItem } from '../types/ranking.types';
import { EvaluationMetricsService } from './evaluation-metrics.service';

function rated(
  modelScore: number | null,
  humanRating: number | null,
  extra: Partial<EvaluationItem> = {},
): EvaluationItem {
  return { modelScore, humanRating, ...extra };
}

describe('EvaluationMetricsService', () => {
  let service: EvaluationMetricsService;

  beforeEach(() => {
    service = new EvaluationMetricsService();
  });

  describe('spearman', () => {
    it('is 1 for the same ordering and -1 for the reverse', () => {
      expect(
        service.spearman([rated(10, 0), rated(20, 1), rated(30, 2), rated(40, 3)])
          .rho,
      ).toBeCloseTo(1);
      expect(
        service.spearman([rated(10, 3), rated(20, 2), rated(30, 1), rated(40, 0)])
          .rho,
      ).toBeCloseTo(-1);
    });

    it('gives tied values their average rank', () => {
      const result = service.spearman([
        rated(10, 0),
        rated(20, 1),
        rated(20, 1),
        rated(40, 3),
      ]);

      expect(result.rho).toBeCloseTo(1);
      expect(result.n).toBe(4);
    });

    it('is null below three pairs or for a constant series', () => {
      expect(service.spearman([rated(10, 0), rated(20, 1), rated(null, 2)])).toEqual({
        rho: null,
        n: 2,
      });
      expect(
        service.spearman([rated(10, 2), rated(20, 2), rated(30, 2)]).rho,
      ).toBeNull();
    });
  });

  describe('ndcgAtK', () => {
    it('is 1 for a perfect ordering', () => {
      const result = service.ndcgAtK(
        [rated(90, 3), rated(70, 2), rated(50, 0)],
        3,
      );

      expect(result.ndcg).toBeCloseTo(1);
      expect(result.nItems).toBe(3);
    });

    it('is below 1 for an inverted ordering', () => {
      const result = service.ndcgAtK(
        [rated(90, 0), rated(70, 2), rated(50, 3)],
        3,
      );

      expect(result.dcg).toBeCloseTo(3 / Math.log2(3) + 7 / 2);
      expect(result.idcg).toBeCloseTo(7 + 3 / Math.log2(3));
      expect(result.ndcg).toBeLessThan(1);
    });

    it('prefers an explicit relevance label over the rating', () => {
      const result = service.ndcgAtK(
        [rated(90, 0, { relevanceLabel: 3 }), rated(10, 3, { relevanceLabel: 0 })],
        2,
      );

      expect(result.ndcg).toBeCloseTo(1);
    });

    it('is 0 when nothing is relevant and null with no items', () => {
      expect(service.ndcgAtK([rated(50, 0), rated(40, 0)], 5).ndcg).toBe(0);
      expect(service.ndcgAtK([], 5)).toEqual({
        ndcg: null,
        dcg: null,
        idcg: null,
        k: 5,
        nItems: 0,
      });
    });
  });

  describe('recallAtK', () => {
    it('counts relevant items in the model top k', () => {
      const result = service.recallAtK(
        [rated(95, 3), rated(90, 1), rated(80, 3), rated(20, 3), rated(10, 0)],
        2,
      );

      expect(result).toEqual({
        recall: 1 / 3,
        hits: 1,
        totalRelevant: 3,
        k: 2,
      });
    });

    it('is null when no item is relevant', () => {
      expect(service.recallAtK([rated(95, 2)], 5).recall).toBeNull();
    });
  });

  it('computes every metric at 5, 10 and 20', () => {
    const summary = service.computeAll([
      rated(90, 3),
      rated(70, 2),
      rated(50, 1),
      rated(30, 0),
    ]);

    expect(Object.keys(summary.ndcg)).toEqual(['ndcg@5', 'ndcg@10', 'ndcg@20']);
    expect(summary.ndcg['ndcg@5']).toBeCloseTo(1);
    expect(summary.recall['recall@5']).toBe(1);
    expect(summary.spearmanRho).toBeCloseTo(1);
    expect(summary.recallAt5Hits).toBe(1);
    expect(summary.recallAt5TotalRelevant).toBe(1);
  });

  it('groups items by source category', () => {
    const breakdown = service.computeBySource([
      rated(90, 3, { source: 'PubMed' }),
      rated(60, 1, { source: 'medRxiv (all)' }),
      rated(40, 1, { source: 'bioRxiv' }),
      rated(30, 0, { source: 'The Lancet' }),
      rated(20, 0, { source: 'Conference blog' }),
    ]);

    expect(breakdown.pubmed?.count).toBe(1);
    expect(breakdown.preprint?.count).toBe(2);
    expect(breakdown.journal?.count).toBe(1);
    expect(breakdown.other?.count).toBe(1);
  });

  it('ranks disagreements by absolute error on the rating scale', () => {
    const top = service.topDisagreements(
      [
        rated(100, 0, { id: 'a', title: 'A' }),
        rated(50, 2, { id: 'b', title: 'B' }),
        rated(null, 3, { id: 'c' }),
      ],
      1,
    );

    expect(top).toEqual([
      {
        id: 'a',
        title: 'A',
        humanRating: 0,
        modelScore: 100,
        modelScoreScaled: 3,
        absoluteError: 3,
        modelReason: '',
        relevanceLabel: null,
      },
    ]);
  });

  it('maps scores to ratings and back to ranges', () => {
    expect([0, 24.9, 25, 49, 50, 74, 75, 100].map((s) => service.scoreToRating(s))).toEqual([
      0, 0, 1, 1, 2, 2, 3, 3,
    ]);
    expect(service.ratingToScoreRange(2)).toEqual({ min: 50, max: 75 });
    expect(service.ratingToScoreRange(7)).toEqual({ min: 75, max: 100 });
  });

  it('builds a confusion matrix of human versus predicted rating', () => {
    const result = service.classificationAccuracy([
      rated(90, 3),
      rated(10, 0),
      rated(60, 1),
      rated(null, 2),
    ]);

    expect(result.n).toBe(3);
    expect(result.correct).toBe(2);
    expect(result.accuracy).toBeCloseTo(2 / 3);
    expect(result.confusionMatrix).toEqual([
      [1, 0, 0, 0],
      [0, 0, 1, 0],
      [0, 0, 0, 0],
      [0, 0, 0, 1],
    ]);
  });
});
