import { HeuristicScoringService } from './heuristic-scoring.service';

const NOW = new Date('2026-03-10T00:00:00.000Z');

function daysAgo(days: number): Date {
  return new Date(NOW.getTime() - days * 24 * 60 * 60 * 1000);
}

describe('HeuristicScoringService', () => {
  let service: HeuristicScoringService;

  beforeEach(() => {
    service = new HeuristicScoringService();
  });

  it('scores a fresh priority-venue paper with three keyword hits at the maximum', () => {
    const result = service.scoreCandidate(
      {
        title: 'Methylation screening for early detection of pancreatic cancer',
        textSnippet: 'A cohort study.',
        source: 'Nature Cancer',
        publishedAt: daysAgo(2),
      },
      NOW,
    );

    expect(result.score).toBe(600);
    expect(result.reason).toBe(
      'source=100 recency=200 keywords=300 (screening, early detection, methylation)',
    );
  });

  it('uses the baseline source score and the recency floor for undated items', () => {
    const result = service.scoreCandidate(
      {
        title: 'Notes on lab automation',
        textSnippet: '',
        source: 'Unknown Feed',
        publishedAt: null,
      },
      NOW,
    );

    expect(result).toEqual({
      score: 60,
      reason: 'source=10 recency=50 keywords=0',
    });
  });

  it('steps recency down with age', () => {
    expect(service.recencyScore(daysAgo(6.9), NOW)).toBe(200);
    expect(service.recencyScore(daysAgo(7), NOW)).toBe(150);
    expect(service.recencyScore(daysAgo(20), NOW)).toBe(100);
    expect(service.recencyScore(daysAgo(45), NOW)).toBe(50);
  });

  it('matches venue names case-insensitively and keeps the best match', () => {
    expect(service.sourcePriority('medRxiv (all)')).toBe(60);
    expect(service.sourcePriority('rss', 'The Lancet Oncology')).toBe(80);
  });
});
