import { Logger } from '@nestjs/common';
import { RerankParserService } from './rerank-parser.service';

describe('RerankParserService', () => {
  let service: RerankParserService;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    service = new RerankParserService();
    warnSpy = jest
      .spyOn(Logger.prototype, 'warn')
      .mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it('decodes a well-formed ranked_ids object directly', () => {
    const parsed = service.parseRanking('{"ranked_ids": ["a", "b", "c"]}');

    expect(parsed?.rankedIds).toEqual(['a', 'b', 'c']);
    expect(parsed?.strategy).toBe('direct');
  });

  it('strips a fenced code block with a language tag', () => {
    const parsed = service.parseRanking(
      '```json\n{"ranked_ids": ["a", "b"]}\n```',
    );

    expect(parsed?.rankedIds).toEqual(['a', 'b']);
    expect(parsed?.strategy).toBe('fenced');
  });

  it('extracts a balanced block surrounded by prose', () => {
    const parsed = service.parseRanking(
      'Here is my ranking: {"ranked_ids": ["x1", "x2"]} Hope this helps.',
    );

    expect(parsed?.rankedIds).toEqual(['x1', 'x2']);
    expect(parsed?.strategy).toBe('bracket');
  });

  it('repairs output truncated inside a string', () => {
    const parsed = service.parseRanking('{"ranked_ids": ["id1", "id2", "id');

    expect(parsed?.rankedIds).toEqual(['id1', 'id2']);
    expect(parsed?.strategy).toBe('repaired');
  });

  it('keeps the last complete id when output stops right after it', () => {
    const parsed = service.parseRanking('{"ranked_ids": ["id1", "id2"', 3);

    expect(parsed?.rankedIds).toEqual(['id1', 'id2']);
    expect(parsed?.strategy).toBe('repaired');
  });

  it('keeps model order for ids before the truncation point', () => {
    const parsed = service.parseRanking('{"ranked_ids": ["id3", "id2"');

    expect(parsed?.rankedIds).toEqual(['id3', 'id2']);
  });

  it('repairs output missing only the final brace', () => {
    const parsed = service.parseRanking(
      '{"ranked_ids": ["id1", "id2", "id3"]',
    );

    expect(parsed?.rankedIds).toEqual(['id1', 'id2', 'id3']);
  });

  it('recovers ids from an embedded ranked_ids fragment', () => {
    const parsed = service.parseRanking(
      'The ranked_ids are: "ranked_ids": ["id1", "id2"] and done',
    );

    expect(parsed?.rankedIds).toEqual(['id1', 'id2']);
  });

  it('falls back to regex extraction of id pairs', () => {
    const parsed = service.parseRanking(
      'rank "pub_id": "p9" first then "pub_id": "p4", and "pub_id": "p9" again',
    );

    expect(parsed?.rankedIds).toEqual(['p9', 'p4']);
    expect(parsed?.strategy).toBe('regex');
  });

  it('orders judgment objects by rank and clamps scores', () => {
    const parsed = service.parseRanking(
      JSON.stringify([
        { pub_id: 'p2', llm_score: 150, llm_rank: 2, llm_reason: ' solid ' },
        {
          pub_id: 'p1',
          llm_score: '70',
          llm_rank: 1,
          llm_key_findings: ['a', 'b', 'c', 'd'],
        },
      ]),
    );

    expect(parsed?.rankedIds).toEqual(['p1', 'p2']);
    expect(parsed?.judgments[0]).toEqual({
      itemId: 'p2',
      modelScore: 100,
      modelRank: 2,
      modelReason: 'solid',
      modelWhy: '',
      modelFindings: [],
    });
    expect(parsed?.judgments[1]?.modelScore).toBe(70);
    expect(parsed?.judgments[1]?.modelFindings).toEqual(['a', 'b', 'c']);
  });

  it('reads judgments nested under a results key', () => {
    const parsed = service.parseRanking(
      '{"results": [{"item_id": "q1", "score": 55, "title": "T"}]}',
    );

    expect(parsed?.rankedIds).toEqual(['q1']);
    expect(parsed?.judgments[0]?.title).toBe('T');
    expect(parsed?.judgments[0]?.modelRank).toBeNull();
  });

  it('returns null for empty or non-JSON text', () => {
    expect(service.parseRanking('')).toBeNull();
    expect(service.parseRanking('   ')).toBeNull();
    expect(service.parseRanking('This is not JSON at all')).toBeNull();
  });

  it('logs but accepts an under-filled ranking', () => {
    const parsed = service.parseRanking('{"ranked_ids": ["a"]}', 3);

    expect(parsed?.rankedIds).toEqual(['a']);
    expect(warnSpy).toHaveBeenCalledWith(
      'ranking under-filled: 1/3 ids (direct)',
    );
  });

  it('decodes the first object for single-item responses', () => {
    expect(
      service.decodeObject(
        'Result:\n```json\n{"relevancy_score": 72, "relevancy_reason": "ok"}\n```',
      ),
    ).toEqual({ relevancy_score: 72, relevancy_reason: 'ok' });
    expect(service.decodeObject('[1, 2]')).toBeNull();
  });
});
