import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { MatchScorer } from '../../src/matching/matchScorer';
import { QueryCandidate } from '../../src/matching/types';
import { assertClose, market } from '../helpers';

const candidate = (text: string): QueryCandidate => ({ text, strategyId: 'original_pattern', priorConfidence: 0.9 });

describe('MatchScorer', () => {
  const scorer = new MatchScorer();

  it('finds an exact token match', () => {
    const house = market();
    const scored = scorer.score(candidate('Will Republican control the US House after the 2024 election?'), [house]);
    assert.equal(scored.market, house);
    assert.equal(scored.similarity, 1);
  });

  it('scores partial overlap with Jaccard similarity', () => {
    const scored = scorer.score(candidate('Republican election'), [market()]);
    // 2 shared tokens out of 7 distinct
    assert.equal(scored.similarity, 2 / 7);
  });

  it('picks the most similar market', () => {
    const senate = market({ id: 'senate', question: 'Will the Democrats win the Senate?' });
    const house = market();
    const scored = scorer.score(candidate('Republican control US House'), [senate, house]);
    assert.equal(scored.market?.id, 'pm-house');
  });

  it('keeps the first market on a tie', () => {
    const first = market({ id: 'first' });
    const second = market({ id: 'second' });
    assert.equal(scorer.score(candidate('Republican House'), [first, second]).market?.id, 'first');
  });

  it('returns no market for an empty pool', () => {
    assert.deepEqual(scorer.score(candidate('Republican House'), []), { market: null, similarity: 0 });
  });

  it('combines prior and similarity with the configured weights', () => {
    assertClose(scorer.finalConfidence(0.9, 1), 0.95);
    assertClose(new MatchScorer({ priorWeight: 0.25, similarityWeight: 0.75 }).finalConfidence(0.8, 0.4), 0.5);
  });

  it('clamps confidence into [0, 1]', () => {
    const heavy = new MatchScorer({ priorWeight: 1, similarityWeight: 1 });
    assert.equal(heavy.finalConfidence(0.9, 0.5), 1);
    assert.equal(heavy.finalConfidence(0, 0), 0);
  });
});
