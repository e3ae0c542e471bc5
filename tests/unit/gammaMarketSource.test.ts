import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { GammaMarketSource, toMarketQuestion } from '../../src/sources/gammaMarketSource';

describe('toMarketQuestion', () => {
  it('decodes JSON-encoded outcome lists and string numbers', () => {
    const market = toMarketQuestion({
      id: 512,
      question: 'Will the Republicans control the US House after the 2024 election?',
      outcomes: '["Yes", "No"]',
      outcomePrices: '["0.45", "0.55"]',
      endDate: '2024-11-05T12:00:00Z',
      liquidity: '50000.5',
      volume: 1200,
    });

    assert.deepEqual(market, {
      id: '512',
      venue: 'polymarket',
      question: 'Will the Republicans control the US House after the 2024 election?',
      outcomePrices: { Yes: 0.45, No: 0.55 },
      closingTime: Date.UTC(2024, 10, 5, 12),
      volume: 1200,
      liquidity: 50000.5,
    });
  });

  it('accepts plain arrays and the legacy end date field', () => {
    const market = toMarketQuestion({
      id: 'm-1',
      question: 'Q',
      outcomes: ['Yes', 'No'],
      outcomePrices: [0.3, 0.7],
      end_date_iso: '2024-11-05T00:00:00Z',
    });

    assert.deepEqual(market?.outcomePrices, { Yes: 0.3, No: 0.7 });
    assert.equal(market?.closingTime, Date.UTC(2024, 10, 5));
    assert.equal(market?.liquidity, 0);
  });

  it('leaves prices empty when outcomes cannot be decoded', () => {
    const market = toMarketQuestion({ id: 'm-2', question: 'Q', outcomes: 'not json', outcomePrices: '["0.5"]' });
    assert.deepEqual(market?.outcomePrices, {});
    assert.equal(market?.closingTime, null);
  });

  it('skips records without an id', () => {
    assert.equal(toMarketQuestion({ question: 'Q' }), null);
  });

  it('tags markets with the given venue', () => {
    assert.equal(toMarketQuestion({ id: 'm-3' }, 'polymarket-us')?.venue, 'polymarket-us');
  });
});

describe('GammaMarketSource', () => {
  it('serves the polymarket venue', () => {
    assert.equal(new GammaMarketSource('http://localhost:0').venue, 'polymarket');
  });
});
