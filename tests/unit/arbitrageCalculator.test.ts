import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ArbitrageCalculator, sidePrice } from '../../src/arbitrage/arbitrageCalculator';
import { assertClose, CLOSING, contract, matchResult } from '../helpers';

const DAY = 24 * 60 * 60 * 1000;

const legA = (confidence = 0.95) =>
  matchResult(
    { id: 'pm-1', venue: 'polymarket', outcomePrices: { Yes: 0.45, No: 0.55 }, liquidity: 50000 },
    confidence,
    contract({ venue: 'polymarket' })
  );

const legB = (overrides: Parameters<typeof matchResult>[0] = {}, confidence = 0.92) =>
  matchResult(
    {
      id: 'pi-1',
      venue: 'predictit',
      outcomePrices: { Yes: 0.62, No: 0.38 },
      closingTime: CLOSING + DAY,
      liquidity: 20000,
      ...overrides,
    },
    confidence
  );

describe('ArbitrageCalculator', () => {
  const calculator = new ArbitrageCalculator();

  it('prices a confident, aligned hedge as pure arbitrage', () => {
    const opp = calculator.evaluate(legA(), legB(), 0.01, 0.01, 0.02);

    assert.equal(opp.legA.price, 0.45);
    assert.equal(opp.legB.price, 0.62);
    assert.equal(opp.combinedCost, 0.87);
    assert.equal(opp.edge, 0.13);
    assert.equal(opp.classification, 'pure_arb');
    assert.equal(opp.matchConfidence, 0.92);
    assert.equal(opp.resolutionAligned, true);
    assert.equal(opp.recommendedSize, 2000);
    assert.deepEqual(opp.fees, { legA: 0.01, legB: 0.01 });
    assert.deepEqual(opp.reasons, []);
  });

  it('downgrades a low-confidence match to statistical arbitrage', () => {
    const opp = calculator.evaluate(legA(), legB({}, 0.8), 0.01, 0.01, 0.02);
    assert.equal(opp.classification, 'stat_arb');
    assert.equal(opp.edge, 0.13);
    assert.deepEqual(opp.reasons, ['match confidence 0.80 below 0.9']);
  });

  it('downgrades legs whose closing times are unknown or apart', () => {
    const unknown = calculator.evaluate(legA(), legB({ closingTime: null }), 0.01, 0.01, 0.02);
    assert.equal(unknown.classification, 'stat_arb');
    assert.equal(unknown.resolutionAligned, false);
    assert.deepEqual(unknown.reasons, ['resolution windows do not overlap']);

    const apart = calculator.evaluate(legA(), legB({ closingTime: CLOSING + 30 * DAY }), 0.01, 0.01, 0.02);
    assert.equal(apart.classification, 'stat_arb');
  });

  it('rejects edges below the minimum and reports negative edges as they are', () => {
    const opp = calculator.evaluate(legA(), legB({ outcomePrices: { Yes: 0.4, No: 0.6 } }), 0.01, 0.01, 0.02);
    assert.equal(opp.combinedCost, 1.09);
    assert.equal(opp.edge, -0.09);
    assert.equal(opp.classification, 'rejected');
    assert.deepEqual(opp.reasons, ['edge -0.0900 below minimum 0.02']);
  });

  it('rejects a leg without a price for its side', () => {
    const unpriced = matchResult(
      { id: 'pm-2', outcomePrices: { 'Donald Trump': 0.5, 'Kamala Harris': 0.48 } },
      0.95
    );
    const opp = calculator.evaluate(unpriced, legB(), 0.01, 0.01, 0.02);
    assert.equal(opp.classification, 'rejected');
    assert.ok(Number.isNaN(opp.edge));
    assert.ok(Number.isNaN(opp.combinedCost));
    assert.deepEqual(opp.reasons, ['no YES price on polymarket market pm-2']);
  });

  it('keeps edge = 1 - combined cost', () => {
    for (const fee of [0, 0.01, 0.05]) {
      const opp = calculator.evaluate(legA(), legB(), fee, fee, 0.004);
      assertClose(opp.edge, 1 - opp.combinedCost, 1e-12);
    }
  });

  it('honours a custom minimum edge', () => {
    const picky = new ArbitrageCalculator({ minEdgeThreshold: 0.2 });
    assert.equal(picky.evaluate(legA(), legB(), 0.01, 0.01, 0.02).classification, 'rejected');
  });

  describe('resolutionAligned', () => {
    it('allows up to the configured tolerance', () => {
      assert.equal(calculator.resolutionAligned(0, 7 * DAY), true);
      assert.equal(calculator.resolutionAligned(0, 7 * DAY + 1), false);
      assert.equal(calculator.resolutionAligned(null, 0), false);
    });
  });

  describe('recommendedSize', () => {
    it('takes the smaller depth, capped by the bankroll', () => {
      assert.equal(calculator.recommendedSize(50000, 20000), 2000);
      assert.equal(calculator.recommendedSize(200000, 300000), 10000);
      assert.equal(calculator.recommendedSize(0, 500), 0);
    });
  });
});

describe('sidePrice', () => {
  it('reads the side label directly', () => {
    assert.equal(sidePrice(matchResult({}, 0.9, contract({ side: 'NO' }))), 0.45);
  });

  it('uses the complement in a binary market', () => {
    const result = matchResult({ outcomePrices: { Yes: 0.7, Other: 0.3 } }, 0.9, contract({ side: 'NO' }));
    assert.equal(sidePrice(result), 0.3);
  });

  it('reads a label equal to the contract name', () => {
    const harris = contract({ name: 'Kamala Harris', side: 'NO' });
    const result = matchResult({ outcomePrices: { 'Kamala Harris': 0.48, 'Donald Trump': 0.5 } }, 0.9, harris);
    assert.equal(sidePrice(result), 0.52);
  });

  it('returns null when no price fits', () => {
    const result = matchResult({ outcomePrices: { Yes: 0.62 } }, 0.9, contract({ side: 'NO' }));
    assert.equal(sidePrice(result), null);
  });
});
