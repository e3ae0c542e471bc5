import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ArbitrageCalculator } from '../../src/arbitrage/arbitrageCalculator';
import { MessageSender, TelegramNotifier, escapeHtml, formatOpportunity } from '../../src/services/telegramNotifier';
import { CLOSING, HOUSE_QUESTION, contract, matchResult } from '../helpers';

class FakeSender implements MessageSender {
  readonly sent: Array<{ chatId: string; text: string; parseMode?: string }> = [];
  private attempts = 0;

  // Zero-based attempt numbers that reject
  constructor(private readonly failOn: ReadonlySet<number> = new Set()) {}

  async sendMessage(chatId: string, text: string, options?: { parse_mode?: string }): Promise<unknown> {
    const attempt = this.attempts++;
    if (this.failOn.has(attempt)) {
      throw new Error('chat not found');
    }
    this.sent.push({ chatId, text, parseMode: options?.parse_mode });
    return {};
  }
}

const opportunity = (confidenceB = 0.92) =>
  new ArbitrageCalculator().evaluate(
    matchResult(
      { id: 'pm-1', venue: 'polymarket', outcomePrices: { Yes: 0.45, No: 0.55 }, liquidity: 50000 },
      0.95,
      contract({ venue: 'polymarket' })
    ),
    matchResult(
      { id: 'pi-1', venue: 'predictit', outcomePrices: { Yes: 0.62, No: 0.38 }, closingTime: CLOSING, liquidity: 20000 },
      confidenceB
    ),
    0.01,
    0.01,
    0.02
  );

describe('formatOpportunity', () => {
  it('lays out both legs and the pricing', () => {
    assert.deepEqual(formatOpportunity(opportunity()).split('\n'), [
      '🚨 <b>PURE ARBITRAGE</b> 🚨',
      '',
      '<b>Contract:</b> Republican (YES)',
      '',
      '<b>Buy YES on polymarket</b> @ $0.4500',
      `• ${HOUSE_QUESTION}`,
      '<b>Hedge on predictit</b> @ $0.3800',
      `• ${HOUSE_QUESTION}`,
      '',
      '• Combined Cost: $0.8700',
      '• Edge: <b>13.00%</b>',
      '• Fees: 2.00% | Slippage: 2.00%',
      '• Match Confidence: 0.92',
      '• Recommended Size: $2000.00',
    ]);
  });

  it('appends the downgrade reasons to statistical arbitrage', () => {
    const lines = formatOpportunity(opportunity(0.8)).split('\n');
    assert.equal(lines[0], '📊 <b>STATISTICAL ARBITRAGE</b>');
    assert.deepEqual(lines.slice(-2), ['', '<i>match confidence 0.80 below 0.9</i>']);
  });

  it('escapes markup in free text', () => {
    assert.equal(escapeHtml('a < b & c > d'), 'a &lt; b &amp; c &gt; d');
  });
});

describe('TelegramNotifier', () => {
  it('sends each opportunity as HTML and counts deliveries', async () => {
    const sender = new FakeSender(new Set([1]));
    const notifier = new TelegramNotifier('test-secret', 'chat-1', sender);

    const sent = await notifier.sendOpportunityAlerts([opportunity(), opportunity(0.8), opportunity()]);

    assert.equal(sent, 2);
    assert.equal(sender.sent.length, 2);
    assert.deepEqual(
      sender.sent.map(message => [message.chatId, message.parseMode]),
      [
        ['chat-1', 'HTML'],
        ['chat-1', 'HTML'],
      ]
    );
  });

  it('announces the venues being scanned', async () => {
    const sender = new FakeSender();
    await new TelegramNotifier('test-secret', 'chat-1', sender).sendStartupMessage(['polymarket', 'predictit'], 3);

    assert.equal(
      sender.sent[0].text,
      '🤖 <b>Cross-Venue Arbitrage Scanner Started</b>\n\nVenues: polymarket, predictit\nContracts tracked: 3'
    );
  });

  it('keeps going when an error notification cannot be sent', async () => {
    const sender = new FakeSender(new Set([0]));
    await new TelegramNotifier('test-secret', 'chat-1', sender).sendErrorNotification('snapshot <missing>');
    assert.equal(sender.sent.length, 0);
  });
});
