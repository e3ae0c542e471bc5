import TelegramBot from 'node-telegram-bot-api';
import { ArbitrageOpportunity } from '../arbitrage/types';

/**
 * What the notifier needs from a bot; TelegramBot satisfies it
 */
export interface MessageSender {
  sendMessage(chatId: string, text: string, options?: TelegramBot.SendMessageOptions): Promise<unknown>;
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

const percent = (value: number) => `${(value * 100).toFixed(2)}%`;

export function formatOpportunity(opp: ArbitrageOpportunity): string {
  const { legA, legB } = opp;
  const header = opp.classification === 'pure_arb' ? '🚨 <b>PURE ARBITRAGE</b> 🚨' : '📊 <b>STATISTICAL ARBITRAGE</b>';

  const lines = [
    header,
    '',
    `<b>Contract:</b> ${escapeHtml(legA.contract.name)} (${legA.contract.side})`,
    '',
    `<b>Buy ${legA.contract.side} on ${escapeHtml(legA.venue)}</b> @ $${legA.price.toFixed(4)}`,
    `• ${escapeHtml(legA.question)}`,
    `<b>Hedge on ${escapeHtml(legB.venue)}</b> @ $${(1 - legB.price).toFixed(4)}`,
    `• ${escapeHtml(legB.question)}`,
    '',
    `• Combined Cost: $${opp.combinedCost.toFixed(4)}`,
    `• Edge: <b>${percent(opp.edge)}</b>`,
    `• Fees: ${percent(opp.fees.legA + opp.fees.legB)} | Slippage: ${percent(opp.slippage)}`,
    `• Match Confidence: ${opp.matchConfidence.toFixed(2)}`,
    `• Recommended Size: $${opp.recommendedSize.toFixed(2)}`,
  ];

  if (opp.reasons.length > 0) {
    lines.push('', `<i>${escapeHtml(opp.reasons.join('; '))}</i>`);
  }

  return lines.join('\n');
}

export class TelegramNotifier {
  private bot: MessageSender;
  private chatId: string;

  constructor(botToken: string, chatId: string, bot?: MessageSender) {
    this.bot = bot ?? new TelegramBot(botToken, { polling: false });
    this.chatId = chatId;
  }

  /**
   * Send one alert per opportunity; returns how many were delivered
   */
  async sendOpportunityAlerts(opportunities: ArbitrageOpportunity[]): Promise<number> {
    let sent = 0;
    for (const opp of opportunities) {
      try {
        await this.bot.sendMessage(this.chatId, formatOpportunity(opp), { parse_mode: 'HTML' });
        sent++;
      } catch (error) {
        console.error('❌ Error sending Telegram alert:', error instanceof Error ? error.message : error);
      }
    }
    if (sent > 0) {
      console.log(`✅ Sent ${sent} opportunity alert(s)`);
    }
    return sent;
  }

  async sendStartupMessage(venues: string[], contractCount: number): Promise<void> {
    try {
      const message = [
        '🤖 <b>Cross-Venue Arbitrage Scanner Started</b>',
        '',
        `Venues: ${escapeHtml(venues.join(', '))}`,
        `Contracts tracked: ${contractCount}`,
      ].join('\n');

      await this.bot.sendMessage(this.chatId, message, { parse_mode: 'HTML' });
    } catch (error) {
      console.error('❌ Error sending startup message:', error instanceof Error ? error.message : error);
    }
  }

  async sendErrorNotification(error: string): Promise<void> {
    try {
      const message = `⚠️ <b>Scanner Error</b>\n\n${escapeHtml(error)}`;
      await this.bot.sendMessage(this.chatId, message, { parse_mode: 'HTML' });
    } catch (err) {
      console.error('❌ Error sending error notification:', err instanceof Error ? err.message : err);
    }
  }
}
