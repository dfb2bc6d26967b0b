import { Telegram } from 'telegraf';
import { createLogger } from '../utils/logger.js';
import { formatUtc } from '../utils/format.js';
import { errorMessage } from '../core/errors.js';
import { AlertSeverity, type Alert } from '../core/types/alerts.js';
import type { AlertNotifier } from './types.js';

const logger = createLogger('TelegramSink');

export type TelegramApi = Pick<Telegram, 'sendMessage'>;

export interface TelegramSinkOptions {
  botToken: string;
  chatId: string;
  api?: TelegramApi;
}

const SEVERITY_EMOJIS: Record<AlertSeverity, string> = {
  [AlertSeverity.CRITICAL]: '🚨',
  [AlertSeverity.WARNING]: '⚠️',
  [AlertSeverity.INFO]: 'ℹ️',
};

// Legacy Markdown only treats these four as markup
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

// Format alert for Telegram
export function formatTelegramAlert(alert: Alert): string {
  let message = `${SEVERITY_EMOJIS[alert.severity]} *${alert.severity.toUpperCase()} Alert: ${escapeMarkdown(alert.protocolId)}*\n\n`;
  message += `${escapeMarkdown(alert.message)}\n`;
  message += `\n• *Alert Type:* ${escapeMarkdown(alert.kind)}`;
  message += `\n• *Time:* ${formatUtc(alert.triggeredAt)}`;
  return message;
}

export class TelegramSink implements AlertNotifier {
  readonly name = 'telegram';
  readonly enabled = true;

  private readonly api: TelegramApi;
  private readonly chatId: string;

  constructor(options: TelegramSinkOptions) {
    this.api = options.api ?? new Telegram(options.botToken);
    this.chatId = options.chatId;
    logger.info('Telegram notifications enabled');
  }

  async send(alert: Alert): Promise<boolean> {
    const sent = await this.sendMarkdown(formatTelegramAlert(alert));
    if (sent) {
      logger.info(`Alert sent to ${this.chatId}: ${alert.protocolId} - ${alert.kind}`);
    }
    return sent;
  }

  async sendTestMessage(): Promise<boolean> {
    return this.sendMarkdown(
      '✅ *Protocol Monitor - Telegram Integration Test*\n\nYou will receive alerts here when anomalies are detected.'
    );
  }

  private async sendMarkdown(text: string): Promise<boolean> {
    try {
      await this.api.sendMessage(this.chatId, text, { parse_mode: 'Markdown' });
      return true;
    } catch (error) {
      logger.error(`Failed to send message to ${this.chatId}: ${errorMessage(error)}`);
      return false;
    }
  }
}

export default TelegramSink;
