import { NullSink } from './NullSink.js';
import { SlackWebhookSink } from './SlackWebhookSink.js';
import { TelegramSink } from './TelegramSink.js';
import { ConfigurationError } from '../core/errors.js';
import type { NotificationsConfig } from '../config/schema.js';
import type { AlertNotifier } from './types.js';

// Pick the sink for the configured channel
export function createNotificationSink(config: NotificationsConfig): AlertNotifier {
  switch (config.channel) {
    case 'slack':
      if (!config.slackWebhookUrl) {
        throw new ConfigurationError('Slack webhook URL is required when channel is slack');
      }
      return new SlackWebhookSink({ webhookUrl: config.slackWebhookUrl, timeoutMs: config.timeoutMs });
    case 'telegram':
      if (!config.telegramBotToken || !config.telegramChatId) {
        throw new ConfigurationError('Telegram bot token and chat id are required when channel is telegram');
      }
      return new TelegramSink({ botToken: config.telegramBotToken, chatId: config.telegramChatId });
    case 'none':
      return new NullSink();
  }
}

export { NullSink, SlackWebhookSink, TelegramSink };
export type { AlertNotifier } from './types.js';
