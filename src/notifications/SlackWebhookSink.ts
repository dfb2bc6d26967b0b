import { HttpClient } from '../services/HttpClient.js';
import { createLogger } from '../utils/logger.js';
import { formatUtc } from '../utils/format.js';
import { errorMessage } from '../core/errors.js';
import { AlertSeverity, type Alert } from '../core/types/alerts.js';
import type { AlertNotifier } from './types.js';

const logger = createLogger('SlackWebhookSink');

const SEVERITY_COLORS: Record<AlertSeverity, string> = {
  [AlertSeverity.CRITICAL]: '#FF0000',
  [AlertSeverity.WARNING]: '#FFA500',
  [AlertSeverity.INFO]: '#0000FF',
};

const SEVERITY_EMOJIS: Record<AlertSeverity, string> = {
  [AlertSeverity.CRITICAL]: '🚨',
  [AlertSeverity.WARNING]: '⚠️',
  [AlertSeverity.INFO]: 'ℹ️',
};

interface MrkdwnText {
  type: 'mrkdwn';
  text: string;
}

type SlackBlock =
  | { type: 'header'; text: { type: 'plain_text'; text: string; emoji: boolean } }
  | { type: 'section'; text?: MrkdwnText; fields?: MrkdwnText[] }
  | { type: 'context'; elements: MrkdwnText[] };

export interface SlackMessage {
  text?: string;
  blocks?: SlackBlock[];
  attachments?: Array<{ color: string; blocks: SlackBlock[] }>;
}

export type WebhookTransport = Pick<HttpClient, 'request'>;

export interface SlackWebhookSinkOptions {
  webhookUrl: string;
  timeoutMs: number;
  transport?: WebhookTransport;
}

const field = (label: string, value: string): MrkdwnText => ({ type: 'mrkdwn', text: `*${label}:*\n${value}` });

// Attachment coloured by severity with a header, a field grid and the alert message
export function formatSlackAlert(alert: Alert): SlackMessage {
  const severity = alert.severity.toUpperCase();

  return {
    attachments: [
      {
        color: SEVERITY_COLORS[alert.severity],
        blocks: [
          {
            type: 'header',
            text: {
              type: 'plain_text',
              text: `${SEVERITY_EMOJIS[alert.severity]} ${severity} Alert: ${alert.protocolId}`,
              emoji: true,
            },
          },
          {
            type: 'section',
            fields: [
              field('Protocol', alert.protocolId),
              field('Severity', severity),
              field('Alert Type', alert.kind),
              field('Time', formatUtc(alert.triggeredAt)),
            ],
          },
          {
            type: 'section',
            text: { type: 'mrkdwn', text: `*Details:*\n${alert.message}` },
          },
        ],
      },
    ],
  };
}

export class SlackWebhookSink implements AlertNotifier {
  readonly name = 'slack';
  readonly enabled = true;

  private readonly webhookUrl: string;
  private readonly transport: WebhookTransport;

  constructor(options: SlackWebhookSinkOptions) {
    this.webhookUrl = options.webhookUrl;
    // Webhook posts are not idempotent, so no retries
    this.transport =
      options.transport ?? new HttpClient('Slack', { timeoutMs: options.timeoutMs, maxRetries: 0, redactPaths: true });
    logger.info('Slack notifications enabled');
  }

  async send(alert: Alert): Promise<boolean> {
    const sent = await this.post(formatSlackAlert(alert));
    if (sent) {
      logger.info(`Sent Slack notification for ${alert.protocolId} - ${alert.kind}`);
    }
    return sent;
  }

  async sendTestMessage(): Promise<boolean> {
    return this.post({
      text: '✅ Protocol Monitor - Slack Integration Test',
      blocks: [
        {
          type: 'section',
          text: {
            type: 'mrkdwn',
            text: 'Slack integration is working correctly! You will receive alerts here when anomalies are detected.',
          },
        },
        {
          type: 'context',
          elements: [{ type: 'mrkdwn', text: `Sent at ${formatUtc(new Date())}` }],
        },
      ],
    });
  }

  private async post(message: SlackMessage): Promise<boolean> {
    try {
      const response = await this.transport.request<unknown>({
        method: 'POST',
        url: this.webhookUrl,
        data: message,
        validateStatus: () => true,
      });

      if (response.status >= 200 && response.status < 300) {
        return true;
      }
      logger.error(`Failed to send Slack notification: ${response.status} - ${String(response.data)}`);
      return false;
    } catch (error) {
      logger.error(`Error sending Slack notification: ${errorMessage(error)}`);
      return false;
    }
  }
}

export default SlackWebhookSink;
