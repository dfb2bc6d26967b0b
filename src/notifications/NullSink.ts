import { createLogger } from '../utils/logger.js';
import type { AlertNotifier } from './types.js';
import type { Alert } from '../core/types/alerts.js';

const logger = createLogger('NullSink');

// Used when notifications.channel is "none"
export class NullSink implements AlertNotifier {
  readonly name = 'none';
  readonly enabled = false;

  async send(alert: Alert): Promise<boolean> {
    logger.debug(`Notifications disabled, skipping alert ${alert.id}`);
    return false;
  }

  async sendTestMessage(): Promise<boolean> {
    logger.warn('Cannot send test message: no notification channel configured');
    return false;
  }
}

export default NullSink;
