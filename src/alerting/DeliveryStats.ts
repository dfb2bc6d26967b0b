import { createLogger } from '../utils/logger.js';
import type { EventBus } from '../core/events/EventBus.js';

const logger = createLogger('DeliveryStats');

export interface DeliveryCounts {
  raised: number;
  suppressed: number;
  delivered: number;
  failed: number;
}

// Running tally of ledger and notification outcomes since process start
export class DeliveryStats {
  private counts: DeliveryCounts = { raised: 0, suppressed: 0, delivered: 0, failed: 0 };

  constructor(events: EventBus) {
    events.on('alert:raised', () => {
      this.counts.raised++;
    });

    events.on('alert:suppressed', () => {
      this.counts.suppressed++;
    });

    events.on('notification:sent', ({ alertId, sink }) => {
      this.counts.delivered++;
      logger.debug(`Alert ${alertId} delivered via ${sink}`);
    });

    events.on('notification:failed', () => {
      this.counts.failed++;
    });
  }

  getCounts(): DeliveryCounts {
    return { ...this.counts };
  }
}

export default DeliveryStats;
