import { createLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { HOUR_MS } from '../utils/format.js';
import { ErrorCode, NotificationError, errorMessage } from '../core/errors.js';
import { systemClock, type AlertLedger, type Clock, type NotificationSink } from '../core/ports.js';
import { SaveOutcome, type AlertCandidate, type AlertKind, type SaveResult } from '../core/types/alerts.js';
import type { EventBus } from '../core/events/EventBus.js';
import type { AlertRepository } from '../storage/repositories/AlertRepository.js';

const logger = createLogger('AlertManager');

export interface AlertManagerOptions {
  deduplicationWindowMs: number;
  notificationTimeoutMs: number;
}

export const DEFAULT_ALERT_MANAGER_OPTIONS: AlertManagerOptions = {
  deduplicationWindowMs: HOUR_MS,
  notificationTimeoutMs: 10000,
};

/**
 * Persists alert candidates with per-(protocol, kind) deduplication and
 * forwards freshly inserted alerts to the notification sink.
 *
 * Delivery is best effort: a failing or slow sink is logged and reported on
 * the event bus, and the alert stays persisted.
 */
export class AlertManager implements AlertLedger {
  private readonly options: AlertManagerOptions;

  constructor(
    private readonly repository: AlertRepository,
    private readonly sink: NotificationSink,
    private readonly events: EventBus,
    options: Partial<AlertManagerOptions> = {},
    private readonly clock: Clock = systemClock
  ) {
    this.options = { ...DEFAULT_ALERT_MANAGER_OPTIONS, ...options };
    logger.info(`AlertManager initialized (sink: ${sink.name}, dedup window: ${this.options.deduplicationWindowMs}ms)`);
  }

  hasRecentOpen(protocolId: string, kind: AlertKind, windowMs = this.options.deduplicationWindowMs): boolean {
    return this.repository.hasOpenSince(protocolId, kind, this.windowStart(windowMs));
  }

  async save(candidate: AlertCandidate): Promise<SaveResult> {
    const alert = this.repository.insertUnlessRecentOpen(
      candidate,
      this.windowStart(this.options.deduplicationWindowMs)
    );

    if (!alert) {
      logger.info(`Duplicate alert suppressed for ${candidate.protocolId}: ${candidate.kind}`);
      this.events.emit('alert:suppressed', { protocolId: candidate.protocolId, kind: candidate.kind });
      return { outcome: SaveOutcome.DUPLICATE_SUPPRESSED };
    }

    logger.warn(`ALERT: ${alert.severity.toUpperCase()} - ${alert.message}`, {
      alertId: alert.id,
      protocolId: alert.protocolId,
    });
    this.events.emit('alert:raised', alert);

    if (!this.sink.enabled) {
      logger.debug(`Notifications disabled, not delivering alert ${alert.id}`);
      return { outcome: SaveOutcome.INSERTED, alert };
    }

    try {
      const delivered = await withTimeout(
        this.sink.send(alert),
        this.options.notificationTimeoutMs,
        () =>
          new NotificationError(
            `${this.sink.name} did not respond within ${this.options.notificationTimeoutMs}ms`,
            ErrorCode.NotificationTimeout
          )
      );

      if (delivered) {
        this.events.emit('notification:sent', { alertId: alert.id, sink: this.sink.name });
      } else {
        this.reportDeliveryFailure(alert.id, new NotificationError(`${this.sink.name} rejected the alert`));
      }
    } catch (error) {
      this.reportDeliveryFailure(
        alert.id,
        error instanceof Error ? error : new NotificationError(errorMessage(error))
      );
    }

    return { outcome: SaveOutcome.INSERTED, alert };
  }

  // Close an open alert; false when it was missing or already resolved
  resolve(alertId: string): boolean {
    return this.repository.resolve(alertId, this.clock());
  }

  private windowStart(windowMs: number): Date {
    return new Date(this.clock().getTime() - windowMs);
  }

  private reportDeliveryFailure(alertId: string, error: Error): void {
    logger.error(`Failed to deliver alert ${alertId} via ${this.sink.name}: ${error.message}`);
    this.events.emit('notification:failed', { alertId, sink: this.sink.name, error });
  }
}

export default AlertManager;
