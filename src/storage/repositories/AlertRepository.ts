import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { storageCall, type DatabaseWrapper } from '../Database.js';
import { createLogger } from '../../utils/logger.js';
import {
  AlertKind,
  AlertSeverity,
  type Alert,
  type AlertCandidate,
  type AlertFilter,
} from '../../core/types/alerts.js';

const logger = createLogger('AlertRepository');

const ALERT_COLUMNS = 'id, protocol_id, alert_kind, severity, message, triggered_at, resolved_at';

const alertRowSchema = z.object({
  id: z.string(),
  protocol_id: z.string(),
  alert_kind: z.nativeEnum(AlertKind),
  severity: z.nativeEnum(AlertSeverity),
  message: z.string(),
  triggered_at: z.number(),
  resolved_at: z.number().nullable(),
});

function toAlert(row: unknown): Alert {
  const parsed = alertRowSchema.parse(row);
  return {
    id: parsed.id,
    protocolId: parsed.protocol_id,
    kind: parsed.alert_kind,
    severity: parsed.severity,
    message: parsed.message,
    triggeredAt: new Date(parsed.triggered_at),
    resolvedAt: parsed.resolved_at === null ? null : new Date(parsed.resolved_at),
  };
}

const LIST_SQL: Record<AlertFilter, string> = {
  open: `
    SELECT ${ALERT_COLUMNS} FROM protocol_alerts
    WHERE resolved_at IS NULL
    ORDER BY triggered_at DESC
  `,
  resolved: `
    SELECT ${ALERT_COLUMNS} FROM protocol_alerts
    WHERE resolved_at IS NOT NULL
    ORDER BY triggered_at DESC
    LIMIT ?
  `,
  all: `
    SELECT ${ALERT_COLUMNS} FROM protocol_alerts
    ORDER BY triggered_at DESC
    LIMIT ?
  `,
};

const SEVERITY_RANK: Record<AlertSeverity, number> = {
  [AlertSeverity.CRITICAL]: 1,
  [AlertSeverity.WARNING]: 2,
  [AlertSeverity.INFO]: 3,
};

export class AlertRepository {
  constructor(private readonly database: DatabaseWrapper) {}

  // Open alert of this kind triggered after windowStart?
  hasOpenSince(protocolId: string, kind: AlertKind, windowStart: Date): boolean {
    return storageCall('recent open alert lookup', () => {
      const stmt = this.database.prepare(`
        SELECT id FROM protocol_alerts
        WHERE protocol_id = ?
          AND alert_kind = ?
          AND resolved_at IS NULL
          AND triggered_at > ?
        LIMIT 1
      `);
      return stmt.get(protocolId, kind, windowStart.getTime()) !== undefined;
    });
  }

  /**
   * Check-then-insert inside one immediate transaction. Returns null when an
   * open alert of the same kind was triggered after windowStart.
   */
  insertUnlessRecentOpen(candidate: AlertCandidate, windowStart: Date): Alert | null {
    return storageCall('save alert', () =>
      this.database.immediate(() => {
        if (this.hasOpenSince(candidate.protocolId, candidate.kind, windowStart)) {
          return null;
        }

        const alert: Alert = {
          id: uuidv4(),
          protocolId: candidate.protocolId,
          kind: candidate.kind,
          severity: candidate.severity,
          message: candidate.message,
          triggeredAt: candidate.triggeredAt,
          resolvedAt: null,
        };

        this.database
          .prepare(`
            INSERT INTO protocol_alerts (${ALERT_COLUMNS})
            VALUES (?, ?, ?, ?, ?, ?, NULL)
          `)
          .run(
            alert.id,
            alert.protocolId,
            alert.kind,
            alert.severity,
            alert.message,
            alert.triggeredAt.getTime()
          );

        logger.debug(`Alert saved: ${alert.id}`);
        return alert;
      })
    );
  }

  // Mark an open alert resolved; false when missing or already resolved
  resolve(id: string, resolvedAt: Date = new Date()): boolean {
    return storageCall('resolve alert', () => {
      const result = this.database
        .prepare('UPDATE protocol_alerts SET resolved_at = ? WHERE id = ? AND resolved_at IS NULL')
        .run(resolvedAt.getTime(), id);
      if (result.changes > 0) {
        logger.info(`Alert resolved: ${id}`);
      }
      return result.changes > 0;
    });
  }

  // Alerts newest first; open alerts are not capped
  list(filter: AlertFilter, limit = 100): Alert[] {
    return storageCall('list alerts', () => {
      const rows =
        filter === 'open'
          ? this.database.prepare(LIST_SQL.open).all()
          : this.database.prepare(LIST_SQL[filter]).all(limit);
      return rows.map(toAlert);
    });
  }

  // Most severe open alert for a protocol triggered after `since`
  worstOpenSeverity(protocolId: string, since: Date): AlertSeverity | null {
    return storageCall('worst open severity', () => {
      const rows = this.database
        .prepare(`
          SELECT DISTINCT severity FROM protocol_alerts
          WHERE protocol_id = ? AND resolved_at IS NULL AND triggered_at > ?
        `)
        .all(protocolId, since.getTime());

      let worst: AlertSeverity | null = null;
      for (const row of rows) {
        const { severity } = z.object({ severity: z.nativeEnum(AlertSeverity) }).parse(row);
        if (worst === null || SEVERITY_RANK[severity] < SEVERITY_RANK[worst]) {
          worst = severity;
        }
      }
      return worst;
    });
  }
}

export default AlertRepository;
