// Alert domain types

export enum AlertKind {
  TVL_DROP = 'tvl_drop',
  APY_LOW = 'apy_low',
  UTILIZATION_HIGH = 'utilization_high',
}

export enum AlertSeverity {
  CRITICAL = 'critical',
  WARNING = 'warning',
  INFO = 'info',
}

export type AlertStatus = 'open' | 'resolved';

interface CandidateBase {
  protocolId: string;
  message: string;
  triggeredAt: Date;
}

export interface TvlDropCandidate extends CandidateBase {
  kind: AlertKind.TVL_DROP;
  severity: AlertSeverity.CRITICAL;
  details: {
    previousTvl: number;
    currentTvl: number;
    dropPercent: number;
  };
}

export interface ApyLowCandidate extends CandidateBase {
  kind: AlertKind.APY_LOW;
  severity: AlertSeverity.WARNING;
  details: {
    apy: number;
    threshold: number;
  };
}

export interface UtilizationHighCandidate extends CandidateBase {
  kind: AlertKind.UTILIZATION_HIGH;
  severity: AlertSeverity.WARNING;
  details: {
    utilizationPercent: number;
    threshold: number;
  };
}

// Produced by a rule evaluation, not persisted until the ledger accepts it
export type AlertCandidate = TvlDropCandidate | ApyLowCandidate | UtilizationHighCandidate;

// Persisted alert record; open while resolvedAt is null
export interface Alert {
  id: string;
  protocolId: string;
  kind: AlertKind;
  severity: AlertSeverity;
  message: string;
  triggeredAt: Date;
  resolvedAt: Date | null;
}

export type AlertFilter = AlertStatus | 'all';

export enum SaveOutcome {
  INSERTED = 'inserted',
  DUPLICATE_SUPPRESSED = 'duplicate_suppressed',
}

export type SaveResult =
  | { outcome: SaveOutcome.INSERTED; alert: Alert }
  | { outcome: SaveOutcome.DUPLICATE_SUPPRESSED };

// Wire shape for the reporting API
export interface AlertView {
  id: string;
  protocol_id: string;
  alert_kind: AlertKind;
  severity: AlertSeverity;
  message: string;
  triggered_at: string;
  resolved_at: string | null;
  status: AlertStatus;
}

export function alertStatus(alert: Alert): AlertStatus {
  return alert.resolvedAt === null ? 'open' : 'resolved';
}

export function toAlertView(alert: Alert): AlertView {
  return {
    id: alert.id,
    protocol_id: alert.protocolId,
    alert_kind: alert.kind,
    severity: alert.severity,
    message: alert.message,
    triggered_at: alert.triggeredAt.toISOString(),
    resolved_at: alert.resolvedAt ? alert.resolvedAt.toISOString() : null,
    status: alertStatus(alert),
  };
}
