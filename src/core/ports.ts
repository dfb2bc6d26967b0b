import type { Alert, AlertCandidate, AlertKind, SaveResult } from './types/alerts.js';
import type { Snapshot } from './types/protocols.js';

/**
 * Read/append access to per-protocol snapshots.
 *
 * `asOf` returns the freshest sample at or before the cutoff. It does not
 * interpolate: when sampling is sparser than the lookback, the sample it
 * returns can be considerably older than the cutoff.
 */
export interface SnapshotStore {
  latest(protocolId: string): Snapshot | null;
  asOf(protocolId: string, cutoff: Date): Snapshot | null;
  /** Returns false when a snapshot with the same (protocolId, timestamp) already exists. */
  append(snapshot: Snapshot): boolean;
}

export interface AlertLedger {
  hasRecentOpen(protocolId: string, kind: AlertKind, windowMs?: number): boolean;
  save(candidate: AlertCandidate): Promise<SaveResult>;
}

/** Best-effort delivery. Resolves false on failure and never rejects. */
export interface NotificationSink {
  readonly name: string;
  /** False for a switched-off channel; the ledger then skips delivery entirely. */
  readonly enabled: boolean;
  send(alert: Alert): Promise<boolean>;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
