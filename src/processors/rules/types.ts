import type { SnapshotStore } from '../../core/ports.js';
import type { AlertCandidate } from '../../core/types/alerts.js';
import type { ProtocolConfig, Thresholds } from '../../core/types/protocols.js';

export interface RuleContext {
  store: SnapshotStore;
  protocol: ProtocolConfig;
  thresholds: Thresholds;
  now: Date;
}

// Pure evaluator: reads the store, owns no state
export type ThresholdRule = (context: RuleContext) => AlertCandidate | null;
