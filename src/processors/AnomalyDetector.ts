import { createLogger } from '../utils/logger.js';
import { ConfigurationError, ErrorCode, errorMessage } from '../core/errors.js';
import { systemClock, type AlertLedger, type Clock, type SnapshotStore } from '../core/ports.js';
import { DEFAULT_RULES, type ThresholdRule } from './rules/index.js';
import type { AlertCandidate } from '../core/types/alerts.js';
import type { ProtocolRegistry, Thresholds } from '../core/types/protocols.js';

const logger = createLogger('AnomalyDetector');

export interface AnomalyDetectorDeps {
  protocols: ProtocolRegistry;
  snapshots: SnapshotStore;
  ledger: AlertLedger;
  thresholds: Thresholds;
  rules?: readonly ThresholdRule[];
  clock?: Clock;
}

export type DetectionResult = Record<string, AlertCandidate[]>;

/**
 * Runs every threshold rule over every configured protocol and hands each
 * candidate to the alert ledger as soon as it is produced.
 *
 * Returned candidates describe what was detected in this run. Whether a
 * candidate became a new alert or was suppressed as a duplicate is the
 * ledger's business.
 */
export class AnomalyDetector {
  private readonly protocols: ProtocolRegistry;
  private readonly snapshots: SnapshotStore;
  private readonly ledger: AlertLedger;
  private readonly thresholds: Thresholds;
  private readonly rules: readonly ThresholdRule[];
  private readonly clock: Clock;

  constructor(deps: AnomalyDetectorDeps) {
    this.protocols = deps.protocols;
    this.snapshots = deps.snapshots;
    this.ledger = deps.ledger;
    this.thresholds = deps.thresholds;
    this.rules = deps.rules ?? DEFAULT_RULES;
    this.clock = deps.clock ?? systemClock;
  }

  // Evaluate one protocol; unknown ids surface as ConfigurationError
  async detectOne(protocolId: string): Promise<AlertCandidate[]> {
    const protocol = Object.hasOwn(this.protocols, protocolId) ? this.protocols[protocolId] : undefined;
    if (!protocol) {
      throw new ConfigurationError(`Unknown protocol: ${protocolId}`, ErrorCode.UnknownProtocol, { protocolId });
    }

    // One instant per protocol so every rule reads the same point in time
    const now = this.clock();
    const candidates: AlertCandidate[] = [];

    for (const rule of this.rules) {
      const candidate = rule({ store: this.snapshots, protocol, thresholds: this.thresholds, now });
      if (!candidate) {
        continue;
      }
      await this.ledger.save(candidate);
      candidates.push(candidate);
    }

    if (candidates.length > 0) {
      logger.info(`Detected ${candidates.length} anomalies for ${protocolId}`);
    }
    return candidates;
  }

  // Never throws: a failing protocol is logged and reported with no candidates
  async detectAll(): Promise<DetectionResult> {
    const results: DetectionResult = {};

    for (const protocolId of Object.keys(this.protocols)) {
      try {
        results[protocolId] = await this.detectOne(protocolId);
      } catch (error) {
        logger.error(`Error detecting anomalies for ${protocolId}: ${errorMessage(error)}`);
        results[protocolId] = [];
      }
    }

    return results;
  }
}

export default AnomalyDetector;
