import { createLogger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../core/errors.js';
import type { SnapshotStore } from '../core/ports.js';
import type { ProtocolConfig, ProtocolRegistry, Snapshot } from '../core/types/protocols.js';

export interface CollectorStatus {
  name: string;
  lastCollectionAt?: Date;
  lastErrorAt?: Date;
  lastError?: string;
  totalCollections: number;
  totalErrors: number;
}

export type IngestionResult = Record<string, boolean>;

export abstract class BaseCollector {
  abstract readonly name: string;

  protected lastCollectionAt?: Date;
  protected lastErrorAt?: Date;
  protected lastError?: string;
  protected totalCollections = 0;
  protected totalErrors = 0;
  protected logger: Logger;

  constructor(
    protected readonly protocols: ProtocolRegistry,
    protected readonly store: SnapshotStore
  ) {
    this.logger = createLogger(this.constructor.name);
  }

  // Build one snapshot for a protocol; null when the source had no usable data
  protected abstract fetchSnapshot(protocol: ProtocolConfig): Promise<Snapshot | null>;

  // True only when a new snapshot row was written
  async ingestOne(protocolId: string): Promise<boolean> {
    const protocol = Object.hasOwn(this.protocols, protocolId) ? this.protocols[protocolId] : undefined;
    if (!protocol) {
      this.logger.error(`Unknown protocol: ${protocolId}`);
      return false;
    }

    try {
      const snapshot = await this.fetchSnapshot(protocol);
      if (!snapshot) {
        this.logger.warn(`Failed to fetch data for ${protocolId}`);
        return false;
      }

      const saved = this.store.append(snapshot);
      this.lastCollectionAt = new Date();
      this.totalCollections++;
      this.lastError = undefined;

      if (saved) {
        this.logger.info(`Ingested ${protocolId}`);
      } else {
        this.logger.warn(`Data already exists for ${protocolId}`);
      }
      return saved;
    } catch (error) {
      this.totalErrors++;
      this.lastErrorAt = new Date();
      this.lastError = errorMessage(error);
      this.logger.error(`Error ingesting ${protocolId}: ${this.lastError}`);
      return false;
    }
  }

  // One protocol's failure never stops the others
  async ingestAll(): Promise<IngestionResult> {
    const results: IngestionResult = {};

    for (const protocolId of Object.keys(this.protocols)) {
      results[protocolId] = await this.ingestOne(protocolId);
    }

    const successCount = Object.values(results).filter(Boolean).length;
    this.logger.info(`Ingestion complete: ${successCount}/${Object.keys(results).length} protocols successful`);
    return results;
  }

  // Get collector status
  getStatus(): CollectorStatus {
    return {
      name: this.name,
      lastCollectionAt: this.lastCollectionAt,
      lastErrorAt: this.lastErrorAt,
      lastError: this.lastError,
      totalCollections: this.totalCollections,
      totalErrors: this.totalErrors,
    };
  }
}

export default BaseCollector;
