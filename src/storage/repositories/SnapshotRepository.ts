import { z } from 'zod';
import { storageCall, type DatabaseWrapper } from '../Database.js';
import { createLogger } from '../../utils/logger.js';
import type { SnapshotStore } from '../../core/ports.js';
import type { Snapshot } from '../../core/types/protocols.js';

const logger = createLogger('SnapshotRepository');

const SNAPSHOT_COLUMNS = 'protocol_id, timestamp, tvl_usd, apy_7d, utilization_rate';

const snapshotRowSchema = z.object({
  protocol_id: z.string(),
  timestamp: z.number(),
  tvl_usd: z.number().nullable(),
  apy_7d: z.number().nullable(),
  utilization_rate: z.number().nullable(),
});

function toSnapshot(row: unknown): Snapshot | null {
  if (row === undefined) {
    return null;
  }
  const parsed = snapshotRowSchema.parse(row);
  return {
    protocolId: parsed.protocol_id,
    timestamp: new Date(parsed.timestamp),
    tvl: parsed.tvl_usd,
    apy7d: parsed.apy_7d,
    utilization: parsed.utilization_rate,
  };
}

export class SnapshotRepository implements SnapshotStore {
  constructor(private readonly database: DatabaseWrapper) {}

  // Most recent snapshot for a protocol
  latest(protocolId: string): Snapshot | null {
    return storageCall('latest snapshot', () => {
      const stmt = this.database.prepare(`
        SELECT ${SNAPSHOT_COLUMNS} FROM protocol_snapshots
        WHERE protocol_id = ?
        ORDER BY timestamp DESC
        LIMIT 1
      `);
      return toSnapshot(stmt.get(protocolId));
    });
  }

  // Freshest snapshot at or before the cutoff
  asOf(protocolId: string, cutoff: Date): Snapshot | null {
    return storageCall('snapshot as of cutoff', () => {
      const stmt = this.database.prepare(`
        SELECT ${SNAPSHOT_COLUMNS} FROM protocol_snapshots
        WHERE protocol_id = ? AND timestamp <= ?
        ORDER BY timestamp DESC
        LIMIT 1
      `);
      return toSnapshot(stmt.get(protocolId, cutoff.getTime()));
    });
  }

  // Insert; an existing (protocol_id, timestamp) row is left untouched
  append(snapshot: Snapshot): boolean {
    return storageCall('append snapshot', () => {
      const stmt = this.database.prepare(`
        INSERT INTO protocol_snapshots (${SNAPSHOT_COLUMNS})
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT (protocol_id, timestamp) DO NOTHING
      `);

      const result = stmt.run(
        snapshot.protocolId,
        snapshot.timestamp.getTime(),
        snapshot.tvl,
        snapshot.apy7d,
        snapshot.utilization
      );

      if (result.changes === 0) {
        logger.info(
          `Snapshot already exists for ${snapshot.protocolId} at ${snapshot.timestamp.toISOString()}`
        );
        return false;
      }

      logger.debug(`Saved snapshot for ${snapshot.protocolId}`);
      return true;
    });
  }

  // Snapshots newer than `since`, newest first
  history(protocolId: string, since: Date): Snapshot[] {
    return storageCall('snapshot history', () => {
      const stmt = this.database.prepare(`
        SELECT ${SNAPSHOT_COLUMNS} FROM protocol_snapshots
        WHERE protocol_id = ? AND timestamp > ?
        ORDER BY timestamp DESC
      `);
      const snapshots: Snapshot[] = [];
      for (const row of stmt.all(protocolId, since.getTime())) {
        const snapshot = toSnapshot(row);
        if (snapshot) {
          snapshots.push(snapshot);
        }
      }
      return snapshots;
    });
  }

  /**
   * Seed-only write that overwrites the TVL of an existing (protocol, timestamp)
   * row. Not part of SnapshotStore: ingestion never calls it, only the demo
   * seeding script does.
   */
  upsertForSeed(snapshot: Snapshot): void {
    storageCall('seed snapshot', () => {
      this.database
        .prepare(`
          INSERT INTO protocol_snapshots (${SNAPSHOT_COLUMNS})
          VALUES (?, ?, ?, ?, ?)
          ON CONFLICT (protocol_id, timestamp) DO UPDATE SET tvl_usd = excluded.tvl_usd
        `)
        .run(
          snapshot.protocolId,
          snapshot.timestamp.getTime(),
          snapshot.tvl,
          snapshot.apy7d,
          snapshot.utilization
        );
    });
    logger.warn(`Seeded snapshot for ${snapshot.protocolId} at ${snapshot.timestamp.toISOString()}`);
  }
}

export default SnapshotRepository;
