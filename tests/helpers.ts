import { vi } from 'vitest';
import { openDatabase, IN_MEMORY, type DatabaseWrapper } from '../src/storage/Database.js';
import { HOUR_MS } from '../src/utils/format.js';
import {
  AlertKind,
  AlertSeverity,
  type Alert,
  type ApyLowCandidate,
  type TvlDropCandidate,
} from '../src/core/types/alerts.js';
import type { Clock, SnapshotStore } from '../src/core/ports.js';
import type { ProtocolRegistry, Snapshot, Thresholds } from '../src/core/types/protocols.js';

export const T0 = new Date('2024-03-01T12:00:00.000Z');

export const at = (offsetMs: number): Date => new Date(T0.getTime() + offsetMs);

export const hoursAgo = (hours: number): Date => at(-hours * HOUR_MS);

export function fixedClock(date: Date = T0): Clock {
  return () => new Date(date.getTime());
}

// Clock whose current instant tests can move
export function movableClock(start: Date = T0): { clock: Clock; advance(ms: number): void } {
  let now = start.getTime();
  return {
    clock: () => new Date(now),
    advance: (ms) => {
      now += ms;
    },
  };
}

export const TEST_THRESHOLDS: Thresholds = {
  tvlDrop24hPercent: 20,
  apyMinPercent: 2,
  utilizationMaxPercent: 95,
};

export function makeProtocols(): ProtocolRegistry {
  return {
    'aave-v3': {
      id: 'aave-v3',
      name: 'Aave V3',
      defillamaSlug: 'aave-v3',
      type: 'lending',
      chain: 'ethereum',
      metrics: { apy7d: 3.45, utilization: 0.725 },
    },
    'uniswap-v3': {
      id: 'uniswap-v3',
      name: 'Uniswap V3',
      defillamaSlug: 'uniswap-v3',
      type: 'dex',
      chain: 'ethereum',
      metrics: { apy7d: 12, utilization: 0.5 },
    },
  };
}

export function openTestDatabase(): DatabaseWrapper {
  return openDatabase({ databasePath: IN_MEMORY, busyTimeoutMs: 1000 });
}

export function makeSnapshot(
  protocolId: string,
  timestamp: Date,
  values: Partial<Pick<Snapshot, 'tvl' | 'apy7d' | 'utilization'>> = {}
): Snapshot {
  return {
    protocolId,
    timestamp,
    tvl: values.tvl ?? null,
    apy7d: values.apy7d ?? null,
    utilization: values.utilization ?? null,
  };
}

export function tvlCandidate(protocolId = 'aave-v3', triggeredAt: Date = T0): TvlDropCandidate {
  return {
    protocolId,
    kind: AlertKind.TVL_DROP,
    severity: AlertSeverity.CRITICAL,
    message: 'TVL dropped 30.00% in 24 hours (from $50,000,000,000.00 to $35,000,000,000.00)',
    triggeredAt,
    details: { previousTvl: 50_000_000_000, currentTvl: 35_000_000_000, dropPercent: 30 },
  };
}

export function apyCandidate(protocolId = 'aave-v3', triggeredAt: Date = T0): ApyLowCandidate {
  return {
    protocolId,
    kind: AlertKind.APY_LOW,
    severity: AlertSeverity.WARNING,
    message: 'APY dropped below threshold: 1.50% (threshold: 2.00%)',
    triggeredAt,
    details: { apy: 1.5, threshold: 2 },
  };
}

export function makeAlert(overrides: Partial<Alert> = {}): Alert {
  return {
    id: 'alert-1',
    protocolId: 'aave-v3',
    kind: AlertKind.TVL_DROP,
    severity: AlertSeverity.CRITICAL,
    message: 'TVL dropped 30.00% in 24 hours (from $50,000,000,000.00 to $35,000,000,000.00)',
    triggeredAt: T0,
    resolvedAt: null,
    ...overrides,
  };
}

export function fakeSink(delivered = true) {
  return {
    name: 'fake',
    enabled: true,
    send: vi.fn(async (_alert: Alert) => delivered),
    sendTestMessage: vi.fn(async () => delivered),
  };
}

// Array-backed store for exercising rules without SQLite
export class InMemorySnapshotStore implements SnapshotStore {
  private readonly rows: Snapshot[] = [];

  constructor(snapshots: Snapshot[] = []) {
    for (const snapshot of snapshots) {
      this.append(snapshot);
    }
  }

  latest(protocolId: string): Snapshot | null {
    return this.newestFirst(protocolId)[0] ?? null;
  }

  asOf(protocolId: string, cutoff: Date): Snapshot | null {
    return this.newestFirst(protocolId).find((s) => s.timestamp.getTime() <= cutoff.getTime()) ?? null;
  }

  append(snapshot: Snapshot): boolean {
    const exists = this.rows.some(
      (s) => s.protocolId === snapshot.protocolId && s.timestamp.getTime() === snapshot.timestamp.getTime()
    );
    if (exists) {
      return false;
    }
    this.rows.push(snapshot);
    return true;
  }

  private newestFirst(protocolId: string): Snapshot[] {
    return this.rows
      .filter((s) => s.protocolId === protocolId)
      .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  }
}
