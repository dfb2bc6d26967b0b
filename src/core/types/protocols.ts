// Protocol and snapshot domain types

export type ProtocolType = 'lending' | 'dex' | 'yield' | 'other';

export interface StaticMetrics {
  apy7d?: number;
  utilization?: number;
}

export interface ProtocolConfig {
  id: string;
  name: string;
  defillamaSlug: string;
  type: ProtocolType;
  chain: string;
  metrics?: StaticMetrics;
}

export type ProtocolRegistry = Record<string, ProtocolConfig>;

// One sample of a protocol's metrics. Absent numbers mean "unknown", never zero.
export interface Snapshot {
  protocolId: string;
  timestamp: Date;
  tvl: number | null;
  apy7d: number | null;
  utilization: number | null;
}

export interface Thresholds {
  tvlDrop24hPercent: number;
  apyMinPercent: number;
  utilizationMaxPercent: number;
}

export type ProtocolHealth = 'healthy' | 'warning' | 'critical' | 'unknown';
