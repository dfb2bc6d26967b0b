import { createLogger } from '../utils/logger.js';
import { getConfig } from '../config/index.js';
import { DAY_MS } from '../utils/format.js';
import { errorMessage } from '../core/errors.js';
import { buildMonitor, type MonitorContext } from '../app.js';

const logger = createLogger('DemoAlert');

const DEMO_PROTOCOL = process.argv[2] ?? 'aave-v3';

// A 30% TVL drop, low APY and high utilization in one go
function seedSnapshots(monitor: MonitorContext, protocolId: string, now: Date): void {
  logger.info('Inserting demo history to trigger alerts...');

  monitor.snapshots.upsertForSeed({
    protocolId,
    timestamp: new Date(now.getTime() - DAY_MS),
    tvl: 50_000_000_000,
    apy7d: 5,
    utilization: 0.75,
  });

  monitor.snapshots.upsertForSeed({
    protocolId,
    timestamp: now,
    tvl: 35_000_000_000,
    apy7d: 1.5,
    utilization: 0.97,
  });

  logger.info('  - 24h ago: $50B TVL, 5% APY, 75% utilization');
  logger.info('  - Now: $35B TVL, 1.5% APY, 97% utilization');
}

async function main(): Promise<void> {
  const config = getConfig();
  const monitor = buildMonitor(config);

  try {
    if (!Object.hasOwn(monitor.protocols, DEMO_PROTOCOL)) {
      throw new Error(`Protocol ${DEMO_PROTOCOL} is not configured`);
    }

    seedSnapshots(monitor, DEMO_PROTOCOL, new Date());

    logger.info('Running anomaly detection...');
    const candidates = await monitor.detector.detectOne(DEMO_PROTOCOL);
    for (const candidate of candidates) {
      logger.info(`  ${candidate.severity.toUpperCase()}: ${candidate.message}`);
    }
    logger.info(`Detected ${candidates.length} anomalies for ${DEMO_PROTOCOL}`);

    logger.info(`Sending test message via ${monitor.sink.name}...`);
    const delivered = await monitor.sink.sendTestMessage();
    logger.info(delivered ? 'Test message sent' : 'Test message not sent');
  } finally {
    monitor.database.close();
  }
}

main().catch((error: unknown) => {
  logger.error(`Demo failed: ${errorMessage(error)}`);
  process.exit(1);
});
