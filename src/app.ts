import { createLogger } from './utils/logger.js';
import { getThresholds, toProtocolRegistry, type AppConfig } from './config/index.js';
import { openDatabase, type DatabaseWrapper } from './storage/Database.js';
import { SnapshotRepository } from './storage/repositories/SnapshotRepository.js';
import { AlertRepository } from './storage/repositories/AlertRepository.js';
import { AlertManager } from './alerting/AlertManager.js';
import { DeliveryStats } from './alerting/DeliveryStats.js';
import { AnomalyDetector } from './processors/AnomalyDetector.js';
import { DefiLlamaCollector } from './collectors/defillama/DefiLlamaCollector.js';
import { MonitoringPipeline } from './pipeline/MonitoringPipeline.js';
import { createNotificationSink, type AlertNotifier } from './notifications/index.js';
import { eventBus, type EventBus } from './core/events/EventBus.js';
import { systemClock, type Clock } from './core/ports.js';
import type { ProtocolRegistry } from './core/types/protocols.js';

const logger = createLogger('App');

export interface MonitorContext {
  config: AppConfig;
  protocols: ProtocolRegistry;
  events: EventBus;
  database: DatabaseWrapper;
  snapshots: SnapshotRepository;
  alerts: AlertRepository;
  sink: AlertNotifier;
  alertManager: AlertManager;
  deliveryStats: DeliveryStats;
  detector: AnomalyDetector;
  collector: DefiLlamaCollector;
  pipeline: MonitoringPipeline;
}

export interface BuildOptions {
  events?: EventBus;
  sink?: AlertNotifier;
  clock?: Clock;
}

// Wire every component from one validated configuration
export function buildMonitor(config: AppConfig, options: BuildOptions = {}): MonitorContext {
  const clock = options.clock ?? systemClock;
  const events = options.events ?? eventBus;
  const protocols = toProtocolRegistry(config);

  logger.info('Initializing database...');
  const database = openDatabase(config.storage);
  const snapshots = new SnapshotRepository(database);
  const alerts = new AlertRepository(database);

  logger.info(`Initializing ${config.notifications.channel} notification channel...`);
  const sink = options.sink ?? createNotificationSink(config.notifications);

  const deliveryStats = new DeliveryStats(events);
  const alertManager = new AlertManager(
    alerts,
    sink,
    events,
    {
      deduplicationWindowMs: config.alerts.deduplicationWindowMs,
      notificationTimeoutMs: config.notifications.timeoutMs,
    },
    clock
  );

  const detector = new AnomalyDetector({
    protocols,
    snapshots,
    ledger: alertManager,
    thresholds: getThresholds(config),
    clock,
  });

  const collector = new DefiLlamaCollector({
    protocols,
    store: snapshots,
    options: config.collectors.defillama,
    clock,
  });

  const pipeline = new MonitoringPipeline({
    collector,
    detector,
    events,
    intervalMs: config.pipeline.intervalMs,
    clock,
  });

  logger.info(`Monitoring ${Object.keys(protocols).length} protocols: ${Object.keys(protocols).join(', ')}`);

  return {
    config,
    protocols,
    events,
    database,
    snapshots,
    alerts,
    sink,
    alertManager,
    deliveryStats,
    detector,
    collector,
    pipeline,
  };
}
