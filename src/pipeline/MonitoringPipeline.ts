import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../core/errors.js';
import { systemClock, type Clock } from '../core/ports.js';
import type { EventBus } from '../core/events/EventBus.js';
import type { PipelineStatus, PipelineSummary } from '../core/types/pipeline.js';
import type { IngestionResult } from '../collectors/BaseCollector.js';
import type { DetectionResult } from '../processors/AnomalyDetector.js';

const logger = createLogger('MonitoringPipeline');

export interface Ingestor {
  ingestAll(): Promise<IngestionResult>;
}

export interface Detector {
  detectAll(): Promise<DetectionResult>;
}

export interface MonitoringPipelineDeps {
  collector: Ingestor;
  detector: Detector;
  events: EventBus;
  intervalMs: number;
  clock?: Clock;
}

// Process exit code for a --once run
export const EXIT_CODES: Record<PipelineStatus, number> = {
  success: 0,
  partial_failure: 1,
  failed: 2,
};

/**
 * Ingestion followed by detection. Detection always runs, so alerts are still
 * evaluated against stored history when every fetch failed.
 */
export class MonitoringPipeline {
  private readonly collector: Ingestor;
  private readonly detector: Detector;
  private readonly events: EventBus;
  private readonly intervalMs: number;
  private readonly clock: Clock;

  private intervalId: NodeJS.Timeout | null = null;
  private running = false;
  private lastSummary: PipelineSummary | null = null;

  constructor(deps: MonitoringPipelineDeps) {
    this.collector = deps.collector;
    this.detector = deps.detector;
    this.events = deps.events;
    this.intervalMs = deps.intervalMs;
    this.clock = deps.clock ?? systemClock;
  }

  async run(): Promise<PipelineSummary> {
    const runId = uuidv4();
    const startedAt = this.clock();
    logger.info(`Starting monitoring pipeline run: ${runId}`);
    this.events.emit('pipeline:started', { runId });

    let status: PipelineStatus = 'success';
    let error: string | undefined;
    let ingestion: IngestionResult = {};
    const anomalies: Record<string, number> = {};

    try {
      logger.info('Starting data ingestion phase...');
      ingestion = await this.collector.ingestAll();

      if (!Object.values(ingestion).some(Boolean)) {
        logger.error('All protocols failed during ingestion');
        status = 'partial_failure';
      }

      logger.info('Starting anomaly detection phase...');
      const detected = await this.detector.detectAll();
      for (const [protocolId, candidates] of Object.entries(detected)) {
        anomalies[protocolId] = candidates.length;
        for (const candidate of candidates) {
          logger.warn(`${protocolId}: ${candidate.severity.toUpperCase()}: ${candidate.message}`);
        }
      }

      const total = Object.values(anomalies).reduce((a, b) => a + b, 0);
      logger.info(`Anomaly detection complete: ${total} total alerts`);
    } catch (err) {
      status = 'failed';
      error = errorMessage(err);
      logger.error(`Pipeline failed with critical error: ${error}`);
    }

    const finishedAt = this.clock();
    const summary: PipelineSummary = {
      runId,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      ingestion,
      anomalies,
      status,
      ...(error === undefined ? {} : { error }),
    };

    logger.info(`Pipeline run complete: ${status} (${summary.durationMs}ms)`);
    this.lastSummary = summary;
    this.events.emit('pipeline:completed', summary);
    return summary;
  }

  // Run now, then every intervalMs; overlapping ticks are skipped
  async start(): Promise<void> {
    if (this.intervalId) {
      logger.warn('Pipeline is already running');
      return;
    }

    this.intervalId = setInterval(() => {
      this.tick().catch((err: unknown) => {
        logger.error(`Scheduled pipeline run failed: ${errorMessage(err)}`);
      });
    }, this.intervalMs);

    await this.tick();
    logger.info(`Pipeline scheduled every ${this.intervalMs / 1000}s`);
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      logger.info('Pipeline stopped');
    }
  }

  getLastRun(): PipelineSummary | null {
    return this.lastSummary;
  }

  private async tick(): Promise<void> {
    if (this.running) {
      logger.warn('Previous pipeline run still in progress, skipping');
      return;
    }
    this.running = true;
    try {
      await this.run();
    } finally {
      this.running = false;
    }
  }
}

export default MonitoringPipeline;
