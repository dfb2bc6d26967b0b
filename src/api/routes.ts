import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { DAY_MS } from '../utils/format.js';
import { ErrorCode, MonitorError, errorMessage, toErrorEnvelope } from '../core/errors.js';
import { AlertSeverity, toAlertView } from '../core/types/alerts.js';
import { systemClock, type Clock } from '../core/ports.js';
import type { ProtocolHealth, ProtocolRegistry, Snapshot } from '../core/types/protocols.js';
import type { PipelineSummary } from '../core/types/pipeline.js';
import type { DeliveryCounts } from '../alerting/DeliveryStats.js';
import type { CollectorStatus } from '../collectors/BaseCollector.js';
import type { SnapshotRepository } from '../storage/repositories/SnapshotRepository.js';
import type { AlertRepository } from '../storage/repositories/AlertRepository.js';

const logger = createLogger('Api');

export const API_VERSION = '1.0.0';

export interface RouteDeps {
  appName: string;
  protocols: ProtocolRegistry;
  snapshots: Pick<SnapshotRepository, 'latest' | 'history'>;
  alerts: Pick<AlertRepository, 'list' | 'worstOpenSeverity'>;
  database: { ping(): void };
  alertSettings: { statusWindowMs: number; resolvedListLimit: number };
  getLastRun?: () => PipelineSummary | null;
  getDeliveryCounts?: () => DeliveryCounts;
  getCollectorStatus?: () => CollectorStatus;
  clock?: Clock;
}

const historyQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(30),
});

const alertsQuerySchema = z.object({
  status: z.enum(['open', 'resolved', 'all']).default('open'),
});

interface ProtocolStatusView {
  name: string;
  tvl: number | null;
  apy: number | null;
  utilization: number | null;
  status: ProtocolHealth;
  last_updated: string | null;
}

const HTTP_STATUS: Partial<Record<ErrorCode, number>> = {
  [ErrorCode.UnknownProtocol]: 404,
  [ErrorCode.InvalidQuery]: 400,
  [ErrorCode.NotFound]: 404,
  [ErrorCode.StorageUnavailable]: 503,
};

export const sendError = (reply: FastifyReply, error: unknown): FastifyReply => {
  if (error instanceof MonitorError) {
    return reply.code(HTTP_STATUS[error.code] ?? 500).send(toErrorEnvelope(error.code, error.message, error.details));
  }

  return reply.code(500).send(toErrorEnvelope(ErrorCode.InternalError, 'Unexpected internal error', {
    error: errorMessage(error),
  }));
};

function toHealth(severity: AlertSeverity | null): ProtocolHealth {
  if (severity === AlertSeverity.CRITICAL) return 'critical';
  if (severity === AlertSeverity.WARNING) return 'warning';
  return 'healthy';
}

const toHistoryPoint = (snapshot: Snapshot) => ({
  timestamp: snapshot.timestamp.toISOString(),
  tvl: snapshot.tvl,
  apy: snapshot.apy7d,
  utilization: snapshot.utilization,
});

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const clock = deps.clock ?? systemClock;

  const unknownStatus = (name: string): ProtocolStatusView => ({
    name,
    tvl: null,
    apy: null,
    utilization: null,
    status: 'unknown',
    last_updated: null,
  });

  const protocolStatus = (protocolId: string, now: Date): ProtocolStatusView => {
    try {
      const snapshot = deps.snapshots.latest(protocolId);
      if (!snapshot) {
        return unknownStatus(protocolId);
      }
      const severity = deps.alerts.worstOpenSeverity(
        protocolId,
        new Date(now.getTime() - deps.alertSettings.statusWindowMs)
      );
      return {
        name: protocolId,
        tvl: snapshot.tvl,
        apy: snapshot.apy7d,
        utilization: snapshot.utilization,
        status: toHealth(severity),
        last_updated: snapshot.timestamp.toISOString(),
      };
    } catch (error) {
      logger.error(`Error determining status for ${protocolId}: ${errorMessage(error)}`);
      return unknownStatus(protocolId);
    }
  };

  app.get('/', async () => ({
    message: deps.appName,
    version: API_VERSION,
    endpoints: ['/protocols', '/protocols/{name}/history', '/alerts', '/health'],
  }));

  app.get('/protocols', async () => {
    const now = clock();
    return Object.keys(deps.protocols).map((protocolId) => protocolStatus(protocolId, now));
  });

  app.get<{ Params: { name: string } }>('/protocols/:name/history', async (request, reply) => {
    const { name } = request.params;
    if (!Object.hasOwn(deps.protocols, name)) {
      return reply.code(404).send(toErrorEnvelope(ErrorCode.UnknownProtocol, `Protocol '${name}' not found`));
    }

    const parse = historyQuerySchema.safeParse(request.query);
    if (!parse.success) {
      return reply.code(400).send(toErrorEnvelope(
        ErrorCode.InvalidQuery,
        'Invalid query params.',
        parse.error.flatten(),
      ));
    }

    try {
      const since = new Date(clock().getTime() - parse.data.days * DAY_MS);
      return deps.snapshots.history(name, since).map(toHistoryPoint);
    } catch (error) {
      logger.error(`Error fetching history for ${name}: ${errorMessage(error)}`);
      return sendError(reply, error);
    }
  });

  app.get('/alerts', async (request, reply) => {
    const parse = alertsQuerySchema.safeParse(request.query);
    if (!parse.success) {
      return reply.code(400).send(toErrorEnvelope(
        ErrorCode.InvalidQuery,
        'Invalid query params.',
        parse.error.flatten(),
      ));
    }

    try {
      return deps.alerts.list(parse.data.status, deps.alertSettings.resolvedListLimit).map(toAlertView);
    } catch (error) {
      logger.error(`Error fetching alerts: ${errorMessage(error)}`);
      return sendError(reply, error);
    }
  });

  app.get('/health', async (_request, reply) => {
    try {
      deps.database.ping();
      const lastRun = deps.getLastRun?.() ?? null;
      const alerts = deps.getDeliveryCounts?.();
      const collector = deps.getCollectorStatus?.();
      return {
        status: 'healthy',
        timestamp: clock().toISOString(),
        last_run: lastRun
          ? { run_id: lastRun.runId, status: lastRun.status, finished_at: lastRun.finishedAt }
          : null,
        ...(alerts === undefined ? {} : { alerts }),
        ...(collector === undefined
          ? {}
          : {
              collector: {
                name: collector.name,
                last_collection_at: collector.lastCollectionAt?.toISOString() ?? null,
                last_error: collector.lastError ?? null,
                last_error_at: collector.lastErrorAt?.toISOString() ?? null,
                total_collections: collector.totalCollections,
                total_errors: collector.totalErrors,
              },
            }),
      };
    } catch (error) {
      logger.error(`Health check failed: ${errorMessage(error)}`);
      return reply.code(503).send({
        status: 'unhealthy',
        error: errorMessage(error),
        timestamp: clock().toISOString(),
      });
    }
  });
}
