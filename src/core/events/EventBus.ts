import { EventEmitter } from 'events';
import { createLogger } from '../../utils/logger.js';
import type { Alert, AlertKind } from '../types/alerts.js';
import type { PipelineSummary } from '../types/pipeline.js';

const logger = createLogger('EventBus');

// Event type definitions
export interface EventMap {
  // Ledger events
  'alert:raised': Alert;
  'alert:suppressed': { protocolId: string; kind: AlertKind };

  // Notification delivery events
  'notification:sent': { alertId: string; sink: string };
  'notification:failed': { alertId: string; sink: string; error: Error };

  // Pipeline lifecycle
  'pipeline:started': { runId: string };
  'pipeline:completed': PipelineSummary;
}

// Type-safe event emitter
export class TypedEventEmitter extends EventEmitter {
  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): boolean {
    return super.emit(event, payload);
  }

  on<K extends keyof EventMap>(event: K, listener: (payload: EventMap[K]) => void): this {
    return super.on(event, listener);
  }

  once<K extends keyof EventMap>(event: K, listener: (payload: EventMap[K]) => void): this {
    return super.once(event, listener);
  }

  off<K extends keyof EventMap>(event: K, listener: (payload: EventMap[K]) => void): this {
    return super.off(event, listener);
  }
}

export class EventBus extends TypedEventEmitter {
  constructor(private readonly traceEvents = process.env['LOG_LEVEL'] === 'debug') {
    super();
    this.setMaxListeners(50);
  }

  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): boolean {
    // Log all events in debug mode
    if (this.traceEvents) {
      logger.debug(`Event: ${event}`, { payload: this.summarizePayload(payload) });
    }
    return super.emit(event, payload);
  }

  clear(): void {
    this.removeAllListeners();
  }

  // Summarize payload for logging (avoid huge log entries)
  private summarizePayload(payload: unknown): unknown {
    if (!payload || typeof payload !== 'object') {
      return payload;
    }
    if (Array.isArray(payload)) {
      return `[Array(${payload.length})]`;
    }
    if ('ingestion' in payload && 'anomalies' in payload && 'status' in payload) {
      return { status: payload.status };
    }
    return payload;
  }
}

// Shared instance for process wiring
export const eventBus = new EventBus();
export default eventBus;
