import { describe, expect, it, vi } from 'vitest';
import { EventBus } from '../src/core/events/EventBus.js';
import { AlertKind } from '../src/core/types/alerts.js';

describe('EventBus', () => {
  it('delivers typed payloads to listeners', () => {
    const bus = new EventBus(false);
    const listener = vi.fn();
    bus.on('alert:suppressed', listener);

    bus.emit('alert:suppressed', { protocolId: 'aave-v3', kind: AlertKind.TVL_DROP });

    expect(listener).toHaveBeenCalledWith({ protocolId: 'aave-v3', kind: AlertKind.TVL_DROP });
  });

  it('calls once listeners a single time', () => {
    const bus = new EventBus(false);
    const listener = vi.fn();
    bus.once('pipeline:started', listener);

    bus.emit('pipeline:started', { runId: 'run-1' });
    bus.emit('pipeline:started', { runId: 'run-2' });

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('removes listeners with off and clear', () => {
    const bus = new EventBus(false);
    const removed = vi.fn();
    const cleared = vi.fn();
    bus.on('pipeline:started', removed);
    bus.on('alert:suppressed', cleared);

    bus.off('pipeline:started', removed);
    bus.clear();
    bus.emit('pipeline:started', { runId: 'run-1' });
    bus.emit('alert:suppressed', { protocolId: 'aave-v3', kind: AlertKind.APY_LOW });

    expect(removed).not.toHaveBeenCalled();
    expect(cleared).not.toHaveBeenCalled();
  });

  it('keeps separate instances isolated', () => {
    const first = new EventBus(false);
    const second = new EventBus(false);
    const listener = vi.fn();
    first.on('pipeline:started', listener);

    second.emit('pipeline:started', { runId: 'run-1' });

    expect(listener).not.toHaveBeenCalled();
  });
});
