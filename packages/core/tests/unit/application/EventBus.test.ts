import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../../src/application/EventBus.js';
import type { BatchCreatedEvent, BatchCompletedEvent, DomainEvent } from '../../../src/domain/events/DomainEvents.js';

function createdEvent(): BatchCreatedEvent {
  return {
    type: 'batch:created',
    batchId: 'batch-1',
    datasetId: 'dataset-1',
    format: 'json',
    timestamp: Date.now(),
  };
}

describe('EventBus', () => {
  it('should emit events to registered handlers', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('batch:created', handler);

    const event = createdEvent();
    bus.emit(event);
    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith(event);
  });

  it('should not call handlers for different event types', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('batch:created', handler);

    const event: BatchCompletedEvent = {
      type: 'batch:completed',
      batchId: 'batch-1',
      timestamp: Date.now(),
    };

    bus.emit(event);
    expect(handler).not.toHaveBeenCalled();
  });

  it('should support multiple handlers for the same event', () => {
    const bus = new EventBus();
    const handler1 = vi.fn();
    const handler2 = vi.fn();

    bus.on('batch:created', handler1);
    bus.on('batch:created', handler2);

    bus.emit(createdEvent());
    expect(handler1).toHaveBeenCalledOnce();
    expect(handler2).toHaveBeenCalledOnce();
  });

  it('should remove handlers with off()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('batch:created', handler);
    bus.off('batch:created', handler);

    bus.emit(createdEvent());
    expect(handler).not.toHaveBeenCalled();
  });

  it('should deliver every event type to wildcard handlers', () => {
    const bus = new EventBus();
    const handler = vi.fn<(event: DomainEvent) => void>();

    bus.onAny(handler);
    bus.emit(createdEvent());
    bus.emit({ type: 'batch:aborted', batchId: 'batch-1', timestamp: Date.now() });

    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler.mock.calls.map(([e]) => e.type)).toEqual(['batch:created', 'batch:aborted']);

    bus.offAny(handler);
    bus.emit(createdEvent());
    expect(handler).toHaveBeenCalledTimes(2);
  });

  it('should keep notifying other handlers when one throws', () => {
    const onHandlerError = vi.fn();
    const bus = new EventBus(onHandlerError);
    const failing = vi.fn(() => {
      throw new Error('handler broke');
    });
    const healthy = vi.fn();

    bus.on('batch:created', failing);
    bus.on('batch:created', healthy);

    const event = createdEvent();
    expect(() => bus.emit(event)).not.toThrow();
    expect(healthy).toHaveBeenCalledOnce();
    expect(onHandlerError).toHaveBeenCalledWith(new Error('handler broke'), event);
  });
});
