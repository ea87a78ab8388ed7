import { describe, it, expect, vi } from 'vitest';
import { TurnQueue } from './turn-queue';

describe('TurnQueue', () => {
  it('runs a job enqueued from inside a turn after the current one', () => {
    const queue = new TurnQueue(vi.fn());
    const order: string[] = [];

    queue.run(() => {
      order.push('a-start');
      queue.run(() => order.push('b'));
      order.push('a-end');
    });

    expect(order).toEqual(['a-start', 'a-end', 'b']);
  });

  it('holds deferred work until the queue drains', () => {
    const queue = new TurnQueue(vi.fn());
    const order: string[] = [];

    queue.run(() => {
      queue.defer(() => order.push('deferred'));
      queue.run(() => order.push('second'));
      order.push('first');
    });

    expect(order).toEqual(['first', 'second', 'deferred']);
  });

  it('runs deferred work at once when idle', () => {
    const queue = new TurnQueue(vi.fn());
    const deferred = vi.fn();
    queue.defer(deferred);
    expect(deferred).toHaveBeenCalledTimes(1);
  });

  it('defers work queued by a deferred callback to the same flush', () => {
    const queue = new TurnQueue(vi.fn());
    const order: string[] = [];

    queue.run(() => {
      queue.defer(() => {
        order.push('first');
        queue.defer(() => order.push('second'));
      });
    });

    expect(order).toEqual(['first', 'second']);
  });

  it('hands a throwing job to the error handler and keeps draining', () => {
    const onError = vi.fn();
    const queue = new TurnQueue(onError);
    const boom = new Error('boom');
    const after = vi.fn();

    queue.run(() => {
      queue.run(after);
      throw boom;
    });

    expect(onError).toHaveBeenCalledWith(boom);
    expect(after).toHaveBeenCalledTimes(1);
  });
});
