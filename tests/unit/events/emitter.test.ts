import { describe, it, expect, vi } from 'vitest';
import { ArchiverEventEmitter } from '../../../src/events/emitter.js';

const MOVED = { year: 2019, folder: 'Archives/2019', count: 2 };

describe('ArchiverEventEmitter', () => {
  it('calls listener on emit', () => {
    const emitter = new ArchiverEventEmitter();
    const listener = vi.fn();
    emitter.on('messages:moved', listener);

    emitter.emit('messages:moved', MOVED);

    expect(listener).toHaveBeenCalledOnce();
    expect(listener).toHaveBeenCalledWith(MOVED);
  });

  it('returns unsubscribe function from on()', () => {
    const emitter = new ArchiverEventEmitter();
    const listener = vi.fn();
    const unsub = emitter.on('messages:moved', listener);

    unsub();
    emitter.emit('messages:moved', MOVED);

    expect(listener).not.toHaveBeenCalled();
  });

  it('off() is safe for an event without listeners', () => {
    const emitter = new ArchiverEventEmitter();
    expect(() => emitter.off('run:started', vi.fn())).not.toThrow();
  });

  it('swallows listener errors', () => {
    const emitter = new ArchiverEventEmitter();
    const badListener = vi.fn(() => {
      throw new Error('Listener error');
    });
    const goodListener = vi.fn();

    emitter.on('messages:moved', badListener);
    emitter.on('messages:moved', goodListener);

    expect(() => emitter.emit('messages:moved', MOVED)).not.toThrow();
    expect(badListener).toHaveBeenCalled();
    expect(goodListener).toHaveBeenCalled();
  });

  it('off() only removes the given listener', () => {
    const emitter = new ArchiverEventEmitter();
    const kept = vi.fn();
    const removed = vi.fn();
    emitter.on('folder:created', kept);
    emitter.on('folder:created', removed);

    emitter.off('folder:created', removed);
    emitter.emit('folder:created', { year: 2019, folder: 'Archives/2019' });

    expect(kept).toHaveBeenCalledWith({ year: 2019, folder: 'Archives/2019' });
    expect(removed).not.toHaveBeenCalled();
  });

  it('keeps events apart', () => {
    const emitter = new ArchiverEventEmitter();
    const found = vi.fn();
    emitter.on('folder:found', found);

    emitter.emit('folder:created', { year: 2019, folder: 'Archives/2019' });

    expect(found).not.toHaveBeenCalled();
  });
});
