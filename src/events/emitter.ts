import type { ArchiverEvent, ArchiverEventMap } from '../core/types.js';

export type ArchiverListener<K extends ArchiverEvent> = (data: ArchiverEventMap[K]) => void;

type ListenerTable = { [K in ArchiverEvent]: Set<ArchiverListener<K>> };

/**
 * Progress reporting for one archive run. The CLI subscribes to print what
 * the run does; the core never writes output itself.
 */
export class ArchiverEventEmitter {
  private readonly listeners: ListenerTable = {
    'run:started': new Set(),
    'batch:started': new Set(),
    'batch:classified': new Set(),
    'folder:found': new Set(),
    'folder:created': new Set(),
    'messages:moved': new Set(),
    'run:completed': new Set(),
  };

  on<K extends ArchiverEvent>(event: K, listener: ArchiverListener<K>): () => void {
    this.listeners[event].add(listener);
    return () => this.off(event, listener);
  }

  off<K extends ArchiverEvent>(event: K, listener: ArchiverListener<K>): void {
    this.listeners[event].delete(listener);
  }

  emit<K extends ArchiverEvent>(event: K, data: ArchiverEventMap[K]): void {
    for (const listener of [...this.listeners[event]]) {
      try {
        listener(data);
      } catch {
        // a reporter failure is not an archive failure
      }
    }
  }
}
