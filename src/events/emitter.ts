import type { EventListener, ProgressEvent } from './types.js';

/**
 * Synchronous fan-out of progress events. A listener that throws is reported
 * and does not stop the pipeline or the other listeners.
 */
export class EventEmitter {
  private readonly listeners = new Set<EventListener>();

  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: ProgressEvent): void {
    // Listeners may unsubscribe while being notified
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        console.error('Error in event listener:', error);
      }
    }
  }
}

/** Shared by the pipeline and whoever wants to watch it. */
export const events = new EventEmitter();
