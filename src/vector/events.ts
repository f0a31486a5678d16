/**
 * Event system for slot vectors.
 * Provides a pub/sub mechanism for buffer replacement.
 */

// =============================================================================
// Event Types
// =============================================================================

/**
 * Base event interface.
 */
export interface VectorEvent {
  readonly type: string;
  readonly timestamp: number;
}

/**
 * Operation that caused a buffer replacement.
 */
export type GrowthReason = 'reserve' | 'push' | 'insert' | 'resize';

/**
 * Fired after a vector adopts a new buffer.
 */
export interface ReallocateEvent extends VectorEvent {
  readonly type: 'reallocate';
  readonly reason: GrowthReason;
  /** Capacity before the replacement */
  readonly prevCapacity: number;
  /** Capacity after the replacement */
  readonly nextCapacity: number;
  /** Number of elements relocated into the new buffer */
  readonly size: number;
}

/**
 * Event type to handler mapping.
 */
export interface VectorEventMap {
  reallocate: ReallocateEvent;
}

// =============================================================================
// Event Handler Types
// =============================================================================

/**
 * Handler function for a specific event type.
 */
export type EventHandler<E extends VectorEvent> = (event: E) => void;

/**
 * Unsubscribe function returned by addEventListener.
 */
export type Unsubscribe = () => void;

// =============================================================================
// Event Emitter
// =============================================================================

/**
 * Type-safe pub/sub for vector events.
 * One emitter may be shared by any number of vectors.
 */
export interface VectorEventEmitter {
  /**
   * Add an event listener for a specific event type.
   * @returns Unsubscribe function
   */
  addEventListener<K extends keyof VectorEventMap>(
    type: K,
    handler: EventHandler<VectorEventMap[K]>
  ): Unsubscribe;

  removeEventListener<K extends keyof VectorEventMap>(
    type: K,
    handler: EventHandler<VectorEventMap[K]>
  ): void;

  /**
   * Emit an event to all registered handlers.
   * A throwing handler is logged and does not stop the others.
   */
  emit<K extends keyof VectorEventMap>(type: K, event: VectorEventMap[K]): void;

  removeAllListeners(): void;
}

type HandlerSets = {
  [K in keyof VectorEventMap]: Set<EventHandler<VectorEventMap[K]>>;
};

/**
 * Create a new vector event emitter.
 */
export function createVectorEventEmitter(): VectorEventEmitter {
  const handlers: HandlerSets = {
    reallocate: new Set(),
  };

  return {
    addEventListener<K extends keyof VectorEventMap>(
      type: K,
      handler: EventHandler<VectorEventMap[K]>
    ): Unsubscribe {
      const typeHandlers = handlers[type];
      typeHandlers.add(handler);
      return () => {
        typeHandlers.delete(handler);
      };
    },

    removeEventListener<K extends keyof VectorEventMap>(
      type: K,
      handler: EventHandler<VectorEventMap[K]>
    ): void {
      handlers[type].delete(handler);
    },

    emit<K extends keyof VectorEventMap>(type: K, event: VectorEventMap[K]): void {
      for (const handler of handlers[type]) {
        try {
          handler(event);
        } catch (error) {
          console.error(`Event handler error for '${type}':`, error);
        }
      }
    },

    removeAllListeners(): void {
      for (const typeHandlers of Object.values(handlers)) {
        typeHandlers.clear();
      }
    },
  };
}

// =============================================================================
// Event Helpers
// =============================================================================

/**
 * Create a reallocate event.
 */
export function createReallocateEvent(
  reason: GrowthReason,
  prevCapacity: number,
  nextCapacity: number,
  size: number
): ReallocateEvent {
  return Object.freeze({
    type: 'reallocate' as const,
    timestamp: Date.now(),
    reason,
    prevCapacity,
    nextCapacity,
    size,
  });
}
