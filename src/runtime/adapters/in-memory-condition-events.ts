import type { Logger } from '../../core/logging/index.js';
import { errorMessageOf } from '../../errors/formatter.js';
import type {
  ConditionEvent,
  ConditionEventKind,
  ConditionEvents,
  ConditionListener,
  Unsubscribe,
} from '../ports/condition-events.js';

/**
 * In-memory ConditionEvents implementation.
 * Listeners run synchronously in subscription order; async listeners are not awaited.
 */
export class InMemoryConditionEvents implements ConditionEvents {
  private readonly listeners: Record<ConditionEventKind, Set<ConditionListener>> = {
    condition_met: new Set(),
    condition_failed: new Set(),
  };

  constructor(private readonly logger: Logger) {}

  onConditionMet(listener: ConditionListener): Unsubscribe {
    return this.subscribe('condition_met', listener);
  }

  onConditionFailed(listener: ConditionListener): Unsubscribe {
    return this.subscribe('condition_failed', listener);
  }

  emit(event: ConditionEvent): void {
    // Copy so a listener that unsubscribes mid-emit does not skip its neighbours.
    for (const listener of [...this.listeners[event.kind]]) {
      try {
        const pending = listener(event);
        if (pending instanceof Promise) {
          void pending.catch((error: unknown) => this.reportFailure(event, error));
        }
      } catch (error) {
        this.reportFailure(event, error);
      }
    }
  }

  listenerCount(kind: ConditionEventKind): number {
    return this.listeners[kind].size;
  }

  private subscribe(kind: ConditionEventKind, listener: ConditionListener): Unsubscribe {
    this.listeners[kind].add(listener);
    return () => {
      this.listeners[kind].delete(listener);
    };
  }

  private reportFailure(event: ConditionEvent, error: unknown): void {
    this.logger.warn({ err: error, event: event.kind }, `Condition listener failed: ${errorMessageOf(error)}`);
  }
}
