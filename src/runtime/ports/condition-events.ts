import type { ConditionResult } from '../../domain/condition-result.js';

export type ConditionEventKind = 'condition_met' | 'condition_failed';

export type ConditionEvent = {
  readonly kind: ConditionEventKind;
  readonly result: ConditionResult;
  /** The checker that raised the notification. */
  readonly source: object;
};

export type ConditionListener = (event: ConditionEvent) => void | Promise<void>;

export type Unsubscribe = () => void;

/**
 * Port for condition outcome notifications.
 * Emitting never fails: a listener that throws or rejects is isolated from
 * the other listeners and from the evaluation that raised the event.
 */
export interface ConditionEvents {
  onConditionMet(listener: ConditionListener): Unsubscribe;
  onConditionFailed(listener: ConditionListener): Unsubscribe;
  emit(event: ConditionEvent): void;
}
