/**
 * Transition log event types.
 */

/**
 * Who produced a transition. Only `loop` transitions are forwarded to
 * subscribers; `notification` transitions come from the notification
 * subsystem reporting on itself and are written to the sink only.
 */
export type TransitionOrigin = 'loop' | 'notification';

/** Structured `key=value` fields, rendered in insertion order. */
export type TransitionFields = Record<string, string | number>;

/**
 * One recorded event. Never mutated after creation.
 */
export interface Transition {
  /** ISO timestamp, second precision (`2024-01-02T03:04:05Z`) */
  readonly timestamp: string;
  /** Free-text event name, e.g. `cmd start` or `state=SOLVING` */
  readonly message: string;
  readonly fields: Readonly<TransitionFields>;
  readonly origin: TransitionOrigin;
}

/** Receives every `loop`-origin transition after it is written. */
export type TransitionListener = (transition: Transition) => Promise<void>;
