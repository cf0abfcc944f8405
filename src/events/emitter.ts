/**
 * chatport - Notification Channel
 * Typed fan-out for `scroll` and transcript notifications
 *
 * Handler lists are replaced, never mutated, so a handler that unsubscribes
 * (or subscribes) while a notification is being delivered only affects the
 * next one.
 */

import type { EventHandler, Unsubscribe, EventMap } from "../types";

export interface Emitter<T extends EventMap> {
  on: <E extends keyof T>(event: E, handler: EventHandler<T[E]>) => Unsubscribe;
  emit: <E extends keyof T>(event: E, payload: T[E]) => void;
  /** Drop every subscription (on teardown) */
  clear: () => void;
}

type HandlerLists<T extends EventMap> = {
  [E in keyof T]?: readonly EventHandler<T[E]>[];
};

/**
 * `scope` prefixes failure reports, e.g. `chatport/chat`.
 */
export const createEmitter = <T extends EventMap>(
  scope = "chatport",
): Emitter<T> => {
  let lists: HandlerLists<T> = {};

  const on = <E extends keyof T>(
    event: E,
    handler: EventHandler<T[E]>,
  ): Unsubscribe => {
    lists[event] = [...(lists[event] ?? []), handler];

    return () => {
      const current = lists[event];
      if (current) lists[event] = current.filter((h) => h !== handler);
    };
  };

  const emit = <E extends keyof T>(event: E, payload: T[E]): void => {
    const current = lists[event];
    if (!current) return;

    for (const handler of current) {
      try {
        handler(payload);
      } catch (error) {
        console.error(
          `[${scope}] "${String(event)}" handler threw:`,
          error,
        );
      }
    }
  };

  return {
    on,
    emit,
    clear: () => {
      lists = {};
    },
  };
};
