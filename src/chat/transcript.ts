/**
 * chatport/chat - Transcript
 * Bounded message history feeding a scroll viewport
 *
 * Each message gets an id from a counter that only ever goes up. The id is the
 * viewport key, so two identical messages are still two items and an evicted
 * message's id is never handed out again.
 */

import type {
  EventHandler,
  EventMap,
  ScrollViewportEvent,
  Unsubscribe,
  ViewportEntry,
  ViewportId,
} from "../types";
import { DEFAULT_MAX_MESSAGES, EDGE_EPSILON } from "../constants";
import { createEmitter } from "../events/emitter";
import { isViewportAtBottom } from "../viewport/notify";
import type { ViewportRegistry } from "../viewport/registry";

// =============================================================================
// Types
// =============================================================================

export type MessageId = number;

export interface TranscriptConfig {
  /** Messages kept before the oldest are evicted (default: 500) */
  maxMessages?: number;

  /** Viewport showing this transcript */
  viewportId?: ViewportId;

  /** Registry the viewport is registered in */
  registry?: ViewportRegistry;

  /** Edge tolerance for the bottom check (default: 0.01) */
  epsilon?: number;
}

export interface TranscriptEvents<M> extends EventMap {
  /** "Scroll to bottom" affordance toggled */
  affordance: { visible: boolean };

  /** Message appended */
  message: { id: MessageId; message: M };

  /** Messages dropped from the front of the scrollback */
  evicted: { ids: MessageId[] };
}

export interface ChatTranscript<M> {
  /** Append a message, returning its id */
  push: (message: M) => MessageId;

  /** Snapshot of the item list for the viewport, oldest first */
  entries: () => readonly ViewportEntry<M, MessageId>[];

  size: () => number;

  /** Drop every message (reported as `evicted`) and hide the affordance */
  clear: () => void;

  /** Feed the viewport's `scroll` notifications here */
  handleScroll: (event: ScrollViewportEvent) => void;

  /** Whether the "scroll to bottom" affordance should be shown */
  showScrollToBottom: () => boolean;

  /** Jump the viewport to the newest message */
  scrollToBottom: () => boolean;

  /** Jump the viewport to the message at `index` in `entries()` */
  jumpToMessage: (index: number) => boolean;

  /** Index of the newest message matching `predicate`, or -1 */
  findMessage: (predicate: (message: M, id: MessageId) => boolean) => number;

  /** Jump to the newest matching message; `false` when none matched */
  jumpToNewestMatch: (
    predicate: (message: M, id: MessageId) => boolean,
  ) => boolean;

  on: <E extends keyof TranscriptEvents<M>>(
    event: E,
    handler: EventHandler<TranscriptEvents<M>[E]>,
  ) => Unsubscribe;
}

// =============================================================================
// Transcript Factory
// =============================================================================

export const createChatTranscript = <M>(
  config: TranscriptConfig = {},
): ChatTranscript<M> => {
  const {
    maxMessages = DEFAULT_MAX_MESSAGES,
    viewportId,
    registry,
    epsilon = EDGE_EPSILON,
  } = config;

  if (!Number.isInteger(maxMessages) || maxMessages < 1) {
    throw new Error("[chatport/chat] maxMessages must be a positive integer");
  }

  const emitter = createEmitter<TranscriptEvents<M>>("chatport/chat");
  let messages: ViewportEntry<M, MessageId>[] = [];
  let nextId: MessageId = 0;
  let showAffordance = false;

  const push = (message: M): MessageId => {
    const id = nextId++;
    messages.push({ item: message, key: id });

    if (messages.length > maxMessages) {
      const evicted = messages.splice(0, messages.length - maxMessages);
      emitter.emit("evicted", { ids: evicted.map((entry) => entry.key) });
    }

    emitter.emit("message", { id, message });
    return id;
  };

  const setAffordance = (visible: boolean): void => {
    if (visible === showAffordance) return;
    showAffordance = visible;
    emitter.emit("affordance", { visible });
  };

  const clear = (): void => {
    const ids = messages.map((entry) => entry.key);
    messages = [];
    if (ids.length > 0) emitter.emit("evicted", { ids });
    setAffordance(false);
  };

  const dispatch = (run: (registry: ViewportRegistry, id: ViewportId) => boolean): boolean => {
    if (!registry || viewportId === undefined) return false;
    return run(registry, viewportId);
  };

  const findMessage = (
    predicate: (message: M, id: MessageId) => boolean,
  ): number => {
    for (let i = messages.length - 1; i >= 0; i--) {
      const entry = messages[i];
      if (entry && predicate(entry.item, entry.key)) return i;
    }
    return -1;
  };

  const jumpToMessage = (index: number): boolean =>
    dispatch((r, id) => r.scrollToIndex(id, index));

  return {
    push,
    entries: () => messages.slice(),
    size: () => messages.length,
    clear,
    handleScroll: (event) => setAffordance(!isViewportAtBottom(event, epsilon)),
    showScrollToBottom: () => showAffordance,
    scrollToBottom: () => dispatch((r, id) => r.snapToEnd(id)),
    jumpToMessage,
    findMessage,
    jumpToNewestMatch: (predicate) => {
      const index = findMessage(predicate);
      return index >= 0 && jumpToMessage(index);
    },
    on: (event, handler) => emitter.on(event, handler),
  };
};
