/**
 * chatport - Viewport Registry
 * Identity-addressed access to viewports from outside the view tree
 *
 * Code that only holds a viewport's id (a chat panel reacting to "jump to
 * newest", a search box jumping into scrollback) looks the viewport up here
 * and queues an operation on it. The viewport applies queued operations
 * during its own commit step.
 */

import type { ScrollOperation, ViewportId } from "../types";

// =============================================================================
// Types
// =============================================================================

/** Anything that accepts scroll operations */
export interface OperationTarget {
  operate: (operation: ScrollOperation) => void;
}

export interface ViewportRegistry {
  register: (id: ViewportId, target: OperationTarget) => void;

  /** Remove `id`; when `target` is given, only if it is the one registered */
  unregister: (id: ViewportId, target?: OperationTarget) => void;

  get: (id: ViewportId) => OperationTarget | undefined;
  has: (id: ViewportId) => boolean;

  /** Queue an operation; `false` when no viewport has `id` */
  dispatch: (id: ViewportId, operation: ScrollOperation) => boolean;

  scrollToIndex: (id: ViewportId, index: number) => boolean;
  snapTo: (id: ViewportId, fraction: number) => boolean;
  snapToEnd: (id: ViewportId) => boolean;
  scrollTo: (id: ViewportId, offset: number) => boolean;
  scrollBy: (id: ViewportId, delta: number) => boolean;
}

// =============================================================================
// Identity
// =============================================================================

let nextId = 0;

/** Fresh identity, never equal to any other */
export const uniqueViewportId = (label = "viewport"): ViewportId =>
  Symbol(`${label}#${++nextId}`);

// =============================================================================
// Registry Factory
// =============================================================================

export const createViewportRegistry = (): ViewportRegistry => {
  const targets = new Map<ViewportId, OperationTarget>();

  const register = (id: ViewportId, target: OperationTarget): void => {
    const existing = targets.get(id);
    if (existing && existing !== target) {
      throw new Error(
        `[chatport] A viewport is already registered as ${String(id)}`,
      );
    }
    targets.set(id, target);
  };

  const unregister = (id: ViewportId, target?: OperationTarget): void => {
    if (target && targets.get(id) !== target) return;
    targets.delete(id);
  };

  const dispatch = (id: ViewportId, operation: ScrollOperation): boolean => {
    const target = targets.get(id);
    if (!target) return false;
    target.operate(operation);
    return true;
  };

  return {
    register,
    unregister,
    get: (id) => targets.get(id),
    has: (id) => targets.has(id),
    dispatch,
    scrollToIndex: (id, index) =>
      dispatch(id, { type: "scrollToIndex", index }),
    snapTo: (id, fraction) => dispatch(id, { type: "snapTo", fraction }),
    snapToEnd: (id) => dispatch(id, { type: "snapTo", fraction: 1 }),
    scrollTo: (id, offset) => dispatch(id, { type: "scrollTo", offset }),
    scrollBy: (id, delta) => dispatch(id, { type: "scrollBy", delta }),
  };
};
