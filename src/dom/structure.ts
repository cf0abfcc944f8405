/**
 * chatport/dom - DOM Structure
 * Container resolution and the element scaffold of a DOM viewport
 */

// =============================================================================
// Types
// =============================================================================

export interface DOMStructure {
  /** Focusable outer element, receives page keys */
  root: HTMLElement;
  /** Clipping element, receives wheel input */
  viewport: HTMLElement;
  /** Translated by the scroll offset, holds the item elements */
  content: HTMLElement;
}

// =============================================================================
// Container Resolution
// =============================================================================

export const resolveContainer = (container: HTMLElement | string): HTMLElement => {
  if (typeof container === "string") {
    const el = document.querySelector<HTMLElement>(container);
    if (!el) throw new Error(`[chatport/dom] Container not found: ${container}`);
    return el;
  }
  return container;
};

// =============================================================================
// DOM Structure Factory
// =============================================================================

export const createDOMStructure = (
  container: HTMLElement,
  classPrefix: string,
  ariaLabel?: string,
): DOMStructure => {
  const root = document.createElement("div");
  root.className = classPrefix;
  root.setAttribute("role", "log");
  root.setAttribute("tabindex", "0");
  if (ariaLabel) root.setAttribute("aria-label", ariaLabel);
  root.style.height = "100%";
  root.style.width = "100%";

  const viewport = document.createElement("div");
  viewport.className = `${classPrefix}-viewport`;
  // offsets are applied by transform, native scrolling stays off
  viewport.style.overflow = "hidden";
  viewport.style.position = "relative";
  viewport.style.height = "100%";
  viewport.style.width = "100%";

  const content = document.createElement("div");
  content.className = `${classPrefix}-content`;
  content.style.position = "relative";
  content.style.width = "100%";
  content.style.willChange = "transform";

  viewport.appendChild(content);
  root.appendChild(viewport);
  container.appendChild(root);

  return { root, viewport, content };
};

/** Render a template result into an element */
export const applyTemplate = (
  element: HTMLElement,
  result: string | HTMLElement,
): void => {
  if (typeof result === "string") element.innerHTML = result;
  else element.replaceChildren(result);
};
