/**
 * chatport/dom - Browser host
 */

export {
  createDomViewport,
  type DomViewport,
  type DomViewportConfig,
  type ItemView,
  type VisibilityEntry,
} from "./host";

export {
  createDOMStructure,
  resolveContainer,
  applyTemplate,
  type DOMStructure,
} from "./structure";
