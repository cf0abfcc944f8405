/**
 * chatport - Constants
 * All default values and magic numbers in one place
 */

// =============================================================================
// Edges
// =============================================================================

/**
 * Tolerance used for "is at top" / "is at bottom" checks.
 * Translations within this distance of an edge count as being on it.
 */
export const EDGE_EPSILON = 0.01;

// =============================================================================
// Animation
// =============================================================================

/**
 * Progress gained per second of elapsed time while a smooth scroll is in flight.
 * At 30 an animation settles in roughly two 60Hz frames.
 */
export const ANIMATION_RATE = 30;

// =============================================================================
// Input
// =============================================================================

/** Distance scrolled by one wheel "line" */
export const LINE_HEIGHT = 80;

// =============================================================================
// DOM Host
// =============================================================================

/** Default CSS class prefix */
export const DEFAULT_CLASS_PREFIX = "chatport";

// =============================================================================
// Chat Transcript
// =============================================================================

/** Messages kept in scrollback before the oldest are evicted */
export const DEFAULT_MAX_MESSAGES = 500;

// =============================================================================
// Settings
// =============================================================================

/** Storage key for persisted UI settings */
export const DEFAULT_SETTINGS_KEY = "chatport:settings";
