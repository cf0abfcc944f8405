/**
 * chatport/chat - UI Settings
 * Persisted user preferences read by the viewport every frame
 */

import { DEFAULT_SETTINGS_KEY } from "../constants";

// =============================================================================
// Types
// =============================================================================

export interface UiSettings {
  naturalScrolling: boolean;
}

export interface Settings {
  ui: UiSettings;
}

/** Subset of the Web Storage API (`localStorage` satisfies it) */
export interface SettingsStorage {
  getItem: (key: string) => string | null;
  setItem: (key: string, value: string) => void;
}

export interface SettingsStore {
  /** Read from storage, writing defaults when nothing is stored yet */
  load: () => Settings;
  get: () => Settings;
  update: (patch: Partial<UiSettings>) => Settings;
  /** Getter suitable for the `naturalScrolling` viewport option */
  naturalScrolling: () => boolean;
}

export class SettingsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`[chatport/settings] ${message}`, options);
    this.name = "SettingsError";
  }
}

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  ui: Object.freeze({ naturalScrolling: false }),
});

// =============================================================================
// Parsing
// =============================================================================

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Parse stored settings. Unknown fields are ignored and missing ones take
 * their default; a field of the wrong type is an error.
 */
export const parseSettings = (raw: string): Settings => {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new SettingsError("Stored settings are not valid JSON", {
      cause: error,
    });
  }

  if (!isRecord(data)) {
    throw new SettingsError("Stored settings must be an object");
  }

  const ui = data.ui ?? {};
  if (!isRecord(ui)) {
    throw new SettingsError('"ui" must be an object');
  }

  const naturalScrolling =
    ui.naturalScrolling ?? DEFAULT_SETTINGS.ui.naturalScrolling;
  if (typeof naturalScrolling !== "boolean") {
    throw new SettingsError('"ui.naturalScrolling" must be a boolean');
  }

  return { ui: { naturalScrolling } };
};

export const serializeSettings = (settings: Settings): string =>
  JSON.stringify(settings, null, 2);

// =============================================================================
// Store Factory
// =============================================================================

export const createSettingsStore = (
  storage: SettingsStorage,
  key = DEFAULT_SETTINGS_KEY,
): SettingsStore => {
  let current: Settings = {
    ui: { ...DEFAULT_SETTINGS.ui },
  };

  const save = (): void => {
    storage.setItem(key, serializeSettings(current));
  };

  const load = (): Settings => {
    const raw = storage.getItem(key);
    if (raw === null) {
      current = { ui: { ...DEFAULT_SETTINGS.ui } };
      save();
    } else {
      current = parseSettings(raw);
    }
    return current;
  };

  const update = (patch: Partial<UiSettings>): Settings => {
    current = { ui: { ...current.ui, ...patch } };
    save();
    return current;
  };

  return {
    load,
    get: () => current,
    update,
    naturalScrolling: () => current.ui.naturalScrolling,
  };
};
