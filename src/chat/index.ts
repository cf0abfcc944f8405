/**
 * chatport/chat - Chat transcript and UI settings
 */

export {
  createChatTranscript,
  type ChatTranscript,
  type TranscriptConfig,
  type TranscriptEvents,
  type MessageId,
} from "./transcript";

export {
  createSettingsStore,
  parseSettings,
  serializeSettings,
  SettingsError,
  DEFAULT_SETTINGS,
  type Settings,
  type UiSettings,
  type SettingsStorage,
  type SettingsStore,
} from "./settings";
