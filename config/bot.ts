import env from '#start/env'
import {
  SUPPORTED_LANGUAGES,
  isSupportedLanguage,
  type EmergencyContact,
  type LanguageMetadata,
  type SupportedLanguage,
} from '#bot/types/bot_types'

const defaultLanguage = env.get('BOT_DEFAULT_LANGUAGE', 'en')

if (!isSupportedLanguage(defaultLanguage)) {
  throw new Error(
    `BOT_DEFAULT_LANGUAGE "${defaultLanguage}" is not supported (expected one of ${SUPPORTED_LANGUAGES.join(', ')})`
  )
}

const languages: Record<SupportedLanguage, LanguageMetadata> = {
  id: {
    code: 'id',
    name: 'Indonesian',
    nativeName: 'Bahasa Indonesia',
    flag: '🇮🇩',
    aliases: ['indonesia', 'indonesian', 'bahasa', 'ind'],
  },
  zh: {
    code: 'zh',
    name: 'Chinese',
    nativeName: '中文',
    flag: '🇹🇼',
    aliases: ['chinese', 'mandarin', 'zh-tw', 'zh-hant', '中文'],
  },
  en: {
    code: 'en',
    name: 'English',
    nativeName: 'English',
    flag: '🇬🇧',
    aliases: ['english', 'eng'],
  },
  vi: {
    code: 'vi',
    name: 'Vietnamese',
    nativeName: 'Tiếng Việt',
    flag: '🇻🇳',
    aliases: ['vietnamese', 'viet', 'tiengviet'],
  },
}

const emergencyContacts: EmergencyContact[] = [
  { key: 'police', number: '110' },
  { key: 'fire_ambulance', number: '119' },
  { key: 'foreign_worker_hotline', number: '1955' },
  { key: 'anti_trafficking', number: '113' },
  { key: 'anti_fraud', number: '165' },
]

export default {
  /**
   * Configuration générale du bot
   */
  general: {
    name: 'Pelita',
    version: '1.0.0',
    description: 'Multilingual assistant for migrant workers in Taiwan',
    enabled: env.get('BOT_ENABLED', true),
    defaultLanguage,
    supportedLanguages: [...SUPPORTED_LANGUAGES],
    languages,
  },

  /**
   * Canal LINE
   */
  line: {
    channelSecret: env.get('LINE_CHANNEL_SECRET', ''),
    channelAccessToken: env.get('LINE_CHANNEL_ACCESS_TOKEN', ''),
    maxMessageLength: 5000,
  },

  /**
   * Historique de conversation
   */
  conversation: {
    historyWindow: env.get('BOT_HISTORY_WINDOW', 10),
    maxUserMessageChars: 2000,
    maxHistoryTurnChars: 500,
  },

  /**
   * Délais des collaborateurs externes (ms)
   */
  timeouts: {
    aiMs: env.get('BOT_AI_TIMEOUT_MS', 25000),
    detectionMs: env.get('BOT_DETECTION_TIMEOUT_MS', 1500),
    platformMs: env.get('BOT_PLATFORM_TIMEOUT_MS', 5000),
  },

  /**
   * Détection de langue au premier contact
   */
  detection: {
    minConfidence: 0.7,
    minTextLength: 2,
  },

  /**
   * Menus riches : un artefact par langue, nommé `<prefix>-<langue>-v<version>`
   */
  richMenu: {
    prefix: env.get('BOT_RICH_MENU_PREFIX', 'pelita'),
    layoutFile: 'resources/rich_menus/layout.yml',
    imageDirectory: 'resources/rich_menus',
    syncConcurrency: 5,
  },

  /**
   * Numéros d'urgence (Taïwan)
   */
  emergency: {
    country: 'TW',
    contacts: emergencyContacts,
  },

  /**
   * Administration
   */
  admin: {
    token: env.get('ADMIN_TOKEN', ''),
  },
}
