import type { DateTime } from 'luxon'

/**
 * Langues prises en charge, dans l'ordre du catalogue
 */
export const SUPPORTED_LANGUAGES = ['id', 'zh', 'en', 'vi'] as const

export type SupportedLanguage = (typeof SUPPORTED_LANGUAGES)[number]

export function isSupportedLanguage(code: string): code is SupportedLanguage {
  return SUPPORTED_LANGUAGES.some((language) => language === code)
}

/**
 * Métadonnées d'affichage d'une langue
 */
export interface LanguageMetadata {
  code: SupportedLanguage
  name: string
  nativeName: string
  flag: string
  aliases: string[]
}

export type MessageChannel = 'line'

export type ChatScope = 'direct' | 'group'

/**
 * Utilisateur tel que stocké par la couche de persistance
 */
export interface BotUserRecord {
  id: string
  preferredLanguage: SupportedLanguage
  assignedMenuId: string | null
  lastSeenAt: DateTime
}

export type TurnRole = 'user' | 'assistant'

export interface ConversationTurn {
  userId: string
  role: TurnRole
  content: string
  language: SupportedLanguage
  createdAt: DateTime
}

export interface GroupChannelRecord {
  groupId: string
  translateEnabled: boolean
  targetLanguage: SupportedLanguage | null
  enabledBy: string | null
}

export interface QuickReplyOption {
  label: string
  text: string
}

/**
 * Origine d'une réponse produite par le routeur
 */
export type ReplySource =
  | 'canned'
  | 'command'
  | 'invalid_argument'
  | 'ai'
  | 'ai_fallback'
  | 'translation'
  | 'error'

export interface Reply {
  text: string
  language: SupportedLanguage
  source: ReplySource
  quickReplies?: QuickReplyOption[]
}

/**
 * Message entrant normalisé, indépendant du transport
 */
export interface IncomingMessage {
  channel: MessageChannel
  scope: ChatScope
  userId: string
  groupId?: string
  replyToken: string
  content: string
  messageType: 'text' | 'postback'
  timestamp: Date
}

/**
 * Adaptateur de canal chargé d'envoyer les réponses
 */
export interface ChannelAdapter {
  readonly channel: MessageChannel
  reply(replyToken: string, reply: Reply): Promise<void>
}

export interface EmergencyContact {
  key: string
  number: string
}
