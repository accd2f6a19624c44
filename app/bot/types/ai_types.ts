import type { ConversationTurn, SupportedLanguage, TurnRole } from './bot_types.js'

/**
 * Message envoyé au modèle
 */
export interface AIMessage {
  role: TurnRole
  content: string
}

/**
 * Requête vers un provider IA
 */
export interface AIRequest {
  system: string
  messages: AIMessage[]
  maxTokens: number
  temperature: number
}

export interface AIUsageStats {
  provider: string
  isAvailable: boolean
  requests: number
  failures: number
}

/**
 * Provider IA
 */
export interface AIProvider {
  readonly name: string
  generate(request: AIRequest, signal: AbortSignal): Promise<string>
  isAvailable(): boolean
  getUsageStats(): AIUsageStats
}

/**
 * Service de complétion consommé par le routeur : borné dans le temps,
 * une erreur est remontée telle quelle, sans nouvel essai.
 */
export interface AIBackend {
  complete(
    context: ConversationTurn[],
    language: SupportedLanguage,
    signal?: AbortSignal
  ): Promise<string>

  translate(text: string, target: SupportedLanguage, signal?: AbortSignal): Promise<string>

  getStats(): AIUsageStats
}
