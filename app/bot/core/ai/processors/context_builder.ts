import logger from '@adonisjs/core/services/logger'
import { AI_CONFIG } from '../config/ai_config.js'
import type { AIMessage } from '#bot/types/ai_types'
import type { ConversationTurn } from '#bot/types/bot_types'

export interface ContextLimits {
  maxUserMessageChars: number
  maxHistoryTurnChars: number
}

/**
 * Transforme la fenêtre de conversation en messages pour le modèle :
 * tours tronqués, premier message côté utilisateur, rôles alternés.
 */
export default class ContextBuilder {
  constructor(private readonly limits: ContextLimits) {}

  build(turns: ConversationTurn[]): AIMessage[] {
    const lastIndex = turns.length - 1
    const messages: AIMessage[] = []

    turns.forEach((turn, index) => {
      const limit =
        index === lastIndex && turn.role === 'user'
          ? this.limits.maxUserMessageChars
          : this.limits.maxHistoryTurnChars
      const content = this.truncate(turn.content, limit)

      // Le modèle attend un premier message utilisateur
      if (messages.length === 0 && turn.role === 'assistant') {
        return
      }

      const previous = messages.at(-1)
      if (previous && previous.role === turn.role) {
        previous.content = `${previous.content}\n${content}`
        return
      }

      messages.push({ role: turn.role, content })
    })

    logger.debug({ turns: turns.length, messages: messages.length }, 'AI context built')

    return messages
  }

  private truncate(content: string, limit: number): string {
    return content.length > limit ? content.slice(0, limit) + AI_CONFIG.truncationSuffix : content
  }
}
