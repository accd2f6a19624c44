import { DateTime } from 'luxon'
import logger from '@adonisjs/core/services/logger'
import type { BotRepository } from '#bot/contracts/persistence.contract'
import type { ConversationTurn, SupportedLanguage, TurnRole } from '#bot/types/bot_types'
import { shortId } from '#bot/utils/timeout'

/**
 * Journal de conversation par utilisateur, en ajout seul.
 * Seule la fenêtre des N derniers tours est relue pour l'IA.
 * L'appelant détient le verrou de l'utilisateur.
 */
export default class ConversationStore {
  constructor(
    private readonly repository: BotRepository,
    private readonly windowSize: number
  ) {
    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new RangeError(`Conversation window must be a positive integer, got ${windowSize}`)
    }
  }

  public async append(
    userId: string,
    role: TurnRole,
    content: string,
    language: SupportedLanguage
  ): Promise<ConversationTurn> {
    const turn: ConversationTurn = {
      userId,
      role,
      content,
      language,
      createdAt: DateTime.now(),
    }
    await this.repository.appendTurn(turn)
    return turn
  }

  /**
   * Les `windowSize` tours les plus récents, du plus ancien au plus récent
   */
  public async window(userId: string): Promise<ConversationTurn[]> {
    return this.repository.getRecentTurns(userId, this.windowSize)
  }

  public async reset(userId: string): Promise<void> {
    await this.repository.truncateTurns(userId)
    logger.info({ userId: shortId(userId) }, 'Conversation history cleared')
  }
}
