// app/bot/contracts/persistence.contract.ts

import type {
  BotUserRecord,
  ConversationTurn,
  GroupChannelRecord,
} from '#bot/types/bot_types'

/**
 * Accès aux données du bot.
 * Les lectures d'un même utilisateur respectent l'ordre d'écriture.
 */
export interface BotRepository {
  getUser(id: string): Promise<BotUserRecord | null>

  upsertUser(user: BotUserRecord): Promise<void>

  /**
   * Parcourt les utilisateurs par pages, triés par identifiant
   */
  listUsers(afterId: string | null, limit: number): Promise<BotUserRecord[]>

  appendTurn(turn: ConversationTurn): Promise<void>

  /**
   * Au plus `limit` tours, les plus récents, dans l'ordre chronologique
   */
  getRecentTurns(userId: string, limit: number): Promise<ConversationTurn[]>

  truncateTurns(userId: string): Promise<void>

  getGroupChannel(groupId: string): Promise<GroupChannelRecord | null>

  upsertGroupChannel(channel: GroupChannelRecord): Promise<void>
}
