import BotUser from '#models/bot/bot_user'
import BotMessage from '#models/bot/bot_message'
import GroupChannel from '#models/bot/group_channel'
import type { BotRepository } from '#bot/contracts/persistence.contract'
import type {
  BotUserRecord,
  ConversationTurn,
  GroupChannelRecord,
} from '#bot/types/bot_types'

function toUserRecord(user: BotUser): BotUserRecord {
  return {
    id: user.id,
    preferredLanguage: user.preferredLanguage,
    assignedMenuId: user.assignedMenuId,
    lastSeenAt: user.lastSeenAt,
  }
}

function toTurn(message: BotMessage): ConversationTurn {
  return {
    userId: message.botUserId,
    role: message.role,
    content: message.content,
    language: message.language,
    createdAt: message.createdAt,
  }
}

function toGroupRecord(channel: GroupChannel): GroupChannelRecord {
  return {
    groupId: channel.groupId,
    translateEnabled: channel.translateEnabled,
    targetLanguage: channel.targetLanguage,
    enabledBy: channel.enabledBy,
  }
}

/**
 * Persistance Lucid (PostgreSQL en exploitation)
 */
export default class LucidBotRepository implements BotRepository {
  async getUser(id: string): Promise<BotUserRecord | null> {
    const user = await BotUser.find(id)
    return user ? toUserRecord(user) : null
  }

  async upsertUser(record: BotUserRecord): Promise<void> {
    await BotUser.updateOrCreate(
      { id: record.id },
      {
        preferredLanguage: record.preferredLanguage,
        assignedMenuId: record.assignedMenuId,
        lastSeenAt: record.lastSeenAt,
      }
    )
  }

  async listUsers(afterId: string | null, limit: number): Promise<BotUserRecord[]> {
    const query = BotUser.query().orderBy('id', 'asc').limit(limit)
    if (afterId !== null) {
      query.where('id', '>', afterId)
    }
    const users = await query
    return users.map(toUserRecord)
  }

  async appendTurn(turn: ConversationTurn): Promise<void> {
    await BotMessage.create({
      botUserId: turn.userId,
      role: turn.role,
      content: turn.content,
      language: turn.language,
      createdAt: turn.createdAt,
    })
  }

  async getRecentTurns(userId: string, limit: number): Promise<ConversationTurn[]> {
    if (limit <= 0) {
      return []
    }

    const messages = await BotMessage.forUser(userId).orderBy('id', 'desc').limit(limit)
    return messages.reverse().map(toTurn)
  }

  async truncateTurns(userId: string): Promise<void> {
    await BotMessage.forUser(userId).delete()
  }

  async getGroupChannel(groupId: string): Promise<GroupChannelRecord | null> {
    const channel = await GroupChannel.find(groupId)
    return channel ? toGroupRecord(channel) : null
  }

  async upsertGroupChannel(record: GroupChannelRecord): Promise<void> {
    await GroupChannel.updateOrCreate(
      { groupId: record.groupId },
      {
        translateEnabled: record.translateEnabled,
        targetLanguage: record.targetLanguage,
        enabledBy: record.enabledBy,
      }
    )
  }
}
