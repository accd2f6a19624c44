import { DateTime } from 'luxon'
import { BaseModel, column, belongsTo } from '@adonisjs/lucid/orm'
import type { BelongsTo } from '@adonisjs/lucid/types/relations'
import type { SupportedLanguage, TurnRole } from '#bot/types/bot_types'
import BotUser from './bot_user.js'

/**
 * Tour de conversation. L'identifiant auto-incrémenté donne l'ordre d'écriture.
 */
export default class BotMessage extends BaseModel {
  @column({ isPrimary: true })
  declare id: number

  @column()
  declare botUserId: string

  @column()
  declare role: TurnRole

  @column()
  declare content: string

  @column()
  declare language: SupportedLanguage

  @column.dateTime()
  declare createdAt: DateTime

  @belongsTo(() => BotUser)
  declare botUser: BelongsTo<typeof BotUser>

  public static forUser(botUserId: string) {
    return this.query().where('botUserId', botUserId)
  }
}
