import { DateTime } from 'luxon'
import { BaseModel, column, hasMany } from '@adonisjs/lucid/orm'
import type { HasMany } from '@adonisjs/lucid/types/relations'
import type { SupportedLanguage } from '#bot/types/bot_types'
import BotMessage from './bot_message.js'

export default class BotUser extends BaseModel {
  static selfAssignPrimaryKey = true

  /**
   * Identifiant LINE de l'utilisateur
   */
  @column({ isPrimary: true })
  declare id: string

  @column()
  declare preferredLanguage: SupportedLanguage

  @column()
  declare assignedMenuId: string | null

  @column.dateTime()
  declare lastSeenAt: DateTime

  @column.dateTime({ autoCreate: true })
  declare createdAt: DateTime

  @column.dateTime({ autoCreate: true, autoUpdate: true })
  declare updatedAt: DateTime

  @hasMany(() => BotMessage)
  declare messages: HasMany<typeof BotMessage>
}
