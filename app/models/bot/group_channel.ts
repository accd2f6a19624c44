import { DateTime } from 'luxon'
import { BaseModel, column } from '@adonisjs/lucid/orm'
import type { SupportedLanguage } from '#bot/types/bot_types'

export default class GroupChannel extends BaseModel {
  static selfAssignPrimaryKey = true

  @column({ isPrimary: true })
  declare groupId: string

  // sqlite renvoie 0/1
  @column({ consume: (value) => Boolean(value) })
  declare translateEnabled: boolean

  @column()
  declare targetLanguage: SupportedLanguage | null

  @column()
  declare enabledBy: string | null

  @column.dateTime({ autoCreate: true })
  declare createdAt: DateTime

  @column.dateTime({ autoCreate: true, autoUpdate: true })
  declare updatedAt: DateTime
}
