import { BaseSchema } from '@adonisjs/lucid/schema'
import { SUPPORTED_LANGUAGES } from '#bot/types/bot_types'

export default class extends BaseSchema {
  protected tableName = 'bot_users'

  async up() {
    this.schema.createTable(this.tableName, (table) => {
      // Identifiant LINE (U + 32 hex)
      table.string('id', 64).primary()

      table.enum('preferred_language', [...SUPPORTED_LANGUAGES]).notNullable()
      table.string('assigned_menu_id', 128).nullable()

      table.timestamp('last_seen_at', { useTz: true }).notNullable()
      table.timestamp('created_at', { useTz: true }).notNullable()
      table.timestamp('updated_at', { useTz: true }).notNullable()

      table.index(['preferred_language'])
    })
  }

  async down() {
    this.schema.dropTable(this.tableName)
  }
}
