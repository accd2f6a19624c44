import { BaseSchema } from '@adonisjs/lucid/schema'
import { SUPPORTED_LANGUAGES } from '#bot/types/bot_types'

export default class extends BaseSchema {
  protected tableName = 'bot_messages'

  async up() {
    this.schema.createTable(this.tableName, (table) => {
      table.increments('id')

      table.string('bot_user_id', 64).notNullable()
      table.foreign('bot_user_id').references('bot_users.id').onDelete('CASCADE')

      table.enum('role', ['user', 'assistant']).notNullable()
      table.text('content').notNullable()
      table.enum('language', [...SUPPORTED_LANGUAGES]).notNullable()

      table.timestamp('created_at', { useTz: true }).notNullable()

      table.index(['bot_user_id', 'id'])
    })
  }

  async down() {
    this.schema.dropTable(this.tableName)
  }
}
