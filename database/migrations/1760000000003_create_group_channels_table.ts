import { BaseSchema } from '@adonisjs/lucid/schema'
import { SUPPORTED_LANGUAGES } from '#bot/types/bot_types'

export default class extends BaseSchema {
  protected tableName = 'group_channels'

  async up() {
    this.schema.createTable(this.tableName, (table) => {
      table.string('group_id', 64).primary()

      table.boolean('translate_enabled').defaultTo(false).notNullable()
      table.enum('target_language', [...SUPPORTED_LANGUAGES]).nullable()
      table.string('enabled_by', 64).nullable()

      table.timestamp('created_at', { useTz: true }).notNullable()
      table.timestamp('updated_at', { useTz: true }).notNullable()

      // translate_enabled implique une langue cible
      table.check(
        'translate_enabled = false OR target_language IS NOT NULL',
        {},
        'group_channels_target_check'
      )
    })
  }

  async down() {
    this.schema.dropTable(this.tableName)
  }
}
