import { BaseSchema } from '@adonisjs/lucid/schema'

export default class extends BaseSchema {
  protected tableName = 'learning_paths'

  async up() {
    this.schema.createTable(this.tableName, (table) => {
      table.increments('id')
      table
        .integer('child_profile_id')
        .unsigned()
        .notNullable()
        .references('id')
        .inTable('child_profiles')
        .onDelete('CASCADE')
      table.string('title', 200).notNullable()
      table.text('description').notNullable()
      table.integer('current_stage').notNullable().defaultTo(1)
      table.integer('total_stages').notNullable().defaultTo(5)
      table.integer('progress_percentage').notNullable().defaultTo(0)

      table.timestamp('created_at')
      table.timestamp('last_updated')
    })
  }

  async down() {
    this.schema.dropTable(this.tableName)
  }
}
