import { BaseSchema } from '@adonisjs/lucid/schema'

export default class extends BaseSchema {
  protected tableName = 'path_activities'

  async up() {
    this.schema.createTable(this.tableName, (table) => {
      table.increments('id')
      table
        .integer('learning_path_id')
        .unsigned()
        .notNullable()
        .references('id')
        .inTable('learning_paths')
        .onDelete('CASCADE')
      table.string('title', 200).notNullable()
      table.text('description').notNullable()
      table.string('activity_type', 50).notNullable()
      table.string('content_url').nullable()
      table.integer('stage_number').notNullable()
      table.string('status', 20).notNullable().defaultTo('pending')
      table.boolean('is_completed').notNullable().defaultTo(false)

      table.timestamp('created_at')

      table.index(['learning_path_id', 'stage_number'])
    })
  }

  async down() {
    this.schema.dropTable(this.tableName)
  }
}
