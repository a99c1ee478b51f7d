import { BaseSchema } from '@adonisjs/lucid/schema'

export default class extends BaseSchema {
  protected tableName = 'progress_assessments'

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
      table.timestamp('assessment_date')
      table.string('reading_level', 20).notNullable()
      table.integer('reading_fluency_score').nullable()
      table.integer('comprehension_score').nullable()
      table.integer('vocabulary_score').nullable()
      table.text('notes').nullable()
    })
  }

  async down() {
    this.schema.dropTable(this.tableName)
  }
}
