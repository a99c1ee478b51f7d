import { DateTime } from 'luxon'
import { BaseModel, belongsTo, column, hasMany } from '@adonisjs/lucid/orm'
import type { BelongsTo, HasMany } from '@adonisjs/lucid/types/relations'
import User from '#models/user'
import LearningPath from '#models/learning_path'
import ProgressAssessment from '#models/progress_assessment'
import RecordNotFoundException from '#exceptions/record_not_found_exception'
import ProfileAccessDeniedException from '#exceptions/profile_access_denied_exception'

export default class ChildProfile extends BaseModel {
  @column({ isPrimary: true })
  declare id: number

  @column()
  declare userId: number

  @column()
  declare name: string

  @column()
  declare age: number

  @column()
  declare readingLevel: string

  @column()
  declare avatarUrl: string | null

  @column({
    consume: (value) => (value && typeof value === 'string' ? JSON.parse(value) : (value ?? [])),
    prepare: (value) => JSON.stringify(value ?? []),
  })
  declare interests: string[]

  @column.dateTime({ autoCreate: true })
  declare createdAt: DateTime

  @column.dateTime({ autoCreate: true, autoUpdate: true })
  declare updatedAt: DateTime

  @belongsTo(() => User)
  declare user: BelongsTo<typeof User>

  @hasMany(() => LearningPath)
  declare learningPaths: HasMany<typeof LearningPath>

  @hasMany(() => ProgressAssessment)
  declare assessments: HasMany<typeof ProgressAssessment>

  /**
   * Finds a profile and checks it belongs to the given user
   */
  static async findOwnedOrFail(id: number, user: { id: number }) {
    const profile = await this.find(id)
    if (!profile) {
      throw new RecordNotFoundException('child profile', id)
    }
    if (profile.userId !== user.id) {
      throw new ProfileAccessDeniedException()
    }
    return profile
  }
}
