import { DateTime } from 'luxon'
import { BaseModel, belongsTo, column } from '@adonisjs/lucid/orm'
import type { BelongsTo } from '@adonisjs/lucid/types/relations'
import LearningPath from '#models/learning_path'
import RecordNotFoundException from '#exceptions/record_not_found_exception'
import ProfileAccessDeniedException from '#exceptions/profile_access_denied_exception'
import type { ActivityStatus, ActivityType } from '#types/learning_paths'

export default class PathActivity extends BaseModel {
  @column({ isPrimary: true })
  declare id: number

  @column()
  declare learningPathId: number

  @column()
  declare title: string

  @column()
  declare description: string

  @column()
  declare activityType: ActivityType

  @column()
  declare contentUrl: string | null

  @column()
  declare stageNumber: number

  @column()
  declare status: ActivityStatus

  @column({ consume: (value) => Boolean(value) })
  declare isCompleted: boolean

  @column.dateTime({ autoCreate: true })
  declare createdAt: DateTime

  @belongsTo(() => LearningPath)
  declare learningPath: BelongsTo<typeof LearningPath>

  /**
   * Resolves an activity through its path up to the child profile
   * and checks the profile belongs to the given user
   */
  static async findOwnedOrFail(id: number, user: { id: number }) {
    const activity = await this.query()
      .where('id', id)
      .preload('learningPath', (pathQuery) => pathQuery.preload('childProfile'))
      .first()

    if (!activity) {
      throw new RecordNotFoundException('path activity', id)
    }
    if (activity.learningPath.childProfile.userId !== user.id) {
      throw new ProfileAccessDeniedException()
    }
    return activity
  }
}
