import { DateTime } from 'luxon'
import { BaseModel, belongsTo, column, hasMany } from '@adonisjs/lucid/orm'
import type { BelongsTo, HasMany } from '@adonisjs/lucid/types/relations'
import ChildProfile from '#models/child_profile'
import PathActivity from '#models/path_activity'

export default class LearningPath extends BaseModel {
  @column({ isPrimary: true })
  declare id: number

  @column()
  declare childProfileId: number

  @column()
  declare title: string

  @column()
  declare description: string

  @column()
  declare currentStage: number

  @column()
  declare totalStages: number

  @column()
  declare progressPercentage: number

  @column.dateTime({ autoCreate: true })
  declare createdAt: DateTime

  // Only moved by the progress tracker, hence no autoUpdate
  @column.dateTime({ autoCreate: true })
  declare lastUpdated: DateTime

  @belongsTo(() => ChildProfile)
  declare childProfile: BelongsTo<typeof ChildProfile>

  @hasMany(() => PathActivity)
  declare activities: HasMany<typeof PathActivity>
}
