import { DateTime } from 'luxon'
import { BaseModel, belongsTo, column } from '@adonisjs/lucid/orm'
import type { BelongsTo } from '@adonisjs/lucid/types/relations'
import ChildProfile from '#models/child_profile'

export default class ProgressAssessment extends BaseModel {
  @column({ isPrimary: true })
  declare id: number

  @column()
  declare childProfileId: number

  @column.dateTime({ autoCreate: true })
  declare assessmentDate: DateTime

  @column()
  declare readingLevel: string

  @column()
  declare readingFluencyScore: number | null

  @column()
  declare comprehensionScore: number | null

  @column()
  declare vocabularyScore: number | null

  @column()
  declare notes: string | null

  @belongsTo(() => ChildProfile)
  declare childProfile: BelongsTo<typeof ChildProfile>
}
