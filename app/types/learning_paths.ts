import type { DateTime } from 'luxon'

export const ACTIVITY_STATUSES = ['pending', 'in-progress', 'completed'] as const
export type ActivityStatus = (typeof ACTIVITY_STATUSES)[number]

/**
 * Kinds of work an activity can hold. Append to the list to
 * introduce a new kind.
 */
export const ACTIVITY_TYPES = ['assessment', 'exercise', 'reading', 'quiz', 'creative'] as const
export type ActivityType = (typeof ACTIVITY_TYPES)[number]

export function isActivityStatus(value: unknown): value is ActivityStatus {
  return ACTIVITY_STATUSES.some((status) => status === value)
}

/**
 * The part of a child profile the generator reads
 */
export interface ChildProfileSnapshot {
  id: number
  name: string
  age: number
  readingLevel: string
}

export interface LearningPathRecord {
  id: number
  childProfileId: number
  title: string
  description: string
  currentStage: number
  totalStages: number
  progressPercentage: number
  createdAt: DateTime
  lastUpdated: DateTime
}

export interface PathActivityRecord {
  id: number
  learningPathId: number
  title: string
  description: string
  activityType: ActivityType
  contentUrl: string | null
  stageNumber: number
  status: ActivityStatus
  isCompleted: boolean
  createdAt: DateTime
}

export type NewLearningPath = Omit<LearningPathRecord, 'id' | 'createdAt' | 'lastUpdated'>
export type NewPathActivity = Omit<PathActivityRecord, 'id' | 'createdAt' | 'contentUrl'>

export type LearningPathChanges = Partial<
  Pick<LearningPathRecord, 'currentStage' | 'progressPercentage' | 'lastUpdated'>
>
export type PathActivityChanges = Partial<Pick<PathActivityRecord, 'status' | 'isCompleted'>>

export interface GeneratedLearningPath {
  path: LearningPathRecord
  activities: PathActivityRecord[]
}

export interface ActivityStatusResult {
  activity: PathActivityRecord
  path: LearningPathRecord
  stageAdvanced: boolean
}

/**
 * Persistence operations the learning path core relies on. An
 * instance is bound to a single unit of work.
 */
export interface PathStore {
  findProfile(id: number): Promise<ChildProfileSnapshot | null>
  createPath(attributes: NewLearningPath): Promise<LearningPathRecord>
  createActivities(activities: NewPathActivity[]): Promise<PathActivityRecord[]>
  findPath(id: number): Promise<LearningPathRecord | null>
  findActivity(id: number): Promise<PathActivityRecord | null>
  findPathsByProfile(childProfileId: number): Promise<LearningPathRecord[]>
  findActivitiesByPath(learningPathId: number): Promise<PathActivityRecord[]>
  countActivities(learningPathId: number, filter?: { isCompleted?: boolean }): Promise<number>
  updatePath(id: number, changes: LearningPathChanges): Promise<LearningPathRecord>
  updateActivity(id: number, changes: PathActivityChanges): Promise<PathActivityRecord>
}

/**
 * Runs `work` against a store scoped to one transaction. The
 * transaction commits when `work` resolves and rolls back when
 * it throws.
 */
export interface UnitOfWork {
  transaction<T>(work: (store: PathStore) => Promise<T>): Promise<T>
}
