import { DateTime } from 'luxon'
import InvalidActivityStatusException from '#exceptions/invalid_activity_status_exception'
import RecordNotFoundException from '#exceptions/record_not_found_exception'
import { isActivityStatus } from '#types/learning_paths'
import type {
  ActivityStatusResult,
  LearningPathChanges,
  PathActivityChanges,
  PathActivityRecord,
  PathStore,
} from '#types/learning_paths'

/**
 * Share of completed activities, floored. `null` when the path
 * has no activity to count.
 */
export function computeProgressPercentage(completed: number, total: number): number | null {
  if (total === 0) {
    return null
  }
  return Math.floor((100 * completed) / total)
}

export default class ProgressTracker {
  /**
   * Moves an activity to the requested status. Completing the
   * activity of the path's current stage advances the stage pointer
   * (never past the last stage) and recomputes the progress.
   *
   * `isCompleted` is never reset once set, whatever status comes next.
   */
  static async applyActivityStatus(
    activity: PathActivityRecord,
    requestedStatus: string,
    store: PathStore
  ): Promise<ActivityStatusResult> {
    if (!isActivityStatus(requestedStatus)) {
      throw new InvalidActivityStatusException(requestedStatus)
    }

    const path = await store.findPath(activity.learningPathId)
    if (!path) {
      throw new RecordNotFoundException('learning path', activity.learningPathId)
    }

    const activityChanges: PathActivityChanges = { status: requestedStatus }
    if (requestedStatus === 'completed') {
      activityChanges.isCompleted = true
    }
    const updatedActivity = await store.updateActivity(activity.id, activityChanges)

    if (requestedStatus !== 'completed' || activity.stageNumber !== path.currentStage) {
      return { activity: updatedActivity, path, stageAdvanced: false }
    }

    const pathChanges: LearningPathChanges = { lastUpdated: DateTime.now() }
    if (path.currentStage < path.totalStages) {
      pathChanges.currentStage = path.currentStage + 1
    }

    const percentage = await this.countProgress(path.id, store)
    if (percentage !== null) {
      pathChanges.progressPercentage = percentage
    }

    const updatedPath = await store.updatePath(path.id, pathChanges)

    return {
      activity: updatedActivity,
      path: updatedPath,
      stageAdvanced: pathChanges.currentStage !== undefined,
    }
  }

  /**
   * Recomputes and stores the progress of a path. Paths without
   * activities are left untouched and yield `null`.
   */
  static async recomputeProgress(learningPathId: number, store: PathStore): Promise<number | null> {
    const percentage = await this.countProgress(learningPathId, store)
    if (percentage === null) {
      return null
    }

    await store.updatePath(learningPathId, { progressPercentage: percentage })
    return percentage
  }

  private static async countProgress(learningPathId: number, store: PathStore) {
    const completed = await store.countActivities(learningPathId, { isCompleted: true })
    const total = await store.countActivities(learningPathId)
    return computeProgressPercentage(completed, total)
  }
}
