import LearningPathGenerator from '#services/learning_path_generator'
import PathLock from '#services/path_lock'
import ProgressTracker from '#services/progress_tracker'
import { READING_JOURNEY_TEMPLATE } from '#services/path_template'
import type { PathTemplate } from '#services/path_template'
import InvalidActivityStatusException from '#exceptions/invalid_activity_status_exception'
import RecordNotFoundException from '#exceptions/record_not_found_exception'
import { isActivityStatus } from '#types/learning_paths'
import type {
  ActivityStatusResult,
  ChildProfileSnapshot,
  GeneratedLearningPath,
  LearningPathRecord,
  PathActivityRecord,
  UnitOfWork,
} from '#types/learning_paths'

export interface LearningPathWithActivities {
  path: LearningPathRecord
  activities: PathActivityRecord[]
}

/**
 * Entry point of the learning path core. Every operation runs in
 * its own unit of work; activity updates are also serialized per
 * path.
 */
export default class LearningPathService {
  constructor(
    private unitOfWork: UnitOfWork,
    private locks: PathLock = new PathLock(),
    private template: PathTemplate = READING_JOURNEY_TEMPLATE
  ) {}

  generateLearningPath(profile: ChildProfileSnapshot): Promise<GeneratedLearningPath> {
    return this.unitOfWork.transaction((store) =>
      LearningPathGenerator.generate(profile, store, this.template)
    )
  }

  generateForProfile(childProfileId: number): Promise<GeneratedLearningPath> {
    return this.unitOfWork.transaction(async (store) => {
      const profile = await store.findProfile(childProfileId)
      if (!profile) {
        throw new RecordNotFoundException('child profile', childProfileId)
      }
      return LearningPathGenerator.generate(profile, store, this.template)
    })
  }

  async applyActivityStatus(
    activityId: number,
    requestedStatus: string
  ): Promise<ActivityStatusResult> {
    if (!isActivityStatus(requestedStatus)) {
      throw new InvalidActivityStatusException(requestedStatus)
    }

    const activity = await this.unitOfWork.transaction((store) => store.findActivity(activityId))
    if (!activity) {
      throw new RecordNotFoundException('path activity', activityId)
    }

    return this.locks.run(activity.learningPathId, () =>
      this.unitOfWork.transaction(async (store) => {
        /**
         * Read again under the lock, the activity may have changed
         * while we were waiting
         */
        const current = await store.findActivity(activityId)
        if (!current) {
          throw new RecordNotFoundException('path activity', activityId)
        }
        return ProgressTracker.applyActivityStatus(current, requestedStatus, store)
      })
    )
  }

  listPathsForProfile(childProfileId: number): Promise<LearningPathWithActivities[]> {
    return this.unitOfWork.transaction(async (store) => {
      const paths = await store.findPathsByProfile(childProfileId)
      const result: LearningPathWithActivities[] = []
      for (const path of paths) {
        result.push({ path, activities: await store.findActivitiesByPath(path.id) })
      }
      return result
    })
  }
}
