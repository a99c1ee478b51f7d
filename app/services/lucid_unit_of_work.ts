import db from '@adonisjs/lucid/services/db'
import type { TransactionClientContract } from '@adonisjs/lucid/types/database'
import ChildProfile from '#models/child_profile'
import LearningPath from '#models/learning_path'
import PathActivity from '#models/path_activity'
import RecordNotFoundException from '#exceptions/record_not_found_exception'
import type {
  LearningPathChanges,
  NewLearningPath,
  NewPathActivity,
  PathActivityChanges,
  PathStore,
  UnitOfWork,
} from '#types/learning_paths'

/**
 * Path store reading and writing through Lucid models, every query
 * bound to the given transaction
 */
export class LucidPathStore implements PathStore {
  constructor(private trx: TransactionClientContract) {}

  findProfile(id: number) {
    return ChildProfile.find(id, { client: this.trx })
  }

  createPath(attributes: NewLearningPath) {
    return LearningPath.create(attributes, { client: this.trx })
  }

  createActivities(activities: NewPathActivity[]) {
    return PathActivity.createMany(activities, { client: this.trx })
  }

  findPath(id: number) {
    return LearningPath.find(id, { client: this.trx })
  }

  findActivity(id: number) {
    return PathActivity.find(id, { client: this.trx })
  }

  async findPathsByProfile(childProfileId: number) {
    return LearningPath.query({ client: this.trx })
      .where('childProfileId', childProfileId)
      .orderBy('id', 'asc')
  }

  async findActivitiesByPath(learningPathId: number) {
    return PathActivity.query({ client: this.trx })
      .where('learningPathId', learningPathId)
      .orderBy('stageNumber', 'asc')
  }

  async countActivities(learningPathId: number, filter: { isCompleted?: boolean } = {}) {
    const query = PathActivity.query({ client: this.trx }).where('learningPathId', learningPathId)
    if (filter.isCompleted !== undefined) {
      query.where('isCompleted', filter.isCompleted)
    }

    const result = await query.count('* as total')
    return Number(result[0].$extras.total) || 0
  }

  async updatePath(id: number, changes: LearningPathChanges) {
    const path = await LearningPath.find(id, { client: this.trx })
    if (!path) {
      throw new RecordNotFoundException('learning path', id)
    }
    path.merge(changes)
    return path.save()
  }

  async updateActivity(id: number, changes: PathActivityChanges) {
    const activity = await PathActivity.find(id, { client: this.trx })
    if (!activity) {
      throw new RecordNotFoundException('path activity', id)
    }
    activity.merge(changes)
    return activity.save()
  }
}

export default class LucidUnitOfWork implements UnitOfWork {
  transaction<T>(work: (store: PathStore) => Promise<T>): Promise<T> {
    return db.transaction((trx) => work(new LucidPathStore(trx)))
  }
}
