import { beforeEach, describe, expect, it } from 'vitest'
import LearningPathService from '#services/learning_path_service'
import PathLock from '#services/path_lock'
import { READING_JOURNEY_TEMPLATE } from '#services/path_template'
import InvalidActivityStatusException from '#exceptions/invalid_activity_status_exception'
import RecordNotFoundException from '#exceptions/record_not_found_exception'
import InMemoryUnitOfWork from '#tests/fakes/in_memory_unit_of_work'

const maya = { id: 1, name: 'Maya', age: 7, readingLevel: 'beginner' }
const leo = { id: 2, name: 'Leo', age: 10, readingLevel: 'intermediate' }

describe('LearningPathService', () => {
  let unitOfWork: InMemoryUnitOfWork
  let locks: PathLock
  let service: LearningPathService

  beforeEach(() => {
    unitOfWork = new InMemoryUnitOfWork()
    unitOfWork.addProfile(maya)
    unitOfWork.addProfile(leo)
    locks = new PathLock()
    service = new LearningPathService(unitOfWork, locks)
  })

  describe('generateForProfile', () => {
    it('generates a path from the stored profile', async () => {
      const { path, activities } = await service.generateForProfile(leo.id)

      expect(path.title).toBe('Personalized Reading Journey for Leo')
      expect(path.childProfileId).toBe(leo.id)
      expect(activities).toHaveLength(5)
      expect(unitOfWork.commits).toBe(1)
    })

    it('fails for an unknown profile', async () => {
      await expect(service.generateForProfile(42)).rejects.toBeInstanceOf(RecordNotFoundException)
      await expect(service.generateForProfile(42)).rejects.toThrow('Cannot find child profile with id 42')
      expect(unitOfWork.paths.size).toBe(0)
    })
  })

  it('generates with the template it was built with', async () => {
    const shortService = new LearningPathService(unitOfWork, locks, {
      ...READING_JOURNEY_TEMPLATE,
      name: 'two-steps',
      stages: READING_JOURNEY_TEMPLATE.stages.slice(0, 2),
    })

    const { path, activities } = await shortService.generateLearningPath(maya)

    expect(path.totalStages).toBe(2)
    expect(activities.map((activity) => activity.title)).toEqual([
      'Reading Assessment',
      'Vocabulary Building',
    ])
  })

  describe('applyActivityStatus', () => {
    it('advances the path of the activity', async () => {
      const { activities } = await service.generateLearningPath(maya)

      const result = await service.applyActivityStatus(activities[0].id, 'completed')

      expect(result.stageAdvanced).toBe(true)
      expect(result.path).toMatchObject({ currentStage: 2, progressPercentage: 20 })
      expect(locks.pending).toBe(0)
    })

    it('rejects an unknown status before opening a transaction', async () => {
      const { activities } = await service.generateLearningPath(maya)
      const transactions = unitOfWork.transactions

      await expect(service.applyActivityStatus(activities[0].id, 'finished')).rejects.toBeInstanceOf(
        InvalidActivityStatusException
      )
      expect(unitOfWork.transactions).toBe(transactions)
    })

    it('fails for an unknown activity', async () => {
      await expect(service.applyActivityStatus(999, 'completed')).rejects.toMatchObject({
        status: 404,
        code: 'E_RECORD_NOT_FOUND',
        message: 'Cannot find path activity with id 999',
      })
    })

    it('applies concurrent completions on one path one after the other', async () => {
      const { path, activities } = await service.generateLearningPath(maya)

      const results = await Promise.all([
        service.applyActivityStatus(activities[0].id, 'completed'),
        service.applyActivityStatus(activities[1].id, 'completed'),
      ])

      expect(results.map((result) => result.path.currentStage)).toEqual([2, 3])
      expect(unitOfWork.paths.get(path.id)).toMatchObject({ currentStage: 3, progressPercentage: 40 })
    })

    it('rolls back a failed update and keeps the path usable', async () => {
      const { path, activities } = await service.generateLearningPath(maya)
      unitOfWork.failOn('updatePath')

      await expect(service.applyActivityStatus(activities[0].id, 'completed')).rejects.toThrow(
        'updatePath failed'
      )
      expect(unitOfWork.activities.get(activities[0].id)).toMatchObject({
        status: 'pending',
        isCompleted: false,
      })
      expect(locks.pending).toBe(0)

      unitOfWork.clearFailures()
      const result = await service.applyActivityStatus(activities[0].id, 'completed')

      expect(result.path.id).toBe(path.id)
      expect(result.path.currentStage).toBe(2)
    })
  })

  describe('listPathsForProfile', () => {
    it('returns the paths of the profile with activities ordered by stage', async () => {
      const path = unitOfWork.insertPath({ childProfileId: maya.id, totalStages: 3 })
      unitOfWork.insertActivity({ learningPathId: path.id, stageNumber: 3 })
      unitOfWork.insertActivity({ learningPathId: path.id, stageNumber: 1 })
      unitOfWork.insertActivity({ learningPathId: path.id, stageNumber: 2 })
      await service.generateLearningPath(leo)

      const paths = await service.listPathsForProfile(maya.id)

      expect(paths).toHaveLength(1)
      expect(paths[0].path.id).toBe(path.id)
      expect(paths[0].activities.map((activity) => activity.stageNumber)).toEqual([1, 2, 3])
    })

    it('returns every path once the profile has been assessed again', async () => {
      await service.generateLearningPath(maya)
      await service.generateForProfile(maya.id)

      const paths = await service.listPathsForProfile(maya.id)

      expect(paths.map(({ path }) => path.currentStage)).toEqual([1, 1])
      expect(paths.every(({ activities }) => activities.length === 5)).toBe(true)
    })

    it('is empty for a profile without paths', async () => {
      await expect(service.listPathsForProfile(leo.id)).resolves.toEqual([])
    })
  })
})
